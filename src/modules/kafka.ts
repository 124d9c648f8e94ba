import { Kafka, Producer, logLevel } from 'kafkajs';

import { describeError } from '../errors.js';
import logger from '../logger.js';
import settings from '../settings.js';

let kafka: Kafka | null = null;
let producer: Producer | null = null;
let connecting: Promise<void> | null = null;
let isConnected = false;

/**
 * Initializes the Kafka client and producer once. Concurrent callers share
 * the same connection attempt.
 */
export async function initializeKafkaProducer(): Promise<void> {
    if (isConnected) return;
    if (connecting) return connecting;

    connecting = (async () => {
        try {
            kafka = new Kafka({
                clientId: settings.kafkaClientId,
                brokers: settings.kafkaBrokers,
                logLevel: logLevel.WARN,
                retry: {
                    initialRetryTime: 300,
                    retries: 5,
                },
            });

            const newProducer = kafka.producer({
                allowAutoTopicCreation: true,
            });

            await newProducer.connect();
            producer = newProducer;
            isConnected = true;
            logger.info(`[kafka-producer] Connected to ${settings.kafkaBrokers.join(', ')}`);

            producer.on('producer.disconnect', () => {
                logger.warn('[kafka-producer] Kafka producer disconnected.');
                isConnected = false;
            });
        } catch (error) {
            isConnected = false;
            producer = null;
            logger.error(`[kafka-producer] Failed to initialize or connect Kafka producer: ${describeError(error)}`);
        } finally {
            connecting = null;
        }
    })();
    return connecting;
}

/**
 * Sends JSON messages to a topic. Delivery failures are logged, not thrown:
 * notifications never decide whether a ledger operation succeeded.
 */
export async function sendKafkaEvents(topic: string, messages: Array<{ key: string; value: string }>): Promise<void> {
    if (!producer || !isConnected) {
        await initializeKafkaProducer();
    }
    if (!producer || !isConnected) {
        logger.error(`[kafka-producer] Producer unavailable, dropping ${messages.length} message(s) for topic '${topic}'`);
        return;
    }

    try {
        await producer.send({ topic, messages });
        logger.debug(`[kafka-producer] Sent ${messages.length} message(s) to Kafka topic '${topic}'`);
    } catch (error) {
        logger.error(`[kafka-producer] Failed to send to Kafka topic '${topic}': ${describeError(error)}`);
    }
}

/**
 * Disconnects the Kafka producer.
 * Call this on application shutdown to ensure graceful disconnection.
 */
export async function disconnectKafkaProducer(): Promise<void> {
    if (producer && isConnected) {
        try {
            await producer.disconnect();
            logger.info('[kafka-producer] Kafka producer disconnected successfully.');
        } catch (error) {
            logger.error(`[kafka-producer] Error disconnecting Kafka producer: ${describeError(error)}`);
        } finally {
            producer = null;
            isConnected = false;
        }
    }
}
