import logger from '../logger.js';
import { sendKafkaEvents } from '../modules/kafka.js';
import settings from '../settings.js';
import type { TxContext } from '../transactions/types.js';
import { deterministicIdFrom } from './deterministic-id.js';

export type EventCategory = 'pool' | 'stake' | 'unstake' | 'config' | 'role';
export type EventValue = string | number | boolean | null;
export type EventData = Record<string, EventValue>;

/**
 * Represents the structure of an event document to be stored.
 */
export interface EventDocument {
    _id: string;
    sequence: number; // Position in the event log; commit order
    category: EventCategory;
    action: string;
    type: string; // category_action
    timestamp: string;
    time: number; // Ledger clock, unix seconds
    actor: string;
    data: EventData;
    transactionId: string;
}

/**
 * Records a notification as part of the running operation. The event lives in
 * the ledger state, so it disappears if the operation rolls back.
 */
export function logEvent(ctx: TxContext, category: EventCategory, action: string, data: EventData): EventDocument {
    const sequence = ctx.state.listEvents().length;
    const eventDocument: EventDocument = {
        _id: deterministicIdFrom([category, action, ctx.sender, ctx.txId, sequence], 24),
        sequence,
        category,
        action,
        type: `${category}_${action}`,
        timestamp: new Date(ctx.now * 1000).toISOString(),
        time: ctx.now,
        actor: ctx.sender,
        data,
        transactionId: ctx.txId,
    };
    ctx.state.appendEvent(eventDocument);
    logger.debug(`[event-logger] ${eventDocument.type} by ${ctx.sender}: ${JSON.stringify(data)}`);
    return eventDocument;
}

/**
 * Publishes committed events to Kafka when notifications are enabled.
 */
export async function publishEvents(events: EventDocument[]): Promise<void> {
    if (!settings.useNotification || events.length === 0) return;
    await sendKafkaEvents(
        settings.kafkaTopic,
        events.map(event => ({ key: event._id, value: JSON.stringify(event) }))
    );
}
