// Runtime settings sourced from environment variables

import config from './config.js';

export type ExcessNativePolicy = 'retain' | 'refund';

function parseExcessPolicy(raw: string | undefined): ExcessNativePolicy {
    return raw === 'refund' ? 'refund' : config.defaultExcessNativePolicy;
}

export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const logToFile: boolean = process.env.LOG_TO_FILE !== 'false';
export const logDir: string = process.env.LOG_DIR || '';
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'stakevault';
export const usePersistence: boolean = process.env.USE_PERSISTENCE !== 'false';
export const useNotification: boolean = process.env.USE_NOTIFICATION === 'true';
export const kafkaBrokers: string[] = (process.env.KAFKA_BROKERS || process.env.KAFKA_BROKER || 'localhost:29092')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
export const kafkaClientId: string = process.env.KAFKA_CLIENT_ID || 'stakevault-event-producer';
export const kafkaTopic: string = process.env.KAFKA_TOPIC || 'stakevault-events';

// The principal that initializes the ledger becomes owner and first manager
export const ledgerOwner: string = process.env.LEDGER_OWNER || 'owner';
export const ledgerTreasury: string = process.env.LEDGER_TREASURY || 'treasury';
// Custody account that holds native value attached to an operation
export const ledgerAccount: string = process.env.LEDGER_ACCOUNT || 'stakevault';
export const minimumStakeAmount: string = process.env.MIN_STAKE_AMOUNT || config.defaultMinimumStakeAmount;
export const minimumStakeDuration: number = process.env.MIN_STAKE_DURATION
    ? parseInt(process.env.MIN_STAKE_DURATION)
    : config.defaultMinimumStakeDuration;
export const excessNativePolicy: ExcessNativePolicy = parseExcessPolicy(process.env.EXCESS_NATIVE_POLICY);

export default {
    apiPort,
    logLevel,
    logToFile,
    logDir,
    mongoUrl,
    mongoDb,
    usePersistence,
    useNotification,
    kafkaBrokers,
    kafkaClientId,
    kafkaTopic,
    ledgerOwner,
    ledgerTreasury,
    ledgerAccount,
    minimumStakeAmount,
    minimumStakeDuration,
    excessNativePolicy,
};
