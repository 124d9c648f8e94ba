import 'dotenv/config';

import config from './config.js';
import { describeError } from './errors.js';
import { createInitialState, Ledger } from './ledger.js';
import logger from './logger.js';
import { disconnectKafkaProducer, initializeKafkaProducer } from './modules/kafka.js';
import http from './modules/http/index.js';
import { mongo } from './mongo.js';
import { systemClock } from './ports.js';
import settings from './settings.js';
import { LedgerState } from './state.js';
import { CommitListener } from './transactions/index.js';
import AccountBook from './utils/account.js';
import { publishEvents } from './utils/event-logger.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection:', { reason_details: describeError(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20, 22];
const currentNodeV = parseInt(process.versions.node.split('.')[0]);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

let closing = false;
let ledgerState: LedgerState | null = null;

async function loadState(): Promise<LedgerState> {
    if (!settings.usePersistence) {
        logger.warn('Persistence disabled (USE_PERSISTENCE=false); state lives in memory only.');
        return createInitialState();
    }
    await mongo.init();
    const snapshot = await mongo.loadSnapshot();
    if (snapshot) return LedgerState.fromSnapshot(snapshot);

    logger.info(`No ledger found in ${settings.mongoDb}, initializing owner ${settings.ledgerOwner}.`);
    const state = createInitialState();
    await mongo.writeSnapshot(state);
    return state;
}

export async function main(): Promise<void> {
    logger.info(`Starting ${config.ledgerName}...`);

    const state = await loadState();
    ledgerState = state;

    if (settings.useNotification) await initializeKafkaProducer();

    const onCommit: CommitListener = async (_changes, events) => {
        if (settings.usePersistence) await mongo.writeToDisk(state);
        await publishEvents(events);
    };

    // Development value transfer; a host embedding the ledger supplies its own
    const ledger = new Ledger({ state, transfer: new AccountBook(), clock: systemClock, onCommit });
    logger.info(`Ledger ready: ${ledger.poolCount()} pool(s), owner ${ledger.owner()}, nonce ${state.getNonce()}.`);

    http.init(ledger);
    logger.info(`${config.ledgerName} started successfully.`);
}

process.on('SIGINT', () => {
    if (closing) return;
    closing = true;
    logger.info('Received SIGINT, completing writer queue...');

    setTimeout(() => {
        logger.warn('Forcing shutdown after 30s timeout...');
        process.exit(1);
    }, 30000).unref();

    const flush = ledgerState && settings.usePersistence ? mongo.writeToDisk(ledgerState) : Promise.resolve();
    flush
        .then(() => disconnectKafkaProducer())
        .then(() => mongo.close())
        .then(() => {
            logger.info(`${config.ledgerName} exited safely`);
            process.exit(0);
        })
        .catch((error: unknown) => {
            logger.error(`Shutdown failed: ${describeError(error)}`);
            process.exit(1);
        });
});

main().catch(error => {
    logger.fatal(`Critical error during startup: ${describeError(error)}`);
    process.exit(1);
});

export default main;
