import cors from 'cors';
import express, { Express } from 'express';
import { Server } from 'http';

import type { Ledger } from '../../ledger.js';
import logger from '../../logger.js';
import settings from '../../settings.js';
import configRouter from './config.js';
import eventsRouter from './events.js';
import poolsRouter from './pools.js';
import stakesRouter from './stakes.js';
import { bigintReplacer } from './utils.js';

/**
 * Read-only HTTP API over a ledger.
 */
export function createApp(ledger: Ledger): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());
    app.set('json replacer', bigintReplacer);

    logger.trace('Setting up HTTP endpoints...');
    app.use('/pools', poolsRouter(ledger));
    app.use('/stakes', stakesRouter(ledger));
    app.use('/config', configRouter(ledger));
    app.use('/events', eventsRouter(ledger));
    logger.trace('Initialized API endpoints /pools, /stakes, /config, /events');
    return app;
}

/**
 * HTTP server module
 */
export function init(ledger: Ledger, port: number = settings.apiPort): Server {
    const app = createApp(ledger);

    // Set host for Linux platform
    const host = process.platform === 'linux' ? '0.0.0.0' : undefined;
    logger.debug(`Starting HTTP server on port ${port}`);

    const onListening = (): void => {
        const addr = server.address();
        if (addr && typeof addr !== 'string') {
            logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
        } else {
            logger.info(`HTTP server listening on port ${port}`);
        }
    };
    const server = host ? app.listen(port, host, onListening) : app.listen(port, onListening);

    server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
            logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
        } else if (error.code === 'EACCES') {
            logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
        } else {
            logger.error(`HTTP server error: ${error.message}`);
        }
    });
    return server;
}

export default {
    createApp,
    init,
};
