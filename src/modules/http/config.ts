import express, { Request, Response, Router } from 'express';

import config from '../../config.js';
import type { Ledger } from '../../ledger.js';
import { sendError } from './utils.js';

export default function configRouter(ledger: Ledger): Router {
    const router: Router = express.Router();

    router.get('/', (_req: Request, res: Response) => {
        try {
            res.json({
                current: ledger.getConfig(),
                protocol: {
                    secondsPerYear: config.secondsPerYear,
                    nativeTokenSymbol: config.nativeTokenSymbol,
                    nativeTokenPrecision: config.nativeTokenPrecision,
                    maxBatchSize: config.maxBatchSize,
                    maxPageSize: config.maxPageSize,
                },
                metadata: {
                    endpoint: '/config',
                    timestamp: new Date().toISOString(),
                },
            });
        } catch (error) {
            sendError(res, error, 'Failed to retrieve configuration');
        }
    });

    return router;
}
