import express, { Request, Response, Router } from 'express';

import type { Ledger } from '../../ledger.js';
import { getIdParam, getPagination, sendError } from './utils.js';

/**
 * Pool registry and unstake request endpoints.
 */
export default function poolsRouter(ledger: Ledger): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /pools List all pools
     * @apiUse PaginationParams
     */
    router.get('/', (req: Request, res: Response) => {
        try {
            const { limit, skip, page } = getPagination(req);
            const data = ledger.getAllPools(skip, limit);
            res.json({ data, total: ledger.poolCount(), limit, skip, page });
        } catch (error) {
            sendError(res, error, 'Error fetching pools');
        }
    });

    /**
     * @api {get} /pools/active List pools accepting new stakes
     * @apiUse PaginationParams
     */
    router.get('/active', (req: Request, res: Response) => {
        try {
            const { limit, skip, page } = getPagination(req);
            const data = ledger.getActivePools(skip, limit);
            res.json({ data, limit, skip, page });
        } catch (error) {
            sendError(res, error, 'Error fetching active pools');
        }
    });

    router.get('/count', (_req: Request, res: Response) => {
        res.json({ count: ledger.poolCount() });
    });

    router.get('/:poolId', (req: Request, res: Response) => {
        try {
            const pool = ledger.getPool(getIdParam(req, 'poolId'));
            res.json({ ...pool, requestCount: ledger.requestCount(pool.poolId) });
        } catch (error) {
            sendError(res, error, `Error fetching pool ${req.params.poolId}`);
        }
    });

    /**
     * @api {get} /pools/:poolId/requests List unstake requests of a pool
     * @apiUse PaginationParams
     */
    router.get('/:poolId/requests', (req: Request, res: Response) => {
        try {
            const poolId = getIdParam(req, 'poolId');
            const { limit, skip, page } = getPagination(req);
            const data = ledger.getUnstakeRequests(poolId, skip, limit);
            res.json({ data, total: ledger.requestCount(poolId), limit, skip, page });
        } catch (error) {
            sendError(res, error, `Error fetching requests of pool ${req.params.poolId}`);
        }
    });

    router.get('/:poolId/requests/:requestId', (req: Request, res: Response) => {
        try {
            res.json(ledger.getUnstakeRequest(getIdParam(req, 'poolId'), getIdParam(req, 'requestId')));
        } catch (error) {
            sendError(res, error, `Error fetching request ${req.params.poolId}/${req.params.requestId}`);
        }
    });

    return router;
}
