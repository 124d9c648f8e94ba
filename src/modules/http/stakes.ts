import express, { Request, Response, Router } from 'express';

import type { Ledger } from '../../ledger.js';
import { getIdParam, getPagination, sendError } from './utils.js';

export default function stakesRouter(ledger: Ledger): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /stakes/:owner Stakes of one principal, with live rewards
     * @apiUse PaginationParams
     */
    router.get('/:owner', (req: Request, res: Response) => {
        try {
            const { owner } = req.params;
            const { limit, skip, page } = getPagination(req);
            const data = ledger.getUserStakes(owner, skip, limit);
            res.json({ data, total: ledger.stakeCount(owner), limit, skip, page });
        } catch (error) {
            sendError(res, error, `Error fetching stakes of ${req.params.owner}`);
        }
    });

    router.get('/:owner/:stakeIndex', (req: Request, res: Response) => {
        try {
            res.json(ledger.getStake(req.params.owner, getIdParam(req, 'stakeIndex')));
        } catch (error) {
            sendError(res, error, `Error fetching stake ${req.params.owner}/${req.params.stakeIndex}`);
        }
    });

    return router;
}
