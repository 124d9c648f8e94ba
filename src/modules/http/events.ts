import express, { Request, Response, Router } from 'express';

import type { Ledger } from '../../ledger.js';
import { getPagination, getStringQuery, sendError } from './utils.js';

export default function eventsRouter(ledger: Ledger): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /events Committed ledger events, oldest first
     * @apiUse PaginationParams
     * @apiParam {String} [category] pool, stake, unstake, config or role
     * @apiParam {String} [type] e.g. stake_created
     * @apiParam {String} [actor] Principal that issued the operation
     */
    router.get('/', (req: Request, res: Response) => {
        try {
            const { limit, skip, page } = getPagination(req);
            const category = getStringQuery(req, 'category');
            const type = getStringQuery(req, 'type');
            const actor = getStringQuery(req, 'actor');

            if (!category && !type && !actor) {
                const data = ledger.getEvents(skip, limit);
                res.json({ data, total: ledger.state.listEvents().length, limit, skip, page });
                return;
            }

            const matching = ledger.state.listEvents().filter(event =>
                (!category || event.category === category) &&
                (!type || event.type === type) &&
                (!actor || event.actor === actor)
            );
            res.json({ data: matching.slice(skip, skip + limit), total: matching.length, limit, skip, page });
        } catch (error) {
            sendError(res, error, 'Error fetching events');
        }
    });

    return router;
}
