import { Request, Response } from 'express';

import config from '../../config.js';
import { describeError, InvalidInputError, LedgerError } from '../../errors.js';
import logger from '../../logger.js';

/**
 * @apiDefine PaginationParams
 * @apiParam {Number} [limit=10] Number of items to return per page (max: 100)
 * @apiParam {Number} [offset=0] Number of items to skip (for pagination)
 *
 * @apiSuccess {Object[]} data Array of items
 * @apiSuccess {Number} total Total number of items available
 * @apiSuccess {Number} limit Number of items per page
 * @apiSuccess {Number} skip Number of items skipped
 * @apiSuccess {Number} page Current page number
 *
 * @apiSuccessExample {json} Pagination Response:
 *     {
 *       "data": [...],
 *       "total": 150,
 *       "limit": 20,
 *       "skip": 40,
 *       "page": 3
 *     }
 */

function parseNonNegative(raw: unknown, field: string): number | undefined {
    if (raw === undefined) return undefined;
    if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
        throw new InvalidInputError(`${field} must be a non-negative integer`, field);
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) throw new InvalidInputError(`${field} is too large`, field);
    return value;
}

/**
 * Get pagination parameters from request query
 * @returns Object with limit, skip, and page properties
 */
export const getPagination = (req: Request) => {
    const requested = parseNonNegative(req.query.limit, 'limit') ?? config.defaultPageSize;
    const limit = Math.min(requested, config.maxPageSize);
    const offset = parseNonNegative(req.query.offset, 'offset') ?? 0;
    return {
        limit,
        skip: offset,
        page: limit > 0 ? Math.floor(offset / limit) + 1 : 1,
    };
};

/**
 * Reads a numeric route parameter such as :poolId.
 */
export const getIdParam = (req: Request, name: string): number => {
    const value = parseNonNegative(req.params[name], name);
    if (value === undefined) throw new InvalidInputError(`${name} is required`, name);
    return value;
};

export const getStringQuery = (req: Request, name: string): string | undefined => {
    const raw = req.query[name];
    return typeof raw === 'string' && raw.length > 0 ? raw : undefined;
};

// Amounts leave the API as decimal strings
export const bigintReplacer = (_key: string, value: unknown): unknown =>
    typeof value === 'bigint' ? value.toString() : value;

function statusOf(error: LedgerError): number {
    switch (error.code) {
        case 'NOT_FOUND':
            return 404;
        case 'INVALID_INPUT':
            return 400;
        default:
            return 500;
    }
}

export const sendError = (res: Response, error: unknown, context: string): void => {
    if (error instanceof LedgerError) {
        const status = statusOf(error);
        if (status === 500) logger.error(`[http] ${context}: ${error.message}`);
        res.status(status).json({ error: error.code, message: error.message, details: error.details });
        return;
    }
    logger.error(`[http] ${context}: ${describeError(error)}`);
    res.status(500).json({
        error: 'INTERNAL_ERROR',
        message: error instanceof Error ? error.message : 'Unknown error',
    });
};
