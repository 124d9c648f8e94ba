import { UnauthorizedError } from '../errors.js';
import logger from '../logger.js';
import type { TxContext } from '../transactions/types.js';
import { TransactionType } from '../transactions/types.js';

export function requireManager(ctx: TxContext): void {
    if (!ctx.state.isManager(ctx.sender)) {
        logger.warn(`[access] ${ctx.sender} is not a manager (${TransactionType[ctx.type]})`);
        throw new UnauthorizedError(`${ctx.sender} is not a manager`, ctx.sender, 'manager');
    }
}

export function requireOwner(ctx: TxContext): void {
    if (ctx.state.getSettings().owner !== ctx.sender) {
        logger.warn(`[access] ${ctx.sender} is not the owner (${TransactionType[ctx.type]})`);
        throw new UnauthorizedError(`${ctx.sender} is not the owner`, ctx.sender, 'owner');
    }
}
