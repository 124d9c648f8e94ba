import { InvalidInputError, NotFoundError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { TxContext } from '../types.js';
import { PoolSetActiveData } from './pool-interfaces.js';

export async function validateTx(data: PoolSetActiveData, ctx: TxContext): Promise<void> {
    requireManager(ctx);

    if (!validate.integer(data.poolId, true, false)) {
        throw new InvalidInputError('poolId must be a non-negative integer', 'poolId');
    }
    if (!validate.boolean(data.isActive)) {
        throw new InvalidInputError('isActive must be a boolean', 'isActive');
    }
    if (!ctx.state.getPool(data.poolId)) {
        logger.warn(`[pool-set-active] Pool ${data.poolId} not found.`);
        throw new NotFoundError(`Pool ${data.poolId} not found`, { poolId: data.poolId });
    }
}

export async function processTx(data: PoolSetActiveData, ctx: TxContext): Promise<void> {
    ctx.state.updatePool(data.poolId, { isActive: data.isActive });

    logEvent(ctx, 'pool', 'status_changed', {
        poolId: data.poolId,
        isActive: data.isActive,
    });
    logger.info(`[pool-set-active] Pool ${data.poolId} is now ${data.isActive ? 'active' : 'inactive'}.`);
}
