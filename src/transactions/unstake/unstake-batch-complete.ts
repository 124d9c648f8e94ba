import config from '../../config.js';
import { InvalidInputError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { TxContext } from '../types.js';
import { assertFunding, findSettleable, getPoolOrFail, handleExcessValue, quoteBatch, settle } from './unstake-helpers.js';
import { UnstakeBatchCompleteData } from './unstake-interfaces.js';

export async function validateTx(data: UnstakeBatchCompleteData, ctx: TxContext): Promise<void> {
    requireManager(ctx);

    if (!validate.integer(data.poolId, true, false)) {
        throw new InvalidInputError('poolId must be a non-negative integer', 'poolId');
    }
    if (!validate.array(data.requestIds, config.maxBatchSize)) {
        logger.warn('[unstake-batch-complete] requestIds must be a non-empty list.');
        throw new InvalidInputError(`requestIds must hold between 1 and ${config.maxBatchSize} ids`, 'requestIds');
    }
    if (!data.requestIds.every(id => validate.integer(id, true, false))) {
        throw new InvalidInputError('requestIds must be non-negative integers', 'requestIds');
    }

    const pool = getPoolOrFail(ctx.state, data.poolId);
    const quote = quoteBatch(ctx.state, pool, data.requestIds);
    await assertFunding(ctx, pool, quote.total);
}

export async function processTx(data: UnstakeBatchCompleteData, ctx: TxContext): Promise<number> {
    const pool = getPoolOrFail(ctx.state, data.poolId);
    const handled = new Set<number>();
    let requestsProcessed = 0;
    let paid = 0n;

    for (const requestId of data.requestIds) {
        if (handled.has(requestId)) continue;
        handled.add(requestId);

        // Pass two re-checks every entry; stale ones are skipped, not fatal
        const target = findSettleable(ctx.state, pool, requestId);
        if (!target) {
            logger.debug(`[unstake-batch-complete] Skipping request ${pool.poolId}/${requestId}: not pending.`);
            continue;
        }
        await settle(ctx, target);
        paid += target.total;
        requestsProcessed++;
    }

    const refunded = pool.isNative ? await handleExcessValue(ctx, paid) : 0n;

    logEvent(ctx, 'unstake', 'batch_completed', {
        poolId: pool.poolId,
        requestsProcessed,
        requestsSubmitted: data.requestIds.length,
        totalPaid: paid.toString(),
        refunded: refunded.toString(),
    });
    logger.info(`[unstake-batch-complete] ${ctx.sender} settled ${requestsProcessed}/${data.requestIds.length} request(s) in pool ${pool.poolId}.`);
    return requestsProcessed;
}
