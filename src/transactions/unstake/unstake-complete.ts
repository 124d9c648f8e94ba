import { InvalidInputError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { formatPoolAmount } from '../pool/pool-helpers.js';
import type { TxContext } from '../types.js';
import { assertFunding, handleExcessValue, resolvePendingRequest, settle } from './unstake-helpers.js';
import { UnstakeCompleteData } from './unstake-interfaces.js';

export async function validateTx(data: UnstakeCompleteData, ctx: TxContext): Promise<void> {
    requireManager(ctx);

    if (!validate.integer(data.poolId, true, false)) {
        throw new InvalidInputError('poolId must be a non-negative integer', 'poolId');
    }
    if (!validate.integer(data.requestId, true, false)) {
        throw new InvalidInputError('requestId must be a non-negative integer', 'requestId');
    }

    const target = resolvePendingRequest(ctx.state, data.poolId, data.requestId);
    await assertFunding(ctx, target.pool, target.total);
}

export async function processTx(data: UnstakeCompleteData, ctx: TxContext): Promise<bigint> {
    const target = resolvePendingRequest(ctx.state, data.poolId, data.requestId);
    await settle(ctx, target);
    const refunded = target.pool.isNative ? await handleExcessValue(ctx, target.total) : 0n;

    logEvent(ctx, 'unstake', 'completed', {
        poolId: data.poolId,
        requestId: data.requestId,
        user: target.request.user,
        stakeIndex: target.request.stakeIndex,
        amount: target.request.amount.toString(),
        reward: target.request.reward.toString(),
        total: target.total.toString(),
        refunded: refunded.toString(),
    });
    logger.info(`[unstake-complete] ${ctx.sender} settled request ${data.poolId}/${data.requestId}: ${formatPoolAmount(target.pool, target.total)} to ${target.request.user}.`);
    return target.total;
}
