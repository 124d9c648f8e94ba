import { InvalidInputError, NotFoundError, PolicyViolationError } from '../../errors.js';
import logger from '../../logger.js';
import { logEvent } from '../../utils/event-logger.js';
import { transferOrFail } from '../../utils/transfer.js';
import validate from '../../validation/index.js';
import { formatPoolAmount } from '../pool/pool-helpers.js';
import { PoolData } from '../pool/pool-interfaces.js';
import type { TxContext } from '../types.js';
import { StakeCreateData, StakeData } from './stake-interfaces.js';

function getActivePool(poolId: number, ctx: TxContext): PoolData {
    const pool = ctx.state.getPool(poolId);
    if (!pool) {
        logger.warn(`[stake-create] Pool ${poolId} not found.`);
        throw new NotFoundError(`Pool ${poolId} not found`, { poolId });
    }
    if (!pool.isActive) {
        logger.warn(`[stake-create] Pool ${poolId} is not active.`);
        throw new PolicyViolationError(`Pool ${poolId} is not active`, { poolId });
    }
    return pool;
}

export async function validateTx(data: StakeCreateData, ctx: TxContext): Promise<void> {
    if (!validate.integer(data.poolId, true, false)) {
        throw new InvalidInputError('poolId must be a non-negative integer', 'poolId');
    }
    if (!validate.bigint(data.amount, false, false)) {
        throw new InvalidInputError('amount must be a positive integer amount', 'amount');
    }

    const pool = getActivePool(data.poolId, ctx);

    const { minimumStakeAmount } = ctx.state.getSettings();
    if (data.amount < minimumStakeAmount) {
        logger.warn(`[stake-create] Amount ${data.amount} below minimum ${minimumStakeAmount}.`);
        throw new PolicyViolationError('Amount is below the minimum stake amount', {
            amount: data.amount.toString(),
            minimumStakeAmount: minimumStakeAmount.toString(),
        });
    }

    if (pool.isNative && ctx.value !== data.amount) {
        logger.warn(`[stake-create] Attached value ${ctx.value} does not match amount ${data.amount}.`);
        throw new PolicyViolationError('Attached value must equal the staked amount', {
            value: ctx.value.toString(),
            amount: data.amount.toString(),
        });
    }
    if (!pool.isNative && ctx.value !== 0n) {
        logger.warn(`[stake-create] Value attached to asset pool ${pool.poolId}.`);
        throw new PolicyViolationError('Asset pools do not accept attached value', { value: ctx.value.toString() });
    }
}

export async function processTx(data: StakeCreateData, ctx: TxContext): Promise<number> {
    const pool = getActivePool(data.poolId, ctx);
    const { treasury, custodyAccount } = ctx.state.getSettings();

    if (pool.isNative || pool.assetReference === null) {
        await transferOrFail(ctx, { kind: 'native', from: custodyAccount, to: treasury, amount: data.amount });
    } else {
        await transferOrFail(ctx, { kind: 'token', assetReference: pool.assetReference, from: ctx.sender, to: treasury, amount: data.amount });
    }

    const stakeIndex = ctx.state.stakeCount(ctx.sender);
    const stake: StakeData = {
        owner: ctx.sender,
        stakeIndex,
        poolId: pool.poolId,
        stakedAmount: data.amount,
        startTime: ctx.now,
        lockDuration: pool.lockDuration,
        rewardsEarned: 0n,
        status: 'staked',
        requestId: null,
    };
    ctx.state.appendStake(stake);

    const totalStaked = pool.totalStaked + data.amount;
    ctx.state.updatePool(pool.poolId, { totalStaked });

    logEvent(ctx, 'stake', 'created', {
        poolId: pool.poolId,
        staker: ctx.sender,
        stakeIndex,
        amount: data.amount.toString(),
        totalStaked: totalStaked.toString(),
    });
    logger.info(`[stake-create] ${ctx.sender} staked ${formatPoolAmount(pool, data.amount)} in pool ${pool.poolId} (stake #${stakeIndex}).`);
    return stakeIndex;
}
