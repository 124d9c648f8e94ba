import { DataIntegrityError, InvalidInputError, InvalidStateError, NotFoundError, PolicyViolationError } from '../../errors.js';
import logger from '../../logger.js';
import { logEvent } from '../../utils/event-logger.js';
import { rewardOf, unlockTime } from '../../utils/reward.js';
import validate from '../../validation/index.js';
import { formatPoolAmount } from '../pool/pool-helpers.js';
import { StakeData } from '../stake/stake-interfaces.js';
import type { TxContext } from '../types.js';
import { UnstakeRequestData, UnstakeRequestRecord } from './unstake-interfaces.js';

function getOwnStake(stakeIndex: number, ctx: TxContext): StakeData {
    // Stakes are addressed by (sender, index): nobody can name another owner's stake
    const stake = ctx.state.getStake(ctx.sender, stakeIndex);
    if (!stake) {
        logger.warn(`[unstake-request] Stake ${ctx.sender}/${stakeIndex} not found.`);
        throw new NotFoundError(`Stake ${stakeIndex} of ${ctx.sender} not found`, { owner: ctx.sender, stakeIndex });
    }
    return stake;
}

export async function validateTx(data: UnstakeRequestData, ctx: TxContext): Promise<void> {
    if (!validate.integer(data.stakeIndex, true, false)) {
        throw new InvalidInputError('stakeIndex must be a non-negative integer', 'stakeIndex');
    }

    const stake = getOwnStake(data.stakeIndex, ctx);
    if (stake.status !== 'staked') {
        logger.warn(`[unstake-request] Stake ${ctx.sender}/${data.stakeIndex} is ${stake.status}.`);
        throw new InvalidStateError(`Stake is ${stake.status}, expected staked`, {
            owner: ctx.sender,
            stakeIndex: data.stakeIndex,
            status: stake.status,
        });
    }

    const availableAt = unlockTime(stake, ctx.state.getSettings().minimumStakeDuration);
    if (ctx.now < availableAt) {
        logger.warn(`[unstake-request] Stake ${ctx.sender}/${data.stakeIndex} locked until ${availableAt}.`);
        throw new PolicyViolationError('Stake is still locked', {
            stakeIndex: data.stakeIndex,
            availableAt,
            now: ctx.now,
        });
    }
}

export async function processTx(data: UnstakeRequestData, ctx: TxContext): Promise<number> {
    const stake = getOwnStake(data.stakeIndex, ctx);
    const pool = ctx.state.getPool(stake.poolId);
    if (!pool) {
        throw new DataIntegrityError(`Stake ${ctx.sender}/${data.stakeIndex} references unknown pool ${stake.poolId}`);
    }

    const reward = rewardOf(stake, pool, ctx.now);
    const requestId = ctx.state.requestCount(pool.poolId);

    ctx.state.updateStake(ctx.sender, data.stakeIndex, {
        status: 'pending',
        rewardsEarned: reward,
        requestId,
    });

    const totalStaked = pool.totalStaked - stake.stakedAmount;
    if (totalStaked < 0n) {
        throw new DataIntegrityError(`Pool ${pool.poolId} total staked would become negative`);
    }
    ctx.state.updatePool(pool.poolId, { totalStaked });

    const request: UnstakeRequestRecord = {
        poolId: pool.poolId,
        requestId,
        user: ctx.sender,
        stakeIndex: data.stakeIndex,
        amount: stake.stakedAmount,
        reward,
        timestamp: ctx.now,
    };
    ctx.state.appendUnstakeRequest(request);

    logEvent(ctx, 'unstake', 'requested', {
        poolId: pool.poolId,
        requestId,
        user: ctx.sender,
        stakeIndex: data.stakeIndex,
        amount: stake.stakedAmount.toString(),
        reward: reward.toString(),
    });
    logger.info(`[unstake-request] ${ctx.sender} requested unstake of stake #${data.stakeIndex} (request ${pool.poolId}/${requestId}, reward ${formatPoolAmount(pool, reward)}).`);
    return requestId;
}
