import config from '../config.js';
import { PoolData } from '../transactions/pool/pool-interfaces.js';
import { StakeData } from '../transactions/stake/stake-interfaces.js';

const SECONDS_PER_YEAR = BigInt(config.secondsPerYear);

/**
 * Linear APR accrual: amount * apr% * duration / year, truncated.
 * The precision factor multiplies before the division and divides after it;
 * floor(floor(x * P / d) / P) === floor(x / d), so it adds no bias.
 */
export function computeReward(amount: bigint, apr: number, durationSeconds: number): bigint {
    if (amount <= 0n || apr <= 0 || durationSeconds <= 0) return 0n;
    const scaled = (amount * BigInt(apr) * BigInt(durationSeconds) * config.rewardPrecision) /
        (config.aprDenominator * SECONDS_PER_YEAR);
    return scaled / config.rewardPrecision;
}

/**
 * Seconds that count toward the reward: elapsed time, capped at the lock
 * duration for locked stakes. Unlocked stakes accrue indefinitely.
 */
export function effectiveDuration(startTime: number, lockDuration: number, now: number): number {
    const elapsed = Math.max(0, now - startTime);
    return lockDuration > 0 ? Math.min(elapsed, lockDuration) : elapsed;
}

/**
 * The frozen reward once an unstake was requested, otherwise a live estimate.
 */
export function rewardOf(stake: StakeData, pool: PoolData, now: number): bigint {
    if (stake.status !== 'staked') return stake.rewardsEarned;
    return computeReward(stake.stakedAmount, pool.apr, effectiveDuration(stake.startTime, stake.lockDuration, now));
}

/**
 * Earliest time an unstake request is accepted.
 */
export function unlockTime(stake: StakeData, minimumStakeDuration: number): number {
    return stake.startTime + stake.lockDuration + minimumStakeDuration;
}
