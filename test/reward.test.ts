import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { PoolData } from '../src/transactions/pool/pool-interfaces.js';
import { StakeData } from '../src/transactions/stake/stake-interfaces.js';
import { computeReward, effectiveDuration, rewardOf, unlockTime } from '../src/utils/reward.js';
import { DAY, ONE, START } from './helpers.js';

const YEAR = 365 * DAY;

function makePool(apr: number, lockDuration: number): PoolData {
    return {
        poolId: 0,
        isNative: true,
        assetReference: null,
        apr,
        lockDuration,
        isActive: true,
        totalStaked: 0n,
        createdAt: START,
        creator: 'manager1',
    };
}

function makeStake(amount: bigint, lockDuration: number, overrides: Partial<StakeData> = {}): StakeData {
    return {
        owner: 'alice',
        stakeIndex: 0,
        poolId: 0,
        stakedAmount: amount,
        startTime: START,
        lockDuration,
        rewardsEarned: 0n,
        status: 'staked',
        requestId: null,
        ...overrides,
    };
}

describe('computeReward', () => {
    it('10 units at 5% for 30 days', () => {
        assert.equal(computeReward(10n * ONE, 5, 30 * DAY), 41095890410958904n);
    });

    it('a full year at 10% pays a tenth of the principal', () => {
        assert.equal(computeReward(1000n * ONE, 10, YEAR), 100n * ONE);
    });

    it('truncates toward zero', () => {
        assert.equal(computeReward(365_000_000n, 100, DAY), 1_000_000n);
        assert.equal(computeReward(99n, 1, 1), 0n);
    });

    it('is zero for empty inputs', () => {
        assert.equal(computeReward(0n, 5, YEAR), 0n);
        assert.equal(computeReward(ONE, 0, YEAR), 0n);
        assert.equal(computeReward(ONE, 5, 0), 0n);
    });
});

describe('effectiveDuration', () => {
    it('unlocked stakes accrue for the whole elapsed time', () => {
        assert.equal(effectiveDuration(START, 0, START + 100), 100);
    });

    it('locked stakes stop accruing at the lock end', () => {
        assert.equal(effectiveDuration(START, 50, START + 100), 50);
        assert.equal(effectiveDuration(START, 500, START + 100), 100);
    });

    it('a clock behind the start time counts as zero', () => {
        assert.equal(effectiveDuration(START, 0, START - 10), 0);
    });
});

describe('rewardOf', () => {
    it('caps a locked stake at its lock duration', () => {
        const pool = makePool(12, 60 * DAY);
        const stake = makeStake(100n * ONE, 60 * DAY);
        assert.equal(rewardOf(stake, pool, START + 90 * DAY), 1972602739726027397n);
        assert.equal(rewardOf(stake, pool, START + 90 * DAY), rewardOf(stake, pool, START + 60 * DAY));
    });

    it('keeps growing for an unlocked stake', () => {
        const pool = makePool(12, 0);
        const stake = makeStake(100n * ONE, 0);
        assert.equal(rewardOf(stake, pool, START + 90 * DAY), 2958904109589041095n);
    });

    it('returns the frozen reward once unstaking started', () => {
        const pool = makePool(12, 0);
        const stake = makeStake(100n * ONE, 0, { status: 'pending', rewardsEarned: 777n, requestId: 0 });
        assert.equal(rewardOf(stake, pool, START + 90 * DAY), 777n);
    });
});

describe('unlockTime', () => {
    it('adds the lock and the global minimum duration', () => {
        const stake = makeStake(ONE, 500, { startTime: 1000 });
        assert.equal(unlockTime(stake, 100), 1600);
    });
});
