import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createInitialState, Ledger } from '../src/ledger.js';
import { LedgerState } from '../src/state.js';
import AccountBook from '../src/utils/account.js';
import { ALICE, BOB, createTestLedger, DAY, ManualClock, OWNER, START, TestLedger, withCode } from './helpers.js';

async function withFivePools(): Promise<TestLedger> {
    const setup = createTestLedger();
    for (let i = 0; i < 5; i++) await setup.ledger.createPool(OWNER, true, null, 5 + i, 0);
    return setup;
}

describe('pool listings', () => {
    it('pages through every pool in id order', async () => {
        const { ledger } = await withFivePools();
        const ids: number[] = [];
        for (let offset = 0; offset < ledger.poolCount(); offset += 2) {
            ids.push(...ledger.getAllPools(offset, 2).map(pool => pool.poolId));
        }
        assert.deepEqual(ids, [0, 1, 2, 3, 4]);
    });

    it('distinguishes the end of the list from an offset past it', async () => {
        const { ledger } = await withFivePools();
        assert.deepEqual(ledger.getAllPools(5, 10), []);
        assert.deepEqual(ledger.getAllPools(0, 0), []);
        assert.throws(() => ledger.getAllPools(6, 10), withCode('NOT_FOUND'));
        assert.throws(() => ledger.getAllPools(-1, 10), withCode('INVALID_INPUT'));
        assert.throws(() => ledger.getAllPools(0, 1.5), withCode('INVALID_INPUT'));
    });

    it('counts the active offset over active pools only', async () => {
        const { ledger } = await withFivePools();
        await ledger.setPoolActive(OWNER, 1, false);
        await ledger.setPoolActive(OWNER, 3, false);

        assert.deepEqual(ledger.getActivePools(0, 10).map(pool => pool.poolId), [0, 2, 4]);
        assert.deepEqual(ledger.getActivePools(1, 1).map(pool => pool.poolId), [2]);
        assert.deepEqual(ledger.getActivePools(3, 5), []);
        assert.deepEqual(ledger.getActivePools(10, 5), []);
    });

    it('hands out copies that cannot change the ledger', async () => {
        const { ledger, book } = await withFivePools();
        book.credit(ALICE, 100n);
        await ledger.stake(ALICE, 0, 100n, 100n);

        const view = ledger.getPool(0);
        view.totalStaked = 0n;
        view.isActive = false;
        ledger.getAllPools(0, 1)[0].totalStaked = 7n;
        ledger.getActivePools(0, 1)[0].apr = 99;
        ledger.getEvents(0, 1)[0].data.poolId = 42;

        const stored = ledger.getPool(0);
        assert.equal(stored.totalStaked, 100n);
        assert.equal(stored.isActive, true);
        assert.equal(stored.apr, 5);
        assert.equal(ledger.totalStaked(0), 100n);
        assert.equal(ledger.getEvents(0, 1)[0].data.poolId, 0);
    });

    it('fails on unknown pools', async () => {
        const { ledger } = await withFivePools();
        assert.throws(() => ledger.getPool(5), withCode('NOT_FOUND'));
        assert.throws(() => ledger.totalStaked(5), withCode('NOT_FOUND'));
        assert.throws(() => ledger.getUnstakeRequests(5, 0, 10), withCode('NOT_FOUND'));
    });
});

describe('stake and request listings', () => {
    it('pages through a user stakes with live rewards', async () => {
        const { ledger, book, clock } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 10, 0);
        book.credit(ALICE, 3000n);
        await ledger.stake(ALICE, 0, 1000n, 1000n);
        await ledger.stake(ALICE, 0, 1000n, 1000n);
        await ledger.stake(ALICE, 0, 1000n, 1000n);
        clock.advance(365 * DAY);

        const page = ledger.getUserStakes(ALICE, 1, 5);
        assert.deepEqual(page.map(stake => stake.stakeIndex), [1, 2]);
        assert.deepEqual(page.map(stake => stake.reward), [100n, 100n]);
        assert.deepEqual(ledger.getUserStakes(ALICE, 3, 5), []);
        assert.throws(() => ledger.getUserStakes(ALICE, 4, 5), withCode('NOT_FOUND'));
        assert.deepEqual(ledger.getUserStakes(BOB, 0, 5), []);
        assert.throws(() => ledger.getStake(BOB, 0), withCode('NOT_FOUND'));
    });

    it('lists requests with the status of their stake', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 100n);
        book.credit(OWNER, 100n);
        await ledger.stake(ALICE, 0, 50n, 50n);
        await ledger.stake(ALICE, 0, 50n, 50n);
        await ledger.requestUnstake(ALICE, 0);
        await ledger.requestUnstake(ALICE, 1);
        await ledger.completeUnstake(OWNER, 0, 1, 50n);

        const requests = ledger.getUnstakeRequests(0, 0, 10);
        assert.deepEqual(requests.map(request => [request.requestId, request.status]), [[0, 'pending'], [1, 'completed']]);
        assert.equal(ledger.requestCount(0), 2);
        assert.deepEqual(ledger.getUnstakeRequests(0, 2, 10), []);
        assert.throws(() => ledger.getUnstakeRequests(0, 3, 10), withCode('NOT_FOUND'));
        assert.throws(() => ledger.getUnstakeRequest(0, 2), withCode('NOT_FOUND'));
    });

    it('keeps totalStaked equal to the sum of staked amounts', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 1000n);
        book.credit(BOB, 1000n);
        await ledger.stake(ALICE, 0, 100n, 100n);
        await ledger.stake(BOB, 0, 250n, 250n);
        await ledger.stake(ALICE, 0, 40n, 40n);
        await ledger.requestUnstake(BOB, 0);

        const staked = [ALICE, BOB]
            .flatMap(owner => ledger.getUserStakes(owner, 0, 10))
            .filter(stake => stake.status === 'staked')
            .reduce((sum, stake) => sum + stake.stakedAmount, 0n);
        assert.equal(staked, 140n);
        assert.equal(ledger.totalStaked(0), staked);
    });
});

describe('events', () => {
    it('pages the event log in commit order', async () => {
        const { ledger } = await withFivePools();
        assert.deepEqual(ledger.getEvents(3, 10).map(event => event.data.poolId), [3, 4]);
        assert.deepEqual(ledger.getEvents(5, 10), []);
        assert.throws(() => ledger.getEvents(6, 10), withCode('NOT_FOUND'));
    });

    it('gives each event its own id and a transaction id', async () => {
        const { ledger } = await withFivePools();
        const events = ledger.getEvents(0, 10);
        assert.equal(new Set(events.map(event => event._id)).size, 5);
        assert.equal(new Set(events.map(event => event.transactionId)).size, 5);
        assert.equal(events[0].timestamp, new Date(START * 1000).toISOString());
    });
});

describe('data integrity', () => {
    it('fails loudly when a request and its stake disagree', async () => {
        const base = createInitialState({ owner: OWNER, custodyAccount: 'vault', treasury: 'treasury' });
        const state = LedgerState.fromSnapshot({
            settings: { ...base.getSettings() },
            nonce: 3,
            pools: [{
                poolId: 0,
                isNative: true,
                assetReference: null,
                apr: 5,
                lockDuration: 0,
                isActive: true,
                totalStaked: 10n,
                createdAt: START,
                creator: OWNER,
            }],
            stakes: [{
                owner: ALICE,
                stakeIndex: 0,
                poolId: 0,
                stakedAmount: 10n,
                startTime: START,
                lockDuration: 0,
                rewardsEarned: 0n,
                status: 'staked',
                requestId: null,
            }],
            unstakeRequests: [{ poolId: 0, requestId: 0, user: ALICE, stakeIndex: 0, amount: 10n, reward: 0n, timestamp: START }],
            managers: [OWNER],
            events: [],
        });
        const book = new AccountBook();
        book.credit(OWNER, 10n);
        const ledger = new Ledger({ state, transfer: book, clock: new ManualClock() });

        assert.throws(() => ledger.getUnstakeRequest(0, 0), withCode('DATA_INTEGRITY_BREACH'));
        await assert.rejects(ledger.completeUnstake(OWNER, 0, 0, 10n), withCode('DATA_INTEGRITY_BREACH'));
        assert.equal(book.balanceOf(ALICE), 0n);
        assert.equal(book.balanceOf(OWNER), 10n);
    });
});
