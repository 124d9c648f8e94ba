import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ALICE, BOB, createTestLedger, CUSTODY, DAY, ONE, OWNER, START, TOKEN, TREASURY, withCode } from './helpers.js';

describe('stake', () => {
    it('moves native value to the treasury and records the stake', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 100n * ONE);

        assert.equal(await ledger.stake(ALICE, 0, 10n * ONE, 10n * ONE), 0);

        assert.equal(book.balanceOf(ALICE), 90n * ONE);
        assert.equal(book.balanceOf(TREASURY), 10n * ONE);
        assert.equal(book.balanceOf(CUSTODY), 0n);
        assert.equal(ledger.totalStaked(0), 10n * ONE);
        assert.deepEqual(ledger.getStake(ALICE, 0), {
            owner: ALICE,
            stakeIndex: 0,
            poolId: 0,
            stakedAmount: 10n * ONE,
            startTime: START,
            lockDuration: 0,
            rewardsEarned: 0n,
            status: 'staked',
            requestId: null,
            reward: 0n,
        });
    });

    it('numbers stakes per owner', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 100n);
        book.credit(BOB, 100n);

        assert.equal(await ledger.stake(ALICE, 0, 10n, 10n), 0);
        assert.equal(await ledger.stake(ALICE, 0, 10n, 10n), 1);
        assert.equal(await ledger.stake(BOB, 0, 10n, 10n), 0);
        assert.equal(ledger.stakeCount(ALICE), 2);
        assert.equal(ledger.totalStaked(0), 30n);
    });

    it('pulls asset pools from the staker without attached value', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, false, TOKEN, 8, 0);
        book.credit(ALICE, 50n, TOKEN);

        await ledger.stake(ALICE, 0, 20n);
        assert.equal(book.balanceOf(ALICE, TOKEN), 30n);
        assert.equal(book.balanceOf(TREASURY, TOKEN), 20n);

        book.credit(ALICE, 5n);
        await assert.rejects(ledger.stake(ALICE, 0, 20n, 5n), withCode('POLICY_VIOLATION'));
        assert.equal(book.balanceOf(ALICE), 5n);
    });

    it('requires attached value equal to the amount on native pools', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 100n);

        await assert.rejects(ledger.stake(ALICE, 0, 10n, 9n), withCode('POLICY_VIOLATION'));
        await assert.rejects(ledger.stake(ALICE, 0, 10n, 11n), withCode('POLICY_VIOLATION'));
        await assert.rejects(ledger.stake(ALICE, 0, 10n), withCode('POLICY_VIOLATION'));
        assert.equal(book.balanceOf(ALICE), 100n);
        assert.equal(ledger.stakeCount(ALICE), 0);
    });

    it('enforces the minimum stake amount', async () => {
        const { ledger, book } = createTestLedger({ minimumStakeAmount: 100n });
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 1000n);

        await assert.rejects(ledger.stake(ALICE, 0, 99n, 99n), withCode('POLICY_VIOLATION'));
        assert.equal(await ledger.stake(ALICE, 0, 100n, 100n), 0);
    });

    it('rejects a zero amount and unknown pools', async () => {
        const { ledger, book } = createTestLedger({ minimumStakeAmount: 0n });
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 10n);

        await assert.rejects(ledger.stake(ALICE, 0, 0n), withCode('INVALID_INPUT'));
        await assert.rejects(ledger.stake(ALICE, 7, 5n, 5n), withCode('NOT_FOUND'));
    });

    it('fails atomically when the staker cannot pay', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, false, TOKEN, 8, 0);
        book.credit(ALICE, 5n, TOKEN);

        await assert.rejects(ledger.stake(ALICE, 0, 10n), withCode('TRANSFER_FAILED'));
        assert.equal(ledger.stakeCount(ALICE), 0);
        assert.equal(ledger.totalStaked(0), 0n);
        assert.equal(book.balanceOf(ALICE, TOKEN), 5n);
    });

    it('undoes the escrow when forwarding to the treasury fails', async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 10n);
        book.onTransfer = async transfer => {
            if (transfer.to === TREASURY) throw new Error('treasury offline');
        };

        await assert.rejects(ledger.stake(ALICE, 0, 10n, 10n), withCode('TRANSFER_FAILED'));
        assert.equal(book.balanceOf(ALICE), 10n);
        assert.equal(book.balanceOf(CUSTODY), 0n);
        assert.equal(ledger.stakeCount(ALICE), 0);
        assert.deepEqual(ledger.getEvents(0, 10).map(event => event.type), ['pool_created']);
    });

    it('accrues a live reward: 10 units at 5% for 30 days', async () => {
        const { ledger, book, clock } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        book.credit(ALICE, 10n * ONE);
        await ledger.stake(ALICE, 0, 10n * ONE, 10n * ONE);

        clock.advance(30 * DAY);
        assert.equal(ledger.rewardOf(ALICE, 0), 41095890410958904n);
        assert.equal(ledger.getStake(ALICE, 0).reward, 41095890410958904n);
    });
});
