import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ALICE, BOB, createTestLedger, CUSTODY, DAY, OWNER, TestLedger, TOKEN, withCode } from './helpers.js';

/**
 * Native pool 0 with three pending requests one day after staking. The
 * amounts are small enough that the accrued reward truncates to 0:
 * request 0 = alice 100, request 1 = bob 200, request 2 = alice 300.
 */
async function threePendingRequests(): Promise<TestLedger> {
    const setup = createTestLedger();
    const { ledger, book, clock } = setup;
    await ledger.createPool(OWNER, true, null, 5, 0);
    book.credit(ALICE, 400n);
    book.credit(BOB, 200n);
    await ledger.stake(ALICE, 0, 100n, 100n);
    await ledger.stake(BOB, 0, 200n, 200n);
    await ledger.stake(ALICE, 0, 300n, 300n);
    clock.advance(DAY);
    await ledger.requestUnstake(ALICE, 0);
    await ledger.requestUnstake(BOB, 0);
    await ledger.requestUnstake(ALICE, 1);
    book.credit(OWNER, 1000n);
    return setup;
}

describe('batchCompleteUnstake', () => {
    it('quotes what a batch needs, counting duplicates once', async () => {
        const { ledger } = await threePendingRequests();
        assert.deepEqual(ledger.quoteBatchCompletion(0, [0, 1, 1, 2, 9]), {
            requiredValue: 600n,
            settleableRequestIds: [0, 1, 2],
        });
    });

    it('settles every pending request in one call', async () => {
        const { ledger, book } = await threePendingRequests();

        assert.equal(await ledger.batchCompleteUnstake(OWNER, 0, [0, 1, 2], 600n), 3);

        assert.equal(book.balanceOf(ALICE), 400n);
        assert.equal(book.balanceOf(BOB), 200n);
        assert.equal(book.balanceOf(OWNER), 400n);
        assert.equal(book.balanceOf(CUSTODY), 0n);
        assert.deepEqual(ledger.getUnstakeRequests(0, 0, 10).map(request => request.status), ['completed', 'completed', 'completed']);

        const event = ledger.getEvents(0, 100).at(-1);
        assert.equal(event?.type, 'unstake_batch_completed');
        assert.equal(event?.data.requestsProcessed, 3);
    });

    it('skips requests that are already completed', async () => {
        const { ledger, book } = await threePendingRequests();
        await ledger.completeUnstake(OWNER, 0, 1, 200n);

        assert.equal(await ledger.batchCompleteUnstake(OWNER, 0, [0, 1], 100n), 1);
        assert.equal(book.balanceOf(ALICE), 100n);
        assert.equal(book.balanceOf(BOB), 200n);
        assert.equal(ledger.getUnstakeRequest(0, 0).status, 'completed');
        assert.equal(ledger.getUnstakeRequest(0, 2).status, 'pending');
    });

    it('skips duplicates and unknown ids', async () => {
        const { ledger, book } = await threePendingRequests();
        assert.equal(await ledger.batchCompleteUnstake(OWNER, 0, [0, 0, 99], 100n), 1);
        assert.equal(book.balanceOf(ALICE), 100n);
    });

    it('processes nothing when no entry is pending', async () => {
        const { ledger } = await threePendingRequests();
        await ledger.completeUnstake(OWNER, 0, 1, 200n);
        assert.equal(await ledger.batchCompleteUnstake(OWNER, 0, [1]), 0);
    });

    it('rejects an empty list, unknown pools and missing funding', async () => {
        const { ledger, book } = await threePendingRequests();
        await assert.rejects(ledger.batchCompleteUnstake(OWNER, 0, [], 0n), withCode('INVALID_INPUT'));
        await assert.rejects(ledger.batchCompleteUnstake(OWNER, 5, [0], 100n), withCode('NOT_FOUND'));
        await assert.rejects(ledger.batchCompleteUnstake(OWNER, 0, [0, 1, 2], 599n), withCode('POLICY_VIOLATION'));
        await assert.rejects(ledger.batchCompleteUnstake(ALICE, 0, [0], 100n), withCode('UNAUTHORIZED'));
        assert.equal(book.balanceOf(OWNER), 1000n);
        assert.deepEqual(ledger.getUnstakeRequests(0, 0, 10).map(request => request.status), ['pending', 'pending', 'pending']);
    });

    it('rolls back the whole batch when one payout fails', async () => {
        const { ledger, book } = await threePendingRequests();
        book.onTransfer = async transfer => {
            if (transfer.to === BOB) throw new Error('recipient rejected');
        };

        await assert.rejects(ledger.batchCompleteUnstake(OWNER, 0, [0, 1, 2], 600n), withCode('TRANSFER_FAILED'));
        assert.equal(book.balanceOf(ALICE), 0n);
        assert.equal(book.balanceOf(OWNER), 1000n);
        assert.equal(ledger.getUnstakeRequest(0, 0).status, 'pending');
    });

    it('needs no attached value for asset pools', async () => {
        const { ledger, book, clock } = createTestLedger();
        await ledger.createPool(OWNER, false, TOKEN, 5, 0);
        book.credit(ALICE, 100n, TOKEN);
        await ledger.stake(ALICE, 0, 60n);
        await ledger.stake(ALICE, 0, 40n);
        clock.advance(DAY);
        await ledger.requestUnstake(ALICE, 0);
        await ledger.requestUnstake(ALICE, 1);
        book.credit(OWNER, 100n, TOKEN);

        assert.deepEqual(ledger.quoteBatchCompletion(0, [0, 1]), { requiredValue: 0n, settleableRequestIds: [0, 1] });
        assert.equal(await ledger.batchCompleteUnstake(OWNER, 0, [0, 1]), 2);
        assert.equal(book.balanceOf(ALICE, TOKEN), 100n);
        assert.equal(book.balanceOf(OWNER, TOKEN), 0n);
    });
});
