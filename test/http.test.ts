import assert from 'node:assert/strict';
import { once } from 'node:events';
import { Server } from 'node:http';
import { after, before, describe, it } from 'node:test';

import { createApp } from '../src/modules/http/index.js';
import { ALICE, createTestLedger, OWNER, TOKEN } from './helpers.js';

describe('http api', () => {
    let server: Server;
    let baseUrl = '';

    before(async () => {
        const { ledger, book } = createTestLedger();
        await ledger.createPool(OWNER, true, null, 5, 0);
        await ledger.createPool(OWNER, false, TOKEN, 7, 0);
        await ledger.createPool(OWNER, true, null, 9, 0);
        await ledger.setPoolActive(OWNER, 1, false);
        book.credit(ALICE, 100n);
        await ledger.stake(ALICE, 0, 100n, 100n);
        await ledger.requestUnstake(ALICE, 0);

        server = createApp(ledger).listen(0, '127.0.0.1');
        await once(server, 'listening');
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('server has no port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        server.closeAllConnections();
        server.close();
        await once(server, 'close');
    });

    interface Page<T> {
        data: T[];
        total: number;
    }

    async function get<T = unknown>(path: string): Promise<{ status: number; body: T }> {
        const response = await fetch(baseUrl + path);
        const body: T = JSON.parse(await response.text());
        return { status: response.status, body };
    }

    it('lists pools with pagination metadata', async () => {
        const { status, body } = await get('/pools?limit=2');
        assert.equal(status, 200);
        assert.deepEqual(body, {
            data: [
                { poolId: 0, isNative: true, assetReference: null, apr: 5, lockDuration: 0, isActive: true, totalStaked: '0', createdAt: 1_700_000_000, creator: OWNER },
                { poolId: 1, isNative: false, assetReference: TOKEN, apr: 7, lockDuration: 0, isActive: false, totalStaked: '0', createdAt: 1_700_000_000, creator: OWNER },
            ],
            total: 3,
            limit: 2,
            skip: 0,
            page: 1,
        });
    });

    it('caps the page size', async () => {
        const { body } = await get('/pools?limit=500');
        assert.deepEqual(body, {
            data: [0, 1, 2].map(poolId => ({
                poolId,
                isNative: poolId !== 1,
                assetReference: poolId === 1 ? TOKEN : null,
                apr: [5, 7, 9][poolId],
                lockDuration: 0,
                isActive: poolId !== 1,
                totalStaked: '0',
                createdAt: 1_700_000_000,
                creator: OWNER,
            })),
            total: 3,
            limit: 100,
            skip: 0,
            page: 1,
        });
    });

    it('filters active pools and counts pools', async () => {
        const active = await get<Page<{ poolId: number }>>('/pools/active');
        assert.equal(active.status, 200);
        assert.deepEqual(active.body.data.map(pool => pool.poolId), [0, 2]);
        assert.deepEqual((await get('/pools/count')).body, { count: 3 });
    });

    it('maps query errors to 404 and 400', async () => {
        const missing = await get<{ error: string }>('/pools/9');
        assert.equal(missing.status, 404);
        assert.equal(missing.body.error, 'NOT_FOUND');

        assert.equal((await get('/pools?offset=4')).status, 404);
        assert.equal((await get('/pools/abc')).status, 400);
        assert.equal((await get('/pools?limit=-1')).status, 400);
    });

    it('serves a pool with its request count', async () => {
        const { body } = await get<{ requestCount: number; totalStaked: string }>('/pools/0');
        assert.equal(body.requestCount, 1);
        assert.equal(body.totalStaked, '0');
    });

    it('serves stakes and requests with amounts as strings', async () => {
        const stakes = await get(`/stakes/${ALICE}`);
        assert.deepEqual(stakes.body, {
            data: [{
                owner: ALICE,
                stakeIndex: 0,
                poolId: 0,
                stakedAmount: '100',
                startTime: 1_700_000_000,
                lockDuration: 0,
                rewardsEarned: '0',
                status: 'pending',
                requestId: 0,
                reward: '0',
            }],
            total: 1,
            limit: 10,
            skip: 0,
            page: 1,
        });

        const request = await get('/pools/0/requests/0');
        assert.deepEqual(request.body, {
            poolId: 0,
            requestId: 0,
            user: ALICE,
            stakeIndex: 0,
            amount: '100',
            reward: '0',
            timestamp: 1_700_000_000,
            status: 'pending',
        });

        assert.equal((await get(`/stakes/${ALICE}/3`)).status, 404);
    });

    it('serves the configuration', async () => {
        const { body } = await get<{ current: Record<string, unknown> }>('/config');
        const { current } = body;
        assert.equal(current.minimumStakeAmount, '1');
        assert.equal(current.owner, OWNER);
        assert.deepEqual(current.managers, [OWNER]);
    });

    it('filters events by type', async () => {
        const { body: page } = await get<Page<{ type: string; actor: string }>>('/events?type=stake_created');
        assert.equal(page.total, 1);
        assert.equal(page.data[0].actor, ALICE);

        const byCategory = await get<Page<{ type: string }>>('/events?category=unstake');
        assert.deepEqual(byCategory.body.data.map(event => event.type), ['unstake_requested']);

        const all = await get<Page<{ type: string }>>('/events?limit=2&offset=2');
        assert.deepEqual(all.body.data.map(event => event.type), [
            'pool_created',
            'pool_status_changed',
        ]);
    });
});
