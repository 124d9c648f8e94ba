import { AnyBulkWriteOperation, Db, MongoClient } from 'mongodb';

import { describeError } from './errors.js';
import logger from './logger.js';
import ProcessingQueue from './processingQueue.js';
import settings, { ExcessNativePolicy } from './settings.js';
import { LedgerSnapshot, LedgerState, StateChange } from './state.js';
import { LedgerSettingsData } from './transactions/config/config-interfaces.js';
import { PoolData } from './transactions/pool/pool-interfaces.js';
import { StakeData, StakeStatus } from './transactions/stake/stake-interfaces.js';
import { UnstakeRequestRecord } from './transactions/unstake/unstake-interfaces.js';
import { toBigInt, toDbString } from './utils/bigint.js';
import type { EventDocument } from './utils/event-logger.js';

// Amounts are stored as zero-padded strings (see toDbString)

export interface PoolDoc {
    _id: number;
    isNative: boolean;
    assetReference: string | null;
    apr: number;
    lockDuration: number;
    isActive: boolean;
    totalStaked: string;
    createdAt: number;
    creator: string;
}

export interface StakeDoc {
    _id: string; // owner/stakeIndex
    owner: string;
    stakeIndex: number;
    poolId: number;
    stakedAmount: string;
    startTime: number;
    lockDuration: number;
    rewardsEarned: string;
    status: StakeStatus;
    requestId: number | null;
}

export interface UnstakeRequestDoc {
    _id: string; // poolId/requestId
    poolId: number;
    requestId: number;
    user: string;
    stakeIndex: number;
    amount: string;
    reward: string;
    timestamp: number;
}

export interface ManagerDoc {
    _id: string;
}

export interface StateDoc {
    _id: number;
    nonce: number;
    owner: string;
    treasury: string;
    custodyAccount: string;
    minimumStakeAmount: string;
    minimumStakeDuration: number;
    excessNativePolicy: ExcessNativePolicy;
}

export type PoolFields = Omit<PoolDoc, '_id'>;
export type StakeFields = Omit<StakeDoc, '_id'>;
export type UnstakeRequestFields = Omit<UnstakeRequestDoc, '_id'>;
export type StateFields = Omit<StateDoc, '_id'>;

const STATE_DOC_ID = 0;

export const stakeDocId = (owner: string, stakeIndex: number): string => `${owner}/${stakeIndex}`;
export const requestDocId = (poolId: number, requestId: number): string => `${poolId}/${requestId}`;

export function poolToDoc(pool: PoolData): PoolFields {
    return {
        isNative: pool.isNative,
        assetReference: pool.assetReference,
        apr: pool.apr,
        lockDuration: pool.lockDuration,
        isActive: pool.isActive,
        totalStaked: toDbString(pool.totalStaked),
        createdAt: pool.createdAt,
        creator: pool.creator,
    };
}

export function poolFromDoc(doc: PoolDoc): PoolData {
    return {
        poolId: doc._id,
        isNative: doc.isNative,
        assetReference: doc.assetReference,
        apr: doc.apr,
        lockDuration: doc.lockDuration,
        isActive: doc.isActive,
        totalStaked: toBigInt(doc.totalStaked),
        createdAt: doc.createdAt,
        creator: doc.creator,
    };
}

export function stakeToDoc(stake: StakeData): StakeFields {
    return {
        owner: stake.owner,
        stakeIndex: stake.stakeIndex,
        poolId: stake.poolId,
        stakedAmount: toDbString(stake.stakedAmount),
        startTime: stake.startTime,
        lockDuration: stake.lockDuration,
        rewardsEarned: toDbString(stake.rewardsEarned),
        status: stake.status,
        requestId: stake.requestId,
    };
}

export function stakeFromDoc(doc: StakeDoc): StakeData {
    return {
        owner: doc.owner,
        stakeIndex: doc.stakeIndex,
        poolId: doc.poolId,
        stakedAmount: toBigInt(doc.stakedAmount),
        startTime: doc.startTime,
        lockDuration: doc.lockDuration,
        rewardsEarned: toBigInt(doc.rewardsEarned),
        status: doc.status,
        requestId: doc.requestId,
    };
}

export function requestToDoc(request: UnstakeRequestRecord): UnstakeRequestFields {
    return {
        poolId: request.poolId,
        requestId: request.requestId,
        user: request.user,
        stakeIndex: request.stakeIndex,
        amount: toDbString(request.amount),
        reward: toDbString(request.reward),
        timestamp: request.timestamp,
    };
}

export function requestFromDoc(doc: UnstakeRequestDoc): UnstakeRequestRecord {
    return {
        poolId: doc.poolId,
        requestId: doc.requestId,
        user: doc.user,
        stakeIndex: doc.stakeIndex,
        amount: toBigInt(doc.amount),
        reward: toBigInt(doc.reward),
        timestamp: doc.timestamp,
    };
}

export function stateToDoc(nonce: number, ledgerSettings: LedgerSettingsData): StateFields {
    return {
        nonce,
        owner: ledgerSettings.owner,
        treasury: ledgerSettings.treasury,
        custodyAccount: ledgerSettings.custodyAccount,
        minimumStakeAmount: toDbString(ledgerSettings.minimumStakeAmount),
        minimumStakeDuration: ledgerSettings.minimumStakeDuration,
        excessNativePolicy: ledgerSettings.excessNativePolicy,
    };
}

function settingsFromDoc(doc: StateDoc): LedgerSettingsData {
    return {
        owner: doc.owner,
        treasury: doc.treasury,
        custodyAccount: doc.custodyAccount,
        minimumStakeAmount: toBigInt(doc.minimumStakeAmount),
        minimumStakeDuration: doc.minimumStakeDuration,
        excessNativePolicy: doc.excessNativePolicy,
    };
}

interface BulkOperations {
    pools: AnyBulkWriteOperation<PoolDoc>[];
    stakes: AnyBulkWriteOperation<StakeDoc>[];
    unstakeRequests: AnyBulkWriteOperation<UnstakeRequestDoc>[];
    managers: AnyBulkWriteOperation<ManagerDoc>[];
    state: AnyBulkWriteOperation<StateDoc>[];
    events: AnyBulkWriteOperation<EventDocument>[];
}

/**
 * Turns committed state changes into upserts (and manager deletions) carrying
 * the current value of every touched record.
 */
export function buildBulkOperations(state: LedgerState, changes: StateChange[]): BulkOperations {
    const ops: BulkOperations = { pools: [], stakes: [], unstakeRequests: [], managers: [], state: [], events: [] };
    const eventIds = new Set<string>();

    for (const change of changes) {
        switch (change.collection) {
            case 'pools': {
                const pool = state.getPool(change.poolId);
                if (!pool) break;
                ops.pools.push({ replaceOne: { filter: { _id: pool.poolId }, replacement: poolToDoc(pool), upsert: true } });
                break;
            }
            case 'stakes': {
                const stake = state.getStake(change.owner, change.stakeIndex);
                if (!stake) break;
                ops.stakes.push({
                    replaceOne: { filter: { _id: stakeDocId(stake.owner, stake.stakeIndex) }, replacement: stakeToDoc(stake), upsert: true },
                });
                break;
            }
            case 'unstakeRequests': {
                const request = state.getUnstakeRequest(change.poolId, change.requestId);
                if (!request) break;
                ops.unstakeRequests.push({
                    replaceOne: {
                        filter: { _id: requestDocId(request.poolId, request.requestId) },
                        replacement: requestToDoc(request),
                        upsert: true,
                    },
                });
                break;
            }
            case 'managers':
                if (state.isManager(change.principal)) {
                    ops.managers.push({ replaceOne: { filter: { _id: change.principal }, replacement: {}, upsert: true } });
                } else {
                    ops.managers.push({ deleteOne: { filter: { _id: change.principal } } });
                }
                break;
            case 'state':
                ops.state.push({
                    replaceOne: {
                        filter: { _id: STATE_DOC_ID },
                        replacement: stateToDoc(state.getNonce(), state.getSettings()),
                        upsert: true,
                    },
                });
                break;
            case 'events':
                eventIds.add(change.eventId);
                break;
        }
    }

    if (eventIds.size > 0) {
        for (const event of state.listEvents()) {
            if (!eventIds.has(event._id)) continue;
            const { _id, ...fields } = event;
            ops.events.push({ replaceOne: { filter: { _id }, replacement: fields, upsert: true } });
        }
    }
    return ops;
}

let client: MongoClient | null = null;
let db: Db | null = null;

export const mongo = {
    writerQueue: new ProcessingQueue('mongo-writer'),

    init: async (): Promise<Db> => {
        const connected = new MongoClient(settings.mongoUrl, {});
        await connected.connect();
        client = connected;
        db = connected.db(settings.mongoDb);
        logger.info(`[mongo] Connected to ${settings.mongoUrl}/${db.databaseName}`);
        return db;
    },

    getDb: (): Db => {
        if (!db) throw new Error('MongoDB has not been initialized. Call init() first.');
        return db;
    },

    close: async (): Promise<void> => {
        if (!client) return;
        await client.close();
        client = null;
        db = null;
        logger.info('[mongo] Connection closed.');
    },

    /**
     * Reads the whole ledger back. Null when the database holds no ledger yet.
     */
    loadSnapshot: async (): Promise<LedgerSnapshot | null> => {
        const db = mongo.getDb();
        const stateDoc = await db.collection<StateDoc>('state').findOne({ _id: STATE_DOC_ID });
        if (!stateDoc) return null;

        const [pools, stakes, requests, managers, events] = await Promise.all([
            db.collection<PoolDoc>('pools').find({}).toArray(),
            db.collection<StakeDoc>('stakes').find({}).toArray(),
            db.collection<UnstakeRequestDoc>('unstakeRequests').find({}).toArray(),
            db.collection<ManagerDoc>('managers').find({}).toArray(),
            db.collection<EventDocument>('events').find({}).sort({ sequence: 1 }).toArray(),
        ]);
        logger.info(`[mongo] Loaded ${pools.length} pools, ${stakes.length} stakes, ${requests.length} requests, ${events.length} events.`);

        return {
            settings: settingsFromDoc(stateDoc),
            nonce: stateDoc.nonce,
            pools: pools.map(poolFromDoc),
            stakes: stakes.map(stakeFromDoc),
            unstakeRequests: requests.map(requestFromDoc),
            managers: managers.map(manager => manager._id),
            events,
        };
    },

    /**
     * Writes a full ledger, used once when the database is empty.
     */
    writeSnapshot: async (state: LedgerState): Promise<void> => {
        const changes: StateChange[] = [
            { collection: 'state' },
            ...state.listPools().map((pool): StateChange => ({ collection: 'pools', poolId: pool.poolId })),
            ...state.listManagers().map((principal): StateChange => ({ collection: 'managers', principal })),
        ];
        for (const owner of state.listStakeOwners()) {
            for (const stake of state.listStakes(owner)) changes.push({ collection: 'stakes', owner, stakeIndex: stake.stakeIndex });
        }
        for (const pool of state.listPools()) {
            for (const request of state.listUnstakeRequests(pool.poolId)) {
                changes.push({ collection: 'unstakeRequests', poolId: pool.poolId, requestId: request.requestId });
            }
        }
        for (const event of state.listEvents()) changes.push({ collection: 'events', eventId: event._id });
        await mongo.writerQueue.run(() => mongo.flush(state, changes));
    },

    /**
     * Flushes every committed change not yet on disk. A failed flush puts the
     * changes back so the next call retries them.
     */
    writeToDisk: async (state: LedgerState): Promise<void> => {
        await mongo.writerQueue.run(async () => {
            const changes = state.drainChanges();
            if (changes.length === 0) return;
            try {
                await mongo.flush(state, changes);
            } catch (error) {
                state.requeueChanges(changes);
                logger.error(`[mongo] writeToDisk failed, ${state.pendingChangeCount()} change(s) kept for retry: ${describeError(error)}`);
            }
        });
    },

    flush: async (state: LedgerState, changes: StateChange[]): Promise<void> => {
        const db = mongo.getDb();
        const ops = buildBulkOperations(state, changes);
        const writes: Promise<unknown>[] = [];
        if (ops.pools.length) writes.push(db.collection<PoolDoc>('pools').bulkWrite(ops.pools, { ordered: false }));
        if (ops.stakes.length) writes.push(db.collection<StakeDoc>('stakes').bulkWrite(ops.stakes, { ordered: false }));
        if (ops.unstakeRequests.length) {
            writes.push(db.collection<UnstakeRequestDoc>('unstakeRequests').bulkWrite(ops.unstakeRequests, { ordered: false }));
        }
        if (ops.managers.length) writes.push(db.collection<ManagerDoc>('managers').bulkWrite(ops.managers, { ordered: true }));
        if (ops.events.length) writes.push(db.collection<EventDocument>('events').bulkWrite(ops.events, { ordered: false }));
        await Promise.all(writes);
        // State document last: its nonce marks how far the flush got
        if (ops.state.length) await db.collection<StateDoc>('state').bulkWrite(ops.state);
        logger.debug(`[mongo] Flushed ${changes.length} change(s).`);
    },
};

export default mongo;
