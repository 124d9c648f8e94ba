import cloneDeep from 'clone-deep';

import { DataIntegrityError, InvalidStateError } from './errors.js';
import logger from './logger.js';
import { LedgerSettingsData } from './transactions/config/config-interfaces.js';
import { PoolData } from './transactions/pool/pool-interfaces.js';
import { NEXT_STAKE_STATUS, StakeData } from './transactions/stake/stake-interfaces.js';
import { UnstakeRequestRecord } from './transactions/unstake/unstake-interfaces.js';
import { EventDocument } from './utils/event-logger.js';

export type StateChange =
    | { collection: 'pools'; poolId: number }
    | { collection: 'stakes'; owner: string; stakeIndex: number }
    | { collection: 'unstakeRequests'; poolId: number; requestId: number }
    | { collection: 'managers'; principal: string }
    | { collection: 'state' }
    | { collection: 'events'; eventId: string };

export type PoolChanges = Partial<Pick<PoolData, 'isActive' | 'totalStaked'>>;
export type StakeChanges = Partial<Pick<StakeData, 'status' | 'rewardsEarned' | 'requestId'>>;

/**
 * Everything needed to rebuild a LedgerState, as loaded from storage.
 */
export interface LedgerSnapshot {
    settings: LedgerSettingsData;
    nonce: number;
    pools: PoolData[];
    stakes: StakeData[];
    unstakeRequests: UnstakeRequestRecord[];
    managers: string[];
    events: EventDocument[];
}

function changeKey(change: StateChange): string {
    switch (change.collection) {
        case 'pools':
            return `pools/${change.poolId}`;
        case 'stakes':
            return `stakes/${change.owner}/${change.stakeIndex}`;
        case 'unstakeRequests':
            return `unstakeRequests/${change.poolId}/${change.requestId}`;
        case 'managers':
            return `managers/${change.principal}`;
        case 'state':
            return 'state';
        case 'events':
            return `events/${change.eventId}`;
    }
}

/**
 * In-memory ledger state. Pools, per-owner stakes and per-pool requests live
 * in append-only arenas addressed by dense index.
 *
 * Writes are only accepted between begin() and commit()/rollback(). Each write
 * records how to undo itself, so rollback() restores the exact state seen at
 * begin(). Committed writes accumulate as pending changes until the persistence
 * layer drains them.
 */
export class LedgerState {
    private pools: PoolData[] = [];
    private stakes = new Map<string, StakeData[]>();
    private unstakeRequests: Record<number, UnstakeRequestRecord[]> = {};
    private managers = new Set<string>();
    private events: EventDocument[] = [];
    private settings: LedgerSettingsData;
    private nonce = 0;

    private undo: Array<() => void> = [];
    private touched = new Map<string, StateChange>();
    private inTransaction = false;
    private pendingChanges = new Map<string, StateChange>();

    constructor(settings: LedgerSettingsData) {
        this.settings = cloneDeep(settings);
    }

    static fromSnapshot(snapshot: LedgerSnapshot): LedgerState {
        const state = new LedgerState(snapshot.settings);
        state.nonce = snapshot.nonce;

        const pools = [...snapshot.pools].sort((a, b) => a.poolId - b.poolId);
        pools.forEach((pool, index) => {
            if (pool.poolId !== index) throw new DataIntegrityError(`Pool ids are not dense: expected ${index}, found ${pool.poolId}`);
        });
        state.pools = pools;

        const stakes = [...snapshot.stakes].sort((a, b) => a.stakeIndex - b.stakeIndex);
        for (const stake of stakes) {
            let arena = state.stakes.get(stake.owner);
            if (!arena) {
                arena = [];
                state.stakes.set(stake.owner, arena);
            }
            if (stake.stakeIndex !== arena.length) {
                throw new DataIntegrityError(`Stake indexes of ${stake.owner} are not dense at ${stake.stakeIndex}`);
            }
            arena.push(stake);
        }

        const requests = [...snapshot.unstakeRequests].sort((a, b) => a.requestId - b.requestId);
        for (const request of requests) {
            const arena = state.unstakeRequests[request.poolId] ?? (state.unstakeRequests[request.poolId] = []);
            if (request.requestId !== arena.length) {
                throw new DataIntegrityError(`Request ids of pool ${request.poolId} are not dense at ${request.requestId}`);
            }
            arena.push(request);
        }

        for (const principal of snapshot.managers) state.managers.add(principal);
        state.events = [...snapshot.events].sort((a, b) => a.sequence - b.sequence);
        logger.debug(`[state] Restored ${state.pools.length} pools, ${stakes.length} stakes, ${requests.length} requests`);
        return state;
    }

    // --- transaction control ---

    begin(): void {
        if (this.inTransaction) throw new InvalidStateError('A state transaction is already open');
        this.inTransaction = true;
        this.undo = [];
        this.touched = new Map();
    }

    commit(): StateChange[] {
        if (!this.inTransaction) throw new InvalidStateError('No state transaction to commit');
        const committed = [...this.touched.values()];
        for (const [key, change] of this.touched) this.pendingChanges.set(key, change);
        this.nonce++;
        this.pendingChanges.set('state', { collection: 'state' });
        this.undo = [];
        this.touched = new Map();
        this.inTransaction = false;
        return committed;
    }

    rollback(): void {
        if (!this.inTransaction) return;
        for (let i = this.undo.length - 1; i >= 0; i--) this.undo[i]();
        logger.debug(`[state] Rolled back ${this.undo.length} write(s)`);
        this.undo = [];
        this.touched = new Map();
        this.inTransaction = false;
    }

    /**
     * Hands the committed-but-unpersisted changes to the caller and forgets them.
     */
    drainChanges(): StateChange[] {
        const changes = [...this.pendingChanges.values()];
        this.pendingChanges = new Map();
        return changes;
    }

    /**
     * Puts drained changes back after a failed flush. Newer entries win.
     */
    requeueChanges(changes: StateChange[]): void {
        for (const change of changes) {
            const key = changeKey(change);
            if (!this.pendingChanges.has(key)) this.pendingChanges.set(key, change);
        }
    }

    pendingChangeCount(): number {
        return this.pendingChanges.size;
    }

    private assertWritable(): void {
        if (!this.inTransaction) throw new InvalidStateError('State writes require an open transaction');
    }

    private write(change: StateChange, undo: () => void): void {
        this.undo.push(undo);
        this.touched.set(changeKey(change), change);
    }

    // --- reads ---

    getNonce(): number {
        return this.nonce;
    }

    getSettings(): Readonly<LedgerSettingsData> {
        return this.settings;
    }

    poolCount(): number {
        return this.pools.length;
    }

    getPool(poolId: number): PoolData | undefined {
        return this.pools[poolId];
    }

    listPools(): readonly PoolData[] {
        return this.pools;
    }

    stakeCount(owner: string): number {
        return this.stakes.get(owner)?.length ?? 0;
    }

    getStake(owner: string, stakeIndex: number): StakeData | undefined {
        return this.stakes.get(owner)?.[stakeIndex];
    }

    listStakes(owner: string): readonly StakeData[] {
        return this.stakes.get(owner) ?? [];
    }

    listStakeOwners(): string[] {
        return [...this.stakes.keys()];
    }

    requestCount(poolId: number): number {
        return this.unstakeRequests[poolId]?.length ?? 0;
    }

    getUnstakeRequest(poolId: number, requestId: number): UnstakeRequestRecord | undefined {
        return this.unstakeRequests[poolId]?.[requestId];
    }

    listUnstakeRequests(poolId: number): readonly UnstakeRequestRecord[] {
        return this.unstakeRequests[poolId] ?? [];
    }

    isManager(principal: string): boolean {
        return this.managers.has(principal);
    }

    listManagers(): string[] {
        return [...this.managers];
    }

    listEvents(): readonly EventDocument[] {
        return this.events;
    }

    // --- writes ---

    insertPool(pool: PoolData): void {
        this.assertWritable();
        if (pool.poolId !== this.pools.length) {
            throw new DataIntegrityError(`Pool id ${pool.poolId} is not the next id ${this.pools.length}`);
        }
        this.pools.push(pool);
        this.write({ collection: 'pools', poolId: pool.poolId }, () => {
            this.pools.pop();
        });
    }

    updatePool(poolId: number, changes: PoolChanges): void {
        this.assertWritable();
        const pool = this.pools[poolId];
        if (!pool) throw new DataIntegrityError(`Pool ${poolId} not found for update`);
        const copy = cloneDeep(pool);
        this.pools[poolId] = { ...pool, ...changes };
        this.write({ collection: 'pools', poolId }, () => {
            this.pools[poolId] = copy;
        });
    }

    appendStake(stake: StakeData): void {
        this.assertWritable();
        const arena = this.stakes.get(stake.owner) ?? [];
        if (stake.stakeIndex !== arena.length) {
            throw new DataIntegrityError(`Stake index ${stake.stakeIndex} is not the next index ${arena.length} for ${stake.owner}`);
        }
        const created = !this.stakes.has(stake.owner);
        this.stakes.set(stake.owner, arena);
        arena.push(stake);
        this.write({ collection: 'stakes', owner: stake.owner, stakeIndex: stake.stakeIndex }, () => {
            arena.pop();
            if (created) this.stakes.delete(stake.owner);
        });
    }

    /**
     * Status changes must follow NEXT_STAKE_STATUS.
     */
    updateStake(owner: string, stakeIndex: number, changes: StakeChanges): void {
        this.assertWritable();
        const arena = this.stakes.get(owner);
        const stake = arena?.[stakeIndex];
        if (!arena || !stake) throw new DataIntegrityError(`Stake ${owner}/${stakeIndex} not found for update`);
        if (changes.status !== undefined && changes.status !== stake.status && NEXT_STAKE_STATUS[stake.status] !== changes.status) {
            throw new InvalidStateError(`Illegal stake transition ${stake.status} -> ${changes.status}`, {
                owner,
                stakeIndex,
            });
        }
        const copy = cloneDeep(stake);
        arena[stakeIndex] = { ...stake, ...changes };
        this.write({ collection: 'stakes', owner, stakeIndex }, () => {
            arena[stakeIndex] = copy;
        });
    }

    appendUnstakeRequest(request: UnstakeRequestRecord): void {
        this.assertWritable();
        const arena = this.unstakeRequests[request.poolId] ?? [];
        if (request.requestId !== arena.length) {
            throw new DataIntegrityError(`Request id ${request.requestId} is not the next id ${arena.length} for pool ${request.poolId}`);
        }
        const created = !this.unstakeRequests[request.poolId];
        this.unstakeRequests[request.poolId] = arena;
        arena.push(request);
        this.write({ collection: 'unstakeRequests', poolId: request.poolId, requestId: request.requestId }, () => {
            arena.pop();
            if (created) delete this.unstakeRequests[request.poolId];
        });
    }

    setManager(principal: string, enabled: boolean): void {
        this.assertWritable();
        const before = this.isManager(principal);
        if (enabled) this.managers.add(principal);
        else this.managers.delete(principal);
        this.write({ collection: 'managers', principal }, () => {
            if (before) this.managers.add(principal);
            else this.managers.delete(principal);
        });
    }

    updateSettings(changes: Partial<LedgerSettingsData>): void {
        this.assertWritable();
        const copy = cloneDeep(this.settings);
        this.settings = { ...this.settings, ...changes };
        this.write({ collection: 'state' }, () => {
            this.settings = copy;
        });
    }

    appendEvent(event: EventDocument): void {
        this.assertWritable();
        this.events.push(event);
        this.write({ collection: 'events', eventId: event._id }, () => {
            this.events.pop();
        });
    }
}

export default LedgerState;
