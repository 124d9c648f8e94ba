import config from '../config.js';
import { DataIntegrityError, InvalidInputError, NotFoundError } from '../errors.js';
import logger from '../logger.js';
import type { LedgerState } from '../state.js';
import { LedgerSettingsData } from '../transactions/config/config-interfaces.js';
import { PoolData } from '../transactions/pool/pool-interfaces.js';
import { StakeData } from '../transactions/stake/stake-interfaces.js';
import { getPoolOrFail, quoteBatch, requestStatus } from '../transactions/unstake/unstake-helpers.js';
import { BatchQuote, UnstakeRequestRecord, UnstakeRequestStatus } from '../transactions/unstake/unstake-interfaces.js';
import validate from '../validation/index.js';
import type { EventDocument } from './event-logger.js';
import { rewardOf } from './reward.js';

export interface StakeView extends StakeData {
    reward: bigint; // Live for staked records, frozen afterwards
}

export interface UnstakeRequestView extends UnstakeRequestRecord {
    status: UnstakeRequestStatus;
}

export interface ConfigView extends LedgerSettingsData {
    managers: string[];
}

function assertPageArgs(offset: number, limit: number): void {
    if (!validate.integer(offset, true, false)) {
        throw new InvalidInputError('offset must be a non-negative integer', 'offset');
    }
    if (!validate.integer(limit, true, false)) {
        throw new InvalidInputError('limit must be a non-negative integer', 'limit');
    }
}

/**
 * One page of a sequence whose length is known. An offset past the end is an
 * error; an offset equal to the length is an empty page.
 */
function pageOf<T>(items: readonly T[], offset: number, limit: number, what: string): T[] {
    assertPageArgs(offset, limit);
    if (offset > items.length) {
        logger.debug(`[queries] Offset ${offset} beyond ${items.length} ${what}.`);
        throw new NotFoundError(`Offset ${offset} is beyond the ${items.length} ${what}`, { offset, length: items.length });
    }
    return items.slice(offset, offset + limit);
}

function poolOfStake(state: LedgerState, stake: StakeData): PoolData {
    const pool = state.getPool(stake.poolId);
    if (!pool) {
        throw new DataIntegrityError(`Stake ${stake.owner}/${stake.stakeIndex} references unknown pool ${stake.poolId}`);
    }
    return pool;
}

function toStakeView(state: LedgerState, stake: StakeData, now: number): StakeView {
    return { ...stake, reward: rewardOf(stake, poolOfStake(state, stake), now) };
}

function toRequestView(state: LedgerState, request: UnstakeRequestRecord): UnstakeRequestView {
    return { ...request, status: requestStatus(state, request) };
}

// --- pools ---

export function getPool(state: LedgerState, poolId: number): PoolData {
    if (!validate.integer(poolId, true, false)) {
        throw new InvalidInputError('poolId must be a non-negative integer', 'poolId');
    }
    const pool = state.getPool(poolId);
    if (!pool) throw new NotFoundError(`Pool ${poolId} not found`, { poolId });
    return { ...pool };
}

export function getAllPools(state: LedgerState, offset: number, limit: number): PoolData[] {
    return pageOf(state.listPools(), offset, limit, 'pools').map(pool => ({ ...pool }));
}

/**
 * Active pools in ascending id order. The offset counts active pools only;
 * an offset past the end gives an empty page.
 */
export function getActivePools(state: LedgerState, offset: number, limit: number): PoolData[] {
    assertPageArgs(offset, limit);
    const page: PoolData[] = [];
    let skipped = 0;
    for (const pool of state.listPools()) {
        if (page.length >= limit) break;
        if (!pool.isActive) continue;
        if (skipped < offset) {
            skipped++;
            continue;
        }
        page.push({ ...pool });
    }
    return page;
}

export function totalStaked(state: LedgerState, poolId: number): bigint {
    return getPool(state, poolId).totalStaked;
}

// --- stakes ---

export function getStake(state: LedgerState, owner: string, stakeIndex: number, now: number): StakeView {
    if (!validate.integer(stakeIndex, true, false)) {
        throw new InvalidInputError('stakeIndex must be a non-negative integer', 'stakeIndex');
    }
    const stake = state.getStake(owner, stakeIndex);
    if (!stake) throw new NotFoundError(`Stake ${stakeIndex} of ${owner} not found`, { owner, stakeIndex });
    return toStakeView(state, stake, now);
}

export function getUserStakes(state: LedgerState, owner: string, offset: number, limit: number, now: number): StakeView[] {
    return pageOf(state.listStakes(owner), offset, limit, `stakes of ${owner}`).map(stake => toStakeView(state, stake, now));
}

export function rewardOfStake(state: LedgerState, owner: string, stakeIndex: number, now: number): bigint {
    return getStake(state, owner, stakeIndex, now).reward;
}

// --- unstake requests ---

export function getUnstakeRequest(state: LedgerState, poolId: number, requestId: number): UnstakeRequestView {
    getPool(state, poolId);
    if (!validate.integer(requestId, true, false)) {
        throw new InvalidInputError('requestId must be a non-negative integer', 'requestId');
    }
    const request = state.getUnstakeRequest(poolId, requestId);
    if (!request) throw new NotFoundError(`Unstake request ${requestId} not found in pool ${poolId}`, { poolId, requestId });
    return toRequestView(state, request);
}

export function getUnstakeRequests(state: LedgerState, poolId: number, offset: number, limit: number): UnstakeRequestView[] {
    getPool(state, poolId);
    return pageOf(state.listUnstakeRequests(poolId), offset, limit, `requests of pool ${poolId}`)
        .map(request => toRequestView(state, request));
}

export function requestCount(state: LedgerState, poolId: number): number {
    getPool(state, poolId);
    return state.requestCount(poolId);
}

/**
 * What a batch settlement of `requestIds` would need right now. Read-only.
 */
export function quoteBatchCompletion(state: LedgerState, poolId: number, requestIds: readonly number[]): BatchQuote {
    if (!validate.integer(poolId, true, false)) {
        throw new InvalidInputError('poolId must be a non-negative integer', 'poolId');
    }
    if (!validate.array(requestIds, config.maxBatchSize) || !requestIds.every(id => validate.integer(id, true, false))) {
        throw new InvalidInputError(`requestIds must hold between 1 and ${config.maxBatchSize} non-negative integers`, 'requestIds');
    }
    const { requiredValue, settleableRequestIds } = quoteBatch(state, getPoolOrFail(state, poolId), requestIds);
    return { requiredValue, settleableRequestIds };
}

// --- config, roles and events ---

export function getConfig(state: LedgerState): ConfigView {
    return { ...state.getSettings(), managers: state.listManagers() };
}

export function getEvents(state: LedgerState, offset: number, limit: number): EventDocument[] {
    return pageOf(state.listEvents(), offset, limit, 'events').map(event => ({ ...event, data: { ...event.data } }));
}
