import { DataIntegrityError, InvalidStateError, NotFoundError, PolicyViolationError } from '../../errors.js';
import logger from '../../logger.js';
import type { LedgerState } from '../../state.js';
import { tokenBalanceOf, transferOrFail } from '../../utils/transfer.js';
import { formatNativeAmount } from '../pool/pool-helpers.js';
import { PoolData } from '../pool/pool-interfaces.js';
import { StakeData } from '../stake/stake-interfaces.js';
import type { TxContext } from '../types.js';
import { BatchQuote, UnstakeRequestRecord, UnstakeRequestStatus } from './unstake-interfaces.js';

export interface SettlementTarget {
    pool: PoolData;
    request: UnstakeRequestRecord;
    stake: StakeData;
    total: bigint;
}

/**
 * The stake a request refers to. The stake must point back at the request;
 * anything else is corrupted state and fails loudly.
 */
export function stakeOfRequest(state: LedgerState, request: UnstakeRequestRecord): StakeData {
    const stake = state.getStake(request.user, request.stakeIndex);
    if (!stake || stake.poolId !== request.poolId || stake.requestId !== request.requestId || stake.status === 'staked') {
        logger.error(`[unstake] Request ${request.poolId}/${request.requestId} and stake ${request.user}/${request.stakeIndex} disagree.`);
        throw new DataIntegrityError('Unstake request does not match its stake', {
            poolId: request.poolId,
            requestId: request.requestId,
            user: request.user,
            stakeIndex: request.stakeIndex,
        });
    }
    return stake;
}

export function requestStatus(state: LedgerState, request: UnstakeRequestRecord): UnstakeRequestStatus {
    const status = stakeOfRequest(state, request).status;
    return status === 'completed' ? 'completed' : 'pending';
}

export function getPoolOrFail(state: LedgerState, poolId: number): PoolData {
    const pool = state.getPool(poolId);
    if (!pool) {
        logger.warn(`[unstake] Pool ${poolId} not found.`);
        throw new NotFoundError(`Pool ${poolId} not found`, { poolId });
    }
    return pool;
}

/**
 * The settlement target for a request that must be pending.
 */
export function resolvePendingRequest(state: LedgerState, poolId: number, requestId: number): SettlementTarget {
    const pool = getPoolOrFail(state, poolId);
    const request = state.getUnstakeRequest(poolId, requestId);
    if (!request) {
        logger.warn(`[unstake] Request ${poolId}/${requestId} not found.`);
        throw new NotFoundError(`Unstake request ${requestId} not found in pool ${poolId}`, { poolId, requestId });
    }
    const stake = stakeOfRequest(state, request);
    if (stake.status !== 'pending') {
        logger.warn(`[unstake] Request ${poolId}/${requestId} is ${stake.status}.`);
        throw new InvalidStateError(`Unstake request is ${stake.status}, expected pending`, {
            poolId,
            requestId,
            status: stake.status,
        });
    }
    return { pool, request, stake, total: request.amount + request.reward };
}

/**
 * Like resolvePendingRequest, but returns null for entries a batch skips:
 * unknown or no longer pending.
 */
export function findSettleable(state: LedgerState, pool: PoolData, requestId: number): SettlementTarget | null {
    const request = state.getUnstakeRequest(pool.poolId, requestId);
    if (!request) return null;
    const stake = stakeOfRequest(state, request);
    if (stake.status !== 'pending') return null;
    return { pool, request, stake, total: request.amount + request.reward };
}

/**
 * First pass of batch settlement: what the manager has to provide for the
 * entries that are still settleable. Duplicate ids count once.
 */
export function quoteBatch(state: LedgerState, pool: PoolData, requestIds: readonly number[]): BatchQuote & { total: bigint } {
    const seen = new Set<number>();
    const settleableRequestIds: number[] = [];
    let total = 0n;
    for (const requestId of requestIds) {
        if (seen.has(requestId)) continue;
        seen.add(requestId);
        const target = findSettleable(state, pool, requestId);
        if (!target) continue;
        settleableRequestIds.push(requestId);
        total += target.total;
    }
    return { requiredValue: pool.isNative ? total : 0n, settleableRequestIds, total };
}

/**
 * Checks that the manager can fund `total`: attached native value for native
 * pools, own token balance (and no attached value) for asset pools.
 */
export async function assertFunding(ctx: TxContext, pool: PoolData, total: bigint): Promise<void> {
    if (pool.isNative || pool.assetReference === null) {
        if (ctx.value < total) {
            logger.warn(`[unstake] Attached value ${ctx.value} below required ${total}.`);
            throw new PolicyViolationError('Attached value does not cover the settlement', {
                value: ctx.value.toString(),
                required: total.toString(),
            });
        }
        return;
    }
    if (ctx.value !== 0n) {
        throw new PolicyViolationError('Asset pools do not accept attached value', { value: ctx.value.toString() });
    }
    const balance = await tokenBalanceOf(ctx, pool.assetReference, ctx.sender);
    if (balance < total) {
        logger.warn(`[unstake] ${ctx.sender} holds ${balance} ${pool.assetReference}, needs ${total}.`);
        throw new PolicyViolationError('Manager balance does not cover the settlement', {
            balance: balance.toString(),
            required: total.toString(),
        });
    }
}

/**
 * Pays principal plus reward to the requester and closes the stake, which
 * closes the request with it.
 */
export async function settle(ctx: TxContext, target: SettlementTarget): Promise<void> {
    const { pool, request, total } = target;
    if (pool.isNative || pool.assetReference === null) {
        await transferOrFail(ctx, { kind: 'native', from: ctx.state.getSettings().custodyAccount, to: request.user, amount: total });
    } else {
        await transferOrFail(ctx, { kind: 'token', assetReference: pool.assetReference, from: ctx.sender, to: request.user, amount: total });
    }
    ctx.state.updateStake(request.user, request.stakeIndex, { status: 'completed' });
}

/**
 * Native value attached beyond what was paid out. Refunded to the manager or
 * kept in custody, depending on the configured policy. Returns the refund.
 */
export async function handleExcessValue(ctx: TxContext, paid: bigint): Promise<bigint> {
    const excess = ctx.value - paid;
    if (excess <= 0n) return 0n;
    const { excessNativePolicy, custodyAccount } = ctx.state.getSettings();
    if (excessNativePolicy !== 'refund') {
        logger.info(`[unstake] Retaining excess value ${formatNativeAmount(excess)} attached by ${ctx.sender}.`);
        return 0n;
    }
    await transferOrFail(ctx, { kind: 'native', from: custodyAccount, to: ctx.sender, amount: excess });
    logger.info(`[unstake] Refunded excess value ${formatNativeAmount(excess)} to ${ctx.sender}.`);
    return excess;
}
