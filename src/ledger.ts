import { Clock, systemClock, ValueTransfer } from './ports.js';
import settings, { ExcessNativePolicy } from './settings.js';
import { LedgerState } from './state.js';
import { LedgerSettingsData } from './transactions/config/config-interfaces.js';
import { CommitListener, TransactionExecutor } from './transactions/index.js';
import { PoolData } from './transactions/pool/pool-interfaces.js';
import { TransactionType } from './transactions/types.js';
import { BatchQuote } from './transactions/unstake/unstake-interfaces.js';
import { toBigInt } from './utils/bigint.js';
import type { EventDocument } from './utils/event-logger.js';
import * as queries from './utils/ledger-queries.js';

export function defaultLedgerSettings(): LedgerSettingsData {
    return {
        owner: settings.ledgerOwner,
        treasury: settings.ledgerTreasury,
        custodyAccount: settings.ledgerAccount,
        minimumStakeAmount: toBigInt(settings.minimumStakeAmount),
        minimumStakeDuration: settings.minimumStakeDuration,
        excessNativePolicy: settings.excessNativePolicy,
    };
}

/**
 * A fresh ledger: no pools, the owner is also the first manager.
 */
export function createInitialState(overrides: Partial<LedgerSettingsData> = {}): LedgerState {
    const ledgerSettings = { ...defaultLedgerSettings(), ...overrides };
    return LedgerState.fromSnapshot({
        settings: ledgerSettings,
        nonce: 0,
        pools: [],
        stakes: [],
        unstakeRequests: [],
        managers: [ledgerSettings.owner],
        events: [],
    });
}

export interface LedgerOptions {
    transfer: ValueTransfer;
    clock?: Clock;
    state?: LedgerState;
    // Ignored when `state` is given
    settings?: Partial<LedgerSettingsData>;
    onCommit?: CommitListener;
}

/**
 * Entry point of the staking ledger. Mutating calls take the caller principal
 * first and run through the serial executor; queries read the current state.
 */
export class Ledger {
    readonly state: LedgerState;
    private readonly clock: Clock;
    private readonly executor: TransactionExecutor;

    constructor(options: LedgerOptions) {
        this.state = options.state ?? createInitialState(options.settings);
        this.clock = options.clock ?? systemClock;
        this.executor = new TransactionExecutor({
            state: this.state,
            transfer: options.transfer,
            clock: this.clock,
            onCommit: options.onCommit,
        });
    }

    // --- Pool Registry ---

    createPool(sender: string, isNative: boolean, assetReference: string | null, apr: number, lockDuration: number): Promise<number> {
        return this.executor.execute(TransactionType.POOL_CREATE, sender, { isNative, assetReference, apr, lockDuration });
    }

    setPoolActive(sender: string, poolId: number, isActive: boolean): Promise<void> {
        return this.executor.execute(TransactionType.POOL_SET_ACTIVE, sender, { poolId, isActive });
    }

    // --- Stake Ledger ---

    stake(sender: string, poolId: number, amount: bigint, attachedValue = 0n): Promise<number> {
        return this.executor.execute(TransactionType.STAKE_CREATE, sender, { poolId, amount }, attachedValue);
    }

    // --- Unstake Pipeline ---

    requestUnstake(sender: string, stakeIndex: number): Promise<number> {
        return this.executor.execute(TransactionType.UNSTAKE_REQUEST, sender, { stakeIndex });
    }

    completeUnstake(sender: string, poolId: number, requestId: number, attachedValue = 0n): Promise<bigint> {
        return this.executor.execute(TransactionType.UNSTAKE_COMPLETE, sender, { poolId, requestId }, attachedValue);
    }

    batchCompleteUnstake(sender: string, poolId: number, requestIds: number[], attachedValue = 0n): Promise<number> {
        return this.executor.execute(TransactionType.UNSTAKE_BATCH_COMPLETE, sender, { poolId, requestIds }, attachedValue);
    }

    // --- Configuration ---

    setMinimumStakeAmount(sender: string, minimumStakeAmount: bigint): Promise<void> {
        return this.executor.execute(TransactionType.CONFIG_SET_MINIMUM_AMOUNT, sender, { minimumStakeAmount });
    }

    setMinimumStakeDuration(sender: string, minimumStakeDuration: number): Promise<void> {
        return this.executor.execute(TransactionType.CONFIG_SET_MINIMUM_DURATION, sender, { minimumStakeDuration });
    }

    setTreasury(sender: string, treasury: string): Promise<void> {
        return this.executor.execute(TransactionType.CONFIG_SET_TREASURY, sender, { treasury });
    }

    setExcessNativePolicy(sender: string, excessNativePolicy: ExcessNativePolicy): Promise<void> {
        return this.executor.execute(TransactionType.CONFIG_SET_EXCESS_POLICY, sender, { excessNativePolicy });
    }

    // --- Access Control ---

    setManager(sender: string, principal: string, enabled: boolean): Promise<void> {
        return this.executor.execute(TransactionType.ROLE_SET_MANAGER, sender, { principal, enabled });
    }

    isManager(principal: string): boolean {
        return this.state.isManager(principal);
    }

    owner(): string {
        return this.state.getSettings().owner;
    }

    // --- Queries ---

    poolCount(): number {
        return this.state.poolCount();
    }

    getPool(poolId: number): PoolData {
        return queries.getPool(this.state, poolId);
    }

    getAllPools(offset: number, limit: number): PoolData[] {
        return queries.getAllPools(this.state, offset, limit);
    }

    getActivePools(offset: number, limit: number): PoolData[] {
        return queries.getActivePools(this.state, offset, limit);
    }

    totalStaked(poolId: number): bigint {
        return queries.totalStaked(this.state, poolId);
    }

    stakeCount(owner: string): number {
        return this.state.stakeCount(owner);
    }

    getStake(owner: string, stakeIndex: number): queries.StakeView {
        return queries.getStake(this.state, owner, stakeIndex, this.clock.now());
    }

    getUserStakes(owner: string, offset: number, limit: number): queries.StakeView[] {
        return queries.getUserStakes(this.state, owner, offset, limit, this.clock.now());
    }

    rewardOf(owner: string, stakeIndex: number): bigint {
        return queries.rewardOfStake(this.state, owner, stakeIndex, this.clock.now());
    }

    requestCount(poolId: number): number {
        return queries.requestCount(this.state, poolId);
    }

    getUnstakeRequest(poolId: number, requestId: number): queries.UnstakeRequestView {
        return queries.getUnstakeRequest(this.state, poolId, requestId);
    }

    getUnstakeRequests(poolId: number, offset: number, limit: number): queries.UnstakeRequestView[] {
        return queries.getUnstakeRequests(this.state, poolId, offset, limit);
    }

    quoteBatchCompletion(poolId: number, requestIds: number[]): BatchQuote {
        return queries.quoteBatchCompletion(this.state, poolId, requestIds);
    }

    getConfig(): queries.ConfigView {
        return queries.getConfig(this.state);
    }

    getEvents(offset: number, limit: number): EventDocument[] {
        return queries.getEvents(this.state, offset, limit);
    }
}

export default Ledger;
