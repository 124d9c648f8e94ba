import type { ValueTransfer } from '../ports.js';
import type { LedgerState } from '../state.js';
import type {
    ConfigSetExcessPolicyData,
    ConfigSetMinimumAmountData,
    ConfigSetMinimumDurationData,
    ConfigSetTreasuryData,
} from './config/config-interfaces.js';
import type { PoolCreateData, PoolSetActiveData } from './pool/pool-interfaces.js';
import type { RoleSetManagerData } from './role/role-interfaces.js';
import type { StakeCreateData } from './stake/stake-interfaces.js';
import type { UnstakeBatchCompleteData, UnstakeCompleteData, UnstakeRequestData } from './unstake/unstake-interfaces.js';

export enum TransactionType {
    // Pool Registry
    POOL_CREATE = 1,
    POOL_SET_ACTIVE = 2,

    // Stake Ledger
    STAKE_CREATE = 3,

    // Unstake Pipeline
    UNSTAKE_REQUEST = 4,
    UNSTAKE_COMPLETE = 5,
    UNSTAKE_BATCH_COMPLETE = 6,

    // Global configuration
    CONFIG_SET_MINIMUM_AMOUNT = 7,
    CONFIG_SET_MINIMUM_DURATION = 8,
    CONFIG_SET_TREASURY = 9,
    CONFIG_SET_EXCESS_POLICY = 10,

    // Access control
    ROLE_SET_MANAGER = 11,
}

/**
 * Payload and result of every transaction type.
 */
export interface TransactionMap {
    [TransactionType.POOL_CREATE]: { data: PoolCreateData; result: number };
    [TransactionType.POOL_SET_ACTIVE]: { data: PoolSetActiveData; result: void };
    [TransactionType.STAKE_CREATE]: { data: StakeCreateData; result: number };
    [TransactionType.UNSTAKE_REQUEST]: { data: UnstakeRequestData; result: number };
    [TransactionType.UNSTAKE_COMPLETE]: { data: UnstakeCompleteData; result: bigint };
    [TransactionType.UNSTAKE_BATCH_COMPLETE]: { data: UnstakeBatchCompleteData; result: number };
    [TransactionType.CONFIG_SET_MINIMUM_AMOUNT]: { data: ConfigSetMinimumAmountData; result: void };
    [TransactionType.CONFIG_SET_MINIMUM_DURATION]: { data: ConfigSetMinimumDurationData; result: void };
    [TransactionType.CONFIG_SET_TREASURY]: { data: ConfigSetTreasuryData; result: void };
    [TransactionType.CONFIG_SET_EXCESS_POLICY]: { data: ConfigSetExcessPolicyData; result: void };
    [TransactionType.ROLE_SET_MANAGER]: { data: RoleSetManagerData; result: void };
}

export type TransactionData<K extends TransactionType> = TransactionMap[K]['data'];
export type TransactionResult<K extends TransactionType> = TransactionMap[K]['result'];

/**
 * Everything a handler may read or touch while running one transaction.
 */
export interface TxContext {
    readonly txId: string;
    readonly type: TransactionType;
    readonly sender: string;
    // Native value the caller attached; already escrowed into the custody account
    readonly value: bigint;
    readonly now: number;
    readonly state: LedgerState;
    readonly transfer: ValueTransfer;
}

export interface TransactionHandler<D, R> {
    // Throws a LedgerError on the first failed precondition; never writes
    validateTx: (data: D, ctx: TxContext) => Promise<void>;
    processTx: (data: D, ctx: TxContext) => Promise<R>;
}

export type TransactionHandlers = {
    [K in TransactionType]: TransactionHandler<TransactionData<K>, TransactionResult<K>>;
};
