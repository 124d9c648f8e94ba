import { StakeStatus } from '../stake/stake-interfaces.js';

export type UnstakeRequestStatus = Exclude<StakeStatus, 'staked'>;

export interface UnstakeRequestData {
    stakeIndex: number;
}

export interface UnstakeCompleteData {
    poolId: number;
    requestId: number;
}

export interface UnstakeBatchCompleteData {
    poolId: number;
    requestIds: number[];
}

/**
 * A withdrawal request. It has no status field of its own: the status is the
 * referenced stake's, so the two can never diverge.
 */
export interface UnstakeRequestRecord {
    poolId: number;
    requestId: number; // Position in the pool's request list
    user: string;
    stakeIndex: number;
    amount: bigint; // Principal snapshot
    reward: bigint; // Frozen reward snapshot
    timestamp: number;
}

export interface BatchQuote {
    requiredValue: bigint; // Native value the manager must attach; 0 for asset pools
    settleableRequestIds: number[];
}
