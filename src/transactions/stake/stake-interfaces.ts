// Stake interfaces; amounts are bigint in smallest units, times in unix seconds

export type StakeStatus = 'staked' | 'pending' | 'completed';

/**
 * The only legal successor of each status. 'completed' is terminal.
 */
export const NEXT_STAKE_STATUS: Record<StakeStatus, StakeStatus | null> = {
    staked: 'pending',
    pending: 'completed',
    completed: null,
};

export interface StakeCreateData {
    poolId: number;
    amount: bigint;
}

export interface StakeData {
    owner: string;
    stakeIndex: number; // Position in the owner's stake list
    poolId: number;
    stakedAmount: bigint;
    startTime: number;
    lockDuration: number; // Copied from the pool at creation
    rewardsEarned: bigint; // 0 until an unstake is requested, then frozen
    status: StakeStatus;
    requestId: number | null; // Set together with the move to 'pending'
}
