// Pool interfaces; amounts are bigint in smallest units, times in unix seconds

export interface PoolCreateData {
    isNative: boolean;
    assetReference: string | null; // Token handle; null for native pools
    apr: number; // Integer percent, > 0
    lockDuration: number; // Seconds; 0 means unlocked
}

export interface PoolSetActiveData {
    poolId: number;
    isActive: boolean;
}

export interface PoolData {
    poolId: number;
    isNative: boolean;
    assetReference: string | null;
    apr: number;
    lockDuration: number;
    isActive: boolean;
    totalStaked: bigint; // Sum of stakedAmount over the pool's stakes still in 'staked' status
    createdAt: number;
    creator: string;
}
