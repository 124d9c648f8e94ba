import { ExcessNativePolicy } from '../../settings.js';

export interface ConfigSetMinimumAmountData {
    minimumStakeAmount: bigint;
}

export interface ConfigSetMinimumDurationData {
    minimumStakeDuration: number;
}

export interface ConfigSetTreasuryData {
    treasury: string;
}

export interface ConfigSetExcessPolicyData {
    excessNativePolicy: ExcessNativePolicy;
}

export interface LedgerSettingsData {
    owner: string;
    treasury: string;
    custodyAccount: string; // Holds native value attached to an operation
    minimumStakeAmount: bigint;
    minimumStakeDuration: number; // Seconds on top of the pool lock
    excessNativePolicy: ExcessNativePolicy;
}
