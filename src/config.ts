const config = {
    ledgerName: 'Stakevault',
    nativeTokenSymbol: 'NATIVE',
    nativeTokenPrecision: 18,
    nullAccountName: 'null',
    secondsPerYear: 365 * 86400,
    // Fixed-point factor applied before the APR division, cancelled after it
    rewardPrecision: 10n ** 18n,
    aprDenominator: 100n,
    defaultMinimumStakeAmount: '1',
    defaultMinimumStakeDuration: 0,
    defaultExcessNativePolicy: 'retain' as const,
    maxValue: '999999999999999999999999999999999999',
    maxAprPercent: 100000,
    maxLockDuration: 100 * 365 * 86400,
    principalMinLength: 1,
    principalMaxLength: 64,
    principalAllowedChars: 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789',
    principalAllowedCharsMiddle: 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789.-_:',
    assetReferenceMaxLength: 96,
    defaultPageSize: 10,
    maxPageSize: 100,
    maxBatchSize: 500,
};


export default config;
