import config from '../../config.js';
import { formatTokenAmount } from '../../utils/bigint.js';
import { PoolData } from './pool-interfaces.js';

/**
 * Human readable amount for log lines. Native amounts are shown in whole
 * units; asset amounts stay in smallest units since their precision is unknown.
 */
export function formatPoolAmount(pool: PoolData, amount: bigint): string {
    if (pool.isNative || pool.assetReference === null) return formatNativeAmount(amount);
    return `${amount} ${pool.assetReference}`;
}

export function formatNativeAmount(amount: bigint): string {
    return `${formatTokenAmount(amount, config.nativeTokenPrecision)} ${config.nativeTokenSymbol}`;
}
