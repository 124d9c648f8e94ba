import config from '../../config.js';
import { InvalidInputError, PolicyViolationError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { TxContext } from '../types.js';
import { PoolCreateData, PoolData } from './pool-interfaces.js';

export async function validateTx(data: PoolCreateData, ctx: TxContext): Promise<void> {
    requireManager(ctx);

    if (!validate.boolean(data.isNative)) {
        throw new InvalidInputError('isNative must be a boolean', 'isNative');
    }

    if (data.isNative) {
        if (data.assetReference !== null) {
            logger.warn(`[pool-create] Native pool must not carry an asset reference (${data.assetReference}).`);
            throw new PolicyViolationError('Native pool must not have an asset reference', { assetReference: String(data.assetReference) });
        }
    } else if (
        !validate.string(
            data.assetReference,
            config.assetReferenceMaxLength,
            1,
            config.principalAllowedChars,
            config.principalAllowedCharsMiddle
        ) ||
        data.assetReference === config.nullAccountName
    ) {
        logger.warn('[pool-create] Asset pool requires a valid asset reference.');
        throw new PolicyViolationError('Asset pool requires a valid asset reference', { assetReference: String(data.assetReference) });
    }

    if (!validate.integer(data.apr, false, false, config.maxAprPercent)) {
        logger.warn(`[pool-create] Invalid apr ${data.apr}.`);
        throw new PolicyViolationError('apr must be a positive integer percent', { apr: String(data.apr) });
    }

    if (!validate.integer(data.lockDuration, true, false, config.maxLockDuration)) {
        logger.warn(`[pool-create] Invalid lockDuration ${data.lockDuration}.`);
        throw new PolicyViolationError('lockDuration must be a non-negative integer of seconds', { lockDuration: String(data.lockDuration) });
    }
}

export async function processTx(data: PoolCreateData, ctx: TxContext): Promise<number> {
    const poolId = ctx.state.poolCount();
    const pool: PoolData = {
        poolId,
        isNative: data.isNative,
        assetReference: data.isNative ? null : data.assetReference,
        apr: data.apr,
        lockDuration: data.lockDuration,
        isActive: true,
        totalStaked: 0n,
        createdAt: ctx.now,
        creator: ctx.sender,
    };
    ctx.state.insertPool(pool);

    logEvent(ctx, 'pool', 'created', {
        poolId,
        isNative: pool.isNative,
        assetReference: pool.assetReference,
        apr: pool.apr,
        lockDuration: pool.lockDuration,
    });
    logger.info(`[pool-create] Pool ${poolId} created by ${ctx.sender} (apr ${pool.apr}%, lock ${pool.lockDuration}s).`);
    return poolId;
}
