import config from '../../config.js';
import { InvalidInputError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { TxContext } from '../types.js';
import { ConfigSetMinimumDurationData } from './config-interfaces.js';

export async function validateTx(data: ConfigSetMinimumDurationData, ctx: TxContext): Promise<void> {
    requireManager(ctx);
    if (!validate.integer(data.minimumStakeDuration, true, false, config.maxLockDuration)) {
        throw new InvalidInputError('minimumStakeDuration must be a non-negative integer of seconds', 'minimumStakeDuration');
    }
}

export async function processTx(data: ConfigSetMinimumDurationData, ctx: TxContext): Promise<void> {
    const previous = ctx.state.getSettings().minimumStakeDuration;
    ctx.state.updateSettings({ minimumStakeDuration: data.minimumStakeDuration });
    logEvent(ctx, 'config', 'minimum_duration_changed', {
        previous,
        minimumStakeDuration: data.minimumStakeDuration,
    });
    logger.info(`[config-set-minimum-duration] Minimum stake duration ${previous}s -> ${data.minimumStakeDuration}s.`);
}
