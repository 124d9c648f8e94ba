import { InvalidInputError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { TxContext } from '../types.js';
import { ConfigSetMinimumAmountData } from './config-interfaces.js';

export async function validateTx(data: ConfigSetMinimumAmountData, ctx: TxContext): Promise<void> {
    requireManager(ctx);
    if (!validate.bigint(data.minimumStakeAmount, true, false)) {
        throw new InvalidInputError('minimumStakeAmount must be a non-negative amount', 'minimumStakeAmount');
    }
}

export async function processTx(data: ConfigSetMinimumAmountData, ctx: TxContext): Promise<void> {
    const previous = ctx.state.getSettings().minimumStakeAmount;
    ctx.state.updateSettings({ minimumStakeAmount: data.minimumStakeAmount });
    logEvent(ctx, 'config', 'minimum_amount_changed', {
        previous: previous.toString(),
        minimumStakeAmount: data.minimumStakeAmount.toString(),
    });
    logger.info(`[config-set-minimum-amount] Minimum stake amount ${previous} -> ${data.minimumStakeAmount}.`);
}
