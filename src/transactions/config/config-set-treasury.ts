import { PolicyViolationError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { TxContext } from '../types.js';
import { ConfigSetTreasuryData } from './config-interfaces.js';

export async function validateTx(data: ConfigSetTreasuryData, ctx: TxContext): Promise<void> {
    requireManager(ctx);
    if (!validate.principal(data.treasury)) {
        logger.warn(`[config-set-treasury] Invalid treasury '${String(data.treasury)}'.`);
        throw new PolicyViolationError('Treasury must be a valid, non-null principal', { treasury: String(data.treasury) });
    }
}

export async function processTx(data: ConfigSetTreasuryData, ctx: TxContext): Promise<void> {
    const previous = ctx.state.getSettings().treasury;
    ctx.state.updateSettings({ treasury: data.treasury });
    logEvent(ctx, 'config', 'treasury_changed', {
        previous,
        treasury: data.treasury,
    });
    logger.info(`[config-set-treasury] Treasury ${previous} -> ${data.treasury}.`);
}
