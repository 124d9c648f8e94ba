import { InvalidInputError } from '../../errors.js';
import logger from '../../logger.js';
import { requireManager } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import type { TxContext } from '../types.js';
import { ConfigSetExcessPolicyData } from './config-interfaces.js';

export async function validateTx(data: ConfigSetExcessPolicyData, ctx: TxContext): Promise<void> {
    requireManager(ctx);
    if (data.excessNativePolicy !== 'retain' && data.excessNativePolicy !== 'refund') {
        throw new InvalidInputError("excessNativePolicy must be 'retain' or 'refund'", 'excessNativePolicy');
    }
}

export async function processTx(data: ConfigSetExcessPolicyData, ctx: TxContext): Promise<void> {
    const previous = ctx.state.getSettings().excessNativePolicy;
    ctx.state.updateSettings({ excessNativePolicy: data.excessNativePolicy });
    logEvent(ctx, 'config', 'excess_policy_changed', {
        previous,
        excessNativePolicy: data.excessNativePolicy,
    });
    logger.info(`[config-set-excess-policy] Excess native value policy ${previous} -> ${data.excessNativePolicy}.`);
}
