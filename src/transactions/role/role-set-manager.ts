import { InvalidInputError } from '../../errors.js';
import logger from '../../logger.js';
import { requireOwner } from '../../utils/access.js';
import { logEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import type { TxContext } from '../types.js';
import { RoleSetManagerData } from './role-interfaces.js';

export async function validateTx(data: RoleSetManagerData, ctx: TxContext): Promise<void> {
    requireOwner(ctx);
    if (!validate.principal(data.principal)) {
        throw new InvalidInputError('principal must be a valid, non-null principal', 'principal');
    }
    if (!validate.boolean(data.enabled)) {
        throw new InvalidInputError('enabled must be a boolean', 'enabled');
    }
}

export async function processTx(data: RoleSetManagerData, ctx: TxContext): Promise<void> {
    ctx.state.setManager(data.principal, data.enabled);
    logEvent(ctx, 'role', 'manager_changed', {
        principal: data.principal,
        enabled: data.enabled,
    });
    logger.info(`[role-set-manager] ${data.principal} ${data.enabled ? 'granted' : 'revoked'} manager role by ${ctx.sender}.`);
}
