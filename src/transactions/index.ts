import { AsyncLocalStorage } from 'async_hooks';

import { describeError, InvalidInputError, LedgerError, PolicyViolationError, ReentrantCallError } from '../errors.js';
import logger from '../logger.js';
import type { Clock, ValueTransfer } from '../ports.js';
import ProcessingQueue from '../processingQueue.js';
import type { LedgerState, StateChange } from '../state.js';
import { deterministicIdFrom } from '../utils/deterministic-id.js';
import type { EventDocument } from '../utils/event-logger.js';
import { transferOrFail } from '../utils/transfer.js';
import validate from '../validation/index.js';
import * as configSetExcessPolicy from './config/config-set-excess-policy.js';
import * as configSetMinimumAmount from './config/config-set-minimum-amount.js';
import * as configSetMinimumDuration from './config/config-set-minimum-duration.js';
import * as configSetTreasury from './config/config-set-treasury.js';
import * as poolCreate from './pool/pool-create.js';
import * as poolSetActive from './pool/pool-set-active.js';
import * as roleSetManager from './role/role-set-manager.js';
import * as stakeCreate from './stake/stake-create.js';
import {
    TransactionData,
    TransactionHandlers,
    TransactionResult,
    TransactionType,
    TxContext,
} from './types.js';
import * as unstakeBatchComplete from './unstake/unstake-batch-complete.js';
import * as unstakeComplete from './unstake/unstake-complete.js';
import * as unstakeRequest from './unstake/unstake-request.js';

export const transactionHandlers: TransactionHandlers = {
    [TransactionType.POOL_CREATE]: poolCreate,
    [TransactionType.POOL_SET_ACTIVE]: poolSetActive,
    [TransactionType.STAKE_CREATE]: stakeCreate,
    [TransactionType.UNSTAKE_REQUEST]: unstakeRequest,
    [TransactionType.UNSTAKE_COMPLETE]: unstakeComplete,
    [TransactionType.UNSTAKE_BATCH_COMPLETE]: unstakeBatchComplete,
    [TransactionType.CONFIG_SET_MINIMUM_AMOUNT]: configSetMinimumAmount,
    [TransactionType.CONFIG_SET_MINIMUM_DURATION]: configSetMinimumDuration,
    [TransactionType.CONFIG_SET_TREASURY]: configSetTreasury,
    [TransactionType.CONFIG_SET_EXCESS_POLICY]: configSetExcessPolicy,
    [TransactionType.ROLE_SET_MANAGER]: roleSetManager,
};

// Only these may carry attached native value
const VALUE_BEARING_TYPES = new Set<TransactionType>([
    TransactionType.STAKE_CREATE,
    TransactionType.UNSTAKE_COMPLETE,
    TransactionType.UNSTAKE_BATCH_COMPLETE,
]);

/**
 * Called after every committed transaction, still inside the serial queue.
 */
export type CommitListener = (changes: StateChange[], events: EventDocument[]) => Promise<void>;

export interface ExecutorOptions {
    state: LedgerState;
    transfer: ValueTransfer;
    clock: Clock;
    onCommit?: CommitListener;
}

interface ExecutionFrame {
    type: TransactionType;
    active: boolean;
}

/**
 * Single-writer executor. Transactions run one at a time through a queue;
 * each one validates, escrows attached value, processes, then commits or
 * rolls back both the ledger state and the transfer port.
 *
 * A call issued from inside a running transaction (for instance by a value
 * transfer hook) is rejected instead of queued.
 */
export class TransactionExecutor {
    private readonly queue = new ProcessingQueue('ledger');
    private readonly scope = new AsyncLocalStorage<ExecutionFrame>();

    constructor(private readonly options: ExecutorOptions) {}

    async execute<K extends TransactionType>(
        type: K,
        sender: string,
        data: TransactionData<K>,
        value = 0n
    ): Promise<TransactionResult<K>> {
        // Timers and callbacks created during an operation keep its frame after it ends
        const running = this.scope.getStore();
        if (running?.active) {
            logger.warn(`[executor] Reentrant ${TransactionType[type]} from ${sender} during ${TransactionType[running.type]} rejected.`);
            throw new ReentrantCallError(TransactionType[type]);
        }
        return this.queue.run(() => {
            const frame: ExecutionFrame = { type, active: true };
            return this.scope.run(frame, async () => {
                try {
                    return await this.runAtomic(type, sender, data, value);
                } finally {
                    frame.active = false;
                }
            });
        });
    }

    private async runAtomic<K extends TransactionType>(
        type: K,
        sender: string,
        data: TransactionData<K>,
        value: bigint
    ): Promise<TransactionResult<K>> {
        const { state, transfer, clock } = this.options;
        const handler = transactionHandlers[type];
        const typeName = TransactionType[type];
        const ctx: TxContext = {
            txId: deterministicIdFrom([typeName, sender, state.getNonce()]),
            type,
            sender,
            value,
            now: clock.now(),
            state,
            transfer,
        };
        const eventsBefore = state.listEvents().length;

        let result: TransactionResult<K>;
        let changes: StateChange[];
        state.begin();
        transfer.begin?.();
        try {
            if (!validate.principal(sender)) {
                throw new InvalidInputError('sender must be a valid principal', 'sender');
            }
            if (!validate.bigint(value, true, false)) {
                throw new InvalidInputError('attached value must be a non-negative amount', 'value');
            }
            if (value > 0n && !VALUE_BEARING_TYPES.has(type)) {
                throw new PolicyViolationError(`${typeName} does not accept attached value`, { value: value.toString() });
            }

            await handler.validateTx(data, ctx);
            if (value > 0n) {
                await transferOrFail(ctx, { kind: 'native', from: sender, to: state.getSettings().custodyAccount, amount: value });
            }
            result = await handler.processTx(data, ctx);

            changes = state.commit();
            transfer.commit?.();
        } catch (error) {
            state.rollback();
            transfer.rollback?.();
            if (error instanceof LedgerError) {
                logger.warn(`[executor] ${typeName} from ${sender} rejected (${error.code}): ${error.message}`);
            } else {
                logger.error(`[executor] ${typeName} from ${sender} failed: ${describeError(error)}`);
            }
            throw error;
        }

        logger.debug(`[executor] ${typeName} ${ctx.txId} committed with ${changes.length} change(s).`);
        if (this.options.onCommit) {
            await this.options.onCommit(changes, state.listEvents().slice(eventsBefore));
        }
        return result;
    }
}

export default TransactionExecutor;
