import { describeError, LedgerError, TransferFailedError } from '../errors.js';
import logger from '../logger.js';
import type { TxContext } from '../transactions/types.js';

export type TransferInstruction =
    | { kind: 'native'; from: string; to: string; amount: bigint }
    | { kind: 'token'; assetReference: string; from: string; to: string; amount: bigint };

function describeTransfer(instruction: TransferInstruction): string {
    const asset = instruction.kind === 'native' ? 'native' : instruction.assetReference;
    return `${instruction.amount} ${asset} ${instruction.from} -> ${instruction.to}`;
}

/**
 * Runs one value transfer through the port. Any failure aborts the running
 * operation; ledger errors raised inside the port (e.g. a rejected reentrant
 * call) pass through unchanged.
 */
export async function transferOrFail(ctx: TxContext, instruction: TransferInstruction): Promise<void> {
    if (instruction.amount === 0n) return;
    try {
        if (instruction.kind === 'native') {
            await ctx.transfer.transferNative(instruction.from, instruction.to, instruction.amount);
        } else {
            await ctx.transfer.transferToken(instruction.assetReference, instruction.from, instruction.to, instruction.amount);
        }
        logger.trace(`[transfer] ${describeTransfer(instruction)}`);
    } catch (error) {
        logger.error(`[transfer] Failed ${describeTransfer(instruction)}: ${describeError(error)}`);
        if (error instanceof LedgerError) throw error;
        throw new TransferFailedError(`Transfer failed: ${describeError(error)}`, {
            from: instruction.from,
            to: instruction.to,
            amount: instruction.amount.toString(),
        });
    }
}

export async function tokenBalanceOf(ctx: TxContext, assetReference: string, holder: string): Promise<bigint> {
    try {
        return await ctx.transfer.tokenBalance(assetReference, holder);
    } catch (error) {
        if (error instanceof LedgerError) throw error;
        throw new TransferFailedError(`Balance lookup failed: ${describeError(error)}`, { assetReference, holder });
    }
}
