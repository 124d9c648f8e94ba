import cloneDeep from 'clone-deep';

import config from '../config.js';
import logger from '../logger.js';
import type { ValueTransfer } from '../ports.js';

export type Balances = Record<string, Record<string, bigint>>;

export interface TransferRecord {
    assetReference: string; // config.nativeTokenSymbol for native value
    from: string;
    to: string;
    amount: bigint;
}

/**
 * In-memory balance book implementing the value-transfer port. Balances are
 * kept per holder and per asset; native value lives under the native symbol.
 * begin/commit/rollback snapshot the whole book so transfers made by a failed
 * operation disappear with it.
 */
export class AccountBook implements ValueTransfer {
    private balances: Balances = {};
    private snapshot: Balances | null = null;
    private uncommitted = 0;

    // Runs before each transfer moves value; a throwing hook fails the transfer
    onTransfer: ((transfer: TransferRecord) => Promise<void>) | null = null;

    balanceOf(holder: string, assetReference: string = config.nativeTokenSymbol): bigint {
        return this.balances[holder]?.[assetReference] ?? 0n;
    }

    /**
     * Mints value out of thin air. Development and tests only.
     */
    credit(holder: string, amount: bigint, assetReference: string = config.nativeTokenSymbol): void {
        this.adjust(holder, assetReference, amount);
        logger.trace(`[account] Credited ${amount} ${assetReference} to ${holder}`);
    }

    async transferNative(from: string, to: string, amount: bigint): Promise<void> {
        await this.move({ assetReference: config.nativeTokenSymbol, from, to, amount });
    }

    async transferToken(assetReference: string, from: string, to: string, amount: bigint): Promise<void> {
        await this.move({ assetReference, from, to, amount });
    }

    async tokenBalance(assetReference: string, holder: string): Promise<bigint> {
        return this.balanceOf(holder, assetReference);
    }

    begin(): void {
        this.snapshot = cloneDeep(this.balances);
        this.uncommitted = 0;
    }

    commit(): void {
        this.uncommitted = 0;
        this.snapshot = null;
    }

    rollback(): void {
        if (this.snapshot) {
            this.balances = this.snapshot;
            logger.debug(`[account] Rolled back ${this.uncommitted} transfer(s)`);
        }
        this.uncommitted = 0;
        this.snapshot = null;
    }

    private async move(transfer: TransferRecord): Promise<void> {
        if (transfer.amount <= 0n) throw new Error(`Transfer amount must be positive, got ${transfer.amount}`);
        if (this.onTransfer) await this.onTransfer(transfer);

        const available = this.balanceOf(transfer.from, transfer.assetReference);
        if (available < transfer.amount) {
            logger.error(`[account] Insufficient ${transfer.assetReference} balance for ${transfer.from}: ${available} < ${transfer.amount}`);
            throw new Error(`Insufficient ${transfer.assetReference} balance for ${transfer.from}`);
        }
        this.adjust(transfer.from, transfer.assetReference, -transfer.amount);
        this.adjust(transfer.to, transfer.assetReference, transfer.amount);
        if (this.snapshot) this.uncommitted++;
    }

    private adjust(holder: string, assetReference: string, amount: bigint): void {
        const holderBalances = this.balances[holder] ?? (this.balances[holder] = {});
        holderBalances[assetReference] = (holderBalances[assetReference] ?? 0n) + amount;
    }
}

export default AccountBook;
