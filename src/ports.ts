/**
 * Environment port: clock. Unix seconds.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

/**
 * Value-transfer port. Moves native currency or units of a fungible token
 * between principals. A failed transfer throws; the ledger then aborts the
 * whole enclosing operation.
 *
 * `begin`, `commit` and `rollback` are called around every mutating operation
 * so a host can make its transfers part of the same atomic unit.
 */
export interface ValueTransfer {
    transferNative(from: string, to: string, amount: bigint): Promise<void>;
    transferToken(assetReference: string, from: string, to: string, amount: bigint): Promise<void>;
    tokenBalance(assetReference: string, holder: string): Promise<bigint>;
    begin?(): void;
    commit?(): void;
    rollback?(): void;
}
