import { Ledger } from '../src/ledger.js';
import type { Clock } from '../src/ports.js';
import { LedgerSettingsData } from '../src/transactions/config/config-interfaces.js';
import AccountBook from '../src/utils/account.js';

export const OWNER = 'owner';
export const MANAGER = 'manager1';
export const TREASURY = 'treasury';
export const CUSTODY = 'vault';
export const ALICE = 'alice';
export const BOB = 'bob';
export const TOKEN = 'TKN';

export const ONE = 10n ** 18n;
export const DAY = 86400;
export const START = 1_700_000_000;

export class ManualClock implements Clock {
    constructor(public current = START) {}

    now(): number {
        return this.current;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}

export interface TestLedger {
    ledger: Ledger;
    clock: ManualClock;
    book: AccountBook;
}

export function createTestLedger(overrides: Partial<LedgerSettingsData> = {}): TestLedger {
    const clock = new ManualClock();
    const book = new AccountBook();
    const ledger = new Ledger({
        transfer: book,
        clock,
        settings: {
            owner: OWNER,
            treasury: TREASURY,
            custodyAccount: CUSTODY,
            minimumStakeAmount: 1n,
            minimumStakeDuration: 0,
            excessNativePolicy: 'retain',
            ...overrides,
        },
    });
    return { ledger, clock, book };
}

/**
 * Rejection matcher for assert.rejects / assert.throws on a ledger error code.
 */
export function withCode(code: string): (error: unknown) => boolean {
    return (error: unknown) => error instanceof Error && 'code' in error && error.code === code;
}
