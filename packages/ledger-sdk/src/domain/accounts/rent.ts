import { consoleSink, type LineSink } from "@ledgerwire/helpers";

import type { AccountEntity } from "./AccountEntity";

export interface RentExemptionEntry {
    index: number;
    lamports: bigint;
    rentExempt: boolean;
}

export function reportRentExemption(accounts: readonly AccountEntity[]): RentExemptionEntry[] {
    return accounts.map((account, index) => ({
        index,
        lamports: account.lamports(),
        rentExempt: account.isRentExempt(),
    }));
}

/**
 * Writes each account's info line followed by its rent-exemption status.
 */
export function displayAccounts(accounts: readonly AccountEntity[], sink: LineSink = consoleSink): void {
    for (const account of accounts) {
        account.displayInfo(sink);
        sink(`Rent-exempt: ${account.isRentExempt()}`);
    }
}
