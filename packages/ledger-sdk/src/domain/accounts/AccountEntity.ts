import type { LineSink } from "@ledgerwire/helpers";
import { RENT_EXEMPT_MIN_LAMPORTS } from "@ledgerwire/ledger-program";

/**
 * Capability shared by every account kind.
 */
export interface AccountEntity {
    lamports(): bigint;
    /** One-line description, as written by {@link AccountEntity.displayInfo}. */
    infoLine(): string;
    displayInfo(sink?: LineSink): void;
    isRentExempt(): boolean;
}

export function defaultIsRentExempt(account: Pick<AccountEntity, "lamports">): boolean {
    return account.lamports() >= RENT_EXEMPT_MIN_LAMPORTS;
}
