import { domainError, type DomainError } from "@ledgerwire/ledger-program";
import { err, ok, type Result } from "neverthrow";

import type { LedgerAccount } from "./from-record";

export interface TransferRequest {
    /** Debited account; undefined when the lookup found nothing. */
    source?: LedgerAccount;
    signer: string;
    amount: bigint;
}

/**
 * Ledger checks a transfer must pass before execution, in order: the source
 * exists, the signer owns it, the amount is non-zero, the balance covers it.
 */
export function preflightTransfer(request: TransferRequest): Result<void, DomainError> {
    const { source, signer, amount } = request;
    if (!source) {
        return err(domainError("AccountNotFound"));
    }
    if (source.kind !== "user" || source.name !== signer) {
        return err(domainError("UnauthorizedSigner", `${signer} cannot debit this account`));
    }
    if (amount <= 0n) {
        return err(domainError("InvalidAmount", "Amount must be greater than zero"));
    }
    if (source.lamports() < amount) {
        return err(domainError("InsufficientBalance"));
    }
    return ok(undefined);
}
