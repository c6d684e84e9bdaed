/**
 * Capability shared by every transaction kind that can be validated ahead of
 * execution.
 */
export interface TransactionRecord {
    /** Opaque signature string as supplied by the sender. */
    signature(): string;
    amount(): bigint;
    /** Signature check. Stubbed: no cryptography is performed. */
    verify(): boolean;
    isValid(): boolean;
}

/**
 * Default validity rule: a verified signature and a non-zero amount.
 */
export function defaultIsValid(transaction: Pick<TransactionRecord, "verify" | "amount">): boolean {
    return transaction.verify() && transaction.amount() > 0n;
}

const U64_MAX = (1n << 64n) - 1n;

export function ensureU64(value: bigint, field: string): bigint {
    if (value < 0n || value > U64_MAX) {
        throw new Error(`${field} must be an unsigned 64-bit integer`);
    }
    return value;
}
