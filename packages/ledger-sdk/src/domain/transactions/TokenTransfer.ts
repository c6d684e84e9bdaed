import { defaultIsValid, ensureU64, type TransactionRecord } from "./TransactionRecord";

/** Signatures produced by the token signer carry this prefix. */
export const TOKEN_SIGNATURE_PREFIX = "0x";

export interface TokenTransferParams {
    from: string;
    to: string;
    amountLamports: bigint;
    signature: string;
}

export class TokenTransfer implements TransactionRecord {
    readonly kind = "token_transfer" as const;
    readonly from: string;
    readonly to: string;
    readonly amountLamports: bigint;
    private readonly sig: string;

    constructor(params: TokenTransferParams) {
        this.from = params.from;
        this.to = params.to;
        this.amountLamports = ensureU64(params.amountLamports, "amountLamports");
        this.sig = params.signature;
    }

    signature(): string {
        return this.sig;
    }

    amount(): bigint {
        return this.amountLamports;
    }

    verify(): boolean {
        return this.sig.startsWith(TOKEN_SIGNATURE_PREFIX);
    }

    isValid(): boolean {
        return defaultIsValid(this);
    }
}
