import { ensureU64, type TransactionRecord } from "./TransactionRecord";

export const DEFAULT_COLLECTION_AUTHORITY = "authority";

export interface NftTransferParams {
    collection: string;
    tokenId: bigint;
    newOwner: string;
    signedBy: string;
    signature: string;
    /** Signer allowed to move tokens of the collection (default: "authority") */
    authority?: string;
}

export class NftTransfer implements TransactionRecord {
    readonly kind = "nft_transfer" as const;
    readonly collection: string;
    readonly tokenId: bigint;
    readonly newOwner: string;
    readonly signedBy: string;
    readonly authority: string;
    private readonly sig: string;

    constructor(params: NftTransferParams) {
        this.collection = params.collection;
        this.tokenId = ensureU64(params.tokenId, "tokenId");
        this.newOwner = params.newOwner;
        this.signedBy = params.signedBy;
        this.authority = params.authority ?? DEFAULT_COLLECTION_AUTHORITY;
        this.sig = params.signature;
    }

    signature(): string {
        return this.sig;
    }

    // A single token always moves.
    amount(): bigint {
        return 1n;
    }

    verify(): boolean {
        return this.sig.length > 0 && this.signedBy === this.authority;
    }

    /**
     * Replaces the default rule: amount is fixed, so the token id and
     * collection are checked instead.
     */
    isValid(): boolean {
        return this.verify() && this.tokenId > 0n && this.collection.length > 0;
    }
}
