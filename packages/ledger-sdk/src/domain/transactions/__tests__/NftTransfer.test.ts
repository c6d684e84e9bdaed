import { describe, expect, it } from "vitest";

import { NftTransfer, type NftTransferParams } from "../NftTransfer";

const BASE: NftTransferParams = {
    collection: "Lunar Moths",
    tokenId: 42n,
    newOwner: "carol",
    signedBy: "authority",
    signature: "valid_sig",
};

describe("NftTransfer", () => {
    it("always moves a single token", () => {
        expect(new NftTransfer(BASE).amount()).toBe(1n);
    });

    it("is valid when signed by the authority with a token id and collection", () => {
        const transfer = new NftTransfer(BASE);
        expect(transfer.verify()).toBe(true);
        expect(transfer.isValid()).toBe(true);
    });

    it("replaces the default rule with token id and collection checks", () => {
        const zeroId = new NftTransfer({ ...BASE, tokenId: 0n });
        const noCollection = new NftTransfer({ ...BASE, collection: "" });

        // amount() > 0 and verify() hold, so the default rule would accept both
        expect(zeroId.verify() && zeroId.amount() > 0n).toBe(true);
        expect(zeroId.isValid()).toBe(false);
        expect(noCollection.isValid()).toBe(false);
    });

    it("fails verification for other signers or an empty signature", () => {
        expect(new NftTransfer({ ...BASE, signedBy: "mallory" }).verify()).toBe(false);
        expect(new NftTransfer({ ...BASE, signature: "" }).verify()).toBe(false);
        expect(new NftTransfer({ ...BASE, signedBy: "mallory" }).isValid()).toBe(false);
    });

    it("accepts a custom collection authority", () => {
        const transfer = new NftTransfer({ ...BASE, signedBy: "curator", authority: "curator" });
        expect(transfer.isValid()).toBe(true);
    });
});
