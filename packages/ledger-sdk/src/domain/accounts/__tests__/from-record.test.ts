import { encodeAccountRecord } from "@ledgerwire/ledger-program";
import { describe, expect, it } from "vitest";

import { accountFromRecord, parseAccountEntity } from "../from-record";
import { ProgramAccount } from "../ProgramAccount";
import { UserAccount } from "../UserAccount";

const PAIR_RECORD = new Uint8Array([1, 0, 0, 0, 255, 255, 255, 255, 5, 0, 0, 0, 83, 79, 76, 47, 85, 83, 68, 67]);

describe("parseAccountEntity", () => {
    it("builds a user account from a type 1 record", () => {
        const account = parseAccountEntity(PAIR_RECORD)._unsafeUnwrap();

        expect(account).toBeInstanceOf(UserAccount);
        expect(account.lamports()).toBe(4_294_967_295n);
        expect(account.infoLine()).toBe("User Account: SOL/U, Balance: 4294967295 lamports");
        expect(account.isRentExempt()).toBe(true);
    });

    it("builds a program account from a type 2 record", () => {
        const bytes = encodeAccountRecord({ typeTag: 2, lamports: 5, name: "TokenProg" })._unsafeUnwrap();
        const account = parseAccountEntity(bytes)._unsafeUnwrap();

        expect(account).toBeInstanceOf(ProgramAccount);
        expect(account.kind).toBe("program");
        expect(account.lamports()).toBe(1_000_000n);
    });

    it("passes parser errors through unchanged", () => {
        expect(parseAccountEntity(PAIR_RECORD.slice(0, 4))._unsafeUnwrapErr()).toEqual({
            kind: "TruncatedInput",
            context: "account record header",
            expected: 12,
            actual: 4,
        });
    });
});

describe("accountFromRecord", () => {
    it("rejects unknown type tags", () => {
        const record = { typeTag: 9, lamports: 0, nameLength: 0, nameBytes: new Uint8Array(), name: "" };
        expect(accountFromRecord(record)._unsafeUnwrapErr()).toEqual({
            kind: "InvalidEncoding",
            field: "account type tag",
        });
    });
});
