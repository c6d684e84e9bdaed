import {
    ACCOUNT_TYPE_PROGRAM,
    ACCOUNT_TYPE_USER,
    invalidEncoding,
    parseAccountRecord,
    type AccountRecord,
    type CodecError,
} from "@ledgerwire/ledger-program";
import { err, ok, type Result } from "neverthrow";

import { ProgramAccount } from "./ProgramAccount";
import { UserAccount } from "./UserAccount";

export type LedgerAccount = UserAccount | ProgramAccount;

/**
 * Builds the account entity described by a parsed record. Program records
 * are always executable; their stored lamports are ignored.
 */
export function accountFromRecord(record: AccountRecord): Result<LedgerAccount, CodecError> {
    switch (record.typeTag) {
        case ACCOUNT_TYPE_USER:
            return ok(new UserAccount({ name: record.name, lamports: BigInt(record.lamports) }));
        case ACCOUNT_TYPE_PROGRAM:
            return ok(new ProgramAccount({ id: record.name, isExecutable: true }));
        default:
            return err(invalidEncoding("account type tag"));
    }
}

export function parseAccountEntity(data: Uint8Array): Result<LedgerAccount, CodecError> {
    return parseAccountRecord(data).andThen(accountFromRecord);
}
