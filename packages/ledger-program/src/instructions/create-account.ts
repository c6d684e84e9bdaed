import type { Result } from "neverthrow";

import { ACCOUNT_ID_OFFSET, AMOUNT_OFFSET } from "../constants";
import type { CodecError } from "../errors";
import type { CreateAccountInstruction } from "../types";
import { allocateInstruction, checkUint32, type InstructionArgs } from "./shared";

export function createCreateAccountInstruction(
  args: InstructionArgs<"create_account">
): Result<Uint8Array, CodecError> {
  return checkUint32("lamports", args.lamports)
    .andThen(() => checkUint32("accountId", args.accountId))
    .map(() => {
      const { bytes, view } = allocateInstruction("create_account");
      view.setUint32(AMOUNT_OFFSET, args.lamports, true);
      view.setUint32(ACCOUNT_ID_OFFSET, args.accountId, true);
      return bytes;
    });
}

export function readCreateAccountInstruction(view: DataView): CreateAccountInstruction {
  return {
    kind: "create_account",
    lamports: view.getUint32(AMOUNT_OFFSET, true),
    accountId: view.getUint32(ACCOUNT_ID_OFFSET, true),
  };
}
