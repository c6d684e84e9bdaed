import type { Result } from "neverthrow";

import { ACCOUNT_ID_OFFSET, AMOUNT_OFFSET } from "../constants";
import type { CodecError } from "../errors";
import type { BurnInstruction } from "../types";
import { allocateInstruction, checkUint32, type InstructionArgs } from "./shared";

export function createBurnInstruction(
  args: InstructionArgs<"burn">
): Result<Uint8Array, CodecError> {
  return checkUint32("amount", args.amount)
    .andThen(() => checkUint32("accountId", args.accountId))
    .map(() => {
      const { bytes, view } = allocateInstruction("burn");
      view.setUint32(AMOUNT_OFFSET, args.amount, true);
      view.setUint32(ACCOUNT_ID_OFFSET, args.accountId, true);
      return bytes;
    });
}

export function readBurnInstruction(view: DataView): BurnInstruction {
  return {
    kind: "burn",
    amount: view.getUint32(AMOUNT_OFFSET, true),
    accountId: view.getUint32(ACCOUNT_ID_OFFSET, true),
  };
}
