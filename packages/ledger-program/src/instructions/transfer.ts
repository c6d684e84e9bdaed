import type { Result } from "neverthrow";

import { ACCOUNT_ID_OFFSET, AMOUNT_OFFSET } from "../constants";
import type { CodecError } from "../errors";
import type { TransferInstruction } from "../types";
import { allocateInstruction, checkUint32, type InstructionArgs } from "./shared";

export function createTransferInstruction(
  args: InstructionArgs<"transfer">
): Result<Uint8Array, CodecError> {
  return checkUint32("amount", args.amount)
    .andThen(() => checkUint32("recipientId", args.recipientId))
    .map(() => {
      const { bytes, view } = allocateInstruction("transfer");
      view.setUint32(AMOUNT_OFFSET, args.amount, true);
      view.setUint32(ACCOUNT_ID_OFFSET, args.recipientId, true);
      return bytes;
    });
}

export function readTransferInstruction(view: DataView): TransferInstruction {
  return {
    kind: "transfer",
    amount: view.getUint32(AMOUNT_OFFSET, true),
    recipientId: view.getUint32(ACCOUNT_ID_OFFSET, true),
  };
}
