import type { Result } from "neverthrow";

import { ACCOUNT_ID_OFFSET, AMOUNT_OFFSET, DECIMALS_OFFSET } from "../constants";
import type { CodecError } from "../errors";
import type { MintInstruction } from "../types";
import { allocateInstruction, checkUint32, checkUint8, type InstructionArgs } from "./shared";

export function createMintInstruction(
  args: InstructionArgs<"mint">
): Result<Uint8Array, CodecError> {
  return checkUint32("amount", args.amount)
    .andThen(() => checkUint32("recipientId", args.recipientId))
    .andThen(() => checkUint8("decimals", args.decimals))
    .map(() => {
      const { bytes, view } = allocateInstruction("mint");
      view.setUint32(AMOUNT_OFFSET, args.amount, true);
      view.setUint32(ACCOUNT_ID_OFFSET, args.recipientId, true);
      view.setUint8(DECIMALS_OFFSET, args.decimals);
      return bytes;
    });
}

export function readMintInstruction(view: DataView): MintInstruction {
  return {
    kind: "mint",
    amount: view.getUint32(AMOUNT_OFFSET, true),
    recipientId: view.getUint32(ACCOUNT_ID_OFFSET, true),
    decimals: view.getUint8(DECIMALS_OFFSET),
  };
}
