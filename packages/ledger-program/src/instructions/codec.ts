import { viewOf } from "@ledgerwire/helpers";
import { err, ok, type Result } from "neverthrow";

import { INSTRUCTION_HEADER_SIZE } from "../constants";
import { truncatedInput, unknownInstruction, type CodecError } from "../errors";
import type { Instruction } from "../types";
import { createBurnInstruction, readBurnInstruction } from "./burn";
import { createCreateAccountInstruction, readCreateAccountInstruction } from "./create-account";
import { createInitializeInstruction, readInitializeInstruction } from "./initialize";
import { createMintInstruction, readMintInstruction } from "./mint";
import { instructionKindForOpcode, minimumLengthFor } from "./shared";
import { createTransferInstruction, readTransferInstruction } from "./transfer";

/**
 * Encodes an instruction into its wire form: opcode, three reserved zero
 * bytes, then the opcode's little-endian fields.
 */
export function encodeInstruction(instruction: Instruction): Result<Uint8Array, CodecError> {
  switch (instruction.kind) {
    case "initialize":
      return createInitializeInstruction();
    case "create_account":
      return createCreateAccountInstruction(instruction);
    case "transfer":
      return createTransferInstruction(instruction);
    case "mint":
      return createMintInstruction(instruction);
    case "burn":
      return createBurnInstruction(instruction);
  }
}

/**
 * Reads the opcode byte without checking the rest of the payload.
 */
export function readOpcode(data: Uint8Array): Result<number, CodecError> {
  if (data.length < 1) {
    return err(truncatedInput("instruction header", INSTRUCTION_HEADER_SIZE, data.length));
  }
  return ok(data[0]);
}

/**
 * Decodes an untrusted buffer. Bytes past the opcode's minimum length are
 * ignored.
 */
export function decodeInstruction(data: Uint8Array): Result<Instruction, CodecError> {
  return readOpcode(data).andThen((opcode): Result<Instruction, CodecError> => {
    const kind = instructionKindForOpcode(opcode);
    if (!kind) {
      return err(unknownInstruction(opcode));
    }

    const expected = minimumLengthFor(kind);
    if (data.length < expected) {
      return err(truncatedInput(`${kind} instruction`, expected, data.length));
    }

    const view = viewOf(data);
    switch (kind) {
      case "initialize":
        return ok(readInitializeInstruction());
      case "create_account":
        return ok(readCreateAccountInstruction(view));
      case "transfer":
        return ok(readTransferInstruction(view));
      case "mint":
        return ok(readMintInstruction(view));
      case "burn":
        return ok(readBurnInstruction(view));
    }
  });
}
