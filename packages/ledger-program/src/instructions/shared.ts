import { isUint32, isUint8, viewOf } from "@ledgerwire/helpers";
import { err, ok, type Result } from "neverthrow";

import {
  BURN_INSTRUCTION_SIZE,
  CREATE_ACCOUNT_INSTRUCTION_SIZE,
  INITIALIZE_INSTRUCTION_SIZE,
  INSTRUCTION_BURN,
  INSTRUCTION_CREATE_ACCOUNT,
  INSTRUCTION_INITIALIZE,
  INSTRUCTION_MINT,
  INSTRUCTION_TRANSFER,
  MINT_INSTRUCTION_SIZE,
  TRANSFER_INSTRUCTION_SIZE,
} from "../constants";
import { fieldOutOfRange, type CodecError } from "../errors";
import type { Instruction, InstructionKind, InstructionOf } from "../types";

export type InstructionArgs<K extends InstructionKind> = Omit<InstructionOf<K>, "kind">;

interface InstructionLayout {
  opcode: number;
  size: number;
}

export const INSTRUCTION_LAYOUTS = {
  initialize: { opcode: INSTRUCTION_INITIALIZE, size: INITIALIZE_INSTRUCTION_SIZE },
  create_account: { opcode: INSTRUCTION_CREATE_ACCOUNT, size: CREATE_ACCOUNT_INSTRUCTION_SIZE },
  transfer: { opcode: INSTRUCTION_TRANSFER, size: TRANSFER_INSTRUCTION_SIZE },
  mint: { opcode: INSTRUCTION_MINT, size: MINT_INSTRUCTION_SIZE },
  burn: { opcode: INSTRUCTION_BURN, size: BURN_INSTRUCTION_SIZE },
} as const satisfies Record<InstructionKind, InstructionLayout>;

export function instructionKindForOpcode(opcode: number): InstructionKind | undefined {
  switch (opcode) {
    case INSTRUCTION_INITIALIZE:
      return "initialize";
    case INSTRUCTION_CREATE_ACCOUNT:
      return "create_account";
    case INSTRUCTION_TRANSFER:
      return "transfer";
    case INSTRUCTION_MINT:
      return "mint";
    case INSTRUCTION_BURN:
      return "burn";
    default:
      return undefined;
  }
}

export function opcodeFor(kind: InstructionKind): number {
  return INSTRUCTION_LAYOUTS[kind].opcode;
}

/** Smallest buffer that decodes as an instruction of this kind. */
export function minimumLengthFor(kind: InstructionKind): number {
  return INSTRUCTION_LAYOUTS[kind].size;
}

/**
 * Allocates a zeroed buffer for the instruction and writes its header.
 */
export function allocateInstruction(kind: InstructionKind): { bytes: Uint8Array; view: DataView } {
  const bytes = new Uint8Array(minimumLengthFor(kind));
  const view = viewOf(bytes);
  view.setUint8(0, opcodeFor(kind));
  return { bytes, view };
}

export function checkUint32(field: string, value: number): Result<number, CodecError> {
  return isUint32(value) ? ok(value) : err(fieldOutOfRange(field, value, 0xffffffff));
}

export function checkUint8(field: string, value: number): Result<number, CodecError> {
  return isUint8(value) ? ok(value) : err(fieldOutOfRange(field, value, 0xff));
}

/**
 * Checks every numeric field of an instruction against its wire width, in
 * layout order. Decoded instructions always pass.
 */
export function checkInstructionFields(instruction: Instruction): Result<Instruction, CodecError> {
  switch (instruction.kind) {
    case "initialize":
      return ok(instruction);
    case "create_account":
      return checkUint32("lamports", instruction.lamports)
        .andThen(() => checkUint32("accountId", instruction.accountId))
        .map((): Instruction => instruction);
    case "transfer":
      return checkUint32("amount", instruction.amount)
        .andThen(() => checkUint32("recipientId", instruction.recipientId))
        .map((): Instruction => instruction);
    case "mint":
      return checkUint32("amount", instruction.amount)
        .andThen(() => checkUint32("recipientId", instruction.recipientId))
        .andThen(() => checkUint8("decimals", instruction.decimals))
        .map((): Instruction => instruction);
    case "burn":
      return checkUint32("amount", instruction.amount)
        .andThen(() => checkUint32("accountId", instruction.accountId))
        .map((): Instruction => instruction);
  }
}
