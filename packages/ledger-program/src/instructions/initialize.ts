import { ok, type Result } from "neverthrow";

import type { CodecError } from "../errors";
import type { InitializeInstruction } from "../types";
import { allocateInstruction } from "./shared";

const INITIALIZE: InitializeInstruction = { kind: "initialize" };

export function createInitializeInstruction(): Result<Uint8Array, CodecError> {
  return ok(allocateInstruction("initialize").bytes);
}

export function readInitializeInstruction(): InitializeInstruction {
  return { ...INITIALIZE };
}
