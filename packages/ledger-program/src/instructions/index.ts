export { decodeInstruction, encodeInstruction, readOpcode } from "./codec";
export { createInitializeInstruction } from "./initialize";
export { createCreateAccountInstruction } from "./create-account";
export { createTransferInstruction } from "./transfer";
export { createMintInstruction } from "./mint";
export { createBurnInstruction } from "./burn";
export {
  checkInstructionFields,
  INSTRUCTION_LAYOUTS,
  instructionKindForOpcode,
  minimumLengthFor,
  opcodeFor,
} from "./shared";
export type { InstructionArgs } from "./shared";
