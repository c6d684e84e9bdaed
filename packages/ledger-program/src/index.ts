// Types
export type {
  AccountRecord,
  AccountRecordInput,
  BurnInstruction,
  CreateAccountInstruction,
  InitializeInstruction,
  Instruction,
  InstructionKind,
  InstructionOf,
  MintInstruction,
  OperationResult,
  TransferInstruction,
} from "./types";

// Constants
export {
  ACCOUNT_NAME_MAX_LENGTH,
  ACCOUNT_NAME_OFFSET,
  ACCOUNT_RECORD_HEADER_SIZE,
  ACCOUNT_TYPE_PROGRAM,
  ACCOUNT_TYPE_USER,
  INSTRUCTION_BURN,
  INSTRUCTION_CREATE_ACCOUNT,
  INSTRUCTION_HEADER_SIZE,
  INSTRUCTION_INITIALIZE,
  INSTRUCTION_MINT,
  INSTRUCTION_TRANSFER,
  PROGRAM_ACCOUNT_LAMPORTS,
  RENT_EXEMPT_MIN_LAMPORTS,
} from "./constants";

// Errors
export {
  DOMAIN_ERROR_KINDS,
  describeError,
  domainError,
  fieldOutOfRange,
  fromCodecError,
  invalidEncoding,
  isCompositeError,
  isDomainError,
  networkError,
  toCompositeError,
  truncatedInput,
  unknownInstruction,
} from "./errors";
export type { CodecError, CompositeError, DomainError, DomainErrorKind, LedgerError } from "./errors";

// Instructions
export {
  checkInstructionFields,
  createBurnInstruction,
  createCreateAccountInstruction,
  createInitializeInstruction,
  createMintInstruction,
  createTransferInstruction,
  decodeInstruction,
  encodeInstruction,
  INSTRUCTION_LAYOUTS,
  instructionKindForOpcode,
  minimumLengthFor,
  opcodeFor,
  readOpcode,
} from "./instructions/index";
export type { InstructionArgs } from "./instructions/index";

// Account parsing
export { encodeAccountRecord, parseAccountRecord } from "./accounts";

// Dispatch
export { createDispatcher, Dispatcher } from "./dispatcher";
export type { DispatchResult } from "./dispatcher";
export {
  dispatcherConfigFromEnv,
  DispatcherSettingsSchema,
  resolveDispatcherConfig,
  TRANSFER_PAYLOAD_POLICIES,
} from "./config";
export type {
  DispatcherConfig,
  DispatcherSettings,
  ResolvedDispatcherConfig,
  TransferPayloadPolicy,
} from "./config";
