export { defaultIsValid } from "./TransactionRecord";
export type { TransactionRecord } from "./TransactionRecord";
export { TOKEN_SIGNATURE_PREFIX, TokenTransfer } from "./TokenTransfer";
export type { TokenTransferParams } from "./TokenTransfer";
export { DEFAULT_COLLECTION_AUTHORITY, NftTransfer } from "./NftTransfer";
export type { NftTransferParams } from "./NftTransfer";
export { summarizeValidations, validateAll } from "./validate";
export type { TransactionValidation, ValidateAllOptions, ValidationSummary } from "./validate";
