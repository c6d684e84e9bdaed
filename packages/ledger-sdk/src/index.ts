// Transactions
export {
    defaultIsValid,
    DEFAULT_COLLECTION_AUTHORITY,
    NftTransfer,
    summarizeValidations,
    TOKEN_SIGNATURE_PREFIX,
    TokenTransfer,
    validateAll,
} from "./domain/transactions";
export type {
    NftTransferParams,
    TokenTransferParams,
    TransactionRecord,
    TransactionValidation,
    ValidateAllOptions,
    ValidationSummary,
} from "./domain/transactions";

// Accounts
export {
    accountFromRecord,
    defaultIsRentExempt,
    displayAccounts,
    parseAccountEntity,
    preflightTransfer,
    ProgramAccount,
    reportRentExemption,
    UserAccount,
} from "./domain/accounts";
export type {
    AccountEntity,
    LedgerAccount,
    ProgramAccountParams,
    RentExemptionEntry,
    TransferRequest,
    UserAccountParams,
} from "./domain/accounts";
