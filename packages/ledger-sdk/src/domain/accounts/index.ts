export { defaultIsRentExempt } from "./AccountEntity";
export type { AccountEntity } from "./AccountEntity";
export { UserAccount } from "./UserAccount";
export type { UserAccountParams } from "./UserAccount";
export { ProgramAccount } from "./ProgramAccount";
export type { ProgramAccountParams } from "./ProgramAccount";
export { accountFromRecord, parseAccountEntity } from "./from-record";
export type { LedgerAccount } from "./from-record";
export { displayAccounts, reportRentExemption } from "./rent";
export type { RentExemptionEntry } from "./rent";
export { preflightTransfer } from "./preflight";
export type { TransferRequest } from "./preflight";
