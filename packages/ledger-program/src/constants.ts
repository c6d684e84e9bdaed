/**
 * Wire format constants for ledger instructions and account records.
 *
 * All multi-byte fields are little-endian unsigned integers.
 */

// ============================================================================
// Instruction Constants
// ============================================================================

/** Size of the instruction header: opcode byte followed by 3 reserved bytes */
export const INSTRUCTION_HEADER_SIZE = 4;

// Instruction discriminants
export const INSTRUCTION_INITIALIZE = 0x00;
export const INSTRUCTION_CREATE_ACCOUNT = 0x01;
export const INSTRUCTION_TRANSFER = 0x02;
export const INSTRUCTION_MINT = 0x03;
export const INSTRUCTION_BURN = 0x04;

/** Offset of the first u32 field (amount or lamports) */
export const AMOUNT_OFFSET = 4;

/** Offset of the second u32 field (recipient or account id) */
export const ACCOUNT_ID_OFFSET = 8;

/** Offset of the mint decimals byte */
export const DECIMALS_OFFSET = 12;

export const INITIALIZE_INSTRUCTION_SIZE = INSTRUCTION_HEADER_SIZE;
export const CREATE_ACCOUNT_INSTRUCTION_SIZE = 12;
export const TRANSFER_INSTRUCTION_SIZE = 12;
export const MINT_INSTRUCTION_SIZE = 13;
export const BURN_INSTRUCTION_SIZE = 12;

// ============================================================================
// Account Record Constants
// ============================================================================

export const ACCOUNT_TYPE_TAG_OFFSET = 0;
export const ACCOUNT_LAMPORTS_OFFSET = 4;
export const ACCOUNT_NAME_LENGTH_OFFSET = 8;
export const ACCOUNT_NAME_OFFSET = 12;

/** Bytes preceding the variable-length name */
export const ACCOUNT_RECORD_HEADER_SIZE = ACCOUNT_NAME_OFFSET;

/** The name length is a single unsigned byte */
export const ACCOUNT_NAME_MAX_LENGTH = 0xff;

export const ACCOUNT_TYPE_USER = 1;
export const ACCOUNT_TYPE_PROGRAM = 2;

// ============================================================================
// Ledger Constants
// ============================================================================

/** Minimum balance for an account to be rent-exempt */
export const RENT_EXEMPT_MIN_LAMPORTS = 890_880n;

/** Fixed balance reported by program accounts */
export const PROGRAM_ACCOUNT_LAMPORTS = 1_000_000n;
