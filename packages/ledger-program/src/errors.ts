/**
 * Layered error taxonomy.
 *
 * Codec errors come from byte-level parsing, domain errors from ledger rules.
 * Both are lifted into {@link CompositeError} by composition; the original
 * error is always kept as a field of the wrapping variant.
 */

export type CodecError =
  | { kind: "TruncatedInput"; context: string; expected: number; actual: number }
  | { kind: "UnknownInstruction"; opcode: number }
  | { kind: "InvalidEncoding"; field: string }
  | { kind: "FieldOutOfRange"; field: string; value: number | bigint; max: number };

export const DOMAIN_ERROR_KINDS = [
  "InsufficientBalance",
  "AccountNotFound",
  "UnauthorizedSigner",
  "InvalidAmount",
] as const;

export type DomainErrorKind = (typeof DOMAIN_ERROR_KINDS)[number];

export interface DomainError {
  readonly kind: DomainErrorKind;
  readonly message: string;
}

export type CompositeError =
  | { kind: "Domain"; error: DomainError }
  | { kind: "Network"; message: string }
  | { kind: "Serialization"; error: CodecError };

export type LedgerError = CodecError | DomainError | CompositeError;

const DOMAIN_ERROR_MESSAGES: Record<DomainErrorKind, string> = {
  InsufficientBalance: "Insufficient balance",
  AccountNotFound: "Account not found",
  UnauthorizedSigner: "Unauthorized signer",
  InvalidAmount: "Invalid amount",
};

export function truncatedInput(context: string, expected: number, actual: number): CodecError {
  return { kind: "TruncatedInput", context, expected, actual };
}

export function unknownInstruction(opcode: number): CodecError {
  return { kind: "UnknownInstruction", opcode };
}

export function invalidEncoding(field: string): CodecError {
  return { kind: "InvalidEncoding", field };
}

export function fieldOutOfRange(field: string, value: number | bigint, max: number): CodecError {
  return { kind: "FieldOutOfRange", field, value, max };
}

export function domainError(kind: DomainErrorKind, message?: string): DomainError {
  return { kind, message: message ?? DOMAIN_ERROR_MESSAGES[kind] };
}

/**
 * Canonical DomainError -> CompositeError conversion. Every domain kind maps
 * to the `Domain` variant carrying the original error.
 */
export function toCompositeError(error: DomainError): CompositeError {
  return { kind: "Domain", error };
}

export function fromCodecError(error: CodecError): CompositeError {
  return { kind: "Serialization", error };
}

export function networkError(message: string): CompositeError {
  return { kind: "Network", message };
}

export function isDomainError(error: LedgerError): error is DomainError {
  return DOMAIN_ERROR_KINDS.some((kind) => kind === error.kind);
}

export function isCompositeError(error: LedgerError): error is CompositeError {
  return error.kind === "Domain" || error.kind === "Network" || error.kind === "Serialization";
}

/**
 * Renders an error of any layer as a single line. Meant for log output and
 * other human-facing boundaries only.
 */
export function describeError(error: LedgerError): string {
  switch (error.kind) {
    case "TruncatedInput":
      return `Truncated ${error.context}: expected at least ${error.expected} bytes, got ${error.actual}`;
    case "UnknownInstruction":
      return `Unknown instruction type: ${error.opcode}`;
    case "InvalidEncoding":
      return `Invalid encoding in ${error.field}`;
    case "FieldOutOfRange":
      return `${error.field} out of range: ${error.value.toString()} (max ${error.max})`;
    case "Domain":
      return `Domain error: ${describeError(error.error)}`;
    case "Network":
      return `Network error: ${error.message}`;
    case "Serialization":
      return `Serialization error: ${describeError(error.error)}`;
    case "InsufficientBalance":
    case "AccountNotFound":
    case "UnauthorizedSigner":
    case "InvalidAmount":
      return `${error.kind}: ${error.message}`;
  }
}
