/**
 * Routes decoded instructions to their operation.
 *
 * @example
 * ```ts
 * const created = createDispatcher({ logger: createConsoleLogger("Dispatch") });
 * if (created.isOk()) {
 *   const result = created.value.dispatchBytes(new Uint8Array([2, 0, 0, 0, 100, 0, 0, 0, 50, 0, 0, 0]));
 *   // ok({ operation: "transfer", amount: 100, recipientId: 50 })
 * }
 * ```
 */

import { err, ok, type Result } from "neverthrow";
import type { ZodError } from "zod";

import {
  resolveDispatcherConfig,
  type DispatcherConfig,
  type ResolvedDispatcherConfig,
} from "./config";
import { INSTRUCTION_HEADER_SIZE, INSTRUCTION_TRANSFER } from "./constants";
import {
  describeError,
  domainError,
  fromCodecError,
  toCompositeError,
  type CodecError,
  type CompositeError,
} from "./errors";
import { decodeInstruction } from "./instructions/codec";
import { checkInstructionFields } from "./instructions/shared";
import type { Instruction, OperationResult } from "./types";

export type DispatchResult = Result<OperationResult, CompositeError>;

export class Dispatcher {
  private readonly config: ResolvedDispatcherConfig;

  constructor(config: ResolvedDispatcherConfig) {
    this.config = config;
  }

  get transferPayloadPolicy(): ResolvedDispatcherConfig["transferPayloadPolicy"] {
    return this.config.transferPayloadPolicy;
  }

  /**
   * Fields outside their wire width fail with `Serialization(FieldOutOfRange)`
   * before any operation rule runs.
   */
  dispatch(instruction: Instruction): DispatchResult {
    const result = checkInstructionFields(instruction)
      .mapErr(fromCodecError)
      .andThen((checked) => this.route(checked));
    this.logOutcome(instruction.kind, result);
    return result;
  }

  /**
   * Decodes then dispatches. Opcodes outside the known set take the unknown
   * arm and fail with UnknownInstruction carrying the literal byte.
   */
  dispatchBytes(data: Uint8Array): DispatchResult {
    const decoded = decodeInstruction(data);
    if (decoded.isOk()) {
      return this.dispatch(decoded.value);
    }

    const error = decoded.error;
    if (this.shouldReportShortTransfer(data, error)) {
      this.config.logger.info("Transfer payload too short, skipping", { payloadLength: data.length });
      return ok({ operation: "transfer_skipped", payloadLength: data.length });
    }

    const wrapped = fromCodecError(error);
    this.config.logger.debug("Instruction rejected", { error: describeError(wrapped) });
    return err(wrapped);
  }

  private route(instruction: Instruction): DispatchResult {
    switch (instruction.kind) {
      case "initialize":
        return ok({ operation: "initialize" });
      case "create_account":
        return ok({
          operation: "create_account",
          lamports: instruction.lamports,
          accountId: instruction.accountId,
        });
      case "transfer":
        return this.requireAmount(instruction.amount).map(() => ({
          operation: "transfer" as const,
          amount: instruction.amount,
          recipientId: instruction.recipientId,
        }));
      case "mint":
        return this.requireAmount(instruction.amount).map(() => ({
          operation: "mint" as const,
          amount: instruction.amount,
          recipientId: instruction.recipientId,
          decimals: instruction.decimals,
        }));
      case "burn":
        return this.requireAmount(instruction.amount).map(() => ({
          operation: "burn" as const,
          amount: instruction.amount,
          accountId: instruction.accountId,
        }));
    }
  }

  private requireAmount(amount: number): Result<number, CompositeError> {
    if (this.config.rejectZeroAmounts && amount === 0) {
      return err(toCompositeError(domainError("InvalidAmount", "Amount must be greater than zero")));
    }
    return ok(amount);
  }

  /** Only a complete header followed by a short Transfer payload qualifies. */
  private shouldReportShortTransfer(data: Uint8Array, error: CodecError): boolean {
    return (
      this.config.transferPayloadPolicy === "report" &&
      error.kind === "TruncatedInput" &&
      data.length >= INSTRUCTION_HEADER_SIZE &&
      data[0] === INSTRUCTION_TRANSFER
    );
  }

  private logOutcome(kind: Instruction["kind"], result: DispatchResult): void {
    if (result.isOk()) {
      this.config.logger.debug("Dispatched instruction", { kind, operation: result.value.operation });
    } else {
      this.config.logger.debug("Instruction failed", { kind, error: describeError(result.error) });
    }
  }
}

export function createDispatcher(config?: DispatcherConfig): Result<Dispatcher, ZodError> {
  return resolveDispatcherConfig(config).map((resolved) => new Dispatcher(resolved));
}
