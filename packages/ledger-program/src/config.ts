/**
 * Dispatcher configuration.
 */

import { NOOP_LOGGER, type Logger } from "@ledgerwire/helpers";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

export const TRANSFER_PAYLOAD_POLICIES = ["reject", "report"] as const;

export type TransferPayloadPolicy = (typeof TRANSFER_PAYLOAD_POLICIES)[number];

/**
 * Serializable dispatcher settings. Defaults are applied here.
 */
export const DispatcherSettingsSchema = z.object({
  transferPayloadPolicy: z.enum(TRANSFER_PAYLOAD_POLICIES).default("reject"),
  rejectZeroAmounts: z.boolean().default(true),
});

export type DispatcherSettings = z.infer<typeof DispatcherSettingsSchema>;

export interface DispatcherConfig {
  /**
   * What to do with a Transfer whose payload is shorter than amount and
   * recipient need. "reject" fails with TruncatedInput like every other
   * bounds violation; "report" returns a `transfer_skipped` result instead.
   * @default "reject"
   */
  transferPayloadPolicy?: TransferPayloadPolicy;

  /**
   * Fail Transfer, Mint and Burn with InvalidAmount when the amount is 0.
   * @default true
   */
  rejectZeroAmounts?: boolean;

  /** Receives debug lines for each dispatch (default: no-op) */
  logger?: Logger;
}

export interface ResolvedDispatcherConfig extends DispatcherSettings {
  logger: Logger;
}

const DispatcherEnvSchema = z.object({
  LEDGER_TRANSFER_PAYLOAD_POLICY: z.enum(TRANSFER_PAYLOAD_POLICIES).optional(),
  LEDGER_REJECT_ZERO_AMOUNTS: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
});

export function resolveDispatcherConfig(
  config: DispatcherConfig = {}
): Result<ResolvedDispatcherConfig, z.ZodError> {
  const parsed = DispatcherSettingsSchema.safeParse({
    transferPayloadPolicy: config.transferPayloadPolicy,
    rejectZeroAmounts: config.rejectZeroAmounts,
  });
  if (!parsed.success) {
    return err(parsed.error);
  }
  return ok({ ...parsed.data, logger: config.logger ?? NOOP_LOGGER });
}

/**
 * Reads dispatcher settings from environment variables. Unset variables
 * fall back to the defaults of {@link DispatcherSettingsSchema}.
 */
export function dispatcherConfigFromEnv(
  env: Record<string, string | undefined>
): Result<DispatcherConfig, z.ZodError> {
  const parsed = DispatcherEnvSchema.safeParse(env);
  if (!parsed.success) {
    return err(parsed.error);
  }
  return ok({
    transferPayloadPolicy: parsed.data.LEDGER_TRANSFER_PAYLOAD_POLICY,
    rejectZeroAmounts: parsed.data.LEDGER_REJECT_ZERO_AMOUNTS,
  });
}
