import { NOOP_LOGGER } from "@ledgerwire/helpers";
import { describe, expect, it } from "vitest";

import { dispatcherConfigFromEnv, resolveDispatcherConfig } from "./config";

describe("resolveDispatcherConfig", () => {
  it("applies defaults", () => {
    expect(resolveDispatcherConfig()._unsafeUnwrap()).toEqual({
      transferPayloadPolicy: "reject",
      rejectZeroAmounts: true,
      logger: NOOP_LOGGER,
    });
  });

  it("keeps explicit settings", () => {
    const resolved = resolveDispatcherConfig({ transferPayloadPolicy: "report", rejectZeroAmounts: false });
    expect(resolved._unsafeUnwrap()).toMatchObject({ transferPayloadPolicy: "report", rejectZeroAmounts: false });
  });
});

describe("dispatcherConfigFromEnv", () => {
  it("reads known variables", () => {
    const config = dispatcherConfigFromEnv({
      LEDGER_TRANSFER_PAYLOAD_POLICY: "report",
      LEDGER_REJECT_ZERO_AMOUNTS: "false",
      UNRELATED: "x",
    });
    expect(config._unsafeUnwrap()).toEqual({ transferPayloadPolicy: "report", rejectZeroAmounts: false });
  });

  it("leaves unset variables to the defaults", () => {
    const config = dispatcherConfigFromEnv({})._unsafeUnwrap();
    expect(resolveDispatcherConfig(config)._unsafeUnwrap().transferPayloadPolicy).toBe("reject");
  });

  it("rejects unknown values", () => {
    expect(dispatcherConfigFromEnv({ LEDGER_TRANSFER_PAYLOAD_POLICY: "ignore" }).isErr()).toBe(true);
    expect(dispatcherConfigFromEnv({ LEDGER_REJECT_ZERO_AMOUNTS: "yes" }).isErr()).toBe(true);
  });
});
