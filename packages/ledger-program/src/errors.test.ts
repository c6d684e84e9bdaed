import { describe, expect, it } from "vitest";

import {
  DOMAIN_ERROR_KINDS,
  describeError,
  domainError,
  fieldOutOfRange,
  fromCodecError,
  isCompositeError,
  isDomainError,
  networkError,
  toCompositeError,
  truncatedInput,
  unknownInstruction,
} from "./errors";

describe("toCompositeError", () => {
  it("maps every domain kind to the Domain variant without loss", () => {
    for (const kind of DOMAIN_ERROR_KINDS) {
      const original = domainError(kind, `detail for ${kind}`);
      const composite = toCompositeError(original);

      expect(composite.kind).toBe("Domain");
      if (composite.kind === "Domain") {
        expect(composite.error).toEqual({ kind, message: `detail for ${kind}` });
      }
    }
  });

  it("keeps domain kinds distinguishable after wrapping", () => {
    const wrapped = DOMAIN_ERROR_KINDS.map((kind) => toCompositeError(domainError(kind)));
    const recovered = wrapped.map((composite) => (composite.kind === "Domain" ? composite.error.kind : null));
    expect(recovered).toEqual([...DOMAIN_ERROR_KINDS]);
  });
});

describe("fromCodecError", () => {
  it("wraps codec failures as Serialization", () => {
    expect(fromCodecError(unknownInstruction(9))).toEqual({
      kind: "Serialization",
      error: { kind: "UnknownInstruction", opcode: 9 },
    });
  });
});

describe("type guards", () => {
  it("separates the layers", () => {
    expect(isDomainError(domainError("InvalidAmount"))).toBe(true);
    expect(isDomainError(unknownInstruction(1))).toBe(false);
    expect(isCompositeError(networkError("Timeout"))).toBe(true);
    expect(isCompositeError(domainError("InvalidAmount"))).toBe(false);
  });
});

describe("describeError", () => {
  it("renders each layer on one line", () => {
    expect(describeError(domainError("InvalidAmount"))).toBe("InvalidAmount: Invalid amount");
    expect(describeError(toCompositeError(domainError("AccountNotFound")))).toBe(
      "Domain error: AccountNotFound: Account not found"
    );
    expect(describeError(fromCodecError(unknownInstruction(9)))).toBe(
      "Serialization error: Unknown instruction type: 9"
    );
    expect(describeError(networkError("Timeout"))).toBe("Network error: Timeout");
    expect(describeError(truncatedInput("transfer instruction", 12, 5))).toBe(
      "Truncated transfer instruction: expected at least 12 bytes, got 5"
    );
    expect(describeError(fieldOutOfRange("amount", -1, 0xffffffff))).toBe(
      "amount out of range: -1 (max 4294967295)"
    );
  });
});
