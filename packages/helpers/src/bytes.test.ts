import { describe, expect, it } from "vitest";

import { hasAvailable, isUint32, isUint8, viewOf } from "./bytes";

describe("byte helpers", () => {
  it("checks available ranges", () => {
    expect(hasAvailable(12, 8, 4)).toBe(true);
    expect(hasAvailable(12, 9, 4)).toBe(false);
    expect(hasAvailable(12, 12, 0)).toBe(true);
    expect(hasAvailable(12, -1, 1)).toBe(false);
  });

  it("views a subarray at its own offset", () => {
    const backing = new Uint8Array([0xff, 0x01, 0x00, 0x00, 0x00]);
    const view = viewOf(backing.subarray(1));
    expect(view.getUint32(0, true)).toBe(1);
  });

  it("bounds integer widths", () => {
    expect(isUint8(255)).toBe(true);
    expect(isUint8(256)).toBe(false);
    expect(isUint32(0xffffffff)).toBe(true);
    expect(isUint32(0x100000000)).toBe(false);
    expect(isUint32(-1)).toBe(false);
    expect(isUint32(1.5)).toBe(false);
  });
});
