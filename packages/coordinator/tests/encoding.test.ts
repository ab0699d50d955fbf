import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import {
  byteLength,
  computeCommitment,
  parseAddress,
  parseHex32,
  parseHexBytes,
  parseNonZeroHex32,
  parseOptionalHex32,
} from "../src/encoding.js";
import { CoordinationError } from "../src/errors.js";

const ZERO_ID = `0x${"0".repeat(64)}`;

describe("parseHex32", () => {
  it("lowercases", () => {
    expect(parseHex32(`0x${"AB".repeat(32)}`, "id")).toBe(`0x${"ab".repeat(32)}`);
  });

  it("rejects the wrong width and names the field", () => {
    expect(() => parseHex32("0x1234", "dependencyId")).toThrow(
      "dependencyId must be 0x followed by 64 hex digits",
    );
  });

  it("rejects zero when a value is required", () => {
    expect(() => parseNonZeroHex32(ZERO_ID, "id")).toThrow("id must be non-zero");
  });

  it("reads zero and absent as none", () => {
    expect(parseOptionalHex32(undefined, "dependencyId")).toBeUndefined();
    expect(parseOptionalHex32(ZERO_ID, "dependencyId")).toBeUndefined();
  });
});

describe("parseAddress", () => {
  it("rejects the zero address", () => {
    expect(() => parseAddress(`0x${"0".repeat(40)}`, "originDomain")).toThrow(
      "originDomain must be non-zero",
    );
  });

  it("rejects a 256-bit id in place of an address", () => {
    expect(() => parseAddress(`0x${"1".repeat(64)}`, "caller")).toThrow(CoordinationError);
  });
});

describe("payload bytes", () => {
  it("rejects odd-length hex", () => {
    expect(() => parseHexBytes("0xabc", "payload")).toThrow(CoordinationError);
  });

  it("counts bytes", () => {
    expect(byteLength("0x")).toBe(0);
    expect(byteLength("0xdeadbeef")).toBe(4);
  });
});

describe("computeCommitment", () => {
  it("hashes payload bytes followed by secret bytes", () => {
    const secret = `0x${"5e".repeat(32)}`;
    const expected = createHash("sha256")
      .update(Buffer.from("cafebabe" + "5e".repeat(32), "hex"))
      .digest("hex");
    expect(computeCommitment("0xcafebabe", secret)).toBe(`0x${expected}`);
  });

  it("differs when the secret differs", () => {
    expect(computeCommitment("0x01", `0x${"01".repeat(32)}`)).not.toBe(
      computeCommitment("0x01", `0x${"02".repeat(32)}`),
    );
  });
});
