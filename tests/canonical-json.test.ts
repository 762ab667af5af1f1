import { describe, expect, it } from "vitest";
import { canonicalStringify } from "../src/lib/canonical-json.js";

describe("canonicalStringify", () => {
  it("sorts object keys at every depth without whitespace", () => {
    expect(canonicalStringify({ b: 1, a: { d: true, c: null } })).toBe('{"a":{"c":null,"d":true},"b":1}');
  });

  it("orders integer-like keys as strings instead of numerically", () => {
    expect(canonicalStringify({ b: 1, "10": 2, "2": 3, a: 4 })).toBe('{"10":2,"2":3,"a":4,"b":1}');
  });

  it("keeps array order", () => {
    expect(canonicalStringify({ roles: ["operator", "admin"] })).toBe('{"roles":["operator","admin"]}');
  });

  it("omits undefined properties and keeps explicit nulls", () => {
    expect(canonicalStringify({ scope: null, skipped: undefined, sub: "x" })).toBe('{"scope":null,"sub":"x"}');
  });

  it("escapes strings the way JSON does", () => {
    expect(canonicalStringify({ quote: 'say "hi"\n' })).toBe('{"quote":"say \\"hi\\"\\n"}');
  });

  it("produces identical text for objects built in different orders", () => {
    const left = canonicalStringify({ iat: 10, exp: 20, nested: { y: [1, 2], x: "a" } });
    const right = canonicalStringify({ nested: { x: "a", y: [1, 2] }, exp: 20, iat: 10 });
    expect(left).toBe(right);
  });

  it("rejects non-finite numbers with their path", () => {
    expect(() => canonicalStringify({ claims: [1, Number.NaN] })).toThrow(
      "Cannot canonicalize non-finite number at $.claims[1]."
    );
  });
});
