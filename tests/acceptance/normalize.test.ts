import { describe, it, expect } from "vitest";
import {
  normalizePhone,
  isMasked,
  phonePattern,
  parsePhonePolicy,
  formatPolicy,
  DEFAULT_PHONE_POLICY,
} from "../../src/core/normalize.js";

describe("Phone normalizer", () => {
  it("formats a tel: value with separators", () => {
    expect(normalizePhone("tel:55-1234-5678")).toBe("55 1234 5678");
  });

  it("formats bare digits and spaced digits the same way", () => {
    expect(normalizePhone("5512345678")).toBe("55 1234 5678");
    expect(normalizePhone(" (55) 1234 5678 ")).toBe("55 1234 5678");
  });

  it("rejects anything that isn't exactly 10 digits", () => {
    expect(normalizePhone("123-456")).toBeUndefined();
    expect(normalizePhone("1234567")).toBeUndefined();
    expect(normalizePhone("+52 55 1234 5678")).toBeUndefined(); // 12 digits
    expect(normalizePhone("")).toBeUndefined();
  });

  it("uses the policy's grouping", () => {
    const policy = parsePhonePolicy("3,3,4");
    expect(normalizePhone("212-555-0199", policy)).toBe("212 555 0199");
    expect(normalizePhone("55 1234 5678 9", policy)).toBeUndefined();
  });
});

describe("Masking", () => {
  it("detects three dots and the ellipsis character", () => {
    expect(isMasked("55 1234 ...")).toBe(true);
    expect(isMasked("55 1234 …")).toBe(true);
    expect(isMasked("55 1234 5678")).toBe(false);
  });
});

describe("Phone pattern", () => {
  it("matches 2+4+4 digits with optional single spaces", () => {
    const text = "Consultorio: 55 1234 5678 o 5598765432, ext 12";
    expect(text.match(phonePattern())).toEqual(["55 1234 5678", "5598765432"]);
  });

  it("follows a custom policy", () => {
    expect("call 212 555 0199".match(phonePattern(parsePhonePolicy("3,3,4")))).toEqual(["212 555 0199"]);
  });
});

describe("Phone policy parsing", () => {
  it("sums the groups into the digit count", () => {
    expect(parsePhonePolicy("2, 4, 4")).toEqual(DEFAULT_PHONE_POLICY);
    expect(parsePhonePolicy("3,3,4")).toEqual({ digits: 10, groups: [3, 3, 4] });
    expect(parsePhonePolicy("4,4")).toEqual({ digits: 8, groups: [4, 4] });
  });

  it("throws on empty, zero or non-numeric groups", () => {
    expect(() => parsePhonePolicy("")).toThrow("Invalid phone groups");
    expect(() => parsePhonePolicy("2,0,4")).toThrow("Invalid phone groups");
    expect(() => parsePhonePolicy("two,four")).toThrow("Invalid phone groups");
  });

  it("formats back to the group list", () => {
    expect(formatPolicy(DEFAULT_PHONE_POLICY)).toBe("2,4,4");
  });
});
