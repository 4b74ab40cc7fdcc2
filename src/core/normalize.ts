/**
 * Phone number cleanup. A policy describes the only accepted digit count and
 * how the digits are grouped for display.
 */
export interface PhonePolicy {
  digits: number;
  groups: number[];
}

/** Ten-digit local numbers, shown as "55 1234 5678" */
export const DEFAULT_PHONE_POLICY: PhonePolicy = {
  digits: 10,
  groups: [2, 4, 4],
};

/** Reduce text to its digits and format them, or undefined if the count doesn't match the policy */
export function normalizePhone(
  text: string,
  policy: PhonePolicy = DEFAULT_PHONE_POLICY
): string | undefined {
  const digits = text.replace(/\D/g, "");
  if (digits.length !== policy.digits) return undefined;

  const parts: string[] = [];
  let offset = 0;
  for (const size of policy.groups) {
    parts.push(digits.slice(offset, offset + size));
    offset += size;
  }
  return parts.join(" ");
}

/** Masked numbers are shown truncated, e.g. "55 1234 ..." */
export function isMasked(text: string): boolean {
  return text.includes("...") || text.includes("…");
}

/** Free-text pattern for a policy, e.g. /\d{2}\s?\d{4}\s?\d{4}/g for 2,4,4 */
export function phonePattern(policy: PhonePolicy = DEFAULT_PHONE_POLICY): RegExp {
  const source = policy.groups.map((n) => `\\d{${n}}`).join("\\s?");
  return new RegExp(source, "g");
}

/** Parse a "2,4,4" group list into a policy. Throws on anything else. */
export function parsePhonePolicy(value: string): PhonePolicy {
  const parts = value.split(",").map((p) => p.trim());
  const groups = parts.map((p) => (/^\d+$/.test(p) ? Number(p) : NaN));

  if (groups.length === 0 || groups.some((g) => !Number.isInteger(g) || g <= 0)) {
    throw new Error(
      `Invalid phone groups: "${value}". Expected comma-separated digit counts, e.g. 2,4,4`
    );
  }

  return {
    digits: groups.reduce((sum, g) => sum + g, 0),
    groups,
  };
}

export function formatPolicy(policy: PhonePolicy): string {
  return policy.groups.join(",");
}
