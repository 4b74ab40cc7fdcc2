import { normalizePhone, phonePattern, type PhonePolicy } from "./normalize.js";

/** What the extractor reads out of a revealed panel before choosing a number */
export interface PanelSnapshot {
  /** href values of a[href^="tel:"] links, in DOM order */
  telLinks: string[];
  /** Text of b / strong elements, in DOM order */
  emphasized: string[];
  /** The panel's full visible text */
  text: string;
}

export interface PhoneStrategy {
  name: "tel-link" | "emphasized" | "text-pattern";
  /** Raw candidates in the order they should be tried */
  candidates(panel: PanelSnapshot, policy: PhonePolicy): string[];
}

export interface StrategyMatch {
  phone: string;
  strategy: PhoneStrategy["name"];
}

/** Ordered: the first strategy that yields an unseen valid number wins */
export const PHONE_STRATEGIES: readonly PhoneStrategy[] = [
  {
    name: "tel-link",
    candidates: (panel) => panel.telLinks.map((href) => href.replace(/^tel:/i, "").trim()),
  },
  {
    name: "emphasized",
    candidates: (panel) => panel.emphasized.map((t) => t.trim()),
  },
  {
    name: "text-pattern",
    candidates: (panel, policy) => panel.text.match(phonePattern(policy)) ?? [],
  },
];

/**
 * Run the strategy chain over a panel. Numbers already in `seen` are skipped,
 * so a strategy whose every candidate is a duplicate falls through to the next.
 */
export function pickPhone(
  panel: PanelSnapshot,
  seen: readonly string[],
  policy: PhonePolicy,
  strategies: readonly PhoneStrategy[] = PHONE_STRATEGIES
): StrategyMatch | undefined {
  for (const strategy of strategies) {
    for (const raw of strategy.candidates(panel, policy)) {
      const phone = normalizePhone(raw, policy);
      if (phone && !seen.includes(phone)) {
        return { phone, strategy: strategy.name };
      }
    }
  }
  return undefined;
}
