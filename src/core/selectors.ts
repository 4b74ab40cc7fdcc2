/** Markup of the profile pages. All of it is site-specific. */
export const SELECTORS = {
  body: "body",
  container: '[data-id="gdpr-show-number-block"]',
  visibleNumber: 'span[data-id="shrinked-number"]',
  revealButton: '[data-id="show-phone-number-modal"]',
  /** Used when the reveal button's data-target has no data-id to follow */
  anyPhonePanel: '.modal[data-id*="phone"].show, .modal[data-id*="phone"]:not(.fade)',
  telLink: 'a[href^="tel:"]',
  emphasized: "b, strong",
  closeControl: '[data-dismiss="modal"], .close, button[aria-label="Close"]',
  backdrop: ".modal-backdrop",
} as const;

/**
 * data-target looks like "[data-id='address-469542-3310770736-2-phone']".
 * Returns the id, or undefined when it can't be found.
 */
export function parsePanelId(target: string | null): string | undefined {
  if (!target) return undefined;
  const match = target.match(/data-id='([^']+)/);
  return match?.[1];
}

export function panelSelector(panelId: string): string {
  return `[data-id="${panelId}"]`;
}
