import { SessionError, WaitTimeoutError, type PageElement } from "../browser/types.js";
import { errorMessage } from "./logger.js";
import type { ExtractionContext } from "./context.js";
import { isMasked, normalizePhone } from "./normalize.js";
import { SELECTORS, panelSelector, parsePanelId } from "./selectors.js";
import { pickPhone, type PanelSnapshot } from "./strategies.js";

export const MAX_PHONES_PER_ROW = 2;

class ElementNotFoundError extends Error {
  constructor(selector: string) {
    super(`Element not found: ${selector}`);
    this.name = "ElementNotFoundError";
  }
}

async function required(scope: PageElement, selector: string): Promise<PageElement> {
  const el = await scope.query(selector);
  if (!el) throw new ElementNotFoundError(selector);
  return el;
}

async function snapshotPanel(panel: PageElement): Promise<PanelSnapshot> {
  const telLinks: string[] = [];
  for (const link of await panel.queryAll(SELECTORS.telLink)) {
    const href = await link.attribute("href");
    if (href) telLinks.push(href);
  }

  const emphasized: string[] = [];
  for (const el of await panel.queryAll(SELECTORS.emphasized)) {
    emphasized.push(await el.text());
  }

  return { telLinks, emphasized, text: await panel.text() };
}

/** Close through the panel's own control; otherwise hide it and strip the overlay */
async function dismissPanel(ctx: ExtractionContext, panel: PageElement, where: string): Promise<void> {
  try {
    const close = await required(panel, SELECTORS.closeControl);
    await close.click();
  } catch (err) {
    if (err instanceof SessionError) throw err;
    ctx.log.debug(`${where}: close control failed (${errorMessage(err)}), hiding panel`);
    try {
      await panel.hide();
      for (const backdrop of await ctx.session.queryAll(SELECTORS.backdrop)) {
        await backdrop.remove();
      }
    } catch (hideErr) {
      if (hideErr instanceof SessionError) throw hideErr;
      ctx.log.warn(`${where}: could not hide panel (${errorMessage(hideErr)})`);
    }
  }
  await ctx.pause(ctx.pacing.afterClose);
}

/** Click the container's reveal action and read the number from the panel it opens */
async function revealFromPanel(
  ctx: ExtractionContext,
  container: PageElement,
  found: readonly string[],
  where: string
): Promise<string | undefined> {
  const button = await required(container, SELECTORS.revealButton);
  const target = await button.attribute("data-target");
  ctx.log.debug(`${where}: panel target ${target ?? "(none)"}`);

  await button.click();
  await ctx.pause(ctx.pacing.afterReveal);

  const panelId = parsePanelId(target);
  const selector = panelId ? panelSelector(panelId) : SELECTORS.anyPhonePanel;

  let panel: PageElement;
  try {
    panel = await ctx.session.waitFor(selector, ctx.timeouts.panelMs);
  } catch (err) {
    if (err instanceof WaitTimeoutError) {
      ctx.log.warn(`${where}: panel ${selector} did not appear`);
      return undefined;
    }
    throw err;
  }
  await ctx.pause(ctx.pacing.afterPanel);

  const match = pickPhone(await snapshotPanel(panel), found, ctx.policy);
  if (match) {
    ctx.log.info(`${where}: ${match.phone} (from ${match.strategy})`);
  } else {
    ctx.log.info(`${where}: panel had no usable number`);
  }

  await dismissPanel(ctx, panel, where);
  return match?.phone;
}

/** A container's number, or undefined when it yields nothing new */
async function phoneFromContainer(
  ctx: ExtractionContext,
  container: PageElement,
  found: readonly string[],
  where: string
): Promise<string | undefined> {
  const visible = (await (await required(container, SELECTORS.visibleNumber)).text()).trim();

  if (isMasked(visible)) {
    ctx.log.info(`${where}: masked number "${visible}", revealing`);
    return revealFromPanel(ctx, container, found, where);
  }

  const phone = normalizePhone(visible, ctx.policy);
  if (phone && !found.includes(phone)) {
    ctx.log.info(`${where}: ${phone} (already visible)`);
    return phone;
  }
  return undefined;
}

async function findContainers(ctx: ExtractionContext, rowNumber: number): Promise<PageElement[]> {
  try {
    await ctx.session.waitFor(SELECTORS.container, ctx.timeouts.containersMs);
  } catch (err) {
    if (err instanceof WaitTimeoutError) {
      ctx.log.warn(`Row ${rowNumber}: no phone containers found`);
      return [];
    }
    throw err;
  }
  return ctx.session.queryAll(SELECTORS.container);
}

/**
 * Load a profile page and collect up to two distinct numbers from its phone
 * widgets, in page order. Never throws: a page that can't be loaded or read
 * gives an empty list.
 */
export async function extractPhones(
  ctx: ExtractionContext,
  url: string,
  rowNumber: number
): Promise<string[]> {
  const found: string[] = [];

  try {
    ctx.log.info(`Row ${rowNumber}: ${url}`);
    await ctx.session.navigate(url);
    await ctx.session.waitFor(SELECTORS.body, ctx.timeouts.pageMs);
    await ctx.pause(ctx.pacing.settle);

    const containers = await findContainers(ctx, rowNumber);
    ctx.log.info(`Row ${rowNumber}: ${containers.length} phone container(s)`);

    for (const [i, container] of containers.entries()) {
      if (found.length >= MAX_PHONES_PER_ROW) break;
      const where = `Row ${rowNumber} container ${i + 1}`;

      try {
        const phone = await phoneFromContainer(ctx, container, found, where);
        if (phone) found.push(phone);
      } catch (err) {
        if (err instanceof SessionError) throw err;
        ctx.log.warn(`${where}: skipped (${errorMessage(err)})`);
        continue;
      }

      await ctx.pause(ctx.pacing.betweenContainers);
    }
  } catch (err) {
    ctx.log.error(`Row ${rowNumber}: page failed`, err);
    return [];
  }

  ctx.log.info(`Row ${rowNumber}: ${found.length ? found.join(", ") : "no phones"}`);
  return found.slice(0, MAX_PHONES_PER_ROW);
}
