/**
 * Apply-link follower
 *
 * Clicks through aggregator landing pages ("Apply on company site") towards the
 * real application form, which may open in the same tab or a new one.
 */

import { getLogger } from '../log/logger';
import type { AutomationPage, ClickTarget } from '../types';

const logger = getLogger();

export const DEFAULT_APPLY_SELECTORS = [
  "a:has-text('Apply on company site')",
  "button:has-text('Apply on company site')",
  "a:has-text('Apply Now')",
  "button:has-text('Apply Now')",
  "button:has-text('Apply')",
  "a[href*='apply']",
  "a[href*='application']",
  '.apply-button',
  '#apply-button',
];

/** Candidates for the scored fallback when no known selector is visible */
export const GENERIC_BUTTON_SELECTOR = "button, a.btn, .button, [role='button']";

const EXCLUDED_LABELS = ['sign in', 'login', 'log in', 'search'];

/**
 * Indicators that the current page already shows an application form
 */
const APPLICATION_FORM_INDICATORS = [
  'input[name*="firstName"]',
  'input[name*="first_name"]',
  'input[name*="lastName"]',
  'input[name*="email"]',
  'input[type="file"]',
  'form[id*="application"]',
  '[class*="application-form"]',
  '#application-form',
  '[data-automation-id="applicationForm"]',
];

export type FollowResult =
  | { clicked: false }
  | { clicked: true; page: AutomationPage; openedNewTab: boolean; label: string };

export interface FollowOptions {
  selectors?: string[];
  popupTimeoutMs?: number;
  settleTimeoutMs?: number;
}

function isExcluded(text: string): boolean {
  const lower = text.toLowerCase();
  return EXCLUDED_LABELS.some(label => lower.includes(label));
}

/**
 * Score a button label by how likely it leads off the aggregator to the employer's form
 */
export function scoreApplyLabel(text: string): number {
  const lower = text.toLowerCase().trim();
  if (isExcluded(lower)) return 0;

  let score = 0;
  if (lower.includes('apply on company')) {
    score = 100;
  } else if (lower.includes('apply now')) {
    score = 80;
  } else if (lower.includes('apply')) {
    score = 50;
  }

  if (lower.includes('on company site')) {
    score += 20;
  }
  return score;
}

async function findKnownTarget(page: AutomationPage, selectors: string[]): Promise<ClickTarget | null> {
  for (const selector of selectors) {
    try {
      const targets = await page.visibleTexts(selector);
      const target = targets.find(t => !isExcluded(t.text));
      if (target) {
        logger.debug(`[Navigator] Found apply control "${target.text}" (${selector})`);
        return target;
      }
    } catch (error) {
      logger.debug(`[Navigator] Error with selector ${selector}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return null;
}

async function findScoredTarget(page: AutomationPage): Promise<ClickTarget | null> {
  const buttons = await page.visibleTexts(GENERIC_BUTTON_SELECTOR);

  let candidate: ClickTarget | null = null;
  let candidateScore = 0;
  for (const button of buttons) {
    const score = scoreApplyLabel(button.text);
    if (score > candidateScore) {
      candidate = button;
      candidateScore = score;
    }
  }

  if (candidate) {
    logger.debug(`[Navigator] Highest scoring apply control: "${candidate.text}" (${candidateScore})`);
  }
  return candidate;
}

/**
 * Find and click the apply control. Returns the page the click led to.
 */
export async function followApplyLink(page: AutomationPage, options: FollowOptions = {}): Promise<FollowResult> {
  const selectors = options.selectors ?? DEFAULT_APPLY_SELECTORS;
  const popupTimeoutMs = options.popupTimeoutMs ?? 5000;
  const settleTimeoutMs = options.settleTimeoutMs ?? 10000;

  const target = (await findKnownTarget(page, selectors)) ?? (await findScoredTarget(page));
  if (!target) {
    logger.warn('[Navigator] Could not find an apply control on landing page');
    return { clicked: false };
  }

  const click = { done: false };
  const popup = await page.waitForPopup(async () => {
    click.done = await page.click(target.selector);
  }, popupTimeoutMs);

  if (popup) {
    logger.info('[Navigator] New tab opened, switching to it');
    await popup.bringToFront();
    await popup.waitForLoad(settleTimeoutMs);
    return { clicked: true, page: popup, openedNewTab: true, label: target.text };
  }

  if (!click.done) {
    logger.warn(`[Navigator] Click on "${target.text}" did not go through`);
    return { clicked: false };
  }

  await page.waitForLoad(settleTimeoutMs);
  logger.info(`[Navigator] After click, URL: ${page.url()}`);
  return { clicked: true, page, openedNewTab: false, label: target.text };
}

/**
 * Detect if we're on an application form page
 */
export async function isApplicationFormPage(page: AutomationPage): Promise<boolean> {
  let foundCount = 0;

  for (const selector of APPLICATION_FORM_INDICATORS) {
    if (await page.isVisible(selector)) {
      foundCount++;
      if (foundCount >= 2) {
        return true;
      }
    }
  }
  return false;
}

export default {
  followApplyLink,
  scoreApplyLabel,
  isApplicationFormPage,
};
