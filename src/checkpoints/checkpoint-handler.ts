/**
 * Human-in-the-loop checkpoint handler
 *
 * A visible challenge pauses the run until a person clears it in the browser
 * window. The pause is a bounded wait that also gives up on cancellation.
 */

import { getLogger } from '../log/logger';
import { boundedWait } from './bounded-wait';
import type { WaitResult } from './bounded-wait';
import type { ATSMappings, AutomationPage, RunControl } from '../types';

const logger = getLogger();

export type CheckpointType = 'captcha' | 'manual_input';

export type CaptchaIndicators = Pick<ATSMappings, 'captchaSelectors' | 'captchaPhrases'>;

export const CHECKPOINT_POLL_INTERVAL_MS = 2000;

/**
 * Detect if a CAPTCHA challenge is showing on the current page
 */
export async function detectCaptcha(page: AutomationPage, indicators: CaptchaIndicators): Promise<boolean> {
  for (const selector of indicators.captchaSelectors) {
    if (await page.isVisible(selector)) {
      logger.debug(`[CAPTCHA] Detected active challenge: ${selector}`);
      return true;
    }
  }

  const lowerText = (await page.bodyText()).toLowerCase();
  for (const phrase of indicators.captchaPhrases) {
    if (lowerText.includes(phrase.toLowerCase())) {
      logger.debug(`[CAPTCHA] Detected challenge text: "${phrase}"`);
      return true;
    }
  }

  return false;
}

/**
 * Get user-friendly message for checkpoint type
 */
export function getCheckpointMessage(type: CheckpointType): string {
  switch (type) {
    case 'captcha':
      return 'CAPTCHA detected. Please solve the CAPTCHA in the browser window.';
    case 'manual_input':
      return 'Manual input required. Please complete any remaining fields in the browser.';
  }
}

export interface HumanWaitOptions {
  timeoutMs: number;
  intervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wait for a person to clear the CAPTCHA. Resolves `ready` once the challenge is gone.
 */
export async function waitForCaptchaCleared(
  page: AutomationPage,
  indicators: CaptchaIndicators,
  control: RunControl,
  options: HumanWaitOptions
): Promise<WaitResult<true>> {
  logger.checkpoint('captcha', getCheckpointMessage('captcha'));

  const result = await boundedWait<true>(
    async () => ((await detectCaptcha(page, indicators)) ? null : true),
    {
      timeoutMs: options.timeoutMs,
      intervalMs: options.intervalMs ?? CHECKPOINT_POLL_INTERVAL_MS,
      isCancelled: () => control.isCancelled(),
      sleep: options.sleep,
    }
  );

  switch (result.kind) {
    case 'ready':
      logger.info('Checkpoint resolved: captcha');
      break;
    case 'timeout':
      logger.warn(`[CAPTCHA] Not cleared within ${Math.round(options.timeoutMs / 1000)}s`);
      break;
    case 'cancelled':
      logger.info('[CAPTCHA] Wait abandoned, run cancelled');
      break;
  }
  return result;
}

export default {
  detectCaptcha,
  getCheckpointMessage,
  waitForCaptchaCleared,
};
