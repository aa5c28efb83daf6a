/**
 * Universal fallback strategy
 *
 * Works on any form by reading the visible fields, answering them from the
 * profile, and pressing the most likely "next" or "submit" control. Multi-page
 * forms are followed for a bounded number of pages.
 */

import { addLog } from '../core/application';
import { followApplyLink, isApplicationFormPage } from '../navigator/apply-link-follower';
import {
  answerVisibleFields,
  isSubmissionConfirmed,
  noteFailure,
  passCaptcha,
  shouldHoldSubmit,
} from './form-actions';
import type { FillerContext } from './form-actions';
import type { Application, AutomationPage, ClickTarget, FormFiller, Job, RunControl } from '../types';

export const MAX_FORM_PAGES = 5;

export const ADVANCE_BUTTON_SELECTOR = "button, input[type='submit'], a[role='button'], [role='button']";

export interface ScoredControl {
  target: ClickTarget;
  score: number;
  /** True when pressing it sends the application */
  final: boolean;
}

/**
 * Score a button label as a way forward through the form
 */
export function scoreAdvanceLabel(text: string): { score: number; final: boolean } {
  const lower = text.toLowerCase();
  if (/\b(back|previous|cancel|sign in|log ?in|save for later)\b/.test(lower)) {
    return { score: -10, final: false };
  }
  if (/\b(submit|apply|send application)\b/.test(lower)) {
    return { score: 10, final: true };
  }
  if (/\b(continue|next|proceed|save and continue)\b/.test(lower)) {
    return { score: 8, final: false };
  }
  if (/\breview\b/.test(lower)) {
    return { score: 5, final: false };
  }
  return { score: 0, final: false };
}

export function pickAdvanceControl(targets: ClickTarget[]): ScoredControl | null {
  let best: ScoredControl | null = null;
  for (const target of targets) {
    const { score, final } = scoreAdvanceLabel(target.text);
    if (score > 0 && (!best || score > best.score)) {
      best = { target, score, final };
    }
  }
  return best;
}

export class UniversalFiller implements FormFiller {
  readonly name = 'universal';

  constructor(private readonly ctx: FillerContext) {}

  async canHandle(): Promise<boolean> {
    return true;
  }

  /**
   * Get from a job description page onto the form itself when needed
   */
  private async reachForm(page: AutomationPage, application: Application): Promise<AutomationPage> {
    if (await isApplicationFormPage(page)) return page;

    const followed = await followApplyLink(page, {
      selectors: this.ctx.mappings.applySelectors,
      settleTimeoutMs: this.ctx.settleTimeoutMs,
    });
    if (!followed.clicked) return page;

    addLog(application, 'apply_clicked', followed.label);
    return followed.page;
  }

  async fill(page: AutomationPage, job: Job, application: Application, control: RunControl): Promise<boolean> {
    const { logger } = this.ctx;
    const current = await this.reachForm(page, application);

    for (let formPage = 1; formPage <= MAX_FORM_PAGES; formPage++) {
      if (control.isCancelled()) return false;

      logger.info(`[Universal] Filling form page ${formPage}`);
      const filled = await answerVisibleFields(current, job, application, this.ctx, control);
      addLog(application, 'page_filled', `Page ${formPage}: ${filled} fields`);

      if (control.isCancelled()) return false;

      const advance = pickAdvanceControl(await current.visibleTexts(ADVANCE_BUTTON_SELECTOR));
      if (!advance) {
        if (await isSubmissionConfirmed(current, this.ctx.mappings)) return true;
        return noteFailure(application, `No submit or next button found on form page ${formPage}`);
      }

      if (advance.final) {
        if (shouldHoldSubmit(application, this.ctx)) {
          addLog(application, 'held_for_review', `Stopped before "${advance.target.text}"`);
          logger.info('[Universal] Form filled, holding the final submit for review');
          return true;
        }
        if (!(await passCaptcha(current, application, this.ctx, control))) return false;
      }

      logger.debug(`[Universal] Clicking "${advance.target.text}" (score ${advance.score})`);
      if (!(await current.click(advance.target.selector))) {
        return noteFailure(application, `Could not click "${advance.target.text}"`);
      }
      await current.waitForLoad(this.ctx.settleTimeoutMs);

      if (await isSubmissionConfirmed(current, this.ctx.mappings)) {
        addLog(application, 'submitted', current.url());
        return true;
      }

      if (advance.final) {
        // The final control is pressed at most once
        if (!(await passCaptcha(current, application, this.ctx, control))) return false;
        if (await isSubmissionConfirmed(current, this.ctx.mappings)) {
          addLog(application, 'submitted', current.url());
          return true;
        }
        return noteFailure(application, `Submission was not confirmed after "${advance.target.text}"`);
      }
    }

    return noteFailure(application, `Form did not finish within ${MAX_FORM_PAGES} pages`);
  }
}

export default {
  UniversalFiller,
  scoreAdvanceLabel,
  pickAdvanceControl,
};
