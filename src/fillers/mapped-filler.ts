/**
 * Selector-mapped strategy for vendors with stable form markup
 * (Greenhouse, Lever, Ashby). Selectors come from ats-mappings.json.
 */

import { addLog, addQuestion } from '../core/application';
import {
  answerVisibleFields,
  clickFirst,
  fillFirst,
  isSubmissionConfirmed,
  noteFailure,
  passCaptcha,
  shouldHoldSubmit,
  uploadResume,
} from './form-actions';
import type { FillerContext } from './form-actions';
import type { Application, ATSFormConfig, AutomationPage, FormFiller, Job, RunControl } from '../types';

export class MappedFormFiller implements FormFiller {
  readonly name: string;

  constructor(
    private readonly form: ATSFormConfig,
    private readonly ctx: FillerContext
  ) {
    this.name = form.name.toLowerCase();
  }

  async canHandle(page: AutomationPage): Promise<boolean> {
    for (const marker of this.form.formMarkers) {
      if (await page.isVisible(marker)) return true;
    }
    return false;
  }

  private async fillMappedFields(page: AutomationPage, application: Application): Promise<number> {
    let filled = 0;
    for (const [key, selectors] of Object.entries(this.form.fieldMappings)) {
      const value = this.ctx.answerer.valueFor(key);
      if (!value) continue;

      const selector = await fillFirst(page, selectors, value);
      if (!selector) continue;

      filled++;
      addQuestion(application, {
        question_text: key,
        field_name: selector,
        answer: value,
        answered_by: 'auto',
      });
    }
    return filled;
  }

  async fill(page: AutomationPage, job: Job, application: Application, control: RunControl): Promise<boolean> {
    const { logger } = this.ctx;
    logger.info(`[${this.form.name}] Filling mapped fields`);

    const mapped = await this.fillMappedFields(page, application);
    addLog(application, 'fields_filled', `${mapped} mapped fields`);

    await uploadResume(page, this.form.resumeSelectors, application, this.ctx);
    if (control.isCancelled()) return false;

    await answerVisibleFields(page, job, application, this.ctx, control);
    if (control.isCancelled()) return false;

    if (shouldHoldSubmit(application, this.ctx)) {
      addLog(application, 'held_for_review', 'Form filled, submit not clicked');
      logger.info(`[${this.form.name}] Form filled, holding submit for review`);
      return true;
    }

    if (!(await passCaptcha(page, application, this.ctx, control))) return false;

    const submit = await clickFirst(page, this.form.submitSelectors);
    if (!submit) {
      return noteFailure(application, `${this.form.name} submit button not found`);
    }
    await page.waitForLoad(this.ctx.settleTimeoutMs);

    if (await isSubmissionConfirmed(page, this.ctx.mappings)) {
      addLog(application, 'submitted', page.url());
      return true;
    }
    return noteFailure(application, 'Submission was not confirmed');
  }
}

export default {
  MappedFormFiller,
};
