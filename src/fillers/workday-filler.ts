/**
 * Workday strategy
 *
 * Workday puts two screens in front of the form: an Apply button, then a
 * choice of how to apply. Both are clicked through before the universal
 * filler takes over.
 */

import { addLog } from '../core/application';
import { clickFirst } from './form-actions';
import type { FillerContext } from './form-actions';
import type { UniversalFiller } from './universal-filler';
import type { Application, AutomationPage, FormFiller, Job, RunControl } from '../types';

const APPLY_SELECTORS = [
  '[data-automation-id="applyButton"]',
  '[data-automation-id="adventureButton"]',
  "a:has-text('Apply')",
  "button:has-text('Apply')",
];

/** Preferred order: manual entry keeps every field visible to the filler */
const APPLY_MODE_SELECTORS = [
  '[data-automation-id="applyManually"]',
  '[data-automation-id="useMyLastApplication"]',
];

export class WorkdayFiller implements FormFiller {
  readonly name = 'workday';

  constructor(
    private readonly ctx: FillerContext,
    private readonly universal: UniversalFiller
  ) {}

  async canHandle(page: AutomationPage): Promise<boolean> {
    if (page.url().toLowerCase().includes('myworkdayjobs.com')) return true;
    return (await page.content()).toLowerCase().includes('workday');
  }

  private async openForm(page: AutomationPage, application: Application): Promise<void> {
    const { logger } = this.ctx;

    const apply = await clickFirst(page, APPLY_SELECTORS);
    if (apply) {
      logger.info('[Workday] Clicked Apply');
      addLog(application, 'apply_clicked', apply);
      await page.waitForLoad(this.ctx.settleTimeoutMs);
    } else {
      logger.info('[Workday] No Apply button found (might be already on form)');
    }

    const mode = await clickFirst(page, APPLY_MODE_SELECTORS);
    if (mode) {
      logger.info(`[Workday] Selected apply mode: ${mode}`);
      addLog(application, 'apply_mode', mode);
      await page.waitForLoad(this.ctx.settleTimeoutMs);
    }
  }

  async fill(page: AutomationPage, job: Job, application: Application, control: RunControl): Promise<boolean> {
    await this.openForm(page, application);
    if (control.isCancelled()) return false;
    return this.universal.fill(page, job, application, control);
  }
}

export default {
  WorkdayFiller,
};
