/**
 * Filling strategy registry
 *
 * A fixed table from platform tag to strategy with one universal fallback.
 * Landing-page tags, unregistered tags and strategies that decline the page
 * all fall through to the fallback.
 */

import { isATSType, isLandingPage } from '../normalize/ats-detector';
import { MappedFormFiller } from './mapped-filler';
import { UniversalFiller } from './universal-filler';
import { WorkdayFiller } from './workday-filler';
import type { FillerContext } from './form-actions';
import type { ATSType, AutomationPage, FormFiller } from '../types';

export type FillerTable = Partial<Record<ATSType, FormFiller>>;

export class FillerRegistry {
  constructor(
    private readonly fillers: FillerTable,
    readonly fallback: FormFiller
  ) {}

  registered(ats: ATSType): FormFiller | null {
    return this.fillers[ats] ?? null;
  }

  async dispatch(ats: ATSType, page: AutomationPage): Promise<FormFiller> {
    if (isLandingPage(ats)) return this.fallback;

    const filler = this.registered(ats);
    if (filler && (await filler.canHandle(page))) {
      return filler;
    }
    return this.fallback;
  }
}

/**
 * The standard strategy set: selector-mapped vendors from the form table,
 * Workday, and the universal fallback
 */
export function createFillerRegistry(ctx: FillerContext): FillerRegistry {
  const universal = new UniversalFiller(ctx);
  const fillers: FillerTable = {
    workday: new WorkdayFiller(ctx, universal),
  };

  for (const [ats, form] of Object.entries(ctx.mappings.forms)) {
    if (!form || !isATSType(ats) || ats === 'workday' || isLandingPage(ats)) continue;
    fillers[ats] = new MappedFormFiller(form, ctx);
  }

  return new FillerRegistry(fillers, universal);
}

export default {
  FillerRegistry,
  createFillerRegistry,
};
