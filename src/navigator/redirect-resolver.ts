/**
 * Redirect resolver
 *
 * Re-classifies the current page after every hop and keeps clicking through
 * landing pages until a terminal vendor (or `custom`) page shows up, the hop
 * budget runs out, or the run is cancelled.
 */

import { isLandingPage } from '../normalize/ats-detector';
import type { PlatformClassifier } from '../normalize/ats-detector';
import { followApplyLink } from './apply-link-follower';
import { getLogger } from '../log/logger';
import type { Logger } from '../log/logger';
import type { ATSType, AutomationPage, Classification, RunControl } from '../types';

export const MAX_REDIRECT_HOPS = 2;
export const REFINE_CONFIDENCE = 0.6;

export type ResolveStop =
  | 'terminal'   // reached a non-landing page
  | 'exhausted'  // hop budget spent while still on a landing page
  | 'stuck'      // landing page without a usable apply control
  | 'cancelled';

export interface ResolveResult {
  page: AutomationPage;
  /** Platform tag to dispatch on, refined from the last classification when it is confident */
  ats: ATSType;
  classification: Classification;
  hops: number;
  stop: ResolveStop;
}

export interface RedirectResolverOptions {
  maxHops?: number;
  applySelectors?: string[];
  popupTimeoutMs?: number;
  settleTimeoutMs?: number;
  logger?: Logger;
}

export class RedirectResolver {
  private readonly maxHops: number;
  private readonly applySelectors: string[] | undefined;
  private readonly popupTimeoutMs: number;
  private readonly settleTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly classifier: PlatformClassifier,
    options: RedirectResolverOptions = {}
  ) {
    this.maxHops = options.maxHops ?? MAX_REDIRECT_HOPS;
    this.applySelectors = options.applySelectors;
    this.popupTimeoutMs = options.popupTimeoutMs ?? 5000;
    this.settleTimeoutMs = options.settleTimeoutMs ?? 10000;
    this.logger = options.logger ?? getLogger();
  }

  private async classifyPage(page: AutomationPage): Promise<Classification> {
    return this.classifier.classify(page.url(), await page.content());
  }

  /**
   * A confident, different classification of a terminal page overrides the current tag
   */
  private refine(current: ATSType, classification: Classification): ATSType {
    if (isLandingPage(classification.ats)) return current;
    if (classification.ats !== current && classification.confidence > REFINE_CONFIDENCE) {
      this.logger.info(
        `[Resolver] Platform refined: ${current} -> ${classification.ats} (confidence: ${Math.round(classification.confidence * 100)}%)`
      );
      return classification.ats;
    }
    return current;
  }

  async resolve(page: AutomationPage, currentAts: ATSType, control: RunControl): Promise<ResolveResult> {
    let current = page;
    let hops = 0;
    let classification = await this.classifyPage(current);

    while (isLandingPage(classification.ats)) {
      if (control.isCancelled()) {
        return { page: current, ats: currentAts, classification, hops, stop: 'cancelled' };
      }

      if (hops >= this.maxHops) {
        this.logger.warn(`[Resolver] Still on a landing page after ${hops} hops, using the generic filler`);
        return { page: current, ats: currentAts, classification, hops, stop: 'exhausted' };
      }

      this.logger.info(`[Resolver] Landing page detected: ${classification.ats}. Following apply link (hop ${hops + 1})`);
      const followed = await followApplyLink(current, {
        selectors: this.applySelectors,
        popupTimeoutMs: this.popupTimeoutMs,
        settleTimeoutMs: this.settleTimeoutMs,
      });

      if (!followed.clicked) {
        return { page: current, ats: currentAts, classification, hops, stop: 'stuck' };
      }

      hops++;
      current = followed.page;
      classification = await this.classifyPage(current);
    }

    return {
      page: current,
      ats: this.refine(currentAts, classification),
      classification,
      hops,
      stop: 'terminal',
    };
  }
}

export default {
  RedirectResolver,
  MAX_REDIRECT_HOPS,
};
