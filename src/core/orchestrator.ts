/**
 * Application orchestrator
 *
 * Drives one job at a time from claimed to a terminal outcome:
 * claim → classify → open → resolve landing pages → fill → record.
 * Cancellation is cooperative and checked before classification, after
 * classification, before filling and after filling. The run's registry
 * entry and browser session are released on every exit path.
 */

import {
  completeApplication,
  createApplication,
  failApplication,
  getQuestionsNeedingReview,
  requestReview,
  skipApplication,
  startApplication,
  addLog,
} from './application';
import { describeJob } from './job';
import { screenshotPath } from '../browser/browser-manager';
import { defaultSleep } from '../checkpoints/bounded-wait';
import { createRunResult, getLogger } from '../log/logger';
import type { Logger } from '../log/logger';
import type { PlatformClassifier } from '../normalize/ats-detector';
import type { RedirectResolver } from '../navigator/redirect-resolver';
import type { FillerRegistry } from '../fillers/registry';
import type { Notifier } from '../notify/notifier';
import type { CancellationRegistry, RunLease, RunStatus } from '../registry/cancellation-registry';
import type {
  Application,
  ApplicationSettings,
  ApplyOutcome,
  ATSType,
  AutomationPage,
  BrowserDriver,
  BrowserSession,
  Job,
  JobSourceProvider,
  JobStatus,
  JobStore,
  ProcessResult,
  SessionStats,
} from '../types';

const NETWORK_ERROR_PATTERNS = [
  'ERR_NAME_NOT_RESOLVED',
  'ERR_CONNECTION_REFUSED',
  'ERR_CONNECTION_RESET',
  'ERR_INTERNET_DISCONNECTED',
  'timeout',
];

/**
 * Navigation failures that mean the posting is gone or unreachable
 */
export function isUnreachableError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return NETWORK_ERROR_PATTERNS.some(pattern => message.toLowerCase().includes(pattern.toLowerCase()));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function outcomeIssue(outcome: ApplyOutcome): string | undefined {
  switch (outcome.kind) {
    case 'needs_review':
    case 'expired':
      return outcome.reason;
    case 'failed':
      return outcome.error;
    default:
      return undefined;
  }
}

export interface OrchestratorSettings {
  application: ApplicationSettings;
  navigationTimeout: number;
}

export interface OrchestratorDeps {
  store: JobStore;
  classifier: PlatformClassifier;
  resolver: RedirectResolver;
  fillers: FillerRegistry;
  runs: CancellationRegistry;
  driver: BrowserDriver;
  notifier: Notifier;
  settings: OrchestratorSettings;
  discovery?: JobSourceProvider | null;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface CandidateFilter {
  platform?: ATSType;
}

export type StartResult = { status: 'started' } | { status: 'already_running' };
export type AbortResult = { status: 'aborted' } | { status: 'not_running' };

/** Raised inside a run when a checkpoint sees the cancellation flag */
class RunCancelled extends Error {
  constructor(readonly checkpoint: string) {
    super(`Cancelled at ${checkpoint}`);
    this.name = 'RunCancelled';
  }
}

interface RunState {
  job: Job;
  priorStatus: JobStatus;
  application: Application;
  lease: RunLease;
  session: BrowserSession | null;
  page: AutomationPage | null;
}

export class Orchestrator {
  private readonly store: JobStore;
  private readonly classifier: PlatformClassifier;
  private readonly resolver: RedirectResolver;
  private readonly fillers: FillerRegistry;
  private readonly runs: CancellationRegistry;
  private readonly driver: BrowserDriver;
  private readonly notifier: Notifier;
  private readonly settings: OrchestratorSettings;
  private readonly discovery: JobSourceProvider | null;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  private readonly inFlight = new Map<string, Promise<ProcessResult | null>>();
  private stopRequested = false;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.classifier = deps.classifier;
    this.resolver = deps.resolver;
    this.fillers = deps.fillers;
    this.runs = deps.runs;
    this.driver = deps.driver;
    this.notifier = deps.notifier;
    this.settings = deps.settings;
    this.discovery = deps.discovery ?? null;
    this.logger = deps.logger ?? getLogger();
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Actionable jobs, oldest first, over-fetched so filtering still leaves enough
   */
  async selectCandidates(maxCount: number, filter: CandidateFilter = {}): Promise<Job[]> {
    const limit = maxCount * this.settings.application.overfetchFactor;
    const jobs = await this.store.listActionable(limit);
    const { platform } = filter;
    if (!platform) return jobs;

    return jobs.filter(job => {
      const ats = job.ats === 'unknown' ? this.classifier.classify(job.apply_url || job.url).ats : job.ats;
      return ats === platform;
    });
  }

  /**
   * Run one job to a terminal outcome. A second run for a job that is already
   * running is refused with `already_running`.
   */
  async processJob(job: Job): Promise<ProcessResult> {
    const lease = this.runs.register(job.id);
    if (!lease) {
      this.logger.warn(`[Orchestrator] ${describeJob(job)} is already running`);
      return { kind: 'already_running', jobId: job.id };
    }
    return this.run(job, lease);
  }

  /**
   * Start a job in the background
   */
  async start(jobId: string): Promise<StartResult> {
    const job = await this.store.getJob(jobId);
    if (!job) {
      throw new Error(`Job not found: ${jobId}`);
    }

    const lease = this.runs.register(jobId);
    if (!lease) {
      return { status: 'already_running' };
    }

    const run: Promise<ProcessResult | null> = this.run(job, lease)
      .catch((error: unknown): null => {
        this.logger.error(`[Orchestrator] Background run for ${jobId} crashed: ${errorMessage(error)}`);
        return null;
      })
      .finally(() => {
        if (this.inFlight.get(jobId) === run) {
          this.inFlight.delete(jobId);
        }
      });
    this.inFlight.set(jobId, run);
    return { status: 'started' };
  }

  /**
   * The result of a background run started with `start`. Resolves null if the run crashed.
   */
  settled(jobId: string): Promise<ProcessResult | null> | null {
    return this.inFlight.get(jobId) ?? null;
  }

  abort(jobId: string): AbortResult {
    if (this.runs.requestCancel(jobId)) {
      this.logger.info(`[Orchestrator] Cancellation requested for ${jobId}`);
      return { status: 'aborted' };
    }
    return { status: 'not_running' };
  }

  pollStatus(jobId: string): RunStatus {
    return this.runs.status(jobId);
  }

  /**
   * Cancel every active run and stop the session loop after the current job
   */
  abortAll(): string[] {
    this.stopRequested = true;
    const ids = this.runs.activeJobIds();
    for (const id of ids) {
      this.runs.requestCancel(id);
    }
    return ids;
  }

  async runSession(maxApplications: number, scrapeFirst: boolean, filter: CandidateFilter = {}): Promise<SessionStats> {
    const startedAt = Date.now();
    this.stopRequested = false;

    const stats: SessionStats = {
      jobsProcessed: 0,
      submitted: 0,
      needsReview: 0,
      failed: 0,
      expired: 0,
      cancelled: 0,
      alreadyRunning: 0,
      candidates: 0,
      durationMs: 0,
    };

    if (scrapeFirst && this.discovery) {
      try {
        const found = await this.discovery.discover();
        this.logger.info(`Found ${found.found} jobs, ${found.new} new`);
      } catch (error) {
        this.logger.error(`[Discovery] Scraping error: ${errorMessage(error)}`);
      }
    }

    const candidates = await this.selectCandidates(maxApplications, filter);
    stats.candidates = candidates.length;
    this.logger.info(`Found ${candidates.length} pending jobs`);

    for (const [index, job] of candidates.entries()) {
      if (stats.submitted >= maxApplications) {
        this.logger.info(`Reached max applications (${maxApplications})`);
        break;
      }
      if (this.stopRequested) {
        this.logger.info('Session stopped');
        break;
      }

      const result = await this.processJob(job);
      this.tally(stats, result);

      const isLast = index === candidates.length - 1;
      if (result.kind !== 'already_running' && !isLast && !this.stopRequested && stats.submitted < maxApplications) {
        await this.randomDelay();
      }
    }

    stats.durationMs = Date.now() - startedAt;
    await this.notifier.notifySummary(stats);
    return stats;
  }

  private tally(stats: SessionStats, result: ProcessResult): void {
    if (result.kind === 'already_running') {
      stats.alreadyRunning++;
      return;
    }
    stats.jobsProcessed++;
    switch (result.kind) {
      case 'submitted':
        stats.submitted++;
        break;
      case 'needs_review':
        stats.needsReview++;
        break;
      case 'failed':
        stats.failed++;
        break;
      case 'expired':
        stats.expired++;
        break;
      case 'cancelled':
        stats.cancelled++;
        break;
    }
  }

  private async randomDelay(): Promise<void> {
    const { min, max } = this.settings.application.delay;
    const seconds = min + this.random() * Math.max(0, max - min);
    this.logger.info(`Waiting ${Math.round(seconds)}s before next application...`);
    await this.sleep(seconds * 1000);
  }

  private checkpoint(state: RunState, name: string): void {
    if (state.lease.isCancelled()) {
      throw new RunCancelled(name);
    }
  }

  private async run(job: Job, lease: RunLease): Promise<ProcessResult> {
    try {
      return await this.attempt(job, lease);
    } finally {
      lease.release();
    }
  }

  private async attempt(job: Job, lease: RunLease): Promise<ApplyOutcome> {
    const startedAt = Date.now();
    this.logger.applicationStart(job.company, job.title);

    const stored = await this.store.getJob(job.id);
    const current = stored ?? job;
    const application = createApplication(current, this.settings.application.maxRetries);
    const state: RunState = {
      job: current,
      priorStatus: current.status,
      application,
      lease,
      session: null,
      page: null,
    };

    let outcome: ApplyOutcome;
    try {
      startApplication(application);
      await this.store.addApplication(application);
      await this.store.updateJobStatus(current.id, 'in_progress');
      outcome = await this.advance(state);
    } catch (error) {
      outcome =
        error instanceof RunCancelled
          ? await this.cancelRun(state, error.checkpoint)
          : await this.failRun(state, errorMessage(error));
    } finally {
      await this.closeSession(state);
    }

    this.logger.applicationResult(
      createRunResult(
        current.id,
        current.company,
        current.title,
        state.application.ats,
        outcome.kind,
        outcomeIssue(outcome),
        Date.now() - startedAt
      )
    );
    return outcome;
  }

  private async advance(state: RunState): Promise<ApplyOutcome> {
    const { application } = state;
    this.checkpoint(state, 'before classification');

    let ats = state.job.ats;
    if (ats === 'unknown') {
      const classification = this.classifier.classify(state.job.apply_url || state.job.url);
      ats = classification.ats;
      await this.store.updateJobPlatform(state.job.id, ats);
      this.logger.info(`Platform: ${ats} (confidence: ${Math.round(classification.confidence * 100)}%)`);
    } else {
      this.logger.info(`Platform: ${ats}`);
    }
    application.ats = ats;
    addLog(application, 'classified', ats);

    this.checkpoint(state, 'after classification');

    const opened = await this.open(state);
    if (opened.kind === 'expired') {
      return this.expireRun(state, opened.reason);
    }

    const resolved = await this.resolver.resolve(opened.page, ats, state.lease);
    state.page = resolved.page;
    addLog(application, 'resolved', `${resolved.stop} after ${resolved.hops} hops: ${resolved.page.url()}`);
    if (resolved.stop === 'cancelled') {
      throw new RunCancelled('redirect resolution');
    }
    if (resolved.ats !== ats) {
      ats = resolved.ats;
      application.ats = ats;
      await this.store.updateJobPlatform(state.job.id, ats);
    }

    this.checkpoint(state, 'before filling');

    const filler = await this.fillers.dispatch(ats, resolved.page);
    this.logger.info(`Using ${filler.name} filler`);
    addLog(application, 'filler', filler.name);
    const filled = await filler.fill(resolved.page, state.job, application, state.lease);

    this.checkpoint(state, 'after filling');

    if (!filled) {
      return this.failRun(state, application.error_message ?? `${filler.name} filler did not complete the application`);
    }

    const pending = getQuestionsNeedingReview(application);
    if (this.settings.application.reviewMode || pending.length > 0) {
      const reason =
        pending.length > 0
          ? `${pending.length} question(s) need review: ${pending.map(q => q.question_text).join('; ')}`
          : 'Review mode - check before submitting';
      return this.reviewRun(state, reason);
    }

    return this.submitRun(state);
  }

  private async open(state: RunState): Promise<{ kind: 'opened'; page: AutomationPage } | { kind: 'expired'; reason: string }> {
    const url = state.job.apply_url || state.job.url;
    this.logger.info(`Opening ${url}`);

    state.session = await this.driver.newSession();
    try {
      const { page, status } = await state.session.open(url, this.settings.navigationTimeout);
      state.page = page;
      if (status !== null && status >= 400) {
        return { kind: 'expired', reason: `Page loaded with status ${status}` };
      }
      return { kind: 'opened', page };
    } catch (error) {
      if (isUnreachableError(error)) {
        return { kind: 'expired', reason: `Navigation failed: ${errorMessage(error)}` };
      }
      throw error;
    }
  }

  private async capture(state: RunState, name: string): Promise<string | undefined> {
    const { application: settings } = this.settings;
    if (!settings.saveScreenshots || !state.page) return undefined;

    const filePath = screenshotPath(settings.screenshotsDir, `${name}-${state.job.id}`);
    try {
      await state.page.screenshot(filePath);
      return filePath;
    } catch (error) {
      this.logger.debug(`[Orchestrator] Screenshot failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async submitRun(state: RunState): Promise<ApplyOutcome> {
    const { application, job } = state;
    completeApplication(application);
    await this.store.updateApplication(application);
    await this.store.updateJobStatus(job.id, 'applied');
    await this.notifier.notifyCompleted(job);
    return { kind: 'submitted', jobId: job.id, applicationId: application.id };
  }

  private async reviewRun(state: RunState, reason: string): Promise<ApplyOutcome> {
    const { application, job } = state;
    requestReview(application, reason);
    const shot = await this.capture(state, 'review');
    if (shot) addLog(application, 'screenshot', 'Form ready for review', shot);
    await this.store.updateApplication(application);
    await this.store.updateJobStatus(job.id, 'needs_review');
    await this.notifier.notifyNeedsReview(job, reason);
    return { kind: 'needs_review', jobId: job.id, applicationId: application.id, reason };
  }

  private async failRun(state: RunState, error: string): Promise<ApplyOutcome> {
    const { application, job } = state;
    this.logger.error(`[Orchestrator] ${describeJob(job)} failed: ${error}`);
    const shot = await this.capture(state, 'failed');
    if (shot) addLog(application, 'screenshot', 'Page at failure', shot);
    failApplication(application, error);
    await this.store.updateApplication(application);
    await this.store.updateJobStatus(job.id, 'failed');
    await this.notifier.notifyFailed(job, error);
    return { kind: 'failed', jobId: job.id, applicationId: application.id, error };
  }

  private async expireRun(state: RunState, reason: string): Promise<ApplyOutcome> {
    const { application, job } = state;
    this.logger.warn(`[Orchestrator] ${describeJob(job)} expired: ${reason}`);
    skipApplication(application, reason);
    await this.store.updateApplication(application);
    await this.store.updateJobStatus(job.id, 'expired');
    return { kind: 'expired', jobId: job.id, applicationId: application.id, reason };
  }

  /**
   * Undo the claim: the attempt is discarded and the job returns to the queue.
   * A job that was waiting for review goes back to waiting for review.
   */
  private async cancelRun(state: RunState, checkpoint: string): Promise<ApplyOutcome> {
    const { application, job } = state;
    const resetTo: JobStatus = state.priorStatus === 'needs_review' ? 'needs_review' : 'new';
    this.logger.info(`[Orchestrator] ${describeJob(job)} cancelled ${checkpoint}, status reset to ${resetTo}`);
    await this.store.discardApplication(application.id);
    await this.store.updateJobStatus(job.id, resetTo);
    return { kind: 'cancelled', jobId: job.id };
  }

  private async closeSession(state: RunState): Promise<void> {
    if (!state.session) return;
    try {
      await state.session.close();
    } catch (error) {
      this.logger.debug(`[Orchestrator] Closing browser session failed: ${errorMessage(error)}`);
    }
    state.session = null;
  }
}

export default {
  Orchestrator,
  isUnreachableError,
};
