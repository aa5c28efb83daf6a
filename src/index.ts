/**
 * Application orchestrator - Main Entry Point
 *
 * Discovers postings, works out which applicant tracking system hosts each
 * form, and fills it with a human review gate before anything is submitted.
 */

// Load environment variables from .env file
import 'dotenv/config';

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';

import { loadATSMappings, validateCandidateProfile } from './config';
import { describeJob, isJobStatus } from './core/job';
import { getLogger } from './log/logger';
import { PlatformClassifier, getPlatformInfo, groupJobsByATS, isATSType } from './normalize/ats-detector';
import { createRuntime } from './runtime';
import type { Runtime } from './runtime';
import type { ATSType, Job, JobStatus, ProcessResult, SessionStats } from './types';

const program = new Command();

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parsePlatform(value: string): ATSType {
  const lower = value.toLowerCase();
  if (!isATSType(lower)) {
    throw new InvalidArgumentError(`Unknown platform "${value}".`);
  }
  return lower;
}

function parseStatus(value: string): JobStatus {
  if (!isJobStatus(value)) {
    throw new InvalidArgumentError(`Unknown status "${value}".`);
  }
  return value;
}

function banner(): void {
  console.log('\n' + chalk.bgCyan.black(' APPLY ORCHESTRATOR ') + '\n');
}

function fatal(error: unknown): never {
  getLogger().error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

/**
 * Load the runtime and refuse to continue with an incomplete profile
 */
function startRuntime(overrides: Parameters<typeof createRuntime>[0] = {}): Runtime {
  const runtime = createRuntime(overrides);
  const profileErrors = validateCandidateProfile(runtime.profile);
  if (profileErrors.length > 0) {
    runtime.logger.error('Invalid candidate profile:');
    profileErrors.forEach(e => runtime.logger.error(`  - ${e}`));
    console.log(chalk.yellow('\nPlease update config/candidate-profile.json with your information.'));
    process.exit(1);
  }

  if (runtime.resumePath) {
    runtime.logger.info(`Resume: ${runtime.resumePath}`);
  } else {
    runtime.logger.warn('No resume file found. Applications will require manual resume upload.');
  }
  return runtime;
}

/**
 * Ctrl+C asks every active run to stop at its next checkpoint; a second Ctrl+C exits
 */
function handleInterrupts(runtime: Runtime): void {
  let interrupted = false;
  process.on('SIGINT', () => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    const ids = runtime.orchestrator.abortAll();
    runtime.logger.warn(`Interrupted. Cancelling ${ids.length} active run(s); press Ctrl+C again to exit now.`);
  });
}

function printStats(stats: SessionStats): void {
  console.log(chalk.gray(`\nCandidates: ${stats.candidates} | Processed: ${stats.jobsProcessed} | ` +
    `Duration: ${(stats.durationMs / 1000).toFixed(0)}s`));
}

function printOutcome(result: ProcessResult): void {
  switch (result.kind) {
    case 'submitted':
      console.log(chalk.green(`✓ Submitted (application ${result.applicationId})`));
      break;
    case 'needs_review':
      console.log(chalk.yellow(`◐ Needs review: ${result.reason}`));
      break;
    case 'failed':
      console.log(chalk.red(`✗ Failed: ${result.error}`));
      break;
    case 'expired':
      console.log(chalk.gray(`○ Expired: ${result.reason}`));
      break;
    case 'cancelled':
      console.log(chalk.gray('○ Cancelled, job returned to the queue'));
      break;
    case 'already_running':
      console.log(chalk.gray('○ Already running'));
      break;
  }
}

interface RunOptions {
  limit?: number;
  scrape: boolean;
  platform?: ATSType;
  dryRun?: boolean;
  review: boolean;
}

async function runSession(options: RunOptions): Promise<void> {
  banner();
  let runtime: Runtime | null = null;

  try {
    runtime = startRuntime(options.review ? {} : { reviewMode: false });
    const { orchestrator, settings, classifier, logger } = runtime;
    const limit = options.limit ?? settings.application.maxPerRun;

    if (options.dryRun) {
      const candidates = await orchestrator.selectCandidates(limit, { platform: options.platform });
      logger.info(`[DRY RUN] ${candidates.length} candidate(s)`);
      for (const job of candidates) {
        const { ats, confidence } = job.ats === 'unknown'
          ? classifier.classify(job.apply_url || job.url)
          : { ats: job.ats, confidence: 1 };
        console.log(`  ${chalk.bold(describeJob(job))} ${chalk.gray(`[${ats} ${Math.round(confidence * 100)}%]`)}`);
      }
      return;
    }

    logger.info(`Review mode: ${settings.application.reviewMode ? 'ON' : 'OFF'}`);
    handleInterrupts(runtime);

    const stats = await orchestrator.runSession(limit, options.scrape, { platform: options.platform });
    logger.printSummary();
    printStats(stats);
  } catch (error) {
    fatal(error);
  } finally {
    await runtime?.driver.shutdown();
  }
}

async function applyOne(target: string, options: { review: boolean }): Promise<void> {
  banner();
  let runtime: Runtime | null = null;

  try {
    runtime = startRuntime(options.review ? {} : { reviewMode: false });
    const { store, orchestrator } = runtime;

    let job: Job | null;
    if (/^https?:\/\//i.test(target)) {
      const { id } = await store.addJob({
        title: 'Position',
        company: 'Manual Application',
        location: 'Unknown',
        url: target,
        source: 'manual',
      });
      job = await store.getJob(id);
    } else {
      job = await store.getJob(target);
    }

    if (!job) {
      throw new Error(`Job not found: ${target}`);
    }

    handleInterrupts(runtime);
    printOutcome(await orchestrator.processJob(job));
  } catch (error) {
    fatal(error);
  } finally {
    await runtime?.driver.shutdown();
  }
}

// CLI setup
program
  .name('apply-orchestrator')
  .description('Job application orchestrator with a human review gate')
  .version('1.0.0');

program
  .command('run')
  .description('Discover jobs and work through the queue')
  .option('-l, --limit <number>', 'Maximum number of submitted applications', parsePositiveInt)
  .option('--no-scrape', 'Skip job discovery before the run')
  .option('-p, --platform <ats>', 'Only process jobs on this platform', parsePlatform)
  .option('--dry-run', 'List candidate jobs without applying')
  .option('--no-review', 'Submit without pausing for review')
  .action(runSession);

program
  .command('apply <job>')
  .description('Apply to one job by id, or by URL for a job not yet in the store')
  .option('--no-review', 'Submit without pausing for review')
  .action(applyOne);

program
  .command('add <url>')
  .description('Add a job to the queue')
  .option('-t, --title <title>', 'Job title', 'Position')
  .option('-c, --company <name>', 'Company name', 'Unknown')
  .option('--location <location>', 'Job location', 'Unknown')
  .action(async (url: string, options: { title: string; company: string; location: string }) => {
    try {
      const runtime = createRuntime();
      const result = await runtime.store.addJob({ ...options, url, source: 'manual' });
      if (result.created) {
        console.log(chalk.green(`✓ Added ${result.id}`));
      } else {
        console.log(chalk.gray(`Already queued as ${result.id}`));
      }
    } catch (error) {
      fatal(error);
    }
  });

program
  .command('classify <url>')
  .description('Show which platform hosts an application URL')
  .action((url: string) => {
    try {
      const { ats, confidence } = new PlatformClassifier(loadATSMappings()).classify(url);
      const info = getPlatformInfo(ats);
      console.log(`${chalk.bold(ats)} ${chalk.gray(`(confidence: ${Math.round(confidence * 100)}%)`)}`);
      if (info.difficulty !== 'unknown') {
        console.log(chalk.gray(`${info.name}: ${info.difficulty}${info.multiStep ? ', multi-step' : ''}` +
          `${info.requiresAccount ? ', account required' : ''}`));
      }
    } catch (error) {
      fatal(error);
    }
  });

program
  .command('jobs')
  .description('List stored jobs grouped by platform')
  .option('-s, --status <status>', 'Only jobs with this status', parseStatus)
  .action(async (options: { status?: JobStatus }) => {
    try {
      const runtime = createRuntime();
      const jobs = await runtime.store.listJobs(options.status);

      console.log('\n' + chalk.bgCyan.black(' JOBS ') + '\n');
      if (jobs.length === 0) {
        console.log(chalk.gray('No jobs stored yet.'));
        return;
      }

      for (const [ats, group] of groupJobsByATS(jobs, runtime.classifier)) {
        console.log(chalk.bold(`${ats} (${group.length})`));
        for (const job of group) {
          console.log(`  ${chalk.gray(job.id.slice(0, 8))} ${describeJob(job)} ${chalk.gray(`[${job.status}]`)}`);
        }
      }
    } catch (error) {
      fatal(error);
    }
  });

program
  .command('history')
  .description('View application history')
  .action(async () => {
    try {
      const runtime = createRuntime();
      const applications = await runtime.store.listApplications();

      console.log('\n' + chalk.bgCyan.black(' APPLICATION HISTORY ') + '\n');

      if (applications.length === 0) {
        console.log(chalk.gray('No applications recorded yet.'));
        return;
      }

      const newestFirst = [...applications].reverse();
      for (const app of newestFirst.slice(0, 20)) {
        const date = new Date(app.created_at).toLocaleDateString();
        const statusColor = app.status === 'submitted' ? chalk.green : app.status === 'needs_review' ? chalk.yellow : chalk.red;

        console.log(`${statusColor(app.status.padEnd(12))} ${chalk.bold(app.company)} - ${app.job_title}`);
        console.log(chalk.gray(`   ${date} | ${app.ats} | ${app.job_url.substring(0, 60)}`));
        if (app.error_message) console.log(chalk.gray(`   Note: ${app.error_message}`));
      }

      if (applications.length > 20) {
        console.log(chalk.gray(`... and ${applications.length - 20} more`));
      }
    } catch (error) {
      fatal(error);
    }
  });

program
  .command('test')
  .description('Test configuration and browser setup')
  .action(async () => {
    console.log('\n' + chalk.bgYellow.black(' CONFIGURATION TEST ') + '\n');
    let runtime: Runtime | null = null;

    try {
      runtime = createRuntime();
      const { logger, settings, credentials } = runtime;
      logger.info('✓ Settings loaded');
      logger.info('✓ Candidate profile loaded');

      const errors = validateCandidateProfile(runtime.profile);
      if (errors.length > 0) {
        logger.warn('Profile validation issues:');
        errors.forEach(e => logger.warn(`  - ${e}`));
      } else {
        logger.info('✓ Profile validated');
      }

      if (runtime.resumePath) {
        logger.info(`✓ Resume found: ${runtime.resumePath}`);
      } else {
        logger.warn('✗ Resume not found');
      }

      const key = settings.llm.provider === 'huggingface' ? credentials.huggingfaceApiKey : credentials.openaiApiKey;
      if (key) {
        logger.info(`✓ ${settings.llm.provider} API key set`);
      } else {
        logger.warn(`✗ No ${settings.llm.provider} API key, free-text answers will be left for review`);
      }

      logger.info('Testing browser...');
      const session = await runtime.driver.newSession();
      const { status } = await session.open('https://example.com', settings.browser.navigationTimeout);
      await session.close();
      logger.info(`✓ Navigation working (status ${status ?? 'unknown'})`);

      console.log('\n' + chalk.green('All tests passed!') + '\n');
    } catch (error) {
      fatal(error);
    } finally {
      await runtime?.driver.shutdown();
    }
  });

// Parse arguments
program.parseAsync().catch(fatal);
