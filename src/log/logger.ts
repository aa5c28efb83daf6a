/**
 * Logging and run-result module
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import type { ATSType, ProcessResult } from '../types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ResultKind = ProcessResult['kind'];

export interface RunResult {
  job_id: string;
  company: string;
  role: string;
  ats: ATSType;
  outcome: ResultKind;
  issue?: string;
  timestamp: string;
  duration_ms?: number;
}

export type RunSummary = Record<ResultKind | 'total', number>;

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const OUTCOME_STYLE: Record<ResultKind, (text: string) => string> = {
  submitted: chalk.green,
  needs_review: chalk.yellow,
  failed: chalk.red,
  expired: chalk.gray,
  cancelled: chalk.gray,
  already_running: chalk.gray,
};

export class Logger {
  private level: LogLevel;
  private results: RunResult[] = [];
  private logFile: string | null = null;

  /** With a null output directory nothing is written to disk */
  constructor(level: LogLevel = 'info', outputDir: string | null = null) {
    this.level = level;
    this.openLogFile(outputDir);
  }

  private openLogFile(outputDir: string | null): void {
    this.logFile = null;
    if (!outputDir) return;

    fs.mkdirSync(outputDir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(outputDir, `application-log-${stamp}.json`);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;

    const time = new Date().toLocaleTimeString();
    console.log(LEVEL_STYLE[level](`[${time}] ${level.toUpperCase()}: ${message}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /**
   * A wait on a person (CAPTCHA, verification)
   */
  checkpoint(type: string, message: string): void {
    if (!this.enabled('info')) return;
    console.log('\n' + chalk.bgYellow.black(' CHECKPOINT ') + ' ' + chalk.yellow(type.toUpperCase()));
    console.log(chalk.yellow(`→ ${message}`));
  }

  applicationStart(company: string, role: string): void {
    if (!this.enabled('info')) return;
    console.log('\n' + chalk.bgBlue.white(' APPLYING '));
    console.log(chalk.blue(`${role} at ${company}`));
    console.log(chalk.gray('─'.repeat(50)));
  }

  /**
   * Record a finished run and rewrite the run log
   */
  applicationResult(result: RunResult): void {
    this.results.push(result);

    if (this.enabled('info')) {
      console.log(OUTCOME_STYLE[result.outcome](`Outcome: ${result.outcome.toUpperCase()}`));
      if (result.issue) console.log(chalk.red(`Issue: ${result.issue}`));
      if (result.duration_ms) console.log(chalk.gray(`Duration: ${(result.duration_ms / 1000).toFixed(1)}s`));
    }

    if (this.logFile) {
      const output = {
        generated_at: new Date().toISOString(),
        total_applications: this.results.length,
        summary: this.getSummary(),
        results: this.results,
      };
      fs.writeFileSync(this.logFile, JSON.stringify(output, null, 2));
    }
  }

  getSummary(): RunSummary {
    const summary: RunSummary = {
      total: this.results.length,
      submitted: 0,
      needs_review: 0,
      failed: 0,
      expired: 0,
      cancelled: 0,
      already_running: 0,
    };
    for (const result of this.results) {
      summary[result.outcome]++;
    }
    return summary;
  }

  printSummary(): void {
    const summary = this.getSummary();

    console.log('\n' + chalk.bgWhite.black(' SUMMARY '));
    console.log(chalk.gray('═'.repeat(50)));
    console.log(`Total Applications: ${summary.total}`);
    console.log(chalk.green(`✓ Submitted: ${summary.submitted}`));
    console.log(chalk.yellow(`◐ Needs review: ${summary.needs_review}`));
    console.log(chalk.red(`✗ Failed: ${summary.failed}`));
    console.log(chalk.gray(`○ Expired: ${summary.expired}`));
    console.log(chalk.gray(`○ Cancelled: ${summary.cancelled}`));
    console.log(chalk.gray('═'.repeat(50)));

    if (this.logFile) {
      console.log(chalk.gray(`\nDetailed log saved to: ${this.logFile}`));
    }
  }

  /**
   * Reconfigure in place so module-level references stay valid
   */
  configure(level: LogLevel, outputDir: string | null): void {
    this.level = level;
    this.results = [];
    this.openLogFile(outputDir);
  }
}

let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

export function configureLogger(level: LogLevel, outputDir: string | null): Logger {
  const logger = getLogger();
  logger.configure(level, outputDir);
  return logger;
}

export function createRunResult(
  jobId: string,
  company: string,
  role: string,
  ats: ATSType,
  outcome: ResultKind,
  issue?: string,
  durationMs?: number
): RunResult {
  return {
    job_id: jobId,
    company,
    role,
    ats,
    outcome,
    issue,
    timestamp: new Date().toISOString(),
    duration_ms: durationMs,
  };
}

export default {
  getLogger,
  configureLogger,
  createRunResult,
};
