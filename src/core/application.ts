/**
 * Application attempt records and their transitions.
 * Helpers mutate the record in place; logs and questions are only ever appended.
 */

import { randomUUID } from 'crypto';
import type {
  AnsweredBy,
  Application,
  ApplicationQuestion,
  ApplicationStatus,
  Job,
  QuestionKind,
} from '../types';

export const DEFAULT_MAX_RETRIES = 3;

const TERMINAL_STATUSES: readonly ApplicationStatus[] = ['submitted', 'failed', 'skipped'];

const timestamp = (): string => new Date().toISOString();

export function createApplication(job: Job, maxRetries: number = DEFAULT_MAX_RETRIES): Application {
  return {
    id: randomUUID(),
    job_id: job.id,
    job_title: job.title,
    company: job.company,
    job_url: job.apply_url || job.url,
    ats: job.ats,
    status: 'pending',
    created_at: timestamp(),
    started_at: null,
    completed_at: null,
    logs: [],
    questions: [],
    error_message: null,
    retry_count: 0,
    max_retries: maxRetries,
    resume_uploaded: false,
    screenshots: [],
  };
}

export function isTerminal(application: Application): boolean {
  return TERMINAL_STATUSES.includes(application.status);
}

export function addLog(application: Application, action: string, details: string = '', screenshot?: string): void {
  application.logs.push({
    timestamp: timestamp(),
    action,
    details,
    ...(screenshot ? { screenshot_path: screenshot } : {}),
  });
  if (screenshot) {
    application.screenshots.push(screenshot);
  }
}

export function startApplication(application: Application): void {
  if (application.status !== 'pending' && application.status !== 'in_progress') {
    return;
  }
  application.status = 'in_progress';
  application.started_at = application.started_at ?? timestamp();
  addLog(application, 'started', 'Application process started');
}

export function completeApplication(application: Application): void {
  application.status = 'submitted';
  application.completed_at = timestamp();
  addLog(application, 'completed', 'Application submitted successfully');
}

export function failApplication(application: Application, error: string): void {
  application.status = 'failed';
  application.error_message = error;
  application.completed_at = timestamp();
  addLog(application, 'failed', error);
}

export function requestReview(application: Application, reason: string): void {
  application.status = 'needs_review';
  addLog(application, 'needs_review', reason);
}

export function skipApplication(application: Application, reason: string): void {
  application.status = 'skipped';
  application.error_message = reason;
  application.completed_at = timestamp();
  addLog(application, 'skipped', reason);
}

export interface QuestionInput {
  question_text: string;
  field_name?: string;
  kind?: QuestionKind;
  required?: boolean;
  options?: string[];
  answer?: string | null;
  answered_by?: AnsweredBy | null;
  needs_review?: boolean;
  review_reason?: string;
}

export function addQuestion(application: Application, input: QuestionInput): ApplicationQuestion {
  const question: ApplicationQuestion = {
    question_text: input.question_text,
    field_name: input.field_name ?? '',
    kind: input.kind ?? 'text',
    required: input.required ?? false,
    options: input.options ?? [],
    answer: input.answer ?? null,
    answered_by: input.answered_by ?? null,
    needs_review: input.needs_review ?? false,
    review_reason: input.review_reason ?? '',
  };
  application.questions.push(question);
  return question;
}

export function answerQuestion(question: ApplicationQuestion, answer: string, answeredBy: AnsweredBy): void {
  question.answer = answer;
  question.answered_by = answeredBy;
  if (answeredBy === 'human') {
    question.needs_review = false;
    question.review_reason = '';
  }
}

export function getQuestionsNeedingReview(application: Application): ApplicationQuestion[] {
  return application.questions.filter(q => q.needs_review);
}

export function canRetry(application: Application): boolean {
  return application.retry_count < application.max_retries;
}

/**
 * Count an internal retry of a flaky step. False once the budget is spent.
 */
export function recordRetry(application: Application, step: string): boolean {
  if (!canRetry(application)) return false;
  application.retry_count++;
  addLog(application, 'retry', `${step} (attempt ${application.retry_count + 1})`);
  return true;
}

export default {
  createApplication,
  isTerminal,
  addLog,
  startApplication,
  completeApplication,
  failApplication,
  requestReview,
  skipApplication,
  addQuestion,
  answerQuestion,
  getQuestionsNeedingReview,
  canRetry,
  recordRetry,
};
