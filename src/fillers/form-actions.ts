/**
 * Form actions shared by the filling strategies
 */

import { addLog, addQuestion, getQuestionsNeedingReview } from '../core/application';
import { detectCaptcha, waitForCaptchaCleared } from '../checkpoints/checkpoint-handler';
import type { Logger } from '../log/logger';
import type { Answer, Question, QuestionAnswerer } from './question-answerer';
import type {
  Application,
  ATSMappings,
  AutomationPage,
  FormField,
  Job,
  RunControl,
} from '../types';

/**
 * Everything a strategy needs beyond the page and the job
 */
export interface FillerContext {
  answerer: QuestionAnswerer;
  mappings: ATSMappings;
  resumePath: string | null;
  /** Fill but stop short of the final submit */
  reviewMode: boolean;
  headless: boolean;
  humanWaitTimeoutMs: number;
  settleTimeoutMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const RESUME_LABEL = /resume|cv\b|curriculum/i;

/**
 * Record why a strategy gave up and report failure
 */
export function noteFailure(application: Application, reason: string): false {
  application.error_message = reason;
  addLog(application, 'fill_failed', reason);
  return false;
}

/**
 * Fill the first selector that accepts the value
 */
export async function fillFirst(page: AutomationPage, selectors: string[], value: string): Promise<string | null> {
  for (const selector of selectors) {
    if (await page.fill(selector, value)) {
      return selector;
    }
  }
  return null;
}

export async function clickFirst(page: AutomationPage, selectors: string[]): Promise<string | null> {
  for (const selector of selectors) {
    if ((await page.isVisible(selector)) && (await page.click(selector))) {
      return selector;
    }
  }
  return null;
}

export async function uploadResume(
  page: AutomationPage,
  selectors: string[],
  application: Application,
  ctx: FillerContext
): Promise<boolean> {
  if (application.resume_uploaded) return true;
  if (!ctx.resumePath) {
    ctx.logger.warn('[Filler] No resume file configured, skipping upload');
    return false;
  }

  for (const selector of selectors) {
    if (await page.setInputFiles(selector, ctx.resumePath)) {
      application.resume_uploaded = true;
      addLog(application, 'resume_uploaded', selector);
      ctx.logger.info('Resume uploaded');
      return true;
    }
  }
  return false;
}

/**
 * Detect if the page shows a submission confirmation
 */
export async function isSubmissionConfirmed(
  page: AutomationPage,
  mappings: Pick<ATSMappings, 'successPhrases' | 'successUrlParts'>
): Promise<boolean> {
  const url = page.url().toLowerCase();
  if (mappings.successUrlParts.some(part => url.includes(part.toLowerCase()))) {
    return true;
  }

  const text = (await page.bodyText()).toLowerCase();
  return mappings.successPhrases.some(phrase => text.includes(phrase.toLowerCase()));
}

export function shouldHoldSubmit(application: Application, ctx: FillerContext): boolean {
  return ctx.reviewMode || getQuestionsNeedingReview(application).length > 0;
}

/**
 * Clear any CAPTCHA before submitting. Headless runs cannot be helped by a person.
 */
export async function passCaptcha(
  page: AutomationPage,
  application: Application,
  ctx: FillerContext,
  control: RunControl
): Promise<boolean> {
  if (!(await detectCaptcha(page, ctx.mappings))) return true;

  if (ctx.headless) {
    return noteFailure(application, 'CAPTCHA detected in headless mode');
  }

  addLog(application, 'captcha', 'Waiting for a person to solve the CAPTCHA');
  const result = await waitForCaptchaCleared(page, ctx.mappings, control, {
    timeoutMs: ctx.humanWaitTimeoutMs,
    sleep: ctx.sleep,
  });

  switch (result.kind) {
    case 'ready':
      addLog(application, 'captcha_cleared');
      return true;
    case 'timeout':
      return noteFailure(application, 'CAPTCHA was not solved in time');
    case 'cancelled':
      return false;
  }
}

function isEmpty(field: FormField): boolean {
  if (field.kind === 'checkbox' || field.kind === 'radio') {
    return field.currentValue !== 'true';
  }
  return field.currentValue.trim() === '';
}

function humanize(name: string): string {
  return name.replace(/[_\-[\]]+/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Radio inputs arrive one per option; fold them into one question per group name
 */
interface RadioGroup {
  question: Question;
  name: string;
  choices: FormField[];
}

function groupRadios(fields: FormField[]): RadioGroup[] {
  const groups = new Map<string, RadioGroup>();
  for (const field of fields) {
    if (field.kind !== 'radio') continue;
    const key = field.name || field.selector;
    const group = groups.get(key) ?? {
      name: key,
      choices: [],
      question: { text: humanize(key), kind: 'radio', required: false, options: [] },
    };
    group.choices.push(field);
    group.question.options.push(field.label);
    group.question.required = group.question.required || field.required;
    groups.set(key, group);
  }
  return [...groups.values()].filter(group => group.choices.every(isEmpty));
}

async function applyAnswer(page: AutomationPage, field: FormField, value: string): Promise<boolean> {
  switch (field.kind) {
    case 'select':
      return page.selectOption(field.selector, value);
    case 'checkbox':
      return value === 'Yes' ? page.check(field.selector) : true;
    case 'file':
      return false;
    default:
      return page.fill(field.selector, value);
  }
}

function record(application: Application, question: Question, fieldName: string, answer: Answer, applied: boolean): void {
  const notEntered = question.required && answer.value !== null && !applied;
  addQuestion(application, {
    question_text: question.text,
    field_name: fieldName,
    kind: question.kind,
    required: question.required,
    options: question.options,
    answer: answer.value,
    answered_by: answer.answeredBy,
    needs_review: answer.needsReview || notEntered,
    review_reason: answer.needsReview ? answer.reviewReason : notEntered ? 'Answer could not be entered' : '',
  });
}

/**
 * Answer every empty visible field and record each as an application question.
 * Returns the number of fields filled.
 */
export async function answerVisibleFields(
  page: AutomationPage,
  job: Job,
  application: Application,
  ctx: FillerContext,
  control: RunControl
): Promise<number> {
  const fields = await page.extractFields();
  let filled = 0;

  const fileFields = fields.filter(field => field.kind === 'file');
  const resumeField = fileFields.find(field => RESUME_LABEL.test(`${field.label} ${field.name}`)) ?? fileFields[0];
  if (resumeField) {
    await uploadResume(page, [resumeField.selector], application, ctx);
  }

  for (const field of fields) {
    if (control.isCancelled()) return filled;
    if (field.kind === 'file' || field.kind === 'radio' || !isEmpty(field) || !field.label) continue;

    const question: Question = { text: field.label, kind: field.kind, required: field.required, options: field.options };
    const answer = await ctx.answerer.answer(question, job);
    const applied = answer.value !== null && (await applyAnswer(page, field, answer.value));
    if (applied) filled++;

    if (answer.value !== null || answer.needsReview) {
      record(application, question, field.name, answer, applied);
    }
  }

  for (const group of groupRadios(fields)) {
    if (control.isCancelled()) return filled;

    const answer = await ctx.answerer.answer(group.question, job);
    const choice = answer.value === null ? undefined : group.choices.find(c => c.label === answer.value);
    const applied = choice !== undefined && (await page.check(choice.selector));
    if (applied) filled++;

    if (answer.value !== null || answer.needsReview) {
      record(application, group.question, group.name, answer, applied);
    }
  }

  ctx.logger.debug(`[Filler] Filled ${filled} of ${fields.length} visible fields`);
  return filled;
}

export default {
  answerVisibleFields,
  clickFirst,
  fillFirst,
  isSubmissionConfirmed,
  noteFailure,
  passCaptcha,
  shouldHoldSubmit,
  uploadResume,
};
