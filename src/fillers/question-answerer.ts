/**
 * Question answering for form fields
 *
 * Answers come from the candidate profile first. Free-text questions go to the
 * text generator, and anything left unanswered that the form requires is
 * flagged for a human.
 */

import { getLogger } from '../log/logger';
import type { Logger } from '../log/logger';
import type {
  AnsweredBy,
  CandidateProfile,
  FormQuestions,
  Job,
  LLMSettings,
  OpenEndedPattern,
  QuestionKind,
  TextGenerator,
} from '../types';

const DEFAULT_FREE_TEXT_LENGTH = 1000;
const SHORT_TEXT_LENGTH = 200;

const CONSENT_PATTERNS = ['agree', 'acknowledge', 'consent', 'certify', 'confirm that'];

export interface Question {
  text: string;
  kind: QuestionKind;
  required: boolean;
  options: string[];
}

export interface Answer {
  value: string | null;
  answeredBy: AnsweredBy | null;
  needsReview: boolean;
  reviewReason: string;
}

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

/**
 * Flatten the profile into the keys the question patterns refer to
 */
export function profileValues(profile: CandidateProfile): Record<string, string> {
  const { personal, links, compliance } = profile;
  const education = profile.education[0];
  const work = profile.work_experience[0];
  const address = personal.address;

  const values: Record<string, string> = {
    first_name: personal.first_name,
    last_name: personal.last_name,
    full_name: `${personal.first_name} ${personal.last_name}`.trim(),
    email: personal.email,
    phone: personal.phone,
    location: personal.location,
    linkedin: links.linkedin,
    github: links.github,
    website: links.portfolio || links.github,
    start_date: personal.start_date ?? '',
    salary_expectation: personal.salary_expectation ?? '',
    current_company: work?.company ?? '',
    current_title: work?.title ?? '',
    school: education?.school ?? '',
    degree: education?.degree ?? '',
    discipline: education?.field ?? '',
    graduation: education?.graduation ?? '',
    gpa: education?.gpa ?? '',
    street: address?.street ?? '',
    city: address?.city ?? '',
    state: address?.state ?? '',
    zip: address?.zip ?? '',
    country: address?.country ?? '',
  };

  if (compliance) {
    values.sponsorship = yesNo(compliance.require_sponsorship);
    values.authorized = yesNo(compliance.authorized_to_work);
    values.veteran_status = compliance.veteran_status;
    values.disability_status = compliance.disability_status;
    values.gender = compliance.gender ?? '';
    values.race_ethnicity = compliance.race_ethnicity ?? '';
  }

  return values;
}

/**
 * Check if label matches any pattern. Patterns are case-insensitive regular expressions.
 */
export function matchesPattern(label: string, patterns: string[]): boolean {
  return patterns.some(pattern => {
    try {
      return new RegExp(pattern, 'i').test(label);
    } catch {
      return label.toLowerCase().includes(pattern.toLowerCase());
    }
  });
}

/**
 * Find the option that best represents a value: exact text, then prefix, then containment
 */
export function findMatchingOption(options: string[], value: string): string | null {
  const target = value.trim().toLowerCase();
  if (!target) return null;

  const candidates = options.filter(option => option.trim() !== '');
  const lower = (option: string) => option.trim().toLowerCase();

  return (
    candidates.find(option => lower(option) === target) ??
    candidates.find(option => lower(option).startsWith(target)) ??
    candidates.find(option => lower(option).includes(target) || target.includes(lower(option))) ??
    null
  );
}

function answered(value: string, answeredBy: AnsweredBy): Answer {
  return { value, answeredBy, needsReview: false, reviewReason: '' };
}

function unanswered(question: Question, reason: string): Answer {
  return { value: null, answeredBy: null, needsReview: question.required, reviewReason: question.required ? reason : '' };
}

export interface QuestionAnswererOptions {
  generator: TextGenerator | null;
  llm: LLMSettings;
  logger?: Logger;
}

export class QuestionAnswerer {
  private readonly values: Record<string, string>;
  private readonly generator: TextGenerator | null;
  private readonly llm: LLMSettings;
  private readonly logger: Logger;

  constructor(
    private readonly profile: CandidateProfile,
    private readonly questions: FormQuestions,
    options: QuestionAnswererOptions
  ) {
    this.values = profileValues(profile);
    this.generator = options.generator;
    this.llm = options.llm;
    this.logger = options.logger ?? getLogger();
  }

  valueFor(key: string): string | null {
    return this.values[key] || null;
  }

  /**
   * Profile value for a label, or null when no pattern claims it
   */
  lookup(label: string): string | null {
    for (const field of this.questions.profileFields) {
      if (matchesPattern(label, field.patterns)) {
        const value = this.values[field.key];
        return value ? value : null;
      }
    }
    return null;
  }

  private reviewPattern(text: string): string | null {
    const lower = text.toLowerCase();
    return this.llm.alwaysReviewQuestions.find(pattern => lower.includes(pattern.toLowerCase())) ?? null;
  }

  private openEnded(text: string): OpenEndedPattern | null {
    return this.questions.openEnded.find(entry => matchesPattern(text, entry.patterns)) ?? null;
  }

  async answer(question: Question, job: Job): Promise<Answer> {
    if (question.kind === 'file') {
      return unanswered(question, 'File upload needs a human');
    }

    const reviewPattern = this.reviewPattern(question.text);
    if (reviewPattern) {
      const draft = await this.draft(question, job, DEFAULT_FREE_TEXT_LENGTH);
      this.logger.debug(`[Answers] "${question.text}" is always reviewed`);
      return {
        value: draft,
        answeredBy: draft ? 'llm' : null,
        needsReview: true,
        reviewReason: `Always reviewed: ${reviewPattern}`,
      };
    }

    const profileValue = this.lookup(question.text);
    if (profileValue) {
      return this.fromProfile(question, profileValue);
    }

    if (question.kind === 'checkbox') {
      if (matchesPattern(question.text, CONSENT_PATTERNS)) {
        return answered('Yes', 'auto');
      }
      return unanswered(question, 'No profile answer for checkbox');
    }

    if (question.kind === 'select' || question.kind === 'radio') {
      return unanswered(question, 'No profile answer matches the options');
    }

    const openEnded = this.openEnded(question.text);
    const maxLength = openEnded?.maxLength ?? (question.kind === 'textarea' ? DEFAULT_FREE_TEXT_LENGTH : SHORT_TEXT_LENGTH);
    if (!openEnded && question.kind === 'text' && !question.required) {
      return unanswered(question, '');
    }

    const draft = await this.draft(question, job, maxLength);
    if (draft) {
      return answered(draft, 'llm');
    }
    return unanswered(question, this.generator ? 'Text generator returned no answer' : 'No text generator configured');
  }

  private fromProfile(question: Question, value: string): Answer {
    if (question.kind === 'checkbox') {
      return answered(value === 'No' ? 'No' : 'Yes', 'auto');
    }

    if (question.kind === 'select' || question.kind === 'radio') {
      const option = findMatchingOption(question.options, value);
      if (!option) {
        return unanswered(question, `No option matches "${value}"`);
      }
      return answered(option, 'auto');
    }

    return answered(value, 'auto');
  }

  buildPrompt(question: Question, job: Job, maxLength: number): string {
    const { personal } = this.profile;
    const education = this.profile.education
      .map(e => `${e.degree} in ${e.field}, ${e.school} (${e.graduation})`)
      .join('; ');
    const experience = this.profile.work_experience
      .map(w => `${w.title} at ${w.company} (${w.start_date} - ${w.end_date})`)
      .join('; ');

    const context = [
      `Position: ${job.title} at ${job.company}`,
      `Applicant: ${personal.first_name} ${personal.last_name}, ${personal.location}`,
      education ? `Education: ${education}` : '',
      experience ? `Experience: ${experience}` : '',
      this.profile.skills.length > 0 ? `Skills: ${this.profile.skills.join(', ')}` : '',
      this.profile.summary ? `Summary: ${this.profile.summary}` : '',
    ];
    const ask = [
      `Question: ${question.text}`,
      question.options.length > 0 ? `Choose one of: ${question.options.join(' | ')}` : '',
      `Keep the answer under ${maxLength} characters.`,
    ];
    const nonEmpty = (line: string) => line !== '';
    return `${context.filter(nonEmpty).join('\n')}\n\n${ask.filter(nonEmpty).join('\n')}`;
  }

  private async draft(question: Question, job: Job, maxLength: number): Promise<string | null> {
    if (!this.generator) return null;

    const prompt = this.buildPrompt(question, job, maxLength);
    const text = await this.generator.generate(prompt, this.llm.maxTokens, this.llm.temperature);
    if (!text) return null;
    return text.trim().slice(0, maxLength);
  }
}

export default {
  QuestionAnswerer,
  profileValues,
  matchesPattern,
  findMatchingOption,
};
