/**
 * Core type definitions for the application orchestrator
 *
 * Shapes read from JSON files are declared as zod schemas and their types inferred.
 */

import { z } from 'zod';

// Candidate Profile Types
export const AddressSchema = z.object({
  street: z.string().default(''),
  city: z.string().default(''),
  state: z.string().default(''),
  zip: z.string().default(''),
  country: z.string().default(''),
});

export const PersonalInfoSchema = z.object({
  first_name: z.string().default(''),
  last_name: z.string().default(''),
  email: z.string().default(''),
  phone: z.string().default(''),
  location: z.string().default(''),
  address: AddressSchema.optional(),
  start_date: z.string().optional(),
  salary_expectation: z.string().optional(),
});

export const EducationSchema = z.object({
  school: z.string().default(''),
  degree: z.string().default(''),
  field: z.string().default(''),
  graduation: z.string().default(''), // YYYY-MM
  gpa: z.string().optional(),
});

export const WorkExperienceSchema = z.object({
  company: z.string().default(''),
  title: z.string().default(''),
  start_date: z.string().default(''),
  end_date: z.string().default(''), // YYYY-MM or "Present"
  description: z.array(z.string()).default([]),
});

export const ComplianceInfoSchema = z.object({
  require_sponsorship: z.boolean().default(false),
  authorized_to_work: z.boolean().default(true),
  veteran_status: z.string().default(''),
  disability_status: z.string().default(''),
  gender: z.string().optional(),
  race_ethnicity: z.string().optional(),
});

export const ResumeAssetSchema = z.object({
  file_path: z.string(),
  file_name: z.string().default(''),
  mime: z.string().default('application/pdf'),
});

export const CandidateProfileSchema = z.object({
  personal: PersonalInfoSchema.default({}),
  education: z.array(EducationSchema).default([]),
  work_experience: z.array(WorkExperienceSchema).default([]),
  skills: z.array(z.string()).default([]),
  links: z
    .object({
      github: z.string().default(''),
      linkedin: z.string().default(''),
      portfolio: z.string().optional(),
    })
    .default({}),
  compliance: ComplianceInfoSchema.optional(),
  resume: ResumeAssetSchema.optional(),
  summary: z.string().optional(),
});

export type Address = z.infer<typeof AddressSchema>;
export type PersonalInfo = z.infer<typeof PersonalInfoSchema>;
export type Education = z.infer<typeof EducationSchema>;
export type WorkExperience = z.infer<typeof WorkExperienceSchema>;
export type ComplianceInfo = z.infer<typeof ComplianceInfoSchema>;
export type ResumeAsset = z.infer<typeof ResumeAssetSchema>;
export type CandidateProfile = z.infer<typeof CandidateProfileSchema>;
export type Links = CandidateProfile['links'];

// ATS Types
export const ATS_TYPES = [
  'workday',
  'ashby',
  'greenhouse',
  'lever',
  'oracle',
  'adp',
  'icims',
  'taleo',
  'jobvite',
  'smartrecruiters',
  'builtin',
  'redirector',
  'custom',
  'unknown',
] as const;

export type ATSType = (typeof ATS_TYPES)[number];

/** Tags for aggregator pages that only link onward to the real form */
export const LANDING_PAGE_TYPES: readonly ATSType[] = ['builtin', 'redirector'];

export interface Classification {
  ats: ATSType;
  confidence: number;
}

function platformKey(table: string) {
  return z.enum(ATS_TYPES, { errorMap: () => ({ message: `Unknown platform in ${table}` }) });
}

const selectorList = z.array(z.string()).default([]);

export const ATSFormConfigSchema = z.object({
  name: z.string().default(''),
  /** Selectors whose presence confirms the vendor's form is on the page */
  formMarkers: selectorList,
  resumeSelectors: selectorList,
  fieldMappings: z.record(z.string(), z.array(z.string())).default({}),
  submitSelectors: selectorList,
});

// Key order in a pattern table is its priority order
const PatternTableSchema = z.record(platformKey('pattern table'), z.array(z.string())).default({});

export const ATSMappingsSchema = z.object({
  urlPatterns: PatternTableSchema,
  contentPatterns: PatternTableSchema,
  forms: z.record(platformKey('form table'), ATSFormConfigSchema).default({}),
  applySelectors: selectorList,
  captchaSelectors: selectorList,
  captchaPhrases: selectorList,
  successPhrases: selectorList,
  successUrlParts: selectorList,
});

export type ATSFormConfig = z.infer<typeof ATSFormConfigSchema>;
export type ATSMappings = z.infer<typeof ATSMappingsSchema>;

// Question Pattern Types
export const ProfileFieldPatternSchema = z.object({
  /** Key into the candidate's flattened profile values */
  key: z.string().min(1),
  patterns: z.array(z.string()).default([]),
});

export const OpenEndedPatternSchema = ProfileFieldPatternSchema.extend({
  maxLength: z.number().int().positive().default(1000),
});

export const FormQuestionsSchema = z.object({
  profileFields: z.array(ProfileFieldPatternSchema).default([]),
  openEnded: z.array(OpenEndedPatternSchema).default([]),
});

export type ProfileFieldPattern = z.infer<typeof ProfileFieldPatternSchema>;
export type OpenEndedPattern = z.infer<typeof OpenEndedPatternSchema>;
export type FormQuestions = z.infer<typeof FormQuestionsSchema>;


// Job Types
export const JOB_STATUSES = [
  'new',
  'queued',
  'in_progress',
  'applied',
  'skipped',
  'failed',
  'needs_review',
  'expired',
  'rejected',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const JOB_SOURCES = ['github', 'manual', 'other'] as const;

export type JobSource = (typeof JOB_SOURCES)[number];

export interface Job {
  id: string;
  title: string;
  company: string;
  location: string;
  url: string;
  apply_url?: string;
  description?: string;
  source: JobSource;
  ats: ATSType;
  status: JobStatus;
  discovered_at: string;
  applied_at: string | null; // set exactly when status is 'applied'
  tags: string[];
}

/** A posting as produced by discovery, before the store assigns identity and status */
export interface DiscoveredJob {
  title: string;
  company: string;
  location: string;
  url: string;
  apply_url?: string;
  source: JobSource;
  date_posted?: string;
}

// Application Types
export const APPLICATION_STATUSES = ['pending', 'in_progress', 'needs_review', 'submitted', 'failed', 'skipped'] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export const QUESTION_KINDS = ['text', 'select', 'radio', 'checkbox', 'file', 'textarea'] as const;

export type QuestionKind = (typeof QUESTION_KINDS)[number];

export const ANSWERED_BY = ['auto', 'llm', 'human'] as const;

export type AnsweredBy = (typeof ANSWERED_BY)[number];

export interface ApplicationQuestion {
  question_text: string;
  field_name: string;
  kind: QuestionKind;
  required: boolean;
  options: string[];
  answer: string | null;
  answered_by: AnsweredBy | null;
  needs_review: boolean;
  review_reason: string;
}

export interface ApplicationLog {
  timestamp: string;
  action: string;
  details: string;
  screenshot_path?: string;
}

export interface Application {
  id: string;
  job_id: string;
  job_title: string;
  company: string;
  job_url: string;
  ats: ATSType;
  status: ApplicationStatus;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  logs: ApplicationLog[];
  questions: ApplicationQuestion[];
  error_message: string | null;
  retry_count: number;
  max_retries: number;
  resume_uploaded: boolean;
  screenshots: string[];
}

// Outcome Types
export type ApplyOutcome =
  | { kind: 'submitted'; jobId: string; applicationId: string }
  | { kind: 'needs_review'; jobId: string; applicationId: string; reason: string }
  | { kind: 'failed'; jobId: string; applicationId: string; error: string }
  | { kind: 'expired'; jobId: string; applicationId: string; reason: string }
  | { kind: 'cancelled'; jobId: string };

export type ProcessResult = ApplyOutcome | { kind: 'already_running'; jobId: string };

export interface SessionStats {
  jobsProcessed: number;
  submitted: number;
  needsReview: number;
  failed: number;
  expired: number;
  cancelled: number;
  alreadyRunning: number;
  candidates: number;
  durationMs: number;
}

// Settings Types
export const BrowserSettingsSchema = z.object({
  headless: z.boolean().default(true),
  slowMo: z.number().nonnegative().default(50),
  timeout: z.number().int().positive().default(30000),
  navigationTimeout: z.number().int().positive().default(30000),
  viewport: z
    .object({
      width: z.number().int().positive().default(1280),
      height: z.number().int().positive().default(900),
    })
    .default({}),
});

export const JobSourceSettingsSchema = z.object({
  repository: z.string().default('SimplifyJobs/New-Grad-Positions'),
  branch: z.string().default('dev'),
  readmePath: z.string().default('README.md'),
});

export const ApplicationSettingsSchema = z.object({
  reviewMode: z.boolean().default(true),
  maxPerRun: z.number().int().positive().default(10),
  overfetchFactor: z.number().int().positive().default(5),
  delay: z
    .object({
      min: z.number().nonnegative().default(30), // seconds
      max: z.number().nonnegative().default(120),
    })
    .refine(delay => delay.min <= delay.max, { message: 'min must not exceed max' })
    .default({}),
  maxRetries: z.number().int().nonnegative().default(3),
  saveScreenshots: z.boolean().default(true),
  screenshotsDir: z.string().default('./logs/screenshots'),
  humanWaitTimeoutMs: z.number().int().positive().default(300000),
});

export const LLM_PROVIDERS = ['openai', 'huggingface'] as const;

export const LLMSettingsSchema = z.object({
  provider: z.enum(LLM_PROVIDERS).default('openai'),
  model: z.string().default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(300),
  alwaysReviewQuestions: z.array(z.string()).default([]),
});

export const NotificationSettingsSchema = z.object({
  ntfyTopic: z.string().default(''),
  discordWebhookUrl: z.string().default(''),
  events: z
    .object({
      needsReview: z.boolean().default(true),
      completed: z.boolean().default(true),
      failed: z.boolean().default(true),
      summary: z.boolean().default(true),
    })
    .default({}),
});

export const StoreSettingsSchema = z.object({
  path: z.string().default('./data/jobs.json'),
});

export const LoggingSettingsSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  outputDir: z.string().default('./logs'),
});

export const SettingsSchema = z.object({
  browser: BrowserSettingsSchema.default({}),
  jobSource: JobSourceSettingsSchema.default({}),
  application: ApplicationSettingsSchema.default({}),
  llm: LLMSettingsSchema.default({}),
  notifications: NotificationSettingsSchema.default({}),
  store: StoreSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});

export type BrowserSettings = z.infer<typeof BrowserSettingsSchema>;
export type JobSourceSettings = z.infer<typeof JobSourceSettingsSchema>;
export type ApplicationSettings = z.infer<typeof ApplicationSettingsSchema>;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];
export type LLMSettings = z.infer<typeof LLMSettingsSchema>;
export type NotificationSettings = z.infer<typeof NotificationSettingsSchema>;
export type StoreSettings = z.infer<typeof StoreSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;


// Form Field Types
export interface FormField {
  selector: string;
  kind: QuestionKind;
  label: string;
  name: string;
  required: boolean;
  currentValue: string;
  options: string[];
}

/** A visible clickable element, addressable by a selector unique to the current page */
export interface ClickTarget {
  selector: string;
  text: string;
}

// Browser Capability Types
export interface AutomationPage {
  url(): string;
  title(): Promise<string>;
  content(): Promise<string>;
  bodyText(): Promise<string>;
  isVisible(selector: string): Promise<boolean>;
  click(selector: string): Promise<boolean>;
  fill(selector: string, value: string): Promise<boolean>;
  selectOption(selector: string, label: string): Promise<boolean>;
  check(selector: string): Promise<boolean>;
  setInputFiles(selector: string, filePath: string): Promise<boolean>;
  visibleTexts(selector: string): Promise<ClickTarget[]>;
  extractFields(): Promise<FormField[]>;
  /** Resolves false when the page did not settle within the timeout */
  waitForLoad(timeoutMs?: number): Promise<boolean>;
  /** Runs the action and returns the tab it opened, or null when it navigated in place */
  waitForPopup(action: () => Promise<unknown>, timeoutMs: number): Promise<AutomationPage | null>;
  bringToFront(): Promise<void>;
  screenshot(filePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface OpenedPage {
  page: AutomationPage;
  status: number | null;
}

export interface BrowserSession {
  open(url: string, timeoutMs: number): Promise<OpenedPage>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  newSession(): Promise<BrowserSession>;
  shutdown(): Promise<void>;
}

// Filling Strategy Types
export interface RunControl {
  isCancelled(): boolean;
}

export interface FormFiller {
  readonly name: string;
  canHandle(page: AutomationPage): Promise<boolean>;
  fill(page: AutomationPage, job: Job, application: Application, control: RunControl): Promise<boolean>;
}

export interface TextGenerator {
  generate(prompt: string, maxTokens: number, temperature: number): Promise<string | null>;
}

// Store Types
export interface AddJobResult {
  id: string;
  created: boolean;
}

export interface JobStore {
  listActionable(limit: number): Promise<Job[]>;
  listJobs(status?: JobStatus): Promise<Job[]>;
  getJob(id: string): Promise<Job | null>;
  addJob(job: DiscoveredJob): Promise<AddJobResult>;
  updateJobStatus(id: string, status: JobStatus): Promise<void>;
  updateJobPlatform(id: string, ats: ATSType): Promise<void>;
  getApplication(id: string): Promise<Application | null>;
  listApplications(jobId?: string): Promise<Application[]>;
  addApplication(application: Application): Promise<void>;
  updateApplication(application: Application): Promise<void>;
  discardApplication(id: string): Promise<void>;
}

export interface DiscoveryResult {
  found: number;
  new: number;
}

export interface JobSourceProvider {
  discover(): Promise<DiscoveryResult>;
}
