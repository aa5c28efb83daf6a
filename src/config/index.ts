/**
 * Configuration loader module
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ATSMappingsSchema, CandidateProfileSchema, FormQuestionsSchema, SettingsSchema } from '../types';
import type { ATSMappings, CandidateProfile, FormQuestions, Settings } from '../types';

export const CONFIG_DIR = path.resolve(__dirname, '../../config');
export const PROJECT_ROOT = path.resolve(__dirname, '../..');

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw value against a schema, naming its source in the error
 */
function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, source: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid ${source}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load and parse a JSON configuration file
 */
function loadJsonConfig(filename: string, configDir: string): unknown {
  const filePath = path.join(configDir, filename);

  if (!fs.existsSync(filePath)) {
    throw new Error(`Configuration file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Fill raw settings from the defaults. Unknown keys are dropped, mistyped values are rejected.
 */
export function parseSettings(raw: unknown): Settings {
  return parseWith(SettingsSchema, raw ?? {}, 'settings');
}

const TRUE_FLAGS = ['1', 'true', 'yes', 'on'] as const;
const FALSE_FLAGS = ['0', 'false', 'no', 'off'] as const;

const envFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum([...TRUE_FLAGS, ...FALSE_FLAGS]))
  .transform(flag => TRUE_FLAGS.some(value => value === flag));

// An empty variable, as a copied .env.example leaves it, counts as unset
function optionalVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema.optional());
}

const envSchema = z.object({
  REVIEW_MODE: optionalVar(envFlag),
  HEADLESS: optionalVar(envFlag),
  MAX_APPLICATIONS_PER_RUN: optionalVar(z.coerce.number().int().positive()),
  NTFY_TOPIC: optionalVar(z.string()),
  DISCORD_WEBHOOK_URL: optionalVar(z.string().url()),
  JOB_STORE_PATH: optionalVar(z.string()),
  OPENAI_API_KEY: optionalVar(z.string()),
  HUGGINGFACE_API_KEY: optionalVar(z.string()),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(env: NodeJS.ProcessEnv): Env {
  return parseWith(envSchema, env, 'environment');
}

/**
 * Apply environment overrides on top of file settings
 */
export function applyEnvOverrides(settings: Settings, env: NodeJS.ProcessEnv): Settings {
  const vars = parseEnv(env);

  return {
    ...settings,
    browser: {
      ...settings.browser,
      headless: vars.HEADLESS ?? settings.browser.headless,
    },
    application: {
      ...settings.application,
      reviewMode: vars.REVIEW_MODE ?? settings.application.reviewMode,
      maxPerRun: vars.MAX_APPLICATIONS_PER_RUN ?? settings.application.maxPerRun,
    },
    notifications: {
      ...settings.notifications,
      ntfyTopic: vars.NTFY_TOPIC ?? settings.notifications.ntfyTopic,
      discordWebhookUrl: vars.DISCORD_WEBHOOK_URL ?? settings.notifications.discordWebhookUrl,
    },
    store: {
      path: vars.JOB_STORE_PATH ?? settings.store.path,
    },
  };
}

/**
 * Load application settings
 */
export function loadSettings(configDir: string = CONFIG_DIR, env: NodeJS.ProcessEnv = process.env): Settings {
  return applyEnvOverrides(parseSettings(loadJsonConfig('settings.json', configDir)), env);
}

export interface Credentials {
  openaiApiKey: string | null;
  huggingfaceApiKey: string | null;
}

const credentialsSchema = envSchema.pick({ OPENAI_API_KEY: true, HUGGINGFACE_API_KEY: true });

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const vars = parseWith(credentialsSchema, env, 'environment');
  return {
    openaiApiKey: vars.OPENAI_API_KEY ?? null,
    huggingfaceApiKey: vars.HUGGINGFACE_API_KEY ?? null,
  };
}

export function parseCandidateProfile(raw: unknown): CandidateProfile {
  return parseWith(CandidateProfileSchema, raw ?? {}, 'candidate profile');
}

/**
 * Load candidate profile configuration
 */
export function loadCandidateProfile(configDir: string = CONFIG_DIR): CandidateProfile {
  return parseCandidateProfile(loadJsonConfig('candidate-profile.json', configDir));
}

export function parseATSMappings(raw: unknown): ATSMappings {
  return parseWith(ATSMappingsSchema, raw ?? {}, 'ATS mappings');
}

/**
 * Load ATS mappings configuration
 */
export function loadATSMappings(configDir: string = CONFIG_DIR): ATSMappings {
  return parseATSMappings(loadJsonConfig('ats-mappings.json', configDir));
}

export function parseFormQuestions(raw: unknown): FormQuestions {
  return parseWith(FormQuestionsSchema, raw ?? {}, 'form questions');
}

/**
 * Load question patterns used to answer form fields
 */
export function loadFormQuestions(configDir: string = CONFIG_DIR): FormQuestions {
  return parseFormQuestions(loadJsonConfig('form-questions.json', configDir));
}

/**
 * Get the absolute path to the resume file
 */
export function getResumePath(profile: CandidateProfile, root: string = PROJECT_ROOT): string | null {
  if (!profile.resume?.file_path) {
    return null;
  }

  const resumePath = path.isAbsolute(profile.resume.file_path)
    ? profile.resume.file_path
    : path.resolve(root, profile.resume.file_path);

  return fs.existsSync(resumePath) ? resumePath : null;
}

/**
 * Validate candidate profile has required fields
 */
export function validateCandidateProfile(profile: CandidateProfile): string[] {
  const errors: string[] = [];

  if (!profile.personal.first_name) errors.push('First name is required');
  if (!profile.personal.last_name) errors.push('Last name is required');
  if (!profile.personal.email) errors.push('Email is required');
  if (!profile.personal.phone) errors.push('Phone is required');

  if (profile.education.length === 0) {
    errors.push('At least one education entry is required');
  }

  return errors;
}

export default {
  loadCandidateProfile,
  loadATSMappings,
  loadFormQuestions,
  loadSettings,
  loadCredentials,
  getResumePath,
  validateCandidateProfile,
};
