/**
 * Schemas for persisted job and application records
 *
 * Rows that cannot be read are dropped and unknown enum values fall back to
 * their defaults, so one bad record never takes the whole store down.
 */

import { z } from 'zod';
import {
  ANSWERED_BY,
  APPLICATION_STATUSES,
  ATS_TYPES,
  JOB_SOURCES,
  JOB_STATUSES,
  QUESTION_KINDS,
} from '../types';
import type { Application, ApplicationLog, ApplicationQuestion, Job } from '../types';

const text = z.string().catch('');
const nullableText = z.string().nullable().catch(null);
const optionalText = z.string().min(1).optional().catch(undefined);
const textList = z.array(z.string()).catch([]);
const flag = z.boolean().catch(false);

/**
 * An array whose unreadable entries are skipped
 */
function validRows<T>(row: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z
    .array(z.unknown())
    .catch([])
    .transform(values =>
      values.flatMap(value => {
        const parsed = row.safeParse(value);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

const JobRecordSchema = z
  .object({
    id: z.string().min(1),
    title: text,
    company: text,
    location: text,
    url: z.string().min(1),
    apply_url: optionalText,
    description: optionalText,
    source: z.enum(JOB_SOURCES).catch('other'),
    ats: z.enum(ATS_TYPES).catch('unknown'),
    status: z.enum(JOB_STATUSES).catch('new'),
    discovered_at: text,
    applied_at: nullableText,
    tags: textList,
  })
  .transform(
    (job): Job => ({
      ...job,
      // applied_at is set exactly when the status is applied
      applied_at: job.status === 'applied' ? job.applied_at ?? job.discovered_at : null,
    })
  );

const ApplicationLogRecordSchema = z.object({
  timestamp: text,
  action: text,
  details: text,
  screenshot_path: optionalText,
}) satisfies z.ZodType<ApplicationLog, z.ZodTypeDef, unknown>;

const ApplicationQuestionRecordSchema = z.object({
  question_text: text,
  field_name: text,
  kind: z.enum(QUESTION_KINDS).catch('text'),
  required: flag,
  options: textList,
  answer: nullableText,
  answered_by: z.enum(ANSWERED_BY).nullable().catch(null),
  needs_review: flag,
  review_reason: text,
}) satisfies z.ZodType<ApplicationQuestion, z.ZodTypeDef, unknown>;

const ApplicationRecordSchema = z.object({
  id: z.string().min(1),
  job_id: z.string().min(1),
  job_title: text,
  company: text,
  job_url: text,
  ats: z.enum(ATS_TYPES).catch('unknown'),
  status: z.enum(APPLICATION_STATUSES).catch('pending'),
  created_at: text,
  started_at: nullableText,
  completed_at: nullableText,
  logs: validRows<ApplicationLog>(ApplicationLogRecordSchema),
  questions: validRows<ApplicationQuestion>(ApplicationQuestionRecordSchema),
  error_message: nullableText,
  retry_count: z.number().int().nonnegative().catch(0),
  max_retries: z.number().int().nonnegative().catch(3),
  resume_uploaded: flag,
  screenshots: textList,
}) satisfies z.ZodType<Application, z.ZodTypeDef, unknown>;

const StoreSnapshotSchema = z.object({
  jobs: validRows<Job>(JobRecordSchema),
  applications: validRows<Application>(ApplicationRecordSchema),
});

export type StoreSnapshot = z.infer<typeof StoreSnapshotSchema>;

export function parseSnapshot(value: unknown): StoreSnapshot {
  const result = StoreSnapshotSchema.safeParse(value);
  return result.success ? result.data : { jobs: [], applications: [] };
}
