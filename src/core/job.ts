/**
 * Job record helpers
 */

import { randomUUID } from 'crypto';
import { JOB_STATUSES } from '../types';
import type { DiscoveredJob, Job, JobStatus } from '../types';

const ACTIONABLE_STATUSES: readonly JobStatus[] = ['new', 'queued'];

export function isActionable(job: Job): boolean {
  return ACTIONABLE_STATUSES.includes(job.status);
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some(status => status === value);
}

/**
 * Remove tracking parameters and case so the same posting compares equal
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url.trim());
    for (const param of ['utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content', 'ref', 'source']) {
      parsed.searchParams.delete(param);
    }
    parsed.hash = '';
    return parsed.toString().replace(/\/$/, '').toLowerCase();
  } catch {
    return url.trim().toLowerCase();
  }
}

export function createJob(input: DiscoveredJob, now: Date = new Date()): Job {
  return {
    id: randomUUID(),
    title: input.title,
    company: input.company,
    location: input.location,
    url: input.url,
    ...(input.apply_url ? { apply_url: input.apply_url } : {}),
    source: input.source,
    ats: 'unknown',
    status: 'new',
    discovered_at: now.toISOString(),
    applied_at: null,
    tags: input.date_posted ? [`posted:${input.date_posted}`] : [],
  };
}

/**
 * Status change that keeps applied_at set exactly when the status is 'applied'
 */
export function withStatus(job: Job, status: JobStatus, now: Date = new Date()): Job {
  return {
    ...job,
    status,
    applied_at: status === 'applied' ? job.applied_at ?? now.toISOString() : null,
  };
}

export function describeJob(job: Job): string {
  return `${job.title} at ${job.company}`;
}

export default {
  isActionable,
  isJobStatus,
  normalizeUrl,
  createJob,
  withStatus,
  describeJob,
};
