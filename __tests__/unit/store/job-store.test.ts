import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApplication } from '../../../src/core/application';
import { FileJobStore, InMemoryJobStore } from '../../../src/store/job-store';
import { parseSnapshot } from '../../../src/store/records';
import type { DiscoveredJob } from '../../../src/types';
import { makeJob } from '../../helpers';

function posting(url: string, overrides: Partial<DiscoveredJob> = {}): DiscoveredJob {
  return { title: 'Engineer', company: 'Acme', location: 'Remote', url, source: 'github', ...overrides };
}

describe('InMemoryJobStore', () => {
  it('deduplicates postings by normalized URL', async () => {
    const store = new InMemoryJobStore();
    const first = await store.addJob(posting('https://jobs.lever.co/acme/1?utm_source=list'));
    const second = await store.addJob(posting('https://JOBS.lever.co/acme/1/'));

    expect(first.created).toBe(true);
    expect(second).toEqual({ id: first.id, created: false });
    expect(await store.listJobs()).toHaveLength(1);
  });

  it('creates new jobs untagged and actionable', async () => {
    const store = new InMemoryJobStore();
    const { id } = await store.addJob(posting('https://jobs.lever.co/acme/1', { date_posted: 'Mar 01' }));
    const job = await store.getJob(id);

    expect(job).toMatchObject({ status: 'new', ats: 'unknown', applied_at: null, tags: ['posted:Mar 01'] });
  });

  it('lists actionable jobs oldest first up to the limit', async () => {
    const store = new InMemoryJobStore();
    await store.putJob(makeJob({ id: 'late', discovered_at: '2026-01-03T00:00:00.000Z' }));
    await store.putJob(makeJob({ id: 'early', discovered_at: '2026-01-01T00:00:00.000Z' }));
    await store.putJob(makeJob({ id: 'mid', discovered_at: '2026-01-02T00:00:00.000Z', status: 'queued' }));
    await store.putJob(makeJob({ id: 'done', discovered_at: '2026-01-01T00:00:00.000Z', status: 'applied' }));

    expect((await store.listActionable(10)).map(j => j.id)).toEqual(['early', 'mid', 'late']);
    expect((await store.listActionable(2)).map(j => j.id)).toEqual(['early', 'mid']);
    expect((await store.listJobs('applied')).map(j => j.id)).toEqual(['done']);
  });

  it('sets applied_at exactly while a job is applied', async () => {
    const store = new InMemoryJobStore();
    await store.putJob(makeJob());

    await store.updateJobStatus('job-1', 'applied');
    expect((await store.getJob('job-1'))?.applied_at).not.toBeNull();

    await store.updateJobStatus('job-1', 'needs_review');
    expect((await store.getJob('job-1'))?.applied_at).toBeNull();
  });

  it('returns copies that do not write through', async () => {
    const store = new InMemoryJobStore();
    await store.putJob(makeJob());
    const copy = await store.getJob('job-1');
    if (copy) copy.status = 'failed';
    expect((await store.getJob('job-1'))?.status).toBe('new');
  });

  it('rejects updates for unknown jobs', async () => {
    const store = new InMemoryJobStore();
    await expect(store.updateJobStatus('missing', 'failed')).rejects.toThrow('Job not found: missing');
    await expect(store.updateJobPlatform('missing', 'lever')).rejects.toThrow('Job not found: missing');
  });

  it('stores, updates and discards applications', async () => {
    const store = new InMemoryJobStore();
    const application = createApplication(makeJob());
    await store.addApplication(application);
    await expect(store.addApplication(application)).rejects.toThrow(`Application already exists: ${application.id}`);

    application.status = 'submitted';
    await store.updateApplication(application);
    expect((await store.getApplication(application.id))?.status).toBe('submitted');
    expect(await store.listApplications('job-1')).toHaveLength(1);
    expect(await store.listApplications('job-2')).toHaveLength(0);

    await store.discardApplication(application.id);
    expect(await store.getApplication(application.id)).toBeNull();
    await expect(store.updateApplication(application)).rejects.toThrow(`Application not found: ${application.id}`);
  });
});

describe('FileJobStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = FileJobStore.open(path.join(dir, 'jobs.json'));
    expect(await store.listJobs()).toEqual([]);
  });

  it('persists every write and reloads it', async () => {
    const file = path.join(dir, 'nested', 'jobs.json');
    const store = FileJobStore.open(file);
    const { id } = await store.addJob(posting('https://jobs.lever.co/acme/1'));
    await store.updateJobPlatform(id, 'lever');

    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(parseSnapshot(raw).jobs).toHaveLength(1);

    const reopened = FileJobStore.open(file);
    expect(await reopened.getJob(id)).toMatchObject({ ats: 'lever', status: 'new', url: 'https://jobs.lever.co/acme/1' });
  });

  it('refuses a corrupt file', () => {
    const file = path.join(dir, 'jobs.json');
    fs.writeFileSync(file, '{ not json');
    expect(() => FileJobStore.open(file)).toThrow(/is not valid JSON/);
  });
});

describe('parseSnapshot', () => {
  it('drops malformed records and defaults unknown enums', () => {
    const snapshot = parseSnapshot({
      jobs: [
        { id: 'a', url: 'https://example.com/a', status: 'bogus', ats: 'nope' },
        { id: 'b' },
        'garbage',
      ],
      applications: [{ id: 'x', job_id: 'a', status: 'submitted', questions: [{ question_text: 'Q', kind: 'radio' }] }],
    });

    expect(snapshot.jobs).toHaveLength(1);
    expect(snapshot.jobs[0]).toMatchObject({ id: 'a', status: 'new', ats: 'unknown', source: 'other', applied_at: null });
    expect(snapshot.applications[0]).toMatchObject({ id: 'x', status: 'submitted', max_retries: 3 });
    expect(snapshot.applications[0].questions[0]).toMatchObject({ question_text: 'Q', kind: 'radio', answered_by: null });
  });
});
