/**
 * Job and application persistence
 *
 * Every write is a single-record upsert keyed by id. Records are copied on the
 * way in and out so callers never hold a reference into the store.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createJob, isActionable, normalizeUrl, withStatus } from '../core/job';
import { getLogger } from '../log/logger';
import { parseSnapshot } from './records';
import type { StoreSnapshot } from './records';
import type {
  AddJobResult,
  Application,
  ATSType,
  DiscoveredJob,
  Job,
  JobStatus,
  JobStore,
} from '../types';

const logger = getLogger();

export class InMemoryJobStore implements JobStore {
  protected jobs = new Map<string, Job>();
  protected applications = new Map<string, Application>();

  constructor(snapshot?: StoreSnapshot) {
    for (const job of snapshot?.jobs ?? []) {
      this.jobs.set(job.id, structuredClone(job));
    }
    for (const application of snapshot?.applications ?? []) {
      this.applications.set(application.id, structuredClone(application));
    }
  }

  /**
   * Persistence hook, called after every mutation
   */
  protected async persist(): Promise<void> {}

  async listActionable(limit: number): Promise<Job[]> {
    return [...this.jobs.values()]
      .filter(isActionable)
      .sort((a, b) => a.discovered_at.localeCompare(b.discovered_at))
      .slice(0, Math.max(0, limit))
      .map(job => structuredClone(job));
  }

  async listJobs(status?: JobStatus): Promise<Job[]> {
    return [...this.jobs.values()]
      .filter(job => !status || job.status === status)
      .sort((a, b) => a.discovered_at.localeCompare(b.discovered_at))
      .map(job => structuredClone(job));
  }

  async getJob(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  /**
   * Insert a discovered posting unless one with the same normalized URL exists
   */
  async addJob(input: DiscoveredJob): Promise<AddJobResult> {
    const key = normalizeUrl(input.url);
    for (const job of this.jobs.values()) {
      if (normalizeUrl(job.url) === key) {
        return { id: job.id, created: false };
      }
    }

    const job = createJob(input);
    this.jobs.set(job.id, job);
    await this.persist();
    return { id: job.id, created: true };
  }

  /**
   * Seed or overwrite a complete job record
   */
  async putJob(job: Job): Promise<void> {
    this.jobs.set(job.id, structuredClone(withStatus(job, job.status)));
    await this.persist();
  }

  async updateJobStatus(id: string, status: JobStatus): Promise<void> {
    const job = this.requireJob(id);
    this.jobs.set(id, withStatus(job, status));
    await this.persist();
  }

  async updateJobPlatform(id: string, ats: ATSType): Promise<void> {
    const job = this.requireJob(id);
    this.jobs.set(id, { ...job, ats });
    await this.persist();
  }

  async getApplication(id: string): Promise<Application | null> {
    const application = this.applications.get(id);
    return application ? structuredClone(application) : null;
  }

  async listApplications(jobId?: string): Promise<Application[]> {
    return [...this.applications.values()]
      .filter(application => !jobId || application.job_id === jobId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map(application => structuredClone(application));
  }

  async addApplication(application: Application): Promise<void> {
    if (this.applications.has(application.id)) {
      throw new Error(`Application already exists: ${application.id}`);
    }
    this.applications.set(application.id, structuredClone(application));
    await this.persist();
  }

  async updateApplication(application: Application): Promise<void> {
    if (!this.applications.has(application.id)) {
      throw new Error(`Application not found: ${application.id}`);
    }
    this.applications.set(application.id, structuredClone(application));
    await this.persist();
  }

  async discardApplication(id: string): Promise<void> {
    if (this.applications.delete(id)) {
      await this.persist();
    }
  }

  protected snapshot(): StoreSnapshot {
    return {
      jobs: [...this.jobs.values()],
      applications: [...this.applications.values()],
    };
  }

  private requireJob(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) {
      throw new Error(`Job not found: ${id}`);
    }
    return job;
  }
}

/**
 * JSON file store. The whole file is rewritten after each upsert.
 */
export class FileJobStore extends InMemoryJobStore {
  private readonly filePath: string;
  private pending: Promise<void> = Promise.resolve();

  private constructor(filePath: string, snapshot: StoreSnapshot) {
    super(snapshot);
    this.filePath = filePath;
  }

  static open(filePath: string): FileJobStore {
    const resolved = path.resolve(filePath);
    let snapshot: StoreSnapshot = { jobs: [], applications: [] };

    if (fs.existsSync(resolved)) {
      const content = fs.readFileSync(resolved, 'utf-8');
      try {
        snapshot = parseSnapshot(JSON.parse(content));
      } catch (error) {
        throw new Error(`Job store at ${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
      }
      logger.debug(`[Store] Loaded ${snapshot.jobs.length} jobs, ${snapshot.applications.length} applications`);
    }

    return new FileJobStore(resolved, snapshot);
  }

  /**
   * Writes are chained so concurrent upserts never share the temp file
   */
  protected persist(): Promise<void> {
    const write = this.pending.then(() => this.writeSnapshot());
    this.pending = write.catch((error: unknown) => {
      logger.warn(`[Store] Write to ${this.filePath} failed: ${String(error)}`);
    });
    return write;
  }

  private async writeSnapshot(): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.promises.mkdir(dir, { recursive: true });

    const output = {
      last_updated: new Date().toISOString(),
      ...this.snapshot(),
    };
    const tmp = `${this.filePath}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(output, null, 2));
    await fs.promises.rename(tmp, this.filePath);
  }
}

export default {
  InMemoryJobStore,
  FileJobStore,
};
