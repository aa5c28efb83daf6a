import { describe, expect, it } from 'vitest';
import { GithubJobSource, extractUrl, fetchReadme, parseJobs } from '../../../src/ingest/github-parser';
import { InMemoryJobStore } from '../../../src/store/job-store';
import type { JobSourceSettings } from '../../../src/types';
import { fetchReturning, makeJob } from '../../helpers';

const source: JobSourceSettings = { repository: 'example/internships', branch: 'main', readmePath: 'README.md' };

const HTML_README = [
  '<table>',
  '<thead><tr><th>Company</th><th>Role</th><th>Location</th><th>Application</th><th>Age</th></tr></thead>',
  '<tbody>',
  '<tr>',
  '<td><strong><a href="https://simplify.jobs/c/Acme">Acme</a></strong></td>',
  '<td>Backend Intern</td>',
  '<td>Remote</td>',
  '<td><a href="https://boards.greenhouse.io/acme/jobs/1?utm_source=list"><img alt="Apply"></a> <a href="https://simplify.jobs/p/1"><img alt="Simplify"></a></td>',
  '<td>0d</td>',
  '</tr>',
  '<tr><td>↳</td><td>Frontend Intern</td><td>New York, NY</td><td><a href="https://jobs.lever.co/acme/2">Apply</a></td><td>1d</td></tr>',
  '<tr><td><strong>Globex</strong></td><td>Data Intern</td><td>Austin, TX</td><td>🔒</td><td>3d</td></tr>',
  '<tr><td>↳</td><td></td><td></td><td><a href="https://globex.wd1.myworkdayjobs.com/careers/job/R1">Apply</a></td><td>3d</td></tr>',
  '</tbody>',
  '</table>',
].join('\n');

const MARKDOWN_README = [
  '# Internships',
  '',
  '| Company | Role | Location | Application/Link | Date Posted |',
  '| --- | --- | --- | --- | --- |',
  '| **[Initech](https://initech.example.com)** | SWE Intern | Dallas, TX | [Apply](https://jobs.ashbyhq.com/initech/1) | Jan 01 |',
  '| ↳ | QA Intern | Remote | [Apply](https://jobs.ashbyhq.com/initech/2) | Jan 01 |',
  '| Hooli | ML Intern | Palo Alto, CA | 🔒 | Jan 02 |',
].join('\n');

describe('extractUrl', () => {
  it('reads href, markdown and bare links and drops tracking', () => {
    expect(extractUrl('<a href="https://x.test/a?utm_source=list&amp;ref=1">Apply</a>')).toBe('https://x.test/a');
    expect(extractUrl('<a href="https://x.test/a?id=1&amp;b=2">Apply</a>')).toBe('https://x.test/a?id=1&b=2');
    expect(extractUrl('[Apply](https://x.test/b)')).toBe('https://x.test/b');
    expect(extractUrl('see https://x.test/c now')).toBe('https://x.test/c');
    expect(extractUrl('closed')).toBeNull();
  });
});

describe('parseJobs', () => {
  it('reads HTML tables with continuation rows and skips closed postings', () => {
    expect(parseJobs(HTML_README)).toEqual([
      {
        title: 'Backend Intern',
        company: 'Acme',
        location: 'Remote',
        url: 'https://boards.greenhouse.io/acme/jobs/1',
        source: 'github',
      },
      {
        title: 'Frontend Intern',
        company: 'Acme',
        location: 'New York, NY',
        url: 'https://jobs.lever.co/acme/2',
        source: 'github',
      },
      {
        title: 'Software Engineer',
        company: 'Globex',
        location: 'Unknown',
        url: 'https://globex.wd1.myworkdayjobs.com/careers/job/R1',
        source: 'github',
      },
    ]);
  });

  it('reads markdown tables by header name', () => {
    expect(parseJobs(MARKDOWN_README)).toEqual([
      {
        title: 'SWE Intern',
        company: 'Initech',
        location: 'Dallas, TX',
        url: 'https://jobs.ashbyhq.com/initech/1',
        source: 'github',
      },
      {
        title: 'QA Intern',
        company: 'Initech',
        location: 'Remote',
        url: 'https://jobs.ashbyhq.com/initech/2',
        source: 'github',
      },
    ]);
  });

  it('reads both table kinds from one document', () => {
    const jobs = parseJobs(`${HTML_README}\n\n${MARKDOWN_README}`);
    expect(jobs.map(j => j.company)).toEqual(['Acme', 'Acme', 'Globex', 'Initech', 'Initech']);
  });

  it('returns nothing for prose', () => {
    expect(parseJobs('No openings right now.')).toEqual([]);
  });
});

describe('fetchReadme', () => {
  it('reads the raw file for the configured branch', async () => {
    const fetchFn = fetchReturning(200, MARKDOWN_README);
    expect(await fetchReadme(source, fetchFn)).toBe(MARKDOWN_README);
    expect(fetchFn).toHaveBeenCalledWith('https://raw.githubusercontent.com/example/internships/main/README.md');
  });

  it('throws on an error status', async () => {
    await expect(fetchReadme(source, fetchReturning(503, 'down'))).rejects.toThrow('Failed to fetch README: 503');
  });
});

describe('GithubJobSource', () => {
  it('stores new postings and counts what was already known', async () => {
    const store = new InMemoryJobStore({
      jobs: [makeJob({ id: 'known', url: 'https://boards.greenhouse.io/acme/jobs/1' })],
      applications: [],
    });

    const result = await new GithubJobSource(store, source, fetchReturning(200, HTML_README)).discover();

    expect(result).toEqual({ found: 3, new: 2 });
    const urls = (await store.listJobs()).map(j => j.url);
    expect(urls).toHaveLength(3);
    expect(urls).toContain('https://jobs.lever.co/acme/2');
  });
});
