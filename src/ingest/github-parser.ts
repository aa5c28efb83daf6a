/**
 * GitHub README parser for extracting job postings
 * Supports both Markdown tables and HTML tables
 */

import { getLogger } from '../log/logger';
import type { DiscoveredJob, DiscoveryResult, JobSourceProvider, JobSourceSettings, JobStore } from '../types';

const logger = getLogger();

type FetchFn = typeof fetch;

const DEFAULT_ROLE = 'Software Engineer';
const CONTINUATION = '↳';
const CLOSED = '🔒';

/**
 * Fetch README content from a GitHub repository
 */
export async function fetchReadme(source: JobSourceSettings, fetchFn: FetchFn = fetch): Promise<string> {
  const rawUrl = `https://raw.githubusercontent.com/${source.repository}/${source.branch}/${source.readmePath}`;

  const response = await fetchFn(rawUrl);

  if (!response.ok) {
    throw new Error(`Failed to fetch README: ${response.status} ${response.statusText}`);
  }

  return response.text();
}

function stripTracking(url: string): string {
  return url.split('?utm_source')[0].replace(/&amp;/g, '&');
}

/**
 * Extract URL from various link formats
 */
export function extractUrl(text: string): string | null {
  const hrefMatch = text.match(/href="([^"]+)"/);
  if (hrefMatch) {
    return stripTracking(hrefMatch[1]);
  }

  const mdMatch = text.match(/\[([^\]]*)\]\(([^)]+)\)/);
  if (mdMatch) {
    return stripTracking(mdMatch[2]);
  }

  const urlMatch = text.match(/https?:\/\/[^\s<>"]+/);
  if (urlMatch) {
    return stripTracking(urlMatch[0]);
  }

  return null;
}

/**
 * Extract text content, stripping HTML tags
 */
function stripHtml(html: string): string {
  return html
    .replace(/<[^>]+>/g, ' ')
    .replace(/\*\*/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Extract company name from cell content
 */
function extractCompany(cell: string): string {
  // **Company** format
  const boldMatch = cell.match(/\*\*([^*]+)\*\*/);
  if (boldMatch) {
    return stripHtml(boldMatch[1]).replace(/\[([^\]]+)\]\([^)]*\)/, '$1');
  }

  const aMatch = cell.match(/<a[^>]*>([^<]+)<\/a>/i);
  if (aMatch) {
    return aMatch[1].trim();
  }

  // [Company](url) format
  const linkMatch = cell.match(/\[([^\]]+)\]/);
  if (linkMatch) {
    return linkMatch[1].trim();
  }

  return stripHtml(cell);
}

/** Prefer direct ATS links over aggregator links in the application cell */
const JOB_BOARD_PATTERNS = [
  /href="(https?:\/\/[^"]*greenhouse[^"]*)"/i,
  /href="(https?:\/\/[^"]*lever[^"]*)"/i,
  /href="(https?:\/\/[^"]*workday[^"]*)"/i,
  /href="(https?:\/\/[^"]*icims[^"]*)"/i,
  /href="(https?:\/\/[^"]*ashby[^"]*)"/i,
  /href="(https?:\/\/[^"]*careers\.[^"]*)"/i,
  /href="(https?:\/\/[^"]*jobs\.[^"]*)"/i,
];

function extractApplyUrl(cell: string): string | null {
  for (const pattern of JOB_BOARD_PATTERNS) {
    const match = cell.match(pattern);
    if (match && !match[1].includes('simplify.jobs')) {
      return stripTracking(match[1]);
    }
  }

  for (const match of cell.matchAll(/href="([^"]+)"/g)) {
    if (!match[1].includes('simplify.jobs')) {
      return stripTracking(match[1]);
    }
  }

  return extractUrl(cell);
}

function toJob(company: string, role: string, location: string, url: string): DiscoveredJob {
  return {
    title: role || DEFAULT_ROLE,
    company,
    location: location || 'Unknown',
    url,
    source: 'github',
  };
}

/**
 * Parse HTML table rows. Continuation rows (↳) belong to the company above them.
 */
function parseHtmlTable(html: string): DiscoveredJob[] {
  const jobs: DiscoveredJob[] = [];

  for (const tbodyMatch of html.matchAll(/<tbody[^>]*>([\s\S]*?)<\/tbody>/gi)) {
    let previousCompany = '';

    for (const rowMatch of tbodyMatch[1].matchAll(/<tr[^>]*>([\s\S]*?)<\/tr>/gi)) {
      const row = rowMatch[1];
      const cells = [...row.matchAll(/<td[^>]*>([\s\S]*?)<\/td>/gi)].map(m => m[1]);
      if (cells.length < 4) continue;

      let company = extractCompany(cells[0]);
      if (company === CONTINUATION) {
        company = previousCompany;
      } else {
        previousCompany = company;
      }

      if (row.includes(CLOSED)) continue;

      const applyUrl = extractApplyUrl(cells[3]);
      if (!company || !applyUrl) continue;

      jobs.push(toJob(company, stripHtml(cells[1]), stripHtml(cells[2]), applyUrl));
    }
  }

  return jobs;
}

/**
 * Parse Markdown table rows
 */
function parseMarkdownTable(markdown: string): DiscoveredJob[] {
  const jobs: DiscoveredJob[] = [];
  let headers: string[] = [];
  let inTable = false;
  let previousCompany = '';

  for (const line of markdown.split('\n')) {
    const trimmed = line.trim();

    if (!trimmed.startsWith('|') || !trimmed.endsWith('|')) {
      inTable = false;
      headers = [];
      continue;
    }

    // Separator row (|---|---|)
    if (/^\|[\s\-:|]+\|$/.test(trimmed)) {
      inTable = true;
      continue;
    }

    const cells = trimmed.split('|').slice(1, -1).map(c => c.trim());

    if (!inTable) {
      headers = cells.map(c => c.toLowerCase());
      continue;
    }

    if (cells.length < 3) continue;

    const column = (match: (header: string) => boolean, fallback: number): string => {
      const index = headers.findIndex(match);
      return cells[index >= 0 ? index : fallback] ?? '';
    };

    let company = extractCompany(column(h => h.includes('company'), 0));
    if (company === CONTINUATION) {
      company = previousCompany;
    } else {
      previousCompany = company;
    }

    if (trimmed.includes(CLOSED)) continue;

    const role = stripHtml(column(h => h.includes('role') || h.includes('title'), 1));
    const location = stripHtml(column(h => h.includes('location'), 2));
    const applyCell = column(h => h.includes('apply') || h.includes('link') || h.includes('application'), 3);
    const applyUrl = extractUrl(applyCell) ?? extractUrl(trimmed);

    if (company && applyUrl) {
      jobs.push(toJob(company, role, location, applyUrl));
    }
  }

  return jobs;
}

/**
 * Parse job tables from README content (supports both HTML and Markdown)
 */
export function parseJobs(content: string): DiscoveredJob[] {
  const jobs: DiscoveredJob[] = [];

  if (content.includes('<table') || content.includes('<tbody')) {
    jobs.push(...parseHtmlTable(content));
  }

  if (content.includes('|')) {
    for (const job of parseMarkdownTable(content)) {
      if (!jobs.some(j => j.url === job.url)) {
        jobs.push(job);
      }
    }
  }

  return jobs;
}

/**
 * Discovery over a GitHub-hosted job list
 */
export class GithubJobSource implements JobSourceProvider {
  constructor(
    private readonly store: JobStore,
    private readonly source: JobSourceSettings,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async discover(): Promise<DiscoveryResult> {
    logger.info(`[Discovery] Fetching ${this.source.repository}@${this.source.branch}`);
    const content = await fetchReadme(this.source, this.fetchFn);
    const jobs = parseJobs(content);

    let created = 0;
    for (const job of jobs) {
      const result = await this.store.addJob(job);
      if (result.created) created++;
    }

    logger.info(`[Discovery] Found ${jobs.length} open postings, ${created} new`);
    return { found: jobs.length, new: created };
  }
}

export default {
  fetchReadme,
  parseJobs,
  GithubJobSource,
};
