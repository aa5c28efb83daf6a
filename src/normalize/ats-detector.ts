/**
 * ATS (Applicant Tracking System) detection module
 *
 * Scores a URL, and optionally the page HTML, against ordered vendor signature
 * tables. A URL hit is authoritative (0.9). Content hits score
 * min(0.5 + 0.2 * matches, 0.85). With no signal at all the result is
 * `custom` at 0.3 so callers still try the fallback filler.
 */

import { ATS_TYPES, LANDING_PAGE_TYPES } from '../types';
import type { ATSMappings, ATSType, Classification, Job } from '../types';
import { loadATSMappings } from '../config';

export const URL_MATCH_CONFIDENCE = 0.9;
export const CONTENT_BASE_CONFIDENCE = 0.5;
export const CONTENT_MATCH_STEP = 0.2;
export const CONTENT_MAX_CONFIDENCE = 0.85;
export const FALLBACK_CONFIDENCE = 0.3;

const NO_MATCH: Classification = { ats: 'unknown', confidence: 0 };

interface CompiledTable {
  ats: ATSType;
  patterns: RegExp[];
}

function compileTable(table: Partial<Record<ATSType, string[]>>): CompiledTable[] {
  return Object.entries(table).flatMap(([key, patterns]) => {
    const ats = ATS_TYPES.find(type => type === key);
    if (!ats || !patterns) return [];
    return [{ ats, patterns: patterns.map(p => new RegExp(p, 'i')) }];
  });
}

/**
 * Host plus path of a URL, lowercased. Unparseable input is used as-is.
 */
export function urlTarget(url: string): string {
  const trimmed = url.trim().toLowerCase();
  try {
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
    const parsed = new URL(withScheme);
    return `${parsed.host}${parsed.pathname}`;
  } catch {
    return trimmed;
  }
}

export class PlatformClassifier {
  private readonly urlTable: CompiledTable[];
  private readonly contentTable: CompiledTable[];

  constructor(mappings: Pick<ATSMappings, 'urlPatterns' | 'contentPatterns'>) {
    this.urlTable = compileTable(mappings.urlPatterns);
    this.contentTable = compileTable(mappings.contentPatterns);
  }

  classifyUrl(url: string): Classification {
    if (!url) return NO_MATCH;
    const target = urlTarget(url);

    for (const entry of this.urlTable) {
      if (entry.patterns.some(pattern => pattern.test(target))) {
        return { ats: entry.ats, confidence: URL_MATCH_CONFIDENCE };
      }
    }
    return NO_MATCH;
  }

  /**
   * First vendor in table order with any matching keyword wins
   */
  classifyContent(html: string): Classification {
    if (!html) return NO_MATCH;

    for (const entry of this.contentTable) {
      const matches = entry.patterns.filter(pattern => pattern.test(html)).length;
      if (matches > 0) {
        return {
          ats: entry.ats,
          confidence: contentConfidence(matches),
        };
      }
    }
    return NO_MATCH;
  }

  classify(url: string, content?: string): Classification {
    const byUrl = this.classifyUrl(url);
    if (byUrl.confidence >= URL_MATCH_CONFIDENCE) {
      return byUrl;
    }

    if (content) {
      const byContent = this.classifyContent(content);
      if (byContent.confidence > byUrl.confidence) {
        return byContent;
      }
    }

    if (byUrl.confidence > 0) {
      return byUrl;
    }

    return { ats: 'custom', confidence: FALLBACK_CONFIDENCE };
  }
}

export function contentConfidence(matches: number): number {
  // Rounded so 0.5 + 0.2 * 1 reads as 0.7, not 0.7000000000000001
  const raw = CONTENT_BASE_CONFIDENCE + matches * CONTENT_MATCH_STEP;
  return Math.round(Math.min(raw, CONTENT_MAX_CONFIDENCE) * 100) / 100;
}

export function isLandingPage(ats: ATSType): boolean {
  return LANDING_PAGE_TYPES.includes(ats);
}

export function isATSType(value: string): value is ATSType {
  return ATS_TYPES.some(type => type === value);
}

export interface PlatformInfo {
  name: string;
  difficulty: 'easy' | 'medium' | 'hard' | 'unknown';
  multiStep: boolean;
  requiresAccount: boolean;
}

const PLATFORM_INFO: Partial<Record<ATSType, PlatformInfo>> = {
  workday: { name: 'Workday', difficulty: 'medium', multiStep: true, requiresAccount: true },
  ashby: { name: 'Ashby', difficulty: 'easy', multiStep: false, requiresAccount: false },
  greenhouse: { name: 'Greenhouse', difficulty: 'easy', multiStep: false, requiresAccount: false },
  lever: { name: 'Lever', difficulty: 'easy', multiStep: false, requiresAccount: false },
  oracle: { name: 'Oracle', difficulty: 'hard', multiStep: true, requiresAccount: true },
  adp: { name: 'ADP Workforce', difficulty: 'hard', multiStep: true, requiresAccount: true },
};

export function getPlatformInfo(ats: ATSType): PlatformInfo {
  return PLATFORM_INFO[ats] ?? { name: 'Unknown', difficulty: 'unknown', multiStep: false, requiresAccount: false };
}

let defaultClassifier: PlatformClassifier | null = null;

/**
 * Classifier over the tables in config/ats-mappings.json (cached)
 */
export function getClassifier(): PlatformClassifier {
  if (!defaultClassifier) {
    defaultClassifier = new PlatformClassifier(loadATSMappings());
  }
  return defaultClassifier;
}

/**
 * Give a job a platform tag from its URL when it has none
 */
export function normalizeJob(job: Job, classifier: PlatformClassifier = getClassifier()): Job {
  if (job.ats !== 'unknown') return job;
  return {
    ...job,
    ats: classifier.classify(job.apply_url || job.url).ats,
  };
}

/**
 * Group jobs by ATS type for batch processing
 */
export function groupJobsByATS(jobs: Job[], classifier: PlatformClassifier = getClassifier()): Map<ATSType, Job[]> {
  const groups = new Map<ATSType, Job[]>();

  for (const job of jobs) {
    const { ats } = normalizeJob(job, classifier);
    const existing = groups.get(ats) || [];
    existing.push(job);
    groups.set(ats, existing);
  }

  return groups;
}

export default {
  PlatformClassifier,
  getClassifier,
  contentConfidence,
  isLandingPage,
  isATSType,
  getPlatformInfo,
  normalizeJob,
  groupJobsByATS,
};
