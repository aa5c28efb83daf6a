import { describe, expect, it } from 'vitest';
import {
  PlatformClassifier,
  contentConfidence,
  groupJobsByATS,
  isATSType,
  isLandingPage,
  normalizeJob,
  urlTarget,
} from '../../../src/normalize/ats-detector';
import { makeJob, mappings } from '../../helpers';

const classifier = new PlatformClassifier(mappings);

describe('PlatformClassifier', () => {
  describe('URL matching', () => {
    it.each([
      ['https://boards.greenhouse.io/acme/jobs/4012', 'greenhouse'],
      ['https://job-boards.greenhouse.io/acme/jobs/4012', 'greenhouse'],
      ['https://jobs.lever.co/acme/5c1e', 'lever'],
      ['https://jobs.ashbyhq.com/acme/42', 'ashby'],
      ['https://acme.wd5.myworkdayjobs.com/en-US/careers/job/Remote/Engineer_R1', 'workday'],
      ['https://careers-acme.icims.com/jobs/1234/job', 'icims'],
      ['https://acme.taleo.net/careersection/2/jobdetail.ftl?job=1', 'taleo'],
      ['https://jobs.jobvite.com/acme/job/o1', 'jobvite'],
      ['https://jobs.smartrecruiters.com/Acme/123', 'smartrecruiters'],
      ['https://workforcenow.adp.com/mascsr/default/mdf/recruitment', 'adp'],
      ['https://builtin.com/job/backend-engineer/123', 'builtin'],
      ['https://simplify.jobs/p/abc-123', 'redirector'],
    ])('tags %s as %s with URL confidence', (url, ats) => {
      expect(classifier.classify(url)).toEqual({ ats, confidence: 0.9 });
    });

    it('ignores case in the URL', () => {
      expect(classifier.classify('HTTPS://JOBS.LEVER.CO/Acme/1').ats).toBe('lever');
    });

    it('prefers the URL over page content', () => {
      const result = classifier.classify('https://boards.greenhouse.io/acme/jobs/1', '<div>workday WDAY_ wd-apply</div>');
      expect(result).toEqual({ ats: 'greenhouse', confidence: 0.9 });
    });
  });

  describe('content matching', () => {
    it('scores one keyword at 0.7', () => {
      const result = classifier.classify('https://careers.example.com/job/1', '<form class="lever-apply"></form>');
      expect(result).toEqual({ ats: 'lever', confidence: 0.7 });
    });

    it('caps two keywords at 0.85', () => {
      const html = '<form id="greenhouse-application" action="https://boards.greenhouse.io/submit"></form>';
      const result = classifier.classify('https://careers.example.com/job/1', html);
      expect(result).toEqual({ ats: 'greenhouse', confidence: 0.85 });
    });

    it('lets the first vendor in table order win', () => {
      const html = '<script src="https://boards.greenhouse.io/embed"></script><div class="gh-apply">Powered by Workday</div>';
      expect(classifier.classify('https://careers.example.com/job/1', html)).toEqual({ ats: 'workday', confidence: 0.7 });
    });
  });

  it('falls back to custom at 0.3 when nothing matches', () => {
    expect(classifier.classify('https://careers.example.com/job/1', '<p>Join us</p>')).toEqual({
      ats: 'custom',
      confidence: 0.3,
    });
    expect(classifier.classify('')).toEqual({ ats: 'custom', confidence: 0.3 });
  });

  it('returns the same result for the same input', () => {
    const url = 'https://careers.example.com/job/1';
    const html = '<div class="ashby-apply"></div>';
    expect(classifier.classify(url, html)).toEqual(classifier.classify(url, html));
  });
});

describe('contentConfidence', () => {
  it('grows by 0.2 per keyword and caps at 0.85', () => {
    expect(contentConfidence(1)).toBe(0.7);
    expect(contentConfidence(2)).toBe(0.85);
    expect(contentConfidence(5)).toBe(0.85);
  });
});

describe('urlTarget', () => {
  it('keeps host and path, lowercased, without the query', () => {
    expect(urlTarget('Jobs.Lever.co/Acme?utm_source=x')).toBe('jobs.lever.co/acme');
  });
});

describe('platform tags', () => {
  it('knows which tags are landing pages', () => {
    expect(isLandingPage('builtin')).toBe(true);
    expect(isLandingPage('redirector')).toBe(true);
    expect(isLandingPage('greenhouse')).toBe(false);
    expect(isLandingPage('custom')).toBe(false);
  });

  it('validates tag strings', () => {
    expect(isATSType('ashby')).toBe(true);
    expect(isATSType('monster')).toBe(false);
  });
});

describe('normalizeJob', () => {
  it('tags an untagged job from its apply URL', () => {
    const job = makeJob({ url: 'https://example.com/posting', apply_url: 'https://jobs.lever.co/acme/1' });
    expect(normalizeJob(job, classifier).ats).toBe('lever');
  });

  it('keeps an existing tag', () => {
    const job = makeJob({ ats: 'workday' });
    expect(normalizeJob(job, classifier)).toBe(job);
  });
});

describe('groupJobsByATS', () => {
  it('groups jobs under their platform', () => {
    const jobs = [
      makeJob({ id: 'a', url: 'https://boards.greenhouse.io/acme/jobs/1' }),
      makeJob({ id: 'b', url: 'https://jobs.lever.co/acme/2' }),
      makeJob({ id: 'c', url: 'https://boards.greenhouse.io/acme/jobs/3' }),
    ];
    const groups = groupJobsByATS(jobs, classifier);
    expect(groups.get('greenhouse')?.map(j => j.id)).toEqual(['a', 'c']);
    expect(groups.get('lever')?.map(j => j.id)).toEqual(['b']);
  });
});
