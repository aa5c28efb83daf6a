import { describe, expect, it } from 'vitest';
import { findMatchingOption, matchesPattern, profileValues } from '../../../src/fillers/question-answerer';
import type { Question } from '../../../src/fillers/question-answerer';
import { makeAnswerer, makeJob, profile, stubGenerator } from '../../helpers';

const job = makeJob();

function question(text: string, overrides: Partial<Question> = {}): Question {
  return { text, kind: 'text', required: false, options: [], ...overrides };
}

describe('profileValues', () => {
  it('flattens the profile into answer keys', () => {
    const values = profileValues(profile);
    expect(values).toMatchObject({
      full_name: 'Sam Tester',
      website: 'https://github.com/sam-tester',
      school: 'Test University',
      current_company: 'Fixture Labs',
      city: 'Portland',
      sponsorship: 'No',
      authorized: 'Yes',
      race_ethnicity: '',
    });
  });
});

describe('matchesPattern', () => {
  it('matches case-insensitive regular expressions', () => {
    expect(matchesPattern('Which City do you live in?', ['\\bcity\\b'])).toBe(true);
    expect(matchesPattern('Ethnicity', ['\\bcity\\b'])).toBe(false);
  });

  it('falls back to substring matching for invalid expressions', () => {
    expect(matchesPattern('Salary ([range])', ['(['])).toBe(true);
  });
});

describe('findMatchingOption', () => {
  it('prefers exact, then prefix, then containment', () => {
    expect(findMatchingOption(['Yes, I am authorized', 'Yes'], 'yes')).toBe('Yes');
    expect(findMatchingOption(['No', 'Yes, I am authorized'], 'Yes')).toBe('Yes, I am authorized');
    expect(findMatchingOption(['Select...', 'United States of America'], 'States')).toBe('United States of America');
    expect(findMatchingOption(['Maybe'], 'Yes')).toBeNull();
    expect(findMatchingOption(['Yes'], '  ')).toBeNull();
  });
});

describe('QuestionAnswerer', () => {
  it('answers profile questions automatically', async () => {
    const answerer = makeAnswerer();
    expect(await answerer.answer(question('First Name', { required: true }), job)).toEqual({
      value: 'Sam',
      answeredBy: 'auto',
      needsReview: false,
      reviewReason: '',
    });
    expect(answerer.valueFor('full_name')).toBe('Sam Tester');
    expect(answerer.valueFor('race_ethnicity')).toBeNull();
  });

  it('picks the option that matches the profile value', async () => {
    const answerer = makeAnswerer();
    const sponsorship = await answerer.answer(
      question('Will you require visa sponsorship?', { kind: 'select', options: ['Yes', 'No'] }),
      job
    );
    expect(sponsorship.value).toBe('No');

    const authorized = await answerer.answer(
      question('Are you authorized to work in the US?', { kind: 'radio', options: ['Yes, I am authorized', 'No'] }),
      job
    );
    expect(authorized.value).toBe('Yes, I am authorized');
  });

  it('flags a required choice with no matching option', async () => {
    const answer = await makeAnswerer().answer(
      question('Are you authorized to work here?', { kind: 'select', required: true, options: ['Maybe'] }),
      job
    );
    expect(answer).toEqual({
      value: null,
      answeredBy: null,
      needsReview: true,
      reviewReason: 'No option matches "Yes"',
    });
  });

  it('leaves optional unmatched questions alone', async () => {
    const answerer = makeAnswerer();
    const ethnicity = await answerer.answer(question('Ethnicity', { kind: 'select', options: ['A', 'B'] }), job);
    expect(ethnicity).toEqual({ value: null, answeredBy: null, needsReview: false, reviewReason: '' });

    const nickname = await answerer.answer(question('Nickname'), job);
    expect(nickname.needsReview).toBe(false);
    expect(nickname.value).toBeNull();
  });

  it('accepts consent checkboxes', async () => {
    const answer = await makeAnswerer().answer(
      question('I agree to the privacy policy', { kind: 'checkbox', required: true }),
      job
    );
    expect(answer).toMatchObject({ value: 'Yes', answeredBy: 'auto', needsReview: false });
  });

  it('never answers file fields', async () => {
    const answer = await makeAnswerer().answer(question('Transcript', { kind: 'file', required: true }), job);
    expect(answer).toEqual({ value: null, answeredBy: null, needsReview: true, reviewReason: 'File upload needs a human' });
  });

  it('drafts open-ended answers within the configured length', async () => {
    const generator = stubGenerator(`  ${'x'.repeat(80)}  `);
    const answer = await makeAnswerer(generator).answer(
      question('Why do you want to join?', { kind: 'textarea', required: true }),
      job
    );

    expect(answer).toEqual({ value: 'x'.repeat(50), answeredBy: 'llm', needsReview: false, reviewReason: '' });
    expect(generator.prompts[0]).toContain('Keep the answer under 50 characters.');
  });

  it('flags required free text when no generator is configured', async () => {
    const answer = await makeAnswerer().answer(question('Favorite color', { required: true }), job);
    expect(answer.needsReview).toBe(true);
    expect(answer.reviewReason).toBe('No text generator configured');
  });

  it('flags required free text when the generator gives nothing back', async () => {
    const answer = await makeAnswerer(stubGenerator(null)).answer(
      question('Describe your ideal team', { kind: 'textarea', required: true }),
      job
    );
    expect(answer.reviewReason).toBe('Text generator returned no answer');
  });

  it('drafts but always flags questions on the review list', async () => {
    const answer = await makeAnswerer(stubGenerator('Dear team'), ['cover letter']).answer(
      question('Cover Letter', { kind: 'textarea' }),
      job
    );
    expect(answer).toEqual({
      value: 'Dear team',
      answeredBy: 'llm',
      needsReview: true,
      reviewReason: 'Always reviewed: cover letter',
    });
  });

  it('builds the prompt from the job and profile', () => {
    const prompt = makeAnswerer().buildPrompt(question('Why do you want to join?'), job, 50);
    expect(prompt).toBe(
      [
        'Position: Backend Engineer at Acme',
        'Applicant: Sam Tester, Portland, OR',
        'Education: BS in Computer Science, Test University (2025-05)',
        'Experience: Intern at Fixture Labs (2024-06 - 2024-08)',
        'Skills: TypeScript, SQL',
        '',
        'Question: Why do you want to join?',
        'Keep the answer under 50 characters.',
      ].join('\n')
    );
  });
});
