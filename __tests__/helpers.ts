import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { loadATSMappings, parseCandidateProfile, parseFormQuestions, DEFAULT_SETTINGS } from '../src/config';
import { Logger, configureLogger } from '../src/log/logger';
import { QuestionAnswerer } from '../src/fillers/question-answerer';
import type { Notification, NotificationChannel } from '../src/notify/notifier';
import type { FillerContext } from '../src/fillers/form-actions';
import type {
  AutomationPage,
  BrowserDriver,
  BrowserSession,
  ClickTarget,
  FormField,
  Job,
  OpenedPage,
  TextGenerator,
} from '../src/types';

// ── Shared fixtures ─────────────────────────────────────────────────────

export const quietLogger = new Logger('error', null);

configureLogger('error', null);

export const mappings = loadATSMappings();

export const profile = parseCandidateProfile({
  personal: {
    first_name: 'Sam',
    last_name: 'Tester',
    email: 'sam@example.com',
    phone: '555-0199',
    location: 'Portland, OR',
    address: { street: '2 Test Ave', city: 'Portland', state: 'OR', zip: '97201', country: 'United States' },
  },
  education: [
    { school: 'Test University', degree: 'BS', field: 'Computer Science', graduation: '2025-05', gpa: '3.8' },
  ],
  work_experience: [
    { company: 'Fixture Labs', title: 'Intern', start_date: '2024-06', end_date: '2024-08', description: [] },
  ],
  skills: ['TypeScript', 'SQL'],
  links: { github: 'https://github.com/sam-tester', linkedin: 'https://linkedin.com/in/sam-tester' },
  compliance: {
    require_sponsorship: false,
    authorized_to_work: true,
    veteran_status: 'I am not a protected veteran',
    disability_status: 'No, I do not have a disability',
  },
});

export const questions = parseFormQuestions({
  profileFields: [
    { key: 'first_name', patterns: ['first name'] },
    { key: 'last_name', patterns: ['last name'] },
    { key: 'email', patterns: ['email'] },
    { key: 'phone', patterns: ['phone'] },
    { key: 'city', patterns: ['\\bcity\\b'] },
    { key: 'sponsorship', patterns: ['sponsorship'] },
    { key: 'authorized', patterns: ['authorized to work'] },
    { key: 'veteran_status', patterns: ['veteran'] },
    { key: 'race_ethnicity', patterns: ['ethnicity'] },
  ],
  openEnded: [
    { key: 'why_company', patterns: ['why do you want'], maxLength: 50 },
    { key: 'cover_letter', patterns: ['cover letter'], maxLength: 2500 },
  ],
});

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'job-1',
    title: 'Backend Engineer',
    company: 'Acme',
    location: 'Remote',
    url: 'https://boards.greenhouse.io/acme/jobs/1',
    source: 'manual',
    ats: 'unknown',
    status: 'new',
    discovered_at: '2026-01-01T00:00:00.000Z',
    applied_at: null,
    tags: [],
    ...overrides,
  };
}

export function stubGenerator(reply: string | null): TextGenerator & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    generate: vi.fn(async (prompt: string) => {
      prompts.push(prompt);
      return reply;
    }),
  };
}

export function makeAnswerer(generator: TextGenerator | null = null, alwaysReview: string[] = []): QuestionAnswerer {
  return new QuestionAnswerer(profile, questions, {
    generator,
    llm: { ...DEFAULT_SETTINGS.llm, alwaysReviewQuestions: alwaysReview },
    logger: quietLogger,
  });
}

export function makeFillerContext(overrides: Partial<FillerContext> = {}): FillerContext {
  return {
    answerer: makeAnswerer(),
    mappings,
    resumePath: '/tmp/resume.pdf',
    reviewMode: false,
    headless: true,
    humanWaitTimeoutMs: 1000,
    settleTimeoutMs: 10,
    logger: quietLogger,
    sleep: async () => {},
    ...overrides,
  };
}

export function field(overrides: Partial<FormField> & Pick<FormField, 'selector' | 'label'>): FormField {
  return {
    kind: 'text',
    name: '',
    required: false,
    currentValue: '',
    options: [],
    ...overrides,
  };
}

// ── Scripted browser ────────────────────────────────────────────────────

export interface PageState {
  url: string;
  html?: string;
  text?: string;
  /** Selectors reported as visible */
  visible?: string[];
  /** Results of visibleTexts(selector) */
  targets?: Record<string, ClickTarget[]>;
  fields?: FormField[];
}

/** A click handler may navigate in place, or return a new page to simulate a new tab */
type ClickHandler = (page: FakePage) => FakePage | void;

export class FakePage implements AutomationPage {
  private state: Required<PageState>;
  private readonly handlers = new Map<string, ClickHandler>();
  private popup: FakePage | null = null;

  readonly clicks: string[] = [];
  readonly fills = new Map<string, string>();
  readonly selections = new Map<string, string>();
  readonly checks: string[] = [];
  readonly uploads: string[] = [];
  readonly screenshots: string[] = [];
  closed = false;

  constructor(state: PageState) {
    this.state = FakePage.complete(state);
  }

  private static complete(state: PageState): Required<PageState> {
    return {
      html: '',
      text: '',
      visible: [],
      targets: {},
      fields: [],
      ...state,
    };
  }

  navigate(state: PageState): void {
    this.state = FakePage.complete(state);
  }

  hide(selector: string): void {
    this.state.visible = this.state.visible.filter(s => s !== selector);
  }

  onClick(selector: string, handler: ClickHandler): this {
    this.handlers.set(selector, handler);
    return this;
  }

  private knows(selector: string): boolean {
    if (this.handlers.has(selector) || this.state.visible.includes(selector)) return true;
    if (this.state.fields.some(f => f.selector === selector)) return true;
    return Object.values(this.state.targets).some(list => list.some(t => t.selector === selector));
  }

  url(): string {
    return this.state.url;
  }

  async title(): Promise<string> {
    return '';
  }

  async content(): Promise<string> {
    return this.state.html;
  }

  async bodyText(): Promise<string> {
    return this.state.text;
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.state.visible.includes(selector);
  }

  async click(selector: string): Promise<boolean> {
    if (!this.knows(selector)) return false;
    this.clicks.push(selector);
    const handler = this.handlers.get(selector);
    const opened = handler ? handler(this) : undefined;
    if (opened) this.popup = opened;
    return true;
  }

  async fill(selector: string, value: string): Promise<boolean> {
    const target = this.state.fields.find(f => f.selector === selector);
    if (!target && !this.state.visible.includes(selector)) return false;
    if (target) target.currentValue = value;
    this.fills.set(selector, value);
    return true;
  }

  async selectOption(selector: string, label: string): Promise<boolean> {
    const target = this.state.fields.find(f => f.selector === selector);
    if (!target || !target.options.includes(label)) return false;
    target.currentValue = label;
    this.selections.set(selector, label);
    return true;
  }

  async check(selector: string): Promise<boolean> {
    if (!this.knows(selector)) return false;
    this.checks.push(selector);
    return true;
  }

  async setInputFiles(selector: string, filePath: string): Promise<boolean> {
    if (!this.knows(selector)) return false;
    this.uploads.push(`${selector}=${filePath}`);
    return true;
  }

  async visibleTexts(selector: string): Promise<ClickTarget[]> {
    return this.state.targets[selector] ?? [];
  }

  async extractFields(): Promise<FormField[]> {
    return this.state.fields.map(f => ({ ...f, options: [...f.options] }));
  }

  async waitForLoad(): Promise<boolean> {
    return true;
  }

  async waitForPopup(action: () => Promise<unknown>): Promise<AutomationPage | null> {
    this.popup = null;
    await action();
    const opened = this.popup;
    this.popup = null;
    return opened;
  }

  async bringToFront(): Promise<void> {}

  async screenshot(filePath: string): Promise<void> {
    this.screenshots.push(filePath);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export type PageScript = (url: string) => OpenedPage | Promise<OpenedPage>;

export class FakeSession implements BrowserSession {
  closed = false;

  constructor(private readonly script: PageScript) {}

  async open(url: string): Promise<OpenedPage> {
    return this.script(url);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeDriver implements BrowserDriver {
  readonly sessions: FakeSession[] = [];
  shutdownCalls = 0;

  constructor(private readonly script: PageScript) {}

  async newSession(): Promise<BrowserSession> {
    const session = new FakeSession(this.script);
    this.sessions.push(session);
    return session;
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls++;
  }
}

// ── Notifications ───────────────────────────────────────────────────────

export class RecordingChannel implements NotificationChannel {
  readonly name = 'recording';
  readonly sent: Notification[] = [];

  async send(notification: Notification): Promise<boolean> {
    this.sent.push(notification);
    return true;
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export function fetchReturning(status: number, body: unknown = {}): Mock<typeof fetch> {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return vi.fn<typeof fetch>(async () => new Response(status === 204 ? null : text, { status }));
}
