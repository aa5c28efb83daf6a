/**
 * Browser management module using Playwright
 *
 * One Chromium process is shared; every session gets its own BrowserContext so
 * cookies, tabs and navigation state never cross between concurrent runs.
 */

import { chromium } from 'playwright';
import type { Browser, BrowserContext, Locator, Page } from 'playwright';
import * as fs from 'fs';
import * as path from 'path';
import type {
  AutomationPage,
  BrowserDriver,
  BrowserSession,
  BrowserSettings,
  ClickTarget,
  FormField,
  OpenedPage,
  QuestionKind,
} from '../types';
import { getLogger } from '../log/logger';

const logger = getLogger();

const TARGET_ATTRIBUTE = 'data-apply-target';
const FIELD_ATTRIBUTE = 'data-apply-field';

interface RawField {
  id: string;
  tag: string;
  type: string;
  label: string;
  name: string;
  required: boolean;
  value: string;
  options: string[];
}

function toQuestionKind(tag: string, type: string): QuestionKind {
  if (tag === 'select') return 'select';
  if (tag === 'textarea') return 'textarea';
  switch (type) {
    case 'checkbox':
      return 'checkbox';
    case 'radio':
      return 'radio';
    case 'file':
      return 'file';
    default:
      return 'text';
  }
}

export class PlaywrightPage implements AutomationPage {
  constructor(
    private readonly page: Page,
    private readonly settings: BrowserSettings
  ) {}

  url(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async bodyText(): Promise<string> {
    return (await this.page.textContent('body')) || '';
  }

  private first(selector: string): Locator {
    return this.page.locator(selector).first();
  }

  async isVisible(selector: string): Promise<boolean> {
    try {
      return await this.first(selector).isVisible();
    } catch {
      return false;
    }
  }

  /**
   * Element interactions report false when the element is missing or refuses the action
   */
  private async attempt(selector: string, action: (locator: Locator) => Promise<unknown>): Promise<boolean> {
    const locator = this.first(selector);
    try {
      if ((await locator.count()) === 0) return false;
      await action(locator);
      return true;
    } catch (error) {
      logger.debug(`[Browser] Action on "${selector}" failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  click(selector: string): Promise<boolean> {
    return this.attempt(selector, locator => locator.click({ timeout: this.settings.timeout }));
  }

  fill(selector: string, value: string): Promise<boolean> {
    return this.attempt(selector, locator => locator.fill(value, { timeout: this.settings.timeout }));
  }

  selectOption(selector: string, label: string): Promise<boolean> {
    return this.attempt(selector, locator => locator.selectOption({ label }, { timeout: this.settings.timeout }));
  }

  check(selector: string): Promise<boolean> {
    return this.attempt(selector, locator => locator.check({ timeout: this.settings.timeout }));
  }

  setInputFiles(selector: string, filePath: string): Promise<boolean> {
    return this.attempt(selector, locator => locator.setInputFiles(filePath, { timeout: this.settings.timeout }));
  }

  /**
   * Tag each visible match with an index attribute so it can be clicked later
   */
  async visibleTexts(selector: string): Promise<ClickTarget[]> {
    const tagged = await this.page.$$eval(
      selector,
      (elements, attribute) => {
        document.querySelectorAll(`[${attribute}]`).forEach(stale => stale.removeAttribute(attribute));
        return elements.flatMap((el, index) => {
          const style = window.getComputedStyle(el);
          if (style.display === 'none' || style.visibility === 'hidden') return [];
          const rect = el.getBoundingClientRect();
          if (rect.width === 0 && rect.height === 0) return [];
          const value = el instanceof HTMLInputElement ? el.value : '';
          el.setAttribute(attribute, String(index));
          return [{ index, text: (el.textContent || value || '').replace(/\s+/g, ' ').trim() }];
        });
      },
      TARGET_ATTRIBUTE
    );

    return tagged.map(({ index, text }) => ({ selector: `[${TARGET_ATTRIBUTE}="${index}"]`, text }));
  }

  async extractFields(): Promise<FormField[]> {
    const raw: RawField[] = await this.page.$$eval(
      'input, select, textarea',
      (elements, attribute) => {
        document.querySelectorAll(`[${attribute}]`).forEach(stale => stale.removeAttribute(attribute));
        return elements.flatMap((el, index) => {
          if (!(el instanceof HTMLInputElement || el instanceof HTMLSelectElement || el instanceof HTMLTextAreaElement)) {
            return [];
          }
          const type = el instanceof HTMLInputElement ? el.type : '';
          if (['hidden', 'submit', 'button', 'reset', 'image'].includes(type) || el.disabled) return [];
          const style = window.getComputedStyle(el);
          if (style.display === 'none' || style.visibility === 'hidden') return [];

          let label = el.getAttribute('aria-label') || '';
          if (!label && el.id) {
            const labelEl = document.querySelector(`label[for="${CSS.escape(el.id)}"]`);
            if (labelEl) label = labelEl.textContent || '';
          }
          if (!label) {
            const wrapping = el.closest('label');
            if (wrapping) label = wrapping.textContent || '';
          }
          if (!label) {
            label = el.getAttribute('placeholder') || el.name || '';
          }

          el.setAttribute(attribute, String(index));
          return [{
            id: String(index),
            tag: el.tagName.toLowerCase(),
            type,
            label: label.replace(/\s+/g, ' ').trim().slice(0, 200),
            name: el.name || el.id || '',
            required: el.required || el.getAttribute('aria-required') === 'true',
            value: el instanceof HTMLInputElement && (type === 'checkbox' || type === 'radio') ? String(el.checked) : el.value,
            options: el instanceof HTMLSelectElement ? Array.from(el.options).map(o => (o.textContent || '').trim()) : [],
          }];
        });
      },
      FIELD_ATTRIBUTE
    );

    return raw.map(field => ({
      selector: `[${FIELD_ATTRIBUTE}="${field.id}"]`,
      kind: toQuestionKind(field.tag, field.type),
      label: field.label,
      name: field.name,
      required: field.required,
      currentValue: field.value,
      options: field.options,
    }));
  }

  async waitForLoad(timeoutMs: number = this.settings.navigationTimeout): Promise<boolean> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
      return true;
    } catch (error) {
      logger.debug(`[Browser] Page did not settle: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async waitForPopup(action: () => Promise<unknown>, timeoutMs: number): Promise<AutomationPage | null> {
    const popup = this.page
      .context()
      .waitForEvent('page', { timeout: timeoutMs })
      .catch(() => null);

    await action();
    const opened = await popup;
    if (!opened) return null;

    await opened.waitForLoadState('domcontentloaded').catch((error: unknown) => {
      logger.debug(`[Browser] New tab did not finish loading: ${String(error)}`);
    });
    return new PlaywrightPage(opened, this.settings);
  }

  bringToFront(): Promise<void> {
    return this.page.bringToFront();
  }

  async screenshot(filePath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await this.page.screenshot({ path: filePath, fullPage: true });
    logger.debug(`Screenshot saved: ${filePath}`);
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly context: BrowserContext,
    private readonly settings: BrowserSettings
  ) {}

  async open(url: string, timeoutMs: number): Promise<OpenedPage> {
    const page = await this.context.newPage();
    page.setDefaultTimeout(this.settings.timeout);

    logger.debug(`Navigating to: ${url}`);
    const response = await page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: timeoutMs,
    });

    return {
      page: new PlaywrightPage(page, this.settings),
      status: response ? response.status() : null,
    };
  }

  close(): Promise<void> {
    return this.context.close();
  }
}

export class PlaywrightDriver implements BrowserDriver {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly settings: BrowserSettings) {}

  private launch(): Promise<Browser> {
    if (!this.browser) {
      logger.info('Initializing browser...');
      this.browser = chromium.launch({
        headless: this.settings.headless,
        slowMo: this.settings.slowMo,
        args: ['--disable-blink-features=AutomationControlled', '--no-sandbox'],
      }).catch((error: unknown) => {
        this.browser = null;
        throw error;
      });
    }
    return this.browser;
  }

  async newSession(): Promise<BrowserSession> {
    const browser = await this.launch();
    const context = await browser.newContext({ viewport: this.settings.viewport });
    return new PlaywrightSession(context, this.settings);
  }

  async shutdown(): Promise<void> {
    if (!this.browser) return;
    const browser = await this.browser;
    this.browser = null;
    await browser.close();
    logger.info('Browser closed');
  }
}

/**
 * Screenshot path under the configured directory, stamped with the time
 */
export function screenshotPath(outputDir: string, name: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return path.join(outputDir, `${name}-${timestamp}.png`);
}

export default {
  PlaywrightDriver,
  PlaywrightPage,
  screenshotPath,
};
