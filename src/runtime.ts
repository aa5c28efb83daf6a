/**
 * Wires configuration into a ready orchestrator
 */

import * as path from 'path';
import {
  PROJECT_ROOT,
  getResumePath,
  loadATSMappings,
  loadCandidateProfile,
  loadCredentials,
  loadFormQuestions,
  loadSettings,
} from './config';
import type { Credentials } from './config';
import { PlaywrightDriver } from './browser/browser-manager';
import { Orchestrator } from './core/orchestrator';
import { createFillerRegistry } from './fillers/registry';
import { QuestionAnswerer } from './fillers/question-answerer';
import { GithubJobSource } from './ingest/github-parser';
import { createTextGenerator } from './llm/text-generator';
import { configureLogger } from './log/logger';
import type { Logger } from './log/logger';
import { RedirectResolver } from './navigator/redirect-resolver';
import { PlatformClassifier } from './normalize/ats-detector';
import { createNotifier } from './notify/notifier';
import { CancellationRegistry } from './registry/cancellation-registry';
import { FileJobStore } from './store/job-store';
import type { ATSMappings, CandidateProfile, Settings } from './types';

export interface Runtime {
  settings: Settings;
  profile: CandidateProfile;
  mappings: ATSMappings;
  credentials: Credentials;
  logger: Logger;
  store: FileJobStore;
  classifier: PlatformClassifier;
  driver: PlaywrightDriver;
  orchestrator: Orchestrator;
  resumePath: string | null;
}

export function resolveFromRoot(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(PROJECT_ROOT, filePath);
}

export function createRuntime(overrides: Partial<Settings['application']> = {}): Runtime {
  const loaded = loadSettings();
  const settings: Settings = {
    ...loaded,
    application: { ...loaded.application, ...overrides },
  };

  const logger = configureLogger(settings.logging.level, resolveFromRoot(settings.logging.outputDir));
  const profile = loadCandidateProfile();
  const mappings = loadATSMappings();
  const credentials = loadCredentials();
  const resumePath = getResumePath(profile);

  const store = FileJobStore.open(resolveFromRoot(settings.store.path));
  const classifier = new PlatformClassifier(mappings);
  const driver = new PlaywrightDriver(settings.browser);

  const answerer = new QuestionAnswerer(profile, loadFormQuestions(), {
    generator: createTextGenerator(settings.llm, credentials),
    llm: settings.llm,
  });

  const fillers = createFillerRegistry({
    answerer,
    mappings,
    resumePath,
    reviewMode: settings.application.reviewMode,
    headless: settings.browser.headless,
    humanWaitTimeoutMs: settings.application.humanWaitTimeoutMs,
    settleTimeoutMs: settings.browser.timeout,
    logger,
  });

  const orchestrator = new Orchestrator({
    store,
    classifier,
    resolver: new RedirectResolver(classifier, { applySelectors: mappings.applySelectors, logger }),
    fillers,
    runs: new CancellationRegistry(),
    driver,
    notifier: createNotifier(settings.notifications),
    settings: {
      application: {
        ...settings.application,
        screenshotsDir: resolveFromRoot(settings.application.screenshotsDir),
      },
      navigationTimeout: settings.browser.navigationTimeout,
    },
    discovery: new GithubJobSource(store, settings.jobSource),
    logger,
  });

  return { settings, profile, mappings, credentials, logger, store, classifier, driver, orchestrator, resumePath };
}

export default {
  createRuntime,
  resolveFromRoot,
};
