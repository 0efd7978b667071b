export { StaticBackend } from './StaticBackend.js';
export { ScriptedBackend, SUBMIT_SELECTORS } from './ScriptedBackend.js';
export { PlaywrightSessionFactory, withBrowserSession } from './BrowserSession.js';
export type {
  BrowserSession,
  BrowserSessionFactory,
  PlaywrightSessionOptions,
  ScriptedPage,
} from './BrowserSession.js';
export type { SubmissionBackend, SubmissionContext } from './types.js';
