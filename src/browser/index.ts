/**
 * Browser execution module.
 * Playwright-backed automation driver. No LLM calls and no policy.
 * Receives validated actions scoped to a window and frame chain.
 */

export { toPlaywrightSelector, frameSelector, describeLocator } from './selectors.js';
export { createPlaywrightDriver } from './runner.js';
export type { RunnerConfig } from './runner.js';
export type { AutomationDriver, DriverResult, DriverScope, WindowTarget } from './driver.js';
export { cleanMarkup, truncateMarkup } from './markup.js';
