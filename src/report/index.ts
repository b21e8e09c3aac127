/**
 * Report generation module.
 * Deterministic, no LLM calls.
 * Transforms a finished run into markdown, JSON and replayable plan artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON, describeContext } from './reporter.js';
export type { JsonOutput, JsonOutputStep, JsonOutputFeedback } from './reporter.js';
export { generatePlanYAML, parsePlanYAML, recordPlan } from './plan.js';
export type { RecordedPlan } from './plan.js';
