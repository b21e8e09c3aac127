/**
 * Core orchestration module.
 * Planner → run builder (lifecycle guard, locator policy, context stack,
 * dispatcher, retry policy) → transcript.
 * No CLI and no browser APIs; the driver comes in through its interface.
 */

export * from './errors.js';
export { SessionLifecycleGuard } from './lifecycle.js';
export type { LifecycleDecision, LifecycleView } from './lifecycle.js';
export { ContextStack, contextKey } from './contextStack.js';
export type { ContextFrame } from './contextStack.js';
export { validateLocator, assertLocator, bestLocatorFor, isStableClass, parseDomSnapshot } from './locatorPolicy.js';
export type { LocatorValidation, ValidateOptions } from './locatorPolicy.js';
export { createDispatcher } from './dispatcher.js';
export type { ActionDispatcher, DispatcherOptions } from './dispatcher.js';
export { executeWithRecovery } from './recovery.js';
export type { RecoveryOptions, RecoveryResult } from './recovery.js';
export { Transcript } from './transcript.js';
export { planProposalSchema, describeAction, payloadOf } from './planning.js';
export type { PlanProposal, PlanningCollaborator, PlanningInput } from './planning.js';
export { createLLMPlanner } from './planner.js';
export { createScriptedPlanner } from './scriptedPlanner.js';
export { runPlan } from './runBuilder.js';
export type { RunConfig } from './runBuilder.js';
export { runAgentLoop, ARTIFACT_FILES } from './agentLoop.js';
export type { AgentLoopConfig, AgentLoopResult } from './agentLoop.js';
