export { Orchestrator, createOrchestrator, newRequestId } from './coordinator.js';
export type { OrchestratorConfig, OrchestratorRuntime, InvestigateOptions, AgentsDescription } from './coordinator.js';
export { Dispatcher, DEFAULT_DEADLINE_MS } from './dispatcher.js';
export type { DispatcherConfig, DispatchOptions, Investigator } from './dispatcher.js';
export { Synthesizer, SECONDARY_CONFIDENCE_CAP, DEFAULT_SYNTHESIS_TIMEOUT_MS, DEFAULT_SYNTHESIS_BUDGET_MS } from './synthesizer.js';
export type { SynthesizerConfig, SynthesizeOptions } from './synthesizer.js';
export { FallbackController, classifyFailure, MAX_ATTEMPTS_PER_TIER } from './fallback-controller.js';
export type { FallbackState, Transition } from './fallback-controller.js';
export { ruleBasedSynthesis, weightedConfidence, DEFAULT_THRESHOLDS } from './rule-based-synthesis.js';
export type { RuleBasedThresholds } from './rule-based-synthesis.js';
export { BatchInvestigator, renderBatchSummary } from './batch-investigator.js';
export type { BatchOptions, BatchProgress, BatchEntry, BatchResult } from './batch-investigator.js';
export { createSpecialist } from './specialist-factory.js';
