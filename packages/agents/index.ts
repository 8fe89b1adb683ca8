// Alert triage: investigation orchestrator
// Fans an alert out to domain specialists, then synthesizes one weighted verdict

export {
  Orchestrator, createOrchestrator, newRequestId,
  Dispatcher, Synthesizer, FallbackController, classifyFailure,
  ruleBasedSynthesis, BatchInvestigator, createSpecialist,
} from './orchestrator/index.js';
export type {
  OrchestratorConfig, OrchestratorRuntime, AgentsDescription, Investigator,
  RuleBasedThresholds, BatchResult, BatchEntry,
} from './orchestrator/index.js';

export { BaseSpecialist } from './agents/base-specialist.js';
export type { SpecialistContext } from './agents/base-specialist.js';
export { PlatformSpecialist } from './agents/platform-specialist.js';
export { NetworkSpecialist } from './agents/network-specialist.js';
export { SecuritySpecialist } from './agents/security-specialist.js';
export { ReliabilitySpecialist } from './agents/reliability-specialist.js';
export { DataSpecialist } from './agents/data-specialist.js';

export * from './config/index.js';
export * from './types/index.js';

export { parseInvestigationRequest, validateInvestigationRequest } from './schemas/investigation.js';
export type { InvestigationRequestBody } from './schemas/investigation.js';
export { parseBatchInput, requestsFromWebhook } from './schemas/alertmanager.js';

export {
  InvalidRequestError, ReasoningBackendError, MalformedOutputError,
  ToolCallError, ToolTransportError, SynthesisConfigurationError, errorMessage,
} from './utils/errors.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';

// Bridge: MCP tool servers and reasoning backends
export * from './bridge/index.js';

export { toWireResponse, toWireFinding } from './utils/wire-format.js';
export type { WireInvestigationResponse, WireFinding } from './utils/wire-format.js';
