/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Protocol
export { Action, Observation, ObservationMap, Proposal, Transition } from "./protocol.js";
export type { ProposalDraft, TransitionDraft } from "./protocol.js";

// Models
export { ModelParameter, FadingModelEntry, MobilityModelEntry, formatIssues } from "./model.js";
export type { ModelSpec, ModelSource } from "./model.js";

// Delegates
export { DelegateSpec, DelegateErrorPolicy } from "./delegate.js";
export type { DelegateSpecInput } from "./delegate.js";

// Configuration
export {
    OrchestrationConfig,
    CoordinatorConfig,
    RankingPolicyConfig,
    TerminationPolicy,
    AgentEntry,
    ToolEntry,
    parseOrchestrationConfig,
} from "./config.js";
export type { OrchestrationConfigInput } from "./config.js";
