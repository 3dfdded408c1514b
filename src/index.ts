/**
 * meshstep — Public API
 *
 * Lockstep coordination of control agents over a composite of
 * independently stepped network simulators.
 */

// Core
export {
    BuildContext,
    CapabilityRegistry,
    ModelResolver,
    RicianFading,
    RayleighFading,
    NakagamiFading,
    RandomWalkMobility,
    DelegateSimulator,
    CompositeEnvironment,
    Coordinator,
    maxUtilityPolicy,
    weightedMetricsPolicy,
    policyFromConfig,
    rankProposals,
    createRandom,
    isAgent,
    isTool,
    isSimulator,
    isFadingModel,
    isMobilityModel,
} from "./core/index.js";
export type {
    Agent,
    AgentFeedback,
    AgentId,
    CapabilityFactory,
    CapabilityKind,
    CompositeEvents,
    DelegateDependencies,
    DelegateId,
    DelegateLifecycle,
    FadingModel,
    LinkState,
    MobilityModel,
    ModuleLoader,
    Plan,
    PlanTelemetry,
    Position,
    ProposalContext,
    ProposalResult,
    RankingPolicy,
    Simulator,
    TelemetryRecord,
    TelemetrySink,
    Tool,
} from "./core/index.js";

// Orchestration
export { OrchestratorLoop, buildOrchestration, runOrchestration, summarizeStep } from "./orchestrator.js";
export type {
    CompletionReason,
    LoopStatus,
    Orchestration,
    OrchestratorEvents,
    RunOptions,
    RunOrchestrationOptions,
    RunOutcome,
    RunState,
    StepRecord,
} from "./orchestrator.js";

// Built-ins
export { registerBuiltins, BUILTIN_CAPABILITIES } from "./builtins.js";
export { LinkSimulator, LinkSimulatorOptions, linkChannelId } from "./simulators/link.js";
export { PowerControlAgent, LlmAgent, LlmDecision } from "./agents/index.js";

// Schemas
export {
    Action,
    Observation,
    ObservationMap,
    Proposal,
    Transition,
    DelegateSpec,
    FadingModelEntry,
    MobilityModelEntry,
    OrchestrationConfig,
    CoordinatorConfig,
    parseOrchestrationConfig,
} from "./schemas/index.js";
export type { ModelSpec, ModelSource, OrchestrationConfigInput } from "./schemas/index.js";

// Telemetry
export { SqliteTelemetryStore } from "./telemetry/sqlite.js";
export type { StoredRun } from "./telemetry/sqlite.js";
export {
    MetricRegistry,
    BUILTIN_METRICS,
    energyMetric,
    throughputMetric,
    fairnessMetric,
    latencyMetric,
    handoffSuccessMetric,
} from "./telemetry/metrics.js";
export type { MetricFunction, MetricInput } from "./telemetry/metrics.js";

// LLM
export { LLMClient, resolveLanguageModel } from "./llm/index.js";
export type { StructuredGenerator } from "./llm/index.js";

// Errors
export {
    ConfigurationError,
    UnknownCapabilityError,
    ResolutionError,
    AgentIdCollisionError,
    ModelResolutionError,
    InvalidModelParametersError,
    ProposalError,
    DelegateStepError,
    DelegateTimeoutError,
} from "./errors/index.js";

// Logging
export { createLogger } from "./utils/logger.js";
