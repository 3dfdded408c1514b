export { BuildContext, isQualifiedReference, parseQualifiedReference } from "./context.js";
export type { BuildContextOptions, ModuleLoader, QualifiedReference } from "./context.js";
export { CapabilityRegistry, instantiate } from "./registry.js";
export type { CapabilityFactory, CapabilityKind } from "./registry.js";
export {
    ModelResolver,
    RicianFading,
    RayleighFading,
    NakagamiFading,
    RandomWalkMobility,
    FADING_ALIASES,
    MOBILITY_ALIASES,
    latestPerTarget,
} from "./models.js";
export type { FadingFamily, MobilityFamily } from "./models.js";
export { createRandom } from "./random.js";
export type { RandomSource } from "./random.js";
export { DelegateSimulator, withDeadline } from "./delegate.js";
export type { DelegateDependencies, DelegateLifecycle } from "./delegate.js";
export { CompositeEnvironment, assertDisjointAgents } from "./environment.js";
export type { CompositeEvents, CompositeOptions } from "./environment.js";
export {
    Coordinator,
    maxUtilityPolicy,
    weightedMetricsPolicy,
    policyFromConfig,
    rankProposals,
} from "./coordinator.js";
export type {
    CoordinatorOptions,
    Plan,
    PlanRequest,
    PlanTelemetry,
    ProposalResult,
    RankedProposal,
    RankingPolicy,
} from "./coordinator.js";
export { isAgent, isTool, isSimulator, isFadingModel, isMobilityModel } from "./types.js";
export type {
    Agent,
    AgentFeedback,
    AgentId,
    Awaitable,
    DelegateId,
    FadingModel,
    LinkState,
    MobilityModel,
    Position,
    ProposalContext,
    Simulator,
    TelemetryRecord,
    TelemetrySink,
    Tool,
} from "./types.js";
