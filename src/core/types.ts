/**
 * Capability surfaces the engine consumes. All of them are structural:
 * anything with the right methods qualifies, no base class required.
 */
import type { Action, Observation, ObservationMap, ProposalDraft, TransitionDraft } from "../schemas/protocol.js";

export type Awaitable<T> = T | Promise<T>;

export type AgentId = string;
export type DelegateId = string;

/** The link a fading model draws a gain for. */
export interface LinkState {
    readonly channel_id: string;
    readonly time_index: number;
    /** Large-scale SNR before fading. */
    readonly snr_db: number;
    readonly distance_m?: number;
}

export interface FadingModel {
    /** Draw the small-scale gain, in dB, for one link at one instant. */
    sample(link: LinkState): number;
    /**
     * Restart the random stream. Simulators call this on reset with a seed
     * derived from the run seed, or `undefined` when the run is unseeded.
     */
    reseed?(seed: string | undefined): void;
}

export type Position = readonly number[];

export interface MobilityModel {
    advance(position: Position, dt: number): Position;
    reseed?(seed: string | undefined): void;
}

export interface ProposalContext {
    readonly step: number;
}

/** Delivered to an agent after every environment step. */
export interface AgentFeedback {
    readonly step: number;
    readonly observation: Observation | undefined;
    readonly reward: number | undefined;
    readonly done: boolean;
}

export interface Agent {
    /** Return a proposal, or null to abstain this step. */
    propose(observation: Observation, context: ProposalContext): Awaitable<ProposalDraft | null>;
    feedback?(feedback: AgentFeedback): Awaitable<void>;
}

/** An adapter to an external solver or numeric engine. */
export interface Tool {
    call(args: Record<string, unknown>): Awaitable<unknown>;
}

export interface Simulator {
    reset(seed?: number): Awaitable<ObservationMap>;
    step(actions: Record<AgentId, Action>): Awaitable<TransitionDraft>;
    registerFadingModel?(channelId: string, model: FadingModel): void;
    registerMobilityModel?(agentId: string, model: MobilityModel): void;
}

/** One record per orchestrator tick, handed to the external persistence layer. */
export interface TelemetryRecord {
    step_index: number;
    plan_summary: {
        committed: AgentId[];
        utilities: Record<AgentId, number>;
        failures: AgentId[];
    };
    observation_snapshot: ObservationMap;
    rewards: Record<AgentId, number>;
    done: boolean;
    /** Per-step KPIs by metric name. */
    metrics: Record<string, number>;
}

export interface TelemetrySink {
    record(entry: TelemetryRecord): Awaitable<void>;
}

function hasMethods(value: unknown, ...names: string[]): boolean {
    if (typeof value !== "object" || value === null) return false;
    const target: object = value;
    return names.every((name) => name in target && typeof Reflect.get(target, name) === "function");
}

export function isAgent(value: unknown): value is Agent {
    return hasMethods(value, "propose");
}

export function isTool(value: unknown): value is Tool {
    return hasMethods(value, "call");
}

export function isSimulator(value: unknown): value is Simulator {
    return hasMethods(value, "reset", "step");
}

export function isFadingModel(value: unknown): value is FadingModel {
    return hasMethods(value, "sample");
}

export function isMobilityModel(value: unknown): value is MobilityModel {
    return hasMethods(value, "advance");
}
