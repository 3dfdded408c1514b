/**
 * Orchestrator — the lockstep run loop.
 *
 * Each tick: check for cancellation, ask the coordinator for a plan, step
 * the composite environment with the plan's actions, record the step, hand
 * a telemetry record to the sink, then deliver feedback to the agents.
 *
 *   idle ──run()──▶ running ──▶ completed | aborted ──reset()──▶ idle
 */
import { EventEmitter } from "events";
import type { Logger } from "pino";
import { BuildContext } from "./core/context.js";
import { CapabilityRegistry } from "./core/registry.js";
import { ModelResolver } from "./core/models.js";
import { CompositeEnvironment } from "./core/environment.js";
import type { DelegateLifecycle } from "./core/delegate.js";
import { Coordinator, policyFromConfig } from "./core/coordinator.js";
import type { Plan } from "./core/coordinator.js";
import { isTool } from "./core/types.js";
import type { AgentId, DelegateId, TelemetryRecord, TelemetrySink, Tool } from "./core/types.js";
import type { ObservationMap, Transition } from "./schemas/protocol.js";
import { parseOrchestrationConfig } from "./schemas/config.js";
import type { OrchestrationConfig } from "./schemas/config.js";
import { registerBuiltins } from "./builtins.js";
import { MetricRegistry } from "./telemetry/metrics.js";
import { ConfigurationError, DelegateStepError } from "./errors/index.js";
import { silentLogger } from "./utils/logger.js";

export type LoopStatus = "idle" | "running" | "completed" | "aborted";

export type CompletionReason = "delegate-done" | "horizon-exhausted" | "cancelled";

export interface StepRecord {
    step: number;
    plan: Plan;
    transition: Transition;
    metrics: Record<string, number>;
}

export interface RunState {
    /** Ticks completed so far. */
    step: number;
    delegates: Record<DelegateId, DelegateLifecycle>;
    history: StepRecord[];
}

export type RunOutcome =
    | { status: "completed"; reason: CompletionReason; steps: number; history: StepRecord[] }
    | { status: "aborted"; error: Error; steps: number; history: StepRecord[] };

export interface OrchestratorEvents {
    "run:start": [{ maxSteps: number; seed: number | undefined }];
    "step:complete": [{ record: StepRecord }];
    "run:complete": [{ outcome: RunOutcome }];
}

export interface OrchestratorLoopOptions {
    environment: CompositeEnvironment;
    coordinator: Coordinator;
    telemetry?: TelemetrySink;
    /** Default: every built-in metric. */
    metrics?: MetricRegistry;
    logger?: Logger;
}

export interface RunOptions {
    maxSteps: number;
    seed?: number;
    /** Observed at tick boundaries only. */
    signal?: AbortSignal;
}

/** Condense a step into the record handed to the telemetry sink. */
export function summarizeStep(record: StepRecord): TelemetryRecord {
    const { plan, transition } = record;
    return {
        step_index: record.step,
        plan_summary: {
            committed: [...plan.committed],
            utilities: { ...plan.telemetry.utilities },
            failures: plan.telemetry.failures.map((failure) => failure.agent_id),
        },
        observation_snapshot: structuredClone(transition.observations),
        rewards: { ...transition.rewards },
        done: transition.done,
        metrics: { ...record.metrics },
    };
}

function assertStepBudget(maxSteps: number): void {
    if (!Number.isInteger(maxSteps) || maxSteps < 0) {
        throw new ConfigurationError(`maxSteps must be a non-negative integer, got ${maxSteps}.`);
    }
}

function emptyState(): RunState {
    return { step: 0, delegates: {}, history: [] };
}

export class OrchestratorLoop extends EventEmitter<OrchestratorEvents> {
    public readonly environment: CompositeEnvironment;
    public readonly coordinator: Coordinator;

    private readonly telemetry?: TelemetrySink;
    private readonly metrics: MetricRegistry;
    private readonly logger: Logger;

    private currentStatus: LoopStatus = "idle";
    private runState: RunState = emptyState();
    private cancelRequested = false;

    constructor(options: OrchestratorLoopOptions) {
        super();
        this.environment = options.environment;
        this.coordinator = options.coordinator;
        this.telemetry = options.telemetry;
        this.logger = options.logger ?? silentLogger;
        this.metrics = options.metrics ?? new MetricRegistry({ logger: this.logger });
    }

    get status(): LoopStatus {
        return this.currentStatus;
    }

    get state(): Readonly<RunState> {
        return this.runState;
    }

    /** Stop before the next tick. A tick already in progress runs to completion. */
    cancel(): void {
        this.cancelRequested = true;
    }

    /** Return a finished loop to `idle` and clear its run state. */
    reset(): void {
        if (this.currentStatus === "running") {
            throw new Error("Cannot reset a running orchestrator; cancel it first.");
        }
        this.currentStatus = "idle";
        this.runState = emptyState();
        this.cancelRequested = false;
    }

    async run(options: RunOptions): Promise<RunOutcome> {
        if (this.currentStatus !== "idle") {
            throw new Error(`Cannot run from state "${this.currentStatus}"; call reset() first.`);
        }
        const { maxSteps, seed, signal } = options;
        assertStepBudget(maxSteps);
        this.currentStatus = "running";
        this.cancelRequested = false;
        this.emit("run:start", { maxSteps, seed });
        this.logger.info({ maxSteps, seed }, "run started");

        let outcome: RunOutcome;
        try {
            const reason = await this.loop(maxSteps, seed, signal);
            outcome = { status: "completed", reason, steps: this.runState.step, history: this.runState.history };
            this.currentStatus = "completed";
            this.logger.info({ reason, steps: outcome.steps }, "run completed");
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            outcome = { status: "aborted", error, steps: this.runState.step, history: this.runState.history };
            this.currentStatus = "aborted";
            this.logger.error({ err: error, steps: outcome.steps }, "run aborted");
        }

        this.emit("run:complete", { outcome });
        return outcome;
    }

    private async loop(maxSteps: number, seed: number | undefined, signal: AbortSignal | undefined): Promise<CompletionReason> {
        let observations: ObservationMap = await this.environment.reset(seed);
        this.runState.delegates = this.environment.lifecycles();

        for (let step = 0; step < maxSteps; step++) {
            if (this.cancelRequested || signal?.aborted) return "cancelled";

            const plan = await this.coordinator.step(observations, {
                step,
                requiredAgentIds: this.environment.requiredAgentIds(),
            });
            const transition = await this.environment.step(plan.actions);

            const metrics = this.metrics.compute({ step, plan, transition });
            const record: StepRecord = { step, plan, transition, metrics };
            this.runState.history.push(record);
            this.runState.step = step + 1;
            this.runState.delegates = this.environment.lifecycles();

            await this.telemetry?.record(summarizeStep(record));
            await this.deliverFeedback(step, transition);
            this.emit("step:complete", { record });

            observations = transition.observations;
            if (transition.done) return "delegate-done";
        }
        return this.cancelRequested || signal?.aborted ? "cancelled" : "horizon-exhausted";
    }

    private async deliverFeedback(step: number, transition: Transition): Promise<void> {
        for (const { id, agent } of this.coordinator.agents()) {
            if (!agent.feedback) continue;
            try {
                await agent.feedback({
                    step,
                    observation: transition.observations[id],
                    reward: transition.rewards[id],
                    done: transition.done,
                });
            } catch (err) {
                this.logger.warn({ agentId: id, step, err }, "agent feedback failed");
            }
        }
    }
}

export interface BuildOptions {
    /** Pre-populated registry; built-ins are added where their names are free. */
    registry?: CapabilityRegistry;
    /** Directory relative references are resolved against. Ignored when `registry` is given. */
    baseDir?: string;
    telemetry?: TelemetrySink;
    /** Metrics to draw from; the configuration's `metrics` list selects among them. */
    metrics?: MetricRegistry;
    logger?: Logger;
}

export interface Orchestration {
    registry: CapabilityRegistry;
    environment: CompositeEnvironment;
    coordinator: Coordinator;
    loop: OrchestratorLoop;
}

/** Build every component a validated configuration describes. */
export async function buildOrchestration(config: OrchestrationConfig, options: BuildOptions = {}): Promise<Orchestration> {
    const logger = options.logger ?? silentLogger;
    const registry = options.registry ?? new CapabilityRegistry(new BuildContext({ baseDir: options.baseDir, logger }));
    registerBuiltins(registry);

    for (const tool of config.tools) {
        registry.register(tool.name, () => registry.construct(tool.reference, tool.args, tool.kwargs, "tool"), "tool");
    }
    for (const entry of config.agents) {
        registry.registerAgent(entry.id, () =>
            registry.construct(entry.reference, entry.args, { ...entry.kwargs, agent_id: entry.id }, "agent-type"),
        );
    }

    const environment = await CompositeEnvironment.build(
        config.delegates,
        { registry, models: new ModelResolver(registry), logger },
        { termination: config.termination, logger },
    );

    let optimizer: Tool | undefined;
    if (config.coordinator.optimizer_tool !== undefined) {
        const tool = await registry.resolve(config.coordinator.optimizer_tool, "tool");
        if (!isTool(tool)) {
            throw new ConfigurationError(`Tool "${config.coordinator.optimizer_tool}" does not implement call().`);
        }
        optimizer = tool;
    }

    const coordinator = await Coordinator.create(registry, {
        policy: policyFromConfig(config.coordinator.policy),
        defaultAction: config.coordinator.default_action,
        maxCommitted: config.coordinator.max_committed,
        concurrency: config.coordinator.concurrency,
        optimizer,
        logger,
    });

    const unmatched = environment.agentIds().filter((id: AgentId) => !registry.has(id));
    if (unmatched.length > 0) {
        logger.warn({ agents: unmatched }, "delegate agents without a registered agent receive the default action");
    }

    const available = options.metrics ?? new MetricRegistry({ logger });
    const metrics = config.metrics ? available.select(config.metrics) : available;

    const loop = new OrchestratorLoop({ environment, coordinator, telemetry: options.telemetry, metrics, logger });
    return { registry, environment, coordinator, loop };
}

export interface RunOrchestrationOptions extends BuildOptions {
    /** Overrides `max_steps` from the configuration. */
    maxSteps?: number;
    /** Overrides `seed` from the configuration. */
    seed?: number;
    signal?: AbortSignal;
    onStepComplete?: (record: StepRecord) => void;
    onDelegateDone?: (delegate: DelegateId, step: number) => void;
    onDelegateSkipped?: (delegate: DelegateId, step: number, error: DelegateStepError) => void;
}

/**
 * Parse a configuration document, build everything it describes and run it.
 * Configuration errors produce an `aborted` outcome with zero steps.
 */
export async function runOrchestration(input: unknown, options: RunOrchestrationOptions = {}): Promise<RunOutcome> {
    const { onStepComplete, onDelegateDone, onDelegateSkipped } = options;

    let config: OrchestrationConfig;
    let built: Orchestration;
    try {
        if (options.maxSteps !== undefined) assertStepBudget(options.maxSteps);
        config = parseOrchestrationConfig(input);
        built = await buildOrchestration(config, options);
    } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        (options.logger ?? silentLogger).error({ err }, "configuration rejected");
        return { status: "aborted", error: err, steps: 0, history: [] };
    }

    const { environment, loop } = built;
    if (onStepComplete) loop.on("step:complete", ({ record }) => onStepComplete(record));
    if (onDelegateDone) environment.on("delegate:done", ({ delegate, step }) => onDelegateDone(delegate, step));
    if (onDelegateSkipped) {
        environment.on("delegate:skipped", ({ delegate, step, error }) => onDelegateSkipped(delegate, step, error));
    }

    return loop.run({
        maxSteps: options.maxSteps ?? config.max_steps,
        seed: options.seed ?? config.seed,
        signal: options.signal,
    });
}
