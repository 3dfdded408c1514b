/**
 * DelegateSimulator — one sub-simulator of the composite environment.
 *
 * Owns a fixed set of agent ids, filters the actions it is given to those
 * ids, validates what the simulator returns, and tracks its lifecycle:
 *
 *   active ──(transition.done)──▶ done ──(next step)──▶ held
 *
 * Once done, the final Transition is frozen and handed back unchanged on
 * every later step; the simulator itself is never called again.
 */
import type { Logger } from "pino";
import type { CapabilityRegistry } from "./registry.js";
import type { ModelResolver } from "./models.js";
import { latestPerTarget } from "./models.js";
import { isSimulator } from "./types.js";
import type { AgentId, Simulator } from "./types.js";
import { ObservationMap, Transition } from "../schemas/protocol.js";
import type { Action } from "../schemas/protocol.js";
import { formatIssues } from "../schemas/model.js";
import type { DelegateSpec } from "../schemas/delegate.js";
import {
    ConfigurationError,
    DelegateStepError,
    DelegateTimeoutError,
    describeError,
} from "../errors/index.js";
import { silentLogger } from "../utils/logger.js";

export type DelegateLifecycle = "active" | "done" | "held";

export interface DelegateDependencies {
    registry: CapabilityRegistry;
    models: ModelResolver;
    logger?: Logger;
}

const EMPTY_TRANSITION: Transition = deepFreeze({ observations: {}, rewards: {}, done: false, info: {} });

export class DelegateSimulator {
    public readonly spec: DelegateSpec;

    private readonly simulator: Simulator;
    private readonly owned: ReadonlySet<AgentId>;
    private readonly logger: Logger;

    private state: DelegateLifecycle = "active";
    private stepIndex = 0;
    private last: Transition | undefined;
    private held: Transition | undefined;

    private constructor(spec: DelegateSpec, simulator: Simulator, logger: Logger) {
        this.spec = spec;
        this.simulator = simulator;
        this.owned = new Set(spec.agent_ids);
        this.logger = logger;
    }

    /**
     * Construct the simulator named by `spec.reference` and inject the
     * configured fading and mobility overrides.
     */
    static async create(spec: DelegateSpec, deps: DelegateDependencies): Promise<DelegateSimulator> {
        const logger = (deps.logger ?? silentLogger).child({ delegate: spec.name });

        const instance = await deps.registry.construct(spec.reference, spec.args, spec.kwargs, "simulator");
        if (!isSimulator(instance)) {
            throw new ConfigurationError(
                `Delegate "${spec.name}": "${spec.reference}" does not implement reset() and step().`,
            );
        }

        for (const [channelId, modelSpec] of latestPerTarget(spec.fading_models)) {
            if (!instance.registerFadingModel) {
                throw new ConfigurationError(
                    `Delegate "${spec.name}" configures a fading model for "${channelId}" but its simulator has no fading slot.`,
                );
            }
            const model = await deps.models.resolveFading(modelSpec);
            instance.registerFadingModel(channelId, model);
            logger.debug({ channelId, source: modelSpec.source }, "fading model injected");
        }

        for (const [agentId, modelSpec] of latestPerTarget(spec.mobility_models)) {
            if (!spec.agent_ids.includes(agentId)) {
                throw new ConfigurationError(
                    `Delegate "${spec.name}" configures a mobility model for "${agentId}", which it does not own.`,
                );
            }
            if (!instance.registerMobilityModel) {
                throw new ConfigurationError(
                    `Delegate "${spec.name}" configures a mobility model for "${agentId}" but its simulator has no mobility slot.`,
                );
            }
            const model = await deps.models.resolveMobility(modelSpec);
            instance.registerMobilityModel(agentId, model);
            logger.debug({ agentId, source: modelSpec.source }, "mobility model injected");
        }

        return new DelegateSimulator(spec, instance, logger);
    }

    get name(): string {
        return this.spec.name;
    }

    get agentIds(): readonly AgentId[] {
        return this.spec.agent_ids;
    }

    get lifecycle(): DelegateLifecycle {
        return this.state;
    }

    isActive(): boolean {
        return this.state === "active";
    }

    owns(agentId: AgentId): boolean {
        return this.owned.has(agentId);
    }

    /** Reset the simulator and the lifecycle. The delegate's own seed wins over `seed`. */
    async reset(seed?: number): Promise<ObservationMap> {
        this.state = "active";
        this.stepIndex = 0;
        this.last = undefined;
        this.held = undefined;

        const effectiveSeed = this.spec.seed ?? seed;
        const raw = await this.invoke(() => this.simulator.reset(effectiveSeed));
        const parsed = ObservationMap.safeParse(raw);
        if (!parsed.success) {
            throw new DelegateStepError(this.name, 0, `invalid observations from reset (${formatIssues(parsed.error).join("; ")})`);
        }
        this.assertOwned(Object.keys(parsed.data), "observations");
        return parsed.data;
    }

    /**
     * Step with the actions addressed to this delegate's agents. Actions for
     * other agents are dropped; a finished delegate returns its held Transition.
     */
    async step(actions: Record<AgentId, Action>): Promise<Transition> {
        const index = this.stepIndex++;

        if (this.held) {
            this.state = "held";
            return this.held;
        }

        const own: Record<AgentId, Action> = {};
        for (const [agentId, action] of Object.entries(actions)) {
            if (this.owned.has(agentId)) own[agentId] = action;
        }

        const raw = await this.invoke(() => this.simulator.step(own), index);
        const parsed = Transition.safeParse(raw);
        if (!parsed.success) {
            throw new DelegateStepError(this.name, index, `invalid transition (${formatIssues(parsed.error).join("; ")})`);
        }
        const transition = parsed.data;
        this.assertOwned(Object.keys(transition.observations), "observations", index);
        this.assertOwned(Object.keys(transition.rewards), "rewards", index);

        this.last = transition;
        if (transition.done) {
            this.held = deepFreeze(structuredClone(transition));
            this.state = "done";
            this.logger.info({ step: index }, "delegate finished; holding final transition");
            return this.held;
        }
        return transition;
    }

    /**
     * Stop stepping this delegate and hold its last Transition, or an empty
     * one if it never completed a step.
     */
    retire(): Transition {
        if (!this.held) {
            this.held = this.last ? deepFreeze(structuredClone(this.last)) : EMPTY_TRANSITION;
        }
        this.state = "held";
        return this.held;
    }

    private async invoke<T>(call: () => T | Promise<T>, index = 0): Promise<T> {
        const timeoutMs = this.spec.step_timeout_ms;
        try {
            const work = Promise.resolve().then(call);
            if (timeoutMs === undefined) return await work;
            return await withDeadline(work, timeoutMs, () => new DelegateTimeoutError(this.name, index, timeoutMs));
        } catch (err) {
            if (err instanceof DelegateStepError) throw err;
            throw new DelegateStepError(this.name, index, describeError(err), { cause: err });
        }
    }

    private assertOwned(keys: string[], field: string, index = 0): void {
        const foreign = keys.filter((key) => !this.owned.has(key));
        if (foreign.length > 0) {
            throw new DelegateStepError(this.name, index, `${field} reported for agents it does not own: ${foreign.join(", ")}`);
        }
    }
}

/** Reject with `onTimeout()` if `work` has not settled within `timeoutMs`. */
export function withDeadline<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
        work.then(
            (value) => {
                clearTimeout(timer);
                resolve(value);
            },
            (err: unknown) => {
                clearTimeout(timer);
                reject(err);
            },
        );
    });
}

function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}
