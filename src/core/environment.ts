/**
 * CompositeEnvironment — fans one joint action out to several delegate
 * simulators and merges what they return into a single Transition.
 *
 * Delegates step sequentially in configuration order. A finished delegate
 * is not stepped again; its held Transition is merged in its place, so
 * delegates with different horizons can share one run.
 */
import { EventEmitter } from "events";
import type { Logger } from "pino";
import { DelegateSimulator } from "./delegate.js";
import type { DelegateDependencies, DelegateLifecycle } from "./delegate.js";
import type { AgentId, DelegateId } from "./types.js";
import type { Action, ObservationMap, Transition } from "../schemas/protocol.js";
import type { DelegateSpec } from "../schemas/delegate.js";
import type { TerminationPolicy } from "../schemas/config.js";
import {
    AgentIdCollisionError,
    ConfigurationError,
    DelegateStepError,
    DelegateTimeoutError,
} from "../errors/index.js";
import { silentLogger } from "../utils/logger.js";

export interface CompositeEvents {
    "delegate:done": [{ delegate: DelegateId; step: number }];
    "delegate:skipped": [{ delegate: DelegateId; step: number; error: DelegateStepError }];
}

export interface CompositeOptions {
    /** `first-done` ends the episode when any delegate finishes; `all-done` when none is left active. */
    termination?: TerminationPolicy;
    logger?: Logger;
}

/**
 * Fail before anything is constructed if two delegates share a name or
 * claim the same agent id.
 */
export function assertDisjointAgents(specs: readonly DelegateSpec[]): void {
    const names = new Set<string>();
    const owners = new Map<AgentId, DelegateId>();
    for (const spec of specs) {
        if (names.has(spec.name)) {
            throw new ConfigurationError(`Duplicate delegate name: "${spec.name}".`);
        }
        names.add(spec.name);
        for (const agentId of spec.agent_ids) {
            const owner = owners.get(agentId);
            if (owner !== undefined) throw new AgentIdCollisionError(agentId, owner, spec.name);
            owners.set(agentId, spec.name);
        }
    }
}

export class CompositeEnvironment extends EventEmitter<CompositeEvents> {
    public readonly termination: TerminationPolicy;

    private readonly delegates: DelegateSimulator[];
    private readonly owners = new Map<AgentId, DelegateSimulator>();
    private readonly logger: Logger;
    private stepIndex = 0;

    constructor(delegates: DelegateSimulator[], options: CompositeOptions = {}) {
        super();
        this.delegates = delegates;
        this.termination = options.termination ?? "first-done";
        this.logger = options.logger ?? silentLogger;
        for (const delegate of delegates) {
            for (const agentId of delegate.agentIds) this.owners.set(agentId, delegate);
        }
    }

    static async build(
        specs: readonly DelegateSpec[],
        deps: DelegateDependencies,
        options: CompositeOptions = {},
    ): Promise<CompositeEnvironment> {
        assertDisjointAgents(specs);
        const delegates: DelegateSimulator[] = [];
        for (const spec of specs) {
            delegates.push(await DelegateSimulator.create(spec, { ...deps, logger: deps.logger ?? options.logger }));
        }
        return new CompositeEnvironment(delegates, options);
    }

    /** Every agent id, delegate by delegate in configuration order. */
    agentIds(): AgentId[] {
        return this.delegates.flatMap((delegate) => [...delegate.agentIds]);
    }

    /** Agents whose delegate is still active and expects an action. */
    requiredAgentIds(): AgentId[] {
        return this.delegates.filter((delegate) => delegate.isActive()).flatMap((delegate) => [...delegate.agentIds]);
    }

    lifecycles(): Record<DelegateId, DelegateLifecycle> {
        return Object.fromEntries(this.delegates.map((delegate) => [delegate.name, delegate.lifecycle]));
    }

    async reset(seed?: number): Promise<ObservationMap> {
        this.stepIndex = 0;
        const observations: ObservationMap = {};
        for (const delegate of this.delegates) {
            Object.assign(observations, await delegate.reset(seed));
        }
        return observations;
    }

    async step(actions: Record<AgentId, Action>): Promise<Transition> {
        const index = this.stepIndex++;
        const partitions = this.partition(actions);

        const observations: ObservationMap = {};
        const rewards: Record<AgentId, number> = {};
        const info: Record<string, unknown> = {};
        let anyDone = false;

        for (const delegate of this.delegates) {
            const wasActive = delegate.isActive();
            let transition: Transition;
            try {
                transition = await delegate.step(partitions.get(delegate) ?? {});
            } catch (err) {
                if (!this.shouldSkip(delegate, err)) throw err;
                transition = delegate.retire();
                this.logger.warn({ delegate: delegate.name, step: index, err }, "delegate failed; retired under skip policy");
                this.emit("delegate:skipped", { delegate: delegate.name, step: index, error: err });
            }

            if (wasActive && transition.done) {
                this.emit("delegate:done", { delegate: delegate.name, step: index });
            }

            Object.assign(observations, transition.observations);
            Object.assign(rewards, transition.rewards);
            info[delegate.name] = transition.info;
            anyDone ||= transition.done;
        }

        const noneActive = this.delegates.every((delegate) => !delegate.isActive());
        const done = this.termination === "first-done" ? anyDone || noneActive : noneActive;
        return { observations, rewards, done, info };
    }

    private partition(actions: Record<AgentId, Action>): Map<DelegateSimulator, Record<AgentId, Action>> {
        const partitions = new Map<DelegateSimulator, Record<AgentId, Action>>();
        for (const [agentId, action] of Object.entries(actions)) {
            const owner = this.owners.get(agentId);
            if (!owner) {
                this.logger.warn({ agentId }, "dropping action for an agent no delegate owns");
                continue;
            }
            const bucket = partitions.get(owner) ?? {};
            bucket[agentId] = action;
            partitions.set(owner, bucket);
        }
        return partitions;
    }

    private shouldSkip(delegate: DelegateSimulator, err: unknown): err is DelegateStepError {
        return (
            delegate.spec.on_error === "skip" &&
            err instanceof DelegateStepError &&
            !(err instanceof DelegateTimeoutError)
        );
    }
}
