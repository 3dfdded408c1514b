/**
 * Coordinator — collects one proposal per agent, ranks them and commits a plan.
 *
 * Proposal collection never fails as a whole: each agent yields a
 * ProposalResult, failures are logged and reported in plan telemetry, and
 * the remaining proposals are ranked as if the failed agent had abstained.
 */
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { CapabilityRegistry } from "./registry.js";
import { isAgent } from "./types.js";
import type { Agent, AgentId, Tool } from "./types.js";
import { Proposal } from "../schemas/protocol.js";
import type { Action, ObservationMap } from "../schemas/protocol.js";
import { formatIssues } from "../schemas/model.js";
import type { RankingPolicyConfig } from "../schemas/config.js";
import { ConfigurationError, ProposalError, describeError } from "../errors/index.js";
import { silentLogger } from "../utils/logger.js";

export interface RankingPolicy {
    readonly name: string;
    score(proposal: Proposal): number;
}

/** Score is the utility the agent reported. */
export const maxUtilityPolicy: RankingPolicy = {
    name: "max-utility",
    score: (proposal) => proposal.utility,
};

/**
 * Score is the weighted sum of `metadata.estimates[metric]`, with weights
 * normalized to sum to 1. Missing or non-numeric estimates count as 0.
 */
export function weightedMetricsPolicy(weights: Record<string, number>): RankingPolicy {
    const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
    if (!(total > 0)) {
        throw new ConfigurationError("Weighted ranking needs at least one positive weight.");
    }
    const normalized = Object.entries(weights).map(([metric, weight]) => [metric, weight / total] as const);

    return {
        name: "weighted",
        score: (proposal) => {
            const estimates = proposal.metadata.estimates;
            if (typeof estimates !== "object" || estimates === null) return 0;
            return normalized.reduce((sum, [metric, weight]) => {
                const value: unknown = Reflect.get(estimates, metric);
                return typeof value === "number" && Number.isFinite(value) ? sum + weight * value : sum;
            }, 0);
        },
    };
}

export function policyFromConfig(config: RankingPolicyConfig): RankingPolicy {
    return config === "max-utility" ? maxUtilityPolicy : weightedMetricsPolicy(config.weights);
}

/** `latencyMs` is the wall-clock time the agent took to answer, when it was asked. */
export type ProposalResult =
    | { status: "proposed"; agentId: AgentId; index: number; proposal: Proposal; latencyMs?: number }
    | { status: "abstained"; agentId: AgentId; index: number; latencyMs?: number }
    | { status: "failed"; agentId: AgentId; index: number; error: ProposalError; latencyMs?: number };

export interface RankedProposal {
    agentId: AgentId;
    /** Registry position, the tie-breaker. */
    index: number;
    score: number;
    proposal: Proposal;
}

/** Highest score first; equal scores keep registry order. */
export function rankProposals(results: readonly ProposalResult[], policy: RankingPolicy): RankedProposal[] {
    const ranked: RankedProposal[] = [];
    for (const result of results) {
        if (result.status !== "proposed") continue;
        ranked.push({
            agentId: result.agentId,
            index: result.index,
            score: policy.score(result.proposal),
            proposal: result.proposal,
        });
    }
    return ranked.sort((a, b) => b.score - a.score || a.index - b.index);
}

export interface PlanTelemetry {
    policy: string;
    ranked: { agent_id: AgentId; score: number }[];
    utilities: Record<AgentId, number>;
    failures: { agent_id: AgentId; reason: string }[];
    abstained: AgentId[];
    selected: AgentId[];
    /** Proposal latency per agent that proposed or failed. */
    latency_ms: Record<AgentId, number>;
    /** Whatever the optimizer tool returned, when one is configured and succeeded. */
    optimizer?: unknown;
}

export interface Plan {
    step: number;
    committed: AgentId[];
    actions: Record<AgentId, Action>;
    telemetry: PlanTelemetry;
}

export interface CoordinatorOptions {
    policy?: RankingPolicy;
    /** Sent to every required agent that was not committed. Default: `{}`. */
    defaultAction?: Action;
    /** Default: 1. */
    maxCommitted?: number;
    /** Maximum proposals in flight. Default: 4. */
    concurrency?: number;
    optimizer?: Tool;
    logger?: Logger;
}

export interface PlanRequest {
    step: number;
    /**
     * Agents that must receive an action this step. When given, agents
     * outside it abstain without being asked.
     */
    requiredAgentIds?: readonly AgentId[];
}

interface MountedAgent {
    id: AgentId;
    agent: Agent;
}

export class Coordinator {
    public readonly policy: RankingPolicy;

    private readonly mounted: MountedAgent[];
    private readonly defaultAction: Action;
    private readonly maxCommitted: number;
    private readonly concurrency: number;
    private readonly optimizer?: Tool;
    private readonly logger: Logger;

    constructor(agents: MountedAgent[], options: CoordinatorOptions = {}) {
        this.mounted = agents;
        this.policy = options.policy ?? maxUtilityPolicy;
        this.defaultAction = options.defaultAction ?? {};
        this.maxCommitted = options.maxCommitted ?? 1;
        this.concurrency = options.concurrency ?? 4;
        this.optimizer = options.optimizer;
        this.logger = options.logger ?? silentLogger;
    }

    /** Resolve every registered agent, in registration order. */
    static async create(registry: CapabilityRegistry, options: CoordinatorOptions = {}): Promise<Coordinator> {
        const mounted: MountedAgent[] = [];
        for (const id of registry.listAgents()) {
            const agent = await registry.resolve(id, "agent");
            if (!isAgent(agent)) {
                throw new ConfigurationError(`Agent "${id}" does not implement propose().`);
            }
            mounted.push({ id, agent });
        }
        return new Coordinator(mounted, options);
    }

    agents(): ReadonlyArray<Readonly<MountedAgent>> {
        return this.mounted;
    }

    /**
     * Ask every observed agent in `eligible` (all agents when omitted) for a
     * proposal. Results come back in registry order.
     */
    async collect(observations: ObservationMap, step: number, eligible?: ReadonlySet<AgentId>): Promise<ProposalResult[]> {
        const limit = pLimit(this.concurrency);
        return Promise.all(
            this.mounted.map(({ id, agent }, index) =>
                limit(async (): Promise<ProposalResult> => {
                    if (eligible && !eligible.has(id)) return { status: "abstained", agentId: id, index };
                    const started = performance.now();
                    const result = await this.proposeOne(id, agent, index, observations, step);
                    return { ...result, latencyMs: performance.now() - started };
                }),
            ),
        );
    }

    async step(observations: ObservationMap, request: PlanRequest): Promise<Plan> {
        const { step } = request;
        const eligible = request.requiredAgentIds && new Set(request.requiredAgentIds);
        const results = await this.collect(observations, step, eligible);
        const ranked = rankProposals(results, this.policy);
        const selected = ranked.slice(0, this.maxCommitted);

        const actions: Record<AgentId, Action> = {};
        for (const candidate of selected) actions[candidate.agentId] = candidate.proposal.action;
        for (const agentId of request.requiredAgentIds ?? []) {
            if (!(agentId in actions)) actions[agentId] = structuredClone(this.defaultAction);
        }

        const utilities: Record<AgentId, number> = {};
        const failures: PlanTelemetry["failures"] = [];
        const abstained: AgentId[] = [];
        const latency: Record<AgentId, number> = {};
        for (const result of results) {
            if (result.status === "abstained") {
                abstained.push(result.agentId);
                continue;
            }
            if (result.status === "proposed") utilities[result.agentId] = result.proposal.utility;
            else failures.push({ agent_id: result.agentId, reason: result.error.message });
            if (result.latencyMs !== undefined) latency[result.agentId] = result.latencyMs;
        }

        const committed = selected.map((candidate) => candidate.agentId);
        const telemetry: PlanTelemetry = {
            policy: this.policy.name,
            ranked: ranked.map((candidate) => ({ agent_id: candidate.agentId, score: candidate.score })),
            utilities,
            failures,
            abstained,
            selected: committed,
            latency_ms: latency,
        };

        if (this.optimizer) {
            try {
                telemetry.optimizer = await this.optimizer.call({ utilities, step });
            } catch (err) {
                this.logger.warn({ step, err }, "optimizer tool failed; plan unchanged");
            }
        }

        if (ranked.length === 0) {
            this.logger.debug({ step }, "no proposals; committing defaults only");
        }
        return { step, committed, actions, telemetry };
    }

    private async proposeOne(
        id: AgentId,
        agent: Agent,
        index: number,
        observations: ObservationMap,
        step: number,
    ): Promise<ProposalResult> {
        const observation = observations[id];
        if (observation === undefined) return { status: "abstained", agentId: id, index };

        try {
            const raw = await agent.propose(observation, { step });
            if (raw === null) return { status: "abstained", agentId: id, index };

            const parsed = Proposal.safeParse(raw);
            if (!parsed.success) {
                throw new ProposalError(id, step, `invalid proposal (${formatIssues(parsed.error).join("; ")})`);
            }
            if (parsed.data.agent_id !== id) {
                throw new ProposalError(id, step, `proposal is signed by "${parsed.data.agent_id}"`);
            }
            return { status: "proposed", agentId: id, index, proposal: parsed.data };
        } catch (err) {
            const error = err instanceof ProposalError ? err : new ProposalError(id, step, describeError(err), { cause: err });
            this.logger.warn({ agentId: id, step, err: error }, "proposal failed");
            return { status: "failed", agentId: id, index, error };
        }
    }
}
