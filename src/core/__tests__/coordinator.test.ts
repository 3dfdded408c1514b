/**
 * Coordinator Tests — ranking, tie-breaking, failure isolation and plan assembly.
 */
import { describe, it, expect, vi } from "vitest";
import { CapabilityRegistry } from "../../core/registry.js";
import {
    Coordinator,
    maxUtilityPolicy,
    policyFromConfig,
    rankProposals,
    weightedMetricsPolicy,
} from "../../core/coordinator.js";
import type { CoordinatorOptions, ProposalResult } from "../../core/coordinator.js";
import type { Agent } from "../../core/types.js";
import { Proposal } from "../../schemas/protocol.js";
import type { ObservationMap, ProposalDraft } from "../../schemas/protocol.js";
import { ConfigurationError, ProposalError } from "../../errors/index.js";

function fixed(id: string, utility: number, extra: Partial<ProposalDraft> = {}): Agent {
    return {
        propose: () => ({ agent_id: id, action: { from: id }, utility, ...extra }),
    };
}

async function coordinatorFor(agents: Record<string, Agent>, options: CoordinatorOptions = {}) {
    const registry = new CapabilityRegistry();
    for (const [id, agent] of Object.entries(agents)) registry.registerAgent(id, () => agent);
    return Coordinator.create(registry, options);
}

function observe(...ids: string[]): ObservationMap {
    return Object.fromEntries(ids.map((id) => [id, { snr_db: 5 }]));
}

describe("rankProposals", () => {
    const proposed = (agentId: string, index: number, utility: number): ProposalResult => ({
        status: "proposed",
        agentId,
        index,
        proposal: Proposal.parse({ agent_id: agentId, action: {}, utility }),
    });

    it("orders by score, breaking ties by registry index", () => {
        const ranked = rankProposals([proposed("c", 2, 5), proposed("a", 0, 3), proposed("b", 1, 5)], maxUtilityPolicy);
        expect(ranked.map((r) => r.agentId)).toEqual(["b", "c", "a"]);
    });

    it("does not depend on the order results arrive in", () => {
        const results = [proposed("a", 0, 1), proposed("b", 1, 4), proposed("c", 2, 4), proposed("d", 3, 2)];
        const forward = rankProposals(results, maxUtilityPolicy).map((r) => r.agentId);
        const reversed = rankProposals([...results].reverse(), maxUtilityPolicy).map((r) => r.agentId);
        expect(forward).toEqual(["b", "c", "d", "a"]);
        expect(reversed).toEqual(forward);
    });

    it("ignores abstentions and failures", () => {
        const ranked = rankProposals(
            [
                { status: "abstained", agentId: "a", index: 0 },
                { status: "failed", agentId: "b", index: 1, error: new ProposalError("b", 0, "boom") },
                proposed("c", 2, 1),
            ],
            maxUtilityPolicy,
        );
        expect(ranked.map((r) => r.agentId)).toEqual(["c"]);
    });
});

describe("weightedMetricsPolicy", () => {
    it("scores by normalized weights over metadata estimates", () => {
        const policy = weightedMetricsPolicy({ throughput: 3, energy: 1 });
        const proposal = Proposal.parse({
            agent_id: "a",
            action: {},
            utility: 100,
            metadata: { estimates: { throughput: 4, energy: 8 } },
        });
        expect(policy.score(proposal)).toBe(5);
    });

    it("counts missing or non-numeric estimates as zero", () => {
        const policy = weightedMetricsPolicy({ throughput: 1, energy: 1 });
        const proposal = Proposal.parse({ agent_id: "a", action: {}, utility: 1, metadata: { estimates: { throughput: 4, energy: "low" } } });
        expect(policy.score(proposal)).toBe(2);
        expect(policy.score(Proposal.parse({ agent_id: "a", action: {}, utility: 1 }))).toBe(0);
    });

    it("requires a positive weight", () => {
        expect(() => weightedMetricsPolicy({ throughput: 0 })).toThrow(ConfigurationError);
    });

    it("is selected from configuration", () => {
        expect(policyFromConfig("max-utility")).toBe(maxUtilityPolicy);
        expect(policyFromConfig({ type: "weighted", weights: { a: 1 } }).name).toBe("weighted");
    });
});

describe("Coordinator.create", () => {
    it("rejects a registered agent without propose()", async () => {
        const registry = new CapabilityRegistry();
        registry.registerAgent("mute", () => ({ speak: () => "hi" }));
        await expect(Coordinator.create(registry)).rejects.toThrow('Agent "mute" does not implement propose().');
    });
});

describe("Coordinator.step", () => {
    it("commits the highest-utility proposal", async () => {
        const coordinator = await coordinatorFor({ a1: fixed("a1", 1), a2: fixed("a2", 3), a3: fixed("a3", 2) });
        const plan = await coordinator.step(observe("a1", "a2", "a3"), { step: 0 });

        expect(plan.committed).toEqual(["a2"]);
        expect(plan.actions).toEqual({ a2: { from: "a2" } });
        expect(plan.telemetry.utilities).toEqual({ a1: 1, a2: 3, a3: 2 });
        expect(plan.telemetry.ranked).toEqual([
            { agent_id: "a2", score: 3 },
            { agent_id: "a3", score: 2 },
            { agent_id: "a1", score: 1 },
        ]);
    });

    it("breaks ties in favour of the earlier registered agent", async () => {
        const coordinator = await coordinatorFor({ late: fixed("late", 2), early: fixed("early", 2) });
        const plan = await coordinator.step(observe("late", "early"), { step: 0 });
        expect(plan.committed).toEqual(["late"]);
    });

    it("ranks the same regardless of which agent answers first", async () => {
        const slow: Agent = {
            propose: async () => {
                await new Promise((resolve) => setTimeout(resolve, 10));
                return { agent_id: "slow", action: {}, utility: 5 };
            },
        };
        const coordinator = await coordinatorFor({ slow, fast: fixed("fast", 5) });
        const plan = await coordinator.step(observe("slow", "fast"), { step: 0 });
        expect(plan.committed).toEqual(["slow"]);
    });

    it("fills defaults for required agents that were not committed", async () => {
        const coordinator = await coordinatorFor({ a1: fixed("a1", 1), a2: fixed("a2", 3) }, { defaultAction: { power: 0.1 } });
        const plan = await coordinator.step(observe("a1", "a2"), { step: 4, requiredAgentIds: ["a1", "a2", "b1"] });

        expect(plan.step).toBe(4);
        expect(plan.actions).toEqual({ a2: { from: "a2" }, a1: { power: 0.1 }, b1: { power: 0.1 } });
        expect(plan.actions.a1).not.toBe(plan.actions.b1);
    });

    it("commits up to maxCommitted agents", async () => {
        const coordinator = await coordinatorFor(
            { a1: fixed("a1", 1), a2: fixed("a2", 3), a3: fixed("a3", 2) },
            { maxCommitted: 2 },
        );
        const plan = await coordinator.step(observe("a1", "a2", "a3"), { step: 0 });
        expect(plan.committed).toEqual(["a2", "a3"]);
        expect(Object.keys(plan.actions)).toEqual(["a2", "a3"]);
    });

    it("isolates a failing agent and ranks the rest", async () => {
        const broken: Agent = {
            propose: () => {
                throw new Error("model offline");
            },
        };
        const coordinator = await coordinatorFor({ a1: fixed("a1", 1), broken, a3: fixed("a3", 2) });
        const plan = await coordinator.step(observe("a1", "broken", "a3"), { step: 2, requiredAgentIds: ["a1", "broken", "a3"] });

        expect(plan.committed).toEqual(["a3"]);
        expect(plan.telemetry.failures).toEqual([
            { agent_id: "broken", reason: 'Agent "broken" failed to propose at step 2: model offline' },
        ]);
        expect(plan.actions.broken).toEqual({});
    });

    it("treats invalid, non-finite and mis-signed proposals as failures", async () => {
        const coordinator = await coordinatorFor({
            nan: fixed("nan", Number.NaN),
            liar: fixed("someone-else", 9),
            ok: fixed("ok", 0),
        });
        const plan = await coordinator.step(observe("nan", "liar", "ok"), { step: 0 });

        expect(plan.committed).toEqual(["ok"]);
        expect(plan.telemetry.failures.map((f) => f.agent_id)).toEqual(["nan", "liar"]);
        expect(plan.telemetry.failures[1].reason).toBe('Agent "liar" failed to propose at step 0: proposal is signed by "someone-else"');
    });

    it("records abstentions and agents without an observation", async () => {
        const quiet: Agent = { propose: () => null };
        const coordinator = await coordinatorFor({ quiet, absent: fixed("absent", 7), a1: fixed("a1", 1) });
        const plan = await coordinator.step(observe("quiet", "a1"), { step: 0 });

        expect(plan.telemetry.abstained).toEqual(["quiet", "absent"]);
        expect(plan.committed).toEqual(["a1"]);
    });

    it("does not ask agents outside requiredAgentIds", async () => {
        const propose = vi.fn(() => ({ agent_id: "a1", action: { from: "a1" }, utility: 10 }));
        const coordinator = await coordinatorFor({ a1: { propose }, b1: fixed("b1", 1) });
        const plan = await coordinator.step(observe("a1", "b1"), { step: 3, requiredAgentIds: ["b1"] });

        expect(propose).not.toHaveBeenCalled();
        expect(plan.committed).toEqual(["b1"]);
        expect(plan.actions).toEqual({ b1: { from: "b1" } });
        expect(plan.telemetry.abstained).toEqual(["a1"]);
        expect(Object.keys(plan.telemetry.latency_ms)).toEqual(["b1"]);
    });

    it("produces an all-default plan when nobody proposes", async () => {
        const quiet: Agent = { propose: () => null };
        const coordinator = await coordinatorFor({ quiet });
        const plan = await coordinator.step(observe("quiet"), { step: 0, requiredAgentIds: ["quiet"] });

        expect(plan.committed).toEqual([]);
        expect(plan.actions).toEqual({ quiet: {} });
    });

    it("never has more than `concurrency` proposals in flight", async () => {
        let inFlight = 0;
        let peak = 0;
        const tracked = (id: string): Agent => ({
            propose: async () => {
                inFlight++;
                peak = Math.max(peak, inFlight);
                await new Promise((resolve) => setTimeout(resolve, 5));
                inFlight--;
                return { agent_id: id, action: {}, utility: 1 };
            },
        });
        const agents = Object.fromEntries(["a", "b", "c", "d", "e"].map((id) => [id, tracked(id)]));
        const coordinator = await coordinatorFor(agents, { concurrency: 2 });

        await coordinator.step(observe("a", "b", "c", "d", "e"), { step: 0 });
        expect(peak).toBe(2);
    });

    it("consults the optimizer tool for telemetry", async () => {
        const call = vi.fn(async () => ({ allocation: "a2" }));
        const coordinator = await coordinatorFor({ a1: fixed("a1", 1), a2: fixed("a2", 3) }, { optimizer: { call } });
        const plan = await coordinator.step(observe("a1", "a2"), { step: 3 });

        expect(call).toHaveBeenCalledWith({ utilities: { a1: 1, a2: 3 }, step: 3 });
        expect(plan.telemetry.optimizer).toEqual({ allocation: "a2" });
        expect(plan.committed).toEqual(["a2"]);
    });

    it("keeps the plan when the optimizer tool fails", async () => {
        const call = vi.fn(async () => {
            throw new Error("solver timeout");
        });
        const coordinator = await coordinatorFor({ a1: fixed("a1", 1) }, { optimizer: { call } });
        const plan = await coordinator.step(observe("a1"), { step: 0 });

        expect(plan.committed).toEqual(["a1"]);
        expect(plan.telemetry.optimizer).toBeUndefined();
    });

    it("ranks with the weighted policy when configured", async () => {
        const coordinator = await coordinatorFor(
            {
                a1: fixed("a1", 10, { metadata: { estimates: { throughput: 1 } } }),
                a2: fixed("a2", 1, { metadata: { estimates: { throughput: 6 } } }),
            },
            { policy: weightedMetricsPolicy({ throughput: 1 }) },
        );
        const plan = await coordinator.step(observe("a1", "a2"), { step: 0 });
        expect(plan.committed).toEqual(["a2"]);
        expect(plan.telemetry.policy).toBe("weighted");
    });
});
