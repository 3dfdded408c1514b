import { describe, it, expect } from "vitest";
import {
    MetricRegistry,
    energyMetric,
    fairnessMetric,
    handoffSuccessMetric,
    latencyMetric,
    throughputMetric,
} from "../metrics.js";
import type { MetricInput } from "../metrics.js";
import type { PlanTelemetry } from "../../core/coordinator.js";
import type { ObservationMap } from "../../schemas/protocol.js";
import { ConfigurationError } from "../../errors/index.js";

function tick(observations: ObservationMap, telemetry: Partial<PlanTelemetry> = {}): MetricInput {
    return {
        step: 0,
        plan: {
            step: 0,
            committed: [],
            actions: {},
            telemetry: {
                policy: "max-utility",
                ranked: [],
                utilities: {},
                failures: [],
                abstained: [],
                selected: [],
                latency_ms: {},
                ...telemetry,
            },
        },
        transition: { observations, rewards: {}, done: false, info: {} },
    };
}

describe("built-in metrics", () => {
    it("sums energy cost, falling back to transmit power", () => {
        expect(energyMetric(tick({ a: { power: 0.5 }, b: { energy_cost: 2, power: 1 }, c: {} }))).toBe(2.5);
    });

    it("sums spectral efficiency over agents reporting snr_db", () => {
        const input = tick({ a: { snr_db: 0 }, b: { snr_db: 10 * Math.log10(3) }, c: { snr_db: "n/a" } });
        expect(throughputMetric(input)).toBeCloseTo(3, 9);
        expect(fairnessMetric(input)).toBeCloseTo(0.9, 9);
    });

    it("treats a tick without snr readings as perfectly fair", () => {
        expect(fairnessMetric(tick({ a: { power: 1 } }))).toBe(1);
        expect(throughputMetric(tick({}))).toBe(0);
    });

    it("averages proposal latency", () => {
        expect(latencyMetric(tick({}, { latency_ms: { a: 2, b: 4 } }))).toBe(3);
        expect(latencyMetric(tick({}))).toBe(0);
    });

    it("reads handoff success from the optimizer result", () => {
        const allocations = { a: { approved: true }, b: { approved: false } };
        expect(handoffSuccessMetric(tick({}, { optimizer: { allocations } }))).toBe(0.5);
        expect(handoffSuccessMetric(tick({}, { optimizer: { handoff_success: 0.8 } }))).toBe(0.8);
        expect(handoffSuccessMetric(tick({}, { optimizer: "ok" }))).toBe(0);
        expect(handoffSuccessMetric(tick({}))).toBe(0);
    });
});

describe("MetricRegistry", () => {
    it("starts with the built-ins", () => {
        expect(new MetricRegistry().list()).toEqual(["energy", "throughput", "fairness", "latency", "handoff_success"]);
        expect(new MetricRegistry({ builtins: false }).list()).toEqual([]);
    });

    it("refuses to replace a metric unless asked to", () => {
        const registry = new MetricRegistry();
        expect(() => registry.register("energy", () => 0)).toThrow('Metric "energy" is already registered.');

        registry.register("energy", () => 42, { overwrite: true });
        expect(registry.compute(tick({ a: { power: 1 } })).energy).toBe(42);
    });

    it("selects metrics by name", () => {
        const selected = new MetricRegistry().select(["latency", "energy"]);
        expect(selected.list()).toEqual(["latency", "energy"]);
        expect(selected.compute(tick({ a: { power: 1 } }, { latency_ms: { a: 5 } }))).toEqual({ latency: 5, energy: 1 });
    });

    it("rejects an unknown name on select", () => {
        expect(() => new MetricRegistry().select(["energy", "nope"])).toThrow(ConfigurationError);
        expect(() => new MetricRegistry().select(["nope"])).toThrow('Unknown metric: "nope" is not registered.');
    });

    it("leaves out metrics that throw or are not finite", () => {
        const registry = new MetricRegistry({ builtins: false });
        registry.register("broken", () => {
            throw new Error("boom");
        });
        registry.register("infinite", () => Number.POSITIVE_INFINITY);
        registry.register("steps", ({ step }) => step + 1);

        expect(registry.compute(tick({}))).toEqual({ steps: 1 });
    });
});
