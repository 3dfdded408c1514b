/**
 * Metric Registry — named per-step KPIs computed from each tick's plan and
 * merged transition.
 *
 * Built-ins: energy, throughput, fairness (Jain's index), latency and
 * handoff_success. Custom metrics are added with `register`.
 */
import type { Logger } from "pino";
import type { Plan } from "../core/coordinator.js";
import type { AgentId } from "../core/types.js";
import type { Observation, Transition } from "../schemas/protocol.js";
import { ConfigurationError } from "../errors/index.js";
import { silentLogger } from "../utils/logger.js";

/** What a metric sees of one tick. */
export interface MetricInput {
    step: number;
    plan: Plan;
    transition: Transition;
}

export type MetricFunction = (input: MetricInput) => number;

function numeric(value: unknown): number | undefined {
    return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/** Shannon spectral efficiency (bit/s/Hz) of every agent that reports `snr_db`. */
function spectralEfficiencies(observations: Record<AgentId, Observation>): number[] {
    const values: number[] = [];
    for (const observation of Object.values(observations)) {
        const snrDb = numeric(observation.snr_db);
        if (snrDb !== undefined) values.push(Math.log2(1 + Math.pow(10, snrDb / 10)));
    }
    return values;
}

/** Sum of `energy_cost`, or of transmit `power` where no cost is reported. */
export const energyMetric: MetricFunction = ({ transition }) =>
    Object.values(transition.observations).reduce(
        (sum, observation) => sum + (numeric(observation.energy_cost) ?? numeric(observation.power) ?? 0),
        0,
    );

export const throughputMetric: MetricFunction = ({ transition }) =>
    spectralEfficiencies(transition.observations).reduce((sum, value) => sum + value, 0);

/** Jain's index over per-agent spectral efficiency: 1 with no agents, 0 when all are zero. */
export const fairnessMetric: MetricFunction = ({ transition }) => {
    const values = spectralEfficiencies(transition.observations);
    if (values.length === 0) return 1;
    const total = values.reduce((sum, value) => sum + value, 0);
    const squares = values.reduce((sum, value) => sum + value * value, 0);
    return squares === 0 ? 0 : (total * total) / (values.length * squares);
};

/** Mean proposal latency in ms; 0 when nobody was asked. */
export const latencyMetric: MetricFunction = ({ plan }) => {
    const values = Object.values(plan.telemetry.latency_ms);
    return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
};

/**
 * Read from the optimizer tool's result: the share of `allocations` entries
 * marked `approved`, else a numeric `handoff_success`. 0 otherwise.
 */
export const handoffSuccessMetric: MetricFunction = ({ plan }) => {
    const result = plan.telemetry.optimizer;
    if (typeof result !== "object" || result === null) return 0;

    const allocations: unknown = Reflect.get(result, "allocations");
    if (typeof allocations === "object" && allocations !== null) {
        const entries: unknown[] = Object.values(allocations);
        if (entries.length > 0) {
            const approved = entries.filter(
                (entry) => typeof entry === "object" && entry !== null && Reflect.get(entry, "approved") === true,
            );
            return approved.length / entries.length;
        }
    }
    return numeric(Reflect.get(result, "handoff_success")) ?? 0;
};

export const BUILTIN_METRICS: Readonly<Record<string, MetricFunction>> = {
    energy: energyMetric,
    throughput: throughputMetric,
    fairness: fairnessMetric,
    latency: latencyMetric,
    handoff_success: handoffSuccessMetric,
};

export class MetricRegistry {
    private readonly metrics = new Map<string, MetricFunction>();
    private readonly logger: Logger;

    constructor(options: { builtins?: boolean; logger?: Logger } = {}) {
        this.logger = options.logger ?? silentLogger;
        if (options.builtins ?? true) {
            for (const [name, metric] of Object.entries(BUILTIN_METRICS)) this.metrics.set(name, metric);
        }
    }

    register(name: string, metric: MetricFunction, options: { overwrite?: boolean } = {}): void {
        if (this.metrics.has(name) && !options.overwrite) {
            throw new ConfigurationError(`Metric "${name}" is already registered.`);
        }
        this.metrics.set(name, metric);
    }

    has(name: string): boolean {
        return this.metrics.has(name);
    }

    list(): string[] {
        return [...this.metrics.keys()];
    }

    /** Keep only `names`, in that order. */
    select(names: readonly string[]): MetricRegistry {
        const selected = new MetricRegistry({ builtins: false, logger: this.logger });
        for (const name of names) {
            const metric = this.metrics.get(name);
            if (!metric) throw new ConfigurationError(`Unknown metric: "${name}" is not registered.`);
            selected.register(name, metric);
        }
        return selected;
    }

    /**
     * Compute every registered metric. A metric that throws or returns a
     * non-finite value is logged and left out of the result.
     */
    compute(input: MetricInput): Record<string, number> {
        const values: Record<string, number> = {};
        for (const [name, metric] of this.metrics) {
            try {
                const value = metric(input);
                if (Number.isFinite(value)) values[name] = value;
                else this.logger.warn({ metric: name, step: input.step, value }, "metric is not finite; omitted");
            } catch (err) {
                this.logger.warn({ metric: name, step: input.step, err }, "metric failed; omitted");
            }
        }
        return values;
    }
}
