/**
 * Orchestration Configuration — everything needed to build and run one orchestration.
 *
 * The document format (JSON file, inline object) is the caller's concern;
 * this schema only fixes the shape once it is deserialized.
 */
import { z } from "zod/v4";
import { DelegateSpec } from "./delegate.js";
import { formatIssues } from "./model.js";
import { ConfigurationError } from "../errors/index.js";

interface IssueSink {
    addIssue(issue: { code: "custom"; message: string; path: number[] }): void;
}

function uniqueBy<T>(key: (item: T) => string, label: string) {
    return (items: T[], ctx: IssueSink): void => {
        const seen = new Set<string>();
        items.forEach((item, i) => {
            const id = key(item);
            if (seen.has(id)) {
                ctx.addIssue({ code: "custom", message: `Duplicate ${label}: ${id}`, path: [i] });
            }
            seen.add(id);
        });
    };
}

/** A capability built from a registered alias or a qualified reference. */
const CapabilityEntry = z.object({
    reference: z.string().min(1),
    args: z.array(z.unknown()).default([]),
    kwargs: z.record(z.string(), z.unknown()).default({}),
});

export const AgentEntry = CapabilityEntry.extend({ id: z.string().min(1) });
export type AgentEntry = z.infer<typeof AgentEntry>;

export const ToolEntry = CapabilityEntry.extend({ name: z.string().min(1) });
export type ToolEntry = z.infer<typeof ToolEntry>;

/**
 * `max-utility` ranks by the utility each agent reports.
 * `weighted` ranks by a weighted sum of the metric estimates in proposal metadata.
 */
export const RankingPolicyConfig = z.union([
    z.literal("max-utility"),
    z.object({
        type: z.literal("weighted"),
        weights: z.record(z.string(), z.number().nonnegative()),
    }),
]);
export type RankingPolicyConfig = z.infer<typeof RankingPolicyConfig>;

export const CoordinatorConfig = z.object({
    policy: RankingPolicyConfig.default("max-utility"),
    /** Sent to every required agent that was not committed this step. */
    default_action: z.record(z.string(), z.unknown()).default({}),
    /** Number of top-ranked agents whose own actions are committed. */
    max_committed: z.number().int().positive().default(1),
    /** Maximum proposals evaluated at once. */
    concurrency: z.number().int().positive().default(4),
    /** Registered tool consulted with the step's utilities. */
    optimizer_tool: z.string().min(1).optional(),
});
export type CoordinatorConfig = z.infer<typeof CoordinatorConfig>;

export const TerminationPolicy = z.enum(["first-done", "all-done"]);
export type TerminationPolicy = z.infer<typeof TerminationPolicy>;

export const OrchestrationConfig = z.object({
    max_steps: z.number().int().nonnegative().default(100),
    /** Run seed, passed to every delegate without its own. */
    seed: z.number().int().optional(),
    termination: TerminationPolicy.default("first-done"),
    delegates: z.array(DelegateSpec).min(1).superRefine(uniqueBy<DelegateSpec>((d) => d.name, "delegate name")),
    agents: z.array(AgentEntry).default([]).superRefine(uniqueBy<AgentEntry>((a) => a.id, "agent id")),
    tools: z.array(ToolEntry).default([]).superRefine(uniqueBy<ToolEntry>((t) => t.name, "tool name")),
    coordinator: CoordinatorConfig.prefault({}),
    /** Metric names computed every step; all registered metrics when omitted. */
    metrics: z.array(z.string().min(1)).optional(),
});
export type OrchestrationConfig = z.infer<typeof OrchestrationConfig>;
export type OrchestrationConfigInput = z.input<typeof OrchestrationConfig>;

/** Parse a deserialized document, raising ConfigurationError with every issue found. */
export function parseOrchestrationConfig(input: unknown): OrchestrationConfig {
    const result = OrchestrationConfig.safeParse(input);
    if (!result.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error).join("; ")}`, {
            cause: result.error,
        });
    }
    return result.data;
}
