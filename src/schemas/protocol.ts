/**
 * Protocol Schemas — the per-step payloads exchanged between agents,
 * the coordinator and simulator delegates.
 */
import { z } from "zod/v4";

/** An agent's action payload, dispatched to the delegate that owns the agent. */
export const Action = z.record(z.string(), z.unknown());
export type Action = z.infer<typeof Action>;

/** What one agent sees after a step. */
export const Observation = z.record(z.string(), z.unknown());
export type Observation = z.infer<typeof Observation>;

export const ObservationMap = z.record(z.string(), Observation);
export type ObservationMap = z.infer<typeof ObservationMap>;

/**
 * An agent's candidate action for one step plus the utility it expects.
 * Validated by the coordinator before ranking; non-finite utilities are rejected.
 */
export const Proposal = z.object({
    agent_id: z.string().min(1),
    action: Action,
    utility: z.number(),
    metadata: z.record(z.string(), z.unknown()).default({}),
});
export type Proposal = z.infer<typeof Proposal>;
/** What an agent returns; `metadata` may be omitted. */
export type ProposalDraft = z.input<typeof Proposal>;

/**
 * The result bundle of one simulator step.
 * Produced by every delegate and by the composite environment.
 */
export const Transition = z.object({
    observations: ObservationMap,
    rewards: z.record(z.string(), z.number()),
    done: z.boolean(),
    info: z.record(z.string(), z.unknown()).default({}),
});
export type Transition = z.infer<typeof Transition>;
/** What a simulator returns; `info` may be omitted. */
export type TransitionDraft = z.input<typeof Transition>;
