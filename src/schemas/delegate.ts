/**
 * Delegate Schemas — how one sub-simulator of the composite environment is built.
 */
import { z } from "zod/v4";
import { FadingModelEntry, MobilityModelEntry } from "./model.js";

export const DelegateErrorPolicy = z.enum(["abort", "skip"]);
export type DelegateErrorPolicy = z.infer<typeof DelegateErrorPolicy>;

/**
 * One delegate: the simulator to construct, the agents it owns, and the
 * model overrides injected into its channel and mobility slots.
 */
export const DelegateSpec = z.object({
    name: z.string().min(1),
    /** Built-in simulator alias or `<module>#<export>` reference. */
    reference: z.string().min(1),
    agent_ids: z.array(z.string().min(1)).superRefine((ids, ctx) => {
        const seen = new Set<string>();
        for (let i = 0; i < ids.length; i++) {
            if (seen.has(ids[i])) {
                ctx.addIssue({ code: "custom", message: `Duplicate agent id: ${ids[i]}`, path: [i] });
            }
            seen.add(ids[i]);
        }
    }),
    args: z.array(z.unknown()).default([]),
    kwargs: z.record(z.string(), z.unknown()).default({}),
    /** Overrides the run seed for this delegate. */
    seed: z.number().int().optional(),
    fading_models: z.array(FadingModelEntry).default([]),
    mobility_models: z.array(MobilityModelEntry).default([]),
    /** Per-call deadline for reset() and step(). */
    step_timeout_ms: z.number().int().positive().optional(),
    /** `abort` ends the run on a step failure; `skip` retires the delegate and holds its last transition. */
    on_error: DelegateErrorPolicy.default("abort"),
});
export type DelegateSpec = z.infer<typeof DelegateSpec>;
export type DelegateSpecInput = z.input<typeof DelegateSpec>;
