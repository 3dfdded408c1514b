/**
 * Model Schemas — fading and mobility overrides attached to a delegate.
 *
 * Raw configuration entries name either a built-in alias (`type`) or a
 * qualified reference (`reference`), and are parsed into the closed
 * `ModelSpec` variant the resolver works on.
 */
import { z } from "zod/v4";

/** Scalar keyword arguments a model is built with. */
export const ModelParameter = z.union([z.number(), z.string(), z.boolean()]);
export type ModelParameter = z.infer<typeof ModelParameter>;

export type ModelSource =
    | { readonly kind: "builtin"; readonly name: string }
    | { readonly kind: "reference"; readonly locator: string };

export interface ModelSpec {
    /** The channel id (fading) or agent id (mobility) the model is bound to. */
    readonly target: string;
    readonly source: ModelSource;
    readonly parameters: Readonly<Record<string, ModelParameter>>;
}

/** Build a spec, or return the reason the entry is malformed. */
function toModelSpec(
    target: string,
    type: string | undefined,
    reference: string | undefined,
    kwargs: Record<string, ModelParameter>,
): ModelSpec | string {
    if (type !== undefined && reference !== undefined) {
        return "give either 'type' or 'reference', not both";
    }
    const source: ModelSource | undefined =
        type !== undefined
            ? { kind: "builtin", name: type.toLowerCase() }
            : reference !== undefined
                ? { kind: "reference", locator: reference }
                : undefined;
    if (!source) return "one of 'type' or 'reference' is required";
    return Object.freeze({ target, source, parameters: Object.freeze({ ...kwargs }) });
}

/** A per-channel fading override, e.g. `{ channel_id: "link:a1", type: "nakagami", kwargs: { m_factor: 2, omega: 1 } }`. */
export const FadingModelEntry = z
    .object({
        channel_id: z.string().min(1),
        type: z.string().min(1).optional(),
        reference: z.string().min(1).optional(),
        kwargs: z.record(z.string(), ModelParameter).default({}),
    })
    .transform((entry, ctx) => {
        const spec = toModelSpec(entry.channel_id, entry.type, entry.reference, entry.kwargs);
        if (typeof spec === "string") {
            ctx.addIssue({ code: "custom", message: spec });
            return z.NEVER;
        }
        return spec;
    });

/** A per-agent mobility override, e.g. `{ agent_id: "a1", type: "random_walk" }`. */
export const MobilityModelEntry = z
    .object({
        agent_id: z.string().min(1),
        type: z.string().min(1).optional(),
        reference: z.string().min(1).optional(),
        kwargs: z.record(z.string(), ModelParameter).default({}),
    })
    .transform((entry, ctx) => {
        const spec = toModelSpec(entry.agent_id, entry.type, entry.reference, entry.kwargs);
        if (typeof spec === "string") {
            ctx.addIssue({ code: "custom", message: spec });
            return z.NEVER;
        }
        return spec;
    });

/** Render zod issues as `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
