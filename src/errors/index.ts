/**
 * Error taxonomy for the orchestration engine.
 *
 * Configuration-tier errors are fatal and raised before any step runs.
 * Proposal errors are recorded per agent and never halt a run.
 * Delegate errors abort the run unless a delegate opts into the skip policy.
 */

/**
 * Raised at build time for anything that makes a configuration unusable:
 * unknown aliases, missing parameters, colliding agent ids.
 */
export class ConfigurationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigurationError";
    }
}

/** Thrown when a built-in alias has no registered capability. */
export class UnknownCapabilityError extends ConfigurationError {
    public readonly capability: string;

    constructor(capability: string, kind?: string) {
        super(`Unknown ${kind ?? "capability"}: "${capability}" is not registered.`);
        this.name = "UnknownCapabilityError";
        this.capability = capability;
    }
}

/**
 * Thrown when a qualified reference cannot be located, or when the
 * located constructor throws.
 */
export class ResolutionError extends ConfigurationError {
    public readonly reference: string;

    constructor(reference: string, reason: string, options?: { cause?: unknown }) {
        super(`Cannot resolve "${reference}": ${reason}`, options);
        this.name = "ResolutionError";
        this.reference = reference;
    }
}

/** Thrown when two delegates claim the same agent id. */
export class AgentIdCollisionError extends ConfigurationError {
    public readonly agentId: string;
    public readonly delegates: readonly [string, string];

    constructor(agentId: string, first: string, second: string) {
        super(`Agent id "${agentId}" is claimed by both delegate "${first}" and delegate "${second}".`);
        this.name = "AgentIdCollisionError";
        this.agentId = agentId;
        this.delegates = [first, second];
    }
}

/** Thrown when a fading or mobility model cannot be built for a channel or agent. */
export class ModelResolutionError extends ConfigurationError {
    public readonly target: string;

    constructor(target: string, reason: string, options?: { cause?: unknown }) {
        super(`Model for "${target}" cannot be resolved: ${reason}`, options);
        this.name = "ModelResolutionError";
        this.target = target;
    }
}

/** Thrown when a built-in model is given missing or out-of-domain parameters. */
export class InvalidModelParametersError extends ModelResolutionError {
    public readonly model: string;
    public readonly issues: readonly string[];

    constructor(target: string, model: string, issues: readonly string[]) {
        super(target, `invalid parameters for "${model}" (${issues.join("; ")})`);
        this.name = "InvalidModelParametersError";
        this.model = model;
        this.issues = issues;
    }
}

/**
 * An agent failed to produce a usable proposal for one step.
 * The coordinator records it and ranks the remaining proposals.
 */
export class ProposalError extends Error {
    public readonly agentId: string;
    public readonly step: number;

    constructor(agentId: string, step: number, reason: string, options?: { cause?: unknown }) {
        super(`Agent "${agentId}" failed to propose at step ${step}: ${reason}`, options);
        this.name = "ProposalError";
        this.agentId = agentId;
        this.step = step;
    }
}

/** A delegate simulator failed inside `reset` or `step`. */
export class DelegateStepError extends Error {
    public readonly delegate: string;
    public readonly step: number;

    constructor(delegate: string, step: number, reason: string, options?: { cause?: unknown }) {
        super(`Delegate "${delegate}" failed at step ${step}: ${reason}`, options);
        this.name = "DelegateStepError";
        this.delegate = delegate;
        this.step = step;
    }
}

/** A delegate simulator overran its per-call deadline. */
export class DelegateTimeoutError extends DelegateStepError {
    public readonly timeoutMs: number;

    constructor(delegate: string, step: number, timeoutMs: number) {
        super(delegate, step, `no transition within ${timeoutMs}ms`);
        this.name = "DelegateTimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

/** Extract a printable message from an unknown thrown value. */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
