/**
 * ModelResolver — turns a ModelSpec into a ready-to-sample fading model or
 * a movement-update mobility model.
 *
 * Built-in aliases map to parameterized stochastic generators. Qualified
 * references resolve through the capability registry and only have to
 * satisfy the `sample` / `advance` surface.
 */
import { z } from "zod/v4";
import type { CapabilityRegistry } from "./registry.js";
import { instantiate } from "./registry.js";
import { createRandom } from "./random.js";
import type { RandomSource } from "./random.js";
import { isFadingModel, isMobilityModel } from "./types.js";
import type { FadingModel, LinkState, MobilityModel, Position } from "./types.js";
import type { ModelParameter, ModelSpec } from "../schemas/model.js";
import { formatIssues } from "../schemas/model.js";
import {
    ConfigurationError,
    InvalidModelParametersError,
    ModelResolutionError,
    UnknownCapabilityError,
} from "../errors/index.js";

export type FadingFamily = "rician" | "rayleigh" | "nakagami";
export type MobilityFamily = "random_walk";

const seed = z.number().int().optional();

const RicianParameters = z.strictObject({
    /** Ratio of line-of-sight to scattered power. */
    k_factor: z.number().positive().default(5),
    sigma: z.number().positive().default(2),
    seed,
});

const RayleighParameters = z.strictObject({
    sigma: z.number().positive().default(6),
    seed,
});

const NakagamiParameters = z.strictObject({
    /** Shape; 1 reduces to Rayleigh. */
    m_factor: z.number().positive(),
    /** Spread (mean power). */
    omega: z.number().positive(),
    seed,
});

const RandomWalkParameters = z.strictObject({
    /** Largest per-axis displacement per unit of time. */
    step_size: z.number().positive().default(0.5),
    seed,
});

/** Rician approximation: a fixed line-of-sight term plus a scattered Gaussian term, in dB. */
export class RicianFading implements FadingModel {
    public readonly family = "rician";
    public readonly parameters: Readonly<z.infer<typeof RicianParameters>>;
    private readonly rng: RandomSource;

    constructor(parameters: z.infer<typeof RicianParameters>) {
        this.parameters = Object.freeze({ ...parameters });
        this.rng = createRandom(parameters.seed);
    }

    sample(_link: LinkState): number {
        const { k_factor: k, sigma } = this.parameters;
        const los = Math.sqrt(k / (k + 1));
        const scattered = Math.sqrt(1 / (k + 1)) * this.rng.gaussian(0, sigma);
        return los + scattered;
    }

    /** The model's own `seed` takes precedence over the derived one. */
    reseed(derived: string | undefined): void {
        const seed = this.parameters.seed ?? derived;
        if (seed !== undefined) this.rng.reseed(seed);
    }
}

/** Rich-scattering, no line of sight: zero-mean Gaussian offset in dB. */
export class RayleighFading implements FadingModel {
    public readonly family = "rayleigh";
    public readonly parameters: Readonly<z.infer<typeof RayleighParameters>>;
    private readonly rng: RandomSource;

    constructor(parameters: z.infer<typeof RayleighParameters>) {
        this.parameters = Object.freeze({ ...parameters });
        this.rng = createRandom(parameters.seed);
    }

    sample(_link: LinkState): number {
        return this.rng.gaussian(0, this.parameters.sigma);
    }

    reseed(derived: string | undefined): void {
        const seed = this.parameters.seed ?? derived;
        if (seed !== undefined) this.rng.reseed(seed);
    }
}

/** Nakagami-m: the power gain is Gamma(m, omega / m); returned in dB. */
export class NakagamiFading implements FadingModel {
    public readonly family = "nakagami";
    public readonly parameters: Readonly<z.infer<typeof NakagamiParameters>>;
    private readonly rng: RandomSource;

    constructor(parameters: z.infer<typeof NakagamiParameters>) {
        this.parameters = Object.freeze({ ...parameters });
        this.rng = createRandom(parameters.seed);
    }

    sample(_link: LinkState): number {
        const { m_factor: m, omega } = this.parameters;
        const gain = this.rng.gamma(m, omega / m);
        return 10 * Math.log10(Math.max(gain, 1e-9));
    }

    reseed(derived: string | undefined): void {
        const seed = this.parameters.seed ?? derived;
        if (seed !== undefined) this.rng.reseed(seed);
    }
}

/** Independent uniform displacement on every axis, scaled by dt. */
export class RandomWalkMobility implements MobilityModel {
    public readonly family = "random_walk";
    public readonly parameters: Readonly<z.infer<typeof RandomWalkParameters>>;
    private readonly rng: RandomSource;

    constructor(parameters: z.infer<typeof RandomWalkParameters>) {
        this.parameters = Object.freeze({ ...parameters });
        this.rng = createRandom(parameters.seed);
    }

    advance(position: Position, dt: number): Position {
        const reach = this.parameters.step_size;
        return position.map((coordinate) => coordinate + this.rng.uniform(-reach, reach) * dt);
    }

    reseed(derived: string | undefined): void {
        const seed = this.parameters.seed ?? derived;
        if (seed !== undefined) this.rng.reseed(seed);
    }
}

type Builder<T> = (target: string, alias: string, parameters: Readonly<Record<string, ModelParameter>>) => T;

function builtin<S extends z.ZodType, T>(schema: S, create: (parameters: z.output<S>) => T): Builder<T> {
    return (target, alias, parameters) => {
        const parsed = schema.safeParse(parameters);
        if (!parsed.success) {
            throw new InvalidModelParametersError(target, alias, formatIssues(parsed.error));
        }
        return create(parsed.data);
    };
}

const FADING_BUILTINS: Record<FadingFamily, Builder<FadingModel>> = {
    rician: builtin(RicianParameters, (p) => new RicianFading(p)),
    rayleigh: builtin(RayleighParameters, (p) => new RayleighFading(p)),
    nakagami: builtin(NakagamiParameters, (p) => new NakagamiFading(p)),
};

const MOBILITY_BUILTINS: Record<MobilityFamily, Builder<MobilityModel>> = {
    random_walk: builtin(RandomWalkParameters, (p) => new RandomWalkMobility(p)),
};

function lookup<T>(table: Record<string, Builder<T>>, alias: string): Builder<T> | undefined {
    return Object.hasOwn(table, alias) ? table[alias] : undefined;
}

export const FADING_ALIASES: readonly string[] = Object.keys(FADING_BUILTINS);
export const MOBILITY_ALIASES: readonly string[] = Object.keys(MOBILITY_BUILTINS);

export class ModelResolver {
    private readonly registry: CapabilityRegistry;

    constructor(registry: CapabilityRegistry) {
        this.registry = registry;
    }

    async resolveFading(spec: ModelSpec): Promise<FadingModel> {
        if (spec.source.kind === "builtin") {
            const build = lookup<FadingModel>(FADING_BUILTINS, spec.source.name);
            if (!build) throw new UnknownCapabilityError(spec.source.name, "fading model");
            return build(spec.target, spec.source.name, spec.parameters);
        }
        const model = await this.fromReference(spec, spec.source.locator);
        if (!isFadingModel(model)) {
            throw new ModelResolutionError(spec.target, `"${spec.source.locator}" does not implement sample(link)`);
        }
        return model;
    }

    async resolveMobility(spec: ModelSpec): Promise<MobilityModel> {
        if (spec.source.kind === "builtin") {
            const build = lookup<MobilityModel>(MOBILITY_BUILTINS, spec.source.name);
            if (!build) throw new UnknownCapabilityError(spec.source.name, "mobility model");
            return build(spec.target, spec.source.name, spec.parameters);
        }
        const model = await this.fromReference(spec, spec.source.locator);
        if (!isMobilityModel(model)) {
            throw new ModelResolutionError(spec.target, `"${spec.source.locator}" does not implement advance(position, dt)`);
        }
        return model;
    }

    private async fromReference(spec: ModelSpec, locator: string): Promise<unknown> {
        try {
            const handle = await this.registry.resolve(locator);
            return instantiate(locator, handle, [], { ...spec.parameters });
        } catch (err) {
            if (err instanceof ModelResolutionError) throw err;
            const reason = err instanceof ConfigurationError ? err.message : String(err);
            throw new ModelResolutionError(spec.target, reason, { cause: err });
        }
    }
}

/**
 * Collapse overrides to one spec per target; a later entry for the same
 * channel or agent replaces the earlier one.
 */
export function latestPerTarget(specs: readonly ModelSpec[]): Map<string, ModelSpec> {
    const byTarget = new Map<string, ModelSpec>();
    for (const spec of specs) {
        byTarget.delete(spec.target);
        byTarget.set(spec.target, spec);
    }
    return byTarget;
}
