/**
 * CapabilityRegistry — named handles to agents, simulators and tools.
 *
 * Names resolve through registered factories; `<module>#<export>` references
 * resolve through the build context's module loader. Either way the result
 * is built once per context and cached by the exact string.
 */
import type { Awaitable } from "./types.js";
import { BuildContext, isQualifiedReference } from "./context.js";
import {
    ConfigurationError,
    ResolutionError,
    UnknownCapabilityError,
    describeError,
} from "../errors/index.js";

/**
 * `agent` entries are live agent instances and are enumerated by
 * `listAgents()`; `agent-type` entries are classes agents are built from.
 */
export type CapabilityKind = "agent" | "agent-type" | "simulator" | "tool";

export type CapabilityFactory = (context: BuildContext) => Awaitable<unknown>;

interface RegistryEntry {
    kind: CapabilityKind;
    factory: CapabilityFactory;
}

export class CapabilityRegistry {
    public readonly context: BuildContext;

    private readonly entries = new Map<string, RegistryEntry>();
    private readonly agentOrder: string[] = [];

    constructor(context: BuildContext = new BuildContext()) {
        this.context = context;
    }

    register(name: string, factory: CapabilityFactory, kind: CapabilityKind = "tool"): void {
        if (isQualifiedReference(name)) {
            throw new ConfigurationError(`Capability names cannot contain '#': "${name}"`);
        }
        if (this.entries.has(name)) {
            throw new ConfigurationError(`Capability "${name}" is already registered.`);
        }
        this.entries.set(name, { kind, factory });
        if (kind === "agent") this.agentOrder.push(name);
    }

    /** Register an agent; enumeration order is registration order. */
    registerAgent(agentId: string, factory: CapabilityFactory): void {
        this.register(agentId, factory, "agent");
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    kindOf(name: string): CapabilityKind | undefined {
        return this.entries.get(name)?.kind;
    }

    /** Agent ids in registration order. */
    listAgents(): string[] {
        return [...this.agentOrder];
    }

    /**
     * Resolve a name or qualified reference to its instance, constructing it
     * on first use. `expected` guards against resolving the wrong kind of
     * registered capability; references carry no kind and are not checked.
     */
    resolve(nameOrReference: string, expected?: CapabilityKind): Promise<unknown> {
        if (isQualifiedReference(nameOrReference)) {
            return this.context.memoize(nameOrReference, () => this.context.loadExport(nameOrReference));
        }

        const entry = this.entries.get(nameOrReference);
        if (!entry) {
            return Promise.reject(new UnknownCapabilityError(nameOrReference, expected));
        }
        if (expected && entry.kind !== expected) {
            return Promise.reject(
                new ConfigurationError(`"${nameOrReference}" is registered as ${entry.kind}, expected ${expected}.`),
            );
        }

        return this.context.memoize(nameOrReference, async () => {
            try {
                return await entry.factory(this.context);
            } catch (err) {
                if (err instanceof ConfigurationError) throw err;
                throw new ResolutionError(nameOrReference, `factory failed (${describeError(err)})`, { cause: err });
            }
        });
    }

    /**
     * Resolve a handle and build a configured instance from it. Classes are
     * constructed with `(...args, kwargs)`; kwargs are appended only when non-empty.
     * Every call constructs a fresh instance; only the handle is cached.
     */
    async construct(
        nameOrReference: string,
        args: readonly unknown[] = [],
        kwargs: Record<string, unknown> = {},
        expected?: CapabilityKind,
    ): Promise<unknown> {
        const handle = await this.resolve(nameOrReference, expected);
        return instantiate(nameOrReference, handle, args, kwargs);
    }
}

/** Construct `handle` if it is a class; pass plain instances through unchanged. */
export function instantiate(
    reference: string,
    handle: unknown,
    args: readonly unknown[],
    kwargs: Record<string, unknown>,
): unknown {
    const constructorArgs = Object.keys(kwargs).length > 0 ? [...args, kwargs] : [...args];

    if (typeof handle === "function") {
        try {
            return Reflect.construct(handle, constructorArgs);
        } catch (err) {
            throw new ResolutionError(reference, `constructor threw (${describeError(err)})`, { cause: err });
        }
    }

    if (constructorArgs.length > 0) {
        throw new ResolutionError(reference, "arguments were given but the capability is not constructible");
    }
    return handle;
}
