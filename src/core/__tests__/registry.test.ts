/**
 * Capability Registry Tests — alias and reference resolution, caching and construction.
 *
 * Qualified references go through a fake module loader, so nothing is
 * imported from disk.
 */
import { describe, it, expect, vi } from "vitest";
import { BuildContext, parseQualifiedReference } from "../../core/context.js";
import type { ModuleLoader } from "../../core/context.js";
import { CapabilityRegistry, instantiate } from "../../core/registry.js";
import { ConfigurationError, ResolutionError, UnknownCapabilityError } from "../../errors/index.js";

class Recorder {
    public readonly received: unknown[];
    constructor(...received: unknown[]) {
        this.received = received;
    }
}

function registryWith(modules: Record<string, Record<string, unknown>>) {
    const loader = vi.fn<ModuleLoader>(async (specifier) => {
        const namespace = modules[specifier];
        if (!namespace) throw new Error(`Cannot find module '${specifier}'`);
        return namespace;
    });
    const registry = new CapabilityRegistry(new BuildContext({ baseDir: "/base", loader }));
    return { registry, loader };
}

describe("parseQualifiedReference", () => {
    it("splits at the last '#'", () => {
        expect(parseQualifiedReference("./a#b.js#Sim")).toEqual({ specifier: "./a#b.js", exportName: "Sim" });
    });

    it("rejects an empty module or export", () => {
        expect(parseQualifiedReference("#Sim")).toBeNull();
        expect(parseQualifiedReference("./sims.js#")).toBeNull();
    });
});

describe("CapabilityRegistry aliases", () => {
    it("builds a registered capability once per context", async () => {
        const { registry } = registryWith({});
        const factory = vi.fn(() => ({ call: () => 1 }));
        registry.register("solver", factory);

        const first = await registry.resolve("solver");
        const second = await registry.resolve("solver");

        expect(first).toBe(second);
        expect(factory).toHaveBeenCalledTimes(1);
        expect(registry.context.isCached("solver")).toBe(true);
    });

    it("shares one in-flight construction between concurrent callers", async () => {
        const { registry } = registryWith({});
        const factory = vi.fn(async () => {
            await new Promise((resolve) => setTimeout(resolve, 5));
            return { call: () => 1 };
        });
        registry.register("slow", factory);

        const [a, b] = await Promise.all([registry.resolve("slow"), registry.resolve("slow")]);

        expect(a).toBe(b);
        expect(factory).toHaveBeenCalledTimes(1);
    });

    it("does not share instances across contexts", async () => {
        const factory = () => ({});
        const one = new CapabilityRegistry(new BuildContext());
        const two = new CapabilityRegistry(new BuildContext());
        one.register("thing", factory);
        two.register("thing", factory);

        expect(await one.resolve("thing")).not.toBe(await two.resolve("thing"));
    });

    it("raises UnknownCapabilityError for an unregistered alias", async () => {
        const { registry } = registryWith({});
        await expect(registry.resolve("warp", "simulator")).rejects.toThrow(UnknownCapabilityError);
        await expect(registry.resolve("warp", "simulator")).rejects.toThrow('Unknown simulator: "warp" is not registered.');
    });

    it("rejects an alias registered as a different kind", async () => {
        const { registry } = registryWith({});
        registry.register("link", () => ({}), "simulator");
        await expect(registry.resolve("link", "tool")).rejects.toThrow('"link" is registered as simulator, expected tool.');
    });

    it("wraps factory failures and does not cache them", async () => {
        const { registry } = registryWith({});
        let attempts = 0;
        registry.register("flaky", () => {
            attempts++;
            if (attempts === 1) throw new Error("warming up");
            return { ok: true };
        });

        await expect(registry.resolve("flaky")).rejects.toThrow('Cannot resolve "flaky": factory failed (warming up)');
        expect(registry.context.isCached("flaky")).toBe(false);
        await expect(registry.resolve("flaky")).resolves.toEqual({ ok: true });
    });

    it("rejects duplicate names and names containing '#'", () => {
        const { registry } = registryWith({});
        registry.register("solver", () => ({}));
        expect(() => registry.register("solver", () => ({}))).toThrow(ConfigurationError);
        expect(() => registry.register("a#b", () => ({}))).toThrow("Capability names cannot contain '#': \"a#b\"");
    });

    it("lists agents in registration order", () => {
        const { registry } = registryWith({});
        registry.registerAgent("zeta", () => ({}));
        registry.register("tool-a", () => ({}));
        registry.registerAgent("alpha", () => ({}));

        expect(registry.listAgents()).toEqual(["zeta", "alpha"]);
        expect(registry.kindOf("tool-a")).toBe("tool");
    });
});

describe("CapabilityRegistry qualified references", () => {
    it("resolves relative specifiers against the base directory", async () => {
        const { registry, loader } = registryWith({ "file:///base/sims/custom.js": { Custom: Recorder } });

        await expect(registry.resolve("./sims/custom.js#Custom")).resolves.toBe(Recorder);
        expect(loader).toHaveBeenCalledWith("file:///base/sims/custom.js");
    });

    it("passes package specifiers through unchanged", async () => {
        const { registry, loader } = registryWith({ "net-sims": { Sim: Recorder } });

        await registry.resolve("net-sims#Sim");
        expect(loader).toHaveBeenCalledWith("net-sims");
    });

    it("caches by the exact reference string", async () => {
        const { registry, loader } = registryWith({ "net-sims": { Sim: Recorder } });

        await registry.resolve("net-sims#Sim");
        await registry.resolve("net-sims#Sim");
        expect(loader).toHaveBeenCalledTimes(1);
    });

    it("raises ResolutionError for a missing export", async () => {
        const { registry } = registryWith({ "net-sims": { Sim: Recorder } });
        await expect(registry.resolve("net-sims#Nope")).rejects.toThrow(
            'Cannot resolve "net-sims#Nope": module "net-sims" has no export "Nope"',
        );
    });

    it("raises ResolutionError when the module cannot be loaded", async () => {
        const { registry } = registryWith({});
        const failure = registry.resolve("./missing.js#Sim");
        await expect(failure).rejects.toThrow(ResolutionError);
        await expect(failure).rejects.toThrow(
            "Cannot resolve \"./missing.js#Sim\": module \"./missing.js\" could not be loaded (Cannot find module 'file:///base/missing.js')",
        );
    });
});

describe("construct", () => {
    it("appends non-empty kwargs after the positional arguments", async () => {
        const { registry } = registryWith({});
        registry.register("recorder", () => Recorder);

        const built = await registry.construct("recorder", [1, "two"], { mode: "fast" });

        expect(built).toBeInstanceOf(Recorder);
        expect(built).toEqual(new Recorder(1, "two", { mode: "fast" }));
    });

    it("omits empty kwargs", async () => {
        const { registry } = registryWith({});
        registry.register("recorder", () => Recorder);

        const built = await registry.construct("recorder", [1]);
        expect(built).toEqual(new Recorder(1));
    });

    it("builds a fresh instance on every call", async () => {
        const { registry } = registryWith({});
        registry.register("recorder", () => Recorder);

        expect(await registry.construct("recorder")).not.toBe(await registry.construct("recorder"));
    });

    it("returns a non-constructible handle unchanged when no arguments are given", () => {
        const instance = { call: () => 42 };
        expect(instantiate("solver", instance, [], {})).toBe(instance);
    });

    it("rejects arguments for a non-constructible handle", () => {
        expect(() => instantiate("solver", { call: () => 42 }, [1], {})).toThrow(
            'Cannot resolve "solver": arguments were given but the capability is not constructible',
        );
    });

    it("wraps constructor failures in ResolutionError", () => {
        class Broken {
            constructor() {
                throw new Error("no licence");
            }
        }
        expect(() => instantiate("broken", Broken, [], {})).toThrow('Cannot resolve "broken": constructor threw (no licence)');
    });
});
