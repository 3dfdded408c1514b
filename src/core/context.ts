/**
 * BuildContext — the long-lived value every construction call receives.
 *
 * It owns the resolution cache, so constructing the same capability twice
 * within one context yields the cached instance, while two contexts never
 * share state.
 */
import path from "path";
import { pathToFileURL } from "url";
import type { Logger } from "pino";
import { ResolutionError, describeError } from "../errors/index.js";
import { silentLogger } from "../utils/logger.js";

/** Loads a module namespace for a qualified reference. */
export type ModuleLoader = (specifier: string) => Promise<Record<string, unknown>>;

export interface BuildContextOptions {
    /** Directory relative module specifiers are resolved against. Default: cwd. */
    baseDir?: string;
    loader?: ModuleLoader;
    logger?: Logger;
}

export interface QualifiedReference {
    specifier: string;
    exportName: string;
}

/** `<module>#<export>` marks a qualified reference; anything else is an alias. */
export function isQualifiedReference(reference: string): boolean {
    return reference.includes("#");
}

export function parseQualifiedReference(reference: string): QualifiedReference | null {
    const at = reference.lastIndexOf("#");
    if (at <= 0 || at === reference.length - 1) return null;
    return { specifier: reference.slice(0, at), exportName: reference.slice(at + 1) };
}

const importModule: ModuleLoader = (specifier) => import(specifier);

export class BuildContext {
    public readonly baseDir: string;
    public readonly logger: Logger;

    private readonly loader: ModuleLoader;
    private readonly cache = new Map<string, Promise<unknown>>();

    constructor(options: BuildContextOptions = {}) {
        this.baseDir = options.baseDir ?? process.cwd();
        this.loader = options.loader ?? importModule;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Build `key` once. Concurrent callers share the in-flight promise,
     * which serializes first construction per key. Failures are evicted
     * so a later call can retry.
     */
    memoize(key: string, build: () => Promise<unknown>): Promise<unknown> {
        const cached = this.cache.get(key);
        if (cached) return cached;

        const pending = (async () => {
            try {
                return await build();
            } catch (err) {
                this.cache.delete(key);
                throw err;
            }
        })();
        this.cache.set(key, pending);
        return pending;
    }

    isCached(key: string): boolean {
        return this.cache.has(key);
    }

    /** Locate the export a qualified reference points at. */
    async loadExport(reference: string): Promise<unknown> {
        const parsed = parseQualifiedReference(reference);
        if (!parsed) {
            throw new ResolutionError(reference, "expected '<module>#<export>'");
        }

        let namespace: Record<string, unknown>;
        try {
            namespace = await this.loader(this.toImportSpecifier(parsed.specifier));
        } catch (err) {
            throw new ResolutionError(reference, `module "${parsed.specifier}" could not be loaded (${describeError(err)})`, {
                cause: err,
            });
        }

        if (!(parsed.exportName in namespace)) {
            throw new ResolutionError(reference, `module "${parsed.specifier}" has no export "${parsed.exportName}"`);
        }
        this.logger.debug({ reference }, "resolved qualified reference");
        return namespace[parsed.exportName];
    }

    private toImportSpecifier(specifier: string): string {
        const isPath = specifier.startsWith("./") || specifier.startsWith("../") || path.isAbsolute(specifier);
        return isPath ? pathToFileURL(path.resolve(this.baseDir, specifier)).href : specifier;
    }
}
