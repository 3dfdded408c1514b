/**
 * Built-in capability aliases, available to every configuration without
 * a qualified reference.
 */
import type { CapabilityKind, CapabilityRegistry } from "./core/registry.js";
import { LinkSimulator } from "./simulators/link.js";
import { PowerControlAgent } from "./agents/power-control.js";
import { LlmAgent } from "./agents/llm-agent.js";

export const BUILTIN_CAPABILITIES: ReadonlyArray<{ name: string; kind: CapabilityKind; handle: unknown }> = [
    { name: "link", kind: "simulator", handle: LinkSimulator },
    { name: "power-control", kind: "agent-type", handle: PowerControlAgent },
    { name: "llm", kind: "agent-type", handle: LlmAgent },
];

/** Register every built-in whose name is still free. */
export function registerBuiltins(registry: CapabilityRegistry): void {
    for (const { name, kind, handle } of BUILTIN_CAPABILITIES) {
        if (!registry.has(name)) registry.register(name, () => handle, kind);
    }
}
