/**
 * Agents barrel export.
 */
export { PowerControlAgent, PowerControlOptions } from "./power-control.js";

export { LlmAgent, LlmAgentOptions, LlmDecision, DEFAULT_SYSTEM_PROMPT } from "./llm-agent.js";
