import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";
import { ConfigurationError } from "../errors/index.js";

/**
 * Resolves a LanguageModel based on provider and model names.
 * Falls back to MESHSTEP_PROVIDER and MESHSTEP_MODEL environment variables,
 * then to OpenAI gpt-4o-mini.
 */
export function resolveLanguageModel(providerName?: string, modelId?: string): LanguageModel {
    const provider = providerName || process.env.MESHSTEP_PROVIDER || "openai";
    const model = modelId || process.env.MESHSTEP_MODEL;

    switch (provider.toLowerCase()) {
        case "openai":
            return openai(model || "gpt-4o-mini");
        case "google":
            return google(model || "gemini-1.5-flash");
        case "anthropic":
            return anthropic(model || "claude-3-5-haiku-latest");
        default:
            throw new ConfigurationError(`Unsupported LLM provider: ${provider}`);
    }
}
