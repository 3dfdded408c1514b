/**
 * LLM Client — Thin wrapper around the Vercel AI SDK.
 *
 * Agents depend on the `StructuredGenerator` surface only, so a test or an
 * alternative backend can stand in for the SDK.
 */
import type { LanguageModel } from "ai";
import { generateObject } from "ai";
import type { ZodType } from "zod/v4";

export interface GenerateOptions {
    /** Override the default model for this request. */
    model?: LanguageModel;
    temperature?: number;
}

/** Result of a structured object generation (Zod-validated). */
export interface ObjectResult<T> {
    object: T;
    tokenUsage: number;
}

export interface StructuredGenerator {
    generateObject<T>(schema: ZodType<T>, system: string, prompt: string, options?: GenerateOptions): Promise<ObjectResult<T>>;
}

export class LLMClient implements StructuredGenerator {
    public readonly model: LanguageModel;

    constructor(model: LanguageModel) {
        this.model = model;
    }

    /**
     * Generate a structured object validated against a Zod schema.
     * Uses the Vercel AI SDK's native `generateObject` — no manual JSON.parse().
     */
    async generateObject<T>(
        schema: ZodType<T>,
        system: string,
        prompt: string,
        options?: GenerateOptions,
    ): Promise<ObjectResult<T>> {
        const result = await generateObject({
            model: options?.model ?? this.model,
            schema,
            system,
            prompt,
            temperature: options?.temperature ?? 0.2,
        });

        return {
            object: result.object as T,
            tokenUsage: result.usage.totalTokens ?? 0,
        };
    }
}
