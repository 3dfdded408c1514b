/**
 * LlmAgent — asks a language model for a structured proposal.
 *
 * The system prompt is fixed for the agent's lifetime; the per-step prompt
 * carries the current observation and the feedback from the previous step.
 * The model's output is validated by the Vercel AI SDK's `generateObject`
 * before it becomes a proposal.
 */
import { z } from "zod/v4";
import type { Agent, AgentFeedback, ProposalContext } from "../core/types.js";
import type { Observation, ProposalDraft } from "../schemas/protocol.js";
import { formatIssues } from "../schemas/model.js";
import { LLMClient } from "../llm/client.js";
import type { StructuredGenerator } from "../llm/client.js";
import { resolveLanguageModel } from "../llm/resolve.js";
import { ConfigurationError } from "../errors/index.js";

export const DEFAULT_SYSTEM_PROMPT =
    "You control one radio terminal in a shared network. Given your latest observation, " +
    "propose the action for the next step and the utility you expect from it. " +
    "Higher utility wins the coordination round; report it honestly.";

export const LlmAgentOptions = z.object({
    agent_id: z.string().min(1),
    system_prompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
    temperature: z.number().min(0).max(2).default(0.2),
    /** openai | google | anthropic; falls back to MESHSTEP_PROVIDER. */
    provider: z.string().optional(),
    model: z.string().optional(),
});
export type LlmAgentOptions = z.infer<typeof LlmAgentOptions>;

/** What the model must return. */
export const LlmDecision = z.object({
    action: z.record(z.string(), z.union([z.number(), z.string(), z.boolean()])),
    utility: z.number(),
    rationale: z.string(),
});
export type LlmDecision = z.infer<typeof LlmDecision>;

export class LlmAgent implements Agent {
    public readonly id: string;
    public readonly systemPrompt: string;

    private readonly client: StructuredGenerator;
    private readonly temperature: number;
    private lastFeedback: AgentFeedback | null = null;

    /** `client` defaults to an LLMClient for the configured provider and model. */
    constructor(options: z.input<typeof LlmAgentOptions>, client?: StructuredGenerator) {
        const parsed = LlmAgentOptions.safeParse(options);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid llm agent options: ${formatIssues(parsed.error).join("; ")}`);
        }
        this.id = parsed.data.agent_id;
        this.systemPrompt = parsed.data.system_prompt;
        this.temperature = parsed.data.temperature;
        this.client = client ?? new LLMClient(resolveLanguageModel(parsed.data.provider, parsed.data.model));
    }

    async propose(observation: Observation, context: ProposalContext): Promise<ProposalDraft> {
        const prompt = JSON.stringify({
            step: context.step,
            observation,
            previous: this.lastFeedback && {
                step: this.lastFeedback.step,
                reward: this.lastFeedback.reward ?? null,
                done: this.lastFeedback.done,
            },
        });

        const result = await this.client.generateObject(LlmDecision, this.systemPrompt, prompt, {
            temperature: this.temperature,
        });

        return {
            agent_id: this.id,
            action: result.object.action,
            utility: result.object.utility,
            metadata: { rationale: result.object.rationale, token_usage: result.tokenUsage },
        };
    }

    feedback(feedback: AgentFeedback): void {
        this.lastFeedback = feedback;
    }
}
