/**
 * Agent Tests — power-control arithmetic and the LLM agent against a
 * stand-in structured generator.
 */
import { describe, it, expect } from "vitest";
import type { ZodType } from "zod/v4";
import { PowerControlAgent } from "../power-control.js";
import { DEFAULT_SYSTEM_PROMPT, LlmAgent } from "../llm-agent.js";
import type { GenerateOptions, ObjectResult, StructuredGenerator } from "../../llm/client.js";
import { ConfigurationError } from "../../errors/index.js";

describe("PowerControlAgent", () => {
    const agent = new PowerControlAgent({ agent_id: "ue-1", target_snr_db: 10 });

    it("lowers power when the link is above target", () => {
        const proposal = agent.propose({ snr_db: 13, power: 0.5 }, { step: 0 });

        expect(proposal?.agent_id).toBe("ue-1");
        expect(proposal?.utility).toBe(3);
        expect(Number(proposal?.action.power)).toBeCloseTo(0.5 * Math.pow(10, -0.3), 12);
    });

    it("caps power at 1 and reports its estimates", () => {
        const proposal = agent.propose({ snr_db: 4, power: 0.5 }, { step: 0 });

        expect(proposal?.action).toEqual({ power: 1 });
        expect(proposal?.metadata).toEqual({ estimates: { snr_gap_db: 6, power_saving: -0.5 } });
    });

    it("never proposes less than min_power", () => {
        expect(agent.propose({ snr_db: 40, power: 0.5 }, { step: 0 })?.action).toEqual({ power: 0.01 });
    });

    it("abstains inside the tolerance band", () => {
        expect(agent.propose({ snr_db: 10.05, power: 0.5 }, { step: 0 })).toBeNull();
    });

    it("throws on an observation without a link reading", () => {
        expect(() => agent.propose({ rssi: -70 }, { step: 3 })).toThrow("observation at step 3 lacks snr_db/power");
    });

    it("rejects invalid options", () => {
        expect(() => new PowerControlAgent({ agent_id: "ue-1", min_power: 0 })).toThrow(ConfigurationError);
    });
});

class ScriptedGenerator implements StructuredGenerator {
    public readonly calls: { system: string; prompt: string; options?: GenerateOptions }[] = [];
    private readonly reply: unknown;

    constructor(reply: unknown) {
        this.reply = reply;
    }

    async generateObject<T>(schema: ZodType<T>, system: string, prompt: string, options?: GenerateOptions): Promise<ObjectResult<T>> {
        this.calls.push({ system, prompt, options });
        // parse() returns zod's deferred output type for a generic schema
        return { object: schema.parse(this.reply) as T, tokenUsage: 5 };
    }
}

describe("LlmAgent", () => {
    const reply = { action: { power: 0.4 }, utility: 2, rationale: "close the gap" };

    it("turns the model's decision into a proposal", async () => {
        const generator = new ScriptedGenerator(reply);
        const agent = new LlmAgent({ agent_id: "ue-1" }, generator);

        const proposal = await agent.propose({ snr_db: 3 }, { step: 0 });

        expect(proposal).toEqual({
            agent_id: "ue-1",
            action: { power: 0.4 },
            utility: 2,
            metadata: { rationale: "close the gap", token_usage: 5 },
        });
        expect(generator.calls).toEqual([
            {
                system: DEFAULT_SYSTEM_PROMPT,
                prompt: '{"step":0,"observation":{"snr_db":3},"previous":null}',
                options: { temperature: 0.2 },
            },
        ]);
    });

    it("includes the previous step's feedback in the prompt", async () => {
        const generator = new ScriptedGenerator(reply);
        const agent = new LlmAgent({ agent_id: "ue-1", system_prompt: "Be brief.", temperature: 0 }, generator);

        agent.feedback({ step: 0, observation: { snr_db: 3 }, reward: 1.5, done: false });
        await agent.propose({ snr_db: 4 }, { step: 1 });

        expect(generator.calls[0]).toEqual({
            system: "Be brief.",
            prompt: '{"step":1,"observation":{"snr_db":4},"previous":{"step":0,"reward":1.5,"done":false}}',
            options: { temperature: 0 },
        });
    });

    it("fails when the model output does not match the decision schema", async () => {
        const agent = new LlmAgent({ agent_id: "ue-1" }, new ScriptedGenerator({ action: {}, utility: "high" }));
        await expect(agent.propose({ snr_db: 3 }, { step: 0 })).rejects.toThrow();
    });

    it("rejects invalid options", () => {
        expect(() => new LlmAgent({ agent_id: "ue-1", temperature: 3 }, new ScriptedGenerator(reply))).toThrow(
            ConfigurationError,
        );
    });
});
