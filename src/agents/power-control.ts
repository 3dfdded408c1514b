/**
 * PowerControlAgent — closed-loop transmit power control towards a target SNR.
 *
 * Proposes the power that would close the gap between the observed and
 * the target SNR in one step, clamped to [min_power, 1]. The utility is
 * the size of that gap in dB.
 */
import { z } from "zod/v4";
import type { Agent, ProposalContext } from "../core/types.js";
import type { Observation, ProposalDraft } from "../schemas/protocol.js";
import { formatIssues } from "../schemas/model.js";
import { ConfigurationError } from "../errors/index.js";

export const PowerControlOptions = z.object({
    agent_id: z.string().min(1),
    target_snr_db: z.number().default(10),
    min_power: z.number().gt(0).lte(1).default(0.01),
    /** Gaps smaller than this are ignored and the agent abstains. */
    tolerance_db: z.number().nonnegative().default(0.1),
});
export type PowerControlOptions = z.infer<typeof PowerControlOptions>;

const LinkReading = z.object({
    snr_db: z.number(),
    power: z.number().positive(),
});

export class PowerControlAgent implements Agent {
    public readonly id: string;
    private readonly options: PowerControlOptions;

    constructor(options: z.input<typeof PowerControlOptions>) {
        const parsed = PowerControlOptions.safeParse(options);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid power-control options: ${formatIssues(parsed.error).join("; ")}`);
        }
        this.options = parsed.data;
        this.id = parsed.data.agent_id;
    }

    propose(observation: Observation, context: ProposalContext): ProposalDraft | null {
        const reading = LinkReading.safeParse(observation);
        if (!reading.success) {
            throw new Error(`observation at step ${context.step} lacks snr_db/power`);
        }
        const { snr_db: snrDb, power } = reading.data;
        const gapDb = this.options.target_snr_db - snrDb;
        if (Math.abs(gapDb) < this.options.tolerance_db) return null;

        const proposed = Math.min(1, Math.max(this.options.min_power, power * Math.pow(10, gapDb / 10)));
        return {
            agent_id: this.id,
            action: { power: proposed },
            utility: Math.abs(gapDb),
            metadata: {
                estimates: {
                    snr_gap_db: Math.abs(gapDb),
                    power_saving: power - proposed,
                },
            },
        };
    }
}
