/**
 * LinkSimulator — a point-to-point link-budget simulator, one link per agent.
 *
 * Large-scale SNR follows a log-distance path-loss law plus the transmit
 * power in dB. A fading model registered for `link:<agentId>` adds its
 * sampled gain on top; a mobility model registered for the agent moves it
 * every step. Links without an override see no fading and stay put.
 */
import { z } from "zod/v4";
import type { AgentId, FadingModel, MobilityModel, Position, Simulator } from "../core/types.js";
import type { Action, ObservationMap, TransitionDraft } from "../schemas/protocol.js";
import { formatIssues } from "../schemas/model.js";
import { ConfigurationError } from "../errors/index.js";

export const LinkSimulatorOptions = z.object({
    agents: z.array(z.string().min(1)).min(1),
    /** Episode horizon in steps. */
    max_steps: z.number().int().positive().default(10),
    /** SNR at 1 m with full power. */
    base_snr_db: z.number().default(20),
    path_loss_exponent: z.number().nonnegative().default(2),
    dt: z.number().positive().default(1),
    /** Reward penalty per unit of transmit power. */
    power_cost: z.number().nonnegative().default(0.5),
    initial_power: z.number().gt(0).lte(1).default(1),
    initial_distance_m: z.number().positive().default(10),
});
export type LinkSimulatorOptions = z.infer<typeof LinkSimulatorOptions>;
export type LinkSimulatorOptionsInput = z.input<typeof LinkSimulatorOptions>;

/** `power` is optional: an agent that sends no power keeps its previous one. */
const LinkAction = z.object({
    power: z.number().gt(0).lte(1).optional(),
});

interface LinkTerminal {
    position: Position;
    power: number;
}

export function linkChannelId(agentId: AgentId): string {
    return `link:${agentId}`;
}

export class LinkSimulator implements Simulator {
    public readonly options: LinkSimulatorOptions;

    private readonly fading = new Map<string, FadingModel>();
    private readonly mobility = new Map<AgentId, MobilityModel>();
    private terminals = new Map<AgentId, LinkTerminal>();
    private stepCount = 0;

    constructor(options: LinkSimulatorOptionsInput) {
        const parsed = LinkSimulatorOptions.safeParse(options);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid link simulator options: ${formatIssues(parsed.error).join("; ")}`);
        }
        this.options = parsed.data;
    }

    registerFadingModel(channelId: string, model: FadingModel): void {
        this.fading.set(channelId, model);
    }

    registerMobilityModel(agentId: string, model: MobilityModel): void {
        this.mobility.set(agentId, model);
    }

    /**
     * Each fading and mobility model restarts from a seed derived from
     * `seed` and its channel or agent, so a seeded run replays exactly.
     */
    reset(seed?: number): ObservationMap {
        this.stepCount = 0;
        for (const [channelId, model] of this.fading) {
            model.reseed?.(seed === undefined ? undefined : `${seed}:fading:${channelId}`);
        }
        for (const [agentId, model] of this.mobility) {
            model.reseed?.(seed === undefined ? undefined : `${seed}:mobility:${agentId}`);
        }
        this.terminals = new Map(
            this.options.agents.map((agentId) => [
                agentId,
                { position: [this.options.initial_distance_m, 0], power: this.options.initial_power },
            ]),
        );
        return this.observe();
    }

    step(actions: Record<AgentId, Action>): TransitionDraft {
        if (this.terminals.size === 0) {
            throw new Error("step() called before reset()");
        }
        this.stepCount++;

        for (const [agentId, terminal] of this.terminals) {
            const action = actions[agentId];
            if (action !== undefined) {
                const parsed = LinkAction.safeParse(action);
                if (!parsed.success) {
                    throw new Error(`Invalid action for "${agentId}": ${formatIssues(parsed.error).join("; ")}`);
                }
                terminal.power = parsed.data.power ?? terminal.power;
            }
            const mover = this.mobility.get(agentId);
            if (mover) terminal.position = mover.advance(terminal.position, this.options.dt);
        }

        const observations = this.observe();
        const rewards: Record<AgentId, number> = {};
        for (const [agentId, terminal] of this.terminals) {
            const snrDb = Number(observations[agentId].snr_db);
            rewards[agentId] = Math.log2(1 + Math.pow(10, snrDb / 10)) - this.options.power_cost * terminal.power;
        }

        return {
            observations,
            rewards,
            done: this.stepCount >= this.options.max_steps,
            info: { step: this.stepCount, horizon: this.options.max_steps },
        };
    }

    private observe(): ObservationMap {
        const observations: ObservationMap = {};
        for (const [agentId, terminal] of this.terminals) {
            observations[agentId] = {
                snr_db: this.snrDb(agentId, terminal),
                position: [...terminal.position],
                power: terminal.power,
                step: this.stepCount,
            };
        }
        return observations;
    }

    private snrDb(agentId: AgentId, terminal: LinkTerminal): number {
        const distance = Math.max(Math.hypot(...terminal.position), 1);
        const largeScale =
            this.options.base_snr_db -
            10 * this.options.path_loss_exponent * Math.log10(distance) +
            10 * Math.log10(terminal.power);

        const channelId = linkChannelId(agentId);
        const model = this.fading.get(channelId);
        const gain = model
            ? model.sample({ channel_id: channelId, time_index: this.stepCount, snr_db: largeScale, distance_m: distance })
            : 0;
        return largeScale + gain;
    }
}
