import type { OrchestrationConfigInput } from "../../schemas/config.js";

/** Written by `meshstep init`: three power-controlled terminals on two simulators. */
export const sampleConfig = {
    max_steps: 50,
    seed: 7,
    termination: "all-done",
    delegates: [
        {
            name: "macro",
            reference: "link",
            agent_ids: ["ue-1", "ue-2"],
            kwargs: { agents: ["ue-1", "ue-2"], max_steps: 20, base_snr_db: 24, path_loss_exponent: 2.2 },
            fading_models: [{ channel_id: "link:ue-1", type: "nakagami", kwargs: { m_factor: 2, omega: 1 } }],
        },
        {
            name: "small-cell",
            reference: "link",
            agent_ids: ["ue-3"],
            kwargs: { agents: ["ue-3"], max_steps: 10, base_snr_db: 18 },
            fading_models: [{ channel_id: "link:ue-3", type: "rician", kwargs: { k_factor: 8 } }],
            mobility_models: [{ agent_id: "ue-3", type: "random_walk", kwargs: { step_size: 0.5 } }],
            on_error: "skip",
        },
    ],
    agents: [
        { id: "ue-1", reference: "power-control", kwargs: { target_snr_db: 12 } },
        { id: "ue-2", reference: "power-control", kwargs: { target_snr_db: 12 } },
        { id: "ue-3", reference: "power-control", kwargs: { target_snr_db: 9 } },
    ],
    coordinator: {
        policy: "max-utility",
        max_committed: 2,
    },
} satisfies OrchestrationConfigInput;

export const CONFIG_FILE_NAME = "meshstep.config.json";
