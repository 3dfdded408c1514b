import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import fs from "fs/promises";
import path from "path";
import { runOrchestration } from "../../orchestrator.js";
import type { RunOutcome, StepRecord } from "../../orchestrator.js";
import { parseOrchestrationConfig } from "../../schemas/config.js";
import { SqliteTelemetryStore } from "../../telemetry/sqlite.js";
import { createLogger } from "../../utils/logger.js";

interface RunOptions {
    config: string;
    maxSteps?: string;
    seed?: string;
    db?: string;
    yes?: boolean;
}

export function parseIntegerOption(name: string, value: string | undefined, min?: number): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isInteger(parsed)) throw new Error(`Invalid ${name} value: ${value}`);
    if (min !== undefined && parsed < min) throw new Error(`Invalid ${name} value: ${value} (must be >= ${min})`);
    return parsed;
}

/** One line per tick: committed agents, failures and the summed reward. */
export function formatStepSummary(record: StepRecord): string {
    const committed = record.plan.committed.length > 0 ? record.plan.committed.join(", ") : "(defaults only)";
    const reward = Object.values(record.transition.rewards).reduce((sum, value) => sum + value, 0);
    const failures = record.plan.telemetry.failures.map((failure) => failure.agent_id);
    const failed = failures.length > 0 ? `  failed: ${failures.join(", ")}` : "";
    return `step ${record.step}  committed: ${committed}  reward: ${reward.toFixed(3)}${failed}${record.transition.done ? "  [done]" : ""}`;
}

export function formatOutcome(outcome: RunOutcome): string {
    return outcome.status === "completed"
        ? `completed (${outcome.reason}) after ${outcome.steps} step(s)`
        : `aborted after ${outcome.steps} step(s): ${outcome.error.message}`;
}

export async function runCommand(options: RunOptions) {
    p.intro(chalk.bgMagenta.black(" meshstep - Run "));

    const configPath = path.resolve(process.cwd(), options.config);
    let store: SqliteTelemetryStore | undefined;

    try {
        const maxStepsOverride = parseIntegerOption("--max-steps", options.maxSteps, 0);
        const seedOverride = parseIntegerOption("--seed", options.seed);

        const document: unknown = JSON.parse(await fs.readFile(configPath, "utf-8"));
        const config = parseOrchestrationConfig(document);
        const maxSteps = maxStepsOverride ?? config.max_steps;
        const seed = seedOverride ?? config.seed;

        p.log.info(
            `${chalk.bold(path.basename(configPath))}: ${config.delegates.length} delegate(s), ` +
            `${config.agents.length} agent(s), up to ${maxSteps} step(s)`,
        );

        if (!options.yes) {
            const start = await p.confirm({ message: "Start the run?" });
            if (p.isCancel(start) || !start) {
                p.outro("Run cancelled.");
                return;
            }
        }

        let runId: string | undefined;
        if (options.db) {
            store = new SqliteTelemetryStore(options.db);
            runId = store.startRun({ maxSteps, seed, label: path.basename(configPath) });
        }

        const spinner = ora("Running...").start();
        const outcome = await runOrchestration(document, {
            baseDir: path.dirname(configPath),
            maxSteps,
            seed,
            telemetry: store && runId ? store.sinkFor(runId) : undefined,
            logger: createLogger("meshstep", process.env.MESHSTEP_LOG_LEVEL ?? "warn"),
            onStepComplete: (record) => {
                spinner.clear();
                console.log(formatStepSummary(record));
                spinner.text = `Step ${record.step + 1}/${maxSteps}`;
                spinner.render();
            },
            onDelegateDone: (delegate, step) => {
                spinner.clear();
                console.log(chalk.blue(`delegate ${delegate} finished at step ${step}`));
                spinner.render();
            },
            onDelegateSkipped: (delegate, step, error) => {
                spinner.clear();
                console.log(chalk.yellow(`delegate ${delegate} skipped at step ${step}: ${error.message}`));
                spinner.render();
            },
        });

        if (store && runId) store.finishRun(runId, outcome);

        if (outcome.status === "completed") {
            spinner.succeed(chalk.green(formatOutcome(outcome)));
            if (runId) p.log.info(`Telemetry stored as run ${chalk.cyan(runId)}`);
            p.outro("Done.");
            return;
        }

        spinner.fail(chalk.red(formatOutcome(outcome)));
        p.outro("Run aborted.");
        process.exitCode = 1;
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    } finally {
        store?.close();
    }
}
