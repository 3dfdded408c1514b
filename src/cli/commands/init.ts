import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import { CONFIG_FILE_NAME, sampleConfig } from "../templates/config.js";

/** Write `content` unless the file exists. Returns whether it was written. */
export async function safeWrite(filePath: string, content: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        p.log.warn(`Skipped ${chalk.cyan(path.basename(filePath))} (already exists)`);
        return false;
    } catch {
        await fs.writeFile(filePath, content);
        return true;
    }
}

export async function initCommand(options?: { yes?: boolean }) {
    p.intro(chalk.bgCyan.black(" meshstep - Initialize "));

    const cwd = process.cwd();
    const isReady = options?.yes
        ? true
        : await p.confirm({
            message: `Write a sample ${CONFIG_FILE_NAME} in ${cwd}?`,
            initialValue: true,
        });

    if (p.isCancel(isReady) || !isReady) {
        p.cancel("Operation cancelled.");
        process.exit(0);
    }

    try {
        const written = await safeWrite(path.join(cwd, CONFIG_FILE_NAME), `${JSON.stringify(sampleConfig, null, 2)}\n`);
        if (written) p.log.success(`Created ${chalk.cyan(CONFIG_FILE_NAME)}`);

        p.note(
            `1. Review ${chalk.cyan(CONFIG_FILE_NAME)}\n` +
            `2. Run it: ${chalk.magenta(`meshstep run -c ${CONFIG_FILE_NAME}`)}\n` +
            `3. Persist telemetry with ${chalk.green("--db runs.db")}`,
            "Next Steps",
        );
        p.outro(chalk.green("Ready."));
    } catch (error) {
        p.log.error(chalk.red(error instanceof Error ? error.message : String(error)));
        process.exit(1);
    }
}
