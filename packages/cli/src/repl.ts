import * as readline from "readline";
import { Readable } from "stream";
import { CliConfig } from "./config";
import { Output, runSource } from "./commands/run";

const EXIT_COMMAND = "exit";

/**
 * Reads one line at a time and runs each as its own unit. Stops at end of
 * input or on a line reading `exit`. Errors never end the session.
 */
export async function runPrompt(
    input: Readable,
    config: CliConfig,
    output: Output,
): Promise<void> {
    const rl = readline.createInterface({
        input,
        terminal: false,
        crlfDelay: Infinity,
    });
    const prompt = () => output.stdout.write(config.prompt);

    prompt();
    try {
        for await (const rawLine of rl) {
            const line = rawLine.trim();
            if (line === EXIT_COMMAND) break;

            if (line.length > 0) {
                runSource(line, config, output);
            }
            prompt();
        }
    } finally {
        rl.close();
    }
}
