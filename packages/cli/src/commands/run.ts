import * as fs from "fs/promises";
import { Writable } from "stream";
import chalk from "chalk";
import {
    ConsoleReporter,
    RunResult,
    printAst,
    run,
    stringify,
} from "@treelox/core";
import { CliConfig } from "../config";

export const EXIT_OK = 0;
export const EXIT_IO_ERROR = 74;

export interface Output {
    stdout: Writable;
    stderr: Writable;
}

export function writeLine(stream: Writable, text: string): void {
    stream.write(`${text}\n`);
}

/**
 * Runs one unit of source and prints its value, or the diagnostics it
 * produced, the way both the prompt and the file runner show them.
 */
export function runSource(
    source: string,
    config: CliConfig,
    output: Output,
): RunResult {
    const reporter = new ConsoleReporter({
        color: config.color,
        source: config.excerpt ? source : undefined,
        write: (text) => writeLine(output.stderr, text),
    });

    const result = run(source, reporter);

    if (config.ast && result.ast) {
        writeLine(output.stdout, printAst(result.ast));
    }
    if (result.value) {
        writeLine(output.stdout, stringify(result.value));
    }

    return result;
}

export async function runFile(
    file: string,
    config: CliConfig,
    output: Output,
): Promise<number> {
    let source: string;
    try {
        source = await fs.readFile(file, "utf-8");
    } catch {
        const colors =
            config.color ? chalk : new chalk.Instance({ level: 0 });
        writeLine(output.stderr, colors.red("Error reading source file."));
        return EXIT_IO_ERROR;
    }

    runSource(source, config, output);
    return EXIT_OK;
}
