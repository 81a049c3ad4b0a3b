import yargs from "yargs";
import { Readable } from "stream";
import chalk from "chalk";
import { CliConfig, ConfigError, loadConfig } from "./config";
import { EXIT_OK, Output, runFile, writeLine } from "./commands/run";
import { runPrompt } from "./repl";

export const EXIT_USAGE = 64;
export const EXIT_CONFIG = 78;

export const USAGE = "Usage: treelox [script]";
export const VERSION = "0.1.0";

export interface CliStreams extends Output {
    stdin: Readable;
}

export async function main(
    args: string[],
    streams: CliStreams,
    cwd: string = process.cwd(),
): Promise<number> {
    // Help, version and parse failures come back through the callback
    // instead of being printed to the console and ending the process.
    const parsed: { output: string; error?: Error } = { output: "" };

    const argv = await yargs()
        .scriptName("treelox")
        .usage(USAGE)
        .option("ast", {
            type: "boolean",
            describe: "Print the parsed expression tree before its value",
        })
        .option("color", {
            type: "boolean",
            describe: "Color diagnostics",
        })
        .option("excerpt", {
            type: "boolean",
            describe: "Show the source line under each diagnostic",
        })
        .option("config", {
            type: "string",
            describe: "Path to a treelox.yml configuration file",
        })
        .help()
        .version(VERSION)
        .exitProcess(false)
        .parse(args, {}, (err, _argv, output) => {
            parsed.error = err;
            parsed.output = output;
        });

    if (parsed.error) {
        writeLine(streams.stderr, parsed.output || parsed.error.message);
        return EXIT_USAGE;
    }
    if (parsed.output) {
        writeLine(streams.stdout, parsed.output);
        return EXIT_OK;
    }

    const positionals = argv._.map(String);
    if (positionals.length > 1) {
        writeLine(streams.stdout, USAGE);
        return EXIT_USAGE;
    }

    let config: CliConfig;
    try {
        config = await loadConfig(argv.config, cwd);
    } catch (e) {
        if (!(e instanceof ConfigError)) throw e;
        const colors =
            argv.color === false ? new chalk.Instance({ level: 0 }) : chalk;
        writeLine(
            streams.stderr,
            `${colors.red(`Error in ${e.file}:`)} ${e.message}`,
        );
        return EXIT_CONFIG;
    }

    config = {
        ...config,
        ast: argv.ast ?? config.ast,
        color: argv.color ?? config.color,
        excerpt: argv.excerpt ?? config.excerpt,
    };

    const [script] = positionals;
    if (script !== undefined) {
        return runFile(script, config, streams);
    }

    await runPrompt(streams.stdin, config, streams);
    return EXIT_OK;
}
