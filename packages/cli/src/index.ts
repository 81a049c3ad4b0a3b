#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { main } from "./main";
import { errorMessage } from "./config";

main(hideBin(process.argv), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
}).then(
    (code) => {
        process.exitCode = code;
    },
    (e: unknown) => {
        console.error(chalk.red("Error:"), errorMessage(e));
        process.exitCode = 1;
    },
);
