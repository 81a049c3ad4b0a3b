import chalk, { Chalk } from "chalk";
import { ErrorLocation } from "../utils/Error";
import { formatExcerpt } from "../utils/err";

/**
 * Sink for diagnostics raised while scanning, parsing or evaluating.
 * `location` is empty for scan and runtime errors; `loc` marks the source
 * span for excerpts.
 */
export interface ErrorReporter {
    report(
        line: number,
        location: string,
        message: string,
        loc?: ErrorLocation,
    ): void;
}

export interface Diagnostic {
    line: number;
    location: string;
    message: string;
    loc?: ErrorLocation;
}

export function formatDiagnostic(
    line: number,
    location: string,
    message: string,
): string {
    return `[line ${line}] Error ${location}: ${message}`;
}

export interface ConsoleReporterOptions {
    color?: boolean;
    // When set, each diagnostic is followed by the offending source line.
    source?: string;
    write?: (text: string) => void;
}

export class ConsoleReporter implements ErrorReporter {
    private colors: Chalk;
    private source?: string;
    private write: (text: string) => void;

    constructor(options: ConsoleReporterOptions = {}) {
        this.colors =
            options.color === false ? new chalk.Instance({ level: 0 }) : chalk;
        this.source = options.source;
        this.write = options.write ?? ((text) => console.error(text));
    }

    public report(
        line: number,
        location: string,
        message: string,
        loc?: ErrorLocation,
    ): void {
        this.write(this.colors.red(formatDiagnostic(line, location, message)));

        if (this.source !== undefined && loc !== undefined) {
            for (const excerptLine of formatExcerpt(
                this.source,
                loc,
                this.colors,
            )) {
                this.write(excerptLine);
            }
        }
    }
}

export class CollectingReporter implements ErrorReporter {
    public diagnostics: Diagnostic[] = [];

    public report(
        line: number,
        location: string,
        message: string,
        loc?: ErrorLocation,
    ): void {
        this.diagnostics.push({ line, location, message, loc });
    }

    public get messages(): string[] {
        return this.diagnostics.map((d) =>
            formatDiagnostic(d.line, d.location, d.message),
        );
    }
}
