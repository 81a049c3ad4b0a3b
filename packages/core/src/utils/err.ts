import chalk, { Chalk } from "chalk";
import { ErrorLocation } from "./Error";

/**
 * Renders the source line an error points at, with a caret underline.
 *
 *   |
 * 3 | 1 + "a"
 *   |   ^
 */
export function formatExcerpt(
    source: string,
    loc: ErrorLocation,
    colors: Chalk = chalk,
): string[] {
    const lines = source.split("\n");
    const lineContent = lines[loc.line - 1];
    if (lineContent === undefined) return [];

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);

    const pipeLine = `${colors.blue(padding)} ${colors.blue("|")}`;
    const codeLine = `${colors.blue(lineNumStr)} ${colors.blue("|")} ${lineContent}`;

    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const pointer = colors.red.bold("^".repeat(Math.max(1, loc.len ?? 1)));
    const pointerLine = `${colors.blue(padding)} ${colors.blue("|")} ${pointerSpace}${pointer}`;

    return [pipeLine, codeLine, pointerLine];
}
