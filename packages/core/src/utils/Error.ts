import chalk from "chalk";
import { Loc } from "../lexer/Token";

const plain = new chalk.Instance({ level: 0 });

/**
 * A problem pinned to a place in a source file. The message renders an
 * excerpt of the offending line with a caret underline:
 *
 *     Error: Unexpected character '@'
 *       --> main.az:3:7
 *       |
 *     3 | int a @ 4;
 *       |       ^
 *       |
 *       = This character is not part of the language
 */
export class AzulaError extends Error {
    public rawMessage: string;
    public loc: Loc;
    public file: string;
    public source?: string;
    public hint?: string;

    constructor(
        message: string,
        loc: Loc,
        file: string,
        source?: string,
        hint?: string,
        color = true,
    ) {
        const paint = color ? chalk : plain;
        const lines = source ? source.split("\n") : [];
        const lineContent = lines[loc.line - 1] ?? "";

        const lineNumStr = String(loc.line);
        const padding = " ".repeat(lineNumStr.length);

        const errorHeader = `${paint.red.bold("Error:")} ${paint.bold(message)}`;
        const locationLine = `${paint.blue(padding)} ${paint.blue("-->")} ${file}:${loc.line}:${loc.col}`;
        const pipeLine = `${paint.blue(padding)} ${paint.blue("|")}`;
        const codeLine = `${paint.blue(lineNumStr)} ${paint.blue("|")} ${lineContent}`;

        // An underline never runs past the end of the excerpted line
        const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
        const remaining = Math.max(1, lineContent.length - (loc.col - 1));
        const underlineLen = Math.min(Math.max(1, loc.length ?? 1), remaining);
        const pointer = paint.red.bold("^".repeat(underlineLen));
        const pointerLine = `${paint.blue(padding)} ${paint.blue("|")} ${pointerSpace}${pointer}`;

        const output = [
            errorHeader,
            locationLine,
            pipeLine,
            codeLine,
            pointerLine,
            pipeLine,
        ];

        if (hint) {
            output.push(`${paint.blue(padding)} ${paint.blue("=")} ${hint}`);
        }

        super(output.join("\n"));
        this.name = "AzulaError";
        this.rawMessage = message;
        this.loc = loc;
        this.file = file;
        this.source = source;
        this.hint = hint;
    }
}
