import chalk from "chalk";
import { Lexer, lexicalProblems, toError } from "@azula/core";
import { AzulaConfig } from "../config";

export interface CheckOptions {
    color?: boolean;
}

export interface CheckReport {
    lines: string[];
    failed: boolean;
}

/** Lines to print for `azula check`. Flags win over the config file. */
export function checkReport(
    source: string,
    file: string,
    config: AzulaConfig,
    options: CheckOptions = {},
): CheckReport {
    const tokens = new Lexer(source, { file, keywords: config.keywords }).tokenize();
    const problems = lexicalProblems(tokens);
    const color = options.color ?? config.color;

    if (problems.length === 0) {
        const ok = `${file}: no lexical problems.`;
        return { lines: [color ? chalk.green(ok) : ok], failed: false };
    }

    const lines = problems.map((problem) => toError(problem, source, color).message);
    const noun = problems.length === 1 ? "problem" : "problems";
    const summary = `\nFound ${problems.length} lexical ${noun} in ${file}.`;
    lines.push(color ? chalk.red(summary) : summary);
    return { lines, failed: true };
}
