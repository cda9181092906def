import chalk from "chalk";
import { Token, TokenCategory, TokenKind, categoryOf } from "@azula/core";

type Paint = (text: string) => string;

const CATEGORY_COLORS: Record<TokenCategory, Paint> = {
    sentinel: chalk.gray,
    literal: chalk.green,
    keyword: chalk.magenta,
    punctuation: chalk.white,
    operator: chalk.yellow,
    delimiter: chalk.cyan,
};

export function formatToken(token: Token, color: boolean): string {
    const text = token.toString();
    if (!color) return text;
    if (token.kind === TokenKind.Illegal) return chalk.red.bold(text);
    return CATEGORY_COLORS[categoryOf(token.kind)](text);
}

export function formatTokensJson(tokens: readonly Token[]): string {
    return JSON.stringify(
        tokens.map((token) => ({
            kind: token.kind,
            literal: token.literal,
            file: token.file,
            line: token.line,
            col: token.col,
        })),
        null,
        2,
    );
}
