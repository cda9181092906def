import { Lexer } from "@azula/core";
import { AzulaConfig, OutputFormat } from "../config";
import { formatToken, formatTokensJson } from "../output";

export interface TokensOptions {
    format?: OutputFormat;
    color?: boolean;
}

/** Lines to print for `azula tokens`. Flags win over the config file. */
export function tokensReport(
    source: string,
    file: string,
    config: AzulaConfig,
    options: TokensOptions = {},
): string[] {
    const tokens = new Lexer(source, { file, keywords: config.keywords }).tokenize();
    const format = options.format ?? config.format;

    if (format === "json") {
        return [formatTokensJson(tokens)];
    }

    const color = options.color ?? config.color;
    return tokens.map((token) => formatToken(token, color));
}
