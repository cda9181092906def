import { Token } from "../lexer/Token";
import { TokenKind } from "../lexer/TokenKind";
import { AzulaError } from "../utils/Error";

export type LexicalProblemKind = "unexpected-character" | "unterminated-string";

export interface LexicalProblem {
    kind: LexicalProblemKind;
    message: string;
    hint: string;
    token: Token;
}

function describeIllegal(token: Token): LexicalProblem {
    if (token.literal.startsWith('"')) {
        return {
            kind: "unterminated-string",
            message: "Unterminated string literal",
            hint: 'Close the string with a matching "',
            token,
        };
    }
    return {
        kind: "unexpected-character",
        message: `Unexpected character '${token.literal}'`,
        hint: "This character is not part of the language",
        token,
    };
}

/** One problem per Illegal token, in stream order. */
export function lexicalProblems(tokens: readonly Token[]): LexicalProblem[] {
    return tokens
        .filter((token) => token.kind === TokenKind.Illegal)
        .map(describeIllegal);
}

export function toError(
    problem: LexicalProblem,
    source?: string,
    color = true,
): AzulaError {
    return new AzulaError(
        problem.message,
        problem.token.loc,
        problem.token.file,
        source,
        problem.hint,
        color,
    );
}
