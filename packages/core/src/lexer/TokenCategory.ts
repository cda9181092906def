import { TokenKind } from "./TokenKind";

export type TokenCategory =
    | "sentinel"
    | "literal"
    | "keyword"
    | "punctuation"
    | "operator"
    | "delimiter";

function assertNever(value: never): never {
    throw new Error(`Unhandled token kind: ${String(value)}`);
}

// Every kind must be listed here; a new kind fails to compile until it is.
export function categoryOf(kind: TokenKind): TokenCategory {
    switch (kind) {
        case TokenKind.Illegal:
        case TokenKind.EndOfFile:
            return "sentinel";

        case TokenKind.Identifier:
        case TokenKind.String:
        case TokenKind.Number:
            return "literal";

        case TokenKind.Type:
        case TokenKind.Function:
        case TokenKind.Return:
        case TokenKind.As:
        case TokenKind.Struct:
        case TokenKind.True:
        case TokenKind.False:
        case TokenKind.If:
        case TokenKind.ElseIf:
        case TokenKind.Else:
        case TokenKind.Switch:
        case TokenKind.Default:
        case TokenKind.For:
            return "keyword";

        case TokenKind.Assign:
        case TokenKind.Colon:
        case TokenKind.Semicolon:
        case TokenKind.Comma:
            return "punctuation";

        case TokenKind.Plus:
        case TokenKind.Minus:
        case TokenKind.Asterisk:
        case TokenKind.Slash:
        case TokenKind.Modulo:
        case TokenKind.Eq:
        case TokenKind.NotEq:
        case TokenKind.Lt:
        case TokenKind.Gt:
        case TokenKind.LtEq:
        case TokenKind.GtEq:
        case TokenKind.Or:
        case TokenKind.And:
        case TokenKind.Not:
            return "operator";

        case TokenKind.LParen:
        case TokenKind.RParen:
        case TokenKind.LBrace:
        case TokenKind.RBrace:
        case TokenKind.LBracket:
        case TokenKind.RBracket:
            return "delimiter";

        default:
            return assertNever(kind);
    }
}

export function isKeywordKind(kind: TokenKind): boolean {
    return categoryOf(kind) === "keyword";
}

export function isOperatorKind(kind: TokenKind): boolean {
    return categoryOf(kind) === "operator";
}
