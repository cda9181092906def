export enum TokenKind {
    // Sentinels
    Illegal = "ILLEGAL",
    EndOfFile = "EOF",

    // Literals & names
    Type = "TYPE", // int, string, ...
    Identifier = "IDENTIFIER",
    String = "STRING", // "text"
    Number = "NUMBER", // 12, 12.5

    // Declarations
    Function = "FUNCTION", // func
    Return = "RETURN", // return
    As = "AS", // as
    Struct = "STRUCT", // struct
    True = "TRUE", // true
    False = "FALSE", // false

    // Punctuation
    Assign = "ASSIGN", // =
    Colon = "COLON", // :
    Semicolon = "SEMICOLON", // ;
    Comma = "COMMA", // ,

    // Operators
    Plus = "PLUS", // +
    Minus = "MINUS", // -
    Asterisk = "ASTERISK", // *
    Slash = "SLASH", // /
    Modulo = "MODULO", // %
    Eq = "EQ", // ==
    NotEq = "NOT_EQ", // !=
    Lt = "LT", // <
    Gt = "GT", // >
    LtEq = "LT_EQ", // <=
    GtEq = "GT_EQ", // >=
    Or = "OR", // or, ||
    And = "AND", // and, &&
    Not = "NOT", // !

    // Control flow
    If = "IF",
    ElseIf = "ELSEIF",
    Else = "ELSE",
    Switch = "SWITCH",
    Default = "DEFAULT",
    For = "FOR",

    // Delimiters
    LParen = "LBRACKET", // (
    RParen = "RBRACKET", // )
    LBrace = "LBRACE", // {
    RBrace = "RBRACE", // }
    LBracket = "LSQUARE", // [
    RBracket = "RSQUARE", // ]
}

const KIND_NAMES: ReadonlyMap<string, TokenKind> = new Map(Object.entries(TokenKind));

/**
 * Looks a kind up by its member name (`"LtEq"`) or its diagnostic
 * spelling (`"LT_EQ"`). Used where kinds arrive as text, e.g. config files.
 */
export function parseTokenKind(name: string): TokenKind | undefined {
    const byName = KIND_NAMES.get(name);
    if (byName) return byName;
    for (const kind of KIND_NAMES.values()) {
        if (kind === name) return kind;
    }
    return undefined;
}
