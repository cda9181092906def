import { TokenKind } from "./TokenKind";

const IDENTIFIER_SHAPE = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Sentinels are produced by the lexer itself, never by a spelling
const RESERVED_KINDS: ReadonlySet<TokenKind> = new Set([
    TokenKind.Illegal,
    TokenKind.EndOfFile,
]);

export class KeywordTableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "KeywordTableError";
    }
}

/**
 * Read-only mapping from reserved spellings to token kinds. Matches are
 * exact and case-sensitive; anything else is left to the lexer to
 * classify as an identifier.
 */
export class KeywordTable {
    private readonly table: ReadonlyMap<string, TokenKind>;

    constructor(entries: Iterable<readonly [string, TokenKind]>) {
        const table = new Map<string, TokenKind>();

        for (const [word, kind] of entries) {
            if (!IDENTIFIER_SHAPE.test(word)) {
                throw new KeywordTableError(
                    `Keyword '${word}' is not a valid identifier spelling`,
                );
            }
            if (RESERVED_KINDS.has(kind)) {
                throw new KeywordTableError(
                    `Keyword '${word}' cannot map to the sentinel kind ${kind}`,
                );
            }
            const existing = table.get(word);
            if (existing !== undefined && existing !== kind) {
                throw new KeywordTableError(
                    `Keyword '${word}' maps to both ${existing} and ${kind}`,
                );
            }
            table.set(word, kind);
        }

        this.table = table;
    }

    public static from(entries: Record<string, TokenKind>): KeywordTable {
        return new KeywordTable(Object.entries(entries));
    }

    public resolve(candidate: string): TokenKind | undefined {
        return this.table.get(candidate);
    }

    public has(candidate: string): boolean {
        return this.table.has(candidate);
    }

    public get size(): number {
        return this.table.size;
    }

    public entries(): Array<[string, TokenKind]> {
        return [...this.table.entries()];
    }

    /** Returns a new table with `entries` added; later entries win. */
    public extend(entries: Record<string, TokenKind>): KeywordTable {
        return this.extendWith(Object.entries(entries));
    }

    /** Same as `extend`, from `[word, kind]` pairs. */
    public extendWith(entries: Iterable<readonly [string, TokenKind]>): KeywordTable {
        const merged = new Map(this.table);
        for (const [word, kind] of entries) {
            merged.set(word, kind);
        }
        return new KeywordTable(merged);
    }
}

export const DEFAULT_KEYWORDS = KeywordTable.from({
    // Type names
    int: TokenKind.Type,
    int32: TokenKind.Type,
    int64: TokenKind.Type,
    float: TokenKind.Type,
    float32: TokenKind.Type,
    float64: TokenKind.Type,
    bool: TokenKind.Type,
    string: TokenKind.Type,
    error: TokenKind.Type,
    void: TokenKind.Type,

    func: TokenKind.Function,
    return: TokenKind.Return,
    as: TokenKind.As,
    struct: TokenKind.Struct,

    true: TokenKind.True,
    false: TokenKind.False,
    or: TokenKind.Or,
    and: TokenKind.And,

    if: TokenKind.If,
    elseif: TokenKind.ElseIf,
    else: TokenKind.Else,

    switch: TokenKind.Switch,
    default: TokenKind.Default,

    for: TokenKind.For,
});
