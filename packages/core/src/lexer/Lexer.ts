import { Cursor, Mark } from "./Cursor";
import { DEFAULT_KEYWORDS, KeywordTable } from "./Keywords";
import { Token } from "./Token";
import { TokenKind } from "./TokenKind";

// Two-character spellings are tried before single ones (maximal munch).
const DOUBLE_SYMBOLS: Record<string, TokenKind> = {
    "==": TokenKind.Eq,
    "!=": TokenKind.NotEq,
    "<=": TokenKind.LtEq,
    ">=": TokenKind.GtEq,
    "&&": TokenKind.And,
    "||": TokenKind.Or,
};

const SINGLE_SYMBOLS: Record<string, TokenKind> = {
    "=": TokenKind.Assign,
    ":": TokenKind.Colon,
    ";": TokenKind.Semicolon,
    ",": TokenKind.Comma,
    "+": TokenKind.Plus,
    "-": TokenKind.Minus,
    "*": TokenKind.Asterisk,
    "/": TokenKind.Slash,
    "%": TokenKind.Modulo,
    "<": TokenKind.Lt,
    ">": TokenKind.Gt,
    "!": TokenKind.Not,
    "(": TokenKind.LParen,
    ")": TokenKind.RParen,
    "{": TokenKind.LBrace,
    "}": TokenKind.RBrace,
    "[": TokenKind.LBracket,
    "]": TokenKind.RBracket,
};

export interface LexerOptions {
    /** Name reported in every token; defaults to `<input>`. */
    file?: string;
    keywords?: KeywordTable;
}

export class Lexer {
    private readonly cursor: Cursor;
    private readonly file: string;
    private readonly keywords: KeywordTable;
    private eof: Token | null = null;

    constructor(input: string, options: LexerOptions = {}) {
        this.cursor = new Cursor(input);
        this.file = options.file ?? "<input>";
        this.keywords = options.keywords ?? DEFAULT_KEYWORDS;
    }

    public tokenize(): Token[] {
        const tokens: Token[] = [];
        let token: Token;
        do {
            token = this.nextToken();
            tokens.push(token);
        } while (token.kind !== TokenKind.EndOfFile);
        return tokens;
    }

    /**
     * Scans the next token. Once the end is reached the same EOF token is
     * returned on every further call.
     */
    public nextToken(): Token {
        if (this.eof) return this.eof;

        this.skipTrivia();

        const start = this.cursor.mark();
        if (this.cursor.isAtEnd()) {
            this.eof = this.createToken(TokenKind.EndOfFile, start);
            return this.eof;
        }

        const char = this.cursor.current();

        if (this.isAlpha(char)) return this.readIdentifier(start);
        if (this.isDigit(char)) return this.readNumber(start);
        if (char === '"') return this.readString(start);

        const pair = char + this.cursor.peek();
        const double = DOUBLE_SYMBOLS[pair];
        if (double) {
            this.cursor.advance();
            this.cursor.advance();
            return this.createToken(double, start);
        }

        const single = SINGLE_SYMBOLS[char];
        if (single) {
            this.cursor.advance();
            return this.createToken(single, start);
        }

        return this.readIllegal(start);
    }

    private createToken(kind: TokenKind, start: Mark): Token {
        return new Token(
            kind,
            this.cursor.sliceFrom(start),
            this.file,
            start.line,
            start.col,
        );
    }

    private skipTrivia() {
        while (!this.cursor.isAtEnd()) {
            const char = this.cursor.current();

            if (this.isWhitespace(char)) {
                this.cursor.advance();
                continue;
            }

            // Line comment, runs to (not including) the newline
            if (char === "/" && this.cursor.peek() === "/") {
                this.cursor.advanceWhile((c) => c !== "\n");
                continue;
            }

            break;
        }
    }

    private readIdentifier(start: Mark): Token {
        this.cursor.advanceWhile((c) => this.isAlphaNumeric(c));
        const word = this.cursor.sliceFrom(start);
        const kind = this.keywords.resolve(word) ?? TokenKind.Identifier;
        return this.createToken(kind, start);
    }

    private readNumber(start: Mark): Token {
        this.cursor.advanceWhile((c) => this.isDigit(c));

        if (this.cursor.current() === "." && this.isDigit(this.cursor.peek())) {
            this.cursor.advance(); // consume dot
            this.cursor.advanceWhile((c) => this.isDigit(c));
        }

        return this.createToken(TokenKind.Number, start);
    }

    // Strings keep their quotes in the literal. A string still open at the
    // end of input becomes one Illegal token covering the partial run.
    private readString(start: Mark): Token {
        this.cursor.advance(); // opening quote

        while (!this.cursor.isAtEnd()) {
            const char = this.cursor.advance();
            if (char === "\\") {
                this.cursor.advance();
                continue;
            }
            if (char === '"') {
                return this.createToken(TokenKind.String, start);
            }
        }

        return this.createToken(TokenKind.Illegal, start);
    }

    private readIllegal(start: Mark): Token {
        const high = this.cursor.advance();
        // Keep surrogate pairs together so the literal is a whole character
        if (this.isHighSurrogate(high) && this.isLowSurrogate(this.cursor.current())) {
            this.cursor.advance();
        }
        return this.createToken(TokenKind.Illegal, start);
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /^[a-zA-Z_]$/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /^[a-zA-Z0-9_]$/.test(char);
    }

    private isDigit(char: string): boolean {
        return /^[0-9]$/.test(char);
    }

    private isHighSurrogate(char: string): boolean {
        const code = char.charCodeAt(0);
        return code >= 0xd800 && code <= 0xdbff;
    }

    private isLowSurrogate(char: string): boolean {
        const code = char.charCodeAt(0);
        return code >= 0xdc00 && code <= 0xdfff;
    }
}

export function tokenize(input: string, options: LexerOptions = {}): Token[] {
    return new Lexer(input, options).tokenize();
}
