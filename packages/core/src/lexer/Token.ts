import { TokenKind } from "./TokenKind";

export interface Loc {
    line: number;
    col: number;
    length?: number;
}

/**
 * One lexical unit. Positions are 1-based and point at the token's first
 * character; `literal` is the exact source text (quotes included for
 * strings, empty for EOF).
 */
export class Token {
    public readonly kind: TokenKind;
    public readonly literal: string;
    public readonly file: string;
    public readonly line: number;
    public readonly col: number;

    constructor(
        kind: TokenKind,
        literal: string,
        file: string,
        line: number,
        col: number,
    ) {
        this.kind = kind;
        this.literal = literal;
        this.file = file;
        this.line = line;
        this.col = col;
        Object.freeze(this);
    }

    public get length(): number {
        return this.literal.length;
    }

    public get loc(): Loc {
        return { line: this.line, col: this.col, length: this.length };
    }

    public is(...kinds: TokenKind[]): boolean {
        return kinds.includes(this.kind);
    }

    public toString(): string {
        return `Token ${this.kind} (${this.literal}) in ${this.file} line ${this.line}, character ${this.col}`;
    }
}
