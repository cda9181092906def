export interface Mark {
    position: number;
    line: number;
    col: number;
}

/**
 * Position over the source text. `advance` is the only way line and
 * column change: `\n` moves to the next line at column 1, any other code
 * unit moves one column right. A leading byte order mark is skipped
 * without taking a column.
 */
export class Cursor {
    private readonly input: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;

    constructor(input: string) {
        this.input = input;
        if (input.startsWith("\uFEFF")) this.position = 1;
    }

    public isAtEnd(): boolean {
        return this.position >= this.input.length;
    }

    public current(): string {
        return this.peek(0);
    }

    public peek(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    public advance(): string {
        const char = this.current();
        if (char === "") return char;

        if (char === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
        return char;
    }

    /** Advances while `predicate` holds for the current character. */
    public advanceWhile(predicate: (char: string) => boolean): void {
        while (!this.isAtEnd() && predicate(this.current())) {
            this.advance();
        }
    }

    public mark(): Mark {
        return { position: this.position, line: this.line, col: this.col };
    }

    /** Source text from `start` up to the current position. */
    public sliceFrom(start: Mark): string {
        return this.input.slice(start.position, this.position);
    }
}
