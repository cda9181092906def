import { Lexer, tokenize } from "../src/lexer/Lexer";
import { DEFAULT_KEYWORDS } from "../src/lexer/Keywords";
import { Token } from "../src/lexer/Token";
import { TokenKind } from "../src/lexer/TokenKind";

function kinds(tokens: Token[]): TokenKind[] {
    return tokens.map((t) => t.kind);
}

// Offset of a 1-based line/col pair in `source`
function offsetOf(source: string, line: number, col: number): number {
    let offset = 0;
    for (let l = 1; l < line; l++) {
        offset = source.indexOf("\n", offset) + 1;
    }
    return offset + col - 1;
}

describe("Lexer", () => {
    test("tokenize a simple conditional", () => {
        const tokens = new Lexer("if x == 10 { return true; }", {
            file: "t.az",
        }).tokenize();

        expect(kinds(tokens)).toEqual([
            TokenKind.If,
            TokenKind.Identifier,
            TokenKind.Eq,
            TokenKind.Number,
            TokenKind.LBrace,
            TokenKind.Return,
            TokenKind.True,
            TokenKind.Semicolon,
            TokenKind.RBrace,
            TokenKind.EndOfFile,
        ]);

        expect(tokens[0].literal).toBe("if");
        expect(tokens[0].line).toBe(1);
        expect(tokens[0].col).toBe(1);
        expect(tokens[2].literal).toBe("==");
        expect(tokens[2].col).toBe(6);
        expect(tokens[3].literal).toBe("10");
        expect(tokens[0].file).toBe("t.az");
    });

    test("empty input yields a single EOF", () => {
        const tokens = tokenize("");
        expect(tokens).toHaveLength(1);
        expect(tokens[0].kind).toBe(TokenKind.EndOfFile);
        expect(tokens[0].literal).toBe("");
        expect(tokens[0].line).toBe(1);
        expect(tokens[0].col).toBe(1);
    });

    test("EOF sits just after the last character", () => {
        const tokens = tokenize("if x == 10 { return true; }");
        const eof = tokens[tokens.length - 1];
        expect(eof.line).toBe(1);
        expect(eof.col).toBe(28);
    });

    test("EOF after a trailing newline starts the next line", () => {
        const tokens = tokenize("x\n");
        expect(kinds(tokens)).toEqual([TokenKind.Identifier, TokenKind.EndOfFile]);
        expect(tokens[1].line).toBe(2);
        expect(tokens[1].col).toBe(1);
    });

    test("a leading byte order mark takes no column", () => {
        const tokens = tokenize("\uFEFFint x");
        expect(tokens.map((t) => [t.literal, t.line, t.col])).toEqual([
            ["int", 1, 1],
            ["x", 1, 5],
            ["", 1, 6],
        ]);
    });

    test("a byte order mark alone is empty input", () => {
        const tokens = tokenize("\uFEFF");
        expect(tokens).toHaveLength(1);
        expect(tokens[0].kind).toBe(TokenKind.EndOfFile);
        expect(tokens[0].col).toBe(1);
    });

    test("default file name", () => {
        expect(tokenize("x")[0].file).toBe("<input>");
    });

    test("unsupported character becomes Illegal and scanning goes on", () => {
        const tokens = tokenize("@");
        expect(kinds(tokens)).toEqual([TokenKind.Illegal, TokenKind.EndOfFile]);
        expect(tokens[0].literal).toBe("@");
        expect(tokens[1].col).toBe(2);

        const mixed = tokenize("a @ b # c");
        expect(kinds(mixed)).toEqual([
            TokenKind.Identifier,
            TokenKind.Illegal,
            TokenKind.Identifier,
            TokenKind.Illegal,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
        expect(mixed[3].literal).toBe("#");
        expect(mixed[3].col).toBe(7);
    });

    test("characters outside the BMP stay one Illegal token", () => {
        const tokens = tokenize("😀");
        expect(kinds(tokens)).toEqual([TokenKind.Illegal, TokenKind.EndOfFile]);
        expect(tokens[0].literal).toBe("😀");
        expect(tokens[1].col).toBe(3);
    });

    test("keywords are case sensitive", () => {
        const tokens = tokenize("IF");
        expect(kinds(tokens)).toEqual([TokenKind.Identifier, TokenKind.EndOfFile]);
        expect(tokens[0].literal).toBe("IF");
    });

    test("every keyword scans to its kind", () => {
        for (const [word, kind] of DEFAULT_KEYWORDS.entries()) {
            const [token] = tokenize(word);
            expect(token.kind).toBe(kind);
            expect(token.literal).toBe(word);
        }
    });

    test("identifiers that start with a keyword stay identifiers", () => {
        const tokens = tokenize("iffy _for return2");
        expect(kinds(tokens)).toEqual([
            TokenKind.Identifier,
            TokenKind.Identifier,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
    });

    test.each([
        ["=", TokenKind.Assign],
        [":", TokenKind.Colon],
        [";", TokenKind.Semicolon],
        [",", TokenKind.Comma],
        ["+", TokenKind.Plus],
        ["-", TokenKind.Minus],
        ["*", TokenKind.Asterisk],
        ["/", TokenKind.Slash],
        ["%", TokenKind.Modulo],
        ["<", TokenKind.Lt],
        [">", TokenKind.Gt],
        ["!", TokenKind.Not],
        ["(", TokenKind.LParen],
        [")", TokenKind.RParen],
        ["{", TokenKind.LBrace],
        ["}", TokenKind.RBrace],
        ["[", TokenKind.LBracket],
        ["]", TokenKind.RBracket],
        ["==", TokenKind.Eq],
        ["!=", TokenKind.NotEq],
        ["<=", TokenKind.LtEq],
        [">=", TokenKind.GtEq],
        ["&&", TokenKind.And],
        ["||", TokenKind.Or],
    ])("symbol %s", (symbol, kind) => {
        const tokens = tokenize(symbol);
        expect(kinds(tokens)).toEqual([kind, TokenKind.EndOfFile]);
        expect(tokens[0].literal).toBe(symbol);
    });

    test("longest operator wins", () => {
        expect(kinds(tokenize("a<=b"))).toEqual([
            TokenKind.Identifier,
            TokenKind.LtEq,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
        expect(kinds(tokenize("<=="))).toEqual([
            TokenKind.LtEq,
            TokenKind.Assign,
            TokenKind.EndOfFile,
        ]);
        expect(kinds(tokenize("!=="))).toEqual([
            TokenKind.NotEq,
            TokenKind.Assign,
            TokenKind.EndOfFile,
        ]);
        expect(kinds(tokenize("= ="))).toEqual([
            TokenKind.Assign,
            TokenKind.Assign,
            TokenKind.EndOfFile,
        ]);
    });

    test("logical operators as words and symbols", () => {
        expect(kinds(tokenize("a && b || c and d or e"))).toEqual([
            TokenKind.Identifier,
            TokenKind.And,
            TokenKind.Identifier,
            TokenKind.Or,
            TokenKind.Identifier,
            TokenKind.And,
            TokenKind.Identifier,
            TokenKind.Or,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
    });

    test("lone ampersand and pipe are Illegal", () => {
        const tokens = tokenize("& |");
        expect(kinds(tokens)).toEqual([
            TokenKind.Illegal,
            TokenKind.Illegal,
            TokenKind.EndOfFile,
        ]);
        expect(tokens[0].literal).toBe("&");
        expect(tokens[1].literal).toBe("|");
    });

    test("track lines and columns across newlines and tabs", () => {
        const tokens = tokenize("func main() {\n\treturn 1;\n}");
        const positions = tokens.map((t) => [t.literal, t.line, t.col]);
        expect(positions).toEqual([
            ["func", 1, 1],
            ["main", 1, 6],
            ["(", 1, 10],
            [")", 1, 11],
            ["{", 1, 13],
            ["return", 2, 2],
            ["1", 2, 9],
            [";", 2, 10],
            ["}", 3, 1],
            ["", 3, 2],
        ]);
    });

    test("numbers", () => {
        const tokens = tokenize("3.14 42");
        expect(kinds(tokens)).toEqual([
            TokenKind.Number,
            TokenKind.Number,
            TokenKind.EndOfFile,
        ]);
        expect(tokens[0].literal).toBe("3.14");
        expect(tokens[1].literal).toBe("42");
    });

    test("a dot without digits after it ends the number", () => {
        const tokens = tokenize("3.");
        expect(kinds(tokens)).toEqual([
            TokenKind.Number,
            TokenKind.Illegal,
            TokenKind.EndOfFile,
        ]);
        expect(tokens[0].literal).toBe("3");
        expect(tokens[1].literal).toBe(".");
        expect(tokens[1].col).toBe(2);
    });

    test("digits followed by letters split into number and identifier", () => {
        const tokens = tokenize("12abc");
        expect(kinds(tokens)).toEqual([
            TokenKind.Number,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
        expect(tokens[1].literal).toBe("abc");
        expect(tokens[1].col).toBe(3);
    });

    test("strings keep their quotes", () => {
        const tokens = tokenize('"hi there"');
        expect(kinds(tokens)).toEqual([TokenKind.String, TokenKind.EndOfFile]);
        expect(tokens[0].literal).toBe('"hi there"');
        expect(tokens[1].col).toBe(11);
    });

    test("escaped quote does not close a string", () => {
        const tokens = tokenize('"a\\"b"');
        expect(kinds(tokens)).toEqual([TokenKind.String, TokenKind.EndOfFile]);
        expect(tokens[0].literal).toBe('"a\\"b"');
        expect(tokens[1].col).toBe(7);
    });

    test("strings may span lines", () => {
        const tokens = tokenize('"a\nb" c');
        expect(kinds(tokens)).toEqual([
            TokenKind.String,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
        expect(tokens[0].literal).toBe('"a\nb"');
        expect(tokens[1].line).toBe(2);
        expect(tokens[1].col).toBe(4);
    });

    test("unterminated string becomes one Illegal token", () => {
        const tokens = tokenize('x = "abc');
        expect(kinds(tokens)).toEqual([
            TokenKind.Identifier,
            TokenKind.Assign,
            TokenKind.Illegal,
            TokenKind.EndOfFile,
        ]);
        expect(tokens[2].literal).toBe('"abc');
        expect(tokens[2].col).toBe(5);
        expect(tokens[3].col).toBe(9);
    });

    test("line comments are skipped", () => {
        const tokens = tokenize("a // comment\nb");
        expect(tokens.map((t) => [t.literal, t.line, t.col])).toEqual([
            ["a", 1, 1],
            ["b", 2, 1],
            ["", 2, 2],
        ]);

        const onlyComment = tokenize("// only");
        expect(kinds(onlyComment)).toEqual([TokenKind.EndOfFile]);
        expect(onlyComment[0].col).toBe(8);
    });

    test("single slash is division", () => {
        expect(kinds(tokenize("a / b"))).toEqual([
            TokenKind.Identifier,
            TokenKind.Slash,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
    });

    test("nextToken keeps returning the same EOF", () => {
        const lexer = new Lexer("x");
        expect(lexer.nextToken().kind).toBe(TokenKind.Identifier);
        const eof = lexer.nextToken();
        expect(eof.kind).toBe(TokenKind.EndOfFile);
        expect(lexer.nextToken()).toBe(eof);
        expect(lexer.tokenize()).toEqual([eof]);
    });

    test("tokenize continues from where nextToken stopped", () => {
        const lexer = new Lexer("a b c");
        expect(lexer.nextToken().literal).toBe("a");
        expect(lexer.tokenize().map((t) => t.literal)).toEqual(["b", "c", ""]);
    });

    test("custom keyword table", () => {
        const keywords = DEFAULT_KEYWORDS.extend({ let: TokenKind.Type });
        const tokens = new Lexer("let x", { keywords }).tokenize();
        expect(kinds(tokens)).toEqual([
            TokenKind.Type,
            TokenKind.Identifier,
            TokenKind.EndOfFile,
        ]);
        expect(kinds(tokenize("let"))[0]).toBe(TokenKind.Identifier);
    });

    test("literals match the source at their reported positions", () => {
        const source = [
            "func add(int a, int b): int {",
            "    // sum",
            '    return a + b; "done" 2.5 >= !x',
            "}",
            "",
        ].join("\n");
        const tokens = tokenize(source);

        for (const token of tokens) {
            if (token.kind === TokenKind.EndOfFile) continue;
            const start = offsetOf(source, token.line, token.col);
            expect(source.slice(start, start + token.length)).toBe(token.literal);
        }
        expect(tokens.filter((t) => t.kind === TokenKind.EndOfFile)).toHaveLength(1);
        expect(tokens.some((t) => t.kind === TokenKind.Illegal)).toBe(false);
    });
});
