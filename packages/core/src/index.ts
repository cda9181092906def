export { Lexer, tokenize } from "./lexer/Lexer";
export type { LexerOptions } from "./lexer/Lexer";
export { Token } from "./lexer/Token";
export type { Loc } from "./lexer/Token";
export { TokenKind, parseTokenKind } from "./lexer/TokenKind";
export { categoryOf, isKeywordKind, isOperatorKind } from "./lexer/TokenCategory";
export type { TokenCategory } from "./lexer/TokenCategory";
export { KeywordTable, KeywordTableError, DEFAULT_KEYWORDS } from "./lexer/Keywords";
export { lexicalProblems, toError } from "./diagnostics/problems";
export type { LexicalProblem, LexicalProblemKind } from "./diagnostics/problems";
export { AzulaError } from "./utils/Error";
