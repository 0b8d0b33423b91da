export { Lexer } from "@/lexer/lexer"
export { ByteCursor } from "@/lexer/cursor"
export { isPunctuation } from "@/lexer/token"
export type { Token, Punctuation, PunctuationToken, LiteralToken, StringToken, NumberToken } from "@/lexer/token"
