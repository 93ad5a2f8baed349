import { Scanner, Token, TokenType, isTriviaTokenType } from "./scanner";
import { Trivia, TriviaKind } from "./node";

/**
 * A non-trivia token, together with the trivia that belongs to it.
 * Trailing trivia is everything after the token on its own line, up to and including the end-of-line;
 * all other trivia before a token is that token's leading trivia.
 */
export interface TokenWithTrivia {
    readonly token: Token,
    readonly leadingTrivia: readonly Trivia[],
    readonly trailingTrivia: readonly Trivia[],
}

function triviaKindOf(type: TokenType) : TriviaKind {
    switch (type) {
        case TokenType.WHITESPACE: return TriviaKind.whitespace;
        case TokenType.END_OF_LINE: return TriviaKind.endOfLine;
        case TokenType.SINGLE_LINE_COMMENT: return TriviaKind.singleLineComment;
        case TokenType.MULTI_LINE_COMMENT: return TriviaKind.multiLineComment;
        case TokenType.DIRECTIVE: return TriviaKind.directive;
        default: throw "not a trivia token type";
    }
}

function triviaFromToken(token: Token) : Trivia {
    return {
        kind: triviaKindOf(token.type),
        text: token.text,
        range: token.range,
    }
}

/**
 * Runs the scanner to completion, producing the full token stream of a file.
 * The last element is always the EOF token, which collects any trailing trivia of the file as its leading trivia.
 */
export function Tokenizer(scanner: Scanner) {
    const tokens : TokenWithTrivia[] = [];
    let lookahead = scanner.nextToken();

    while (true) {
        const leadingTrivia : Trivia[] = [];
        while (isTriviaTokenType(lookahead.type)) {
            leadingTrivia.push(triviaFromToken(lookahead));
            lookahead = scanner.nextToken();
        }

        const token = lookahead;
        lookahead = scanner.nextToken();

        const trailingTrivia : Trivia[] = [];
        if (token.type !== TokenType.EOF) {
            while (isTriviaTokenType(lookahead.type) && lookahead.type !== TokenType.DIRECTIVE) {
                trailingTrivia.push(triviaFromToken(lookahead));
                const wasEndOfLine = lookahead.type === TokenType.END_OF_LINE;
                lookahead = scanner.nextToken();
                if (wasEndOfLine) {
                    break;
                }
            }
        }

        tokens.push({token, leadingTrivia, trailingTrivia});

        if (token.type === TokenType.EOF) {
            break;
        }
    }

    return {
        getTokens: () : readonly TokenWithTrivia[] => tokens,
        getSourceText: scanner.getSourceText,
    }
}

export type Tokenizer = ReturnType<typeof Tokenizer>;
