export const enum TokenType {
    NIL,
    CHAR, // any single char that we didn't otherwise handle
    EOF,

    // trivia
    WHITESPACE,
    END_OF_LINE,
    SINGLE_LINE_COMMENT,
    MULTI_LINE_COMMENT,
    DIRECTIVE,

    IDENTIFIER,
    NUMERIC_LITERAL,
    STRING_LITERAL,
    INTERPOLATED_STRING_LITERAL,
    CHAR_LITERAL,

    AMPERSAND,
    AMPERSAND_EQUAL,
    CARET,
    CARET_EQUAL,
    COLON,
    COMMA,
    DBL_AMPERSAND,
    DBL_COLON,
    DBL_EQUAL,
    DBL_LEFT_ANGLE,
    DBL_LEFT_ANGLE_EQUAL,
    DBL_MINUS,
    DBL_PIPE,
    DBL_PLUS,
    DBL_QUESTION_MARK,
    DBL_QUESTION_MARK_EQUAL,
    DBL_RIGHT_ANGLE,        // only produced by the parser, gluing adjacent `>` tokens
    DBL_RIGHT_ANGLE_EQUAL,  // ditto, `>` followed by `>=`
    DOT,
    EQUAL,
    EQUAL_RIGHT_ANGLE,
    EXCLAMATION,
    EXCLAMATION_EQUAL,
    FORWARD_SLASH,
    FORWARD_SLASH_EQUAL,
    LEFT_ANGLE,
    LEFT_ANGLE_EQUAL,
    LEFT_BRACE,
    LEFT_BRACKET,
    LEFT_PAREN,
    MINUS,
    MINUS_EQUAL,
    PERCENT,
    PERCENT_EQUAL,
    PIPE,
    PIPE_EQUAL,
    PLUS,
    PLUS_EQUAL,
    QUESTION_MARK,
    QUESTION_MARK_DOT,
    RIGHT_ANGLE,
    RIGHT_ANGLE_EQUAL,
    RIGHT_BRACE,
    RIGHT_BRACKET,
    RIGHT_PAREN,
    SEMICOLON,
    STAR,
    STAR_EQUAL,
    TILDE,

    _FIRST_KW,
    KW_ABSTRACT,
    KW_AS,
    KW_BASE,
    KW_BOOL,
    KW_BREAK,
    KW_BYTE,
    KW_CASE,
    KW_CATCH,
    KW_CHAR,
    KW_CLASS,
    KW_CONST,
    KW_CONTINUE,
    KW_DECIMAL,
    KW_DEFAULT,
    KW_DO,
    KW_DOUBLE,
    KW_ELSE,
    KW_FALSE,
    KW_FINALLY,
    KW_FLOAT,
    KW_FOR,
    KW_FOREACH,
    KW_GOTO,
    KW_IF,
    KW_IN,
    KW_INT,
    KW_INTERFACE,
    KW_INTERNAL,
    KW_IS,
    KW_LONG,
    KW_NAMESPACE,
    KW_NEW,
    KW_NULL,
    KW_OBJECT,
    KW_OUT,
    KW_OVERRIDE,
    KW_PARAMS,
    KW_PRIVATE,
    KW_PROTECTED,
    KW_PUBLIC,
    KW_READONLY,
    KW_REF,
    KW_RETURN,
    KW_SBYTE,
    KW_SEALED,
    KW_SHORT,
    KW_STATIC,
    KW_STRING,
    KW_STRUCT,
    KW_SWITCH,
    KW_THIS,
    KW_THROW,
    KW_TRUE,
    KW_TRY,
    KW_TYPEOF,
    KW_UINT,
    KW_ULONG,
    KW_USHORT,
    KW_USING,
    KW_VIRTUAL,
    KW_VOID,
    KW_WHILE,
    _LAST_KW,
}

export const TokenTypeUiString : Record<TokenType, string> = {
    [TokenType.NIL]:                      "nil",
    [TokenType.CHAR]:                     "char",
    [TokenType.EOF]:                      "eof",

    [TokenType.WHITESPACE]:               "<whitespace>",
    [TokenType.END_OF_LINE]:              "<end-of-line>",
    [TokenType.SINGLE_LINE_COMMENT]:      "<comment>",
    [TokenType.MULTI_LINE_COMMENT]:       "<multiline-comment>",
    [TokenType.DIRECTIVE]:                "<directive>",

    [TokenType.IDENTIFIER]:               "<identifier>",
    [TokenType.NUMERIC_LITERAL]:          "<number>",
    [TokenType.STRING_LITERAL]:           "<string>",
    [TokenType.INTERPOLATED_STRING_LITERAL]: "<interpolated-string>",
    [TokenType.CHAR_LITERAL]:             "<char>",

    [TokenType.AMPERSAND]:                "&",
    [TokenType.AMPERSAND_EQUAL]:          "&=",
    [TokenType.CARET]:                    "^",
    [TokenType.CARET_EQUAL]:              "^=",
    [TokenType.COLON]:                    ":",
    [TokenType.COMMA]:                    ",",
    [TokenType.DBL_AMPERSAND]:            "&&",
    [TokenType.DBL_COLON]:                "::",
    [TokenType.DBL_EQUAL]:                "==",
    [TokenType.DBL_LEFT_ANGLE]:           "<<",
    [TokenType.DBL_LEFT_ANGLE_EQUAL]:     "<<=",
    [TokenType.DBL_MINUS]:                "--",
    [TokenType.DBL_PIPE]:                 "||",
    [TokenType.DBL_PLUS]:                 "++",
    [TokenType.DBL_QUESTION_MARK]:        "??",
    [TokenType.DBL_QUESTION_MARK_EQUAL]:  "??=",
    [TokenType.DBL_RIGHT_ANGLE]:          ">>",
    [TokenType.DBL_RIGHT_ANGLE_EQUAL]:    ">>=",
    [TokenType.DOT]:                      ".",
    [TokenType.EQUAL]:                    "=",
    [TokenType.EQUAL_RIGHT_ANGLE]:        "=>",
    [TokenType.EXCLAMATION]:              "!",
    [TokenType.EXCLAMATION_EQUAL]:        "!=",
    [TokenType.FORWARD_SLASH]:            "/",
    [TokenType.FORWARD_SLASH_EQUAL]:      "/=",
    [TokenType.LEFT_ANGLE]:               "<",
    [TokenType.LEFT_ANGLE_EQUAL]:         "<=",
    [TokenType.LEFT_BRACE]:               "{",
    [TokenType.LEFT_BRACKET]:             "[",
    [TokenType.LEFT_PAREN]:               "(",
    [TokenType.MINUS]:                    "-",
    [TokenType.MINUS_EQUAL]:              "-=",
    [TokenType.PERCENT]:                  "%",
    [TokenType.PERCENT_EQUAL]:            "%=",
    [TokenType.PIPE]:                     "|",
    [TokenType.PIPE_EQUAL]:               "|=",
    [TokenType.PLUS]:                     "+",
    [TokenType.PLUS_EQUAL]:               "+=",
    [TokenType.QUESTION_MARK]:            "?",
    [TokenType.QUESTION_MARK_DOT]:        "?.",
    [TokenType.RIGHT_ANGLE]:              ">",
    [TokenType.RIGHT_ANGLE_EQUAL]:        ">=",
    [TokenType.RIGHT_BRACE]:              "}",
    [TokenType.RIGHT_BRACKET]:            "]",
    [TokenType.RIGHT_PAREN]:              ")",
    [TokenType.SEMICOLON]:                ";",
    [TokenType.STAR]:                     "*",
    [TokenType.STAR_EQUAL]:               "*=",
    [TokenType.TILDE]:                    "~",

    [TokenType._FIRST_KW]:                "<<first-kw>>",
    [TokenType.KW_ABSTRACT]:              "abstract",
    [TokenType.KW_AS]:                    "as",
    [TokenType.KW_BASE]:                  "base",
    [TokenType.KW_BOOL]:                  "bool",
    [TokenType.KW_BREAK]:                 "break",
    [TokenType.KW_BYTE]:                  "byte",
    [TokenType.KW_CASE]:                  "case",
    [TokenType.KW_CATCH]:                 "catch",
    [TokenType.KW_CHAR]:                  "char",
    [TokenType.KW_CLASS]:                 "class",
    [TokenType.KW_CONST]:                 "const",
    [TokenType.KW_CONTINUE]:              "continue",
    [TokenType.KW_DECIMAL]:               "decimal",
    [TokenType.KW_DEFAULT]:               "default",
    [TokenType.KW_DO]:                    "do",
    [TokenType.KW_DOUBLE]:                "double",
    [TokenType.KW_ELSE]:                  "else",
    [TokenType.KW_FALSE]:                 "false",
    [TokenType.KW_FINALLY]:               "finally",
    [TokenType.KW_FLOAT]:                 "float",
    [TokenType.KW_FOR]:                   "for",
    [TokenType.KW_FOREACH]:               "foreach",
    [TokenType.KW_GOTO]:                  "goto",
    [TokenType.KW_IF]:                    "if",
    [TokenType.KW_IN]:                    "in",
    [TokenType.KW_INT]:                   "int",
    [TokenType.KW_INTERFACE]:             "interface",
    [TokenType.KW_INTERNAL]:              "internal",
    [TokenType.KW_IS]:                    "is",
    [TokenType.KW_LONG]:                  "long",
    [TokenType.KW_NAMESPACE]:             "namespace",
    [TokenType.KW_NEW]:                   "new",
    [TokenType.KW_NULL]:                  "null",
    [TokenType.KW_OBJECT]:                "object",
    [TokenType.KW_OUT]:                   "out",
    [TokenType.KW_OVERRIDE]:              "override",
    [TokenType.KW_PARAMS]:                "params",
    [TokenType.KW_PRIVATE]:               "private",
    [TokenType.KW_PROTECTED]:             "protected",
    [TokenType.KW_PUBLIC]:                "public",
    [TokenType.KW_READONLY]:              "readonly",
    [TokenType.KW_REF]:                   "ref",
    [TokenType.KW_RETURN]:                "return",
    [TokenType.KW_SBYTE]:                 "sbyte",
    [TokenType.KW_SEALED]:                "sealed",
    [TokenType.KW_SHORT]:                 "short",
    [TokenType.KW_STATIC]:                "static",
    [TokenType.KW_STRING]:                "string",
    [TokenType.KW_STRUCT]:                "struct",
    [TokenType.KW_SWITCH]:                "switch",
    [TokenType.KW_THIS]:                  "this",
    [TokenType.KW_THROW]:                 "throw",
    [TokenType.KW_TRUE]:                  "true",
    [TokenType.KW_TRY]:                   "try",
    [TokenType.KW_TYPEOF]:                "typeof",
    [TokenType.KW_UINT]:                  "uint",
    [TokenType.KW_ULONG]:                 "ulong",
    [TokenType.KW_USHORT]:                "ushort",
    [TokenType.KW_USING]:                 "using",
    [TokenType.KW_VIRTUAL]:               "virtual",
    [TokenType.KW_VOID]:                  "void",
    [TokenType.KW_WHILE]:                 "while",
    [TokenType._LAST_KW]:                 "<<last-kw>>",
};

const keywordByText = (function() {
    const result = new Map<string, TokenType>();
    for (const [type, text] of Object.entries(TokenTypeUiString)) {
        const tokenType : TokenType = Number(type);
        if (isKeywordTokenType(tokenType)) {
            result.set(text, tokenType);
        }
    }
    return result;
})();

// longest first, so that `??=` wins over `??` wins over `?`
const punctuators : [string, TokenType][] = [
    ["??=", TokenType.DBL_QUESTION_MARK_EQUAL],
    ["<<=", TokenType.DBL_LEFT_ANGLE_EQUAL],
    ["&&", TokenType.DBL_AMPERSAND],
    ["&=", TokenType.AMPERSAND_EQUAL],
    ["^=", TokenType.CARET_EQUAL],
    ["::", TokenType.DBL_COLON],
    ["==", TokenType.DBL_EQUAL],
    ["<<", TokenType.DBL_LEFT_ANGLE],
    ["--", TokenType.DBL_MINUS],
    ["||", TokenType.DBL_PIPE],
    ["++", TokenType.DBL_PLUS],
    ["??", TokenType.DBL_QUESTION_MARK],
    ["=>", TokenType.EQUAL_RIGHT_ANGLE],
    ["!=", TokenType.EXCLAMATION_EQUAL],
    ["/=", TokenType.FORWARD_SLASH_EQUAL],
    ["<=", TokenType.LEFT_ANGLE_EQUAL],
    ["-=", TokenType.MINUS_EQUAL],
    ["%=", TokenType.PERCENT_EQUAL],
    ["|=", TokenType.PIPE_EQUAL],
    ["+=", TokenType.PLUS_EQUAL],
    ["?.", TokenType.QUESTION_MARK_DOT],
    [">=", TokenType.RIGHT_ANGLE_EQUAL],
    ["*=", TokenType.STAR_EQUAL],
    ["&", TokenType.AMPERSAND],
    ["^", TokenType.CARET],
    [":", TokenType.COLON],
    [",", TokenType.COMMA],
    [".", TokenType.DOT],
    ["=", TokenType.EQUAL],
    ["!", TokenType.EXCLAMATION],
    ["/", TokenType.FORWARD_SLASH],
    ["<", TokenType.LEFT_ANGLE],
    ["{", TokenType.LEFT_BRACE],
    ["[", TokenType.LEFT_BRACKET],
    ["(", TokenType.LEFT_PAREN],
    ["-", TokenType.MINUS],
    ["%", TokenType.PERCENT],
    ["|", TokenType.PIPE],
    ["+", TokenType.PLUS],
    ["?", TokenType.QUESTION_MARK],
    // note there is no `>>`; the parser glues adjacent `>` tokens, since `List<List<int>>` closes two type argument lists
    [">", TokenType.RIGHT_ANGLE],
    ["}", TokenType.RIGHT_BRACE],
    ["]", TokenType.RIGHT_BRACKET],
    [")", TokenType.RIGHT_PAREN],
    [";", TokenType.SEMICOLON],
    ["*", TokenType.STAR],
    ["~", TokenType.TILDE],
];

export class SourceRange {
    fromInclusive: number;
    toExclusive: number;

    constructor(fromInclusive: number, toExclusive: number) {
        this.fromInclusive = fromInclusive;
        this.toExclusive = toExclusive;
    }

    static Nil() {
        return new SourceRange(-1, -1);
    }

    isNil() {
        return this.fromInclusive == -1 && this.toExclusive == -1;
    }

    size() {
        return this.toExclusive - this.fromInclusive;
    }

    includes(index: number) : boolean {
        return this.fromInclusive <= index && index < this.toExclusive
    }
}

export function isTriviaTokenType(type: TokenType) : boolean {
    return type === TokenType.WHITESPACE
        || type === TokenType.END_OF_LINE
        || type === TokenType.SINGLE_LINE_COMMENT
        || type === TokenType.MULTI_LINE_COMMENT
        || type === TokenType.DIRECTIVE;
}

export function isKeywordTokenType(type: TokenType) : boolean {
    return TokenType._FIRST_KW < type && type < TokenType._LAST_KW;
}

/**
 * Produces raw tokens, trivia included, one at a time. Grouping trivia onto tokens is the tokenizer's job.
 */
export function Scanner(source_: string | Buffer) {
    let sourceText : string;
    if (typeof source_ === "string") {
        // a leading BOM is dropped, so it never ends up as the leading trivia of the first token
        sourceText = source_.charCodeAt(0) === 0xFEFF ? source_.slice(1) : source_;
    }
    else {
        const hadBom = source_.length >= 3 && source_[0] === 0xEF && source_[1] === 0xBB && source_[2] === 0xBF;
        sourceText = source_.subarray(hadBom ? 3 : 0).toString("utf-8");
    }

    let index = 0;
    let lastScannedText = "";

    const end = sourceText.length;

    return {
        getIndex,
        restoreIndex,
        hasNext,
        peekChar,
        nextToken,
        getTextSlice,
        getSourceText: () => sourceText,
    }

    function getIndex() {
        return index;
    }

    function restoreIndex(restoreIndex: number) {
        index = restoreIndex;
    }

    function hasNext(jump: number = 0) : boolean {
        return index + jump < end;
    }

    function peekChar(jump: number = 0) : string {
        return hasNext(jump) ? sourceText[index + jump] : "";
    }

    function nextToken() : Token {
        if (!hasNext()) {
            return makeToken(TokenType.EOF, index, index, "");
        }

        const from = index;

        if (maybeEat(/[ \t\f\v\u00A0\uFEFF]+/y)) return makeToken(TokenType.WHITESPACE, from, index);
        if (maybeEat(/\r\n|\n|\r|\u2028|\u2029/y)) return makeToken(TokenType.END_OF_LINE, from, index);
        if (maybeEat(/\/\/[^\r\n]*/y)) return makeToken(TokenType.SINGLE_LINE_COMMENT, from, index);
        if (maybeEat(/\/\*[\s\S]*?(\*\/|$)/y)) return makeToken(TokenType.MULTI_LINE_COMMENT, from, index);
        if (peekChar() === "#" && isAtLineStart()) {
            maybeEat(/#[^\r\n]*/y);
            return makeToken(TokenType.DIRECTIVE, from, index);
        }

        if (maybeEat(/(\$@|@\$)"(""|[^"])*("|$)/y)) return makeToken(TokenType.INTERPOLATED_STRING_LITERAL, from, index);
        if (peekChar() === "$" && peekChar(1) === "\"") {
            scanInterpolatedString();
            return makeToken(TokenType.INTERPOLATED_STRING_LITERAL, from, index, getTextSlice(new SourceRange(from, index)));
        }
        if (maybeEat(/@"(""|[^"])*("|$)/y)) return makeToken(TokenType.STRING_LITERAL, from, index);
        if (maybeEat(/"(\\.|[^"\\\r\n])*("|(?=[\r\n])|$)/y)) return makeToken(TokenType.STRING_LITERAL, from, index);
        if (maybeEat(/'(\\.|[^'\\\r\n])*('|(?=[\r\n])|$)/y)) return makeToken(TokenType.CHAR_LITERAL, from, index);

        if (maybeEat(/0[xX][0-9a-fA-F_]+[uUlL]*|0[bB][01_]+[uUlL]*|(\d[\d_]*)?\.\d[\d_]*([eE][+-]?\d+)?[fFdDmM]?|\d[\d_]*([eE][+-]?\d+)?([uU][lL]?|[lL][uU]?|[fFdDmM])?/y)) {
            return makeToken(TokenType.NUMERIC_LITERAL, from, index);
        }

        if (maybeEat(/@?[_\p{L}][_\p{L}\p{Nd}]*/uy)) {
            const keyword = lastScannedText.startsWith("@") ? undefined : keywordByText.get(lastScannedText);
            return makeToken(keyword ?? TokenType.IDENTIFIER, from, index);
        }

        for (const [text, type] of punctuators) {
            if (sourceText.startsWith(text, index)) {
                index += text.length;
                return makeToken(type, from, index, text);
            }
        }

        index += 1;
        return makeToken(TokenType.CHAR, from, index, getTextSlice(new SourceRange(from, index)));
    }

    /**
     * `$"a {b} c"`: holes can contain nested braces and string literals of their own.
     * An unterminated literal runs to the end of the line.
     */
    function scanInterpolatedString() : void {
        index += 2;
        let depth = 0;
        while (hasNext()) {
            const c = peekChar();
            if (c === "\r" || c === "\n") {
                return;
            }
            if (depth === 0) {
                if (c === "\"") { index += 1; return; }
                if (c === "\\") { index += 2; continue; }
                if (c === "{" && peekChar(1) === "{") { index += 2; continue; }
                if (c === "{") depth += 1;
                index += 1;
            }
            else {
                if (c === "\"" && maybeEat(/"(\\.|[^"\\\r\n])*"/y)) continue;
                if (c === "{") depth += 1;
                if (c === "}") depth -= 1;
                index += 1;
            }
        }
    }

    function isAtLineStart() : boolean {
        for (let i = index - 1; i >= 0; i--) {
            const c = sourceText[i];
            if (c === "\n" || c === "\r") return true;
            if (c !== " " && c !== "\t") return false;
        }
        return true;
    }

    function maybeEat(pattern: RegExp) {
        pattern.lastIndex = index;
        const match = pattern.exec(sourceText);
        if (match && match[0].length > 0) {
            index += match[0].length;
            lastScannedText = match[0];
            return true;
        }
        else {
            return false;
        }
    }

    function makeToken(tokenType: TokenType, from: number, to: number, text: string = lastScannedText): Token {
        return Token(tokenType, text, from, to);
    }

    function getTextSlice(range: SourceRange) {
        return sourceText.slice(range.fromInclusive, range.toExclusive);
    }
}

export type Scanner = ReturnType<typeof Scanner>;

export interface Token {
    type: TokenType;
    range: SourceRange;
    text: string;
}

export function Token(type: TokenType, text: string, fromInclusive: number, toExclusive: number) : Token;
export function Token(type: TokenType, text: string, range: SourceRange) : Token;
export function Token(type: TokenType, text: string, fromOrRange: number | SourceRange, toExclusive?: number) : Token {
    if (typeof fromOrRange === "number") {
        return {
            type,
            text,
            range: new SourceRange(fromOrRange, toExclusive ?? fromOrRange)
        }
    }
    else {
        return {
            type,
            text,
            range: fromOrRange
        }
    }
}
