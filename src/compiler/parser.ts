import {
    Diagnostic, DiagnosticKind, NodeFlags, Terminal, SourceFile, SkippedTokens,
    UsingDirective, NamespaceDeclaration, TypeDeclaration, MethodDeclaration, ConstructorDeclaration,
    FieldDeclaration, PropertyDeclaration, AccessorList, AccessorDeclaration, ParameterList, Parameter,
    ArrowExpressionClause, VariableDeclaration, VariableDeclarator, EqualsValueClause,
    PredefinedType, IdentifierName, GenericName, TypeArgumentList, QualifiedName, ArrayType, ArrayRankSpecifier, NullableType,
    Block, ForEachStatement, ParenthesizedDesignation, IfStatement, ElseClause, LocalDeclarationStatement,
    EmptyStatement, ExpressionStatement, YieldStatement, ReturnStatement, BreakStatement, ContinueStatement,
    ThrowStatement, WhileStatement, DoStatement, ForStatement, LocalFunctionStatement, TryStatement,
    CatchClause, CatchDeclaration, FinallyClause, SwitchStatement, SwitchSection, CaseSwitchLabel,
    DefaultSwitchLabel, UsingStatement, LockStatement,
    LiteralExpression, LiteralType, ThisExpression, BaseExpression, ParenthesizedExpression, TupleExpression,
    CastExpression, BinaryExpression, IsPatternExpression, AssignmentExpression, ConditionalExpression,
    PrefixUnaryExpression, PostfixUnaryExpression, MemberAccessExpression, ElementAccessExpression,
    InvocationExpression, ArgumentList, Argument, NameColon, DeclarationExpression, ObjectCreationExpression,
    ArrayCreationExpression, InitializerExpression, LambdaExpression, TypeofExpression, DefaultExpression,
    AwaitExpression, ThrowExpression,
    QueryExpression, QueryBody, QueryContinuation, FromClause, LetClause, WhereClause, JoinClause, JoinIntoClause,
    OrderByClause, Ordering, SelectClause, GroupClause,
    Node, NodeKind, Statement, Expression, TypeNode, NameNode, QueryClause,
    setDebug as setNodeModuleDebug } from "./node";
import { Scanner, SourceRange, Token, TokenType, TokenTypeUiString } from "./scanner";
import { Tokenizer, TokenWithTrivia } from "./tokenizer";

export interface ParserOptions {
    debug: boolean,
}

const enum TypeParseFlags {
    none           = 0,
    // in `x is T ? a : b` the `?` starts a conditional, so it is only a nullable marker when nothing can follow it
    strictNullable = 1 << 0,
    // `new List<int>[3]` takes its rank specifiers as part of the creation expression
    noArray        = 1 << 1,
}

const memberModifiers = new Set<TokenType>([
    TokenType.KW_PUBLIC, TokenType.KW_PRIVATE, TokenType.KW_PROTECTED, TokenType.KW_INTERNAL,
    TokenType.KW_STATIC, TokenType.KW_READONLY, TokenType.KW_VIRTUAL, TokenType.KW_OVERRIDE,
    TokenType.KW_SEALED, TokenType.KW_ABSTRACT, TokenType.KW_CONST,
]);

const contextualMemberModifiers = new Set<string>(["async", "partial", "extern", "unsafe", "volatile", "required", "file"]);

// members we keep as opaque tokens; nothing inside them can host a convertible loop we care about
const contextualOpaqueMemberKeywords = new Set<string>(["enum", "delegate", "event", "implicit", "explicit"]);

export function isPredefinedTypeKeyword(type: TokenType) : boolean {
    switch (type) {
        case TokenType.KW_BOOL:
        case TokenType.KW_BYTE:
        case TokenType.KW_CHAR:
        case TokenType.KW_DECIMAL:
        case TokenType.KW_DOUBLE:
        case TokenType.KW_FLOAT:
        case TokenType.KW_INT:
        case TokenType.KW_LONG:
        case TokenType.KW_OBJECT:
        case TokenType.KW_SBYTE:
        case TokenType.KW_SHORT:
        case TokenType.KW_STRING:
        case TokenType.KW_UINT:
        case TokenType.KW_ULONG:
        case TokenType.KW_USHORT:
        case TokenType.KW_VOID:
            return true;
        default:
            return false;
    }
}

function binaryOperatorPrecedence(type: TokenType) : number {
    switch (type) {
        case TokenType.DBL_QUESTION_MARK: return 1;
        case TokenType.DBL_PIPE: return 2;
        case TokenType.DBL_AMPERSAND: return 3;
        case TokenType.PIPE: return 4;
        case TokenType.CARET: return 5;
        case TokenType.AMPERSAND: return 6;
        case TokenType.DBL_EQUAL:
        case TokenType.EXCLAMATION_EQUAL: return 7;
        case TokenType.LEFT_ANGLE:
        case TokenType.RIGHT_ANGLE:
        case TokenType.LEFT_ANGLE_EQUAL:
        case TokenType.RIGHT_ANGLE_EQUAL:
        case TokenType.KW_IS:
        case TokenType.KW_AS: return 8;
        case TokenType.DBL_LEFT_ANGLE:
        case TokenType.DBL_RIGHT_ANGLE: return 9;
        case TokenType.PLUS:
        case TokenType.MINUS: return 10;
        case TokenType.STAR:
        case TokenType.FORWARD_SLASH:
        case TokenType.PERCENT: return 11;
        default: return 0;
    }
}

function isAssignmentOperator(type: TokenType) : boolean {
    switch (type) {
        case TokenType.EQUAL:
        case TokenType.PLUS_EQUAL:
        case TokenType.MINUS_EQUAL:
        case TokenType.STAR_EQUAL:
        case TokenType.FORWARD_SLASH_EQUAL:
        case TokenType.PERCENT_EQUAL:
        case TokenType.AMPERSAND_EQUAL:
        case TokenType.PIPE_EQUAL:
        case TokenType.CARET_EQUAL:
        case TokenType.DBL_LEFT_ANGLE_EQUAL:
        case TokenType.DBL_RIGHT_ANGLE_EQUAL:
        case TokenType.DBL_QUESTION_MARK_EQUAL:
            return true;
        default:
            return false;
    }
}

function isLiteralStart(type: TokenType) : boolean {
    switch (type) {
        case TokenType.NUMERIC_LITERAL:
        case TokenType.STRING_LITERAL:
        case TokenType.INTERPOLATED_STRING_LITERAL:
        case TokenType.CHAR_LITERAL:
        case TokenType.KW_TRUE:
        case TokenType.KW_FALSE:
        case TokenType.KW_NULL:
            return true;
        default:
            return false;
    }
}

/**
 * tokens that can start the operand of a cast; `(T)-x` is deliberately excluded, it reads as a subtraction
 */
function canFollowCast(type: TokenType) : boolean {
    switch (type) {
        case TokenType.IDENTIFIER:
        case TokenType.LEFT_PAREN:
        case TokenType.EXCLAMATION:
        case TokenType.TILDE:
        case TokenType.KW_THIS:
        case TokenType.KW_BASE:
        case TokenType.KW_NEW:
        case TokenType.KW_TYPEOF:
        case TokenType.KW_DEFAULT:
            return true;
        default:
            return isLiteralStart(type) || isPredefinedTypeKeyword(type);
    }
}

// after a speculative `<...>` in an expression, these tokens confirm a generic name rather than a less-than
function canFollowTypeArgumentListInExpression(type: TokenType) : boolean {
    switch (type) {
        case TokenType.LEFT_PAREN:
        case TokenType.RIGHT_PAREN:
        case TokenType.RIGHT_BRACKET:
        case TokenType.RIGHT_BRACE:
        case TokenType.COLON:
        case TokenType.SEMICOLON:
        case TokenType.COMMA:
        case TokenType.DOT:
        case TokenType.QUESTION_MARK_DOT:
        case TokenType.QUESTION_MARK:
        case TokenType.DBL_EQUAL:
        case TokenType.EXCLAMATION_EQUAL:
        case TokenType.PIPE:
        case TokenType.CARET:
        case TokenType.DBL_AMPERSAND:
        case TokenType.DBL_PIPE:
        case TokenType.EOF:
            return true;
        default:
            return false;
    }
}

export function Parser(options: ParserOptions = {debug: false}) {
    const debug = options.debug;
    if (debug) {
        setNodeModuleDebug();
    }

    let tokens : readonly TokenWithTrivia[] = [];
    let index = 0;
    let lastToken : Token | null = null;
    let diagnostics : Diagnostic[] = [];

    const SpeculationHelper = (function() {
        //
        // run a `T` returning worker, and always rollback changes to parser state when done
        //
        function lookahead<T>(lookaheadWorker: () => T) : T {
            const savedIndex = index;
            const savedLastToken = lastToken;
            const diagnosticsLimit = diagnostics.length;

            const result = lookaheadWorker();

            diagnostics.splice(diagnosticsLimit); // drop any diagnostics that were added
            index = savedIndex;
            lastToken = savedLastToken;
            return result;
        }
        //
        // if speculationWorker returns a non-null `T`, we return that;
        // otherwise, rollback any changes to parser state made by the speculation worker and return null
        //
        function speculate<T>(speculationWorker: () => T | null) : T | null {
            const savedIndex = index;
            const savedLastToken = lastToken;
            const diagnosticsLimit = diagnostics.length;

            const result = speculationWorker();

            if (result !== null) {
                return result;
            }
            else {
                diagnostics.splice(diagnosticsLimit);
                index = savedIndex;
                lastToken = savedLastToken;
                return null;
            }
        }
        return {
            lookahead,
            speculate
        }
    })();

    const self_ = {
        parse,
        parseExpressionText,
    };

    return self_;

    /*********************************
    /* impl
    /********************************/
    function acquire(sourceFile: SourceFile) {
        const tokenizer = Tokenizer(Scanner(sourceFile.sourceText));
        sourceFile.sourceText = tokenizer.getSourceText();
        tokens = tokenizer.getTokens();
        index = 0;
        lastToken = null;
        diagnostics = sourceFile.diagnostics = [];
    }

    function release() : void {
        tokens = [];
        index = 0;
        lastToken = null;
        diagnostics = [];
    }

    function parse(sourceFile: SourceFile) : SourceFile {
        acquire(sourceFile);

        sourceFile.content = parseCompilationUnitMembers();
        sourceFile.endOfFile = next();

        if (debug) {
            for (const diagnostic of diagnostics) {
                diagnostic.__debug_text = sourceFile.sourceText.slice(diagnostic.fromInclusive, diagnostic.toExclusive);
            }
        }

        release();
        return sourceFile;
    }

    /**
     * parse a lone expression, e.g. a generated query, against a scratch source file
     */
    function parseExpressionText(sourceFile: SourceFile) : Expression {
        acquire(sourceFile);
        const result = parseExpression();
        if (lookahead() !== TokenType.EOF) {
            parseErrorAtCurrentToken("Unexpected trailing text after expression.");
        }
        sourceFile.endOfFile = next();
        release();
        return result;
    }

    function peek(jump: number = 0) : TokenWithTrivia {
        return tokens[Math.min(index + jump, tokens.length - 1)];
    }

    function lookahead() : TokenType {
        return peek().token.type;
    }

    function isContextual(text: string, jump: number = 0) : boolean {
        const token = peek(jump).token;
        return token.type === TokenType.IDENTIFIER && token.text === text;
    }

    function pos() : number {
        return lastToken?.range.toExclusive ?? 0;
    }

    /**
     * consume the current token as a terminal; the EOF token is never consumed
     */
    function next() : Terminal {
        const current = peek();
        if (current.token.type !== TokenType.EOF) {
            index++;
        }
        lastToken = current.token;
        return Terminal(current.token, current.leadingTrivia, current.trailingTrivia);
    }

    // `>` `>` and `>` `>=` with nothing between them are shift operators; the scanner never produces them
    function peekGluedRightAngle() : TokenType.DBL_RIGHT_ANGLE | TokenType.DBL_RIGHT_ANGLE_EQUAL | null {
        if (lookahead() !== TokenType.RIGHT_ANGLE) {
            return null;
        }
        const first = peek();
        const second = peek(1);
        if (first.trailingTrivia.length > 0 || second.leadingTrivia.length > 0 || second.token.range.fromInclusive !== first.token.range.toExclusive) {
            return null;
        }
        if (second.token.type === TokenType.RIGHT_ANGLE) return TokenType.DBL_RIGHT_ANGLE;
        if (second.token.type === TokenType.RIGHT_ANGLE_EQUAL) return TokenType.DBL_RIGHT_ANGLE_EQUAL;
        return null;
    }

    function peekOperator() : TokenType {
        return peekGluedRightAngle() ?? lookahead();
    }

    function nextOperator() : Terminal {
        const glued = peekGluedRightAngle();
        if (glued === null) {
            return next();
        }
        const first = peek();
        const second = peek(1);
        index += 2;
        lastToken = second.token;
        const token = Token(glued, TokenTypeUiString[glued], new SourceRange(first.token.range.fromInclusive, second.token.range.toExclusive));
        return Terminal(token, first.leadingTrivia, second.trailingTrivia);
    }

    function parseErrorAtRange(fromInclusive: number, toExclusive: number, msg: string) : void {
        const lastDiagnostic = diagnostics.length > 0 ? diagnostics[diagnostics.length-1] : undefined;
        const freshDiagnostic : Diagnostic = {
            kind: DiagnosticKind.error,
            fromInclusive,
            toExclusive,
            msg,
        };

        if (lastDiagnostic && lastDiagnostic.fromInclusive === fromInclusive) {
            // last diagnostic started where this one starts, and is exactly as long or longer
            if (lastDiagnostic.toExclusive >= toExclusive) {
                return;
            }
            diagnostics[diagnostics.length-1] = freshDiagnostic;
            return;
        }

        diagnostics.push(freshDiagnostic);
    }

    function parseErrorAtPos(pos: number, msg: string) {
        parseErrorAtRange(pos, pos+1, msg);
    }

    function parseErrorAtCurrentToken(msg: string) : void {
        const range = peek().token.range;
        parseErrorAtRange(range.fromInclusive, Math.max(range.toExclusive, range.fromInclusive + 1), msg);
    }

    function createMissingNode<T extends Node>(node: T) : T {
        node.flags |= NodeFlags.error | NodeFlags.missing;
        return node;
    }

    function phonyTerminalFromCurrentPos(type: TokenType) : Terminal {
        const errorPos = pos();
        return createMissingNode(Terminal(Token(type, "", new SourceRange(errorPos, errorPos))));
    }

    function parseOptionalTerminal(type: TokenType) : Terminal | null {
        return lookahead() === type ? next() : null;
    }

    function parseExpectedTerminal(type: TokenType, errorMsg?: string) : Terminal {
        const maybeTerminal = parseOptionalTerminal(type);
        if (maybeTerminal) {
            return maybeTerminal;
        }
        parseErrorAtPos(pos(), errorMsg ?? "Expected '" + TokenTypeUiString[type] + "'.");
        return phonyTerminalFromCurrentPos(type);
    }

    function parseExpectedIdentifier() : Terminal {
        return parseExpectedTerminal(TokenType.IDENTIFIER, "Identifier expected.");
    }

    function parseExpectedContextual(text: string) : Terminal {
        if (isContextual(text)) {
            return next();
        }
        parseErrorAtPos(pos(), "Expected '" + text + "'.");
        return phonyTerminalFromCurrentPos(TokenType.IDENTIFIER);
    }

    /**
     * a separated list; `parseElement` is called at least once unless the list is immediately closed
     */
    function parseSeparatedList<T>(closer: TokenType, parseElement: () => T, allowTrailingSeparator = false) : {elements: T[], separators: Terminal[]} {
        const elements : T[] = [];
        const separators : Terminal[] = [];
        if (lookahead() === closer) {
            return {elements, separators};
        }
        while (true) {
            const start = index;
            elements.push(parseElement());
            if (lookahead() !== TokenType.COMMA) {
                break;
            }
            separators.push(next());
            if (allowTrailingSeparator && lookahead() === closer) {
                break;
            }
            if (index === start) {
                break;
            }
        }
        return {elements, separators};
    }

    //
    // skipping
    //

    function isOpener(type: TokenType) {
        return type === TokenType.LEFT_BRACE || type === TokenType.LEFT_PAREN || type === TokenType.LEFT_BRACKET;
    }

    function isCloser(type: TokenType) {
        return type === TokenType.RIGHT_BRACE || type === TokenType.RIGHT_PAREN || type === TokenType.RIGHT_BRACKET;
    }

    /**
     * consume balanced tokens until `stop` says so at nesting depth 0; never consumes a closer that would go below depth 0
     */
    function parseSkippedUntil(stop: (type: TokenType) => boolean, isError: boolean) : SkippedTokens | null {
        const terminals : Terminal[] = [];
        let depth = 0;
        while (lookahead() !== TokenType.EOF) {
            const type = lookahead();
            if (depth === 0 && (stop(type) || isCloser(type))) {
                break;
            }
            terminals.push(next());
            if (isOpener(type)) depth++;
            else if (isCloser(type)) depth--;
        }
        return terminals.length === 0 ? null : SkippedTokens(terminals, isError);
    }

    /**
     * consume a whole member we don't model, through its `;` or its closing `}`
     */
    function parseSkippedMember(startIndex: number, diagnosticsLimit: number, isError: boolean) : SkippedTokens {
        index = startIndex;
        diagnostics.splice(diagnosticsLimit);

        const terminals : Terminal[] = [];
        let depth = 0;
        while (lookahead() !== TokenType.EOF) {
            const type = lookahead();
            if (depth === 0 && isCloser(type)) {
                break;
            }
            terminals.push(next());
            if (isOpener(type)) depth++;
            else if (isCloser(type)) depth--;

            if (depth === 0 && type === TokenType.SEMICOLON) {
                break;
            }
            if (depth === 0 && type === TokenType.RIGHT_BRACE) {
                if (lookahead() === TokenType.SEMICOLON) {
                    terminals.push(next());
                }
                break;
            }
        }

        if (terminals.length === 0) {
            // a stray closer; eat it so we make progress
            terminals.push(next());
            isError = true;
        }

        const result = SkippedTokens(terminals, isError);
        if (isError) {
            parseErrorAtRange(result.range.fromInclusive, result.range.toExclusive, "Unrecognized declaration.");
        }
        return result;
    }

    function parseAttributeLists() : SkippedTokens[] {
        const result : SkippedTokens[] = [];
        while (lookahead() === TokenType.LEFT_BRACKET) {
            const terminals = [next()];
            let depth = 1;
            while (depth > 0 && lookahead() !== TokenType.EOF) {
                const type = lookahead();
                terminals.push(next());
                if (type === TokenType.LEFT_BRACKET) depth++;
                else if (type === TokenType.RIGHT_BRACKET) depth--;
            }
            result.push(SkippedTokens(terminals, false));
        }
        return result;
    }

    //
    // compilation unit and declarations
    //

    function parseCompilationUnitMembers() : Node[] {
        const result : Node[] = [];
        while (lookahead() !== TokenType.EOF) {
            const start = index;
            const member = parseCompilationUnitMember();
            if (index === start) {
                result.push(parseSkippedMember(start, diagnostics.length, true));
            }
            else {
                result.push(member);
            }
        }
        return result;
    }

    function isStartOfUsingDirective() : boolean {
        return (lookahead() === TokenType.KW_USING && peek(1).token.type !== TokenType.LEFT_PAREN && !isContextual("var", 1))
            || (isContextual("global") && peek(1).token.type === TokenType.KW_USING);
    }

    function isStartOfTypeOrNamespaceDeclaration() : boolean {
        return SpeculationHelper.lookahead(() => {
            parseAttributeLists();
            parseMemberModifiers();
            const type = lookahead();
            return type === TokenType.KW_CLASS
                || type === TokenType.KW_STRUCT
                || type === TokenType.KW_INTERFACE
                || type === TokenType.KW_NAMESPACE
                || (isContextual("record") && (peek(1).token.type === TokenType.IDENTIFIER || peek(1).token.type === TokenType.KW_CLASS || peek(1).token.type === TokenType.KW_STRUCT))
                || (isContextual("enum") && peek(1).token.type === TokenType.IDENTIFIER)
                || isContextual("delegate");
        });
    }

    // top level statements are allowed alongside usings, namespaces and types
    function parseCompilationUnitMember() : Node {
        if (isStartOfUsingDirective()) {
            return parseUsingDirective();
        }
        if (isStartOfTypeOrNamespaceDeclaration()) {
            return parseMemberDeclaration(null);
        }
        return parseStatement();
    }

    function parseUsingDirective() : UsingDirective {
        const globalKeyword = isContextual("global") ? next() : null;
        const usingKeyword = parseExpectedTerminal(TokenType.KW_USING);
        const staticKeyword = parseOptionalTerminal(TokenType.KW_STATIC);
        const alias = lookahead() === TokenType.IDENTIFIER && peek(1).token.type === TokenType.EQUAL
            ? {name: next(), equals: next()}
            : null;
        const name = parseExpectedType();
        const semicolon = parseExpectedTerminal(TokenType.SEMICOLON);
        return UsingDirective(globalKeyword, usingKeyword, staticKeyword, alias, name, semicolon);
    }

    function parseMemberModifiers() : Terminal[] {
        const result : Terminal[] = [];
        while (true) {
            const type = lookahead();
            if (memberModifiers.has(type)) {
                result.push(next());
                continue;
            }
            // `new` as a modifier hides an inherited member; `new(...)` and `new T()` don't start members
            if (type === TokenType.KW_NEW && peek(1).token.type !== TokenType.LEFT_PAREN && memberModifiers.has(peek(1).token.type)) {
                result.push(next());
                continue;
            }
            const peek1 = peek(1).token.type;
            if (type === TokenType.IDENTIFIER && contextualMemberModifiers.has(peek().token.text) && (peek1 === TokenType.IDENTIFIER || peek1 > TokenType._FIRST_KW)) {
                result.push(next());
                continue;
            }
            return result;
        }
    }

    function parseMembersUntilRightBrace(containingTypeName: string | null) : Node[] {
        const result : Node[] = [];
        while (lookahead() !== TokenType.RIGHT_BRACE && lookahead() !== TokenType.EOF) {
            const start = index;
            const member = isStartOfUsingDirective() ? parseUsingDirective() : parseMemberDeclaration(containingTypeName);
            if (index === start) {
                result.push(parseSkippedMember(start, diagnostics.length, true));
            }
            else {
                result.push(member);
            }
        }
        return result;
    }

    function parseMemberDeclaration(containingTypeName: string | null) : Node {
        const startIndex = index;
        const diagnosticsLimit = diagnostics.length;

        const attributes = parseAttributeLists();
        const modifiers = parseMemberModifiers();

        switch (lookahead()) {
            case TokenType.KW_NAMESPACE:
                return parseNamespaceDeclaration();
            case TokenType.KW_CLASS:
            case TokenType.KW_STRUCT:
            case TokenType.KW_INTERFACE:
                return parseTypeDeclaration(attributes, modifiers);
            case TokenType.TILDE:
                // finalizer
                return parseSkippedMember(startIndex, diagnosticsLimit, false);
        }

        if (isContextual("record") && (peek(1).token.type === TokenType.IDENTIFIER || peek(1).token.type === TokenType.KW_CLASS || peek(1).token.type === TokenType.KW_STRUCT)) {
            return parseTypeDeclaration(attributes, modifiers);
        }

        if (lookahead() === TokenType.IDENTIFIER && contextualOpaqueMemberKeywords.has(peek().token.text)) {
            return parseSkippedMember(startIndex, diagnosticsLimit, false);
        }

        if (containingTypeName !== null && isContextual(containingTypeName) && peek(1).token.type === TokenType.LEFT_PAREN) {
            return parseConstructorDeclaration(attributes, modifiers);
        }

        const type = tryParseType();
        if (!type) {
            return parseSkippedMember(startIndex, diagnosticsLimit, true);
        }

        if (lookahead() === TokenType.KW_THIS || isContextual("operator")) {
            // indexers and operators
            return parseSkippedMember(startIndex, diagnosticsLimit, false);
        }

        if (lookahead() !== TokenType.IDENTIFIER) {
            return parseSkippedMember(startIndex, diagnosticsLimit, true);
        }

        switch (peek(1).token.type) {
            case TokenType.LEFT_PAREN:
            case TokenType.LEFT_ANGLE:
                return parseMethodDeclaration(attributes, modifiers, type);
            case TokenType.LEFT_BRACE:
            case TokenType.EQUAL_RIGHT_ANGLE:
                return parsePropertyDeclaration(attributes, modifiers, type);
            case TokenType.EQUAL:
            case TokenType.SEMICOLON:
            case TokenType.COMMA: {
                const declaration = parseVariableDeclaration(type);
                return FieldDeclaration(attributes, modifiers, declaration, parseExpectedTerminal(TokenType.SEMICOLON));
            }
            default:
                // explicit interface implementations, and anything else we don't model
                return parseSkippedMember(startIndex, diagnosticsLimit, peek(1).token.type !== TokenType.DOT);
        }
    }

    function parseNamespaceDeclaration() : NamespaceDeclaration {
        const namespaceKeyword = next();
        const name = parseName(/*inType*/ true);
        if (lookahead() === TokenType.SEMICOLON) {
            const semicolon = next();
            // file scoped; everything else in the file belongs to it
            const members : Node[] = [];
            while (lookahead() !== TokenType.EOF) {
                const start = index;
                const member = isStartOfUsingDirective() ? parseUsingDirective() : parseMemberDeclaration(null);
                members.push(index === start ? parseSkippedMember(start, diagnostics.length, true) : member);
            }
            return NamespaceDeclaration(namespaceKeyword, name, null, semicolon, members, null);
        }

        const leftBrace = parseExpectedTerminal(TokenType.LEFT_BRACE);
        const members = parseMembersUntilRightBrace(null);
        const rightBrace = parseExpectedTerminal(TokenType.RIGHT_BRACE);
        const semicolon = parseOptionalTerminal(TokenType.SEMICOLON);
        return NamespaceDeclaration(namespaceKeyword, name, leftBrace, semicolon, members, rightBrace);
    }

    function parseTypeDeclaration(attributes: SkippedTokens[], modifiers: Terminal[]) : TypeDeclaration {
        const keyword = next();
        const secondKeyword = keyword.token.text === "record"
            ? (lookahead() === TokenType.KW_CLASS || lookahead() === TokenType.KW_STRUCT ? next() : null)
            : null;
        const identifier = parseExpectedIdentifier();
        const header = parseSkippedUntil(type => type === TokenType.LEFT_BRACE || type === TokenType.SEMICOLON, false);

        if (lookahead() === TokenType.SEMICOLON) {
            return TypeDeclaration(attributes, modifiers, keyword, secondKeyword, identifier, header, null, [], null, next());
        }

        const leftBrace = parseExpectedTerminal(TokenType.LEFT_BRACE);
        const members = parseMembersUntilRightBrace(identifier.token.text);
        const rightBrace = parseExpectedTerminal(TokenType.RIGHT_BRACE);
        const semicolon = parseOptionalTerminal(TokenType.SEMICOLON);
        return TypeDeclaration(attributes, modifiers, keyword, secondKeyword, identifier, header, leftBrace, members, rightBrace, semicolon);
    }

    function parseTypeParameters() : SkippedTokens | null {
        if (lookahead() !== TokenType.LEFT_ANGLE) {
            return null;
        }
        const terminals = [next()];
        let depth = 1;
        while (depth > 0 && lookahead() !== TokenType.EOF && lookahead() !== TokenType.LEFT_PAREN) {
            const type = lookahead();
            terminals.push(next());
            if (type === TokenType.LEFT_ANGLE) depth++;
            else if (type === TokenType.RIGHT_ANGLE) depth--;
        }
        return SkippedTokens(terminals, depth !== 0);
    }

    function parseConstraintClauses() : SkippedTokens | null {
        if (!isContextual("where")) {
            return null;
        }
        return parseSkippedUntil(type => type === TokenType.LEFT_BRACE || type === TokenType.EQUAL_RIGHT_ANGLE || type === TokenType.SEMICOLON, false);
    }

    function parseFunctionBodyParts() {
        if (lookahead() === TokenType.LEFT_BRACE) {
            return {body: parseBlock(), expressionBody: null, semicolon: null};
        }
        if (lookahead() === TokenType.EQUAL_RIGHT_ANGLE) {
            const expressionBody = ArrowExpressionClause(next(), parseExpression());
            return {body: null, expressionBody, semicolon: parseExpectedTerminal(TokenType.SEMICOLON)};
        }
        return {body: null, expressionBody: null, semicolon: parseExpectedTerminal(TokenType.SEMICOLON, "Expected a method body or ';'.")};
    }

    function parseMethodDeclaration(attributes: SkippedTokens[], modifiers: Terminal[], returnType: TypeNode) : MethodDeclaration {
        const identifier = next();
        const typeParameters = parseTypeParameters();
        const parameterList = parseParameterList(/*isLambda*/ false);
        const constraints = parseConstraintClauses();
        return MethodDeclaration(attributes, modifiers, returnType, identifier, typeParameters, parameterList, constraints, parseFunctionBodyParts());
    }

    function parseConstructorDeclaration(attributes: SkippedTokens[], modifiers: Terminal[]) : ConstructorDeclaration {
        const identifier = next();
        const parameterList = parseParameterList(/*isLambda*/ false);
        const initializer = lookahead() === TokenType.COLON
            ? parseSkippedUntil(type => type === TokenType.LEFT_BRACE || type === TokenType.EQUAL_RIGHT_ANGLE || type === TokenType.SEMICOLON, false)
            : null;
        return ConstructorDeclaration(attributes, modifiers, identifier, parameterList, initializer, parseFunctionBodyParts());
    }

    function parsePropertyDeclaration(attributes: SkippedTokens[], modifiers: Terminal[], type: TypeNode) : PropertyDeclaration {
        const identifier = next();

        if (lookahead() === TokenType.EQUAL_RIGHT_ANGLE) {
            const expressionBody = ArrowExpressionClause(next(), parseExpression());
            return PropertyDeclaration(attributes, modifiers, type, identifier, null, expressionBody, null, parseExpectedTerminal(TokenType.SEMICOLON));
        }

        const leftBrace = next();
        const accessors : AccessorDeclaration[] = [];
        while (lookahead() !== TokenType.RIGHT_BRACE && lookahead() !== TokenType.EOF) {
            const start = index;
            accessors.push(parseAccessorDeclaration());
            if (index === start) {
                break;
            }
        }
        const accessorList = AccessorList(leftBrace, accessors, parseExpectedTerminal(TokenType.RIGHT_BRACE));

        if (lookahead() === TokenType.EQUAL) {
            const initializer = EqualsValueClause(next(), parseVariableInitializer());
            return PropertyDeclaration(attributes, modifiers, type, identifier, accessorList, null, initializer, parseExpectedTerminal(TokenType.SEMICOLON));
        }

        return PropertyDeclaration(attributes, modifiers, type, identifier, accessorList, null, null, null);
    }

    function parseAccessorDeclaration() : AccessorDeclaration {
        const modifiers : Terminal[] = [];
        while (memberModifiers.has(lookahead())) {
            modifiers.push(next());
        }
        const keyword = lookahead() === TokenType.IDENTIFIER ? next() : parseExpectedContextual("get");
        return AccessorDeclaration(modifiers, keyword, parseFunctionBodyParts());
    }

    function parseParameterList(isLambda: boolean) : ParameterList {
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
        const {elements, separators} = parseSeparatedList(TokenType.RIGHT_PAREN, () => parseParameter(isLambda));
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        return ParameterList(leftParen, elements, separators, rightParen);
    }

    function parseParameter(isLambda: boolean) : Parameter {
        const attributes = parseAttributeLists();
        const modifiers : Terminal[] = [];
        while (true) {
            const type = lookahead();
            if (type === TokenType.KW_REF || type === TokenType.KW_OUT || type === TokenType.KW_IN || type === TokenType.KW_PARAMS || type === TokenType.KW_THIS || (isContextual("scoped") && peek(1).token.type !== TokenType.COMMA && peek(1).token.type !== TokenType.RIGHT_PAREN)) {
                modifiers.push(next());
                continue;
            }
            break;
        }

        if (isLambda && lookahead() === TokenType.IDENTIFIER && (peek(1).token.type === TokenType.COMMA || peek(1).token.type === TokenType.RIGHT_PAREN)) {
            return Parameter(attributes, modifiers, null, next(), null);
        }

        const type = parseExpectedType();
        const identifier = parseExpectedIdentifier();
        const defaultValue = !isLambda && lookahead() === TokenType.EQUAL
            ? EqualsValueClause(next(), parseExpression())
            : null;
        return Parameter(attributes, modifiers, type, identifier, defaultValue);
    }

    function parseVariableDeclaration(type: TypeNode) : VariableDeclaration {
        const {elements, separators} = parseSeparatedList(TokenType.SEMICOLON, parseVariableDeclarator);
        return VariableDeclaration(type, elements, separators);
    }

    function parseVariableDeclarator() : VariableDeclarator {
        const identifier = parseExpectedIdentifier();
        const initializer = lookahead() === TokenType.EQUAL
            ? EqualsValueClause(next(), parseVariableInitializer())
            : null;
        return VariableDeclarator(identifier, initializer);
    }

    // `int[] xs = {1, 2};` is the one place a bare initializer is an expression
    function parseVariableInitializer() : Expression {
        return lookahead() === TokenType.LEFT_BRACE ? parseInitializerExpression() : parseExpression();
    }

    //
    // types
    //

    function parseSimpleName(inType: boolean) : IdentifierName | GenericName {
        const identifier = parseExpectedIdentifier();
        if (lookahead() !== TokenType.LEFT_ANGLE) {
            return IdentifierName(identifier);
        }

        const typeArgumentList = SpeculationHelper.speculate(() => {
            const result = tryParseTypeArgumentList();
            if (result && !inType && !canFollowTypeArgumentListInExpression(lookahead())) {
                return null;
            }
            return result;
        });

        return typeArgumentList ? GenericName(identifier, typeArgumentList) : IdentifierName(identifier);
    }

    function tryParseTypeArgumentList() : TypeArgumentList | null {
        return SpeculationHelper.speculate(() => {
            const leftAngle = next();
            const args : TypeNode[] = [];
            const separators : Terminal[] = [];
            while (true) {
                const arg = tryParseType();
                if (!arg) {
                    return null;
                }
                args.push(arg);
                if (lookahead() === TokenType.COMMA) {
                    separators.push(next());
                    continue;
                }
                break;
            }
            if (lookahead() !== TokenType.RIGHT_ANGLE) {
                return null;
            }
            return TypeArgumentList(leftAngle, args, separators, next());
        });
    }

    function parseName(inType: boolean) : NameNode {
        let name : NameNode = parseSimpleName(inType);
        while ((lookahead() === TokenType.DOT || lookahead() === TokenType.DBL_COLON) && peek(1).token.type === TokenType.IDENTIFIER) {
            const dot = next();
            name = QualifiedName(name, dot, parseSimpleName(inType));
        }
        return name;
    }

    function isNullableQuestionMark(flags: TypeParseFlags) : boolean {
        if (lookahead() !== TokenType.QUESTION_MARK) {
            return false;
        }
        if (!(flags & TypeParseFlags.strictNullable)) {
            return true;
        }
        switch (peek(1).token.type) {
            case TokenType.RIGHT_PAREN:
            case TokenType.SEMICOLON:
            case TokenType.COMMA:
            case TokenType.RIGHT_BRACKET:
            case TokenType.RIGHT_BRACE:
            case TokenType.RIGHT_ANGLE:
            case TokenType.EOF:
                return true;
            default:
                return false;
        }
    }

    /**
     * parse a type if one is here, else consume nothing and return null; never emits diagnostics
     */
    function tryParseType(flags: TypeParseFlags = TypeParseFlags.none) : TypeNode | null {
        return SpeculationHelper.speculate(() => {
            let type : TypeNode;
            if (isPredefinedTypeKeyword(lookahead())) {
                type = PredefinedType(next());
            }
            else if (lookahead() === TokenType.IDENTIFIER) {
                type = parseName(/*inType*/ true);
            }
            else {
                return null;
            }

            if (isNullableQuestionMark(flags)) {
                type = NullableType(type, next());
            }

            if (flags & TypeParseFlags.noArray) {
                return type;
            }

            const rankSpecifiers : ArrayRankSpecifier[] = [];
            while (lookahead() === TokenType.LEFT_BRACKET && (peek(1).token.type === TokenType.RIGHT_BRACKET || peek(1).token.type === TokenType.COMMA)) {
                const leftBracket = next();
                const separators : Terminal[] = [];
                while (lookahead() === TokenType.COMMA) {
                    separators.push(next());
                }
                if (lookahead() !== TokenType.RIGHT_BRACKET) {
                    return null;
                }
                rankSpecifiers.push(ArrayRankSpecifier(leftBracket, [], separators, next()));
            }

            if (rankSpecifiers.length > 0) {
                type = ArrayType(type, rankSpecifiers);
                if (isNullableQuestionMark(flags)) {
                    type = NullableType(type, next());
                }
            }

            return type;
        });
    }

    function parseExpectedType(flags: TypeParseFlags = TypeParseFlags.none) : TypeNode {
        const type = tryParseType(flags);
        if (type) {
            return type;
        }
        parseErrorAtPos(pos(), "Type expected.");
        return createMissingNode(IdentifierName(phonyTerminalFromCurrentPos(TokenType.IDENTIFIER)));
    }

    //
    // statements
    //

    function parseBlock() : Block {
        const leftBrace = parseExpectedTerminal(TokenType.LEFT_BRACE);
        const statements = parseStatementList(() => lookahead() === TokenType.RIGHT_BRACE);
        const rightBrace = parseExpectedTerminal(TokenType.RIGHT_BRACE);
        return Block(leftBrace, statements, rightBrace);
    }

    function parseStatementList(isTerminator: () => boolean) : Statement[] {
        const result : Statement[] = [];
        while (lookahead() !== TokenType.EOF && !isTerminator()) {
            const start = index;
            const statement = parseStatement();
            if (index === start) {
                // no progress; the statement is all missing nodes, so eat the offending token instead
                const stray = next();
                parseErrorAtRange(stray.range.fromInclusive, stray.range.toExclusive, "Unexpected '" + stray.token.text + "'.");
                result.push(SkippedTokens([stray], true));
            }
            else {
                result.push(statement);
            }
        }
        return result;
    }

    function parseEmbeddedStatement() : Statement {
        if (lookahead() === TokenType.EOF) {
            parseErrorAtPos(pos(), "Statement expected.");
            return createMissingNode(EmptyStatement(phonyTerminalFromCurrentPos(TokenType.SEMICOLON)));
        }
        return parseStatement();
    }

    function parseStatement() : Statement {
        switch (lookahead()) {
            case TokenType.LEFT_BRACE: return parseBlock();
            case TokenType.SEMICOLON: return EmptyStatement(next());
            case TokenType.KW_FOREACH: return parseForEachStatement();
            case TokenType.KW_IF: return parseIfStatement();
            case TokenType.KW_WHILE: return parseWhileStatement();
            case TokenType.KW_DO: return parseDoStatement();
            case TokenType.KW_FOR: return parseForStatement();
            case TokenType.KW_RETURN: {
                const returnKeyword = next();
                const expression = lookahead() === TokenType.SEMICOLON ? null : parseExpression();
                return ReturnStatement(returnKeyword, expression, parseExpectedTerminal(TokenType.SEMICOLON));
            }
            case TokenType.KW_BREAK: return BreakStatement(next(), parseExpectedTerminal(TokenType.SEMICOLON));
            case TokenType.KW_CONTINUE: return ContinueStatement(next(), parseExpectedTerminal(TokenType.SEMICOLON));
            case TokenType.KW_THROW: {
                const throwKeyword = next();
                const expression = lookahead() === TokenType.SEMICOLON ? null : parseExpression();
                return ThrowStatement(throwKeyword, expression, parseExpectedTerminal(TokenType.SEMICOLON));
            }
            case TokenType.KW_TRY: return parseTryStatement();
            case TokenType.KW_SWITCH: return parseSwitchStatement();
            case TokenType.KW_GOTO: {
                const result = parseSkippedUntil(type => type === TokenType.SEMICOLON, false);
                const semicolon = parseExpectedTerminal(TokenType.SEMICOLON);
                return SkippedTokens([...(result?.terminals ?? []), semicolon], false);
            }
            case TokenType.KW_USING: {
                if (peek(1).token.type === TokenType.LEFT_PAREN) {
                    return parseUsingStatement();
                }
                const usingKeyword = next();
                const declaration = parseVariableDeclaration(parseExpectedType());
                return LocalDeclarationStatement([usingKeyword], declaration, parseExpectedTerminal(TokenType.SEMICOLON));
            }
            case TokenType.KW_CONST: {
                const constKeyword = next();
                const declaration = parseVariableDeclaration(parseExpectedType());
                return LocalDeclarationStatement([constKeyword], declaration, parseExpectedTerminal(TokenType.SEMICOLON));
            }
            case TokenType.IDENTIFIER: {
                if (isContextual("yield") && (peek(1).token.type === TokenType.KW_RETURN || peek(1).token.type === TokenType.KW_BREAK)) {
                    return parseYieldStatement();
                }
                if (isContextual("lock") && peek(1).token.type === TokenType.LEFT_PAREN) {
                    const lockKeyword = next();
                    const leftParen = next();
                    const expression = parseExpression();
                    const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
                    return LockStatement(lockKeyword, leftParen, expression, rightParen, parseEmbeddedStatement());
                }
                if (peek(1).token.type === TokenType.COLON) {
                    // a label; the labeled statement follows as its own statement
                    return SkippedTokens([next(), next()], false);
                }
                break;
            }
        }

        const declarationOrFunction = tryParseLocalDeclarationOrFunction();
        if (declarationOrFunction) {
            return declarationOrFunction;
        }

        const expression = parseExpression();
        return ExpressionStatement(expression, parseExpectedTerminal(TokenType.SEMICOLON));
    }

    function tryParseLocalDeclarationOrFunction() : LocalDeclarationStatement | LocalFunctionStatement | null {
        return SpeculationHelper.speculate(() => {
            const modifiers : Terminal[] = [];
            while (lookahead() === TokenType.KW_STATIC || ((isContextual("async") || isContextual("unsafe") || isContextual("extern")) && peek(1).token.type !== TokenType.LEFT_PAREN && peek(1).token.type !== TokenType.EQUAL_RIGHT_ANGLE)) {
                modifiers.push(next());
            }

            const type = tryParseType();
            if (!type || lookahead() !== TokenType.IDENTIFIER) {
                return null;
            }
            // `await x;` and friends
            if (type.kind === NodeKind.identifierName && (type.identifier.token.text === "await" || type.identifier.token.text === "yield")) {
                return null;
            }

            switch (peek(1).token.type) {
                case TokenType.LEFT_PAREN:
                case TokenType.LEFT_ANGLE: {
                    const identifier = next();
                    const typeParameters = parseTypeParameters();
                    const diagnosticsLimit = diagnostics.length;
                    const parameterList = parseParameterList(/*isLambda*/ false);
                    if (diagnostics.length > diagnosticsLimit) {
                        return null;
                    }
                    const constraints = parseConstraintClauses();
                    if (lookahead() !== TokenType.LEFT_BRACE && lookahead() !== TokenType.EQUAL_RIGHT_ANGLE) {
                        return null;
                    }
                    return LocalFunctionStatement(modifiers, type, identifier, typeParameters, parameterList, constraints, parseFunctionBodyParts());
                }
                case TokenType.EQUAL:
                case TokenType.SEMICOLON:
                case TokenType.COMMA: {
                    if (modifiers.length > 0) {
                        return null;
                    }
                    const declaration = parseVariableDeclaration(type);
                    return LocalDeclarationStatement([], declaration, parseExpectedTerminal(TokenType.SEMICOLON));
                }
                default:
                    return null;
            }
        });
    }

    function parseForEachStatement() : ForEachStatement {
        const forEachKeyword = next();
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
        const type = parseExpectedType();

        let identifier : Terminal | null = null;
        let designation : ParenthesizedDesignation | null = null;
        if (lookahead() === TokenType.LEFT_PAREN) {
            const designationLeftParen = next();
            const {elements, separators} = parseSeparatedList(TokenType.RIGHT_PAREN, parseExpectedIdentifier);
            designation = ParenthesizedDesignation(designationLeftParen, elements, separators, parseExpectedTerminal(TokenType.RIGHT_PAREN));
        }
        else {
            identifier = parseExpectedIdentifier();
        }

        const inKeyword = parseExpectedTerminal(TokenType.KW_IN);
        const expression = parseExpression();
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        const statement = parseEmbeddedStatement();
        return ForEachStatement(forEachKeyword, leftParen, type, identifier, designation, inKeyword, expression, rightParen, statement);
    }

    function parseIfStatement() : IfStatement {
        const ifKeyword = next();
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
        const condition = parseExpression();
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        const statement = parseEmbeddedStatement();
        const elseClause = lookahead() === TokenType.KW_ELSE
            ? ElseClause(next(), parseEmbeddedStatement())
            : null;
        return IfStatement(ifKeyword, leftParen, condition, rightParen, statement, elseClause);
    }

    function parseWhileStatement() : WhileStatement {
        const whileKeyword = next();
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
        const condition = parseExpression();
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        return WhileStatement(whileKeyword, leftParen, condition, rightParen, parseEmbeddedStatement());
    }

    function parseDoStatement() : DoStatement {
        const doKeyword = next();
        const statement = parseEmbeddedStatement();
        const whileKeyword = parseExpectedTerminal(TokenType.KW_WHILE);
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
        const condition = parseExpression();
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        return DoStatement(doKeyword, statement, whileKeyword, leftParen, condition, rightParen, parseExpectedTerminal(TokenType.SEMICOLON));
    }

    function parseForStatement() : ForStatement {
        const forKeyword = next();
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);

        let declaration : VariableDeclaration | null = null;
        let initializers : Expression[] = [];
        let initializerSeparators : Terminal[] = [];
        if (lookahead() !== TokenType.SEMICOLON) {
            declaration = SpeculationHelper.speculate(() => {
                const type = tryParseType();
                return type && lookahead() === TokenType.IDENTIFIER ? parseVariableDeclaration(type) : null;
            });
            if (!declaration) {
                ({elements: initializers, separators: initializerSeparators} = parseSeparatedList(TokenType.SEMICOLON, parseExpression));
            }
        }
        const firstSemicolon = parseExpectedTerminal(TokenType.SEMICOLON);
        const condition = lookahead() === TokenType.SEMICOLON ? null : parseExpression();
        const secondSemicolon = parseExpectedTerminal(TokenType.SEMICOLON);
        const {elements: incrementors, separators: incrementorSeparators} = parseSeparatedList(TokenType.RIGHT_PAREN, parseExpression);
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        const statement = parseEmbeddedStatement();

        return ForStatement(forKeyword, leftParen, declaration, initializers, initializerSeparators, firstSemicolon,
            condition, secondSemicolon, incrementors, incrementorSeparators, rightParen, statement);
    }

    function parseYieldStatement() : YieldStatement {
        const yieldKeyword = next();
        const returnOrBreakKeyword = next();
        const expression = returnOrBreakKeyword.token.type === TokenType.KW_RETURN ? parseExpression() : null;
        return YieldStatement(yieldKeyword, returnOrBreakKeyword, expression, parseExpectedTerminal(TokenType.SEMICOLON));
    }

    function parseTryStatement() : TryStatement {
        const tryKeyword = next();
        const block = parseBlock();
        const catches : CatchClause[] = [];
        while (lookahead() === TokenType.KW_CATCH) {
            const catchKeyword = next();
            let declaration : CatchDeclaration | null = null;
            if (lookahead() === TokenType.LEFT_PAREN) {
                const leftParen = next();
                const type = parseExpectedType();
                const identifier = parseOptionalTerminal(TokenType.IDENTIFIER);
                declaration = CatchDeclaration(leftParen, type, identifier, parseExpectedTerminal(TokenType.RIGHT_PAREN));
            }
            const filter = isContextual("when")
                ? parseSkippedUntil(type => type === TokenType.LEFT_BRACE, false)
                : null;
            catches.push(CatchClause(catchKeyword, declaration, filter, parseBlock()));
        }
        const finallyClause = lookahead() === TokenType.KW_FINALLY
            ? FinallyClause(next(), parseBlock())
            : null;
        if (catches.length === 0 && !finallyClause) {
            parseErrorAtPos(pos(), "Expected 'catch' or 'finally'.");
        }
        return TryStatement(tryKeyword, block, catches, finallyClause);
    }

    function isStartOfSwitchLabel() : boolean {
        return lookahead() === TokenType.KW_CASE || (lookahead() === TokenType.KW_DEFAULT && peek(1).token.type === TokenType.COLON);
    }

    function parseSwitchStatement() : SwitchStatement {
        const switchKeyword = next();
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
        const expression = parseExpression();
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        const leftBrace = parseExpectedTerminal(TokenType.LEFT_BRACE);

        const sections : SwitchSection[] = [];
        while (isStartOfSwitchLabel()) {
            const labels : (CaseSwitchLabel | DefaultSwitchLabel)[] = [];
            while (isStartOfSwitchLabel()) {
                if (lookahead() === TokenType.KW_DEFAULT) {
                    labels.push(DefaultSwitchLabel(next(), next()));
                    continue;
                }
                const caseKeyword = next();
                const value : Expression = SpeculationHelper.speculate(() => {
                    const value = parseExpression();
                    return lookahead() === TokenType.COLON ? value : null;
                }) ?? parseSkippedUntil(type => type === TokenType.COLON, false) ?? createMissingNode(IdentifierName(phonyTerminalFromCurrentPos(TokenType.IDENTIFIER)));
                labels.push(CaseSwitchLabel(caseKeyword, value, parseExpectedTerminal(TokenType.COLON)));
            }
            const statements = parseStatementList(() => lookahead() === TokenType.RIGHT_BRACE || isStartOfSwitchLabel());
            sections.push(SwitchSection(labels, statements));
        }

        const rightBrace = parseExpectedTerminal(TokenType.RIGHT_BRACE);
        return SwitchStatement(switchKeyword, leftParen, expression, rightParen, leftBrace, sections, rightBrace);
    }

    function parseUsingStatement() : UsingStatement {
        const usingKeyword = next();
        const leftParen = next();
        const declaration = SpeculationHelper.speculate(() => {
            const type = tryParseType();
            return type && lookahead() === TokenType.IDENTIFIER && peek(1).token.type === TokenType.EQUAL ? parseVariableDeclaration(type) : null;
        });
        const expression = declaration ? null : parseExpression();
        const rightParen = parseExpectedTerminal(TokenType.RIGHT_PAREN);
        return UsingStatement(usingKeyword, leftParen, declaration, expression, rightParen, parseEmbeddedStatement());
    }

    //
    // expressions
    //

    function parseExpression() : Expression {
        const lambda = tryParseLambda();
        if (lambda) {
            return lambda;
        }

        if (isStartOfQueryExpression()) {
            return parseQueryExpression();
        }

        const left = parseConditionalExpression();
        if (isAssignmentOperator(peekOperator())) {
            const operator = nextOperator();
            return AssignmentExpression(left, operator, lookahead() === TokenType.LEFT_BRACE ? parseInitializerExpression() : parseExpression());
        }
        return left;
    }

    function parseConditionalExpression() : Expression {
        const condition = parseBinaryExpression(1);
        if (lookahead() !== TokenType.QUESTION_MARK) {
            return condition;
        }
        const questionMark = next();
        const whenTrue = parseExpression();
        const colon = parseExpectedTerminal(TokenType.COLON);
        const whenFalse = parseExpression();
        return ConditionalExpression(condition, questionMark, whenTrue, colon, whenFalse);
    }

    function parseBinaryExpression(minPrecedence: number) : Expression {
        let left = parseUnaryExpression();
        while (true) {
            const operatorType = peekOperator();
            const precedence = binaryOperatorPrecedence(operatorType);
            if (precedence === 0 || precedence < minPrecedence) {
                return left;
            }

            if (operatorType === TokenType.KW_IS) {
                left = parseIsPatternExpression(left);
                continue;
            }

            if (operatorType === TokenType.KW_AS) {
                const asKeyword = next();
                left = BinaryExpression(left, asKeyword, parseExpectedType(TypeParseFlags.strictNullable));
                continue;
            }

            const operator = nextOperator();
            // `??` is right associative
            const right = parseBinaryExpression(operatorType === TokenType.DBL_QUESTION_MARK ? precedence : precedence + 1);
            left = BinaryExpression(left, operator, right);
        }
    }

    function parseIsPatternExpression(expression: Expression) : IsPatternExpression {
        const isKeyword = next();
        const notKeyword = isContextual("not") ? next() : null;

        if (isLiteralStart(lookahead()) || lookahead() === TokenType.MINUS) {
            return IsPatternExpression(expression, isKeyword, notKeyword, parseBinaryExpression(binaryOperatorPrecedence(TokenType.DBL_LEFT_ANGLE)), null);
        }

        const type = parseExpectedType(TypeParseFlags.strictNullable);
        const designation = lookahead() === TokenType.IDENTIFIER && !isContextual("and") && !isContextual("or") && !isContextual("when")
            ? next()
            : null;
        return IsPatternExpression(expression, isKeyword, notKeyword, type, designation);
    }

    function parseUnaryExpression() : Expression {
        switch (lookahead()) {
            case TokenType.PLUS:
            case TokenType.MINUS:
            case TokenType.EXCLAMATION:
            case TokenType.TILDE:
            case TokenType.DBL_PLUS:
            case TokenType.DBL_MINUS:
            case TokenType.CARET: {
                const operator = next();
                return PrefixUnaryExpression(operator, parseUnaryExpression());
            }
            case TokenType.KW_THROW: {
                const throwKeyword = next();
                return ThrowExpression(throwKeyword, parseExpression());
            }
            case TokenType.LEFT_PAREN: {
                const cast = tryParseCastExpression();
                if (cast) {
                    return cast;
                }
                break;
            }
            case TokenType.IDENTIFIER: {
                if (isContextual("await") && isStartOfAwaitOperand(peek(1).token.type)) {
                    const awaitKeyword = next();
                    return AwaitExpression(awaitKeyword, parseUnaryExpression());
                }
                break;
            }
        }
        return parsePostfixExpression(parsePrimaryExpression());
    }

    function isStartOfAwaitOperand(type: TokenType) : boolean {
        return type === TokenType.IDENTIFIER
            || type === TokenType.KW_NEW
            || type === TokenType.KW_THIS
            || type === TokenType.KW_BASE
            || type === TokenType.LEFT_PAREN
            || isLiteralStart(type)
            || isPredefinedTypeKeyword(type);
    }

    function tryParseCastExpression() : CastExpression | null {
        return SpeculationHelper.speculate(() => {
            const leftParen = next();
            const type = tryParseType();
            if (!type || lookahead() !== TokenType.RIGHT_PAREN) {
                return null;
            }
            const rightParen = next();
            if (type.kind !== NodeKind.predefinedType && !canFollowCast(lookahead())) {
                return null;
            }
            if (type.kind === NodeKind.predefinedType && !canFollowCast(lookahead()) && lookahead() !== TokenType.MINUS && lookahead() !== TokenType.PLUS) {
                return null;
            }
            return CastExpression(leftParen, type, rightParen, parseUnaryExpression());
        });
    }

    function parseLiteralExpression() : LiteralExpression {
        const literal = next();
        switch (literal.token.type) {
            case TokenType.NUMERIC_LITERAL: return LiteralExpression(LiteralType.numeric, literal);
            case TokenType.STRING_LITERAL: return LiteralExpression(LiteralType.string, literal);
            case TokenType.INTERPOLATED_STRING_LITERAL: return LiteralExpression(LiteralType.interpolatedString, literal);
            case TokenType.CHAR_LITERAL: return LiteralExpression(LiteralType.char, literal);
            case TokenType.KW_TRUE: return LiteralExpression(LiteralType.true, literal);
            case TokenType.KW_FALSE: return LiteralExpression(LiteralType.false, literal);
            case TokenType.KW_NULL: return LiteralExpression(LiteralType.null, literal);
            default: return LiteralExpression(LiteralType.default, literal);
        }
    }

    function parsePrimaryExpression() : Expression {
        const type = lookahead();

        if (isLiteralStart(type)) {
            return parseLiteralExpression();
        }

        if (isPredefinedTypeKeyword(type)) {
            // `int.Parse(...)`, `string.Empty`
            return PredefinedType(next());
        }

        switch (type) {
            case TokenType.IDENTIFIER:
                return parseSimpleName(/*inType*/ false);
            case TokenType.KW_THIS:
                return ThisExpression(next());
            case TokenType.KW_BASE:
                return BaseExpression(next());
            case TokenType.KW_DEFAULT: {
                if (peek(1).token.type !== TokenType.LEFT_PAREN) {
                    return parseLiteralExpression();
                }
                const keyword = next();
                const leftParen = next();
                const type = parseExpectedType();
                return DefaultExpression(keyword, leftParen, type, parseExpectedTerminal(TokenType.RIGHT_PAREN));
            }
            case TokenType.KW_TYPEOF: {
                const keyword = next();
                const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
                const type = parseExpectedType();
                return TypeofExpression(keyword, leftParen, type, parseExpectedTerminal(TokenType.RIGHT_PAREN));
            }
            case TokenType.KW_NEW:
                return parseNewExpression();
            case TokenType.LEFT_PAREN:
                return parseParenthesizedOrTupleExpression();
            default: {
                parseErrorAtCurrentToken("Expression expected.");
                return createMissingNode(IdentifierName(phonyTerminalFromCurrentPos(TokenType.IDENTIFIER)));
            }
        }
    }

    function isNullForgivingOperator() : boolean {
        if (lookahead() !== TokenType.EXCLAMATION) {
            return false;
        }
        switch (peek(1).token.type) {
            case TokenType.DOT:
            case TokenType.QUESTION_MARK_DOT:
            case TokenType.LEFT_BRACKET:
            case TokenType.LEFT_PAREN:
            case TokenType.RIGHT_PAREN:
            case TokenType.RIGHT_BRACKET:
            case TokenType.RIGHT_BRACE:
            case TokenType.SEMICOLON:
            case TokenType.COMMA:
                return true;
            default:
                return false;
        }
    }

    function parsePostfixExpression(root: Expression) : Expression {
        let result = root;
        while (true) {
            switch (lookahead()) {
                case TokenType.DOT:
                case TokenType.QUESTION_MARK_DOT: {
                    const operator = next();
                    result = MemberAccessExpression(result, operator, parseSimpleName(/*inType*/ false));
                    continue;
                }
                case TokenType.LEFT_PAREN: {
                    result = InvocationExpression(result, parseArgumentList());
                    continue;
                }
                case TokenType.LEFT_BRACKET: {
                    const leftBracket = next();
                    const {elements, separators} = parseSeparatedList(TokenType.RIGHT_BRACKET, parseArgument);
                    result = ElementAccessExpression(result, leftBracket, elements, separators, parseExpectedTerminal(TokenType.RIGHT_BRACKET));
                    continue;
                }
                case TokenType.DBL_PLUS:
                case TokenType.DBL_MINUS: {
                    result = PostfixUnaryExpression(result, next());
                    continue;
                }
                case TokenType.EXCLAMATION: {
                    if (isNullForgivingOperator()) {
                        result = PostfixUnaryExpression(result, next());
                        continue;
                    }
                    return result;
                }
                default:
                    return result;
            }
        }
    }

    function parseArgumentList() : ArgumentList {
        const leftParen = parseExpectedTerminal(TokenType.LEFT_PAREN);
        const {elements, separators} = parseSeparatedList(TokenType.RIGHT_PAREN, parseArgument);
        return ArgumentList(leftParen, elements, separators, parseExpectedTerminal(TokenType.RIGHT_PAREN));
    }

    function parseArgument() : Argument {
        const nameColon = lookahead() === TokenType.IDENTIFIER && peek(1).token.type === TokenType.COLON
            ? NameColon(next(), next())
            : null;

        const refKind = lookahead() === TokenType.KW_REF || lookahead() === TokenType.KW_OUT || lookahead() === TokenType.KW_IN
            ? next()
            : null;

        if (refKind?.token.type === TokenType.KW_OUT) {
            const declaration = SpeculationHelper.speculate(() => {
                const type = tryParseType();
                if (!type || lookahead() !== TokenType.IDENTIFIER) {
                    return null;
                }
                const identifier = next();
                return lookahead() === TokenType.COMMA || lookahead() === TokenType.RIGHT_PAREN
                    ? DeclarationExpression(type, identifier)
                    : null;
            });
            if (declaration) {
                return Argument(nameColon, refKind, declaration);
            }
        }

        return Argument(nameColon, refKind, parseExpression());
    }

    function parseParenthesizedOrTupleExpression() : ParenthesizedExpression | TupleExpression {
        const leftParen = next();
        const first = parseArgument();
        if (lookahead() !== TokenType.COMMA && first.nameColon === null && first.refKind === null) {
            return ParenthesizedExpression(leftParen, first.expression, parseExpectedTerminal(TokenType.RIGHT_PAREN));
        }

        const args = [first];
        const separators : Terminal[] = [];
        while (lookahead() === TokenType.COMMA) {
            separators.push(next());
            args.push(parseArgument());
        }
        return TupleExpression(leftParen, args, separators, parseExpectedTerminal(TokenType.RIGHT_PAREN));
    }

    function parseArrayRankSpecifiersWithSizes() : ArrayRankSpecifier[] {
        const result : ArrayRankSpecifier[] = [];
        while (lookahead() === TokenType.LEFT_BRACKET) {
            const leftBracket = next();
            if (lookahead() === TokenType.COMMA || lookahead() === TokenType.RIGHT_BRACKET) {
                const separators : Terminal[] = [];
                while (lookahead() === TokenType.COMMA) {
                    separators.push(next());
                }
                result.push(ArrayRankSpecifier(leftBracket, [], separators, parseExpectedTerminal(TokenType.RIGHT_BRACKET)));
            }
            else {
                const {elements, separators} = parseSeparatedList(TokenType.RIGHT_BRACKET, parseExpression);
                result.push(ArrayRankSpecifier(leftBracket, elements, separators, parseExpectedTerminal(TokenType.RIGHT_BRACKET)));
            }
        }
        return result;
    }

    function parseNewExpression() : ObjectCreationExpression | ArrayCreationExpression {
        const newKeyword = next();

        switch (lookahead()) {
            case TokenType.LEFT_BRACKET: {
                // `new[] { 1, 2 }`
                const rankSpecifiers = parseArrayRankSpecifiersWithSizes();
                const initializer = parseInitializerExpression();
                return ArrayCreationExpression(newKeyword, null, rankSpecifiers, initializer);
            }
            case TokenType.LEFT_PAREN: {
                // target typed, `List<int> xs = new();`
                const argumentList = parseArgumentList();
                const initializer = lookahead() === TokenType.LEFT_BRACE ? parseInitializerExpression() : null;
                return ObjectCreationExpression(newKeyword, null, argumentList, initializer);
            }
            case TokenType.LEFT_BRACE: {
                // anonymous object, `new { A = 1 }`
                return ObjectCreationExpression(newKeyword, null, null, parseInitializerExpression());
            }
        }

        const type = parseExpectedType(TypeParseFlags.noArray);

        if (lookahead() === TokenType.LEFT_BRACKET) {
            const rankSpecifiers = parseArrayRankSpecifiersWithSizes();
            const initializer = lookahead() === TokenType.LEFT_BRACE ? parseInitializerExpression() : null;
            return ArrayCreationExpression(newKeyword, type, rankSpecifiers, initializer);
        }

        const argumentList = lookahead() === TokenType.LEFT_PAREN ? parseArgumentList() : null;
        const initializer = lookahead() === TokenType.LEFT_BRACE ? parseInitializerExpression() : null;
        if (!argumentList && !initializer) {
            parseErrorAtPos(pos(), "Expected '(' or '{'.");
        }
        return ObjectCreationExpression(newKeyword, type, argumentList, initializer);
    }

    function parseInitializerExpression() : InitializerExpression {
        const leftBrace = parseExpectedTerminal(TokenType.LEFT_BRACE);
        const {elements, separators} = parseSeparatedList(
            TokenType.RIGHT_BRACE,
            () => lookahead() === TokenType.LEFT_BRACE ? parseInitializerExpression() : parseExpression(),
            /*allowTrailingSeparator*/ true);
        return InitializerExpression(leftBrace, elements, separators, parseExpectedTerminal(TokenType.RIGHT_BRACE));
    }

    function tryParseLambda() : LambdaExpression | null {
        const isAsync = isContextual("async")
            && ((peek(1).token.type === TokenType.IDENTIFIER && peek(2).token.type === TokenType.EQUAL_RIGHT_ANGLE) || peek(1).token.type === TokenType.LEFT_PAREN);
        const offset = isAsync ? 1 : 0;

        if (peek(offset).token.type === TokenType.IDENTIFIER && peek(offset + 1).token.type === TokenType.EQUAL_RIGHT_ANGLE) {
            const asyncKeyword = isAsync ? next() : null;
            const parameter = Parameter([], [], null, next(), null);
            const arrow = next();
            return LambdaExpression(asyncKeyword, parameter, null, arrow, parseLambdaBody());
        }

        if (peek(offset).token.type !== TokenType.LEFT_PAREN) {
            return null;
        }

        return SpeculationHelper.speculate(() => {
            const asyncKeyword = isAsync ? next() : null;
            const diagnosticsLimit = diagnostics.length;
            const parameterList = parseParameterList(/*isLambda*/ true);
            if (diagnostics.length > diagnosticsLimit || lookahead() !== TokenType.EQUAL_RIGHT_ANGLE) {
                return null;
            }
            const arrow = next();
            return LambdaExpression(asyncKeyword, null, parameterList, arrow, parseLambdaBody());
        });
    }

    function parseLambdaBody() : Block | Expression {
        return lookahead() === TokenType.LEFT_BRACE ? parseBlock() : parseExpression();
    }

    //
    // query expressions
    //

    function isStartOfQueryExpression() : boolean {
        if (!isContextual("from")) {
            return false;
        }
        return SpeculationHelper.lookahead(() => {
            next();
            if (lookahead() === TokenType.IDENTIFIER && peek(1).token.type === TokenType.KW_IN) {
                return true;
            }
            return tryParseType() !== null && lookahead() === TokenType.IDENTIFIER && peek(1).token.type === TokenType.KW_IN;
        });
    }

    function parseQueryExpression() : QueryExpression {
        const fromClause = parseFromClause();
        return QueryExpression(fromClause, parseQueryBody());
    }

    function parseFromClause() : FromClause {
        const fromKeyword = next();
        const type = lookahead() === TokenType.IDENTIFIER && peek(1).token.type === TokenType.KW_IN ? null : tryParseType();
        const identifier = parseExpectedIdentifier();
        const inKeyword = parseExpectedTerminal(TokenType.KW_IN);
        return FromClause(fromKeyword, type, identifier, inKeyword, parseExpression());
    }

    function parseQueryBody() : QueryBody {
        const clauses : QueryClause[] = [];
        while (true) {
            if (isContextual("from")) {
                clauses.push(parseFromClause());
            }
            else if (isContextual("let")) {
                const letKeyword = next();
                const identifier = parseExpectedIdentifier();
                const equals = parseExpectedTerminal(TokenType.EQUAL);
                clauses.push(LetClause(letKeyword, identifier, equals, parseExpression()));
            }
            else if (isContextual("where")) {
                const whereKeyword = next();
                clauses.push(WhereClause(whereKeyword, parseExpression()));
            }
            else if (isContextual("join")) {
                clauses.push(parseJoinClause());
            }
            else if (isContextual("orderby")) {
                const orderByKeyword = next();
                const {elements, separators} = parseSeparatedList(TokenType.EOF, () => {
                    const expression = parseExpression();
                    const direction = isContextual("ascending") || isContextual("descending") ? next() : null;
                    return Ordering(expression, direction);
                });
                clauses.push(OrderByClause(orderByKeyword, elements, separators));
            }
            else {
                break;
            }
        }

        let selectOrGroup : SelectClause | GroupClause;
        if (isContextual("group")) {
            const groupKeyword = next();
            const groupExpression = parseExpression();
            const byKeyword = parseExpectedContextual("by");
            selectOrGroup = GroupClause(groupKeyword, groupExpression, byKeyword, parseExpression());
        }
        else {
            const selectKeyword = parseExpectedContextual("select");
            selectOrGroup = SelectClause(selectKeyword, parseExpression());
        }

        const continuation = isContextual("into")
            ? QueryContinuation(next(), parseExpectedIdentifier(), parseQueryBody())
            : null;

        return QueryBody(clauses, selectOrGroup, continuation);
    }

    function parseJoinClause() : JoinClause {
        const joinKeyword = next();
        const type = lookahead() === TokenType.IDENTIFIER && peek(1).token.type === TokenType.KW_IN ? null : tryParseType();
        const identifier = parseExpectedIdentifier();
        const inKeyword = parseExpectedTerminal(TokenType.KW_IN);
        const inExpression = parseExpression();
        const onKeyword = parseExpectedContextual("on");
        const leftExpression = parseExpression();
        const equalsKeyword = parseExpectedContextual("equals");
        const rightExpression = parseExpression();
        const into = isContextual("into")
            ? JoinIntoClause(next(), parseExpectedIdentifier())
            : null;
        return JoinClause(joinKeyword, type, identifier, inKeyword, inExpression, onKeyword, leftExpression, equalsKeyword, rightExpression, into);
    }
}

export type Parser = ReturnType<typeof Parser>;
