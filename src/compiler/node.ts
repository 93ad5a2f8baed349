import { SourceRange, Token, TokenType } from "./scanner";

let debugNodeModule = false;
export function setDebug() { // can't unset after setting it, per program run
    debugNodeModule = true;
}

let nextNodeId : NodeId = 0;

export type NodeId = number;

export const enum NodeFlags {
    none         = 0,
    error        = 1 << 0,
    missing      = 1 << 1,
}

export const enum TriviaKind { whitespace, endOfLine, singleLineComment, multiLineComment, directive }

export interface Trivia {
    readonly kind: TriviaKind,
    readonly text: string,
    readonly range: SourceRange,
}

export type TriviaRun = readonly Trivia[];

export function Trivia(kind: TriviaKind, text: string) : Trivia {
    return {kind, text, range: SourceRange.Nil()};
}

export const Space = () => Trivia(TriviaKind.whitespace, " ");
export const Whitespace = (text: string) => Trivia(TriviaKind.whitespace, text);
export const EndOfLine = (text = "\n") => Trivia(TriviaKind.endOfLine, text);

export function isComment(trivia: Trivia) : boolean {
    return trivia.kind === TriviaKind.singleLineComment || trivia.kind === TriviaKind.multiLineComment;
}

export const enum NodeKind {
    sourceFile, terminal, skippedTokens,

    // declarations
    usingDirective, namespaceDeclaration, typeDeclaration, methodDeclaration, constructorDeclaration,
    fieldDeclaration, propertyDeclaration, accessorList, accessorDeclaration, parameterList, parameter,
    arrowExpressionClause, variableDeclaration, variableDeclarator, equalsValueClause,

    // types
    predefinedType, identifierName, genericName, typeArgumentList, qualifiedName, arrayType, arrayRankSpecifier, nullableType,

    // statements
    block, forEachStatement, parenthesizedDesignation, ifStatement, elseClause, localDeclarationStatement,
    emptyStatement, expressionStatement, yieldStatement, returnStatement, breakStatement, continueStatement,
    throwStatement, whileStatement, doStatement, forStatement, localFunctionStatement, tryStatement,
    catchClause, catchDeclaration, finallyClause, switchStatement, switchSection, caseSwitchLabel,
    defaultSwitchLabel, usingStatement, lockStatement,

    // expressions
    literalExpression, thisExpression, baseExpression, parenthesizedExpression, tupleExpression,
    castExpression, binaryExpression, isPatternExpression, assignmentExpression, conditionalExpression,
    prefixUnaryExpression, postfixUnaryExpression, memberAccessExpression, elementAccessExpression,
    invocationExpression, argumentList, argument, nameColon, declarationExpression, objectCreationExpression,
    arrayCreationExpression, initializerExpression, lambdaExpression, typeofExpression, defaultExpression,
    awaitExpression, throwExpression,

    // queries
    queryExpression, queryBody, queryContinuation, fromClause, letClause, whereClause, joinClause, joinIntoClause,
    orderByClause, ordering, selectClause, groupClause,
}

export interface NodeBase {
    kind: NodeKind,
    nodeId: NodeId,
    parent: Node | null,
    range: SourceRange,
    flags: NodeFlags,
    containedScope?: Scope,
    __debug_kind?: string,
}

type NodeBaseFields = Omit<NodeBase, "kind">;

function NodeBase(kind: NodeKind, range: SourceRange = SourceRange.Nil()) : NodeBaseFields {
    const result : NodeBaseFields = {
        nodeId: nextNodeId++,
        parent: null,
        range,
        flags: NodeFlags.none,
    };

    if (debugNodeModule) {
        result.__debug_kind = NodeKindUiString[kind];
    }

    return result;
}

export function mergeRanges(...nodes : (SourceRange | Node | readonly Node[] | undefined | null)[]) : SourceRange {
    const result = SourceRange.Nil();
    if (nodes.length === 0) {
        return result;
    }

    let gotStart = false;
    for (const node of nodes) {
        if (!node) continue;

        let thisRange : SourceRange;
        if (Array.isArray(node)) {
            if (node.length === 0) continue;
            thisRange = mergeRanges(...node);
        }
        else if (node instanceof SourceRange) {
            thisRange = node;
        }
        else if ("kind" in node) {
            thisRange = node.range;
        }
        else {
            continue;
        }

        if (thisRange.isNil()) continue;

        if (!gotStart) {
            result.fromInclusive = thisRange.fromInclusive;
            result.toExclusive = thisRange.toExclusive;
            gotStart = true;
        }
        else {
            result.toExclusive = thisRange.toExclusive;
        }
    }

    return result;
}

export const enum DiagnosticKind { error, warning }
export interface Diagnostic {
    kind: DiagnosticKind,
    fromInclusive: number,
    toExclusive: number,
    msg: string,
    __debug_text?: string,
}

/**
 * names declared directly by a scope-introducing node (a block, a member, a type, a foreach, ...)
 */
export type Scope = Map<string, SymbolDeclaration>;

export interface SymbolDeclaration {
    name: string,
    declaration: Node,
    // null if the declared type is implicit (`var`, a lambda parameter, a query range variable)
    declaredType: TypeNode | null,
}

export type Node =
    | SourceFile
    | Terminal
    | SkippedTokens
    | UsingDirective
    | NamespaceDeclaration
    | TypeDeclaration
    | MethodDeclaration
    | ConstructorDeclaration
    | FieldDeclaration
    | PropertyDeclaration
    | AccessorList
    | AccessorDeclaration
    | ParameterList
    | Parameter
    | ArrowExpressionClause
    | VariableDeclaration
    | VariableDeclarator
    | EqualsValueClause
    | PredefinedType
    | IdentifierName
    | GenericName
    | TypeArgumentList
    | QualifiedName
    | ArrayType
    | ArrayRankSpecifier
    | NullableType
    | Block
    | ForEachStatement
    | ParenthesizedDesignation
    | IfStatement
    | ElseClause
    | LocalDeclarationStatement
    | EmptyStatement
    | ExpressionStatement
    | YieldStatement
    | ReturnStatement
    | BreakStatement
    | ContinueStatement
    | ThrowStatement
    | WhileStatement
    | DoStatement
    | ForStatement
    | LocalFunctionStatement
    | TryStatement
    | CatchClause
    | CatchDeclaration
    | FinallyClause
    | SwitchStatement
    | SwitchSection
    | CaseSwitchLabel
    | DefaultSwitchLabel
    | UsingStatement
    | LockStatement
    | LiteralExpression
    | ThisExpression
    | BaseExpression
    | ParenthesizedExpression
    | TupleExpression
    | CastExpression
    | BinaryExpression
    | IsPatternExpression
    | AssignmentExpression
    | ConditionalExpression
    | PrefixUnaryExpression
    | PostfixUnaryExpression
    | MemberAccessExpression
    | ElementAccessExpression
    | InvocationExpression
    | ArgumentList
    | Argument
    | NameColon
    | DeclarationExpression
    | ObjectCreationExpression
    | ArrayCreationExpression
    | InitializerExpression
    | LambdaExpression
    | TypeofExpression
    | DefaultExpression
    | AwaitExpression
    | ThrowExpression
    | QueryExpression
    | QueryBody
    | QueryContinuation
    | FromClause
    | LetClause
    | WhereClause
    | JoinClause
    | JoinIntoClause
    | OrderByClause
    | Ordering
    | SelectClause
    | GroupClause

export type TypeNode =
    | PredefinedType
    | IdentifierName
    | GenericName
    | QualifiedName
    | ArrayType
    | NullableType

export type NameNode = IdentifierName | GenericName | QualifiedName;

export type Expression =
    | IdentifierName
    | GenericName
    | PredefinedType
    | LiteralExpression
    | ThisExpression
    | BaseExpression
    | ParenthesizedExpression
    | TupleExpression
    | CastExpression
    | BinaryExpression
    | IsPatternExpression
    | AssignmentExpression
    | ConditionalExpression
    | PrefixUnaryExpression
    | PostfixUnaryExpression
    | MemberAccessExpression
    | ElementAccessExpression
    | InvocationExpression
    | DeclarationExpression
    | ObjectCreationExpression
    | ArrayCreationExpression
    | InitializerExpression
    | LambdaExpression
    | TypeofExpression
    | DefaultExpression
    | AwaitExpression
    | ThrowExpression
    | QueryExpression
    | SkippedTokens

export type Statement =
    | Block
    | ForEachStatement
    | IfStatement
    | LocalDeclarationStatement
    | EmptyStatement
    | ExpressionStatement
    | YieldStatement
    | ReturnStatement
    | BreakStatement
    | ContinueStatement
    | ThrowStatement
    | WhileStatement
    | DoStatement
    | ForStatement
    | LocalFunctionStatement
    | TryStatement
    | SwitchStatement
    | UsingStatement
    | LockStatement
    | SkippedTokens

export type MemberDeclaration =
    | NamespaceDeclaration
    | TypeDeclaration
    | MethodDeclaration
    | ConstructorDeclaration
    | FieldDeclaration
    | PropertyDeclaration
    | SkippedTokens

/**
 * a node that owns a body of statements and so can own `yield` statements
 */
export type FunctionLike =
    | MethodDeclaration
    | ConstructorDeclaration
    | AccessorDeclaration
    | LocalFunctionStatement
    | LambdaExpression

export type QueryClause = FromClause | LetClause | WhereClause | JoinClause | OrderByClause;

export interface SourceFile extends NodeBase {
    kind: NodeKind.sourceFile,
    absPath: string,
    sourceText: string,
    content: Node[],
    endOfFile: Terminal | null,
    diagnostics: Diagnostic[],
}

export function SourceFile(absPath: string, sourceText: string) : SourceFile {
    return {
        ...NodeBase(NodeKind.sourceFile, new SourceRange(0, sourceText.length)),
        kind: NodeKind.sourceFile,
        absPath,
        sourceText,
        content: [],
        endOfFile: null,
        diagnostics: [],
    }
}

export interface Terminal extends NodeBase {
    kind: NodeKind.terminal,
    token: Token,
    leadingTrivia: TriviaRun,
    trailingTrivia: TriviaRun,
    rangeWithTrivia: SourceRange,
}

export function Terminal(token: Token, leadingTrivia: TriviaRun = [], trailingTrivia: TriviaRun = []) : Terminal {
    return {
        ...NodeBase(NodeKind.terminal, token.range),
        kind: NodeKind.terminal,
        token,
        leadingTrivia,
        trailingTrivia,
        rangeWithTrivia: mergeRanges(leadingTrivia[0]?.range, token.range, trailingTrivia[trailingTrivia.length - 1]?.range),
    }
}

/**
 * tokens we don't understand (or deliberately don't model, like attribute lists), kept verbatim
 */
export interface SkippedTokens extends NodeBase {
    kind: NodeKind.skippedTokens,
    terminals: Terminal[],
}

export function SkippedTokens(terminals: Terminal[], isError: boolean) : SkippedTokens {
    const v : SkippedTokens = {
        ...NodeBase(NodeKind.skippedTokens, mergeRanges(terminals)),
        kind: NodeKind.skippedTokens,
        terminals,
    }
    if (isError) {
        v.flags |= NodeFlags.error;
    }
    return v;
}

//
// declarations
//

export interface UsingDirective extends NodeBase {
    kind: NodeKind.usingDirective,
    globalKeyword: Terminal | null,
    usingKeyword: Terminal,
    staticKeyword: Terminal | null,
    alias: {name: Terminal, equals: Terminal} | null,
    name: TypeNode,
    semicolon: Terminal,
}

export function UsingDirective(globalKeyword: Terminal | null, usingKeyword: Terminal, staticKeyword: Terminal | null, alias: UsingDirective["alias"], name: TypeNode, semicolon: Terminal) : UsingDirective {
    return {
        ...NodeBase(NodeKind.usingDirective, mergeRanges(globalKeyword, usingKeyword, semicolon)),
        kind: NodeKind.usingDirective,
        globalKeyword, usingKeyword, staticKeyword, alias, name, semicolon,
    }
}

export interface NamespaceDeclaration extends NodeBase {
    kind: NodeKind.namespaceDeclaration,
    namespaceKeyword: Terminal,
    name: NameNode,
    // file scoped namespaces have a semicolon and no braces
    leftBrace: Terminal | null,
    semicolon: Terminal | null,
    members: Node[],
    rightBrace: Terminal | null,
}

export function NamespaceDeclaration(namespaceKeyword: Terminal, name: NameNode, leftBrace: Terminal | null, semicolon: Terminal | null, members: Node[], rightBrace: Terminal | null) : NamespaceDeclaration {
    return {
        ...NodeBase(NodeKind.namespaceDeclaration, mergeRanges(namespaceKeyword, semicolon, leftBrace, members, rightBrace)),
        kind: NodeKind.namespaceDeclaration,
        namespaceKeyword, name, leftBrace, semicolon, members, rightBrace,
    }
}

export interface TypeDeclaration extends NodeBase {
    kind: NodeKind.typeDeclaration,
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    keyword: Terminal,
    // `record class`, `record struct`
    secondKeyword: Terminal | null,
    identifier: Terminal,
    // type parameters, primary constructor, base list, constraints
    header: SkippedTokens | null,
    leftBrace: Terminal | null,
    members: Node[],
    rightBrace: Terminal | null,
    semicolon: Terminal | null,
}

export function TypeDeclaration(
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    keyword: Terminal,
    secondKeyword: Terminal | null,
    identifier: Terminal,
    header: SkippedTokens | null,
    leftBrace: Terminal | null,
    members: Node[],
    rightBrace: Terminal | null,
    semicolon: Terminal | null) : TypeDeclaration {
    return {
        ...NodeBase(NodeKind.typeDeclaration, mergeRanges(attributes, modifiers, keyword, leftBrace, rightBrace, semicolon)),
        kind: NodeKind.typeDeclaration,
        attributes, modifiers, keyword, secondKeyword, identifier, header, leftBrace, members, rightBrace, semicolon,
    }
}

interface FunctionBodyParts {
    body: Block | null,
    expressionBody: ArrowExpressionClause | null,
    semicolon: Terminal | null,
}

export interface MethodDeclaration extends NodeBase, FunctionBodyParts {
    kind: NodeKind.methodDeclaration,
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    returnType: TypeNode,
    identifier: Terminal,
    typeParameters: SkippedTokens | null,
    parameterList: ParameterList,
    constraints: SkippedTokens | null,
}

export function MethodDeclaration(
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    returnType: TypeNode,
    identifier: Terminal,
    typeParameters: SkippedTokens | null,
    parameterList: ParameterList,
    constraints: SkippedTokens | null,
    bodyParts: FunctionBodyParts) : MethodDeclaration {
    return {
        ...NodeBase(NodeKind.methodDeclaration, mergeRanges(attributes, modifiers, returnType, parameterList, bodyParts.body, bodyParts.expressionBody, bodyParts.semicolon)),
        kind: NodeKind.methodDeclaration,
        attributes, modifiers, returnType, identifier, typeParameters, parameterList, constraints,
        ...bodyParts,
    }
}

export interface ConstructorDeclaration extends NodeBase, FunctionBodyParts {
    kind: NodeKind.constructorDeclaration,
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    identifier: Terminal,
    parameterList: ParameterList,
    // `: base(...)`, `: this(...)`
    initializer: SkippedTokens | null,
}

export function ConstructorDeclaration(
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    identifier: Terminal,
    parameterList: ParameterList,
    initializer: SkippedTokens | null,
    bodyParts: FunctionBodyParts) : ConstructorDeclaration {
    return {
        ...NodeBase(NodeKind.constructorDeclaration, mergeRanges(attributes, modifiers, identifier, parameterList, bodyParts.body, bodyParts.expressionBody, bodyParts.semicolon)),
        kind: NodeKind.constructorDeclaration,
        attributes, modifiers, identifier, parameterList, initializer,
        ...bodyParts,
    }
}

export interface FieldDeclaration extends NodeBase {
    kind: NodeKind.fieldDeclaration,
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    declaration: VariableDeclaration,
    semicolon: Terminal,
}

export function FieldDeclaration(attributes: SkippedTokens[], modifiers: Terminal[], declaration: VariableDeclaration, semicolon: Terminal) : FieldDeclaration {
    return {
        ...NodeBase(NodeKind.fieldDeclaration, mergeRanges(attributes, modifiers, declaration, semicolon)),
        kind: NodeKind.fieldDeclaration,
        attributes, modifiers, declaration, semicolon,
    }
}

export interface PropertyDeclaration extends NodeBase {
    kind: NodeKind.propertyDeclaration,
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    type: TypeNode,
    identifier: Terminal,
    accessorList: AccessorList | null,
    expressionBody: ArrowExpressionClause | null,
    initializer: EqualsValueClause | null,
    semicolon: Terminal | null,
}

export function PropertyDeclaration(
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    type: TypeNode,
    identifier: Terminal,
    accessorList: AccessorList | null,
    expressionBody: ArrowExpressionClause | null,
    initializer: EqualsValueClause | null,
    semicolon: Terminal | null) : PropertyDeclaration {
    return {
        ...NodeBase(NodeKind.propertyDeclaration, mergeRanges(attributes, modifiers, type, accessorList, expressionBody, initializer, semicolon)),
        kind: NodeKind.propertyDeclaration,
        attributes, modifiers, type, identifier, accessorList, expressionBody, initializer, semicolon,
    }
}

export interface AccessorList extends NodeBase {
    kind: NodeKind.accessorList,
    leftBrace: Terminal,
    accessors: AccessorDeclaration[],
    rightBrace: Terminal,
}

export function AccessorList(leftBrace: Terminal, accessors: AccessorDeclaration[], rightBrace: Terminal) : AccessorList {
    return {
        ...NodeBase(NodeKind.accessorList, mergeRanges(leftBrace, rightBrace)),
        kind: NodeKind.accessorList,
        leftBrace, accessors, rightBrace,
    }
}

export interface AccessorDeclaration extends NodeBase, FunctionBodyParts {
    kind: NodeKind.accessorDeclaration,
    modifiers: Terminal[],
    // get | set | init | add | remove
    keyword: Terminal,
}

export function AccessorDeclaration(modifiers: Terminal[], keyword: Terminal, bodyParts: FunctionBodyParts) : AccessorDeclaration {
    return {
        ...NodeBase(NodeKind.accessorDeclaration, mergeRanges(modifiers, keyword, bodyParts.body, bodyParts.expressionBody, bodyParts.semicolon)),
        kind: NodeKind.accessorDeclaration,
        modifiers, keyword,
        ...bodyParts,
    }
}

export interface ParameterList extends NodeBase {
    kind: NodeKind.parameterList,
    leftParen: Terminal,
    parameters: Parameter[],
    separators: Terminal[],
    rightParen: Terminal,
}

export function ParameterList(leftParen: Terminal, parameters: Parameter[], separators: Terminal[], rightParen: Terminal) : ParameterList {
    return {
        ...NodeBase(NodeKind.parameterList, mergeRanges(leftParen, rightParen)),
        kind: NodeKind.parameterList,
        leftParen, parameters, separators, rightParen,
    }
}

export interface Parameter extends NodeBase {
    kind: NodeKind.parameter,
    attributes: SkippedTokens[],
    modifiers: Terminal[],
    // null for implicitly typed lambda parameters
    type: TypeNode | null,
    identifier: Terminal,
    defaultValue: EqualsValueClause | null,
}

export function Parameter(attributes: SkippedTokens[], modifiers: Terminal[], type: TypeNode | null, identifier: Terminal, defaultValue: EqualsValueClause | null) : Parameter {
    return {
        ...NodeBase(NodeKind.parameter, mergeRanges(attributes, modifiers, type, identifier, defaultValue)),
        kind: NodeKind.parameter,
        attributes, modifiers, type, identifier, defaultValue,
    }
}

export interface ArrowExpressionClause extends NodeBase {
    kind: NodeKind.arrowExpressionClause,
    arrow: Terminal,
    expression: Expression,
}

export function ArrowExpressionClause(arrow: Terminal, expression: Expression) : ArrowExpressionClause {
    return {
        ...NodeBase(NodeKind.arrowExpressionClause, mergeRanges(arrow, expression)),
        kind: NodeKind.arrowExpressionClause,
        arrow, expression,
    }
}

export interface VariableDeclaration extends NodeBase {
    kind: NodeKind.variableDeclaration,
    type: TypeNode,
    variables: VariableDeclarator[],
    separators: Terminal[],
}

export function VariableDeclaration(type: TypeNode, variables: VariableDeclarator[], separators: Terminal[]) : VariableDeclaration {
    return {
        ...NodeBase(NodeKind.variableDeclaration, mergeRanges(type, variables)),
        kind: NodeKind.variableDeclaration,
        type, variables, separators,
    }
}

export interface VariableDeclarator extends NodeBase {
    kind: NodeKind.variableDeclarator,
    identifier: Terminal,
    initializer: EqualsValueClause | null,
}

export function VariableDeclarator(identifier: Terminal, initializer: EqualsValueClause | null) : VariableDeclarator {
    return {
        ...NodeBase(NodeKind.variableDeclarator, mergeRanges(identifier, initializer)),
        kind: NodeKind.variableDeclarator,
        identifier, initializer,
    }
}

export interface EqualsValueClause extends NodeBase {
    kind: NodeKind.equalsValueClause,
    equals: Terminal,
    value: Expression,
}

export function EqualsValueClause(equals: Terminal, value: Expression) : EqualsValueClause {
    return {
        ...NodeBase(NodeKind.equalsValueClause, mergeRanges(equals, value)),
        kind: NodeKind.equalsValueClause,
        equals, value,
    }
}

//
// types
//

export interface PredefinedType extends NodeBase {
    kind: NodeKind.predefinedType,
    keyword: Terminal,
}

export function PredefinedType(keyword: Terminal) : PredefinedType {
    return {
        ...NodeBase(NodeKind.predefinedType, keyword.range),
        kind: NodeKind.predefinedType,
        keyword,
    }
}

export interface IdentifierName extends NodeBase {
    kind: NodeKind.identifierName,
    identifier: Terminal,
}

export function IdentifierName(identifier: Terminal) : IdentifierName {
    return {
        ...NodeBase(NodeKind.identifierName, identifier.range),
        kind: NodeKind.identifierName,
        identifier,
    }
}

export interface GenericName extends NodeBase {
    kind: NodeKind.genericName,
    identifier: Terminal,
    typeArgumentList: TypeArgumentList,
}

export function GenericName(identifier: Terminal, typeArgumentList: TypeArgumentList) : GenericName {
    return {
        ...NodeBase(NodeKind.genericName, mergeRanges(identifier, typeArgumentList)),
        kind: NodeKind.genericName,
        identifier, typeArgumentList,
    }
}

export interface TypeArgumentList extends NodeBase {
    kind: NodeKind.typeArgumentList,
    leftAngle: Terminal,
    args: TypeNode[],
    separators: Terminal[],
    rightAngle: Terminal,
}

export function TypeArgumentList(leftAngle: Terminal, args: TypeNode[], separators: Terminal[], rightAngle: Terminal) : TypeArgumentList {
    return {
        ...NodeBase(NodeKind.typeArgumentList, mergeRanges(leftAngle, rightAngle)),
        kind: NodeKind.typeArgumentList,
        leftAngle, args, separators, rightAngle,
    }
}

export interface QualifiedName extends NodeBase {
    kind: NodeKind.qualifiedName,
    left: NameNode,
    // `.`, or `::` for `global::`
    dot: Terminal,
    right: IdentifierName | GenericName,
}

export function QualifiedName(left: NameNode, dot: Terminal, right: IdentifierName | GenericName) : QualifiedName {
    return {
        ...NodeBase(NodeKind.qualifiedName, mergeRanges(left, right)),
        kind: NodeKind.qualifiedName,
        left, dot, right,
    }
}

export interface ArrayType extends NodeBase {
    kind: NodeKind.arrayType,
    elementType: TypeNode,
    rankSpecifiers: ArrayRankSpecifier[],
}

export function ArrayType(elementType: TypeNode, rankSpecifiers: ArrayRankSpecifier[]) : ArrayType {
    return {
        ...NodeBase(NodeKind.arrayType, mergeRanges(elementType, rankSpecifiers)),
        kind: NodeKind.arrayType,
        elementType, rankSpecifiers,
    }
}

export interface ArrayRankSpecifier extends NodeBase {
    kind: NodeKind.arrayRankSpecifier,
    leftBracket: Terminal,
    // sizes are only present in array creation expressions, `new int[3]`
    sizes: Expression[],
    separators: Terminal[],
    rightBracket: Terminal,
}

export function ArrayRankSpecifier(leftBracket: Terminal, sizes: Expression[], separators: Terminal[], rightBracket: Terminal) : ArrayRankSpecifier {
    return {
        ...NodeBase(NodeKind.arrayRankSpecifier, mergeRanges(leftBracket, rightBracket)),
        kind: NodeKind.arrayRankSpecifier,
        leftBracket, sizes, separators, rightBracket,
    }
}

export interface NullableType extends NodeBase {
    kind: NodeKind.nullableType,
    elementType: TypeNode,
    questionMark: Terminal,
}

export function NullableType(elementType: TypeNode, questionMark: Terminal) : NullableType {
    return {
        ...NodeBase(NodeKind.nullableType, mergeRanges(elementType, questionMark)),
        kind: NodeKind.nullableType,
        elementType, questionMark,
    }
}

//
// statements
//

export interface Block extends NodeBase {
    kind: NodeKind.block,
    leftBrace: Terminal,
    statements: Statement[],
    rightBrace: Terminal,
}

export function Block(leftBrace: Terminal, statements: Statement[], rightBrace: Terminal) : Block {
    return {
        ...NodeBase(NodeKind.block, mergeRanges(leftBrace, statements, rightBrace)),
        kind: NodeKind.block,
        leftBrace, statements, rightBrace,
    }
}

export interface ForEachStatement extends NodeBase {
    kind: NodeKind.forEachStatement,
    forEachKeyword: Terminal,
    leftParen: Terminal,
    type: TypeNode,
    // exactly one of `identifier` and `designation` is non-null; `foreach (var (a, b) in ...)` has a designation
    identifier: Terminal | null,
    designation: ParenthesizedDesignation | null,
    inKeyword: Terminal,
    expression: Expression,
    rightParen: Terminal,
    statement: Statement,
}

export function ForEachStatement(
    forEachKeyword: Terminal,
    leftParen: Terminal,
    type: TypeNode,
    identifier: Terminal | null,
    designation: ParenthesizedDesignation | null,
    inKeyword: Terminal,
    expression: Expression,
    rightParen: Terminal,
    statement: Statement) : ForEachStatement {
    return {
        ...NodeBase(NodeKind.forEachStatement, mergeRanges(forEachKeyword, statement)),
        kind: NodeKind.forEachStatement,
        forEachKeyword, leftParen, type, identifier, designation, inKeyword, expression, rightParen, statement,
    }
}

export interface ParenthesizedDesignation extends NodeBase {
    kind: NodeKind.parenthesizedDesignation,
    leftParen: Terminal,
    identifiers: Terminal[],
    separators: Terminal[],
    rightParen: Terminal,
}

export function ParenthesizedDesignation(leftParen: Terminal, identifiers: Terminal[], separators: Terminal[], rightParen: Terminal) : ParenthesizedDesignation {
    return {
        ...NodeBase(NodeKind.parenthesizedDesignation, mergeRanges(leftParen, rightParen)),
        kind: NodeKind.parenthesizedDesignation,
        leftParen, identifiers, separators, rightParen,
    }
}

export interface IfStatement extends NodeBase {
    kind: NodeKind.ifStatement,
    ifKeyword: Terminal,
    leftParen: Terminal,
    condition: Expression,
    rightParen: Terminal,
    statement: Statement,
    elseClause: ElseClause | null,
}

export function IfStatement(ifKeyword: Terminal, leftParen: Terminal, condition: Expression, rightParen: Terminal, statement: Statement, elseClause: ElseClause | null) : IfStatement {
    return {
        ...NodeBase(NodeKind.ifStatement, mergeRanges(ifKeyword, statement, elseClause)),
        kind: NodeKind.ifStatement,
        ifKeyword, leftParen, condition, rightParen, statement, elseClause,
    }
}

export interface ElseClause extends NodeBase {
    kind: NodeKind.elseClause,
    elseKeyword: Terminal,
    statement: Statement,
}

export function ElseClause(elseKeyword: Terminal, statement: Statement) : ElseClause {
    return {
        ...NodeBase(NodeKind.elseClause, mergeRanges(elseKeyword, statement)),
        kind: NodeKind.elseClause,
        elseKeyword, statement,
    }
}

export interface LocalDeclarationStatement extends NodeBase {
    kind: NodeKind.localDeclarationStatement,
    // const, using, await using
    modifiers: Terminal[],
    declaration: VariableDeclaration,
    semicolon: Terminal,
}

export function LocalDeclarationStatement(modifiers: Terminal[], declaration: VariableDeclaration, semicolon: Terminal) : LocalDeclarationStatement {
    return {
        ...NodeBase(NodeKind.localDeclarationStatement, mergeRanges(modifiers, declaration, semicolon)),
        kind: NodeKind.localDeclarationStatement,
        modifiers, declaration, semicolon,
    }
}

export interface EmptyStatement extends NodeBase {
    kind: NodeKind.emptyStatement,
    semicolon: Terminal,
}

export function EmptyStatement(semicolon: Terminal) : EmptyStatement {
    return {
        ...NodeBase(NodeKind.emptyStatement, semicolon.range),
        kind: NodeKind.emptyStatement,
        semicolon,
    }
}

export interface ExpressionStatement extends NodeBase {
    kind: NodeKind.expressionStatement,
    expression: Expression,
    semicolon: Terminal,
}

export function ExpressionStatement(expression: Expression, semicolon: Terminal) : ExpressionStatement {
    return {
        ...NodeBase(NodeKind.expressionStatement, mergeRanges(expression, semicolon)),
        kind: NodeKind.expressionStatement,
        expression, semicolon,
    }
}

export const enum YieldStatementType { yieldReturn, yieldBreak }

export interface YieldStatement extends NodeBase {
    kind: NodeKind.yieldStatement,
    subType: YieldStatementType,
    yieldKeyword: Terminal,
    returnOrBreakKeyword: Terminal,
    // null for `yield break`
    expression: Expression | null,
    semicolon: Terminal,
}

export function YieldStatement(yieldKeyword: Terminal, returnOrBreakKeyword: Terminal, expression: Expression | null, semicolon: Terminal) : YieldStatement {
    return {
        ...NodeBase(NodeKind.yieldStatement, mergeRanges(yieldKeyword, semicolon)),
        kind: NodeKind.yieldStatement,
        subType: returnOrBreakKeyword.token.type === TokenType.KW_BREAK ? YieldStatementType.yieldBreak : YieldStatementType.yieldReturn,
        yieldKeyword, returnOrBreakKeyword, expression, semicolon,
    }
}

export interface ReturnStatement extends NodeBase {
    kind: NodeKind.returnStatement,
    returnKeyword: Terminal,
    expression: Expression | null,
    semicolon: Terminal,
}

export function ReturnStatement(returnKeyword: Terminal, expression: Expression | null, semicolon: Terminal) : ReturnStatement {
    return {
        ...NodeBase(NodeKind.returnStatement, mergeRanges(returnKeyword, semicolon)),
        kind: NodeKind.returnStatement,
        returnKeyword, expression, semicolon,
    }
}

export interface BreakStatement extends NodeBase {
    kind: NodeKind.breakStatement,
    breakKeyword: Terminal,
    semicolon: Terminal,
}

export function BreakStatement(breakKeyword: Terminal, semicolon: Terminal) : BreakStatement {
    return {
        ...NodeBase(NodeKind.breakStatement, mergeRanges(breakKeyword, semicolon)),
        kind: NodeKind.breakStatement,
        breakKeyword, semicolon,
    }
}

export interface ContinueStatement extends NodeBase {
    kind: NodeKind.continueStatement,
    continueKeyword: Terminal,
    semicolon: Terminal,
}

export function ContinueStatement(continueKeyword: Terminal, semicolon: Terminal) : ContinueStatement {
    return {
        ...NodeBase(NodeKind.continueStatement, mergeRanges(continueKeyword, semicolon)),
        kind: NodeKind.continueStatement,
        continueKeyword, semicolon,
    }
}

export interface ThrowStatement extends NodeBase {
    kind: NodeKind.throwStatement,
    throwKeyword: Terminal,
    expression: Expression | null,
    semicolon: Terminal,
}

export function ThrowStatement(throwKeyword: Terminal, expression: Expression | null, semicolon: Terminal) : ThrowStatement {
    return {
        ...NodeBase(NodeKind.throwStatement, mergeRanges(throwKeyword, semicolon)),
        kind: NodeKind.throwStatement,
        throwKeyword, expression, semicolon,
    }
}

export interface WhileStatement extends NodeBase {
    kind: NodeKind.whileStatement,
    whileKeyword: Terminal,
    leftParen: Terminal,
    condition: Expression,
    rightParen: Terminal,
    statement: Statement,
}

export function WhileStatement(whileKeyword: Terminal, leftParen: Terminal, condition: Expression, rightParen: Terminal, statement: Statement) : WhileStatement {
    return {
        ...NodeBase(NodeKind.whileStatement, mergeRanges(whileKeyword, statement)),
        kind: NodeKind.whileStatement,
        whileKeyword, leftParen, condition, rightParen, statement,
    }
}

export interface DoStatement extends NodeBase {
    kind: NodeKind.doStatement,
    doKeyword: Terminal,
    statement: Statement,
    whileKeyword: Terminal,
    leftParen: Terminal,
    condition: Expression,
    rightParen: Terminal,
    semicolon: Terminal,
}

export function DoStatement(doKeyword: Terminal, statement: Statement, whileKeyword: Terminal, leftParen: Terminal, condition: Expression, rightParen: Terminal, semicolon: Terminal) : DoStatement {
    return {
        ...NodeBase(NodeKind.doStatement, mergeRanges(doKeyword, semicolon)),
        kind: NodeKind.doStatement,
        doKeyword, statement, whileKeyword, leftParen, condition, rightParen, semicolon,
    }
}

export interface ForStatement extends NodeBase {
    kind: NodeKind.forStatement,
    forKeyword: Terminal,
    leftParen: Terminal,
    declaration: VariableDeclaration | null,
    initializers: Expression[],
    initializerSeparators: Terminal[],
    firstSemicolon: Terminal,
    condition: Expression | null,
    secondSemicolon: Terminal,
    incrementors: Expression[],
    incrementorSeparators: Terminal[],
    rightParen: Terminal,
    statement: Statement,
}

export function ForStatement(
    forKeyword: Terminal,
    leftParen: Terminal,
    declaration: VariableDeclaration | null,
    initializers: Expression[],
    initializerSeparators: Terminal[],
    firstSemicolon: Terminal,
    condition: Expression | null,
    secondSemicolon: Terminal,
    incrementors: Expression[],
    incrementorSeparators: Terminal[],
    rightParen: Terminal,
    statement: Statement) : ForStatement {
    return {
        ...NodeBase(NodeKind.forStatement, mergeRanges(forKeyword, statement)),
        kind: NodeKind.forStatement,
        forKeyword, leftParen, declaration, initializers, initializerSeparators, firstSemicolon,
        condition, secondSemicolon, incrementors, incrementorSeparators, rightParen, statement,
    }
}

export interface LocalFunctionStatement extends NodeBase, FunctionBodyParts {
    kind: NodeKind.localFunctionStatement,
    modifiers: Terminal[],
    returnType: TypeNode,
    identifier: Terminal,
    typeParameters: SkippedTokens | null,
    parameterList: ParameterList,
    constraints: SkippedTokens | null,
}

export function LocalFunctionStatement(
    modifiers: Terminal[],
    returnType: TypeNode,
    identifier: Terminal,
    typeParameters: SkippedTokens | null,
    parameterList: ParameterList,
    constraints: SkippedTokens | null,
    bodyParts: FunctionBodyParts) : LocalFunctionStatement {
    return {
        ...NodeBase(NodeKind.localFunctionStatement, mergeRanges(modifiers, returnType, parameterList, bodyParts.body, bodyParts.expressionBody, bodyParts.semicolon)),
        kind: NodeKind.localFunctionStatement,
        modifiers, returnType, identifier, typeParameters, parameterList, constraints,
        ...bodyParts,
    }
}

export interface TryStatement extends NodeBase {
    kind: NodeKind.tryStatement,
    tryKeyword: Terminal,
    block: Block,
    catches: CatchClause[],
    finallyClause: FinallyClause | null,
}

export function TryStatement(tryKeyword: Terminal, block: Block, catches: CatchClause[], finallyClause: FinallyClause | null) : TryStatement {
    return {
        ...NodeBase(NodeKind.tryStatement, mergeRanges(tryKeyword, block, catches, finallyClause)),
        kind: NodeKind.tryStatement,
        tryKeyword, block, catches, finallyClause,
    }
}

export interface CatchClause extends NodeBase {
    kind: NodeKind.catchClause,
    catchKeyword: Terminal,
    declaration: CatchDeclaration | null,
    // `when (...)`
    filter: SkippedTokens | null,
    block: Block,
}

export function CatchClause(catchKeyword: Terminal, declaration: CatchDeclaration | null, filter: SkippedTokens | null, block: Block) : CatchClause {
    return {
        ...NodeBase(NodeKind.catchClause, mergeRanges(catchKeyword, block)),
        kind: NodeKind.catchClause,
        catchKeyword, declaration, filter, block,
    }
}

export interface CatchDeclaration extends NodeBase {
    kind: NodeKind.catchDeclaration,
    leftParen: Terminal,
    type: TypeNode,
    identifier: Terminal | null,
    rightParen: Terminal,
}

export function CatchDeclaration(leftParen: Terminal, type: TypeNode, identifier: Terminal | null, rightParen: Terminal) : CatchDeclaration {
    return {
        ...NodeBase(NodeKind.catchDeclaration, mergeRanges(leftParen, rightParen)),
        kind: NodeKind.catchDeclaration,
        leftParen, type, identifier, rightParen,
    }
}

export interface FinallyClause extends NodeBase {
    kind: NodeKind.finallyClause,
    finallyKeyword: Terminal,
    block: Block,
}

export function FinallyClause(finallyKeyword: Terminal, block: Block) : FinallyClause {
    return {
        ...NodeBase(NodeKind.finallyClause, mergeRanges(finallyKeyword, block)),
        kind: NodeKind.finallyClause,
        finallyKeyword, block,
    }
}

export interface SwitchStatement extends NodeBase {
    kind: NodeKind.switchStatement,
    switchKeyword: Terminal,
    leftParen: Terminal,
    expression: Expression,
    rightParen: Terminal,
    leftBrace: Terminal,
    sections: SwitchSection[],
    rightBrace: Terminal,
}

export function SwitchStatement(switchKeyword: Terminal, leftParen: Terminal, expression: Expression, rightParen: Terminal, leftBrace: Terminal, sections: SwitchSection[], rightBrace: Terminal) : SwitchStatement {
    return {
        ...NodeBase(NodeKind.switchStatement, mergeRanges(switchKeyword, rightBrace)),
        kind: NodeKind.switchStatement,
        switchKeyword, leftParen, expression, rightParen, leftBrace, sections, rightBrace,
    }
}

export interface SwitchSection extends NodeBase {
    kind: NodeKind.switchSection,
    labels: (CaseSwitchLabel | DefaultSwitchLabel)[],
    statements: Statement[],
}

export function SwitchSection(labels: (CaseSwitchLabel | DefaultSwitchLabel)[], statements: Statement[]) : SwitchSection {
    return {
        ...NodeBase(NodeKind.switchSection, mergeRanges(labels, statements)),
        kind: NodeKind.switchSection,
        labels, statements,
    }
}

export interface CaseSwitchLabel extends NodeBase {
    kind: NodeKind.caseSwitchLabel,
    caseKeyword: Terminal,
    value: Expression,
    colon: Terminal,
}

export function CaseSwitchLabel(caseKeyword: Terminal, value: Expression, colon: Terminal) : CaseSwitchLabel {
    return {
        ...NodeBase(NodeKind.caseSwitchLabel, mergeRanges(caseKeyword, colon)),
        kind: NodeKind.caseSwitchLabel,
        caseKeyword, value, colon,
    }
}

export interface DefaultSwitchLabel extends NodeBase {
    kind: NodeKind.defaultSwitchLabel,
    defaultKeyword: Terminal,
    colon: Terminal,
}

export function DefaultSwitchLabel(defaultKeyword: Terminal, colon: Terminal) : DefaultSwitchLabel {
    return {
        ...NodeBase(NodeKind.defaultSwitchLabel, mergeRanges(defaultKeyword, colon)),
        kind: NodeKind.defaultSwitchLabel,
        defaultKeyword, colon,
    }
}

export interface UsingStatement extends NodeBase {
    kind: NodeKind.usingStatement,
    usingKeyword: Terminal,
    leftParen: Terminal,
    declaration: VariableDeclaration | null,
    expression: Expression | null,
    rightParen: Terminal,
    statement: Statement,
}

export function UsingStatement(usingKeyword: Terminal, leftParen: Terminal, declaration: VariableDeclaration | null, expression: Expression | null, rightParen: Terminal, statement: Statement) : UsingStatement {
    return {
        ...NodeBase(NodeKind.usingStatement, mergeRanges(usingKeyword, statement)),
        kind: NodeKind.usingStatement,
        usingKeyword, leftParen, declaration, expression, rightParen, statement,
    }
}

export interface LockStatement extends NodeBase {
    kind: NodeKind.lockStatement,
    lockKeyword: Terminal,
    leftParen: Terminal,
    expression: Expression,
    rightParen: Terminal,
    statement: Statement,
}

export function LockStatement(lockKeyword: Terminal, leftParen: Terminal, expression: Expression, rightParen: Terminal, statement: Statement) : LockStatement {
    return {
        ...NodeBase(NodeKind.lockStatement, mergeRanges(lockKeyword, statement)),
        kind: NodeKind.lockStatement,
        lockKeyword, leftParen, expression, rightParen, statement,
    }
}

//
// expressions
//

export const enum LiteralType { numeric, string, interpolatedString, char, true, false, null, default }

export interface LiteralExpression extends NodeBase {
    kind: NodeKind.literalExpression,
    subType: LiteralType,
    literal: Terminal,
}

export function LiteralExpression(subType: LiteralType, literal: Terminal) : LiteralExpression {
    return {
        ...NodeBase(NodeKind.literalExpression, literal.range),
        kind: NodeKind.literalExpression,
        subType, literal,
    }
}

export interface ThisExpression extends NodeBase {
    kind: NodeKind.thisExpression,
    keyword: Terminal,
}

export function ThisExpression(keyword: Terminal) : ThisExpression {
    return {
        ...NodeBase(NodeKind.thisExpression, keyword.range),
        kind: NodeKind.thisExpression,
        keyword,
    }
}

export interface BaseExpression extends NodeBase {
    kind: NodeKind.baseExpression,
    keyword: Terminal,
}

export function BaseExpression(keyword: Terminal) : BaseExpression {
    return {
        ...NodeBase(NodeKind.baseExpression, keyword.range),
        kind: NodeKind.baseExpression,
        keyword,
    }
}

export interface ParenthesizedExpression extends NodeBase {
    kind: NodeKind.parenthesizedExpression,
    leftParen: Terminal,
    expression: Expression,
    rightParen: Terminal,
}

export function ParenthesizedExpression(leftParen: Terminal, expression: Expression, rightParen: Terminal) : ParenthesizedExpression {
    return {
        ...NodeBase(NodeKind.parenthesizedExpression, mergeRanges(leftParen, rightParen)),
        kind: NodeKind.parenthesizedExpression,
        leftParen, expression, rightParen,
    }
}

export interface TupleExpression extends NodeBase {
    kind: NodeKind.tupleExpression,
    leftParen: Terminal,
    args: Argument[],
    separators: Terminal[],
    rightParen: Terminal,
}

export function TupleExpression(leftParen: Terminal, args: Argument[], separators: Terminal[], rightParen: Terminal) : TupleExpression {
    return {
        ...NodeBase(NodeKind.tupleExpression, mergeRanges(leftParen, rightParen)),
        kind: NodeKind.tupleExpression,
        leftParen, args, separators, rightParen,
    }
}

export interface CastExpression extends NodeBase {
    kind: NodeKind.castExpression,
    leftParen: Terminal,
    type: TypeNode,
    rightParen: Terminal,
    expression: Expression,
}

export function CastExpression(leftParen: Terminal, type: TypeNode, rightParen: Terminal, expression: Expression) : CastExpression {
    return {
        ...NodeBase(NodeKind.castExpression, mergeRanges(leftParen, expression)),
        kind: NodeKind.castExpression,
        leftParen, type, rightParen, expression,
    }
}

export interface BinaryExpression extends NodeBase {
    kind: NodeKind.binaryExpression,
    left: Expression,
    operator: Terminal,
    // a type for `as`
    right: Expression | TypeNode,
}

export function BinaryExpression(left: Expression, operator: Terminal, right: Expression | TypeNode) : BinaryExpression {
    return {
        ...NodeBase(NodeKind.binaryExpression, mergeRanges(left, right)),
        kind: NodeKind.binaryExpression,
        left, operator, right,
    }
}

export interface IsPatternExpression extends NodeBase {
    kind: NodeKind.isPatternExpression,
    expression: Expression,
    isKeyword: Terminal,
    notKeyword: Terminal | null,
    pattern: Expression | TypeNode,
    // `x is Foo f`
    designation: Terminal | null,
}

export function IsPatternExpression(expression: Expression, isKeyword: Terminal, notKeyword: Terminal | null, pattern: Expression | TypeNode, designation: Terminal | null) : IsPatternExpression {
    return {
        ...NodeBase(NodeKind.isPatternExpression, mergeRanges(expression, pattern, designation)),
        kind: NodeKind.isPatternExpression,
        expression, isKeyword, notKeyword, pattern, designation,
    }
}

export interface AssignmentExpression extends NodeBase {
    kind: NodeKind.assignmentExpression,
    left: Expression,
    operator: Terminal,
    right: Expression,
}

export function AssignmentExpression(left: Expression, operator: Terminal, right: Expression) : AssignmentExpression {
    return {
        ...NodeBase(NodeKind.assignmentExpression, mergeRanges(left, right)),
        kind: NodeKind.assignmentExpression,
        left, operator, right,
    }
}

export interface ConditionalExpression extends NodeBase {
    kind: NodeKind.conditionalExpression,
    condition: Expression,
    questionMark: Terminal,
    whenTrue: Expression,
    colon: Terminal,
    whenFalse: Expression,
}

export function ConditionalExpression(condition: Expression, questionMark: Terminal, whenTrue: Expression, colon: Terminal, whenFalse: Expression) : ConditionalExpression {
    return {
        ...NodeBase(NodeKind.conditionalExpression, mergeRanges(condition, whenFalse)),
        kind: NodeKind.conditionalExpression,
        condition, questionMark, whenTrue, colon, whenFalse,
    }
}

export interface PrefixUnaryExpression extends NodeBase {
    kind: NodeKind.prefixUnaryExpression,
    operator: Terminal,
    operand: Expression,
}

export function PrefixUnaryExpression(operator: Terminal, operand: Expression) : PrefixUnaryExpression {
    return {
        ...NodeBase(NodeKind.prefixUnaryExpression, mergeRanges(operator, operand)),
        kind: NodeKind.prefixUnaryExpression,
        operator, operand,
    }
}

export interface PostfixUnaryExpression extends NodeBase {
    kind: NodeKind.postfixUnaryExpression,
    operand: Expression,
    // `++`, `--`, or the null-forgiving `!`
    operator: Terminal,
}

export function PostfixUnaryExpression(operand: Expression, operator: Terminal) : PostfixUnaryExpression {
    return {
        ...NodeBase(NodeKind.postfixUnaryExpression, mergeRanges(operand, operator)),
        kind: NodeKind.postfixUnaryExpression,
        operand, operator,
    }
}

export interface MemberAccessExpression extends NodeBase {
    kind: NodeKind.memberAccessExpression,
    expression: Expression,
    // `.` or `?.`
    operator: Terminal,
    name: IdentifierName | GenericName,
}

export function MemberAccessExpression(expression: Expression, operator: Terminal, name: IdentifierName | GenericName) : MemberAccessExpression {
    return {
        ...NodeBase(NodeKind.memberAccessExpression, mergeRanges(expression, name)),
        kind: NodeKind.memberAccessExpression,
        expression, operator, name,
    }
}

export interface ElementAccessExpression extends NodeBase {
    kind: NodeKind.elementAccessExpression,
    expression: Expression,
    leftBracket: Terminal,
    args: Argument[],
    separators: Terminal[],
    rightBracket: Terminal,
}

export function ElementAccessExpression(expression: Expression, leftBracket: Terminal, args: Argument[], separators: Terminal[], rightBracket: Terminal) : ElementAccessExpression {
    return {
        ...NodeBase(NodeKind.elementAccessExpression, mergeRanges(expression, rightBracket)),
        kind: NodeKind.elementAccessExpression,
        expression, leftBracket, args, separators, rightBracket,
    }
}

export interface InvocationExpression extends NodeBase {
    kind: NodeKind.invocationExpression,
    expression: Expression,
    argumentList: ArgumentList,
}

export function InvocationExpression(expression: Expression, argumentList: ArgumentList) : InvocationExpression {
    return {
        ...NodeBase(NodeKind.invocationExpression, mergeRanges(expression, argumentList)),
        kind: NodeKind.invocationExpression,
        expression, argumentList,
    }
}

export interface ArgumentList extends NodeBase {
    kind: NodeKind.argumentList,
    leftParen: Terminal,
    args: Argument[],
    separators: Terminal[],
    rightParen: Terminal,
}

export function ArgumentList(leftParen: Terminal, args: Argument[], separators: Terminal[], rightParen: Terminal) : ArgumentList {
    return {
        ...NodeBase(NodeKind.argumentList, mergeRanges(leftParen, rightParen)),
        kind: NodeKind.argumentList,
        leftParen, args, separators, rightParen,
    }
}

export interface Argument extends NodeBase {
    kind: NodeKind.argument,
    nameColon: NameColon | null,
    // ref, out, in
    refKind: Terminal | null,
    expression: Expression,
}

export function Argument(nameColon: NameColon | null, refKind: Terminal | null, expression: Expression) : Argument {
    return {
        ...NodeBase(NodeKind.argument, mergeRanges(nameColon, refKind, expression)),
        kind: NodeKind.argument,
        nameColon, refKind, expression,
    }
}

export interface NameColon extends NodeBase {
    kind: NodeKind.nameColon,
    name: Terminal,
    colon: Terminal,
}

export function NameColon(name: Terminal, colon: Terminal) : NameColon {
    return {
        ...NodeBase(NodeKind.nameColon, mergeRanges(name, colon)),
        kind: NodeKind.nameColon,
        name, colon,
    }
}

/**
 * `out var x`, `out int x`
 */
export interface DeclarationExpression extends NodeBase {
    kind: NodeKind.declarationExpression,
    type: TypeNode,
    identifier: Terminal,
}

export function DeclarationExpression(type: TypeNode, identifier: Terminal) : DeclarationExpression {
    return {
        ...NodeBase(NodeKind.declarationExpression, mergeRanges(type, identifier)),
        kind: NodeKind.declarationExpression,
        type, identifier,
    }
}

export interface ObjectCreationExpression extends NodeBase {
    kind: NodeKind.objectCreationExpression,
    newKeyword: Terminal,
    // null for target-typed `new()`
    type: TypeNode | null,
    argumentList: ArgumentList | null,
    initializer: InitializerExpression | null,
}

export function ObjectCreationExpression(newKeyword: Terminal, type: TypeNode | null, argumentList: ArgumentList | null, initializer: InitializerExpression | null) : ObjectCreationExpression {
    return {
        ...NodeBase(NodeKind.objectCreationExpression, mergeRanges(newKeyword, type, argumentList, initializer)),
        kind: NodeKind.objectCreationExpression,
        newKeyword, type, argumentList, initializer,
    }
}

export interface ArrayCreationExpression extends NodeBase {
    kind: NodeKind.arrayCreationExpression,
    newKeyword: Terminal,
    // null for implicitly typed `new[] { ... }`
    elementType: TypeNode | null,
    rankSpecifiers: ArrayRankSpecifier[],
    initializer: InitializerExpression | null,
}

export function ArrayCreationExpression(newKeyword: Terminal, elementType: TypeNode | null, rankSpecifiers: ArrayRankSpecifier[], initializer: InitializerExpression | null) : ArrayCreationExpression {
    return {
        ...NodeBase(NodeKind.arrayCreationExpression, mergeRanges(newKeyword, elementType, rankSpecifiers, initializer)),
        kind: NodeKind.arrayCreationExpression,
        newKeyword, elementType, rankSpecifiers, initializer,
    }
}

export interface InitializerExpression extends NodeBase {
    kind: NodeKind.initializerExpression,
    leftBrace: Terminal,
    expressions: Expression[],
    separators: Terminal[],
    rightBrace: Terminal,
}

export function InitializerExpression(leftBrace: Terminal, expressions: Expression[], separators: Terminal[], rightBrace: Terminal) : InitializerExpression {
    return {
        ...NodeBase(NodeKind.initializerExpression, mergeRanges(leftBrace, rightBrace)),
        kind: NodeKind.initializerExpression,
        leftBrace, expressions, separators, rightBrace,
    }
}

export interface LambdaExpression extends NodeBase {
    kind: NodeKind.lambdaExpression,
    asyncKeyword: Terminal | null,
    // `x => ...` has a lone parameter, `(x, y) => ...` a list
    parameter: Parameter | null,
    parameterList: ParameterList | null,
    arrow: Terminal,
    body: Block | Expression,
}

export function LambdaExpression(asyncKeyword: Terminal | null, parameter: Parameter | null, parameterList: ParameterList | null, arrow: Terminal, body: Block | Expression) : LambdaExpression {
    return {
        ...NodeBase(NodeKind.lambdaExpression, mergeRanges(asyncKeyword, parameter, parameterList, arrow, body)),
        kind: NodeKind.lambdaExpression,
        asyncKeyword, parameter, parameterList, arrow, body,
    }
}

export interface TypeofExpression extends NodeBase {
    kind: NodeKind.typeofExpression,
    keyword: Terminal,
    leftParen: Terminal,
    type: TypeNode,
    rightParen: Terminal,
}

export function TypeofExpression(keyword: Terminal, leftParen: Terminal, type: TypeNode, rightParen: Terminal) : TypeofExpression {
    return {
        ...NodeBase(NodeKind.typeofExpression, mergeRanges(keyword, rightParen)),
        kind: NodeKind.typeofExpression,
        keyword, leftParen, type, rightParen,
    }
}

export interface DefaultExpression extends NodeBase {
    kind: NodeKind.defaultExpression,
    keyword: Terminal,
    leftParen: Terminal,
    type: TypeNode,
    rightParen: Terminal,
}

export function DefaultExpression(keyword: Terminal, leftParen: Terminal, type: TypeNode, rightParen: Terminal) : DefaultExpression {
    return {
        ...NodeBase(NodeKind.defaultExpression, mergeRanges(keyword, rightParen)),
        kind: NodeKind.defaultExpression,
        keyword, leftParen, type, rightParen,
    }
}

export interface AwaitExpression extends NodeBase {
    kind: NodeKind.awaitExpression,
    awaitKeyword: Terminal,
    expression: Expression,
}

export function AwaitExpression(awaitKeyword: Terminal, expression: Expression) : AwaitExpression {
    return {
        ...NodeBase(NodeKind.awaitExpression, mergeRanges(awaitKeyword, expression)),
        kind: NodeKind.awaitExpression,
        awaitKeyword, expression,
    }
}

export interface ThrowExpression extends NodeBase {
    kind: NodeKind.throwExpression,
    throwKeyword: Terminal,
    expression: Expression,
}

export function ThrowExpression(throwKeyword: Terminal, expression: Expression) : ThrowExpression {
    return {
        ...NodeBase(NodeKind.throwExpression, mergeRanges(throwKeyword, expression)),
        kind: NodeKind.throwExpression,
        throwKeyword, expression,
    }
}

//
// query expressions
//

export interface QueryExpression extends NodeBase {
    kind: NodeKind.queryExpression,
    fromClause: FromClause,
    body: QueryBody,
}

export function QueryExpression(fromClause: FromClause, body: QueryBody) : QueryExpression {
    return {
        ...NodeBase(NodeKind.queryExpression, mergeRanges(fromClause, body)),
        kind: NodeKind.queryExpression,
        fromClause, body,
    }
}

export interface QueryBody extends NodeBase {
    kind: NodeKind.queryBody,
    clauses: QueryClause[],
    selectOrGroup: SelectClause | GroupClause,
    continuation: QueryContinuation | null,
}

export function QueryBody(clauses: QueryClause[], selectOrGroup: SelectClause | GroupClause, continuation: QueryContinuation | null) : QueryBody {
    return {
        ...NodeBase(NodeKind.queryBody, mergeRanges(clauses, selectOrGroup, continuation)),
        kind: NodeKind.queryBody,
        clauses, selectOrGroup, continuation,
    }
}

export interface QueryContinuation extends NodeBase {
    kind: NodeKind.queryContinuation,
    intoKeyword: Terminal,
    identifier: Terminal,
    body: QueryBody,
}

export function QueryContinuation(intoKeyword: Terminal, identifier: Terminal, body: QueryBody) : QueryContinuation {
    return {
        ...NodeBase(NodeKind.queryContinuation, mergeRanges(intoKeyword, body)),
        kind: NodeKind.queryContinuation,
        intoKeyword, identifier, body,
    }
}

export interface FromClause extends NodeBase {
    kind: NodeKind.fromClause,
    fromKeyword: Terminal,
    type: TypeNode | null,
    identifier: Terminal,
    inKeyword: Terminal,
    expression: Expression,
}

export function FromClause(fromKeyword: Terminal, type: TypeNode | null, identifier: Terminal, inKeyword: Terminal, expression: Expression) : FromClause {
    return {
        ...NodeBase(NodeKind.fromClause, mergeRanges(fromKeyword, expression)),
        kind: NodeKind.fromClause,
        fromKeyword, type, identifier, inKeyword, expression,
    }
}

export interface LetClause extends NodeBase {
    kind: NodeKind.letClause,
    letKeyword: Terminal,
    identifier: Terminal,
    equals: Terminal,
    expression: Expression,
}

export function LetClause(letKeyword: Terminal, identifier: Terminal, equals: Terminal, expression: Expression) : LetClause {
    return {
        ...NodeBase(NodeKind.letClause, mergeRanges(letKeyword, expression)),
        kind: NodeKind.letClause,
        letKeyword, identifier, equals, expression,
    }
}

export interface WhereClause extends NodeBase {
    kind: NodeKind.whereClause,
    whereKeyword: Terminal,
    condition: Expression,
}

export function WhereClause(whereKeyword: Terminal, condition: Expression) : WhereClause {
    return {
        ...NodeBase(NodeKind.whereClause, mergeRanges(whereKeyword, condition)),
        kind: NodeKind.whereClause,
        whereKeyword, condition,
    }
}

export interface JoinClause extends NodeBase {
    kind: NodeKind.joinClause,
    joinKeyword: Terminal,
    type: TypeNode | null,
    identifier: Terminal,
    inKeyword: Terminal,
    inExpression: Expression,
    onKeyword: Terminal,
    leftExpression: Expression,
    equalsKeyword: Terminal,
    rightExpression: Expression,
    into: JoinIntoClause | null,
}

export function JoinClause(
    joinKeyword: Terminal,
    type: TypeNode | null,
    identifier: Terminal,
    inKeyword: Terminal,
    inExpression: Expression,
    onKeyword: Terminal,
    leftExpression: Expression,
    equalsKeyword: Terminal,
    rightExpression: Expression,
    into: JoinIntoClause | null) : JoinClause {
    return {
        ...NodeBase(NodeKind.joinClause, mergeRanges(joinKeyword, rightExpression, into)),
        kind: NodeKind.joinClause,
        joinKeyword, type, identifier, inKeyword, inExpression, onKeyword, leftExpression, equalsKeyword, rightExpression, into,
    }
}

export interface JoinIntoClause extends NodeBase {
    kind: NodeKind.joinIntoClause,
    intoKeyword: Terminal,
    identifier: Terminal,
}

export function JoinIntoClause(intoKeyword: Terminal, identifier: Terminal) : JoinIntoClause {
    return {
        ...NodeBase(NodeKind.joinIntoClause, mergeRanges(intoKeyword, identifier)),
        kind: NodeKind.joinIntoClause,
        intoKeyword, identifier,
    }
}

export interface OrderByClause extends NodeBase {
    kind: NodeKind.orderByClause,
    orderByKeyword: Terminal,
    orderings: Ordering[],
    separators: Terminal[],
}

export function OrderByClause(orderByKeyword: Terminal, orderings: Ordering[], separators: Terminal[]) : OrderByClause {
    return {
        ...NodeBase(NodeKind.orderByClause, mergeRanges(orderByKeyword, orderings)),
        kind: NodeKind.orderByClause,
        orderByKeyword, orderings, separators,
    }
}

export interface Ordering extends NodeBase {
    kind: NodeKind.ordering,
    expression: Expression,
    // ascending | descending
    direction: Terminal | null,
}

export function Ordering(expression: Expression, direction: Terminal | null) : Ordering {
    return {
        ...NodeBase(NodeKind.ordering, mergeRanges(expression, direction)),
        kind: NodeKind.ordering,
        expression, direction,
    }
}

export interface SelectClause extends NodeBase {
    kind: NodeKind.selectClause,
    selectKeyword: Terminal,
    expression: Expression,
}

export function SelectClause(selectKeyword: Terminal, expression: Expression) : SelectClause {
    return {
        ...NodeBase(NodeKind.selectClause, mergeRanges(selectKeyword, expression)),
        kind: NodeKind.selectClause,
        selectKeyword, expression,
    }
}

export interface GroupClause extends NodeBase {
    kind: NodeKind.groupClause,
    groupKeyword: Terminal,
    groupExpression: Expression,
    byKeyword: Terminal,
    byExpression: Expression,
}

export function GroupClause(groupKeyword: Terminal, groupExpression: Expression, byKeyword: Terminal, byExpression: Expression) : GroupClause {
    return {
        ...NodeBase(NodeKind.groupClause, mergeRanges(groupKeyword, byExpression)),
        kind: NodeKind.groupClause,
        groupKeyword, groupExpression, byKeyword, byExpression,
    }
}

const NodeKindUiString : Record<NodeKind, string> = {
    [NodeKind.sourceFile]: "sourceFile",
    [NodeKind.terminal]: "terminal",
    [NodeKind.skippedTokens]: "skippedTokens",
    [NodeKind.usingDirective]: "usingDirective",
    [NodeKind.namespaceDeclaration]: "namespaceDeclaration",
    [NodeKind.typeDeclaration]: "typeDeclaration",
    [NodeKind.methodDeclaration]: "methodDeclaration",
    [NodeKind.constructorDeclaration]: "constructorDeclaration",
    [NodeKind.fieldDeclaration]: "fieldDeclaration",
    [NodeKind.propertyDeclaration]: "propertyDeclaration",
    [NodeKind.accessorList]: "accessorList",
    [NodeKind.accessorDeclaration]: "accessorDeclaration",
    [NodeKind.parameterList]: "parameterList",
    [NodeKind.parameter]: "parameter",
    [NodeKind.arrowExpressionClause]: "arrowExpressionClause",
    [NodeKind.variableDeclaration]: "variableDeclaration",
    [NodeKind.variableDeclarator]: "variableDeclarator",
    [NodeKind.equalsValueClause]: "equalsValueClause",
    [NodeKind.predefinedType]: "predefinedType",
    [NodeKind.identifierName]: "identifierName",
    [NodeKind.genericName]: "genericName",
    [NodeKind.typeArgumentList]: "typeArgumentList",
    [NodeKind.qualifiedName]: "qualifiedName",
    [NodeKind.arrayType]: "arrayType",
    [NodeKind.arrayRankSpecifier]: "arrayRankSpecifier",
    [NodeKind.nullableType]: "nullableType",
    [NodeKind.block]: "block",
    [NodeKind.forEachStatement]: "forEachStatement",
    [NodeKind.parenthesizedDesignation]: "parenthesizedDesignation",
    [NodeKind.ifStatement]: "ifStatement",
    [NodeKind.elseClause]: "elseClause",
    [NodeKind.localDeclarationStatement]: "localDeclarationStatement",
    [NodeKind.emptyStatement]: "emptyStatement",
    [NodeKind.expressionStatement]: "expressionStatement",
    [NodeKind.yieldStatement]: "yieldStatement",
    [NodeKind.returnStatement]: "returnStatement",
    [NodeKind.breakStatement]: "breakStatement",
    [NodeKind.continueStatement]: "continueStatement",
    [NodeKind.throwStatement]: "throwStatement",
    [NodeKind.whileStatement]: "whileStatement",
    [NodeKind.doStatement]: "doStatement",
    [NodeKind.forStatement]: "forStatement",
    [NodeKind.localFunctionStatement]: "localFunctionStatement",
    [NodeKind.tryStatement]: "tryStatement",
    [NodeKind.catchClause]: "catchClause",
    [NodeKind.catchDeclaration]: "catchDeclaration",
    [NodeKind.finallyClause]: "finallyClause",
    [NodeKind.switchStatement]: "switchStatement",
    [NodeKind.switchSection]: "switchSection",
    [NodeKind.caseSwitchLabel]: "caseSwitchLabel",
    [NodeKind.defaultSwitchLabel]: "defaultSwitchLabel",
    [NodeKind.usingStatement]: "usingStatement",
    [NodeKind.lockStatement]: "lockStatement",
    [NodeKind.literalExpression]: "literalExpression",
    [NodeKind.thisExpression]: "thisExpression",
    [NodeKind.baseExpression]: "baseExpression",
    [NodeKind.parenthesizedExpression]: "parenthesizedExpression",
    [NodeKind.tupleExpression]: "tupleExpression",
    [NodeKind.castExpression]: "castExpression",
    [NodeKind.binaryExpression]: "binaryExpression",
    [NodeKind.isPatternExpression]: "isPatternExpression",
    [NodeKind.assignmentExpression]: "assignmentExpression",
    [NodeKind.conditionalExpression]: "conditionalExpression",
    [NodeKind.prefixUnaryExpression]: "prefixUnaryExpression",
    [NodeKind.postfixUnaryExpression]: "postfixUnaryExpression",
    [NodeKind.memberAccessExpression]: "memberAccessExpression",
    [NodeKind.elementAccessExpression]: "elementAccessExpression",
    [NodeKind.invocationExpression]: "invocationExpression",
    [NodeKind.argumentList]: "argumentList",
    [NodeKind.argument]: "argument",
    [NodeKind.nameColon]: "nameColon",
    [NodeKind.declarationExpression]: "declarationExpression",
    [NodeKind.objectCreationExpression]: "objectCreationExpression",
    [NodeKind.arrayCreationExpression]: "arrayCreationExpression",
    [NodeKind.initializerExpression]: "initializerExpression",
    [NodeKind.lambdaExpression]: "lambdaExpression",
    [NodeKind.typeofExpression]: "typeofExpression",
    [NodeKind.defaultExpression]: "defaultExpression",
    [NodeKind.awaitExpression]: "awaitExpression",
    [NodeKind.throwExpression]: "throwExpression",
    [NodeKind.queryExpression]: "queryExpression",
    [NodeKind.queryBody]: "queryBody",
    [NodeKind.queryContinuation]: "queryContinuation",
    [NodeKind.fromClause]: "fromClause",
    [NodeKind.letClause]: "letClause",
    [NodeKind.whereClause]: "whereClause",
    [NodeKind.joinClause]: "joinClause",
    [NodeKind.joinIntoClause]: "joinIntoClause",
    [NodeKind.orderByClause]: "orderByClause",
    [NodeKind.ordering]: "ordering",
    [NodeKind.selectClause]: "selectClause",
    [NodeKind.groupClause]: "groupClause",
};
