import { ForEachStatement, FunctionLike, Node, NodeId, NodeKind, SourceFile, Statement, Terminal } from "./node";
import { SourceRange } from "./scanner";

// falsy return values keep it going
function forEachNode<T>(nodeList: readonly (Node | null)[], f: (node: Node | null) => T) : T | undefined {
    for (let i = 0; i < nodeList.length; i++) {
        const result = f(nodeList[i]);
        if (result) return result;
    }
    return undefined;
}

// `a, b, c` visits a , b , c in source order
function forEachSeparated<T>(elements: readonly Node[], separators: readonly Terminal[], f: (node: Node | null) => T) : T | undefined {
    for (let i = 0; i < elements.length; i++) {
        const result = f(elements[i]) || (i < separators.length ? f(separators[i]) : undefined);
        if (result) return result;
    }
    // a trailing separator, as in `{1, 2,}`
    for (let i = elements.length; i < separators.length; i++) {
        const result = f(separators[i]);
        if (result) return result;
    }
    return undefined;
}

function forEachBodyPart<T>(node: {body: Node | null, expressionBody: Node | null, semicolon: Node | null}, f: (node: Node | null) => T) : T | undefined {
    return f(node.body) || f(node.expressionBody) || f(node.semicolon) || undefined;
}

/**
 * visit the direct children of a node, in source order; a truthy value returned by the visitor stops the walk and is returned
 */
export function visit(node: Node | Node[], visitor: (arg: Node | null) => unknown) : unknown {
    if (Array.isArray(node)) {
        return forEachNode(node, visitor);
    }
    switch (node.kind) {
        case NodeKind.terminal:
            // bottomed out; trivia is not a node
            return;
        case NodeKind.sourceFile:
            return forEachNode(node.content, visitor)
                || visitor(node.endOfFile);
        case NodeKind.skippedTokens:
            return forEachNode(node.terminals, visitor);
        case NodeKind.usingDirective:
            return visitor(node.globalKeyword)
                || visitor(node.usingKeyword)
                || visitor(node.staticKeyword)
                || (node.alias ? visitor(node.alias.name) || visitor(node.alias.equals) : undefined)
                || visitor(node.name)
                || visitor(node.semicolon);
        case NodeKind.namespaceDeclaration:
            return visitor(node.namespaceKeyword)
                || visitor(node.name)
                || (node.leftBrace ? undefined : visitor(node.semicolon))
                || visitor(node.leftBrace)
                || forEachNode(node.members, visitor)
                || visitor(node.rightBrace)
                || (node.leftBrace ? visitor(node.semicolon) : undefined);
        case NodeKind.typeDeclaration:
            return forEachNode(node.attributes, visitor)
                || forEachNode(node.modifiers, visitor)
                || visitor(node.keyword)
                || visitor(node.secondKeyword)
                || visitor(node.identifier)
                || visitor(node.header)
                || visitor(node.leftBrace)
                || forEachNode(node.members, visitor)
                || visitor(node.rightBrace)
                || visitor(node.semicolon);
        case NodeKind.methodDeclaration:
            return forEachNode(node.attributes, visitor)
                || forEachNode(node.modifiers, visitor)
                || visitor(node.returnType)
                || visitor(node.identifier)
                || visitor(node.typeParameters)
                || visitor(node.parameterList)
                || visitor(node.constraints)
                || forEachBodyPart(node, visitor);
        case NodeKind.constructorDeclaration:
            return forEachNode(node.attributes, visitor)
                || forEachNode(node.modifiers, visitor)
                || visitor(node.identifier)
                || visitor(node.parameterList)
                || visitor(node.initializer)
                || forEachBodyPart(node, visitor);
        case NodeKind.fieldDeclaration:
            return forEachNode(node.attributes, visitor)
                || forEachNode(node.modifiers, visitor)
                || visitor(node.declaration)
                || visitor(node.semicolon);
        case NodeKind.propertyDeclaration:
            return forEachNode(node.attributes, visitor)
                || forEachNode(node.modifiers, visitor)
                || visitor(node.type)
                || visitor(node.identifier)
                || visitor(node.accessorList)
                || visitor(node.expressionBody)
                || visitor(node.initializer)
                || visitor(node.semicolon);
        case NodeKind.accessorList:
            return visitor(node.leftBrace)
                || forEachNode(node.accessors, visitor)
                || visitor(node.rightBrace);
        case NodeKind.accessorDeclaration:
            return forEachNode(node.modifiers, visitor)
                || visitor(node.keyword)
                || forEachBodyPart(node, visitor);
        case NodeKind.parameterList:
            return visitor(node.leftParen)
                || forEachSeparated(node.parameters, node.separators, visitor)
                || visitor(node.rightParen);
        case NodeKind.parameter:
            return forEachNode(node.attributes, visitor)
                || forEachNode(node.modifiers, visitor)
                || visitor(node.type)
                || visitor(node.identifier)
                || visitor(node.defaultValue);
        case NodeKind.arrowExpressionClause:
            return visitor(node.arrow)
                || visitor(node.expression);
        case NodeKind.variableDeclaration:
            return visitor(node.type)
                || forEachSeparated(node.variables, node.separators, visitor);
        case NodeKind.variableDeclarator:
            return visitor(node.identifier)
                || visitor(node.initializer);
        case NodeKind.equalsValueClause:
            return visitor(node.equals)
                || visitor(node.value);
        case NodeKind.predefinedType:
            return visitor(node.keyword);
        case NodeKind.identifierName:
            return visitor(node.identifier);
        case NodeKind.genericName:
            return visitor(node.identifier)
                || visitor(node.typeArgumentList);
        case NodeKind.typeArgumentList:
            return visitor(node.leftAngle)
                || forEachSeparated(node.args, node.separators, visitor)
                || visitor(node.rightAngle);
        case NodeKind.qualifiedName:
            return visitor(node.left)
                || visitor(node.dot)
                || visitor(node.right);
        case NodeKind.arrayType:
            return visitor(node.elementType)
                || forEachNode(node.rankSpecifiers, visitor);
        case NodeKind.arrayRankSpecifier:
            return visitor(node.leftBracket)
                || forEachSeparated(node.sizes, node.separators, visitor)
                || visitor(node.rightBracket);
        case NodeKind.nullableType:
            return visitor(node.elementType)
                || visitor(node.questionMark);
        case NodeKind.block:
            return visitor(node.leftBrace)
                || forEachNode(node.statements, visitor)
                || visitor(node.rightBrace);
        case NodeKind.forEachStatement:
            return visitor(node.forEachKeyword)
                || visitor(node.leftParen)
                || visitor(node.type)
                || visitor(node.identifier)
                || visitor(node.designation)
                || visitor(node.inKeyword)
                || visitor(node.expression)
                || visitor(node.rightParen)
                || visitor(node.statement);
        case NodeKind.parenthesizedDesignation:
            return visitor(node.leftParen)
                || forEachSeparated(node.identifiers, node.separators, visitor)
                || visitor(node.rightParen);
        case NodeKind.ifStatement:
            return visitor(node.ifKeyword)
                || visitor(node.leftParen)
                || visitor(node.condition)
                || visitor(node.rightParen)
                || visitor(node.statement)
                || visitor(node.elseClause);
        case NodeKind.elseClause:
            return visitor(node.elseKeyword)
                || visitor(node.statement);
        case NodeKind.localDeclarationStatement:
            return forEachNode(node.modifiers, visitor)
                || visitor(node.declaration)
                || visitor(node.semicolon);
        case NodeKind.emptyStatement:
            return visitor(node.semicolon);
        case NodeKind.expressionStatement:
            return visitor(node.expression)
                || visitor(node.semicolon);
        case NodeKind.yieldStatement:
            return visitor(node.yieldKeyword)
                || visitor(node.returnOrBreakKeyword)
                || visitor(node.expression)
                || visitor(node.semicolon);
        case NodeKind.returnStatement:
            return visitor(node.returnKeyword)
                || visitor(node.expression)
                || visitor(node.semicolon);
        case NodeKind.breakStatement:
            return visitor(node.breakKeyword)
                || visitor(node.semicolon);
        case NodeKind.continueStatement:
            return visitor(node.continueKeyword)
                || visitor(node.semicolon);
        case NodeKind.throwStatement:
            return visitor(node.throwKeyword)
                || visitor(node.expression)
                || visitor(node.semicolon);
        case NodeKind.whileStatement:
            return visitor(node.whileKeyword)
                || visitor(node.leftParen)
                || visitor(node.condition)
                || visitor(node.rightParen)
                || visitor(node.statement);
        case NodeKind.doStatement:
            return visitor(node.doKeyword)
                || visitor(node.statement)
                || visitor(node.whileKeyword)
                || visitor(node.leftParen)
                || visitor(node.condition)
                || visitor(node.rightParen)
                || visitor(node.semicolon);
        case NodeKind.forStatement:
            return visitor(node.forKeyword)
                || visitor(node.leftParen)
                || visitor(node.declaration)
                || forEachSeparated(node.initializers, node.initializerSeparators, visitor)
                || visitor(node.firstSemicolon)
                || visitor(node.condition)
                || visitor(node.secondSemicolon)
                || forEachSeparated(node.incrementors, node.incrementorSeparators, visitor)
                || visitor(node.rightParen)
                || visitor(node.statement);
        case NodeKind.localFunctionStatement:
            return forEachNode(node.modifiers, visitor)
                || visitor(node.returnType)
                || visitor(node.identifier)
                || visitor(node.typeParameters)
                || visitor(node.parameterList)
                || visitor(node.constraints)
                || forEachBodyPart(node, visitor);
        case NodeKind.tryStatement:
            return visitor(node.tryKeyword)
                || visitor(node.block)
                || forEachNode(node.catches, visitor)
                || visitor(node.finallyClause);
        case NodeKind.catchClause:
            return visitor(node.catchKeyword)
                || visitor(node.declaration)
                || visitor(node.filter)
                || visitor(node.block);
        case NodeKind.catchDeclaration:
            return visitor(node.leftParen)
                || visitor(node.type)
                || visitor(node.identifier)
                || visitor(node.rightParen);
        case NodeKind.finallyClause:
            return visitor(node.finallyKeyword)
                || visitor(node.block);
        case NodeKind.switchStatement:
            return visitor(node.switchKeyword)
                || visitor(node.leftParen)
                || visitor(node.expression)
                || visitor(node.rightParen)
                || visitor(node.leftBrace)
                || forEachNode(node.sections, visitor)
                || visitor(node.rightBrace);
        case NodeKind.switchSection:
            return forEachNode(node.labels, visitor)
                || forEachNode(node.statements, visitor);
        case NodeKind.caseSwitchLabel:
            return visitor(node.caseKeyword)
                || visitor(node.value)
                || visitor(node.colon);
        case NodeKind.defaultSwitchLabel:
            return visitor(node.defaultKeyword)
                || visitor(node.colon);
        case NodeKind.usingStatement:
            return visitor(node.usingKeyword)
                || visitor(node.leftParen)
                || visitor(node.declaration)
                || visitor(node.expression)
                || visitor(node.rightParen)
                || visitor(node.statement);
        case NodeKind.lockStatement:
            return visitor(node.lockKeyword)
                || visitor(node.leftParen)
                || visitor(node.expression)
                || visitor(node.rightParen)
                || visitor(node.statement);
        case NodeKind.literalExpression:
            return visitor(node.literal);
        case NodeKind.thisExpression:
        case NodeKind.baseExpression:
            return visitor(node.keyword);
        case NodeKind.parenthesizedExpression:
            return visitor(node.leftParen)
                || visitor(node.expression)
                || visitor(node.rightParen);
        case NodeKind.tupleExpression:
            return visitor(node.leftParen)
                || forEachSeparated(node.args, node.separators, visitor)
                || visitor(node.rightParen);
        case NodeKind.castExpression:
            return visitor(node.leftParen)
                || visitor(node.type)
                || visitor(node.rightParen)
                || visitor(node.expression);
        case NodeKind.binaryExpression:
        case NodeKind.assignmentExpression:
            return visitor(node.left)
                || visitor(node.operator)
                || visitor(node.right);
        case NodeKind.isPatternExpression:
            return visitor(node.expression)
                || visitor(node.isKeyword)
                || visitor(node.notKeyword)
                || visitor(node.pattern)
                || visitor(node.designation);
        case NodeKind.conditionalExpression:
            return visitor(node.condition)
                || visitor(node.questionMark)
                || visitor(node.whenTrue)
                || visitor(node.colon)
                || visitor(node.whenFalse);
        case NodeKind.prefixUnaryExpression:
            return visitor(node.operator)
                || visitor(node.operand);
        case NodeKind.postfixUnaryExpression:
            return visitor(node.operand)
                || visitor(node.operator);
        case NodeKind.memberAccessExpression:
            return visitor(node.expression)
                || visitor(node.operator)
                || visitor(node.name);
        case NodeKind.elementAccessExpression:
            return visitor(node.expression)
                || visitor(node.leftBracket)
                || forEachSeparated(node.args, node.separators, visitor)
                || visitor(node.rightBracket);
        case NodeKind.invocationExpression:
            return visitor(node.expression)
                || visitor(node.argumentList);
        case NodeKind.argumentList:
            return visitor(node.leftParen)
                || forEachSeparated(node.args, node.separators, visitor)
                || visitor(node.rightParen);
        case NodeKind.argument:
            return visitor(node.nameColon)
                || visitor(node.refKind)
                || visitor(node.expression);
        case NodeKind.nameColon:
            return visitor(node.name)
                || visitor(node.colon);
        case NodeKind.declarationExpression:
            return visitor(node.type)
                || visitor(node.identifier);
        case NodeKind.objectCreationExpression:
            return visitor(node.newKeyword)
                || visitor(node.type)
                || visitor(node.argumentList)
                || visitor(node.initializer);
        case NodeKind.arrayCreationExpression:
            return visitor(node.newKeyword)
                || visitor(node.elementType)
                || forEachNode(node.rankSpecifiers, visitor)
                || visitor(node.initializer);
        case NodeKind.initializerExpression:
            return visitor(node.leftBrace)
                || forEachSeparated(node.expressions, node.separators, visitor)
                || visitor(node.rightBrace);
        case NodeKind.lambdaExpression:
            return visitor(node.asyncKeyword)
                || visitor(node.parameter)
                || visitor(node.parameterList)
                || visitor(node.arrow)
                || visitor(node.body);
        case NodeKind.typeofExpression:
        case NodeKind.defaultExpression:
            return visitor(node.keyword)
                || visitor(node.leftParen)
                || visitor(node.type)
                || visitor(node.rightParen);
        case NodeKind.awaitExpression:
            return visitor(node.awaitKeyword)
                || visitor(node.expression);
        case NodeKind.throwExpression:
            return visitor(node.throwKeyword)
                || visitor(node.expression);
        case NodeKind.queryExpression:
            return visitor(node.fromClause)
                || visitor(node.body);
        case NodeKind.queryBody:
            return forEachNode(node.clauses, visitor)
                || visitor(node.selectOrGroup)
                || visitor(node.continuation);
        case NodeKind.queryContinuation:
            return visitor(node.intoKeyword)
                || visitor(node.identifier)
                || visitor(node.body);
        case NodeKind.fromClause:
            return visitor(node.fromKeyword)
                || visitor(node.type)
                || visitor(node.identifier)
                || visitor(node.inKeyword)
                || visitor(node.expression);
        case NodeKind.letClause:
            return visitor(node.letKeyword)
                || visitor(node.identifier)
                || visitor(node.equals)
                || visitor(node.expression);
        case NodeKind.whereClause:
            return visitor(node.whereKeyword)
                || visitor(node.condition);
        case NodeKind.joinClause:
            return visitor(node.joinKeyword)
                || visitor(node.type)
                || visitor(node.identifier)
                || visitor(node.inKeyword)
                || visitor(node.inExpression)
                || visitor(node.onKeyword)
                || visitor(node.leftExpression)
                || visitor(node.equalsKeyword)
                || visitor(node.rightExpression)
                || visitor(node.into);
        case NodeKind.joinIntoClause:
            return visitor(node.intoKeyword)
                || visitor(node.identifier);
        case NodeKind.orderByClause:
            return visitor(node.orderByKeyword)
                || forEachSeparated(node.orderings, node.separators, visitor);
        case NodeKind.ordering:
            return visitor(node.expression)
                || visitor(node.direction);
        case NodeKind.selectClause:
            return visitor(node.selectKeyword)
                || visitor(node.expression);
        case NodeKind.groupClause:
            return visitor(node.groupKeyword)
                || visitor(node.groupExpression)
                || visitor(node.byKeyword)
                || visitor(node.byExpression);
        default:
            exhaustiveCaseGuard(node);
    }
}

export function exhaustiveCaseGuard(_:never) : never { throw "Non-exhaustive case or unintentional fallthrough."; }

/**
 * every terminal under a node, in source order
 */
export function getTerminals(tree: Node | Node[]) : Terminal[] {
    const result : Terminal[] = [];
    function visitor(node: Node | null) {
        if (!node) {
            return;
        }
        if (node.kind === NodeKind.terminal) {
            result.push(node);
        }
        else {
            visit(node, visitor);
        }
    }
    Array.isArray(tree)
        ? forEachNode(tree, visitor)
        : visitor(tree);
    return result;
}

export function firstTerminal(node: Node) : Terminal | undefined {
    return node.kind === NodeKind.terminal ? node : getTerminals(node)[0];
}

export function lastTerminal(node: Node) : Terminal | undefined {
    const terminals = getTerminals(node);
    return terminals.length > 0 ? terminals[terminals.length - 1] : undefined;
}

export interface NodeSourceMap {
    nodeId: NodeId,
    range: SourceRange
}

export function flattenTree(tree: Node | Node[]) : NodeSourceMap[] {
    const result : NodeSourceMap[] = [];
    for (const terminal of getTerminals(tree)) {
        // missing terminals are zero width and own no source text
        if (terminal.range.size() === 0) {
            continue;
        }
        if (result.length > 0 && result[result.length-1].range.toExclusive > terminal.range.fromInclusive) {
            throw "each subsequent node should start on or after the exclusive end of the previous node";
        }
        result.push({nodeId: terminal.nodeId, range: terminal.range});
    }
    return result;
}

// conform to java's java.util.Arrays.binarySearch
export function binarySearch<T>(vs: readonly T[], comparator: (v: T) => number) : number {
    if (vs.length === 0) {
        return -1;
    }

    function mid(a: number, b: number) {
        return Math.floor((a+b)/2);
    }

    let floor = 0;
    let ceil = vs.length - 1;
    let index = mid(floor, ceil);

    while (floor <= ceil) {
        const compare = comparator(vs[index]);
        if (compare === 0) {
            return index;
        }
        if (compare < 0) {
            // T is less than target, move floor
            floor = index+1;
        }
        else {
            // T is more than target, move ceil
            ceil = index-1;
        }
        index = mid(floor, ceil);
    }

    return ~floor;
}

/**
 * the terminal a cursor is on; a cursor right after a token, as in `xs|`, is on that token
 */
export function findNodeInFlatSourceMap(flatSourceMap: readonly NodeSourceMap[], nodeMap: ReadonlyMap<NodeId, Node>, index: number) : Node | undefined {
    if (flatSourceMap.length === 0) return undefined;

    let match = binarySearch(flatSourceMap,
        (v) => {
            if (v.range.fromInclusive <= index && index <= v.range.toExclusive) {
                return 0;
            }
            else if (v.range.toExclusive < index) {
                return -1;
            }
            else {
                return 1;
            }
        });

    // if we didn't match get the closest node after the cursor
    match = match < 0 ? Math.min(~match, flatSourceMap.length - 1) : match;
    return nodeMap.get(flatSourceMap[match].nodeId);
}

function findSelfOrAncestorOfKind<T extends Node>(node: Node, isKind: (node: Node) => node is T) : T | undefined {
    let current : Node | null = node;
    while (current) {
        if (isKind(current)) {
            return current;
        }
        current = current.parent;
    }
    return undefined;
}

export function isFunctionLike(node: Node) : node is FunctionLike {
    switch (node.kind) {
        case NodeKind.methodDeclaration:
        case NodeKind.constructorDeclaration:
        case NodeKind.accessorDeclaration:
        case NodeKind.localFunctionStatement:
        case NodeKind.lambdaExpression:
            return true;
        default:
            return false;
    }
}

export function getContainingFunction(node: Node) : FunctionLike | undefined {
    return node.parent ? findSelfOrAncestorOfKind(node.parent, isFunctionLike) : undefined;
}

/**
 * the header of a foreach is `foreach (T x in xs)`, everything but the body
 */
export function getForEachHeaderRange(node: ForEachStatement) : SourceRange {
    return new SourceRange(node.forEachKeyword.range.fromInclusive, node.rightParen.range.toExclusive);
}

/**
 * the innermost foreach whose header contains the offset; a cursor right after `)` is still in the header
 */
export function findForEachAtOffset(flatSourceMap: readonly NodeSourceMap[], nodeMap: ReadonlyMap<NodeId, Node>, offset: number) : ForEachStatement | undefined {
    const node = findNodeInFlatSourceMap(flatSourceMap, nodeMap, offset);
    if (!node) {
        return undefined;
    }
    return findSelfOrAncestorOfKind(node, (node) : node is ForEachStatement => {
        if (node.kind !== NodeKind.forEachStatement) {
            return false;
        }
        const header = getForEachHeaderRange(node);
        return header.fromInclusive <= offset && offset <= header.toExclusive;
    });
}

