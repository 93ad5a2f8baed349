import { Diagnostic, DiagnosticKind, Node, NodeKind, Scope, SourceFile, Terminal, TypeNode } from "./node";
import { SourceRange } from "./scanner";
import { visit, exhaustiveCaseGuard } from "./utils";

function introducesScope(node: Node) : boolean {
    switch (node.kind) {
        case NodeKind.sourceFile:
        case NodeKind.namespaceDeclaration:
        case NodeKind.typeDeclaration:
        case NodeKind.methodDeclaration:
        case NodeKind.constructorDeclaration:
        case NodeKind.accessorDeclaration:
        case NodeKind.localFunctionStatement:
        case NodeKind.lambdaExpression:
        case NodeKind.block:
        case NodeKind.forEachStatement:
        case NodeKind.forStatement:
        case NodeKind.usingStatement:
        case NodeKind.catchClause:
        case NodeKind.switchStatement:
        case NodeKind.queryExpression:
            return true;
        default:
            return false;
    }
}

/**
 * sets parent links and fills the scopes of a freshly parsed tree; run once per parse
 */
export function Binder() {
    let diagnostics : Diagnostic[] = [];

    function bind(sourceFile: SourceFile) {
        diagnostics = sourceFile.diagnostics;
        sourceFile.parent = null;
        sourceFile.containedScope = new Map();
        visit(sourceFile, (child) => bindNode(child, sourceFile));
        diagnostics = [];
    }

    function bindNode(node: Node | null, parent: Node) : void {
        if (!node) return;

        node.parent = parent;

        if (introducesScope(node)) {
            // an accessor may already hold its implicit `value`
            node.containedScope ??= new Map();
        }

        bindDeclarations(node);

        visit(node, (child) => bindNode(child, node));
    }

    function nearestScope(node: Node) : Scope | undefined {
        let current : Node | null = node;
        while (current) {
            if (current.containedScope) {
                return current.containedScope;
            }
            current = current.parent;
        }
        return undefined;
    }

    function declare(scope: Scope | undefined, identifier: Terminal, declaration: Node, declaredType: TypeNode | null) {
        const name = identifier.token.text;
        if (!scope || name === "" || name === "_") {
            return;
        }
        if (scope.has(name)) {
            // overloads share a name; everything else is a redeclaration
            const existing = scope.get(name);
            if (existing && !(isOverloadable(existing.declaration) && isOverloadable(declaration))) {
                issueDiagnosticAtRange(identifier.range, `A symbol named '${name}' is already declared in this scope.`, DiagnosticKind.warning);
            }
            return;
        }
        scope.set(name, {name, declaration, declaredType});
    }

    function isOverloadable(node: Node) {
        return node.kind === NodeKind.methodDeclaration || node.kind === NodeKind.constructorDeclaration;
    }

    //
    // names are declared into the nearest scope above the declaring node; the node's own scope is for what it contains
    //
    function bindDeclarations(node: Node) {
        switch (node.kind) {
            case NodeKind.typeDeclaration:
                declare(node.parent ? nearestScope(node.parent) : undefined, node.identifier, node, null);
                return;
            case NodeKind.methodDeclaration:
                declare(node.parent ? nearestScope(node.parent) : undefined, node.identifier, node, node.returnType);
                return;
            case NodeKind.localFunctionStatement:
                declare(node.parent ? nearestScope(node.parent) : undefined, node.identifier, node, node.returnType);
                return;
            case NodeKind.propertyDeclaration:
                declare(nearestScope(node), node.identifier, node, node.type);
                bindPropertyValueParameter(node.type, node.accessorList?.accessors ?? []);
                return;
            case NodeKind.variableDeclaration: {
                const scope = nearestScope(node);
                for (const variable of node.variables) {
                    declare(scope, variable.identifier, variable, node.type);
                }
                return;
            }
            case NodeKind.parameter: {
                // the parameter list belongs to the function-like above it
                const owner = node.parent?.kind === NodeKind.parameterList ? node.parent.parent : node.parent;
                declare(owner?.containedScope, node.identifier, node, node.type);
                return;
            }
            case NodeKind.forEachStatement: {
                if (node.identifier) {
                    declare(node.containedScope, node.identifier, node, node.type);
                }
                for (const identifier of node.designation?.identifiers ?? []) {
                    declare(node.containedScope, identifier, node, null);
                }
                return;
            }
            case NodeKind.catchDeclaration:
                if (node.identifier) {
                    declare(nearestScope(node), node.identifier, node, node.type);
                }
                return;
            case NodeKind.declarationExpression:
                declare(nearestScope(node), node.identifier, node, node.type);
                return;
            case NodeKind.isPatternExpression:
                if (node.designation && node.pattern.kind !== NodeKind.literalExpression) {
                    declare(nearestScope(node), node.designation, node, isTypeNode(node.pattern) ? node.pattern : null);
                }
                return;
            case NodeKind.fromClause:
            case NodeKind.joinClause:
                declare(nearestScope(node), node.identifier, node, node.type);
                return;
            case NodeKind.letClause:
            case NodeKind.queryContinuation:
            case NodeKind.joinIntoClause:
                declare(nearestScope(node), node.identifier, node, null);
                return;
            case NodeKind.sourceFile:
            case NodeKind.terminal:
            case NodeKind.skippedTokens:
            case NodeKind.usingDirective:
            case NodeKind.namespaceDeclaration:
            case NodeKind.constructorDeclaration:
            case NodeKind.fieldDeclaration:
            case NodeKind.accessorList:
            case NodeKind.accessorDeclaration:
            case NodeKind.parameterList:
            case NodeKind.arrowExpressionClause:
            case NodeKind.variableDeclarator:
            case NodeKind.equalsValueClause:
            case NodeKind.predefinedType:
            case NodeKind.identifierName:
            case NodeKind.genericName:
            case NodeKind.typeArgumentList:
            case NodeKind.qualifiedName:
            case NodeKind.arrayType:
            case NodeKind.arrayRankSpecifier:
            case NodeKind.nullableType:
            case NodeKind.block:
            case NodeKind.parenthesizedDesignation:
            case NodeKind.ifStatement:
            case NodeKind.elseClause:
            case NodeKind.localDeclarationStatement:
            case NodeKind.emptyStatement:
            case NodeKind.expressionStatement:
            case NodeKind.yieldStatement:
            case NodeKind.returnStatement:
            case NodeKind.breakStatement:
            case NodeKind.continueStatement:
            case NodeKind.throwStatement:
            case NodeKind.whileStatement:
            case NodeKind.doStatement:
            case NodeKind.forStatement:
            case NodeKind.tryStatement:
            case NodeKind.catchClause:
            case NodeKind.finallyClause:
            case NodeKind.switchStatement:
            case NodeKind.switchSection:
            case NodeKind.caseSwitchLabel:
            case NodeKind.defaultSwitchLabel:
            case NodeKind.usingStatement:
            case NodeKind.lockStatement:
            case NodeKind.literalExpression:
            case NodeKind.thisExpression:
            case NodeKind.baseExpression:
            case NodeKind.parenthesizedExpression:
            case NodeKind.tupleExpression:
            case NodeKind.castExpression:
            case NodeKind.binaryExpression:
            case NodeKind.assignmentExpression:
            case NodeKind.conditionalExpression:
            case NodeKind.prefixUnaryExpression:
            case NodeKind.postfixUnaryExpression:
            case NodeKind.memberAccessExpression:
            case NodeKind.elementAccessExpression:
            case NodeKind.invocationExpression:
            case NodeKind.argumentList:
            case NodeKind.argument:
            case NodeKind.nameColon:
            case NodeKind.objectCreationExpression:
            case NodeKind.arrayCreationExpression:
            case NodeKind.initializerExpression:
            case NodeKind.lambdaExpression:
            case NodeKind.typeofExpression:
            case NodeKind.defaultExpression:
            case NodeKind.awaitExpression:
            case NodeKind.throwExpression:
            case NodeKind.queryExpression:
            case NodeKind.queryBody:
            case NodeKind.whereClause:
            case NodeKind.orderByClause:
            case NodeKind.ordering:
            case NodeKind.selectClause:
            case NodeKind.groupClause:
                return;
            default:
                exhaustiveCaseGuard(node);
        }
    }

    // `set` and `init` accessors see an implicit `value` of the property's type
    function bindPropertyValueParameter(type: TypeNode, accessors: readonly Node[]) {
        for (const accessor of accessors) {
            if (accessor.kind !== NodeKind.accessorDeclaration) continue;
            const keyword = accessor.keyword.token.text;
            if (keyword === "set" || keyword === "init") {
                accessor.containedScope = new Map([["value", {name: "value", declaration: accessor, declaredType: type}]]);
            }
        }
    }

    function issueDiagnosticAtRange(range: SourceRange, msg: string, kind = DiagnosticKind.error) : void {
        diagnostics.push({kind, fromInclusive: range.fromInclusive, toExclusive: range.toExclusive, msg});
    }

    return { bind };
}

export type Binder = ReturnType<typeof Binder>;

function isTypeNode(node: Node) : node is TypeNode {
    switch (node.kind) {
        case NodeKind.predefinedType:
        case NodeKind.identifierName:
        case NodeKind.genericName:
        case NodeKind.qualifiedName:
        case NodeKind.arrayType:
        case NodeKind.nullableType:
            return true;
        default:
            return false;
    }
}
