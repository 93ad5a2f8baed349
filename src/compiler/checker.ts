import {
    Expression, FunctionLike, InvocationExpression, LiteralType, LocalFunctionStatement, MethodDeclaration,
    NameNode, Node, NodeKind, SourceFile, SymbolDeclaration, TypeDeclaration, TypeNode } from "./node";
import { CancellationTokenConsumer } from "./cancellationToken";
import { TypeLibrary } from "./typeLibrary";
import {
    ArrayTypeSymbol, ListMetadataName, MethodSymbol, predefinedTypeMetadataNames, TypeSymbol } from "./types";
import { getContainingFunction, visit } from "./utils";

/**
 * The semantic questions the refactoring asks. Lookups that can be expensive take a cancellation token
 * and check it before doing any work.
 */
export interface SemanticModel {
    getMethodSymbol(invocation: InvocationExpression, cancellationToken: CancellationTokenConsumer) : MethodSymbol | null;
    getEnclosingMember(node: Node, cancellationToken: CancellationTokenConsumer) : FunctionLike | null;
    isGenericListType(type: TypeSymbol | null) : boolean;
    isNamespaceInScope(node: Node, namespaceName: string) : boolean;
}

function getNameText(name: NameNode) : string {
    switch (name.kind) {
        case NodeKind.identifierName:
        case NodeKind.genericName:
            return name.identifier.token.text;
        case NodeKind.qualifiedName:
            return getNameText(name.left) + "." + getNameText(name.right);
    }
}

function withArity(name: string, arity: number) {
    return arity === 0 ? name : `${name}\`${arity}`;
}

export function Checker(library: TypeLibrary) {
    function getSemanticModel(sourceFile: SourceFile) {
        const typeDeclarations = new Map<string, TypeDeclaration[]>();
        const typeCache = new Map<Node, TypeSymbol | null>();
        const resolving = new Set<Node>();

        (function collectTypeDeclarations(node: Node | null) : void {
            if (!node) return;
            if (node.kind === NodeKind.typeDeclaration) {
                const name = node.identifier.token.text;
                const existing = typeDeclarations.get(name);
                if (existing) existing.push(node);
                else typeDeclarations.set(name, [node]);
            }
            if (node.kind === NodeKind.sourceFile || node.kind === NodeKind.namespaceDeclaration || node.kind === NodeKind.typeDeclaration) {
                visit(node, collectTypeDeclarations);
            }
        })(sourceFile);

        //
        // names
        //

        function resolveName(name: string, from: Node) : SymbolDeclaration | undefined {
            let current : Node | null = from;
            while (current) {
                const symbol = current.containedScope?.get(name);
                if (symbol) {
                    return symbol;
                }
                current = current.parent;
            }
            return undefined;
        }

        interface UsingContext {
            namespaces: string[],
            aliases: Map<string, TypeNode>,
        }

        /**
         * the namespaces a name at `node` is looked up in: each enclosing namespace and its usings, innermost first, then the global namespace
         */
        function getUsingContext(node: Node) : UsingContext {
            const namespaces : string[] = [];
            const aliases = new Map<string, TypeNode>();

            function addUsings(members: readonly Node[]) {
                for (const member of members) {
                    if (member.kind !== NodeKind.usingDirective || member.staticKeyword) {
                        continue;
                    }
                    if (member.alias) {
                        aliases.set(member.alias.name.token.text, member.name);
                    }
                    else if (member.name.kind === NodeKind.identifierName || member.name.kind === NodeKind.qualifiedName) {
                        namespaces.push(getNameText(member.name));
                    }
                }
            }

            let current : Node | null = node;
            while (current) {
                if (current.kind === NodeKind.namespaceDeclaration) {
                    const parts = getNameText(current.name).split(".");
                    for (let i = parts.length; i > 0; i--) {
                        namespaces.push(parts.slice(0, i).join("."));
                    }
                    addUsings(current.members);
                }
                else if (current.kind === NodeKind.sourceFile) {
                    addUsings(current.content);
                }
                current = current.parent;
            }

            return {namespaces: [...namespaces, ""], aliases};
        }

        function isNamespaceInScope(node: Node, namespaceName: string) : boolean {
            let current : Node | null = node;
            while (current) {
                if (current.kind === NodeKind.namespaceDeclaration) {
                    const name = getNameText(current.name);
                    if (name === namespaceName || name.startsWith(namespaceName + ".")) {
                        return true;
                    }
                }
                current = current.parent;
            }
            return getUsingContext(node).namespaces.includes(namespaceName);
        }

        //
        // types
        //

        function getContainingNamespaceName(node: Node) : string {
            const parts : string[] = [];
            let current = node.parent;
            while (current) {
                if (current.kind === NodeKind.namespaceDeclaration) {
                    parts.unshift(getNameText(current.name));
                }
                else if (current.kind === NodeKind.typeDeclaration) {
                    parts.unshift(current.identifier.token.text);
                }
                current = current.parent;
            }
            return parts.join(".");
        }

        function getDeclaredTypeSymbol(declaration: TypeDeclaration, typeArguments: readonly TypeSymbol[] = []) : TypeSymbol {
            const containerName = getContainingNamespaceName(declaration);
            const name = declaration.identifier.token.text;
            return TypeSymbol(containerName ? containerName + "." + name : name, typeArguments, declaration);
        }

        function lookupTypeByName(name: string, typeArguments: readonly TypeSymbol[], context: Node) : TypeSymbol | null {
            const declared = typeDeclarations.get(name);
            if (declared && declared.length > 0) {
                return getDeclaredTypeSymbol(declared[0], typeArguments);
            }

            const {namespaces, aliases} = getUsingContext(context);
            const alias = aliases.get(name);
            if (alias && typeArguments.length === 0) {
                return resolveTypeNode(alias, alias);
            }

            const metadataName = withArity(name, typeArguments.length);
            for (const namespace of namespaces) {
                const candidate = namespace ? namespace + "." + metadataName : metadataName;
                if (library.hasType(candidate)) {
                    return TypeSymbol(candidate, typeArguments);
                }
            }
            return null;
        }

        function unknownType() : TypeSymbol {
            return TypeSymbol("?");
        }

        function resolveTypeNode(type: TypeNode, context: Node) : TypeSymbol | null {
            switch (type.kind) {
                case NodeKind.predefinedType: {
                    const metadataName = predefinedTypeMetadataNames[type.keyword.token.text];
                    return metadataName ? TypeSymbol(metadataName) : null;
                }
                case NodeKind.nullableType:
                    return resolveTypeNode(type.elementType, context);
                case NodeKind.arrayType: {
                    let result = resolveTypeNode(type.elementType, context) ?? unknownType();
                    for (let i = 0; i < type.rankSpecifiers.length; i++) {
                        result = ArrayTypeSymbol(result);
                    }
                    return result;
                }
                case NodeKind.identifierName: {
                    const name = type.identifier.token.text;
                    if (name === "var" && !typeDeclarations.has("var")) {
                        return null;
                    }
                    return lookupTypeByName(name, [], context);
                }
                case NodeKind.genericName: {
                    const typeArguments = type.typeArgumentList.args.map((arg) => resolveTypeNode(arg, context) ?? unknownType());
                    return lookupTypeByName(type.identifier.token.text, typeArguments, context);
                }
                case NodeKind.qualifiedName: {
                    const typeArguments = type.right.kind === NodeKind.genericName
                        ? type.right.typeArgumentList.args.map((arg) => resolveTypeNode(arg, context) ?? unknownType())
                        : [];
                    const metadataName = withArity(getNameText(type), typeArguments.length);
                    if (library.hasType(metadataName)) {
                        return TypeSymbol(metadataName, typeArguments);
                    }
                    // relative to an enclosing namespace or a using
                    for (const namespace of getUsingContext(context).namespaces) {
                        if (namespace && library.hasType(namespace + "." + metadataName)) {
                            return TypeSymbol(namespace + "." + metadataName, typeArguments);
                        }
                    }
                    const declared = typeDeclarations.get(type.right.identifier.token.text);
                    return declared && declared.length > 0 ? getDeclaredTypeSymbol(declared[0], typeArguments) : null;
                }
            }
        }

        function isVar(type: TypeNode) : boolean {
            return type.kind === NodeKind.identifierName && type.identifier.token.text === "var";
        }

        function getElementType(type: TypeSymbol | null) : TypeSymbol | null {
            return type ? library.getElementType(type) : null;
        }

        function getTypeOfDeclaration(symbol: SymbolDeclaration) : TypeSymbol | null {
            const declaration = symbol.declaration;
            if (symbol.declaredType && !isVar(symbol.declaredType)) {
                return resolveTypeNode(symbol.declaredType, declaration);
            }
            switch (declaration.kind) {
                case NodeKind.variableDeclarator:
                    return declaration.initializer ? getTypeOfExpression(declaration.initializer.value) : null;
                case NodeKind.forEachStatement:
                    return declaration.identifier ? getElementType(getTypeOfExpression(declaration.expression)) : null;
                case NodeKind.fromClause:
                    return getElementType(getTypeOfExpression(declaration.expression));
                case NodeKind.joinClause:
                    return getElementType(getTypeOfExpression(declaration.inExpression));
                case NodeKind.letClause:
                    return getTypeOfExpression(declaration.expression);
                default:
                    return null;
            }
        }

        function getEnclosingTypeSymbol(node: Node) : TypeSymbol | null {
            let current = node.parent;
            while (current) {
                if (current.kind === NodeKind.typeDeclaration) {
                    return getDeclaredTypeSymbol(current);
                }
                current = current.parent;
            }
            return null;
        }

        /**
         * the type a declared-in-source member has when read, e.g. a field or property type
         */
        function getSourceMemberType(type: TypeSymbol, name: string) : TypeSymbol | null {
            const member = type.declaration?.containedScope?.get(name);
            if (!member || member.declaration.kind === NodeKind.methodDeclaration) {
                return null;
            }
            return getTypeOfDeclaration(member);
        }

        function getTypeOfMemberAccess(receiver: TypeSymbol, name: string) : TypeSymbol | null {
            if (receiver.declaration) {
                return getSourceMemberType(receiver, name);
            }
            return library.lookupProperty(receiver, name)?.type ?? null;
        }

        function getTypeOfExpression(expression: Expression) : TypeSymbol | null {
            const cached = typeCache.get(expression);
            if (cached !== undefined) {
                return cached;
            }
            if (resolving.has(expression)) {
                return null;
            }
            resolving.add(expression);
            const result = computeTypeOfExpression(expression);
            resolving.delete(expression);
            typeCache.set(expression, result);
            return result;
        }

        function getTargetTypeOfCreation(expression: Expression) : TypeSymbol | null {
            // `List<int> xs = new();`
            const parent = expression.parent;
            if (parent?.kind === NodeKind.equalsValueClause && parent.parent?.kind === NodeKind.variableDeclarator) {
                const declaration = parent.parent.parent;
                if (declaration?.kind === NodeKind.variableDeclaration && !isVar(declaration.type)) {
                    return resolveTypeNode(declaration.type, declaration);
                }
            }
            if (parent?.kind === NodeKind.assignmentExpression && parent.right === expression) {
                return getTypeOfExpression(parent.left);
            }
            return null;
        }

        function computeTypeOfExpression(expression: Expression) : TypeSymbol | null {
            switch (expression.kind) {
                case NodeKind.literalExpression:
                    switch (expression.subType) {
                        case LiteralType.numeric: {
                            const text = expression.literal.token.text.toLowerCase();
                            if (/^0x/.test(text)) return TypeSymbol("System.Int32");
                            if (text.endsWith("m")) return TypeSymbol("System.Decimal");
                            if (text.endsWith("f")) return TypeSymbol("System.Single");
                            if (text.endsWith("d") || /[.e]/.test(text)) return TypeSymbol("System.Double");
                            if (text.endsWith("l")) return TypeSymbol("System.Int64");
                            return TypeSymbol("System.Int32");
                        }
                        case LiteralType.string:
                        case LiteralType.interpolatedString:
                            return TypeSymbol("System.String");
                        case LiteralType.char:
                            return TypeSymbol("System.Char");
                        case LiteralType.true:
                        case LiteralType.false:
                            return TypeSymbol("System.Boolean");
                        default:
                            return null;
                    }
                case NodeKind.identifierName: {
                    const symbol = resolveName(expression.identifier.token.text, expression);
                    return symbol ? getTypeOfDeclaration(symbol) : null;
                }
                case NodeKind.parenthesizedExpression:
                    return getTypeOfExpression(expression.expression);
                case NodeKind.castExpression:
                    return resolveTypeNode(expression.type, expression);
                case NodeKind.thisExpression:
                    return getEnclosingTypeSymbol(expression);
                case NodeKind.memberAccessExpression: {
                    const receiver = getTypeOfExpression(expression.expression);
                    return receiver ? getTypeOfMemberAccess(receiver, expression.name.identifier.token.text) : null;
                }
                case NodeKind.elementAccessExpression: {
                    const receiver = getTypeOfExpression(expression.expression);
                    return receiver ? library.getIndexerType(receiver) : null;
                }
                case NodeKind.invocationExpression:
                    return getMethodSymbolWorker(expression)?.returnType ?? null;
                case NodeKind.objectCreationExpression:
                    return expression.type
                        ? resolveTypeNode(expression.type, expression)
                        : getTargetTypeOfCreation(expression);
                case NodeKind.arrayCreationExpression: {
                    if (!expression.elementType) {
                        return null;
                    }
                    let result = resolveTypeNode(expression.elementType, expression) ?? unknownType();
                    for (let i = 0; i < expression.rankSpecifiers.length; i++) {
                        result = ArrayTypeSymbol(result);
                    }
                    return result;
                }
                case NodeKind.conditionalExpression:
                    return getTypeOfExpression(expression.whenTrue) ?? getTypeOfExpression(expression.whenFalse);
                case NodeKind.assignmentExpression:
                    return getTypeOfExpression(expression.left);
                case NodeKind.binaryExpression: {
                    const operator = expression.operator.token.text;
                    if (operator === "as") {
                        return expression.right.kind === NodeKind.predefinedType
                            || expression.right.kind === NodeKind.identifierName
                            || expression.right.kind === NodeKind.genericName
                            || expression.right.kind === NodeKind.qualifiedName
                            || expression.right.kind === NodeKind.arrayType
                            || expression.right.kind === NodeKind.nullableType
                            ? resolveTypeNode(expression.right, expression)
                            : null;
                    }
                    if (["==", "!=", "<", ">", "<=", ">=", "&&", "||"].includes(operator)) {
                        return TypeSymbol("System.Boolean");
                    }
                    return getTypeOfExpression(expression.left);
                }
                case NodeKind.isPatternExpression:
                    return TypeSymbol("System.Boolean");
                case NodeKind.prefixUnaryExpression:
                    return expression.operator.token.text === "!" ? TypeSymbol("System.Boolean") : getTypeOfExpression(expression.operand);
                case NodeKind.postfixUnaryExpression:
                    return getTypeOfExpression(expression.operand);
                case NodeKind.queryExpression: {
                    let body = expression.body;
                    while (body.continuation) {
                        body = body.continuation.body;
                    }
                    const selected = body.selectOrGroup.kind === NodeKind.selectClause
                        ? getTypeOfExpression(body.selectOrGroup.expression)
                        : null;
                    return TypeSymbol("System.Collections.Generic.IEnumerable`1", [selected ?? unknownType()]);
                }
                case NodeKind.typeofExpression:
                    return TypeSymbol("System.Type");
                case NodeKind.defaultExpression:
                    return resolveTypeNode(expression.type, expression);
                default:
                    return null;
            }
        }

        //
        // methods
        //

        function methodSymbolFromDeclaration(declaration: MethodDeclaration | LocalFunctionStatement, containingType: TypeSymbol | null) : MethodSymbol {
            return {
                name: declaration.identifier.token.text,
                containingType,
                parameterTypes: declaration.parameterList.parameters.map((p) => p.type ? resolveTypeNode(p.type, declaration) : null),
                returnType: resolveTypeNode(declaration.returnType, declaration),
                isStatic: declaration.modifiers.some((modifier) => modifier.token.text === "static"),
                declaration,
            };
        }

        function acceptsArgumentCount(declaration: MethodDeclaration | LocalFunctionStatement, argumentCount: number) : boolean {
            const parameters = declaration.parameterList.parameters;
            const required = parameters.filter((p) => !p.defaultValue && !p.modifiers.some((m) => m.token.text === "params")).length;
            const hasParams = parameters.some((p) => p.modifiers.some((m) => m.token.text === "params"));
            return argumentCount >= required && (hasParams || argumentCount <= parameters.length);
        }

        function lookupSourceMethod(type: TypeSymbol, name: string, argumentCount: number) : MethodSymbol | null {
            for (const member of type.declaration?.members ?? []) {
                if (member.kind === NodeKind.methodDeclaration && member.identifier.token.text === name && acceptsArgumentCount(member, argumentCount)) {
                    return methodSymbolFromDeclaration(member, type);
                }
            }
            return null;
        }

        function lookupMethod(receiver: TypeSymbol, name: string, argumentCount: number) : MethodSymbol | null {
            if (receiver.declaration) {
                return lookupSourceMethod(receiver, name, argumentCount);
            }
            const candidates = library.lookupMethods(receiver, name, argumentCount);
            // overloads of the same arity are not told apart; the first one declared wins
            return candidates.length > 0 ? candidates[0] : null;
        }

        function getMethodSymbolWorker(invocation: InvocationExpression) : MethodSymbol | null {
            const callee = invocation.expression;
            const argumentCount = invocation.argumentList.args.length;

            if (callee.kind === NodeKind.memberAccessExpression) {
                const name = callee.name.identifier.token.text;
                const receiver = getTypeOfExpression(callee.expression);
                if (receiver) {
                    return lookupMethod(receiver, name, argumentCount);
                }
                // a static call, `Console.WriteLine(x)`
                if (callee.expression.kind === NodeKind.identifierName || callee.expression.kind === NodeKind.predefinedType) {
                    const staticType = resolveTypeNode(callee.expression, callee.expression);
                    const method = staticType ? lookupMethod(staticType, name, argumentCount) : null;
                    return method?.isStatic ? method : null;
                }
                return null;
            }

            if (callee.kind === NodeKind.identifierName || callee.kind === NodeKind.genericName) {
                const symbol = resolveName(callee.identifier.token.text, callee);
                const declaration = symbol?.declaration;
                if (declaration?.kind === NodeKind.localFunctionStatement) {
                    return methodSymbolFromDeclaration(declaration, null);
                }
                if (declaration?.kind === NodeKind.methodDeclaration) {
                    const containingType = getEnclosingTypeSymbol(declaration);
                    return containingType
                        ? lookupSourceMethod(containingType, callee.identifier.token.text, argumentCount)
                        : methodSymbolFromDeclaration(declaration, null);
                }
            }

            return null;
        }

        function getMethodSymbol(invocation: InvocationExpression, cancellationToken: CancellationTokenConsumer) : MethodSymbol | null {
            cancellationToken.throwIfCancellationRequested();
            return getMethodSymbolWorker(invocation);
        }

        function getEnclosingMember(node: Node, cancellationToken: CancellationTokenConsumer) : FunctionLike | null {
            cancellationToken.throwIfCancellationRequested();
            return getContainingFunction(node) ?? null;
        }

        function isGenericListType(type: TypeSymbol | null) : boolean {
            return type?.metadataName === ListMetadataName;
        }

        const semanticModel : SemanticModel = {
            getMethodSymbol,
            getEnclosingMember,
            isGenericListType,
            isNamespaceInScope,
        };

        return {
            ...semanticModel,
            getTypeOfExpression,
            resolveTypeNode,
        };
    }

    return {
        getSemanticModel,
    }
}

export type Checker = ReturnType<typeof Checker>;
export type CheckerSemanticModel = ReturnType<Checker["getSemanticModel"]>;
