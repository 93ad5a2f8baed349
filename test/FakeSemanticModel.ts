import type { SemanticModel } from "../src/compiler/checker";
import type { CancellationTokenConsumer } from "../src/compiler/cancellationToken";
import { FunctionLike, InvocationExpression, Node, NodeKind } from "../src/compiler/node";
import { ListMetadataName, MethodSymbol, TypeSymbol } from "../src/compiler/types";
import { getContainingFunction } from "../src/compiler/utils";

export interface FakeSemanticModelOptions {
    // receivers whose `Add` resolves to `List<T>.Add`; any other receiver's `Add` is some other type's
    listNames?: readonly string[],
    namespacesInScope?: readonly string[],
}

export interface FakeSemanticModel extends SemanticModel {
    readonly calls: string[],
}

/**
 * Answers from the names written in the source rather than from declarations, and records which lookups were made.
 */
export function FakeSemanticModel(options: FakeSemanticModelOptions = {}) : FakeSemanticModel {
    const listNames = new Set(options.listNames ?? []);
    const namespacesInScope = new Set(options.namespacesInScope ?? []);
    const calls : string[] = [];
    const listType = TypeSymbol(ListMetadataName, [TypeSymbol("System.Int32")]);
    const otherType = TypeSymbol("Other.Bag");

    function getMethodSymbol(invocation: InvocationExpression, cancellationToken: CancellationTokenConsumer) : MethodSymbol | null {
        calls.push("getMethodSymbol");
        cancellationToken.throwIfCancellationRequested();
        const callee = invocation.expression;
        if (callee.kind !== NodeKind.memberAccessExpression || callee.expression.kind !== NodeKind.identifierName) {
            return null;
        }
        const receiver = callee.expression.identifier.token.text;
        return {
            name: callee.name.identifier.token.text,
            containingType: listNames.has(receiver) ? listType : otherType,
            parameterTypes: invocation.argumentList.args.map(() => null),
            returnType: null,
            isStatic: false,
        };
    }

    function getEnclosingMember(node: Node, cancellationToken: CancellationTokenConsumer) : FunctionLike | null {
        calls.push("getEnclosingMember");
        cancellationToken.throwIfCancellationRequested();
        return getContainingFunction(node) ?? null;
    }

    return {
        calls,
        getMethodSymbol,
        getEnclosingMember,
        isGenericListType: (type) => type?.metadataName === ListMetadataName,
        isNamespaceInScope: (_node, namespaceName) => namespacesInScope.has(namespaceName),
    };
}
