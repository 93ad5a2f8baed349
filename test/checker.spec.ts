import * as assert from "assert";

import { CancellationException, CancellationTokenConsumer, NeverCancelled } from "../src/compiler/cancellationToken";
import { Checker, SemanticModel } from "../src/compiler/checker";
import { InvocationExpression, Node, NodeKind } from "../src/compiler/node";
import { loadTypeLibrary } from "../src/compiler/typeLibrary";
import { findNodes, firstForEach, inMethod, parseAndBind } from "./TestLoader";

const isInvocation = (node: Node) : node is InvocationExpression => node.kind === NodeKind.invocationExpression;

function check(sourceText: string) {
    const sourceFile = parseAndBind(sourceText);
    assert.strictEqual(sourceFile.diagnostics.length, 0, "test source parses cleanly");
    const model = Checker(loadTypeLibrary()).getSemanticModel(sourceFile);
    const invocations = findNodes(sourceFile, isInvocation);
    return {sourceFile, model, invocations};
}

describe("checker", () => {
    it("Should resolve Add on a List<T> parameter to List<T>.Add", () => {
        const {model, invocations} = check(inMethod("ys.Add(1);"));
        const method = model.getMethodSymbol(invocations[0], NeverCancelled);

        assert.strictEqual(method?.name, "Add");
        assert.strictEqual(method?.containingType?.metadataName, "System.Collections.Generic.List`1");
        assert.strictEqual(method?.containingType?.typeArguments[0].metadataName, "System.Int32");
        assert.strictEqual(model.isGenericListType(method?.containingType ?? null), true);
    });

    it("Should resolve Add on a local initialized with a new list", () => {
        const {model, invocations} = check(inMethod("var names = new List<string>();\nnames.Add(\"a\");"));
        const method = model.getMethodSymbol(invocations[0], NeverCancelled);

        assert.strictEqual(model.isGenericListType(method?.containingType ?? null), true);
        assert.strictEqual(method?.containingType?.typeArguments[0].metadataName, "System.String");
    });

    it("Should not take Add on another collection for List<T>.Add", () => {
        const {model, invocations} = check(inMethod("set.Add(1);\nitems.Add(2);", undefined, "void M(HashSet<int> set, IList<int> items)"));
        const setAdd = model.getMethodSymbol(invocations[0], NeverCancelled);
        const itemsAdd = model.getMethodSymbol(invocations[1], NeverCancelled);

        assert.strictEqual(setAdd?.containingType?.metadataName, "System.Collections.Generic.HashSet`1");
        assert.strictEqual(itemsAdd?.containingType?.metadataName, "System.Collections.Generic.ICollection`1");
        assert.strictEqual(model.isGenericListType(setAdd?.containingType ?? null), false);
        assert.strictEqual(model.isGenericListType(itemsAdd?.containingType ?? null), false);
    });

    it("Should prefer a List type declared in the file over the framework's", () => {
        const {model, invocations} = check([
            "using System.Collections.Generic;",
            "",
            "class List<T>",
            "{",
            "    public void Add(T item) { }",
            "}",
            "",
            "class C",
            "{",
            "    void M(List<int> ys)",
            "    {",
            "        ys.Add(1);",
            "    }",
            "}",
            "",
        ].join("\n"));
        const method = model.getMethodSymbol(invocations[0], NeverCancelled);

        assert.strictEqual(method?.containingType?.metadataName, "List");
        assert.strictEqual(model.isGenericListType(method?.containingType ?? null), false);
    });

    it("Should type a loop variable by the element type of what it iterates", () => {
        const {sourceFile, model} = check(inMethod("foreach (var x in xs)\n    Use(x);"));
        const forEach = firstForEach(sourceFile);

        assert.strictEqual(model.getTypeOfExpression(forEach.expression)?.metadataName, "System.Collections.Generic.List`1");
        const use = findNodes(forEach, isInvocation)[0];
        assert.strictEqual(model.getTypeOfExpression(use.argumentList.args[0].expression)?.metadataName, "System.Int32");
    });

    it("Should see a namespace imported by a using or enclosing the code", () => {
        const withoutLinq = check(inMethod("foreach (var x in xs) Use(x);"));
        assert.strictEqual(withoutLinq.model.isNamespaceInScope(firstForEach(withoutLinq.sourceFile), "System.Linq"), false);
        assert.strictEqual(withoutLinq.model.isNamespaceInScope(firstForEach(withoutLinq.sourceFile), "System.Collections.Generic"), true);

        const withLinq = check(inMethod("foreach (var x in xs) Use(x);", "using System.Collections.Generic;\nusing System.Linq;\n\n"));
        assert.strictEqual(withLinq.model.isNamespaceInScope(firstForEach(withLinq.sourceFile), "System.Linq"), true);

        const nested = check("namespace System.Linq.Extensions\n{\n    class C\n    {\n        void M(int[] xs)\n        {\n            foreach (var x in xs) { }\n        }\n    }\n}\n");
        assert.strictEqual(nested.model.isNamespaceInScope(firstForEach(nested.sourceFile), "System.Linq"), true);
    });

    it("Should serve as the semantic model the conversion consumes", () => {
        const {sourceFile, model, invocations} = check(inMethod("foreach (var x in xs) ys.Add(x);"));
        const semanticModel : SemanticModel = model;

        assert.strictEqual(semanticModel.getMethodSymbol(invocations[0], NeverCancelled)?.name, "Add");
        assert.strictEqual(semanticModel.isNamespaceInScope(firstForEach(sourceFile), "System.Collections.Generic"), true);
    });

    it("Should throw CancellationException from a lookup once cancellation is requested", () => {
        const {model, invocations} = check(inMethod("ys.Add(1);"));
        assert.throws(() => model.getMethodSymbol(invocations[0], CancellationTokenConsumer(() => true)), CancellationException);
    });
});
