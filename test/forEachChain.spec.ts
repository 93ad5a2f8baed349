import * as assert from "assert";

import { NodeKind, TriviaRun } from "../src/compiler/node";
import { classifyForEach, ExtendedNodeKind } from "../src/services/forEachChain";
import { printTrivia } from "../src/services/printer";
import { FakeSemanticModel } from "./FakeSemanticModel";
import { firstForEach, inMethod, parseAndBind } from "./TestLoader";

function classify(lines: string[]) {
    const sourceFile = parseAndBind(inMethod(lines.join("\n")));
    assert.strictEqual(sourceFile.diagnostics.length, 0, "test source parses cleanly");
    return classifyForEach(firstForEach(sourceFile), FakeSemanticModel());
}

const texts = (runs: readonly TriviaRun[]) => runs.map(printTrivia);

describe("foreach chain classification", () => {
    it("Should turn a nested if into a where clause and stop at the innermost statement", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "        ys.Add(x * 2);",
            "    }",
            "}",
        ]);

        assert.deepStrictEqual(chain.extendedNodes.map(v => v.kind), [ExtendedNodeKind.if]);
        assert.deepStrictEqual(chain.identifiers.map(v => v.token.text), ["x"]);
        assert.strictEqual(chain.terminalStatements.length, 1);
        assert.strictEqual(chain.terminalStatements[0].kind, NodeKind.expressionStatement);
        assert.strictEqual(printTrivia(chain.leadingTrivia), "            \n");
        assert.strictEqual(printTrivia(chain.extendedNodes[0].leadingTrivia), "        \n");
    });

    it("Should list closing brace trivia innermost first", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "{",
            "    foreach (var y in ys)",
            "    {",
            "        Use(x, y);",
            "    } // closes inner",
            "}",
        ]);

        assert.deepStrictEqual(texts(chain.trailingTrivia), [
            " ".repeat(13) + "// closes inner\n",
            "        ",
        ]);
        assert.deepStrictEqual(chain.identifiers.map(v => v.token.text), ["x", "y"]);
        assert.deepStrictEqual(chain.extendedNodes.map(v => v.kind), [ExtendedNodeKind.forEach]);
    });

    it("Should produce the same chain when classifying the same loop twice", () => {
        const sourceFile = parseAndBind(inMethod([
            "foreach (var x in xs)",
            "{",
            "    // keep",
            "    var y = x * 2;",
            "    if (y > 3)",
            "        Use(y);",
            "}",
        ].join("\n")));
        const forEach = firstForEach(sourceFile);
        const model = FakeSemanticModel();

        const first = classifyForEach(forEach, model);
        const second = classifyForEach(forEach, model);

        assert.deepStrictEqual(second.extendedNodes.map(v => v.node), first.extendedNodes.map(v => v.node));
        assert.deepStrictEqual(second.identifiers, first.identifiers);
        assert.deepStrictEqual(second.terminalStatements, first.terminalStatements);
        assert.deepStrictEqual(texts(second.extendedNodes.map(v => v.leadingTrivia)), texts(first.extendedNodes.map(v => v.leadingTrivia)));
        assert.deepStrictEqual(texts(second.trailingTrivia), texts(first.trailingTrivia));
        assert.strictEqual(printTrivia(first.extendedNodes[0].leadingTrivia), "        \n            // keep\n" + " ".repeat(13));
    });

    it("Should leave an if with an else as the terminal statement, with no clauses", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0) { Use(x); } else { Use(0); }",
            "}",
        ]);

        assert.strictEqual(chain.extendedNodes.length, 0);
        assert.strictEqual(chain.terminalStatements.length, 1);
        assert.strictEqual(chain.terminalStatements[0].kind, NodeKind.ifStatement);
    });

    it("Should make every statement a leftover once a declaration lacks an initializer", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "{",
            "    int a;",
            "    int b = x;",
            "}",
        ]);

        assert.strictEqual(chain.extendedNodes.length, 0);
        assert.deepStrictEqual(chain.terminalStatements.map(v => v.kind), [NodeKind.localDeclarationStatement, NodeKind.localDeclarationStatement]);
        assert.deepStrictEqual(chain.identifiers.map(v => v.token.text), ["x"]);
    });

    it("Should turn each declarator of a declaration into its own let clause", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "{",
            "    var y = x * 2, z = y + 1;",
            "    Use(z);",
            "}",
        ]);

        assert.deepStrictEqual(chain.extendedNodes.map(v => v.kind), [ExtendedNodeKind.declarator, ExtendedNodeKind.declarator]);
        assert.deepStrictEqual(chain.identifiers.map(v => v.token.text), ["x", "y", "z"]);
        assert.strictEqual(chain.terminalStatements.length, 1);
        assert.strictEqual(printTrivia(chain.extendedNodes[1].leadingTrivia), " ");
    });

    it("Should not make let clauses out of a const declaration", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "{",
            "    const int k = 1;",
            "    Use(x + k);",
            "}",
        ]);

        assert.strictEqual(chain.extendedNodes.length, 0);
        assert.strictEqual(chain.terminalStatements.length, 2);
    });

    it("Should stop at a nested loop that deconstructs its elements", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "    foreach (var (a, b) in Pairs(x))",
            "        Use(a, b);",
        ]);

        assert.strictEqual(chain.extendedNodes.length, 0);
        assert.strictEqual(chain.terminalStatements[0].kind, NodeKind.forEachStatement);
    });

    it("Should end the chain with no terminal statements when the body is a lone declaration", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "{",
            "    var y = x;",
            "}",
        ]);

        assert.strictEqual(chain.terminalStatements.length, 0);
        assert.deepStrictEqual(chain.identifiers.map(v => v.token.text), ["x", "y"]);
    });

    it("Should keep the comments of an empty statement body as leading trivia", () => {
        const chain = classify([
            "foreach (var x in xs)",
            "    /* nothing */ ;",
        ]);

        assert.strictEqual(chain.terminalStatements.length, 0);
        assert.strictEqual(chain.extendedNodes.length, 0);
        assert.strictEqual(printTrivia(chain.leadingTrivia), "            /* nothing */ ");
    });
});
