import * as assert from "assert";

import { CancellationException, CancellationTokenConsumer, NeverCancelled } from "../src/compiler/cancellationToken";
import { NodeKind } from "../src/compiler/node";
import { classifyForEach } from "../src/services/forEachChain";
import { ConversionStrategyKind, matchStrategy } from "../src/services/strategyMatcher";
import { printTrivia, printWithoutOuterTrivia } from "../src/services/printer";
import { FakeSemanticModel, FakeSemanticModelOptions } from "./FakeSemanticModel";
import { firstForEach, inMethod, parseAndBind } from "./TestLoader";

const iteratorSignature = "IEnumerable<int> M(List<int> xs)";

function setup(lines: string[], options: FakeSemanticModelOptions = {}, signature?: string) {
    const sourceFile = parseAndBind(inMethod(lines.join("\n"), undefined, signature));
    assert.strictEqual(sourceFile.diagnostics.length, 0, "test source parses cleanly");
    const model = FakeSemanticModel(options);
    const chain = classifyForEach(firstForEach(sourceFile), model);
    return {model, chain};
}

describe("strategy matching", () => {
    it("Should count when the only leftover is an increment", () => {
        const {model, chain} = setup([
            "foreach (var x in xs)",
            "{",
            "    count++; // counted",
            "}",
        ]);

        const strategy = matchStrategy(chain, NeverCancelled);
        assert.strictEqual(strategy.kind, ConversionStrategyKind.count);
        if (strategy.kind !== ConversionStrategyKind.count) return;

        assert.strictEqual(strategy.selectExpression.token.text, "x");
        assert.strictEqual(printWithoutOuterTrivia(strategy.modifyingExpression), "count");
        assert.strictEqual(printTrivia(strategy.trivia.leading), "            ");
        assert.strictEqual(printTrivia(strategy.trivia.trailing), " // counted\n");
        assert.deepStrictEqual(model.calls, []);
    });

    it("Should add to a list when Add resolves to List<T>.Add", () => {
        const {model, chain} = setup([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "        ys.Add(x /* twice */ * 2);",
            "    }",
            "}",
        ], {listNames: ["ys"]});

        const strategy = matchStrategy(chain, NeverCancelled);
        assert.strictEqual(strategy.kind, ConversionStrategyKind.toList);
        if (strategy.kind !== ConversionStrategyKind.toList) return;

        assert.strictEqual(printWithoutOuterTrivia(strategy.selectExpression), "x /* twice */ * 2");
        assert.strictEqual(printWithoutOuterTrivia(strategy.modifyingExpression), "ys");
        // trivia printed with the argument is not also in the bag
        assert.strictEqual(printTrivia(strategy.trivia.trailing), "\n");
        assert.deepStrictEqual(model.calls, ["getMethodSymbol"]);
    });

    it("Should fall back to the default when Add belongs to some other type", () => {
        const {chain} = setup([
            "foreach (var x in xs)",
            "    bag.Add(x);",
        ]);

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
    });

    it("Should not look up an Add call with a named argument", () => {
        const {model, chain} = setup([
            "foreach (var x in xs)",
            "    ys.Add(item: x);",
        ], {listNames: ["ys"]});

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
        assert.deepStrictEqual(model.calls, []);
    });

    it("Should throw CancellationException before a semantic lookup once cancellation is requested", () => {
        const {model, chain} = setup([
            "foreach (var x in xs)",
            "    ys.Add(x);",
        ], {listNames: ["ys"]});

        assert.throws(() => matchStrategy(chain, CancellationTokenConsumer(() => true)), CancellationException);
        assert.deepStrictEqual(model.calls, []);
    });

    it("Should return the sequence when the loop is the last statement of an iterator", () => {
        const {model, chain} = setup([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "        yield return x;",
            "}",
        ], {}, iteratorSignature);

        const strategy = matchStrategy(chain, NeverCancelled);
        assert.strictEqual(strategy.kind, ConversionStrategyKind.yieldReturn);
        if (strategy.kind !== ConversionStrategyKind.yieldReturn) return;

        assert.strictEqual(strategy.yieldBreak, null);
        assert.strictEqual(printWithoutOuterTrivia(strategy.selectExpression), "x");
        assert.deepStrictEqual(model.calls, ["getEnclosingMember"]);
    });

    it("Should pair the return with a yield break that directly follows the loop", () => {
        const {chain} = setup([
            "foreach (var x in xs)",
            "    yield return x;",
            "yield break;",
        ], {}, iteratorSignature);

        const strategy = matchStrategy(chain, NeverCancelled);
        assert.strictEqual(strategy.kind, ConversionStrategyKind.yieldReturn);
        if (strategy.kind !== ConversionStrategyKind.yieldReturn) return;

        assert.strictEqual(strategy.yieldBreak?.kind, NodeKind.yieldStatement);
    });

    it("Should not return the sequence when the iterator yields elsewhere too", () => {
        const {chain} = setup([
            "yield return 0;",
            "foreach (var x in xs)",
            "    yield return x;",
        ], {}, iteratorSignature);

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
    });

    it("Should not return the sequence from a loop nested in another statement", () => {
        const {chain} = setup([
            "if (xs != null)",
            "{",
            "    foreach (var x in xs)",
            "        yield return x;",
            "}",
        ], {}, iteratorSignature);

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
    });

    it("Should not count into a variable a clause reads", () => {
        const {chain} = setup([
            "foreach (var x in xs)",
            "{",
            "    var gap = x - count;",
            "    count++;",
            "}",
        ]);

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
    });

    it("Should not add to a list a clause reads, nor look up its Add", () => {
        const {model, chain} = setup([
            "foreach (var x in xs)",
            "    foreach (var y in ys)",
            "        ys.Add(x);",
        ], {listNames: ["ys"]});

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
        assert.deepStrictEqual(model.calls, []);
    });

    it("Should not add to a list the added value reads", () => {
        const {chain} = setup([
            "foreach (var x in xs)",
            "    ys.Add(ys.Count + x);",
        ], {listNames: ["ys"]});

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
    });

    it("Should use the default for more than one leftover statement", () => {
        const {chain} = setup([
            "foreach (var x in xs)",
            "{",
            "    count++;",
            "    total++;",
            "}",
        ]);

        assert.strictEqual(matchStrategy(chain, NeverCancelled).kind, ConversionStrategyKind.default);
    });

    it("Should pick the same strategy every time for the same chain", () => {
        const {chain} = setup([
            "foreach (var x in xs)",
            "    ys.Add(x);",
        ], {listNames: ["ys"]});

        const first = matchStrategy(chain, NeverCancelled);
        const second = matchStrategy(chain, NeverCancelled);
        assert.strictEqual(first.kind, ConversionStrategyKind.toList);
        assert.strictEqual(second.kind, first.kind);
    });
});
