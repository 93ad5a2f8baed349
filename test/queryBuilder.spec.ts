import * as assert from "assert";

import { NeverCancelled } from "../src/compiler/cancellationToken";
import { classifyForEach } from "../src/services/forEachChain";
import { ConversionStrategyKind, matchStrategy } from "../src/services/strategyMatcher";
import { QueryBuilder } from "../src/services/queryBuilder";
import { applyTextEdits } from "../src/services/conversionEdits";
import { FakeSemanticModel, FakeSemanticModelOptions } from "./FakeSemanticModel";
import { firstForEach, inMethod, parseAndBind } from "./TestLoader";

const iteratorSignature = "IEnumerable<int> M(List<int> xs)";

function convert(lines: string[], options: FakeSemanticModelOptions = {}, signature?: string) {
    const sourceText = inMethod(lines.join("\n"), undefined, signature);
    const sourceFile = parseAndBind(sourceText);
    assert.strictEqual(sourceFile.diagnostics.length, 0, "test source parses cleanly");

    const chain = classifyForEach(firstForEach(sourceFile), FakeSemanticModel(options));
    const conversion = QueryBuilder(sourceFile, chain, {queryNamespace: "System.Linq"}).build(matchStrategy(chain, NeverCancelled));
    const result = applyTextEdits(sourceText, conversion.edits);

    assert.strictEqual(parseAndBind(result).diagnostics.length, 0, "converted source parses cleanly");
    return {conversion, result};
}

describe("query building", () => {
    it("Should add the query's results to the list", () => {
        const {conversion, result} = convert([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "        ys.Add(x * 2);",
            "    }",
            "}",
        ], {listNames: ["ys"]});

        assert.strictEqual(conversion.strategy.kind, ConversionStrategyKind.toList);
        assert.strictEqual(conversion.query, "from x in xs where x > 0 select x * 2");
        assert.strictEqual(conversion.missingNamespace, "System.Linq");
        assert.strictEqual(result, inMethod("ys.AddRange(from x in xs where x > 0 select x * 2);"));
    });

    it("Should not ask for the query namespace when it is already in scope", () => {
        const {conversion} = convert([
            "foreach (var x in xs)",
            "    if (x > 0)",
            "        ys.Add(x);",
        ], {listNames: ["ys"], namespacesInScope: ["System.Linq"]});

        assert.strictEqual(conversion.missingNamespace, null);
    });

    it("Should count into the zero initialized local declared right before the loop", () => {
        const {conversion, result} = convert([
            "var count = 0;",
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "        count++;",
            "}",
        ]);

        assert.strictEqual(conversion.strategy.kind, ConversionStrategyKind.count);
        assert.strictEqual(result, inMethod("var count = (from x in xs where x > 0 select x).Count();"));
    });

    it("Should add the count when there is no initializer to reuse", () => {
        const {result} = convert([
            "foreach (var x in xs)",
            "    if (x > 0)",
            "        count++;",
        ]);

        assert.strictEqual(result, inMethod("count += (from x in xs where x > 0 select x).Count();"));
    });

    it("Should assign the list to the empty list declared right before the loop", () => {
        const {result} = convert([
            "var evens = new List<int>();",
            "foreach (var x in xs)",
            "    if (x % 2 == 0)",
            "        evens.Add(x);",
        ], {listNames: ["evens"]});

        assert.strictEqual(result, inMethod("var evens = (from x in xs where x % 2 == 0 select x).ToList();"));
    });

    it("Should keep counting in the loop when the query reads the counter", () => {
        const {conversion, result} = convert([
            "int c = 0;",
            "foreach (var x in xs)",
            "    if (x > c)",
            "        c++;",
        ]);

        assert.strictEqual(conversion.strategy.kind, ConversionStrategyKind.default);
        assert.strictEqual(result, inMethod([
            "int c = 0;",
            "foreach (var x in from x in xs where x > c select x)",
            "{",
            "    c++;",
            "}",
        ].join("\n")));
    });

    it("Should keep adding in the loop when the query reads the list", () => {
        const {conversion, result} = convert([
            "var seen = new List<int>();",
            "foreach (var x in xs)",
            "    if (!seen.Contains(x))",
            "        seen.Add(x);",
        ], {listNames: ["seen"]});

        assert.strictEqual(conversion.strategy.kind, ConversionStrategyKind.default);
        assert.strictEqual(result, inMethod([
            "var seen = new List<int>();",
            "foreach (var x in from x in xs where !seen.Contains(x) select x)",
            "{",
            "    seen.Add(x);",
            "}",
        ].join("\n")));
    });

    it("Should return the query from an iterator and drop the yield break after it", () => {
        const {conversion, result} = convert([
            "foreach (var x in xs)",
            "    yield return x * 2;",
            "yield break;",
        ], {}, iteratorSignature);

        assert.strictEqual(conversion.strategy.kind, ConversionStrategyKind.yieldReturn);
        assert.strictEqual(conversion.edits.length, 2);
        assert.strictEqual(result, inMethod("return from x in xs select x * 2;", undefined, iteratorSignature));
    });

    it("Should iterate a tuple of the variables the remaining statements use", () => {
        const {conversion, result} = convert([
            "foreach (var x in xs)",
            "{",
            "    foreach (var y in ys)",
            "    {",
            "        Use(x, y);",
            "    }",
            "}",
        ]);

        assert.strictEqual(conversion.strategy.kind, ConversionStrategyKind.default);
        assert.strictEqual(conversion.query, "from x in xs from y in ys select (x, y)");
        assert.strictEqual(result, inMethod([
            "foreach (var (x, y) in from x in xs from y in ys select (x, y))",
            "{",
            "    Use(x, y);",
            "}",
        ].join("\n")));
    });

    it("Should turn a local into a let clause and iterate it", () => {
        const {result} = convert([
            "foreach (var x in xs)",
            "{",
            "    var y = x * 2;",
            "    Use(y);",
            "}",
        ]);

        assert.strictEqual(result, inMethod([
            "foreach (var y in from x in xs let y = x * 2 select y)",
            "{",
            "    Use(y);",
            "}",
        ].join("\n")));
    });

    it("Should keep the declared type of a local turned into a let clause", () => {
        const {result} = convert([
            "foreach (var x in xs)",
            "{",
            "    double half = x;",
            "    if (half / 2 > 1)",
            "        ys.Add(x);",
            "}",
        ], {listNames: ["ys"]});

        assert.strictEqual(result, inMethod("ys.AddRange(from x in xs let half = (double)(x) where half / 2 > 1 select x);"));
    });

    it("Should turn an array initializer into an array creation in a let clause", () => {
        const {result} = convert([
            "foreach (var x in xs)",
            "{",
            "    int[] pair = {x, 1};",
            "    Use(pair);",
            "}",
        ]);

        assert.strictEqual(result, inMethod([
            "foreach (var pair in from x in xs let pair = new int[] {x, 1} select pair)",
            "{",
            "    Use(pair);",
            "}",
        ].join("\n")));
    });

    it("Should keep comments from inside the loop", () => {
        const {result} = convert([
            "foreach (var x in xs)",
            "{",
            "    // positives only",
            "    if (x > 0)",
            "        ys.Add(x); // keep",
            "}",
        ], {listNames: ["ys"]});

        assert.strictEqual(result, inMethod([
            "ys.AddRange(from x in xs",
            "    // positives only",
            "    where x > 0 select x); // keep",
        ].join("\n")));
    });

    it("Should not add a blank line between comments before and after a dropped brace", () => {
        const {result} = convert([
            "foreach (var x in xs) // outer",
            "{",
            "    // inner",
            "    if (x > 0)",
            "        ys.Add(x);",
            "}",
        ], {listNames: ["ys"]});

        assert.strictEqual(result, inMethod([
            "ys.AddRange(from x in xs // outer",
            "    // inner",
            "    where x > 0 select x);",
        ].join("\n")));
    });

    it("Should put every directive of the remaining statements at column 0", () => {
        const {conversion, result} = convert([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "#if DEBUG",
            "        Log(x);",
            "#else",
            "        Use(x);",
            "#endif",
            "    }",
            "}",
        ]);

        assert.strictEqual(conversion.strategy.kind, ConversionStrategyKind.default);
        assert.strictEqual(result, inMethod([
            "foreach (var x in from x in xs where x > 0 select x)",
            "{",
            "#if DEBUG",
            "    Log(x);",
            "#else",
            "    Use(x);",
            "#endif",
            "}",
        ].join("\n")).replace(/^ +#/gm, "#"));
    });

    it("Should build the same query every time for the same chain", () => {
        const sourceFile = parseAndBind(inMethod("foreach (var x in xs)\n    if (x > 0)\n        Use(x);"));
        const chain = classifyForEach(firstForEach(sourceFile), FakeSemanticModel());
        const builder = QueryBuilder(sourceFile, chain, {queryNamespace: "System.Linq"});

        assert.strictEqual(builder.buildQuery("x", []), "from x in xs where x > 0 select x");
        assert.strictEqual(builder.buildQuery("x", []), builder.buildQuery("x", []));
    });
});
