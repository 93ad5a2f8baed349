import * as assert from "assert";

import { CancellationTokenConsumer, NeverCancelled } from "../src/compiler/cancellationToken";
import { applyTextEdits } from "../src/services/conversionEdits";
import { ConversionOptions, convertForEachToQuery, NotApplicableReason } from "../src/services/convertForEachToQuery";
import { FakeSemanticModel, FakeSemanticModelOptions } from "./FakeSemanticModel";
import { firstForEach, inMethod, parseAndBind } from "./TestLoader";

const defaultOptions : ConversionOptions = {queryNamespace: "System.Linq", addMissingUsing: true};

function convert(
    lines: string[],
    modelOptions: FakeSemanticModelOptions = {},
    options = defaultOptions,
    cancellationToken = NeverCancelled
) {
    const sourceText = inMethod(lines.join("\n"));
    const sourceFile = parseAndBind(sourceText);
    const result = convertForEachToQuery(sourceFile, firstForEach(sourceFile), FakeSemanticModel(modelOptions), options, cancellationToken);
    return {sourceText, result};
}

function reasonOf(lines: string[], modelOptions: FakeSemanticModelOptions = {}, cancellationToken = NeverCancelled) {
    const {result} = convert(lines, modelOptions, defaultOptions, cancellationToken);
    return result.applicable ? null : result.reason;
}

const addToList = [
    "foreach (var x in xs)",
    "    if (x > 0)",
    "        ys.Add(x);",
];

describe("convert foreach to query", () => {
    it("Should convert and import the query namespace", () => {
        const {sourceText, result} = convert(addToList, {listNames: ["ys"]});
        assert.ok(result.applicable);
        if (!result.applicable) return;

        assert.strictEqual(result.edits.length, 2);
        assert.strictEqual(
            applyTextEdits(sourceText, result.edits),
            inMethod("ys.AddRange(from x in xs where x > 0 select x);", "using System.Collections.Generic;\nusing System.Linq;\n\n"));
    });

    it("Should not import the query namespace when told not to", () => {
        const {result} = convert(addToList, {listNames: ["ys"]}, {queryNamespace: "System.Linq", addMissingUsing: false});
        assert.ok(result.applicable);
        if (!result.applicable) return;

        assert.strictEqual(result.edits.length, 1);
        assert.strictEqual(result.conversion.missingNamespace, "System.Linq");
    });

    it("Should not import a namespace that is already in scope", () => {
        const {result} = convert(addToList, {listNames: ["ys"], namespacesInScope: ["System.Linq"]});
        assert.ok(result.applicable);
        if (!result.applicable) return;

        assert.strictEqual(result.edits.length, 1);
    });

    it("Should not convert a loop that deconstructs its elements", () => {
        assert.strictEqual(reasonOf([
            "foreach (var (a, b) in pairs)",
            "    if (a > b)",
            "        Use(a);",
        ]), NotApplicableReason.notConvertible);
    });

    it("Should not convert a loop that has syntax errors", () => {
        assert.strictEqual(reasonOf([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "        Use(x)",
            "}",
        ]), NotApplicableReason.malformedInput);
    });

    it("Should not convert a loop with nothing to turn into a clause", () => {
        assert.strictEqual(reasonOf([
            "foreach (var x in xs)",
            "    Use(x);",
        ]), NotApplicableReason.notConvertible);
    });

    it("Should not convert a loop whose body breaks out of it", () => {
        assert.strictEqual(reasonOf([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "        Use(x);",
            "        break;",
            "    }",
            "}",
        ]), NotApplicableReason.notConvertible);
    });

    it("Should convert a loop whose body breaks out of a loop of its own", () => {
        const {result} = convert([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "        while (true) { break; }",
            "        Use(x);",
            "    }",
            "}",
        ]);
        assert.strictEqual(result.applicable, true);
    });

    it("Should not convert a loop whose body uses goto", () => {
        assert.strictEqual(reasonOf([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "        Use(x);",
            "        goto done;",
            "    }",
            "}",
            "done:",
            "Use(0);",
        ]), NotApplicableReason.notConvertible);
    });

    it("Should not convert a loop whose body has a try statement", () => {
        assert.strictEqual(reasonOf([
            "foreach (var x in xs)",
            "{",
            "    if (x > 0)",
            "    {",
            "        try { Use(x); }",
            "        catch (Exception e) { Use(e); }",
            "    }",
            "}",
        ]), NotApplicableReason.notConvertible);
    });

    it("Should report cancellation instead of edits", () => {
        assert.strictEqual(
            reasonOf(addToList, {listNames: ["ys"]}, CancellationTokenConsumer(() => true)),
            NotApplicableReason.analysisCanceled);
    });
});
