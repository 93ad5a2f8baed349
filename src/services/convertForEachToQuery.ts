import { DiagnosticKind, ForEachStatement, Node, NodeKind, SourceFile } from "../compiler/node";
import type { SemanticModel } from "../compiler/checker";
import { CancellationException, CancellationTokenConsumer } from "../compiler/cancellationToken";
import { TokenType } from "../compiler/scanner";
import { firstTerminal, visit } from "../compiler/utils";
import { classifyForEach } from "./forEachChain";
import { ConversionStrategyKind, matchStrategy } from "./strategyMatcher";
import { QueryBuilder, QueryConversion } from "./queryBuilder";
import { getAddUsingDirectiveEdit, getTokenRange, TextEdit } from "./conversionEdits";

export const enum NotApplicableReason { notConvertible, malformedInput, analysisCanceled }

export interface ConversionOptions {
    queryNamespace: string,
    addMissingUsing: boolean,
}

export type ConversionResult =
    | {applicable: true, conversion: QueryConversion, edits: readonly TextEdit[]}
    | {applicable: false, reason: NotApplicableReason, detail: string}

function notApplicable(reason: NotApplicableReason, detail: string) : ConversionResult {
    return {applicable: false, reason, detail};
}

function hasErrorWithin(sourceFile: SourceFile, node: Node) : boolean {
    const range = getTokenRange(node);
    return sourceFile.diagnostics.some((diagnostic) =>
        diagnostic.kind === DiagnosticKind.error
        && diagnostic.fromInclusive <= range.toExclusive
        && diagnostic.toExclusive >= range.fromInclusive);
}

/**
 * Control flow the rewritten body can't keep: a `break` or `continue` that would leave or restart one of the loops
 * folded into the query, any `goto`, and try statements. Jumps inside a loop of their own, and `break` inside a
 * switch, stay as they are.
 */
function findUnsupportedControlFlow(nodes: readonly Node[]) : Node | null {
    let result : Node | null = null;

    function walk(node: Node | null, insideLoop: boolean, insideSwitch: boolean) : boolean {
        if (!node || result) {
            return !!result;
        }
        switch (node.kind) {
            case NodeKind.breakStatement:
                if (!insideLoop && !insideSwitch) result = node;
                return !!result;
            case NodeKind.continueStatement:
                if (!insideLoop) result = node;
                return !!result;
            case NodeKind.tryStatement:
                result = node;
                return true;
            case NodeKind.skippedTokens:
                if (firstTerminal(node)?.token.type === TokenType.KW_GOTO) result = node;
                return !!result;
            case NodeKind.whileStatement:
            case NodeKind.doStatement:
            case NodeKind.forStatement:
            case NodeKind.forEachStatement:
                visit(node, (child) => walk(child, true, insideSwitch));
                return !!result;
            case NodeKind.switchStatement:
                visit(node, (child) => walk(child, insideLoop, true));
                return !!result;
            case NodeKind.localFunctionStatement:
            case NodeKind.lambdaExpression:
                return false;
            default:
                visit(node, (child) => walk(child, insideLoop, insideSwitch));
                return !!result;
        }
    }

    nodes.forEach((node) => walk(node, false, false));
    return result;
}

/**
 * Classifies the loop, picks a strategy and builds the edits that turn the loop into a query. The tree is not
 * modified; a loop the conversion does not apply to yields the reason instead of edits.
 */
export function convertForEachToQuery(
    sourceFile: SourceFile,
    forEach: ForEachStatement,
    semanticModel: SemanticModel,
    options: ConversionOptions,
    cancellationToken: CancellationTokenConsumer
) : ConversionResult {
    if (!forEach.identifier || forEach.designation) {
        return notApplicable(NotApplicableReason.notConvertible, "the loop deconstructs its elements");
    }

    if (hasErrorWithin(sourceFile, forEach)) {
        return notApplicable(NotApplicableReason.malformedInput, "the loop has syntax errors");
    }

    try {
        const chain = classifyForEach(forEach, semanticModel);
        const strategy = matchStrategy(chain, cancellationToken);

        if (strategy.kind === ConversionStrategyKind.default && chain.extendedNodes.length === 0) {
            return notApplicable(NotApplicableReason.notConvertible, "nothing in the loop becomes a query clause");
        }

        if (strategy.kind === ConversionStrategyKind.default && findUnsupportedControlFlow(chain.terminalStatements)) {
            return notApplicable(NotApplicableReason.notConvertible, "the loop body has control flow a query can't keep");
        }

        const conversion = QueryBuilder(sourceFile, chain, options).build(strategy);
        const edits = [...conversion.edits];
        if (options.addMissingUsing && conversion.missingNamespace !== null) {
            edits.push(getAddUsingDirectiveEdit(sourceFile, conversion.missingNamespace));
        }

        return {applicable: true, conversion, edits};
    }
    catch (err) {
        if (err instanceof CancellationException) {
            return notApplicable(NotApplicableReason.analysisCanceled, "analysis was cancelled");
        }
        throw err;
    }
}
