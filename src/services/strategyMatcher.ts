import {
    Block, Expression, ExpressionStatement, FunctionLike, Node, NodeKind, Statement, Terminal, Trivia, TriviaKind,
    YieldStatement, YieldStatementType } from "../compiler/node";
import { CancellationTokenConsumer } from "../compiler/cancellationToken";
import { TokenType } from "../compiler/scanner";
import { exhaustiveCaseGuard, getTerminals, visit } from "../compiler/utils";
import { ExtendedNode, ExtendedNodeKind, ForEachChain, getTriviaInsideLoop } from "./forEachChain";

export const enum ConversionStrategyKind { default, count, toList, yieldReturn }

/**
 * The trivia of the statement a strategy consumes, less what stays with the expressions it keeps.
 * `leading` is what came before the statement's first token.
 */
export interface TriviaBag {
    readonly leading: readonly Trivia[],
    readonly trailing: readonly Trivia[],
}

export interface DefaultStrategy {
    readonly kind: ConversionStrategyKind.default,
}

// `c++;`
export interface CountStrategy {
    readonly kind: ConversionStrategyKind.count,
    readonly selectExpression: Terminal,
    readonly modifyingExpression: Expression,
    readonly statement: ExpressionStatement,
    readonly trivia: TriviaBag,
}

// `list.Add(e);`
export interface ToListStrategy {
    readonly kind: ConversionStrategyKind.toList,
    readonly selectExpression: Expression,
    readonly modifyingExpression: Expression,
    readonly statement: ExpressionStatement,
    readonly trivia: TriviaBag,
}

// `yield return e;`, optionally followed by a `yield break;` that becomes redundant
export interface YieldReturnStrategy {
    readonly kind: ConversionStrategyKind.yieldReturn,
    readonly statement: YieldStatement,
    readonly selectExpression: Expression,
    readonly yieldBreak: YieldStatement | null,
    readonly trivia: TriviaBag,
}

export type ConversionStrategy = DefaultStrategy | CountStrategy | ToListStrategy | YieldReturnStrategy;

const DefaultStrategy : DefaultStrategy = {kind: ConversionStrategyKind.default};

/**
 * The bag for a statement whose `keptExpressions` are re-emitted: the trivia between their tokens goes with them, their
 * outer trivia and that of every other token goes into the bag.
 */
function getTriviaBag(chain: ForEachChain, statement: Statement, keptExpressions: readonly Node[]) : TriviaBag {
    const emitted = new Set<Trivia>();
    for (const expression of keptExpressions) {
        const terminals = getTerminals(expression);
        terminals.forEach((terminal, i) => {
            if (i > 0) terminal.leadingTrivia.forEach((trivia) => emitted.add(trivia));
            if (i < terminals.length - 1) terminal.trailingTrivia.forEach((trivia) => emitted.add(trivia));
        });
    }

    const terminals = getTerminals(statement);
    const trailing : Trivia[] = [];
    terminals.forEach((terminal, i) => {
        const trivia = getTriviaInsideLoop(terminal, chain.forEach);
        trailing.push(...(i === 0 ? trivia.slice(terminal.leadingTrivia.length) : trivia).filter((v) => !emitted.has(v)));
    });

    return {
        leading: terminals.length > 0 ? [...terminals[0].leadingTrivia] : [],
        trailing,
    };
}

function getFunctionBody(member: FunctionLike) : Block | null {
    if (member.kind === NodeKind.lambdaExpression) {
        return member.body.kind === NodeKind.block ? member.body : null;
    }
    return member.body;
}

/**
 * yield statements that belong to `body` itself, not to local functions or lambdas inside it
 */
function countOwnedYieldStatements(body: Block) : number {
    let count = 0;
    function visitor(node: Node | null) {
        if (!node) {
            return;
        }
        if (node.kind === NodeKind.localFunctionStatement || node.kind === NodeKind.lambdaExpression) {
            return;
        }
        if (node.kind === NodeKind.yieldStatement) {
            count++;
        }
        visit(node, visitor);
    }
    visit(body, visitor);
    return count;
}

function containsDirective(node: Node) : boolean {
    return getTerminals(node).some((terminal) =>
        terminal.leadingTrivia.some((trivia) => trivia.kind === TriviaKind.directive)
        || terminal.trailingTrivia.some((trivia) => trivia.kind === TriviaKind.directive));
}

function getIdentifierNames(node: Node) : string[] {
    return getTerminals(node)
        .filter((terminal) => terminal.token.type === TokenType.IDENTIFIER)
        .map((terminal) => terminal.token.text);
}

function getClauseExpression(extendedNode: ExtendedNode) : Node {
    switch (extendedNode.kind) {
        case ExtendedNodeKind.forEach:
            return extendedNode.node.expression;
        case ExtendedNodeKind.if:
            return extendedNode.node.condition;
        case ExtendedNodeKind.declarator:
            return extendedNode.initializer.value;
        default:
            exhaustiveCaseGuard(extendedNode);
    }
}

/**
 * Whether the query would read a name the accumulating statement writes. Folded into a single `Count()` or `ToList()`,
 * such a query sees the value from before the loop (or, reusing the declaration, reads the local in its own
 * initializer); only the default strategy keeps the per-element updates.
 */
function isReadByQuery(chain: ForEachChain, written: Expression, selected: Node | null) : boolean {
    const writtenNames = new Set(getIdentifierNames(written));
    const read = [chain.forEach.expression, ...chain.extendedNodes.map(getClauseExpression)];
    if (selected) {
        read.push(selected);
    }
    return read.some((node) => getIdentifierNames(node).some((name) => writtenNames.has(name)));
}

function matchExpressionStatement(chain: ForEachChain, statement: ExpressionStatement, cancellationToken: CancellationTokenConsumer) : CountStrategy | ToListStrategy | null {
    const expression = statement.expression;

    if (expression.kind === NodeKind.postfixUnaryExpression && expression.operator.token.text === "++") {
        if (isReadByQuery(chain, expression.operand, null)) {
            return null;
        }
        return {
            kind: ConversionStrategyKind.count,
            selectExpression: chain.identifiers[0],
            modifyingExpression: expression.operand,
            statement,
            trivia: getTriviaBag(chain, statement, [expression.operand]),
        };
    }

    if (expression.kind === NodeKind.invocationExpression
        && expression.expression.kind === NodeKind.memberAccessExpression
        && expression.expression.operator.token.text === "."
        && expression.argumentList.args.length === 1
    ) {
        const target = expression.expression.expression;
        const argument = expression.argumentList.args[0];
        if (argument.nameColon || argument.refKind || isReadByQuery(chain, target, argument.expression)) {
            return null;
        }

        cancellationToken.throwIfCancellationRequested();
        const method = chain.semanticModel.getMethodSymbol(expression, cancellationToken);
        if (!method
            || method.name !== "Add"
            || method.parameterTypes.length !== 1
            || !chain.semanticModel.isGenericListType(method.containingType)
        ) {
            return null;
        }

        return {
            kind: ConversionStrategyKind.toList,
            selectExpression: argument.expression,
            modifyingExpression: target,
            statement,
            trivia: getTriviaBag(chain, statement, [target, argument.expression]),
        };
    }

    return null;
}

function matchYieldReturn(chain: ForEachChain, statement: YieldStatement, cancellationToken: CancellationTokenConsumer) : YieldReturnStrategy | null {
    const expression = statement.expression;
    if (statement.subType !== YieldStatementType.yieldReturn || !expression) {
        return null;
    }

    cancellationToken.throwIfCancellationRequested();
    const member = chain.semanticModel.getEnclosingMember(chain.forEach, cancellationToken);
    const body = member ? getFunctionBody(member) : null;

    // the loop must be a statement of the member's own body, not of some nested block
    if (!body || chain.forEach.parent !== body) {
        return null;
    }

    const statements = body.statements.filter((statement) => statement.kind !== NodeKind.localFunctionStatement);
    const last = statements[statements.length - 1];
    const yieldCount = countOwnedYieldStatements(body);

    const strategy = (yieldBreak: YieldStatement | null) : YieldReturnStrategy => ({
        kind: ConversionStrategyKind.yieldReturn,
        statement,
        selectExpression: expression,
        yieldBreak,
        trivia: getTriviaBag(chain, statement, [expression]),
    });

    if (yieldCount === 1 && last === chain.forEach) {
        return strategy(null);
    }

    if (yieldCount === 2
        && statements.length >= 2
        && statements[statements.length - 2] === chain.forEach
        && last.kind === NodeKind.yieldStatement
        && last.subType === YieldStatementType.yieldBreak
        && !containsDirective(last)
    ) {
        return strategy(last);
    }

    return null;
}

/**
 * Picks how the chain's query is put to use. Only a single leftover statement can match anything other than the
 * default; semantic lookups throw `CancellationException` when cancellation is requested.
 */
export function matchStrategy(chain: ForEachChain, cancellationToken: CancellationTokenConsumer) : ConversionStrategy {
    if (chain.terminalStatements.length !== 1) {
        return DefaultStrategy;
    }

    const statement = chain.terminalStatements[0];
    switch (statement.kind) {
        case NodeKind.expressionStatement:
            return matchExpressionStatement(chain, statement, cancellationToken) ?? DefaultStrategy;
        case NodeKind.yieldStatement:
            return matchYieldReturn(chain, statement, cancellationToken) ?? DefaultStrategy;
        default:
            return DefaultStrategy;
    }
}
