import {
    EqualsValueClause, ForEachStatement, IfStatement, LocalDeclarationStatement, NodeKind, Statement, Terminal,
    Trivia, TriviaRun, TypeNode, VariableDeclarator } from "../compiler/node";
import type { SemanticModel } from "../compiler/checker";
import { exhaustiveCaseGuard, getTerminals, lastTerminal } from "../compiler/utils";

export const enum ExtendedNodeKind { forEach, if, declarator }

interface ExtendedNodeBase {
    // re-emitted before and after the generated clause
    readonly leadingTrivia: TriviaRun,
    readonly trailingTrivia: TriviaRun,
}

export interface ForEachExtendedNode extends ExtendedNodeBase {
    readonly kind: ExtendedNodeKind.forEach,
    readonly node: ForEachStatement,
    readonly identifier: Terminal,
}

export interface IfExtendedNode extends ExtendedNodeBase {
    readonly kind: ExtendedNodeKind.if,
    readonly node: IfStatement,
}

export interface DeclaratorExtendedNode extends ExtendedNodeBase {
    readonly kind: ExtendedNodeKind.declarator,
    readonly node: VariableDeclarator,
    readonly initializer: EqualsValueClause,
    // the declaration's type, `var` included
    readonly type: TypeNode,
}

/**
 * one future query clause: `from`, `where` or `let`
 */
export type ExtendedNode = ForEachExtendedNode | IfExtendedNode | DeclaratorExtendedNode;

export interface ForEachChain {
    readonly forEach: ForEachStatement,
    readonly semanticModel: SemanticModel,
    // the root loop is implicit and not included
    readonly extendedNodes: readonly ExtendedNode[],
    // the root iteration variable, then one per nested loop or declared variable, in scope order
    readonly identifiers: readonly Terminal[],
    // from the first statement that is not a clause through the end of its block; empty if every statement became a clause
    readonly terminalStatements: readonly Statement[],
    // trivia of tokens passed over but not yet attached to a clause when descent stopped
    readonly leadingTrivia: TriviaRun,
    // one run per closing brace, innermost first
    readonly trailingTrivia: readonly TriviaRun[],
}

/**
 * The trivia of a token that lies inside the loop's own text. The root keyword's leading trivia and the trailing
 * trivia of the loop's last token belong to the surrounding code.
 */
export function getTriviaInsideLoop(terminal: Terminal, forEach: ForEachStatement) : Trivia[] {
    const leading = terminal === forEach.forEachKeyword ? [] : terminal.leadingTrivia;
    const trailing = terminal === lastTerminal(forEach) ? [] : terminal.trailingTrivia;
    return [...leading, ...trailing];
}

interface InitializedDeclarator {
    declarator: VariableDeclarator,
    initializer: EqualsValueClause,
}

/**
 * The declarators of `T a = x, b = y;` when each of them has an initializer. A declaration with modifiers (`const`,
 * `using`) cannot become `let` clauses.
 */
function getInitializedDeclarators(statement: LocalDeclarationStatement) : InitializedDeclarator[] | null {
    if (statement.modifiers.length > 0) {
        return null;
    }
    const result : InitializedDeclarator[] = [];
    for (const declarator of statement.declaration.variables) {
        if (!declarator.initializer) {
            return null;
        }
        result.push({declarator, initializer: declarator.initializer});
    }
    return result;
}

/**
 * Walks down from the loop body, turning each nested foreach, else-less if and fully initialized local declaration
 * into a clause, and stops at the first statement that can't be one.
 */
export function classifyForEach(forEach: ForEachStatement, semanticModel: SemanticModel) : ForEachChain {
    const identifiers : Terminal[] = forEach.identifier
        ? [forEach.identifier]
        : [...(forEach.designation?.identifiers ?? [])];
    const extendedNodes : ExtendedNode[] = [];
    const trailingTrivia : TriviaRun[] = [];
    let pendingLeadingTokens : Terminal[] = [];
    let terminalStatements : Statement[] | null = null;

    function triviaOf(terminals: readonly Terminal[]) : Trivia[] {
        return terminals.flatMap((terminal) => getTriviaInsideLoop(terminal, forEach));
    }

    function takePendingLeadingTrivia() : Trivia[] {
        const result = triviaOf(pendingLeadingTokens);
        pendingLeadingTokens = [];
        return result;
    }

    function addDeclarators(statement: LocalDeclarationStatement, declarators: readonly InitializedDeclarator[]) {
        const {type, separators} = statement.declaration;
        const firstLeadingTrivia = [...takePendingLeadingTrivia(), ...triviaOf(getTerminals(type))];

        declarators.forEach(({declarator, initializer}, i) => {
            const isLast = i === declarators.length - 1;
            extendedNodes.push({
                kind: ExtendedNodeKind.declarator,
                node: declarator,
                initializer,
                type,
                leadingTrivia: i === 0 ? firstLeadingTrivia : separators[i-1]?.trailingTrivia ?? [],
                trailingTrivia: isLast ? triviaOf([statement.semicolon]) : separators[i]?.leadingTrivia ?? [],
            });
            identifiers.push(declarator.identifier);
        });
    }

    let current : Statement = forEach.statement;

    while (terminalStatements === null) {
        switch (current.kind) {
            case NodeKind.block: {
                pendingLeadingTokens.push(current.leftBrace);
                trailingTrivia.push(triviaOf([current.rightBrace]));

                const statements = current.statements;
                if (statements.length === 0) {
                    terminalStatements = [];
                    break;
                }

                // everything but the last statement must be a declaration that can become `let` clauses
                for (let i = 0; i < statements.length - 1; i++) {
                    const statement = statements[i];
                    const declarators = statement.kind === NodeKind.localDeclarationStatement
                        ? getInitializedDeclarators(statement)
                        : null;
                    if (statement.kind !== NodeKind.localDeclarationStatement || !declarators) {
                        terminalStatements = statements.slice(i);
                        break;
                    }
                    addDeclarators(statement, declarators);
                }

                current = statements[statements.length - 1];
                break;
            }
            case NodeKind.forEachStatement: {
                // a deconstructing loop has no single range variable to put in a `from` clause
                if (!current.identifier || current.designation) {
                    terminalStatements = [current];
                    break;
                }
                extendedNodes.push({
                    kind: ExtendedNodeKind.forEach,
                    node: current,
                    identifier: current.identifier,
                    leadingTrivia: takePendingLeadingTrivia(),
                    trailingTrivia: [],
                });
                identifiers.push(current.identifier);
                current = current.statement;
                break;
            }
            case NodeKind.ifStatement: {
                if (current.elseClause) {
                    terminalStatements = [current];
                    break;
                }
                extendedNodes.push({
                    kind: ExtendedNodeKind.if,
                    node: current,
                    leadingTrivia: takePendingLeadingTrivia(),
                    trailingTrivia: [],
                });
                current = current.statement;
                break;
            }
            case NodeKind.localDeclarationStatement: {
                const declarators = getInitializedDeclarators(current);
                if (declarators) {
                    addDeclarators(current, declarators);
                    terminalStatements = [];
                }
                else {
                    terminalStatements = [current];
                }
                break;
            }
            case NodeKind.emptyStatement: {
                // the statement goes away, its comments don't
                pendingLeadingTokens.push(current.semicolon);
                terminalStatements = [];
                break;
            }
            case NodeKind.expressionStatement:
            case NodeKind.yieldStatement:
            case NodeKind.returnStatement:
            case NodeKind.breakStatement:
            case NodeKind.continueStatement:
            case NodeKind.throwStatement:
            case NodeKind.whileStatement:
            case NodeKind.doStatement:
            case NodeKind.forStatement:
            case NodeKind.localFunctionStatement:
            case NodeKind.tryStatement:
            case NodeKind.switchStatement:
            case NodeKind.usingStatement:
            case NodeKind.lockStatement:
            case NodeKind.skippedTokens: {
                terminalStatements = [current];
                break;
            }
            default: {
                exhaustiveCaseGuard(current);
            }
        }
    }

    // collected outermost first; the chain reads them innermost first
    trailingTrivia.reverse();

    return Object.freeze({
        forEach,
        semanticModel,
        extendedNodes: Object.freeze(extendedNodes),
        identifiers: Object.freeze(identifiers),
        terminalStatements: Object.freeze(terminalStatements),
        leadingTrivia: Object.freeze(takePendingLeadingTrivia()),
        trailingTrivia: Object.freeze(trailingTrivia),
    });
}
