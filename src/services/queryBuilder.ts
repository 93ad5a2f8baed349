import {
    EqualsValueClause, Expression, ForEachStatement, IfStatement, Node, NodeKind, SourceFile, Statement, Terminal,
    Trivia, TriviaKind, TypeNode, VariableDeclarator } from "../compiler/node";
import { exhaustiveCaseGuard, firstTerminal, getTerminals, lastTerminal, visit } from "../compiler/utils";
import { ExtendedNode, ExtendedNodeKind, ForEachChain, getTriviaInsideLoop } from "./forEachChain";
import { ConversionStrategy, ConversionStrategyKind } from "./strategyMatcher";
import { getRemoveStatementEdit, getTokenRange, TextEdit } from "./conversionEdits";
import {
    getEndOfLine, getLineIndentation, getOuterTrivia, printWithoutOuterTrivia, reindent, renderCommentLines,
    renderGap, renderTail, TriviaLayout } from "./printer";

export interface QueryBuilderOptions {
    // the namespace that makes query expressions and `Count`/`ToList` available
    queryNamespace: string,
}

export interface QueryConversion {
    readonly strategy: ConversionStrategy,
    // `from ... select ...`, as it appears in the edits
    readonly query: string,
    readonly edits: readonly TextEdit[],
    // the query namespace, if it is not visible at the loop and must be imported
    readonly missingNamespace: string | null,
}

interface Clause {
    text: string,
    leadingTrivia: readonly Trivia[],
    trailingTrivia: readonly Trivia[],
}

const indentUnit = "    ";

function isImplicitlyTyped(type: TypeNode) : boolean {
    return type.kind === NodeKind.identifierName && type.identifier.token.text === "var";
}

function isZeroLiteral(expression: Expression) : boolean {
    return expression.kind === NodeKind.literalExpression && expression.literal.token.text === "0";
}

// `new List<T>()`, `new System.Collections.Generic.List<T>()` or a target typed `new()`
function isEmptyListCreation(expression: Expression) : boolean {
    if (expression.kind !== NodeKind.objectCreationExpression
        || expression.initializer
        || (expression.argumentList && expression.argumentList.args.length > 0)
    ) {
        return false;
    }
    const type = expression.type;
    if (!type) {
        return true;
    }
    const name = type.kind === NodeKind.qualifiedName ? type.right : type;
    return name.kind === NodeKind.genericName && name.identifier.token.text === "List";
}

/**
 * The initializer of the statement right before the loop, when that statement declares nothing but the local the
 * loop accumulates into.
 */
function findReusableInitializer(forEach: ForEachStatement, target: Expression, isReusable: (value: Expression) => boolean) : EqualsValueClause | null {
    const parent = forEach.parent;
    const statements : readonly Statement[] | null = parent?.kind === NodeKind.block || parent?.kind === NodeKind.switchSection
        ? parent.statements
        : null;
    const index = statements ? statements.indexOf(forEach) : -1;
    if (!statements || index <= 0 || target.kind !== NodeKind.identifierName) {
        return null;
    }

    const previous = statements[index - 1];
    if (previous.kind !== NodeKind.localDeclarationStatement
        || previous.modifiers.length > 0
        || previous.declaration.variables.length !== 1
    ) {
        return null;
    }

    const declarator = previous.declaration.variables[0];
    const initializer = declarator.initializer;
    if (declarator.identifier.token.text !== target.identifier.token.text || !initializer || !isReusable(initializer.value)) {
        return null;
    }
    return initializer;
}

/**
 * names the statements read, not counting member names after a `.`
 */
function getReferencedNames(nodes: readonly Node[]) : Set<string> {
    const names = new Set<string>();
    function visitor(node: Node | null) : void {
        if (!node) {
            return;
        }
        if (node.kind === NodeKind.memberAccessExpression) {
            visitor(node.expression);
            return;
        }
        if (node.kind === NodeKind.identifierName) {
            names.add(node.identifier.token.text);
        }
        visit(node, visitor);
    }
    nodes.forEach(visitor);
    return names;
}

export function QueryBuilder(sourceFile: SourceFile, chain: ForEachChain, options: QueryBuilderOptions) {
    const sourceText = sourceFile.sourceText;
    const root = chain.forEach;
    const rootLastTerminal = lastTerminal(root);
    const endOfLine = getEndOfLine(sourceText);
    const baseIndent = getLineIndentation(sourceText, root.forEachKeyword.token.range.fromInclusive);
    const statementLayout : TriviaLayout = {indent: baseIndent, endOfLine};
    const continuationLayout : TriviaLayout = {indent: baseIndent + indentUnit, endOfLine};
    const loopRange = getTokenRange(root);
    const followedByLineBreak = !!rootLastTerminal?.trailingTrivia.some((trivia) => trivia.kind === TriviaKind.endOfLine);

    function triviaOf(terminals: readonly Terminal[]) : Trivia[] {
        return terminals.flatMap((terminal) => getTriviaInsideLoop(terminal, root));
    }

    function outerTriviaOf(node: Node) : Trivia[] {
        const {leading, trailing} = getOuterTrivia(node);
        return [...leading, ...trailing];
    }

    function fromClause(forEach: ForEachStatement) : Clause {
        const isTyped = !isImplicitlyTyped(forEach.type);
        const variable : Node = forEach.identifier ?? forEach.designation ?? forEach.inKeyword;
        const typeText = isTyped ? printWithoutOuterTrivia(forEach.type) + " " : "";

        return {
            text: `from ${typeText}${printWithoutOuterTrivia(variable)} in ${printWithoutOuterTrivia(forEach.expression)}`,
            leadingTrivia: forEach === root ? [] : forEach.forEachKeyword.leadingTrivia,
            trailingTrivia: [
                ...triviaOf([forEach.forEachKeyword]).slice(forEach === root ? 0 : forEach.forEachKeyword.leadingTrivia.length),
                ...triviaOf([forEach.leftParen]),
                ...(isTyped ? outerTriviaOf(forEach.type) : triviaOf(getTerminals(forEach.type))),
                ...outerTriviaOf(variable),
                ...triviaOf([forEach.inKeyword]),
                ...outerTriviaOf(forEach.expression),
                ...triviaOf([forEach.rightParen]),
            ],
        };
    }

    function whereClause(ifStatement: IfStatement) : Clause {
        return {
            text: `where ${printWithoutOuterTrivia(ifStatement.condition)}`,
            leadingTrivia: ifStatement.ifKeyword.leadingTrivia,
            trailingTrivia: [
                ...ifStatement.ifKeyword.trailingTrivia,
                ...triviaOf([ifStatement.leftParen]),
                ...outerTriviaOf(ifStatement.condition),
                ...triviaOf([ifStatement.rightParen]),
            ],
        };
    }

    /**
     * A `let` range variable takes the type of its value, so a declared type is kept as a cast; a bare array
     * initializer becomes an array creation.
     */
    function letValue(type: TypeNode, value: Expression) : string {
        const valueText = printWithoutOuterTrivia(value);
        if (isImplicitlyTyped(type)) {
            return valueText;
        }
        const typeText = printWithoutOuterTrivia(type);
        return value.kind === NodeKind.initializerExpression
            ? `new ${typeText} ${valueText}`
            : `(${typeText})(${valueText})`;
    }

    function letClause(declarator: VariableDeclarator, initializer: EqualsValueClause, type: TypeNode) : Clause {
        return {
            text: `let ${declarator.identifier.token.text} = ${letValue(type, initializer.value)}`,
            leadingTrivia: [],
            trailingTrivia: [
                ...triviaOf([declarator.identifier, initializer.equals]),
                ...outerTriviaOf(initializer.value),
            ],
        };
    }

    function clauseOf(extendedNode: ExtendedNode) : Clause {
        let clause : Clause;
        switch (extendedNode.kind) {
            case ExtendedNodeKind.forEach:
                clause = fromClause(extendedNode.node);
                break;
            case ExtendedNodeKind.if:
                clause = whereClause(extendedNode.node);
                break;
            case ExtendedNodeKind.declarator:
                clause = letClause(extendedNode.node, extendedNode.initializer, extendedNode.type);
                break;
            default:
                exhaustiveCaseGuard(extendedNode);
        }
        return {
            text: clause.text,
            leadingTrivia: [...extendedNode.leadingTrivia, ...clause.leadingTrivia],
            trailingTrivia: [...clause.trailingTrivia, ...extendedNode.trailingTrivia],
        };
    }

    /**
     * the chain's clauses followed by `select <selectText>`; trivia between clauses is laid out at the continuation indent
     */
    function buildQuery(selectText: string, selectLeadingTrivia: readonly Trivia[]) : string {
        const clauses = [fromClause(root), ...chain.extendedNodes.map(clauseOf)];
        const parts = [clauses[0].text];
        for (let i = 1; i < clauses.length; i++) {
            parts.push(renderGap([...clauses[i-1].trailingTrivia, ...clauses[i].leadingTrivia], continuationLayout), clauses[i].text);
        }
        const last = clauses[clauses.length - 1];
        parts.push(renderGap([...last.trailingTrivia, ...selectLeadingTrivia], continuationLayout), "select ", selectText);
        return parts.join("");
    }

    function removeLoop(tail: string) : TextEdit {
        return tail === ""
            ? getRemoveStatementEdit(sourceText, root)
            : TextEdit(loopRange, tail.trimStart());
    }

    /**
     * identifiers the leftover statements use, in scope order; the last one introduced if they use none
     */
    function getSelectedIdentifiers() : string[] {
        const referenced = getReferencedNames(chain.terminalStatements);
        const selected : string[] = [];
        for (const identifier of chain.identifiers) {
            const name = identifier.token.text;
            if (referenced.has(name) && !selected.includes(name)) {
                selected.push(name);
            }
        }
        if (selected.length === 0 && chain.identifiers.length > 0) {
            selected.push(chain.identifiers[chain.identifiers.length - 1].token.text);
        }
        return selected;
    }

    function buildDefaultBody() : string {
        const statements = [...chain.terminalStatements];
        const first = statements.length > 0 ? firstTerminal(statements[0]) : undefined;
        const last = statements.length > 0 ? lastTerminal(statements[statements.length - 1]) : undefined;
        const parts = ["{", endOfLine];

        if (!first || !last) {
            parts.push(renderCommentLines([...chain.leadingTrivia, ...chain.trailingTrivia.flat()], continuationLayout));
        }
        else {
            const fromIndent = getLineIndentation(sourceText, first.token.range.fromInclusive);
            const lastTrailingTrivia = last === rootLastTerminal ? [] : last.trailingTrivia;
            parts.push(
                renderCommentLines([...chain.leadingTrivia, ...first.leadingTrivia], continuationLayout),
                continuationLayout.indent,
                reindent(printWithoutOuterTrivia(statements), fromIndent, continuationLayout.indent),
                renderTail([...lastTrailingTrivia, ...chain.trailingTrivia.flat()], continuationLayout, true),
                endOfLine);
        }

        parts.push(baseIndent, "}");
        return parts.join("");
    }

    function build(strategy: ConversionStrategy) : QueryConversion {
        const missingNamespace = chain.semanticModel.isNamespaceInScope(root, options.queryNamespace)
            ? null
            : options.queryNamespace;

        switch (strategy.kind) {
            case ConversionStrategyKind.default: {
                const selected = getSelectedIdentifiers();
                const selectText = selected.length === 1 ? selected[0] : `(${selected.join(", ")})`;
                const query = buildQuery(selectText, []);
                const header = `foreach (var ${selectText} in ${query})`;
                return {
                    strategy,
                    query,
                    edits: [TextEdit(loopRange, header + endOfLine + baseIndent + buildDefaultBody())],
                    missingNamespace,
                };
            }
            case ConversionStrategyKind.count:
            case ConversionStrategyKind.toList: {
                const isCount = strategy.kind === ConversionStrategyKind.count;
                const query = buildQuery(
                    printWithoutOuterTrivia(strategy.selectExpression),
                    [...chain.leadingTrivia, ...strategy.trivia.leading]);
                const tail = renderTail([...strategy.trivia.trailing, ...chain.trailingTrivia.flat()], statementLayout, followedByLineBreak);
                const target = printWithoutOuterTrivia(strategy.modifyingExpression);
                const value = isCount ? `(${query}).Count()` : `(${query}).ToList()`;

                const initializer = findReusableInitializer(root, strategy.modifyingExpression, isCount ? isZeroLiteral : isEmptyListCreation);
                const edits = initializer
                    ? [TextEdit(getTokenRange(initializer.value), value), removeLoop(tail)]
                    : [TextEdit(loopRange, (isCount ? `${target} += ${value};` : `${target}.AddRange(${query});`) + tail)];

                return {strategy, query, edits, missingNamespace};
            }
            case ConversionStrategyKind.yieldReturn: {
                const query = buildQuery(
                    printWithoutOuterTrivia(strategy.selectExpression),
                    [...chain.leadingTrivia, ...strategy.trivia.leading]);
                const tail = renderTail([...strategy.trivia.trailing, ...chain.trailingTrivia.flat()], statementLayout, followedByLineBreak);
                const edits = [TextEdit(loopRange, `return ${query};` + tail)];
                if (strategy.yieldBreak) {
                    edits.push(getRemoveStatementEdit(sourceText, strategy.yieldBreak));
                }
                return {strategy, query, edits, missingNamespace};
            }
            default:
                exhaustiveCaseGuard(strategy);
        }
    }

    return {
        buildQuery,
        build,
    }
}

export type QueryBuilder = ReturnType<typeof QueryBuilder>;
