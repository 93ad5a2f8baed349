import { Node, NodeKind, SourceFile, TriviaKind, UsingDirective } from "../compiler/node";
import { SourceRange } from "../compiler/scanner";
import { firstTerminal, lastTerminal } from "../compiler/utils";
import { getEndOfLine, getLineIndentation, isOnlyIndentationBefore, printWithoutOuterTrivia } from "./printer";

/**
 * replace the source text in `range` with `newText`; an empty range is an insertion
 */
export interface TextEdit {
    readonly range: SourceRange,
    readonly newText: string,
}

export function TextEdit(range: SourceRange, newText: string) : TextEdit {
    return {range, newText};
}

/**
 * the range from the node's first token to its last, without the trivia around them
 */
export function getTokenRange(node: Node) : SourceRange {
    const first = firstTerminal(node);
    const last = lastTerminal(node);
    if (!first || !last) {
        return new SourceRange(node.range.fromInclusive, node.range.fromInclusive);
    }
    return new SourceRange(first.token.range.fromInclusive, last.token.range.toExclusive);
}

/**
 * Deletes a statement. When it has its line to itself the whole line goes; otherwise only its tokens do, and the
 * comments around it stay where they are.
 */
export function getRemoveStatementEdit(sourceText: string, statement: Node) : TextEdit {
    const range = getTokenRange(statement);
    const last = lastTerminal(statement);
    const endsLine = !!last
        && last.trailingTrivia.length > 0
        && last.trailingTrivia.every((trivia) => trivia.kind === TriviaKind.whitespace || trivia.kind === TriviaKind.endOfLine)
        && last.trailingTrivia[last.trailingTrivia.length - 1].kind === TriviaKind.endOfLine;

    if (last && endsLine && isOnlyIndentationBefore(sourceText, range.fromInclusive)) {
        const lineStart = range.fromInclusive - getLineIndentation(sourceText, range.fromInclusive).length;
        return TextEdit(new SourceRange(lineStart, last.rangeWithTrivia.toExclusive), "");
    }

    return TextEdit(range, "");
}

function isPlainUsingDirective(node: Node) : node is UsingDirective {
    return node.kind === NodeKind.usingDirective && !node.alias && !node.staticKeyword && !node.globalKeyword;
}

function getUsingNamespace(using: UsingDirective) : string {
    return printWithoutOuterTrivia(using.name).replace(/\s+/g, "");
}

/**
 * Adds `using <namespaceName>;` among the file's top level usings, before the first one that sorts after it, or at
 * the top of the file if it has none.
 */
export function getAddUsingDirectiveEdit(sourceFile: SourceFile, namespaceName: string) : TextEdit {
    const sourceText = sourceFile.sourceText;
    const endOfLine = getEndOfLine(sourceText);
    const directive = `using ${namespaceName};`;
    const usings = sourceFile.content.filter(isPlainUsingDirective);

    if (usings.length === 0) {
        const first = sourceFile.content.length > 0 ? firstTerminal(sourceFile.content[0]) : undefined;
        const position = first ? first.token.range.fromInclusive : 0;
        const indentation = getLineIndentation(sourceText, position);
        return TextEdit(new SourceRange(position, position), directive + endOfLine + endOfLine + indentation);
    }

    const following = usings.find((using) => getUsingNamespace(using) > namespaceName);
    if (following) {
        const position = following.usingKeyword.token.range.fromInclusive;
        const indentation = getLineIndentation(sourceText, position);
        return TextEdit(new SourceRange(position, position), directive + endOfLine + indentation);
    }

    const semicolon = usings[usings.length - 1].semicolon;
    const trailing = semicolon.trailingTrivia;
    if (trailing.length > 0 && trailing[trailing.length - 1].kind === TriviaKind.endOfLine) {
        const position = semicolon.rangeWithTrivia.toExclusive;
        const indentation = getLineIndentation(sourceText, semicolon.token.range.fromInclusive);
        return TextEdit(new SourceRange(position, position), indentation + directive + endOfLine);
    }

    const position = semicolon.token.range.toExclusive;
    return TextEdit(new SourceRange(position, position), endOfLine + directive);
}

/**
 * apply non-overlapping edits, each ranged over the original text
 */
export function applyTextEdits(text: string, edits: readonly TextEdit[]) : string {
    const sorted = [...edits].sort((l, r) => l.range.fromInclusive - r.range.fromInclusive || l.range.toExclusive - r.range.toExclusive);
    const result : string[] = [];
    let pos = 0;
    for (const edit of sorted) {
        if (edit.range.fromInclusive < pos) {
            throw new Error(`Overlapping text edits at offset ${edit.range.fromInclusive}.`);
        }
        result.push(text.slice(pos, edit.range.fromInclusive), edit.newText);
        pos = edit.range.toExclusive;
    }
    result.push(text.slice(pos));
    return result.join("");
}
