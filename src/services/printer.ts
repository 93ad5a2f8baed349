import { isComment, Node, Terminal, Trivia, TriviaKind, TriviaRun } from "../compiler/node";
import { getTerminals } from "../compiler/utils";

export interface PrintOptions {
    leadingTrivia: boolean,
    trailingTrivia: boolean,
}

export function printTrivia(trivia: TriviaRun) : string {
    return trivia.map((v) => v.text).join("");
}

/**
 * terminals in source order; with both trivia options on, printing a parsed source file reproduces its text
 */
export function printNode(node: Node | Node[], options: PrintOptions = {leadingTrivia: true, trailingTrivia: true}) : string {
    const terminals = getTerminals(node);
    const result : string[] = [];
    terminals.forEach((terminal, i) => {
        if (i > 0 || options.leadingTrivia) {
            result.push(printTrivia(terminal.leadingTrivia));
        }
        result.push(terminal.token.text);
        if (i < terminals.length - 1 || options.trailingTrivia) {
            result.push(printTrivia(terminal.trailingTrivia));
        }
    });
    return result.join("");
}

/**
 * a node's text without the trivia before its first token and after its last
 */
export function printWithoutOuterTrivia(node: Node | Node[]) : string {
    return printNode(node, {leadingTrivia: false, trailingTrivia: false});
}

/**
 * the trivia `printWithoutOuterTrivia` leaves out
 */
export function getOuterTrivia(node: Node) : {leading: TriviaRun, trailing: TriviaRun} {
    const terminals = getTerminals(node);
    if (terminals.length === 0) {
        return {leading: [], trailing: []};
    }
    return {
        leading: terminals[0].leadingTrivia,
        trailing: terminals[terminals.length - 1].trailingTrivia,
    };
}

export function getEndOfLine(sourceText: string) : string {
    return sourceText.includes("\r\n") ? "\r\n" : "\n";
}

/**
 * the whitespace that starts the line containing `offset`
 */
export function getLineIndentation(sourceText: string, offset: number) : string {
    const lineStart = offset > 0 ? sourceText.lastIndexOf("\n", offset - 1) + 1 : 0;
    const match = /^[ \t]*/.exec(sourceText.slice(lineStart, offset));
    return match ? match[0] : "";
}

export function isOnlyIndentationBefore(sourceText: string, offset: number) : boolean {
    const lineStart = offset > 0 ? sourceText.lastIndexOf("\n", offset - 1) + 1 : 0;
    return /^[ \t]*$/.test(sourceText.slice(lineStart, offset));
}

/**
 * move lines indented at `from` to `to`, and preprocessor directive lines to column 0; the first line is assumed to be
 * positioned by the caller
 */
export function reindent(text: string, from: string, to: string) : string {
    return text.split("\n").map((line, i) => {
        if (i > 0 && /^[ \t]*#/.test(line)) {
            return line.trimStart();
        }
        if (i === 0 || !line.startsWith(from) || /^[ \t]*\r?$/.test(line)) {
            return line;
        }
        return to + line.slice(from.length);
    }).join("\n");
}

export interface TriviaLayout {
    // the indentation of lines that generated code breaks onto
    indent: string,
    endOfLine: string,
}

function isCommentLike(trivia: Trivia | undefined) : boolean {
    return !!trivia && (isComment(trivia) || trivia.kind === TriviaKind.directive);
}

function isEndOfLine(trivia: Trivia | undefined) : boolean {
    return trivia?.kind === TriviaKind.endOfLine;
}

/**
 * Two ends-of-line with nothing but whitespace between them in the source. A run may join trivia from tokens that
 * are dropped, so neighbours in the run are not necessarily neighbours in the source.
 */
function isBlankLine(trivia: TriviaRun, first: number, second: number) : boolean {
    if (trivia[first].kind !== TriviaKind.endOfLine || trivia[second].kind !== TriviaKind.endOfLine) {
        return false;
    }
    for (let i = first + 1; i <= second; i++) {
        const prev = trivia[i-1].range;
        const next = trivia[i].range;
        if (prev.isNil() || next.isNil() || prev.toExclusive !== next.fromInclusive) {
            return false;
        }
        if (i < second && trivia[i].kind !== TriviaKind.whitespace) {
            return false;
        }
    }
    return true;
}

/**
 * Comments and directives survive; whitespace does not. An end-of-line survives when it ends a comment line, starts
 * the line of a following comment, or is part of a blank line. Two surviving ends-of-line in a row must be a blank
 * line of the source; otherwise the second is dropped.
 */
export function getRetainedTrivia(trivia: TriviaRun) : Trivia[] {
    const significant : number[] = [];
    trivia.forEach((v, i) => {
        if (v.kind !== TriviaKind.whitespace) {
            significant.push(i);
        }
    });

    const result : Trivia[] = [];
    let lastRetained : number | undefined = undefined;
    significant.forEach((index, i) => {
        const v = trivia[index];
        const before : number | undefined = significant[i-1];
        const after : number | undefined = significant[i+1];
        if (v.kind !== TriviaKind.endOfLine) {
            result.push(v);
            lastRetained = index;
            return;
        }
        const survives = (before !== undefined && (isCommentLike(trivia[before]) || isBlankLine(trivia, before, index)))
            || (after !== undefined && (isCommentLike(trivia[after]) || isBlankLine(trivia, index, after)));
        const doublesLineBreak = lastRetained !== undefined
            && trivia[lastRetained].kind === TriviaKind.endOfLine
            && !isBlankLine(trivia, lastRetained, index);
        if (survives && !doublesLineBreak) {
            result.push(v);
            lastRetained = index;
        }
    });
    return result;
}

function TriviaWriter(layout: TriviaLayout, startsAtLineStart: boolean) {
    const parts : string[] = [];
    let atLineStart = startsAtLineStart;
    // a single line comment or directive must not share its line with what follows
    let lineBreakPending = false;

    function breakLine() {
        parts.push(layout.endOfLine);
        atLineStart = true;
        lineBreakPending = false;
    }

    function write(trivia: readonly Trivia[]) {
        for (const v of trivia) {
            if (v.kind === TriviaKind.endOfLine) {
                parts.push(v.text);
                atLineStart = true;
                lineBreakPending = false;
                continue;
            }
            if (lineBreakPending || (v.kind === TriviaKind.directive && !atLineStart)) {
                breakLine();
            }
            // directives start their line at column 0
            parts.push(atLineStart ? (v.kind === TriviaKind.directive ? "" : layout.indent) : " ");
            parts.push(v.text);
            atLineStart = false;
            lineBreakPending = v.kind === TriviaKind.singleLineComment || v.kind === TriviaKind.directive;
        }
    }

    return {
        write,
        breakLine,
        isEmpty: () => parts.length === 0,
        atLineStart: () => atLineStart,
        lineBreakPending: () => lineBreakPending,
        text: () => parts.join(""),
    }
}

/**
 * The separator placed between two pieces of generated code. An empty gap is a single space; otherwise the retained
 * trivia is laid out and the next piece is indented if it starts a line.
 */
export function renderGap(trivia: TriviaRun, layout: TriviaLayout) : string {
    const writer = TriviaWriter(layout, false);
    writer.write(getRetainedTrivia(trivia));
    if (writer.isEmpty()) {
        return " ";
    }
    if (writer.lineBreakPending()) {
        writer.breakLine();
    }
    return writer.text() + (writer.atLineStart() ? layout.indent : " ");
}

function trimEndOfLines(trivia: Trivia[]) : Trivia[] {
    let from = 0;
    let to = trivia.length;
    while (from < to && trivia[from].kind === TriviaKind.endOfLine) from++;
    while (to > from && trivia[to-1].kind === TriviaKind.endOfLine) to--;
    return trivia.slice(from, to);
}

/**
 * Trivia placed after the last piece of generated code. Nothing at all if no comment survives.
 * `followedByLineBreak` says whether the text after the generated code starts with a line break of its own.
 */
export function renderTail(trivia: TriviaRun, layout: TriviaLayout, followedByLineBreak: boolean) : string {
    const retained = getRetainedTrivia(trivia);
    while (retained.length > 0 && isEndOfLine(retained[retained.length - 1])) {
        retained.pop();
    }
    const writer = TriviaWriter(layout, false);
    writer.write(retained);
    if (writer.lineBreakPending() && !followedByLineBreak) {
        writer.breakLine();
        return writer.text() + layout.indent;
    }
    return writer.text();
}

/**
 * Retained comments as whole lines at `layout.indent`, each line ended; the empty string if there are none.
 */
export function renderCommentLines(trivia: TriviaRun, layout: TriviaLayout) : string {
    const retained = trimEndOfLines(getRetainedTrivia(trivia));
    if (retained.length === 0) {
        return "";
    }
    const writer = TriviaWriter(layout, true);
    writer.write(retained);
    if (!writer.atLineStart()) {
        writer.breakLine();
    }
    return writer.text();
}
