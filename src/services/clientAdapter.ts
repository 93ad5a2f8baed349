/**
 * Maps our internal representation of text ranges, diagnostics and edits to some client's expectations about
 * how those things should be represented
 *
 * an implementing module exports a single constant `adapter` that `satisfies ClientAdapter<T>`
 */

import type { Diagnostic } from "../compiler/node";
import type { TextEdit } from "./conversionEdits";

export type PosMapper<T> = (pos: number) => T

export interface ClientAdapter<T> {
    diagnostic: (posMapper: PosMapper<T>, diagnostic: Diagnostic) => unknown
    textEdit: (posMapper: PosMapper<T>, textEdit: TextEdit) => unknown
}
