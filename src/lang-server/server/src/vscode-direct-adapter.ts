import { Diagnostic as vsDiagnostic, DiagnosticSeverity as vsDiagnosticSeverity } from "vscode-languageserver/node";
import { Position as vsPosition, Range as vsRange, TextEdit as vsTextEdit } from "vscode-languageserver-types"
import { Diagnostic, DiagnosticKind } from "../../../compiler/node";
import { SourceRange } from "../../../compiler/scanner"
import { ClientAdapter, PosMapper } from "../../../services/clientAdapter";
import { TextEdit } from "../../../services/conversionEdits";

import {
	TextDocument
} from 'vscode-languageserver-textdocument';

function sourcePositionToVsPosition(doc: TextDocument) : PosMapper<vsPosition> {
	return (pos: number) => doc.positionAt(pos);
}

const nilRangeAsPosition : vsPosition = {line: 0, character: 0}

function sourceRangeToVsRange(posMapper: PosMapper<vsPosition>, sourceRange: SourceRange) : vsRange {
	const start = sourceRange.isNil() ? nilRangeAsPosition : posMapper(sourceRange.fromInclusive);
	const end = sourceRange.isNil() ? nilRangeAsPosition : posMapper(sourceRange.toExclusive);
	return {
		start,
		end
	}
}

function diagnostic(posMapper: PosMapper<vsPosition>, diagnostic: Diagnostic) : vsDiagnostic {
	return {
		severity: diagnostic.kind === DiagnosticKind.error ? vsDiagnosticSeverity.Error : vsDiagnosticSeverity.Warning,
		range: sourceRangeToVsRange(posMapper, new SourceRange(diagnostic.fromInclusive, diagnostic.toExclusive)),
		message: diagnostic.msg,
		source: "query-refactor"
	}
}

function textEdit(posMapper: PosMapper<vsPosition>, textEdit: TextEdit) : vsTextEdit {
	return {
		range: sourceRangeToVsRange(posMapper, textEdit.range),
		newText: textEdit.newText,
	}
}

export const adapter = {
	sourcePositionToVsPosition,
	diagnostic,
	textEdit,
} as const satisfies ClientAdapter<vsPosition> & {sourcePositionToVsPosition: (doc: TextDocument) => PosMapper<vsPosition>}
