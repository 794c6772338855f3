import type { docs_v1 } from "googleapis";
import { ValidationError } from "./errors.js";
import type {
	DocsDocument,
	DocsRequest,
	DocsStructuralElement,
	ParagraphStyleOptions,
	TableInfo,
	TextStyleOptions,
} from "./types.js";

// Primitive requests. Indices are Docs API indices (UTF-16 code units, body starts at 1).

function location(index: number, segmentId?: string): docs_v1.Schema$Location {
	return segmentId ? { index, segmentId } : { index };
}

function range(startIndex: number, endIndex: number, segmentId?: string): docs_v1.Schema$Range {
	return segmentId ? { startIndex, endIndex, segmentId } : { startIndex, endIndex };
}

export function insertTextRequest(text: string, index = 1, segmentId?: string): DocsRequest {
	return { insertText: { location: location(index, segmentId), text } };
}

export function parseColor(hex: string): docs_v1.Schema$OptionalColor {
	const match = /^#?([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(hex);
	if (!match) {
		throw new ValidationError(`Invalid colour '${hex}'. Use a hex value such as #FF0000.`);
	}
	const [, r, g, b] = match;
	return {
		color: {
			rgbColor: {
				red: Number.parseInt(r, 16) / 255,
				green: Number.parseInt(g, 16) / 255,
				blue: Number.parseInt(b, 16) / 255,
			},
		},
	};
}

export function hasTextStyle(style: TextStyleOptions | undefined): style is TextStyleOptions {
	if (!style) return false;
	return Boolean(
		style.bold ||
			style.italic ||
			style.underline ||
			style.strikethrough ||
			style.fontSize ||
			style.fontFamily ||
			style.linkUrl ||
			style.foregroundColor ||
			style.backgroundColor,
	);
}

export function updateTextStyleRequest(
	startIndex: number,
	endIndex: number,
	style: TextStyleOptions,
	segmentId?: string,
): DocsRequest {
	const textStyle: docs_v1.Schema$TextStyle = {};
	const fields: string[] = [];

	if (style.bold) {
		textStyle.bold = true;
		fields.push("bold");
	}
	if (style.italic) {
		textStyle.italic = true;
		fields.push("italic");
	}
	if (style.underline) {
		textStyle.underline = true;
		fields.push("underline");
	}
	if (style.strikethrough) {
		textStyle.strikethrough = true;
		fields.push("strikethrough");
	}
	if (style.fontSize) {
		textStyle.fontSize = { magnitude: style.fontSize, unit: "PT" };
		fields.push("fontSize");
	}
	if (style.fontFamily) {
		textStyle.weightedFontFamily = { fontFamily: style.fontFamily };
		fields.push("weightedFontFamily");
	}
	if (style.linkUrl) {
		textStyle.link = { url: style.linkUrl };
		fields.push("link");
	}
	if (style.foregroundColor) {
		textStyle.foregroundColor = parseColor(style.foregroundColor);
		fields.push("foregroundColor");
	}
	if (style.backgroundColor) {
		textStyle.backgroundColor = parseColor(style.backgroundColor);
		fields.push("backgroundColor");
	}

	return {
		updateTextStyle: {
			range: range(startIndex, endIndex, segmentId),
			textStyle,
			fields: fields.join(","),
		},
	};
}

export function hasParagraphStyle(style: ParagraphStyleOptions | undefined): style is ParagraphStyleOptions {
	if (!style) return false;
	return Boolean(
		style.namedStyle ||
			(style.alignment && style.alignment !== "START") ||
			style.spaceAbovePt ||
			style.spaceBelowPt ||
			style.indentFirstLinePt,
	);
}

export function updateParagraphStyleRequest(
	startIndex: number,
	endIndex: number,
	style: ParagraphStyleOptions,
	segmentId?: string,
): DocsRequest {
	const paragraphStyle: docs_v1.Schema$ParagraphStyle = {};
	const fields: string[] = [];

	if (style.namedStyle) {
		paragraphStyle.namedStyleType = style.namedStyle;
		fields.push("namedStyleType");
	}
	if (style.alignment && style.alignment !== "START") {
		paragraphStyle.alignment = style.alignment;
		fields.push("alignment");
	}
	if (style.spaceAbovePt && style.spaceAbovePt > 0) {
		paragraphStyle.spaceAbove = { magnitude: style.spaceAbovePt, unit: "PT" };
		fields.push("spaceAbove");
	}
	if (style.spaceBelowPt && style.spaceBelowPt > 0) {
		paragraphStyle.spaceBelow = { magnitude: style.spaceBelowPt, unit: "PT" };
		fields.push("spaceBelow");
	}
	if (style.indentFirstLinePt && style.indentFirstLinePt > 0) {
		paragraphStyle.indentFirstLine = { magnitude: style.indentFirstLinePt, unit: "PT" };
		fields.push("indentFirstLine");
	}

	return {
		updateParagraphStyle: {
			range: range(startIndex, endIndex, segmentId),
			paragraphStyle,
			fields: fields.join(","),
		},
	};
}

export function insertTableRequest(rows: number, columns: number, index = 1, segmentId?: string): DocsRequest {
	return { insertTable: { rows, columns, location: location(index, segmentId) } };
}

function tableCellLocation(tableStartIndex: number, rowIndex: number, columnIndex: number) {
	return {
		tableStartLocation: { index: tableStartIndex },
		rowIndex,
		columnIndex,
	};
}

export function insertTableRowRequest(tableStartIndex: number, rowIndex: number, insertBelow = true): DocsRequest {
	return {
		insertTableRow: {
			tableCellLocation: tableCellLocation(tableStartIndex, rowIndex, 0),
			insertBelow,
		},
	};
}

export function deleteTableRowRequest(tableStartIndex: number, rowIndex: number): DocsRequest {
	return { deleteTableRow: { tableCellLocation: tableCellLocation(tableStartIndex, rowIndex, 0) } };
}

export function insertTableColumnRequest(
	tableStartIndex: number,
	columnIndex: number,
	insertRight = true,
): DocsRequest {
	return {
		insertTableColumn: {
			tableCellLocation: tableCellLocation(tableStartIndex, 0, columnIndex),
			insertRight,
		},
	};
}

export function deleteTableColumnRequest(tableStartIndex: number, columnIndex: number): DocsRequest {
	return { deleteTableColumn: { tableCellLocation: tableCellLocation(tableStartIndex, 0, columnIndex) } };
}

export function deleteContentRangeRequest(startIndex: number, endIndex: number, segmentId?: string): DocsRequest {
	return { deleteContentRange: { range: range(startIndex, endIndex, segmentId) } };
}

export function replaceAllTextRequest(find: string, replace: string, matchCase = true): DocsRequest {
	return {
		replaceAllText: {
			containsText: { text: find, matchCase },
			replaceText: replace,
		},
	};
}

export function createParagraphBulletsRequest(
	startIndex: number,
	endIndex: number,
	bulletPreset = "BULLET_DISC_CIRCLE_SQUARE",
	segmentId?: string,
): DocsRequest {
	return {
		createParagraphBullets: {
			range: range(startIndex, endIndex, segmentId),
			bulletPreset,
		},
	};
}

// Intent builders.

export interface StyleOptions {
	paragraphStyle?: ParagraphStyleOptions;
	textStyle?: TextStyleOptions;
}

function assertIndex(name: string, value: number, min: number): void {
	if (!Number.isInteger(value) || value < min) {
		throw new ValidationError(`${name} must be an integer >= ${min}, got ${value}`);
	}
}

function styleRequests(start: number, textLength: number, paragraphEnd: number, styles: StyleOptions): DocsRequest[] {
	const requests: DocsRequest[] = [];
	if (hasParagraphStyle(styles.paragraphStyle)) {
		requests.push(updateParagraphStyleRequest(start, paragraphEnd, styles.paragraphStyle));
	}
	if (hasTextStyle(styles.textStyle)) {
		requests.push(updateTextStyleRequest(start, start + textLength, styles.textStyle));
	}
	return requests;
}

/** Inserts `text` as its own paragraph at `index`, then styles it. */
export function buildInsertRequests(text: string, index: number, styles: StyleOptions = {}): DocsRequest[] {
	if (text === "") throw new ValidationError("Text to insert must not be empty");
	assertIndex("Index", index, 1);

	return [
		insertTextRequest(`${text}\n`, index),
		...styleRequests(index, text.length, index + text.length + 1, styles),
	];
}

/** Index just before the body's final newline; 1 for an empty body. */
export function documentEndIndex(document: DocsDocument): number {
	const content = document.body?.content;
	if (!content) return 1;

	let maxIndex = 1;
	for (const element of content) {
		if (element.endIndex && element.endIndex > maxIndex) {
			maxIndex = element.endIndex;
		}
	}
	return Math.max(1, maxIndex - 1);
}

function lastParagraphText(document: DocsDocument): string {
	const content = document.body?.content ?? [];
	for (let i = content.length - 1; i >= 0; i--) {
		const paragraph = content[i].paragraph;
		if (paragraph) {
			return (paragraph.elements ?? []).map((e) => e.textRun?.content ?? "").join("");
		}
	}
	return "";
}

export interface AppendPlan {
	requests: DocsRequest[];
	/** Where the appended text starts once the batch is applied. */
	index: number;
}

/**
 * Appends `text` as a new paragraph at the end of the body. The end index is
 * taken from the current document, so the batch must be sent against the same
 * revision.
 */
export function buildAppendRequests(document: DocsDocument, text: string, styles: StyleOptions = {}): AppendPlan {
	if (text === "") throw new ValidationError("Text to append must not be empty");

	const end = documentEndIndex(document);
	const needsBreak = lastParagraphText(document).replace(/\n$/, "") !== "";
	const start = needsBreak ? end + 1 : end;

	return {
		requests: [
			insertTextRequest(needsBreak ? `\n${text}` : text, end),
			...styleRequests(start, text.length, start + text.length, styles),
		],
		index: start,
	};
}

interface TextSpan {
	start: number;
	text: string;
}

function collectTextSpans(content: DocsStructuralElement[] | undefined, spans: TextSpan[]): void {
	for (const element of content ?? []) {
		// Runs merge only within one paragraph, so no match crosses a paragraph break.
		let current: TextSpan | undefined;
		for (const part of element.paragraph?.elements ?? []) {
			const run = part.textRun?.content;
			if (!run || part.startIndex == null) continue;

			if (current && current.start + current.text.length === part.startIndex) {
				current.text += run;
			} else {
				current = { start: part.startIndex, text: run };
				spans.push(current);
			}
		}
		for (const row of element.table?.tableRows ?? []) {
			for (const cell of row.tableCells ?? []) {
				collectTextSpans(cell.content ?? undefined, spans);
			}
		}
	}
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface TextMatch {
	startIndex: number;
	endIndex: number;
}

/** Non-overlapping occurrences of `find` in document order. */
export function findTextMatches(document: DocsDocument, find: string, matchCase = true): TextMatch[] {
	if (find === "") throw new ValidationError("Search text must not be empty");

	const spans: TextSpan[] = [];
	collectTextSpans(document.body?.content ?? undefined, spans);

	const matches: TextMatch[] = [];
	for (const span of spans) {
		const pattern = new RegExp(escapeRegExp(find), matchCase ? "g" : "gi");
		for (let m = pattern.exec(span.text); m !== null; m = pattern.exec(span.text)) {
			const startIndex = span.start + m.index;
			matches.push({ startIndex, endIndex: startIndex + m[0].length });
		}
	}
	return matches;
}

export interface ReplacePlan {
	requests: DocsRequest[];
	occurrences: number;
}

/**
 * Replaces every occurrence of `find` with `replace`. Edits are emitted from
 * the last occurrence to the first, so each delete/insert pair only moves text
 * after every index still pending in the batch.
 */
export function buildReplaceRequests(
	document: DocsDocument,
	find: string,
	replace: string,
	options: { matchCase?: boolean } = {},
): ReplacePlan {
	const matches = findTextMatches(document, find, options.matchCase ?? true);
	const requests: DocsRequest[] = [];

	for (const match of [...matches].reverse()) {
		requests.push(deleteContentRangeRequest(match.startIndex, match.endIndex));
		if (replace !== "") {
			requests.push(insertTextRequest(replace, match.startIndex));
		}
	}

	return { requests, occurrences: matches.length };
}

/** Top-level body tables in document order. */
export function findTables(document: DocsDocument): TableInfo[] {
	const tables: TableInfo[] = [];
	for (const element of document.body?.content ?? []) {
		if (!element.table) continue;
		tables.push({
			tableIndex: tables.length,
			startIndex: element.startIndex ?? 0,
			endIndex: element.endIndex ?? 0,
			rows: element.table.rows ?? element.table.tableRows?.length ?? 0,
			columns: element.table.columns ?? 0,
		});
	}
	return tables;
}

export function resolveTable(document: DocsDocument, tableIndex: number): TableInfo {
	assertIndex("Table index", tableIndex, 0);
	const tables = findTables(document);
	const table = tables[tableIndex];
	if (!table) {
		throw new ValidationError(`Table index ${tableIndex} not found. Document has ${tables.length} table(s).`);
	}
	return table;
}

function assertRow(table: TableInfo, row: number): void {
	assertIndex("Row index", row, 0);
	if (row >= table.rows) {
		throw new ValidationError(`Row index ${row} out of range. Table ${table.tableIndex} has ${table.rows} row(s).`);
	}
}

function assertColumn(table: TableInfo, column: number): void {
	assertIndex("Column index", column, 0);
	if (column >= table.columns) {
		throw new ValidationError(
			`Column index ${column} out of range. Table ${table.tableIndex} has ${table.columns} column(s).`,
		);
	}
}

export function buildCreateTableRequest(rows: number, columns: number, index: number): DocsRequest {
	assertIndex("Rows", rows, 1);
	assertIndex("Columns", columns, 1);
	assertIndex("Index", index, 1);
	return insertTableRequest(rows, columns, index);
}

export function buildAddRowRequest(table: TableInfo, row: number, options: { above?: boolean } = {}): DocsRequest {
	assertRow(table, row);
	return insertTableRowRequest(table.startIndex, row, !options.above);
}

export function buildDeleteRowRequest(table: TableInfo, row: number): DocsRequest {
	assertRow(table, row);
	return deleteTableRowRequest(table.startIndex, row);
}

export function buildAddColumnRequest(table: TableInfo, column: number, options: { left?: boolean } = {}): DocsRequest {
	assertColumn(table, column);
	return insertTableColumnRequest(table.startIndex, column, !options.left);
}

export function buildDeleteColumnRequest(table: TableInfo, column: number): DocsRequest {
	assertColumn(table, column);
	return deleteTableColumnRequest(table.startIndex, column);
}

export function buildBulletsRequest(startIndex: number, endIndex: number, preset?: string): DocsRequest {
	assertIndex("Start index", startIndex, 1);
	if (!Number.isInteger(endIndex) || endIndex <= startIndex) {
		throw new ValidationError(`End index must be an integer greater than ${startIndex}, got ${endIndex}`);
	}
	return createParagraphBulletsRequest(startIndex, endIndex, preset);
}
