import type { docs_v1 } from "googleapis";
import type { DocsDocument, DocsParagraph, DocsStructuralElement, DocsTable, RenderFormat } from "./types.js";

export interface RenderOptions {
	/** Prefix the output with the document title. Ignored for raw output. */
	includeTitle?: boolean;
}

const SOFT_LINE_BREAK = /\u000b/g;

export function renderDocument(document: DocsDocument, format: RenderFormat, options: RenderOptions = {}): string {
	if (format === "raw") {
		return renderRaw(document);
	}

	const body = format === "markdown" ? renderMarkdown(document) : renderPlainText(document);
	if (!options.includeTitle || !document.title) {
		return body;
	}

	const heading = format === "markdown" ? `# ${document.title}` : document.title;
	return body ? `${heading}\n\n${body}` : `${heading}\n`;
}

export function renderRaw(document: DocsDocument): string {
	return JSON.stringify(document, null, 2);
}

// Plain text

/** A body of nothing but empty paragraphs renders as "". */
export function renderPlainText(document: DocsDocument): string {
	const text = contentToText(document.body?.content).replace(SOFT_LINE_BREAK, "\n");
	return text.trim() === "" ? "" : text;
}

function contentToText(content: DocsStructuralElement[] | undefined): string {
	const parts: string[] = [];
	for (const element of content ?? []) {
		if (element.paragraph) {
			parts.push(paragraphText(element.paragraph));
		}
		if (element.table) {
			for (const row of element.table.tableRows ?? []) {
				const cells = (row.tableCells ?? []).map((cell) => contentToText(cell.content).trim());
				parts.push(`${cells.join("\t")}\n`);
			}
		}
	}
	return parts.join("");
}

function paragraphText(paragraph: DocsParagraph): string {
	let text = "";
	for (const elem of paragraph.elements ?? []) {
		if (elem.textRun?.content) {
			text += elem.textRun.content;
		}
	}
	return text;
}

// Markdown

interface Block {
	text: string;
	listItem: boolean;
}

export function renderMarkdown(document: DocsDocument): string {
	const blocks: Block[] = [];

	for (const element of document.body?.content ?? []) {
		if (element.paragraph) {
			const block = paragraphToMarkdown(element.paragraph, document);
			if (block) blocks.push(block);
		}
		if (element.table) {
			const table = tableToMarkdown(element.table, document);
			if (table) blocks.push({ text: table, listItem: false });
		}
	}

	if (blocks.length === 0) {
		return "";
	}

	let markdown = blocks[0].text;
	for (let i = 1; i < blocks.length; i++) {
		const separator = blocks[i - 1].listItem && blocks[i].listItem ? "\n" : "\n\n";
		markdown += separator + blocks[i].text;
	}
	return `${markdown}\n`;
}

function paragraphToMarkdown(paragraph: DocsParagraph, document: DocsDocument): Block | null {
	const text = inlineMarkdown(paragraph, document).trim();
	if (!text) {
		return null;
	}

	if (paragraph.bullet) {
		const level = paragraph.bullet.nestingLevel ?? 0;
		const marker = isOrderedList(document, paragraph.bullet) ? "1." : "-";
		return { text: `${"  ".repeat(level)}${marker} ${text}`, listItem: true };
	}

	const namedStyle = paragraph.paragraphStyle?.namedStyleType;
	if (namedStyle === "TITLE") {
		return { text: `# ${text}`, listItem: false };
	}
	if (namedStyle === "SUBTITLE") {
		return { text: `*${text}*`, listItem: false };
	}
	if (namedStyle?.startsWith("HEADING_")) {
		const level = Number.parseInt(namedStyle.replace("HEADING_", ""), 10);
		if (level >= 1 && level <= 6) {
			return { text: `${"#".repeat(level)} ${text}`, listItem: false };
		}
	}

	return { text, listItem: false };
}

function isOrderedList(document: DocsDocument, bullet: docs_v1.Schema$Bullet): boolean {
	if (!bullet.listId) return false;
	const level = document.lists?.[bullet.listId]?.listProperties?.nestingLevels?.[bullet.nestingLevel ?? 0];
	return Boolean(level?.glyphType && level.glyphType !== "GLYPH_TYPE_UNSPECIFIED");
}

function inlineMarkdown(paragraph: DocsParagraph, document: DocsDocument): string {
	let text = "";
	for (const elem of paragraph.elements ?? []) {
		if (elem.textRun) {
			text += styleRun(elem.textRun.content ?? "", elem.textRun.textStyle ?? undefined);
		} else if (elem.inlineObjectElement?.inlineObjectId) {
			text += imageMarkdown(document, elem.inlineObjectElement.inlineObjectId);
		} else if (elem.horizontalRule) {
			text += "---";
		} else if (elem.richLink?.richLinkProperties) {
			const { title, uri } = elem.richLink.richLinkProperties;
			text += uri ? `[${title ?? uri}](${uri})` : (title ?? "");
		} else if (elem.person?.personProperties) {
			text += elem.person.personProperties.name ?? elem.person.personProperties.email ?? "";
		}
	}
	return text.replace(SOFT_LINE_BREAK, "\n");
}

/** Wraps the non-blank core of a run in markdown markers, leaving its padding outside. */
function styleRun(content: string, style: docs_v1.Schema$TextStyle | undefined): string {
	const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(content);
	if (!style || !match || match[2] === "") {
		return content;
	}

	const [, leading, core, trailing] = match;
	let styled = core;
	if (style.link?.url) {
		styled = `[${styled}](${style.link.url})`;
	}
	if (style.bold) {
		styled = `**${styled}**`;
	}
	if (style.italic) {
		styled = `*${styled}*`;
	}
	if (style.strikethrough) {
		styled = `~~${styled}~~`;
	}
	return leading + styled + trailing;
}

function imageMarkdown(document: DocsDocument, inlineObjectId: string): string {
	const embedded = document.inlineObjects?.[inlineObjectId]?.inlineObjectProperties?.embeddedObject;
	const uri = embedded?.imageProperties?.contentUri ?? embedded?.imageProperties?.sourceUri;
	if (!uri) return "";
	const alt = embedded?.description ?? embedded?.title ?? "";
	return `![${alt}](${uri})`;
}

function tableToMarkdown(table: DocsTable, document: DocsDocument): string {
	const rows: string[][] = [];

	for (const row of table.tableRows ?? []) {
		rows.push((row.tableCells ?? []).map((cell) => cellMarkdown(cell.content, document).replace(/\|/g, "\\|")));
	}

	if (rows.length === 0) {
		return "";
	}

	const [header, ...body] = rows;
	const lines = [`| ${header.join(" | ")} |`, `| ${header.map(() => "---").join(" | ")} |`];
	for (const row of body) {
		lines.push(`| ${row.join(" | ")} |`);
	}
	return lines.join("\n");
}

function cellMarkdown(content: DocsStructuralElement[] | undefined, document: DocsDocument): string {
	const parts: string[] = [];
	for (const element of content ?? []) {
		if (element.paragraph) {
			const text = inlineMarkdown(element.paragraph, document).replace(/\n/g, " ").trim();
			if (text) parts.push(text);
		}
		if (element.table) {
			const nested = element.table.tableRows?.flatMap((row) =>
				(row.tableCells ?? []).map((cell) => cellMarkdown(cell.content, document)),
			);
			if (nested?.length) parts.push(nested.filter(Boolean).join(" "));
		}
	}
	return parts.join(" ");
}
