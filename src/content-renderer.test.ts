import type { docs_v1 } from "googleapis";
import { describe, expect, it } from "vitest";
import { renderDocument, renderMarkdown, renderPlainText, renderRaw } from "./content-renderer.js";
import type { DocsDocument, DocsParagraphElement, DocsStructuralElement } from "./types.js";

function run(content: string, textStyle?: docs_v1.Schema$TextStyle): DocsParagraphElement {
	return { textRun: { content, textStyle } };
}

function para(elements: DocsParagraphElement[], extra: docs_v1.Schema$Paragraph = {}): DocsStructuralElement {
	return { paragraph: { elements, ...extra } };
}

function styled(namedStyleType: string, text: string): DocsStructuralElement {
	return para([run(text)], { paragraphStyle: { namedStyleType } });
}

function table(rows: string[][]): DocsStructuralElement {
	return {
		table: {
			rows: rows.length,
			columns: rows[0]?.length ?? 0,
			tableRows: rows.map((cells) => ({
				tableCells: cells.map((text) => ({ content: [para([run(`${text}\n`)])] })),
			})),
		},
	};
}

function doc(content: DocsStructuralElement[], extra: Partial<DocsDocument> = {}): DocsDocument {
	return { documentId: "doc-1", title: "Plan", body: { content: [{ sectionBreak: {} }, ...content] }, ...extra };
}

const sample = doc(
	[
		styled("HEADING_1", "Goals\n"),
		para([run("Ship "), run("fast", { bold: true }), run(" now\n")]),
		para([run("one\n")], { bullet: { listId: "l1", nestingLevel: 0 } }),
		para([run("two\n")], { bullet: { listId: "l1", nestingLevel: 1 } }),
		para([run("\n")]),
		table([
			["A", "B"],
			["1", "2|3"],
		]),
	],
	{
		lists: {
			l1: { listProperties: { nestingLevels: [{ glyphSymbol: "●" }, { glyphSymbol: "○" }] } },
		},
	},
);

describe("content renderer", () => {
	describe("renderMarkdown", () => {
		it("should render headings, styled runs, lists and tables", () => {
			expect(renderMarkdown(sample)).toBe(
				[
					"# Goals",
					"",
					"Ship **fast** now",
					"",
					"- one",
					"  - two",
					"",
					"| A | B |",
					"| --- | --- |",
					"| 1 | 2\\|3 |",
					"",
				].join("\n"),
			);
		});

		it("should map every heading level", () => {
			const markdown = renderMarkdown(
				doc([styled("TITLE", "T\n"), styled("SUBTITLE", "S\n"), styled("HEADING_3", "H3\n"), styled("HEADING_6", "H6\n")]),
			);

			expect(markdown).toBe("# T\n\n*S*\n\n### H3\n\n###### H6\n");
		});

		it("should keep whitespace outside emphasis markers", () => {
			const markdown = renderMarkdown(doc([para([run("a"), run(" b ", { italic: true }), run("c\n")])]));

			expect(markdown).toBe("a *b* c\n");
		});

		it("should nest link, bold and strikethrough markers", () => {
			const markdown = renderMarkdown(
				doc([
					para([
						run("docs", { bold: true, link: { url: "https://example.com" } }),
						run(" "),
						run("old", { strikethrough: true }),
						run("\n"),
					]),
				]),
			);

			expect(markdown).toBe("**[docs](https://example.com)** ~~old~~\n");
		});

		it("should number ordered lists", () => {
			const markdown = renderMarkdown(
				doc(
					[
						para([run("first\n")], { bullet: { listId: "n1" } }),
						para([run("second\n")], { bullet: { listId: "n1" } }),
					],
					{ lists: { n1: { listProperties: { nestingLevels: [{ glyphType: "DECIMAL" }] } } } },
				),
			);

			expect(markdown).toBe("1. first\n1. second\n");
		});

		it("should render images and horizontal rules", () => {
			const markdown = renderMarkdown(
				doc(
					[
						para([{ inlineObjectElement: { inlineObjectId: "img1" } }, run("\n")]),
						para([{ horizontalRule: {} }, run("\n")]),
					],
					{
						inlineObjects: {
							img1: {
								inlineObjectProperties: {
									embeddedObject: { description: "Logo", imageProperties: { contentUri: "https://img.example/logo" } },
								},
							},
						},
					},
				),
			);

			expect(markdown).toBe("![Logo](https://img.example/logo)\n\n---\n");
		});

		it("should turn soft line breaks into newlines", () => {
			expect(renderMarkdown(doc([para([run("line1\u000bline2\n")])]))).toBe("line1\nline2\n");
		});

		it("should flatten multi-paragraph cells", () => {
			const markdown = renderMarkdown(
				doc([
					{
						table: {
							tableRows: [{ tableCells: [{ content: [para([run("x\n")]), para([run("y\n")])] }] }],
						},
					},
				]),
			);

			expect(markdown).toBe("| x y |\n| --- |\n");
		});

		it("should render an empty document as an empty string", () => {
			expect(renderMarkdown(doc([para([run("\n")])]))).toBe("");
			expect(renderMarkdown({ documentId: "doc-1" })).toBe("");
		});
	});

	describe("renderPlainText", () => {
		it("should keep run text and tab-separate table cells", () => {
			expect(renderPlainText(sample)).toBe("Goals\nShip fast now\none\ntwo\n\nA\tB\n1\t2|3\n");
		});

		it("should render an empty document as an empty string", () => {
			expect(renderPlainText({ documentId: "doc-1", body: { content: [] } })).toBe("");
		});

		it("should render a new blank document as an empty string", () => {
			const blank: DocsDocument = {
				documentId: "doc-1",
				title: "T",
				body: {
					content: [
						{ endIndex: 1, sectionBreak: {} },
						{ startIndex: 1, endIndex: 2, paragraph: { elements: [{ textRun: { content: "\n" } }] } },
					],
				},
			};

			expect(renderPlainText(blank)).toBe("");
			expect(renderDocument(blank, "text", { includeTitle: true })).toBe("T\n");
		});
	});

	describe("renderRaw", () => {
		it("should pretty-print the document JSON", () => {
			const document = doc([para([run("x\n")])]);

			expect(renderRaw(document)).toBe(JSON.stringify(document, null, 2));
		});
	});

	describe("renderDocument", () => {
		it("should prefix the title for markdown", () => {
			expect(renderDocument(doc([para([run("Body\n")])]), "markdown", { includeTitle: true })).toBe(
				"# Plan\n\nBody\n",
			);
		});

		it("should prefix the title line for plain text", () => {
			expect(renderDocument(doc([para([run("Body\n")])]), "text", { includeTitle: true })).toBe("Plan\n\nBody\n");
		});

		it("should print only the title for an empty document", () => {
			expect(renderDocument(doc([]), "markdown", { includeTitle: true })).toBe("# Plan\n");
		});

		it("should be deterministic and leave the input untouched", () => {
			const before = JSON.stringify(sample);

			const first = renderDocument(sample, "markdown");
			const second = renderDocument(sample, "markdown");

			expect(first).toBe(second);
			expect(JSON.stringify(sample)).toBe(before);
		});
	});
});
