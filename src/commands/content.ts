import * as fs from "node:fs";
import { renderDocument } from "../content-renderer.js";
import { ConfigurationError, ValidationError, errorMessage } from "../errors.js";
import type { StyleOptions } from "../request-builder.js";
import { NAMED_STYLE_TYPES, type NamedStyleType, type RenderFormat } from "../types.js";
import { parseInteger, parseOptions, requireInteger, usageError } from "./context.js";
import { requireAuth } from "./guard.js";

export function parseNamedStyle(value: string): NamedStyleType {
	const upper = value.toUpperCase();
	const style = NAMED_STYLE_TYPES.find((s) => s === upper);
	if (!style) {
		throw new ValidationError(`Invalid heading: ${value}. Valid: ${NAMED_STYLE_TYPES.join(", ")}`);
	}
	return style;
}

function styleOptions(values: { heading?: string; bold?: boolean; italic?: boolean }): StyleOptions {
	const styles: StyleOptions = {};
	if (values.heading) {
		styles.paragraphStyle = { namedStyle: parseNamedStyle(values.heading) };
	}
	if (values.bold || values.italic) {
		styles.textStyle = { bold: values.bold, italic: values.italic };
	}
	return styles;
}

const STYLE_FLAGS = {
	heading: { type: "string", short: "H" },
	bold: { type: "boolean", short: "b" },
	italic: { type: "boolean", short: "i" },
} as const;

export const handleContent = requireAuth(async (ctx, account, args) => {
	const command = args[0];
	const cmdArgs = args.slice(1);
	const { docs, output } = ctx;

	if (!command) usageError("content <read|insert|append|from-file|replace|bullets>");

	switch (command) {
		case "read": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: {
					plain: { type: "boolean" },
					raw: { type: "boolean" },
				},
				allowPositionals: true,
			});
			const documentId = positionals[0];
			if (!documentId) usageError("content read <documentId> [--plain] [--raw]");
			if (values.plain && values.raw) {
				throw new ValidationError("--plain and --raw cannot be combined");
			}

			const format: RenderFormat = values.raw ? "raw" : values.plain ? "text" : "markdown";
			const document = await docs.get(account, documentId);
			output.result(
				{
					id: document.documentId ?? documentId,
					title: document.title ?? "",
					format,
					content: format === "raw" ? document : renderDocument(document, format),
				},
				() => output.print(renderDocument(document, format, { includeTitle: format !== "raw" })),
			);
			break;
		}
		case "insert": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { index: { type: "string" }, ...STYLE_FLAGS },
				allowPositionals: true,
			});
			const [documentId, ...words] = positionals;
			const text = words.join(" ");
			if (!documentId || !text) usageError("content insert <documentId> <text> [--index N] [--heading STYLE]");

			const index = parseInteger(values.index, "Index", 1, 1);
			const result = await docs.insertText(account, documentId, text, { index, ...styleOptions(values) });
			output.result({ inserted: true, ...result }, () =>
				output.success(`Inserted ${result.length} characters at index ${result.index}`),
			);
			break;
		}
		case "append": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { ...STYLE_FLAGS },
				allowPositionals: true,
			});
			const [documentId, ...words] = positionals;
			const text = words.join(" ");
			if (!documentId || !text) usageError("content append <documentId> <text> [--heading STYLE]");

			const result = await docs.appendText(account, documentId, text, styleOptions(values));
			output.result({ appended: true, ...result }, () => output.success(`Appended ${result.length} characters`));
			break;
		}
		case "from-file": {
			const [documentId, file] = cmdArgs;
			if (!documentId || !file) usageError("content from-file <documentId> <path>");

			let text: string;
			try {
				text = fs.readFileSync(file, "utf8");
			} catch (e) {
				throw new ConfigurationError(`Cannot read ${file}`, { details: errorMessage(e), cause: e });
			}
			if (text.trim() === "") {
				throw new ValidationError(`${file} is empty`);
			}

			const result = await docs.appendText(account, documentId, text.replace(/\n+$/, ""));
			output.result({ imported: true, file, ...result }, () =>
				output.success(`Imported ${result.length} characters from ${file}`),
			);
			break;
		}
		case "replace": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { "ignore-case": { type: "boolean", short: "i" } },
				allowPositionals: true,
			});
			const [documentId, find, replace] = positionals;
			if (!documentId || !find || replace === undefined) {
				usageError("content replace <documentId> <find> <replace> [--ignore-case]");
			}

			const occurrences = await docs.replaceText(account, documentId, {
				find,
				replace,
				matchCase: !values["ignore-case"],
			});
			output.result({ replaced: occurrences > 0, occurrences }, () =>
				output.success(`Replaced ${occurrences} occurrence(s)`),
			);
			break;
		}
		case "bullets": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { preset: { type: "string", short: "p" } },
				allowPositionals: true,
			});
			const usage = "content bullets <documentId> <start> <end> [--preset P]";
			const documentId = positionals[0];
			if (!documentId) usageError(usage);
			const start = requireInteger(positionals[1], "Start index", usage, 1);
			const end = requireInteger(positionals[2], "End index", usage, 1);

			await docs.createBullets(account, documentId, start, end, values.preset);
			output.result({ bulletsApplied: true, start, end }, () =>
				output.success(`Applied bullets to range ${start}-${end}`),
			);
			break;
		}
		default:
			usageError("content <read|insert|append|from-file|replace|bullets>");
	}
});
