import { parseInteger, parseOptions, requireInteger, usageError } from "./context.js";
import { requireAuth } from "./guard.js";

export const handleTable = requireAuth(async (ctx, account, args) => {
	const command = args[0];
	const cmdArgs = args.slice(1);
	const { docs, output } = ctx;

	if (!command) usageError("table <create|list|add-row|delete-row|add-column|delete-column>");

	switch (command) {
		case "create": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: {
					rows: { type: "string", short: "r" },
					columns: { type: "string", short: "c" },
					index: { type: "string" },
				},
				allowPositionals: true,
			});
			const documentId = positionals[0];
			if (!documentId) usageError("table create <documentId> [--rows N] [--columns N] [--index N]");

			const rows = parseInteger(values.rows, "Rows", 3, 1);
			const columns = parseInteger(values.columns, "Columns", 3, 1);
			const index = parseInteger(values.index, "Index", 1, 1);
			await docs.createTable(account, documentId, { rows, columns, index });
			output.result({ created: true, rows, columns, index }, () =>
				output.success(`Created ${rows}x${columns} table at index ${index}`),
			);
			break;
		}
		case "list": {
			const documentId = cmdArgs[0];
			if (!documentId) usageError("table list <documentId>");
			const tables = await docs.listTables(account, documentId);
			output.result({ tables }, () => {
				if (tables.length === 0) {
					output.print("No tables found in document.");
					return;
				}
				output.table(
					["index", "start", "size"],
					tables.map((t) => [t.tableIndex, t.startIndex, `${t.rows}x${t.columns}`]),
				);
			});
			break;
		}
		case "add-row": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: {
					row: { type: "string" },
					above: { type: "boolean" },
				},
				allowPositionals: true,
			});
			const usage = "table add-row <documentId> <tableIndex> [--row N] [--above]";
			const documentId = positionals[0];
			if (!documentId) usageError(usage);
			const tableIndex = requireInteger(positionals[1], "Table index", usage);
			const row = parseInteger(values.row, "Row", 0);
			const position = values.above ? "above" : "below";

			await docs.addTableRow(account, documentId, tableIndex, { row, above: values.above });
			output.result({ addedRow: true, tableIndex, row, position }, () =>
				output.success(`Added row ${position} row ${row} in table ${tableIndex}`),
			);
			break;
		}
		case "delete-row": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { row: { type: "string" } },
				allowPositionals: true,
			});
			const usage = "table delete-row <documentId> <tableIndex> --row N";
			const documentId = positionals[0];
			if (!documentId) usageError(usage);
			const tableIndex = requireInteger(positionals[1], "Table index", usage);
			const row = requireInteger(values.row, "Row", usage);

			await docs.deleteTableRow(account, documentId, tableIndex, row);
			output.result({ deletedRow: true, tableIndex, row }, () =>
				output.success(`Deleted row ${row} from table ${tableIndex}`),
			);
			break;
		}
		case "add-column": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: {
					column: { type: "string" },
					left: { type: "boolean" },
				},
				allowPositionals: true,
			});
			const usage = "table add-column <documentId> <tableIndex> [--column N] [--left]";
			const documentId = positionals[0];
			if (!documentId) usageError(usage);
			const tableIndex = requireInteger(positionals[1], "Table index", usage);
			const column = parseInteger(values.column, "Column", 0);
			const position = values.left ? "left of" : "right of";

			await docs.addTableColumn(account, documentId, tableIndex, { column, left: values.left });
			output.result({ addedColumn: true, tableIndex, column, position: values.left ? "left" : "right" }, () =>
				output.success(`Added column ${position} column ${column} in table ${tableIndex}`),
			);
			break;
		}
		case "delete-column": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { column: { type: "string" } },
				allowPositionals: true,
			});
			const usage = "table delete-column <documentId> <tableIndex> --column N";
			const documentId = positionals[0];
			if (!documentId) usageError(usage);
			const tableIndex = requireInteger(positionals[1], "Table index", usage);
			const column = requireInteger(values.column, "Column", usage);

			await docs.deleteTableColumn(account, documentId, tableIndex, column);
			output.result({ deletedColumn: true, tableIndex, column }, () =>
				output.success(`Deleted column ${column} from table ${tableIndex}`),
			);
			break;
		}
		default:
			usageError("table <create|list|add-row|delete-row|add-column|delete-column>");
	}
});
