import { ValidationError } from "../errors.js";
import type { ShareRole } from "../types.js";
import { formatTime, parseInteger, parseOptions, usageError } from "./context.js";
import { requireAuth } from "./guard.js";

const SHARE_ROLES: readonly ShareRole[] = ["reader", "writer", "commenter"];

function isShareRole(value: string): value is ShareRole {
	return SHARE_ROLES.some((role) => role === value);
}

export const handleDoc = requireAuth(async (ctx, account, args) => {
	const command = args[0];
	const cmdArgs = args.slice(1);
	const { docs, drive, output } = ctx;

	if (!command) usageError("doc <create|list|search|get|delete|move|share|permissions|unshare|revisions>");

	switch (command) {
		case "create": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { folder: { type: "string", short: "f" } },
				allowPositionals: true,
			});
			const title = positionals.join(" ");
			if (!title) usageError("doc create <title> [--folder ID]");

			const doc = await docs.create(account, title);
			if (values.folder) {
				await drive.move(account, doc.id, values.folder);
			}
			output.result({ id: doc.id, title: doc.title, url: doc.url, folderId: values.folder }, () => {
				output.success(`Created: ${doc.title}`);
				output.print(`  ID: ${doc.id}\n  URL: ${doc.url}`);
			});
			break;
		}
		case "list": {
			const { values } = parseOptions({
				args: cmdArgs,
				options: {
					limit: { type: "string", short: "n" },
					folder: { type: "string", short: "f" },
					"shared-drive": { type: "string", short: "d" },
				},
			});
			const documents = await drive.listDocuments(account, {
				limit: parseInteger(values.limit, "Limit", 20, 1),
				folderId: values.folder,
				sharedDriveId: values["shared-drive"],
			});
			output.result({ documents }, () => {
				if (documents.length === 0) {
					output.print("No documents found.");
					return;
				}
				output.table(
					["id", "title", "modified"],
					documents.map((d) => [d.id, d.title, formatTime(d.modifiedTime)]),
				);
			});
			break;
		}
		case "search": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { limit: { type: "string", short: "n" } },
				allowPositionals: true,
			});
			const query = positionals.join(" ");
			if (!query) usageError("doc search <query> [--limit N]");

			const documents = await drive.searchDocuments(account, query, parseInteger(values.limit, "Limit", 20, 1));
			output.result({ query, documents }, () => {
				if (documents.length === 0) {
					output.print(`No documents found matching '${query}'.`);
					return;
				}
				output.table(
					["id", "title", "modified"],
					documents.map((d) => [d.id, d.title, formatTime(d.modifiedTime)]),
				);
			});
			break;
		}
		case "get": {
			const documentId = cmdArgs[0];
			if (!documentId) usageError("doc get <documentId>");
			const info = await docs.getInfo(account, documentId);
			output.result(info, () => {
				output.print(`Title: ${info.title}\nID: ${info.id}\nRevision: ${info.revisionId ?? "-"}\nURL: ${info.url}`);
			});
			break;
		}
		case "delete": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { force: { type: "boolean", short: "f" } },
				allowPositionals: true,
			});
			const documentId = positionals[0];
			if (!documentId) usageError("doc delete <documentId> [--force]");

			if (!values.force && !(await ctx.confirm(`Delete document ${documentId}?`))) {
				output.result({ deleted: false, id: documentId }, () => output.print("Cancelled"));
				return;
			}
			await drive.delete(account, documentId);
			output.result({ deleted: true, id: documentId }, () => output.success(`Deleted: ${documentId}`));
			break;
		}
		case "move": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { folder: { type: "string", short: "f" } },
				allowPositionals: true,
			});
			const documentId = positionals[0];
			if (!documentId || !values.folder) usageError("doc move <documentId> --folder <folderId>");

			await drive.move(account, documentId, values.folder);
			output.result({ moved: true, id: documentId, folderId: values.folder }, () =>
				output.success(`Moved ${documentId} to folder ${values.folder}`),
			);
			break;
		}
		case "share": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: {
					email: { type: "string", short: "e" },
					role: { type: "string", short: "r", default: "reader" },
					"no-notify": { type: "boolean" },
					message: { type: "string", short: "m" },
				},
				allowPositionals: true,
			});
			const documentId = positionals[0];
			if (!documentId || !values.email) {
				usageError("doc share <documentId> --email <email> [--role reader|writer|commenter]");
			}
			const role = values.role;
			if (!isShareRole(role)) {
				throw new ValidationError(`Invalid role: ${role}. Must be reader, writer, or commenter.`);
			}

			const permission = await drive.share(account, documentId, {
				email: values.email,
				role,
				notify: !values["no-notify"],
				message: values.message,
			});
			output.result(permission, () => output.success(`Shared with ${values.email} as ${role}`));
			break;
		}
		case "permissions": {
			const documentId = cmdArgs[0];
			if (!documentId) usageError("doc permissions <documentId>");
			const permissions = await drive.listPermissions(account, documentId);
			output.result({ permissions }, () => {
				if (permissions.length === 0) {
					output.print("No permissions found.");
					return;
				}
				output.table(
					["id", "type", "role", "user"],
					permissions.map((p) => [p.id, p.type, p.role, p.emailAddress ?? p.displayName]),
				);
			});
			break;
		}
		case "unshare": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { permission: { type: "string", short: "p" } },
				allowPositionals: true,
			});
			const documentId = positionals[0];
			if (!documentId || !values.permission) {
				usageError("doc unshare <documentId> --permission <permissionId>");
			}
			await drive.unshare(account, documentId, values.permission);
			output.result({ unshared: true, permissionId: values.permission }, () =>
				output.success(`Removed permission ${values.permission}`),
			);
			break;
		}
		case "revisions": {
			const documentId = cmdArgs[0];
			if (!documentId) usageError("doc revisions <documentId>");
			const revisions = await drive.listRevisions(account, documentId);
			output.result({ revisions }, () => {
				if (revisions.length === 0) {
					output.print("No revisions found.");
					return;
				}
				output.table(
					["id", "modified", "user"],
					revisions.map((r) => [r.id, formatTime(r.modifiedTime), r.lastModifyingUser]),
				);
			});
			break;
		}
		default:
			usageError("doc <create|list|search|get|delete|move|share|permissions|unshare|revisions>");
	}
});
