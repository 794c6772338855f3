import { parseOptions, usageError } from "./context.js";
import { requireAuth } from "./guard.js";

export const handleDrives = requireAuth(async (ctx, account, args) => {
	const command = args[0];
	const cmdArgs = args.slice(1);
	const { drive, output } = ctx;

	switch (command) {
		case "list": {
			const drives = await drive.listSharedDrives(account);
			output.result({ drives }, () => {
				if (drives.length === 0) {
					output.print("No Shared Drives found.");
					return;
				}
				output.table(
					["id", "name"],
					drives.map((d) => [d.id, d.name]),
				);
			});
			break;
		}
		case "folders": {
			const { values, positionals } = parseOptions({
				args: cmdArgs,
				options: { parent: { type: "string", short: "p" } },
				allowPositionals: true,
			});
			const sharedDriveId = positionals[0];
			const folders = await drive.listFolders(account, { parentId: values.parent, sharedDriveId });
			output.result({ sharedDriveId, parentId: values.parent, folders }, () => {
				if (folders.length === 0) {
					output.print("No folders found.");
					return;
				}
				output.table(
					["id", "name"],
					folders.map((f) => [f.id, f.name]),
				);
			});
			break;
		}
		default:
			usageError("drives <list|folders> [driveId] [--parent ID]");
	}
});
