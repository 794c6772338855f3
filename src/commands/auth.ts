import { ACCOUNT_ENV_VAR } from "../config.js";
import type { CommandContext } from "./context.js";
import { parseOptions, usageError } from "./context.js";
import { extractAccountFlag } from "./guard.js";

const AUTH_USAGE = "auth <login|status|logout|token|credentials|set-default>";

export async function handleAuth(ctx: CommandContext, args: string[]): Promise<void> {
	const command = args[0];
	const cmdArgs = args.slice(1);

	if (!command) usageError(AUTH_USAGE);

	switch (command) {
		case "login": {
			const { values } = parseOptions({
				args: cmdArgs,
				options: {
					"set-default": { type: "boolean" },
					manual: { type: "boolean" },
				},
			});
			const result = await ctx.auth.login({
				manual: values.manual,
				setDefault: values["set-default"],
				onMessage: (message) => ctx.output.info(message),
			});
			ctx.output.result(result, () => {
				ctx.output.success(
					result.isDefault
						? `Authenticated as ${result.email} (default account)`
						: `Authenticated as ${result.email}`,
				);
			});
			break;
		}
		case "status": {
			const accounts = ctx.auth.status();
			ctx.output.result({ authenticated: accounts.length > 0, accounts }, () => {
				if (accounts.length === 0) {
					ctx.output.print("Not authenticated. Run 'gdocs auth login'.");
					return;
				}
				ctx.output.table(
					["email", "default", "token expiry"],
					accounts.map((a) => [a.email, a.isDefault ? "*" : "", a.tokenExpiry]),
				);
			});
			break;
		}
		case "logout": {
			const { account, rest } = extractAccountFlag(cmdArgs);
			const { values, positionals } = parseOptions({
				args: rest,
				options: { all: { type: "boolean" } },
				allowPositionals: true,
			});
			const email = values.all
				? undefined
				: (positionals[0] ?? ctx.auth.resolveAccount(account ?? ctx.account, ctx.env[ACCOUNT_ENV_VAR]));
			const removed = ctx.auth.logout({ email, all: values.all });
			for (const gone of removed) {
				ctx.docs.clearClientCache(gone);
				ctx.drive.clearClientCache(gone);
			}
			ctx.output.result({ loggedOut: removed }, () => {
				ctx.output.success(removed.length === 0 ? "No accounts logged out" : `Logged out: ${removed.join(", ")}`);
			});
			break;
		}
		case "token": {
			const { account, rest } = extractAccountFlag(cmdArgs);
			if (rest.length > 0) usageError("auth token [--account EMAIL]");
			const email = ctx.auth.resolveAccount(account ?? ctx.account, ctx.env[ACCOUNT_ENV_VAR]);
			// Printed as JSON in both modes so it can be piped to a file.
			ctx.output.data(ctx.auth.exportToken(email));
			break;
		}
		case "credentials": {
			const file = cmdArgs[0];
			if (!file) usageError("auth credentials <client-secret.json>");
			const credentials = ctx.auth.importCredentials(file);
			ctx.output.result({ saved: true, clientId: credentials.clientId }, () => {
				ctx.output.success("OAuth client credentials saved");
			});
			break;
		}
		case "set-default": {
			const email = cmdArgs[0];
			if (!email) usageError("auth set-default <email>");
			ctx.auth.setDefault(email);
			ctx.output.result({ defaultAccount: email }, () => {
				ctx.output.success(`Default account set: ${email}`);
			});
			break;
		}
		default:
			usageError(AUTH_USAGE);
	}
}
