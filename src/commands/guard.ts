import { ACCOUNT_ENV_VAR } from "../config.js";
import { ValidationError } from "../errors.js";
import type { CommandContext, CommandHandler } from "./context.js";

export type AuthedHandler = (ctx: CommandContext, account: string, args: string[]) => Promise<void>;

export interface ExtractedAccount {
	account?: string;
	rest: string[];
}

/** Pulls `--account X`, `--account=X` or `-A X` out of a command's arguments. */
export function extractAccountFlag(args: string[]): ExtractedAccount {
	const rest: string[] = [];
	let account: string | undefined;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "--") {
			rest.push(...args.slice(i));
			break;
		}
		if (arg.startsWith("--account=")) {
			account = arg.slice("--account=".length);
			continue;
		}
		if (arg === "--account" || arg === "-A") {
			const value = args[i + 1];
			if (value === undefined || value.startsWith("-")) {
				throw new ValidationError(`Option ${arg} requires an email address`);
			}
			account = value;
			i++;
			continue;
		}
		rest.push(arg);
	}

	return { account, rest };
}

/**
 * Resolves the account and makes sure its token is usable before the
 * handler runs.
 */
export function requireAuth(handler: AuthedHandler): CommandHandler {
	return async (ctx, args) => {
		const { account: local, rest } = extractAccountFlag(args);
		const email = ctx.auth.resolveAccount(local ?? ctx.account, ctx.env[ACCOUNT_ENV_VAR]);
		ctx.output.debug(`account: ${email}`);
		await ctx.auth.ensureValid(email);
		await handler(ctx, email, rest);
	};
}
