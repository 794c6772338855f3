import * as readline from "node:readline/promises";
import { AccountStorage } from "./account-storage.js";
import { AuthService } from "./auth-service.js";
import { handleAuth } from "./commands/auth.js";
import { handleContent } from "./commands/content.js";
import type { CommandContext, CommandHandler } from "./commands/context.js";
import { handleDoc } from "./commands/doc.js";
import { handleDrives } from "./commands/drives.js";
import { extractAccountFlag } from "./commands/guard.js";
import { handleTable } from "./commands/table.js";
import { type Env, getConfigDir } from "./config.js";
import { ValidationError } from "./errors.js";
import { Output, type Writer } from "./output.js";
import { DocsService } from "./services/docs-service.js";
import { DriveService } from "./services/drive-service.js";
import { VERSION } from "./version.js";

export const USAGE = `gdocs - Google Docs CLI

USAGE

  gdocs [--json] [--account EMAIL] <group> <command> [options]

GLOBAL OPTIONS

  --json                 Machine-readable output
  -A, --account EMAIL    Account to use (default: GDOCS_ACCOUNT, then the default account)
  -v, --version          Print version
  -h, --help             Print this help

AUTH

  gdocs auth login [--set-default] [--manual]
  gdocs auth status
  gdocs auth logout [email] [--all]
  gdocs auth token [--account EMAIL]
  gdocs auth credentials <client-secret.json>
  gdocs auth set-default <email>

DOCUMENTS

  gdocs doc create <title> [--folder ID]
  gdocs doc list [--limit N] [--folder ID] [--shared-drive ID]
  gdocs doc search <query> [--limit N]
  gdocs doc get <documentId>
  gdocs doc delete <documentId> [--force]
  gdocs doc move <documentId> --folder ID
  gdocs doc share <documentId> --email E [--role reader|writer|commenter] [--no-notify] [--message M]
  gdocs doc permissions <documentId>
  gdocs doc unshare <documentId> --permission ID
  gdocs doc revisions <documentId>

CONTENT

  gdocs content read <documentId> [--plain] [--raw]
  gdocs content insert <documentId> <text> [--index N] [--heading STYLE] [--bold] [--italic]
  gdocs content append <documentId> <text> [--heading STYLE] [--bold] [--italic]
  gdocs content from-file <documentId> <path>
  gdocs content replace <documentId> <find> <replace> [--ignore-case]
  gdocs content bullets <documentId> <start> <end> [--preset P]

  STYLE: NORMAL_TEXT, TITLE, SUBTITLE, HEADING_1 ... HEADING_6

TABLES

  gdocs table create <documentId> [--rows N] [--columns N] [--index N]
  gdocs table list <documentId>
  gdocs table add-row <documentId> <tableIndex> [--row N] [--above]
  gdocs table delete-row <documentId> <tableIndex> --row N
  gdocs table add-column <documentId> <tableIndex> [--column N] [--left]
  gdocs table delete-column <documentId> <tableIndex> --column N

SHARED DRIVES

  gdocs drives list
  gdocs drives folders [driveId] [--parent ID]

ENVIRONMENT

  GDOCS_ACCOUNT       Account used when --account is not given
  GDOCS_CONFIG_DIR    Configuration directory (default: ~/.gdocs)
  GDOCS_DEBUG         Print debug lines on stderr

DATA STORAGE

  ~/.gdocs/credentials.json   OAuth client credentials
  ~/.gdocs/accounts.json      Account tokens
  ~/.gdocs/config.json        Default account`;

const HANDLERS = new Map<string, CommandHandler>([
	["auth", handleAuth],
	["doc", handleDoc],
	["content", handleContent],
	["table", handleTable],
	["drives", handleDrives],
]);

export interface Services {
	auth: AuthService;
	docs: DocsService;
	drive: DriveService;
}

export interface RunOptions {
	env?: Env;
	stdout?: Writer;
	stderr?: Writer;
	services?: Services;
	confirm?: (question: string) => Promise<boolean>;
}

export interface GlobalOptions {
	json: boolean;
	help: boolean;
	version: boolean;
	account?: string;
	group?: string;
	rest: string[];
}

/**
 * Splits global flags from the group and its arguments. `--json` and
 * `--help` are honoured anywhere before `--`.
 */
export function parseGlobalOptions(argv: string[]): GlobalOptions {
	const options: GlobalOptions = { json: false, help: false, version: false, rest: [] };
	const separator = argv.indexOf("--");
	const flags = separator === -1 ? argv : argv.slice(0, separator);
	const tail = separator === -1 ? [] : argv.slice(separator);

	const remaining: string[] = [];
	for (const arg of flags) {
		if (arg === "--json") options.json = true;
		else if (arg === "--help" || arg === "-h") options.help = true;
		else remaining.push(arg);
	}

	let i = 0;
	const leading: string[] = [];
	while (i < remaining.length && remaining[i].startsWith("-")) {
		const arg = remaining[i];
		if (arg === "--version" || arg === "-v") {
			options.version = true;
			i++;
		} else if (arg === "--account" || arg === "-A" || arg.startsWith("--account=")) {
			const hasValue = arg.includes("=");
			leading.push(arg);
			if (!hasValue && i + 1 < remaining.length) leading.push(remaining[i + 1]);
			i += hasValue ? 1 : 2;
		} else {
			throw new ValidationError(`Unknown option: ${arg}`);
		}
	}

	if (leading.length > 0) {
		const { account } = extractAccountFlag(leading);
		options.account = account;
	}
	options.group = remaining[i];
	options.rest = [...remaining.slice(i + 1), ...tail];
	return options;
}

async function promptConfirm(question: string): Promise<boolean> {
	if (!process.stdin.isTTY) return false;
	const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
	try {
		const answer = await rl.question(`${question} [y/N] `);
		return /^y(es)?$/i.test(answer.trim());
	} finally {
		rl.close();
	}
}

export function createServices(env: Env): Services {
	const storage = new AccountStorage(getConfigDir(env));
	return {
		auth: new AuthService(storage),
		docs: new DocsService(storage),
		drive: new DriveService(storage),
	};
}

/** Runs one CLI invocation and returns its exit code. */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
	const env = options.env ?? process.env;
	let output = new Output({ json: argv.includes("--json"), env, stdout: options.stdout, stderr: options.stderr });

	try {
		const globals = parseGlobalOptions(argv);
		output = new Output({ json: globals.json, env, stdout: options.stdout, stderr: options.stderr });

		if (globals.version) {
			output.result({ version: VERSION }, () => output.print(VERSION));
			return 0;
		}
		if (globals.help || !globals.group) {
			output.print(USAGE);
			return globals.help ? 0 : 1;
		}

		const handler = HANDLERS.get(globals.group);
		if (!handler) {
			throw new ValidationError(`Unknown command group: ${globals.group}`, {
				tip: `Available: ${[...HANDLERS.keys()].join(", ")}`,
			});
		}

		const ctx: CommandContext = {
			...(options.services ?? createServices(env)),
			output,
			env,
			account: globals.account,
			confirm: options.confirm ?? promptConfirm,
		};
		output.debug(`command: ${globals.group} ${globals.rest.join(" ")}`);
		await handler(ctx, globals.rest);
		return 0;
	} catch (e) {
		return output.error(e);
	}
}
