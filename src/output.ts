import { type Env, isDebugEnabled } from "./config.js";
import { CliError, errorMessage } from "./errors.js";

export type Writer = (text: string) => void;

export interface OutputOptions {
	json?: boolean;
	env?: Env;
	stdout?: Writer;
	stderr?: Writer;
}

export interface JsonErrorBody {
	error: true;
	code: string;
	message: string;
	details?: string;
}

/**
 * Everything the CLI prints goes through here: results on stdout,
 * progress and diagnostics on stderr.
 */
export class Output {
	readonly json: boolean;
	private readonly debugEnabled: boolean;
	private readonly stdout: Writer;
	private readonly stderr: Writer;

	constructor(options: OutputOptions = {}) {
		this.json = options.json ?? false;
		this.debugEnabled = isDebugEnabled(options.env ?? process.env);
		this.stdout = options.stdout ?? ((text) => process.stdout.write(text));
		this.stderr = options.stderr ?? ((text) => process.stderr.write(text));
	}

	/** Writes `text` to stdout, adding a trailing newline when it lacks one. */
	print(text: string): void {
		this.stdout(text.endsWith("\n") ? text : `${text}\n`);
	}

	success(message: string): void {
		this.print(`✓ ${message}`);
	}

	info(message: string): void {
		this.stderr(`${message}\n`);
	}

	debug(message: string): void {
		if (this.debugEnabled) {
			this.stderr(`[debug] ${message}\n`);
		}
	}

	data(value: unknown): void {
		this.print(JSON.stringify(value, null, 2));
	}

	/** Tab-separated rows under an upper-case header. */
	table(headers: string[], rows: Array<Array<string | number | undefined>>): void {
		const lines = [headers.map((h) => h.toUpperCase()).join("\t")];
		for (const row of rows) {
			lines.push(row.map((cell) => (cell === undefined || cell === "" ? "-" : String(cell))).join("\t"));
		}
		this.print(lines.join("\n"));
	}

	/**
	 * Prints the value in JSON mode, otherwise runs `human`. Keeps handlers
	 * free of mode checks.
	 */
	result(value: unknown, human: () => void): void {
		if (this.json) {
			this.data(value);
		} else {
			human();
		}
	}

	error(err: unknown): number {
		const cliError = err instanceof CliError ? err : new CliError("ERROR", errorMessage(err));

		if (this.json) {
			const body: JsonErrorBody = { error: true, code: cliError.code, message: cliError.message };
			if (cliError.details) body.details = cliError.details;
			this.data(body);
		} else {
			this.stderr(`Error: ${cliError.message}\n`);
			if (cliError.details && cliError.details !== cliError.message) {
				this.stderr(`  ${cliError.details}\n`);
			}
			if (cliError.tip) {
				this.stderr(`Tip: ${cliError.tip}\n`);
			}
		}

		if (!(err instanceof CliError) && err instanceof Error && err.stack) {
			this.debug(err.stack);
		}
		return cliError.exitCode;
	}
}
