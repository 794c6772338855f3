import { type ParseArgsConfig, parseArgs } from "node:util";
import type { AuthService } from "../auth-service.js";
import type { Env } from "../config.js";
import { ValidationError, errorMessage } from "../errors.js";
import type { Output } from "../output.js";
import type { DocsService } from "../services/docs-service.js";
import type { DriveService } from "../services/drive-service.js";

export interface CommandContext {
	auth: AuthService;
	docs: DocsService;
	drive: DriveService;
	output: Output;
	env: Env;
	/** Account given with the global `--account` flag. */
	account?: string;
	/** Asks a yes/no question; resolves false when there is no terminal to ask on. */
	confirm: (question: string) => Promise<boolean>;
}

export type CommandHandler = (ctx: CommandContext, args: string[]) => Promise<void>;

/** `parseArgs` with its parse failures reported as invalid input. */
export function parseOptions<T extends ParseArgsConfig>(config: T): ReturnType<typeof parseArgs<T>> {
	try {
		return parseArgs(config);
	} catch (e) {
		throw new ValidationError(errorMessage(e));
	}
}

export function usageError(usage: string): never {
	throw new ValidationError(`Usage: gdocs ${usage}`);
}

export function parseInteger(value: string | undefined, name: string, fallback: number, min = 0): number {
	if (value === undefined) return fallback;
	if (!/^-?\d+$/.test(value.trim())) {
		throw new ValidationError(`${name} must be an integer, got '${value}'`);
	}
	const parsed = Number.parseInt(value, 10);
	if (parsed < min) {
		throw new ValidationError(`${name} must be >= ${min}, got ${parsed}`);
	}
	return parsed;
}

export function requireInteger(value: string | undefined, name: string, usage: string, min = 0): number {
	if (value === undefined) usageError(usage);
	return parseInteger(value, name, 0, min);
}

export function formatTime(iso: string | undefined): string | undefined {
	return iso ? iso.slice(0, 16).replace("T", " ") : undefined;
}
