export interface CliErrorOptions {
	details?: string;
	tip?: string;
	cause?: unknown;
}

/**
 * Base class for every failure the command layer knows how to render.
 * `code` is the stable identifier printed in `--json` mode.
 */
export class CliError extends Error {
	readonly code: string;
	readonly exitCode: number;
	readonly details?: string;
	readonly tip?: string;

	constructor(code: string, message: string, options: CliErrorOptions = {}, exitCode = 1) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
		this.exitCode = exitCode;
		this.details = options.details;
		this.tip = options.tip;
	}
}

export class AuthRequiredError extends CliError {
	constructor(account?: string) {
		super("NOT_AUTHENTICATED", account ? `Not authenticated as ${account}` : "Not authenticated", {
			tip: "Run 'gdocs auth login' to authenticate.",
		});
	}
}

export class ReauthRequiredError extends CliError {
	readonly account?: string;

	constructor(account?: string, options: CliErrorOptions = {}) {
		super("TOKEN_EXPIRED", `Token expired for ${account ?? "account"}`, {
			tip: "Run 'gdocs auth login' to re-authenticate.",
			...options,
		});
		this.account = account;
	}
}

export class NotFoundError extends CliError {
	constructor(message: string, options: CliErrorOptions = {}, code = "NOT_FOUND") {
		super(code, message, options);
	}
}

export class AccountNotFoundError extends NotFoundError {
	readonly account: string;
	readonly available: string[];

	constructor(account: string, available: string[]) {
		super(
			`Account '${account}' not found`,
			{
				tip:
					available.length > 0
						? `Available accounts: ${available.join(", ")}`
						: "Run 'gdocs auth login' to add an account.",
			},
			"ACCOUNT_NOT_FOUND",
		);
		this.account = account;
		this.available = available;
	}
}

export class NoAccountConfiguredError extends CliError {
	constructor() {
		super("NO_ACCOUNT", "No account configured", {
			tip: "Run 'gdocs auth login', pass --account, or set GDOCS_ACCOUNT.",
		});
	}
}

export class PermissionDeniedError extends CliError {
	constructor(message: string, options: CliErrorOptions = {}) {
		super("PERMISSION_DENIED", message, options);
	}
}

export class RateLimitedError extends CliError {
	constructor(message = "Rate limit exceeded", options: CliErrorOptions = {}) {
		super("RATE_LIMITED", message, { tip: "Wait a moment and try again.", ...options });
	}
}

export class TransientServerError extends CliError {
	constructor(message = "Google API server error", options: CliErrorOptions = {}) {
		super("SERVER_ERROR", message, { tip: "Try again later.", ...options });
	}
}

export class ValidationError extends CliError {
	constructor(message: string, options: CliErrorOptions = {}) {
		super("INVALID_INPUT", message, options, 2);
	}
}

export class StorageError extends CliError {
	constructor(message: string, options: CliErrorOptions = {}) {
		super("STORAGE_ERROR", message, options);
	}
}

export class ConfigurationError extends CliError {
	constructor(message: string, options: CliErrorOptions = {}) {
		super("CREDENTIALS_NOT_FOUND", message, options, 2);
	}
}

export class ApiError extends CliError {
	readonly status?: number;

	constructor(message: string, status?: number, options: CliErrorOptions = {}) {
		super("API_ERROR", message, options);
		this.status = status;
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

/** HTTP status of a gaxios-style error, if it carries one. */
export function getHttpStatus(err: unknown): number | undefined {
	if (!isRecord(err)) return undefined;
	const response = err.response;
	if (isRecord(response) && typeof response.status === "number") {
		return response.status;
	}
	if (typeof err.status === "number") return err.status;
	if (typeof err.code === "number") return err.code;
	if (typeof err.code === "string" && /^\d{3}$/.test(err.code)) return Number(err.code);
	return undefined;
}

/** First `errors[].reason` of a Google API error body, e.g. `rateLimitExceeded`. */
export function getErrorReason(err: unknown): string | undefined {
	if (!isRecord(err) || !isRecord(err.response)) return undefined;
	const data = err.response.data;
	if (!isRecord(data)) return undefined;
	if (typeof data.error === "string") return data.error;
	if (!isRecord(data.error) || !Array.isArray(data.error.errors)) return undefined;
	const first: unknown = data.error.errors[0];
	return isRecord(first) && typeof first.reason === "string" ? first.reason : undefined;
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

const RATE_LIMIT_REASONS = new Set(["rateLimitExceeded", "userRateLimitExceeded"]);

/**
 * Maps anything thrown by the API client or the auth library onto the
 * CliError taxonomy. `context` names the resource, e.g. "document abc".
 */
export function toCliError(err: unknown, context?: string, account?: string): CliError {
	if (err instanceof CliError) return err;

	const status = getHttpStatus(err);
	const details = errorMessage(err);
	const subject = context ? ` (${context})` : "";

	if (getErrorReason(err) === "invalid_grant") {
		return new ReauthRequiredError(account, { details, cause: err });
	}

	switch (status) {
		case 400:
			return new ValidationError(`Request rejected by Google API${subject}`, { details, cause: err });
		case 401:
			return new ReauthRequiredError(account, { details, cause: err });
		case 403: {
			const reason = getErrorReason(err);
			if (reason && RATE_LIMIT_REASONS.has(reason)) {
				return new RateLimitedError(undefined, { details, cause: err });
			}
			return new PermissionDeniedError(`Permission denied${subject}`, { details, cause: err });
		}
		case 404:
			return new NotFoundError(`Not found${subject}`, { details, cause: err });
		case 429:
			return new RateLimitedError(undefined, { details, cause: err });
		default:
			break;
	}

	if (status !== undefined && status >= 500) {
		return new TransientServerError(undefined, { details, cause: err });
	}
	if (status !== undefined) {
		return new ApiError(`Google API error ${status}${subject}`, status, { details, cause: err });
	}
	return new CliError("ERROR", details, { cause: err });
}
