import * as os from "node:os";
import * as path from "node:path";

export type Env = Record<string, string | undefined>;

export const ACCOUNT_ENV_VAR = "GDOCS_ACCOUNT";
export const CONFIG_DIR_ENV_VAR = "GDOCS_CONFIG_DIR";
export const DEBUG_ENV_VAR = "GDOCS_DEBUG";

export const SCOPES = [
	"https://www.googleapis.com/auth/documents",
	"https://www.googleapis.com/auth/drive",
	"https://www.googleapis.com/auth/userinfo.email",
	"openid",
];

/** Ports tried in order for the OAuth redirect listener; 0 lets the OS pick. */
export const REDIRECT_PORTS = [9090, 9091, 9092, 8888, 8889];

/** Refresh access tokens that expire within this window. */
export const TOKEN_EXPIRY_MARGIN_MS = 60_000;

/** The fields of a failed gaxios request that the retry decision reads. */
export interface RetryableError {
	config: {
		method?: string;
		retryConfig?: { currentRetryAttempt?: number; retry?: number; noResponseRetries?: number };
	};
	response?: { status: number };
}

const NON_IDEMPOTENT_METHODS = new Set(["POST"]);

/**
 * Rate limits are retried for every method. Server errors and lost responses
 * are retried only where repeating the request cannot apply an edit twice.
 */
export function shouldRetryRequest(err: RetryableError): boolean {
	const retryConfig = err.config.retryConfig ?? {};
	const attempt = retryConfig.currentRetryAttempt ?? 0;
	if (attempt >= (retryConfig.retry ?? 0)) return false;

	const method = (err.config.method ?? "GET").toUpperCase();
	const status = err.response?.status;
	if (status === 429) return true;
	if (NON_IDEMPOTENT_METHODS.has(method)) return false;
	if (status === undefined) return attempt < (retryConfig.noResponseRetries ?? 0);
	return status >= 500 && status <= 599;
}

/**
 * Transport-level retry passed to every googleapis client; gaxios backs off
 * exponentially between attempts.
 */
export const RETRY_CONFIG = {
	retry: 3,
	retryDelay: 1000,
	noResponseRetries: 2,
	shouldRetry: shouldRetryRequest,
};

export const DOCUMENT_MIME_TYPE = "application/vnd.google-apps.document";
export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

export function getConfigDir(env: Env = process.env): string {
	return env[CONFIG_DIR_ENV_VAR] || path.join(os.homedir(), ".gdocs");
}

export function isDebugEnabled(env: Env = process.env): boolean {
	const value = env[DEBUG_ENV_VAR];
	return value !== undefined && value !== "" && value !== "0" && value !== "false";
}

export function documentUrl(documentId: string): string {
	return `https://docs.google.com/document/d/${documentId}/edit`;
}

export function folderUrl(folderId: string): string {
	return `https://drive.google.com/drive/folders/${folderId}`;
}
