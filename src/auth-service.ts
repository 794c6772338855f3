import * as fs from "node:fs";
import * as path from "node:path";
import { OAuth2Client } from "google-auth-library";
import { z } from "zod";
import type { AccountStorage } from "./account-storage.js";
import { TOKEN_EXPIRY_MARGIN_MS } from "./config.js";
import {
	AccountNotFoundError,
	CliError,
	ConfigurationError,
	NoAccountConfiguredError,
	ValidationError,
	errorMessage,
	toCliError,
} from "./errors.js";
import { OAuthFlow, type OAuthResult } from "./oauth-flow.js";
import type { Account, AccountStatus, StoredCredentials } from "./types.js";

export type AuthState = "unauthenticated" | "awaiting_consent" | "authenticated";

/** The part of OAuthFlow that login drives. */
export interface ConsentFlow {
	authorize(manual?: boolean): Promise<OAuthResult>;
	fetchEmail(result: OAuthResult): Promise<string>;
}

export interface RefreshedToken {
	accessToken: string;
	expiryDate?: number;
}

export interface AuthServiceOptions {
	flowFactory?: (credentials: StoredCredentials, onMessage: (message: string) => void) => ConsentFlow;
	refresher?: (account: Account) => Promise<RefreshedToken>;
	now?: () => number;
	/** Directory searched for a downloaded `credentials.json`. */
	cwd?: string;
}

export interface LoginOptions {
	manual?: boolean;
	setDefault?: boolean;
	/** Receives the consent URL and progress lines. */
	onMessage: (message: string) => void;
}

export interface LoginResult {
	email: string;
	isDefault: boolean;
	scopes: string[];
}

export interface LogoutOptions {
	email?: string;
	all?: boolean;
}

const clientSecretsSchema = z.object({
	client_id: z.string().min(1),
	client_secret: z.string().min(1),
});

/** Google Cloud console download format. */
const clientSecretsFileSchema = z.union([
	z.object({ installed: clientSecretsSchema }).transform((f) => f.installed),
	z.object({ web: clientSecretsSchema }).transform((f) => f.web),
]);

export function parseClientSecrets(raw: string, source: string): StoredCredentials {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (e) {
		throw new ValidationError(`${source} is not valid JSON`, { details: errorMessage(e) });
	}
	const parsed = clientSecretsFileSchema.safeParse(json);
	if (!parsed.success) {
		throw new ValidationError(`${source} is not an OAuth client file`, {
			tip: "Download the OAuth client JSON (Desktop app) from the Google Cloud console.",
		});
	}
	return { clientId: parsed.data.client_id, clientSecret: parsed.data.client_secret };
}

export interface AccountResolutionInput {
	explicit?: string;
	env?: string;
	defaultAccount?: string;
	accounts: string[];
}

/** Picks the account for a command: `--account`, then the env variable, then the configured default. */
export function resolveAccount(input: AccountResolutionInput): string {
	const requested = input.explicit || input.env;
	if (requested) {
		if (!input.accounts.includes(requested)) {
			throw new AccountNotFoundError(requested, input.accounts);
		}
		return requested;
	}
	if (input.defaultAccount && input.accounts.includes(input.defaultAccount)) {
		return input.defaultAccount;
	}
	throw new NoAccountConfiguredError();
}

async function refreshWithGoogle(account: Account): Promise<RefreshedToken> {
	const client = new OAuth2Client({
		clientId: account.oauth2.clientId,
		clientSecret: account.oauth2.clientSecret,
	});
	client.setCredentials({ refresh_token: account.oauth2.refreshToken });

	const { token } = await client.getAccessToken();
	if (!token) {
		throw new CliError("AUTH_FAILED", `Token refresh for ${account.email} returned no access token`);
	}
	return { accessToken: token, expiryDate: client.credentials.expiry_date ?? undefined };
}

export class AuthService {
	private readonly storage: AccountStorage;
	private readonly flowFactory: NonNullable<AuthServiceOptions["flowFactory"]>;
	private readonly refresher: (account: Account) => Promise<RefreshedToken>;
	private readonly now: () => number;
	private readonly cwd: string;
	private state: AuthState;

	constructor(storage: AccountStorage, options: AuthServiceOptions = {}) {
		this.storage = storage;
		this.flowFactory =
			options.flowFactory ?? ((credentials, onMessage) => new OAuthFlow({ ...credentials, onMessage }));
		this.refresher = options.refresher ?? refreshWithGoogle;
		this.now = options.now ?? Date.now;
		this.cwd = options.cwd ?? process.cwd();
		this.state = storage.listEmails().length > 0 ? "authenticated" : "unauthenticated";
	}

	getState(): AuthState {
		return this.state;
	}

	/** OAuth client credentials from the store, else a `credentials.json` in the working directory. */
	loadClientCredentials(): StoredCredentials {
		const stored = this.storage.getCredentials();
		if (stored) return stored;

		const local = path.join(this.cwd, "credentials.json");
		if (fs.existsSync(local)) {
			return this.importCredentials(local);
		}

		throw new ConfigurationError("OAuth client credentials not found", {
			tip: "Run 'gdocs auth credentials <file>' with the OAuth client JSON from the Google Cloud console.",
		});
	}

	importCredentials(file: string): StoredCredentials {
		let raw: string;
		try {
			raw = fs.readFileSync(file, "utf8");
		} catch (e) {
			throw new ConfigurationError(`Cannot read credentials file ${file}`, { details: errorMessage(e), cause: e });
		}
		const credentials = parseClientSecrets(raw, file);
		this.storage.setCredentials(credentials.clientId, credentials.clientSecret);
		return credentials;
	}

	async login(options: LoginOptions): Promise<LoginResult> {
		const credentials = this.loadClientCredentials();
		const flow = this.flowFactory(credentials, options.onMessage);
		const previous = this.state;

		this.state = "awaiting_consent";
		try {
			const result = await flow.authorize(options.manual ?? false);
			const email = await flow.fetchEmail(result);

			this.storage.addAccount({
				email,
				oauth2: {
					clientId: credentials.clientId,
					clientSecret: credentials.clientSecret,
					refreshToken: result.refreshToken,
					accessToken: result.accessToken,
					expiryDate: result.expiryDate,
					scopes: result.scopes,
				},
			});

			const currentDefault = this.storage.getDefaultAccount();
			const isDefault =
				options.setDefault === true || !currentDefault || !this.storage.hasAccount(currentDefault);
			if (isDefault) {
				this.storage.setDefaultAccount(email);
			}

			this.state = "authenticated";
			return { email, isDefault: isDefault || currentDefault === email, scopes: result.scopes ?? [] };
		} catch (e) {
			this.state = previous === "authenticated" ? previous : "unauthenticated";
			throw toCliError(e, "login");
		}
	}

	/**
	 * Returns the account with an access token good for at least another
	 * minute, refreshing it when needed.
	 */
	async ensureValid(email: string): Promise<Account> {
		const account = this.storage.requireAccount(email);

		const { accessToken, expiryDate } = account.oauth2;
		if (accessToken && expiryDate !== undefined && expiryDate - this.now() > TOKEN_EXPIRY_MARGIN_MS) {
			return account;
		}

		let refreshed: RefreshedToken;
		try {
			refreshed = await this.refresher(account);
		} catch (e) {
			throw toCliError(e, "token refresh", email);
		}

		const updated: Account = {
			...account,
			oauth2: { ...account.oauth2, accessToken: refreshed.accessToken, expiryDate: refreshed.expiryDate },
		};
		this.storage.addAccount(updated);
		return updated;
	}

	/** The stored token set of an account, for use by other tools. */
	exportToken(email: string): Account {
		return this.storage.requireAccount(email);
	}

	resolveAccount(explicit?: string, env?: string): string {
		return resolveAccount({
			explicit,
			env,
			defaultAccount: this.storage.getDefaultAccount(),
			accounts: this.storage.listEmails(),
		});
	}

	status(): AccountStatus[] {
		const defaultAccount = this.storage.getDefaultAccount();
		return this.storage.getAllAccounts().map((account) => ({
			email: account.email,
			isDefault: account.email === defaultAccount,
			tokenExpiry:
				account.oauth2.expiryDate !== undefined ? new Date(account.oauth2.expiryDate).toISOString() : undefined,
		}));
	}

	/** Returns the emails that were removed. */
	logout(options: LogoutOptions): string[] {
		let removed: string[];
		if (options.all) {
			removed = this.storage.clearAll();
		} else {
			if (!options.email) {
				throw new ValidationError("Specify an account or --all");
			}
			if (!this.storage.deleteAccount(options.email)) {
				throw new AccountNotFoundError(options.email, this.storage.listEmails());
			}
			removed = [options.email];
		}

		if (this.storage.listEmails().length === 0) {
			this.state = "unauthenticated";
		}
		return removed;
	}

	setDefault(email: string): void {
		if (!this.storage.hasAccount(email)) {
			throw new AccountNotFoundError(email, this.storage.listEmails());
		}
		this.storage.setDefaultAccount(email);
	}
}
