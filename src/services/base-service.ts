import { OAuth2Client } from "google-auth-library";
import type { AccountStorage } from "../account-storage.js";
import { RETRY_CONFIG } from "../config.js";
import { AccountNotFoundError, toCliError } from "../errors.js";
import type { Account } from "../types.js";

export abstract class BaseService {
	protected readonly accountStorage: AccountStorage;
	private oauth2Clients: Map<string, OAuth2Client> = new Map();

	constructor(accountStorage: AccountStorage) {
		this.accountStorage = accountStorage;
	}

	protected getOAuth2Client(email: string): OAuth2Client {
		const cached = this.oauth2Clients.get(email);
		if (cached) return cached;

		const account = this.accountStorage.getAccount(email);
		if (!account) {
			throw new AccountNotFoundError(email, this.accountStorage.listEmails());
		}

		const client = this.createOAuth2Client(account);
		this.oauth2Clients.set(email, client);
		return client;
	}

	protected createOAuth2Client(account: Account): OAuth2Client {
		const client = new OAuth2Client({
			clientId: account.oauth2.clientId,
			clientSecret: account.oauth2.clientSecret,
		});
		client.setCredentials({
			refresh_token: account.oauth2.refreshToken,
			access_token: account.oauth2.accessToken,
			expiry_date: account.oauth2.expiryDate,
		});

		// The library refreshes expired access tokens on its own; keep the store in step.
		client.on("tokens", (tokens) => {
			const current = this.accountStorage.getAccount(account.email) ?? account;
			this.accountStorage.addAccount({
				...current,
				oauth2: {
					...current.oauth2,
					refreshToken: tokens.refresh_token ?? current.oauth2.refreshToken,
					accessToken: tokens.access_token ?? current.oauth2.accessToken,
					expiryDate: tokens.expiry_date ?? current.oauth2.expiryDate,
				},
			});
		});

		return client;
	}

	/** Options shared by every googleapis client this service builds. */
	protected clientOptions(email: string) {
		return { auth: this.getOAuth2Client(email), retryConfig: RETRY_CONFIG };
	}

	/**
	 * Runs one API call and rethrows failures as CliErrors. `context` names the
	 * resource for NotFound / PermissionDenied messages.
	 */
	protected async call<T>(email: string, context: string, request: () => Promise<T>): Promise<T> {
		try {
			return await request();
		} catch (e) {
			throw toCliError(e, context, email);
		}
	}

	clearClientCache(email?: string): void {
		if (email) {
			this.oauth2Clients.delete(email);
		} else {
			this.oauth2Clients.clear();
		}
	}
}
