import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { getConfigDir } from "./config.js";
import { AuthRequiredError, StorageError, errorMessage } from "./errors.js";
import type { Account, StoredCredentials } from "./types.js";

const ACCOUNTS_FILE = "accounts.json";
const CREDENTIALS_FILE = "credentials.json";
const CONFIG_FILE = "config.json";

const accountSchema = z.object({
	email: z.string().min(1),
	oauth2: z.object({
		clientId: z.string(),
		clientSecret: z.string(),
		refreshToken: z.string(),
		accessToken: z.string().optional(),
		expiryDate: z.number().optional(),
		scopes: z.array(z.string()).optional(),
	}),
});

const credentialsSchema = z.object({
	clientId: z.string(),
	clientSecret: z.string(),
});

const configSchema = z.object({
	defaultAccount: z.string().optional(),
});

type StoredConfig = z.infer<typeof configSchema>;

/**
 * Per-account OAuth token sets plus the OAuth client credentials and the
 * default-account marker, kept as JSON files in the config directory.
 */
export class AccountStorage {
	private readonly configDir: string;
	private accounts: Map<string, Account> = new Map();

	constructor(configDir: string = getConfigDir()) {
		this.configDir = configDir;
		this.ensureDir(this.configDir);
		this.loadAccounts();
	}

	private ensureDir(dir: string): void {
		try {
			fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
		} catch (e) {
			throw new StorageError(`Cannot create config directory ${dir}`, { details: errorMessage(e), cause: e });
		}
	}

	private filePath(name: string): string {
		return path.join(this.configDir, name);
	}

	private readJson(name: string): unknown {
		const file = this.filePath(name);
		if (!fs.existsSync(file)) return undefined;

		let raw: string;
		try {
			raw = fs.readFileSync(file, "utf8");
		} catch (e) {
			throw new StorageError(`Cannot read ${file}`, { details: errorMessage(e), cause: e });
		}
		// Corrupt JSON counts as an empty store.
		try {
			return JSON.parse(raw);
		} catch {
			return undefined;
		}
	}

	private writeJson(name: string, data: unknown): void {
		const file = this.filePath(name);
		const tmp = `${file}.${process.pid}.tmp`;
		try {
			fs.writeFileSync(tmp, JSON.stringify(data, null, 2), { mode: 0o600 });
			fs.renameSync(tmp, file);
		} catch (e) {
			fs.rmSync(tmp, { force: true });
			throw new StorageError(`Cannot write ${file}`, { details: errorMessage(e), cause: e });
		}
	}

	private loadAccounts(): void {
		const data = this.readJson(ACCOUNTS_FILE);
		if (!Array.isArray(data)) return;
		for (const entry of data) {
			const parsed = accountSchema.safeParse(entry);
			if (parsed.success) {
				this.accounts.set(parsed.data.email, parsed.data);
			}
		}
	}

	private saveAccounts(): void {
		this.writeJson(ACCOUNTS_FILE, Array.from(this.accounts.values()));
	}

	private readConfig(): StoredConfig {
		const parsed = configSchema.safeParse(this.readJson(CONFIG_FILE));
		return parsed.success ? parsed.data : {};
	}

	addAccount(account: Account): void {
		this.accounts.set(account.email, account);
		this.saveAccounts();
	}

	getAccount(email: string): Account | undefined {
		return this.accounts.get(email);
	}

	requireAccount(email: string): Account {
		const account = this.accounts.get(email);
		if (!account) throw new AuthRequiredError(email);
		return account;
	}

	getAllAccounts(): Account[] {
		return Array.from(this.accounts.values());
	}

	listEmails(): string[] {
		return Array.from(this.accounts.keys());
	}

	deleteAccount(email: string): boolean {
		const deleted = this.accounts.delete(email);
		if (deleted) {
			this.saveAccounts();
			if (this.getDefaultAccount() === email) {
				this.writeJson(CONFIG_FILE, { ...this.readConfig(), defaultAccount: undefined });
			}
		}
		return deleted;
	}

	hasAccount(email: string): boolean {
		return this.accounts.has(email);
	}

	clearAll(): string[] {
		const emails = this.listEmails();
		this.accounts.clear();
		this.saveAccounts();
		this.writeJson(CONFIG_FILE, { ...this.readConfig(), defaultAccount: undefined });
		return emails;
	}

	getDefaultAccount(): string | undefined {
		return this.readConfig().defaultAccount;
	}

	setDefaultAccount(email: string): void {
		this.writeJson(CONFIG_FILE, { ...this.readConfig(), defaultAccount: email });
	}

	setCredentials(clientId: string, clientSecret: string): void {
		const creds: StoredCredentials = { clientId, clientSecret };
		this.writeJson(CREDENTIALS_FILE, creds);
	}

	getCredentials(): StoredCredentials | null {
		const parsed = credentialsSchema.safeParse(this.readJson(CREDENTIALS_FILE));
		return parsed.success ? parsed.data : null;
	}

	getConfigDir(): string {
		return this.configDir;
	}
}
