import { randomBytes } from "node:crypto";
import type { Server } from "node:http";
import * as readline from "node:readline/promises";
import express from "express";
import { OAuth2Client } from "google-auth-library";
import { google } from "googleapis";
import open from "open";
import { REDIRECT_PORTS, SCOPES } from "./config.js";
import { CliError, errorMessage } from "./errors.js";

export interface OAuthFlowOptions {
	clientId: string;
	clientSecret: string;
	scopes?: string[];
	/** Fixed redirect port; by default the first free one of REDIRECT_PORTS. */
	redirectPort?: number;
	/** Receives the consent URL and progress lines. */
	onMessage: (message: string) => void;
	/** Opens the consent URL. Defaults to the `open` package. */
	openBrowser?: (url: string) => Promise<unknown>;
}

export interface OAuthResult {
	refreshToken: string;
	accessToken?: string;
	expiryDate?: number;
	scopes?: string[];
}

const SUCCESS_PAGE = `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>gdocs</title></head>
<body><h1>Authentication successful</h1><p>You can close this window and return to the terminal.</p></body></html>`;

const FAILURE_PAGE = `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>gdocs</title></head>
<body><h1>Authentication failed</h1><p>Return to the terminal for details.</p></body></html>`;

export class OAuthFlow {
	private readonly oauth2Client: OAuth2Client;
	private readonly scopes: string[];
	private readonly redirectPort?: number;
	private readonly onMessage: (message: string) => void;
	private readonly openBrowser: (url: string) => Promise<unknown>;
	/** Echoed back on the redirect; ties the code to this login attempt. */
	private readonly state = randomBytes(16).toString("hex");
	private redirectUri: string;

	constructor(options: OAuthFlowOptions) {
		this.scopes = options.scopes ?? OAuthFlow.getDefaultScopes();
		this.redirectPort = options.redirectPort;
		this.redirectUri = OAuthFlow.redirectUriFor(options.redirectPort ?? REDIRECT_PORTS[0]);
		this.onMessage = options.onMessage;
		this.openBrowser = options.openBrowser ?? ((url) => open(url));
		this.oauth2Client = new OAuth2Client({
			clientId: options.clientId,
			clientSecret: options.clientSecret,
			redirectUri: this.redirectUri,
		});
	}

	static getDefaultScopes(): string[] {
		return [...SCOPES];
	}

	private static redirectUriFor(port: number): string {
		return `http://127.0.0.1:${port}`;
	}

	getOAuth2Client(): OAuth2Client {
		return this.oauth2Client;
	}

	getRedirectUri(): string {
		return this.redirectUri;
	}

	getState(): string {
		return this.state;
	}

	getAuthUrl(): string {
		return this.oauth2Client.generateAuthUrl({
			access_type: "offline",
			prompt: "consent",
			scope: this.scopes,
			redirect_uri: this.redirectUri,
			state: this.state,
		});
	}

	extractCodeFromUrl(url: string): string {
		let params: URLSearchParams;
		try {
			params = new URL(url).searchParams;
		} catch {
			const queryStart = url.indexOf("?");
			if (queryStart === -1) {
				throw new CliError("AUTH_FAILED", "Invalid redirect URL");
			}
			params = new URLSearchParams(url.slice(queryStart + 1));
		}

		const code = params.get("code");
		if (code) {
			if (params.get("state") !== this.state) {
				throw new CliError("AUTH_FAILED", "OAuth state mismatch", {
					tip: "Use the redirect of the latest 'gdocs auth login' attempt.",
				});
			}
			return code;
		}

		const error = params.get("error");
		if (error) {
			throw new CliError("AUTH_FAILED", `Authorization was refused: ${error}`);
		}
		throw new CliError("AUTH_FAILED", "No authorization code in redirect URL");
	}

	async exchangeCode(code: string): Promise<OAuthResult> {
		const { tokens } = await this.oauth2Client.getToken({ code, redirect_uri: this.redirectUri });

		if (!tokens.refresh_token) {
			throw new CliError("AUTH_FAILED", "No refresh token received", {
				tip: "Remove the app at https://myaccount.google.com/permissions and log in again.",
			});
		}

		return {
			refreshToken: tokens.refresh_token,
			accessToken: tokens.access_token ?? undefined,
			expiryDate: tokens.expiry_date ?? undefined,
			scopes: tokens.scope ? tokens.scope.split(" ") : undefined,
		};
	}

	/** Looks up the email address the token set was granted for. */
	async fetchEmail(result: OAuthResult): Promise<string> {
		this.oauth2Client.setCredentials({
			refresh_token: result.refreshToken,
			access_token: result.accessToken,
			expiry_date: result.expiryDate,
		});
		const oauth2 = google.oauth2({ version: "v2", auth: this.oauth2Client });
		const response = await oauth2.userinfo.get();
		const email = response.data.email;
		if (!email) {
			throw new CliError("AUTH_FAILED", "Google did not return an email address for this account");
		}
		return email;
	}

	async authorize(manual = false): Promise<OAuthResult> {
		const code = manual ? await this.promptForCode() : await this.receiveCode();
		return this.exchangeCode(code);
	}

	private async promptForCode(): Promise<string> {
		this.onMessage("Open this URL in a browser and authorize access:\n");
		this.onMessage(this.getAuthUrl());
		this.onMessage("\nThe browser will then fail to load a 127.0.0.1 page. Copy that page's URL.");

		const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
		try {
			const answer = await rl.question("Paste the redirect URL: ");
			return this.extractCodeFromUrl(answer.trim());
		} finally {
			rl.close();
		}
	}

	private async receiveCode(): Promise<string> {
		const { app, code } = this.callbackApp();
		const server = await this.listen(app);
		const address = server.address();
		if (typeof address === "object" && address !== null) {
			this.redirectUri = OAuthFlow.redirectUriFor(address.port);
		}

		try {
			const url = this.getAuthUrl();
			this.onMessage("Opening browser for Google sign-in. If it does not open, visit:\n");
			this.onMessage(url);
			const [received] = await Promise.all([code, this.launchBrowser(url)]);
			return received;
		} finally {
			server.close();
		}
	}

	private async launchBrowser(url: string): Promise<void> {
		try {
			await this.openBrowser(url);
		} catch (e) {
			this.onMessage(`Could not open a browser: ${errorMessage(e)}`);
		}
	}

	/** The redirect handler, settling `code` on the first redirect that carries a code or an error. */
	private callbackApp(): { app: express.Express; code: Promise<string> } {
		const app = express();
		const code = new Promise<string>((resolve, reject) => {
			app.get("/", (req, res) => {
				const url = new URL(req.originalUrl, this.redirectUri);
				if (!url.searchParams.has("code") && !url.searchParams.has("error")) {
					res.status(404).end();
					return;
				}
				try {
					const received = this.extractCodeFromUrl(url.toString());
					res.type("html").send(SUCCESS_PAGE);
					resolve(received);
				} catch (e) {
					res.status(400).type("html").send(FAILURE_PAGE);
					reject(e);
				}
			});
		});
		return { app, code };
	}

	private async listen(app: express.Express): Promise<Server> {
		const candidates = this.redirectPort !== undefined ? [this.redirectPort] : [...REDIRECT_PORTS, 0];
		let lastError: unknown;
		for (const port of candidates) {
			try {
				return await this.listenOn(app, port);
			} catch (e) {
				lastError = e;
			}
		}
		throw new CliError("AUTH_FAILED", "Could not start the OAuth redirect listener", {
			details: errorMessage(lastError),
			tip: "Use 'gdocs auth login --manual'.",
		});
	}

	private listenOn(app: express.Express, port: number): Promise<Server> {
		return new Promise((resolve, reject) => {
			const server = app.listen(port, "127.0.0.1");
			const onError = (err: Error) => {
				server.off("listening", onListening);
				reject(err);
			};
			const onListening = () => {
				server.off("error", onError);
				resolve(server);
			};
			server.once("error", onError);
			server.once("listening", onListening);
		});
	}
}
