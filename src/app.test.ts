import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AccountStorage } from "./account-storage.js";
import { type Services, parseGlobalOptions, run } from "./app.js";
import { AuthService } from "./auth-service.js";
import { DocsService } from "./services/docs-service.js";
import { DriveService } from "./services/drive-service.js";
import type { Account, DocsDocument } from "./types.js";
import { VERSION } from "./version.js";

const mockDocsInstance = {
	documents: {
		create: vi.fn(),
		get: vi.fn(),
		batchUpdate: vi.fn(),
	},
};

const mockDriveInstance = {
	files: {
		list: vi.fn(),
		get: vi.fn(),
		delete: vi.fn(),
		update: vi.fn(),
	},
};

vi.mock("googleapis", () => ({
	google: {
		docs: vi.fn(() => mockDocsInstance),
		drive: vi.fn(() => mockDriveInstance),
	},
}));

const reportDocument: DocsDocument = {
	documentId: "doc-1",
	title: "Report",
	body: {
		content: [
			{ endIndex: 1, sectionBreak: {} },
			{
				startIndex: 1,
				endIndex: 19,
				paragraph: { elements: [{ startIndex: 1, endIndex: 19, textRun: { content: "Report 2023 draft\n" } }] },
			},
			{
				startIndex: 19,
				endIndex: 31,
				paragraph: { elements: [{ startIndex: 19, endIndex: 31, textRun: { content: "Budget 2023\n" } }] },
			},
		],
	},
};

const tableDocument: DocsDocument = {
	documentId: "doc-1",
	title: "Tables",
	body: {
		content: [
			{ endIndex: 1, sectionBreak: {} },
			{ startIndex: 2, endIndex: 40, table: { rows: 3, columns: 2, tableRows: [] } },
		],
	},
};

function account(email: string): Account {
	return {
		email,
		oauth2: {
			clientId: "test-client-id",
			clientSecret: "test-secret",
			refreshToken: "test-refresh-token",
			accessToken: "test-access-token",
			expiryDate: Date.now() + 3_600_000,
		},
	};
}

describe("run", () => {
	let tempDir: string;
	let storage: AccountStorage;
	let services: Services;
	let stdout: string[];
	let stderr: string[];
	let confirm: Mock<(question: string) => Promise<boolean>>;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "gdocs-test-"));
		storage = new AccountStorage(tempDir);
		storage.addAccount(account("a@example.com"));
		storage.setDefaultAccount("a@example.com");
		services = {
			auth: new AuthService(storage, { cwd: tempDir }),
			docs: new DocsService(storage),
			drive: new DriveService(storage),
		};
		stdout = [];
		stderr = [];
		confirm = vi.fn(async (_question: string) => false);
		vi.clearAllMocks();
		mockDocsInstance.documents.batchUpdate.mockResolvedValue({ data: { documentId: "doc-1", replies: [] } });
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	function exec(argv: string[], env: Record<string, string> = {}): Promise<number> {
		return run(argv, {
			env,
			services,
			confirm,
			stdout: (text) => stdout.push(text),
			stderr: (text) => stderr.push(text),
		});
	}

	const out = () => stdout.join("");
	const err = () => stderr.join("");

	describe("global options", () => {
		it("should print the version", async () => {
			expect(await exec(["--version"])).toBe(0);
			expect(out()).toBe(`${VERSION}\n`);
		});

		it("should print usage and fail without a command group", async () => {
			expect(await exec([])).toBe(1);
			expect(out().startsWith("gdocs - Google Docs CLI\n")).toBe(true);
		});

		it("should print usage for --help anywhere", async () => {
			expect(await exec(["doc", "list", "--help"])).toBe(0);
			expect(out().startsWith("gdocs - Google Docs CLI\n")).toBe(true);
			expect(mockDriveInstance.files.list).not.toHaveBeenCalled();
		});

		it("should reject an unknown command group", async () => {
			expect(await exec(["sheets", "list"])).toBe(2);
			expect(err()).toBe(
				"Error: Unknown command group: sheets\nTip: Available: auth, doc, content, table, drives\n",
			);
		});

		it("should reject an unknown leading option", async () => {
			expect(await exec(["--bogus", "doc", "list"])).toBe(2);
			expect(err()).toBe("Error: Unknown option: --bogus\n");
		});

		it("should split global flags from the command", () => {
			expect(parseGlobalOptions(["-A", "b@example.com", "doc", "get", "d1", "--json"])).toEqual({
				json: true,
				help: false,
				version: false,
				account: "b@example.com",
				group: "doc",
				rest: ["get", "d1"],
			});
		});
	});

	describe("doc", () => {
		beforeEach(() => {
			mockDocsInstance.documents.create.mockResolvedValue({ data: { documentId: "doc-1", title: "Notes" } });
		});

		it("should create a document without moving it", async () => {
			expect(await exec(["doc", "create", "Notes"])).toBe(0);

			expect(mockDocsInstance.documents.create).toHaveBeenCalledWith({ requestBody: { title: "Notes" } });
			expect(mockDriveInstance.files.update).not.toHaveBeenCalled();
			expect(out()).toBe("✓ Created: Notes\n  ID: doc-1\n  URL: https://docs.google.com/document/d/doc-1/edit\n");
		});

		it("should move a new document into a folder", async () => {
			mockDriveInstance.files.get.mockResolvedValue({ data: { parents: ["root-id"] } });
			mockDriveInstance.files.update.mockResolvedValue({ data: { id: "doc-1", name: "Notes", parents: ["f1"] } });

			expect(await exec(["--json", "doc", "create", "Notes", "--folder", "f1"])).toBe(0);

			expect(mockDriveInstance.files.update).toHaveBeenCalledWith(
				expect.objectContaining({ fileId: "doc-1", addParents: "f1", removeParents: "root-id" }),
			);
			expect(JSON.parse(out())).toEqual({
				id: "doc-1",
				title: "Notes",
				url: "https://docs.google.com/document/d/doc-1/edit",
				folderId: "f1",
			});
		});

		it("should cancel a delete that is not confirmed", async () => {
			expect(await exec(["doc", "delete", "doc-1"])).toBe(0);

			expect(confirm).toHaveBeenCalledWith("Delete document doc-1?");
			expect(mockDriveInstance.files.delete).not.toHaveBeenCalled();
			expect(out()).toBe("Cancelled\n");
		});

		it("should delete without asking when forced", async () => {
			mockDriveInstance.files.delete.mockResolvedValue({});

			expect(await exec(["doc", "delete", "doc-1", "--force"])).toBe(0);

			expect(confirm).not.toHaveBeenCalled();
			expect(out()).toBe("✓ Deleted: doc-1\n");
		});

		it("should reject an unknown share role", async () => {
			expect(await exec(["doc", "share", "doc-1", "--email", "friend@example.com", "--role", "owner"])).toBe(2);
			expect(err()).toBe("Error: Invalid role: owner. Must be reader, writer, or commenter.\n");
		});

		it("should print an empty list message", async () => {
			mockDriveInstance.files.list.mockResolvedValue({ data: { files: [] } });

			expect(await exec(["doc", "list"])).toBe(0);
			expect(out()).toBe("No documents found.\n");
		});

		it("should report a missing document as a JSON error", async () => {
			mockDocsInstance.documents.get.mockRejectedValue(
				Object.assign(new Error("Requested entity was not found."), { response: { status: 404 } }),
			);

			expect(await exec(["doc", "get", "missing", "--json"])).toBe(1);
			expect(JSON.parse(out())).toEqual({
				error: true,
				code: "NOT_FOUND",
				message: "Not found (document missing)",
				details: "Requested entity was not found.",
			});
		});
	});

	describe("content", () => {
		it("should replace every occurrence", async () => {
			mockDocsInstance.documents.get.mockResolvedValue({ data: reportDocument });

			expect(await exec(["content", "replace", "doc-1", "2023", "2024"])).toBe(0);
			expect(out()).toBe("✓ Replaced 2 occurrence(s)\n");
		});

		it("should read a document as markdown with its title", async () => {
			mockDocsInstance.documents.get.mockResolvedValue({ data: reportDocument });

			expect(await exec(["content", "read", "doc-1"])).toBe(0);
			expect(out()).toBe("# Report\n\nReport 2023 draft\n\nBudget 2023\n");
		});

		it("should reject a negative insert index before calling the API", async () => {
			expect(await exec(["content", "insert", "doc-1", "Hello", "--index", "0"])).toBe(2);
			expect(err()).toBe("Error: Index must be >= 1, got 0\n");
			expect(mockDocsInstance.documents.batchUpdate).not.toHaveBeenCalled();
		});

		it("should import a file as a new paragraph", async () => {
			mockDocsInstance.documents.get.mockResolvedValue({ data: reportDocument });
			const file = path.join(tempDir, "notes.txt");
			fs.writeFileSync(file, "Imported\n\n");

			expect(await exec(["content", "from-file", "doc-1", file])).toBe(0);

			expect(mockDocsInstance.documents.batchUpdate.mock.calls[0][0].requestBody.requests).toEqual([
				{ insertText: { location: { index: 30 }, text: "\nImported" } },
			]);
			expect(out()).toBe(`✓ Imported 8 characters from ${file}\n`);
		});
	});

	describe("table", () => {
		it("should add a row above another", async () => {
			mockDocsInstance.documents.get.mockResolvedValue({ data: tableDocument });

			expect(await exec(["table", "add-row", "doc-1", "0", "--row", "2", "--above"])).toBe(0);
			expect(out()).toBe("✓ Added row above row 2 in table 0\n");
		});

		it("should require --row to delete a row", async () => {
			expect(await exec(["table", "delete-row", "doc-1", "0"])).toBe(2);
			expect(err()).toBe("Error: Usage: gdocs table delete-row <documentId> <tableIndex> --row N\n");
		});
	});

	describe("accounts", () => {
		beforeEach(() => {
			storage.addAccount(account("b@example.com"));
			mockDocsInstance.documents.get.mockResolvedValue({ data: reportDocument });
		});

		it("should use --account given after the command", async () => {
			expect(await exec(["doc", "get", "doc-1", "--account", "b@example.com"], { GDOCS_DEBUG: "1" })).toBe(0);
			expect(err()).toBe("[debug] command: doc get doc-1 --account b@example.com\n[debug] account: b@example.com\n");
		});

		it("should use GDOCS_ACCOUNT over the default", async () => {
			expect(await exec(["doc", "get", "doc-1"], { GDOCS_ACCOUNT: "b@example.com", GDOCS_DEBUG: "1" })).toBe(0);
			expect(err()).toBe("[debug] command: doc get doc-1\n[debug] account: b@example.com\n");
		});

		it("should reject an unknown account", async () => {
			expect(await exec(["--account", "x@example.com", "doc", "get", "doc-1"])).toBe(1);
			expect(err()).toBe("Error: Account 'x@example.com' not found\nTip: Available accounts: a@example.com, b@example.com\n");
			expect(mockDocsInstance.documents.get).not.toHaveBeenCalled();
		});
	});

	describe("auth", () => {
		it("should report when nobody is signed in", async () => {
			services.auth.logout({ all: true });

			expect(await exec(["auth", "status"])).toBe(0);
			expect(out()).toBe("Not authenticated. Run 'gdocs auth login'.\n");
		});

		it("should fail commands when no account is configured", async () => {
			services.auth.logout({ all: true });

			expect(await exec(["--json", "doc", "list"])).toBe(1);
			expect(JSON.parse(out())).toMatchObject({ error: true, code: "NO_ACCOUNT" });
		});

		it("should export the stored token set of the resolved account", async () => {
			storage.addAccount(account("b@example.com"));

			expect(await exec(["auth", "token"])).toBe(0);
			expect(JSON.parse(out())).toEqual(storage.getAccount("a@example.com"));

			stdout.length = 0;
			expect(await exec(["auth", "token", "--account", "b@example.com"])).toBe(0);
			expect(JSON.parse(out())).toEqual(storage.getAccount("b@example.com"));
		});

		it("should refuse to export an unknown account", async () => {
			expect(await exec(["auth", "token"], { GDOCS_ACCOUNT: "x@example.com" })).toBe(1);
			expect(err()).toBe("Error: Account 'x@example.com' not found\nTip: Available accounts: a@example.com\n");
			expect(out()).toBe("");
		});

		it("should drop cached API clients of a logged out account", async () => {
			const clearDocs = vi.spyOn(services.docs, "clearClientCache");
			const clearDrive = vi.spyOn(services.drive, "clearClientCache");

			expect(await exec(["auth", "logout", "a@example.com"])).toBe(0);

			expect(out()).toBe("✓ Logged out: a@example.com\n");
			expect(clearDocs).toHaveBeenCalledWith("a@example.com");
			expect(clearDrive).toHaveBeenCalledWith("a@example.com");
		});

		it("should switch the default account", async () => {
			storage.addAccount(account("b@example.com"));

			expect(await exec(["auth", "set-default", "b@example.com"])).toBe(0);
			expect(out()).toBe("✓ Default account set: b@example.com\n");
			expect(storage.getDefaultAccount()).toBe("b@example.com");
		});
	});
});
