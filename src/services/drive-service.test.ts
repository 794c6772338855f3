import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AccountStorage } from "../account-storage.js";
import type { Account } from "../types.js";
import { DriveService, escapeQueryValue } from "./drive-service.js";

const mockDriveInstance = {
	files: {
		list: vi.fn(),
		get: vi.fn(),
		delete: vi.fn(),
		update: vi.fn(),
	},
	permissions: {
		create: vi.fn(),
		delete: vi.fn(),
		list: vi.fn(),
	},
	revisions: {
		list: vi.fn(),
	},
	drives: {
		list: vi.fn(),
	},
};

vi.mock("googleapis", () => ({
	google: {
		drive: vi.fn(() => mockDriveInstance),
	},
}));

const DOCS_QUERY = "mimeType = 'application/vnd.google-apps.document' and trashed = false";

describe("DriveService", () => {
	let tempDir: string;
	let storage: AccountStorage;
	let service: DriveService;

	const testAccount: Account = {
		email: "test@example.com",
		oauth2: {
			clientId: "test-client-id",
			clientSecret: "test-client-secret",
			refreshToken: "test-refresh-token",
		},
	};

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "gdocs-test-"));
		storage = new AccountStorage(tempDir);
		storage.addAccount(testAccount);
		service = new DriveService(storage);
		vi.clearAllMocks();
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	describe("escapeQueryValue", () => {
		it("should escape quotes and backslashes", () => {
			expect(escapeQueryValue("Bob's \\ plan")).toBe("Bob\\'s \\\\ plan");
		});
	});

	describe("listDocuments", () => {
		it("should list documents with default options", async () => {
			mockDriveInstance.files.list.mockResolvedValue({
				data: {
					files: [{ id: "doc1", name: "Notes", modifiedTime: "2024-03-01T10:00:00.000Z" }],
				},
			});

			const documents = await service.listDocuments("test@example.com");

			expect(mockDriveInstance.files.list).toHaveBeenCalledWith({
				q: DOCS_QUERY,
				pageSize: 20,
				fields: "nextPageToken, files(id, name, modifiedTime, parents)",
				orderBy: "modifiedTime desc",
				supportsAllDrives: true,
				includeItemsFromAllDrives: true,
				pageToken: undefined,
			});
			expect(documents).toEqual([
				{
					id: "doc1",
					title: "Notes",
					modifiedTime: "2024-03-01T10:00:00.000Z",
					url: "https://docs.google.com/document/d/doc1/edit",
				},
			]);
		});

		it("should follow page tokens until the limit is reached", async () => {
			mockDriveInstance.files.list
				.mockResolvedValueOnce({
					data: { files: [{ id: "a", name: "A" }, { id: "b", name: "B" }], nextPageToken: "page-2" },
				})
				.mockResolvedValueOnce({
					data: { files: [{ id: "c", name: "C" }, { id: "d", name: "D" }], nextPageToken: "page-3" },
				});

			const documents = await service.listDocuments("test@example.com", { limit: 3 });

			expect(documents.map((d) => d.id)).toEqual(["a", "b", "c"]);
			expect(mockDriveInstance.files.list).toHaveBeenCalledTimes(2);
			expect(mockDriveInstance.files.list.mock.calls[1][0]).toMatchObject({ pageSize: 1, pageToken: "page-2" });
		});

		it("should restrict to a folder and a shared drive", async () => {
			mockDriveInstance.files.list.mockResolvedValue({ data: { files: [] } });

			await service.listDocuments("test@example.com", { folderId: "folder1", sharedDriveId: "drive1" });

			expect(mockDriveInstance.files.list).toHaveBeenCalledWith(
				expect.objectContaining({
					q: `${DOCS_QUERY} and 'folder1' in parents`,
					corpora: "drive",
					driveId: "drive1",
				}),
			);
		});

		it("should reject a non-positive limit", async () => {
			await expect(service.listDocuments("test@example.com", { limit: 0 })).rejects.toThrow(
				"Limit must be a positive integer, got 0",
			);
		});
	});

	describe("searchDocuments", () => {
		it("should search titles with the query escaped", async () => {
			mockDriveInstance.files.list.mockResolvedValue({ data: { files: [{ id: "doc1", name: "Bob's plan" }] } });

			const documents = await service.searchDocuments("test@example.com", "Bob's", 5);

			expect(mockDriveInstance.files.list).toHaveBeenCalledWith(
				expect.objectContaining({
					q: `${DOCS_QUERY} and name contains 'Bob\\'s'`,
					pageSize: 5,
				}),
			);
			expect(documents[0].title).toBe("Bob's plan");
		});

		it("should reject an empty query", async () => {
			await expect(service.searchDocuments("test@example.com", "  ")).rejects.toThrow(
				"Search query must not be empty",
			);
		});
	});

	describe("delete", () => {
		it("should delete the file", async () => {
			mockDriveInstance.files.delete.mockResolvedValue({});

			await service.delete("test@example.com", "doc1");

			expect(mockDriveInstance.files.delete).toHaveBeenCalledWith({ fileId: "doc1", supportsAllDrives: true });
		});
	});

	describe("move", () => {
		it("should move the file out of its previous parents", async () => {
			mockDriveInstance.files.get.mockResolvedValue({ data: { parents: ["root-id", "old-folder"] } });
			mockDriveInstance.files.update.mockResolvedValue({
				data: { id: "doc1", name: "Notes", parents: ["folder1"] },
			});

			const result = await service.move("test@example.com", "doc1", "folder1");

			expect(mockDriveInstance.files.update).toHaveBeenCalledWith({
				fileId: "doc1",
				addParents: "folder1",
				removeParents: "root-id,old-folder",
				fields: "id, name, parents",
				supportsAllDrives: true,
			});
			expect(result).toEqual({ id: "doc1", name: "Notes", parentId: "folder1" });
		});

		it("should not remove parents when the file has none", async () => {
			mockDriveInstance.files.get.mockResolvedValue({ data: {} });
			mockDriveInstance.files.update.mockResolvedValue({ data: { id: "doc1", name: "Notes" } });

			await service.move("test@example.com", "doc1", "folder1");

			expect(mockDriveInstance.files.update).toHaveBeenCalledWith(
				expect.objectContaining({ removeParents: undefined }),
			);
		});
	});

	describe("share", () => {
		it("should grant a role and notify with a message", async () => {
			mockDriveInstance.permissions.create.mockResolvedValue({
				data: { id: "perm1", type: "user", role: "writer", emailAddress: "friend@example.com" },
			});

			const permission = await service.share("test@example.com", "doc1", {
				email: "friend@example.com",
				role: "writer",
				message: "Have a look",
			});

			expect(mockDriveInstance.permissions.create).toHaveBeenCalledWith({
				fileId: "doc1",
				requestBody: { type: "user", role: "writer", emailAddress: "friend@example.com" },
				sendNotificationEmail: true,
				emailMessage: "Have a look",
				fields: "id, type, role, emailAddress, displayName",
				supportsAllDrives: true,
			});
			expect(permission).toEqual({
				id: "perm1",
				type: "user",
				role: "writer",
				emailAddress: "friend@example.com",
				displayName: undefined,
			});
		});

		it("should drop the message when notifications are off", async () => {
			mockDriveInstance.permissions.create.mockResolvedValue({ data: { id: "perm1" } });

			await service.share("test@example.com", "doc1", {
				email: "friend@example.com",
				role: "reader",
				notify: false,
				message: "ignored",
			});

			expect(mockDriveInstance.permissions.create).toHaveBeenCalledWith(
				expect.objectContaining({ sendNotificationEmail: false, emailMessage: undefined }),
			);
		});
	});

	describe("listPermissions", () => {
		it("should map permissions", async () => {
			mockDriveInstance.permissions.list.mockResolvedValue({
				data: {
					permissions: [
						{ id: "p1", type: "user", role: "owner", emailAddress: "test@example.com" },
						{ id: "anyoneWithLink", type: "anyone", role: "reader" },
					],
				},
			});

			const permissions = await service.listPermissions("test@example.com", "doc1");

			expect(permissions).toEqual([
				{ id: "p1", type: "user", role: "owner", emailAddress: "test@example.com", displayName: undefined },
				{ id: "anyoneWithLink", type: "anyone", role: "reader", emailAddress: undefined, displayName: undefined },
			]);
		});
	});

	describe("unshare", () => {
		it("should delete the permission", async () => {
			mockDriveInstance.permissions.delete.mockResolvedValue({});

			await service.unshare("test@example.com", "doc1", "perm1");

			expect(mockDriveInstance.permissions.delete).toHaveBeenCalledWith({
				fileId: "doc1",
				permissionId: "perm1",
				supportsAllDrives: true,
			});
		});

		it("should report a missing permission", async () => {
			mockDriveInstance.permissions.delete.mockRejectedValue(
				Object.assign(new Error("Permission not found: perm9."), { response: { status: 404 } }),
			);

			await expect(service.unshare("test@example.com", "doc1", "perm9")).rejects.toThrow(
				"Not found (permission perm9)",
			);
		});
	});

	describe("listRevisions", () => {
		it("should collect every page and name the editor", async () => {
			mockDriveInstance.revisions.list
				.mockResolvedValueOnce({
					data: {
						revisions: [
							{
								id: "1",
								modifiedTime: "2024-01-01T00:00:00.000Z",
								lastModifyingUser: { displayName: "Ada", emailAddress: "ada@example.com" },
							},
						],
						nextPageToken: "next",
					},
				})
				.mockResolvedValueOnce({
					data: { revisions: [{ id: "2", lastModifyingUser: { emailAddress: "bob@example.com" } }] },
				});

			const revisions = await service.listRevisions("test@example.com", "doc1");

			expect(revisions).toEqual([
				{ id: "1", modifiedTime: "2024-01-01T00:00:00.000Z", lastModifyingUser: "Ada" },
				{ id: "2", modifiedTime: undefined, lastModifyingUser: "bob@example.com" },
			]);
		});
	});

	describe("listSharedDrives", () => {
		it("should list shared drives", async () => {
			mockDriveInstance.drives.list.mockResolvedValue({
				data: { drives: [{ id: "drive1", name: "Team" }] },
			});

			const drives = await service.listSharedDrives("test@example.com");

			expect(drives).toEqual([{ id: "drive1", name: "Team" }]);
		});
	});

	describe("listFolders", () => {
		it("should list folders of a shared drive", async () => {
			mockDriveInstance.files.list.mockResolvedValue({
				data: { files: [{ id: "f1", name: "Specs", parents: ["drive1"] }] },
			});

			const folders = await service.listFolders("test@example.com", { sharedDriveId: "drive1" });

			expect(mockDriveInstance.files.list).toHaveBeenCalledWith(
				expect.objectContaining({
					q: "mimeType = 'application/vnd.google-apps.folder' and trashed = false and 'drive1' in parents",
					corpora: "drive",
					driveId: "drive1",
				}),
			);
			expect(folders).toEqual([{ id: "f1", name: "Specs", parentId: "drive1" }]);
		});

		it("should prefer an explicit parent folder", async () => {
			mockDriveInstance.files.list.mockResolvedValue({ data: { files: [] } });

			await service.listFolders("test@example.com", { parentId: "parent1", sharedDriveId: "drive1" });

			expect(mockDriveInstance.files.list).toHaveBeenCalledWith(
				expect.objectContaining({
					q: "mimeType = 'application/vnd.google-apps.folder' and trashed = false and 'parent1' in parents",
				}),
			);
		});
	});

	describe("rate limiting", () => {
		it("should surface a rate-limit reason on 403 as rate limited", async () => {
			mockDriveInstance.files.list.mockRejectedValue(
				Object.assign(new Error("User Rate Limit Exceeded"), {
					response: { status: 403, data: { error: { errors: [{ reason: "userRateLimitExceeded" }] } } },
				}),
			);

			await expect(service.listDocuments("test@example.com")).rejects.toMatchObject({ code: "RATE_LIMITED" });
		});
	});
});
