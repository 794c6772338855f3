import { type drive_v3, google } from "googleapis";
import { DOCUMENT_MIME_TYPE, FOLDER_MIME_TYPE, documentUrl } from "../config.js";
import { ValidationError } from "../errors.js";
import type { DocumentSummary, Folder, Permission, Revision, ShareRole, SharedDrive } from "../types.js";
import { BaseService } from "./base-service.js";

export interface DriveListOptions {
	limit?: number;
	folderId?: string;
	sharedDriveId?: string;
}

export interface DriveShareOptions {
	email: string;
	role: ShareRole;
	notify?: boolean;
	message?: string;
}

export interface DriveFolderOptions {
	parentId?: string;
	sharedDriveId?: string;
}

const DEFAULT_LIMIT = 20;
const MAX_PAGE_SIZE = 100;
const FILE_FIELDS = "nextPageToken, files(id, name, modifiedTime, parents)";
const PERMISSION_FIELDS = "id, type, role, emailAddress, displayName";

/** Escapes a value for use inside a single-quoted Drive query string. */
export function escapeQueryValue(value: string): string {
	return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export class DriveService extends BaseService {
	private driveClients: Map<string, drive_v3.Drive> = new Map();

	private getDriveClient(email: string): drive_v3.Drive {
		let drive = this.driveClients.get(email);
		if (!drive) {
			drive = google.drive({ version: "v3", ...this.clientOptions(email) });
			this.driveClients.set(email, drive);
		}
		return drive;
	}

	async listDocuments(email: string, options: DriveListOptions = {}): Promise<DocumentSummary[]> {
		const clauses = [`mimeType = '${DOCUMENT_MIME_TYPE}'`, "trashed = false"];
		if (options.folderId) {
			clauses.push(`'${escapeQueryValue(options.folderId)}' in parents`);
		}
		return this.listFiles(email, clauses.join(" and "), options.limit ?? DEFAULT_LIMIT, options.sharedDriveId);
	}

	async searchDocuments(email: string, query: string, limit = DEFAULT_LIMIT): Promise<DocumentSummary[]> {
		if (query.trim() === "") {
			throw new ValidationError("Search query must not be empty");
		}
		const q = `mimeType = '${DOCUMENT_MIME_TYPE}' and trashed = false and name contains '${escapeQueryValue(query)}'`;
		return this.listFiles(email, q, limit);
	}

	private async listFiles(
		email: string,
		q: string,
		limit: number,
		sharedDriveId?: string,
	): Promise<DocumentSummary[]> {
		if (!Number.isInteger(limit) || limit < 1) {
			throw new ValidationError(`Limit must be a positive integer, got ${limit}`);
		}

		const drive = this.getDriveClient(email);
		const documents: DocumentSummary[] = [];
		let pageToken: string | undefined;

		do {
			const params: drive_v3.Params$Resource$Files$List = {
				q,
				pageSize: Math.min(MAX_PAGE_SIZE, limit - documents.length),
				fields: FILE_FIELDS,
				orderBy: "modifiedTime desc",
				supportsAllDrives: true,
				includeItemsFromAllDrives: true,
				pageToken,
			};
			if (sharedDriveId) {
				params.corpora = "drive";
				params.driveId = sharedDriveId;
			}

			const response = await this.call(email, "documents", () => drive.files.list(params));
			for (const file of response.data.files ?? []) {
				if (documents.length >= limit) break;
				documents.push(this.toSummary(file));
			}
			pageToken = response.data.nextPageToken ?? undefined;
		} while (pageToken && documents.length < limit);

		return documents;
	}

	async delete(email: string, fileId: string): Promise<void> {
		const drive = this.getDriveClient(email);
		await this.call(email, `document ${fileId}`, () => drive.files.delete({ fileId, supportsAllDrives: true }));
	}

	/** Moves a file into `folderId`, detaching it from every current parent. */
	async move(email: string, fileId: string, folderId: string): Promise<Folder> {
		const drive = this.getDriveClient(email);

		const file = await this.call(email, `document ${fileId}`, () =>
			drive.files.get({ fileId, fields: "parents", supportsAllDrives: true }),
		);
		const previousParents = (file.data.parents ?? []).join(",");

		const response = await this.call(email, `folder ${folderId}`, () =>
			drive.files.update({
				fileId,
				addParents: folderId,
				removeParents: previousParents || undefined,
				fields: "id, name, parents",
				supportsAllDrives: true,
			}),
		);

		return {
			id: response.data.id ?? fileId,
			name: response.data.name ?? "",
			parentId: response.data.parents?.[0] ?? folderId,
		};
	}

	async share(email: string, fileId: string, options: DriveShareOptions): Promise<Permission> {
		const drive = this.getDriveClient(email);
		const notify = options.notify ?? true;

		const response = await this.call(email, `document ${fileId}`, () =>
			drive.permissions.create({
				fileId,
				requestBody: {
					type: "user",
					role: options.role,
					emailAddress: options.email,
				},
				sendNotificationEmail: notify,
				emailMessage: notify ? options.message : undefined,
				fields: PERMISSION_FIELDS,
				supportsAllDrives: true,
			}),
		);

		return this.toPermission(response.data);
	}

	async listPermissions(email: string, fileId: string): Promise<Permission[]> {
		const drive = this.getDriveClient(email);

		const response = await this.call(email, `document ${fileId}`, () =>
			drive.permissions.list({
				fileId,
				fields: `permissions(${PERMISSION_FIELDS})`,
				supportsAllDrives: true,
			}),
		);

		return (response.data.permissions ?? []).map((p) => this.toPermission(p));
	}

	async unshare(email: string, fileId: string, permissionId: string): Promise<void> {
		const drive = this.getDriveClient(email);
		await this.call(email, `permission ${permissionId}`, () =>
			drive.permissions.delete({ fileId, permissionId, supportsAllDrives: true }),
		);
	}

	async listRevisions(email: string, fileId: string): Promise<Revision[]> {
		const drive = this.getDriveClient(email);
		const revisions: Revision[] = [];
		let pageToken: string | undefined;

		do {
			const response = await this.call(email, `document ${fileId}`, () =>
				drive.revisions.list({
					fileId,
					pageToken,
					fields: "nextPageToken, revisions(id, modifiedTime, lastModifyingUser(displayName, emailAddress))",
				}),
			);
			for (const revision of response.data.revisions ?? []) {
				revisions.push({
					id: revision.id ?? "",
					modifiedTime: revision.modifiedTime ?? undefined,
					lastModifyingUser:
						revision.lastModifyingUser?.displayName ?? revision.lastModifyingUser?.emailAddress ?? undefined,
				});
			}
			pageToken = response.data.nextPageToken ?? undefined;
		} while (pageToken);

		return revisions;
	}

	async listSharedDrives(email: string): Promise<SharedDrive[]> {
		const drive = this.getDriveClient(email);
		const drives: SharedDrive[] = [];
		let pageToken: string | undefined;

		do {
			const response = await this.call(email, "shared drives", () =>
				drive.drives.list({ pageSize: MAX_PAGE_SIZE, pageToken, fields: "nextPageToken, drives(id, name)" }),
			);
			for (const d of response.data.drives ?? []) {
				drives.push({ id: d.id ?? "", name: d.name ?? "" });
			}
			pageToken = response.data.nextPageToken ?? undefined;
		} while (pageToken);

		return drives;
	}

	async listFolders(email: string, options: DriveFolderOptions = {}): Promise<Folder[]> {
		const drive = this.getDriveClient(email);
		const parent = options.parentId ?? options.sharedDriveId;
		const clauses = [`mimeType = '${FOLDER_MIME_TYPE}'`, "trashed = false"];
		if (parent) {
			clauses.push(`'${escapeQueryValue(parent)}' in parents`);
		}

		const folders: Folder[] = [];
		let pageToken: string | undefined;

		do {
			const params: drive_v3.Params$Resource$Files$List = {
				q: clauses.join(" and "),
				pageSize: MAX_PAGE_SIZE,
				fields: "nextPageToken, files(id, name, parents)",
				orderBy: "name",
				supportsAllDrives: true,
				includeItemsFromAllDrives: true,
				pageToken,
			};
			if (options.sharedDriveId) {
				params.corpora = "drive";
				params.driveId = options.sharedDriveId;
			}

			const response = await this.call(email, "folders", () => drive.files.list(params));
			for (const file of response.data.files ?? []) {
				folders.push({
					id: file.id ?? "",
					name: file.name ?? "",
					parentId: file.parents?.[0] ?? undefined,
				});
			}
			pageToken = response.data.nextPageToken ?? undefined;
		} while (pageToken);

		return folders;
	}

	private toSummary(file: drive_v3.Schema$File): DocumentSummary {
		const id = file.id ?? "";
		return {
			id,
			title: file.name ?? "",
			modifiedTime: file.modifiedTime ?? undefined,
			url: documentUrl(id),
		};
	}

	private toPermission(p: drive_v3.Schema$Permission): Permission {
		return {
			id: p.id ?? "",
			type: p.type ?? "",
			role: p.role ?? "",
			emailAddress: p.emailAddress ?? undefined,
			displayName: p.displayName ?? undefined,
		};
	}

	override clearClientCache(email?: string): void {
		if (email) {
			this.driveClients.delete(email);
		} else {
			this.driveClients.clear();
		}
		super.clearClientCache(email);
	}
}
