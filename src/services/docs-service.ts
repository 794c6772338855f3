import { type docs_v1, google } from "googleapis";
import { documentUrl } from "../config.js";
import {
	type StyleOptions,
	buildAddColumnRequest,
	buildAddRowRequest,
	buildAppendRequests,
	buildBulletsRequest,
	buildCreateTableRequest,
	buildDeleteColumnRequest,
	buildDeleteRowRequest,
	buildInsertRequests,
	buildReplaceRequests,
	findTables,
	resolveTable,
} from "../request-builder.js";
import type { DocsBatchUpdateResponse, DocsDocument, DocsRequest, DocumentInfo, TableInfo } from "../types.js";
import { BaseService } from "./base-service.js";

export interface DocsInsertTextOptions extends StyleOptions {
	index: number;
}

export interface DocsReplaceTextOptions {
	find: string;
	replace: string;
	matchCase?: boolean;
}

export interface DocsCreateTableOptions {
	rows: number;
	columns: number;
	index: number;
}

export interface DocsTableRowOptions {
	row: number;
	above?: boolean;
}

export interface DocsTableColumnOptions {
	column: number;
	left?: boolean;
}

export interface TextEditResult {
	index: number;
	length: number;
}

export class DocsService extends BaseService {
	private docsClients: Map<string, docs_v1.Docs> = new Map();

	private getDocsClient(email: string): docs_v1.Docs {
		let docs = this.docsClients.get(email);
		if (!docs) {
			docs = google.docs({ version: "v1", ...this.clientOptions(email) });
			this.docsClients.set(email, docs);
		}
		return docs;
	}

	async create(email: string, title: string): Promise<DocumentInfo> {
		const docs = this.getDocsClient(email);

		const response = await this.call(email, `document '${title}'`, () =>
			docs.documents.create({
				requestBody: { title },
			}),
		);

		return this.toInfo(response.data);
	}

	async get(email: string, documentId: string): Promise<DocsDocument> {
		const docs = this.getDocsClient(email);

		const response = await this.call(email, `document ${documentId}`, () =>
			docs.documents.get({
				documentId,
			}),
		);

		return response.data;
	}

	async getInfo(email: string, documentId: string): Promise<DocumentInfo> {
		return this.toInfo(await this.get(email, documentId));
	}

	async batchUpdate(email: string, documentId: string, requests: DocsRequest[]): Promise<DocsBatchUpdateResponse> {
		const docs = this.getDocsClient(email);

		const response = await this.call(email, `document ${documentId}`, () =>
			docs.documents.batchUpdate({
				documentId,
				requestBody: { requests },
			}),
		);

		return response.data;
	}

	async insertText(
		email: string,
		documentId: string,
		text: string,
		options: DocsInsertTextOptions,
	): Promise<TextEditResult> {
		const requests = buildInsertRequests(text, options.index, options);
		await this.batchUpdate(email, documentId, requests);
		return { index: options.index, length: text.length };
	}

	async appendText(
		email: string,
		documentId: string,
		text: string,
		styles: StyleOptions = {},
	): Promise<TextEditResult> {
		const document = await this.get(email, documentId);
		const plan = buildAppendRequests(document, text, styles);
		await this.batchUpdate(email, documentId, plan.requests);
		return { index: plan.index, length: text.length };
	}

	/** Returns the number of occurrences replaced. */
	async replaceText(email: string, documentId: string, options: DocsReplaceTextOptions): Promise<number> {
		const document = await this.get(email, documentId);
		const plan = buildReplaceRequests(document, options.find, options.replace, {
			matchCase: options.matchCase ?? true,
		});

		if (plan.occurrences > 0) {
			await this.batchUpdate(email, documentId, plan.requests);
		}
		return plan.occurrences;
	}

	async createBullets(
		email: string,
		documentId: string,
		startIndex: number,
		endIndex: number,
		preset?: string,
	): Promise<void> {
		await this.batchUpdate(email, documentId, [buildBulletsRequest(startIndex, endIndex, preset)]);
	}

	async listTables(email: string, documentId: string): Promise<TableInfo[]> {
		return findTables(await this.get(email, documentId));
	}

	async createTable(email: string, documentId: string, options: DocsCreateTableOptions): Promise<void> {
		const request = buildCreateTableRequest(options.rows, options.columns, options.index);
		await this.batchUpdate(email, documentId, [request]);
	}

	async addTableRow(
		email: string,
		documentId: string,
		tableIndex: number,
		options: DocsTableRowOptions,
	): Promise<TableInfo> {
		const table = resolveTable(await this.get(email, documentId), tableIndex);
		await this.batchUpdate(email, documentId, [buildAddRowRequest(table, options.row, options)]);
		return table;
	}

	async deleteTableRow(email: string, documentId: string, tableIndex: number, row: number): Promise<TableInfo> {
		const table = resolveTable(await this.get(email, documentId), tableIndex);
		await this.batchUpdate(email, documentId, [buildDeleteRowRequest(table, row)]);
		return table;
	}

	async addTableColumn(
		email: string,
		documentId: string,
		tableIndex: number,
		options: DocsTableColumnOptions,
	): Promise<TableInfo> {
		const table = resolveTable(await this.get(email, documentId), tableIndex);
		await this.batchUpdate(email, documentId, [buildAddColumnRequest(table, options.column, options)]);
		return table;
	}

	async deleteTableColumn(
		email: string,
		documentId: string,
		tableIndex: number,
		column: number,
	): Promise<TableInfo> {
		const table = resolveTable(await this.get(email, documentId), tableIndex);
		await this.batchUpdate(email, documentId, [buildDeleteColumnRequest(table, column)]);
		return table;
	}

	private toInfo(doc: docs_v1.Schema$Document): DocumentInfo {
		const id = doc.documentId ?? "";
		return {
			id,
			title: doc.title ?? "",
			revisionId: doc.revisionId ?? undefined,
			url: documentUrl(id),
		};
	}

	override clearClientCache(email?: string): void {
		if (email) {
			this.docsClients.delete(email);
		} else {
			this.docsClients.clear();
		}
		super.clearClientCache(email);
	}
}
