export { BaseService } from "./base-service.js";
export { DriveService } from "./drive-service.js";
export type { DriveFolderOptions, DriveListOptions, DriveShareOptions } from "./drive-service.js";
export { DocsService } from "./docs-service.js";
export type {
	DocsCreateTableOptions,
	DocsInsertTextOptions,
	DocsReplaceTextOptions,
	DocsTableColumnOptions,
	DocsTableRowOptions,
	TextEditResult,
} from "./docs-service.js";
