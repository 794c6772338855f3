import type { docs_v1 } from "googleapis";

export interface OAuth2Credentials {
	clientId: string;
	clientSecret: string;
	refreshToken: string;
	accessToken?: string;
	/** Access token expiry, epoch milliseconds. */
	expiryDate?: number;
	scopes?: string[];
}

export interface Account {
	email: string;
	oauth2: OAuth2Credentials;
}

export interface StoredCredentials {
	clientId: string;
	clientSecret: string;
}

export interface AccountStatus {
	email: string;
	isDefault: boolean;
	tokenExpiry?: string;
}

export type DocsDocument = docs_v1.Schema$Document;
export type DocsStructuralElement = docs_v1.Schema$StructuralElement;
export type DocsParagraph = docs_v1.Schema$Paragraph;
export type DocsParagraphElement = docs_v1.Schema$ParagraphElement;
export type DocsTable = docs_v1.Schema$Table;
export type DocsTableCell = docs_v1.Schema$TableCell;
export type DocsRequest = docs_v1.Schema$Request;
export type DocsBatchUpdateResponse = docs_v1.Schema$BatchUpdateDocumentResponse;

export interface DocumentInfo {
	id: string;
	title: string;
	revisionId?: string;
	url: string;
}

export interface DocumentSummary {
	id: string;
	title: string;
	modifiedTime?: string;
	url: string;
}

export interface SharedDrive {
	id: string;
	name: string;
}

export interface Folder {
	id: string;
	name: string;
	parentId?: string;
}

export interface Permission {
	id: string;
	type: string;
	role: string;
	emailAddress?: string;
	displayName?: string;
}

export interface Revision {
	id: string;
	modifiedTime?: string;
	lastModifyingUser?: string;
}

export interface TableInfo {
	tableIndex: number;
	startIndex: number;
	endIndex: number;
	rows: number;
	columns: number;
}

export const NAMED_STYLE_TYPES = [
	"NORMAL_TEXT",
	"TITLE",
	"SUBTITLE",
	"HEADING_1",
	"HEADING_2",
	"HEADING_3",
	"HEADING_4",
	"HEADING_5",
	"HEADING_6",
] as const;

export type NamedStyleType = (typeof NAMED_STYLE_TYPES)[number];

export type Alignment = "START" | "CENTER" | "END" | "JUSTIFIED";

export interface TextStyleOptions {
	bold?: boolean;
	italic?: boolean;
	underline?: boolean;
	strikethrough?: boolean;
	/** Points. */
	fontSize?: number;
	fontFamily?: string;
	/** Hex colour, with or without the leading `#`. */
	foregroundColor?: string;
	backgroundColor?: string;
	linkUrl?: string;
}

export interface ParagraphStyleOptions {
	namedStyle?: NamedStyleType;
	alignment?: Alignment;
	spaceAbovePt?: number;
	spaceBelowPt?: number;
	indentFirstLinePt?: number;
}

export type ShareRole = "reader" | "writer" | "commenter";

export type RenderFormat = "markdown" | "text" | "raw";
