/**
 * One record of a gettext catalog, kept as the raw lines it was read from.
 */
export interface CatalogEntry {
	/** Comment lines verbatim. An empty string stands for one blank line inside the block. */
	comments: string[];
	/** `msgctxt` field lines; empty when the entry has no context */
	contextLines: string[];
	/** `msgid` field lines, followed by the `msgid_plural` field for plural entries */
	msgidLines: string[];
	/** `msgstr` or `msgstr[n]` field lines */
	msgstrLines: string[];
}

export type LineEnding = "\n" | "\r\n";

export interface Catalog {
	entries: CatalogEntry[];
	/** Comment lines after the last entry that belong to no entry (obsolete `#~` blocks) */
	trailing: string[];
	eol: LineEnding;
	bom: boolean;
	/** 1-based numbers of lines that could not be attached to any entry */
	ignoredLines: number[];
	/** 1-based numbers of comment lines found inside a msgctxt or msgid field */
	movedComments: number[];
}

export interface FillOutcome {
	filled: number;
	/** Decoded msgids that were filled, in catalog order */
	filledIds: string[];
	/** Decoded translations written, keyed by msgid */
	fills: Map<string, string>;
}

export interface CatalogStatus {
	entries: number;
	translated: number;
	untranslated: number;
	plural: number;
	fillable: number;
}

export type LanguageStatus = "filled" | "unchanged" | "missing-file" | "unknown-language" | "failed";

export interface LanguageResult {
	language: string;
	filePath: string;
	status: LanguageStatus;
	filled: number;
	/** Untranslated entries left after the fill */
	untranslated: number;
	written: boolean;
	ignoredLines: number[];
	error?: {
		code: string;
		message: string;
	};
	timeMs: number;
}

export interface FillReport {
	languages: LanguageResult[];
	totalFilled: number;
	languageCount: number;
	failed: number;
	skipped: number;
	dryRun: boolean;
	startTime: string;
	endTime?: string;
	totalDuration?: number;
}

export interface LanguageStatusReport {
	language: string;
	filePath: string;
	found: boolean;
	knownLanguage: boolean;
	status: CatalogStatus | null;
	error?: string;
}

export interface FillOptions {
	/** Directory holding `<language><extension>` catalogs */
	catalogDir: string;
	extension: string;
	languages: string[];
	dryRun?: boolean;
	verifyOutput?: boolean;
}
