import path from "path";
import yaml from "js-yaml";
import { FileManager } from "../utils/file-manager.js";
import ErrorHelper from "../utils/error-helper.js";
import InputValidator from "../utils/input-validator.js";

/** language → exact source string → exact translation */
export type TranslationTableData = Record<string, Record<string, string>>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Curated translations, per language, keyed by the decoded msgid.
 * Lookups are exact: no trimming, case folding or placeholder normalisation.
 */
export class TranslationTable {
	private readonly byLanguage: Map<string, Map<string, string>>;

	constructor(data: TranslationTableData | Map<string, Map<string, string>> = {}) {
		this.byLanguage =
			data instanceof Map
				? data
				: new Map(
						Object.entries(data).map(([language, strings]): [string, Map<string, string>] => [
							language,
							new Map(Object.entries(strings)),
						])
					);
	}

	/**
	 * Build a table from untrusted data (a parsed JSON or YAML document).
	 * @param source - Name used in error messages
	 */
	static fromObject(data: unknown, source = "<inline>"): TranslationTable {
		const invalid = (reason: string) =>
			ErrorHelper.createError("TABLE_INVALID", { filePath: source, reason });

		if (!isPlainObject(data)) {
			throw invalid("top level must be a mapping of language code to translations");
		}

		const table = new Map<string, Map<string, string>>();
		for (const [language, strings] of Object.entries(data)) {
			try {
				InputValidator.validateLanguageCode(language, "language");
			} catch (error) {
				throw invalid(ErrorHelper.messageOf(error));
			}

			if (!isPlainObject(strings)) {
				throw invalid(`section '${language}' must map source strings to translations`);
			}

			const section = new Map<string, string>();
			for (const [msgid, translation] of Object.entries(strings)) {
				if (msgid === "") {
					throw invalid(`section '${language}' has an empty source string`);
				}
				if (typeof translation !== "string") {
					throw invalid(`translation of '${msgid}' in '${language}' is not a string`);
				}
				section.set(msgid, translation);
			}
			table.set(language, section);
		}

		return new TranslationTable(table);
	}

	languages(): string[] {
		return [...this.byLanguage.keys()];
	}

	hasLanguage(language: string): boolean {
		return this.byLanguage.has(language);
	}

	lookup(language: string, msgid: string): string | undefined {
		return this.byLanguage.get(language)?.get(msgid);
	}

	size(language: string): number {
		return this.byLanguage.get(language)?.size ?? 0;
	}
}

function parseTableContent(content: string, filePath: string): unknown {
	const ext = path.extname(filePath).toLowerCase();
	if (ext === ".yaml" || ext === ".yml") {
		return yaml.load(content, { filename: filePath });
	}
	return JSON.parse(content);
}

/**
 * Load the translation table from a JSON or YAML file.
 */
export async function loadTranslationTable(filePath: string): Promise<TranslationTable> {
	if (!(await FileManager.exists(filePath))) {
		throw ErrorHelper.createError("TABLE_NOT_FOUND", { filePath });
	}

	const content = await FileManager.readText(filePath);

	let data: unknown;
	try {
		data = parseTableContent(content, filePath);
	} catch (error) {
		throw ErrorHelper.createError("TABLE_INVALID", {
			filePath,
			reason: ErrorHelper.messageOf(error),
		});
	}

	return TranslationTable.fromObject(data, filePath);
}
