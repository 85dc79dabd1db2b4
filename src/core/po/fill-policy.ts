import type { Catalog, CatalogEntry, CatalogStatus, FillOutcome } from "../../types/index.js";
import type { TranslationTable } from "../../services/translation-table.js";
import { decodeField, encodeField, fieldKeyword } from "./codec.js";

/**
 * Plural entries carry a `msgid_plural` field and indexed `msgstr[n]` lines.
 */
export function isPluralEntry(entry: CatalogEntry): boolean {
	return (
		entry.msgidLines.some((line) => fieldKeyword(line) === "msgid_plural") ||
		entry.msgstrLines.some((line) => fieldKeyword(line)?.startsWith("msgstr[") ?? false)
	);
}

/**
 * Fills empty translations from the table and nothing else:
 * an existing translation is never overwritten, plural entries are never touched.
 */
export class FillPolicy {
	constructor(private readonly table: TranslationTable) {}

	/**
	 * Fill one entry in place.
	 * @returns true when the entry's msgstr was replaced
	 */
	apply(entry: CatalogEntry, language: string): boolean {
		if (isPluralEntry(entry)) return false;

		const msgid = decodeField(entry.msgidLines);
		const msgstr = decodeField(entry.msgstrLines);
		if (msgstr !== "") return false;

		const translation = this.table.lookup(language, msgid);
		if (translation === undefined) return false;

		entry.msgstrLines = encodeField("msgstr", translation);
		return true;
	}

	applyAll(catalog: Catalog, language: string): FillOutcome {
		const outcome: FillOutcome = { filled: 0, filledIds: [], fills: new Map() };

		for (const entry of catalog.entries) {
			if (!this.apply(entry, language)) continue;

			const msgid = decodeField(entry.msgidLines);
			outcome.filled++;
			outcome.filledIds.push(msgid);
			outcome.fills.set(msgid, decodeField(entry.msgstrLines));
		}

		return outcome;
	}

	/**
	 * Count what a fill would do, without touching the catalog.
	 * The header (empty msgid) is not counted as a translatable entry.
	 */
	inspect(catalog: Catalog, language: string): CatalogStatus {
		const status: CatalogStatus = {
			entries: 0,
			translated: 0,
			untranslated: 0,
			plural: 0,
			fillable: 0,
		};

		for (const entry of catalog.entries) {
			const msgid = decodeField(entry.msgidLines);
			if (msgid === "") continue;

			status.entries++;
			if (isPluralEntry(entry)) {
				status.plural++;
				continue;
			}

			if (decodeField(entry.msgstrLines) !== "") {
				status.translated++;
				continue;
			}

			status.untranslated++;
			if (this.table.lookup(language, msgid) !== undefined) {
				status.fillable++;
			}
		}

		return status;
	}
}
