import CatalogFillService from "../services/fill-service.js";
import type { TranslationTable } from "../services/translation-table.js";
import type {
	FillOptions,
	FillReport,
	LanguageResult,
	LanguageStatusReport,
} from "../types/index.js";

/**
 * Fill every configured catalog from the translation table.
 */
async function fillCatalogs(table: TranslationTable, options: FillOptions): Promise<FillReport> {
	return await new CatalogFillService(table).fillAll(options);
}

/**
 * Inspect every configured catalog without writing.
 */
async function inspectCatalogs(
	table: TranslationTable,
	options: FillOptions
): Promise<LanguageStatusReport[]> {
	return await new CatalogFillService(table).statusAll(options);
}

function formatLanguageLine(result: LanguageResult): string {
	switch (result.status) {
		case "missing-file":
			return `  SKIP: ${result.filePath} not found`;
		case "unknown-language":
			return `  SKIP: No translations defined for '${result.language}'`;
		case "failed":
			return `  FAIL: ${result.language}: ${result.error?.message ?? "unknown error"}`;
		default:
			return `  ${result.language}: filled ${result.filled} translations`;
	}
}

/**
 * Render a fill report the way it is printed at the end of a run.
 */
function formatReport(report: FillReport): string {
	const lines = report.languages.map(formatLanguageLine);

	lines.push(
		"",
		`Total: ${report.totalFilled} translations filled across ${report.languageCount} languages`
	);

	if (report.dryRun) {
		lines.push("Dry run: no catalogs were written");
	}
	if (report.failed > 0) {
		lines.push(`${report.failed} language(s) failed`);
	}

	return lines.join("\n");
}

/**
 * One line per language: entry counts, or why the catalog could not be inspected.
 */
function formatStatus(reports: LanguageStatusReport[]): string {
	return reports
		.map((report) => {
			if (!report.found) return `  ${report.language}: ${report.filePath} not found`;
			if (report.error) return `  ${report.language}: ${report.error}`;
			if (!report.status) return `  ${report.language}: no data`;

			const { entries, translated, untranslated, plural, fillable } = report.status;
			const table = report.knownLanguage ? "" : " (not in translation table)";
			return `  ${report.language}: ${entries} entries, ${translated} translated, ${untranslated} untranslated, ${plural} plural, ${fillable} fillable${table}`;
		})
		.join("\n");
}

export { fillCatalogs, inspectCatalogs, formatReport, formatStatus };
