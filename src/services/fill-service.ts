import { FileManager } from "../utils/file-manager.js";
import ErrorHelper from "../utils/error-helper.js";
import { getLogger } from "../utils/logger.js";
import { StatisticsManager } from "../utils/statistics-manager.js";
import { parseCatalog } from "../core/po/parser.js";
import { rebuildCatalog } from "../core/po/rebuilder.js";
import { FillPolicy } from "../core/po/fill-policy.js";
import { verifyCatalogOutput } from "../core/po/verifier.js";
import type { TranslationTable } from "./translation-table.js";
import type {
	Catalog,
	CatalogStatus,
	FillOptions,
	FillOutcome,
	FillReport,
	LanguageResult,
	LanguageStatusReport,
} from "../types/index.js";

export interface TextFillResult {
	catalog: Catalog;
	outcome: FillOutcome;
	/** Rebuilt text, or the original text untouched when nothing was filled */
	content: string;
	/** Counts after the fill */
	remaining: CatalogStatus;
}

/**
 * Fills catalogs one language at a time.
 * Each catalog is read, filled, verified and written before the next one is opened.
 */
export class CatalogFillService {
	private readonly policy: FillPolicy;

	constructor(private readonly table: TranslationTable) {
		this.policy = new FillPolicy(table);
	}

	/**
	 * Fill catalog text in memory.
	 */
	fillText(text: string, language: string): TextFillResult {
		const catalog = parseCatalog(text);
		const outcome = this.policy.applyAll(catalog, language);
		const content = outcome.filled > 0 ? rebuildCatalog(catalog) : text;

		return {
			catalog,
			outcome,
			content,
			remaining: this.policy.inspect(catalog, language),
		};
	}

	/**
	 * Configured languages, or every language of the table when none are configured.
	 */
	resolveLanguages(languages: string[]): string[] {
		return languages.length > 0 ? languages : this.table.languages();
	}

	/**
	 * Fill the catalog of one language.
	 * Missing catalogs and unknown languages are skipped; read, write and verification
	 * failures are reported in the result instead of being thrown.
	 */
	async fillLanguage(language: string, options: FillOptions): Promise<LanguageResult> {
		const logger = getLogger();
		const started = Date.now();
		const filePath = FileManager.catalogPath(options.catalogDir, language, options.extension);
		const result: LanguageResult = {
			language,
			filePath,
			status: "unchanged",
			filled: 0,
			untranslated: 0,
			written: false,
			ignoredLines: [],
			timeMs: 0,
		};
		const finish = (): LanguageResult => {
			result.timeMs = Date.now() - started;
			return result;
		};

		if (!(await FileManager.exists(filePath))) {
			const error = ErrorHelper.catalogNotFound(filePath, language);
			result.status = "missing-file";
			result.error = { code: error.code, message: error.message };
			await logger.debug(error.message);
			return finish();
		}

		if (!this.table.hasLanguage(language)) {
			const error = ErrorHelper.unknownLanguage(language);
			result.status = "unknown-language";
			result.error = { code: error.code, message: error.message };
			await logger.debug(error.message);
			return finish();
		}

		try {
			const text = await FileManager.readText(filePath);
			const { catalog, outcome, content, remaining } = this.fillText(text, language);

			result.ignoredLines = catalog.ignoredLines;
			result.untranslated = remaining.untranslated;

			if (catalog.ignoredLines.length > 0) {
				await logger.warn(
					`${filePath}: ${catalog.ignoredLines.length} line(s) belong to no entry`,
					{ lines: catalog.ignoredLines }
				);
			}

			if (outcome.filled === 0) {
				return finish();
			}

			if (options.verifyOutput !== false) {
				const verification = verifyCatalogOutput(content, outcome.fills);
				if (!verification.valid) {
					throw ErrorHelper.createError("OUTPUT_VERIFICATION_FAILED", {
						filePath,
						problems: verification.problems.join("; "),
					});
				}
			}

			if (catalog.movedComments.length > 0) {
				await logger.warn(
					`${filePath}: ${catalog.movedComments.length} comment line(s) inside an entry are written above it`,
					{ lines: catalog.movedComments }
				);
			}

			if (!options.dryRun) {
				await FileManager.writeText(filePath, content);
				result.written = true;
				await logger.info(`${filePath}: wrote ${outcome.filled} translation(s)`);
			}

			result.status = "filled";
			result.filled = outcome.filled;
			await logger.debug(`${language}: filled ${outcome.filledIds.join(", ")}`);
		} catch (error) {
			if (!ErrorHelper.isFillError(error)) throw error;

			result.status = "failed";
			result.filled = 0;
			result.written = false;
			result.error = { code: error.code, message: error.message };
			await logger.error(error.message, { language, code: error.code });
		}

		return finish();
	}

	/**
	 * Fill every configured language in order and collect the run report.
	 */
	async fillAll(options: FillOptions): Promise<FillReport> {
		const statistics = new StatisticsManager();
		statistics.reset(options.dryRun === true);

		for (const language of this.resolveLanguages(options.languages)) {
			statistics.record(await this.fillLanguage(language, options));
		}

		return statistics.finish();
	}

	/**
	 * Report per-language counts without writing anything.
	 */
	async statusAll(options: FillOptions): Promise<LanguageStatusReport[]> {
		const reports: LanguageStatusReport[] = [];

		for (const language of this.resolveLanguages(options.languages)) {
			const filePath = FileManager.catalogPath(options.catalogDir, language, options.extension);
			const report: LanguageStatusReport = {
				language,
				filePath,
				found: await FileManager.exists(filePath),
				knownLanguage: this.table.hasLanguage(language),
				status: null,
			};

			if (report.found) {
				try {
					const catalog = parseCatalog(await FileManager.readText(filePath));
					report.status = this.policy.inspect(catalog, language);
				} catch (error) {
					if (!ErrorHelper.isFillError(error)) throw error;
					report.error = error.message;
				}
			}

			reports.push(report);
		}

		return reports;
	}
}

export default CatalogFillService;
