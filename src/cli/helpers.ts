import path from "path";
import { fillCatalogs, formatReport, formatStatus, inspectCatalogs } from "../commands/filler.js";
import { loadTranslationTable } from "../services/translation-table.js";
import InputValidator from "../utils/input-validator.js";
import { configureComponents } from "../config/setup.js";
import { DEFAULT_CONFIG, type FillConfig } from "../config/index.js";
import type { FillOptions } from "../types/index.js";

export type CommandName = "fill" | "status";

/**
 * Options as commander hands them over, global flags included.
 */
export interface CliOptions {
	dir?: string;
	extension?: string;
	languages?: string[];
	translations?: string;
	dryRun?: boolean;
	/** `--no-verify` sets this to false; commander defaults it to true */
	verify?: boolean;
	backup?: boolean;
	debug?: boolean;
	verbose?: boolean;
}

export interface RunConfig extends FillConfig {
	catalogDir: string;
	extension: string;
	languages: string[];
	translationsFile: string;
	dryRun: boolean;
	verifyOutput: boolean;
}

/**
 * Merge command-line options over the loaded configuration.
 * Only options the user actually passed override configured values.
 */
export const buildRunConfig = (config: FillConfig, options: CliOptions): RunConfig => {
	const languages =
		options.languages !== undefined
			? InputValidator.validateLanguageCodes(options.languages, "--languages")
			: config.languages ?? DEFAULT_CONFIG.languages;

	return {
		...config,
		catalogDir: options.dir ?? config.catalogDir ?? DEFAULT_CONFIG.catalogDir,
		extension: options.extension ?? config.extension ?? DEFAULT_CONFIG.extension,
		languages,
		translationsFile:
			options.translations ?? config.translationsFile ?? DEFAULT_CONFIG.translationsFile,
		dryRun: options.dryRun === true || config.dryRun === true,
		verifyOutput: options.verify === false ? false : config.verifyOutput !== false,
		fileOperations: {
			...DEFAULT_CONFIG.fileOperations,
			...config.fileOperations,
			...(options.backup ? { backupFiles: true } : {}),
		},
		debug: options.debug === true || config.debug === true,
		verbose: options.verbose === true || config.verbose === true,
	};
};

/**
 * Service options with directories resolved against the working directory.
 */
export const toFillOptions = (config: RunConfig, cwd: string = process.cwd()): FillOptions => ({
	catalogDir: path.resolve(cwd, config.catalogDir),
	extension: config.extension,
	languages: config.languages,
	dryRun: config.dryRun,
	verifyOutput: config.verifyOutput,
});

/**
 * Validate, configure and run one command.
 * Configuration and table errors are thrown before any catalog is touched;
 * per-language failures only change the exit code.
 * @returns process exit code
 */
export const runCommand = async (
	config: FillConfig,
	options: CliOptions,
	commandName: CommandName,
	cwd: string = process.cwd()
): Promise<number> => {
	const runConfig = buildRunConfig(config, options);
	InputValidator.validateConfig(runConfig);
	configureComponents(runConfig);

	if (runConfig.debug) {
		console.log("CLI Command:", commandName);
		console.log("Configuration:", JSON.stringify(runConfig, null, 2));
	}

	const table = await loadTranslationTable(path.resolve(cwd, runConfig.translationsFile));
	const fillOptions = toFillOptions(runConfig, cwd);

	if (commandName === "status") {
		console.log(`Catalog status in ${fillOptions.catalogDir}:`);
		console.log(formatStatus(await inspectCatalogs(table, fillOptions)));
		return 0;
	}

	console.log(`Filling catalogs in ${fillOptions.catalogDir}`);
	if (runConfig.dryRun) {
		console.log("Dry run: catalogs will not be written");
	}

	const report = await fillCatalogs(table, fillOptions);
	console.log(formatReport(report));

	return report.failed > 0 ? 1 : 0;
};

/**
 * Validate a configuration and load its translation table.
 * @returns summary lines for the terminal
 */
export const validateConfiguration = async (
	config: FillConfig,
	cwd: string = process.cwd()
): Promise<string[]> => {
	const runConfig = buildRunConfig(config, {});
	InputValidator.validateConfig(runConfig);

	const table = await loadTranslationTable(path.resolve(cwd, runConfig.translationsFile));
	const languages = runConfig.languages.length > 0 ? runConfig.languages : table.languages();
	const missing = languages.filter((language) => !table.hasLanguage(language));
	const strings = table.languages().reduce((total, language) => total + table.size(language), 0);

	const summary = [
		"Configuration Summary:",
		`   Catalogs: ${runConfig.catalogDir}/<language>${runConfig.extension}`,
		`   Translation table: ${runConfig.translationsFile} (${table.languages().length} languages, ${strings} strings)`,
		`   Languages: ${languages.length} (${languages.slice(0, 5).join(", ")}${languages.length > 5 ? "..." : ""})`,
		`   Output verification: ${runConfig.verifyOutput ? "Enabled" : "Disabled"}`,
		`   Atomic writes: ${runConfig.fileOperations?.atomic === false ? "Disabled" : "Enabled"}`,
	];

	if (missing.length > 0) {
		summary.push(`   Warning: no translations for ${missing.join(", ")}`);
	}

	return summary;
};
