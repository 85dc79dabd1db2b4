import { loadConfig as c12LoadConfig } from "c12";
import type { LoggerConfig } from "../utils/logger.js";
import type { FileOptions } from "../utils/file-manager.js";

export interface FillConfig {
	/**
	 * Directory holding one catalog per language
	 * @default "./po"
	 */
	catalogDir?: string;

	/**
	 * Catalog file extension; catalogs are named `<language><extension>`
	 * @default ".po"
	 */
	extension?: string;

	/**
	 * Languages to fill. When empty, every language of the translation table is filled.
	 */
	languages?: string[];

	/**
	 * JSON or YAML file mapping language → source string → translation
	 * @default "./translations.json"
	 */
	translationsFile?: string;

	/**
	 * Report what would be filled without writing any catalog
	 * @default false
	 */
	dryRun?: boolean;

	/**
	 * Re-read every rebuilt catalog with gettext-parser before writing it
	 * @default true
	 */
	verifyOutput?: boolean;

	fileOperations?: Pick<FileOptions, "atomic" | "backupFiles" | "backupDir">;

	logging?: LoggerConfig;

	/**
	 * Enable debug mode with verbose logging
	 * @default false
	 */
	debug?: boolean;
	verbose?: boolean;
}

/**
 * Type-safe configuration helper
 */
export function defineConfig(config: FillConfig): FillConfig {
	return config;
}

export const DEFAULT_CONFIG = {
	catalogDir: "./po",
	extension: ".po",
	languages: [],
	translationsFile: "./translations.json",
	dryRun: false,
	verifyOutput: true,
	fileOperations: {
		atomic: true,
		backupFiles: false,
		backupDir: "./backups",
	},
	logging: {
		verbose: false,
		diagnosticsLevel: "minimal",
		saveErrorLogs: false,
		logDirectory: "./logs",
	},
} satisfies FillConfig;

/**
 * Load configuration using c12
 */
export async function loadConfig(cwd: string = process.cwd()) {
	const { config, configFile, layers } = await c12LoadConfig<FillConfig>({
		name: "pofill",
		configFile: "pofill.config",
		rcFile: ".pofillrc",
		dotenv: true,
		cwd,
		defaults: DEFAULT_CONFIG,
	});

	return {
		config: config || {},
		configFile,
		layers,
	};
}
