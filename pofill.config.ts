/**
 * po-backfill configuration
 * Catalogs live in ./po as <language>.po; translations come from ./po/translations.yaml.
 */

import { defineConfig } from "./src/config/index.js";

export default defineConfig({
	catalogDir: "./po",
	extension: ".po",
	translationsFile: "./po/translations.yaml",

	// Leave empty to fill every language of the translation table
	languages: ["de", "fr"],

	verifyOutput: true,
	dryRun: false,

	fileOperations: {
		atomic: true,
		backupFiles: false,
		backupDir: "./backups",
	},

	logging: {
		verbose: false,
		diagnosticsLevel: "minimal",
		outputFormat: "pretty",
		saveErrorLogs: false,
		logDirectory: "./logs",
	},
});
