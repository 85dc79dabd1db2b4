#!/usr/bin/env node
import { createRequire } from "module";
import { program } from "commander";
import ErrorHelper from "./utils/error-helper.js";
import { loadConfig, type FillConfig } from "./config/index.js";
import { loadEnvironmentVariables, configureComponents } from "./config/setup.js";
import { runCommand, validateConfiguration, type CliOptions, type CommandName } from "./cli/helpers.js";

// Use createRequire to load package.json in ESM context
const require = createRequire(import.meta.url);
const { version }: { version: string } = require("../package.json");

const reportError = (error: unknown): void => {
	if (ErrorHelper.isFillError(error)) {
		console.error(
			ErrorHelper.formatError(error, {
				showDebug: process.env.DEBUG === "true",
				showSolutions: true,
				showContext: true,
			})
		);
		return;
	}

	console.error(`\nError: ${ErrorHelper.messageOf(error)}`);
	if (error instanceof Error && error.stack && process.env.DEBUG) {
		console.error(error.stack);
	}
};

const main = async () => {
	await loadEnvironmentVariables();

	const loaded = await loadConfig();
	const defaultConfig: FillConfig = loaded.config;
	configureComponents(defaultConfig);

	const run = async (options: CliOptions, commandName: CommandName) => {
		const globalOpts = program.opts();
		try {
			process.exitCode = await runCommand(
				defaultConfig,
				{ debug: globalOpts.debug === true, verbose: globalOpts.verbose === true, ...options },
				commandName
			);
		} catch (error) {
			reportError(error);
			process.exitCode = 1;
		}
	};

	program
		.name("pofill")
		.description("Fill empty msgstr entries of gettext catalogs from a curated translation table")
		.version(version);

	program
		.option("--debug", "Enable debug mode with verbose logging", false)
		.option("--verbose", "Enable detailed diagnostic output", false);

	program.on("option:debug", function () {
		process.env.DEBUG = "true";
		console.log("Debug mode: ENABLED (verbose logging)");
	});

	program.on("option:verbose", function () {
		process.env.VERBOSE = "true";
		console.log("Verbose mode: ENABLED (detailed diagnostics)");
	});

	const withCatalogOptions = (name: string, description: string, isDefault = false) =>
		program
			.command(name, { isDefault })
			.description(description)
			.option("-d, --dir <dir>", "Catalog directory", defaultConfig.catalogDir)
			.option(
				"-l, --languages <langs>",
				"Languages to process (comma separated)",
				(val: string) => val.split(",")
			)
			.option("-t, --translations <file>", "Translation table (JSON or YAML)")
			.option("-e, --extension <ext>", "Catalog file extension", defaultConfig.extension);

	withCatalogOptions("fill", "Fill empty translations (default command)", true)
		.option("--dry-run", "Report what would be filled without writing", false)
		.option("--no-verify", "Skip re-reading rebuilt catalogs with gettext-parser")
		.option("--backup", "Keep a backup of every catalog before rewriting it", false)
		.action(async (options: CliOptions) => {
			await run(options, "fill");
		});

	withCatalogOptions("status", "Show per-language counts without writing").action(
		async (options: CliOptions) => {
			await run(options, "status");
		}
	);

	program
		.command("validate-config")
		.description("Validate configuration and translation table without filling")
		.action(async () => {
			console.log("Validating configuration...\n");
			try {
				const summary = await validateConfiguration(defaultConfig);
				console.log("Configuration is valid!\n");
				console.log(summary.join("\n"));
				console.log("\nRun 'pofill fill --dry-run' to preview the fill\n");
			} catch (error) {
				console.error("\nConfiguration Validation Failed:\n");
				reportError(error);
				console.error("\nFix the errors above and try again\n");
				process.exitCode = 1;
			}
		});

	await program.parseAsync(process.argv);
};

main().catch((err) => {
	console.error(err);
	process.exit(1);
});
