import dotenv from "dotenv";
import { promises as fs } from "fs";
import path from "path";
import { FileManager } from "../utils/file-manager.js";
import { getLogger } from "../utils/logger.js";
import ErrorHelper from "../utils/error-helper.js";
import type { FillConfig } from "./index.js";

/**
 * Load environment variables from .env files.
 * Prioritizes .env.local over .env.
 */
export const loadEnvironmentVariables = async (cwd: string = process.cwd()): Promise<number> => {
	// .env first (base defaults), then .env.local with override so local values win
	const envFiles = [
		{ file: ".env", override: false },
		{ file: ".env.local", override: true },
	];
	let loadedCount = 0;

	for (const { file: envFile, override } of envFiles) {
		const envPath = path.resolve(cwd, envFile);
		try {
			await fs.access(envPath);
		} catch (error) {
			// ENOENT is expected when files don't exist
			if (ErrorHelper.errnoOf(error) !== "ENOENT") {
				console.warn(`Warning: Could not load ${envFile}: ${ErrorHelper.messageOf(error)}`);
			}
			continue;
		}

		const result = dotenv.config({ path: envPath, override });
		if (result.error) {
			console.warn(`Warning: Could not load ${envFile}: ${result.error.message}`);
			continue;
		}

		loadedCount++;
		if (process.env.VERBOSE || process.env.DEBUG) {
			console.log(`Loaded environment variables from ${envFile}`);
		}
	}

	return loadedCount;
};

/**
 * Configure global components (file operations, logger, debug flags).
 */
export const configureComponents = (config: FillConfig): void => {
	if (config.fileOperations) {
		FileManager.configure(config.fileOperations);
	}

	if (config.logging || config.verbose) {
		getLogger({
			...config.logging,
			verbose: config.logging?.verbose || config.verbose || false,
		});
	}

	if (config.debug) {
		process.env.DEBUG = "true";
	}

	if (config.logging?.verbose || config.verbose) {
		process.env.VERBOSE = "true";
	}
};
