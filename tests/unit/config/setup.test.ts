import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { configureComponents, loadEnvironmentVariables } from "../../../src/config/setup.js";
import { FileManager } from "../../../src/utils/file-manager.js";
import { getLogger } from "../../../src/utils/logger.js";

describe("setup", () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = { ...originalEnv };
		delete process.env.POFILL_TEST_VALUE;
		delete process.env.DEBUG;
		delete process.env.VERBOSE;
	});

	afterEach(() => {
		process.env = originalEnv;
		vi.restoreAllMocks();
		FileManager.configure({});
	});

	describe("loadEnvironmentVariables", () => {
		let dir: string;

		beforeEach(async () => {
			dir = await fs.mkdtemp(path.join(os.tmpdir(), "pofill-env-"));
		});

		afterEach(async () => {
			await fs.rm(dir, { recursive: true, force: true });
		});

		it("should let .env.local override .env", async () => {
			await fs.writeFile(path.join(dir, ".env"), "POFILL_TEST_VALUE=base\n");
			await fs.writeFile(path.join(dir, ".env.local"), "POFILL_TEST_VALUE=local\n");

			expect(await loadEnvironmentVariables(dir)).toBe(2);
			expect(process.env.POFILL_TEST_VALUE).toBe("local");
		});

		it("should load nothing when no files exist", async () => {
			expect(await loadEnvironmentVariables(dir)).toBe(0);
			expect(process.env.POFILL_TEST_VALUE).toBeUndefined();
		});
	});

	describe("configureComponents", () => {
		it("should configure file operations and the logger", () => {
			configureComponents({
				fileOperations: { atomic: false, backupFiles: true, backupDir: "./old" },
				logging: { diagnosticsLevel: "detailed" },
				verbose: true,
			});

			expect(FileManager.getConfig()).toMatchObject({
				atomic: false,
				backupFiles: true,
				backupDir: "./old",
			});
			expect(getLogger().config).toMatchObject({ verbose: true, diagnosticsLevel: "detailed" });
			expect(process.env.VERBOSE).toBe("true");
			expect(process.env.DEBUG).toBeUndefined();
		});

		it("should set the debug flag", () => {
			configureComponents({ debug: true });

			expect(process.env.DEBUG).toBe("true");
		});
	});
});
