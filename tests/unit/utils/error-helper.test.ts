import { describe, it, expect } from "vitest";
import ErrorHelper, { FillError } from "../../../src/utils/error-helper.js";

describe("ErrorHelper", () => {
	describe("createError", () => {
		it("should create a basic error", () => {
			const error = ErrorHelper.createError("CATALOG_NOT_FOUND", {
				filePath: "po/fr.po",
				language: "fr",
			});
			expect(error).toBeInstanceOf(Error);
			expect(error).toBeInstanceOf(FillError);
			expect(error.code).toBe(ErrorHelper.ErrorCodes.CATALOG_NOT_FOUND);
			expect(error.message).toBe("Catalog not found: po/fr.po");
			expect(error.details).toEqual({ filePath: "po/fr.po", language: "fr" });
		});

		it("should fallback for unknown error type", () => {
			const error = ErrorHelper.createError("UNKNOWN_TYPE", {
				message: "Something happened",
			});
			expect(error.code).toBe("ERR_UNKNOWN");
			expect(error.message).toBe("Something happened");
		});
	});

	describe("formatError", () => {
		it("should format error with context and solutions", () => {
			const error = ErrorHelper.unknownLanguage("uk");

			expect(ErrorHelper.formatError(error)).toBe(
				[
					"[ERR_UNKNOWN_LANGUAGE] UNKNOWN_LANGUAGE",
					"",
					"Problem:",
					"  No translations defined for 'uk'",
					"",
					"Why This Happened:",
					"  - The translation table has no section for this language",
					"",
					"How to Fix:",
					"  1. Add the language to the translation table",
					"  2. Remove the language from `languages` in pofill.config",
				].join("\n")
			);
		});

		it("should include debug info when requested", () => {
			const error = ErrorHelper.catalogNotFound("po/fr.po", "fr");
			const formatted = ErrorHelper.formatError(error, { showDebug: true });

			expect(formatted).toContain("Debug Info:\n  filePath: po/fr.po\n  language: fr");
		});

		it("should format plain errors on one line", () => {
			expect(ErrorHelper.formatError(new Error("boom"))).toBe("Error: boom");
			expect(ErrorHelper.formatError("text")).toBe("Error: text");
		});
	});

	describe("Specialized creators", () => {
		it("should carry the errno of I/O failures", () => {
			const cause = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
			const error = ErrorHelper.ioError("write", "po/de.po", cause);

			expect(error.code).toBe("ERR_CATALOG_WRITE_FAILED");
			expect(error.message).toBe(
				"Failed to write catalog po/de.po: EACCES: permission denied"
			);
			expect(error.details.errno).toBe("EACCES");
		});

		it("should list every configuration problem", () => {
			const error = ErrorHelper.configValidationError(["catalogDir bad", "extension bad"]);

			expect(error.message).toBe(
				"Configuration validation failed:\n  - catalogDir bad\n  - extension bad"
			);
		});
	});

	describe("errnoOf", () => {
		it("should return string codes only", () => {
			expect(ErrorHelper.errnoOf({ code: "ENOENT" })).toBe("ENOENT");
			expect(ErrorHelper.errnoOf({ code: 2 })).toBeUndefined();
			expect(ErrorHelper.errnoOf(null)).toBeUndefined();
		});
	});
});
