import path from "path";
import ErrorHelper from "./error-helper.js";
import type { FillConfig } from "../config/index.js";

/**
 * Validation of user-supplied values before any catalog is touched.
 */
class InputValidator {
	/** gettext locale names: `uk`, `pt_BR`, `zh-Hans`, `sr@latin` */
	static readonly LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(?:[_-][A-Za-z0-9]{2,8})*(?:@[a-z]+)?$/;

	static readonly EXTENSION_PATTERN = /^\.[A-Za-z0-9]+$/;

	static validateLanguageCode(code: unknown, fieldName = "language"): string {
		if (typeof code !== "string" || code.trim() === "") {
			throw ErrorHelper.createError("INVALID_INPUT", {
				field: fieldName,
				reason: "must be a non-empty string",
			});
		}

		const trimmed = code.trim();
		if (!this.LANGUAGE_CODE_PATTERN.test(trimmed)) {
			throw ErrorHelper.createError("INVALID_INPUT", {
				field: fieldName,
				reason: `is not a valid language code: '${trimmed}' (expected e.g. 'de', 'pt_BR', 'sr@latin')`,
			});
		}

		return trimmed;
	}

	static validateLanguageCodes(codes: unknown, fieldName = "languages"): string[] {
		if (!Array.isArray(codes)) {
			throw ErrorHelper.createError("INVALID_INPUT", {
				field: fieldName,
				reason: "must be a list of language codes",
			});
		}

		const validated = codes.map((code) => this.validateLanguageCode(code, fieldName));
		return [...new Set(validated)];
	}

	static validatePath(value: unknown, fieldName = "path"): string {
		if (typeof value !== "string" || value.trim() === "") {
			throw ErrorHelper.createError("INVALID_INPUT", {
				field: fieldName,
				reason: "must be a non-empty string",
			});
		}

		if (value.includes("\0")) {
			throw ErrorHelper.createError("INVALID_INPUT", {
				field: fieldName,
				reason: "contains a null byte",
			});
		}

		return path.normalize(value.trim());
	}

	static validateExtension(extension: unknown, fieldName = "extension"): string {
		if (typeof extension !== "string" || !this.EXTENSION_PATTERN.test(extension)) {
			throw ErrorHelper.createError("INVALID_INPUT", {
				field: fieldName,
				reason: "must start with a dot followed by letters or digits, e.g. '.po'",
			});
		}
		return extension;
	}

	/**
	 * Validate a whole configuration, collecting every problem before throwing.
	 */
	static validateConfig(config: FillConfig): void {
		const errors: string[] = [];
		const collect = (check: () => unknown) => {
			try {
				check();
			} catch (error) {
				errors.push(ErrorHelper.messageOf(error));
			}
		};

		collect(() => this.validatePath(config.catalogDir, "catalogDir"));
		collect(() => this.validateExtension(config.extension, "extension"));
		collect(() => this.validatePath(config.translationsFile, "translationsFile"));
		if (config.languages !== undefined) {
			collect(() => this.validateLanguageCodes(config.languages, "languages"));
		}
		if (config.fileOperations?.backupFiles) {
			collect(() =>
				this.validatePath(config.fileOperations?.backupDir, "fileOperations.backupDir")
			);
		}

		if (errors.length > 0) {
			throw ErrorHelper.configValidationError(errors);
		}
	}
}

export default InputValidator;
