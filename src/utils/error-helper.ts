/**
 * Error catalogue for catalog filling.
 * Every error carries a stable code, the details it was created with, and
 * the reasons/solutions shown to the user when it is formatted.
 */

export type ErrorDetails = Record<string, unknown>;

interface ErrorDefinition {
	code: string;
	message: (details: ErrorDetails) => string;
	reasons: string[];
	solutions: string[];
}

const text = (value: unknown, fallback = "unknown"): string =>
	value === undefined || value === null || value === "" ? fallback : String(value);

const ErrorCodes = {
	CATALOG_NOT_FOUND: "ERR_CATALOG_NOT_FOUND",
	UNKNOWN_LANGUAGE: "ERR_UNKNOWN_LANGUAGE",
	CATALOG_READ_FAILED: "ERR_CATALOG_READ_FAILED",
	CATALOG_WRITE_FAILED: "ERR_CATALOG_WRITE_FAILED",
	OUTPUT_VERIFICATION_FAILED: "ERR_OUTPUT_VERIFICATION_FAILED",
	TABLE_NOT_FOUND: "ERR_TABLE_NOT_FOUND",
	TABLE_INVALID: "ERR_TABLE_INVALID",
	INVALID_INPUT: "ERR_INVALID_INPUT",
	CONFIG_VALIDATION: "ERR_CONFIG_VALIDATION",
	UNKNOWN: "ERR_UNKNOWN",
} as const;

const ERROR_DEFINITIONS = {
	CATALOG_NOT_FOUND: {
		code: ErrorCodes.CATALOG_NOT_FOUND,
		message: (d) => `Catalog not found: ${text(d.filePath)}`,
		reasons: [
			"No catalog has been created for this language yet",
			"The catalog directory or file extension is misconfigured",
		],
		solutions: [
			"Check `catalogDir` and `extension` in pofill.config",
			"Create the catalog with msginit before filling it",
		],
	},
	UNKNOWN_LANGUAGE: {
		code: ErrorCodes.UNKNOWN_LANGUAGE,
		message: (d) => `No translations defined for '${text(d.language)}'`,
		reasons: ["The translation table has no section for this language"],
		solutions: [
			"Add the language to the translation table",
			"Remove the language from `languages` in pofill.config",
		],
	},
	CATALOG_READ_FAILED: {
		code: ErrorCodes.CATALOG_READ_FAILED,
		message: (d) => `Failed to read catalog ${text(d.filePath)}: ${text(d.reason)}`,
		reasons: ["The file is not readable by the current user", "The path is a directory"],
		solutions: ["Check the permissions of the catalog file"],
	},
	CATALOG_WRITE_FAILED: {
		code: ErrorCodes.CATALOG_WRITE_FAILED,
		message: (d) => `Failed to write catalog ${text(d.filePath)}: ${text(d.reason)}`,
		reasons: ["The directory is not writable", "The disk is full"],
		solutions: [
			"Check the permissions of the catalog directory",
			"Free disk space and run the fill again",
		],
	},
	OUTPUT_VERIFICATION_FAILED: {
		code: ErrorCodes.OUTPUT_VERIFICATION_FAILED,
		message: (d) =>
			`Rebuilt catalog ${text(d.filePath)} did not verify: ${text(d.problems, "no details")}`,
		reasons: [
			"The original catalog contains syntax gettext tools reject",
			"A translation contains characters that could not be encoded",
		],
		solutions: [
			"Run `msgfmt --check` on the original catalog",
			"Re-run with --no-verify to write the catalog anyway",
		],
	},
	TABLE_NOT_FOUND: {
		code: ErrorCodes.TABLE_NOT_FOUND,
		message: (d) => `Translation table not found: ${text(d.filePath)}`,
		reasons: ["`translationsFile` points to a missing file"],
		solutions: ["Check `translationsFile` in pofill.config or pass --translations"],
	},
	TABLE_INVALID: {
		code: ErrorCodes.TABLE_INVALID,
		message: (d) => `Invalid translation table ${text(d.filePath)}: ${text(d.reason)}`,
		reasons: [
			"The file is not valid JSON or YAML",
			"A language section is not a mapping of source string to translation",
		],
		solutions: [
			'Use the shape { "<language>": { "<source>": "<translation>" } }',
			"Remove empty source strings; the empty msgid is the catalog header",
		],
	},
	INVALID_INPUT: {
		code: ErrorCodes.INVALID_INPUT,
		message: (d) => `${text(d.field, "input")} ${text(d.reason, "is invalid")}`,
		reasons: ["A command-line option or configuration value is malformed"],
		solutions: ["Check the value against `pofill --help`"],
	},
	CONFIG_VALIDATION: {
		code: ErrorCodes.CONFIG_VALIDATION,
		message: (d) => `Configuration validation failed:\n${text(d.errors, "")}`,
		reasons: ["pofill.config contains invalid values"],
		solutions: ["Run `pofill validate-config` after fixing the listed values"],
	},
} satisfies Record<Exclude<keyof typeof ErrorCodes, "UNKNOWN">, ErrorDefinition>;

export type ErrorType = keyof typeof ERROR_DEFINITIONS;

export class FillError extends Error {
	readonly code: string;
	readonly type: string;
	readonly details: ErrorDetails;

	constructor(type: string, code: string, message: string, details: ErrorDetails) {
		super(message);
		this.name = "FillError";
		this.type = type;
		this.code = code;
		this.details = details;
	}
}

export interface FormatOptions {
	showDebug?: boolean;
	showSolutions?: boolean;
	showContext?: boolean;
}

const isErrorType = (type: string): type is ErrorType =>
	Object.prototype.hasOwnProperty.call(ERROR_DEFINITIONS, type);

class ErrorHelper {
	static readonly ErrorCodes = ErrorCodes;

	static createError(type: string, details: ErrorDetails = {}): FillError {
		if (!isErrorType(type)) {
			return new FillError(
				"UNKNOWN",
				ErrorCodes.UNKNOWN,
				text(details.message, "Unknown error"),
				details
			);
		}

		const definition: ErrorDefinition = ERROR_DEFINITIONS[type];
		return new FillError(type, definition.code, definition.message(details), details);
	}

	static isFillError(error: unknown): error is FillError {
		return error instanceof FillError;
	}

	static catalogNotFound(filePath: string, language: string): FillError {
		return this.createError("CATALOG_NOT_FOUND", { filePath, language });
	}

	static unknownLanguage(language: string): FillError {
		return this.createError("UNKNOWN_LANGUAGE", { language });
	}

	static ioError(
		operation: "read" | "write",
		filePath: string,
		cause: unknown
	): FillError {
		return this.createError(
			operation === "read" ? "CATALOG_READ_FAILED" : "CATALOG_WRITE_FAILED",
			{ filePath, reason: this.messageOf(cause), errno: this.errnoOf(cause) }
		);
	}

	static configValidationError(errors: string[]): FillError {
		return this.createError("CONFIG_VALIDATION", {
			errors: errors.map((error) => `  - ${error}`).join("\n"),
		});
	}

	static messageOf(error: unknown): string {
		return error instanceof Error ? error.message : String(error);
	}

	/**
	 * Node's errno code (`ENOENT`, `EACCES`, ...) when the error carries one.
	 */
	static errnoOf(error: unknown): string | undefined {
		if (typeof error === "object" && error !== null && "code" in error) {
			const { code } = error;
			return typeof code === "string" ? code : undefined;
		}
		return undefined;
	}

	static formatError(error: unknown, options: FormatOptions = {}): string {
		const { showDebug = false, showSolutions = true, showContext = true } = options;

		if (!(error instanceof FillError)) {
			return `Error: ${this.messageOf(error)}`;
		}

		const lines = [`[${error.code}] ${error.type}`, "", "Problem:", `  ${error.message}`];
		const definition: ErrorDefinition | null = isErrorType(error.type)
			? ERROR_DEFINITIONS[error.type]
			: null;

		if (definition && showContext) {
			lines.push("", "Why This Happened:");
			definition.reasons.forEach((reason) => lines.push(`  - ${reason}`));
		}

		if (definition && showSolutions) {
			lines.push("", "How to Fix:");
			definition.solutions.forEach((solution, index) =>
				lines.push(`  ${index + 1}. ${solution}`)
			);
		}

		if (showDebug) {
			lines.push("", "Debug Info:");
			for (const [key, value] of Object.entries(error.details)) {
				if (value !== undefined) lines.push(`  ${key}: ${String(value)}`);
			}
			if (error.stack) lines.push("", error.stack);
		}

		return lines.join("\n");
	}
}

export default ErrorHelper;
