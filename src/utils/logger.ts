/**
 * Logging for fill runs.
 * Console output follows verbosity and diagnostics level; warnings and errors can
 * also be appended to log files under `logDirectory`.
 */

import path from "path";
import { promises as fsPromises } from "fs";
import ErrorHelper from "./error-helper.js";

export type LogLevel = "error" | "warning" | "info" | "debug";

export interface LoggerConfig {
	verbose?: boolean;
	diagnosticsLevel?: "minimal" | "normal" | "detailed";
	outputFormat?: "pretty" | "json" | "simple";
	saveErrorLogs?: boolean;
	logDirectory?: string;
	includeTimestamps?: boolean;
}

type LogData = Record<string, unknown> | null;

class Logger {
	public config: Required<LoggerConfig>;
	public logFiles: Record<LogLevel, string>;
	private initialized: boolean;

	/**
	 * Create a new Logger instance.
	 * @param config - Logger configuration.
	 */
	constructor(config: LoggerConfig = {}) {
		this.config = {
			verbose: config.verbose || false,
			diagnosticsLevel: config.diagnosticsLevel || "minimal",
			outputFormat: config.outputFormat || "pretty",
			saveErrorLogs: config.saveErrorLogs === true,
			logDirectory: config.logDirectory || "./logs",
			includeTimestamps: config.includeTimestamps !== false,
		};

		this.logFiles = {
			error: path.join(this.config.logDirectory, "errors.log"),
			warning: path.join(this.config.logDirectory, "warnings.log"),
			info: path.join(this.config.logDirectory, "info.log"),
			debug: path.join(this.config.logDirectory, "debug.log"),
		};

		this.initialized = false;
	}

	/**
	 * Create the log directory once, on first write.
	 */
	async initialize(): Promise<void> {
		if (this.initialized) return;

		if (this.config.saveErrorLogs) {
			try {
				await fsPromises.mkdir(this.config.logDirectory, { recursive: true });
			} catch (error) {
				console.warn(`Logger initialization warning: ${ErrorHelper.messageOf(error)}`);
			}
		}

		this.initialized = true;
	}

	/**
	 * Format log message.
	 * @param level - Log level.
	 * @param message - Log message.
	 * @param data - Additional data to log.
	 */
	formatMessage(level: LogLevel, message: string, data: LogData = null): string {
		const timestamp = this.config.includeTimestamps ? new Date().toISOString() : null;

		switch (this.config.outputFormat) {
			case "json":
				return JSON.stringify({
					timestamp,
					level,
					message,
					data,
				});

			case "simple":
				return `[${level.toUpperCase()}] ${message}`;

			case "pretty":
			default: {
				const timeStr = timestamp ? `[${timestamp}] ` : "";
				const levelStr = `[${level.toUpperCase()}]`;
				const dataStr = data ? `\n${JSON.stringify(data, null, 2)}` : "";
				return `${timeStr}${levelStr} ${message}${dataStr}`;
			}
		}
	}

	/**
	 * Append to the level's log file when file logging is enabled.
	 */
	async writeToFile(level: LogLevel, message: string, data: LogData = null): Promise<void> {
		if (!this.config.saveErrorLogs) return;

		await this.initialize();

		try {
			const logEntry = `${this.formatMessage(level, message, data)}\n`;
			await fsPromises.appendFile(this.logFiles[level], logEntry, "utf8");
		} catch (error) {
			console.warn(`Failed to write to log file: ${ErrorHelper.messageOf(error)}`);
		}
	}

	async error(message: string, data: LogData = null): Promise<void> {
		console.error(`ERROR: ${message}`);
		if (data && this.config.verbose) {
			console.error(data);
		}
		await this.writeToFile("error", message, data);
	}

	async warn(message: string, data: LogData = null): Promise<void> {
		console.warn(`WARNING: ${message}`);
		if (data && this.config.verbose) {
			console.warn(data);
		}
		await this.writeToFile("warning", message, data);
	}

	async info(message: string, data: LogData = null): Promise<void> {
		if (this.config.diagnosticsLevel !== "minimal" || this.config.verbose) {
			console.log(`INFO: ${message}`);
			if (data && this.config.verbose) {
				console.log(data);
			}
		}
		await this.writeToFile("info", message, data);
	}

	async debug(message: string, data: LogData = null): Promise<void> {
		if (this.config.verbose || this.config.diagnosticsLevel === "detailed") {
			console.log(`DEBUG: ${message}`);
			if (data) {
				console.log(data);
			}
		}
		await this.writeToFile("debug", message, data);
	}
}

// Create singleton instance
let loggerInstance: Logger | null = null;

export function getLogger(config: LoggerConfig | null = null): Logger {
	if (!loggerInstance || config) {
		loggerInstance = new Logger(config || {});
	}
	return loggerInstance;
}

export default Logger;
