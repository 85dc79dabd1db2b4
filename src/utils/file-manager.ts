import { promises as fs } from "fs";
import path from "path";
import ErrorHelper from "./error-helper.js";

export interface FileOptions {
	atomic?: boolean;
	createMissingDirs?: boolean;
	backupFiles?: boolean;
	backupDir?: string;
	encoding?: BufferEncoding;
}

/**
 * FileManager - asynchronous catalog file operations.
 * Reads and writes whole text files; writes are atomic (temp file + rename) by default.
 */
class FileManager {
	/**
	 * Default options for file operations
	 */
	static defaultOptions: Required<FileOptions> = {
		atomic: true,
		createMissingDirs: false,
		backupFiles: false,
		backupDir: "./backups",
		encoding: "utf8",
	};

	private static options: Required<FileOptions> | null = null;

	/**
	 * Configure global options for file operations
	 * @param options - File operation options
	 */
	static configure(options: FileOptions): void {
		if (!options) return;

		this.options = {
			...this.defaultOptions,
			...options,
		};
	}

	static getConfig(): Required<FileOptions> {
		return this.options || this.defaultOptions;
	}

	/**
	 * Catalog path for a language: `<dir>/<language><extension>`
	 */
	static catalogPath(catalogDir: string, language: string, extension: string): string {
		return path.join(catalogDir, `${language}${extension}`);
	}

	/**
	 * Read a whole text file.
	 * UTF-8 is decoded strictly: invalid bytes fail the read instead of turning into U+FFFD,
	 * and a byte order mark stays in the text.
	 * @throws FillError (ERR_CATALOG_READ_FAILED) carrying the errno of the failure
	 */
	static async readText(filePath: string, options: FileOptions = {}): Promise<string> {
		const config = { ...this.getConfig(), ...options };

		try {
			const buffer = await fs.readFile(filePath);
			if (config.encoding === "utf8" || config.encoding === "utf-8") {
				return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(buffer);
			}
			return buffer.toString(config.encoding);
		} catch (err) {
			throw ErrorHelper.ioError("read", filePath, err);
		}
	}

	/**
	 * Replace a text file's content, optionally keeping a backup of the previous version.
	 * @throws FillError (ERR_CATALOG_WRITE_FAILED)
	 */
	static async writeText(
		filePath: string,
		content: string,
		options: FileOptions = {}
	): Promise<void> {
		const config = { ...this.getConfig(), ...options };

		try {
			if (config.createMissingDirs) {
				await this.ensureDir(path.dirname(filePath));
			}

			if (config.backupFiles && (await this.exists(filePath))) {
				await this.ensureDir(config.backupDir);
				const backupPath = path.join(
					config.backupDir,
					`${path.basename(filePath)}.${Date.now()}.bak`
				);
				await fs.copyFile(filePath, backupPath);
			}

			if (config.atomic) {
				await this.writeAtomic(filePath, content, config.encoding);
			} else {
				await fs.writeFile(filePath, content, { encoding: config.encoding });
			}
		} catch (err) {
			throw ErrorHelper.ioError("write", filePath, err);
		}
	}

	/**
	 * Write beside the target, then rename over it.
	 */
	private static async writeAtomic(
		filePath: string,
		content: string,
		encoding: BufferEncoding
	): Promise<void> {
		const tempFile = this._generateTempFilePath(filePath);

		try {
			await fs.writeFile(tempFile, content, { encoding });
			await fs.rename(tempFile, filePath);
		} catch (writeError) {
			await fs.rm(tempFile, { force: true }).catch((cleanupError: unknown) => {
				console.warn(
					`Could not remove temporary file ${tempFile}: ${ErrorHelper.messageOf(cleanupError)}`
				);
			});
			throw writeError;
		}
	}

	/**
	 * Generate a unique temporary file path
	 */
	static _generateTempFilePath(filePath: string): string {
		const timestamp = Date.now();
		const random = Math.random().toString(36).substring(2, 8);
		return `${filePath}.tmp.${timestamp}.${random}`;
	}

	static async ensureDir(dir: string): Promise<void> {
		await fs.mkdir(dir, { recursive: true });
	}

	/**
	 * Check if file exists
	 */
	static async exists(filePath: string): Promise<boolean> {
		try {
			await fs.access(filePath);
			return true;
		} catch {
			return false;
		}
	}
}

export { FileManager };
