import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import CatalogFillService from "../../src/services/fill-service.js";
import { loadTranslationTable } from "../../src/services/translation-table.js";
import { FileManager } from "../../src/utils/file-manager.js";
import type { FillOptions } from "../../src/types/index.js";

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "fixtures");

const fill = (text: string, msgstr: string, replacement: string) => text.replace(msgstr, replacement);

describe("Fill run", () => {
	let dir: string;
	let source: string;
	let service: CatalogFillService;
	let options: FillOptions;

	const catalogFile = (language: string) => path.join(dir, `${language}.po`);
	const read = (language: string) => fs.readFile(catalogFile(language), "utf8");

	/** The fr fixture after a fill, derived entry by entry */
	const expectedFr = (text: string, eol = "\n") =>
		[
			[`msgid "Warning"${eol}msgstr ""`, `msgid "Warning"${eol}msgstr "Avertissement"`],
			[
				`"part two"${eol}msgstr ""`,
				`"part two"${eol}msgstr "Première partie deuxième partie"`,
			],
			[`msgid "Open"${eol}msgstr ""`, `msgid "Open"${eol}msgstr "Ouvrir"`],
			[
				`msgid "Say \\"hi\\""${eol}msgstr ""`,
				`msgid "Say \\"hi\\""${eol}msgstr "Dis \\"salut\\""`,
			],
		].reduce((result, [from, to]) => fill(result, from, to), text);

	beforeEach(async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
		FileManager.configure({});

		dir = await fs.mkdtemp(path.join(os.tmpdir(), "pofill-run-"));
		source = await fs.readFile(path.join(FIXTURES, "catalogs", "fr.po"), "utf8");
		await fs.writeFile(catalogFile("fr"), source);

		service = new CatalogFillService(
			await loadTranslationTable(path.join(FIXTURES, "translations.json"))
		);
		options = { catalogDir: dir, extension: ".po", languages: ["fr"] };
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await fs.rm(dir, { recursive: true, force: true });
	});

	it("should fill exactly the empty entries found in the table", async () => {
		const report = await service.fillAll(options);

		expect(report.totalFilled).toBe(4);
		expect(await read("fr")).toBe(expectedFr(source));
	});

	it("should keep existing translations, plurals and obsolete entries", async () => {
		await service.fillAll(options);
		const text = await read("fr");

		expect(text).toContain('msgid "Retry"\nmsgstr "Already Translated"');
		expect(text).toContain('msgid_plural "{} files"\nmsgstr[0] ""\nmsgstr[1] ""');
		expect(text.endsWith('#~ msgid "Obsolete"\n#~ msgstr "Obsolète"\n')).toBe(true);
	});

	it("should match a msgid split over several lines", async () => {
		const report = await service.fillAll(options);

		expect(report.languages[0].status).toBe("filled");
		expect(await read("fr")).toContain(
			'msgid ""\n"Part one "\n"part two"\nmsgstr "Première partie deuxième partie"'
		);
	});

	it("should fill nothing on a second run", async () => {
		await service.fillAll(options);
		const afterFirst = await read("fr");

		const second = await service.fillAll(options);

		expect(second.totalFilled).toBe(0);
		expect(second.languages[0].status).toBe("unchanged");
		expect(await read("fr")).toBe(afterFirst);
	});

	it("should skip missing catalogs and languages without translations", async () => {
		await fs.writeFile(catalogFile("pl"), source);

		const report = await service.fillAll({ ...options, languages: ["uk", "pl", "fr"] });

		expect(report.languages.map((result) => result.status)).toEqual([
			"missing-file",
			"unknown-language",
			"filled",
		]);
		expect(report.skipped).toBe(2);
		expect(report.failed).toBe(0);
		expect(await read("pl")).toBe(source);
	});

	it("should keep CRLF line endings and the byte order mark", async () => {
		const crlf = `\uFEFF${source.split("\n").join("\r\n")}`;
		await fs.writeFile(catalogFile("fr"), crlf);

		await service.fillAll(options);

		expect(await read("fr")).toBe(expectedFr(crlf, "\r\n"));
	});

	it("should never write during a dry run", async () => {
		const report = await service.fillAll({ ...options, dryRun: true });

		expect(report.dryRun).toBe(true);
		expect(report.totalFilled).toBe(4);
		expect(report.languages[0].written).toBe(false);
		expect(await read("fr")).toBe(source);
	});

	it("should not rewrite a catalog with nothing to fill", async () => {
		await fs.writeFile(catalogFile("de"), 'msgid "Warning"\nmsgstr "Achtung"\n');
		const writeSpy = vi.spyOn(FileManager, "writeText");

		const report = await service.fillAll({ ...options, languages: ["de"] });

		expect(report.languages[0].status).toBe("unchanged");
		expect(writeSpy).not.toHaveBeenCalled();
	});

	it("should report what is left to translate", async () => {
		const [before] = await service.statusAll(options);
		await service.fillAll(options);
		const [after] = await service.statusAll(options);

		expect(before.status).toEqual({
			entries: 7,
			translated: 1,
			untranslated: 5,
			plural: 1,
			fillable: 4,
		});
		expect(after.status).toEqual({
			entries: 7,
			translated: 5,
			untranslated: 1,
			plural: 1,
			fillable: 0,
		});
	});
});
