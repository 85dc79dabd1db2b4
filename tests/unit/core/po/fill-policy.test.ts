import { describe, it, expect, beforeEach } from "vitest";
import { FillPolicy, isPluralEntry } from "../../../../src/core/po/fill-policy.js";
import { parseCatalog } from "../../../../src/core/po/parser.js";
import { rebuildCatalog } from "../../../../src/core/po/rebuilder.js";
import { TranslationTable } from "../../../../src/services/translation-table.js";

const CATALOG = [
	'msgid ""',
	'msgstr ""',
	'"Language: fr\\n"',
	"",
	'msgid "Warning"',
	'msgstr ""',
	"",
	'msgid "Retry"',
	'msgstr "Already Translated"',
	"",
	'msgid "One file"',
	'msgid_plural "{} files"',
	'msgstr[0] ""',
	'msgstr[1] ""',
	"",
	'msgid "Unlisted"',
	'msgstr ""',
	"",
].join("\n");

describe("FillPolicy", () => {
	let policy: FillPolicy;

	beforeEach(() => {
		policy = new FillPolicy(
			new TranslationTable({
				fr: {
					Warning: "Avertissement",
					Retry: "Réessayer",
					"One file": "Un fichier",
					'Say "hi"': 'Dis "salut"',
				},
			})
		);
	});

	describe("isPluralEntry", () => {
		it("should recognise plural entries", () => {
			const [, , , plural] = parseCatalog(CATALOG).entries;
			expect(isPluralEntry(plural)).toBe(true);
		});

		it("should not treat singular entries as plural", () => {
			const [, warning] = parseCatalog(CATALOG).entries;
			expect(isPluralEntry(warning)).toBe(false);
		});
	});

	describe("applyAll", () => {
		it("should fill only empty singular entries found in the table", () => {
			const catalog = parseCatalog(CATALOG);
			const outcome = policy.applyAll(catalog, "fr");

			expect(outcome.filled).toBe(1);
			expect(outcome.filledIds).toEqual(["Warning"]);
			expect(outcome.fills).toEqual(new Map([["Warning", "Avertissement"]]));
			expect(catalog.entries[1].msgstrLines).toEqual(['msgstr "Avertissement"']);
		});

		it("should never overwrite an existing translation", () => {
			const catalog = parseCatalog(CATALOG);
			policy.applyAll(catalog, "fr");

			expect(catalog.entries[2].msgstrLines).toEqual(['msgstr "Already Translated"']);
		});

		it("should leave plural entries untouched", () => {
			const catalog = parseCatalog(CATALOG);
			policy.applyAll(catalog, "fr");

			expect(catalog.entries[3].msgstrLines).toEqual(['msgstr[0] ""', 'msgstr[1] ""']);
		});

		it("should fill nothing for a language the table does not have", () => {
			const catalog = parseCatalog(CATALOG);

			expect(policy.applyAll(catalog, "de").filled).toBe(0);
			expect(rebuildCatalog(catalog)).toBe(CATALOG);
		});

		it("should fill nothing on a second pass", () => {
			const catalog = parseCatalog(CATALOG);
			policy.applyAll(catalog, "fr");
			const refilled = parseCatalog(rebuildCatalog(catalog));

			expect(policy.applyAll(refilled, "fr").filled).toBe(0);
		});

		it("should match decoded msgids and write escaped translations", () => {
			const catalog = parseCatalog('msgid "Say \\"hi\\""\nmsgstr ""\n');
			const outcome = policy.applyAll(catalog, "fr");

			expect(outcome.filledIds).toEqual(['Say "hi"']);
			expect(rebuildCatalog(catalog)).toBe('msgid "Say \\"hi\\""\nmsgstr "Dis \\"salut\\""\n');
		});

		it("should fill an entry whose msgstr line is missing", () => {
			const catalog = parseCatalog('msgid "Warning"\n');
			policy.applyAll(catalog, "fr");

			expect(rebuildCatalog(catalog)).toBe('msgid "Warning"\nmsgstr "Avertissement"\n');
		});
	});

	describe("inspect", () => {
		it("should count entries without the header", () => {
			expect(policy.inspect(parseCatalog(CATALOG), "fr")).toEqual({
				entries: 4,
				translated: 1,
				untranslated: 2,
				plural: 1,
				fillable: 1,
			});
		});

		it("should reflect a fill", () => {
			const catalog = parseCatalog(CATALOG);
			policy.applyAll(catalog, "fr");

			expect(policy.inspect(catalog, "fr")).toEqual({
				entries: 4,
				translated: 2,
				untranslated: 1,
				plural: 1,
				fillable: 0,
			});
		});
	});
});
