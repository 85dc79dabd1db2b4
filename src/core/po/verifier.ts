import gettextParser from "gettext-parser";
import ErrorHelper from "../../utils/error-helper.js";

export interface VerificationResult {
	valid: boolean;
	problems: string[];
}

/**
 * Re-read a rebuilt catalog with gettext-parser and check that every fill
 * is visible to standard gettext tooling, in any context.
 * @param fills - msgid → translation written by the fill
 */
export function verifyCatalogOutput(
	text: string,
	fills: ReadonlyMap<string, string>
): VerificationResult {
	let parsed: ReturnType<typeof gettextParser.po.parse>;
	try {
		parsed = gettextParser.po.parse(text.replace(/^\uFEFF/, ""));
	} catch (error) {
		return {
			valid: false,
			problems: [`gettext-parser could not read the catalog: ${ErrorHelper.messageOf(error)}`],
		};
	}

	const contexts = Object.values(parsed.translations);
	const problems: string[] = [];

	for (const [msgid, expected] of fills) {
		const found = contexts.some((entries) => entries[msgid]?.msgstr[0] === expected);
		if (!found) {
			problems.push(`'${msgid}' does not read back as '${expected}'`);
		}
	}

	return { valid: problems.length === 0, problems };
}
