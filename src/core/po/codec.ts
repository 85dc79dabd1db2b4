/**
 * Field codec for gettext catalogs.
 * A field is a keyword line (`msgid "..."`) followed by any number of bare quoted
 * continuation lines; together they hold one logical string.
 */

const KEYWORD_LINE = /^(msgctxt|msgid_plural|msgid|msgstr(?:\[\d+\])?)\s+"(.*)"\s*$/;
const CONTINUATION_LINE = /^"(.*)"\s*$/;
const KEYWORD_PREFIX = /^(msgctxt|msgid_plural|msgid|msgstr(?:\[\d+\])?)\s/;

const UNESCAPES: Record<string, string> = {
	"\\": "\\",
	'"': '"',
	n: "\n",
	t: "\t",
	r: "\r",
	a: "\x07",
	b: "\b",
	f: "\f",
	v: "\v",
};

/**
 * Resolve gettext backslash escapes. Unknown escapes are kept as written.
 */
export function unescapePoString(raw: string): string {
	if (!raw.includes("\\")) return raw;

	const out: string[] = [];
	for (let i = 0; i < raw.length; i++) {
		const ch = raw[i];
		if (ch !== "\\" || i === raw.length - 1) {
			out.push(ch);
			continue;
		}

		const next = raw[i + 1];
		const resolved = UNESCAPES[next];
		out.push(resolved === undefined ? `\\${next}` : resolved);
		i++;
	}
	return out.join("");
}

export function escapePoString(value: string): string {
	return value
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"')
		.replace(/\n/g, "\\n")
		.replace(/\t/g, "\\t")
		.replace(/\r/g, "\\r");
}

/**
 * Keyword of a field line (`msgid`, `msgstr[1]`, ...) or null for anything else.
 */
export function fieldKeyword(line: string): string | null {
	const match = KEYWORD_PREFIX.exec(line);
	return match ? match[1] : null;
}

/**
 * Decode the leading field of `lines` into its logical string.
 * Stops at the next keyword line, so a `msgid_plural` is not folded into the `msgid`.
 */
export function decodeField(lines: readonly string[]): string {
	const fragments: string[] = [];

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i];
		if (i > 0 && fieldKeyword(line) !== null) break;

		const match = i === 0 ? KEYWORD_LINE.exec(line) : CONTINUATION_LINE.exec(line);
		if (!match) continue;
		fragments.push(unescapePoString(i === 0 ? match[2] : match[1]));
	}

	return fragments.join("");
}

/**
 * Encode a value as a single-line field. Values are never re-wrapped.
 */
export function encodeField(keyword: string, value: string): string[] {
	return [`${keyword} "${escapePoString(value)}"`];
}
