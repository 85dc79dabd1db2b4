import type { Catalog, CatalogEntry, LineEnding } from "../../types/index.js";
import { fieldKeyword } from "./codec.js";

export type LineKind =
	| "blank"
	| "comment"
	| "context"
	| "msgid"
	| "plural"
	| "msgstr"
	| "continuation"
	| "unknown";

export type ParserState = "idle" | "comments" | "context" | "msgid" | "msgstr";

type EntryField = "comments" | "contextLines" | "msgidLines" | "msgstrLines";

interface Transition {
	/** Seal the entry being built before handling the line */
	seal?: boolean;
	append?: EntryField;
	/** Remember a blank line that may sit inside a comment block */
	holdBlank?: boolean;
	/** A comment inside an open field; the rebuilder writes it above the entry */
	moved?: boolean;
	ignore?: boolean;
	next: ParserState;
}

const stay = (next: ParserState): Transition => ({ next });
const ignore = (next: ParserState): Transition => ({ ignore: true, next });

/**
 * State × line kind → transition.
 * A `msgid` (or comment, or `msgctxt`) arriving while the translation field is open
 * seals the previous entry, so catalogs without blank separators still split.
 */
export const TRANSITIONS: Record<ParserState, Record<LineKind, Transition>> = {
	idle: {
		blank: stay("idle"),
		comment: { append: "comments", next: "comments" },
		context: { append: "contextLines", next: "context" },
		msgid: { append: "msgidLines", next: "msgid" },
		plural: ignore("idle"),
		msgstr: ignore("idle"),
		continuation: ignore("idle"),
		unknown: ignore("idle"),
	},
	comments: {
		blank: { holdBlank: true, next: "comments" },
		comment: { append: "comments", next: "comments" },
		context: { append: "contextLines", next: "context" },
		msgid: { append: "msgidLines", next: "msgid" },
		plural: ignore("comments"),
		msgstr: ignore("comments"),
		continuation: ignore("comments"),
		unknown: ignore("comments"),
	},
	context: {
		blank: stay("context"),
		comment: { append: "comments", moved: true, next: "context" },
		context: { append: "contextLines", next: "context" },
		msgid: { append: "msgidLines", next: "msgid" },
		plural: ignore("context"),
		msgstr: ignore("context"),
		continuation: { append: "contextLines", next: "context" },
		unknown: ignore("context"),
	},
	msgid: {
		blank: stay("msgid"),
		comment: { append: "comments", moved: true, next: "msgid" },
		context: ignore("msgid"),
		msgid: { append: "msgidLines", next: "msgid" },
		plural: { append: "msgidLines", next: "msgid" },
		msgstr: { append: "msgstrLines", next: "msgstr" },
		continuation: { append: "msgidLines", next: "msgid" },
		unknown: ignore("msgid"),
	},
	msgstr: {
		blank: { seal: true, next: "idle" },
		comment: { seal: true, append: "comments", next: "comments" },
		context: { seal: true, append: "contextLines", next: "context" },
		msgid: { seal: true, append: "msgidLines", next: "msgid" },
		plural: ignore("msgstr"),
		msgstr: { append: "msgstrLines", next: "msgstr" },
		continuation: { append: "msgstrLines", next: "msgstr" },
		unknown: ignore("msgstr"),
	},
};

export function classifyLine(line: string): LineKind {
	if (line.trim() === "") return "blank";
	if (line.startsWith("#")) return "comment";
	if (line.startsWith('"')) return "continuation";

	switch (fieldKeyword(line)) {
		case null:
			return "unknown";
		case "msgctxt":
			return "context";
		case "msgid":
			return "msgid";
		case "msgid_plural":
			return "plural";
		default:
			return "msgstr";
	}
}

const emptyEntry = (): CatalogEntry => ({
	comments: [],
	contextLines: [],
	msgidLines: [],
	msgstrLines: [],
});

class CatalogParser {
	private entries: CatalogEntry[] = [];
	private pending: CatalogEntry = emptyEntry();
	private state: ParserState = "idle";
	private blankHeld = false;
	private ignoredLines: number[] = [];
	private movedComments: number[] = [];

	parse(text: string): Catalog {
		const bom = text.startsWith("\uFEFF");
		const body = bom ? text.slice(1) : text;
		const crlfCount = body.split("\r\n").length - 1;
		const lfCount = body.split("\n").length - 1 - crlfCount;
		// Mixed files are written back with the terminator most of their lines use
		const eol: LineEnding = crlfCount > lfCount ? "\r\n" : "\n";

		body.split(/\r?\n/).forEach((line, index) => this.feed(line, index + 1));

		let trailing: string[] = [];
		if (this.pending.msgidLines.length > 0) {
			this.seal();
		} else {
			trailing = [...this.pending.comments, ...this.pending.contextLines];
		}

		return {
			entries: this.entries,
			trailing,
			eol,
			bom,
			ignoredLines: this.ignoredLines,
			movedComments: this.movedComments,
		};
	}

	private feed(line: string, lineNumber: number): void {
		const transition = TRANSITIONS[this.state][classifyLine(line)];

		if (transition.seal) this.seal();

		if (transition.ignore) {
			this.ignoredLines.push(lineNumber);
		} else if (transition.holdBlank) {
			this.blankHeld = true;
		} else if (transition.append) {
			if (transition.moved) this.movedComments.push(lineNumber);
			if (this.blankHeld && this.pending.comments.length > 0) {
				this.pending.comments.push("");
			}
			this.blankHeld = false;
			this.pending[transition.append].push(line);
		}

		this.state = transition.next;
	}

	private seal(): void {
		this.entries.push(this.pending);
		this.pending = emptyEntry();
		this.blankHeld = false;
	}
}

/**
 * Split catalog text into entries in source order, keeping every line verbatim.
 */
export function parseCatalog(text: string): Catalog {
	return new CatalogParser().parse(text);
}
