import type { Catalog, CatalogEntry } from "../../types/index.js";

const entryLines = (entry: CatalogEntry): string[] => [
	...entry.comments,
	...entry.contextLines,
	...entry.msgidLines,
	...entry.msgstrLines,
];

/**
 * Serialize a catalog: one blank line between entries, one line terminator at the end.
 */
export function rebuildCatalog(catalog: Catalog): string {
	const blocks = catalog.entries.map(entryLines);
	if (catalog.trailing.length > 0) {
		blocks.push(catalog.trailing);
	}
	if (blocks.length === 0) return "";

	const lines: string[] = [];
	blocks.forEach((block, index) => {
		if (index > 0) lines.push("");
		lines.push(...block);
	});
	lines.push("");

	return `${catalog.bom ? "\uFEFF" : ""}${lines.join(catalog.eol)}`;
}
