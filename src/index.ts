export { parseCatalog, classifyLine, TRANSITIONS } from "./core/po/parser.js";
export type { LineKind, ParserState } from "./core/po/parser.js";
export {
	decodeField,
	encodeField,
	escapePoString,
	unescapePoString,
	fieldKeyword,
} from "./core/po/codec.js";
export { rebuildCatalog } from "./core/po/rebuilder.js";
export { FillPolicy, isPluralEntry } from "./core/po/fill-policy.js";
export { verifyCatalogOutput } from "./core/po/verifier.js";
export type { VerificationResult } from "./core/po/verifier.js";
export { TranslationTable, loadTranslationTable } from "./services/translation-table.js";
export type { TranslationTableData } from "./services/translation-table.js";
export { CatalogFillService } from "./services/fill-service.js";
export type { TextFillResult } from "./services/fill-service.js";
export { fillCatalogs, inspectCatalogs, formatReport, formatStatus } from "./commands/filler.js";
export { defineConfig, loadConfig, DEFAULT_CONFIG } from "./config/index.js";
export type { FillConfig } from "./config/index.js";
export { default as ErrorHelper, FillError } from "./utils/error-helper.js";
export type * from "./types/index.js";
