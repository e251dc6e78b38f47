// Core document model and pipeline stages
export {
	Document,
	type Encoding,
	gutterWidthFor,
	type Line,
	lineText,
	lineWidth,
	plainLine,
	type StyledSpan,
	styledSpan,
} from "./core/document.js";
export { type GrepOptions, grepDocument, mergeWindows, resolveContext } from "./core/grep.js";
export { expandTabs, type IngestOptions, type IngestResult, ingestBytes, type InputSource, stripAnsiSequences } from "./core/ingest.js";
export { applyLineRange, type LineRange, parseLineRange } from "./core/line-range.js";
export { renderMarkdown } from "./core/markdown.js";
export { buildPattern, DEFAULT_PATTERN_OPTIONS, type PatternOptions } from "./core/pattern.js";
export { applySearchOverlay, type MatchPosition, SearchState, searchStyle } from "./core/search.js";
export { type Color, mergeStyle, type NamedColor, PLAIN, type RgbValue, type SpanStyle } from "./core/style.js";
export { highlightDocument, resolveLanguage } from "./core/syntax.js";
export { TailReader } from "./core/tail-reader.js";
// Errors
export { EXIT_ERROR, EXIT_INVALID_ARGS, ViewerError, type ViewerErrorDetail } from "./errors.js";
// CLI and modes
export { type CliIo, main, runCli, type ViewerTerminal } from "./main.js";
export { InteractiveMode } from "./modes/interactive/interactive-mode.js";
export { KeyHandler } from "./modes/interactive/key-handler.js";
export { ViewerState, type WrappedRow } from "./modes/interactive/viewer-state.js";
export { ViewerView } from "./modes/interactive/viewer-view.js";
export { formatDocument, runPrintMode } from "./modes/print-mode.js";
// Themes
export { loadSyntaxTheme, SyntaxTheme } from "./theme/syntax-theme.js";
export { getPalette, resolveTheme, type ThemeColors, type ThemeMode } from "./theme/theme.js";
