/**
 * Main entry point for the viewer CLI.
 *
 * Parses arguments, runs the document pipeline (ingest, markdown, line range,
 * grep, syntax coloring, search overlay) and hands the result to print mode or
 * the interactive pager.
 */

import { ProcessTerminal, type RgbColor, type Terminal } from "mat-tui";
import { type Args, parseArgs, printHelp } from "./cli/args.js";
import { APP_NAME, VERSION } from "./config.js";
import { Document } from "./core/document.js";
import { grepDocument, resolveContext } from "./core/grep.js";
import { type InputSource, ingestBytes, isMarkdownPath, readSource, sourceName } from "./core/ingest.js";
import { applyLineRange, parseLineRange } from "./core/line-range.js";
import { renderMarkdown } from "./core/markdown.js";
import { buildPattern, type PatternOptions } from "./core/pattern.js";
import { applySearchOverlay, SearchState, searchStyle } from "./core/search.js";
import { highlightDocument, resolveLanguage } from "./core/syntax.js";
import { errorMessage, EXIT_ERROR, ViewerError } from "./errors.js";
import { logError } from "./log.js";
import { runInteractiveMode } from "./modes/interactive/interactive-mode.js";
import { ViewerState } from "./modes/interactive/viewer-state.js";
import { runPrintMode } from "./modes/print-mode.js";
import { loadSyntaxTheme } from "./theme/syntax-theme.js";
import { getPalette, resolveTheme, type ThemeMode } from "./theme/theme.js";

type TtyAware = { isTTY?: boolean };

/** A terminal that can also report its background color before it starts */
export interface ViewerTerminal extends Terminal {
	queryBackgroundColor(timeoutMs?: number): Promise<RgbColor | undefined>;
}

/** Streams and environment the CLI runs against; tests substitute their own */
export interface CliIo {
	stdin: NodeJS.ReadableStream & TtyAware;
	stdout: NodeJS.WritableStream & TtyAware;
	env: NodeJS.ProcessEnv;
	createTerminal: () => ViewerTerminal;
}

function defaultIo(): CliIo {
	return {
		stdin: process.stdin,
		stdout: process.stdout,
		env: process.env,
		createTerminal: () => new ProcessTerminal(),
	};
}

function resolveInput(args: Args, stdin: TtyAware): InputSource {
	if (args.file === "-") {
		return { kind: "stdin" };
	}
	if (args.file !== undefined) {
		return { kind: "file", path: args.file };
	}
	if (stdin.isTTY) {
		throw new ViewerError({ kind: "noInput" });
	}
	return { kind: "stdin" };
}

function patternOptions(args: Args): PatternOptions {
	return {
		ignoreCase: args.ignoreCase,
		fixedStrings: args.fixedStrings,
		wordRegexp: args.wordRegexp,
		lineRegexp: args.lineRegexp,
	};
}

interface Pipeline {
	document: Document;
	searchState: SearchState | undefined;
}

/**
 * Everything between the raw bytes and the final styled document.
 */
async function buildDocument(
	args: Args,
	source: InputSource,
	io: CliIo,
	mode: ThemeMode,
	renderMarkdownInput: boolean,
): Promise<Pipeline> {
	const palette = getPalette(mode);
	const name = sourceName(source);
	const bytes = await readSource(source, io.stdin);
	const { text, encoding } = ingestBytes(bytes, name, { forceBinary: args.forceBinary, preserveAnsi: args.ansi });

	let document = renderMarkdownInput ? renderMarkdown(text, name, encoding) : Document.fromText(text, name, encoding);

	if (args.lines !== undefined) {
		document = applyLineRange(document, parseLineRange(args.lines, document.lineCount));
	}

	const options = patternOptions(args);
	if (args.grep !== undefined) {
		const { before, after } = resolveContext(args.after, args.before, args.context);
		document = grepDocument(document, { pattern: buildPattern(args.grep, options), before, after }, palette);
	}

	if (!args.noHighlight && !renderMarkdownInput) {
		document = highlightDocument(document, resolveLanguage(args.language, name), loadSyntaxTheme(mode));
	}

	let searchState: SearchState | undefined;
	if (args.search !== undefined) {
		const pattern = buildPattern(args.search, options);
		document = applySearchOverlay(document, pattern, searchStyle(palette));
		searchState = new SearchState(pattern);
		searchState.findMatches(document);
	}

	return { document, searchState };
}

/**
 * Run the CLI and return the process exit code. Errors are printed here.
 */
export async function runCli(argv: string[], overrides: Partial<CliIo> = {}): Promise<number> {
	const io: CliIo = { ...defaultIo(), ...overrides };
	try {
		const args = parseArgs(argv);
		if (args.help) {
			printHelp();
			return 0;
		}
		if (args.version) {
			console.log(`${APP_NAME} ${VERSION}`);
			return 0;
		}

		const source = resolveInput(args, io.stdin);
		const printOnly = args.noPager || !io.stdout.isTTY;
		const renderMarkdownInput =
			!args.noMarkdown && (args.markdown || (source.kind === "file" && isMarkdownPath(source.path)));

		// The terminal is answered before raw mode starts, so it is created up front
		const terminal = printOnly ? undefined : io.createTerminal();
		const mode = await resolveTheme(args.theme, {
			queryBackground: terminal ? () => terminal.queryBackgroundColor() : undefined,
			env: io.env,
		});
		const { document, searchState } = await buildDocument(args, source, io, mode, renderMarkdownInput);

		if (!terminal) {
			await runPrintMode(document, { lineNumbers: args.lineNumbers, output: io.stdout });
			return 0;
		}

		const state = new ViewerState({
			document,
			showGutter: args.lineNumbers,
			palette: getPalette(mode),
			searchState,
			patternOptions: patternOptions(args),
			path: source.kind === "file" ? source.path : undefined,
			wrapMode: args.wrap,
			maxWidth: args.maxWidth,
		});
		if (args.follow) {
			state.toggleFollow();
		}
		await runInteractiveMode(terminal, state);
		return 0;
	} catch (error) {
		if (error instanceof ViewerError) {
			logError(error.message);
			return error.exitCode;
		}
		logError(errorMessage(error));
		return EXIT_ERROR;
	}
}

export async function main(argv: string[]): Promise<void> {
	process.exitCode = await runCli(argv);
}
