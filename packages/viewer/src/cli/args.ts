/**
 * CLI argument parsing and help display
 */

import chalk from "chalk";
import { APP_NAME, DEFAULT_MAX_WIDTH } from "../config.js";
import { ViewerError } from "../errors.js";
import { parseThemeMode, type ThemeMode } from "../theme/theme.js";

export type WrapMode = "none" | "wrap" | "truncate";

const WRAP_MODES: readonly WrapMode[] = ["none", "wrap", "truncate"];

export interface Args {
	/** Positional file; "-" means standard input */
	file?: string;
	lineNumbers: boolean;
	noHighlight: boolean;
	markdown: boolean;
	noMarkdown: boolean;
	follow: boolean;
	search?: string;
	grep?: string;
	ignoreCase: boolean;
	fixedStrings: boolean;
	wordRegexp: boolean;
	lineRegexp: boolean;
	after?: number;
	before?: number;
	context?: number;
	wrap: WrapMode;
	maxWidth: number;
	language?: string;
	theme?: ThemeMode;
	lines?: string;
	noPager: boolean;
	ansi: boolean;
	forceBinary: boolean;
	help: boolean;
	version: boolean;
}

type BooleanFlag =
	| "lineNumbers"
	| "noHighlight"
	| "markdown"
	| "noMarkdown"
	| "follow"
	| "ignoreCase"
	| "fixedStrings"
	| "wordRegexp"
	| "lineRegexp"
	| "noPager"
	| "ansi"
	| "forceBinary"
	| "help"
	| "version";

type ValueOption = "search" | "grep" | "after" | "before" | "context" | "wrap" | "maxWidth" | "language" | "theme" | "lines";

const BOOLEAN_FLAGS: Record<string, BooleanFlag> = {
	"-n": "lineNumbers",
	"--line-numbers": "lineNumbers",
	"-N": "noHighlight",
	"--no-highlight": "noHighlight",
	"-m": "markdown",
	"--markdown": "markdown",
	"-M": "noMarkdown",
	"--no-markdown": "noMarkdown",
	"-f": "follow",
	"--follow": "follow",
	"-i": "ignoreCase",
	"--ignore-case": "ignoreCase",
	"-F": "fixedStrings",
	"--fixed-strings": "fixedStrings",
	"-w": "wordRegexp",
	"--word-regexp": "wordRegexp",
	"-x": "lineRegexp",
	"--line-regexp": "lineRegexp",
	"-P": "noPager",
	"--no-pager": "noPager",
	"--ansi": "ansi",
	"--force-binary": "forceBinary",
	"-h": "help",
	"--help": "help",
	"-V": "version",
	"--version": "version",
};

const VALUE_OPTIONS: Record<string, ValueOption> = {
	"-s": "search",
	"--search": "search",
	"-g": "grep",
	"--grep": "grep",
	"-A": "after",
	"--after": "after",
	"-B": "before",
	"--before": "before",
	"-C": "context",
	"--context": "context",
	"--wrap": "wrap",
	"-W": "maxWidth",
	"--max-width": "maxWidth",
	"-l": "language",
	"--language": "language",
	"-t": "theme",
	"--theme": "theme",
	"-L": "lines",
	"--lines": "lines",
};

function invalid(message: string): ViewerError {
	return new ViewerError({ kind: "invalidArgument", message });
}

function parseCount(flag: string, value: string): number {
	if (!/^\d+$/.test(value)) {
		throw invalid(`Invalid value '${value}' for ${flag}: expected a non-negative integer`);
	}
	return Number.parseInt(value, 10);
}

function applyValue(result: Args, option: ValueOption, flag: string, value: string): void {
	switch (option) {
		case "search":
		case "grep":
		case "language":
		case "lines":
			result[option] = value;
			break;
		case "after":
		case "before":
		case "context":
			result[option] = parseCount(flag, value);
			break;
		case "maxWidth":
			result.maxWidth = parseCount(flag, value);
			break;
		case "wrap": {
			const mode = WRAP_MODES.find((m) => m === value.toLowerCase());
			if (!mode) {
				throw invalid(`Invalid value '${value}' for --wrap. Valid values: ${WRAP_MODES.join(", ")}`);
			}
			result.wrap = mode;
			break;
		}
		case "theme": {
			const theme = parseThemeMode(value);
			if (!theme) {
				throw invalid(`Invalid value '${value}' for ${flag}. Valid values: light, dark`);
			}
			result.theme = theme;
			break;
		}
	}
}

/** Expand "-nP" into "-n", "-P" when every letter is a boolean flag */
function expandCluster(arg: string): string[] | undefined {
	if (!/^-[A-Za-z]{2,}$/.test(arg)) {
		return undefined;
	}
	const flags = [...arg.slice(1)].map((letter) => `-${letter}`);
	return flags.every((flag) => flag in BOOLEAN_FLAGS) ? flags : undefined;
}

export function parseArgs(args: string[]): Args {
	const result: Args = {
		lineNumbers: false,
		noHighlight: false,
		markdown: false,
		noMarkdown: false,
		follow: false,
		ignoreCase: false,
		fixedStrings: false,
		wordRegexp: false,
		lineRegexp: false,
		wrap: "none",
		maxWidth: DEFAULT_MAX_WIDTH,
		noPager: false,
		ansi: false,
		forceBinary: false,
		help: false,
		version: false,
	};

	const setFile = (file: string) => {
		if (result.file !== undefined) {
			throw invalid(`Unexpected argument '${file}': only one file can be viewed`);
		}
		result.file = file;
	};

	let optionsEnded = false;
	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";

		if (optionsEnded || arg === "-" || !arg.startsWith("-")) {
			setFile(arg);
			continue;
		}
		if (arg === "--") {
			optionsEnded = true;
			continue;
		}

		const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
		const name = eq === -1 ? arg : arg.slice(0, eq);

		const flag = BOOLEAN_FLAGS[name];
		if (flag && eq === -1) {
			result[flag] = true;
			continue;
		}

		const option = VALUE_OPTIONS[name];
		if (option) {
			let value: string | undefined;
			if (eq !== -1) {
				value = arg.slice(eq + 1);
			} else if (i + 1 < args.length) {
				value = args[++i];
			}
			if (value === undefined) {
				throw invalid(`Option ${name} requires a value`);
			}
			applyValue(result, option, name, value);
			continue;
		}

		// "-B1", "-tlight": a short option with its value attached
		const attached = arg.startsWith("--") ? undefined : VALUE_OPTIONS[arg.slice(0, 2)];
		if (attached) {
			applyValue(result, attached, arg.slice(0, 2), arg.slice(2));
			continue;
		}

		const cluster = expandCluster(arg);
		if (cluster) {
			for (const short of cluster) {
				const clustered = BOOLEAN_FLAGS[short];
				if (clustered) result[clustered] = true;
			}
			continue;
		}

		throw invalid(`Unknown option '${arg}'. Run '${APP_NAME} --help' for usage`);
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold(APP_NAME)} - view files with paging, grep filtering, markdown rendering and syntax coloring

${chalk.bold("Usage:")}
  ${APP_NAME} [options] [file]
  <command> | ${APP_NAME} [options]

${chalk.bold("Display:")}
  -n, --line-numbers           Show line numbers
  -N, --no-highlight           Disable syntax coloring
  -m, --markdown               Render as markdown
  -M, --no-markdown            Never render as markdown (even for .md files)
  -l, --language <lang>        Grammar to color with (name or file extension)
  -t, --theme <light|dark>     Color theme (default: detected from the terminal)
      --wrap <mode>            Long lines: none (default), wrap or truncate
  -W, --max-width <n>          Column limit in truncate mode (default: ${DEFAULT_MAX_WIDTH})

${chalk.bold("Filtering:")}
  -g, --grep <pattern>         Show only matching lines
  -A, --after <n>              Lines of context after each match
  -B, --before <n>             Lines of context before each match
  -C, --context <n>            Lines of context on both sides (overrides -A and -B)
  -L, --lines <range>          Show a line range: X:Y, :Y, X: or X

${chalk.bold("Search:")}
  -s, --search <pattern>       Highlight matches and jump between them with n/N
  -i, --ignore-case            Case-insensitive matching for -g and -s
  -F, --fixed-strings          Treat patterns as literal text
  -w, --word-regexp            Match whole words only
  -x, --line-regexp            Match whole lines only

${chalk.bold("Input and output:")}
  -f, --follow                 Follow appended lines (like tail -f)
  -P, --no-pager               Print to stdout instead of opening the pager
      --ansi                   Keep ANSI escape sequences from the input
      --force-binary           View files that look binary
  -h, --help                   Show this help
  -V, --version                Show version number

${chalk.bold("Keys:")}
  j/k, arrows                  Scroll lines and columns (h/l)
  d/u, PgDn/PgUp               Half page down/up
  g/G, Home/End                Top/bottom
  0/$                          Line start/end
  / and ?                      Search (case-insensitive / case-sensitive)
  n/N                          Next/previous match
  f                            Toggle follow mode
  #                            Toggle line numbers
  q, Esc, Ctrl+C               Quit

${chalk.bold("Examples:")}
  # Page through a file with line numbers
  ${APP_NAME} -n src/main.ts

  # Lines matching ERROR with two lines of context, printed without the pager
  ${APP_NAME} -g ERROR -C 2 -P app.log

  # Follow a growing log
  ${APP_NAME} -f app.log
`);
}
