/**
 * Errors surfaced to the user. Each carries the offending path, pattern or
 * range and maps to the process exit code.
 */

/** Exit code for general errors (missing input, I/O, binary input, encoding) */
export const EXIT_ERROR = 1;

/** Exit code for invalid arguments (bad regex, bad line range, bad option value) */
export const EXIT_INVALID_ARGS = 2;

export type ViewerErrorDetail =
	| { kind: "io"; path: string; cause: string }
	| { kind: "invalidRegex"; pattern: string; cause: string }
	| { kind: "emptyPattern" }
	| { kind: "binaryFile"; path: string }
	| { kind: "invalidLineRange"; range: string }
	| { kind: "encoding"; path: string }
	| { kind: "noInput" }
	| { kind: "invalidArgument"; message: string };

function formatDetail(detail: ViewerErrorDetail): string {
	switch (detail.kind) {
		case "io":
			return `I/O error for '${detail.path}': ${detail.cause}`;
		case "invalidRegex":
			return `Invalid regex pattern '${detail.pattern}': ${detail.cause}`;
		case "emptyPattern":
			return "Empty pattern provided. Did you mean to omit -s/-g?";
		case "binaryFile":
			return `Binary file detected: '${detail.path}'. Use --force-binary to view anyway`;
		case "invalidLineRange":
			return `Invalid line range format: '${detail.range}'. Expected formats: X:Y, :Y, X:, or X`;
		case "encoding":
			return `Failed to detect or convert encoding for '${detail.path}'`;
		case "noInput":
			return "No input file specified. Use 'mat <file>' or pipe data to stdin.";
		case "invalidArgument":
			return detail.message;
	}
}

export class ViewerError extends Error {
	readonly detail: ViewerErrorDetail;

	constructor(detail: ViewerErrorDetail) {
		super(formatDetail(detail));
		this.name = "ViewerError";
		this.detail = detail;
	}

	get exitCode(): number {
		switch (this.detail.kind) {
			case "invalidRegex":
			case "invalidLineRange":
			case "invalidArgument":
				return EXIT_INVALID_ARGS;
			default:
				return EXIT_ERROR;
		}
	}
}

/** Message of an unknown thrown value, for wrapping as a cause */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
