import * as fs from "node:fs";
import * as path from "node:path";
import { Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import hljs from "highlight.js";
import { getAssetsDir } from "../config.js";
import { errorMessage } from "../errors.js";
import { logDebug } from "../log.js";
import type { SyntaxTheme } from "../theme/syntax-theme.js";
import { type Document, type Line, lineText, type StyledSpan, styledSpan } from "./document.js";
import { fileExtension } from "./ingest.js";
import { mergeStyle, type SpanStyle, stylesEqual } from "./style.js";

const LanguageTableSchema = Type.Object({
	extensions: Type.Record(Type.String(), Type.String()),
	fileNames: Type.Record(Type.String(), Type.String()),
});

const validateLanguageTable = TypeCompiler.Compile(LanguageTableSchema);

interface LanguageTable {
	extensions: Map<string, string>;
	fileNames: Map<string, string>;
}

let languageTable: LanguageTable | undefined;

function getLanguageTable(): LanguageTable {
	if (languageTable) {
		return languageTable;
	}
	const tablePath = path.join(getAssetsDir(), "languages.json");
	const json: unknown = JSON.parse(fs.readFileSync(tablePath, "utf-8"));
	if (!validateLanguageTable.Check(json)) {
		const details = Array.from(validateLanguageTable.Errors(json))
			.map((e) => `  - ${e.path || "/"}: ${e.message}`)
			.join("\n");
		throw new Error(`Invalid language table "${tablePath}":\n${details}`);
	}
	languageTable = {
		extensions: new Map(Object.entries(json.extensions)),
		fileNames: new Map(Object.entries(json.fileNames)),
	};
	return languageTable;
}

function knownLanguage(name: string | undefined): string | undefined {
	return name !== undefined && hljs.getLanguage(name) ? name : undefined;
}

/**
 * Choose a highlight.js grammar. An explicit language is looked up as a
 * grammar name or alias, then as a file extension. Otherwise the source name
 * decides: special file names, the extension table, then the extension as a
 * grammar alias.
 */
export function resolveLanguage(explicit: string | undefined, sourceName: string): string | undefined {
	const table = getLanguageTable();
	if (explicit !== undefined) {
		return knownLanguage(explicit) ?? knownLanguage(table.extensions.get(explicit.toLowerCase()));
	}

	const byName = knownLanguage(table.fileNames.get(path.basename(sourceName)));
	if (byName) {
		return byName;
	}
	const ext = fileExtension(sourceName) ?? path.basename(sourceName).toLowerCase();
	return knownLanguage(table.extensions.get(ext)) ?? knownLanguage(ext);
}

// highlight.js output: opening spans, closing spans, the entities escapeHTML emits, and text
const htmlTokenRegex = /<span class="([^"]*)">|<\/span>|&(amp|lt|gt|quot|#x27|#39);|[^<&]+|[<&]/g;

const ENTITIES: Record<string, string> = {
	amp: "&",
	lt: "<",
	gt: ">",
	quot: '"',
	"#x27": "'",
	"#39": "'",
};

/** Convert highlight.js HTML into styled spans, one array per source line */
export function htmlToStyledLines(html: string, theme: SyntaxTheme): StyledSpan[][] {
	const lines: StyledSpan[][] = [[]];
	const styles: SpanStyle[] = [theme.base];

	const append = (text: string) => {
		const style = styles[styles.length - 1] ?? theme.base;
		const parts = text.split("\n");
		for (let i = 0; i < parts.length; i++) {
			if (i > 0) {
				lines.push([]);
			}
			const part = parts[i];
			if (!part) continue;
			const spans = lines[lines.length - 1];
			if (!spans) continue;
			const last = spans[spans.length - 1];
			if (last && stylesEqual(last.style, style)) {
				last.text += part;
			} else {
				spans.push(styledSpan(part, style));
			}
		}
	};

	for (const match of html.matchAll(htmlTokenRegex)) {
		const [token, className, entity] = match;
		if (className !== undefined) {
			const parent = styles[styles.length - 1] ?? theme.base;
			const scoped = theme.styleForClass(className);
			styles.push(scoped ? mergeStyle(parent, scoped) : parent);
		} else if (token === "</span>") {
			if (styles.length > 1) {
				styles.pop();
			}
		} else if (entity !== undefined) {
			append(ENTITIES[entity] ?? token);
		} else {
			append(token);
		}
	}
	return lines;
}

function isHighlightable(line: Line): boolean {
	return line.number !== 0 && !line.isContext;
}

/**
 * Color a document with a grammar and syntax theme. The text is tokenized as a
 * whole so multi-line constructs carry across rows. Separator and context rows
 * keep their styling, and any row whose colored text would differ from the
 * original is left as it was. Without a grammar the document is returned as is.
 */
export function highlightDocument(document: Document, language: string | undefined, theme: SyntaxTheme): Document {
	if (language === undefined || document.lines.length === 0) {
		return document;
	}

	const texts = document.lines.map(lineText);
	let styled: StyledSpan[][];
	try {
		const html = hljs.highlight(texts.join("\n"), { language, ignoreIllegals: true }).value;
		styled = htmlToStyledLines(html, theme);
	} catch (error) {
		logDebug(`Syntax coloring with ${language} failed: ${errorMessage(error)}`);
		return document;
	}
	if (styled.length !== document.lines.length) {
		logDebug(`Syntax coloring with ${language} produced ${styled.length} rows for ${document.lines.length} lines`);
		return document;
	}

	const lines = document.lines.map((line, index) => {
		const spans = styled[index];
		if (!spans || !isHighlightable(line)) {
			return line;
		}
		const text = spans.map((span) => span.text).join("");
		if (text !== texts[index]) {
			logDebug(`Syntax coloring left line ${line.number} unstyled`);
			return line;
		}
		return { ...line, spans };
	});
	return document.withLines(lines);
}
