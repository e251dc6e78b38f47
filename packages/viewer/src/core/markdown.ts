import { type MarkedToken, marked, type Token, type Tokens } from "marked";
import { Document, type Encoding, type Line, type StyledSpan, styledSpan } from "./document.js";
import { mergeStyle, PLAIN, type SpanStyle } from "./style.js";

const RULE = "─".repeat(40);
const QUOTE_PREFIX = "│ ";
const BULLETS = ["• ", "◦ ", "▪ "];

const FRAME: SpanStyle = { fg: "yellow" };
const DIM: SpanStyle = { fg: "darkGray" };
const MARKER: SpanStyle = { fg: "yellow" };
const TASK: SpanStyle = { fg: "magenta" };
const CODE: SpanStyle = { fg: "green" };
const INLINE_CODE: SpanStyle = { fg: "cyan" };
const IMAGE: SpanStyle = { fg: "magenta" };

const HEADING_STYLES: SpanStyle[] = [
	{ fg: "white", bold: true },
	{ fg: "cyan", bold: true },
	{ fg: "green", bold: true },
	{ fg: "magenta", bold: true },
	{ fg: "yellow", bold: true },
	{ fg: "darkGray", bold: true },
];

const HEADING_GLYPHS = ["", "", "▸ ", "◆ ", "◇ ", "· "];

// `{#id .class key=value}` after heading text
const headingAttributesRegex = /\s*\{(?:\s*(?:[#.][\w-]+|[\w-]+=\S*))+\s*\}\s*$/u;

const MARKED_TOKEN_TYPES = new Set<string>([
	"blockquote",
	"br",
	"code",
	"codespan",
	"def",
	"del",
	"em",
	"escape",
	"heading",
	"hr",
	"html",
	"image",
	"link",
	"list",
	"list_item",
	"paragraph",
	"space",
	"strong",
	"table",
	"text",
]);

/** Narrow a lexer token to the built-in token union so `switch (token.type)` discriminates */
function isMarkedToken(token: Token): token is MarkedToken {
	return MARKED_TOKEN_TYPES.has(token.type);
}

interface ListFrame {
	ordered: boolean;
	counter: number;
}

class MarkdownRenderer {
	private lines: Line[] = [];
	private current: StyledSpan[] = [];
	private lineHasContent = false;
	private lastLineBlank = true;
	private styleStack: SpanStyle[] = [PLAIN];
	private lists: ListFrame[] = [];
	private quoteDepth = 0;

	render(tokens: Token[]): Line[] {
		for (const token of tokens) {
			this.renderBlock(token);
		}
		if (this.current.length > 0) {
			this.flushLine();
		}
		return this.lines;
	}

	private renderBlock(token: Token): void {
		if (!isMarkedToken(token)) return;

		switch (token.type) {
			case "heading":
				this.renderHeading(token);
				break;
			case "paragraph":
				this.blockGap();
				this.renderInline(token.tokens);
				this.flushLine();
				break;
			case "text":
				this.renderTextToken(token);
				this.flushLine();
				break;
			case "code":
				this.renderCode(token);
				break;
			case "blockquote":
				this.blockGap();
				this.quoteDepth++;
				for (const child of token.tokens) {
					this.renderBlock(child);
				}
				if (this.current.length > 0) {
					this.flushLine();
				}
				this.quoteDepth--;
				break;
			case "list":
				this.renderList(token);
				break;
			case "table":
				this.renderTable(token);
				break;
			case "hr":
				this.blockGap();
				this.emit(RULE, DIM);
				this.flushLine();
				break;
			default:
				// html, def and space produce nothing
				break;
		}
	}

	private renderHeading(token: Tokens.Heading): void {
		this.blockGap();
		const level = Math.min(Math.max(token.depth, 1), 6);
		const style = HEADING_STYLES[level - 1];

		if (level === 1) {
			this.emit(`╔${"═".repeat(50)}╗`, FRAME);
			this.flushLine();
			this.emit("║  ", FRAME);
		} else if (level === 2) {
			this.emit("──◈ ", FRAME);
		} else {
			this.emit(HEADING_GLYPHS[level - 1], style);
		}

		this.withStyle(style, () => this.renderInline(stripHeadingAttributes(token.tokens)));

		if (level === 2) {
			this.emit(` ◈${"─".repeat(30)}`, FRAME);
		}
		this.flushLine();
		if (level === 1) {
			this.emit(`╚${"═".repeat(50)}╝`, FRAME);
			this.flushLine();
		}
		this.blankLine();
	}

	private renderCode(token: Tokens.Code): void {
		this.blockGap();
		const lang = token.lang?.trim() ?? "";
		this.emit(lang.length > 0 ? `─── ${lang} ${"─".repeat(30)}` : RULE, DIM);
		this.flushLine();
		for (const row of token.text.split("\n")) {
			this.emit(row, CODE);
			this.flushLine();
		}
		this.emit(RULE, DIM);
		this.flushLine();
	}

	private renderList(token: Tokens.List): void {
		if (this.lists.length === 0) {
			this.blockGap();
		} else if (this.current.length > 0) {
			this.flushLine();
		}
		this.lists.push({ ordered: token.ordered, counter: typeof token.start === "number" ? token.start : 1 });
		for (const item of token.items) {
			this.renderListItem(item);
		}
		this.lists.pop();
	}

	private renderListItem(item: Tokens.ListItem): void {
		if (this.current.length > 0) {
			this.flushLine();
		}
		const depth = this.lists.length;
		const frame = this.lists[depth - 1];
		const indent = "  ".repeat(depth - 1);
		let marker: string;
		if (frame?.ordered) {
			marker = `${indent}${frame.counter}. `;
			frame.counter++;
		} else {
			marker = `${indent}${BULLETS[Math.min(depth, BULLETS.length) - 1]}`;
		}
		this.emit(marker, MARKER);
		if (item.task) {
			this.emit(item.checked ? "[x] " : "[ ] ", TASK);
		}

		let wroteText = false;
		for (const child of item.tokens) {
			if (!isMarkedToken(child)) continue;
			if (child.type === "text" || child.type === "paragraph") {
				if (wroteText) {
					this.flushLine();
					this.emit(" ".repeat(marker.length), PLAIN);
				}
				if (child.type === "text") {
					this.renderTextToken(child);
				} else {
					this.renderInline(child.tokens);
				}
				wroteText = true;
			} else {
				if (this.current.length > 0) {
					this.flushLine();
				}
				this.renderBlock(child);
			}
		}
		if (this.current.length > 0) {
			this.flushLine();
		}
	}

	private renderTable(token: Tokens.Table): void {
		this.blockGap();
		const rows = [token.header, ...token.rows];
		for (const row of rows) {
			for (const cell of row) {
				this.renderInline(cell.tokens);
				this.emitText(" | ");
			}
			this.flushLine();
		}
	}

	private renderTextToken(token: Tokens.Text): void {
		if (token.tokens && token.tokens.length > 0) {
			this.renderInline(token.tokens);
		} else {
			this.emitText(token.text);
		}
	}

	private renderInline(tokens: Token[]): void {
		for (const token of tokens) {
			if (!isMarkedToken(token)) continue;

			switch (token.type) {
				case "text":
					this.renderTextToken(token);
					break;
				case "escape":
					this.emitText(token.text);
					break;
				case "strong":
					this.withStyle({ bold: true }, () => this.renderInline(token.tokens));
					break;
				case "em":
					this.withStyle({ fg: "yellow" }, () => this.renderInline(token.tokens));
					break;
				case "del":
					this.withStyle(DIM, () => this.renderInline(token.tokens));
					break;
				case "codespan":
					this.emit(token.text, INLINE_CODE);
					break;
				case "link":
					this.withStyle({ fg: "blue", underline: true }, () => this.renderInline(token.tokens));
					break;
				case "image":
					this.emit("[Image: ", IMAGE);
					this.withStyle(IMAGE, () => this.emitText(token.text));
					this.emit("]", IMAGE);
					break;
				case "br":
					this.flushLine();
					break;
				default:
					break;
			}
		}
	}

	private currentStyle(): SpanStyle {
		return this.styleStack[this.styleStack.length - 1] ?? PLAIN;
	}

	private withStyle(style: SpanStyle, render: () => void): void {
		this.styleStack.push(mergeStyle(this.currentStyle(), style));
		render();
		this.styleStack.pop();
	}

	/**
	 * Inline text in the current style. A soft line break is a space, except
	 * inside a block quote where it starts a new prefixed row.
	 */
	private emitText(text: string): void {
		const parts = text.split("\n");
		for (let i = 0; i < parts.length; i++) {
			if (i > 0) {
				if (this.quoteDepth > 0) {
					this.flushLine();
				} else {
					this.emit(" ", this.currentStyle());
				}
			}
			this.emit(parts[i], this.currentStyle());
		}
	}

	private emit(text: string, style: SpanStyle): void {
		if (text.length === 0) return;
		this.startLine();
		this.current.push(styledSpan(text, style));
		this.lineHasContent = true;
	}

	private startLine(): void {
		if (this.current.length === 0 && this.quoteDepth > 0) {
			this.current.push(styledSpan(QUOTE_PREFIX.repeat(this.quoteDepth), DIM));
		}
	}

	private flushLine(): void {
		this.lines.push({ number: this.lines.length + 1, spans: this.current, isMatch: false, isContext: false });
		this.current = [];
		this.lastLineBlank = !this.lineHasContent;
		this.lineHasContent = false;
	}

	private blankLine(): void {
		this.startLine();
		this.flushLine();
	}

	/** Separate a top-level block from the one before it by exactly one blank row */
	private blockGap(): void {
		if (this.current.length > 0) {
			this.flushLine();
		}
		if (this.lists.length === 0 && this.lines.length > 0 && !this.lastLineBlank) {
			this.blankLine();
		}
	}
}

function stripHeadingAttributes(tokens: Token[]): Token[] {
	const last = tokens[tokens.length - 1];
	if (last === undefined || !isMarkedToken(last) || last.type !== "text" || !headingAttributesRegex.test(last.text)) {
		return tokens;
	}
	const text = last.text.replace(headingAttributesRegex, "");
	const stripped: Tokens.Text = { type: "text", raw: text, text };
	return [...tokens.slice(0, -1), stripped];
}

/**
 * Render CommonMark (with GFM tables, strikethrough and task lists) into styled,
 * sequentially numbered lines.
 */
export function renderMarkdown(text: string, sourceName: string, encoding: Encoding): Document {
	const tokens = marked.lexer(text, { gfm: true });
	const lines = new MarkdownRenderer().render(tokens);
	return new Document(lines, sourceName, encoding);
}
