import * as fs from "node:fs";

const NEWLINE = 0x0a;

/**
 * Reads lines appended to a file since the last poll. The file is reopened on
 * every poll; a file that shrank is treated as truncated and read again from
 * the start. A trailing line without "\n" is left for a later poll.
 */
export class TailReader {
	readonly path: string;
	private offset: number;
	private decoder = new TextDecoder("utf-8");

	constructor(path: string, startAtEnd: boolean) {
		this.path = path;
		this.offset = startAtEnd ? fs.statSync(path).size : 0;
	}

	get position(): number {
		return this.offset;
	}

	poll(): string[] {
		const fd = fs.openSync(this.path, "r");
		try {
			const size = fs.fstatSync(fd).size;
			if (size < this.offset) {
				this.offset = 0;
				return [];
			}
			if (size === this.offset) {
				return [];
			}

			const chunk = Buffer.alloc(size - this.offset);
			const bytesRead = fs.readSync(fd, chunk, 0, chunk.length, this.offset);
			const data = chunk.subarray(0, bytesRead);
			const lastNewline = data.lastIndexOf(NEWLINE);
			if (lastNewline === -1) {
				return [];
			}

			const complete = this.decoder.decode(data.subarray(0, lastNewline));
			this.offset += lastNewline + 1;
			return complete.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
		} finally {
			fs.closeSync(fd);
		}
	}
}
