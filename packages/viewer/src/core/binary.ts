/** Bytes examined for binary detection */
export const BINARY_SAMPLE_SIZE = 8192;

/** Share of non-printable bytes above which input counts as binary */
const NON_PRINTABLE_THRESHOLD = 0.3;

// Tab, LF, CR, printable ASCII, and every high byte (possible UTF-8 continuation)
function isPrintableByte(byte: number): boolean {
	return byte === 0x09 || byte === 0x0a || byte === 0x0d || (byte >= 0x20 && byte <= 0x7e) || byte >= 0x80;
}

/**
 * Binary when the first 8 KiB contain a NUL byte or more than 30% non-printable bytes.
 * Empty input is text.
 */
export function isBinary(bytes: Uint8Array): boolean {
	const sample = bytes.subarray(0, BINARY_SAMPLE_SIZE);
	if (sample.length === 0) {
		return false;
	}
	if (sample.includes(0)) {
		return true;
	}
	let nonPrintable = 0;
	for (const byte of sample) {
		if (!isPrintableByte(byte)) {
			nonPrintable++;
		}
	}
	return nonPrintable / sample.length > NON_PRINTABLE_THRESHOLD;
}
