import type { Frame } from "../domain/frame";

export const FRAME_SEPARATOR = "|";

const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Serializes a frame as `messageId|index|total|text`.
 */
export function encodeFrame(frame: Frame): string {
	return [frame.messageId, frame.index, frame.total, frame.text].join(FRAME_SEPARATOR);
}

/**
 * Cuts `raw` at the first `cuts` separators; the last field keeps the rest verbatim.
 */
function splitFields(raw: string, cuts: number): string[] {
	const fields: string[] = [];
	let start = 0;
	for (let i = 0; i < cuts; i++) {
		const end = raw.indexOf(FRAME_SEPARATOR, start);
		if (end === -1) break;
		fields.push(raw.slice(start, end));
		start = end + FRAME_SEPARATOR.length;
	}
	fields.push(raw.slice(start));
	return fields;
}

function parseUnsigned(value: string): number | null {
	if (!UNSIGNED_INTEGER.test(value)) return null;
	const parsed = Number.parseInt(value, 10);
	return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Parses a scanned string as a frame.
 * @returns The frame, or null when the string is not one (too few fields,
 * non-numeric index or total, or an index outside `[0, total)`).
 */
export function decodeFrame(raw: string): Frame | null {
	const fields = splitFields(raw, 3);
	if (fields.length !== 4) return null;

	const [messageId, indexField, totalField, text] = fields;
	const index = parseUnsigned(indexField);
	const total = parseUnsigned(totalField);
	if (index === null || total === null) return null;
	if (total < 1 || index >= total) return null;

	return { messageId, index, total, text };
}
