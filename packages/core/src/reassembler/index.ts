import { ErrorCode, MissingChunksError, ScanError } from "../domain/errors";
import type { Frame } from "../domain/frame";
import { decodeFrame } from "../frame";

export type ParsedScan = {
	frames: Frame[];
	/** Number of scanned strings that were not frames. */
	skipped: number;
};

/**
 * Parses every scanned string, keeping the ones that are frames. Strings from
 * stray or foreign symbols are counted and dropped.
 */
export function parseFrames(scanned: readonly string[]): ParsedScan {
	const frames: Frame[] = [];
	for (const raw of scanned) {
		const frame = decodeFrame(raw);
		if (frame) frames.push(frame);
	}
	return { frames, skipped: scanned.length - frames.length };
}

/**
 * Restores the payload of the first message found among the frames.
 *
 * Frames of any other message id are ignored, as are frames of the selected
 * message whose `total` disagrees with the first one seen. Repeated indices
 * keep their first occurrence.
 *
 * @throws {ScanError} if no frame is given.
 * @throws {MissingChunksError} if any index in `[0, total)` is absent.
 */
export function assembleFrames(frames: readonly Frame[]): string {
	const [first] = frames;
	if (!first) throw new ScanError(ErrorCode.INVALID_QR_FORMAT, "Invalid QR format");

	const parts = new Map<number, string>();
	for (const frame of frames) {
		if (frame.messageId !== first.messageId || frame.total !== first.total) continue;
		if (!parts.has(frame.index)) parts.set(frame.index, frame.text);
	}

	const missing: number[] = [];
	const ordered: string[] = [];
	for (let index = 0; index < first.total; index++) {
		const text = parts.get(index);
		if (text === undefined) missing.push(index);
		else ordered.push(text);
	}
	if (missing.length > 0) throw new MissingChunksError(missing);

	return ordered.join("");
}

/**
 * Parses scanned strings and restores the payload they carry.
 * @throws {ScanError} if none of the strings is a frame.
 * @throws {MissingChunksError} if the selected message is incomplete.
 */
export function reassemble(scanned: readonly string[]): string {
	return assembleFrames(parseFrames(scanned).frames);
}
