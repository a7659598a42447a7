import { unwrapEnvelope, wrapEnvelope } from "./checksum";
import { assertChunkSize, splitChunks } from "./chunker";
import { decryptPayload, encryptPayload } from "./crypto";
import type { DecodeOptions, EncodeOptions } from "./domain/codec-options";
import type { DecodeResult } from "./domain/decode-result";
import { ErrorCode, IntegrityError, MosaicError, ScanError, ValidationError } from "./domain/errors";
import type { Frame } from "./domain/frame";
import type { Logger } from "./domain/logger";
import type { Raster } from "./domain/raster";
import type { IRenderer } from "./domain/renderer";
import type { IScanner } from "./domain/scanner";
import { addIndexLabel, renderMessage } from "./layout";
import { decodePng, encodePng } from "./raster";
import { assembleFrames, parseFrames } from "./reassembler";
import { QrCodeRenderer } from "./renderer/qrcode";
import { JsQrScanner } from "./scanner/jsqr";
import { createMessageId, type MessageIdGenerator } from "./utils/message-id";

export const DEFAULT_CHUNK_SIZE = 500;

export type MosaicCodecOptions = {
	renderer?: IRenderer;
	scanner?: IScanner;
	/** Called once per `encode` for the id shared by its frames. */
	createMessageId?: MessageIdGenerator;
	/** Draw the `n/total` caption under each symbol. Defaults to true. */
	labels?: boolean;
	logger?: Logger;
};

/**
 * Turns text into a PNG mosaic of QR symbols and back.
 *
 * Encoding: checksum envelope, optional encryption, chunking, one frame per
 * chunk, one symbol per frame, tiled. Decoding runs the same steps in reverse
 * and reports failures as a `DecodeResult` instead of throwing.
 */
export class MosaicCodec {
	private readonly renderer: IRenderer;
	private readonly scanner: IScanner;
	private readonly createMessageId: MessageIdGenerator;
	private readonly labels: boolean;
	private readonly logger: Logger;

	constructor(options: MosaicCodecOptions = {}) {
		this.renderer = options.renderer ?? new QrCodeRenderer();
		this.scanner = options.scanner ?? new JsQrScanner();
		this.createMessageId = options.createMessageId ?? createMessageId;
		this.labels = options.labels ?? true;
		this.logger = options.logger ?? console;
	}

	/**
	 * Builds the frames `encode` would render, without rendering them.
	 * @throws {ValidationError} for empty text or an invalid chunk size.
	 */
	public frames(text: string, options: EncodeOptions = {}): Frame[] {
		const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
		if (!text) throw new ValidationError(ErrorCode.EMPTY_TEXT, "Provide some text to encode.");
		assertChunkSize(chunkSize);

		const payload = encryptPayload(wrapEnvelope(text), options.passphrase);
		const chunks = splitChunks(payload, chunkSize);
		const messageId = this.createMessageId();
		return chunks.map((chunk, index) => ({ messageId, index, total: chunks.length, text: chunk }));
	}

	/**
	 * Renders the mosaic as a raster image.
	 * @throws {ValidationError} for empty text, an invalid chunk size, or a
	 * chunk too large for one symbol.
	 */
	public render(text: string, options: EncodeOptions = {}): Raster {
		const frames = this.frames(text, options);
		return renderMessage(frames, this.renderer, this.labels ? addIndexLabel : null);
	}

	/**
	 * Encodes `text` into PNG bytes.
	 * @throws {ValidationError} for empty text, an invalid chunk size, or a
	 * chunk too large for one symbol. No image is produced on failure.
	 */
	public encode(text: string, options: EncodeOptions = {}): Buffer {
		return encodePng(this.render(text, options));
	}

	/**
	 * Decodes a PNG mosaic back into text, verifying its checksum.
	 */
	public decode(image: Uint8Array, options: DecodeOptions = {}): DecodeResult {
		try {
			const result = this.decodeRaster(decodePng(image), options);
			this.logger.debug(`Decoded ${Array.from(result.text).length} characters${result.sha256 ? ` (sha256 ${result.sha256})` : ""}`);
			return { ok: true, ...result };
		} catch (error) {
			if (error instanceof IntegrityError) return { ok: false, error, sha256: error.storedHash };
			if (error instanceof MosaicError) return { ok: false, error, sha256: null };
			throw error;
		}
	}

	private decodeRaster(raster: Raster, options: DecodeOptions): { text: string; sha256: string | null } {
		const scanned = this.scanRaster(raster);
		if (scanned.length === 0) throw new ScanError(ErrorCode.NO_QR_CODES, "No QR codes found");

		const { frames, skipped } = parseFrames(scanned);
		if (skipped > 0) this.logger.warn(`Skipped ${skipped} QR symbol(s) that are not mosaic frames`);

		const payload = assembleFrames(frames);
		return unwrapEnvelope(decryptPayload(payload, options.passphrase));
	}

	private scanRaster(raster: Raster): string[] {
		try {
			return this.scanner.scan(raster);
		} catch (error) {
			if (error instanceof MosaicError) throw error;
			this.logger.warn("QR scanner failed", error);
			throw new ScanError(ErrorCode.NO_QR_CODES, "No QR codes found");
		}
	}
}

const defaultCodec = new MosaicCodec();

/**
 * Encodes `text` into PNG bytes with the default renderer.
 */
export function encode(text: string, options?: EncodeOptions): Buffer {
	return defaultCodec.encode(text, options);
}

/**
 * Decodes PNG bytes with the default scanner.
 */
export function decode(image: Uint8Array, options?: DecodeOptions): DecodeResult {
	return defaultCodec.decode(image, options);
}
