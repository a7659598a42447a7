export { parseEnvelope, sha256Hex, unwrapEnvelope, wrapEnvelope } from "./checksum";
export { assertChunkSize, splitChunks } from "./chunker";
export { DEFAULT_CHUNK_SIZE, decode, encode, MosaicCodec, type MosaicCodecOptions } from "./codec";
export { decryptPayload, deriveKey, encryptPayload } from "./crypto";
export type { DecodeOptions, EncodeOptions } from "./domain/codec-options";
export type { DecodeFailure, DecodeResult, DecodeSuccess } from "./domain/decode-result";
export type { Envelope, ParsedPayload, RawLegacyText, StructuredEnvelope, VerifiedPayload } from "./domain/envelope";
export {
	DecryptionError,
	ErrorCode,
	ImageError,
	IntegrityError,
	MissingChunksError,
	MosaicError,
	ScanError,
	ValidationError,
} from "./domain/errors";
export type { Frame } from "./domain/frame";
export type { Logger } from "./domain/logger";
export type { Raster, Rgba } from "./domain/raster";
export type { ErrorCorrectionLevel, IRenderer } from "./domain/renderer";
export type { IScanner } from "./domain/scanner";
export { decodeFrame, encodeFrame, FRAME_SEPARATOR } from "./frame";
export { addIndexLabel, gridSize, type LabelFn, renderMessage, tileImages } from "./layout";
export { decodePng, encodePng } from "./raster";
export { assembleFrames, parseFrames, reassemble } from "./reassembler";
export { QrCodeRenderer, type QrCodeRendererOptions } from "./renderer/qrcode";
export { JsQrScanner, type JsQrScannerOptions } from "./scanner/jsqr";
export { createMessageId, type MessageIdGenerator } from "./utils/message-id";
