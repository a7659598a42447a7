export enum ErrorCode {
	// Caller input errors
	EMPTY_TEXT = "EMPTY_TEXT",
	INVALID_CHUNK_SIZE = "INVALID_CHUNK_SIZE",
	CHUNK_TOO_LARGE = "CHUNK_TOO_LARGE",
	NO_IMAGES = "NO_IMAGES",
	FILE_NOT_FOUND = "FILE_NOT_FOUND",

	// Image errors
	INVALID_IMAGE = "INVALID_IMAGE",

	// Scan errors
	NO_QR_CODES = "NO_QR_CODES",
	INVALID_QR_FORMAT = "INVALID_QR_FORMAT",
	MISSING_CHUNKS = "MISSING_CHUNKS",

	// Crypto errors
	DECRYPTION_FAILED = "DECRYPTION_FAILED",

	// Checksum errors
	INTEGRITY_MISMATCH = "INTEGRITY_MISMATCH",
}

export class MosaicError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
	) {
		super(message || code);
		this.name = code;
	}
}

export class ValidationError extends MosaicError {}
export class ImageError extends MosaicError {}
export class ScanError extends MosaicError {}
export class DecryptionError extends MosaicError {}

export class MissingChunksError extends MosaicError {
	constructor(public readonly missing: readonly number[]) {
		super(ErrorCode.MISSING_CHUNKS, `Missing QR chunks: [${missing.join(", ")}]`);
	}
}

/**
 * The envelope parsed but its hash does not match its text. `storedHash` is
 * whatever the envelope claimed and is untrusted.
 */
export class IntegrityError extends MosaicError {
	constructor(public readonly storedHash: string) {
		super(ErrorCode.INTEGRITY_MISMATCH, "Integrity check failed (SHA-256 mismatch)");
	}
}
