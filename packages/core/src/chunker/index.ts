import { ErrorCode, ValidationError } from "../domain/errors";

/**
 * @throws {ValidationError} unless `chunkSize` is a positive integer.
 */
export function assertChunkSize(chunkSize: number): void {
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new ValidationError(ErrorCode.INVALID_CHUNK_SIZE, `Chunk size must be a positive integer, got ${chunkSize}`);
	}
}

/**
 * Splits `payload` into contiguous slices of at most `chunkSize` characters.
 * Counts Unicode code points so a surrogate pair never straddles two slices.
 */
export function splitChunks(payload: string, chunkSize: number): string[] {
	assertChunkSize(chunkSize);

	const characters = Array.from(payload);
	const chunks: string[] = [];
	for (let offset = 0; offset < characters.length; offset += chunkSize) {
		chunks.push(characters.slice(offset, offset + chunkSize).join(""));
	}
	return chunks;
}
