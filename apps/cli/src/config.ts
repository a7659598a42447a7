import { DEFAULT_CHUNK_SIZE } from "@qr-mosaic/core";

export interface CliConfig {
	chunkSize: number;
	passphrase?: string;
}

/**
 * Trims a passphrase; blank input means no passphrase.
 */
export function normalizePassphrase(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

/**
 * Parses a positive integer option.
 * Throws an error naming `name` if the value is anything else.
 */
export function parsePositiveInt(name: string, value: string): number {
	const parsed = Number(value.trim());
	if (value.trim() === "" || !Number.isInteger(parsed) || parsed <= 0) {
		throw new Error(`${name} must be a positive integer, got "${value}"`);
	}
	return parsed;
}

/**
 * Load CLI defaults from environment variables.
 * Throws an error if a variable is set to an invalid value.
 */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
	const chunkSize = env.QR_MOSAIC_CHUNK_SIZE;
	return {
		chunkSize: chunkSize === undefined ? DEFAULT_CHUNK_SIZE : parsePositiveInt("QR_MOSAIC_CHUNK_SIZE", chunkSize),
		passphrase: normalizePassphrase(env.QR_MOSAIC_PASSPHRASE),
	};
}
