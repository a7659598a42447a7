import * as fs from "node:fs";
import { type DecodeResult, ErrorCode, type MosaicCodec, ValidationError } from "@qr-mosaic/core";
import type { CliConfig } from "../config.js";
import { normalizePassphrase } from "../config.js";

export interface DecodeCommandOptions {
	passphrase?: string;
	json?: boolean;
}

/**
 * Decodes the PNG at `imagePath`. A missing file is reported as a failed
 * result like any other decode failure.
 */
export function runDecode(imagePath: string, options: DecodeCommandOptions, config: CliConfig, codec: MosaicCodec): DecodeResult {
	if (!fs.existsSync(imagePath)) {
		return { ok: false, error: new ValidationError(ErrorCode.FILE_NOT_FOUND, `Image not found: ${imagePath}`), sha256: null };
	}
	const passphrase = normalizePassphrase(options.passphrase) ?? config.passphrase;
	return codec.decode(fs.readFileSync(imagePath), { passphrase });
}
