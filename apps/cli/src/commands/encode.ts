import * as fs from "node:fs";
import { ErrorCode, type MosaicCodec, ValidationError } from "@qr-mosaic/core";
import type { CliConfig } from "../config.js";
import { normalizePassphrase } from "../config.js";

export interface EncodeCommandOptions {
	input?: string;
	chunkSize?: string;
	passphrase?: string;
	out: string;
	base64?: boolean;
}

export type EncodeOutcome = { kind: "file"; path: string; bytes: number } | { kind: "base64"; data: string };

function readText(text: string | undefined, input: string | undefined): string {
	if (input === undefined) return text ?? "";
	if (!fs.existsSync(input)) {
		throw new ValidationError(ErrorCode.FILE_NOT_FOUND, `Input file not found: ${input}`);
	}
	return fs.readFileSync(input, "utf-8");
}

/**
 * Encodes the text argument (or the `--input` file) and writes the PNG to
 * `--out`, or returns it base64-encoded with `--base64`.
 */
export function runEncode(text: string | undefined, options: EncodeCommandOptions, config: CliConfig, codec: MosaicCodec): EncodeOutcome {
	const source = readText(text, options.input);
	const chunkSize = options.chunkSize === undefined ? config.chunkSize : Number(options.chunkSize);
	const passphrase = normalizePassphrase(options.passphrase) ?? config.passphrase;

	if (!source.trim()) throw new ValidationError(ErrorCode.EMPTY_TEXT, "Provide some text to encode.");
	const png = codec.encode(source, { chunkSize, passphrase });

	if (options.base64) return { kind: "base64", data: png.toString("base64") };
	fs.writeFileSync(options.out, png);
	return { kind: "file", path: options.out, bytes: png.length };
}
