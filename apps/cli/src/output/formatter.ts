import type { DecodeResult, MosaicError } from "@qr-mosaic/core";
import chalk from "chalk";
import type { EncodeOutcome } from "../commands/encode.js";

/**
 * Format a decode result the way the JSON API shaped it: `{ data, sha256 }`
 * on success, `{ error, code, sha256 }` on failure.
 */
export function formatDecodeJson(result: DecodeResult): string {
	if (result.ok) return JSON.stringify({ data: result.text, sha256: result.sha256 });
	return JSON.stringify({ error: result.error.message, code: result.error.code, sha256: result.sha256 });
}

/**
 * Format a decode result for a terminal.
 */
export function formatDecodeResult(result: DecodeResult): string {
	if (result.ok) {
		const hash = result.sha256 ? chalk.green(`✓ sha256 ${result.sha256}`) : chalk.yellow("⚠ no checksum (legacy payload)");
		return `${result.text}\n${chalk.gray("─────────────────────────────────────")}\n${hash}`;
	}
	const lines = [formatError(result.error)];
	if (result.sha256) lines.push(chalk.gray(`stored sha256 (untrusted): ${result.sha256}`));
	return lines.join("\n");
}

export function formatError(error: MosaicError): string {
	return `${chalk.red("✗")} ${chalk.bold(error.code)}: ${error.message}`;
}

export function formatEncodeOutcome(outcome: EncodeOutcome): string {
	if (outcome.kind === "base64") return outcome.data;
	return `${chalk.green("✓")} Wrote ${outcome.bytes} bytes to ${chalk.cyan(outcome.path)}`;
}
