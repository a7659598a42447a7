import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { z } from "zod";
import type { ParsedPayload, VerifiedPayload } from "../domain/envelope";
import { IntegrityError } from "../domain/errors";

// Unknown keys are stripped, so later envelope versions still verify.
const EnvelopeSchema = z.object({
	hash: z.string(),
	text: z.string(),
});

/**
 * Lowercase hex SHA-256 of the UTF-8 bytes of `text`.
 */
export function sha256Hex(text: string): string {
	return bytesToHex(sha256(utf8ToBytes(text)));
}

/**
 * Wraps `text` in a `{ hash, text }` envelope and serializes it as JSON.
 */
export function wrapEnvelope(text: string): string {
	return JSON.stringify({ hash: sha256Hex(text), text });
}

function parseJson(payload: string): { ok: true; value: unknown } | { ok: false } {
	try {
		return { ok: true, value: JSON.parse(payload) };
	} catch {
		return { ok: false };
	}
}

/**
 * Classifies a payload as a structured envelope or as legacy plain text.
 * Anything that is not JSON of an object with the string fields `hash` and
 * `text` is legacy text. Other keys are ignored.
 */
export function parseEnvelope(payload: string): ParsedPayload {
	const json = parseJson(payload);
	if (!json.ok) return { kind: "legacy", text: payload };

	const envelope = EnvelopeSchema.safeParse(json.value);
	if (!envelope.success) return { kind: "legacy", text: payload };

	return { kind: "envelope", hash: envelope.data.hash, text: envelope.data.text };
}

/**
 * Parses and verifies a payload.
 * @throws {IntegrityError} if an envelope's hash does not match its text.
 */
export function unwrapEnvelope(payload: string): VerifiedPayload {
	const parsed = parseEnvelope(payload);
	if (parsed.kind === "legacy") return { text: parsed.text, sha256: null };

	if (sha256Hex(parsed.text) !== parsed.hash) {
		throw new IntegrityError(parsed.hash);
	}
	return { text: parsed.text, sha256: parsed.hash };
}
