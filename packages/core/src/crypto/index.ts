import { cbc } from "@noble/ciphers/aes";
import { equalBytes } from "@noble/ciphers/utils";
import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha2";
import { concatBytes, randomBytes, utf8ToBytes } from "@noble/hashes/utils";
import { fromUint8Array, toUint8Array } from "js-base64";
import { DecryptionError, ErrorCode } from "../domain/errors";

// Token layout: version (1) | timestamp (8) | iv (16) | ciphertext (16n) | hmac (32)
const VERSION = 0x80;
const HEADER_LENGTH = 1 + 8 + 16;
const TAG_LENGTH = 32;
const BLOCK_LENGTH = 16;
const TOKEN_PATTERN = /^[A-Za-z0-9_-]+={0,2}$/;

const DECRYPTION_FAILED_MESSAGE = "Decryption failed. Wrong passphrase or corrupted data.";

export type DerivedKey = {
	signingKey: Uint8Array;
	encryptionKey: Uint8Array;
};

/**
 * Derives the signing and encryption keys from a passphrase.
 * @returns The two halves of SHA-256(passphrase).
 */
export function deriveKey(passphrase: string): DerivedKey {
	const digest = sha256(utf8ToBytes(passphrase));
	return { signingKey: digest.slice(0, 16), encryptionKey: digest.slice(16) };
}

function encodeTimestamp(seconds: number): Uint8Array {
	const bytes = new Uint8Array(8);
	const view = new DataView(bytes.buffer);
	view.setUint32(0, Math.floor(seconds / 2 ** 32));
	view.setUint32(4, seconds >>> 0);
	return bytes;
}

function toBase64Url(bytes: Uint8Array): string {
	const unpadded = fromUint8Array(bytes, true);
	return unpadded + "=".repeat((4 - (unpadded.length % 4)) % 4);
}

function fail(): DecryptionError {
	return new DecryptionError(ErrorCode.DECRYPTION_FAILED, DECRYPTION_FAILED_MESSAGE);
}

/**
 * Encrypts `text` into an authenticated Fernet token (AES-128-CBC + HMAC-SHA256,
 * URL-safe base64). Without a passphrase the text is returned unchanged.
 */
export function encryptPayload(text: string, passphrase?: string): string {
	if (!passphrase) return text;

	const { signingKey, encryptionKey } = deriveKey(passphrase);
	const iv = randomBytes(16);
	const ciphertext = cbc(encryptionKey, iv).encrypt(utf8ToBytes(text));
	const timestamp = encodeTimestamp(Math.floor(Date.now() / 1000));

	const signed = concatBytes(new Uint8Array([VERSION]), timestamp, iv, ciphertext);
	const tag = hmac(sha256, signingKey, signed);
	return toBase64Url(concatBytes(signed, tag));
}

/**
 * Verifies and decrypts a token produced by `encryptPayload`. Without a
 * passphrase the token is returned unchanged.
 * @throws {DecryptionError} on a wrong passphrase or a malformed, truncated or
 * altered token.
 */
export function decryptPayload(token: string, passphrase?: string): string {
	if (!passphrase) return token;
	if (!TOKEN_PATTERN.test(token)) throw fail();

	const bytes = toUint8Array(token);
	const ciphertextLength = bytes.length - HEADER_LENGTH - TAG_LENGTH;
	if (ciphertextLength < BLOCK_LENGTH || ciphertextLength % BLOCK_LENGTH !== 0) throw fail();
	if (bytes[0] !== VERSION) throw fail();

	const { signingKey, encryptionKey } = deriveKey(passphrase);
	const signed = bytes.subarray(0, bytes.length - TAG_LENGTH);
	const tag = bytes.subarray(bytes.length - TAG_LENGTH);
	if (!equalBytes(hmac(sha256, signingKey, signed), tag)) throw fail();

	const iv = bytes.slice(9, HEADER_LENGTH);
	const ciphertext = bytes.slice(HEADER_LENGTH, bytes.length - TAG_LENGTH);
	let plaintext: Uint8Array;
	try {
		plaintext = cbc(encryptionKey, iv).decrypt(ciphertext);
	} catch {
		throw fail();
	}

	try {
		return new TextDecoder("utf-8", { fatal: true }).decode(plaintext);
	} catch {
		throw fail();
	}
}
