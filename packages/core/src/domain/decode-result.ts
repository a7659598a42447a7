import type { MosaicError } from "./errors";

export type DecodeSuccess = {
	ok: true;
	text: string;
	/** Verified SHA-256 of the text, or null for a legacy payload without one. */
	sha256: string | null;
};

export type DecodeFailure = {
	ok: false;
	error: MosaicError;
	/**
	 * Set only when the envelope was readable but its hash did not match. The
	 * value is untrusted and meant for display.
	 */
	sha256: string | null;
};

export type DecodeResult = DecodeSuccess | DecodeFailure;
