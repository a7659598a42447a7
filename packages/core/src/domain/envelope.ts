/**
 * The checksum wrapper's on-wire shape. Serialized as a JSON object with
 * exactly these two string fields.
 */
export type Envelope = {
	hash: string;
	text: string;
};

export type StructuredEnvelope = Envelope & {
	kind: "envelope";
};

/**
 * A payload that is not an envelope, kept for images produced before the
 * checksum layer existed.
 */
export type RawLegacyText = {
	kind: "legacy";
	text: string;
};

export type ParsedPayload = StructuredEnvelope | RawLegacyText;

export type VerifiedPayload = {
	text: string;
	/** The verified hash, or null for legacy payloads that carry none. */
	sha256: string | null;
};
