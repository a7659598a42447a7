export type EncodeOptions = {
	/** Maximum characters per QR symbol. Defaults to 500. */
	chunkSize?: number;
	/** Encrypts the payload when set to a non-empty string. */
	passphrase?: string;
};

export type DecodeOptions = {
	passphrase?: string;
};
