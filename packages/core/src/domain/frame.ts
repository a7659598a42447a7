/**
 * One fragment of a message together with the metadata needed to put it back
 * in place. A frame is what a single QR symbol carries.
 */
export interface Frame {
	/** Short random identifier shared by every frame of one encode call. */
	messageId: string;
	/** 0-based position of this fragment, always below `total`. */
	index: number;
	total: number;
	text: string;
}
