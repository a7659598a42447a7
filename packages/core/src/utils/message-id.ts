import { v4 as uuid } from "uuid";

export type MessageIdGenerator = () => string;

/**
 * A fresh 8-character hex message id. Collisions only matter between messages
 * sharing one image, which the reassembler never merges.
 */
export const createMessageId: MessageIdGenerator = () => uuid().replace(/-/g, "").slice(0, 8);
