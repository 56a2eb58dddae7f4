/** Hex-encoded SHA-256 hash */
export type HashHex = string;
