/**
 * One step of a key path: a lowercase name token or an array index.
 */
export type KeySegment = string | number

/**
 * Parsed, normalized configuration key. The empty array is the root key.
 */
export type Key = readonly KeySegment[]
