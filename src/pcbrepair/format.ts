/** First byte of every zlib stream written by the vendor tools (deflate, 32K window). */
export const ZLIB_MAGIC = 0x78;

// Content block layout:
// [content_len (u32 LE)] [zlib stream ...]
// Description block layout, placed anywhere after the content stream:
// [description_len (u32 LE)] [zlib stream ...]
// Trailer:
// ... [description_offset (u32 LE)] ... [distance (u32 LE)]
// `distance` counts back from the start of the final word to the end of the
// slot holding `description_offset`.
export const LENGTH_PREFIX_SIZE = 4;
export const POINTER_SIZE = 4;
export const MAGIC_OFFSET = LENGTH_PREFIX_SIZE;

/** Keys the decoder can try, in the order the vendor tools are probed. */
export type KeyVariant = 'none' | 'fz' | 'cae';

export const DEFAULT_TRIAL_ORDER: readonly KeyVariant[] = ['none', 'fz', 'cae'];

export const DEFAULT_MAX_DECOMPRESSED_SIZE = 256 * 1024 * 1024;

export enum Units {
    Mils = 'mils',
    Millimeters = 'mm',
}

/** Content document delimiters. */
export const CONTENT_FIELD_SEPARATOR = '!';
export const ANNOTATION_ROW = 'A';
export const DATA_ROW = 'S';

/** Description document delimiters. */
export const HEADER_FIELD_SEPARATOR = '|';
export const HEADER_LINE_BREAK = '\r\n';
export const TABLE_FIELD_SEPARATOR = '\t';
export const TABLE_SKIPPED_ROWS = 2;
