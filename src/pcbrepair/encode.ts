import { LENGTH_PREFIX_SIZE, POINTER_SIZE } from './format.js';
import { cfb8Encrypt, getExpandedKey } from './cipher.js';
import { ZlibCodec } from './codecs.js';
import type { EncoderOptions } from './types.js';

/**
 * Builds a container around two documents:
 *
 *   [content_len][zlib(content)][description_len][zlib(description)][description_offset][distance = 4]
 *
 * then encrypts it under the requested key variant.
 */
export function encodeContainer(
    content: Uint8Array,
    description: Uint8Array,
    options: EncoderOptions = {}
): Uint8Array {
    const defaults: Required<EncoderOptions> = {
        variant: 'none',
        compressionLevel: 6,
    };
    const opts = { ...defaults, ...options };

    const contentStream = ZlibCodec.compress(content, opts.compressionLevel);
    const descriptionStream = ZlibCodec.compress(description, opts.compressionLevel);

    const descriptionOffset = LENGTH_PREFIX_SIZE + contentStream.length;
    const totalSize = descriptionOffset + LENGTH_PREFIX_SIZE + descriptionStream.length + POINTER_SIZE * 2;
    const buffer = new Uint8Array(totalSize);
    const view = new DataView(buffer.buffer);

    let pos = 0;
    view.setUint32(pos, content.length, true); pos += LENGTH_PREFIX_SIZE;
    buffer.set(contentStream, pos); pos += contentStream.length;
    view.setUint32(pos, description.length, true); pos += LENGTH_PREFIX_SIZE;
    buffer.set(descriptionStream, pos); pos += descriptionStream.length;
    view.setUint32(pos, descriptionOffset, true); pos += POINTER_SIZE;
    view.setUint32(pos, POINTER_SIZE, true);

    return opts.variant === 'none' ? buffer : cfb8Encrypt(buffer, getExpandedKey(opts.variant));
}
