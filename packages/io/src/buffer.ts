/**
 * Returns a `Buffer` sharing memory with `data`,
 * or a new `Buffer` containing `data` encoded using `encoding`, if `data` is a string.
 */
export function toBuffer(
    data: Uint8Array | string,
    encoding: BufferEncoding = 'utf8',
): Buffer {
    if (typeof data === 'string') {
        return Buffer.from(data, encoding)
    }

    if (Buffer.isBuffer(data)) {
        return data
    }

    return Buffer.from(data.buffer, data.byteOffset, data.byteLength)
}

/**
 * An empty buffer.
 */
export const EMPTY: Uint8Array = new Uint8Array(0)
