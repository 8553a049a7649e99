import {
    assert,
    createUnexpectedEofError,
    createWriteZeroError,
} from '@conduit/error'
import { BufferedReader, Reader, Writer } from './types'

const LINE_FEED = 0x0a
const CHUNK_SIZE = 8192

/**
 * Reads bytes up to and including `delimiter`, or up to the end of the stream.
 * Resolves to an empty Buffer, if the reader is already at the end of the stream.
 */
export async function readUntil(
    reader: BufferedReader,
    delimiter: number,
): Promise<Buffer> {
    assert(
        Number.isInteger(delimiter) && delimiter >= 0 && delimiter <= 0xff,
        'Argument "delimiter" must be a byte.',
    )

    const chunks: Buffer[] = []

    for (;;) {
        const available = await reader.fillBuffer()
        if (available.length === 0) {
            break
        }

        const index = available.indexOf(delimiter)
        const length = index >= 0 ? index + 1 : available.length
        // `available` is owned by the reader, so it must be copied.
        chunks.push(Buffer.from(available.subarray(0, length)))
        reader.consume(length)

        if (index >= 0) {
            break
        }
    }

    return Buffer.concat(chunks)
}

/**
 * Reads a line of UTF-8 text including the terminating "\n", if present.
 * Resolves to an empty string at the end of the stream.
 */
export async function readLine(reader: BufferedReader): Promise<string> {
    return (await readUntil(reader, LINE_FEED)).toString('utf8')
}

/**
 * Reads exactly `buffer.length` bytes into `buffer`.
 * Rejects with an UnexpectedEofError, if the stream ends first.
 */
export async function readExact(
    reader: Reader,
    buffer: Uint8Array,
): Promise<void> {
    let offset = 0

    while (offset < buffer.length) {
        const length = await reader.read(buffer.subarray(offset))
        if (length === null || length === 0) {
            throw createUnexpectedEofError(
                `Stream ended after ${offset} of ${buffer.length} bytes.`,
            )
        }
        offset += length
    }
}

/**
 * Reads all bytes until the end of the stream.
 */
export async function readToEnd(reader: Reader): Promise<Buffer> {
    const chunks: Buffer[] = []

    for (;;) {
        const chunk = Buffer.allocUnsafe(CHUNK_SIZE)
        const length = await reader.read(chunk)
        if (length === null || length === 0) {
            break
        }
        chunks.push(chunk.subarray(0, length))
    }

    return Buffer.concat(chunks)
}

/**
 * Writes all of `data`, calling `writer.write` as many times as necessary.
 * Rejects with a WriteZeroError, if the writer stops accepting data.
 */
export async function writeAll(
    writer: Writer,
    data: Uint8Array,
): Promise<void> {
    let offset = 0

    while (offset < data.length) {
        const length = await writer.write(data.subarray(offset))
        if (length === 0) {
            throw createWriteZeroError(
                `Writer accepted ${offset} of ${data.length} bytes.`,
            )
        }
        offset += length
    }
}
