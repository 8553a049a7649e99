import { assert } from '@conduit/error'
import {
    isReader,
    isWriter,
    Reader,
    toBuffer,
    writeAll,
    Writer,
} from '@conduit/io'
import { Duplex as NodeDuplex } from 'readable-stream'

export const DEFAULT_CHUNK_SIZE = 16384

export interface DuplexStreamOptions {
    /**
     * If false, the stream ends the writable side when the readable side ends.
     * Defaults to true.
     */
    allowHalfOpen?: boolean
    /**
     * The maximum number of bytes requested from the reader at once.
     */
    chunkSize?: number
}

/**
 * A Node duplex stream backed by a Reader and a Writer,
 * usually a `Duplex` instance.
 *
 * - Data is read from `source` when the stream needs more data.
 *   `null` or `0` bytes read ends the readable side.
 * - Written data is passed to `source.write` using `writeAll`.
 * - Ending the stream flushes and then closes the writer.
 *
 * The stream is destroyed with the original error, if any of those operations fail.
 */
export class DuplexStream extends NodeDuplex {
    private readonly chunkSize: number

    /**
     * Creates a new DuplexStream.
     * @param source An object which is both a Reader and a Writer.
     */
    public constructor(
        private readonly source: Reader & Writer,
        {
            allowHalfOpen = true,
            chunkSize = DEFAULT_CHUNK_SIZE,
        }: DuplexStreamOptions = {},
    ) {
        super({ allowHalfOpen })
        assert(
            isReader(source) && isWriter(source),
            'Argument "source" must be a Reader and a Writer.',
        )
        assert(
            Number.isSafeInteger(chunkSize) && chunkSize > 0,
            'Argument "chunkSize" must be a positive integer.',
        )
        this.chunkSize = chunkSize
    }

    public _read(): void {
        const buffer = Buffer.allocUnsafe(this.chunkSize)
        this.source.read(buffer).then(
            (length) => {
                /* istanbul ignore else */
                if (!this.destroyed) {
                    this.push(length ? buffer.subarray(0, length) : null)
                }
            },
            (error: Error) => this.destroy(error),
        )
    }

    public _write(
        data: Uint8Array | string,
        encoding: BufferEncoding,
        callback: (error?: Error | null) => void,
    ): void {
        writeAll(this.source, toBuffer(data, encoding)).then(
            () => callback(null),
            callback,
        )
    }

    public _final(callback: (error?: Error | null) => void): void {
        this.source
            .flush()
            .then(() => this.source.close())
            .then(() => callback(null), callback)
    }
}
