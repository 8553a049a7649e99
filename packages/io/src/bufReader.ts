import { assert } from '@conduit/error'
import { BufferedReader, Reader } from './types'

export const DEFAULT_CAPACITY = 8192

export interface BufReaderOptions {
    /**
     * The size of the internal buffer in bytes.
     */
    capacity?: number
}

/**
 * Adds an internal buffer to any Reader.
 *
 * Reads which are at least as large as the internal buffer are passed directly
 * to the wrapped reader while the internal buffer is empty.
 */
export class BufReader<R extends Reader = Reader> implements BufferedReader {
    private readonly buffer: Uint8Array
    private start: number = 0
    private end: number = 0

    public constructor(
        private readonly inner: R,
        { capacity = DEFAULT_CAPACITY }: BufReaderOptions = {},
    ) {
        assert(
            Number.isSafeInteger(capacity) && capacity > 0,
            'Argument "capacity" must be a positive integer.',
        )
        this.buffer = new Uint8Array(capacity)
    }

    /**
     * The wrapped reader.
     */
    public get reader(): R {
        return this.inner
    }

    /**
     * The number of bytes in the internal buffer.
     */
    public get buffered(): number {
        return this.end - this.start
    }

    public async read(buffer: Uint8Array): Promise<number | null> {
        if (buffer.length === 0) {
            return 0
        }

        if (this.start === this.end && buffer.length >= this.buffer.length) {
            return this.inner.read(buffer)
        }

        const available = await this.fillBuffer()
        if (available.length === 0) {
            return null
        }

        const length = Math.min(available.length, buffer.length)
        buffer.set(available.subarray(0, length))
        this.consume(length)
        return length
    }

    public async fillBuffer(): Promise<Uint8Array> {
        if (this.start === this.end) {
            const length = await this.inner.read(this.buffer)
            this.start = 0
            this.end = length === null ? 0 : length
        }
        return this.buffer.subarray(this.start, this.end)
    }

    public consume(length: number): void {
        assert(
            Number.isSafeInteger(length) &&
                length >= 0 &&
                length <= this.buffered,
            'Argument "length" must be an integer between 0 and the number of buffered bytes.',
        )
        this.start += length
    }
}
