import { assert } from '@conduit/error'
import { toBuffer } from './buffer'
import { BufferedReader, Cloneable } from './types'

/**
 * A BufferedReader over bytes held in memory.
 */
export class BufferReader implements BufferedReader, Cloneable<BufferReader> {
    /**
     * Creates a BufferReader over `text` encoded using `encoding`.
     */
    public static from(
        text: string,
        encoding: BufferEncoding = 'utf8',
    ): BufferReader {
        return new BufferReader(toBuffer(text, encoding))
    }

    private offset: number

    /**
     * Creates a new BufferReader.
     * @param data The bytes to read. They are not copied and must not be modified.
     * @param position The position of the first byte to read.
     */
    public constructor(private readonly data: Uint8Array, position = 0) {
        assert(
            Number.isSafeInteger(position) &&
                position >= 0 &&
                position <= data.length,
            'Argument "position" must be an integer between 0 and data.length.',
        )
        this.offset = position
    }

    /**
     * The position of the next byte to read.
     */
    public get position(): number {
        return this.offset
    }

    /**
     * The number of bytes left to read.
     */
    public get remaining(): number {
        return this.data.length - this.offset
    }

    public async read(buffer: Uint8Array): Promise<number | null> {
        if (buffer.length === 0) {
            return 0
        }
        if (this.remaining === 0) {
            return null
        }
        const length = Math.min(buffer.length, this.remaining)
        buffer.set(this.data.subarray(this.offset, this.offset + length))
        this.offset += length
        return length
    }

    public async fillBuffer(): Promise<Uint8Array> {
        return this.data.subarray(this.offset)
    }

    public consume(length: number): void {
        assert(
            Number.isSafeInteger(length) &&
                length >= 0 &&
                length <= this.remaining,
            'Argument "length" must be an integer between 0 and the number of remaining bytes.',
        )
        this.offset += length
    }

    public clone(): BufferReader {
        return new BufferReader(this.data, this.offset)
    }
}
