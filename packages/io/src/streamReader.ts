import { assert } from '@conduit/error'
import { EMPTY, toBuffer } from './buffer'
import { isReadableStream } from './stream'
import { BufferedReader } from './types'

/**
 * A BufferedReader backed by a Node readable stream.
 *
 * The chunks emitted by the stream serve as the internal buffer.
 * String chunks are encoded using UTF-8.
 *
 * When the stream emits an error, the pending and all subsequent reads
 * are rejected with that error. A stream closed before its end is treated
 * as ended.
 */
export class StreamReader implements BufferedReader {
    private chunk: Uint8Array = EMPTY
    private ended: boolean = false
    private error: Error | undefined = undefined

    /**
     * Creates a new StreamReader.
     * @param stream A readable stream which has not ended yet.
     */
    public constructor(private readonly stream: NodeJS.ReadableStream) {
        assert(
            isReadableStream(stream),
            'Argument "stream" must be a readable stream.',
        )
        this.stream.on('end', this.onEnd)
        this.stream.on('close', this.onEnd)
        this.stream.on('error', this.onError)
    }

    public async read(buffer: Uint8Array): Promise<number | null> {
        if (buffer.length === 0) {
            return 0
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
        while (this.chunk.length === 0) {
            if (this.error) {
                throw this.error
            }
            if (this.ended) {
                break
            }

            const data = this.stream.read()
            if (data === null) {
                await this.whenReadable()
            } else {
                this.chunk = toBuffer(data)
            }
        }
        return this.chunk
    }

    public consume(length: number): void {
        assert(
            Number.isSafeInteger(length) &&
                length >= 0 &&
                length <= this.chunk.length,
            'Argument "length" must be an integer between 0 and the number of buffered bytes.',
        )
        this.chunk = this.chunk.subarray(length)
    }

    private whenReadable(): Promise<void> {
        return new Promise((resolve) => {
            const done = (): void => {
                this.stream.removeListener('readable', done)
                this.stream.removeListener('end', done)
                this.stream.removeListener('close', done)
                this.stream.removeListener('error', done)
                resolve()
            }
            this.stream.once('readable', done)
            this.stream.once('end', done)
            this.stream.once('close', done)
            this.stream.once('error', done)
        })
    }

    private onEnd = (): void => {
        this.ended = true
    }

    private onError = (error: Error): void => {
        this.error = error
    }
}
