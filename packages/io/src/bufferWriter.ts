import { createClosedError } from '@conduit/error'
import { Cloneable, Writer } from './types'

/**
 * A Writer which records the written bytes in memory.
 */
export class BufferWriter implements Writer, Cloneable<BufferWriter> {
    private chunks: Buffer[] = []
    private flushes = 0
    private isClosed = false

    /**
     * All bytes written so far.
     */
    public get data(): Buffer {
        if (this.chunks.length > 1) {
            this.chunks = [Buffer.concat(this.chunks)]
        }
        return this.chunks.length > 0 ? this.chunks[0] : Buffer.alloc(0)
    }

    /**
     * The number of times `flush` has completed.
     */
    public get flushCount(): number {
        return this.flushes
    }

    /**
     * Indicates if `close` has been called.
     */
    public get closed(): boolean {
        return this.isClosed
    }

    public async write(buffer: Uint8Array): Promise<number> {
        if (this.isClosed) {
            throw createClosedError('Cannot write to a closed BufferWriter.')
        }
        if (buffer.length > 0) {
            this.chunks.push(Buffer.from(buffer))
        }
        return buffer.length
    }

    public async flush(): Promise<void> {
        if (this.isClosed) {
            throw createClosedError('Cannot flush a closed BufferWriter.')
        }
        this.flushes++
    }

    public async close(): Promise<void> {
        this.isClosed = true
    }

    public toString(encoding: BufferEncoding = 'utf8'): string {
        return this.data.toString(encoding)
    }

    public clone(): BufferWriter {
        const writer = new BufferWriter()
        writer.chunks = [Buffer.from(this.data)]
        writer.flushes = this.flushes
        writer.isClosed = this.isClosed
        return writer
    }
}
