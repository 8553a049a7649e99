import { assert, createClosedError } from '@conduit/error'
import { isWritableStream } from './stream'
import { Writer } from './types'

/**
 * A Writer backed by a Node writable stream.
 *
 * - `write` resolves when the stream has processed the data.
 * - `flush` resolves when the stream has drained, if it asked for that.
 * - `close` ends the stream and resolves when it has finished.
 *
 * Errors emitted by the stream are passed on unchanged. If the stream is
 * destroyed without an error, the pending and all subsequent operations
 * are rejected with a ClosedError.
 */
export class StreamWriter implements Writer {
    private closed: boolean = false
    private needDrain: boolean = false
    private streamClosed: boolean = false
    private error: Error | undefined = undefined
    private readonly pendingWrites: Set<(error: Error) => void> = new Set()

    /**
     * Creates a new StreamWriter.
     * @param stream A writable stream which has not finished yet.
     */
    public constructor(private readonly stream: NodeJS.WritableStream) {
        assert(
            isWritableStream(stream),
            'Argument "stream" must be a writable stream.',
        )
        this.stream.on('drain', this.onDrain)
        this.stream.on('error', this.onError)
        this.stream.on('close', this.onClose)
    }

    public write(buffer: Uint8Array): Promise<number> {
        if (this.error) {
            return Promise.reject(this.error)
        }
        if (this.closed) {
            return Promise.reject(
                createClosedError('Cannot write to a closed stream.'),
            )
        }
        if (this.isDestroyed()) {
            return Promise.reject(
                createClosedError('Cannot write to a destroyed stream.'),
            )
        }
        if (buffer.length === 0) {
            return Promise.resolve(0)
        }

        const length = buffer.length
        return new Promise((resolve, reject) => {
            const fail = (error: Error): void => {
                this.pendingWrites.delete(fail)
                reject(error)
            }
            this.pendingWrites.add(fail)

            const ready = this.stream.write(buffer, (error) => {
                if (error) {
                    fail(error)
                } else {
                    this.pendingWrites.delete(fail)
                    resolve(length)
                }
            })
            if (!ready) {
                this.needDrain = true
            }
        })
    }

    public flush(): Promise<void> {
        if (this.error) {
            return Promise.reject(this.error)
        }
        if (!this.needDrain) {
            return Promise.resolve()
        }
        if (this.isDestroyed()) {
            return Promise.reject(
                createClosedError('Cannot flush a destroyed stream.'),
            )
        }
        return this.waitFor('drain', 'Stream closed before it drained.')
    }

    public close(): Promise<void> {
        if (this.error) {
            return Promise.reject(this.error)
        }
        if (this.closed) {
            return Promise.resolve()
        }
        this.closed = true

        if (Reflect.get(this.stream, 'writableFinished') === true) {
            return Promise.resolve()
        }
        if (this.isDestroyed()) {
            return Promise.reject(
                createClosedError('Cannot close a destroyed stream.'),
            )
        }
        const finished = this.waitFor(
            'finish',
            'Stream closed before it finished.',
        )
        this.stream.end()
        return finished
    }

    private isDestroyed(): boolean {
        return (
            this.streamClosed || Reflect.get(this.stream, 'destroyed') === true
        )
    }

    private waitFor(event: 'drain' | 'finish', message: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const cleanUp = (): void => {
                this.stream.removeListener(event, onEvent)
                this.stream.removeListener('error', onError)
                this.stream.removeListener('close', onClose)
            }
            const onEvent = (): void => {
                cleanUp()
                resolve()
            }
            const onError = (error: Error): void => {
                cleanUp()
                reject(error)
            }
            const onClose = (): void => {
                cleanUp()
                reject(this.error || createClosedError(message))
            }
            this.stream.once(event, onEvent)
            this.stream.once('error', onError)
            this.stream.once('close', onClose)
        })
    }

    private onDrain = (): void => {
        this.needDrain = false
    }

    private onError = (error: Error): void => {
        this.error = error
    }

    private onClose = (): void => {
        this.streamClosed = true
        const error =
            this.error || createClosedError('Stream closed before writing.')
        this.pendingWrites.forEach((fail) => fail(error))
    }
}
