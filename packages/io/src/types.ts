/**
 * A source of bytes.
 *
 * A pending promise means that no data is available yet. The caller resumes
 * once the reader makes progress.
 */
export interface Reader {
    /**
     * Reads up to `buffer.length` bytes into `buffer`.
     *
     * Resolves to the number of bytes read (`0 < n <= buffer.length`),
     * or to `null` at the end of the stream. Resolves to `0` if `buffer` is empty.
     * Rejects with the error encountered by the underlying source.
     */
    read(buffer: Uint8Array): Promise<number | null>
}

/**
 * A Reader with an internal buffer, which can be inspected before it is consumed.
 */
export interface BufferedReader extends Reader {
    /**
     * Returns the unconsumed bytes in the internal buffer, filling it from the
     * underlying source first, if it is empty.
     * An empty result means the end of the stream.
     *
     * The returned view is valid only until the next call on the reader.
     */
    fillBuffer(): Promise<Uint8Array>

    /**
     * Marks `length` bytes returned by the last `fillBuffer` call as consumed,
     * so that they are not returned again by `fillBuffer` or `read`.
     */
    consume(length: number): void
}

/**
 * A sink for bytes.
 */
export interface Writer {
    /**
     * Writes bytes from `buffer` to the underlying sink.
     * Resolves to the number of bytes accepted (`0 <= n <= buffer.length`).
     */
    write(buffer: Uint8Array): Promise<number>

    /**
     * Pushes the previously accepted bytes towards their destination.
     */
    flush(): Promise<void>

    /**
     * Signals that no more data will be written.
     */
    close(): Promise<void>
}

/**
 * An object which can produce an independent copy of itself in an equal state.
 */
export interface Cloneable<T> {
    clone(): T
}

function hasMethods(value: unknown, ...names: string[]): boolean {
    if (value === null || typeof value !== 'object') {
        return false
    }
    for (const name of names) {
        if (typeof Reflect.get(value, name) !== 'function') {
            return false
        }
    }
    return true
}

export function isReader(value: unknown): value is Reader {
    return hasMethods(value, 'read')
}

export function isBufferedReader(value: unknown): value is BufferedReader {
    return hasMethods(value, 'read', 'fillBuffer', 'consume')
}

export function isWriter(value: unknown): value is Writer {
    return hasMethods(value, 'write', 'flush', 'close')
}

export function isCloneable(value: unknown): value is Cloneable<unknown> {
    return hasMethods(value, 'clone')
}
