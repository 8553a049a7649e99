import { BufferedReader, Cloneable, Reader, Writer } from '@conduit/io'

/**
 * Combines a reader and a writer into a single object which can both read and write.
 *
 * Every call is forwarded unchanged to the wrapped reader or writer and the
 * returned promise is passed back as is. Duplex keeps no buffer and no state of
 * its own, so all results, errors and waiting come from the wrapped objects.
 *
 * Duplex exposes only `read`, `write`, `flush` and `close`. The subclasses add
 * the optional capabilities, when the wrapped objects have them:
 *
 * - BufferedDuplex: `fillBuffer` and `consume` of a BufferedReader.
 * - CloneableDuplex: `clone`, when both the reader and the writer are Cloneable.
 * - CloneableBufferedDuplex: both of the above.
 *
 * @example
 * ```ts
 * const stdio = new BufferedDuplex(
 *     new StreamReader(process.stdin),
 *     new StreamWriter(process.stdout),
 * )
 * const line = await readLine(stdio)
 * await writeAll(stdio, Buffer.from(line))
 * ```
 */
export class Duplex<R extends Reader = Reader, W extends Writer = Writer>
    implements Reader, Writer {
    /**
     * Creates a new Duplex which takes over the `reader` and the `writer`.
     */
    public constructor(
        protected readonly reader: R,
        protected readonly writer: W,
    ) {}

    /**
     * Returns the wrapped reader and writer.
     * The Duplex must not be used afterwards.
     */
    public intoInner(): [R, W] {
        return [this.reader, this.writer]
    }

    public read(buffer: Uint8Array): Promise<number | null> {
        return this.reader.read(buffer)
    }

    public write(buffer: Uint8Array): Promise<number> {
        return this.writer.write(buffer)
    }

    public flush(): Promise<void> {
        return this.writer.flush()
    }

    /**
     * Closes the writer. The reader is not affected.
     */
    public close(): Promise<void> {
        return this.writer.close()
    }
}

/**
 * A Duplex over a BufferedReader.
 */
export class BufferedDuplex<
    R extends BufferedReader = BufferedReader,
    W extends Writer = Writer
> extends Duplex<R, W> implements BufferedReader {
    public fillBuffer(): Promise<Uint8Array> {
        return this.reader.fillBuffer()
    }

    public consume(length: number): void {
        this.reader.consume(length)
    }
}

/**
 * A Duplex over a Cloneable reader and a Cloneable writer.
 */
export class CloneableDuplex<
    R extends Reader & Cloneable<R>,
    W extends Writer & Cloneable<W>
> extends Duplex<R, W> implements Cloneable<CloneableDuplex<R, W>> {
    /**
     * Creates a new CloneableDuplex over clones of the reader and the writer.
     */
    public clone(): CloneableDuplex<R, W> {
        return new CloneableDuplex(this.reader.clone(), this.writer.clone())
    }
}

/**
 * A Duplex over a Cloneable BufferedReader and a Cloneable writer.
 */
export class CloneableBufferedDuplex<
    R extends BufferedReader & Cloneable<R>,
    W extends Writer & Cloneable<W>
> extends BufferedDuplex<R, W>
    implements Cloneable<CloneableBufferedDuplex<R, W>> {
    /**
     * Creates a new CloneableBufferedDuplex over clones of the reader and the writer.
     */
    public clone(): CloneableBufferedDuplex<R, W> {
        return new CloneableBufferedDuplex(
            this.reader.clone(),
            this.writer.clone(),
        )
    }
}

export function isDuplex(value: unknown): value is Duplex {
    return value instanceof Duplex
}
