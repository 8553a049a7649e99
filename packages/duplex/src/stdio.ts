import { StreamReader, StreamWriter } from '@conduit/io'
import { BufferedDuplex } from './duplex'

export interface StdioOptions {
    /**
     * The stream to read from. Defaults to `process.stdin`.
     */
    input?: NodeJS.ReadableStream
    /**
     * The stream to write to. Defaults to `process.stdout`.
     */
    output?: NodeJS.WritableStream
}

/**
 * Creates a Duplex which reads from the standard input and writes to the standard output.
 */
export function stdio({
    input = process.stdin,
    output = process.stdout,
}: StdioOptions = {}): BufferedDuplex<StreamReader, StreamWriter> {
    return new BufferedDuplex(
        new StreamReader(input),
        new StreamWriter(output),
    )
}
