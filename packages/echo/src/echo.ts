import { BufferedDuplex } from '@conduit/duplex'
import {
    BufferedReader,
    readLine,
    toBuffer,
    writeAll,
    Writer,
} from '@conduit/io'

/**
 * Reads a line from `stdio` and writes it back to `stdio`.
 * Resolves to the line, which is empty at the end of the stream.
 */
export async function echoLine(
    stdio: BufferedDuplex<BufferedReader, Writer>,
): Promise<string> {
    const line = await readLine(stdio)
    await writeAll(stdio, toBuffer(line))
    await stdio.flush()
    return line
}
