import {
    BufferReader,
    BufferWriter,
    BufReader,
    readExact,
    readLine,
    readToEnd,
    readUntil,
    Reader,
    writeAll,
    Writer,
} from '.'

/**
 * Returns at most `limit` bytes from every read.
 */
const trickle = (reader: Reader, limit: number): Reader => ({
    read: (buffer) => reader.read(buffer.subarray(0, limit)),
})

/**
 * Accepts at most `limit` bytes in every write.
 */
class LimitedWriter implements Writer {
    public readonly sizes: number[] = []
    public constructor(
        private readonly writer: Writer,
        private readonly limit: number,
    ) {}
    public write(buffer: Uint8Array): Promise<number> {
        this.sizes.push(Math.min(buffer.length, this.limit))
        return this.writer.write(buffer.subarray(0, this.limit))
    }
    public flush(): Promise<void> {
        return this.writer.flush()
    }
    public close(): Promise<void> {
        return this.writer.close()
    }
}

describe('readUntil', () => {
    test('invalid delimiter', async () => {
        const reader = BufferReader.from('abc')
        await expect(readUntil(reader, 256)).rejects.toEqual(
            expect.objectContaining({ name: 'ConduitError Assert' }),
        )
    })
    test('delimiter found', async () => {
        const reader = BufferReader.from('a,b,c')
        expect((await readUntil(reader, 0x2c)).toString()).toBe('a,')
        expect((await readUntil(reader, 0x2c)).toString()).toBe('b,')
        expect((await readUntil(reader, 0x2c)).toString()).toBe('c')
        expect(await readUntil(reader, 0x2c)).toHaveLength(0)
    })
    test('delimiter spanning buffer refills', async () => {
        const source = trickle(BufferReader.from('abcdef;g'), 2)
        const reader = new BufReader(source, { capacity: 4 })
        expect((await readUntil(reader, 0x3b)).toString()).toBe('abcdef;')
        expect((await readUntil(reader, 0x3b)).toString()).toBe('g')
    })
})

describe('readLine', () => {
    test('lines', async () => {
        const reader = BufferReader.from('first\nsecond\r\nthird')
        await expect(readLine(reader)).resolves.toBe('first\n')
        await expect(readLine(reader)).resolves.toBe('second\r\n')
        await expect(readLine(reader)).resolves.toBe('third')
        await expect(readLine(reader)).resolves.toBe('')
    })
    test('empty source', async () => {
        await expect(readLine(BufferReader.from(''))).resolves.toBe('')
    })
    test('multi-byte characters split between reads', async () => {
        const source = trickle(BufferReader.from('zażółć\n'), 1)
        const reader = new BufReader(source, { capacity: 1 })
        await expect(readLine(reader)).resolves.toBe('zażółć\n')
    })
})

describe('readExact', () => {
    test('fills the buffer from many reads', async () => {
        const reader = trickle(BufferReader.from('abcdefgh'), 3)
        const buffer = Buffer.alloc(7)
        await readExact(reader, buffer)
        expect(buffer.toString()).toBe('abcdefg')
    })
    test('empty buffer', async () => {
        const reader = BufferReader.from('')
        await expect(
            readExact(reader, Buffer.alloc(0)),
        ).resolves.toBeUndefined()
    })
    test('unexpected end of stream', async () => {
        const reader = BufferReader.from('abc')
        const promise = readExact(reader, Buffer.alloc(5))
        await expect(promise).rejects.toMatchObject({
            message: 'Stream ended after 3 of 5 bytes.',
            name: 'ConduitError UnexpectedEof',
        })
    })
})

describe('readToEnd', () => {
    test('reads everything', async () => {
        const reader = trickle(BufferReader.from('hello world'), 4)
        expect((await readToEnd(reader)).toString()).toBe('hello world')
    })
    test('empty source', async () => {
        expect(await readToEnd(BufferReader.from(''))).toHaveLength(0)
    })
    test('large source', async () => {
        const data = Buffer.alloc(20000, 0x61)
        const result = await readToEnd(new BufferReader(data))
        expect(result.equals(data)).toBeTrue()
    })
})

describe('writeAll', () => {
    test('writes in parts', async () => {
        const sink = new BufferWriter()
        const writer = new LimitedWriter(sink, 4)
        await writeAll(writer, Buffer.from('hello world'))
        expect(sink.toString()).toBe('hello world')
        expect(writer.sizes).toEqual([4, 4, 3])
    })
    test('empty data', async () => {
        const sink = new BufferWriter()
        const writer = new LimitedWriter(sink, 4)
        await writeAll(writer, Buffer.alloc(0))
        expect(writer.sizes).toEqual([])
    })
    test('writer accepts nothing', async () => {
        const sink = new BufferWriter()
        const writer = new LimitedWriter(sink, 0)
        const promise = writeAll(writer, Buffer.from('abc'))
        await expect(promise).rejects.toMatchObject({
            message: 'Writer accepted 0 of 3 bytes.',
            name: 'ConduitError WriteZero',
        })
    })
    test('pass through errors', async () => {
        const sink = new BufferWriter()
        await sink.close()
        await expect(writeAll(sink, Buffer.from('abc'))).rejects.toMatchObject({
            name: 'ConduitError Closed',
        })
    })
})
