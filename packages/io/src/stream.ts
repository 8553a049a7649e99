function hasFunction(value: object, name: string): boolean {
    return typeof Reflect.get(value, name) === 'function'
}

function hasBoolean(value: object, name: string): boolean {
    return typeof Reflect.get(value, name) === 'boolean'
}

export function isStream(stream: unknown): stream is NodeJS.EventEmitter {
    return (
        stream !== null &&
        typeof stream === 'object' &&
        hasFunction(stream, 'on') &&
        hasFunction(stream, 'once') &&
        hasFunction(stream, 'removeListener')
    )
}

export function isReadableStream(
    stream: unknown,
): stream is NodeJS.ReadableStream {
    return (
        isStream(stream) &&
        hasFunction(stream, 'read') &&
        hasFunction(stream, 'pipe') &&
        hasBoolean(stream, 'readable')
    )
}

export function isWritableStream(
    stream: unknown,
): stream is NodeJS.WritableStream {
    return (
        isStream(stream) &&
        hasFunction(stream, 'write') &&
        hasFunction(stream, 'end') &&
        hasBoolean(stream, 'writable')
    )
}

export function isDuplexStream(
    stream: unknown,
): stream is NodeJS.ReadWriteStream {
    return isReadableStream(stream) && isWritableStream(stream)
}
