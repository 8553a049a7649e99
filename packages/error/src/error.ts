/**
 * Extends Error with:
 * - a `name` which identifies the kind of the error,
 * - the optional `cause` property which indicates the cause of this error.
 */
export interface CustomError<N extends string = string> extends Error {
    name: N
    cause?: Error
}

/**
 * The details used to create a CustomError.
 */
export interface ErrorDetails<N extends string> {
    name: N
    message?: string
    cause?: Error
}

/**
 * Determines if `data` is an Error.
 */
export function isError(data: unknown): data is Error {
    return (
        data !== null &&
        typeof data === 'object' &&
        'name' in data &&
        typeof data.name === 'string' &&
        'message' in data &&
        typeof data.message === 'string'
    )
}

/**
 * Determines if `data` is a CustomError.
 */
export function isCustomError(data: unknown): data is CustomError {
    return (
        isError(data) &&
        (!('cause' in data) || data.cause == null || isError(data.cause))
    )
}

/**
 * Creates a new Error instance with the specified properties.
 * Additionally, `cause.message` is automatically appended to the new error's `message`.
 */
export function createError<N extends string>({
    name,
    message,
    cause,
}: ErrorDetails<N>): CustomError<N> {
    assert(typeof name === 'string', 'Argument "name" must be a string.')
    assert(
        typeof message === 'string' || message === undefined,
        'Argument "message" must be a string or undefined.',
    )
    assert(
        isError(cause) || cause === undefined,
        'Argument "cause" must be an Error or undefined.',
    )

    const fullMessage = message
        ? cause
            ? `${message} => ${cause}`
            : message
        : cause
        ? `=> ${cause}`
        : ''
    const error = Object.assign(new Error(fullMessage), { name, cause })

    Object.defineProperty(error, 'name', { enumerable: false })

    return error
}

/**
 * A ConduitError is a CustomError with the `name` matching the regex /^ConduitError($| )/.
 */
export type ConduitError = CustomError
export function isConduitError(error: unknown): error is ConduitError {
    return isCustomError(error) && /^ConduitError($| )/.test(error.name)
}

export type AssertError = CustomError<'ConduitError Assert'>
export function createAssertError(message?: string): AssertError {
    return createError({
        message,
        name: 'ConduitError Assert',
    })
}
export function isAssertError(error: unknown): error is AssertError {
    return isCustomError(error) && error.name === 'ConduitError Assert'
}

/**
 * Throws an `AssertError` if `value` is falsy.
 */
export function assert(value: unknown, message?: string): asserts value {
    if (!value) {
        throw createAssertError(message)
    }
}

/**
 * Reported when a writer is used after it has been closed.
 */
export type ClosedError = CustomError<'ConduitError Closed'>
export function createClosedError(message?: string): ClosedError {
    return createError({
        message,
        name: 'ConduitError Closed',
    })
}
export function isClosedError(error: unknown): error is ClosedError {
    return isCustomError(error) && error.name === 'ConduitError Closed'
}

/**
 * Reported when a reader ends before the requested number of bytes has been read.
 */
export type UnexpectedEofError = CustomError<'ConduitError UnexpectedEof'>
export function createUnexpectedEofError(
    message?: string,
): UnexpectedEofError {
    return createError({
        message,
        name: 'ConduitError UnexpectedEof',
    })
}
export function isUnexpectedEofError(
    error: unknown,
): error is UnexpectedEofError {
    return isCustomError(error) && error.name === 'ConduitError UnexpectedEof'
}

/**
 * Reported when a writer accepts no bytes of a non-empty buffer.
 */
export type WriteZeroError = CustomError<'ConduitError WriteZero'>
export function createWriteZeroError(message?: string): WriteZeroError {
    return createError({
        message,
        name: 'ConduitError WriteZero',
    })
}
export function isWriteZeroError(error: unknown): error is WriteZeroError {
    return isCustomError(error) && error.name === 'ConduitError WriteZero'
}
