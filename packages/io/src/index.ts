export * from './buffer'
export * from './bufferReader'
export * from './bufferWriter'
export * from './bufReader'
export * from './stream'
export * from './streamReader'
export * from './streamWriter'
export * from './types'
export * from './util'
