export * from './duplex'
export * from './duplexStream'
export * from './stdio'
