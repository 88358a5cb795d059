export * from './position'
export * from './event'
export * from './sequenced-event'
export * from './query'
export * from './append-condition'
