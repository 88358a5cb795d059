export * from './model'
export * from './errors'
export * from './config'
export * from './logger'
export * from './client/client'
export * from './client/read-response'
export * from './transport/transport.interface'
export * from './transport/wire'
export * from './transport/grpc/grpc.transport'
export * from './transport/grpc/grpc-errors'
export * from './testing/in-memory-event-store'
export * from './dispatcher'
export * from './type'
export * from './codec/event-codec'
export * from './event-map'
export * from './event-map-builder'
export * from './projector-map'
export * from './projector/common'
export * from './projector/typeorm/interfaces'
export * from './projector/typeorm/ProjectionState'
export * from './projector/typeorm/eventMapConfigurator'
export * from './projector/typeorm/typeorm.child-projector'
export * from './projector/typeorm/typeorm.projector'
export * from './cache/projection-cache'
export * from './cache/lru.cache'
