import 'reflect-metadata'
import { Column, Entity, PrimaryColumn, ValueTransformer } from 'typeorm'
import { Position } from '../../model'

const BigIntTransformer: ValueTransformer = {
  from(value: string | null) {
    return value == null ? value : BigInt(value)
  },
  to(value: bigint | null | undefined) {
    return value == null ? value : value.toString()
  },
}

@Entity()
export class ProjectionState {
  @PrimaryColumn()
  id!: string

  @Column({ type: 'text', transformer: BigIntTransformer })
  position!: Position

  @Column({ name: 'last_update_utc' })
  lastUpdateUtc!: Date
}
