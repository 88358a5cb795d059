import { Logger } from 'pino'
import { ResolvedClientOptions } from '../config'
import {
  WireAppendRequest,
  WireAppendResponse,
  WireHeadResponse,
  WireReadRequest,
  WireReadResponse,
} from './wire'

/**
 * Channel to the store. Implementations may throw their own errors; the
 * client translates everything into the DcbError taxonomy.
 */
export interface DcbTransport {
  /**
   * Streams read batches. Aborting `signal` must end the stream and release
   * any underlying call.
   */
  read(request: WireReadRequest, signal: AbortSignal): AsyncIterable<WireReadResponse>

  head(): Promise<WireHeadResponse>

  append(request: WireAppendRequest): Promise<WireAppendResponse>

  close(): void
}

export type TransportFactory = (
  options: ResolvedClientOptions,
  logger: Logger,
) => Promise<DcbTransport>
