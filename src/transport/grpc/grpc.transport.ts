import { readFile } from 'node:fs/promises'
import * as path from 'node:path'
import {
  CallOptions,
  ChannelCredentials,
  Client,
  credentials,
  Metadata,
} from '@grpc/grpc-js'
import {
  AnyDefinition,
  loadSync,
  MethodDefinition,
  ServiceDefinition,
} from '@grpc/proto-loader'
import { Logger } from 'pino'
import { DEFAULT_CONNECT_TIMEOUT_MS, ResolvedClientOptions } from '../../config'
import { IoError, TransportError, ValidationError } from '../../errors'
import { DcbTransport } from '../transport.interface'
import {
  appendResponseSchema,
  headResponseSchema,
  parseWire,
  readResponseSchema,
  WireAppendRequest,
  WireAppendResponse,
  WireHeadResponse,
  WireReadRequest,
  WireReadResponse,
} from '../wire'
import { mapGrpcError } from './grpc-errors'

// resolves from both src/ and dist/
export const PROTO_PATH = path.resolve(__dirname, '../../../proto/dcb.proto')
const SERVICE_NAME = 'umadb.UmaDBService'

type Method = MethodDefinition<object, object>

interface ServiceMethods {
  read: Method
  append: Method
  head: Method
}

function isServiceDefinition(definition: AnyDefinition): definition is ServiceDefinition {
  return !('format' in definition)
}

function loadServiceMethods(): ServiceMethods {
  const definition = loadSync(PROTO_PATH, {
    keepCase: false,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  })
  const service = definition[SERVICE_NAME]
  if (service === undefined || !isServiceDefinition(service)) {
    throw new TransportError(`Service ${SERVICE_NAME} missing from ${PROTO_PATH}`)
  }
  const method = (name: string) => {
    const found = service[name]
    if (found === undefined) {
      throw new TransportError(`Method ${SERVICE_NAME}/${name} missing from ${PROTO_PATH}`)
    }
    return found
  }
  return { read: method('Read'), append: method('Append'), head: method('Head') }
}

export function grpcTarget(url: string): { target: string; secure: boolean } {
  const parsed = new URL(url)
  const secure = parsed.protocol === 'https:'
  if (!secure && parsed.protocol !== 'http:') {
    throw new ValidationError(`Unsupported URL scheme ${parsed.protocol}`)
  }
  const port = parsed.port || (secure ? '443' : '80')
  return { target: `${parsed.hostname}:${port}`, secure }
}

async function channelCredentials(
  secure: boolean,
  caPath: string | undefined,
): Promise<ChannelCredentials> {
  if (caPath === undefined) {
    return secure ? credentials.createSsl() : credentials.createInsecure()
  }
  let ca: Buffer
  try {
    ca = await readFile(caPath)
  } catch (err) {
    throw new IoError(`Unable to read CA certificate ${caPath}`, err)
  }
  return credentials.createSsl(ca)
}

/**
 * gRPC channel to the store. One client per transport; each read opens its
 * own server stream which is cancelled as soon as the read ends.
 */
export class GrpcTransport implements DcbTransport {
  private constructor(
    private readonly client: Client,
    private readonly methods: ServiceMethods,
    private readonly timeoutMs: number | undefined,
  ) {}

  static async connect(
    options: ResolvedClientOptions,
    logger: Logger,
  ): Promise<GrpcTransport> {
    const { target, secure } = grpcTarget(options.url)
    const channel = await channelCredentials(secure, options.caPath)
    const methods = loadServiceMethods()
    const client = new Client(target, channel)
    const deadline = Date.now() + (options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS)

    await new Promise<void>((resolve, reject) => {
      client.waitForReady(deadline, (error) => {
        if (error) {
          client.close()
          reject(new TransportError(`Unable to connect to ${options.url}: ${error.message}`, error))
        } else {
          resolve()
        }
      })
    })
    logger.debug({ target, tls: secure || options.caPath !== undefined }, 'gRPC channel ready')

    return new GrpcTransport(client, methods, options.timeoutMs)
  }

  async *read(request: WireReadRequest, signal: AbortSignal): AsyncIterable<WireReadResponse> {
    if (signal.aborted) return
    const { path: method, requestSerialize, responseDeserialize } = this.methods.read
    const call = this.client.makeServerStreamRequest(
      method,
      requestSerialize,
      responseDeserialize,
      request,
      new Metadata(),
    )
    const cancel = () => call.cancel()
    signal.addEventListener('abort', cancel, { once: true })
    try {
      for await (const message of call) {
        yield parseWire(readResponseSchema, message, 'read response')
      }
    } catch (err) {
      throw mapGrpcError(err)
    } finally {
      signal.removeEventListener('abort', cancel)
      call.cancel()
    }
  }

  async head(): Promise<WireHeadResponse> {
    const response = await this.unary(this.methods.head, {})
    return parseWire(headResponseSchema, response, 'head response')
  }

  async append(request: WireAppendRequest): Promise<WireAppendResponse> {
    const response = await this.unary(this.methods.append, request)
    return parseWire(appendResponseSchema, response, 'append response')
  }

  close() {
    this.client.close()
  }

  private unary(method: Method, request: object): Promise<object | undefined> {
    const options: CallOptions =
      this.timeoutMs === undefined ? {} : { deadline: Date.now() + this.timeoutMs }
    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        new Metadata(),
        options,
        (error, response) => (error ? reject(mapGrpcError(error)) : resolve(response)),
      )
    })
  }
}
