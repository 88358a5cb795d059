import { z } from 'zod'
import { ValidationError } from './errors'

export const DEFAULT_BATCH_SIZE = 500
export const MAX_BATCH_SIZE = 10_000
export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000

export const clientOptionsSchema = z.object({
  url: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), {
      message: 'url must use the http:// or https:// scheme',
    }),
  caPath: z.string().min(1).optional(),
  batchSize: z.number().int().min(1).max(MAX_BATCH_SIZE).default(DEFAULT_BATCH_SIZE),
  timeoutMs: z.number().int().positive().optional(),
})

export type ClientOptions = z.input<typeof clientOptionsSchema>
export type ResolvedClientOptions = z.output<typeof clientOptionsSchema>

const envSchema = z.object({
  DCB_URL: z.string({ required_error: 'DCB_URL is not set' }),
  DCB_CA_PATH: z.string().min(1).optional(),
  DCB_BATCH_SIZE: z.coerce.number().optional(),
  DCB_TIMEOUT_MS: z.coerce.number().optional(),
})

export function resolveClientOptions(options: ClientOptions): ResolvedClientOptions {
  const result = clientOptionsSchema.safeParse(options)
  if (!result.success) {
    throw new ValidationError(`Invalid client options: ${formatIssues(result.error)}`)
  }
  return result.data
}

export function clientOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): ResolvedClientOptions {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    throw new ValidationError(`Invalid environment: ${formatIssues(result.error)}`)
  }
  return resolveClientOptions({
    url: result.data.DCB_URL,
    caPath: result.data.DCB_CA_PATH,
    batchSize: result.data.DCB_BATCH_SIZE,
    timeoutMs: result.data.DCB_TIMEOUT_MS,
  })
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}
