import { z } from 'zod'
import dotenv from 'dotenv'

// Load environment variables
dotenv.config()

const configSchema = z.object({
  // Logging
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    filePath: z.string().min(1).optional(),
    maxSizeMB: z.number().positive().optional(),
    maxFiles: z.number().int().positive().optional(),
  }),

  // Demo programs
  demo: z.object({
    latencyMs: z.number().int().nonnegative().default(10),
  }),
})

export type Config = z.infer<typeof configSchema>

export type Env = Record<string, string | undefined>

const parseEnvNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is passed on so the schema reports the offending key
  return Number(value);
};

export const loadConfig = (env: Env = process.env): Config => {
  const rawConfig = {
    logging: {
      level: env['LOG_LEVEL'] || undefined,
      filePath: env['LOG_FILE_PATH'] || undefined,
      maxSizeMB: parseEnvNumber(env['LOG_MAX_SIZE_MB']),
      maxFiles: parseEnvNumber(env['LOG_MAX_FILES']),
    },
    demo: {
      latencyMs: parseEnvNumber(env['DEMO_LATENCY_MS']),
    },
  }

  try {
    return configSchema.parse(rawConfig)
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation error:', JSON.stringify(error.issues, null, 2));
    } else {
      console.error('Unknown error during configuration loading:', error)
    }
    throw new Error('Configuration validation failed')
  }
}
