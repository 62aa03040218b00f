import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// Read on import, before the CLI can report anything: unknown values fall back instead of throwing.
const environmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().catch(undefined),
});

type RawEnvironment = z.infer<typeof environmentSchema>;

export interface Environment {
  readonly NODE_ENV: RawEnvironment['NODE_ENV'];
  readonly LOG_LEVEL: NonNullable<RawEnvironment['LOG_LEVEL']>;
}

export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const { NODE_ENV, LOG_LEVEL } = environmentSchema.parse(source);

  return {
    NODE_ENV,
    LOG_LEVEL: LOG_LEVEL ?? (NODE_ENV === 'test' ? 'silent' : 'warn'),
  };
}

export const environment = loadEnvironment();
