import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Telegram
  botUsername: z.string().optional(), // Without it, only bare commands match
  commandPrefix: z.string().min(1).default('/'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    botUsername: env('BOT_USERNAME'),
    commandPrefix: env('COMMAND_PREFIX'),
    logLevel: env('LOG_LEVEL'),
    nodeEnv: env('NODE_ENV'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
