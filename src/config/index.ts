import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { languageSchema, unitsSchema } from './schemas.js';

const configSchema = z.object({
  // OpenWeatherMap
  openWeatherApiKey: z.string().optional(),
  requestTimeoutMs: z.coerce.number().int().positive().default(10000),

  // Storage
  databasePath: z.string().optional(), // Defaults to data/weather.db next to the package

  // Settings used until the user changes them with `lang` / `units`
  defaultLanguage: languageSchema.default('en'),
  defaultUnits: unitsSchema.default('metric'),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('warn'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    openWeatherApiKey: env('OPENWEATHER_API_KEY'),
    requestTimeoutMs: env('REQUEST_TIMEOUT_MS'),
    databasePath: env('DATABASE_PATH'),
    defaultLanguage: env('DEFAULT_LANGUAGE'),
    defaultUnits: env('DEFAULT_UNITS'),
    logLevel: env('LOG_LEVEL'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

export const config = loadConfig();
