import { z } from 'zod';

export const MockServerOptionsSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  // 0 asks the OS for an ephemeral port
  port: z.number().int().min(0).max(65535).default(0),
});

export type MockServerOptions = z.input<typeof MockServerOptionsSchema>;
export type ResolvedMockServerOptions = z.output<typeof MockServerOptionsSchema>;

export function resolveServerOptions(options: MockServerOptions = {}): ResolvedMockServerOptions {
  return MockServerOptionsSchema.parse(options);
}

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => v === '1' || (v ?? '').toLowerCase() === 'true');

const LogSettingsSchema = z.object({
  HTTP_MOCK_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => (v ?? '').trim().toLowerCase())
    .pipe(z.enum(['', 'error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']))
    .transform((v) => v || 'warn'),
  HTTP_MOCK_SILENT: booleanFlag,
  HTTP_MOCK_LOG_FILE: z
    .string()
    .optional()
    .transform((v) => v?.trim() || undefined),
});

export type LogSettings = {
  level: string;
  silent: boolean;
  file?: string;
};

/**
 * Reads the logging environment. An unknown level falls back to `warn`.
 */
export function loadLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const parsed = LogSettingsSchema.safeParse(env);
  if (parsed.success) {
    return toSettings(parsed.data);
  }
  // only the level can be rejected; without it the schema always parses
  return toSettings(LogSettingsSchema.parse({ ...env, HTTP_MOCK_LOG_LEVEL: undefined }));
}

function toSettings(data: z.output<typeof LogSettingsSchema>): LogSettings {
  return {
    level: data.HTTP_MOCK_LOG_LEVEL,
    silent: data.HTTP_MOCK_SILENT,
    file: data.HTTP_MOCK_LOG_FILE,
  };
}
