import { z } from 'zod';

function normalizeEnvString(value: string) {
  // Handle accidental whitespace and quoted values in .env entries.
  const trimmed = value.trim();
  const unquoted = trimmed.replace(/^"(.*)"$/s, '$1');
  return unquoted;
}

const envSchema = z.object({
  PORT: z.string().default('4000').transform((s) => parseInt(s, 10)),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  MAIL_TRANSPORT: z.enum(['smtp', 'graph']).default('smtp'),
  MAIL_SENDER: z.string().email().optional(),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.string().optional(),
  SMTP_SECURE: z.string().optional(),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  GRAPH_ACCESS_TOKEN: z.string().optional(),
  GRAPH_BASE_URL: z.string().url().default('https://graph.microsoft.com/v1.0'),
  CALENDAR_TIMEZONE: z.string().optional()
});

export type Env = {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: string;
  MAIL_TRANSPORT: 'smtp' | 'graph';
  MAIL_SENDER?: string;
  SMTP_HOST?: string;
  SMTP_PORT: number;
  SMTP_SECURE: boolean;
  SMTP_USER?: string;
  SMTP_PASS?: string;
  GRAPH_ACCESS_TOKEN?: string;
  GRAPH_BASE_URL: string;
  CALENDAR_TIMEZONE?: string;
};

export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error('Invalid environment variables', parsed.error.format());
    throw new Error('Invalid environment variables');
  }

  const token = parsed.data.GRAPH_ACCESS_TOKEN ? normalizeEnvString(parsed.data.GRAPH_ACCESS_TOKEN) : '';

  return {
    PORT: parsed.data.PORT,
    NODE_ENV: parsed.data.NODE_ENV,
    LOG_LEVEL: parsed.data.LOG_LEVEL,
    MAIL_TRANSPORT: parsed.data.MAIL_TRANSPORT,
    MAIL_SENDER: parsed.data.MAIL_SENDER,
    SMTP_HOST: parsed.data.SMTP_HOST,
    SMTP_PORT: parsed.data.SMTP_PORT ? parseInt(parsed.data.SMTP_PORT, 10) : 587,
    SMTP_SECURE: parsed.data.SMTP_SECURE === 'true',
    SMTP_USER: parsed.data.SMTP_USER,
    SMTP_PASS: parsed.data.SMTP_PASS,
    GRAPH_ACCESS_TOKEN: token || undefined,
    GRAPH_BASE_URL: parsed.data.GRAPH_BASE_URL.replace(/\/$/, ''),
    CALENDAR_TIMEZONE: parsed.data.CALENDAR_TIMEZONE
  };
}

const env = loadEnv(process.env);

export default env;
