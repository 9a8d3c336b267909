import { describe, expect, it, vi } from 'vitest';
import { loadEnv } from './env';

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({});
    expect(env).toMatchObject({
      PORT: 4000,
      LOG_LEVEL: 'info',
      MAIL_TRANSPORT: 'smtp',
      SMTP_PORT: 587,
      SMTP_SECURE: false,
      GRAPH_BASE_URL: 'https://graph.microsoft.com/v1.0'
    });
    expect(env.GRAPH_ACCESS_TOKEN).toBeUndefined();
  });

  it('parses SMTP settings and normalizes the Graph token', () => {
    const env = loadEnv({
      PORT: '8080',
      SMTP_PORT: '465',
      SMTP_SECURE: 'true',
      MAIL_TRANSPORT: 'graph',
      GRAPH_ACCESS_TOKEN: '  "test-token"  ',
      GRAPH_BASE_URL: 'https://graph.example.test/v1.0/'
    });
    expect(env.PORT).toBe(8080);
    expect(env.SMTP_PORT).toBe(465);
    expect(env.SMTP_SECURE).toBe(true);
    expect(env.MAIL_TRANSPORT).toBe('graph');
    expect(env.GRAPH_ACCESS_TOKEN).toBe('test-token');
    expect(env.GRAPH_BASE_URL).toBe('https://graph.example.test/v1.0');
  });

  it('throws on invalid values', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(() => loadEnv({ MAIL_TRANSPORT: 'carrier-pigeon' })).toThrow('Invalid environment variables');
    expect(() => loadEnv({ MAIL_SENDER: 'not-an-email' })).toThrow('Invalid environment variables');
    consoleError.mockRestore();
  });
});
