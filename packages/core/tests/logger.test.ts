import { describe, expect, it } from 'vitest';
import { Logger, redactSecrets } from '../src/utils/logger.js';

function capture(options: ConstructorParameters<typeof Logger>[0] = {}) {
  const lines: string[] = [];
  const logger = new Logger({ ...options, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe('redactSecrets', () => {
  it('redacts secret keys at any depth', () => {
    expect(
      redactSecrets({ port: { clientId: 'id-1', clientSecret: 'test-secret' }, token: 'abc' })
    ).toEqual({ port: { clientId: 'id-1', clientSecret: '[REDACTED]' }, token: '[REDACTED]' });
  });

  it('redacts bearer tokens inside strings', () => {
    expect(redactSecrets('Authorization: Bearer test-token-value')).toBe(
      'Authorization: Bearer [REDACTED]'
    );
  });

  it('reduces errors to name and message', () => {
    expect(redactSecrets(new TypeError('bad input'))).toEqual({
      name: 'TypeError',
      message: 'bad input',
    });
  });
});

describe('Logger', () => {
  it('drops records below the configured level', () => {
    const { logger, lines } = capture({ level: 'warn' });

    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('WARN shown');
  });

  it('writes JSON records with child fields', () => {
    const { logger, lines } = capture({ format: 'json' });

    logger.child({ blueprint: 'service' }).info('Created table', { columns: 3 });

    const record = JSON.parse(lines[0] ?? '{}');
    expect(record).toMatchObject({
      level: 'info',
      msg: 'Created table',
      blueprint: 'service',
      columns: 3,
    });
  });

  it('appends fields as key=value pairs in text format', () => {
    const { logger, lines } = capture();

    logger.child({ table: 'service' }).info('Batch written', { rows: 2, note: 'two words' });

    expect(lines[0]).toMatch(/\] INFO Batch written table=service rows=2 note="two words"\n$/);
  });
});
