import test from 'node:test';
import assert from 'node:assert/strict';
import { ZodError } from 'zod';

import { loadConfig } from '../config';

test('config: defaults apply to an empty environment', () => {
  const config = loadConfig({});

  assert.equal(config.server.port, 3000);
  assert.deepEqual(config.server.corsOrigins, ['http://localhost:3000', 'http://localhost:3001']);
  assert.equal(config.storage.backend, 'redis');
  assert.equal(config.fees.ratePerSqmDay, 10);
  assert.equal(config.fees.fallbackDurationDays, 7);
  assert.equal(config.fees.paymentDueDays, 30);
  assert.equal(config.watch.enabled, false);
  assert.equal(config.watch.folder, 'Zadosti');
  assert.equal(config.extraction.timeoutMs, 120_000);
  assert.equal(config.extraction.baseUrl, undefined);
  assert.equal(config.mail.from, 'clerk@municipality.cz');
});

test('config: numeric and boolean variables are coerced', () => {
  const config = loadConfig({
    PORT: '8080',
    RATE_PER_SQM_DAY: '12.5',
    WATCH_ENABLED: 'true',
    STORE_BACKEND: 'memory',
    CORS_ORIGINS: ' http://a.test , ,http://b.test',
  });

  assert.equal(config.server.port, 8080);
  assert.equal(config.fees.ratePerSqmDay, 12.5);
  assert.equal(config.watch.enabled, true);
  assert.equal(config.storage.backend, 'memory');
  assert.deepEqual(config.server.corsOrigins, ['http://a.test', 'http://b.test']);
});

test('config: empty optional strings count as unset', () => {
  const config = loadConfig({ SMTP_HOST: '', OPENAI_BASE_URL: '', SMTP_USER: 'mailer@example.test' });

  assert.equal(config.mail.host, undefined);
  assert.equal(config.extraction.baseUrl, undefined);
  assert.equal(config.mail.from, 'mailer@example.test');
});

test('config: invalid values are rejected', () => {
  assert.throws(() => loadConfig({ PORT: 'not-a-port' }), ZodError);
  assert.throws(() => loadConfig({ STORE_BACKEND: 'postgres' }), ZodError);
  assert.throws(() => loadConfig({ CLERK_EMAIL: 'nobody' }), ZodError);
});

test('config: result is frozen', () => {
  const config = loadConfig({});
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.fees), true);
});
