import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { Validator } from '../validator.js';
import type { ValidationFailure } from '../../errors/validation-failure.js';
import type { JsonObject } from '../../types/schema.js';
import { silentLogger } from '../../util/logger.js';

interface RedactionCase {
  keyword: string;
  schema: JsonObject;
  secret: fc.Arbitrary<string>;
  instance: (secret: string) => JsonObject;
}

const word = fc.stringMatching(/^[a-z0-9]{6,10}$/).map((token) => `zq${token}`);

const CASES: RedactionCase[] = [
  {
    keyword: 'pattern',
    schema: { properties: { v: { type: 'string', pattern: '^A' } } },
    secret: word,
    instance: (secret) => ({ v: secret }),
  },
  {
    keyword: 'enum',
    schema: { properties: { v: { enum: ['allowed'] } } },
    secret: word,
    instance: (secret) => ({ v: secret }),
  },
  {
    keyword: 'const',
    schema: { properties: { v: { const: 'allowed' } } },
    secret: word,
    instance: (secret) => ({ v: secret }),
  },
  {
    keyword: 'format',
    schema: { properties: { v: { type: 'string', format: 'email' } } },
    secret: word,
    instance: (secret) => ({ v: secret }),
  },
  {
    keyword: 'maximum',
    schema: { properties: { v: { type: 'integer', maximum: 10 } } },
    secret: fc.integer({ min: 1000, max: 1_000_000 }).map(String),
    instance: (secret) => ({ v: Number(secret) }),
  },
  {
    keyword: 'multipleOf',
    schema: { properties: { v: { type: 'integer', multipleOf: 7 } } },
    secret: fc.integer({ min: 150, max: 100_000 }).map((k) => String(7 * k + 1)),
    instance: (secret) => ({ v: Number(secret) }),
  },
  {
    keyword: 'propertyNames',
    schema: { propertyNames: { pattern: '^[A-Z]' } },
    secret: word,
    instance: (secret) => ({ [secret]: 1 }),
  },
];

function allMessages(failure: ValidationFailure): string[] {
  return [failure.message, ...failure.causes.flatMap(allMessages)];
}

describe('instance failure redaction', () => {
  const validator = new Validator({ logger: silentLogger });

  it.each(CASES)(
    'never echoes a value rejected by $keyword',
    async ({ schema, secret, instance }) => {
      await fc.assert(
        fc.asyncProperty(secret, async (value) => {
          const result = await validator.validateInstance(instance(value), schema);
          if (result.isOk()) return false;
          return allMessages(result.error.failure).every(
            (message) => !message.includes(value)
          );
        }),
        { numRuns: 25 }
      );
    }
  );

  it('names the rejecting keyword in the redacted message', async () => {
    const result = await validator.validateInstance(
      { v: 'zqhidden1' },
      { properties: { v: { enum: ['allowed'] } } }
    );

    expect(result.isErr() && result.error.message).toBe(
      '#/v: failed validation constraint for keyword [enum]'
    );
  });
});
