import { describe, expect, it } from 'vitest';

import {
  AggregateCommandOptionsSchema,
  IngestCommandOptionsSchema,
  RunCommandOptionsSchema,
  ValidateCommandOptionsSchema,
} from '../schemas.js';

describe('command option schemas', () => {
  it('defaults ingest to USD and upper-cases the currency', () => {
    expect(IngestCommandOptionsSchema.parse({})).toEqual({ currency: 'USD' });
    expect(IngestCommandOptionsSchema.parse({ currency: 'eur', json: true })).toEqual({ currency: 'EUR', json: true });
  });

  it('rejects a malformed currency', () => {
    const result = IngestCommandOptionsSchema.safeParse({ currency: 'EURO' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('--currency must be a 3-letter currency code (e.g. USD)');
  });

  it('accepts real calendar dates only', () => {
    expect(ValidateCommandOptionsSchema.parse({ date: '2024-02-29' })).toEqual({ date: '2024-02-29' });

    const result = ValidateCommandOptionsSchema.safeParse({ date: '2023-02-29' });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('--date must be a calendar date in YYYY-MM-DD form');
  });

  it('coerces --days-back and defaults it to 7', () => {
    expect(AggregateCommandOptionsSchema.parse({})).toEqual({ daysBack: 7 });
    expect(AggregateCommandOptionsSchema.parse({ daysBack: '30' })).toEqual({ daysBack: 30 });
  });

  it.each([
    ['0', '--days-back must be at least 1'],
    ['2.5', '--days-back must be a whole number of days'],
    ['week', '--days-back must be a number'],
  ])('rejects --days-back %s', (daysBack, message) => {
    const result = AggregateCommandOptionsSchema.safeParse({ daysBack });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe(message);
  });

  it('fills every run default', () => {
    expect(RunCommandOptionsSchema.parse({})).toEqual({ stage: 'all', currency: 'USD', daysBack: 7 });
  });

  it('rejects an unknown stage', () => {
    const result = RunCommandOptionsSchema.safeParse({ stage: 'load' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('--stage must be one of: all, ingest, validate, aggregate');
  });
});
