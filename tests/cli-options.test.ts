/**
 * Chime - CLI Argument Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseDueTime, parseInterval, parsePositiveInt } from '../src/cli/utils/options';

describe('CLI options', () => {
  it('parses repeat intervals', () => {
    expect(parseInterval('days')).toEqual({ unit: 'days', count: 1 });
    expect(parseInterval('Weeks:2')).toEqual({ unit: 'weeks', count: 2 });
    expect(() => parseInterval('years')).toThrow(InvalidArgumentError);
    expect(() => parseInterval('months:0')).toThrow(InvalidArgumentError);
  });

  it('requires due times with an explicit offset', () => {
    expect(parseDueTime('2024-01-02T15:00:00Z')).toEqual(new Date('2024-01-02T15:00:00Z'));
    expect(parseDueTime('2024-01-02T16:00:00+01:00')).toEqual(new Date('2024-01-02T15:00:00Z'));
    expect(() => parseDueTime('2024-01-02T15:00')).toThrow(InvalidArgumentError);
    expect(() => parseDueTime('next tuesdayZ')).toThrow(InvalidArgumentError);
  });

  it('accepts positive whole numbers only', () => {
    expect(parsePositiveInt('15')).toBe(15);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
  });
});
