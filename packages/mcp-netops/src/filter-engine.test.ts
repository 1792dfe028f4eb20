import { describe, it, expect } from 'vitest';
import { DEFAULT_FILTER_SET, evaluate, evaluatePredicate, parseFilterSet } from './filter-engine.js';
import { ConfigurationError } from './errors.js';
import type { FilterPredicate } from './types.js';

function predicate(overrides: Partial<FilterPredicate>): FilterPredicate {
  return {
    field: 'os',
    qualifier: 'EQUALS',
    values: ['ios'],
    inverted: false,
    matchPolicy: 'ANY',
    ...overrides,
  };
}

describe('evaluatePredicate', () => {
  it('compares EQUALS values exactly', () => {
    const p = predicate({ values: ['ios'] });
    expect(evaluatePredicate({ os: 'ios' }, p)).toBe(true);
    expect(evaluatePredicate({ os: 'iosxe' }, p)).toBe(false);
  });

  it('matches patterns anywhere in the field', () => {
    const p = predicate({ qualifier: 'MATCHES_PATTERN', values: ['xe'] });
    expect(evaluatePredicate({ os: 'iosxe' }, p)).toBe(true);
    expect(evaluatePredicate({ os: 'nxos' }, p)).toBe(false);
  });

  it('needs only one value under ANY', () => {
    const p = predicate({ values: ['junos', 'ios'] });
    expect(evaluatePredicate({ os: 'ios' }, p)).toBe(true);
  });

  it('needs every value under ALL', () => {
    const p = predicate({ qualifier: 'MATCHES_PATTERN', values: ['^core', 'sw'], matchPolicy: 'ALL' });
    expect(evaluatePredicate({ os: 'core-sw-01' }, p)).toBe(true);
    expect(evaluatePredicate({ os: 'core-rtr-01' }, p)).toBe(false);
  });

  it('stringifies non-string fields and treats null as empty', () => {
    expect(evaluatePredicate({ port: 22 }, predicate({ field: 'port', values: ['22'] }))).toBe(true);
    expect(evaluatePredicate({ os: null }, predicate({ qualifier: 'MATCHES_PATTERN', values: ['^$'] }))).toBe(true);
  });

  it('inversion is the complement for every candidate with the field', () => {
    const candidates = [{ os: 'ios' }, { os: 'junos' }, { os: '' }, { os: 'linux' }];
    const plain = predicate({ qualifier: 'MATCHES_PATTERN', values: ['os$', 'linux'] });
    const inverted = { ...plain, inverted: true };

    for (const candidate of candidates) {
      expect(evaluatePredicate(candidate, inverted)).toBe(!evaluatePredicate(candidate, plain));
    }
  });

  it('treats an unknown field as not satisfied even when inverted', () => {
    expect(evaluatePredicate({ os: 'ios' }, predicate({ field: 'vendor' }))).toBe(false);
    expect(evaluatePredicate({ os: 'ios' }, predicate({ field: 'vendor', inverted: true }))).toBe(false);
  });
});

describe('evaluate', () => {
  it('requires every predicate to pass', () => {
    const set = [
      predicate({ values: ['ios'] }),
      predicate({ field: 'location', qualifier: 'MATCHES_PATTERN', values: ['^DC1'] }),
    ];
    expect(evaluate({ os: 'ios', location: 'DC1 row 4' }, set)).toBe(true);
    expect(evaluate({ os: 'ios', location: 'DC2 row 4' }, set)).toBe(false);
  });

  it('includes everything for an empty set', () => {
    expect(evaluate({ os: 'anything' }, [])).toBe(true);
  });

  it('default set excludes non-network operating systems', () => {
    expect(evaluate({ os: 'ios' }, DEFAULT_FILTER_SET)).toBe(true);
    expect(evaluate({ os: 'junos' }, DEFAULT_FILTER_SET)).toBe(true);
    expect(evaluate({ os: 'linux' }, DEFAULT_FILTER_SET)).toBe(false);
    expect(evaluate({ os: 'vmware-esxi' }, DEFAULT_FILTER_SET)).toBe(false);
    expect(evaluate({ os: '' }, DEFAULT_FILTER_SET)).toBe(false);
    expect(evaluate({ os: 'some os' }, DEFAULT_FILTER_SET)).toBe(false);
  });
});

describe('parseFilterSet', () => {
  it('fills defaults and wraps a single value', () => {
    const set = parseFilterSet([{ field: 'os', qualifier: 'EQUALS', values: 'ios' }]);
    expect(set).toEqual([
      { field: 'os', qualifier: 'EQUALS', values: ['ios'], inverted: false, matchPolicy: 'ANY' },
    ]);
  });

  it('rejects invalid regular expressions', () => {
    expect(() => parseFilterSet([{ field: 'os', qualifier: 'MATCHES_PATTERN', values: ['(unclosed'] }]))
      .toThrow(ConfigurationError);
  });

  it('rejects unknown qualifiers', () => {
    expect(() => parseFilterSet([{ field: 'os', qualifier: 'LIKE', values: ['x'] }])).toThrow(/Invalid filter definition/);
  });
});
