import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { FilterPredicate, FilterSet } from './types.js';

export const filterPredicateSchema = z
  .object({
    field: z.string().min(1),
    qualifier: z.enum(['EQUALS', 'MATCHES_PATTERN']),
    values: z
      .union([z.string(), z.array(z.string()).min(1)])
      .transform(v => (typeof v === 'string' ? [v] : v)),
    inverted: z.boolean().default(false),
    matchPolicy: z.enum(['ANY', 'ALL']).default('ANY'),
  })
  .superRefine((predicate, ctx) => {
    if (predicate.qualifier !== 'MATCHES_PATTERN') return;
    for (const value of predicate.values) {
      try {
        new RegExp(value);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['values'],
          message: `Invalid regular expression: ${value}`,
        });
      }
    }
  });

// Device classes that never run a network OS worth talking to
export const NON_NETWORK_OS_PATTERNS: readonly string[] = [
  'windows',
  'linux',
  'proxmox',
  'vmware',
  'esxi',
  'apc',
  'drac',
  'ping',
  'pdu',
  'exagrid',
  '\\s',
  '^$',
];

export const DEFAULT_FILTER_SET: FilterSet = Object.freeze([
  Object.freeze({
    field: 'os',
    qualifier: 'MATCHES_PATTERN',
    values: NON_NETWORK_OS_PATTERNS,
    inverted: true,
    matchPolicy: 'ANY',
  } satisfies FilterPredicate),
]);

export function parseFilterSet(raw: unknown): FilterSet {
  const result = z.array(filterPredicateSchema).safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map(e => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Invalid filter definition:\n${errors}`);
  }
  return result.data;
}

function fieldText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

function testValue(predicate: FilterPredicate, text: string, value: string): boolean {
  if (predicate.qualifier === 'EQUALS') {
    return text === value;
  }
  return new RegExp(value).test(text);
}

// Unknown fields never satisfy a predicate, inverted or not
export function evaluatePredicate(candidate: Record<string, unknown>, predicate: FilterPredicate): boolean {
  if (!Object.prototype.hasOwnProperty.call(candidate, predicate.field)) {
    return false;
  }

  const text = fieldText(candidate[predicate.field]);
  const matches = predicate.values.filter(value => testValue(predicate, text, value)).length;

  const satisfied = predicate.matchPolicy === 'ALL'
    ? matches === predicate.values.length
    : matches > 0;

  return satisfied !== predicate.inverted;
}

export function evaluate(candidate: Record<string, unknown>, filterSet: FilterSet): boolean {
  return filterSet.every(predicate => evaluatePredicate(candidate, predicate));
}
