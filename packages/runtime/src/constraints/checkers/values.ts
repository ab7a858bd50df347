// Value helpers shared by checkers

import {
  ConstraintProperty,
  type Id,
  type Snak,
  type ClassRelation,
  type ListedValue,
  type TimeValue,
  type TimeBound,
} from '@claimwatch/protocol';
import type { RevisionWrapper } from '../../revisions/wrapper.js';
import type { LinkedStatement, ReferenceLookup } from '../reference.js';

/**
 * Whether a snak's value is one of the listed values.
 * Sentinels match by snak type, entity values by id.
 * @returns null for values a list cannot name (strings, quantities, ...)
 */
export function inValues(snak: Snak, values: readonly ListedValue[]): boolean | null {
  if (snak.snaktype !== 'value') return values.includes(snak.snaktype);
  if (snak.datavalue.type === 'entity') return values.includes(snak.datavalue.id);
  return null;
}

/**
 * Decimal amount of a quantity snak, if any
 */
export function quantityAmount(snak: Snak): string | null {
  return snak.snaktype === 'value' && snak.datavalue.type === 'quantity' ? snak.datavalue.amount : null;
}

/**
 * Entity id a snak points to, if any
 */
export function targetOf(snak: Snak): Id | null {
  return snak.snaktype === 'value' && snak.datavalue.type === 'entity' ? snak.datavalue.id : null;
}

/**
 * Unit item id of a quantity unit, accepting concept URIs
 */
export function unitId(unit: string): string {
  return unit.slice(unit.lastIndexOf('/') + 1);
}

const DECIMAL_PATTERN = /^([+-]?)(\d+)(?:\.(\d+))?$/;

/**
 * A decimal string as an integer count of 10^-scale units
 */
function parseDecimal(text: string): { units: bigint; scale: number } {
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new Error(`Unreadable decimal: ${text}`);
  }
  const [, sign, whole, fraction = ''] = match;
  const units = BigInt(`${whole}${fraction}`);
  return { units: sign === '-' ? -units : units, scale: fraction.length };
}

/**
 * Exact comparison of two decimal strings ("+12.50", "-3", "7")
 * @returns negative, zero or positive like a sort comparator
 */
export function compareDecimals(a: string, b: string): number {
  const left = parseDecimal(a);
  const right = parseDecimal(b);
  const scale = Math.max(left.scale, right.scale);
  const x = left.units * 10n ** BigInt(scale - left.scale);
  const y = right.units * 10n ** BigInt(scale - right.scale);
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Whether a decimal string has a non-zero digit after the point
 */
export function hasFraction(amount: string): boolean {
  const { units, scale } = parseDecimal(amount);
  return scale > 0 && units % 10n ** BigInt(scale) !== 0n;
}

/**
 * Base-10 logarithm of the absolute value of a decimal string
 * @returns null for zero
 */
export function decimalMagnitude(amount: string): number | null {
  const { units, scale } = parseDecimal(amount);
  const digits = (units < 0n ? -units : units).toString();
  if (digits === '0') return null;
  const mantissa = Number(`${digits.slice(0, 1)}.${digits.slice(1, 16)}`);
  return Math.log10(mantissa) + digits.length - 1 - scale;
}

/**
 * Compile a format pattern so that it must match the whole text.
 * Patterns are read as Unicode patterns (so `\p{L}` is a letter class);
 * patterns only valid in the legacy syntax fall back to it.
 *
 * @throws SyntaxError if the pattern is invalid in both syntaxes
 */
export function compileFormat(pattern: string): RegExp {
  const source = `^(?:${pattern})$`;
  try {
    return new RegExp(source, 'u');
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    return new RegExp(source);
  }
}

const TIME_PATTERN = /^([+-]\d+)-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Time components [year, month, day, hour, minute, second] cut to a precision.
 * Precision 9 keeps the year only, 14 keeps everything down to seconds.
 */
export function timeComponents(value: TimeValue, precision: number): number[] {
  const match = TIME_PATTERN.exec(value.time);
  if (!match) {
    throw new Error(`Unreadable time value: ${value.time}`);
  }
  return match.slice(1).map(Number).slice(0, Math.max(1, precision - 8));
}

/**
 * All six components, with those finer than the value's precision reset
 * (month and day to 1, the clock to 0)
 */
export function normalizeTime(value: TimeValue): number[] {
  const [year, month = 1, day = 1, hour = 0, minute = 0, second = 0] = timeComponents(value, value.precision);
  return [year, Math.max(month, 1), Math.max(day, 1), hour, minute, second];
}

/**
 * Epoch milliseconds of a normalized time value
 */
export function timeToEpochMs(value: TimeValue): number {
  const [year, month, day, hour, minute, second] = normalizeTime(value);
  const date = new Date(0);
  date.setUTCFullYear(year, Math.max(month, 1) - 1, Math.max(day, 1));
  date.setUTCHours(hour, minute, second, 0);
  return date.getTime();
}

export function compareComponents(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

/**
 * Resolve a time bound; "now" becomes the current second
 */
export function resolveTimeBound(bound: TimeBound): TimeValue {
  if (bound !== 'now') return bound;
  const iso = new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
  return { type: 'time', time: `+${iso}`, precision: 14 };
}

/**
 * Properties that connect an entity to classes under a relation
 */
export function relationProperties(relation: ClassRelation): Id[] {
  switch (relation) {
    case 'instance':
      return [ConstraintProperty.INSTANCE_OF];
    case 'subclass':
      return [ConstraintProperty.SUBCLASS_OF];
    case 'instance_or_subclass':
      return [ConstraintProperty.INSTANCE_OF, ConstraintProperty.SUBCLASS_OF];
  }
}

/**
 * Entity ids an entity points to through the given properties
 */
export function entityTargets(entity: RevisionWrapper, propertyIds: Id[]): Id[] {
  return propertyIds.flatMap((propertyId) =>
    entity.activeStatements(propertyId).flatMap((s) => {
      const target = targetOf(s.mainsnak);
      return target ? [target] : [];
    })
  );
}

/**
 * Entity ids a linked entity points to through the given properties
 */
export function linkedTargets(statements: LinkedStatement[], propertyIds: Id[]): Id[] {
  return statements.flatMap((s) => {
    if (!propertyIds.includes(s.propertyId) || s.rank === 'deprecated') return [];
    const target = targetOf(s.mainsnak);
    return target ? [target] : [];
  });
}

/**
 * Whether any of the start classes is, or is a subclass of, one of `classes`
 */
export async function reachesClass(
  startIds: Id[],
  classes: readonly Id[],
  lookup: ReferenceLookup
): Promise<boolean> {
  if (startIds.length === 0) return false;
  if (startIds.some((id) => classes.includes(id))) return true;

  const superclasses = await lookup.superclassesOf(startIds);
  for (const supers of superclasses.values()) {
    if (classes.some((id) => supers.has(id))) return true;
  }
  return false;
}
