// Checkers over single values, used as main value or as qualifier

import { UNITLESS, DIFFERENCE_UNITS, type DifferenceBound, type TimeValue } from '@claimwatch/protocol';
import { defineValueChecker } from './types.js';
import {
  inValues,
  unitId,
  compileFormat,
  compareDecimals,
  hasFraction,
  timeComponents,
  compareComponents,
  resolveTimeBound,
  normalizeTime,
  timeToEpochMs,
} from './values.js';

export const oneOfChecker = defineValueChecker('one_of', (snak, constraint) => {
  return inValues(snak, constraint.params.values) === false;
});

export const noneOfChecker = defineValueChecker('none_of', (snak, constraint) => {
  return inValues(snak, constraint.params.values) === true;
});

export const formatChecker = defineValueChecker('format', (snak, constraint) => {
  if (snak.snaktype !== 'value') return false;

  let text: string;
  switch (snak.datavalue.type) {
    case 'string':
      text = snak.datavalue.value;
      break;
    case 'monolingualtext':
      text = snak.datavalue.text;
      break;
    default:
      return false;
  }

  return !compileFormat(constraint.params.pattern).test(text);
});

export const quantityRangeChecker = defineValueChecker('quantity_range', (snak, constraint) => {
  if (snak.snaktype !== 'value' || snak.datavalue.type !== 'quantity') return false;

  const { amount } = snak.datavalue;
  const { min, max } = constraint.params;
  return (min !== null && compareDecimals(amount, min) < 0) || (max !== null && compareDecimals(amount, max) > 0);
});

/**
 * Times are compared at the coarser of the two precisions
 */
export const timeRangeChecker = defineValueChecker('time_range', (snak, constraint) => {
  if (snak.snaktype !== 'value' || snak.datavalue.type !== 'time') return false;

  const value = snak.datavalue;
  const { min, max } = constraint.params;

  if (min !== null) {
    const lower = resolveTimeBound(min);
    const precision = Math.min(lower.precision, value.precision);
    if (compareComponents(timeComponents(value, precision), timeComponents(lower, precision)) < 0) {
      return true;
    }
  }

  if (max !== null) {
    const upper = resolveTimeBound(max);
    const precision = Math.min(upper.precision, value.precision);
    if (compareComponents(timeComponents(value, precision), timeComponents(upper, precision)) > 0) {
      return true;
    }
  }

  return false;
});

export const integerChecker = defineValueChecker('integer', (snak) => {
  return snak.snaktype === 'value' && snak.datavalue.type === 'quantity' && hasFraction(snak.datavalue.amount);
});

export const noBoundsChecker = defineValueChecker('no_bounds', (snak) => {
  return (
    snak.snaktype === 'value' &&
    snak.datavalue.type === 'quantity' &&
    (snak.datavalue.lowerBound !== undefined || snak.datavalue.upperBound !== undefined)
  );
});

/**
 * "novalue" among the allowed units permits unitless quantities
 */
export const unitsChecker = defineValueChecker('units', (snak, constraint) => {
  if (snak.snaktype !== 'value' || snak.datavalue.type !== 'quantity') return false;

  const { units } = constraint.params;
  if (snak.datavalue.unit === UNITLESS) return !units.includes('novalue');
  return !units.includes(unitId(snak.datavalue.unit));
});

const MS_PER_DAY = 24 * 60 * 60 * 1000;

type TimeDifference = { years: number; days: number; seconds: number };

/**
 * Difference from `other` to `value`. Years count whole years elapsed,
 * days are rounded down.
 */
function timeDifference(value: TimeValue, other: TimeValue): TimeDifference {
  const [year, month, day] = normalizeTime(value);
  const [otherYear, otherMonth, otherDay] = normalizeTime(other);
  const years = year - otherYear - (compareComponents([month, day], [otherMonth, otherDay]) < 0 ? 1 : 0);
  const ms = timeToEpochMs(value) - timeToEpochMs(other);
  return { years, days: Math.floor(ms / MS_PER_DAY), seconds: Math.floor(ms / 1000) };
}

/**
 * The difference measured in a bound's unit, or null for units that cannot measure time
 */
function measure(difference: TimeDifference, bound: DifferenceBound): string | null {
  switch (bound.unit) {
    case DIFFERENCE_UNITS.YEAR:
      return String(difference.years);
    case DIFFERENCE_UNITS.DAY:
      return String(difference.days);
    case DIFFERENCE_UNITS.SECOND:
      return String(difference.seconds);
    default:
      return null;
  }
}

function outsideRange(difference: TimeDifference, min: DifferenceBound | null, max: DifferenceBound | null): boolean {
  if (min) {
    const measured = measure(difference, min);
    if (measured !== null && compareDecimals(measured, min.amount) < 0) return true;
  }
  if (max) {
    const measured = measure(difference, max);
    if (measured !== null && compareDecimals(measured, max.amount) > 0) return true;
  }
  return false;
}

/**
 * A time must lie within the range from at least one time of the other
 * property. The constraint holds when the other property has no time.
 */
export const differenceWithinRangeChecker = defineValueChecker(
  'difference_within_range',
  (snak, constraint, { entity }) => {
    if (snak.snaktype !== 'value' || snak.datavalue.type !== 'time') return false;
    const value = snak.datavalue;

    const { property, min, max } = constraint.params;
    const others = entity.activeStatements(property).flatMap((s) => {
      const other = s.mainsnak;
      return other.snaktype === 'value' && other.datavalue.type === 'time' ? [other.datavalue] : [];
    });

    if (others.length === 0) return false;
    return others.every((other) => outsideRange(timeDifference(value, other), min, max));
  }
);
