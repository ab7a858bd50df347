// Typed values carried by snaks

import type { Id } from './common.js';

/**
 * Reference to another entity in the graph
 */
export type EntityValue = {
  type: 'entity';
  id: Id;
};

/**
 * Decimal quantity. Amounts are kept as decimal strings ("+12.5", "-3")
 * so that precision survives serialization.
 */
export type QuantityValue = {
  type: 'quantity';
  amount: string;
  lowerBound?: string;
  upperBound?: string;
  /**
   * Entity id of the unit, or "1" for a unitless quantity
   */
  unit: string;
};

export type StringValue = {
  type: 'string';
  value: string;
};

export type MonolingualTextValue = {
  type: 'monolingualtext';
  text: string;
  language: string;
};

/**
 * Point in time with a precision.
 * Precision follows the graph's convention: 9 = year, 10 = month,
 * 11 = day, 12 = hour, 13 = minute, 14 = second.
 */
export type TimeValue = {
  type: 'time';
  time: string;
  precision: number;
  calendar?: Id;
};

export type GlobeCoordinateValue = {
  type: 'globecoordinate';
  latitude: number;
  longitude: number;
  precision?: number;
  globe?: Id;
};

export type DataValue =
  | EntityValue
  | QuantityValue
  | StringValue
  | MonolingualTextValue
  | TimeValue
  | GlobeCoordinateValue;

export type DataValueType = DataValue['type'];

/**
 * Unit marker for unitless quantities
 */
export const UNITLESS = '1';
