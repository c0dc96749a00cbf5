import Winston from 'winston';
import {FieldParseError} from './errors';
import {UnknownState} from './types/Constants';
import {SensorState} from './types/SensorRecord';

export type Fields = Record<string, unknown>;

type FloatOptions = {
  // Drop every '+' before converting. Only temperatures carry one.
  stripPlus?: boolean;
  // Name used in log lines, e.g. TEMP.IN for the IN key of TEMP.
  label?: string;
};

const DecimalPattern = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const UnsignedDecimalPattern = /^(\d+\.?\d*|\.\d+)$/;

export function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

function toFloat(field: string, value: unknown, stripPlus: boolean): number {
  if (typeof value === 'number') {
    if (Number.isFinite(value)) {
      return value;
    }
    throw new FieldParseError(field, value);
  }
  if (typeof value === 'string') {
    const text = (stripPlus ? value.replace(/\+/g, '') : value).trim();
    if (DecimalPattern.test(text)) {
      return parseFloat(text);
    }
  }
  throw new FieldParseError(field, value);
}

/**
 * Reads a float field. Absent, null and empty values give null; anything
 * that does not convert is logged and gives null as well. A finite JSON
 * number is taken as it is, even where the controller sends strings.
 */
export function readFloat(
  logger: Winston.Logger,
  fields: Fields,
  key: string,
  options: FloatOptions = {}
): number | null {
  const value = fields[key];
  if (!isPresent(value)) {
    return null;
  }

  const label = options.label ?? key;
  try {
    return toFloat(label, value, options.stripPlus ?? false);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`Error converting ${label}: ${reason}`);
    return null;
  }
}

function toMeterValue(field: string, value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string') {
    return UnsignedDecimalPattern.test(value) ? parseFloat(value) : null;
  }
  throw new FieldParseError(field, value);
}

/**
 * Reads a meter value. Only plain digits with at most one decimal point are
 * accepted, so signs, exponents and stray characters all give null without
 * an error log. Unlike the controller's own string encoding, a non-negative
 * JSON number is taken as the reading.
 */
export function readMeterValue(
  logger: Winston.Logger,
  fields: Fields,
  key: string
): number | null {
  const value = fields[key];
  if (!isPresent(value)) {
    return null;
  }

  try {
    const reading = toMeterValue(key, value);
    if (reading === null) {
      logger.debug(`Ignoring ${key} value that is not a plain decimal`, {
        value,
      });
    }
    return reading;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`Error converting ${key}: ${reason}`);
    return null;
  }
}

export function readToken(fields: Fields, key: string): SensorState {
  const value = fields[key];
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  return UnknownState;
}

export function readText(fields: Fields, key: string): string | undefined {
  const value = fields[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function readObject(fields: Fields, key: string): Fields | undefined {
  const value = fields[key];
  return isFields(value) ? value : undefined;
}

export function readList(fields: Fields, key: string): unknown[] {
  const value = fields[key];
  return Array.isArray(value) ? value : [];
}
