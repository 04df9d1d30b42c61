/**
 * Algorithm descriptor parsing
 *
 * Descriptor format: argon2id:{time} {memory}MB {keylen}
 * e.g. "argon2id:3 64MB 32"
 *
 * Every field is bounds-checked at parse time so a tampered artifact is
 * rejected before any derivation work is attempted.
 */

import type { ApiKeyConfig } from '@clientkey/core';
import {
  MalformedDescriptorError,
  OutOfRangeError,
  UnsupportedAlgorithmError,
  type AlgorithmField,
} from './errors.js';
import { splitN } from './utils/split.js';

export const ALGORITHM_ID = 'argon2id:';
export const MEMORY_SUFFIX = 'MB';
export const DEFAULT_ALGORITHM = 'argon2id:3 64MB 32';

const FIELD_SEPARATOR = ' ';
const FIELD_COUNT = 3;
const DECIMAL = /^[0-9]+$/;

export interface Range {
  min: number;
  max: number;
}

export interface AlgorithmBounds {
  timeCost: Range;
  memoryCostMB: Range;
  outputLen: Range;
}

export const DEFAULT_BOUNDS: AlgorithmBounds = {
  timeCost: { min: 1, max: 5 },
  memoryCostMB: { min: 16, max: 64 },
  outputLen: { min: 16, max: 64 },
};

export function boundsFromConfig(config: ApiKeyConfig): AlgorithmBounds {
  return {
    timeCost: config.bounds.time_cost,
    memoryCostMB: config.bounds.memory_cost_mb,
    outputLen: config.bounds.output_length,
  };
}

/**
 * Parsed argon2id parameters. Immutable.
 *
 * The only way to obtain one is from descriptor text, so the numeric fields
 * always agree with canonicalString.
 */
export class AlgorithmSpec {
  /** Exact text this value was parsed from */
  readonly canonicalString: string;
  readonly timeCost: number;
  readonly memoryCostMB: number;
  readonly outputLen: number;

  /**
   * @throws UnsupportedAlgorithmError if the argon2id: prefix is missing
   * @throws MalformedDescriptorError on missing or non-decimal fields and a wrong memory suffix
   * @throws OutOfRangeError if a field falls outside its bounds
   */
  constructor(descriptor: string, bounds: AlgorithmBounds = DEFAULT_BOUNDS) {
    const fields = parseFields(descriptor, bounds);
    this.canonicalString = descriptor;
    this.timeCost = fields.timeCost;
    this.memoryCostMB = fields.memoryCostMB;
    this.outputLen = fields.outputLen;
    Object.freeze(this);
  }

  /** argon2 takes its memory cost in KiB */
  get memoryCostKiB(): number {
    return this.memoryCostMB * 1024;
  }

  /**
   * The descriptor as it was parsed. Artifacts issued under older defaults
   * keep their original text.
   */
  render(): string {
    return this.canonicalString;
  }

  toString(): string {
    return this.canonicalString;
  }
}

export class AlgorithmParser {
  constructor(private readonly bounds: AlgorithmBounds = DEFAULT_BOUNDS) {}

  /**
   * Parse a descriptor against this parser's bounds. The first failing field
   * determines the error.
   */
  parse(descriptor: string): AlgorithmSpec {
    return new AlgorithmSpec(descriptor, this.bounds);
  }
}

const defaultParser = new AlgorithmParser();

/**
 * Parse a descriptor against the default bounds, or the given ones.
 */
export function parseAlgorithm(descriptor: string, bounds?: AlgorithmBounds): AlgorithmSpec {
  return bounds ? new AlgorithmParser(bounds).parse(descriptor) : defaultParser.parse(descriptor);
}

function parseFields(
  descriptor: string,
  bounds: AlgorithmBounds
): Pick<AlgorithmSpec, 'timeCost' | 'memoryCostMB' | 'outputLen'> {
  if (!descriptor.startsWith(ALGORITHM_ID)) {
    throw new UnsupportedAlgorithmError(descriptor);
  }

  const parts = splitN(descriptor.slice(ALGORITHM_ID.length), FIELD_SEPARATOR, FIELD_COUNT);
  const [time, memory, keyLen] = parts;
  if (
    parts.length !== FIELD_COUNT ||
    time === undefined ||
    memory === undefined ||
    keyLen === undefined
  ) {
    throw new MalformedDescriptorError(`Bad algorithm descriptor '${descriptor}'`, {
      descriptor,
      parts: parts.length,
    });
  }

  const timeCost = checked('time_cost', parseDecimal('time_cost', time), bounds.timeCost);

  if (!memory.endsWith(MEMORY_SUFFIX)) {
    throw new MalformedDescriptorError(
      `Bad memory component '${memory}' (wrong or missing suffix)`,
      { field: 'memory_cost_mb', text: memory }
    );
  }
  const memoryCostMB = checked(
    'memory_cost_mb',
    parseDecimal('memory_cost_mb', memory.slice(0, -MEMORY_SUFFIX.length)),
    bounds.memoryCostMB
  );

  const outputLen = checked(
    'output_length',
    parseDecimal('output_length', keyLen),
    bounds.outputLen
  );

  return { timeCost, memoryCostMB, outputLen };
}

function checked(field: AlgorithmField, value: number, range: Range): number {
  if (value > range.max) {
    throw new OutOfRangeError(field, value, range.max, 'max');
  }
  if (value < range.min) {
    throw new OutOfRangeError(field, value, range.min, 'min');
  }
  return value;
}

function parseDecimal(field: AlgorithmField, text: string): number {
  if (!DECIMAL.test(text)) {
    throw new MalformedDescriptorError(`Bad ${field} component '${text}'`, { field, text });
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedDescriptorError(`Bad ${field} component '${text}'`, { field, text });
  }
  return value;
}
