/**
 * Lab Value Generator
 *
 * Synthesises lab results placed inside the reference range for normal
 * patients, strictly below it for low patients and strictly above it for
 * high patients.
 */

import { ConfigError } from '../errors';
import type { LabTestDefinition } from '../types/glossary';
import type { HealthStatus, LabResult, LabResultStatus } from '../types/patient';
import type { RandomSource } from '../utils/random';

const MIN_DECIMALS = 1;
const MAX_DECIMALS = 6;
const OUTLIER_SPREAD = 0.2;
const CEILING_SPANS = 3;

const STATUS_LABELS: Record<HealthStatus, LabResultStatus> = {
  normal: 'Normal',
  low: 'Low',
  high: 'High',
};

/** Number of digits after the decimal point needed to write `value`. */
export const countDecimals = (value: number): number => {
  const text = String(value);
  const exponent = text.match(/e-(\d+)$/);
  if (exponent) {
    const mantissa = text.split('e')[0];
    const mantissaDecimals = mantissa.includes('.') ? mantissa.split('.')[1].length : 0;
    return Number(exponent[1]) + mantissaDecimals;
  }
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
};

export const roundTo = (value: number, decimals: number): number => Number(value.toFixed(decimals));

interface ValidatedRange {
  min: number;
  max: number;
}

const validateRange = (test: LabTestDefinition): ValidatedRange => {
  const { minRange, maxRange } = test;
  const label = `${test.testGroupName} / ${test.testAttributeName}`;
  if (typeof minRange !== 'number' || typeof maxRange !== 'number') {
    throw new ConfigError(`Lab test ${label} has no reference range`);
  }
  if (!Number.isFinite(minRange) || !Number.isFinite(maxRange) || minRange >= maxRange) {
    throw new ConfigError(`Lab test ${label} has an invalid reference range [${minRange}, ${maxRange}]`);
  }
  return { min: minRange, max: maxRange };
};

export class LabValueGenerator {
  constructor(private readonly random: RandomSource) {}

  generate(selectedTests: readonly LabTestDefinition[], healthStatus: HealthStatus): LabResult[] {
    return selectedTests.map((test) => this.generateResult(test, healthStatus));
  }

  generateResult(test: LabTestDefinition, healthStatus: HealthStatus): LabResult {
    const { min, max } = validateRange(test);
    return {
      testGroupName: test.testGroupName,
      testAttributeName: test.testAttributeName,
      value: this.generateValue(min, max, healthStatus),
      unit: test.unit,
      minRange: min,
      maxRange: max,
      status: STATUS_LABELS[healthStatus],
    };
  }

  /**
   * Draw a value for the range [min, max]. Precision follows the bounds
   * (at least one decimal) so a rounded value never lands on a bound when
   * it must lie outside the range.
   */
  generateValue(min: number, max: number, healthStatus: HealthStatus): number {
    const decimals = Math.min(
      MAX_DECIMALS,
      Math.max(MIN_DECIMALS, countDecimals(min), countDecimals(max)),
    );
    const step = 10 ** -decimals;
    const span = max - min;

    switch (healthStatus) {
      case 'normal': {
        const drawn = this.random.normal((min + max) / 2, span / 6);
        return Math.min(max, Math.max(min, roundTo(drawn, decimals)));
      }
      case 'low': {
        const floor = min > 0 ? 0 : roundTo(min - span, decimals);
        const offset = Math.max(step, Math.abs(this.random.normal(0, span * OUTLIER_SPREAD)));
        let value = Math.max(floor, roundTo(min - offset, decimals));
        if (value >= min) {
          value = roundTo(min - step, decimals);
        }
        return value;
      }
      case 'high': {
        const ceiling = max + span * CEILING_SPANS;
        const offset = Math.max(step, Math.abs(this.random.normal(0, span * OUTLIER_SPREAD)));
        let value = Math.min(roundTo(ceiling, decimals), roundTo(max + offset, decimals));
        if (value <= max) {
          value = roundTo(max + step, decimals);
        }
        return value;
      }
    }
  }
}
