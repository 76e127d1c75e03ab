import type { HealthStatus } from '../types/patient';
import { HEALTH_STATUSES } from '../types/patient';
import type { RandomSource } from '../utils/random';

export type StatusDistribution = Record<HealthStatus, number>;

export const DEFAULT_STATUS_DISTRIBUTION: Readonly<StatusDistribution> = Object.freeze({
  normal: 0.7,
  low: 0.15,
  high: 0.15,
});

/**
 * Draws each patient's health status independently, weighted by the
 * distribution. Small batches are not forced to match the proportions.
 */
export class HealthStatusSampler {
  constructor(
    private readonly random: RandomSource,
    private readonly distribution: Readonly<StatusDistribution> = DEFAULT_STATUS_DISTRIBUTION,
  ) {}

  next(): HealthStatus {
    return this.random.weightedPick(
      HEALTH_STATUSES.map((status) => ({ value: status, weight: this.distribution[status] })),
    );
  }
}
