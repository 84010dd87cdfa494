/**
 * Labor Calculation Service
 * Formula: hours = ceil(length / build_rate), cost = hours × rate
 */

import { LaborBreakdown } from '../types';
import { ceilDiv, round2 } from '../calculations/fence/quantities';

export function calculateLaborHours(fenceLength: number, buildRate: number): number {
  return ceilDiv(fenceLength, buildRate);
}

export function calculateLaborCost(
  fenceLength: number,
  buildRate: number,
  ratePerHour: number
): LaborBreakdown {
  const hours = calculateLaborHours(fenceLength, buildRate);

  return {
    hours,
    rate_per_hour: round2(ratePerHour),
    cost: round2(hours * ratePerHour)
  };
}
