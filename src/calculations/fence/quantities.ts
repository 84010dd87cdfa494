/**
 * Fence Quantity Calculations
 * Every partial post, roll, box or batten is bought whole, so all divisions round up.
 */

import {
  BracingBreakdown,
  InsulatorBreakdown,
  PostBreakdown,
  StapleBreakdown
} from '../../types';
import { FenceRules } from '../../constants';
import { InternalCalculationError } from '../../errors';

// Quotients within this many ulps (relative) of an integer are treated as exact
const QUOTIENT_ULPS = 4;

/**
 * Ceiling division that ignores binary floating-point noise,
 * e.g. 1.1 / 0.1 = 11.000000000000002 is 11, not 12.
 * The tolerance scales with the quotient, so genuine fractions still round up.
 */
export function ceilDiv(numerator: number, denominator: number): number {
  const quotient = numerator / denominator;
  const nearest = Math.round(quotient);
  const tolerance = QUOTIENT_ULPS * Number.EPSILON * Math.max(1, Math.abs(quotient));
  if (Math.abs(quotient - nearest) <= tolerance) {
    return nearest;
  }
  return Math.ceil(quotient);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Posts: ceil(length / spacing) + 1, the two run ends being end posts.
 */
export function calculatePosts(
  fenceLength: number,
  postSpacing: number,
  rules: FenceRules
): PostBreakdown {
  const total = ceilDiv(fenceLength, postSpacing) + 1;
  const end = Math.min(rules.end_posts_per_run, total);

  return { total, end, line: total - end };
}

/**
 * Rolls of wire or netting needed to cover a run
 */
export function calculateRolls(lengthM: number, rollLengthM: number): number {
  if (lengthM <= 0) return 0;
  return ceilDiv(lengthM, rollLengthM);
}

/**
 * Staples for stapled (non-hot) wires and netting.
 * Per wire: one per line post, two per end post by default.
 * Netting adds a fixed count per post.
 */
export function calculateStaples(
  stapledWires: number,
  posts: PostBreakdown,
  hasNetting: boolean,
  staplesPerBox: number,
  rules: FenceRules
): StapleBreakdown {
  const perWire =
    rules.staples_per_wire_per_line_post * posts.line +
    rules.staples_per_wire_per_end_post * posts.end;
  const forNetting = hasNetting ? rules.staples_per_post_for_netting * posts.total : 0;
  const count = stapledWires * perWire + forNetting;

  return {
    count,
    per_box: staplesPerBox,
    boxes: count > 0 ? ceilDiv(count, staplesPerBox) : 0
  };
}

/**
 * Battens fill the batten positions (spaced at a fraction of the post
 * spacing) that are not already taken by posts.
 */
export function calculateBattens(
  fenceLength: number,
  postSpacing: number,
  spacingFraction: number | null,
  totalPosts: number
): number {
  if (spacingFraction === null) return 0;
  const battenSpacing = postSpacing * spacingFraction;
  const positions = ceilDiv(fenceLength, battenSpacing) + 1;
  return Math.max(positions - totalPosts, 0);
}

/**
 * Hot wires ride on insulators: bullnose at end posts, claw on line posts
 */
export function calculateInsulators(hotWires: number, posts: PostBreakdown): InsulatorBreakdown {
  return {
    bullnose: posts.end * hotWires,
    claw: posts.line * hotWires
  };
}

export function calculateBracing(fenceLength: number, rules: FenceRules): BracingBreakdown {
  return {
    stay_posts: ceilDiv(fenceLength, rules.stay_post_interval_m),
    triplex: ceilDiv(fenceLength, rules.triplex_interval_m)
  };
}

/**
 * Walk a computed value and fail on any negative or non-finite number.
 * Unreachable for validated input.
 */
export function assertNonNegative(value: unknown, path: string): void {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new InternalCalculationError(path, value);
    }
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => assertNonNegative(item, `${path}[${index}]`));
    return;
  }

  if (typeof value === 'object' && value !== null) {
    for (const [key, child] of Object.entries(value)) {
      assertNonNegative(child, path ? `${path}.${key}` : key);
    }
  }
}
