/**
 * Fence Calculation Orchestrator
 * Single pass from (FenceSpec, PriceCatalog) to CalculationResult.
 * The catalog is never mutated.
 */

import {
  CalculationResult,
  FenceSpec,
  MaterialLine,
  PriceCatalog,
  WireBreakdown
} from '../../types';
import { DEFAULT_FENCE_RULES, FenceRules } from '../../constants';
import {
  requiredMaterials,
  validatePriceCatalog,
  ValidatedCalculationInput
} from '../../validation/fence';
import { calculateLaborCost } from '../../services/labor';
import { CatalogSource, fetchPriceCatalog } from '../../services/pricing';
import { config } from '../../config';
import {
  assertNonNegative,
  calculateBattens,
  calculateBracing,
  calculateInsulators,
  calculatePosts,
  calculateRolls,
  calculateStaples,
  round2
} from './quantities';
import { applyPriceOverrides, calculateTotals, priceMaterial } from './pricing';

function hotWireCount(spec: FenceSpec): number {
  switch (spec.fence_type) {
    case 'hot_wire':
      return spec.hot_wire_count;
    case 'standard':
    case 'netting':
      return 0;
  }
}

function insulatorLabel(name: string, hotWires: number): string {
  return hotWires > 1 ? `${name} (for ${hotWires} hot wires)` : `${name} (for hot wire)`;
}

/**
 * Main calculation function
 */
export function computeFence(
  spec: FenceSpec,
  priceCatalog: PriceCatalog,
  rules: FenceRules = DEFAULT_FENCE_RULES
): CalculationResult {
  const catalog = validatePriceCatalog(priceCatalog, requiredMaterials(spec));
  const { fence_length: length, post_spacing: spacing } = spec;
  const materials: MaterialLine[] = [];
  const add = (line: MaterialLine | null) => {
    if (line) materials.push(line);
  };

  // =========================================================================
  // 1. POSTS
  // =========================================================================

  const posts = calculatePosts(length, spacing, rules);
  add(priceMaterial(catalog, 'line_post', posts.line));
  add(priceMaterial(catalog, 'end_post', posts.end));

  // =========================================================================
  // 2. WIRE (line + hot share one material), BARB, OUTRIGGER
  // =========================================================================

  const hotWires = hotWireCount(spec);
  const rollLength = (key: 'wire' | 'barb_wire' | 'outrigger_wire') =>
    catalog.materials[key]?.unit_size ?? rules.default_wire_roll_length_m;

  const wireLength = round2(length * (spec.line_wire_count + hotWires));
  const barbLength = round2(length * spec.top_wire_count);
  const hasOutrigger = spec.fence_type === 'netting' && spec.electric_outrigger;
  const outriggerLength = hasOutrigger ? length : 0;

  const wire: WireBreakdown = {
    line_wire_count: spec.line_wire_count,
    hot_wire_count: hotWires,
    top_wire_count: spec.top_wire_count,
    wire_length_m: wireLength,
    wire_rolls: calculateRolls(wireLength, rollLength('wire')),
    barb_length_m: barbLength,
    barb_rolls: calculateRolls(barbLength, rollLength('barb_wire')),
    outrigger_length_m: outriggerLength,
    outrigger_rolls: calculateRolls(outriggerLength, rollLength('outrigger_wire'))
  };

  add(priceMaterial(catalog, 'wire', wire.wire_rolls));
  add(priceMaterial(catalog, 'barb_wire', wire.barb_rolls));

  // =========================================================================
  // 3. NETTING
  // =========================================================================

  let nettingRolls = 0;
  if (spec.fence_type === 'netting') {
    const nettingKey = spec.netting_kind === 'deer' ? 'netting_deer' : 'netting_sheep';
    const nettingRoll = catalog.materials[nettingKey]?.unit_size ?? rules.default_netting_roll_length_m;
    nettingRolls = calculateRolls(length, nettingRoll);
    add(priceMaterial(catalog, nettingKey, nettingRolls));
  }

  add(priceMaterial(catalog, 'outrigger_wire', wire.outrigger_rolls));

  // =========================================================================
  // 4. STAPLES (hot wires excluded)
  // =========================================================================

  const staplesPerBox =
    spec.staples_per_box ?? catalog.materials.staples?.unit_size ?? rules.default_staples_per_box;
  const staples = calculateStaples(
    spec.line_wire_count + spec.top_wire_count,
    posts,
    spec.fence_type === 'netting',
    staplesPerBox,
    rules
  );
  add(priceMaterial(catalog, 'staples', staples.boxes));

  // =========================================================================
  // 5. BATTENS
  // =========================================================================

  const battens = calculateBattens(length, spacing, spec.batten_spacing_fraction, posts.total);
  add(priceMaterial(catalog, 'batten', battens));

  // =========================================================================
  // 6. INSULATORS (hot wire only)
  // =========================================================================

  const insulators = calculateInsulators(hotWires, posts);
  if (hotWires > 0) {
    const bullnose = catalog.materials.bullnose_insulator;
    const claw = catalog.materials.claw_insulator;
    if (bullnose) {
      add(priceMaterial(catalog, 'bullnose_insulator', insulators.bullnose, insulatorLabel(bullnose.name, hotWires)));
    }
    if (claw) {
      add(priceMaterial(catalog, 'claw_insulator', insulators.claw, insulatorLabel(claw.name, hotWires)));
    }
  }

  // =========================================================================
  // 7. BRACING
  // =========================================================================

  const bracing = calculateBracing(length, rules);
  add(priceMaterial(catalog, 'stay_post', bracing.stay_posts));
  add(priceMaterial(catalog, 'triplex', bracing.triplex));

  // =========================================================================
  // 8. LABOR & TOTALS
  // =========================================================================

  const labor = calculateLaborCost(length, spec.build_rate, spec.labor_rate);
  const totals = calculateTotals(materials, labor);

  const result: CalculationResult = {
    fence_type: spec.fence_type,
    fence_length: length,
    post_spacing: spacing,
    currency: catalog.currency,
    posts,
    wire,
    netting_rolls: nettingRolls,
    staples,
    battens,
    insulators,
    bracing,
    materials,
    total_material_cost: totals.total_material_cost,
    labor,
    grand_total: totals.grand_total
  };

  assertNonNegative(result, '');
  return result;
}

export interface PricedFenceCalculation {
  region: string;
  pricing_source: CatalogSource;
  result: CalculationResult;
}

/**
 * Calculation with the regional catalog and per-request price overrides
 */
export async function calculateFenceWithPricing(
  input: ValidatedCalculationInput,
  rules: FenceRules = DEFAULT_FENCE_RULES
): Promise<PricedFenceCalculation> {
  const region = input.region ?? config.defaultRegion;
  const { catalog, source } = await fetchPriceCatalog(region);
  const priced = applyPriceOverrides(catalog, input.price_overrides);

  return {
    region,
    pricing_source: source,
    result: computeFence(input.spec, priced, rules)
  };
}
