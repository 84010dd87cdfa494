/**
 * Pricing for Fence Calculations
 */

import {
  LaborBreakdown,
  MATERIAL_KEYS,
  MaterialKey,
  MaterialLine,
  PriceCatalog,
  PriceOverrides
} from '../../types';
import { round2 } from './quantities';

/**
 * Returns a new catalog with per-request unit prices applied.
 * Overrides for materials the catalog lacks are ignored.
 */
export function applyPriceOverrides(catalog: PriceCatalog, overrides: PriceOverrides): PriceCatalog {
  const materials = { ...catalog.materials };

  for (const key of MATERIAL_KEYS) {
    const price = overrides[key];
    const entry = materials[key];
    if (price !== undefined && entry) {
      materials[key] = { ...entry, unit_price: price };
    }
  }

  return { ...catalog, materials };
}

/**
 * Price a quantity of one material. Returns null when the quantity is zero
 * or the catalog does not carry the material.
 */
export function priceMaterial(
  catalog: PriceCatalog,
  key: MaterialKey,
  quantity: number,
  label?: string
): MaterialLine | null {
  const entry = catalog.materials[key];
  if (!entry || quantity <= 0) return null;

  return {
    key,
    material: label ?? entry.name,
    unit: entry.unit,
    unit_price: round2(entry.unit_price),
    quantity,
    cost: round2(entry.unit_price * quantity)
  };
}

export interface FenceTotals {
  total_material_cost: number;
  grand_total: number;
}

export function calculateTotals(materials: MaterialLine[], labor: LaborBreakdown): FenceTotals {
  const materialSum = materials.reduce((sum, line) => sum + line.cost, 0);
  const total_material_cost = round2(materialSum);

  return {
    total_material_cost,
    grand_total: round2(total_material_cost + labor.cost)
  };
}
