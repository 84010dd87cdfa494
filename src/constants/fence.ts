/**
 * Fence Calculation Constants
 * Ranges, staple multipliers and the built-in price list
 */

import { CatalogEntry, FenceTypeName, MaterialKey } from '../types';

// ============================================================================
// INPUT RANGES
// ============================================================================

export interface FieldBound {
  min: number;
  max: number;
  unit: string;
}

export const FIELD_BOUNDS = {
  fence_length: { min: 0.01, max: 50000, unit: 'm' },
  post_spacing: { min: 0.01, max: 50, unit: 'm' },
  labor_rate: { min: 0, max: 1000, unit: 'currency/hour' },
  build_rate: { min: 0.01, max: 1000, unit: 'm/hour' },
  line_wire_count: { min: 0, max: 20, unit: 'wires' },
  top_wire_count: { min: 0, max: 20, unit: 'wires' },
  hot_wire_count: { min: 1, max: 20, unit: 'wires' },
  batten_spacing_fraction: { min: 0.05, max: 1, unit: 'fraction' },
  staples_per_box: { min: 1, max: 100000, unit: 'staples' },
  unit_price: { min: 0, max: 999999, unit: 'currency' },
  roll_length: { min: 0.01, max: 10000, unit: 'm' }
} as const;

export type BoundedField = keyof typeof FIELD_BOUNDS;

/** Deer netting needs tighter post spacing */
export const DEER_NETTING_MAX_POST_SPACING = 10;

/** A standard fence needs at least one stapled line wire */
export const STANDARD_MIN_LINE_WIRES = 1;

export const PRICE_SOURCE_MAX_LENGTH = 200;

// ============================================================================
// CALCULATION RULES
// ============================================================================

export interface FenceRules {
  staples_per_wire_per_line_post: number;
  staples_per_wire_per_end_post: number;
  staples_per_post_for_netting: number;
  default_staples_per_box: number;
  default_wire_roll_length_m: number;
  default_netting_roll_length_m: number;
  end_posts_per_run: number;
  stay_post_interval_m: number;
  triplex_interval_m: number;
}

export const DEFAULT_FENCE_RULES: FenceRules = {
  staples_per_wire_per_line_post: 1,
  staples_per_wire_per_end_post: 2,
  staples_per_post_for_netting: 4,
  default_staples_per_box: 2000,
  default_wire_roll_length_m: 500,
  default_netting_roll_length_m: 50,
  end_posts_per_run: 2,
  stay_post_interval_m: 100,
  triplex_interval_m: 500
};

// ============================================================================
// FENCE TYPE PRESETS
// ============================================================================

export interface FencePreset {
  fence_type: FenceTypeName;
  display_name: string;
  description: string;
  post_spacing: number;
  line_wire_count: number;
  hot_wire_count?: number;
}

export const FENCE_PRESETS: Record<FenceTypeName, FencePreset> = {
  standard: {
    fence_type: 'standard',
    display_name: 'Standard Wire',
    description: 'Post and high-tensile wire fence, optional barbed top wires',
    post_spacing: 5,
    line_wire_count: 8
  },
  hot_wire: {
    fence_type: 'hot_wire',
    display_name: 'Hot Wire',
    description: 'Electric fence with insulated hot wires above any line wires',
    post_spacing: 8,
    line_wire_count: 0,
    hot_wire_count: 2
  },
  netting: {
    fence_type: 'netting',
    display_name: 'Netting',
    description: 'Sheep or deer netting stapled to every post, optional electric outrigger',
    post_spacing: 6,
    line_wire_count: 0
  }
};

// ============================================================================
// FALLBACK PRICES (NZD excl. GST)
// ============================================================================

export const FALLBACK_MATERIALS: Record<MaterialKey, CatalogEntry> = {
  line_post: { name: '5inch posts', unit: 'each', unit_price: 12.50 },
  end_post: { name: '2.5/7 inch Strainer', unit: 'each', unit_price: 37.70 },
  wire: { name: 'Wire - 2.5mm HT', unit: 'roll', unit_price: 139.00, unit_size: 500 },
  barb_wire: { name: 'Wire - Barb', unit: 'roll', unit_price: 200.00, unit_size: 240 },
  netting_sheep: { name: 'Sheep Netting 8/90/30', unit: 'roll', unit_price: 265.00, unit_size: 100 },
  netting_deer: { name: 'Deer Netting 200cm', unit: 'roll', unit_price: 310.00, unit_size: 100 },
  outrigger_wire: { name: 'Electric Outrigger Wire', unit: 'roll', unit_price: 120.00, unit_size: 400 },
  batten: { name: 'Fence Batten 1.8m', unit: 'each', unit_price: 2.85 },
  staples: { name: 'U Staples (Box of 2000)', unit: 'box', unit_price: 183.99, unit_size: 2000 },
  bullnose_insulator: { name: 'Bullnose Insulator', unit: 'each', unit_price: 2.46 },
  claw_insulator: { name: 'Claw Insulator', unit: 'each', unit_price: 0.69 },
  stay_post: { name: '5 inch stay posts', unit: 'each', unit_price: 18.90 },
  triplex: { name: 'Triplex', unit: 'each', unit_price: 9.50 }
};
