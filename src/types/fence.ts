/**
 * Fence Calculation Types
 */

// ============================================================================
// INPUT TYPES
// ============================================================================

export type FenceTypeName = 'standard' | 'hot_wire' | 'netting';

export type NettingKind = 'sheep' | 'deer';

interface FenceSpecBase {
  /** Total fence run in meters */
  fence_length: number;

  /** Distance between post centres in meters */
  post_spacing: number;

  /** Plain wires stapled to every post */
  line_wire_count: number;

  /** Barbed top wires, stapled like line wires */
  top_wire_count: number;

  /** Meters of fence built per labor-hour */
  build_rate: number;

  /** Currency per labor-hour */
  labor_rate: number;

  /** Batten spacing as a fraction of post spacing; null when no battens */
  batten_spacing_fraction: number | null;

  /** Overrides the staples box size from the catalog */
  staples_per_box?: number;
}

export interface StandardFenceSpec extends FenceSpecBase {
  fence_type: 'standard';
}

export interface HotWireFenceSpec extends FenceSpecBase {
  fence_type: 'hot_wire';
  hot_wire_count: number;
}

export interface NettingFenceSpec extends FenceSpecBase {
  fence_type: 'netting';
  netting_kind: NettingKind;
  electric_outrigger: boolean;
}

export type FenceSpec = StandardFenceSpec | HotWireFenceSpec | NettingFenceSpec;

// ============================================================================
// PRICE CATALOG
// ============================================================================

export const MATERIAL_KEYS = [
  'line_post',
  'end_post',
  'wire',
  'barb_wire',
  'netting_sheep',
  'netting_deer',
  'outrigger_wire',
  'batten',
  'staples',
  'bullnose_insulator',
  'claw_insulator',
  'stay_post',
  'triplex'
] as const;

export type MaterialKey = typeof MATERIAL_KEYS[number];

export type MaterialUnit = 'each' | 'roll' | 'box';

export interface CatalogEntry {
  name: string;
  unit: MaterialUnit;
  unit_price: number;
  /** Roll length in meters, or staples per box */
  unit_size?: number;
}

export interface PriceCatalog {
  region: string;
  currency: string;
  materials: Partial<Record<MaterialKey, CatalogEntry>>;
}

export type PriceOverrides = Partial<Record<MaterialKey, number>>;

// ============================================================================
// OUTPUT TYPES
// ============================================================================

export interface MaterialLine {
  key: MaterialKey;
  material: string;
  unit: MaterialUnit;
  unit_price: number;
  quantity: number;
  cost: number;
}

export interface PostBreakdown {
  total: number;
  end: number;
  line: number;
}

export interface WireBreakdown {
  line_wire_count: number;
  hot_wire_count: number;
  top_wire_count: number;
  /** Meters of plain wire (line + hot) */
  wire_length_m: number;
  wire_rolls: number;
  barb_length_m: number;
  barb_rolls: number;
  outrigger_length_m: number;
  outrigger_rolls: number;
}

export interface StapleBreakdown {
  count: number;
  per_box: number;
  boxes: number;
}

export interface InsulatorBreakdown {
  bullnose: number;
  claw: number;
}

export interface BracingBreakdown {
  stay_posts: number;
  triplex: number;
}

export interface LaborBreakdown {
  hours: number;
  rate_per_hour: number;
  cost: number;
}

export interface CalculationResult {
  fence_type: FenceTypeName;
  fence_length: number;
  post_spacing: number;
  currency: string;
  posts: PostBreakdown;
  wire: WireBreakdown;
  netting_rolls: number;
  staples: StapleBreakdown;
  battens: number;
  insulators: InsulatorBreakdown;
  bracing: BracingBreakdown;
  materials: MaterialLine[];
  total_material_cost: number;
  labor: LaborBreakdown;
  grand_total: number;
}

// ============================================================================
// PERSISTENCE TYPES
// ============================================================================

export interface CalculationRecord {
  id: string;
  created_at: string;
  region: string;
  spec: FenceSpec;
  price_overrides: PriceOverrides;
  result: CalculationResult;
}
