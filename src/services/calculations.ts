/**
 * Calculation Store - persists CalculationRecords to the Supabase
 * fence_calculations table, or in memory when no database is configured.
 */

import { v4 as uuidv4 } from 'uuid';
import { getSupabaseClient, isDatabaseConfigured } from './database';
import {
  CalculationRecord,
  CalculationResult,
  FenceSpec,
  PriceOverrides
} from '../types';

export interface CalculationStore {
  readonly kind: 'database' | 'memory';
  save(record: CalculationRecord): Promise<CalculationRecord>;
  get(id: string): Promise<CalculationRecord | null>;
  listRecent(limit: number): Promise<CalculationRecord[]>;
}

export function createCalculationRecord(
  spec: FenceSpec,
  result: CalculationResult,
  region: string,
  priceOverrides: PriceOverrides = {}
): CalculationRecord {
  return {
    id: uuidv4(),
    created_at: new Date().toISOString(),
    region,
    spec,
    price_overrides: priceOverrides,
    result
  };
}

// ============================================================================
// ROW GUARDS
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFenceSpec(value: unknown): value is FenceSpec {
  return isObject(value) &&
    (value.fence_type === 'standard' || value.fence_type === 'hot_wire' || value.fence_type === 'netting') &&
    typeof value.fence_length === 'number' &&
    typeof value.post_spacing === 'number';
}

function isCalculationResult(value: unknown): value is CalculationResult {
  return isObject(value) &&
    Array.isArray(value.materials) &&
    isObject(value.posts) &&
    isObject(value.labor) &&
    typeof value.total_material_cost === 'number' &&
    typeof value.grand_total === 'number';
}

function isPriceOverrides(value: unknown): value is PriceOverrides {
  return isObject(value) && Object.values(value).every(v => typeof v === 'number');
}

function rowToRecord(row: unknown): CalculationRecord | null {
  if (!isObject(row)) return null;
  const { id, created_at, region, spec, price_overrides, result } = row;

  if (typeof id !== 'string' || typeof created_at !== 'string' || typeof region !== 'string') {
    return null;
  }
  if (!isFenceSpec(spec) || !isCalculationResult(result)) {
    return null;
  }

  return {
    id,
    created_at,
    region,
    spec,
    price_overrides: isPriceOverrides(price_overrides) ? price_overrides : {},
    result
  };
}

// ============================================================================
// SUPABASE STORE
// ============================================================================

const TABLE = 'fence_calculations';

export class SupabaseCalculationStore implements CalculationStore {
  readonly kind = 'database' as const;

  async save(record: CalculationRecord): Promise<CalculationRecord> {
    const client = getSupabaseClient();
    const { error } = await client.from(TABLE).insert({
      id: record.id,
      created_at: record.created_at,
      region: record.region,
      fence_type: record.spec.fence_type,
      fence_length: record.spec.fence_length,
      total_cost: record.result.grand_total,
      spec: record.spec,
      price_overrides: record.price_overrides,
      result: record.result
    });

    if (error) {
      throw new Error(`Failed to save calculation: ${error.message}`);
    }
    return record;
  }

  async get(id: string): Promise<CalculationRecord | null> {
    const client = getSupabaseClient();
    const { data, error } = await client
      .from(TABLE)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to load calculation ${id}: ${error.message}`);
    }
    if (!data) return null;

    const record = rowToRecord(data);
    if (!record) {
      console.warn(`⚠️ Calculation ${id} has an unreadable row`);
    }
    return record;
  }

  async listRecent(limit: number): Promise<CalculationRecord[]> {
    const client = getSupabaseClient();
    const { data, error } = await client
      .from(TABLE)
      .select('*')
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw new Error(`Failed to list calculations: ${error.message}`);
    }

    const records: CalculationRecord[] = [];
    for (const row of data ?? []) {
      const record = rowToRecord(row);
      if (record) records.push(record);
    }
    return records;
  }
}

// ============================================================================
// IN-MEMORY STORE
// ============================================================================

/** Oldest records are evicted beyond this many */
export const MEMORY_STORE_MAX_RECORDS = 500;

export class MemoryCalculationStore implements CalculationStore {
  readonly kind = 'memory' as const;
  private readonly records = new Map<string, CalculationRecord>();

  constructor(private readonly maxRecords: number = MEMORY_STORE_MAX_RECORDS) {}

  async save(record: CalculationRecord): Promise<CalculationRecord> {
    // re-saving moves the record to the newest position
    this.records.delete(record.id);
    this.records.set(record.id, record);

    for (const id of this.records.keys()) {
      if (this.records.size <= this.maxRecords) break;
      this.records.delete(id);
    }
    return record;
  }

  async get(id: string): Promise<CalculationRecord | null> {
    return this.records.get(id) ?? null;
  }

  async listRecent(limit: number): Promise<CalculationRecord[]> {
    return Array.from(this.records.values()).reverse().slice(0, limit);
  }

  clear(): void {
    this.records.clear();
  }
}

let calculationStore: CalculationStore | null = null;

export function getCalculationStore(): CalculationStore {
  if (!calculationStore) {
    if (isDatabaseConfigured()) {
      calculationStore = new SupabaseCalculationStore();
    } else {
      console.warn('⚠️ Database not configured - calculations kept in memory');
      calculationStore = new MemoryCalculationStore();
    }
  }
  return calculationStore;
}
