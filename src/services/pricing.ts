/**
 * Pricing Service - Fetches the regional price catalog from the Supabase
 * materials table, falling back to built-in prices when the database is
 * unavailable.
 */

import { z } from 'zod';
import { getSupabaseClient, isDatabaseConfigured } from './database';
import { config } from '../config';
import { FALLBACK_MATERIALS } from '../constants';
import { CatalogEntry, MATERIAL_KEYS, MaterialKey, PriceCatalog } from '../types';
import { DatabaseNotConfiguredError, NotFoundError } from '../errors';
import { MaterialUpdate } from '../validation/fence';

export type CatalogSource = 'database' | 'fallback';

export interface CatalogLookup {
  catalog: PriceCatalog;
  source: CatalogSource;
}

export interface MaterialRecord extends CatalogEntry {
  key: MaterialKey;
  region: string;
  price_source: string;
  auto_update_enabled: boolean;
  last_price_update: string | null;
}

// Rows from the materials table; numeric columns may arrive as strings
const materialRowSchema = z.object({
  key: z.enum(MATERIAL_KEYS),
  name: z.string(),
  unit: z.enum(['each', 'roll', 'box']),
  unit_price: z.coerce.number().nonnegative(),
  unit_size: z.coerce.number().positive().nullable().optional(),
  region: z.string(),
  price_source: z.string().nullable().optional(),
  auto_update_enabled: z.boolean().nullable().optional(),
  last_price_update: z.string().nullable().optional()
});

type MaterialRow = z.infer<typeof materialRowSchema>;

const CACHE_TTL_MS = 5 * 60 * 1000;

interface CachedCatalog {
  catalog: PriceCatalog;
  timestamp: number;
}

const catalogCache = new Map<string, CachedCatalog>();

function toCatalogEntry(row: MaterialRow): CatalogEntry {
  const entry: CatalogEntry = { name: row.name, unit: row.unit, unit_price: row.unit_price };
  if (row.unit_size !== null && row.unit_size !== undefined) {
    entry.unit_size = row.unit_size;
  }
  return entry;
}

function toMaterialRecord(row: MaterialRow): MaterialRecord {
  return {
    ...toCatalogEntry(row),
    key: row.key,
    region: row.region,
    price_source: row.price_source ?? '',
    auto_update_enabled: row.auto_update_enabled ?? false,
    last_price_update: row.last_price_update ?? null
  };
}

function parseRows(data: unknown[]): MaterialRow[] {
  const rows: MaterialRow[] = [];
  for (const item of data) {
    const parsed = materialRowSchema.safeParse(item);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      console.warn('⚠️ Skipping malformed material row:', parsed.error.issues[0]?.message);
    }
  }
  return rows;
}

export function getFallbackCatalog(region: string = config.defaultRegion): PriceCatalog {
  return {
    region,
    currency: config.currency,
    materials: { ...FALLBACK_MATERIALS }
  };
}

export async function fetchPriceCatalog(region: string = config.defaultRegion): Promise<CatalogLookup> {
  const cached = catalogCache.get(region);
  if (cached && (Date.now() - cached.timestamp) < CACHE_TTL_MS) {
    return { catalog: cached.catalog, source: 'database' };
  }

  if (!isDatabaseConfigured()) {
    console.warn('⚠️ Database not configured - using fallback pricing');
    return { catalog: getFallbackCatalog(region), source: 'fallback' };
  }

  try {
    const client = getSupabaseClient();
    const { data, error } = await client
      .from('materials')
      .select('*')
      .eq('region', region)
      .eq('is_active', true);

    if (error) {
      console.error('❌ Error fetching prices:', error.message);
      return cached
        ? { catalog: cached.catalog, source: 'database' }
        : { catalog: getFallbackCatalog(region), source: 'fallback' };
    }

    const rows = parseRows(data ?? []);
    if (rows.length === 0) {
      console.warn(`⚠️ No materials for region "${region}" - using fallback pricing`);
      return { catalog: getFallbackCatalog(region), source: 'fallback' };
    }

    const materials: Partial<Record<MaterialKey, CatalogEntry>> = {};
    for (const row of rows) {
      materials[row.key] = toCatalogEntry(row);
    }

    const catalog: PriceCatalog = { region, currency: config.currency, materials };
    catalogCache.set(region, { catalog, timestamp: Date.now() });
    console.log(`✅ Loaded ${rows.length} materials for ${region} from database`);
    return { catalog, source: 'database' };
  } catch (err) {
    console.error('❌ Database connection error:', err);
    return cached
      ? { catalog: cached.catalog, source: 'database' }
      : { catalog: getFallbackCatalog(region), source: 'fallback' };
  }
}

export function clearCatalogCache(): void {
  catalogCache.clear();
}

// ============================================================================
// SETTINGS: LIST / UPDATE MATERIALS
// ============================================================================

export async function listMaterials(region: string = config.defaultRegion): Promise<{
  materials: MaterialRecord[];
  source: CatalogSource;
}> {
  if (isDatabaseConfigured()) {
    const client = getSupabaseClient();
    const { data, error } = await client
      .from('materials')
      .select('*')
      .eq('region', region)
      .order('key');

    if (error) {
      throw new Error(`Failed to list materials: ${error.message}`);
    }

    const rows = parseRows(data ?? []);
    if (rows.length > 0) {
      return { materials: rows.map(toMaterialRecord), source: 'database' };
    }
  }

  const materials = MATERIAL_KEYS.map(key => ({
    ...FALLBACK_MATERIALS[key],
    key,
    region,
    price_source: 'Fallback',
    auto_update_enabled: false,
    last_price_update: null
  }));
  return { materials, source: 'fallback' };
}

export async function updateMaterial(
  key: MaterialKey,
  update: MaterialUpdate,
  region: string = config.defaultRegion
): Promise<MaterialRecord> {
  if (!isDatabaseConfigured()) {
    throw new DatabaseNotConfiguredError('Material prices can only be updated when the database is configured');
  }

  const changes: Record<string, string | number | boolean | null> = {
    last_price_update: new Date().toISOString()
  };
  if (update.unit_price !== undefined) changes.unit_price = update.unit_price;
  if (update.unit_size !== undefined) changes.unit_size = update.unit_size;
  if (update.price_source !== undefined) changes.price_source = update.price_source;
  if (update.auto_update_enabled !== undefined) changes.auto_update_enabled = update.auto_update_enabled;

  const client = getSupabaseClient();
  const { data, error } = await client
    .from('materials')
    .update(changes)
    .eq('key', key)
    .eq('region', region)
    .select('*');

  if (error) {
    throw new Error(`Failed to update material ${key}: ${error.message}`);
  }

  const [row] = parseRows(data ?? []);
  if (!row) {
    throw new NotFoundError(`Material not found: ${key} (${region})`);
  }

  catalogCache.delete(region);
  console.log(`✅ Updated ${key} for ${region}`);
  return toMaterialRecord(row);
}
