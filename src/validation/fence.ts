/**
 * Fence Input Validation
 * Every numeric field is checked against FIELD_BOUNDS; failures surface as
 * ValidationError carrying the field name and the violated bound.
 */

import { z } from 'zod';
import {
  FIELD_BOUNDS,
  BoundedField,
  FENCE_PRESETS,
  DEER_NETTING_MAX_POST_SPACING,
  STANDARD_MIN_LINE_WIRES,
  PRICE_SOURCE_MAX_LENGTH
} from '../constants';
import {
  CatalogEntry,
  FenceSpec,
  FenceTypeName,
  MATERIAL_KEYS,
  MaterialKey,
  PriceCatalog,
  PriceOverrides
} from '../types';
import { ValidationError, ValidationConstraint } from '../errors';
import { config } from '../config';

// ============================================================================
// COERCION HELPERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Form posts send numbers as strings; blanks mean "not supplied" */
function toNumeric(value: unknown): unknown {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isNaN(parsed) ? value : parsed;
  }
  return value;
}

function blankToUndefined(value: unknown): unknown {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function toBoolean(value: unknown): unknown {
  if (typeof value === 'boolean') return value;
  if (value === null || value === undefined || value === '') return false;
  return ['1', 'true', 'yes', 'on'].includes(String(value).trim().toLowerCase());
}

/** Accepts legacy yes/no netting flags alongside sheep/deer */
function toNettingKind(value: unknown): unknown {
  if (value === null || value === undefined) return undefined;
  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'yes' || normalized === 'true') return 'sheep';
  if (['no', 'false', 'none', ''].includes(normalized)) return undefined;
  return normalized;
}

interface BoundOptions {
  integer?: boolean;
}

function numberSchema(field: string, bound: { min: number; max: number; unit: string }, options: BoundOptions) {
  let schema = z.number({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a number`
  }).finite({ message: `${field} must be a finite number` });

  if (options.integer) {
    schema = schema.int({ message: `${field} must be a whole number` });
  }

  return schema
    .min(bound.min, { message: `${field} must be at least ${bound.min} ${bound.unit}` })
    .max(bound.max, { message: `${field} must be at most ${bound.max} ${bound.unit}` });
}

function required(field: BoundedField, options: BoundOptions = {}, name: string = field) {
  return z.preprocess(toNumeric, numberSchema(name, FIELD_BOUNDS[field], options));
}

function optional(field: BoundedField, options: BoundOptions = {}, name: string = field) {
  return z.preprocess(toNumeric, numberSchema(name, FIELD_BOUNDS[field], options).optional());
}

// ============================================================================
// ZOD ISSUE MAPPING
// ============================================================================

function constraintFor(issue: z.ZodIssue): { constraint: ValidationConstraint; bound?: number } {
  switch (issue.code) {
    case z.ZodIssueCode.too_small:
      return { constraint: issue.type === 'string' ? 'length' : 'min', bound: Number(issue.minimum) };
    case z.ZodIssueCode.too_big:
      return { constraint: issue.type === 'string' ? 'length' : 'max', bound: Number(issue.maximum) };
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined') return { constraint: 'required' };
      if (issue.expected === 'integer') return { constraint: 'integer' };
      return { constraint: 'type' };
    case z.ZodIssueCode.invalid_enum_value:
    case z.ZodIssueCode.invalid_literal:
      return { constraint: 'choice' };
    case z.ZodIssueCode.unrecognized_keys:
      return { constraint: 'unknown_key' };
    default:
      return { constraint: 'type' };
  }
}

export function toValidationError(error: z.ZodError, prefix?: string): ValidationError {
  const issue = error.issues[0];
  const path = issue.path.map(String);
  const field = [prefix, ...path].filter(Boolean).join('.') || 'body';
  const { constraint, bound } = constraintFor(issue);
  return new ValidationError(field, constraint, issue.message, bound);
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, prefix?: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toValidationError(result.error, prefix);
  }
  return result.data;
}

// ============================================================================
// FENCE CALCULATION INPUT
// ============================================================================

const FENCE_TYPES = ['standard', 'hot_wire', 'netting'] as const;

const priceOverridesSchema = z.preprocess(
  value => (value === null || value === undefined || value === '' ? {} : value),
  z.record(
    z.enum(MATERIAL_KEYS, {
      errorMap: () => ({ message: `price_overrides keys must be one of: ${MATERIAL_KEYS.join(', ')}` })
    }),
    required('unit_price', {}, 'price override'),
    { invalid_type_error: 'price_overrides must be an object keyed by material' }
  )
);

const fenceInputSchema = z.object({
  fence_type: z.preprocess(
    blankToUndefined,
    z.enum(FENCE_TYPES, {
      errorMap: () => ({ message: `fence_type must be one of: ${FENCE_TYPES.join(', ')}` })
    }).optional()
  ),
  fence_length: required('fence_length'),
  post_spacing: optional('post_spacing'),
  line_wire_count: optional('line_wire_count', { integer: true }),
  top_wire_count: optional('top_wire_count', { integer: true }),
  // range-checked only for hot wire fences
  hot_wire_count: z.unknown(),
  build_rate: required('build_rate'),
  labor_rate: required('labor_rate'),
  batten_spacing_fraction: optional('batten_spacing_fraction'),
  staples_per_box: optional('staples_per_box', { integer: true }),
  netting_kind: z.preprocess(
    toNettingKind,
    z.enum(['sheep', 'deer'], {
      errorMap: () => ({ message: 'netting_kind must be one of: sheep, deer' })
    }).optional()
  ),
  electric_outrigger: z.preprocess(toBoolean, z.boolean()),
  region: z.preprocess(
    blankToUndefined,
    z.string({ invalid_type_error: 'region must be a string' })
      .max(100, { message: 'region must be at most 100 characters' })
      .optional()
  ),
  price_overrides: priceOverridesSchema
});

export interface CalculationDefaults {
  labor_rate: number;
  build_rate: number;
}

export interface ValidatedCalculationInput {
  spec: FenceSpec;
  region?: string;
  price_overrides: PriceOverrides;
}

/**
 * Validate and normalize a raw calculation request.
 * Optional fields fall back to the fence-type preset and configured rates.
 */
export function validateFenceCalculationInput(
  raw: unknown,
  defaults: CalculationDefaults = {
    labor_rate: config.laborRatePerHour,
    build_rate: config.buildRateMetersPerHour
  }
): ValidatedCalculationInput {
  if (!isRecord(raw)) {
    throw new ValidationError('body', 'type', 'Request body must be an object');
  }

  const withDefaults: Record<string, unknown> = {
    ...raw,
    // legacy form field
    netting_kind: raw.netting_kind ?? raw.netting_type ?? raw.netting,
    labor_rate: toNumeric(raw.labor_rate) ?? defaults.labor_rate,
    build_rate: toNumeric(raw.build_rate) ?? defaults.build_rate
  };

  const input = parseOrThrow(fenceInputSchema, withDefaults);

  const fenceType: FenceTypeName = input.fence_type ?? (input.netting_kind ? 'netting' : 'standard');
  const preset = FENCE_PRESETS[fenceType];

  const postSpacing = input.post_spacing ?? preset.post_spacing;
  const lineWireCount = input.line_wire_count ?? preset.line_wire_count;

  if (fenceType === 'standard' && lineWireCount < STANDARD_MIN_LINE_WIRES) {
    throw new ValidationError(
      'line_wire_count',
      'min',
      `line_wire_count must be at least ${STANDARD_MIN_LINE_WIRES} wires for a standard fence`,
      STANDARD_MIN_LINE_WIRES
    );
  }

  const base = {
    fence_length: input.fence_length,
    post_spacing: postSpacing,
    line_wire_count: lineWireCount,
    top_wire_count: input.top_wire_count ?? 0,
    build_rate: input.build_rate,
    labor_rate: input.labor_rate,
    batten_spacing_fraction: input.batten_spacing_fraction ?? null,
    staples_per_box: input.staples_per_box
  };

  let spec: FenceSpec;
  if (fenceType === 'hot_wire') {
    const hotWireCount = parseOrThrow(
      optional('hot_wire_count', { integer: true }),
      input.hot_wire_count,
      'hot_wire_count'
    );
    spec = {
      fence_type: 'hot_wire',
      ...base,
      hot_wire_count: hotWireCount ?? preset.hot_wire_count ?? FIELD_BOUNDS.hot_wire_count.min
    };
  } else if (fenceType === 'netting') {
    if (!input.netting_kind) {
      throw new ValidationError('netting_kind', 'required', 'netting_kind is required for a netting fence');
    }
    if (input.netting_kind === 'deer' && postSpacing > DEER_NETTING_MAX_POST_SPACING) {
      throw new ValidationError(
        'post_spacing',
        'max',
        `post_spacing must be at most ${DEER_NETTING_MAX_POST_SPACING} m for deer netting`,
        DEER_NETTING_MAX_POST_SPACING
      );
    }
    spec = {
      fence_type: 'netting',
      ...base,
      netting_kind: input.netting_kind,
      electric_outrigger: input.netting_kind === 'deer' ? input.electric_outrigger : false
    };
  } else {
    spec = { fence_type: 'standard', ...base };
  }

  return {
    spec,
    region: input.region,
    price_overrides: input.price_overrides
  };
}

// ============================================================================
// PRICE CATALOG
// ============================================================================

/**
 * Materials the engine cannot price this fence without.
 * Insulators and bracing are optional extras.
 */
export function requiredMaterials(spec: FenceSpec): MaterialKey[] {
  const keys: MaterialKey[] = ['line_post', 'end_post'];
  const hotWires = spec.fence_type === 'hot_wire' ? spec.hot_wire_count : 0;
  const stapledWires = spec.line_wire_count + spec.top_wire_count;

  if (spec.line_wire_count + hotWires > 0) keys.push('wire');
  if (spec.top_wire_count > 0) keys.push('barb_wire');

  if (spec.fence_type === 'netting') {
    keys.push(spec.netting_kind === 'deer' ? 'netting_deer' : 'netting_sheep');
    if (spec.electric_outrigger) keys.push('outrigger_wire');
  }

  if (stapledWires > 0 || spec.fence_type === 'netting') keys.push('staples');
  if (spec.batten_spacing_fraction !== null) keys.push('batten');

  return keys;
}

const catalogEntrySchema = z.object({
  name: z.string({ required_error: 'name is required' }).min(1, { message: 'name is required' }),
  unit: z.enum(['each', 'roll', 'box'], {
    errorMap: () => ({ message: 'unit must be one of: each, roll, box' })
  }),
  unit_price: required('unit_price'),
  unit_size: z.preprocess(toNumeric, z.number({ invalid_type_error: 'unit_size must be a number' }).optional())
});

function sizeBound(key: MaterialKey): BoundedField | null {
  if (key === 'staples') return 'staples_per_box';
  if (key === 'wire' || key === 'barb_wire' || key === 'outrigger_wire' ||
      key === 'netting_sheep' || key === 'netting_deer') {
    return 'roll_length';
  }
  return null;
}

/**
 * Check that the catalog carries every material the fence needs and that
 * every present entry is within range. Returns a normalized copy.
 */
export function validatePriceCatalog(catalog: PriceCatalog, needed: MaterialKey[]): PriceCatalog {
  for (const key of needed) {
    if (!catalog.materials[key]) {
      throw new ValidationError(`catalog.${key}`, 'required', `Price catalog has no entry for ${key}`);
    }
  }

  const materials: Partial<Record<MaterialKey, CatalogEntry>> = {};
  for (const key of MATERIAL_KEYS) {
    const entry = catalog.materials[key];
    if (!entry) continue;

    const parsed = parseOrThrow(catalogEntrySchema, entry, `catalog.${key}`);
    const bound = sizeBound(key);
    if (bound && parsed.unit_size !== undefined) {
      parseOrThrow(required(bound, { integer: bound === 'staples_per_box' }, 'unit_size'), parsed.unit_size, `catalog.${key}`);
    }
    materials[key] = parsed;
  }

  return { ...catalog, materials };
}

// ============================================================================
// MATERIAL UPDATES (settings API)
// ============================================================================

export interface MaterialUpdate {
  unit_price?: number;
  unit_size?: number | null;
  price_source?: string;
  auto_update_enabled?: boolean;
}

const materialUpdateSchema = z.object({
  current_price: optional('unit_price', {}, 'current_price'),
  roll_length: z.preprocess(
    value => (value === '' || value === null ? null : toNumeric(value)),
    numberSchema('roll_length', FIELD_BOUNDS.roll_length, {}).nullable().optional()
  ),
  price_source: z.string({ invalid_type_error: 'price_source must be a string' })
    .max(PRICE_SOURCE_MAX_LENGTH, {
      message: `price_source cannot exceed ${PRICE_SOURCE_MAX_LENGTH} characters`
    })
    .optional(),
  auto_update_enabled: z.boolean({ invalid_type_error: 'auto_update_enabled must be true or false' }).optional()
});

export function validateMaterialKey(raw: unknown): MaterialKey {
  const key = MATERIAL_KEYS.find(k => k === raw);
  if (!key) {
    throw new ValidationError('key', 'choice', `Unknown material: ${String(raw)}`);
  }
  return key;
}

export function validateMaterialUpdateInput(raw: unknown): MaterialUpdate {
  if (!isRecord(raw)) {
    throw new ValidationError('body', 'type', 'Request body must be an object');
  }

  const input = parseOrThrow(materialUpdateSchema, raw);
  const update: MaterialUpdate = {};

  if (input.current_price !== undefined) update.unit_price = input.current_price;
  if (input.roll_length !== undefined) update.unit_size = input.roll_length;
  if (input.price_source !== undefined) update.price_source = input.price_source;
  if (input.auto_update_enabled !== undefined) update.auto_update_enabled = input.auto_update_enabled;

  if (Object.keys(update).length === 0) {
    throw new ValidationError('body', 'required', 'No material fields to update');
  }

  return update;
}
