/**
 * Report helpers shared by the PDF and Excel renderers
 */

import { CalculationRecord, FenceTypeName, MaterialLine } from '../types';
import { round2 } from '../calculations/fence/quantities';
import { FENCE_PRESETS } from '../constants';

export interface ReportLine {
  material: string;
  unit_price: number;
  quantity: number;
  cost: number;
}

/**
 * Merge lines that name the same material (case and surrounding whitespace
 * ignored), e.g. a catalog that uses one post for both line and end posts.
 * The first unit price seen is kept.
 */
export function combineDuplicateMaterials(lines: MaterialLine[]): ReportLine[] {
  const combined: ReportLine[] = [];
  const indexByName = new Map<string, number>();

  for (const line of lines) {
    const normalized = line.material.trim().toLowerCase();
    const existing = indexByName.get(normalized);

    if (existing !== undefined) {
      const item = combined[existing];
      item.quantity += line.quantity;
      item.cost = round2(item.cost + line.cost);
    } else {
      indexByName.set(normalized, combined.length);
      combined.push({
        material: line.material.trim(),
        unit_price: line.unit_price,
        quantity: line.quantity,
        cost: line.cost
      });
    }
  }

  return combined;
}

export const REPORT_TITLE = 'Farm Fence Calculation Report';

export function fenceTypeLabel(fenceType: FenceTypeName): string {
  return FENCE_PRESETS[fenceType].display_name;
}

/** "2026-03-14T09:26:53.000Z" -> "2026-03-14 09:26" (UTC) */
export function formatCreatedAt(createdAt: string): string {
  return createdAt.slice(0, 16).replace('T', ' ');
}

/** Amount with its ISO currency code, e.g. "NZD 57.00" */
export function formatMoney(value: number, currency: string): string {
  return `${currency} ${value.toFixed(2)}`;
}

/** Attachment name, unique per record and creation time */
export function reportFilename(record: CalculationRecord, extension: 'pdf' | 'xlsx'): string {
  const stamp = record.created_at.slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
  return `fence_calculation_${record.id}_${stamp}.${extension}`;
}
