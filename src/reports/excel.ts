/**
 * Excel Report Renderer
 */

import * as ExcelJS from 'exceljs';
import { CalculationRecord } from '../types';
import {
  REPORT_TITLE,
  combineDuplicateMaterials,
  fenceTypeLabel,
  formatCreatedAt
} from './materials';

// Column headers carry the currency code
const AMOUNT_FORMAT = '#,##0.00';

export function buildExcelWorkbook(record: CalculationRecord): ExcelJS.Workbook {
  const { result } = record;
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Fence Calculation');

  sheet.columns = [
    { key: 'item', width: 42 },
    { key: 'unit_price', width: 18 },
    { key: 'quantity', width: 10 },
    { key: 'cost', width: 18 }
  ];

  sheet.addRow([REPORT_TITLE]).font = { size: 16, bold: true };
  sheet.addRow(['Fence Type', fenceTypeLabel(result.fence_type)]);
  sheet.addRow(['Fence Length (m)', result.fence_length]);
  sheet.addRow(['Post Spacing (m)', result.post_spacing]);
  sheet.addRow(['Region', record.region]);
  sheet.addRow(['Created (UTC)', formatCreatedAt(record.created_at)]);
  sheet.addRow([]);

  const header = sheet.addRow([
    'Item',
    `Unit Price (${result.currency})`,
    'Qty',
    `Cost (${result.currency})`
  ]);
  header.eachCell(cell => {
    cell.font = { bold: true };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFDDDDDD' } };
  });

  for (const line of combineDuplicateMaterials(result.materials)) {
    const row = sheet.addRow([line.material, line.unit_price, line.quantity, line.cost]);
    row.getCell(2).numFmt = AMOUNT_FORMAT;
    row.getCell(4).numFmt = AMOUNT_FORMAT;
  }

  sheet.addRow([]);
  const totals: Array<[string, number]> = [
    ['Material Total', result.total_material_cost],
    [`Labor (${result.labor.hours} h)`, result.labor.cost],
    ['Total (excl. GST)', result.grand_total]
  ];
  for (const [label, value] of totals) {
    const row = sheet.addRow([label, null, null, value]);
    row.font = { bold: true };
    row.getCell(4).numFmt = AMOUNT_FORMAT;
  }

  return workbook;
}

export async function generateExcel(record: CalculationRecord): Promise<Buffer> {
  const buffer = await buildExcelWorkbook(record).xlsx.writeBuffer();
  return Buffer.from(buffer);
}
