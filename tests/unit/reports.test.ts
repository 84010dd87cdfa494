/**
 * Report Renderer Tests
 */

import {
  buildExcelWorkbook,
  combineDuplicateMaterials,
  formatCreatedAt,
  formatMoney,
  generateExcel,
  generatePdf,
  reportFilename
} from '../../src/reports';
import { computeFence } from '../../src/calculations/fence';
import { FALLBACK_MATERIALS } from '../../src/constants';
import { CalculationRecord, HotWireFenceSpec, MaterialLine } from '../../src/types';

const spec: HotWireFenceSpec = {
  fence_type: 'hot_wire',
  fence_length: 200,
  post_spacing: 8,
  line_wire_count: 0,
  top_wire_count: 0,
  build_rate: 20,
  labor_rate: 55,
  batten_spacing_fraction: null,
  hot_wire_count: 3
};

const record: CalculationRecord = {
  id: 'calc-1',
  created_at: '2026-03-14T09:26:53.123Z',
  region: 'Southland',
  spec,
  price_overrides: {},
  result: computeFence(spec, { region: 'Southland', currency: 'NZD', materials: { ...FALLBACK_MATERIALS } })
};

describe('Reports', () => {
  describe('combineDuplicateMaterials', () => {
    it('should merge lines naming the same material', () => {
      const lines: MaterialLine[] = [
        { key: 'line_post', material: 'Post ', unit: 'each', unit_price: 12.5, quantity: 19, cost: 237.5 },
        { key: 'wire', material: 'Wire', unit: 'roll', unit_price: 139, quantity: 1, cost: 139 },
        { key: 'end_post', material: 'post', unit: 'each', unit_price: 37.7, quantity: 2, cost: 75.4 }
      ];

      expect(combineDuplicateMaterials(lines)).toEqual([
        { material: 'Post', unit_price: 12.5, quantity: 21, cost: 312.9 },
        { material: 'Wire', unit_price: 139, quantity: 1, cost: 139 }
      ]);
    });
  });

  describe('formatting', () => {
    it('should format the creation time in minutes', () => {
      expect(formatCreatedAt(record.created_at)).toBe('2026-03-14 09:26');
    });

    it('should format money with the currency code', () => {
      expect(formatMoney(1315.14, 'NZD')).toBe('NZD 1315.14');
      expect(formatMoney(57, 'AUD')).toBe('AUD 57.00');
    });

    it('should name exports by id and timestamp', () => {
      expect(reportFilename(record, 'pdf')).toBe('fence_calculation_calc-1_20260314_092653.pdf');
      expect(reportFilename(record, 'xlsx')).toBe('fence_calculation_calc-1_20260314_092653.xlsx');
    });
  });

  describe('generatePdf', () => {
    it('should produce a PDF document', () => {
      const pdf = generatePdf(record);

      expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });
  });

  describe('buildExcelWorkbook', () => {
    const sheet = buildExcelWorkbook(record).getWorksheet('Fence Calculation');

    it('should write the header block', () => {
      expect(sheet?.getCell('A1').value).toBe('Farm Fence Calculation Report');
      expect(sheet?.getCell('B2').value).toBe('Hot Wire');
      expect(sheet?.getCell('B3').value).toBe(200);
      expect(sheet?.getCell('B5').value).toBe('Southland');
      expect(sheet?.getCell('B6').value).toBe('2026-03-14 09:26');
    });

    it('should write one row per material', () => {
      expect(sheet?.getRow(8).values).toEqual([undefined, 'Item', 'Unit Price (NZD)', 'Qty', 'Cost (NZD)']);
      expect(sheet?.getRow(9).values).toEqual([undefined, '5inch posts', 12.5, 24, 300]);
      expect(sheet?.getRow(12).values).toEqual([undefined, 'Bullnose Insulator (for 3 hot wires)', 2.46, 6, 14.76]);
      expect(sheet?.getCell('D9').numFmt).toBe('#,##0.00');
    });

    it('should write the totals', () => {
      expect(sheet?.getCell('A17').value).toBe('Material Total');
      expect(sheet?.getCell('D17').value).toBe(765.14);
      expect(sheet?.getCell('A18').value).toBe('Labor (10 h)');
      expect(sheet?.getCell('D18').value).toBe(550);
      expect(sheet?.getCell('A19').value).toBe('Total (excl. GST)');
      expect(sheet?.getCell('D19').value).toBe(1315.14);
    });
  });

  describe('other currencies', () => {
    it('should name the catalog currency in the Excel headers', () => {
      const aud: CalculationRecord = { ...record, result: { ...record.result, currency: 'AUD' } };
      const audSheet = buildExcelWorkbook(aud).getWorksheet('Fence Calculation');

      expect(audSheet?.getCell('B8').value).toBe('Unit Price (AUD)');
      expect(audSheet?.getCell('D8').value).toBe('Cost (AUD)');
      expect(audSheet?.getCell('D17').numFmt).toBe('#,##0.00');
    });
  });

  describe('generateExcel', () => {
    it('should produce a zipped workbook', async () => {
      const xlsx = await generateExcel(record);

      expect(xlsx.subarray(0, 2).toString('latin1')).toBe('PK');
    });
  });
});
