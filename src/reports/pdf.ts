/**
 * PDF Report Renderer
 */

import { jsPDF } from 'jspdf';
import { CalculationRecord } from '../types';
import {
  REPORT_TITLE,
  combineDuplicateMaterials,
  fenceTypeLabel,
  formatCreatedAt,
  formatMoney
} from './materials';

// Layout in millimetres on A4 portrait
const MARGIN_LEFT = 20;
const MARGIN_RIGHT = 190;
const MARGIN_BOTTOM = 20;
const ROW_HEIGHT = 6;
const COLUMNS = {
  item: MARGIN_LEFT,
  unitPrice: 120,
  quantity: 145,
  cost: MARGIN_RIGHT
};

export function generatePdf(record: CalculationRecord): Buffer {
  const { result } = record;
  const doc = new jsPDF({ unit: 'mm', format: 'a4' });
  const pageHeight = doc.internal.pageSize.getHeight();

  // Header
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(16);
  doc.text(REPORT_TITLE, MARGIN_LEFT, 25);

  doc.setFont('helvetica', 'normal');
  doc.setFontSize(10);
  doc.text(`Fence Type: ${fenceTypeLabel(result.fence_type)}`, MARGIN_LEFT, 33);
  doc.text(`Fence Length: ${result.fence_length} m`, MARGIN_LEFT, 39);
  doc.text(`Post Spacing: ${result.post_spacing} m`, MARGIN_LEFT, 45);
  doc.text(`Region: ${record.region}`, MARGIN_LEFT, 51);
  doc.text(`Created: ${formatCreatedAt(record.created_at)} UTC`, MARGIN_LEFT, 57);

  // Materials table
  let y = 70;
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(12);
  doc.text(`Materials (${result.currency} excl. GST)`, MARGIN_LEFT, y);
  y += ROW_HEIGHT;

  doc.setFontSize(10);
  doc.text('Item', COLUMNS.item, y);
  doc.text('Unit Price', COLUMNS.unitPrice, y, { align: 'right' });
  doc.text('Qty', COLUMNS.quantity, y, { align: 'right' });
  doc.text('Cost', COLUMNS.cost, y, { align: 'right' });
  y += 2;
  doc.line(MARGIN_LEFT, y, MARGIN_RIGHT, y);
  y += 5;

  doc.setFont('helvetica', 'normal');
  for (const line of combineDuplicateMaterials(result.materials)) {
    if (y > pageHeight - MARGIN_BOTTOM) {
      doc.addPage();
      y = 25;
    }
    doc.text(line.material, COLUMNS.item, y);
    doc.text(formatMoney(line.unit_price, result.currency), COLUMNS.unitPrice, y, { align: 'right' });
    doc.text(String(line.quantity), COLUMNS.quantity, y, { align: 'right' });
    doc.text(formatMoney(line.cost, result.currency), COLUMNS.cost, y, { align: 'right' });
    y += ROW_HEIGHT;
  }

  // Totals
  if (y > pageHeight - MARGIN_BOTTOM - 4 * ROW_HEIGHT) {
    doc.addPage();
    y = 25;
  }
  y += 4;
  doc.setFont('helvetica', 'bold');
  const totals: Array<[string, string]> = [
    ['Material Total:', formatMoney(result.total_material_cost, result.currency)],
    [
      `Labor (${result.labor.hours} h @ ${formatMoney(result.labor.rate_per_hour, result.currency)}/h):`,
      formatMoney(result.labor.cost, result.currency)
    ],
    ['Total (excl. GST):', formatMoney(result.grand_total, result.currency)]
  ];
  for (const [label, value] of totals) {
    doc.text(label, COLUMNS.quantity + 5, y, { align: 'right' });
    doc.text(value, COLUMNS.cost, y, { align: 'right' });
    y += ROW_HEIGHT;
  }

  return Buffer.from(doc.output('arraybuffer'));
}
