/**
 * Fence Calculation Routes
 */

import { Router, Request, Response } from 'express';
import { calculateFenceWithPricing } from '../calculations/fence';
import { validateFenceCalculationInput } from '../validation/fence';
import { createCalculationRecord, getCalculationStore } from '../services/calculations';
import { checkDatabase } from '../services/database';
import { FENCE_PRESETS } from '../constants';
import { NotFoundError, ValidationError } from '../errors';
import { CalculationRecord } from '../types';
import { generateExcel, generatePdf, reportFilename } from '../reports';
import { sendError } from './errors';

const router = Router();

const DEFAULT_LIST_LIMIT = 10;
const MAX_LIST_LIMIT = 50;

const PDF_CONTENT_TYPE = 'application/pdf';
const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

async function loadRecord(id: string): Promise<CalculationRecord> {
  const record = await getCalculationStore().get(id);
  if (!record) {
    throw new NotFoundError(`Calculation not found: ${id}`);
  }
  return record;
}

function sendAttachment(res: Response, body: Buffer, contentType: string, filename: string): void {
  res.set({
    'Content-Type': contentType,
    'Content-Disposition': `attachment; filename=${filename}`,
    'Cache-Control': 'no-store, no-cache, must-revalidate, max-age=0',
    Pragma: 'no-cache',
    Expires: '0'
  });
  res.send(body);
}

function parseLimit(raw: unknown): number {
  if (raw === undefined || raw === '') return DEFAULT_LIST_LIMIT;
  const limit = typeof raw === 'string' ? Number(raw) : Number.NaN;

  if (Number.isNaN(limit)) {
    throw new ValidationError('limit', 'type', 'limit must be a number');
  }
  if (!Number.isInteger(limit)) {
    throw new ValidationError('limit', 'integer', 'limit must be a whole number');
  }
  if (limit < 1) {
    throw new ValidationError('limit', 'min', 'limit must be at least 1', 1);
  }
  if (limit > MAX_LIST_LIMIT) {
    throw new ValidationError('limit', 'max', `limit must be at most ${MAX_LIST_LIMIT}`, MAX_LIST_LIMIT);
  }
  return limit;
}

/**
 * POST /api/v1/fence/calculate
 * Validate, price, calculate and persist
 */
router.post('/calculate', async (req: Request, res: Response) => {
  try {
    const input = validateFenceCalculationInput(req.body);
    const { result, region, pricing_source } = await calculateFenceWithPricing(input);

    const record = createCalculationRecord(input.spec, result, region, input.price_overrides);
    await getCalculationStore().save(record);

    console.log(`✅ Calculation ${record.id}: ${result.fence_type} ${result.fence_length} m, total ${result.grand_total} ${result.currency}`);

    res.json({
      success: true,
      calculation_id: record.id,
      created_at: record.created_at,
      region,
      pricing_source,
      result
    });
  } catch (error) {
    sendError(res, error, 'Calculation error');
  }
});

/**
 * GET /api/v1/fence/calculations
 * Most recent calculations first
 */
router.get('/calculations', async (req: Request, res: Response) => {
  try {
    const limit = parseLimit(req.query.limit);
    const calculations = await getCalculationStore().listRecent(limit);
    res.json({ success: true, calculations });
  } catch (error) {
    sendError(res, error, 'List calculations error');
  }
});

/**
 * GET /api/v1/fence/calculations/:id
 */
router.get('/calculations/:id', async (req: Request, res: Response) => {
  try {
    const record = await loadRecord(req.params.id);
    res.json({ success: true, calculation: record });
  } catch (error) {
    sendError(res, error, 'Load calculation error');
  }
});

/**
 * GET /api/v1/fence/calculations/:id/export/pdf
 */
router.get('/calculations/:id/export/pdf', async (req: Request, res: Response) => {
  try {
    const record = await loadRecord(req.params.id);
    sendAttachment(res, generatePdf(record), PDF_CONTENT_TYPE, reportFilename(record, 'pdf'));
  } catch (error) {
    sendError(res, error, 'PDF export error');
  }
});

/**
 * GET /api/v1/fence/calculations/:id/export/excel
 */
router.get('/calculations/:id/export/excel', async (req: Request, res: Response) => {
  try {
    const record = await loadRecord(req.params.id);
    const body = await generateExcel(record);
    sendAttachment(res, body, XLSX_CONTENT_TYPE, reportFilename(record, 'xlsx'));
  } catch (error) {
    sendError(res, error, 'Excel export error');
  }
});

/**
 * GET /api/v1/fence/types
 * Presets used to fill optional fields
 */
router.get('/types', (req: Request, res: Response) => {
  res.json({ fence_types: Object.values(FENCE_PRESETS) });
});

/**
 * GET /api/v1/fence/db-status
 */
router.get('/db-status', async (req: Request, res: Response) => {
  res.json({ database: await checkDatabase() });
});

export default router;
