/**
 * Material Price Routes (settings API)
 */

import { Router, Request, Response } from 'express';
import { listMaterials, updateMaterial } from '../services/pricing';
import { validateMaterialKey, validateMaterialUpdateInput } from '../validation/fence';
import { config } from '../config';
import { ValidationError } from '../errors';
import { sendError } from './errors';

const router = Router();

function regionFrom(raw: unknown): string {
  if (raw === undefined || raw === '') return config.defaultRegion;
  if (typeof raw !== 'string') {
    throw new ValidationError('region', 'type', 'region must be a string');
  }
  return raw;
}

/**
 * GET /api/v1/materials?region=
 */
router.get('/', async (req: Request, res: Response) => {
  try {
    const region = regionFrom(req.query.region);
    const { materials, source } = await listMaterials(region);
    res.json({ success: true, region, source, materials });
  } catch (error) {
    sendError(res, error, 'List materials error');
  }
});

/**
 * POST /api/v1/materials/:key
 * Update price, roll/box size, price source or auto-update flag
 */
router.post('/:key', async (req: Request, res: Response) => {
  try {
    const key = validateMaterialKey(req.params.key);
    const update = validateMaterialUpdateInput(req.body);
    const region = regionFrom(req.query.region);

    const material = await updateMaterial(key, update, region);
    res.json({ success: true, material });
  } catch (error) {
    sendError(res, error, 'Update material error');
  }
});

export default router;
