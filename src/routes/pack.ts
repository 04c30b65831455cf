import { Router, type Request, type Response } from 'express';
import type { BoxAssignment, ErrorBody, PackedBox, PackOutcome, PackResponse } from '../types';
import { pack } from '../services/packing';
import type { BoxCatalog } from '../services/catalog';
import { validatePackRequest } from '../services/validation';
import { errorResponse, methodNotAllowed } from '../middleware/errors';
import { isDebug } from '../config';

export const ENDPOINTS = ['GET /health', 'POST /pack'];

function toPackedBox({ box, items }: BoxAssignment): PackedBox {
  return {
    box_id: box.box_id,
    dimensions: { length: box.length, width: box.width, height: box.height },
    items,
  };
}

export function outcomeResponse(outcome: PackOutcome): { status: number; body: PackResponse | ErrorBody } {
  if (outcome.ok) {
    return {
      status: 200,
      body: { boxes: outcome.boxes.map(toPackedBox), total_boxes: outcome.boxes.length },
    };
  }
  if (outcome.error === 'item_too_large') {
    return { status: 422, body: { error: 'item_too_large', details: outcome.items } };
  }
  return { status: 422, body: { error: 'packing_error', details: outcome.message } };
}

export function createPackRouter(catalog: BoxCatalog): Router {
  const router = Router();

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      ok: true,
      path: req.path,
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      endpoints: ENDPOINTS,
    });
  });
  router.all('/health', methodNotAllowed);

  router.post('/pack', (req: Request, res: Response) => {
    if (!req.is('application/json')) {
      errorResponse(res, 415, 'unsupported_media_type', 'Use Content-Type: application/json');
      return;
    }

    const validation = validatePackRequest(req.body);
    if (!validation.ok) {
      if (isDebug) {
        console.log('Rejected pack request:', validation.errors);
      }
      errorResponse(res, 400, 'validation_error', validation.errors);
      return;
    }

    const { items } = validation.value;
    if (isDebug) {
      console.log('Processing pack request:', { itemCount: items.length });
    }

    const { status, body } = outcomeResponse(pack(items, catalog));
    res.status(status).json(body);
  });
  router.all('/pack', methodNotAllowed);

  return router;
}
