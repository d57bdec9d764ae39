/**
 * Lending Hub - Action Routes
 * POST /v1/actions   hub actions relayed from spokes
 * POST /admin/actions operator actions
 *
 * Bodies are validated by the processor; amounts are decimal strings.
 */

import { Router, Request, Response } from 'express';
import { ActionProcessor } from '../../workers/actionProcessor';
import { Result } from '../../shared/errors';
import { JsonValue } from '../../shared/codec';
import { httpStatusFor, sendError } from '../errors';

type ActionKind = 'hub' | 'admin';

function respond(res: Response, result: Result<JsonValue>): void {
  if (result.success) {
    res.status(200).json({ result: result.value });
    return;
  }
  res.status(httpStatusFor(result.category, result.code)).json({
    error: { code: result.code ?? 'Unknown', category: result.category, message: result.error },
  });
}

export function createActionRoutes(processor: ActionProcessor, kind: ActionKind): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response) => {
    try {
      const result =
        kind === 'hub' ? await processor.processHubAction(req.body) : await processor.processAdminAction(req.body);
      respond(res, result);
    } catch (error) {
      sendError(res, error, 'Action API');
    }
  });

  return router;
}
