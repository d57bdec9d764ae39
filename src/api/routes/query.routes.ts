/**
 * Lending Hub - Read Routes
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { LoanManagerService } from '../../modules/loan-manager';
import { AmountSchema, toJson } from '../../shared/codec';
import { sendError } from '../errors';

const IdParam = z.coerce.number().int().nonnegative();
const PoolEpochsQuery = z
  .string()
  .regex(/^\d+:\d+(,\d+:\d+)*$/)
  .transform((value) =>
    value.split(',').map((pair) => {
      const [poolId, epochIndex] = pair.split(':');
      return { poolId: Number(poolId), epochIndex: Number(epochIndex) };
    })
  );

function badRequest(res: Response, message: string): void {
  res.status(400).json({ error: { code: 'InvalidRequest', message } });
}

export function createQueryRoutes(service: LoanManagerService): Router {
  const router = Router();

  /**
   * GET /v1/pools/:poolId
   */
  router.get('/pools/:poolId', async (req: Request, res: Response) => {
    const poolId = IdParam.safeParse(req.params.poolId);
    if (!poolId.success) return badRequest(res, 'poolId must be a non-negative integer');
    try {
      res.json(toJson(await service.getPool(poolId.data)));
    } catch (error) {
      sendError(res, error, 'Query API');
    }
  });

  /**
   * GET /v1/pools/:poolId/flash-loan?amount=
   * Available liquidity and the fee for the amount
   */
  router.get('/pools/:poolId/flash-loan', async (req: Request, res: Response) => {
    const poolId = IdParam.safeParse(req.params.poolId);
    const amount = AmountSchema.safeParse(req.query.amount ?? '0');
    if (!poolId.success || !amount.success) return badRequest(res, 'poolId and amount must be non-negative integers');
    try {
      const maxFlashLoan = await service.maxFlashLoan(poolId.data);
      const fee = await service.flashFee(poolId.data, amount.data);
      res.json(toJson({ maxFlashLoan, fee }));
    } catch (error) {
      sendError(res, error, 'Query API');
    }
  });

  router.get('/loan-types/:loanTypeId', async (req: Request, res: Response) => {
    const loanTypeId = IdParam.safeParse(req.params.loanTypeId);
    if (!loanTypeId.success) return badRequest(res, 'loanTypeId must be a non-negative integer');
    try {
      res.json(toJson(await service.getLoanType(loanTypeId.data)));
    } catch (error) {
      sendError(res, error, 'Query API');
    }
  });

  router.get('/loans/:loanId', async (req: Request, res: Response) => {
    try {
      res.json(toJson(await service.getUserLoan(req.params.loanId)));
    } catch (error) {
      sendError(res, error, 'Query API');
    }
  });

  router.get('/loans/:loanId/health', async (req: Request, res: Response) => {
    try {
      res.json(toJson(await service.getLoanHealth(req.params.loanId)));
    } catch (error) {
      sendError(res, error, 'Query API');
    }
  });

  router.get('/accounts/:accountId/rewards/:poolId', async (req: Request, res: Response) => {
    const poolId = IdParam.safeParse(req.params.poolId);
    if (!poolId.success) return badRequest(res, 'poolId must be a non-negative integer');
    try {
      res.json(toJson(await service.getUserPoolRewards(req.params.accountId, poolId.data)));
    } catch (error) {
      sendError(res, error, 'Query API');
    }
  });

  /**
   * GET /v1/accounts/:accountId/unclaimed?epochs=1:1,1:2
   * Epochs are poolId:epochIndex pairs
   */
  router.get('/accounts/:accountId/unclaimed', async (req: Request, res: Response) => {
    const epochs = PoolEpochsQuery.safeParse(req.query.epochs);
    if (!epochs.success) return badRequest(res, 'epochs must be poolId:epochIndex pairs separated by commas');
    try {
      const unclaimed = await service.getUnclaimedRewards(req.params.accountId, epochs.data);
      res.json(toJson({ unclaimed }));
    } catch (error) {
      sendError(res, error, 'Query API');
    }
  });

  return router;
}
