import { Router } from 'express';
import type { CreditLedger } from '../ledger/creditLedger';
import { parseId, unwrap } from '../validation/common';
import { parseCreditKey, validateCalculateRequest, validateStatusUpdate } from '../validation/credits';
import { asyncHandler } from './asyncHandler';

export function createCreditsRouter(ledger: CreditLedger): Router {
  const router = Router();

  router.post(
    '/calculate',
    asyncHandler(async (req, res) => {
      const key = unwrap(validateCalculateRequest(req.body));
      const record = await ledger.calculate(key);
      res.status(201).json(record);
    }),
  );

  router.get(
    '/:inverterId',
    asyncHandler(async (req, res) => {
      const inverterId = unwrap(parseId(req.params.inverterId, 'inverterId'));
      res.json(await ledger.listCredits(inverterId));
    }),
  );

  router.get(
    '/:inverterId/:date',
    asyncHandler(async (req, res) => {
      const key = unwrap(parseCreditKey(req.params.inverterId, req.params.date));
      res.json(await ledger.getCredit(key));
    }),
  );

  router.post(
    '/:inverterId/:date/verify',
    asyncHandler(async (req, res) => {
      const key = unwrap(parseCreditKey(req.params.inverterId, req.params.date));
      res.json(await ledger.verify(key));
    }),
  );

  router.patch(
    '/:inverterId/:date/status',
    asyncHandler(async (req, res) => {
      const key = unwrap(parseCreditKey(req.params.inverterId, req.params.date));
      const { status, note } = unwrap(validateStatusUpdate(req.body));
      res.json(await ledger.updateStatus(key, status, note));
    }),
  );

  return router;
}
