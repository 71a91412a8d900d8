import { Router, type Router as RouterType } from 'express';
import { z } from 'zod';
import { Money } from '../lib/money.js';
import { TRANSACTION_TYPES } from '../lib/transactionTypes.js';
import { ApiError } from '../middleware/errorHandler.js';
import { validate } from '../middleware/validate.js';
import { authenticate, requireRole, type AuthenticatedRequest } from '../middleware/auth.js';
import { MAX_REFERENCE_LENGTH } from '../lib/ledgerLimits.js';
import {
  getWalletBalance,
  addMoney,
  withdrawMoney,
  getTransactions,
  reconcileWallet,
} from '../services/wallet.service.js';

const router: RouterType = Router();

// Amounts arrive as JSON numbers or decimal strings and leave as Money.
const amountSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  let amount: Money;
  try {
    amount = Money.parse(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be a number with at most 2 decimal places' });
    return z.NEVER;
  }
  if (!amount.isPositive()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be greater than 0' });
    return z.NEVER;
  }
  return amount;
});

const referenceSchema = z.string().trim().min(1).max(MAX_REFERENCE_LENGTH);

const depositSchema = z.object({
  amount: amountSchema,
  reference: referenceSchema.default('Added to Wallet'),
});

const withdrawSchema = z.object({
  amount: amountSchema,
  reference: referenceSchema,
});

type DepositBody = z.output<typeof depositSchema>;
type WithdrawBody = z.output<typeof withdrawSchema>;

const transactionFiltersSchema = z.object({
  type: z.enum(TRANSACTION_TYPES).optional(),
  limit: z.coerce.number().int().positive().max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const reconcileParamsSchema = z.object({
  userId: z.string().min(1).max(64),
});

function currentUserId(req: AuthenticatedRequest): string {
  if (!req.user) {
    throw ApiError.unauthorized('AUTH_005', 'Authentication required');
  }
  return req.user.userId;
}

/**
 * GET /api/wallet/balance
 * Get current wallet balance
 */
router.get('/balance', authenticate, async (req: AuthenticatedRequest, res, next) => {
  try {
    const balance = await getWalletBalance(currentUserId(req));

    res.json({
      success: true,
      data: balance,
    });
  } catch (error) {
    next(error);
  }
});

/**
 * GET /api/wallet/transactions
 * Get wallet transaction history, newest first
 */
router.get(
  '/transactions',
  authenticate,
  validate({ query: transactionFiltersSchema }),
  async (req: AuthenticatedRequest, res, next) => {
    try {
      const filters = transactionFiltersSchema.parse(req.query);
      const transactions = await getTransactions(currentUserId(req), filters);

      res.json({
        success: true,
        data: transactions,
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * POST /api/wallet/deposit
 * Add money to wallet
 */
router.post(
  '/deposit',
  authenticate,
  validate({ body: depositSchema }),
  async (req: AuthenticatedRequest, res, next) => {
    try {
      const { amount, reference }: DepositBody = req.body;
      const balance = await addMoney(currentUserId(req), amount, reference);

      res.status(201).json({
        success: true,
        data: balance,
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * POST /api/wallet/withdraw
 * Withdraw money to the user's bank account
 */
router.post(
  '/withdraw',
  authenticate,
  validate({ body: withdrawSchema }),
  async (req: AuthenticatedRequest, res, next) => {
    try {
      const { amount, reference }: WithdrawBody = req.body;
      const balance = await withdrawMoney(currentUserId(req), amount, reference);

      res.status(201).json({
        success: true,
        data: balance,
      });
    } catch (error) {
      next(error);
    }
  }
);

/**
 * GET /api/wallet/:userId/reconcile
 * Compare a wallet's balance with its transaction history
 */
router.get(
  '/:userId/reconcile',
  authenticate,
  requireRole('admin'),
  validate({ params: reconcileParamsSchema }),
  async (req, res, next) => {
    try {
      const { userId } = reconcileParamsSchema.parse(req.params);
      const reconciliation = await reconcileWallet(userId);

      res.json({
        success: true,
        data: reconciliation,
      });
    } catch (error) {
      next(error);
    }
  }
);

export default router;
