import type { Request, Response, NextFunction } from 'express';
import { requireOperator } from '../middleware/auth.middleware';
import type { AccountService } from '../services/account.service';
import { toPublicAccount } from '../types/account.types';
import { ok } from '../utils/api-response';
import type { CreateAccountBody, UpdateAccountBody } from '../utils/validation.schemas';

/**
 * Stored portal accounts. Responses never include the encrypted password.
 */
export class AccountController {
  constructor(private readonly accounts: AccountService) {}

  /** GET /api/v1/accounts */
  async list(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const accounts = await this.accounts.list(userId);
      return ok(res, { accounts: accounts.map(toPublicAccount), count: accounts.length });
    } catch (error) {
      next(error);
    }
  }

  /** POST /api/v1/accounts */
  async create(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const body: CreateAccountBody = req.body;
      const account = await this.accounts.create(userId, body);
      return ok(res, { account: toPublicAccount(account) }, 201);
    } catch (error) {
      next(error);
    }
  }

  /** GET /api/v1/accounts/:id */
  async get(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const account = await this.accounts.get(userId, req.params.id);
      return ok(res, { account: toPublicAccount(account) });
    } catch (error) {
      next(error);
    }
  }

  /** PATCH /api/v1/accounts/:id */
  async update(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const body: UpdateAccountBody = req.body;
      const account = await this.accounts.update(userId, req.params.id, body);
      return ok(res, { account: toPublicAccount(account) });
    } catch (error) {
      next(error);
    }
  }

  /** DELETE /api/v1/accounts/:id */
  async remove(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      await this.accounts.remove(userId, req.params.id);
      return ok(res, { deleted: true });
    } catch (error) {
      next(error);
    }
  }

  /** POST /api/v1/accounts/:id/toggle-status */
  async toggleStatus(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const account = await this.accounts.toggleStatus(userId, req.params.id);
      return ok(res, { account: toPublicAccount(account) });
    } catch (error) {
      next(error);
    }
  }

  /** POST /api/v1/accounts/:id/test-connection */
  async testConnection(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const result = await this.accounts.testConnection(userId, req.params.id);
      return ok(res, result);
    } catch (error) {
      next(error);
    }
  }
}
