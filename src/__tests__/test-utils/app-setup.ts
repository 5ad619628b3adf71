/**
 * Builds the full Express app over in-memory repositories and a FakePortal.
 */

import type { Express } from 'express';
import jwt from 'jsonwebtoken';
import { createApp } from '../../app';
import { createCompositionRoot, type CompositionRoot } from '../../app/composition-root';
import type { CredentialVault } from '../../services/credential-vault.service';
import type { DbPort, DbRow } from '../../services/ports/db.port';
import { FakePortal } from './fake-portal';
import { TEST_OPERATOR_SECRET, buildTestConfig, buildTestVault } from './factories';
import { InMemoryAccountRepository, InMemoryEnrollmentLogRepository } from './in-memory-repositories';

export const TEST_NOW = new Date('2026-02-01T01:00:00.000Z');

/** Only the health check reaches the database in app tests. */
export class FakeHealthDb implements DbPort {
  healthy = true;
  readonly queries: string[] = [];

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async query(sql: string): Promise<DbRow[]> {
    const row = await this.queryOne(sql);
    return row ? [row] : [];
  }

  async queryOne(sql: string): Promise<DbRow | null> {
    this.queries.push(sql);
    if (!this.healthy) {
      throw new Error('connection refused');
    }
    return { health_check: 1 };
  }

  async insert(): Promise<void> {
    throw new Error('insert is not used by app tests');
  }

  async update(): Promise<void> {
    throw new Error('update is not used by app tests');
  }

  generateId(): string {
    return 'generated-id';
  }
}

export interface TestApp {
  app: Express;
  root: CompositionRoot;
  portal: FakePortal;
  vault: CredentialVault;
  db: FakeHealthDb;
  accounts: InMemoryAccountRepository;
  logs: InMemoryEnrollmentLogRepository;
}

export function createTestApp(env: NodeJS.ProcessEnv = {}): TestApp {
  const portal = new FakePortal();
  const vault = buildTestVault();
  const db = new FakeHealthDb();
  const accounts = new InMemoryAccountRepository();
  const logs = new InMemoryEnrollmentLogRepository(accounts);
  const root = createCompositionRoot(buildTestConfig(env), {
    db,
    vault,
    accountRepository: accounts,
    enrollmentLogRepository: logs,
    portalAdapter: portal.adapter,
    now: () => TEST_NOW,
  });
  return { app: createApp(root), root, portal, vault, db, accounts, logs };
}

export function operatorToken(userId = 'operator-1'): string {
  return jwt.sign({ sub: userId }, TEST_OPERATOR_SECRET, { algorithm: 'HS256', expiresIn: '1h' });
}

export function authHeader(userId?: string): string {
  return `Bearer ${operatorToken(userId)}`;
}
