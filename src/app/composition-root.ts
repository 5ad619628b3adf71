import type { AxiosAdapter } from 'axios';
import type { AppConfig } from '../config/app.config';
import { createPostgresDbAdapter } from '../adapters/db/postgres.adapter';
import { createDbAccountRepository } from '../adapters/repositories/db-account.repository';
import { createDbEnrollmentLogRepository } from '../adapters/repositories/db-enrollment-log.repository';
import { AccountSessionManager } from '../services/account-session.service';
import { AccountService } from '../services/account.service';
import { CredentialVault } from '../services/credential-vault.service';
import { EnrollmentLogService } from '../services/enrollment-log.service';
import { EnrollmentOrchestrator } from '../services/enrollment-orchestrator.service';
import type { AccountRepositoryPort } from '../services/ports/account.repository.port';
import type { DbPort } from '../services/ports/db.port';
import type { EnrollmentLogRepositoryPort } from '../services/ports/enrollment-log.repository.port';
import { logger } from '../utils/logger';

export interface CompositionRoot {
  config: AppConfig;
  db: DbPort;
  vault: CredentialVault;
  sessions: AccountSessionManager;
  accounts: AccountService;
  enrollmentLogs: EnrollmentLogService;
  orchestrator: EnrollmentOrchestrator;
}

export interface CompositionOverrides {
  db?: DbPort;
  vault?: CredentialVault;
  accountRepository?: AccountRepositoryPort;
  enrollmentLogRepository?: EnrollmentLogRepositoryPort;
  /** Replaces the network layer of every portal session. */
  portalAdapter?: AxiosAdapter;
  now?: () => Date;
}

export function createCompositionRoot(config: AppConfig, overrides: CompositionOverrides = {}): CompositionRoot {
  const db = overrides.db ?? createPostgresDbAdapter();
  const vault = overrides.vault ?? CredentialVault.fromEnv();
  const accountRepository = overrides.accountRepository ?? createDbAccountRepository(db, overrides.now);
  const enrollmentLogRepository = overrides.enrollmentLogRepository ?? createDbEnrollmentLogRepository(db);

  const sessions = new AccountSessionManager(config.portal, vault, overrides.portalAdapter);
  const orchestrator = new EnrollmentOrchestrator(sessions, enrollmentLogRepository, {
    dropFlag: config.enrollment.dropFlag,
    now: overrides.now,
  });

  logger.debug('composition-root:initialized', {
    nodeEnv: config.nodeEnv,
    customDb: Boolean(overrides.db),
    customPortalAdapter: Boolean(overrides.portalAdapter),
  });

  return {
    config,
    db,
    vault,
    sessions,
    accounts: new AccountService(accountRepository, vault, sessions),
    enrollmentLogs: new EnrollmentLogService(enrollmentLogRepository),
    orchestrator,
  };
}
