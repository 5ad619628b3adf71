import { loadAppConfig } from '../../../config/app.config';
import { ConfigurationError } from '../../../utils/errors';

describe('loadAppConfig', () => {
  const base = { OPERATOR_JWT_SECRET: 'test-secret-for-operators' };

  it('applies portal defaults', () => {
    const config = loadAppConfig(base);

    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.portal.timeoutMs).toBe(30000);
    expect(config.portal.endpoints.login).toBe('https://auth-v2.telkomuniversity.ac.id/api/oauth/issueauth');
    expect(config.portal.endpoints.enrolledCourses).toBe(
      'https://service-v2.telkomuniversity.ac.id/read/api/read/87ec6ce42c5f860413f696957c33d9f3ee70acf2/'
    );
    expect(config.portal.headers.referer).toBe('https://sirama.telkomuniversity.ac.id/');
    expect(config.enrollment).toEqual({
      addHash: undefined,
      dropHash: undefined,
      dropFlag: '1',
      programId: 117,
      termLevel: 2,
      maxCredits: 24,
    });
  });

  it('joins hosts and paths regardless of slashes', () => {
    const config = loadAppConfig({ ...base, PORTAL_SERVICE_BASE_URL: 'https://svc.test/', PORTAL_SCHEDULE_PATH: 'sched' });
    expect(config.portal.endpoints.schedule).toBe('https://svc.test/sched');
  });

  it('reads hashes, numbers and the CORS whitelist', () => {
    const config = loadAppConfig({
      ...base,
      ENROLLMENT_ADD_HASH: 'add-hash',
      ENROLLMENT_DROP_HASH: '  ',
      DEFAULT_PROGRAM_ID: '200',
      CORS_WHITELIST: 'https://a.test, https://b.test,',
    });
    expect(config.enrollment.addHash).toBe('add-hash');
    expect(config.enrollment.dropHash).toBeUndefined();
    expect(config.enrollment.programId).toBe(200);
    expect(config.corsWhitelist).toEqual(['https://a.test', 'https://b.test']);
  });

  it('fails with a ConfigurationError naming the bad fields', () => {
    expect(() => loadAppConfig({})).toThrow(ConfigurationError);
    expect(() => loadAppConfig({ ...base, PORTAL_TIMEOUT_MS: 'soon' })).toThrow(/PORTAL_TIMEOUT_MS/);
    expect(() => loadAppConfig({ OPERATOR_JWT_SECRET: 'short' })).toThrow(
      'Invalid configuration: OPERATOR_JWT_SECRET: OPERATOR_JWT_SECRET must be at least 16 characters'
    );
  });
});
