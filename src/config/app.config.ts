import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

/**
 * Typed application configuration parsed from the process environment.
 *
 * Portal hosts, endpoint paths and the pinned origin/referrer pair are
 * configuration; the defaults point at the production registration portal.
 */

const DEFAULT_AUTH_BASE_URL = 'https://auth-v2.telkomuniversity.ac.id';
const DEFAULT_SERVICE_BASE_URL = 'https://service-v2.telkomuniversity.ac.id';
const DEFAULT_PORTAL_ORIGIN = 'https://sirama.telkomuniversity.ac.id';
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/144.0.0.0 Safari/537.36';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  OPERATOR_JWT_SECRET: z.string().min(16, 'OPERATOR_JWT_SECRET must be at least 16 characters'),
  CORS_WHITELIST: z.string().default(''),

  PORTAL_AUTH_BASE_URL: z.string().url().default(DEFAULT_AUTH_BASE_URL),
  PORTAL_SERVICE_BASE_URL: z.string().url().default(DEFAULT_SERVICE_BASE_URL),
  PORTAL_ORIGIN: z.string().url().default(DEFAULT_PORTAL_ORIGIN),
  PORTAL_REFERER: z.string().url().default(`${DEFAULT_PORTAL_ORIGIN}/`),
  PORTAL_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  PORTAL_ACCEPT_LANGUAGE: z.string().min(1).default('id'),
  PORTAL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  PORTAL_LOGIN_PATH: z.string().default('/api/oauth/issueauth'),
  PORTAL_SCOPE_PATH: z.string().default('/api/oauth/issuescope'),
  PORTAL_PROFILE_PATH: z.string().default('/read/api/read/issueprofile'),
  PORTAL_STUDENT_STATUS_PATH: z.string().default('/filter/api/read/d5766829095ade253c73f309124ec702n2132344'),
  PORTAL_ACADEMIC_YEAR_PATH: z.string().default('/course-schedule/academic/current-school-year'),
  PORTAL_REGISTRATION_SCHEDULE_PATH: z.string().default('/course-schedule/course/registration-schedule'),
  PORTAL_AVAILABLE_COURSES_PATH: z.string().default('/read/api/read/d6c09f330d8af5c7d63f64d2c251498fbdfed81d'),
  PORTAL_ENROLLED_COURSES_PATH: z.string().default('/read/api/read/87ec6ce42c5f860413f696957c33d9f3ee70acf2/'),
  PORTAL_SCHEDULE_PATH: z.string().default('/read/api/read/cd3ba337b4dbea0b0976f40e77cad6d5ab264b2e/'),
  PORTAL_TRANSACTION_PATH: z.string().default('/trans/api/transaction'),

  ENROLLMENT_ADD_HASH: optionalString,
  ENROLLMENT_DROP_HASH: optionalString,
  ENROLLMENT_DROP_FLAG: z.string().min(1).default('1'),
  DEFAULT_PROGRAM_ID: z.coerce.number().int().positive().default(117),
  DEFAULT_TERM_LEVEL: z.coerce.number().int().positive().default(2),
  MAX_CREDITS: z.coerce.number().int().positive().default(24),
});

export interface PortalEndpoints {
  login: string;
  scope: string;
  profile: string;
  studentStatus: string;
  academicYear: string;
  registrationSchedule: string;
  availableCourses: string;
  enrolledCourses: string;
  schedule: string;
  transaction: string;
}

export interface PortalConfig {
  endpoints: PortalEndpoints;
  headers: Record<string, string>;
  acceptLanguage: string;
  timeoutMs: number;
}

export interface EnrollmentDefaults {
  addHash?: string;
  dropHash?: string;
  dropFlag: string;
  programId: number;
  termLevel: number;
  maxCredits: number;
}

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  operatorJwtSecret: string;
  corsWhitelist: string[];
  portal: PortalConfig;
  enrollment: EnrollmentDefaults;
}

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export function buildPortalHeaders(origin: string, referer: string, userAgent: string, acceptLanguage: string): Record<string, string> {
  return {
    accept: 'application/json',
    'accept-encoding': 'gzip, deflate, br',
    'accept-language': acceptLanguage,
    origin,
    referer,
    'sec-fetch-dest': 'empty',
    'sec-fetch-mode': 'cors',
    'sec-fetch-site': 'same-site',
    'user-agent': userAgent,
  };
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  const auth = e.PORTAL_AUTH_BASE_URL;
  const service = e.PORTAL_SERVICE_BASE_URL;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    operatorJwtSecret: e.OPERATOR_JWT_SECRET,
    corsWhitelist: e.CORS_WHITELIST.split(',').map((s) => s.trim()).filter(Boolean),
    portal: {
      endpoints: {
        login: joinUrl(auth, e.PORTAL_LOGIN_PATH),
        scope: joinUrl(auth, e.PORTAL_SCOPE_PATH),
        profile: joinUrl(service, e.PORTAL_PROFILE_PATH),
        studentStatus: joinUrl(service, e.PORTAL_STUDENT_STATUS_PATH),
        academicYear: joinUrl(service, e.PORTAL_ACADEMIC_YEAR_PATH),
        registrationSchedule: joinUrl(service, e.PORTAL_REGISTRATION_SCHEDULE_PATH),
        availableCourses: joinUrl(service, e.PORTAL_AVAILABLE_COURSES_PATH),
        enrolledCourses: joinUrl(service, e.PORTAL_ENROLLED_COURSES_PATH),
        schedule: joinUrl(service, e.PORTAL_SCHEDULE_PATH),
        transaction: joinUrl(service, e.PORTAL_TRANSACTION_PATH),
      },
      headers: buildPortalHeaders(e.PORTAL_ORIGIN, e.PORTAL_REFERER, e.PORTAL_USER_AGENT, e.PORTAL_ACCEPT_LANGUAGE),
      acceptLanguage: e.PORTAL_ACCEPT_LANGUAGE,
      timeoutMs: e.PORTAL_TIMEOUT_MS,
    },
    enrollment: {
      addHash: e.ENROLLMENT_ADD_HASH,
      dropHash: e.ENROLLMENT_DROP_HASH,
      dropFlag: e.ENROLLMENT_DROP_FLAG,
      programId: e.DEFAULT_PROGRAM_ID,
      termLevel: e.DEFAULT_TERM_LEVEL,
      maxCredits: e.MAX_CREDITS,
    },
  };
}
