import { z } from 'zod';

// Account schemas
export const createAccountSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
  displayName: z.string().trim().max(200).nullable().optional(),
});

export const updateAccountSchema = z
  .object({
    username: z.string().trim().min(1).optional(),
    password: z.string().min(1).optional(),
    displayName: z.string().trim().max(200).nullable().optional(),
    status: z.enum(['active', 'inactive']).optional(),
  })
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: 'At least one field must be provided',
  });

// Portal reads
export const availableCoursesQuerySchema = z.object({
  programId: z.coerce.number().int().positive().optional(),
  termLevel: z.coerce.number().int().positive().optional(),
});

// Enrollment schemas
const courseRefShape = {
  courseId: z.string().trim().min(1, 'courseId is required'),
  courseName: z.string().trim().optional(),
  registrationId: z.string().trim().min(1).optional(),
  hash: z.string().trim().min(1).optional(),
};

export const enrollmentSchema = z.object({ action: z.enum(['add', 'drop']), ...courseRefShape });

export const batchEnrollmentSchema = z.object({
  action: z.enum(['add', 'drop']),
  ...courseRefShape,
  // Omitted: every active account the operator owns
  accountIds: z.array(z.string().min(1)).min(1).optional(),
});

// Log queries
export const enrollmentLogQuerySchema = z.object({
  accountId: z.string().min(1).optional(),
  status: z.enum(['success', 'failed']).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export const enrollmentStatsQuerySchema = z.object({
  accountId: z.string().min(1).optional(),
});

export type CreateAccountBody = z.infer<typeof createAccountSchema>;
export type UpdateAccountBody = z.infer<typeof updateAccountSchema>;
export type EnrollmentBody = z.infer<typeof enrollmentSchema>;
export type BatchEnrollmentBody = z.infer<typeof batchEnrollmentSchema>;
