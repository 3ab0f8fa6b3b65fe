import { z } from 'zod';

const USERNAME_REGEX = /^[a-z0-9._-]+$/;
const PASSWORD_COMPLEXITY_REGEX = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[@$!%*?&])/;
const MINIMUM_AGE_YEARS = 13;

export const UsernameSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(3, 'Username must be at least 3 characters')
  .max(50, 'Username must be at most 50 characters')
  .regex(USERNAME_REGEX, 'Username may only contain a-z, 0-9, dots, underscores, and hyphens');

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .max(254, 'Email must be at most 254 characters')
  .email('Invalid email address');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(100, 'Password must be at most 100 characters')
  .regex(
    PASSWORD_COMPLEXITY_REGEX,
    'Password must contain a lowercase letter, an uppercase letter, a digit and one of @$!%*?&',
  );

export const DisplayNameSchema = z.string().trim().min(1, 'Display name is required').max(100);

export function meetsMinimumAge(birthDate: Date, now: Date = new Date()): boolean {
  const cutoff = new Date(now);
  cutoff.setUTCFullYear(cutoff.getUTCFullYear() - MINIMUM_AGE_YEARS);
  return birthDate.getTime() <= cutoff.getTime();
}

export const RegisterRequestSchema = z
  .object({
    email: EmailSchema,
    username: UsernameSchema,
    displayName: DisplayNameSchema,
    password: PasswordSchema,
    confirmPassword: z.string(),
    birthDate: z.coerce.date().optional(),
    bio: z.string().trim().max(500).optional(),
    website: z.string().trim().url('Website must be a URL').max(200).optional(),
    location: z.string().trim().max(100).optional(),
  })
  .refine((req) => req.password === req.confirmPassword, {
    message: 'Passwords do not match',
    path: ['confirmPassword'],
  })
  .refine((req) => req.birthDate === undefined || meetsMinimumAge(req.birthDate), {
    message: `User must be at least ${MINIMUM_AGE_YEARS} years old`,
    path: ['birthDate'],
  });

export const LoginRequestSchema = z.object({
  identifier: z.string().trim().toLowerCase().min(1, 'Email or username is required'),
  password: z.string().min(1, 'Password is required'),
  rememberMe: z.boolean().default(false),
});

export const RefreshRequestSchema = z.object({
  refreshToken: z.string().min(1),
});

export const ChangePasswordRequestSchema = z
  .object({
    currentPassword: z.string().min(1, 'Current password is required'),
    newPassword: PasswordSchema,
    confirmPassword: z.string(),
  })
  .refine((req) => req.newPassword === req.confirmPassword, {
    message: 'Passwords do not match',
    path: ['confirmPassword'],
  });

export const EmailRequestSchema = z.object({
  email: EmailSchema,
});

export const ResetPasswordRequestSchema = z
  .object({
    email: EmailSchema,
    token: z.string().min(1, 'Reset token is required'),
    newPassword: PasswordSchema,
    confirmPassword: z.string(),
  })
  .refine((req) => req.newPassword === req.confirmPassword, {
    message: 'Passwords do not match',
    path: ['confirmPassword'],
  });

export const ConfirmEmailRequestSchema = z.object({
  userId: z.string().min(1),
  token: z.string().min(1),
});

export type RegisterRequestInput = z.input<typeof RegisterRequestSchema>;
export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequestInput = z.input<typeof LoginRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type ChangePasswordRequest = z.infer<typeof ChangePasswordRequestSchema>;
export type EmailRequest = z.infer<typeof EmailRequestSchema>;
export type ResetPasswordRequest = z.infer<typeof ResetPasswordRequestSchema>;
export type ConfirmEmailRequest = z.infer<typeof ConfirmEmailRequestSchema>;
