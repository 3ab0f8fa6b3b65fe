import { z } from 'zod';

export const USER_REGISTERED = 'USER_REGISTERED' as const;
export const PASSWORD_CHANGED = 'PASSWORD_CHANGED' as const;

export const UserRegisteredPayload = z.object({
  userId: z.string(),
});

export const PasswordChangedPayload = z.object({
  userId: z.string(),
  via: z.enum(['change', 'reset']),
});

export type UserRegistered = z.infer<typeof UserRegisteredPayload>;
export type PasswordChanged = z.infer<typeof PasswordChangedPayload>;
