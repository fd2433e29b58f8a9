import { z } from 'zod';

const REGISTER_REQUIRED = 'Username, email, and password are required';
const LOGIN_REQUIRED = 'Username and password are required';

function required(message: string) {
  return z.string({ required_error: message, invalid_type_error: message });
}

export const RegisterSchema = z.object({
  username: required(REGISTER_REQUIRED)
    .trim()
    .min(1, REGISTER_REQUIRED)
    .min(3, 'Username must be between 3 and 50 characters')
    .max(50, 'Username must be between 3 and 50 characters')
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, numbers, dots, dashes and underscores'),
  email: required(REGISTER_REQUIRED).trim().min(1, REGISTER_REQUIRED).email('Invalid email address'),
  password: required(REGISTER_REQUIRED)
    .min(1, REGISTER_REQUIRED)
    .min(8, 'Password must be at least 8 characters')
    .max(128, 'Password must be at most 128 characters'),
});

export type RegisterInput = z.infer<typeof RegisterSchema>;

export const LoginSchema = z.object({
  /** Username or email. */
  username: required(LOGIN_REQUIRED).trim().min(1, LOGIN_REQUIRED),
  password: required(LOGIN_REQUIRED).min(1, LOGIN_REQUIRED),
});

export type LoginInput = z.infer<typeof LoginSchema>;
