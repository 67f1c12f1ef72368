/**
 * Auth Zod Schemas
 *
 * Usernames are matched case-insensitively: they are trimmed and
 * lower-cased before lookup and storage.
 */

import { z } from 'zod';

const usernameSchema = z
    .string({ required_error: 'Username is required' })
    .trim()
    .toLowerCase()
    .min(1, 'Username is required')
    .max(120, 'Username must be at most 120 characters');

export const loginBodySchema = z.object({
    username: usernameSchema,
    password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
});

export type LoginBody = z.infer<typeof loginBodySchema>;

export const registerBodySchema = z
    .object({
        username: usernameSchema,
        password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
        confirm: z.string({ required_error: 'Password confirmation is required' }),
    })
    .refine((body) => body.password === body.confirm, {
        message: 'Passwords do not match',
        path: ['confirm'],
    });

export type RegisterBody = z.infer<typeof registerBodySchema>;

export const changePasswordBodySchema = z.object({
    currentPassword: z.string().min(1, 'Current password is required'),
    newPassword: z.string().min(1, 'New password is required'),
});

export type ChangePasswordBody = z.infer<typeof changePasswordBodySchema>;
