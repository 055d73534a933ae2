/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query/param validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type PageQueryDto = z.infer<typeof PageQuerySchema>;

export const TokenQuerySchema = z.object({
  token: z.string().min(1),
});

export const UserIdParamSchema = z.object({
  userId: z.string().uuid(),
});

export const PostIdParamSchema = z.object({
  postId: z.string().uuid(),
});

export const CommentIdParamSchema = z.object({
  commentId: z.string().uuid(),
});

// =============================================================================
// Auth DTOs
// =============================================================================

export const RegisterSchema = z.object({
  username: z
    .string()
    .min(3)
    .max(32)
    .regex(/^[A-Za-z0-9_.]+$/, "username may only contain letters, digits, '_' and '.'"),
  email: z.string().email().max(254),
  password: z.string().min(8).max(64),
});

export type RegisterDto = z.infer<typeof RegisterSchema>;

export const CredentialsSchema = z.object({
  /** Username or email */
  identifier: z.string().min(1).max(254),
  password: z.string().min(1).max(64),
});

export type CredentialsDto = z.infer<typeof CredentialsSchema>;

export const ForgotPasswordSchema = z.object({
  identifier: z.string().min(1).max(254),
});

export type ForgotPasswordDto = z.infer<typeof ForgotPasswordSchema>;

export const ResetPasswordSchema = z
  .object({
    newPassword: z.string().min(8).max(64),
    confirmPassword: z.string().min(8).max(64),
  })
  .refine((body) => body.newPassword === body.confirmPassword, {
    message: "passwords do not match",
    path: ["confirmPassword"],
  });

export type ResetPasswordDto = z.infer<typeof ResetPasswordSchema>;

// =============================================================================
// Moderation DTOs
// =============================================================================

export const TIMEOUT_DURATIONS_MS = {
  "30m": 30 * 60 * 1000,
  "1h": 60 * 60 * 1000,
  "6h": 6 * 60 * 60 * 1000,
  "12h": 12 * 60 * 60 * 1000,
  "1d": 24 * 60 * 60 * 1000,
} as const;

export type TimeoutDuration = keyof typeof TIMEOUT_DURATIONS_MS;

const TIMEOUT_DURATIONS = ["30m", "1h", "6h", "12h", "1d"] as const satisfies readonly TimeoutDuration[];

export const TimeoutSchema = z.object({
  timeoutDuration: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(TIMEOUT_DURATIONS)),
});

export type TimeoutDto = z.infer<typeof TimeoutSchema>;
