/**
 * Type barrel: re-exports the public HTTP types.
 */

// DTOs
export {
  PageQuerySchema,
  TokenQuerySchema,
  UserIdParamSchema,
  PostIdParamSchema,
  CommentIdParamSchema,
  RegisterSchema,
  CredentialsSchema,
  ForgotPasswordSchema,
  ResetPasswordSchema,
  TimeoutSchema,
  TIMEOUT_DURATIONS_MS,
} from "./dto.js";
export type {
  PageQueryDto,
  RegisterDto,
  CredentialsDto,
  ForgotPasswordDto,
  ResetPasswordDto,
  TimeoutDuration,
  TimeoutDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { pageWindow, paginate } from "./pagination.js";
export type {
  PageQuery,
  PageWindow,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv, ApiResponse } from "./api-contract.js";
