/**
 * Type barrel — re-exports all public types from @meridian/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  FeeModelSchema,
  CreateVaultSchema,
  DepositRequestSchema,
  RedeemRequestSchema,
  AllocationSchema,
  IntentSchema,
  DecryptionResultSchema,
  UpkeepSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type { CreateVaultDto, IntentDto, UpkeepDto, ListEventsQuery } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, DomainErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// Views
export { orderView, orderBookView, parametersView } from "./views.js";
export type { OrderView, OrderBookView, ParametersView } from "./views.js";

// App env
export type { AppEnv } from "./api-contract.js";
