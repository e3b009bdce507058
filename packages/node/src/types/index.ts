/**
 * Type barrel — re-exports all public types from @coinwrap/node.
 */

// DTOs
export {
  AmountSchema,
  AddressSchema,
  PaginationQuerySchema,
  AmountBodySchema,
  TransferSchema,
  ApproveSchema,
  CoinTransferSchema,
  ListEventsQuerySchema,
  toNotificationDto,
} from "./dto.js";
export type {
  AmountBodyDto,
  TransferDto,
  ApproveDto,
  CoinTransferDto,
  ListEventsQuery,
  TokenInfoDto,
  CustodyAccountDto,
  BalancesDto,
  NotificationDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
