/**
 * Type barrel — re-exports all public types from @circulate/node.
 */

// DTOs
export {
  AmountSchema,
  AccountIdSchema,
  ItemIdSchema,
  PaginationQuerySchema,
  BorrowSchema,
  LoanActionSchema,
  ListLoansQuerySchema,
  CreateItemSchema,
  UpdateItemSchema,
  PauseItemSchema,
  MintSchema,
  PolicySettingSchema,
  PolicyValueSchema,
  AccountBodySchema,
  TransferStewardshipSchema,
  GrantMembershipSchema,
  WithdrawPoolSchema,
  FundWalletSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  AuditLogSchema,
} from "./dto.js";
export type {
  BorrowDto,
  LoanActionDto,
  ListLoansQuery,
  CreateItemDto,
  UpdateItemDto,
  PauseItemDto,
  MintDto,
  PolicyValueDto,
  AccountBodyDto,
  TransferStewardshipDto,
  GrantMembershipDto,
  WithdrawPoolDto,
  FundWalletDto,
  ListEventsQuery,
  ListStreamEventsQuery,
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

// Auth
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// HTTP contract
export {
  REQUEST_ID_HEADER,
  API_KEY_HEADER,
  ACCOUNT_ID_HEADER,
  RequestIdSchema,
} from "./api-contract.js";
export type { AppEnv } from "./api-contract.js";
