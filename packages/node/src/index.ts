/**
 * @custody/node — HTTP host for a bounded custody vault.
 */

export { CustodyService } from "./services/custody-service.js";
export type {
  CustodyServiceConfig,
  CapacityView,
  ReadinessReport,
} from "./services/custody-service.js";
export { OperationQueue } from "./services/operation-queue.js";
export {
  InMemoryTransferGateway,
  toTransferFn,
} from "./services/transfer-gateway.js";
export type { TransferGateway, Payout } from "./services/transfer-gateway.js";
export {
  loadConfig,
  parseApiKeys,
  assertOwnerCredentials,
  toLedgerConfig,
  ConfigSchema,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";

// Types
export {
  AmountSchema,
  AmountRequestSchema,
  PaginationQuerySchema,
  ListEventsQuerySchema,
} from "./types/dto.js";
export type {
  AmountRequestDto,
  OperationResponse,
  AccountResponse,
  StatsResponse,
  CapacityResponse,
  ListEventsQuery,
} from "./types/dto.js";
export { createErrorEnvelope } from "./types/error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./types/error.js";
export { encodeCursor, decodeCursor, paginate } from "./types/pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./types/pagination.js";
export { ROLES, isRole } from "./types/auth.js";
export type { Role, AuthContext, ApiKeyRecord, JwtClaims } from "./types/auth.js";
export type { AppEnv } from "./types/api-contract.js";
