/**
 * Type barrel — re-exports all public types from @souk/node.
 */

// DTOs
export {
  DecimalStringSchema,
  PaginationQuerySchema,
  CreateProfileSchema,
  UpdateProfileSchema,
  AmountSchema,
  MintSchema,
  CreateOfferSchema,
  ListOffersQuerySchema,
  OpenEscrowSchema,
  ResolveDisputeSchema,
  ListEscrowsQuerySchema,
  ListEventsQuerySchema,
  RecordIdSchema,
} from "./dto.js";
export type {
  CreateProfileDto,
  UpdateProfileDto,
  AmountDto,
  MintDto,
  CreateOfferDto,
  ListOffersQuery,
  OpenEscrowDto,
  ResolveDisputeDto,
  ListEscrowsQuery,
  ListEventsQuery,
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
