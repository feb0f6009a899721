/**
 * Type barrel — re-exports all public types from @rewardstream/node.
 */

// DTOs
export {
  IdentitySchema,
  AmountSchema,
  PaginationQuerySchema,
  IndexParamSchema,
  AddRewardTokenSchema,
  SetRecipientSchema,
  SupplyChangeSchema,
  TransferSchema,
  RewardAmountSchema,
  TransferAdministrationSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  AddRewardTokenDto,
  SetRecipientDto,
  SupplyChangeDto,
  TransferDto,
  RewardAmountDto,
  TransferAdministrationDto,
  ListEventsQuery,
} from "./dto.js";

// Views
export {
  toGlobalStateView,
  toUserStateView,
  toPayoutView,
  toClaimView,
  toHarvestView,
} from "./views.js";
export type {
  GlobalStateView,
  UserStateView,
  PayoutView,
  ClaimView,
  HarvestView,
} from "./views.js";

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
export type { AppEnv, CallerEnv } from "./api-contract.js";
