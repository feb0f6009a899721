/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body, path and query validation.
 * Identities are only checked for shape here; the distributor rejects
 * the null identity itself.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentitySchema = z.string().trim().min(1).max(128);

/** Base-10 amount string, parsed to bigint. */
export const AmountSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "Must be a non-negative integer string")
  .transform((value) => BigInt(value));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const IndexParamSchema = z.coerce.number().int().min(0);

// =============================================================================
// Registry DTOs
// =============================================================================

export const AddRewardTokenSchema = z.object({
  rewardToken: IdentitySchema,
});

export type AddRewardTokenDto = z.infer<typeof AddRewardTokenSchema>;

// =============================================================================
// Recipient DTOs
// =============================================================================

export const SetRecipientSchema = z.object({
  recipient: IdentitySchema,
});

export type SetRecipientDto = z.infer<typeof SetRecipientSchema>;

// =============================================================================
// Balance Ledger DTOs
// =============================================================================

export const SupplyChangeSchema = z.object({
  holder: IdentitySchema,
  amount: AmountSchema,
});

export type SupplyChangeDto = z.infer<typeof SupplyChangeSchema>;

export const TransferSchema = z.object({
  from: IdentitySchema,
  to: IdentitySchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

// =============================================================================
// Harvest DTOs
// =============================================================================

export const RewardAmountSchema = z.object({
  producerToken: IdentitySchema,
  rewardToken: IdentitySchema,
  amount: AmountSchema,
});

export type RewardAmountDto = z.infer<typeof RewardAmountSchema>;

// =============================================================================
// Administration DTOs
// =============================================================================

export const TransferAdministrationSchema = z.object({
  next: IdentitySchema,
});

export type TransferAdministrationDto = z.infer<typeof TransferAdministrationSchema>;

// =============================================================================
// Event Query
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  type: z.string().optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
