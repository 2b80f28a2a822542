/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as decimal-integer strings in the asset's smallest
 * unit and come out of validation as bigint.
 */

import { z } from "zod";
import { FEE_MODEL_KINDS, LIQUIDITY_ACTIONS, STATES_ACTIONS } from "@meridian/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative decimal integer string")
  .transform((value) => BigInt(value));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Vault DTOs
// =============================================================================

export const FeeModelSchema = z.object({
  kind: z.enum(FEE_MODEL_KINDS),
  performanceFeeBps: z.number().int().min(0),
  managementFeeBps: z.number().int().min(0),
});

export const CreateVaultSchema = z.object({
  id: z.string().min(1).max(64),
  type: z.enum(["transparent", "encrypted"]),
  feeModel: FeeModelSchema,
  shareDecimals: z.number().int().min(0).max(36).optional(),
});

export type CreateVaultDto = z.infer<typeof CreateVaultSchema>;

export const DepositRequestSchema = z.object({
  amount: AmountSchema,
});

export const RedeemRequestSchema = z.object({
  shares: AmountSchema,
});

export const AllocationSchema = z.array(
  z.object({
    asset: z.string().min(1),
    weight: z.number().int(),
  }),
);

export const IntentSchema = z.union([
  z.object({ allocation: AllocationSchema }),
  z.object({ ciphertext: z.string().min(1) }),
]);

export type IntentDto = z.infer<typeof IntentSchema>;

export const DecryptionResultSchema = z.object({
  allocation: z.unknown(),
});

// =============================================================================
// Upkeep DTOs
// =============================================================================

export const UpkeepSchema = z.discriminatedUnion("orchestrator", [
  z.object({
    orchestrator: z.literal("states"),
    action: z.enum(STATES_ACTIONS),
    minibatchIndex: z.number().int().min(0),
  }),
  z.object({
    orchestrator: z.literal("liquidity"),
    action: z.enum(LIQUIDITY_ACTIONS),
    minibatchIndex: z.number().int().min(0),
  }),
]);

export type UpkeepDto = z.infer<typeof UpkeepSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema;

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
