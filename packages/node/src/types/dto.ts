/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts and prices travel as non-negative decimal strings; the
 * service converts them to base units.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const DecimalStringSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal string");

const TextSchema = z.string().max(256);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Profile DTOs
// =============================================================================

export const CreateProfileSchema = z.object({
  displayName: TextSchema,
  primaryContact: TextSchema,
  secondaryContact: TextSchema,
});

export type CreateProfileDto = z.infer<typeof CreateProfileSchema>;

export const UpdateProfileSchema = z.object({
  primaryContact: TextSchema,
  secondaryContact: TextSchema,
});

export type UpdateProfileDto = z.infer<typeof UpdateProfileSchema>;

// =============================================================================
// Balance / Settlement DTOs
// =============================================================================

export const AmountSchema = z.object({
  amount: DecimalStringSchema,
});

export type AmountDto = z.infer<typeof AmountSchema>;

export const MintSchema = z.object({
  to: z.string().trim().min(1).optional(),
  amount: DecimalStringSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

// =============================================================================
// Offer DTOs
// =============================================================================

export const CreateOfferSchema = z.object({
  maxTradeAmount: DecimalStringSchema,
  minTradeAmount: DecimalStringSchema,
  unitPrice: DecimalStringSchema,
  currency: TextSchema,
  paymentMethod: TextSchema,
});

export type CreateOfferDto = z.infer<typeof CreateOfferSchema>;

export const ListOffersQuerySchema = PaginationQuerySchema.extend({
  seller: z.string().min(1).optional(),
  active: z.enum(["true", "false"]).optional(),
});

export type ListOffersQuery = z.infer<typeof ListOffersQuerySchema>;

// =============================================================================
// Escrow DTOs
// =============================================================================

export const OpenEscrowSchema = z.object({
  offerId: z.number().int().min(1),
  amount: DecimalStringSchema,
});

export type OpenEscrowDto = z.infer<typeof OpenEscrowSchema>;

export const ResolveDisputeSchema = z.object({
  favorBuyer: z.boolean(),
});

export type ResolveDisputeDto = z.infer<typeof ResolveDisputeSchema>;

export const ListEscrowsQuerySchema = z.object({
  principal: z.string().min(1).optional(),
});

export type ListEscrowsQuery = z.infer<typeof ListEscrowsQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Path Parameters
// =============================================================================

export const RecordIdSchema = z.coerce.number().int().min(1);
