/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal amount in the engine currency, e.g. "5" or "5.00". */
export const AmountSchema = z.string().regex(/^\d+(\.\d+)?$/, "Expected a decimal amount");

export const AccountIdSchema = z.string().trim().min(1).max(256);

export const ItemIdSchema = z.coerce.number().int().min(1);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Loan DTOs
// =============================================================================

export const BorrowSchema = z.object({
  itemId: ItemIdSchema,
  /** Deposit sent with the borrow; defaults to the policy deposit */
  deposit: AmountSchema.optional(),
});

export type BorrowDto = z.infer<typeof BorrowSchema>;

export const LoanActionSchema = z.object({
  itemId: ItemIdSchema,
});

export type LoanActionDto = z.infer<typeof LoanActionSchema>;

export const ListLoansQuerySchema = z.object({
  borrower: z.string().min(1).optional(),
  itemId: ItemIdSchema.optional(),
  overdue: z.enum(["true", "false"]).optional(),
});

export type ListLoansQuery = z.infer<typeof ListLoansQuerySchema>;

// =============================================================================
// Catalog DTOs
// =============================================================================

const PointerSchema = z.string().min(1).max(2048);

export const CreateItemSchema = z.object({
  title: z.string().min(1).max(512),
  author: z.string().max(512).default(""),
  contentPointer: PointerSchema,
  license: z.string().max(256).default(""),
  manifestPointer: PointerSchema.optional(),
  provenancePointer: PointerSchema.optional(),
  contributors: z.array(z.string().min(1).max(256)).max(100).default([]),
});

export type CreateItemDto = z.infer<typeof CreateItemSchema>;

export const UpdateItemSchema = z
  .object({
    title: z.string().min(1).max(512),
    author: z.string().max(512),
    contentPointer: PointerSchema,
    license: z.string().max(256),
    manifestPointer: PointerSchema,
    provenancePointer: PointerSchema,
    contributors: z.array(z.string().min(1).max(256)).max(100),
  })
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, "At least one field is required");

export type UpdateItemDto = z.infer<typeof UpdateItemSchema>;

export const PauseItemSchema = z.object({
  paused: z.boolean(),
});

export type PauseItemDto = z.infer<typeof PauseItemSchema>;

export const MintSchema = z.object({
  quantity: z.number().int().min(1),
  to: AccountIdSchema.optional(),
});

export type MintDto = z.infer<typeof MintSchema>;

// =============================================================================
// Policy & Role DTOs
// =============================================================================

export const PolicySettingSchema = z.enum([
  "loanDuration",
  "depositAmount",
  "gracePeriod",
  "extensionDuration",
  "maxExtensions",
]);

export const PolicyValueSchema = z.object({
  value: z.union([z.number(), AmountSchema]),
});

export type PolicyValueDto = z.infer<typeof PolicyValueSchema>;

export const AccountBodySchema = z.object({
  account: AccountIdSchema,
});

export type AccountBodyDto = z.infer<typeof AccountBodySchema>;

export const TransferStewardshipSchema = z.object({
  to: AccountIdSchema,
});

export type TransferStewardshipDto = z.infer<typeof TransferStewardshipSchema>;

export const GrantMembershipSchema = z.object({
  account: AccountIdSchema,
  tier: z.string().min(1).max(64).optional(),
});

export type GrantMembershipDto = z.infer<typeof GrantMembershipSchema>;

// =============================================================================
// Escrow & Wallet DTOs
// =============================================================================

export const WithdrawPoolSchema = z.object({
  to: AccountIdSchema,
  amount: AmountSchema,
});

export type WithdrawPoolDto = z.infer<typeof WithdrawPoolSchema>;

export const FundWalletSchema = z.object({
  amount: AmountSchema,
});

export type FundWalletDto = z.infer<typeof FundWalletSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  /** Exact event type, e.g. "lending.loan.opened" */
  type: z.string().trim().min(1).optional(),
  actor: AccountIdSchema.optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

/** Desk-wide logs that are not keyed by item or loan. */
export const AuditLogSchema = z.enum(["policy", "membership", "escrow"]);
