import { z } from 'zod';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const SourceIdSchema = z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'Source id must be kebab-case');
export type SourceId = z.infer<typeof SourceIdSchema>;

export const RawRecordSchema = z.object({
  sourceId: SourceIdSchema,
  lineNumber: z.number().int().positive(),
  date: z.string(),
  description: z.string(),
  amount: z.string(),
  type: z.string().optional(),
  category: z.string().optional(),
  country: z.string().optional(),
  yearHint: z.number().int().optional(),
  closingMonth: z.number().int().min(1).max(12).optional(),
  originalText: z.string(),
});
export type RawRecord = z.infer<typeof RawRecordSchema>;

export const TransactionSchema = z.object({
  date: z.string().regex(ISO_DATE, 'Date must be in YYYY-MM-DD format'),
  description: z.string().min(1),
  amount: z.number().finite(),
  account: SourceIdSchema,
  category: z.string().min(1).nullable(),
  owner: z.string().min(1).nullable().optional(),
  sourceCategory: z.string().min(1).nullable().optional(),
  country: z.string().length(2).optional(),
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const CategoryRuleSchema = z.object({
  key: z.string().min(1),
  category: z.string().min(1),
  count: z.number().int().positive(),
  totalCount: z.number().int().positive(),
  lastSeen: z.string().regex(ISO_DATE),
  lastIndex: z.number().int().nonnegative(),
});
export type CategoryRule = z.infer<typeof CategoryRuleSchema>;

export const SignConventionSchema = z.enum(['signed', 'expense-positive', 'type-column']);
export type SignConvention = z.infer<typeof SignConventionSchema>;

export const DateFormatSchema = z.enum(['DD/MM/YYYY', 'MM/DD/YYYY', 'YYYY-MM-DD', 'DD.MM.YYYY', 'DD/MM']);
export type DateFormat = z.infer<typeof DateFormatSchema>;

export const DecimalSeparatorSchema = z.enum(['.', ',']);
export type DecimalSeparator = z.infer<typeof DecimalSeparatorSchema>;
