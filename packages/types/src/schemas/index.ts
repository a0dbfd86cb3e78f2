export {
  SourceIdSchema,
  RawRecordSchema,
  TransactionSchema,
  CategoryRuleSchema,
  SignConventionSchema,
  DateFormatSchema,
  DecimalSeparatorSchema,
} from './transaction.js';

export type {
  SourceId,
  RawRecord,
  Transaction,
  CategoryRule,
  SignConvention,
  DateFormat,
  DecimalSeparator,
} from './transaction.js';
