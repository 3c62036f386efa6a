export * from "./lib/errors";
export * from "./lib/invoice-types";
export { integerInWords, rupeesInWords } from "./lib/amount-in-words";
export { computeTotals, taxComponents, type TaxLine, type Totals } from "./lib/totals";
export { money, qty, percent, type MoneyFormat } from "./lib/money";
export {
  defaultStyle,
  makeStyle,
  validateStyle,
  PAGE_SIZES,
  type FontSource,
  type PageSize,
  type StyleConfig,
  type StyleOverrides,
} from "./lib/style";
export type * from "./lib/layout-types";
export { columnAlign, layoutDocument, planLayout, type LaidOutDocument } from "./lib/layout-engine";
export { AMOUNT_IN_WORDS, AMOUNT_PAYABLE, buildInvoiceBlocks, type InvoiceFigures } from "./lib/invoice-blocks";
export {
  inspectLogo,
  invoiceFigures,
  invoiceFilename,
  planInvoice,
  renderInvoice,
  type LogoInput,
} from "./lib/invoice-pdf";
export {
  archiveEntryName,
  packageArchive,
  rowToRecord,
  runBatch,
  type BatchOptions,
  type BatchProgress,
  type BatchResult,
  type DeliveryMode,
  type FailureMode,
  type RowFailure,
} from "./lib/batch.service";
export {
  normalizeColumnName,
  parseBatchJob,
  parseBatchRows,
  parseInvoiceRecord,
  parseInvoiceSheets,
  type RawRow,
  type SheetOptions,
} from "./lib/records";
export { createInvoice, createInvoiceFromSheets } from "./lib/invoice.service";
export { loadConfig, type AppConfig } from "./lib/config";
