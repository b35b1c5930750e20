/**
 * Core Interfaces Barrel Export
 */

export type { IMarkupFetcher, HttpMethod, RequestParams } from "./IMarkupFetcher";
export type {
  IDocumentParser,
  IDocument,
  IElement,
  ISelectable,
  TextOptions,
} from "./IDocumentParser";
export { ScanError, ScanErrorType, isScanError, isRetryableType } from "./ScanErrorType";
