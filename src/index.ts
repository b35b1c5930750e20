/**
 * Gift Market Scanner - Library Entry Point
 */

// Domain
export type {
  GiftKey,
  ListingSummary,
  ItemDetail,
  OwnershipHistoryEntry,
} from "@/core/domain/Gift";
export { UNKNOWN_VALUE, toGiftKey } from "@/core/domain/Gift";
export type {
  CatalogFilter,
  CatalogSort,
  CatalogQuery,
  CatalogRequest,
} from "@/core/domain/MarketQuery";
export {
  CATALOG_FILTERS,
  CATALOG_SORTS,
  CatalogQuerySchema,
  buildCatalogRequest,
} from "@/core/domain/MarketQuery";
export type { MarketConfig } from "@/core/domain/MarketConfig";
export { MarketConfigSchema } from "@/core/domain/MarketConfig";

// Capabilities
export type {
  IMarkupFetcher,
  HttpMethod,
  RequestParams,
  IDocumentParser,
  IDocument,
  IElement,
  TextOptions,
} from "@/core/interfaces";
export { ScanError, ScanErrorType, isScanError } from "@/core/interfaces";
export { CheerioDocumentParser } from "@/parsers/CheerioDocumentParser";
export { HttpMarkupFetcher } from "@/fetchers/HttpMarkupFetcher";

// Extraction
export {
  extractListings,
  extractDetail,
  ExtractorRegistry,
  createExtractors,
  GiftListingExtractor,
  GiftDetailExtractor,
  PriceParser,
  FieldNormalizer,
} from "@/extractors";
export type { PlatformExtractors } from "@/extractors";

// Service
export { GiftMarketService } from "@/services/GiftMarketService";
export type { GiftInfoBatchOptions } from "@/services/GiftMarketService";

// Config
export { ConfigLoader } from "@/config/ConfigLoader";
