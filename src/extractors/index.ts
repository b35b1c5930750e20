/**
 * Extractors Module Entry Point
 */

import type { ItemDetail, ListingSummary } from "@/core/domain/Gift";
import { MARKET_CONFIG } from "@/config/constants";
import { ExtractorRegistry } from "./ExtractorRegistry";

// Registry
export { ExtractorRegistry, createExtractors } from "./ExtractorRegistry";
export type { PlatformExtractors } from "./ExtractorRegistry";

// Base Interfaces
export type { IListingExtractor, IDetailExtractor } from "./base";

// Platform Extractors
export { GiftListingExtractor } from "./gift/GiftListingExtractor";
export { GiftDetailExtractor } from "./gift/GiftDetailExtractor";

// Common Helpers
export { PriceParser } from "./common/PriceParser";
export { FieldNormalizer } from "./common/FieldNormalizer";

/**
 * 카탈로그 페이지 → 목록 (기본 플랫폼 설정 사용)
 */
export function extractListings(
  markup: string,
  platform: string = MARKET_CONFIG.PLATFORM,
): ListingSummary[] {
  return ExtractorRegistry.getInstance().get(platform).listing.extract(markup);
}

/**
 * 상세 페이지 → 상세 정보 (기본 플랫폼 설정 사용)
 */
export function extractDetail(
  markup: string,
  id: number,
  itemType: string,
  platform: string = MARKET_CONFIG.PLATFORM,
): ItemDetail {
  return ExtractorRegistry.getInstance()
    .get(platform)
    .detail.extract(markup, id, itemType);
}
