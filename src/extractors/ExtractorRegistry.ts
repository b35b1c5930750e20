/**
 * ExtractorRegistry
 *
 * 목적: 플랫폼별 Extractor 중앙 관리 Registry
 * 패턴: Singleton Pattern, Registry Pattern
 */

import type { IDetailExtractor, IListingExtractor } from "@/extractors/base";
import type { MarketConfig } from "@/core/domain/MarketConfig";
import { GiftListingExtractor } from "@/extractors/gift/GiftListingExtractor";
import { GiftDetailExtractor } from "@/extractors/gift/GiftDetailExtractor";
import { CheerioDocumentParser } from "@/parsers/CheerioDocumentParser";
import { ConfigLoader } from "@/config/ConfigLoader";

/**
 * 플랫폼별 Extractor 쌍
 */
export interface PlatformExtractors {
  listing: IListingExtractor;
  detail: IDetailExtractor;
}

/**
 * 설정으로부터 Extractor 쌍 생성
 *
 * 파서는 상태가 없으므로 두 Extractor 가 공유
 */
export function createExtractors(config: MarketConfig): PlatformExtractors {
  const parser = new CheerioDocumentParser();
  return {
    listing: new GiftListingExtractor(
      config.selectors.listing,
      config.baseUrl,
      parser,
    ),
    detail: new GiftDetailExtractor(config.selectors.detail, parser),
  };
}

/**
 * Extractor 중앙 관리 Registry (Singleton)
 *
 * 등록되지 않은 플랫폼은 ConfigLoader 로 YAML 을 찾아 지연 생성
 */
export class ExtractorRegistry {
  private static instance: ExtractorRegistry;
  private readonly extractors: Map<string, PlatformExtractors>;

  private constructor(private readonly configLoader: ConfigLoader) {
    this.extractors = new Map<string, PlatformExtractors>();
  }

  static getInstance(): ExtractorRegistry {
    if (!ExtractorRegistry.instance) {
      ExtractorRegistry.instance = new ExtractorRegistry(
        ConfigLoader.getInstance(),
      );
    }
    return ExtractorRegistry.instance;
  }

  /**
   * Extractor 등록
   *
   * @param id Extractor ID (플랫폼명)
   */
  register(id: string, extractors: PlatformExtractors): void {
    this.extractors.set(id, extractors);
  }

  /**
   * Extractor 조회
   *
   * @param id Extractor ID (예: "fragment")
   * @throws {Error} 등록되지 않았고 설정 파일도 없는 경우 (사용 가능한 ID 목록 포함)
   */
  get(id: string): PlatformExtractors {
    const registered = this.extractors.get(id);
    if (registered) {
      return registered;
    }

    const available = this.configLoader.getAvailablePlatforms();
    if (!available.includes(id)) {
      const availableIds = Array.from(
        new Set([...this.extractors.keys(), ...available]),
      ).join(", ");
      throw new Error(`Extractor not found: ${id}. Available: [${availableIds}]`);
    }

    const created = createExtractors(this.configLoader.loadConfig(id));
    this.register(id, created);
    return created;
  }

  /**
   * Extractor 존재 확인
   */
  has(id: string): boolean {
    return (
      this.extractors.has(id) ||
      this.configLoader.getAvailablePlatforms().includes(id)
    );
  }

  /**
   * 등록된 Extractor 제거 (테스트 격리용)
   */
  clear(): void {
    this.extractors.clear();
  }
}
