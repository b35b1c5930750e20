/**
 * 기프트 마켓 서비스
 *
 * 역할:
 * - 카탈로그 조회 → 목록 추출
 * - 목록 키(GiftKey) → 상세 조회 → 상세 추출
 * - 여러 키에 대한 동시성 제한 상세 조회
 *
 * 전송 에러는 잡지 않고 호출자에게 그대로 전파
 * 추출 단계는 동기 처리 (조회 대기 후 즉시 파싱)
 */

import type { IMarkupFetcher } from "@/core/interfaces/IMarkupFetcher";
import type { GiftKey, ItemDetail, ListingSummary } from "@/core/domain/Gift";
import type { MarketConfig } from "@/core/domain/MarketConfig";
import {
  buildCatalogRequest,
  CatalogQuery,
  CatalogQuerySchema,
} from "@/core/domain/MarketQuery";
import type { PlatformExtractors } from "@/extractors/ExtractorRegistry";
import { createExtractors } from "@/extractors/ExtractorRegistry";
import { HttpMarkupFetcher } from "@/fetchers/HttpMarkupFetcher";
import { ConfigLoader } from "@/config/ConfigLoader";
import { DETAIL_CONFIG, MARKET_CONFIG } from "@/config/constants";
import { createTaskLogger } from "@/utils/LoggerContext";
import { mapWithConcurrency } from "@/utils/concurrency";

/**
 * 상세 일괄 조회 옵션
 */
export interface GiftInfoBatchOptions {
  /** 동시 실행 수 (1 ~ concurrency.max 로 보정) */
  concurrency?: number;
}

export class GiftMarketService {
  private readonly extractors: PlatformExtractors;

  constructor(
    private readonly config: MarketConfig,
    private readonly fetcher: IMarkupFetcher,
    extractors?: PlatformExtractors,
  ) {
    this.extractors = extractors ?? createExtractors(config);
  }

  /**
   * 플랫폼 설정 파일 기반 생성 (HTTP 조회기 사용)
   */
  static create(platform: string = MARKET_CONFIG.PLATFORM): GiftMarketService {
    const config = ConfigLoader.getInstance().loadConfig(platform);
    return new GiftMarketService(config, HttpMarkupFetcher.fromConfig(config));
  }

  /**
   * 카탈로그 조회
   *
   * @throws {ZodError} 잘못된 조회 조건
   */
  async getGifts(query: CatalogQuery = {}): Promise<ListingSummary[]> {
    const resolved = CatalogQuerySchema.parse(query);
    const request = buildCatalogRequest(resolved);
    const log = createTaskLogger("get_gifts", {
      platform: this.config.platform,
      gift_type: resolved.giftType,
    });

    log.debug({ request }, "카탈로그 조회 시작");
    const markup = await this.fetcher.fetch(
      request.method,
      request.path,
      request.params,
    );

    const listings = this.extractors.listing.extract(markup);
    log.info(
      { count: listings.length, filter: resolved.filter, sort: resolved.sort },
      "카탈로그 추출 완료",
    );

    return listings;
  }

  /**
   * 상세 조회 (id / itemType 은 키 값을 그대로 사용)
   */
  async getGiftInfo(key: GiftKey): Promise<ItemDetail> {
    const log = createTaskLogger("get_gift_info", {
      gift_id: key.id,
      gift_type: key.itemType,
    });

    const markup = await this.fetcher.fetch("GET", key.url);
    const detail = this.extractors.detail.extract(markup, key.id, key.itemType);

    log.debug(
      { owner: detail.owner, isForSale: detail.isForSale },
      "상세 추출 완료",
    );

    return detail;
  }

  /**
   * 여러 키 상세 조회
   *
   * 결과 순서 = 입력 순서, 첫 전송 실패 시 reject
   */
  async getGiftInfos(
    keys: readonly GiftKey[],
    options: GiftInfoBatchOptions = {},
  ): Promise<ItemDetail[]> {
    const concurrency = this.resolveConcurrency(options.concurrency);

    createTaskLogger("get_gift_infos", {
      platform: this.config.platform,
    }).info({ count: keys.length, concurrency }, "상세 일괄 조회 시작");

    return mapWithConcurrency(keys, concurrency, (key) =>
      this.getGiftInfo(key),
    );
  }

  /**
   * 동시 실행 수 결정
   * 우선순위: 옵션 > 환경변수 > 플랫폼 설정 기본값, 최대값으로 제한
   */
  private resolveConcurrency(requested?: number): number {
    const { default: fallback, max } = this.config.concurrency;
    const value = requested ?? DETAIL_CONFIG.CONCURRENCY ?? fallback;
    const integer = Number.isFinite(value) ? Math.floor(value) : fallback;
    return Math.min(Math.max(integer, 1), max);
  }
}
