/**
 * GiftListingExtractor
 *
 * 목적: 카탈로그(검색 결과) 페이지 → ListingSummary[] 추출
 * 패턴: Strategy Pattern
 */

import type { IListingExtractor } from "@/extractors/base";
import type { IDocumentParser, IElement } from "@/core/interfaces/IDocumentParser";
import type { ListingSummary } from "@/core/domain/Gift";
import type { ListingSelectors } from "@/core/domain/MarketConfig";
import { CheerioDocumentParser } from "@/parsers/CheerioDocumentParser";
import { PriceParser } from "@/extractors/common/PriceParser";
import { FieldNormalizer } from "@/extractors/common/FieldNormalizer";
import { logger } from "@/config/logger";

/**
 * 기프트 목록 추출기
 *
 * 전략:
 * 1. grid item 요소를 문서 순서대로 순회 (페이지 정렬 순서 유지)
 * 2. 번호 셀이 없거나 숫자가 아니면 해당 행만 제외
 * 3. 이름/가격 셀 누락은 기본값으로 대체 (name: "", price: 없음)
 *
 * @implements {IListingExtractor}
 */
export class GiftListingExtractor implements IListingExtractor {
  constructor(
    private readonly selectors: ListingSelectors,
    private readonly baseUrl: string,
    private readonly parser: IDocumentParser = new CheerioDocumentParser(),
  ) {}

  extract(markup: string): ListingSummary[] {
    const document = this.parser.parse(markup);
    const items = document.selectAll(this.selectors.item);

    if (items.length === 0) {
      logger.debug(
        { selector: this.selectors.item },
        "[GiftListingExtractor] grid item 없음, 빈 목록 반환",
      );
      return [];
    }

    const listings: ListingSummary[] = [];
    items.forEach((item, index) => {
      const listing = this.extractRow(item);
      if (listing) {
        listings.push(listing);
      } else {
        logger.warn(
          { index, href: item.getAttribute(this.selectors.linkAttribute) },
          "[GiftListingExtractor] 번호 파싱 실패, 행 제외",
        );
      }
    });

    logger.debug(
      { total: items.length, extracted: listings.length },
      "[GiftListingExtractor] 목록 추출 완료",
    );

    return listings;
  }

  /**
   * 한 행 추출 (번호 누락/파싱 실패 시 undefined)
   */
  private extractRow(item: IElement): ListingSummary | undefined {
    const id = FieldNormalizer.parseListingId(
      item.selectFirst(this.selectors.number)?.getText(),
    );
    if (id === undefined) {
      return undefined;
    }

    const href = item.getAttribute(this.selectors.linkAttribute) ?? "";
    const name = item.selectFirst(this.selectors.name)?.getText() ?? "";
    const price = this.extractPrice(item);

    return {
      id,
      name,
      itemType: FieldNormalizer.typeSlugFromHref(href),
      ...(price !== undefined ? { price } : {}),
      url: this.resolveUrl(href),
      isForSale: price !== undefined,
    };
  }

  /**
   * 가격 아이콘 셀 텍스트 파싱 (없거나 실패 시 undefined)
   */
  private extractPrice(item: IElement): number | undefined {
    const priceCell = item.selectFirst(this.selectors.price);
    if (!priceCell) {
      return undefined;
    }

    const text = priceCell.getText();
    const price = PriceParser.parseGrouped(text);
    if (price === undefined) {
      logger.debug({ text }, "[GiftListingExtractor] 가격 파싱 실패");
    }
    return price;
  }

  /**
   * 상세 페이지 절대 URL
   */
  private resolveUrl(href: string): string {
    try {
      return new URL(href, this.baseUrl).toString();
    } catch (error) {
      logger.debug(
        { href, error: error instanceof Error ? error.message : String(error) },
        "[GiftListingExtractor] URL 해석 실패, baseUrl 사용",
      );
      return new URL(this.baseUrl).toString();
    }
  }
}
