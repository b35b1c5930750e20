/**
 * GiftDetailExtractor
 *
 * 목적: 상세 페이지 → ItemDetail 추출
 * 패턴: Strategy Pattern
 */

import type { IDetailExtractor } from "@/extractors/base";
import type {
  IDocument,
  IDocumentParser,
  IElement,
} from "@/core/interfaces/IDocumentParser";
import type { ItemDetail, OwnershipHistoryEntry } from "@/core/domain/Gift";
import { UNKNOWN_VALUE } from "@/core/domain/Gift";
import type { DetailSelectors } from "@/core/domain/MarketConfig";
import { CheerioDocumentParser } from "@/parsers/CheerioDocumentParser";
import { PriceParser } from "@/extractors/common/PriceParser";
import { FieldNormalizer } from "@/extractors/common/FieldNormalizer";
import { logger } from "@/config/logger";

/**
 * 속성 테이블 키
 */
const ATTRIBUTE_KEYS = {
  OWNER: "owner",
  MODEL: "model",
  BACKDROP: "backdrop",
  SYMBOL: "symbol",
  ISSUED: "issued",
} as const;

/**
 * 판매 가격 (TON / USD)
 */
interface SalePrice {
  tonPrice?: number;
  usdPrice?: number;
}

/**
 * 기프트 상세 추출기
 *
 * 전략:
 * 1. 고정 속성 테이블 → key(소문자 첫 셀) / value(둘째 셀) 맵 (중복 키는 마지막 행 우선)
 * 2. owner 는 전체 텍스트, model/backdrop/symbol 은 희귀도 토큰 제거
 * 3. 판매 가격 블록: TON 은 요소 자신의 텍스트만, USD 는 전체 텍스트
 * 4. 이력 테이블: 셀 3개 이상인 행만 (price, date, buyer)
 *
 * 어떤 필드 실패도 예외로 전파하지 않고 기본값으로 대체
 *
 * @implements {IDetailExtractor}
 */
export class GiftDetailExtractor implements IDetailExtractor {
  constructor(
    private readonly selectors: DetailSelectors,
    private readonly parser: IDocumentParser = new CheerioDocumentParser(),
  ) {}

  extract(markup: string, id: number, itemType: string): ItemDetail {
    const document = this.parser.parse(markup);
    const attributes = this.buildAttributeTable(document);
    const { tonPrice, usdPrice } = this.extractSalePrice(document);

    return {
      id,
      itemType,
      owner: FieldNormalizer.orUnknown(
        attributes.get(ATTRIBUTE_KEYS.OWNER)?.getText(),
      ),
      model: this.cleanValue(attributes, ATTRIBUTE_KEYS.MODEL),
      backdrop: this.cleanValue(attributes, ATTRIBUTE_KEYS.BACKDROP),
      symbol: this.cleanValue(attributes, ATTRIBUTE_KEYS.SYMBOL),
      issued: this.extractIssued(attributes),
      ...(tonPrice !== undefined ? { tonPrice } : {}),
      ...(usdPrice !== undefined ? { usdPrice } : {}),
      isForSale: tonPrice !== undefined,
      history: this.extractHistory(document),
    };
  }

  /**
   * 고정 속성 테이블 key → 값 셀
   */
  private buildAttributeTable(document: IDocument): Map<string, IElement> {
    const table = new Map<string, IElement>();

    for (const row of document.selectAll(this.selectors.attributeRows)) {
      const cells = row.selectAll(this.selectors.cell);
      if (cells.length < 2) {
        continue;
      }
      table.set(cells[0].getText().toLowerCase(), cells[1]);
    }

    if (table.size === 0) {
      logger.debug(
        { selector: this.selectors.attributeRows },
        "[GiftDetailExtractor] 속성 테이블 없음, 기본값 사용",
      );
    }

    return table;
  }

  /**
   * "값 희귀도" 셀 → 값 (키 없으면 "Unknown")
   */
  private cleanValue(attributes: Map<string, IElement>, key: string): string {
    const cell = attributes.get(key);
    if (!cell) {
      return UNKNOWN_VALUE;
    }
    return FieldNormalizer.leadingValue(cell.getText());
  }

  /**
   * 발행 수량 토큰 (키 없으면 빈 배열)
   */
  private extractIssued(attributes: Map<string, IElement>): string[] {
    const cell = attributes.get(ATTRIBUTE_KEYS.ISSUED);
    return cell ? FieldNormalizer.alternateTokens(cell.getText()) : [];
  }

  /**
   * 판매 가격 블록 (블록이 없으면 둘 다 undefined)
   */
  private extractSalePrice(document: IDocument): SalePrice {
    const priceBlock = document.selectFirst(this.selectors.priceBlock);
    if (!priceBlock) {
      return {};
    }

    // 중첩된 USD 라벨 텍스트를 제외하기 위해 자신의 텍스트만 사용
    const ownText = priceBlock
      .selectFirst(this.selectors.primaryPrice)
      ?.getOwnText();
    const tonPrice = PriceParser.parseGrouped(ownText);

    const usdText = priceBlock
      .selectFirst(this.selectors.secondaryPrice)
      ?.getText();
    const usdPrice = PriceParser.parseCurrencyAmount(usdText);

    if (tonPrice === undefined || usdPrice === undefined) {
      logger.debug(
        { ownText, usdText, tonPrice, usdPrice },
        "[GiftDetailExtractor] 판매 가격 일부 파싱 실패",
      );
    }

    return { tonPrice, usdPrice };
  }

  /**
   * 소유 이력 (문서 순서 유지)
   */
  private extractHistory(document: IDocument): OwnershipHistoryEntry[] {
    const history: OwnershipHistoryEntry[] = [];

    for (const row of document.selectAll(this.selectors.historyRows)) {
      const cells = row.selectAll(this.selectors.cell);
      if (cells.length < 3) {
        continue;
      }
      history.push({
        price: cells[0].getText(),
        date: cells[1].getText(),
        buyer: cells[2].getText(),
      });
    }

    return history;
  }
}
