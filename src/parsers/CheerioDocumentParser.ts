/**
 * CheerioDocumentParser
 *
 * 목적: cheerio 기반 IDocumentParser 구현
 * 패턴: Adapter Pattern (cheerio API → IDocument / IElement)
 */

import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { isText } from "domhandler";
import type { AnyNode } from "domhandler";
import type {
  IDocument,
  IDocumentParser,
  IElement,
  TextOptions,
} from "@/core/interfaces/IDocumentParser";
import { ScanError, ScanErrorType } from "@/core/interfaces/ScanErrorType";

/**
 * cheerio 요소 래퍼
 *
 * $(node) / first() 결과는 AnyNode 로 추론되므로 노드 타입을 넓게 받음
 */
class CheerioElement implements IElement {
  constructor(
    private readonly $: CheerioAPI,
    private readonly node: Cheerio<AnyNode>,
  ) {}

  selectAll(selector: string): IElement[] {
    return this.node
      .find(selector)
      .toArray()
      .map((el) => new CheerioElement(this.$, this.$(el)));
  }

  selectFirst(selector: string): IElement | undefined {
    const first = this.node.find(selector).first();
    return first.length > 0 ? new CheerioElement(this.$, first) : undefined;
  }

  getText(options: TextOptions = {}): string {
    const { trim = true, includeDescendants = true } = options;
    const raw = includeDescendants
      ? this.node.text()
      : (this.getOwnText() ?? "");
    return trim ? raw.trim() : raw;
  }

  getAttribute(name: string): string | undefined {
    return this.node.attr(name);
  }

  getOwnText(): string | undefined {
    const texts = this.node
      .contents()
      .toArray()
      .filter(isText)
      .map((textNode) => textNode.data);

    return texts.length > 0 ? texts.join("") : undefined;
  }
}

/**
 * cheerio 문서 래퍼
 */
class CheerioDocument implements IDocument {
  constructor(private readonly $: CheerioAPI) {}

  selectAll(selector: string): IElement[] {
    return this.$(selector)
      .toArray()
      .map((el) => new CheerioElement(this.$, this.$(el)));
  }

  selectFirst(selector: string): IElement | undefined {
    const first = this.$(selector).first();
    return first.length > 0 ? new CheerioElement(this.$, first) : undefined;
  }
}

/**
 * cheerio 문서 파서
 *
 * 상태가 없으므로 여러 Extractor 가 하나의 인스턴스를 공유해도 안전
 */
export class CheerioDocumentParser implements IDocumentParser {
  parse(markup: string): IDocument {
    if (typeof markup !== "string") {
      throw new ScanError(
        ScanErrorType.MARKUP_INVALID,
        `Markup must be a string, received ${typeof markup}`,
      );
    }

    return new CheerioDocument(load(markup));
  }
}
