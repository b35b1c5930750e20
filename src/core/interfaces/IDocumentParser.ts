/**
 * IDocumentParser Interface
 *
 * 목적: HTML 트리 구성/조회 능력 추상화
 * Extractor 는 이 인터페이스만 사용하므로 파서 라이브러리 교체 시 Extractor 수정 불필요
 */

/**
 * 텍스트 추출 옵션
 */
export interface TextOptions {
  /** 앞뒤 공백 제거 (기본: true) */
  trim?: boolean;

  /** 하위 요소 텍스트 포함 (기본: true) */
  includeDescendants?: boolean;
}

/**
 * CSS Selector 조회가 가능한 노드
 */
export interface ISelectable {
  /** 문서 순서대로 모든 일치 요소 */
  selectAll(selector: string): IElement[];

  /** 첫 번째 일치 요소 */
  selectFirst(selector: string): IElement | undefined;
}

/**
 * 요소 핸들
 */
export interface IElement extends ISelectable {
  getText(options?: TextOptions): string;

  getAttribute(name: string): string | undefined;

  /**
   * 직계 자식 텍스트 노드만 이어 붙인 텍스트
   * 직계 텍스트 노드가 없으면 undefined
   */
  getOwnText(): string | undefined;
}

/**
 * 문서 핸들
 */
export type IDocument = ISelectable;

/**
 * 문서 파서 인터페이스
 */
export interface IDocumentParser {
  /**
   * @throws {ScanError} 문자열이 아닌 입력 (MARKUP_INVALID)
   */
  parse(markup: string): IDocument;
}
