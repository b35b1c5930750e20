/**
 * MarketQuery - 카탈로그 조회 조건
 */

import { z } from "zod";
import type { HttpMethod, RequestParams } from "@/core/interfaces/IMarkupFetcher";

export const CATALOG_FILTERS = ["auction", "all", "sold", "sale"] as const;
export const CATALOG_SORTS = ["price_desc", "price_asc", "listed", "ending"] as const;

export type CatalogFilter = (typeof CATALOG_FILTERS)[number];
export type CatalogSort = (typeof CATALOG_SORTS)[number];

/**
 * 카탈로그 조회 조건 스키마
 *
 * 빈 giftType 은 타입 미지정 (gifts 전체 조회)
 */
export const CatalogQuerySchema = z.object({
  giftType: z
    .string()
    .trim()
    .regex(/^[a-z0-9]*$/i, "giftType must be an alphanumeric slug")
    .optional()
    .transform((giftType) => giftType || undefined),
  filter: z.enum(CATALOG_FILTERS).default("all"),
  sort: z.enum(CATALOG_SORTS).optional(),
});

export type CatalogQuery = z.input<typeof CatalogQuerySchema>;
export type ResolvedCatalogQuery = z.output<typeof CatalogQuerySchema>;

/**
 * 카탈로그 요청 정보
 */
export interface CatalogRequest {
  method: HttpMethod;
  path: string;
  params: RequestParams;
}

/**
 * 조회 조건 → 요청 변환
 *
 * - giftType 있으면 gifts/{giftType}, 없으면 gifts
 * - filter 는 항상, sort 는 지정된 경우만 전달
 */
export function buildCatalogRequest(query: ResolvedCatalogQuery): CatalogRequest {
  const params: RequestParams = { filter: query.filter };
  if (query.sort) {
    params.sort = query.sort;
  }

  return {
    method: "POST",
    path: query.giftType ? `gifts/${query.giftType}` : "gifts",
    params,
  };
}
