/**
 * MarketConfig - 마켓 플랫폼 YAML 설정 스키마
 *
 * 사이트 구조 의존성(CSS Selector, 셀 순서)은 전부 이 설정에 모아둠
 * → 사이트 구조 변경 시 YAML 만 수정
 */

import { z } from "zod";

/**
 * HTTP 전송 설정
 */
export const HttpConfigSchema = z.object({
  headers: z.record(z.string()).default({}),
  timeout: z.number().int().positive().default(15000),
  retryCount: z.number().int().min(1).default(3),
  retryDelay: z.number().int().min(0).default(1000),
  rateLimitDelay: z.number().int().min(0).default(5000),
  requestDelay: z.number().int().min(0).optional(),
});

export type HttpConfig = z.infer<typeof HttpConfigSchema>;

/**
 * 카탈로그(목록) 페이지 Selector
 */
export const ListingSelectorsSchema = z.object({
  item: z.string().min(1),
  number: z.string().min(1),
  name: z.string().min(1),
  price: z.string().min(1),
  linkAttribute: z.string().min(1).default("href"),
});

export type ListingSelectors = z.infer<typeof ListingSelectorsSchema>;

/**
 * 상세 페이지 Selector
 */
export const DetailSelectorsSchema = z.object({
  attributeRows: z.string().min(1),
  cell: z.string().min(1).default("td"),
  priceBlock: z.string().min(1),
  primaryPrice: z.string().min(1),
  secondaryPrice: z.string().min(1),
  historyRows: z.string().min(1),
});

export type DetailSelectors = z.infer<typeof DetailSelectorsSchema>;

/**
 * 상세 조회 동시성 설정
 */
export const ConcurrencyConfigSchema = z
  .object({
    default: z.number().int().min(1).default(3),
    max: z.number().int().min(1).default(10),
  })
  .refine((value) => value.default <= value.max, {
    message: "concurrency.default must be <= concurrency.max",
  });

export const MarketConfigSchema = z.object({
  platform: z.string().min(1),
  name: z.string().optional(),
  baseUrl: z.string().url(),
  http: HttpConfigSchema.default({}),
  selectors: z.object({
    listing: ListingSelectorsSchema,
    detail: DetailSelectorsSchema,
  }),
  concurrency: ConcurrencyConfigSchema.default({}),
});

export type MarketConfig = z.infer<typeof MarketConfigSchema>;
