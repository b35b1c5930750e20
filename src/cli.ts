#!/usr/bin/env node
/**
 * 기프트 마켓 CLI
 *
 * 사용법:
 *   gift-scanner [giftType] [--filter all|sale|auction|sold] [--sort price_asc|price_desc|listed|ending]
 *                [--limit N] [--details] [--concurrency N]
 *
 * 예시:
 *   gift-scanner plushpepe --filter sale --limit 3 --details
 *   gift-scanner --sort price_asc
 */

import "dotenv/config";
import { z } from "zod";
import {
  CATALOG_FILTERS,
  CATALOG_SORTS,
  CatalogQuerySchema,
} from "@/core/domain/MarketQuery";
import type { ItemDetail, ListingSummary } from "@/core/domain/Gift";
import { toGiftKey } from "@/core/domain/Gift";
import { GiftMarketService } from "@/services/GiftMarketService";
import { isScanError } from "@/core/interfaces/ScanErrorType";
import { logger } from "@/config/logger";
import { APP_METADATA } from "@/config/constants";

/**
 * CLI 옵션 스키마
 */
export const CliOptionsSchema = z.object({
  query: CatalogQuerySchema,
  limit: z.coerce.number().int().positive().default(3),
  details: z.boolean().default(false),
  concurrency: z.coerce.number().int().positive().optional(),
});

export type CliOptions = z.output<typeof CliOptionsSchema>;

const USAGE = `${APP_METADATA.NAME} v${APP_METADATA.VERSION}

사용법: gift-scanner [giftType] [options]

옵션:
  --filter <${CATALOG_FILTERS.join("|")}>     (기본: all)
  --sort <${CATALOG_SORTS.join("|")}>
  --limit <N>          출력/상세 조회 개수 (기본: 3)
  --details            상세 정보(소유자) 조회
  --concurrency <N>    상세 조회 동시 실행 수
  --help`;

/**
 * argv → CLI 옵션
 *
 * @throws {Error} 알 수 없는 옵션 / 값 누락
 * @throws {ZodError} 값 검증 실패
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const raw: Record<string, string | boolean | undefined> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--details") {
      raw.details = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      if (!["filter", "sort", "limit", "concurrency"].includes(name)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${arg}`);
      }
      raw[name] = value;
      i++;
      continue;
    }

    positional.push(arg);
  }

  if (positional.length > 1) {
    throw new Error(`Unexpected arguments: ${positional.slice(1).join(" ")}`);
  }

  return CliOptionsSchema.parse({
    query: {
      giftType: positional[0],
      filter: raw.filter,
      sort: raw.sort,
    },
    limit: raw.limit,
    details: raw.details,
    concurrency: raw.concurrency,
  });
}

/**
 * 목록 한 줄 포맷
 */
export function formatListing(gift: ListingSummary, detail?: ItemDetail): string {
  const price = gift.price !== undefined ? `${gift.price} TON` : "not for sale";
  const owner = detail ? ` | Owner: ${detail.owner}` : "";
  return `${gift.name} #${gift.id}: ${price}${owner}`;
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.includes("--help")) {
    console.log(USAGE);
    return;
  }

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const service = GiftMarketService.create();
  const gifts = (await service.getGifts(options.query)).slice(0, options.limit);

  if (gifts.length === 0) {
    console.log("결과 없음");
    return;
  }

  const details = options.details
    ? await service.getGiftInfos(gifts.map(toGiftKey), {
        concurrency: options.concurrency,
      })
    : [];

  gifts.forEach((gift, index) => {
    console.log(formatListing(gift, details[index]));
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(
      isScanError(error)
        ? error.toLogObject()
        : { error: error instanceof Error ? error.message : String(error) },
      "CLI 실행 실패",
    );
    process.exitCode = 1;
  });
}
