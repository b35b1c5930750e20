/**
 * CLI Test
 *
 * 목적: 인자 파싱 / 출력 포맷 검증 (네트워크 없음)
 */

import { describe, it, expect } from "@jest/globals";
import { ZodError } from "zod";
import { formatListing, parseArgs } from "@/cli";
import type { ItemDetail, ListingSummary } from "@/core/domain/Gift";

describe("parseArgs", () => {
  it("인자가 없으면 기본값", () => {
    expect(parseArgs([])).toEqual({
      query: { filter: "all" },
      limit: 3,
      details: false,
    });
  });

  it("타입 / 옵션 / 플래그 파싱", () => {
    expect(
      parseArgs([
        "plushpepe",
        "--filter",
        "sale",
        "--sort",
        "price_asc",
        "--limit",
        "5",
        "--details",
        "--concurrency",
        "2",
      ]),
    ).toEqual({
      query: { giftType: "plushpepe", filter: "sale", sort: "price_asc" },
      limit: 5,
      details: true,
      concurrency: 2,
    });
  });

  it("알 수 없는 옵션은 에러", () => {
    expect(() => parseArgs(["--page", "2"])).toThrow("Unknown option: --page");
  });

  it("값이 빠진 옵션은 에러", () => {
    expect(() => parseArgs(["--filter"])).toThrow("Missing value for --filter");
    expect(() => parseArgs(["--sort", "--details"])).toThrow(
      "Missing value for --sort",
    );
  });

  it("위치 인자는 하나만 허용", () => {
    expect(() => parseArgs(["a", "b"])).toThrow("Unexpected arguments: b");
  });

  it("검증 실패는 ZodError", () => {
    expect(() => parseArgs(["--limit", "0"])).toThrow(ZodError);
    expect(() => parseArgs(["--filter", "cheap"])).toThrow(ZodError);
  });
});

describe("formatListing", () => {
  const listed: ListingSummary = {
    id: 42,
    name: "Plush Pepe",
    itemType: "plushpepe",
    price: 1500,
    url: "https://fragment.com/gift/plushpepe-42",
    isForSale: true,
  };

  it("판매 중인 항목", () => {
    expect(formatListing(listed)).toBe("Plush Pepe #42: 1500 TON");
  });

  it("미판매 항목", () => {
    const { price: _price, ...rest } = listed;
    expect(formatListing({ ...rest, isForSale: false })).toBe(
      "Plush Pepe #42: not for sale",
    );
  });

  it("상세 정보가 있으면 소유자 포함", () => {
    const detail: ItemDetail = {
      id: 42,
      itemType: "plushpepe",
      owner: "alice",
      model: "Gold",
      backdrop: "Black",
      symbol: "Star",
      issued: [],
      isForSale: false,
      history: [],
    };

    expect(formatListing(listed, detail)).toBe(
      "Plush Pepe #42: 1500 TON | Owner: alice",
    );
  });
});
