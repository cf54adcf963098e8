/**
 * ConversionSupport 단위 테스트
 */

import { describe, it, expect } from "@jest/globals";

import { convertedLink, fallbackLink } from "@/core/domain/AffiliateLink";
import { InvalidLinkError } from "@/core/errors/AffiliateErrors";
import {
  assertConvertibleLink,
  convertWithLogging,
  isWellFormedUrl,
} from "@/converters/base/ConversionSupport";
import { RecordingConversionLogger } from "../../helpers/fakes";

describe("isWellFormedUrl", () => {
  it.each([
    "https://www.amazon.com.br/dp/B08N5WRWNW",
    "http://localhost:3000/item",
    "http://127.0.0.1/path?q=1",
    "https://shopee.com.br",
  ])("%s 허용", (url) => {
    expect(isWellFormedUrl(url)).toBe(true);
  });

  it.each([
    "ftp://amazon.com.br/dp/B08N5WRWNW",
    "amazon.com.br/dp/B08N5WRWNW",
    "https://",
    "https://amazon.com.br/dp/ B08N5WRWNW",
    "",
  ])("%s 거부", (url) => {
    expect(isWellFormedUrl(url)).toBe(false);
  });
});

describe("assertConvertibleLink", () => {
  it("일치하는 마켓플레이스 URL은 통과", () => {
    expect(() =>
      assertConvertibleLink("https://shopee.com.br/product/1/2", "shopee"),
    ).not.toThrow();
  });

  it("다른 마켓플레이스 URL은 InvalidLinkError", () => {
    expect(() =>
      assertConvertibleLink("https://shopee.com.br/product/1/2", "amazon"),
    ).toThrow(InvalidLinkError);
  });
});

describe("convertWithLogging", () => {
  const original = "https://shopee.com.br/product/1/2";

  it("성공: 레코드 1건 (status success)", async () => {
    const recorder = new RecordingConversionLogger();

    await convertWithLogging(recorder, "shopee", original, async (trace) => {
      trace.productId = "1.2";
      return convertedLink("https://s.shopee.com.br/AbC", "shopee");
    });

    expect(recorder.records).toHaveLength(1);
    expect(recorder.records[0]).toMatchObject({
      marketplace: "shopee",
      originalLink: original,
      convertedLink: "https://s.shopee.com.br/AbC",
      status: "success",
      error: null,
      productId: "1.2",
    });
  });

  it("소프트 폴백: status fallback + 사유", async () => {
    const recorder = new RecordingConversionLogger();

    await convertWithLogging(recorder, "shopee", original, async () =>
      fallbackLink(original, "shopee", "rate limited"),
    );

    expect(recorder.records[0]).toMatchObject({
      convertedLink: null,
      status: "fallback",
      error: "rate limited",
    });
  });

  it("throw: status error 기록 후 에러 전파", async () => {
    const recorder = new RecordingConversionLogger();
    const error = new InvalidLinkError("Malformed URL: x");

    await expect(
      convertWithLogging(recorder, "shopee", original, async () => {
        throw error;
      }),
    ).rejects.toBe(error);
    expect(recorder.records).toHaveLength(1);
    expect(recorder.records[0]).toMatchObject({
      convertedLink: null,
      status: "error",
      error: "Malformed URL: x",
    });
  });

  it("변환 ID는 호출마다 새로 발급", async () => {
    const recorder = new RecordingConversionLogger();
    const work = async () => convertedLink("https://s.shopee.com.br/AbC", "shopee");

    await convertWithLogging(recorder, "shopee", original, work);
    await convertWithLogging(recorder, "shopee", original, work);

    const [first, second] = recorder.records;
    expect(first?.conversionId).toBeDefined();
    expect(first?.conversionId).not.toBe(second?.conversionId);
  });
});
