/**
 * AffiliateLinkUnwrapper 단위 테스트
 */

import { describe, it, expect } from "@jest/globals";
import pino from "pino";

import { ConfigLoader } from "@/config/ConfigLoader";
import { ConversionError } from "@/core/errors/AffiliateErrors";
import {
  AffiliateLinkUnwrapper,
  PageLink,
  UnwrapRules,
  pickProductLink,
} from "@/converters/mercadolivre/AffiliateLinkUnwrapper";
import { FakeBrowserSessionFactory } from "../../helpers/fakes";

const rules: UnwrapRules = {
  hrefMarkers: ["produto.mercadolivre.com.br/MLB-", "/MLB-", "MLB"],
  buttonLabels: ["Ir para produto", "Ver produto"],
  productMarker: "MLB",
  productIdPattern: /MLB-?(\d+)/,
};

function anchor(href: string, text = ""): PageLink {
  return { tag: "A", href, text, closestHref: href };
}

function button(text: string, closestHref = ""): PageLink {
  return { tag: "BUTTON", href: "", text, closestHref };
}

describe("pickProductLink", () => {
  it("href 마커 순서대로 첫 번째 일치 링크 선택", () => {
    const links = [
      anchor("https://www.mercadolivre.com.br/ofertas"),
      anchor("https://www.mercadolivre.com.br/p/MLB-111"),
      anchor("https://produto.mercadolivre.com.br/MLB-222-fone"),
    ];

    expect(pickProductLink(links, rules)).toBe(
      "https://produto.mercadolivre.com.br/MLB-222-fone",
    );
  });

  it("버튼 라벨 주변 링크 선택", () => {
    const links = [
      anchor("https://www.mercadolivre.com.br/"),
      button("Ir para produto", "https://www.mercadolivre.com.br/p/MLB333"),
    ];

    expect(pickProductLink(links, { ...rules, hrefMarkers: ["/MLB-"] })).toBe(
      "https://www.mercadolivre.com.br/p/MLB333",
    );
  });

  it("라벨별 첫 번째 요소만 확인", () => {
    const links = [
      button("Ver produto"),
      button("Ver produto", "https://www.mercadolivre.com.br/p/MLB444"),
    ];

    expect(
      pickProductLink(links, { ...rules, hrefMarkers: ["/MLB-"], productIdPattern: /^$/ }),
    ).toBeNull();
  });

  it("상품 ID 패턴으로 마지막 시도", () => {
    const links = [
      anchor("https://www.mercadolivre.com.br/"),
      anchor("https://www.mercadolivre.com.br/item/mlb-555"),
      anchor("https://www.mercadolivre.com.br/p/MLB555"),
    ];

    expect(
      pickProductLink(links, {
        ...rules,
        hrefMarkers: ["/MLB-"],
        productIdPattern: /MLB(\d+)/,
      }),
    ).toBe("https://www.mercadolivre.com.br/p/MLB555");
  });

  it("후보가 없으면 null", () => {
    expect(pickProductLink([anchor("https://www.mercadolivre.com.br/")], rules)).toBeNull();
    expect(pickProductLink([], rules)).toBeNull();
  });
});

describe("AffiliateLinkUnwrapper", () => {
  const log = pino({ level: "silent" });

  function createUnwrapper(factory: FakeBrowserSessionFactory): AffiliateLinkUnwrapper {
    return new AffiliateLinkUnwrapper(new ConfigLoader().getMercadoLivreConfig(), factory);
  }

  describe("isAffiliateLink", () => {
    const unwrapper = createUnwrapper(new FakeBrowserSessionFactory());

    it.each([
      "https://www.mercadolivre.com.br/social/test-user?ref=abc",
      "https://mercadolivre.com/sec/1AbC2dE",
      "https://produto.mercadolivre.com.br/MLB-1?matt_tool=987",
    ])("%s 는 제휴 링크", (url) => {
      expect(unwrapper.isAffiliateLink(url)).toBe(true);
    });

    it("일반 상품 링크는 제휴 링크 아님", () => {
      expect(
        unwrapper.isAffiliateLink("https://produto.mercadolivre.com.br/MLB-3967173105-fone"),
      ).toBe(false);
    });
  });

  describe("unwrap", () => {
    it("페이지 링크에서 상품 링크 추출", async () => {
      const url = "https://mercadolivre.com/sec/1AbC2dE";
      const factory = new FakeBrowserSessionFactory().setPage(url, {
        status: 200,
        evaluateResult: [
          button("Ir para produto", "https://www.mercadolivre.com.br/p/MLB777"),
        ],
      });

      await expect(createUnwrapper(factory).unwrap(url, log)).resolves.toBe(
        "https://www.mercadolivre.com.br/p/MLB777",
      );
      expect(factory.sessions[0]?.navigations[0]?.options).toEqual({
        waitUntil: "networkidle",
        settleMs: 2000,
      });
      expect(factory.allClosed).toBe(true);
    });

    it("evaluate 결과 형식이 다르면 후보 없음으로 처리", async () => {
      const url = "https://mercadolivre.com/sec/1AbC2dE";
      const factory = new FakeBrowserSessionFactory().setPage(url, {
        status: 200,
        body: "x".repeat(1500),
        evaluateResult: "unexpected",
      });

      const error = await createUnwrapper(factory)
        .unwrap(url, log)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConversionError);
      expect(error instanceof Error ? error.message : "").toBe(
        `Could not extract product link from affiliate page: ${url}\n${"x".repeat(1000)}`,
      );
      expect(factory.allClosed).toBe(true);
    });
  });
});
