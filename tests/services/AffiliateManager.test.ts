/**
 * AffiliateManager 단위 테스트
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import pino from "pino";

import { ConfigLoader } from "@/config/ConfigLoader";
import type { IAffiliateConverter } from "@/core/interfaces/IAffiliateConverter";
import {
  AffiliateLink,
  convertedLink,
  fallbackLink,
} from "@/core/domain/AffiliateLink";
import { emptyCredentialBundle } from "@/core/domain/CredentialBundle";
import type { MarketplaceId } from "@/core/domain/MarketplaceId";
import {
  ConfigurationError,
  RateLimitedError,
} from "@/core/errors/AffiliateErrors";
import { AmazonConverter } from "@/converters/amazon/AmazonConverter";
import { AffiliateManager } from "@/services/AffiliateManager";
import { ConverterRegistry } from "@/services/ConverterRegistry";
import {
  FakeBrowserSessionFactory,
  InMemoryCredentialStore,
  RecordingConversionLogger,
} from "../helpers/fakes";

const silentLogger = pino({ level: "silent" });

/**
 * 동작을 주입하는 컨버터
 */
class StubConverter implements IAffiliateConverter {
  calls = 0;

  constructor(
    readonly marketplace: MarketplaceId,
    private readonly behavior: (url: string) => Promise<AffiliateLink>,
  ) {}

  async convertLink(originalLink: string): Promise<AffiliateLink> {
    this.calls += 1;
    return this.behavior(originalLink);
  }

  async loadCredentials() {
    return emptyCredentialBundle();
  }

  async validateCredentials(): Promise<boolean> {
    return true;
  }
}

describe("AffiliateManager", () => {
  let conversionLogger: RecordingConversionLogger;
  let manager: AffiliateManager;

  beforeEach(() => {
    conversionLogger = new RecordingConversionLogger();
    manager = new AffiliateManager(new ConverterRegistry(), {
      conversionLogger,
      logger: silentLogger,
    });
  });

  describe("convertLink", () => {
    it("Amazon 링크 변환 성공", async () => {
      manager.registerConverter(
        "amazon",
        new AmazonConverter({
          config: new ConfigLoader().getAmazonConfig(),
          associateTag: "x-20",
          cookieFile: "sessions/amazon_cookies.json",
          credentialStore: new InMemoryCredentialStore(),
          browserFactory: new FakeBrowserSessionFactory(),
          conversionLogger: new RecordingConversionLogger(),
          logger: silentLogger,
        }),
      );

      const result = await manager.convertLink(
        "https://amazon.com.br/dp/B08N5WRWNW",
      );

      expect(result).toEqual({
        link: "https://amazon.com.br/dp/B08N5WRWNW?tag=x-20",
        status: "success",
        marketplace: "amazon",
        error: null,
      });
      expect(conversionLogger.records).toEqual([
        {
          marketplace: "amazon",
          originalLink: "https://amazon.com.br/dp/B08N5WRWNW",
          convertedLink: "https://amazon.com.br/dp/B08N5WRWNW?tag=x-20",
          status: "success",
          error: null,
        },
      ]);
    });

    it("미지원 도메인은 원본 링크로 폴백", async () => {
      const url = "https://unknown-shop.example/item/1";

      const result = await manager.convertLink(url);

      expect(result).toEqual({
        link: url,
        status: "fallback",
        marketplace: "marketplace_not_detected",
        error: "marketplace not detected",
      });
      expect(conversionLogger.records).toHaveLength(1);
      expect(conversionLogger.records[0]?.status).toBe("fallback");
    });

    it("컨버터 미등록 마켓플레이스는 원본 링크로 폴백", async () => {
      const url = "https://shopee.com.br/Fone-i.123.456";

      const result = await manager.convertLink(url);

      expect(result).toEqual({
        link: url,
        status: "fallback",
        marketplace: "shopee",
        error: "marketplace not supported",
      });
    });

    it("컨버터 미등록은 MarketplaceNotSupportedError로 로그", async () => {
      const lines: string[] = [];
      const capturingLogger = pino(
        { level: "info" },
        {
          write: (chunk: string) => {
            lines.push(chunk);
          },
        },
      );
      const logged = new AffiliateManager(new ConverterRegistry(), {
        conversionLogger,
        logger: capturingLogger,
      });

      await logged.convertLink("https://shopee.com.br/product/1/2");

      const entries: unknown[] = lines.map((line) => JSON.parse(line));
      expect(entries).toContainEqual(
        expect.objectContaining({
          level: 40,
          component: "affiliate_manager",
          msg: "등록된 컨버터 없음",
          error: expect.objectContaining({
            errorName: "MarketplaceNotSupportedError",
            message: "marketplace not supported",
            marketplace: "shopee",
          }),
        }),
      );
    });

    it("컨버터 예외는 밖으로 던지지 않고 폴백", async () => {
      const url = "https://produto.mercadolivre.com.br/MLB-3967173105";
      manager.registerConverter(
        "mercadolivre",
        new StubConverter("mercadolivre", async () => {
          throw new RateLimitedError("Mercado Livre rate limit reached");
        }),
      );

      const result = await manager.convertLink(url);

      expect(result).toEqual({
        link: url,
        status: "fallback",
        marketplace: "mercadolivre",
        error: "Mercado Livre rate limit reached",
      });
    });

    it("Error가 아닌 값을 throw해도 폴백", async () => {
      const url = "https://produto.mercadolivre.com.br/MLB-1";
      manager.registerConverter(
        "mercadolivre",
        new StubConverter("mercadolivre", () => Promise.reject("boom")),
      );

      const result = await manager.convertLink(url);

      expect(result.status).toBe("fallback");
      expect(result.error).toBe("boom");
      expect(result.link).toBe(url);
    });

    it("컨버터 소프트 폴백 사유를 그대로 전달", async () => {
      const url = "https://shopee.com.br/product/123/456";
      manager.registerConverter(
        "shopee",
        new StubConverter("shopee", async (original) =>
          fallbackLink(original, "shopee", "Shopee API rate limit exceeded"),
        ),
      );

      const result = await manager.convertLink(url);

      expect(result).toEqual({
        link: url,
        status: "fallback",
        marketplace: "shopee",
        error: "Shopee API rate limit exceeded",
      });
    });

    it("빈 링크 반환은 폴백으로 처리", async () => {
      const url = "https://shopee.com.br/product/123/456";
      manager.registerConverter(
        "shopee",
        new StubConverter("shopee", async () => convertedLink("", "shopee")),
      );

      const result = await manager.convertLink(url);

      expect(result).toEqual({
        link: url,
        status: "fallback",
        marketplace: "shopee",
        error: "converter returned an empty link",
      });
    });
  });

  describe("registerConverter", () => {
    it("같은 마켓플레이스는 덮어씀", async () => {
      const first = new StubConverter("shopee", async () =>
        convertedLink("https://s.shopee.com.br/first", "shopee"),
      );
      const second = new StubConverter("shopee", async () =>
        convertedLink("https://s.shopee.com.br/second", "shopee"),
      );

      manager.registerConverter("shopee", first);
      manager.registerConverter("shopee", second);
      const result = await manager.convertLink("https://shopee.com.br/product/1/2");

      expect(result.link).toBe("https://s.shopee.com.br/second");
      expect(first.calls).toBe(0);
      expect(second.calls).toBe(1);
    });

    it("등록 목록은 지원 순서대로", () => {
      manager.registerConverter(
        "shopee",
        new StubConverter("shopee", async (url) => convertedLink(url, "shopee")),
      );
      manager.registerConverter(
        "amazon",
        new StubConverter("amazon", async (url) => convertedLink(url, "amazon")),
      );

      expect(manager.listRegisteredMarketplaces()).toEqual(["amazon", "shopee"]);
    });

    it("freeze된 레지스트리에는 등록 불가", () => {
      const frozen = new AffiliateManager(new ConverterRegistry().freeze(), {
        conversionLogger,
        logger: silentLogger,
      });

      expect(() =>
        frozen.registerConverter(
          "amazon",
          new StubConverter("amazon", async (url) => convertedLink(url, "amazon")),
        ),
      ).toThrow(ConfigurationError);
      expect(frozen.listRegisteredMarketplaces()).toEqual([]);
    });
  });
});
