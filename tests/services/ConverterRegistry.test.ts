/**
 * ConverterRegistry 단위 테스트
 */

import { describe, it, expect } from "@jest/globals";

import { readAffiliateSettings } from "@/config/constants";
import type { IAffiliateConverter } from "@/core/interfaces/IAffiliateConverter";
import { convertedLink } from "@/core/domain/AffiliateLink";
import {
  CredentialBundle,
  emptyCredentialBundle,
} from "@/core/domain/CredentialBundle";
import type { MarketplaceId } from "@/core/domain/MarketplaceId";
import {
  ConfigurationError,
  CredentialsMissingError,
} from "@/core/errors/AffiliateErrors";
import {
  ConverterRegistry,
  buildConverterRegistry,
} from "@/services/ConverterRegistry";

function echoConverter(marketplace: MarketplaceId): IAffiliateConverter {
  return {
    marketplace,
    convertLink: async (url: string) => convertedLink(url, marketplace),
    loadCredentials: async (): Promise<CredentialBundle> =>
      emptyCredentialBundle(),
    validateCredentials: async () => true,
  };
}

describe("ConverterRegistry", () => {
  it("등록/조회", () => {
    const registry = new ConverterRegistry();
    const converter = echoConverter("amazon");

    registry.register("amazon", converter);

    expect(registry.get("amazon")).toBe(converter);
    expect(registry.has("amazon")).toBe(true);
    expect(registry.has("shopee")).toBe(false);
    expect(registry.get("shopee")).toBeUndefined();
    expect(registry.size()).toBe(1);
  });

  it("freeze 이후 등록은 ConfigurationError", () => {
    const registry = new ConverterRegistry().freeze();

    expect(registry.isFrozen()).toBe(true);
    expect(() => registry.register("amazon", echoConverter("amazon"))).toThrow(
      ConfigurationError,
    );
  });
});

describe("buildConverterRegistry", () => {
  const settings = readAffiliateSettings({});

  it("한 마켓플레이스 구성 실패가 나머지를 막지 않음", () => {
    const build = buildConverterRegistry(settings, {
      amazon: () => echoConverter("amazon"),
      mercadolivre: () => {
        throw new CredentialsMissingError("Credential file not found: ml.json");
      },
      shopee: () => echoConverter("shopee"),
    });

    expect(build.active).toEqual(["amazon", "shopee"]);
    expect(build.failures).toHaveLength(1);
    expect(build.failures[0]?.marketplace).toBe("mercadolivre");
    expect(build.failures[0]?.error).toBeInstanceOf(CredentialsMissingError);
    expect(build.registry.isFrozen()).toBe(true);
  });

  it("팩토리가 없는 마켓플레이스는 건너뜀", () => {
    const build = buildConverterRegistry(settings, {
      shopee: () => echoConverter("shopee"),
    });

    expect(build.active).toEqual(["shopee"]);
    expect(build.failures).toEqual([]);
  });

  it("Error가 아닌 throw 값은 Error로 감쌈", () => {
    const build = buildConverterRegistry(settings, {
      amazon: () => {
        throw "bad config";
      },
    });

    expect(build.failures[0]?.error).toBeInstanceOf(Error);
    expect(build.failures[0]?.error.message).toBe("bad config");
  });
});
