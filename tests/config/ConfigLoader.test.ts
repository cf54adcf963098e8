/**
 * ConfigLoader 단위 테스트
 */

import { describe, it, expect, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { ConfigLoader } from "@/config/ConfigLoader";
import { ConfigurationError } from "@/core/errors/AffiliateErrors";

describe("ConfigLoader", () => {
  const tempDirs: string[] = [];

  function createConfigDir(files: Record<string, string>): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "marketplace-config-"));
    tempDirs.push(dir);
    Object.entries(files).forEach(([name, content]) => {
      fs.writeFileSync(path.join(dir, name), content, "utf8");
    });
    return dir;
  }

  afterEach(() => {
    tempDirs.splice(0).forEach((dir) => {
      fs.rmSync(dir, { recursive: true, force: true });
    });
  });

  describe("config/marketplaces", () => {
    const loader = new ConfigLoader();

    it("Amazon 설정", () => {
      const config = loader.getAmazonConfig();

      expect(config.canonicalHost).toBe("amazon.com.br");
      expect(config.credentials.mandatory).toBe(false);
      expect(config.credentials.requiredCookies).toEqual(["session-id", "ubid-acbbr"]);
    });

    it("Mercado Livre 설정", () => {
      const config = loader.getMercadoLivreConfig();

      expect(config.api.endpoint).toBe(
        "https://www.mercadolivre.com.br/affiliate-program/api/v2/stripe/user/links",
      );
      expect(config.api.responseField).toBe("short_url");
      expect(config.credentials.mandatory).toBe(true);
      expect(config.csrf.headerName).toBe("x-csrf-token");
      expect(config.unwrap.productMarker).toBe("MLB");
    });

    it("Shopee 설정", () => {
      const config = loader.getShopeeConfig();

      expect(config.api.endpoint).toBe("https://open-api.affiliate.shopee.com.br/graphql");
      expect(config.api.subIdSlots).toBe(5);
    });

    it("getInstance는 같은 인스턴스 반환", () => {
      expect(ConfigLoader.getInstance()).toBe(ConfigLoader.getInstance());
    });
  });

  it("기본값 적용", () => {
    const dir = createConfigDir({
      "shopee.yaml": [
        "marketplace: shopee",
        "displayName: Shopee",
        "kind: signed_api",
        "api:",
        "  endpoint: https://open-api.example.test/graphql",
        "credentials:",
        "  mandatory: false",
      ].join("\n"),
    });

    const config = new ConfigLoader(dir).getShopeeConfig();

    expect(config.api.subIdSlots).toBe(5);
    expect(config.credentials.requiredCookies).toEqual([]);
    expect(config.timeouts).toEqual({ navigationMs: 15000, apiMs: 15000 });
  });

  it("파일이 없으면 ConfigurationError", () => {
    const dir = createConfigDir({});

    expect(() => new ConfigLoader(dir).getAmazonConfig()).toThrow(ConfigurationError);
  });

  it("YAML 문법 오류는 ConfigurationError", () => {
    const dir = createConfigDir({ "amazon.yaml": "marketplace: [amazon" });

    expect(() => new ConfigLoader(dir).getAmazonConfig()).toThrow(
      `Failed to parse config: ${path.join(dir, "amazon.yaml")}`,
    );
  });

  it("스키마 검증 실패는 ConfigurationError", () => {
    const dir = createConfigDir({
      "amazon.yaml": "marketplace: amazon\nkind: fixed_parameter\n",
    });

    expect(() => new ConfigLoader(dir).getAmazonConfig()).toThrow(
      /^Invalid config for amazon: /,
    );
  });
});
