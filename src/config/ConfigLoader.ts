/**
 * 마켓플레이스 YAML 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: YAML 파일 로드 + 스키마 검증만 담당
 * - OCP: 엔드포인트/마커 변경 시 YAML만 수정
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";

import {
  AmazonConfig,
  AmazonConfigSchema,
  MercadoLivreConfig,
  MercadoLivreConfigSchema,
  ShopeeConfig,
  ShopeeConfigSchema,
} from "@/core/domain/MarketplaceConfig";
import type { MarketplaceId } from "@/core/domain/MarketplaceId";
import { ConfigurationError } from "@/core/errors/AffiliateErrors";
import { MARKETPLACE_CONFIG_DIR } from "./constants";
import { logger } from "./logger";

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader | null = null;
  private readonly configCache = new Map<MarketplaceId, unknown>();

  constructor(private readonly configDir: string = MARKETPLACE_CONFIG_DIR) {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  getAmazonConfig(): AmazonConfig {
    return this.loadConfig("amazon", AmazonConfigSchema);
  }

  getMercadoLivreConfig(): MercadoLivreConfig {
    return this.loadConfig("mercadolivre", MercadoLivreConfigSchema);
  }

  getShopeeConfig(): ShopeeConfig {
    return this.loadConfig("shopee", ShopeeConfigSchema);
  }

  /**
   * YAML 로드 + 스키마 검증 (파싱 결과 캐시)
   */
  private loadConfig<S extends z.ZodTypeAny>(
    marketplace: MarketplaceId,
    schema: S,
  ): z.output<S> {
    // 캐시 확인
    let raw = this.configCache.get(marketplace);
    if (raw === undefined) {
      raw = this.readYaml(marketplace);
      this.configCache.set(marketplace, raw);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(
        `Invalid config for ${marketplace}: ${issues}`,
        { marketplace, cause: result.error },
      );
    }

    return result.data;
  }

  private readYaml(marketplace: MarketplaceId): unknown {
    const configPath = path.join(this.configDir, `${marketplace}.yaml`);

    // 파일 존재 확인
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, {
        marketplace,
      });
    }

    try {
      const fileContent = fs.readFileSync(configPath, "utf8");
      const parsed: unknown = yaml.load(fileContent);
      logger.debug({ marketplace, configPath }, "마켓플레이스 설정 로드");
      return parsed;
    } catch (error) {
      throw new ConfigurationError(`Failed to parse config: ${configPath}`, {
        marketplace,
        cause: error,
      });
    }
  }
}
