/**
 * Affiliate Manager
 *
 * 역할:
 * - URL → 마켓플레이스 감지
 * - 등록된 컨버터에 변환 위임
 * - 모든 결과를 ConversionResult로 정규화 (예외를 밖으로 던지지 않음)
 *
 * SOLID 원칙:
 * - SRP: 조율만 담당 (변환 로직은 컨버터)
 * - DIP: IAffiliateConverter / ConverterRegistry에 의존
 */

import { logger as rootLogger, Logger } from "@/config/logger";
import type { IAffiliateConverter } from "@/core/interfaces/IAffiliateConverter";
import type { IConversionLogger } from "@/core/interfaces/IConversionLogger";
import {
  ConversionResult,
  fallbackResult,
  successResult,
} from "@/core/domain/AffiliateLink";
import {
  MARKETPLACE_NOT_DETECTED,
  MarketplaceId,
} from "@/core/domain/MarketplaceId";
import {
  MarketplaceNotSupportedError,
  describeError,
  errorMessage,
} from "@/core/errors/AffiliateErrors";
import { ConversionLogger } from "./ConversionLogger";
import { ConverterRegistry } from "./ConverterRegistry";
import { MarketplaceDetector } from "./MarketplaceDetector";

export const MARKETPLACE_NOT_DETECTED_ERROR = "marketplace not detected";
export const MARKETPLACE_NOT_SUPPORTED_ERROR = "marketplace not supported";

export interface AffiliateManagerOptions {
  conversionLogger?: IConversionLogger;
  logger?: Logger;
}

export class AffiliateManager {
  private readonly log: Logger;
  private readonly conversionLogger: IConversionLogger;

  constructor(
    private readonly registry: ConverterRegistry = new ConverterRegistry(),
    options: AffiliateManagerOptions = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({
      component: "affiliate_manager",
    });
    this.conversionLogger =
      options.conversionLogger ?? new ConversionLogger(this.log);
  }

  /**
   * 컨버터 등록 (같은 마켓플레이스는 덮어씀)
   *
   * createAffiliateManager로 만든 Manager는 레지스트리가 freeze 상태라 등록 불가
   * @throws ConfigurationError 레지스트리가 freeze된 경우
   */
  registerConverter(
    marketplace: MarketplaceId,
    converter: IAffiliateConverter,
  ): void {
    this.registry.register(marketplace, converter);
    this.log.info({ marketplace }, "컨버터 등록");
  }

  listRegisteredMarketplaces(): MarketplaceId[] {
    return this.registry.list();
  }

  detectMarketplace(url: string): MarketplaceId | null {
    return MarketplaceDetector.detect(url);
  }

  /**
   * 링크 변환
   * 실패는 모두 원본 링크 + fallback 상태로 반환
   */
  async convertLink(originalLink: string): Promise<ConversionResult> {
    const marketplace = this.detectMarketplace(originalLink);
    if (!marketplace) {
      return this.fallback(
        originalLink,
        MARKETPLACE_NOT_DETECTED,
        MARKETPLACE_NOT_DETECTED_ERROR,
      );
    }

    const converter = this.registry.get(marketplace);
    if (!converter) {
      const error = new MarketplaceNotSupportedError(
        MARKETPLACE_NOT_SUPPORTED_ERROR,
        { marketplace },
      );
      this.log.warn({ error: error.toLogObject() }, "등록된 컨버터 없음");
      return this.fallback(originalLink, marketplace, error.message);
    }

    let url: string;
    let fallbackReason: string | null;
    try {
      const link = await converter.convertLink(originalLink);
      url = link.url;
      fallbackReason = link.fallbackReason;
    } catch (error) {
      this.log.warn(
        { marketplace, error: describeError(error) },
        "컨버터 예외, 원본 링크로 폴백",
      );
      return this.fallback(originalLink, marketplace, errorMessage(error));
    }

    if (fallbackReason !== null) {
      return this.fallback(originalLink, marketplace, fallbackReason);
    }
    if (!url) {
      return this.fallback(originalLink, marketplace, "converter returned an empty link");
    }

    this.conversionLogger.logConversion({
      marketplace,
      originalLink,
      convertedLink: url,
      status: "success",
      error: null,
    });
    return successResult(url, marketplace);
  }

  private fallback(
    originalLink: string,
    marketplace: string,
    error: string,
  ): ConversionResult {
    this.conversionLogger.logConversion({
      marketplace,
      originalLink,
      convertedLink: null,
      status: "fallback",
      error,
    });
    return fallbackResult(originalLink, marketplace, error);
  }
}
