/**
 * Amazon Associates 제휴 링크 컨버터
 *
 * 방식: 고정 파라미터 조합 (API 호출 없음)
 * 형식: https://amazon.com.br/dp/{ASIN}?tag={associate-tag}
 *
 * 쿠키는 선택 사항 (상품 존재 검증 시에만 사용)
 */

import { logger as rootLogger, Logger } from "@/config/logger";
import type { IAffiliateConverter } from "@/core/interfaces/IAffiliateConverter";
import type { IConversionLogger } from "@/core/interfaces/IConversionLogger";
import type { ICredentialStore } from "@/core/interfaces/ICredentialStore";
import type { AmazonConfig } from "@/core/domain/MarketplaceConfig";
import type { CredentialBundle } from "@/core/domain/CredentialBundle";
import { AffiliateLink, convertedLink } from "@/core/domain/AffiliateLink";
import {
  CaptchaDetectedError,
  ConversionError,
  InvalidSessionError,
  InvalidTrackingTagError,
  ProductNotFoundError,
  RateLimitedError,
  describeError,
} from "@/core/errors/AffiliateErrors";
import type { IBrowserSessionFactory } from "@/scrapers/controllers/IBrowserSession";
import { withBrowserSession } from "@/scrapers/controllers/BrowserSessionScope";
import {
  assertConvertibleLink,
  convertWithLogging,
} from "@/converters/base/ConversionSupport";
import { runWithFailurePolicy } from "@/converters/base/FailurePolicy";
import { CredentialCache } from "@/converters/base/CredentialCache";
import {
  findMissingCookies,
  isBundleExpired,
} from "@/utils/CredentialExpiry";
import {
  createConversionLogger,
  createMarketplaceLogger,
} from "@/utils/LoggerContext";
import { ConversionLogger } from "@/services/ConversionLogger";

/**
 * Associate Tag 형식: 영숫자/점 단어를 하이픈으로 잇고 -숫자로 끝남
 * 예: promo-20, tech-store-21
 */
export const ASSOCIATE_TAG_PATTERN = /^[A-Za-z0-9.]+(-[A-Za-z0-9.]+)*-\d+$/;

export function isValidAssociateTag(tag: string): boolean {
  return ASSOCIATE_TAG_PATTERN.test(tag);
}

export interface AmazonConverterOptions {
  config: AmazonConfig;
  associateTag: string;
  cookieFile: string;
  /** 변환 후 상품 존재 검증 (결과는 로그로만 남김) */
  validateProducts?: boolean;
  credentialStore: ICredentialStore;
  browserFactory: IBrowserSessionFactory;
  conversionLogger?: IConversionLogger;
  logger?: Logger;
}

export class AmazonConverter implements IAffiliateConverter {
  readonly marketplace = "amazon" as const;

  private readonly config: AmazonConfig;
  private readonly associateTag: string;
  private readonly cookieFile: string;
  private readonly validateProducts: boolean;
  private readonly credentialStore: ICredentialStore;
  private readonly browserFactory: IBrowserSessionFactory;
  private readonly log: Logger;
  private readonly conversionLogger: IConversionLogger;
  private readonly credentials: CredentialCache;
  private readonly productIdPatterns: RegExp[];

  constructor(options: AmazonConverterOptions) {
    if (!isValidAssociateTag(options.associateTag)) {
      throw new InvalidTrackingTagError(
        `Invalid associate tag: "${options.associateTag}" (expected e.g. name-20)`,
        { marketplace: "amazon" },
      );
    }

    this.config = options.config;
    this.associateTag = options.associateTag;
    this.cookieFile = options.cookieFile;
    this.validateProducts = options.validateProducts ?? false;
    this.credentialStore = options.credentialStore;
    this.browserFactory = options.browserFactory;
    this.log = createMarketplaceLogger(
      this.marketplace,
      options.logger ?? rootLogger,
    );
    this.conversionLogger =
      options.conversionLogger ?? new ConversionLogger(this.log);
    this.credentials = new CredentialCache(() => this.readCredentialFile());
    this.productIdPatterns = options.config.productIdPatterns.map(
      (pattern) => new RegExp(pattern),
    );

    this.log.info(
      { associateTag: this.associateTag, validateProducts: this.validateProducts },
      "AmazonConverter 초기화",
    );
  }

  async convertLink(originalLink: string): Promise<AffiliateLink> {
    return convertWithLogging(
      this.conversionLogger,
      this.marketplace,
      originalLink,
      async (trace) => {
        const log = createConversionLogger(this.log, trace.conversionId);

        assertConvertibleLink(originalLink, this.marketplace);

        return runWithFailurePolicy(
          this.marketplace,
          originalLink,
          log,
          async () => {
            const asin = this.extractAsin(originalLink);
            if (!asin) {
              throw new ConversionError(
                `Could not extract ASIN from link: ${originalLink}`,
                { marketplace: this.marketplace },
              );
            }
            trace.productId = asin;

            const affiliateUrl = this.buildAffiliateLink(asin);

            if (this.validateProducts) {
              await this.runAdvisoryValidation(affiliateUrl, log);
            }

            return convertedLink(affiliateUrl, this.marketplace);
          },
        );
      },
    );
  }

  async loadCredentials(): Promise<CredentialBundle> {
    return this.credentials.reload();
  }

  async validateCredentials(): Promise<boolean> {
    let bundle: CredentialBundle;
    try {
      bundle = await this.credentials.get();
    } catch (error) {
      if (error instanceof InvalidSessionError) {
        this.log.warn({ error: error.message }, "자격 증명 로드 실패");
        return false;
      }
      throw error;
    }

    // 쿠키 없음은 정상 (Amazon은 쿠키 선택)
    if (bundle.cookies.length === 0) {
      return true;
    }

    const missing = findMissingCookies(
      bundle,
      this.config.credentials.requiredCookies,
    );
    if (missing.length > 0) {
      this.log.warn({ missing }, "필수 쿠키 누락");
      return false;
    }

    if (isBundleExpired(bundle)) {
      this.log.warn("쿠키 만료");
      return false;
    }

    return true;
  }

  /**
   * URL 경로에서 ASIN 추출 (첫 번째 일치 패턴)
   */
  extractAsin(url: string): string | null {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return null;
    }

    for (const pattern of this.productIdPatterns) {
      const match = pathname.match(pattern);
      if (match && match[1]) {
        return match[1];
      }
    }
    return null;
  }

  buildAffiliateLink(asin: string): string {
    return `https://${this.config.canonicalHost}/dp/${asin}?tag=${this.associateTag}`;
  }

  /**
   * 상품 존재 여부 확인 (브라우저 세션)
   *
   * - 404: ProductNotFoundError
   * - 429/503: RateLimitedError
   * - 200 + CAPTCHA 마커: CaptchaDetectedError
   * - 200: true
   * - 그 외 상태 / 예상치 못한 실패: false
   */
  async validateProductExists(affiliateLink: string): Promise<boolean> {
    try {
      const bundle = await this.credentials.get();

      return await withBrowserSession(
        this.browserFactory,
        {
          context: this.config.browser,
          cookies: bundle.cookies,
          cookieUrl:
            this.config.credentials.cookieUrl ??
            `https://www.${this.config.canonicalHost}`,
          navigationTimeoutMs: this.config.timeouts.navigationMs,
        },
        async (session) => {
          const page = await session.navigate(affiliateLink, {
            waitUntil: "load",
          });

          if (page.status === 404) {
            throw new ProductNotFoundError(
              `Product not found: ${affiliateLink}`,
              { marketplace: this.marketplace },
            );
          }
          if (page.status === 429 || page.status === 503) {
            throw new RateLimitedError(
              `Amazon rate limit (HTTP ${page.status})`,
              { marketplace: this.marketplace },
            );
          }
          if (page.status !== 200) {
            this.log.warn({ status: page.status }, "예상치 못한 Amazon 응답 상태");
            return false;
          }

          const body = (await page.body()).toLowerCase();
          const marker = this.config.validation.captchaMarkers.find((m) =>
            body.includes(m.toLowerCase()),
          );
          if (marker) {
            throw new CaptchaDetectedError(
              `CAPTCHA detected (marker: ${marker})`,
              { marketplace: this.marketplace },
            );
          }
          return true;
        },
      );
    } catch (error) {
      if (
        error instanceof ProductNotFoundError ||
        error instanceof RateLimitedError ||
        error instanceof CaptchaDetectedError
      ) {
        throw error;
      }
      this.log.warn({ error: describeError(error) }, "상품 검증 중 오류");
      return false;
    }
  }

  /**
   * 검증 결과는 로그로만 남기고 변환 결과에 영향 없음
   */
  private async runAdvisoryValidation(
    affiliateUrl: string,
    log: Logger,
  ): Promise<void> {
    try {
      const exists = await this.validateProductExists(affiliateUrl);
      log.info({ exists }, "상품 존재 검증 완료");
    } catch (error) {
      log.warn({ error: describeError(error) }, "상품 존재 검증 실패 (무시)");
    }
  }

  private async readCredentialFile(): Promise<CredentialBundle> {
    const bundle = await this.credentialStore.load(
      this.cookieFile,
      this.config.credentials.mandatory,
    );

    const fileTag = bundle.marketplaceMeta["associate_tag"];
    if (typeof fileTag === "string" && fileTag !== this.associateTag) {
      this.log.warn(
        { fileTag, configTag: this.associateTag },
        "Associate Tag 불일치 (파일 vs 설정)",
      );
    }

    this.log.info({ cookies: bundle.cookies.length }, "Amazon 쿠키 로드");
    return bundle;
  }
}
