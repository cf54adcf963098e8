/**
 * Mercado Livre 제휴 링크 컨버터
 *
 * 방식: 세션 스크래핑
 * Start → CredentialCheck → [LinkUnwrap] → CsrfAcquire → ApiRequest → Done
 *
 * API: POST https://www.mercadolivre.com.br/affiliate-program/api/v2/stripe/user/links
 * CSRF: 로그인 쿠키로 상품 페이지 방문 후 meta[name=csrf-token]
 */

import { z } from "zod";

import { logger as rootLogger, Logger } from "@/config/logger";
import type { IAffiliateConverter } from "@/core/interfaces/IAffiliateConverter";
import type { IConversionLogger } from "@/core/interfaces/IConversionLogger";
import type { ICredentialStore } from "@/core/interfaces/ICredentialStore";
import type { MercadoLivreConfig } from "@/core/domain/MarketplaceConfig";
import {
  CredentialBundle,
  findCookie,
} from "@/core/domain/CredentialBundle";
import { AffiliateLink, convertedLink } from "@/core/domain/AffiliateLink";
import {
  ApiError,
  ConfigurationError,
  InvalidLinkError,
  InvalidSessionError,
  ProductNotFoundError,
  RateLimitedError,
} from "@/core/errors/AffiliateErrors";
import type { IBrowserSessionFactory } from "@/scrapers/controllers/IBrowserSession";
import {
  assertConvertibleLink,
  convertWithLogging,
  isWellFormedUrl,
} from "@/converters/base/ConversionSupport";
import { runWithFailurePolicy } from "@/converters/base/FailurePolicy";
import { CredentialCache } from "@/converters/base/CredentialCache";
import {
  findMissingCookies,
  isBundleExpired,
  isJwtUsable,
} from "@/utils/CredentialExpiry";
import {
  createConversionLogger,
  createMarketplaceLogger,
  previewLink,
} from "@/utils/LoggerContext";
import { ConversionLogger } from "@/services/ConversionLogger";
import { AffiliateLinkUnwrapper } from "./AffiliateLinkUnwrapper";
import { CsrfTokenProvider } from "./CsrfTokenProvider";

const ApiResponseSchema = z.record(z.string(), z.unknown());

/**
 * 응답 본문 로그 길이
 */
const RESPONSE_PREVIEW_LENGTH = 500;

export interface MercadoLivreConverterOptions {
  config: MercadoLivreConfig;
  cookieFile: string;
  affiliateTag: string;
  credentialStore: ICredentialStore;
  browserFactory: IBrowserSessionFactory;
  conversionLogger?: IConversionLogger;
  logger?: Logger;
}

export class MercadoLivreConverter implements IAffiliateConverter {
  readonly marketplace = "mercadolivre" as const;

  private readonly config: MercadoLivreConfig;
  private readonly cookieFile: string;
  private readonly affiliateTag: string;
  private readonly credentialStore: ICredentialStore;
  private readonly log: Logger;
  private readonly conversionLogger: IConversionLogger;
  private readonly credentials: CredentialCache;
  private readonly unwrapper: AffiliateLinkUnwrapper;
  private readonly csrf: CsrfTokenProvider;
  private readonly productIdPattern: RegExp;

  constructor(options: MercadoLivreConverterOptions) {
    if (!options.affiliateTag) {
      throw new ConfigurationError("ML_AFFILIATE_TAG is required", {
        marketplace: "mercadolivre",
      });
    }

    this.config = options.config;
    this.cookieFile = options.cookieFile;
    this.affiliateTag = options.affiliateTag;
    this.credentialStore = options.credentialStore;
    this.log = createMarketplaceLogger(
      this.marketplace,
      options.logger ?? rootLogger,
    );
    this.conversionLogger =
      options.conversionLogger ?? new ConversionLogger(this.log);
    this.unwrapper = new AffiliateLinkUnwrapper(
      options.config,
      options.browserFactory,
    );
    this.csrf = new CsrfTokenProvider(options.config, options.browserFactory);
    this.credentials = new CredentialCache(() =>
      this.credentialStore.load(
        this.cookieFile,
        this.config.credentials.mandatory,
      ),
    );
    // 자격 증명이 바뀌면 이전 세션의 CSRF 토큰은 무효
    this.credentials.onReload(() => this.csrf.invalidate());
    this.productIdPattern = new RegExp(options.config.unwrap.productIdPattern);

    this.log.info({ cookieFile: this.cookieFile }, "MercadoLivreConverter 초기화");
  }

  async convertLink(originalLink: string): Promise<AffiliateLink> {
    return convertWithLogging(
      this.conversionLogger,
      this.marketplace,
      originalLink,
      async (trace) => {
        const log = createConversionLogger(this.log, trace.conversionId);

        assertConvertibleLink(originalLink, this.marketplace);
        const bundle = await this.ensureValidCredentials(log);

        return runWithFailurePolicy(
          this.marketplace,
          originalLink,
          log,
          async () => {
            let productLink = originalLink;

            // 제휴 링크는 1회만 풀어냄
            if (this.unwrapper.isAffiliateLink(originalLink)) {
              productLink = await this.unwrapper.unwrap(originalLink, log);
              if (!isWellFormedUrl(productLink)) {
                throw new InvalidLinkError(
                  `Unwrapped product link is malformed: ${productLink}`,
                  { marketplace: this.marketplace },
                );
              }
            }
            trace.productId = this.extractProductId(productLink);

            const token = await this.csrf.getToken(bundle, log);
            const shortUrl = await this.requestAffiliateLink(
              productLink,
              bundle,
              token,
              log,
            );
            return convertedLink(shortUrl, this.marketplace);
          },
        );
      },
    );
  }

  async loadCredentials(): Promise<CredentialBundle> {
    return this.credentials.reload();
  }

  async validateCredentials(): Promise<boolean> {
    try {
      return this.isBundleValid(await this.credentials.get());
    } catch (error) {
      if (error instanceof InvalidSessionError) {
        this.log.warn({ error: error.message }, "자격 증명 로드 실패");
        return false;
      }
      throw error;
    }
  }

  /**
   * MLB 상품 ID 추출 (예: MLB-3967173105 → MLB3967173105)
   */
  extractProductId(url: string): string | null {
    const match = url.match(this.productIdPattern);
    return match && match[1] ? `MLB${match[1]}` : null;
  }

  /**
   * 유효한 번들 확보
   * 무효하면 파일을 1회 다시 읽음 (외부에서 쿠키가 갱신됐을 수 있음)
   */
  private async ensureValidCredentials(log: Logger): Promise<CredentialBundle> {
    const cached = await this.credentials.get();
    if (this.isBundleValid(cached)) {
      return cached;
    }

    log.warn("자격 증명 무효, 파일 재로드");
    const reloaded = await this.credentials.reload();
    if (this.isBundleValid(reloaded)) {
      return reloaded;
    }

    throw new InvalidSessionError(
      "Mercado Livre session cookies are expired or invalid; regenerate the cookie file",
      { marketplace: this.marketplace },
    );
  }

  private isBundleValid(bundle: CredentialBundle): boolean {
    if (bundle.cookies.length === 0) {
      this.log.warn("쿠키 없음");
      return false;
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

    // JWT exp는 서명 검증 없는 만료 힌트
    const jwtCookie = this.config.credentials.jwtCookie;
    if (jwtCookie) {
      const token = findCookie(bundle, jwtCookie)?.value;
      if (token && !isJwtUsable(token)) {
        this.log.warn({ cookie: jwtCookie }, "JWT 만료 또는 디코딩 실패");
        return false;
      }
    }

    return true;
  }

  private async requestAffiliateLink(
    productLink: string,
    bundle: CredentialBundle,
    token: string,
    log: Logger,
  ): Promise<string> {
    const { api, csrf } = this.config;

    log.info({ link: previewLink(productLink) }, "제휴 링크 API 요청");

    const response = await fetch(api.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json, text/plain, */*",
        "User-Agent": this.config.browser.userAgent,
        Origin: api.origin,
        Referer: api.referer,
        Cookie: buildCookieHeader(bundle),
        [csrf.headerName]: token,
      },
      body: JSON.stringify({ url: productLink, tag: this.affiliateTag }),
      signal: AbortSignal.timeout(this.config.timeouts.apiMs),
    });

    const bodyText = await response.text();
    log.debug(
      { status: response.status, body: bodyText.slice(0, RESPONSE_PREVIEW_LENGTH) },
      "제휴 링크 API 응답",
    );

    if (response.status === 429) {
      throw new RateLimitedError("Mercado Livre rate limit reached", {
        marketplace: this.marketplace,
      });
    }
    if (response.status === 401 || response.status === 403) {
      this.csrf.invalidate();
      throw new InvalidSessionError(
        `Mercado Livre session or CSRF token rejected (HTTP ${response.status})`,
        { marketplace: this.marketplace },
      );
    }
    if (response.status === 404) {
      throw new ProductNotFoundError(`Product not found: ${productLink}`, {
        marketplace: this.marketplace,
      });
    }
    if (response.status !== 200) {
      throw new ApiError(
        `Mercado Livre API error: HTTP ${response.status}`,
        { marketplace: this.marketplace, status: response.status },
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(bodyText);
    } catch (error) {
      throw new ApiError("Mercado Livre API returned non-JSON body", {
        marketplace: this.marketplace,
        status: response.status,
        cause: error,
      });
    }

    const parsed = ApiResponseSchema.safeParse(payload);
    const shortUrl = parsed.success ? parsed.data[api.responseField] : undefined;
    if (typeof shortUrl !== "string" || shortUrl.length === 0) {
      throw new ApiError(
        `Mercado Livre API response has no ${api.responseField}`,
        { marketplace: this.marketplace, status: response.status },
      );
    }

    return shortUrl;
  }
}

/**
 * Cookie 헤더 (동일 이름은 마지막 값)
 */
export function buildCookieHeader(bundle: CredentialBundle): string {
  const values = new Map<string, string>();
  for (const cookie of bundle.cookies) {
    values.set(cookie.name, cookie.value);
  }
  return Array.from(values, ([name, value]) => `${name}=${value}`).join("; ");
}
