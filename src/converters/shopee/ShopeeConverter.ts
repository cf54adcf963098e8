/**
 * Shopee 제휴 링크 컨버터
 *
 * 방식: 공식 Affiliate Open API (GraphQL generateShortLink)
 * 인증: AppID/Secret SHA256 서명 (ShopeeRequestSigner 참고)
 * 결과: https://s.shopee.com.br/XXXXX
 */

import { z } from "zod";

import { logger as rootLogger, Logger } from "@/config/logger";
import type { IAffiliateConverter } from "@/core/interfaces/IAffiliateConverter";
import type { IConversionLogger } from "@/core/interfaces/IConversionLogger";
import type { ShopeeConfig } from "@/core/domain/MarketplaceConfig";
import {
  CredentialBundle,
  emptyCredentialBundle,
} from "@/core/domain/CredentialBundle";
import { AffiliateLink, convertedLink } from "@/core/domain/AffiliateLink";
import {
  ApiError,
  CredentialsMissingError,
  InvalidSessionError,
  RateLimitedError,
  errorMessage,
} from "@/core/errors/AffiliateErrors";
import {
  assertConvertibleLink,
  convertWithLogging,
} from "@/converters/base/ConversionSupport";
import { runWithFailurePolicy } from "@/converters/base/FailurePolicy";
import {
  createConversionLogger,
  createMarketplaceLogger,
  previewLink,
} from "@/utils/LoggerContext";
import { getUnixSeconds } from "@/utils/timestamp";
import { ConversionLogger } from "@/services/ConversionLogger";
import { signGraphQLRequest } from "./ShopeeRequestSigner";

const ShopeeResponseSchema = z
  .object({
    data: z
      .object({
        generateShortLink: z
          .object({ shortLink: z.string().nullish() })
          .nullish(),
      })
      .nullish(),
    errors: z
      .array(z.object({ message: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

/**
 * 상품 URL 패턴
 * - https://shopee.com.br/{name}-i.{shopId}.{itemId}
 * - https://shopee.com.br/product/{shopId}/{itemId}
 */
const PRODUCT_ID_PATTERNS = [/-i\.(\d+)\.(\d+)/, /\/product\/(\d+)\/(\d+)/];

/**
 * 응답 본문 로그 길이
 */
const RESPONSE_PREVIEW_LENGTH = 500;

export interface ShopeeProductId {
  shopId: string;
  itemId: string;
}

/**
 * Shopee 상품 URL → (shopId, itemId)
 */
export function extractShopeeProductId(url: string): ShopeeProductId | null {
  for (const pattern of PRODUCT_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match && match[1] && match[2]) {
      return { shopId: match[1], itemId: match[2] };
    }
  }
  return null;
}

/**
 * generateShortLink mutation 생성
 * 문자열 값은 JSON 규칙으로 이스케이프
 */
export function buildShortLinkMutation(
  originUrl: string,
  subIds: readonly string[],
): string {
  const subIdList = subIds.map((subId) => JSON.stringify(subId)).join(", ");
  return [
    "mutation {",
    "    generateShortLink(input: {",
    `        originUrl: ${JSON.stringify(originUrl)},`,
    `        subIds: [${subIdList}]`,
    "    }) {",
    "        shortLink",
    "    }",
    "}",
  ].join("\n");
}

export interface ShopeeConverterOptions {
  config: ShopeeConfig;
  appId: string;
  appSecret: string;
  /** subIds[0] (추적용) */
  subId: string;
  conversionLogger?: IConversionLogger;
  logger?: Logger;
  /** 서명 타임스탬프 (Unix seconds) */
  clock?: () => number;
}

export class ShopeeConverter implements IAffiliateConverter {
  readonly marketplace = "shopee" as const;

  private readonly config: ShopeeConfig;
  private readonly appId: string;
  private readonly appSecret: string;
  private readonly subId: string;
  private readonly log: Logger;
  private readonly conversionLogger: IConversionLogger;
  private readonly clock: () => number;

  constructor(options: ShopeeConverterOptions) {
    if (!options.appId || !options.appSecret) {
      throw new CredentialsMissingError(
        "Shopee credentials not found: set SHOPEE_APP_ID and SHOPEE_APP_SECRET",
        { marketplace: "shopee" },
      );
    }

    this.config = options.config;
    this.appId = options.appId;
    this.appSecret = options.appSecret;
    this.subId = options.subId;
    this.log = createMarketplaceLogger(
      this.marketplace,
      options.logger ?? rootLogger,
    );
    this.conversionLogger =
      options.conversionLogger ?? new ConversionLogger(this.log);
    this.clock = options.clock ?? (() => getUnixSeconds());

    this.log.info({ appId: this.appId, subId: this.subId }, "ShopeeConverter 초기화");
  }

  async convertLink(originalLink: string): Promise<AffiliateLink> {
    return convertWithLogging(
      this.conversionLogger,
      this.marketplace,
      originalLink,
      async (trace) => {
        const log = createConversionLogger(this.log, trace.conversionId);

        assertConvertibleLink(originalLink, this.marketplace);

        const productId = extractShopeeProductId(originalLink);
        trace.productId = productId
          ? `${productId.shopId}.${productId.itemId}`
          : null;

        return runWithFailurePolicy(
          this.marketplace,
          originalLink,
          log,
          async () => {
            const shortLink = await this.generateShortLink(originalLink, log);
            return convertedLink(shortLink, this.marketplace);
          },
        );
      },
    );
  }

  /**
   * API 키 방식이라 쿠키 없음 (인증 메타데이터만)
   */
  async loadCredentials(): Promise<CredentialBundle> {
    return emptyCredentialBundle({ auth: "app_signature", appId: this.appId });
  }

  async validateCredentials(): Promise<boolean> {
    return this.appId.length > 0 && this.appSecret.length > 0;
  }

  /**
   * subIds 슬롯 (첫 칸만 사용)
   */
  private buildSubIds(): string[] {
    const slots = this.config.api.subIdSlots;
    return [this.subId, ...Array.from({ length: slots - 1 }, () => "")];
  }

  private async generateShortLink(
    originalLink: string,
    log: Logger,
  ): Promise<string> {
    const request = signGraphQLRequest(
      { appId: this.appId, appSecret: this.appSecret },
      buildShortLinkMutation(originalLink, this.buildSubIds()),
      this.clock(),
    );

    log.info({ link: previewLink(originalLink) }, "generateShortLink 요청");

    let response: Response;
    try {
      response = await fetch(this.config.api.endpoint, {
        method: "POST",
        headers: {
          Authorization: request.authorization,
          "Content-Type": "application/json",
        },
        body: request.body,
        signal: AbortSignal.timeout(this.config.timeouts.apiMs),
      });
    } catch (error) {
      throw new ApiError(
        `Network error calling Shopee API: ${errorMessage(error)}`,
        { marketplace: this.marketplace, cause: error },
      );
    }

    const bodyText = await response.text();
    log.debug(
      { status: response.status, body: bodyText.slice(0, RESPONSE_PREVIEW_LENGTH) },
      "generateShortLink 응답",
    );

    if (response.status === 429) {
      throw new RateLimitedError("Shopee API rate limit exceeded", {
        marketplace: this.marketplace,
      });
    }
    if (response.status === 401) {
      throw new InvalidSessionError(
        "Shopee API rejected credentials: check SHOPEE_APP_ID and SHOPEE_APP_SECRET",
        { marketplace: this.marketplace },
      );
    }
    if (response.status !== 200) {
      throw new ApiError(
        `Shopee API returned HTTP ${response.status}: ${bodyText.slice(0, RESPONSE_PREVIEW_LENGTH)}`,
        { marketplace: this.marketplace, status: response.status },
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(bodyText);
    } catch (error) {
      throw new ApiError("Shopee API returned non-JSON body", {
        marketplace: this.marketplace,
        status: response.status,
        cause: error,
      });
    }

    const parsed = ShopeeResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ApiError("Unexpected Shopee API response format", {
        marketplace: this.marketplace,
        status: response.status,
        cause: parsed.error,
      });
    }

    const shortLink = parsed.data.data?.generateShortLink?.shortLink;
    if (shortLink) {
      return shortLink;
    }

    const firstError = parsed.data.errors?.[0];
    if (firstError) {
      throw new ApiError(
        `GraphQL error: ${firstError.message ?? "Unknown error"}`,
        { marketplace: this.marketplace, status: response.status },
      );
    }

    throw new ApiError("Unexpected Shopee API response format", {
      marketplace: this.marketplace,
      status: response.status,
    });
  }
}
