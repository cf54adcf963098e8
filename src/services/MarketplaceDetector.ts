/**
 * Marketplace Detector
 *
 * URL 호스트 → 마켓플레이스 식별자
 * 결정적/멱등 (같은 입력은 항상 같은 결과)
 */

import { logger } from "@/config/logger";
import {
  MarketplaceId,
  SUPPORTED_MARKETPLACES,
  isMarketplaceId,
} from "@/core/domain/MarketplaceId";

/**
 * 도메인 → 마켓플레이스 테이블
 * 부분 일치 시 이 순서대로 검사
 */
export const MARKETPLACE_DOMAINS: ReadonlyArray<
  readonly [string, MarketplaceId]
> = [
  ["amazon.com.br", "amazon"],
  ["amazon.com", "amazon"],
  ["amzn.to", "amazon"],
  ["mercadolivre.com.br", "mercadolivre"],
  ["produto.mercadolivre.com.br", "mercadolivre"],
  ["mercadolivre.com", "mercadolivre"],
  ["mercadolibre.com", "mercadolivre"],
  ["shopee.com.br", "shopee"],
  ["s.shopee.com.br", "shopee"],
  ["shope.ee", "shopee"],
];

const DOMAIN_LOOKUP: ReadonlyMap<string, MarketplaceId> = new Map(
  MARKETPLACE_DOMAINS,
);

/**
 * Marketplace Detector 클래스
 */
export class MarketplaceDetector {
  /**
   * URL에서 마켓플레이스 감지
   * @param url 상품 URL
   * @returns 감지된 마켓플레이스 (null이면 미지원 또는 파싱 불가)
   */
  static detect(url: string): MarketplaceId | null {
    const host = MarketplaceDetector.extractHost(url);
    if (!host) {
      return null;
    }

    // 정확히 일치
    const exact = DOMAIN_LOOKUP.get(host);
    if (exact) {
      return exact;
    }

    // 부분 일치 (서브도메인 등)
    for (const [domain, marketplace] of MARKETPLACE_DOMAINS) {
      if (host.includes(domain)) {
        return marketplace;
      }
    }

    logger.debug({ host }, "Marketplace not detected from URL");
    return null;
  }

  /**
   * 마켓플레이스 지원 여부
   */
  static isSupported(marketplace: string): marketplace is MarketplaceId {
    return isMarketplaceId(marketplace);
  }

  /**
   * 지원 마켓플레이스 목록
   */
  static listSupported(): readonly MarketplaceId[] {
    return SUPPORTED_MARKETPLACES;
  }

  /**
   * 소문자 호스트 (선행 www. 제거)
   */
  private static extractHost(url: string): string | null {
    try {
      const host = new URL(url).hostname.toLowerCase();
      if (!host) {
        return null;
      }
      return host.startsWith("www.") ? host.slice(4) : host;
    } catch {
      return null;
    }
  }
}
