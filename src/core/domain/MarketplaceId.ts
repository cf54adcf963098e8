/**
 * Marketplace 식별자
 *
 * 레지스트리 키와 로그에서 공통으로 사용하는 소문자 토큰
 */

export const SUPPORTED_MARKETPLACES = [
  "amazon",
  "mercadolivre",
  "shopee",
] as const;

export type MarketplaceId = (typeof SUPPORTED_MARKETPLACES)[number];

/**
 * 마켓플레이스 미감지 시 결과에 기록되는 식별자
 */
export const MARKETPLACE_NOT_DETECTED = "marketplace_not_detected";

export function isMarketplaceId(value: string): value is MarketplaceId {
  return SUPPORTED_MARKETPLACES.some((marketplace) => marketplace === value);
}
