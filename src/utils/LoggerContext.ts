/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Marketplace, Conversion ID 추적 지원
 */

import { v7 as uuidv7 } from "uuid";
import { logger, Logger } from "@/config/logger";
import { LOG_CONFIG } from "@/config/constants";

/**
 * 마켓플레이스 전용 로거 생성
 * @param marketplace - 마켓플레이스 식별자
 * @param parent - 부모 로거 (기본: 루트 로거)
 */
export function createMarketplaceLogger(
  marketplace: string,
  parent: Logger = logger,
): Logger {
  return parent.child({ marketplace });
}

/**
 * 변환 1건 전용 로거 생성
 * @param parent - 마켓플레이스 로거
 * @param conversionId - 변환 ID (기본: UUID v7)
 */
export function createConversionLogger(
  parent: Logger,
  conversionId: string = uuidv7(),
): Logger {
  return parent.child({ conversion_id: conversionId });
}

/**
 * 로그용 링크 축약
 */
export function previewLink(
  link: string,
  maxLength: number = LOG_CONFIG.LINK_PREVIEW_LENGTH,
): string {
  return link.length > maxLength ? `${link.slice(0, maxLength)}...` : link;
}

/**
 * 로그용 토큰 마스킹 (앞부분만 노출)
 */
export function previewToken(
  token: string,
  visible: number = LOG_CONFIG.TOKEN_PREVIEW_LENGTH,
): string {
  return `${token.slice(0, visible)}...`;
}
