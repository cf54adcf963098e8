/**
 * 변환 로그 레코드 기록 인터페이스
 *
 * 컨버터 호출 1건당 정확히 1개의 레코드를 남김
 */

export type ConversionLogStatus = "success" | "fallback" | "error";

export interface ConversionLogRecord {
  marketplace: string;
  originalLink: string;
  convertedLink: string | null;
  status: ConversionLogStatus;
  error: string | null;
  /** 변환 ID (UUID v7) */
  conversionId?: string;
  /** 추출된 상품 식별자 (ASIN, MLB ID, shopId/itemId) */
  productId?: string | null;
  /** 소요 시간 (ms) */
  durationMs?: number;
}

export interface IConversionLogger {
  logConversion(record: ConversionLogRecord): void;
}
