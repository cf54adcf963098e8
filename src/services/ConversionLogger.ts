/**
 * Pino 기반 변환 로그 기록기
 *
 * 레코드 1건 = 로그 1줄 (status에 따라 레벨 결정)
 */

import type { Logger } from "@/config/logger";
import type {
  ConversionLogRecord,
  IConversionLogger,
} from "@/core/interfaces/IConversionLogger";
import { previewLink } from "@/utils/LoggerContext";

export class ConversionLogger implements IConversionLogger {
  constructor(private readonly log: Logger) {}

  logConversion(record: ConversionLogRecord): void {
    const payload = {
      event: "affiliate_conversion",
      conversion_id: record.conversionId,
      marketplace: record.marketplace,
      original_link: record.originalLink,
      converted_link: record.convertedLink,
      status: record.status,
      error: record.error,
      product_id: record.productId ?? null,
      duration_ms: record.durationMs,
    };

    switch (record.status) {
      case "success":
        this.log.info(
          payload,
          `변환 성공: ${previewLink(record.originalLink)}`,
        );
        break;
      case "fallback":
        this.log.warn(payload, `변환 폴백: ${record.error ?? ""}`);
        break;
      case "error":
        this.log.error(payload, `변환 실패: ${record.error ?? ""}`);
        break;
    }
  }
}
