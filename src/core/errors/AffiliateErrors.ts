/**
 * 제휴 링크 변환 에러 분류
 *
 * 목적:
 * - 실패 원인 세분화 (마켓플레이스가 알려준 실패 vs 예기치 못한 실패)
 * - 컨버터별 폴백 정책 결정 (FailurePolicy 참고)
 * - 구조화 로깅
 */

/**
 * 에러 타입
 */
export enum AffiliateErrorType {
  /** URL 형식 오류 또는 다른 마켓플레이스 URL */
  INVALID_LINK = "INVALID_LINK",

  /** 마켓플레이스별 일반 변환 실패 (ID 추출 실패, CSRF 미발견 등) */
  CONVERSION_FAILED = "CONVERSION_FAILED",

  /** 필수 자격 증명 파일/환경변수 없음 */
  CREDENTIALS_MISSING = "CREDENTIALS_MISSING",

  /** 세션 만료 또는 자격 증명 무효 */
  INVALID_SESSION = "INVALID_SESSION",

  /** 마켓플레이스 요청 제한 */
  RATE_LIMITED = "RATE_LIMITED",

  /** 상품 없음 */
  PRODUCT_NOT_FOUND = "PRODUCT_NOT_FOUND",

  /** 예상하지 못한 업스트림 응답 (상태 코드/형식) */
  API_ERROR = "API_ERROR",

  /** 등록된 컨버터 없음 */
  MARKETPLACE_NOT_SUPPORTED = "MARKETPLACE_NOT_SUPPORTED",

  /** CAPTCHA 감지 (advisory 검증 경로 전용) */
  CAPTCHA_DETECTED = "CAPTCHA_DETECTED",

  /** 추적 태그 형식 오류 (생성 시점) */
  INVALID_TRACKING_TAG = "INVALID_TRACKING_TAG",

  /** 설정 누락/오류 */
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
}

export interface AffiliateErrorOptions {
  marketplace?: string;
  cause?: unknown;
}

/**
 * 변환 에러 기본 클래스
 */
export class AffiliateConversionError extends Error {
  public readonly type: AffiliateErrorType;
  public readonly marketplace?: string;
  public readonly errorCause?: unknown;

  constructor(
    type: AffiliateErrorType,
    message: string,
    options?: AffiliateErrorOptions,
  ) {
    super(message);
    this.name = "AffiliateConversionError";
    this.type = type;
    this.marketplace = options?.marketplace;
    this.errorCause = options?.cause;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      errorName: this.name,
      message: this.message,
      marketplace: this.marketplace,
      cause: describeError(this.errorCause),
    };
  }
}

export class InvalidLinkError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.INVALID_LINK, message, options);
    this.name = "InvalidLinkError";
  }
}

export class ConversionError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.CONVERSION_FAILED, message, options);
    this.name = "ConversionError";
  }
}

export class InvalidSessionError extends AffiliateConversionError {
  constructor(
    message: string,
    options?: AffiliateErrorOptions,
    type: AffiliateErrorType = AffiliateErrorType.INVALID_SESSION,
  ) {
    super(type, message, options);
    this.name = "InvalidSessionError";
  }
}

/**
 * 자격 증명 없음
 * 세션 무효의 한 종류로 취급 (InvalidSessionError 정책을 그대로 따름)
 */
export class CredentialsMissingError extends InvalidSessionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(message, options, AffiliateErrorType.CREDENTIALS_MISSING);
    this.name = "CredentialsMissingError";
  }
}

export class RateLimitedError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.RATE_LIMITED, message, options);
    this.name = "RateLimitedError";
  }
}

export class ProductNotFoundError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.PRODUCT_NOT_FOUND, message, options);
    this.name = "ProductNotFoundError";
  }
}

export class ApiError extends AffiliateConversionError {
  public readonly status?: number;

  constructor(
    message: string,
    options?: AffiliateErrorOptions & { status?: number },
  ) {
    super(AffiliateErrorType.API_ERROR, message, options);
    this.name = "ApiError";
    this.status = options?.status;
  }
}

export class MarketplaceNotSupportedError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.MARKETPLACE_NOT_SUPPORTED, message, options);
    this.name = "MarketplaceNotSupportedError";
  }
}

export class CaptchaDetectedError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.CAPTCHA_DETECTED, message, options);
    this.name = "CaptchaDetectedError";
  }
}

export class InvalidTrackingTagError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.INVALID_TRACKING_TAG, message, options);
    this.name = "InvalidTrackingTagError";
  }
}

export class ConfigurationError extends AffiliateConversionError {
  constructor(message: string, options?: AffiliateErrorOptions) {
    super(AffiliateErrorType.CONFIGURATION_ERROR, message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * unknown 에러 → 메시지 문자열
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * unknown 에러 → 로그용 객체
 */
export function describeError(
  error: unknown,
): Record<string, unknown> | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  if (error instanceof AffiliateConversionError) {
    return error.toLogObject();
  }
  if (error instanceof Error) {
    return { errorName: error.name, message: error.message };
  }
  return { message: String(error) };
}
