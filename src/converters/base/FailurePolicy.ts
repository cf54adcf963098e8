/**
 * 컨버터별 실패 정책 테이블
 *
 * 에러 종류별로 throw(raise)할지 원본 링크로 폴백(fallback)할지 결정
 * 규칙은 위에서부터 instanceof로 검사, 일치 없으면 otherwise
 *
 * | 에러                                  | amazon | mercadolivre | shopee   |
 * |---------------------------------------|--------|--------------|----------|
 * | RateLimited                           | raise  | raise        | fallback |
 * | InvalidSession / CredentialsMissing   | raise  | raise        | raise    |
 * | ProductNotFound                       | raise  | raise        | raise    |
 * | 그 외                                 | raise  | fallback     | fallback |
 */

import type { Logger } from "@/config/logger";
import {
  AffiliateLink,
  fallbackLink,
} from "@/core/domain/AffiliateLink";
import type { MarketplaceId } from "@/core/domain/MarketplaceId";
import {
  InvalidSessionError,
  ProductNotFoundError,
  RateLimitedError,
  describeError,
  errorMessage,
} from "@/core/errors/AffiliateErrors";

export type FailureAction = "raise" | "fallback";

type ErrorClass = abstract new (...args: never[]) => Error;

export interface FailurePolicy {
  readonly rules: ReadonlyArray<readonly [ErrorClass, FailureAction]>;
  readonly otherwise: FailureAction;
}

export const FAILURE_POLICIES: Readonly<Record<MarketplaceId, FailurePolicy>> =
  {
    amazon: {
      rules: [],
      otherwise: "raise",
    },
    mercadolivre: {
      rules: [
        [RateLimitedError, "raise"],
        [InvalidSessionError, "raise"],
        [ProductNotFoundError, "raise"],
      ],
      otherwise: "fallback",
    },
    shopee: {
      rules: [
        [RateLimitedError, "fallback"],
        [InvalidSessionError, "raise"],
        [ProductNotFoundError, "raise"],
      ],
      otherwise: "fallback",
    },
  };

/**
 * 에러 → 정책 결정
 */
export function decideFailureAction(
  policy: FailurePolicy,
  error: unknown,
): FailureAction {
  for (const [errorClass, action] of policy.rules) {
    if (error instanceof errorClass) {
      return action;
    }
  }
  return policy.otherwise;
}

/**
 * 정책 적용 구간 실행
 *
 * fallback 대상 실패는 원본 링크 + 사유로 반환, raise 대상은 그대로 throw
 */
export async function runWithFailurePolicy(
  marketplace: MarketplaceId,
  originalLink: string,
  log: Logger,
  work: () => Promise<AffiliateLink>,
  policy: FailurePolicy = FAILURE_POLICIES[marketplace],
): Promise<AffiliateLink> {
  try {
    return await work();
  } catch (error) {
    if (decideFailureAction(policy, error) === "raise") {
      throw error;
    }

    log.warn(
      { error: describeError(error) },
      "변환 실패, 원본 링크로 폴백",
    );
    return fallbackLink(originalLink, marketplace, errorMessage(error));
  }
}
