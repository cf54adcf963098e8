/**
 * 컨버터 레지스트리
 * Registry Pattern
 *
 * 역할:
 * - 마켓플레이스 → 컨버터 매핑
 * - 시작 시 일괄 구성 후 freeze (이후 등록 불가)
 *
 * SOLID 원칙:
 * - SRP: 컨버터 인스턴스 관리만 담당
 * - DIP: IAffiliateConverter 인터페이스에 의존
 */

import { logger } from "@/config/logger";
import type { AffiliateSettings } from "@/config/constants";
import type { IAffiliateConverter } from "@/core/interfaces/IAffiliateConverter";
import {
  MarketplaceId,
  SUPPORTED_MARKETPLACES,
} from "@/core/domain/MarketplaceId";
import {
  ConfigurationError,
  describeError,
  errorMessage,
} from "@/core/errors/AffiliateErrors";

/**
 * 설정 → 컨버터 생성 함수
 */
export type ConverterFactory = (
  settings: AffiliateSettings,
) => IAffiliateConverter;

export type ConverterFactoryMap = Partial<
  Record<MarketplaceId, ConverterFactory>
>;

export class ConverterRegistry {
  private readonly converters = new Map<MarketplaceId, IAffiliateConverter>();
  private frozen = false;

  /**
   * 컨버터 등록 (같은 마켓플레이스는 덮어씀)
   * @throws ConfigurationError freeze 이후 호출 시
   */
  register(marketplace: MarketplaceId, converter: IAffiliateConverter): void {
    if (this.frozen) {
      throw new ConfigurationError(
        `Converter registry is frozen; cannot register ${marketplace}`,
        { marketplace },
      );
    }
    if (this.converters.has(marketplace)) {
      logger.info({ marketplace }, "컨버터 교체");
    }
    this.converters.set(marketplace, converter);
  }

  get(marketplace: MarketplaceId): IAffiliateConverter | undefined {
    return this.converters.get(marketplace);
  }

  has(marketplace: MarketplaceId): boolean {
    return this.converters.has(marketplace);
  }

  /**
   * 등록된 마켓플레이스 (지원 목록 순서)
   */
  list(): MarketplaceId[] {
    return SUPPORTED_MARKETPLACES.filter((marketplace) =>
      this.converters.has(marketplace),
    );
  }

  size(): number {
    return this.converters.size;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }
}

export interface ConverterBuildFailure {
  marketplace: MarketplaceId;
  error: Error;
}

export interface ConverterRegistryBuild {
  registry: ConverterRegistry;
  active: MarketplaceId[];
  failures: ConverterBuildFailure[];
}

/**
 * 전체 마켓플레이스 컨버터 구성
 *
 * 한 마켓플레이스 실패가 나머지 구성을 막지 않음
 * 반환되는 레지스트리는 freeze 상태
 */
export function buildConverterRegistry(
  settings: AffiliateSettings,
  factories: ConverterFactoryMap,
): ConverterRegistryBuild {
  const registry = new ConverterRegistry();
  const failures: ConverterBuildFailure[] = [];

  for (const marketplace of SUPPORTED_MARKETPLACES) {
    const factory = factories[marketplace];
    if (!factory) {
      continue;
    }

    try {
      registry.register(marketplace, factory(settings));
    } catch (error) {
      failures.push({
        marketplace,
        error: error instanceof Error ? error : new Error(errorMessage(error)),
      });
      logger.warn(
        { marketplace, error: describeError(error) },
        "컨버터 구성 실패, 해당 마켓플레이스 비활성화",
      );
    }
  }

  registry.freeze();
  const active = registry.list();
  logger.info(
    { active, failed: failures.map((failure) => failure.marketplace) },
    "컨버터 레지스트리 구성 완료",
  );

  return { registry, active, failures };
}
