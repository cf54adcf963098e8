/**
 * 제휴 링크 변환 구성
 *
 * 환경변수 → 컨버터 레지스트리(freeze) → AffiliateManager
 * 구성에 실패한 마켓플레이스는 비활성화되고 나머지는 그대로 동작
 */

import { AffiliateSettings, readAffiliateSettings } from "@/config/constants";
import {
  ConverterDependencies,
  createConverterFactories,
  createDefaultDependencies,
} from "@/converters/ConverterFactory";
import { AffiliateManager } from "@/services/AffiliateManager";
import {
  ConverterRegistryBuild,
  buildConverterRegistry,
} from "@/services/ConverterRegistry";

export interface AffiliateBootstrapOptions {
  settings?: AffiliateSettings;
  dependencies?: Partial<ConverterDependencies>;
}

export interface AffiliateBootstrap {
  manager: AffiliateManager;
  build: ConverterRegistryBuild;
  settings: AffiliateSettings;
}

export function createAffiliateManager(
  options: AffiliateBootstrapOptions = {},
): AffiliateBootstrap {
  const settings = options.settings ?? readAffiliateSettings();
  const dependencies = mergeDependencies(
    createDefaultDependencies(settings.browserHeadless),
    options.dependencies ?? {},
  );

  const build = buildConverterRegistry(
    settings,
    createConverterFactories(dependencies),
  );
  const manager = new AffiliateManager(build.registry, {
    logger: dependencies.logger,
    conversionLogger: dependencies.conversionLogger,
  });

  return { manager, build, settings };
}

/**
 * 값이 지정된 항목만 기본 의존성을 대체 (undefined는 무시)
 */
export function mergeDependencies(
  defaults: ConverterDependencies,
  overrides: Partial<ConverterDependencies>,
): ConverterDependencies {
  return {
    configLoader: overrides.configLoader ?? defaults.configLoader,
    browserFactory: overrides.browserFactory ?? defaults.browserFactory,
    createCredentialStore:
      overrides.createCredentialStore ?? defaults.createCredentialStore,
    conversionLogger: overrides.conversionLogger ?? defaults.conversionLogger,
    logger: overrides.logger ?? defaults.logger,
  };
}
