/**
 * 컨버터 팩토리
 * Factory Pattern
 *
 * 환경변수 설정 + YAML 설정 + 공용 의존성 → 마켓플레이스별 컨버터
 */

import type { Logger } from "@/config/logger";
import { ConfigLoader } from "@/config/ConfigLoader";
import type { MarketplaceId } from "@/core/domain/MarketplaceId";
import type { IConversionLogger } from "@/core/interfaces/IConversionLogger";
import type { ICredentialStore } from "@/core/interfaces/ICredentialStore";
import type { IBrowserSessionFactory } from "@/scrapers/controllers/IBrowserSession";
import { PlaywrightBrowserSessionFactory } from "@/scrapers/controllers/PlaywrightBrowserSession";
import { CredentialStore } from "@/repositories/CredentialStore";
import type { ConverterFactoryMap } from "@/services/ConverterRegistry";
import { AmazonConverter } from "./amazon/AmazonConverter";
import { MercadoLivreConverter } from "./mercadolivre/MercadoLivreConverter";
import { ShopeeConverter } from "./shopee/ShopeeConverter";

export interface ConverterDependencies {
  configLoader: ConfigLoader;
  browserFactory: IBrowserSessionFactory;
  createCredentialStore: (marketplace: MarketplaceId) => ICredentialStore;
  conversionLogger?: IConversionLogger;
  logger?: Logger;
}

/**
 * 기본 의존성 (YAML 싱글톤, Playwright, 파일 저장소)
 */
export function createDefaultDependencies(
  headless: boolean,
): ConverterDependencies {
  return {
    configLoader: ConfigLoader.getInstance(),
    browserFactory: new PlaywrightBrowserSessionFactory(headless),
    createCredentialStore: (marketplace) => new CredentialStore(marketplace),
  };
}

export function createConverterFactories(
  deps: ConverterDependencies,
): ConverterFactoryMap {
  return {
    amazon: (settings) =>
      new AmazonConverter({
        config: deps.configLoader.getAmazonConfig(),
        associateTag: settings.amazonAssociateTag,
        cookieFile: settings.amazonCookieFile,
        validateProducts: settings.amazonValidateProducts,
        credentialStore: deps.createCredentialStore("amazon"),
        browserFactory: deps.browserFactory,
        conversionLogger: deps.conversionLogger,
        logger: deps.logger,
      }),

    mercadolivre: (settings) =>
      new MercadoLivreConverter({
        config: deps.configLoader.getMercadoLivreConfig(),
        cookieFile: settings.mercadoLivreCookieFile,
        affiliateTag: settings.mercadoLivreTag,
        credentialStore: deps.createCredentialStore("mercadolivre"),
        browserFactory: deps.browserFactory,
        conversionLogger: deps.conversionLogger,
        logger: deps.logger,
      }),

    shopee: (settings) =>
      new ShopeeConverter({
        config: deps.configLoader.getShopeeConfig(),
        appId: settings.shopeeAppId,
        appSecret: settings.shopeeAppSecret,
        subId: settings.shopeeSubId,
        conversionLogger: deps.conversionLogger,
        logger: deps.logger,
      }),
  };
}
