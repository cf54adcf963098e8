/**
 * Affiliate Link Converter 공개 API
 */

export { createAffiliateManager } from "./bootstrap";
export type {
  AffiliateBootstrap,
  AffiliateBootstrapOptions,
} from "./bootstrap";

export { readAffiliateSettings } from "./config/constants";
export type { AffiliateSettings } from "./config/constants";
export { ConfigLoader } from "./config/ConfigLoader";

export type { AffiliateLink, ConversionResult } from "./core/domain/AffiliateLink";
export type { CredentialBundle } from "./core/domain/CredentialBundle";
export {
  MARKETPLACE_NOT_DETECTED,
  SUPPORTED_MARKETPLACES,
} from "./core/domain/MarketplaceId";
export type { MarketplaceId } from "./core/domain/MarketplaceId";
export * from "./core/errors/AffiliateErrors";
export type { IAffiliateConverter } from "./core/interfaces/IAffiliateConverter";
export type {
  ConversionLogRecord,
  IConversionLogger,
} from "./core/interfaces/IConversionLogger";
export type { ICredentialStore } from "./core/interfaces/ICredentialStore";

export { AmazonConverter } from "./converters/amazon/AmazonConverter";
export { MercadoLivreConverter } from "./converters/mercadolivre/MercadoLivreConverter";
export { ShopeeConverter } from "./converters/shopee/ShopeeConverter";
export { FAILURE_POLICIES } from "./converters/base/FailurePolicy";

export { AffiliateManager } from "./services/AffiliateManager";
export {
  ConverterRegistry,
  buildConverterRegistry,
} from "./services/ConverterRegistry";
export { MarketplaceDetector } from "./services/MarketplaceDetector";
export { CredentialStore } from "./repositories/CredentialStore";

export * from "./scrapers/controllers";
