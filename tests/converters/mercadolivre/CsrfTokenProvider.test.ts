/**
 * CsrfTokenProvider 단위 테스트
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import pino from "pino";

import { ConfigLoader } from "@/config/ConfigLoader";
import type { CredentialBundle } from "@/core/domain/CredentialBundle";
import { ConversionError } from "@/core/errors/AffiliateErrors";
import { CsrfTokenProvider } from "@/converters/mercadolivre/CsrfTokenProvider";
import { FakeBrowserSessionFactory, bundleOf } from "../../helpers/fakes";

const log = pino({ level: "silent" });

const CSRF_PAGE = "https://produto.mercadolivre.com.br/";
const HOME_PAGE = "https://www.mercadolivre.com.br/";

function ssidBundle(value: string): CredentialBundle {
  return bundleOf([{ name: "ssid", value }]);
}

describe("CsrfTokenProvider", () => {
  let browserFactory: FakeBrowserSessionFactory;
  let provider: CsrfTokenProvider;

  function sentSsids(): Array<string | undefined> {
    return browserFactory.openOptions.map((options) => options.cookies?.[0]?.value);
  }

  beforeEach(() => {
    browserFactory = new FakeBrowserSessionFactory()
      .setPage(CSRF_PAGE, { status: 200, evaluateResult: "test-csrf-token" })
      .setPage(HOME_PAGE, { status: 200, evaluateResult: null });
    provider = new CsrfTokenProvider(
      new ConfigLoader().getMercadoLivreConfig(),
      browserFactory,
    );
  });

  it("같은 번들이면 캐시된 토큰 재사용", async () => {
    const bundle = ssidBundle("OLD");

    await expect(provider.getToken(bundle, log)).resolves.toBe("test-csrf-token");
    await expect(provider.getToken(bundle, log)).resolves.toBe("test-csrf-token");

    expect(browserFactory.openedCount).toBe(1);
    expect(browserFactory.allClosed).toBe(true);
  });

  it("번들이 바뀌면 새 쿠키로 다시 획득", async () => {
    await provider.getToken(ssidBundle("OLD"), log);
    await provider.getToken(ssidBundle("NEW"), log);

    expect(browserFactory.openedCount).toBe(2);
    expect(sentSsids()).toEqual(["OLD", "NEW"]);
  });

  it("획득 도중 번들이 교체되면 이전 번들의 토큰을 쓰지 않음", async () => {
    browserFactory.openDelayMs = 20;

    await Promise.all([
      provider.getToken(ssidBundle("OLD"), log),
      provider.getToken(ssidBundle("NEW"), log),
    ]);

    expect(browserFactory.openedCount).toBe(2);
    expect(sentSsids()).toEqual(["OLD", "NEW"]);
  });

  it("invalidate 이후에는 같은 번들도 다시 획득", async () => {
    const bundle = ssidBundle("OLD");

    await provider.getToken(bundle, log);
    provider.invalidate();
    await provider.getToken(bundle, log);

    expect(browserFactory.openedCount).toBe(2);
  });

  it("모든 페이지에 토큰이 없으면 ConversionError", async () => {
    browserFactory.setPage(CSRF_PAGE, { status: 200, evaluateResult: "" });

    await expect(provider.getToken(ssidBundle("OLD"), log)).rejects.toThrow(
      ConversionError,
    );
    expect(browserFactory.sessions[0]?.navigations.map(({ url }) => url)).toEqual([
      CSRF_PAGE,
      HOME_PAGE,
    ]);
    expect(browserFactory.allClosed).toBe(true);
  });
});
