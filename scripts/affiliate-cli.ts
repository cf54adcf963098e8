#!/usr/bin/env tsx
/**
 * 제휴 링크 변환 CLI
 *
 * 사용법:
 *   npx tsx scripts/affiliate-cli.ts convert <url> [url...]
 *   npx tsx scripts/affiliate-cli.ts status
 *
 * 예시:
 *   npx tsx scripts/affiliate-cli.ts convert "https://www.amazon.com.br/dp/B08N5WRWNW"
 *   OUTPUT_JSON=true npx tsx scripts/affiliate-cli.ts status
 */

import "dotenv/config";

import { createAffiliateManager } from "@/bootstrap";
import type { ConversionResult } from "@/core/domain/AffiliateLink";
import { SUPPORTED_MARKETPLACES } from "@/core/domain/MarketplaceId";
import { errorMessage } from "@/core/errors/AffiliateErrors";

const isJsonOutput = process.env.OUTPUT_JSON === "true";

function printUsage(): void {
  console.log("사용법:");
  console.log("  npx tsx scripts/affiliate-cli.ts convert <url> [url...]");
  console.log("  npx tsx scripts/affiliate-cli.ts status\n");
  console.log("지원 마켓플레이스:");
  SUPPORTED_MARKETPLACES.forEach((marketplace) => {
    console.log(`  - ${marketplace}`);
  });
}

function printResult(original: string, result: ConversionResult): void {
  const status = result.status === "success" ? "✅" : "⚠️";
  console.log(`\n${status} ${result.marketplace}`);
  console.log(`   원본: ${original}`);
  console.log(`   결과: ${result.link}`);
  if (result.error) {
    console.log(`   사유: ${result.error}`);
  }
}

async function convert(urls: string[]): Promise<number> {
  const { manager } = createAffiliateManager();
  const results: Array<{ original: string; result: ConversionResult }> = [];

  // 순차 처리 (브라우저 세션 동시 실행 방지)
  for (const url of urls) {
    results.push({ original: url, result: await manager.convertLink(url) });
  }

  if (isJsonOutput) {
    console.log(JSON.stringify(results, null, 2));
  } else {
    results.forEach(({ original, result }) => printResult(original, result));
  }

  return results.every(({ result }) => result.status === "success") ? 0 : 2;
}

async function status(): Promise<number> {
  const { build } = createAffiliateManager();
  const converters = build.active.map((marketplace) => ({
    marketplace,
    converter: build.registry.get(marketplace),
  }));

  const credentials = await Promise.all(
    converters.map(async ({ marketplace, converter }) => {
      if (!converter) {
        return { marketplace, valid: false, error: "not registered" };
      }
      try {
        return { marketplace, valid: await converter.validateCredentials(), error: null };
      } catch (error) {
        return { marketplace, valid: false, error: errorMessage(error) };
      }
    }),
  );

  const failures = build.failures.map(({ marketplace, error }) => ({
    marketplace,
    error: error.message,
  }));

  if (isJsonOutput) {
    console.log(JSON.stringify({ active: build.active, credentials, failures }, null, 2));
    return 0;
  }

  console.log("================================================================================");
  console.log("🔗 제휴 링크 컨버터 상태");
  console.log("================================================================================\n");
  credentials.forEach(({ marketplace, valid, error }) => {
    const mark = valid ? "✅" : "❌";
    console.log(`${mark} ${marketplace}${error ? ` (${error})` : ""}`);
  });
  failures.forEach(({ marketplace, error }) => {
    console.log(`⛔ ${marketplace}: 비활성 (${error})`);
  });
  return 0;
}

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);

  switch (command) {
    case "convert":
      if (args.length === 0) {
        console.error("❌ 변환할 URL이 없습니다.\n");
        printUsage();
        return 1;
      }
      return convert(args);
    case "status":
      return status();
    default:
      printUsage();
      return 1;
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error("❌ 실행 실패:", errorMessage(error));
    process.exit(1);
  });
