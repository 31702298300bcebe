/**
 * Playwright Driver Factory
 *
 * SOLID 원칙:
 * - SRP: 설정 → 브라우저 실행 + 세션 생성만 담당
 *
 * 브라우저 매핑:
 * - chrome → chromium
 * - edge → chromium (msedge 채널)
 * - firefox → firefox
 *
 * playwright-core는 브라우저를 내려받지 않으므로
 * 로컬에 설치된 브라우저 또는 채널 사용
 */

import { chromium, firefox } from "playwright-core";
import type { BrowserType, LaunchOptions } from "playwright-core";
import type { BrowserKind, SuiteConfig } from "@/core/domain/SuiteConfig";
import type { DriverSessionFactory } from "@/core/interfaces/IDriverSession";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import { PlaywrightDriverSession } from "./PlaywrightDriverSession";

/**
 * 뷰포트 (데스크톱 레이아웃 고정)
 */
export const VIEWPORT = { width: 1920, height: 1080 } as const;

/**
 * 브라우저 종류 → 실행 대상
 */
export function resolveLaunch(
  kind: BrowserKind,
  headless: boolean,
): { type: BrowserType; options: LaunchOptions } {
  const chromiumArgs = headless ? BROWSER_ARGS.HEADLESS : BROWSER_ARGS.HEADED;

  switch (kind) {
    case "chrome":
      return { type: chromium, options: { headless, args: chromiumArgs } };

    case "edge":
      return {
        type: chromium,
        options: { headless, channel: "msedge", args: chromiumArgs },
      };

    case "firefox":
      return { type: firefox, options: { headless } };
  }
}

/**
 * 세션 생성 함수
 */
export const createPlaywrightSession: DriverSessionFactory = async (
  config: SuiteConfig,
) => {
  const { type, options } = resolveLaunch(config.browser, config.headless);
  const browser = await type.launch(options);

  try {
    const context = await browser.newContext({ viewport: VIEWPORT });
    // 요소 조작 기본 타임아웃 (대기는 ElementWaiter가 담당)
    context.setDefaultTimeout(config.implicitWaitSeconds * 1000);
    const page = await context.newPage();
    return new PlaywrightDriverSession(browser, context, page);
  } catch (error) {
    await browser.close();
    throw error;
  }
};
