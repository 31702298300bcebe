/**
 * Suite Runtime
 *
 * 워커 프로세스당 1개: 설정 + 세션 관리자 + 스크린샷 서비스
 * BeforeAll에서 초기화, 시나리오 World에서 조회
 */

import type { SuiteConfig } from "@/core/domain/SuiteConfig";
import type { DriverSessionFactory } from "@/core/interfaces/IDriverSession";
import { logger } from "@/config/logger";
import { createPlaywrightSession } from "@/drivers/PlaywrightDriverFactory";
import { SessionManager } from "@/session/SessionManager";
import { ScreenshotService } from "@/utils/ScreenshotService";

export interface SuiteRuntime {
  config: SuiteConfig;
  sessions: SessionManager;
  screenshots: ScreenshotService;
}

let runtime: SuiteRuntime | null = null;

export function initRuntime(
  config: SuiteConfig,
  factory: DriverSessionFactory = createPlaywrightSession,
): SuiteRuntime {
  runtime = {
    config,
    sessions: new SessionManager(factory, config, logger),
    screenshots: new ScreenshotService(config.screenshotDir, logger),
  };
  return runtime;
}

export function getRuntime(): SuiteRuntime {
  if (!runtime) {
    throw new Error("Suite runtime is not initialized (BeforeAll not run)");
  }
  return runtime;
}

export function peekRuntime(): SuiteRuntime | null {
  return runtime;
}

export function resetRuntime(): void {
  runtime = null;
}
