/**
 * Cucumber Hooks
 *
 * - BeforeAll: .env + 설정 로드 (실패 시 시나리오 실행 전 중단)
 * - Before: 세션 생성 + 기본 URL 이동
 * - After: 실패 시 스크린샷 첨부, 세션 해제 (정리 에러는 전파하지 않음)
 */

import "dotenv/config";
import {
  After,
  AfterAll,
  Before,
  BeforeAll,
  ITestCaseHookParameter,
  Status,
  setDefaultTimeout,
} from "@cucumber/cucumber";
import { ConfigLoader } from "@/config/ConfigLoader";
import { logger } from "@/config/logger";
import { ScenarioState } from "@/session/ScenarioLifecycle";
import { logImportant } from "@/utils/LoggerContext";
import { initRuntime, peekRuntime } from "./support/runtime";
import type { SuiteWorld } from "./world";

/** 스텝/훅 기본 타임아웃 (세션 생성 + 페이지 로드 포함) */
setDefaultTimeout(90 * 1000);

BeforeAll(function () {
  const config = ConfigLoader.getInstance().load();
  initRuntime(config);
});

Before(async function (
  this: SuiteWorld,
  { pickle, testCaseStartedId }: ITestCaseHookParameter,
) {
  this.begin(testCaseStartedId, pickle.name);
  logImportant(this.scenarioLogger, "시나리오 시작", {
    tags: pickle.tags.map((tag) => tag.name),
  });

  const { config, sessions } = this.runtime;
  const session = await this.lifecycle.start(() =>
    sessions.getSession(testCaseStartedId),
  );
  this.attachSession(session);

  await this.lifecycle.perform(ScenarioState.Navigating, () =>
    this.homePage.navigateTo(config.url),
  );
});

After(async function (
  this: SuiteWorld,
  { pickle, result }: ITestCaseHookParameter,
) {
  const status = result?.status ?? Status.UNKNOWN;
  logImportant(this.scenarioLogger, "시나리오 종료", { status });

  await this.lifecycle.tearDown(async () => {
    const { config, sessions, screenshots } = this.runtime;

    const failed = status === Status.FAILED;
    if (failed && config.screenshotOnFailure && this.hasSession) {
      const shot = await screenshots.capture(this.driver, pickle.name);
      if (shot) {
        await this.attach(shot.image, "image/png");
      }
    }

    await sessions.releaseSession(this.unitId);
  });
});

AfterAll(async function () {
  // 설정 로드 실패 시 runtime 없음
  const runtime = peekRuntime();
  if (!runtime) return;

  await runtime.sessions.releaseAll();
  logger.info("모든 세션 정리 완료");
});
