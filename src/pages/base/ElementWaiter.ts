/**
 * Element Wait Engine
 *
 * SOLID 원칙:
 * - SRP: 조건 폴링 대기만 담당
 * - OCP: until()으로 새로운 조건 추가 가능
 *
 * 폴링 규칙:
 * - 조건 평가 → 미충족이면 min(폴링 간격, 남은 시간) 만큼 대기 → 반복
 * - 마감 시각 도달 시 종료 (T 이상, T + 폴링 간격 이내)
 * - NoSuchElementError / StaleElementError는 재시도, 그 외 에러는 즉시 전파
 */

import { Locator, describeLocator, isLocator } from "@/core/domain/Locator";
import type {
  BooleanWaitOptions,
  ResolvedWaitSettings,
  WaitConditionKind,
  WaitOptions,
} from "@/core/domain/WaitCondition";
import {
  PageSnapshot,
  WaitTimeoutError,
} from "@/core/errors/AutomationError";
import {
  NoSuchElementError,
  isTransientLookupError,
} from "@/core/errors/DriverErrors";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import type { IElementHandle } from "@/core/interfaces/IElementHandle";
import { WAIT_CONFIG } from "@/config/constants";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { sleep } from "@/utils/sleep";

/**
 * 대기 대상: Locator(매 폴링마다 재조회) 또는 요소 핸들
 */
export type WaitTarget = Locator | IElementHandle;

/**
 * 폴링 조건 함수
 * null 반환 = 아직 미충족
 */
export type Probe<T> = () => Promise<T | null>;

export class ElementWaiter {
  private readonly defaults: ResolvedWaitSettings;

  constructor(
    private readonly session: IDriverSession,
    private readonly logger: Logger = defaultLogger,
    defaults: Partial<ResolvedWaitSettings> = {},
  ) {
    this.defaults = {
      timeoutMs: defaults.timeoutMs ?? WAIT_CONFIG.DEFAULT_TIMEOUT_MS,
      pollIntervalMs: defaults.pollIntervalMs ?? WAIT_CONFIG.POLL_INTERVAL_MS,
    };
  }

  /**
   * 옵션에 기본값 적용
   */
  resolve(options: WaitOptions = {}): ResolvedWaitSettings {
    return {
      timeoutMs: options.timeoutMs ?? this.defaults.timeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? this.defaults.pollIntervalMs,
    };
  }

  /**
   * 범용 폴링
   * @returns 조건 값, 타임아웃 시 null
   */
  async until<T>(
    description: string,
    probe: Probe<T>,
    options: WaitOptions = {},
  ): Promise<T | null> {
    const { timeoutMs, pollIntervalMs } = this.resolve(options);
    const deadline = Date.now() + timeoutMs;
    let attempts = 0;

    for (;;) {
      attempts++;
      const value = await this.evaluate(probe);
      if (value !== null) {
        return value;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.debug(
          { description, timeoutMs, attempts },
          "대기 조건 타임아웃",
        );
        return null;
      }

      await sleep(Math.min(pollIntervalMs, remaining));
    }
  }

  /**
   * 표시될 때까지 대기
   */
  async waitForVisible(
    target: WaitTarget,
    options: WaitOptions = {},
  ): Promise<IElementHandle> {
    const element = await this.until(
      `${this.describe(target, options)} visible`,
      async () => {
        const el = await this.resolveTarget(target);
        return (await el.isDisplayed()) ? el : null;
      },
      options,
    );
    return element ?? this.fail(target, "visible", options);
  }

  /**
   * 클릭 가능할 때까지 대기
   * visible과 enabled를 같은 폴링 샘플에서 판정
   */
  async waitForClickable(
    target: WaitTarget,
    options: WaitOptions = {},
  ): Promise<IElementHandle> {
    const element = await this.until(
      `${this.describe(target, options)} clickable`,
      async () => {
        const el = await this.resolveTarget(target);
        const displayed = await el.isDisplayed();
        const enabled = await el.isEnabled();
        return displayed && enabled ? el : null;
      },
      options,
    );
    return element ?? this.fail(target, "clickable", options);
  }

  /**
   * 사라질 때까지 대기
   * 없음 / stale / 숨김 모두 사라진 것으로 판정
   */
  async waitForAbsent(
    target: WaitTarget,
    options: BooleanWaitOptions = {},
  ): Promise<boolean> {
    const gone = await this.until(
      `${this.describe(target, options)} absent`,
      async () => {
        try {
          const el = await this.resolveTarget(target);
          return (await el.isDisplayed()) ? null : true;
        } catch (error) {
          if (isTransientLookupError(error)) {
            return true;
          }
          throw error;
        }
      },
      options,
    );
    return gone ?? this.failBoolean(target, "absent", options);
  }

  /**
   * 텍스트 포함될 때까지 대기 (대소문자 구분)
   */
  async waitForText(
    target: WaitTarget,
    expected: string,
    options: BooleanWaitOptions = {},
  ): Promise<boolean> {
    const matched = await this.until(
      `${this.describe(target, options)} text contains '${expected}'`,
      async () => {
        const el = await this.resolveTarget(target);
        const text = await el.innerText();
        return text.includes(expected) ? true : null;
      },
      options,
    );
    return matched ?? this.failBoolean(target, "textContains", options);
  }

  /**
   * 대상 → 요소 핸들 (Locator면 첫 번째 일치 요소)
   */
  async resolveTarget(target: WaitTarget): Promise<IElementHandle> {
    if (!isLocator(target)) {
      return target;
    }

    const elements = await this.session.findElements(target);
    const first = elements[0];
    if (!first) {
      throw new NoSuchElementError(
        `No element matches ${describeLocator(target)}`,
      );
    }
    return first;
  }

  /**
   * 현재 페이지 스냅샷 (실패해도 예외 없음)
   */
  async snapshot(): Promise<PageSnapshot> {
    return takeSnapshot(this.session);
  }

  /**
   * 로그용 대상 설명
   */
  describe(target: WaitTarget, options: WaitOptions = {}): string {
    if (options.label) {
      return options.label;
    }
    return isLocator(target) ? describeLocator(target) : "element";
  }

  private async evaluate<T>(probe: Probe<T>): Promise<T | null> {
    try {
      return await probe();
    } catch (error) {
      if (isTransientLookupError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async fail(
    target: WaitTarget,
    condition: WaitConditionKind,
    options: WaitOptions,
  ): Promise<never> {
    const { timeoutMs } = this.resolve(options);
    const snapshot = await this.snapshot();
    const description = this.describe(target, options);

    this.logger.error(
      { target: description, condition, timeoutMs, ...snapshot },
      "요소 대기 타임아웃",
    );
    throw new WaitTimeoutError(description, condition, timeoutMs, snapshot);
  }

  private async failBoolean(
    target: WaitTarget,
    condition: WaitConditionKind,
    options: BooleanWaitOptions,
  ): Promise<boolean> {
    if (options.strict) {
      return this.fail(target, condition, options);
    }

    this.logger.warn(
      {
        target: this.describe(target, options),
        condition,
        timeoutMs: this.resolve(options).timeoutMs,
      },
      "대기 조건 미충족 - false 반환",
    );
    return false;
  }
}

/**
 * URL/제목 스냅샷
 * 조회 실패 항목은 "unknown"
 */
export async function takeSnapshot(
  session: IDriverSession,
): Promise<PageSnapshot> {
  const [url, title] = await Promise.all([
    session.currentUrl().catch(() => "unknown"),
    session.title().catch(() => "unknown"),
  ]);
  return { url, title };
}
