/**
 * Page Interaction Base
 *
 * SOLID 원칙:
 * - SRP: 대기 + 요소 조작 + 진단 캡처만 담당
 * - DIP: IDriverSession 인터페이스에만 의존
 *
 * 재시도 정책:
 * - click / type 도중 StaleElementError → 1회 재시도
 *   (Locator 대상은 재대기 후 새 요소로, 요소 핸들 대상은 같은 핸들로)
 * - 두 번째 실패 → ActionFailedError (attempts = 2)
 * - stale이 아닌 실패 → ActionFailedError (attempts = 1)
 * - 대기 실패(WaitTimeoutError)는 그대로 전파
 */

import { Locator, describeLocator, isLocator } from "@/core/domain/Locator";
import type {
  ResolvedWaitSettings,
  WaitOptions,
} from "@/core/domain/WaitCondition";
import {
  ActionFailedError,
  ActionKind,
  PageSnapshot,
} from "@/core/errors/AutomationError";
import { StaleElementError } from "@/core/errors/DriverErrors";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import type { IElementHandle } from "@/core/interfaces/IElementHandle";
import { DESCRIBE_LIMITS, WAIT_CONFIG } from "@/config/constants";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { sleep } from "@/utils/sleep";
import { ElementWaiter, WaitTarget } from "./ElementWaiter";

/**
 * 하이라이트 옵션
 */
export interface HighlightOptions {
  label?: string;
  durationMs?: number;
}

const HIGHLIGHT_STYLE = "border: 3px solid red; background-color: yellow;";

export class PageActions {
  readonly waiter: ElementWaiter;

  constructor(
    protected readonly session: IDriverSession,
    protected readonly logger: Logger = defaultLogger,
    waitDefaults: Partial<ResolvedWaitSettings> = {},
  ) {
    this.waiter = new ElementWaiter(session, logger, waitDefaults);
  }

  // ==================== 조작 ====================

  /**
   * clickable 대기 후 클릭
   */
  async click(target: WaitTarget, options: WaitOptions = {}): Promise<void> {
    const label = await this.labelFor(target, options.label);
    await this.withStaleRetry(
      target,
      label,
      "click",
      () => this.waiter.waitForClickable(target, { ...options, label }),
      (element) => element.click(),
    );
    this.logger.debug({ target: label }, "클릭 완료");
  }

  /**
   * visible 대기 후 입력값 비우고 입력
   */
  async type(
    target: WaitTarget,
    text: string,
    options: WaitOptions = {},
  ): Promise<void> {
    const label = await this.labelFor(target, options.label);
    await this.withStaleRetry(
      target,
      label,
      "type",
      () => this.waiter.waitForVisible(target, { ...options, label }),
      async (element) => {
        await element.clear();
        await element.type(text);
      },
    );
    this.logger.debug({ target: label, length: text.length }, "입력 완료");
  }

  /**
   * visible 대기 후 텍스트 조회
   */
  async readText(
    target: WaitTarget,
    options: WaitOptions = {},
  ): Promise<string> {
    const label = await this.labelFor(target, options.label);
    const element = await this.waiter.waitForVisible(target, {
      ...options,
      label,
    });

    try {
      const text = await element.innerText();
      this.logger.debug({ target: label, text }, "텍스트 조회 완료");
      return text;
    } catch (error) {
      throw await this.actionFailed(label, "readText", 1, error);
    }
  }

  /**
   * 즉시 표시 여부 확인 (대기 없음, 예외 없음)
   */
  async isDisplayed(
    target: WaitTarget,
    options: { label?: string } = {},
  ): Promise<boolean> {
    try {
      const element = await this.waiter.resolveTarget(target);
      return await element.isDisplayed();
    } catch (error) {
      this.logger.debug(
        { target: this.waiter.describe(target, options), error },
        "요소 표시 안 됨",
      );
      return false;
    }
  }

  /**
   * 요소를 화면에 스크롤 (실패 무시)
   */
  async scrollIntoView(
    target: WaitTarget,
    options: { label?: string } = {},
  ): Promise<void> {
    try {
      const element = await this.waiter.resolveTarget(target);
      await element.scrollIntoView();
    } catch (error) {
      this.logger.warn(
        { target: this.waiter.describe(target, options), error },
        "스크롤 실패 - 무시",
      );
    }
  }

  /**
   * 시각 디버깅용 하이라이트 (실패 무시)
   * 지정 시간 후 원래 style 복원
   */
  async highlight(
    target: WaitTarget,
    options: HighlightOptions = {},
  ): Promise<void> {
    const durationMs = options.durationMs ?? WAIT_CONFIG.HIGHLIGHT_DURATION_MS;
    try {
      const element = await this.waiter.resolveTarget(target);
      const original = (await element.getAttribute("style")) ?? "";
      await element.setAttribute(
        "style",
        `${original} ${HIGHLIGHT_STYLE}`.trim(),
      );
      await sleep(durationMs);
      await element.setAttribute("style", original);
    } catch (error) {
      this.logger.warn(
        { target: this.waiter.describe(target, options), error },
        "하이라이트 실패 - 무시",
      );
    }
  }

  // ==================== 조회 ====================

  /**
   * 즉시 조회 (대기 없음)
   */
  async findAll(locator: Locator): Promise<IElementHandle[]> {
    return this.session.findElements(locator);
  }

  async count(locator: Locator): Promise<number> {
    return (await this.findAll(locator)).length;
  }

  // ==================== 페이지 ====================

  /**
   * document.readyState === "complete" 대기
   * 타임아웃은 경고만 남김
   */
  async waitForPageLoad(
    timeoutMs: number = WAIT_CONFIG.PAGE_LOAD_TIMEOUT_MS,
  ): Promise<boolean> {
    const loaded = await this.waiter.until(
      "document.readyState complete",
      async () =>
        (await this.session.readyState()) === "complete" ? true : null,
      { timeoutMs },
    );

    if (loaded === null) {
      this.logger.warn(
        { timeoutMs, ...(await this.waiter.snapshot()) },
        "페이지 로드 대기 타임아웃 - 계속 진행",
      );
      return false;
    }
    return true;
  }

  async navigateTo(url: string): Promise<void> {
    this.logger.info({ url }, "페이지 이동");
    await this.session.navigate(url);
    await this.waitForPageLoad();
    this.logger.info(
      { currentUrl: await this.getCurrentUrl() },
      "페이지 이동 완료",
    );
  }

  async getTitle(): Promise<string> {
    return this.session.title();
  }

  async getCurrentUrl(): Promise<string> {
    return this.session.currentUrl();
  }

  // ==================== 진단 ====================

  /**
   * 로그용 요소 설명
   * 예: <input id='s' name='s' class='search-field'> text='...'
   */
  async describeElement(element: IElementHandle): Promise<string> {
    try {
      const tag = await element.tagName();
      const id = await element.getAttribute("id");
      const name = await element.getAttribute("name");
      const className = await element.getAttribute("class");
      const text = await element.innerText();

      let desc = `<${tag}`;
      if (id) desc += ` id='${id}'`;
      if (name) desc += ` name='${name}'`;
      if (className) {
        desc += ` class='${className.slice(0, DESCRIBE_LIMITS.CLASS_MAX)}'`;
      }
      desc += ">";
      if (text) desc += ` text='${text.slice(0, DESCRIBE_LIMITS.TEXT_MAX)}'`;

      return desc;
    } catch {
      return "[Unable to describe element]";
    }
  }

  /**
   * 현재 페이지 상태 로깅 (예외 없음)
   */
  async captureDiagnostics(): Promise<PageSnapshot> {
    const snapshot = await this.waiter.snapshot();
    let sourceLength: number | null = null;
    try {
      sourceLength = (await this.session.pageSource()).length;
    } catch (error) {
      this.logger.debug({ error }, "페이지 소스 조회 실패");
    }

    this.logger.warn({ ...snapshot, sourceLength }, "진단 정보");
    return snapshot;
  }

  // ==================== 내부 ====================

  /**
   * 로그 라벨 결정: 명시 라벨 → Locator 설명 → 요소 설명
   */
  protected async labelFor(
    target: WaitTarget,
    label: string | undefined,
  ): Promise<string> {
    if (label) return label;
    if (isLocator(target)) return describeLocator(target);
    return this.describeElement(target);
  }

  /**
   * 요소 핸들은 재조회할 수 없으므로 대기 없이 같은 핸들로 재시도
   */
  private async withStaleRetry(
    target: WaitTarget,
    label: string,
    action: ActionKind,
    acquire: () => Promise<IElementHandle>,
    perform: (element: IElementHandle) => Promise<void>,
  ): Promise<void> {
    const element = await acquire();
    try {
      await perform(element);
      return;
    } catch (error) {
      if (!(error instanceof StaleElementError)) {
        throw await this.actionFailed(label, action, 1, error);
      }
      this.logger.warn({ target: label, action }, "Stale 요소 - 재시도");
    }

    const retried = isLocator(target) ? await acquire() : element;
    try {
      await perform(retried);
    } catch (error) {
      throw await this.actionFailed(label, action, 2, error);
    }
  }

  private async actionFailed(
    label: string,
    action: ActionKind,
    attempts: number,
    cause: unknown,
  ): Promise<ActionFailedError> {
    const snapshot = await this.captureDiagnostics();
    const error = new ActionFailedError(label, action, attempts, {
      cause,
      snapshot,
    });
    this.logger.error(error.toLogObject(), "요소 조작 실패");
    return error;
  }
}
