/**
 * Playwright Driver Session
 *
 * SOLID 원칙:
 * - SRP: playwright-core Page/ElementHandle → 드라이버 인터페이스 변환만 담당
 * - LSP: IDriverSession 계약 준수 (분리된 요소 → StaleElementError)
 */

import type {
  Browser,
  BrowserContext,
  ElementHandle,
  Page,
} from "playwright-core";
import { v7 as uuidv7 } from "uuid";
import type { Locator } from "@/core/domain/Locator";
import { StaleElementError } from "@/core/errors/DriverErrors";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import type { IElementHandle } from "@/core/interfaces/IElementHandle";

type DomHandle = ElementHandle<SVGElement | HTMLElement>;

/**
 * 분리된 요소 / 파괴된 실행 컨텍스트 에러 메시지
 */
const STALE_PATTERNS = [
  "not attached to the DOM",
  "Element is detached",
  "is disposed",
  "Execution context was destroyed",
];

/**
 * Locator → Playwright 셀렉터 문자열
 */
export function toSelector(locator: Locator): string {
  return `${locator.strategy}=${locator.selector}`;
}

/**
 * Playwright 에러 → StaleElementError 변환
 */
export function translateError(error: unknown): unknown {
  if (
    error instanceof Error &&
    STALE_PATTERNS.some((pattern) => error.message.includes(pattern))
  ) {
    return new StaleElementError(error.message);
  }
  return error;
}

async function guard<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateError(error);
  }
}

/**
 * Playwright ElementHandle 래퍼
 */
export class PlaywrightElementHandle implements IElementHandle {
  constructor(private readonly handle: DomHandle) {}

  tagName(): Promise<string> {
    return guard(() => this.handle.evaluate((el) => el.tagName.toLowerCase()));
  }

  getAttribute(name: string): Promise<string | null> {
    return guard(() => this.handle.getAttribute(name));
  }

  innerText(): Promise<string> {
    return guard(() => this.handle.innerText());
  }

  isDisplayed(): Promise<boolean> {
    return guard(() => this.handle.isVisible());
  }

  isEnabled(): Promise<boolean> {
    return guard(() => this.handle.isEnabled());
  }

  click(): Promise<void> {
    return guard(() => this.handle.click());
  }

  clear(): Promise<void> {
    return guard(() => this.handle.fill(""));
  }

  type(text: string): Promise<void> {
    return guard(() => this.handle.type(text));
  }

  submit(): Promise<void> {
    return guard(() => this.handle.press("Enter"));
  }

  scrollIntoView(): Promise<void> {
    return guard(() => this.handle.scrollIntoViewIfNeeded());
  }

  setAttribute(name: string, value: string): Promise<void> {
    return guard(() =>
      this.handle.evaluate(
        (el, attr) => {
          if (attr.value === "") {
            el.removeAttribute(attr.name);
          } else {
            el.setAttribute(attr.name, attr.value);
          }
        },
        { name, value },
      ),
    );
  }

  async findElements(locator: Locator): Promise<IElementHandle[]> {
    const handles = await guard(() => this.handle.$$(toSelector(locator)));
    return handles.map((handle) => new PlaywrightElementHandle(handle));
  }
}

/**
 * Playwright Page 기반 세션
 */
export class PlaywrightDriverSession implements IDriverSession {
  readonly id: string = uuidv7();

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  readyState(): Promise<string> {
    return guard(() => this.page.evaluate(() => document.readyState));
  }

  async findElements(locator: Locator): Promise<IElementHandle[]> {
    const handles = await guard(() => this.page.$$(toSelector(locator)));
    return handles.map((handle) => new PlaywrightElementHandle(handle));
  }

  screenshot(): Promise<Buffer> {
    // 화면 크기만 캡처 (전체 페이지 X)
    return this.page.screenshot({ type: "png", fullPage: false });
  }

  pageSource(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}
