/**
 * ElementWaiter 테스트
 *
 * 짧은 타임아웃(300ms) / 폴링(50ms)으로 실제 시간 기반 검증
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import pino from "pino";
import { By } from "@/core/domain/Locator";
import { WaitTimeoutError } from "@/core/errors/AutomationError";
import {
  NoSuchElementError,
  StaleElementError,
} from "@/core/errors/DriverErrors";
import { ElementWaiter, takeSnapshot } from "@/pages/base/ElementWaiter";
import {
  FakeDriverSession,
  FakeElementHandle,
  FakeNode,
} from "../../fakes/FakeDriver";

const silent = pino({ level: "silent" });
const FAST = { timeoutMs: 300, pollIntervalMs: 50 };
const TITLE = By.css("h1.site-title", "Site Title");
// 타이머 지연 허용치
const TIMER_SLACK_MS = 100;

class UnreachableSession extends FakeDriverSession {
  async currentUrl(): Promise<string> {
    throw new Error("session closed");
  }

  async title(): Promise<string> {
    throw new Error("session closed");
  }
}

describe("ElementWaiter", () => {
  let session: FakeDriverSession;
  let waiter: ElementWaiter;

  beforeEach(() => {
    session = new FakeDriverSession();
    session.url = "https://blog.test/";
    session.pageTitle = "Blog";
    waiter = new ElementWaiter(session, silent, FAST);
  });

  describe("resolve", () => {
    it("옵션이 없으면 생성자 기본값 사용", () => {
      expect(waiter.resolve()).toEqual(FAST);
      expect(waiter.resolve({ timeoutMs: 1000 })).toEqual({
        timeoutMs: 1000,
        pollIntervalMs: 50,
      });
    });
  });

  describe("until", () => {
    it("조건이 이미 충족되면 한 번만 평가", async () => {
      let calls = 0;
      const value = await waiter.until("ready", async () => {
        calls++;
        return "ok";
      });

      expect(value).toBe("ok");
      expect(calls).toBe(1);
    });

    it("타임아웃 이후 null 반환 (타임아웃 + 폴링 간격 이내)", async () => {
      let calls = 0;
      const started = Date.now();
      const value = await waiter.until("never", async () => {
        calls++;
        return null;
      });

      const elapsed = Date.now() - started;
      expect(value).toBeNull();
      expect(elapsed).toBeGreaterThanOrEqual(300);
      expect(elapsed).toBeLessThan(300 + 50 + TIMER_SLACK_MS);
      expect(calls).toBeGreaterThan(1);
    });

    it("일시적 조회 에러는 미충족으로 취급", async () => {
      const errors = [
        new NoSuchElementError("missing"),
        new StaleElementError("detached"),
      ];
      const value = await waiter.until("eventually", async () => {
        const next = errors.shift();
        if (next) throw next;
        return 7;
      });

      expect(value).toBe(7);
    });

    it("그 외 에러는 즉시 전파", async () => {
      await expect(
        waiter.until("broken", async () => {
          throw new Error("browser crashed");
        }),
      ).rejects.toThrow("browser crashed");
    });
  });

  describe("waitForVisible", () => {
    it("나중에 표시되는 요소 대기", async () => {
      const node = new FakeNode({ tag: "h1", visible: false });
      session.query(TITLE, [node]);
      setTimeout(() => {
        node.visible = true;
      }, 100);

      const element = await waiter.waitForVisible(TITLE);

      expect(element).toBeInstanceOf(FakeElementHandle);
      expect(element instanceof FakeElementHandle ? element.node : null).toBe(node);
    });

    it("매 폴링마다 Locator 재조회", async () => {
      const replacement = new FakeNode({ tag: "h1" });
      let lookups = 0;
      session.query(TITLE, () => {
        lookups++;
        return lookups < 3 ? [] : [replacement];
      });

      await waiter.waitForVisible(TITLE);

      expect(session.lookupCount(TITLE)).toBe(3);
    });

    it("타임아웃 시 현재 페이지 정보가 담긴 WaitTimeoutError", async () => {
      session.query(TITLE, [new FakeNode({ visible: false })]);
      const started = Date.now();

      const promise = waiter.waitForVisible(TITLE);

      await expect(promise).rejects.toBeInstanceOf(WaitTimeoutError);
      const elapsed = Date.now() - started;
      expect(elapsed).toBeGreaterThanOrEqual(300);
      expect(elapsed).toBeLessThan(300 + 50 + TIMER_SLACK_MS);
      await expect(promise).rejects.toThrow(
        "TIMEOUT: 'Site Title' not visible within 300ms. Current URL: https://blog.test/ | Title: Blog",
      );
    });

    it("라벨이 있으면 라벨로 보고", async () => {
      await expect(
        waiter.waitForVisible(TITLE, { label: "Header", timeoutMs: 100 }),
      ).rejects.toThrow("TIMEOUT: 'Header' not visible within 100ms.");
    });
  });

  describe("waitForClickable", () => {
    it("표시 + 활성 요소 반환", async () => {
      const node = new FakeNode({ tag: "input", enabled: false });
      session.query(TITLE, [node]);
      setTimeout(() => {
        node.enabled = true;
      }, 100);

      await expect(waiter.waitForClickable(TITLE)).resolves.toBeInstanceOf(
        FakeElementHandle,
      );
    });

    it("비활성 상태 유지 시 clickable 타임아웃", async () => {
      session.query(TITLE, [new FakeNode({ enabled: false })]);

      await expect(waiter.waitForClickable(TITLE)).rejects.toThrow(
        "TIMEOUT: 'Site Title' not clickable within 300ms.",
      );
    });
  });

  describe("waitForAbsent", () => {
    it("요소가 없으면 즉시 true", async () => {
      expect(await waiter.waitForAbsent(TITLE)).toBe(true);
    });

    it("숨겨지면 true", async () => {
      const node = new FakeNode();
      session.query(TITLE, [node]);
      setTimeout(() => {
        node.visible = false;
      }, 100);

      expect(await waiter.waitForAbsent(TITLE)).toBe(true);
    });

    it("stale 요소 핸들은 사라진 것으로 판정", async () => {
      const node = new FakeNode();
      node.stale = true;

      expect(await waiter.waitForAbsent(new FakeElementHandle(node))).toBe(true);
    });

    it("계속 표시되면 false (기본)", async () => {
      session.query(TITLE, [new FakeNode()]);

      expect(await waiter.waitForAbsent(TITLE)).toBe(false);
    });

    it("strict 옵션이면 WaitTimeoutError", async () => {
      session.query(TITLE, [new FakeNode()]);

      await expect(
        waiter.waitForAbsent(TITLE, { strict: true }),
      ).rejects.toThrow("TIMEOUT: 'Site Title' not absent within 300ms.");
    });
  });

  describe("waitForText", () => {
    it("텍스트 포함 시 true", async () => {
      session.query(TITLE, [new FakeNode({ text: "Sorry, no results found" })]);

      expect(await waiter.waitForText(TITLE, "no results")).toBe(true);
    });

    it("대소문자 구분", async () => {
      session.query(TITLE, [new FakeNode({ text: "No Results" })]);

      expect(await waiter.waitForText(TITLE, "no results")).toBe(false);
    });

    it("strict 옵션이면 textContains 타임아웃", async () => {
      session.query(TITLE, [new FakeNode({ text: "Automation Panda" })]);

      await expect(
        waiter.waitForText(TITLE, "Python", { strict: true }),
      ).rejects.toThrow("TIMEOUT: 'Site Title' not textContains within 300ms.");
    });
  });

  describe("resolveTarget", () => {
    it("요소 핸들은 그대로 반환", async () => {
      const handle = new FakeElementHandle(new FakeNode());

      expect(await waiter.resolveTarget(handle)).toBe(handle);
    });

    it("일치 요소가 없으면 NoSuchElementError", async () => {
      await expect(waiter.resolveTarget(TITLE)).rejects.toThrow(
        new NoSuchElementError("No element matches Site Title"),
      );
    });
  });

  describe("describe", () => {
    it("라벨 → Locator 설명 → element", () => {
      expect(waiter.describe(TITLE, { label: "Header" })).toBe("Header");
      expect(waiter.describe(By.css("#main"))).toBe("css=#main");
      expect(waiter.describe(new FakeElementHandle(new FakeNode()))).toBe(
        "element",
      );
    });
  });

  describe("takeSnapshot", () => {
    it("URL과 제목 반환", async () => {
      expect(await takeSnapshot(session)).toEqual({
        url: "https://blog.test/",
        title: "Blog",
      });
    });

    it("조회 실패 항목은 unknown", async () => {
      expect(await takeSnapshot(new UnreachableSession())).toEqual({
        url: "unknown",
        title: "unknown",
      });
    });
  });
});
