/**
 * PageActions 테스트
 *
 * stale 재시도, 실패 보고, 즉시 조회, 진단 문자열 검증
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import pino from "pino";
import { By } from "@/core/domain/Locator";
import {
  ActionFailedError,
  WaitTimeoutError,
} from "@/core/errors/AutomationError";
import { StaleElementError } from "@/core/errors/DriverErrors";
import { PageActions } from "@/pages/base/PageActions";
import {
  FakeDriverSession,
  FakeElementHandle,
  FakeNode,
} from "../../fakes/FakeDriver";

const silent = pino({ level: "silent" });
const SUBMIT = By.css("button[type='submit']", "Submit");
const FIELD = By.css("input[name='s']", "Search Input");

describe("PageActions", () => {
  let session: FakeDriverSession;
  let actions: PageActions;

  beforeEach(() => {
    session = new FakeDriverSession();
    session.url = "https://blog.test/";
    session.pageTitle = "Blog";
    actions = new PageActions(session, silent, {
      timeoutMs: 300,
      pollIntervalMs: 50,
    });
  });

  describe("click", () => {
    it("clickable 대기 후 한 번 클릭", async () => {
      const button = new FakeNode({ tag: "button" });
      session.query(SUBMIT, [button]);

      await actions.click(SUBMIT);

      expect(button.count("click")).toBe(1);
    });

    it("stale 발생 시 재조회한 요소로 재시도", async () => {
      const old = new FakeNode({ tag: "button" }).failOn(
        "click",
        new StaleElementError("detached"),
      );
      const fresh = new FakeNode({ tag: "button" });
      let lookups = 0;
      session.query(SUBMIT, () => (lookups++ === 0 ? [old] : [fresh]));

      await actions.click(SUBMIT);

      expect(old.count("click")).toBe(1);
      expect(fresh.count("click")).toBe(1);
    });

    it("두 번째 시도도 실패하면 attempts 2", async () => {
      const button = new FakeNode({ tag: "button" }).failOn(
        "click",
        new StaleElementError("detached"),
        new StaleElementError("detached again"),
      );
      session.query(SUBMIT, [button]);

      const promise = actions.click(SUBMIT);

      await expect(promise).rejects.toBeInstanceOf(ActionFailedError);
      await expect(promise).rejects.toThrow(
        "FAILED: Could not click 'Submit' after 2 attempt(s). Error: detached again",
      );
      expect(button.count("click")).toBe(2);
    });

    it("stale이 아닌 실패는 재시도 없이 attempts 1", async () => {
      const button = new FakeNode({ tag: "button" }).failOn(
        "click",
        new Error("element click intercepted"),
      );
      session.query(SUBMIT, [button]);

      await expect(actions.click(SUBMIT)).rejects.toMatchObject({
        attempts: 1,
        action: "click",
        target: "Submit",
        snapshot: { url: "https://blog.test/", title: "Blog" },
      });
      expect(button.count("click")).toBe(1);
    });

    it("대기 실패는 WaitTimeoutError 그대로 전파", async () => {
      await expect(actions.click(SUBMIT)).rejects.toBeInstanceOf(
        WaitTimeoutError,
      );
    });

    it("요소 핸들 대상은 요소 설명을 라벨로 사용", async () => {
      const node = new FakeNode({ tag: "button", text: "Go" }).failOn(
        "click",
        new Error("intercepted"),
      );

      await expect(
        actions.click(new FakeElementHandle(node)),
      ).rejects.toThrow(
        "FAILED: Could not click '<button> text='Go'' after 1 attempt(s). Error: intercepted",
      );
    });

    it("요소 핸들이 stale이면 재대기 없이 attempts 2", async () => {
      const node = new FakeNode({ tag: "a", text: "Post" }).failOn(
        "click",
        new StaleElementError("detached"),
        new StaleElementError("detached again"),
      );
      const started = Date.now();

      const promise = actions.click(new FakeElementHandle(node), {
        label: "Post Link",
      });

      await expect(promise).rejects.toBeInstanceOf(ActionFailedError);
      await expect(promise).rejects.toThrow(
        "FAILED: Could not click 'Post Link' after 2 attempt(s). Error: detached again",
      );
      expect(Date.now() - started).toBeLessThan(300);
      expect(node.count("click")).toBe(2);
      expect(node.count("isDisplayed")).toBe(1);
    });

    it("요소 핸들은 같은 핸들로 한 번 재시도", async () => {
      const node = new FakeNode({ tag: "a", text: "Post" }).failOn(
        "click",
        new StaleElementError("detached"),
      );

      await actions.click(new FakeElementHandle(node), { label: "Post Link" });

      expect(node.count("click")).toBe(2);
    });
  });

  describe("type", () => {
    it("기존 값을 비우고 입력", async () => {
      const input = new FakeNode({ tag: "input" });
      input.value = "old keyword";
      session.query(FIELD, [input]);

      await actions.type(FIELD, "BDD");

      expect(input.value).toBe("BDD");
      expect(input.calls.filter((c) => c === "clear" || c === "type")).toEqual([
        "clear",
        "type",
      ]);
    });

    it("입력 중 stale 발생 시 한 번 재시도", async () => {
      const input = new FakeNode({ tag: "input" }).failOn(
        "type",
        new StaleElementError("re-rendered"),
      );
      session.query(FIELD, [input]);

      await actions.type(FIELD, "Python");

      expect(input.value).toBe("Python");
      expect(input.count("clear")).toBe(2);
    });
  });

  describe("readText", () => {
    it("표시된 요소의 텍스트 반환", async () => {
      session.query(FIELD, [new FakeNode({ text: "Automation Panda" })]);

      expect(await actions.readText(FIELD)).toBe("Automation Panda");
    });

    it("텍스트 조회 실패는 ActionFailedError", async () => {
      session.query(FIELD, [
        new FakeNode().failOn("innerText", new Error("boom")),
      ]);

      await expect(actions.readText(FIELD)).rejects.toThrow(
        "FAILED: Could not readText 'Search Input' after 1 attempt(s). Error: boom",
      );
    });
  });

  describe("isDisplayed", () => {
    it("대기 없이 현재 상태 반환", async () => {
      expect(await actions.isDisplayed(FIELD)).toBe(false);
      expect(session.lookupCount(FIELD)).toBe(1);

      session.query(FIELD, [new FakeNode({ visible: false })]);
      expect(await actions.isDisplayed(FIELD)).toBe(false);

      session.query(FIELD, [new FakeNode()]);
      expect(await actions.isDisplayed(FIELD)).toBe(true);
    });

    it("조회 에러도 false", async () => {
      session.query(FIELD, [
        new FakeNode().failOn("isDisplayed", new Error("crashed")),
      ]);

      expect(await actions.isDisplayed(FIELD)).toBe(false);
    });
  });

  describe("highlight", () => {
    it("하이라이트 후 원래 style 복원", async () => {
      const node = new FakeNode({ attrs: { style: "color: blue;" } });
      session.query(FIELD, [node]);

      await actions.highlight(FIELD, { durationMs: 10 });

      expect(node.styleHistory).toEqual([
        "color: blue; border: 3px solid red; background-color: yellow;",
        "color: blue;",
      ]);
      expect(node.attrs.get("style")).toBe("color: blue;");
    });

    it("style이 없던 요소는 속성 제거로 복원", async () => {
      const node = new FakeNode();
      session.query(FIELD, [node]);

      await actions.highlight(FIELD, { durationMs: 10 });

      expect(node.styleHistory[0]).toBe(
        "border: 3px solid red; background-color: yellow;",
      );
      expect(node.attrs.has("style")).toBe(false);
    });

    it("요소가 없어도 예외 없음", async () => {
      await expect(actions.highlight(FIELD)).resolves.toBeUndefined();
    });
  });

  describe("waitForPageLoad", () => {
    it("readyState complete까지 대기", async () => {
      session.readyStates = ["loading", "interactive", "complete"];

      expect(await actions.waitForPageLoad(300)).toBe(true);
    });

    it("타임아웃 시 false (예외 없음)", async () => {
      session.readyStates = ["loading"];

      expect(await actions.waitForPageLoad(200)).toBe(false);
    });
  });

  it("navigateTo: 이동 후 로드 대기", async () => {
    await actions.navigateTo("https://blog.test/contact/");

    expect(session.navigations).toEqual(["https://blog.test/contact/"]);
    expect(await actions.getCurrentUrl()).toBe("https://blog.test/contact/");
    expect(await actions.getTitle()).toBe("Blog");
  });

  it("count: 즉시 조회 개수", async () => {
    session.query(FIELD, [new FakeNode(), new FakeNode()]);

    expect(await actions.count(FIELD)).toBe(2);
  });

  describe("describeElement", () => {
    it("태그, 속성, 잘린 텍스트 포함", async () => {
      const node = new FakeNode({
        tag: "input",
        text: "Type keywords here please",
        attrs: { id: "s", name: "s", class: "search-field" },
      });

      expect(await actions.describeElement(new FakeElementHandle(node))).toBe(
        "<input id='s' name='s' class='search-field'> text='Type keywords here p'",
      );
    });

    it("class는 30자까지", async () => {
      const node = new FakeNode({
        tag: "div",
        attrs: { class: "entry-content clear wide-layout-column" },
      });

      expect(await actions.describeElement(new FakeElementHandle(node))).toBe(
        "<div class='entry-content clear wide-layou'>",
      );
    });

    it("조회 실패 시 대체 문자열", async () => {
      const node = new FakeNode();
      node.stale = true;

      expect(await actions.describeElement(new FakeElementHandle(node))).toBe(
        "[Unable to describe element]",
      );
    });
  });

  it("captureDiagnostics: 현재 페이지 스냅샷 반환", async () => {
    expect(await actions.captureDiagnostics()).toEqual({
      url: "https://blog.test/",
      title: "Blog",
    });
  });
});
