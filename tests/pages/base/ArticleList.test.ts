/**
 * ArticleList 테스트
 *
 * 제목 추출 전략, 제목/인덱스 클릭, 링크 선택 순서 검증
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import pino from "pino";
import { By } from "@/core/domain/Locator";
import {
  IndexOutOfRangeError,
  NotFoundError,
} from "@/core/errors/AutomationError";
import { StaleElementError } from "@/core/errors/DriverErrors";
import { ArticleList } from "@/pages/base/ArticleList";
import { PageActions } from "@/pages/base/PageActions";
import {
  FakeDriverSession,
  FakeNode,
  fakeArticle,
} from "../../fakes/FakeDriver";

const silent = pino({ level: "silent" });

const LOCATORS = {
  articles: By.css("article.post", "Articles"),
  nestedTitle: By.css(".entry-title", "Entry Title"),
  flatTitles: By.css("article .entry-title", "Flat Titles"),
};
const LINK_ANCESTOR = By.xpath("./ancestor-or-self::a[1]");
const LINK_DESCENDANT = By.css("a");

describe("ArticleList", () => {
  let session: FakeDriverSession;
  let list: ArticleList;

  beforeEach(() => {
    session = new FakeDriverSession();
    session.url = "https://blog.test/";
    const actions = new PageActions(session, silent, {
      timeoutMs: 300,
      pollIntervalMs: 50,
    });
    list = new ArticleList("TestPage", actions, LOCATORS, silent);
  });

  function publish(...titles: string[]) {
    const posts = titles.map((title) =>
      fakeArticle(title, LOCATORS.nestedTitle, LINK_DESCENDANT),
    );
    session.query(
      LOCATORS.articles,
      posts.map((post) => post.article),
    );
    return posts;
  }

  describe("titles", () => {
    it("article 내부 제목을 trim하여 문서 순서대로 반환", async () => {
      publish("  Getting Started with BDD ", "Python Testing 101", "   ");

      expect(await list.titles()).toEqual([
        "Getting Started with BDD",
        "Python Testing 101",
      ]);
    });

    it("중복 제목 유지", async () => {
      publish("Weekly Notes", "Weekly Notes");

      expect(await list.titles()).toEqual(["Weekly Notes", "Weekly Notes"]);
    });

    it("stale article은 건너뜀", async () => {
      const [first, second] = publish("First Post", "Second Post");
      first.article.failOn("findElements", new StaleElementError("detached"));

      expect(await list.titles()).toEqual(["Second Post"]);
      expect(second.heading.count("innerText")).toBe(1);
    });

    it("article이 없으면 평면 제목 사용", async () => {
      session.query(LOCATORS.flatTitles, [
        new FakeNode({ text: "Flat One" }),
        new FakeNode({ text: "" }),
        new FakeNode({ text: "Flat Two" }),
      ]);

      expect(await list.titles()).toEqual(["Flat One", "Flat Two"]);
    });
  });

  it("count: article 컨테이너 개수", async () => {
    publish("A", "B", "C");

    expect(await list.count()).toBe(3);
  });

  describe("clickByTitle", () => {
    it("완전 일치 게시글의 하위 링크 클릭", async () => {
      const [, python] = publish("Getting Started with BDD", "Python Testing 101");

      await list.clickByTitle("python testing 101");

      expect(python.link.count("click")).toBe(1);
      expect(python.link.count("scrollIntoView")).toBe(1);
    });

    it("부분 일치 (대소문자 무시)", async () => {
      const [bdd] = publish("Getting Started with BDD", "Python Testing 101");

      await list.clickByTitle("started");

      expect(bdd.link.count("click")).toBe(1);
    });

    it("상위 a가 있으면 상위 링크 우선", async () => {
      const [post] = publish("Wrapped Title");
      const anchor = new FakeNode({ tag: "a" });
      post.heading.query(LINK_ANCESTOR, [anchor]);

      await list.clickByTitle("Wrapped Title");

      expect(anchor.count("click")).toBe(1);
      expect(post.link.count("click")).toBe(0);
    });

    it("링크가 없으면 제목 요소 클릭", async () => {
      const heading = new FakeNode({ tag: "h2", text: "Plain Title" });
      const article = new FakeNode({ tag: "article" }).query(
        LOCATORS.nestedTitle,
        [heading],
      );
      session.query(LOCATORS.articles, [article]);

      await list.clickByTitle("Plain Title");

      expect(heading.count("click")).toBe(1);
    });

    it("목록에 없으면 구조적 XPath 링크 클릭", async () => {
      publish("Getting Started with BDD");
      const archive = new FakeNode({ tag: "a", text: "Andy's Archive" });
      session.query(
        By.xpath(`//a[contains(text(), "Andy's Archive")]`),
        [archive],
      );

      await list.clickByTitle("Andy's Archive");

      expect(archive.count("click")).toBe(1);
    });

    it("어디에도 없으면 사용 가능한 제목과 함께 NotFoundError", async () => {
      publish("Getting Started with BDD", "Python Testing 101");

      const promise = list.clickByTitle("Ruby");

      await expect(promise).rejects.toBeInstanceOf(NotFoundError);
      await expect(promise).rejects.toThrow(
        "Not found: 'Ruby'. Available titles: [Getting Started with BDD, Python Testing 101]",
      );
    });

    it("빈 제목은 링크를 클릭하지 않고 NotFoundError", async () => {
      publish("Getting Started with BDD");
      const home = new FakeNode({ tag: "a", text: "Home" });
      session.query(By.xpath("//a[contains(text(), '')]"), [home]);

      const promise = list.clickByTitle("   ");

      await expect(promise).rejects.toBeInstanceOf(NotFoundError);
      await expect(promise).rejects.toThrow(
        "Not found: '   '. Available titles: [Getting Started with BDD]",
      );
      expect(home.count("click")).toBe(0);
    });

    it("구조적 XPath에는 trim한 제목 사용", async () => {
      publish("Getting Started with BDD");
      const archive = new FakeNode({ tag: "a", text: "Archive" });
      session.query(By.xpath("//a[contains(text(), 'Archive')]"), [archive]);

      await list.clickByTitle("  Archive ");

      expect(archive.count("click")).toBe(1);
    });
  });

  describe("clickByIndex", () => {
    it("0부터 시작하는 인덱스로 클릭", async () => {
      const [, second] = publish("First Post", "Second Post");

      await list.clickByIndex(1);

      expect(second.link.count("click")).toBe(1);
    });

    it("범위 밖 인덱스는 IndexOutOfRangeError", async () => {
      publish("First Post", "Second Post", "Third Post");

      const promise = list.clickByIndex(5);

      await expect(promise).rejects.toBeInstanceOf(IndexOutOfRangeError);
      await expect(promise).rejects.toThrow(
        "INDEX OUT OF RANGE: Requested index 5, but only 3 results available",
      );
    });

    it("음수와 정수가 아닌 인덱스도 거부", async () => {
      publish("First Post");

      await expect(list.clickByIndex(-1)).rejects.toThrow(
        "INDEX OUT OF RANGE: Requested index -1, but only 1 results available",
      );
      await expect(list.clickByIndex(0.5)).rejects.toBeInstanceOf(
        IndexOutOfRangeError,
      );
    });
  });
});
