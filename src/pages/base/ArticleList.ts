/**
 * Article List Section
 *
 * 홈 / 검색 결과 페이지가 공유하는 게시글 목록 처리
 *
 * 제목 추출:
 * 1. article 컨테이너 → 내부 .entry-title (기본)
 * 2. 평면 제목 Locator (fallback)
 * - trim 후 빈 제목 제외, 문서 순서 유지, 중복 제거 없음
 *
 * 제목 클릭: 완전 일치 → 부분 일치 → 구조적 XPath → NotFoundError
 */

import { By, Locator, xpathLiteral } from "@/core/domain/Locator";
import {
  IndexOutOfRangeError,
  NotFoundError,
} from "@/core/errors/AutomationError";
import { isTransientLookupError } from "@/core/errors/DriverErrors";
import type { IElementHandle } from "@/core/interfaces/IElementHandle";
import type { Logger } from "@/config/logger";
import { LocatorChain } from "./LocatorChain";
import type { PageActions } from "./PageActions";
import { matchTitle } from "./TitleMatcher";

/**
 * 목록 Locator 묶음
 */
export interface ArticleListLocators {
  /** 게시글 컨테이너 */
  articles: Locator;
  /** 컨테이너 내부 제목 */
  nestedTitle: Locator;
  /** 평면 제목 (fallback) */
  flatTitles: Locator;
}

/**
 * 제목 요소 + 텍스트
 */
export interface TitleEntry {
  element: IElementHandle;
  title: string;
}

const LINK_ANCESTOR = By.xpath(
  "./ancestor-or-self::a[1]",
  "Title Link (ancestor)",
);
const LINK_DESCENDANT = By.css("a", "Title Link (descendant)");

export class ArticleList {
  constructor(
    private readonly name: string,
    private readonly actions: PageActions,
    private readonly locators: ArticleListLocators,
    private readonly logger: Logger,
  ) {}

  /**
   * 제목 요소 목록
   */
  async entries(): Promise<TitleEntry[]> {
    const result = await new LocatorChain<TitleEntry>(
      `${this.name} titles`,
      this.logger,
    )
      .step("article-nested", () => this.nestedEntries())
      .step("flat", async () =>
        collectEntries(await this.actions.findAll(this.locators.flatTitles)),
      )
      .run();

    return result.items;
  }

  async titles(): Promise<string[]> {
    return (await this.entries()).map((entry) => entry.title);
  }

  /**
   * 게시글 컨테이너 개수
   */
  async count(): Promise<number> {
    return this.actions.count(this.locators.articles);
  }

  /**
   * 제목으로 클릭
   */
  async clickByTitle(title: string): Promise<void> {
    const entries = await this.entries();
    const titles = entries.map((entry) => entry.title);
    const query = title.trim();
    if (!query) {
      throw await this.notFound(title, titles);
    }

    const match = matchTitle(titles, query);

    if (match) {
      this.logger.info(
        {
          title,
          found: match.title,
          kind: match.kind,
          position: match.index + 1,
        },
        "제목 일치 게시글 발견",
      );
      await this.clickEntry(entries[match.index]);
      return;
    }

    const structural = By.xpath(
      `//a[contains(text(), ${xpathLiteral(query)})]`,
      `Link containing '${query}'`,
    );
    if (await this.actions.isDisplayed(structural)) {
      this.logger.info({ title }, "XPath fallback으로 링크 발견");
      await this.actions.click(structural);
      return;
    }

    throw await this.notFound(title, titles);
  }

  /**
   * 인덱스로 클릭 (0부터)
   */
  async clickByIndex(index: number): Promise<void> {
    const entries = await this.entries();

    if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
      const snapshot = await this.actions.captureDiagnostics();
      const error = new IndexOutOfRangeError(index, entries.length, {
        snapshot,
      });
      this.logger.error(error.toLogObject(), "인덱스 범위 초과");
      throw error;
    }

    await this.clickEntry(entries[index]);
  }

  private async notFound(
    title: string,
    titles: string[],
  ): Promise<NotFoundError> {
    const snapshot = await this.actions.captureDiagnostics();
    this.logger.error({ title, available: titles }, "제목 일치 게시글 없음");
    return new NotFoundError(title, titles, { snapshot });
  }

  private async nestedEntries(): Promise<TitleEntry[]> {
    const articles = await this.actions.findAll(this.locators.articles);
    const entries: TitleEntry[] = [];

    for (const [i, article] of articles.entries()) {
      try {
        const [titleElement] = await article.findElements(
          this.locators.nestedTitle,
        );
        if (!titleElement) continue;

        const title = (await titleElement.innerText()).trim();
        if (title) {
          entries.push({ element: titleElement, title });
        }
      } catch (error) {
        if (!isTransientLookupError(error)) throw error;
        this.logger.debug(
          { position: i + 1 },
          "게시글 제목 조회 실패 - 건너뜀",
        );
      }
    }

    return entries;
  }

  /**
   * 제목 요소의 링크 클릭
   * 링크: 상위 a → 하위 a → 제목 요소 자체
   */
  private async clickEntry(entry: TitleEntry): Promise<void> {
    const result = await new LocatorChain<IElementHandle>(
      `${this.name} link`,
      this.logger,
    )
      .step("ancestor", () => entry.element.findElements(LINK_ANCESTOR))
      .step("descendant", () => entry.element.findElements(LINK_DESCENDANT))
      .step("self", async () => [entry.element])
      .run();

    const [link] = result.items;
    const label = `Post Link: ${entry.title}`;

    await this.actions.scrollIntoView(link, { label });
    await this.actions.click(link, { label });
    this.logger.info(
      { title: entry.title, via: result.step },
      "게시글 클릭 완료",
    );
  }
}

/**
 * 요소 목록 → 비어있지 않은 제목 목록
 */
async function collectEntries(
  elements: IElementHandle[],
): Promise<TitleEntry[]> {
  const entries: TitleEntry[] = [];
  for (const element of elements) {
    try {
      const title = (await element.innerText()).trim();
      if (title) entries.push({ element, title });
    } catch (error) {
      if (!isTransientLookupError(error)) throw error;
    }
  }
  return entries;
}
