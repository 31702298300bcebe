/**
 * SearchResultsPage
 *
 * 검색 결과 페이지 (결과 목록, 결과 없음 메시지, 페이지네이션)
 */

import { By } from "@/core/domain/Locator";
import type { ResolvedWaitSettings } from "@/core/domain/WaitCondition";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import { NO_RESULTS_VOCABULARY, PAGE_WAIT_CONFIG } from "@/config/constants";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { createPageLogger } from "@/utils/LoggerContext";
import { ArticleList } from "./base/ArticleList";
import { PageActions } from "./base/PageActions";
import { submitSearch } from "./base/searchBox";

/**
 * SearchResultsPage Locators
 */
export const SEARCH_LOCATORS = {
  container: By.css(
    "#main, .site-main, main",
    "Search Results Container (#main, .site-main, main)",
  ),
  pageTitle: By.css(
    ".page-title, .archive-title, h1.entry-title",
    "Search Page Title (.page-title, .archive-title, h1.entry-title)",
  ),
  articles: By.css(
    "article.post, article.type-post, .search-entry",
    "Search Result Articles (article.post)",
  ),
  entryTitle: By.css(".entry-title", "Entry Title (.entry-title)"),
  titles: By.css(
    "article .entry-title, .search-entry .entry-title",
    "Search Result Titles (article .entry-title)",
  ),
  excerpts: By.css(
    "article .entry-summary, article .entry-content, .search-entry .entry-excerpt",
    "Search Result Excerpts",
  ),
  noResultsMessage: By.css(
    ".no-results, .not-found, .entry-content p",
    "No Results Message (.no-results, .not-found)",
  ),
  searchInput: By.css(
    "input.search-field[name='s']",
    "Search Input (input.search-field[name='s'])",
  ),
  pagination: By.css(
    ".pagination, .nav-links, .page-numbers",
    "Pagination (.pagination, .nav-links)",
  ),
  nextPage: By.css(".next, .nav-next a, a.next", "Next Page Link"),
  prevPage: By.css(".prev, .nav-previous a, a.prev", "Previous Page Link"),
  loadingPlaceholder: By.css(
    "article.post:not(.post)",
    "Loading placeholder",
  ),
} as const;

/** 결과 없음 메시지에 포함되는 문구 (대소문자 구분) */
const NO_RESULTS_TEXT = "no results";

export class SearchResultsPage extends PageActions {
  private readonly articles: ArticleList;

  constructor(
    session: IDriverSession,
    logger: Logger = defaultLogger,
    waitDefaults: Partial<ResolvedWaitSettings> = {},
  ) {
    const pageLogger = createPageLogger(logger, "SearchResultsPage");
    super(session, pageLogger, waitDefaults);
    this.articles = new ArticleList(
      "SearchResultsPage",
      this,
      {
        articles: SEARCH_LOCATORS.articles,
        nestedTitle: SEARCH_LOCATORS.entryTitle,
        flatTitles: SEARCH_LOCATORS.titles,
      },
      pageLogger,
    );
  }

  /**
   * 결과 영역 표시 AND (결과 존재 OR 결과 없음 메시지)
   */
  async isSearchResultsDisplayed(): Promise<boolean> {
    try {
      await this.waitForPageLoad();

      const currentUrl = await this.getCurrentUrl();
      const isSearchUrl =
        currentUrl.includes("?s=") || currentUrl.includes("search");
      const containerPresent = await this.isDisplayed(
        SEARCH_LOCATORS.container,
      );

      const placeholderGone = await this.waiter.waitForAbsent(
        SEARCH_LOCATORS.loadingPlaceholder,
        PAGE_WAIT_CONFIG.SEARCH_LOADING,
      );
      const hasResults =
        placeholderGone && (await this.count(SEARCH_LOCATORS.articles)) > 0;
      const hasNoResultsMessage = hasResults
        ? false
        : await this.waiter.waitForText(
            SEARCH_LOCATORS.noResultsMessage,
            NO_RESULTS_TEXT,
            PAGE_WAIT_CONFIG.NO_RESULTS_TEXT,
          );

      const displayed = containerPresent && (hasResults || hasNoResultsMessage);
      this.logger.info(
        {
          displayed,
          isSearchUrl,
          containerPresent,
          hasResults,
          hasNoResultsMessage,
        },
        "검색 결과 표시 확인",
      );

      if (!displayed) {
        await this.captureDiagnostics();
      }
      return displayed;
    } catch (error) {
      this.logger.error({ error }, "검색 결과 표시 확인 실패");
      await this.captureDiagnostics();
      return false;
    }
  }

  async getSearchResultsCount(): Promise<number> {
    try {
      await this.waitForPageLoad();
      const count = await this.articles.count();
      this.logger.info({ count }, "검색 결과 개수");
      return count;
    } catch (error) {
      this.logger.error({ error }, "검색 결과 개수 조회 실패");
      return 0;
    }
  }

  async getSearchResultTitles(): Promise<string[]> {
    try {
      await this.waitForPageLoad();
      const titles = await this.articles.titles();
      this.logger.info({ titles }, "검색 결과 제목 조회");
      return titles;
    } catch (error) {
      this.logger.error({ error }, "검색 결과 제목 조회 실패");
      await this.captureDiagnostics();
      return [];
    }
  }

  /**
   * 인덱스(0부터)로 결과 클릭
   */
  async clickOnResult(index: number): Promise<void> {
    await this.waitForPageLoad();
    await this.articles.clickByIndex(index);
  }

  async clickOnResultByTitle(title: string): Promise<void> {
    await this.waitForPageLoad();
    await this.articles.clickByTitle(title);
  }

  /**
   * 검색 페이지 제목 (없으면 빈 문자열)
   */
  async getSearchPageTitle(): Promise<string> {
    try {
      return await this.readText(SEARCH_LOCATORS.pageTitle);
    } catch (error) {
      this.logger.warn({ error }, "검색 페이지 제목 조회 실패");
      return "";
    }
  }

  /**
   * 결과 없음 메시지 어휘 일치 OR 결과 0개
   */
  async hasNoResults(): Promise<boolean> {
    try {
      await this.waitForPageLoad();

      if (await this.isDisplayed(SEARCH_LOCATORS.noResultsMessage)) {
        const message = await this.readText(SEARCH_LOCATORS.noResultsMessage);
        if (matchesNoResultsVocabulary(message)) {
          this.logger.info({ message }, "결과 없음 메시지 확인");
          return true;
        }
      }

      const count = await this.articles.count();
      this.logger.info({ count, noResults: count === 0 }, "결과 없음 여부");
      return count === 0;
    } catch (error) {
      this.logger.error({ error }, "결과 없음 확인 실패");
      return false;
    }
  }

  async searchAgain(keyword: string): Promise<void> {
    this.logger.info({ keyword }, "재검색 시작");
    await submitSearch(
      this,
      this.logger,
      SEARCH_LOCATORS.searchInput,
      keyword,
      PAGE_WAIT_CONFIG.SEARCH_AGAIN_INPUT,
    );
  }

  async hasPagination(): Promise<boolean> {
    return this.isDisplayed(SEARCH_LOCATORS.pagination);
  }

  /**
   * 다음 페이지 이동 (링크 없으면 false)
   */
  async goToNextPage(): Promise<boolean> {
    return this.followPageLink("next");
  }

  /**
   * 이전 페이지 이동 (링크 없으면 false)
   */
  async goToPreviousPage(): Promise<boolean> {
    return this.followPageLink("previous");
  }

  async getSearchResultExcerpts(): Promise<string[]> {
    try {
      const excerpts: string[] = [];
      for (const element of await this.findAll(SEARCH_LOCATORS.excerpts)) {
        const excerpt = (await element.innerText()).trim();
        if (excerpt) excerpts.push(excerpt);
      }
      this.logger.info({ count: excerpts.length }, "검색 결과 요약 조회");
      return excerpts;
    } catch (error) {
      this.logger.error({ error }, "검색 결과 요약 조회 실패");
      return [];
    }
  }

  /**
   * 결과 제목 중 키워드 포함 여부 (대소문자 무시)
   */
  async isKeywordInResults(keyword: string): Promise<boolean> {
    const titles = await this.getSearchResultTitles();
    const needle = keyword.toLowerCase();
    const found = titles.find((title) => title.toLowerCase().includes(needle));

    if (found === undefined) {
      this.logger.info({ keyword, titles }, "키워드 포함 결과 없음");
      return false;
    }
    this.logger.info({ keyword, title: found }, "키워드 포함 결과 발견");
    return true;
  }

  private async followPageLink(
    direction: "next" | "previous",
  ): Promise<boolean> {
    const link =
      direction === "next"
        ? SEARCH_LOCATORS.nextPage
        : SEARCH_LOCATORS.prevPage;
    try {
      if (!(await this.isDisplayed(link))) {
        this.logger.info({ direction }, "페이지 이동 링크 없음");
        return false;
      }
      await this.click(link);
      await this.waitForPageLoad();
      this.logger.info(
        { direction, url: await this.getCurrentUrl() },
        "페이지 이동 완료",
      );
      return true;
    } catch (error) {
      this.logger.error({ direction, error }, "페이지 이동 실패");
      return false;
    }
  }
}

/**
 * 결과 없음 어휘 일치 (대소문자 무시 부분 일치)
 */
export function matchesNoResultsVocabulary(message: string): boolean {
  const lower = message.toLowerCase();
  return NO_RESULTS_VOCABULARY.some((word) => lower.includes(word));
}
