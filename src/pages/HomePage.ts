/**
 * HomePage
 *
 * 블로그 메인 페이지 (헤더, 네비게이션, 검색, 최근 게시글)
 */

import { By, xpathLiteral } from "@/core/domain/Locator";
import type { ResolvedWaitSettings } from "@/core/domain/WaitCondition";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import { PAGE_WAIT_CONFIG } from "@/config/constants";
import { logger as defaultLogger, Logger } from "@/config/logger";
import { createPageLogger, logImportant } from "@/utils/LoggerContext";
import { ArticleList } from "./base/ArticleList";
import { PageActions } from "./base/PageActions";
import { submitSearch } from "./base/searchBox";

/**
 * HomePage Locators
 */
export const HOME_LOCATORS = {
  siteTitle: By.css("h1.site-title", "Site Title (h1.site-title)"),
  siteDescription: By.css(
    "h2.site-description",
    "Site Description (h2.site-description)",
  ),
  navMenu: By.css(
    "nav#site-navigation.main-navigation",
    "Navigation Menu (nav#site-navigation)",
  ),
  navMenuItems: By.css(
    "#menu-primary .menu-item a",
    "Navigation Menu Items (#menu-primary .menu-item a)",
  ),
  searchIcon: By.css(
    "input.search-submit",
    "Search Submit Button (input.search-submit)",
  ),
  searchInput: By.css(
    "input.search-field[name='s']",
    "Search Input Field (input.search-field[name='s'])",
  ),
  articleEntries: By.css(
    "article.post, article.type-post",
    "Article Entries (article.post)",
  ),
  entryTitle: By.css(".entry-title", "Entry Title (.entry-title)"),
  recentPostTitles: By.css(
    "article.post .entry-title",
    "Recent Post Titles (article.post .entry-title)",
  ),
  mainContent: By.css(
    "#main, .site-main, main",
    "Main Content (#main, .site-main, main)",
  ),
  footer: By.css(
    "footer.site-footer, #colophon",
    "Footer (footer.site-footer, #colophon)",
  ),
} as const;

export class HomePage extends PageActions {
  private readonly articles: ArticleList;

  constructor(
    session: IDriverSession,
    logger: Logger = defaultLogger,
    waitDefaults: Partial<ResolvedWaitSettings> = {},
  ) {
    const pageLogger = createPageLogger(logger, "HomePage");
    super(session, pageLogger, waitDefaults);
    this.articles = new ArticleList(
      "HomePage",
      this,
      {
        articles: HOME_LOCATORS.articleEntries,
        nestedTitle: HOME_LOCATORS.entryTitle,
        flatTitles: HOME_LOCATORS.recentPostTitles,
      },
      pageLogger,
    );
  }

  /**
   * 사이트 제목 + 본문 영역 표시 여부
   */
  async isHomePageLoaded(): Promise<boolean> {
    try {
      await this.waitForPageLoad();

      const titlePresent = await this.isDisplayed(HOME_LOCATORS.siteTitle);
      const contentPresent = await this.isDisplayed(HOME_LOCATORS.mainContent);
      const loaded = titlePresent && contentPresent;

      if (loaded) {
        logImportant(this.logger, "홈페이지 로드 확인", {
          titlePresent,
          contentPresent,
        });
      } else {
        this.logger.warn(
          { titlePresent, contentPresent },
          "홈페이지 로드 미완료",
        );
        await this.captureDiagnostics();
      }
      return loaded;
    } catch (error) {
      this.logger.error({ error }, "홈페이지 로드 확인 실패");
      await this.captureDiagnostics();
      return false;
    }
  }

  async getHeaderTitle(): Promise<string> {
    const title = await this.readText(HOME_LOCATORS.siteTitle);
    this.logger.info({ title }, "헤더 제목 조회");
    return title;
  }

  /**
   * 사이트 설명 (없으면 빈 문자열)
   */
  async getSiteDescription(): Promise<string> {
    try {
      return await this.readText(HOME_LOCATORS.siteDescription);
    } catch (error) {
      this.logger.warn({ error }, "사이트 설명 없음");
      return "";
    }
  }

  /**
   * 검색 아이콘 클릭 (표시된 경우에만, 실패 무시)
   */
  async clickSearchIcon(): Promise<void> {
    try {
      if (await this.isDisplayed(HOME_LOCATORS.searchIcon)) {
        await this.click(HOME_LOCATORS.searchIcon);
      } else {
        this.logger.debug("검색 아이콘 없음 - 검색창이 이미 표시된 상태");
      }
    } catch (error) {
      this.logger.warn({ error }, "검색 아이콘 클릭 실패 - 무시");
    }
  }

  async searchFor(keyword: string): Promise<void> {
    this.logger.info({ keyword }, "검색 시작");
    await this.clickSearchIcon();
    await submitSearch(
      this,
      this.logger,
      HOME_LOCATORS.searchInput,
      keyword,
      PAGE_WAIT_CONFIG.SEARCH_INPUT,
    );
  }

  async getRecentPostTitles(): Promise<string[]> {
    try {
      await this.waitForPageLoad();
      const titles = await this.articles.titles();
      this.logger.info({ count: titles.length }, "최근 게시글 제목 조회");
      return titles;
    } catch (error) {
      this.logger.error({ error }, "최근 게시글 제목 조회 실패");
      await this.captureDiagnostics();
      return [];
    }
  }

  async clickOnPost(title: string): Promise<void> {
    await this.articles.clickByTitle(title);
  }

  async getNavigationMenuItems(): Promise<string[]> {
    try {
      const items: string[] = [];
      for (const element of await this.findAll(HOME_LOCATORS.navMenuItems)) {
        const text = (await element.innerText()).trim();
        if (text) items.push(text);
      }
      this.logger.info({ items }, "네비게이션 메뉴 조회");
      return items;
    } catch (error) {
      this.logger.error({ error }, "네비게이션 메뉴 조회 실패");
      await this.captureDiagnostics();
      return [];
    }
  }

  async clickNavigationMenuItem(text: string): Promise<void> {
    await this.click(
      By.xpath(
        `//nav//a[contains(text(), ${xpathLiteral(text)})]`,
        `Menu Item '${text}'`,
      ),
    );
    this.logger.info({ text }, "메뉴 클릭 완료");
  }

  async isNavigationMenuDisplayed(): Promise<boolean> {
    return this.isDisplayed(HOME_LOCATORS.navMenu);
  }

  async isFooterDisplayed(): Promise<boolean> {
    return this.isDisplayed(HOME_LOCATORS.footer);
  }

  async getPostCount(): Promise<number> {
    try {
      return await this.articles.count();
    } catch (error) {
      this.logger.error({ error }, "게시글 개수 조회 실패");
      return 0;
    }
  }
}
