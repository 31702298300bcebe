/**
 * Scenario World
 *
 * 시나리오마다 새 인스턴스 (cucumber-js)
 * 실행 단위 ID, 상태 머신, 세션, 페이지 모델 보관
 */

import { IWorldOptions, World, setWorldConstructor } from "@cucumber/cucumber";
import type { ResolvedWaitSettings } from "@/core/domain/WaitCondition";
import type { IDriverSession } from "@/core/interfaces/IDriverSession";
import { logger, Logger } from "@/config/logger";
import { ContactPage } from "@/pages/ContactPage";
import { HomePage } from "@/pages/HomePage";
import { SearchResultsPage } from "@/pages/SearchResultsPage";
import { ScenarioLifecycle } from "@/session/ScenarioLifecycle";
import { createScenarioLogger } from "@/utils/LoggerContext";
import { SuiteRuntime, getRuntime } from "./support/runtime";

export class SuiteWorld extends World {
  unitId = "";
  scenarioLogger: Logger = logger;
  lifecycle: ScenarioLifecycle = new ScenarioLifecycle("", logger);
  private session: IDriverSession | null = null;
  private pages: {
    home?: HomePage;
    searchResults?: SearchResultsPage;
    contact?: ContactPage;
  } = {};

  constructor(options: IWorldOptions) {
    super(options);
  }

  get runtime(): SuiteRuntime {
    return getRuntime();
  }

  /**
   * 시나리오 시작 준비 (Before 훅)
   */
  begin(unitId: string, scenario: string): void {
    this.unitId = unitId;
    this.scenarioLogger = createScenarioLogger(unitId, scenario);
    this.lifecycle = new ScenarioLifecycle(unitId, this.scenarioLogger);
  }

  attachSession(session: IDriverSession): void {
    this.session = session;
  }

  get hasSession(): boolean {
    return this.session !== null;
  }

  get driver(): IDriverSession {
    if (!this.session) {
      throw new Error(`No driver session for scenario ${this.unitId}`);
    }
    return this.session;
  }

  get homePage(): HomePage {
    this.pages.home ??= new HomePage(
      this.driver,
      this.scenarioLogger,
      this.waitDefaults,
    );
    return this.pages.home;
  }

  get searchResultsPage(): SearchResultsPage {
    this.pages.searchResults ??= new SearchResultsPage(
      this.driver,
      this.scenarioLogger,
      this.waitDefaults,
    );
    return this.pages.searchResults;
  }

  get contactPage(): ContactPage {
    this.pages.contact ??= new ContactPage(this.driver, this.scenarioLogger, {
      waitDefaults: this.waitDefaults,
    });
    return this.pages.contact;
  }

  private get waitDefaults(): ResolvedWaitSettings {
    const { explicitWaitSeconds, pollIntervalMs } = this.runtime.config;
    return { timeoutMs: explicitWaitSeconds * 1000, pollIntervalMs };
  }
}

setWorldConstructor(SuiteWorld);
