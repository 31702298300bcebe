/**
 * 검색 스텝 정의
 */

import { Then, When } from "@cucumber/cucumber";
import { expect } from "expect";
import { ScenarioState } from "@/session/ScenarioLifecycle";
import type { SuiteWorld } from "./world";

When(
  "I search for {string}",
  async function (this: SuiteWorld, keyword: string) {
    await this.lifecycle.perform(ScenarioState.Searching, () =>
      this.homePage.searchFor(keyword),
    );
  },
);

When(
  "I click on the search result titled {string}",
  async function (this: SuiteWorld, title: string) {
    await this.lifecycle.perform(ScenarioState.Clicking, () =>
      this.searchResultsPage.clickOnResultByTitle(title),
    );
  },
);

Then("search results should be displayed", async function (this: SuiteWorld) {
  const page = this.searchResultsPage;
  const { displayed, count } = await this.lifecycle.perform(
    ScenarioState.ReadingState,
    async () => ({
      displayed: await page.isSearchResultsDisplayed(),
      count: await page.getSearchResultsCount(),
    }),
  );
  expect(displayed).toBe(true);
  expect(count).toBeGreaterThan(0);
});

Then(
  "the results should contain {string}",
  async function (this: SuiteWorld, keyword: string) {
    const found = await this.lifecycle.perform(ScenarioState.ReadingState, () =>
      this.searchResultsPage.isKeywordInResults(keyword),
    );
    expect(found).toBe(true);
  },
);

Then("no search results should be found", async function (this: SuiteWorld) {
  const noResults = await this.lifecycle.perform(
    ScenarioState.ReadingState,
    () => this.searchResultsPage.hasNoResults(),
  );
  expect(noResults).toBe(true);
});
