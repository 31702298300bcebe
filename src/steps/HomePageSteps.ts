/**
 * 홈페이지 스텝 정의
 */

import { Given, Then, When } from "@cucumber/cucumber";
import { expect } from "expect";
import { ScenarioState } from "@/session/ScenarioLifecycle";
import type { SuiteWorld } from "./world";

Given(
  /^I am on the (.+) homepage$/,
  async function (this: SuiteWorld, site: string) {
    this.scenarioLogger.info({ site }, "홈페이지 이동");
    await this.lifecycle.perform(ScenarioState.Navigating, () =>
      this.homePage.navigateTo(this.runtime.config.url),
    );
  },
);

When(
  "I open the {string} menu item",
  async function (this: SuiteWorld, menuItem: string) {
    await this.lifecycle.perform(ScenarioState.Clicking, () =>
      this.homePage.clickNavigationMenuItem(menuItem),
    );
  },
);

Then("the homepage should be displayed", async function (this: SuiteWorld) {
  const loaded = await this.lifecycle.perform(ScenarioState.ReadingState, () =>
    this.homePage.isHomePageLoaded(),
  );
  expect(loaded).toBe(true);
});

Then(
  "the page title should contain {string}",
  async function (this: SuiteWorld, expected: string) {
    const title = await this.lifecycle.perform(ScenarioState.ReadingState, () =>
      this.homePage.getTitle(),
    );
    expect(title.toLowerCase()).toContain(expected.toLowerCase());
  },
);

Then("the site header should be visible", async function (this: SuiteWorld) {
  const header = await this.lifecycle.perform(ScenarioState.ReadingState, () =>
    this.homePage.getHeaderTitle(),
  );
  expect(header.trim()).not.toBe("");
});

Then(
  "the header should display {string}",
  async function (this: SuiteWorld, expected: string) {
    const header = await this.lifecycle.perform(
      ScenarioState.ReadingState,
      () => this.homePage.getHeaderTitle(),
    );
    expect(header.toLowerCase()).toContain(expected.toLowerCase());
  },
);

Then("I should see recent blog posts", async function (this: SuiteWorld) {
  const titles = await this.lifecycle.perform(ScenarioState.ReadingState, () =>
    this.homePage.getRecentPostTitles(),
  );
  expect(titles.length).toBeGreaterThan(0);
});

Then(
  /^there should be at least (\d+) posts? displayed$/,
  async function (this: SuiteWorld, minimum: string) {
    const count = await this.lifecycle.perform(ScenarioState.ReadingState, () =>
      this.homePage.getPostCount(),
    );
    expect(count).toBeGreaterThanOrEqual(Number(minimum));
  },
);
