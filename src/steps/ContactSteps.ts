/**
 * 문의 페이지 스텝 정의
 */

import { Then } from "@cucumber/cucumber";
import { expect } from "expect";
import { ScenarioState } from "@/session/ScenarioLifecycle";
import type { SuiteWorld } from "./world";

Then("the contact page should be displayed", async function (this: SuiteWorld) {
  const loaded = await this.lifecycle.perform(ScenarioState.ReadingState, () =>
    this.contactPage.isContactPageLoaded(),
  );
  expect(loaded).toBe(true);
});
