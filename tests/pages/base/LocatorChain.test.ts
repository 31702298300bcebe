/**
 * LocatorChain 테스트
 */

import { describe, it, expect } from "@jest/globals";
import pino from "pino";
import {
  NoSuchElementError,
  StaleElementError,
} from "@/core/errors/DriverErrors";
import { LocatorChain } from "@/pages/base/LocatorChain";

const silent = pino({ level: "silent" });

describe("LocatorChain", () => {
  it("처음으로 비어있지 않은 단계 채택", async () => {
    const visited: string[] = [];
    const result = await new LocatorChain<string>("titles", silent)
      .step("empty", async () => {
        visited.push("empty");
        return [];
      })
      .step("nested", async () => {
        visited.push("nested");
        return ["First Post"];
      })
      .step("flat", async () => {
        visited.push("flat");
        return ["Unused"];
      })
      .run();

    expect(result).toEqual({ step: "nested", items: ["First Post"] });
    expect(visited).toEqual(["empty", "nested"]);
  });

  it("일시적 조회 에러는 다음 단계로", async () => {
    const result = await new LocatorChain<number>("links", silent)
      .step("stale", async () => {
        throw new StaleElementError("detached");
      })
      .step("missing", async () => {
        throw new NoSuchElementError("none");
      })
      .step("self", async () => [1])
      .run();

    expect(result.step).toBe("self");
  });

  it("그 외 에러는 전파", async () => {
    const chain = new LocatorChain<number>("links", silent).step(
      "broken",
      async () => {
        throw new Error("protocol error");
      },
    );

    await expect(chain.run()).rejects.toThrow("protocol error");
  });

  it("모든 단계가 비면 step null", async () => {
    const result = await new LocatorChain<number>("none", silent)
      .step("a", async () => [])
      .run();

    expect(result).toEqual({ step: null, items: [] });
  });
});
