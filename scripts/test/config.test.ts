import { describe, expect, it } from "vitest";

import { resolveAggregatorConfig } from "../src/config/env.js";
import { ConfigError } from "../src/errors.js";

describe("resolveAggregatorConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveAggregatorConfig({}, {})).toEqual({
      inputPath: "/mnt/ramdisk/log_ckpt2.txt",
      tagsPath: null,
      residualMode: "watchlist",
      onMalformed: "fail",
      jsonOut: null
    });
  });

  it("reads the environment", () => {
    const config = resolveAggregatorConfig(
      {},
      {
        CKPT_LOG_PATH: "/tmp/ckpt.log",
        CKPT_TAGS_PATH: "tags.yaml",
        CKPT_RESIDUAL_MODE: "ALL",
        CKPT_ON_MALFORMED: "skip",
        CKPT_JSON_OUT: "out/summary.json"
      }
    );
    expect(config).toEqual({
      inputPath: "/tmp/ckpt.log",
      tagsPath: "tags.yaml",
      residualMode: "all",
      onMalformed: "skip",
      jsonOut: "out/summary.json"
    });
  });

  it("prefers flags over the environment and ignores blank values", () => {
    const config = resolveAggregatorConfig(
      { input: "flag.log", residual: "watchlist", json: " " },
      { CKPT_LOG_PATH: "env.log", CKPT_RESIDUAL_MODE: "all", CKPT_JSON_OUT: "" }
    );
    expect(config.inputPath).toBe("flag.log");
    expect(config.residualMode).toBe("watchlist");
    expect(config.jsonOut).toBeNull();
  });

  it("rejects unknown choices", () => {
    expect(() => resolveAggregatorConfig({ residual: "sometimes" }, {})).toThrow(ConfigError);
    expect(() => resolveAggregatorConfig({}, { CKPT_ON_MALFORMED: "retry" })).toThrow(
      'Invalid malformed-line policy "retry"; expected one of fail, skip'
    );
  });
});
