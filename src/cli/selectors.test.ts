import { describe, it, expect } from "vitest";
import { finalizeConfig, loadDefaultConfig, Logger, mergeConfig } from "../utils";
import type { BuildConfig } from "../types";
import { hasSelectors, narrowConfig } from "./selectors";

const logger = new Logger("error");

async function baseConfig(): Promise<BuildConfig> {
  return finalizeConfig(
    mergeConfig(await loadDefaultConfig(), {
      languages: ["EN", "DE", "FR"],
      formats: {
        html: { enabled: true, priority: 1, options: {} },
        pdf: { enabled: true, priority: 1, options: { theme: "custom" } },
        rst: { enabled: false, priority: 3, options: {} },
      },
    }),
  );
}

describe("hasSelectors", () => {
  it("is false without any selector", () => {
    expect(hasSelectors({})).toBe(false);
    expect(hasSelectors({ lang: [] })).toBe(false);
  });

  it("is true for --all or any list", () => {
    expect(hasSelectors({ all: true })).toBe(true);
    expect(hasSelectors({ format: ["html"] })).toBe(true);
  });
});

describe("narrowConfig", () => {
  it("keeps configured order when narrowing languages", async () => {
    const config = narrowConfig(await baseConfig(), { lang: ["fr", "EN"] }, logger);

    expect(config.languages).toEqual(["EN", "FR"]);
    expect(config.flavors).toEqual(["plain", "withHelp"]);
  });

  it("drops languages that are not configured", async () => {
    const config = narrowConfig(await baseConfig(), { lang: ["EN", "JA"] }, logger);

    expect(config.languages).toEqual(["EN"]);
  });

  it("narrows flavors", async () => {
    const config = narrowConfig(await baseConfig(), { flavor: ["withHelp"] }, logger);

    expect(config.flavors).toEqual(["withHelp"]);
  });

  it("keeps only selected formats and enables them", async () => {
    const config = narrowConfig(await baseConfig(), { format: ["pdf", "rst"] }, logger);

    expect(config.formats).toEqual({
      pdf: { enabled: true, priority: 1, options: { theme: "custom" } },
      rst: { enabled: true, priority: 3, options: {} },
    });
  });

  it("adds a supported format missing from the configuration", async () => {
    const config = narrowConfig(await baseConfig(), { format: ["confluence"] }, logger);

    expect(config.formats).toEqual({ confluence: { enabled: true, priority: 2, options: {} } });
  });

  it("ignores unknown formats", async () => {
    const config = narrowConfig(await baseConfig(), { format: ["html", "epub"] }, logger);

    expect(Object.keys(config.formats)).toEqual(["html"]);
  });

  it("fails when nothing selectable remains", async () => {
    const base = await baseConfig();

    expect(() => narrowConfig(base, { format: ["epub"] }, logger)).toThrow(
      "formats: At least one output format must be enabled",
    );
    expect(() => narrowConfig(base, { lang: ["JA"] }, logger)).toThrow(
      "languages: At least one language must be specified",
    );
  });
});
