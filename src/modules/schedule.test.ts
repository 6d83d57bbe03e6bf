import { describe, it, expect } from "vitest";
import { finalizeConfig, loadDefaultConfig, mergeConfig } from "../utils";
import type { BuildConfig, PartialBuildConfig } from "../types/config";
import { createBuildMatrix } from "./schedule";

async function configWith(override: PartialBuildConfig): Promise<BuildConfig> {
  return finalizeConfig(mergeConfig(await loadDefaultConfig(), override));
}

const formats = {
  html: { enabled: true, priority: 1 as const, options: {} },
  pdf: { enabled: false, priority: 1 as const, options: {} },
  docx: { enabled: true, priority: 1 as const, options: { reference: "ref.docx" } },
};

describe("createBuildMatrix", () => {
  it("crosses languages, flavors and enabled formats", async () => {
    const config = await configWith({ languages: ["EN", "DE", "FR"], flavors: ["plain", "withHelp"], formats });

    const tasks = createBuildMatrix(config);

    expect(tasks).toHaveLength(3 * 2 * 2);
    expect(new Set(tasks.map((t) => t.id)).size).toBe(tasks.length);
  });

  it("orders tasks language-major, then flavor, then format", async () => {
    const config = await configWith({ languages: ["EN", "DE"], flavors: ["plain", "withHelp"], formats });

    expect(createBuildMatrix(config).map((t) => t.id)).toEqual([
      "EN/plain/html",
      "EN/plain/docx",
      "EN/withHelp/html",
      "EN/withHelp/docx",
      "DE/plain/html",
      "DE/plain/docx",
      "DE/withHelp/html",
      "DE/withHelp/docx",
    ]);
  });

  it("removes exactly the tasks of a disabled format and restores them when re-enabled", async () => {
    const base = { languages: ["EN", "DE"], flavors: ["plain"] };
    const all = createBuildMatrix(await configWith({ ...base, formats }));
    const withoutDocx = createBuildMatrix(
      await configWith({ ...base, formats: { ...formats, docx: { ...formats.docx, enabled: false } } }),
    );
    const withPdf = createBuildMatrix(
      await configWith({ ...base, formats: { ...formats, pdf: { ...formats.pdf, enabled: true } } }),
    );

    expect(withoutDocx.map((t) => t.id)).toEqual(all.filter((t) => t.format !== "docx").map((t) => t.id));
    expect(withPdf.filter((t) => t.format !== "pdf").map((t) => t.id)).toEqual(all.map((t) => t.id));
    expect(withPdf.filter((t) => t.format === "pdf")).toHaveLength(2);
  });

  it("carries format options and a matrix index on frozen tasks", async () => {
    const config = await configWith({ languages: ["EN"], flavors: ["plain"], formats });

    const tasks = createBuildMatrix(config);

    expect(tasks[1]).toEqual({
      id: "EN/plain/docx",
      index: 1,
      language: "EN",
      flavor: "plain",
      format: "docx",
      options: { reference: "ref.docx" },
    });
    expect(Object.isFrozen(tasks[1])).toBe(true);
  });
});
