import { describe, it, expect } from "vitest";
import { UnknownFormatError } from "../utils";
import { ConverterRegistry } from "./registry";
import { CONVERTERS, HtmlConverter, PdfConverter, createDefaultRegistry } from "./index";
import { FORMAT_NAMES } from "../types/converter";

describe("ConverterRegistry", () => {
  it("resolves registered converters", () => {
    const registry = new ConverterRegistry().register("html", new HtmlConverter());
    expect(registry.resolve("html").name).toBe("html");
    expect(registry.has("html")).toBe(true);
    expect(registry.has("pdf")).toBe(false);
  });

  it("throws UnknownFormatError for unknown names", () => {
    const registry = new ConverterRegistry().freeze();
    expect(() => registry.resolve("epub", { language: "EN", flavor: "plain" })).toThrow(UnknownFormatError);
    expect(() => registry.resolve("epub")).toThrow("No converter registered for format: epub");
  });

  it("rejects a converter registered under another name", () => {
    expect(() => new ConverterRegistry().register("pdf", new HtmlConverter())).toThrow(
      "Converter name mismatch: registered as pdf but reports html",
    );
  });

  it("rejects duplicate names", () => {
    const registry = new ConverterRegistry().register("html", new HtmlConverter());
    expect(() => registry.register("html", new HtmlConverter())).toThrow("Converter already registered: html");
  });

  it("rejects registration after freeze", () => {
    const registry = new ConverterRegistry().freeze();
    expect(() => registry.register("pdf", new PdfConverter())).toThrow("Registry is frozen; cannot register pdf");
  });
});

describe("createDefaultRegistry", () => {
  it("registers every format in declaration order", () => {
    const registry = createDefaultRegistry();
    expect(registry.names()).toEqual([...FORMAT_NAMES]);
    expect(registry.isFrozen).toBe(true);
  });

  it("reports stable priorities and extensions", () => {
    const registry = createDefaultRegistry();
    const table = Object.fromEntries(
      registry.list().map((c) => [c.name, `${c.priority} ${c.outputExtension()}`]),
    );

    expect(table).toEqual({
      html: "1 .html",
      pdf: "1 .pdf",
      docx: "1 .docx",
      markdown: "1 .md",
      markdown_mp: "1 .md",
      asciidoc: "1 .adoc",
      github_markdown: "2 .md",
      github_markdown_mp: "2 .md",
      rst: "3 .rst",
      textile: "3 .textile",
      confluence: "2 .xhtml",
    });
  });

  it("keeps the static table in sync with the format list", () => {
    expect(Object.keys(CONVERTERS)).toEqual([...FORMAT_NAMES]);
  });
});
