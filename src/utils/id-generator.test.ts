import { describe, it, expect } from "vitest";
import { IdGenerator } from "./id-generator";

describe("IdGenerator", () => {
  it("generates lower-case alphanumeric IDs of the given length", () => {
    const id = new IdGenerator(5).generate();

    expect(id).toMatch(/^[a-z0-9]{5}$/);
  });

  it("prefixes IDs", () => {
    const id = new IdGenerator().generate("EN-plain-html");

    expect(id).toMatch(/^EN-plain-html-[a-z0-9]{8}$/);
  });

  it("never repeats an ID", () => {
    const generator = new IdGenerator(2);
    const ids = Array.from({ length: 200 }, () => generator.generate());

    expect(new Set(ids).size).toBe(200);
    expect(generator.count).toBe(200);
  });
});
