/**
 * Chapter splitting for multi-page output
 * Every <h2> in the rendered document starts a chapter
 */

import * as cheerio from "cheerio";
import { slugify } from "../utils";

export interface Chapter {
  number: number; // 1-based
  title: string;
  fileName: string; // "NN-slug.md"
  html: string; // Standalone HTML page holding only this chapter
}

export interface SplitDocument {
  title: string; // Document title (<h1>, then <title>), empty when absent
  chapters: Chapter[];
}

export function chapterFileName(number: number, title: string): string {
  return `${String(number).padStart(2, "0")}-${slugify(title)}.md`;
}

export function splitChapters(html: string): SplitDocument {
  const $ = cheerio.load(html);
  const title = $("h1").first().text().trim() || $("title").first().text().trim();
  const chapters: Chapter[] = [];

  $("h2").each((index, element) => {
    const $heading = $(element);
    const chapterTitle = $heading.text().trim();

    // Asciidoctor wraps each level-1 section in div.sect1
    const $parent = $heading.parent();
    const body = $parent.hasClass("sect1")
      ? $.html($parent)
      : $.html($heading) + $.html($heading.nextUntil("h2"));

    chapters.push({
      number: index + 1,
      title: chapterTitle,
      fileName: chapterFileName(index + 1, chapterTitle),
      html: `<!DOCTYPE html>\n<html><head><meta charset="utf-8"></head><body>\n${body}\n</body></html>\n`,
    });
  });

  return { title, chapters };
}
