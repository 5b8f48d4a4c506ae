import * as cheerio from "cheerio";

/**
 * Decode HTML entities (`&amp;`, `&#39;`, `&nbsp;` ...) in text that no
 * longer contains markup.
 */
function decodeEntities(text: string): string {
  if (!text.includes("&")) return text;
  return cheerio.load(text, null, false).root().text();
}

/**
 * Turn a raw email body, plain text or HTML, into a single line of text for
 * pattern matching. Tags become spaces and every whitespace run, line breaks
 * included, becomes one space, so phrases wrapped across lines still match.
 */
export function normalizeEmailText(raw: string): string {
  const withoutTags = raw.replace(/<[^>]+>/g, " ");

  return decodeEntities(withoutTags).replace(/\s+/g, " ").trim();
}
