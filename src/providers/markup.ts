import * as cheerio from "cheerio";

export const CODE_FENCE = "```";

export interface WrapperRule {
  /** Decorative container around a code block. */
  selector: string;
  /** Descendants kept when the container is collapsed. */
  keep: string;
}

export interface MarkupRules {
  format: "html" | "text";
  /** Divs whose inline style contains this are emptied. */
  hiddenStyle?: string;
  wrappers?: WrapperRule[];
  /** Elements rendered as fenced code blocks. */
  code?: string;
  /** Break lines at every element boundary instead of concatenating text nodes. */
  blockSeparators?: boolean;
  /** "blank" keeps one blank line between paragraphs, "single" drops blank lines altogether. */
  collapse?: "blank" | "single";
}

function collapseLines(text: string, mode: "blank" | "single"): string {
  const normalized = text.replace(/[ \t]+\n/g, "\n");
  if (mode === "single") {
    return normalized.replace(/\n\s*\n/g, "\n").replace(/\n{2,}/g, "\n");
  }
  return normalized.replace(/\n\s*\n/g, "\n\n");
}

// An already fenced block, as this module emits it.
const FENCED_BLOCK = /(?:^|\n)```\n[\s\S]*?\n```(?=\n|$)/g;
const MARKUP_TAG = /<\/?[a-zA-Z][^>]*>/;

function markupToText(fragment: string, rules: MarkupRules): string {
  if (!MARKUP_TAG.test(fragment)) {
    return fragment;
  }

  const $ = cheerio.load(fragment, null, false);

  const hiddenStyle = rules.hiddenStyle;
  if (hiddenStyle) {
    $("div").each((_, element) => {
      const style = $(element).attr("style");
      if (style?.includes(hiddenStyle)) {
        $(element).empty();
      }
    });
  }

  for (const wrapper of rules.wrappers ?? []) {
    $(wrapper.selector).each((_, element) => {
      const container = $(element);
      const payload = container.find(wrapper.keep).toArray();
      container.empty();
      container.append(payload);
    });
  }

  $("br").replaceWith("\n");

  if (rules.blockSeparators) {
    $("*").each((_, element) => {
      $(element).prepend("\n");
      $(element).append("\n");
    });
  }

  if (rules.code) {
    $(rules.code).each((_, element) => {
      $(element).before(`\n${CODE_FENCE}\n`);
      $(element).after(`\n${CODE_FENCE}\n`);
    });
  }

  return $.root().text();
}

/**
 * Turns the markup of one answer container into plain text. Code blocks come
 * out as "\n```\n<code>\n```\n" and everything else loses its tags.
 * Blocks that are already fenced pass through untouched, so cleaning twice
 * changes nothing.
 */
export function cleanMarkup(raw: string, rules: MarkupRules): string {
  const collapse = rules.collapse ?? "blank";

  if (rules.format === "text") {
    return collapseLines(raw.replace(/\r\n/g, "\n"), collapse).trim();
  }

  let text = "";
  let cursor = 0;
  for (const match of raw.matchAll(FENCED_BLOCK)) {
    const start = match.index ?? cursor;
    text += markupToText(raw.slice(cursor, start), rules);
    text += match[0];
    cursor = start + match[0].length;
  }
  text += markupToText(raw.slice(cursor), rules);

  return collapseLines(text, collapse).trim();
}
