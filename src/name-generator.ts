/**
 * Pure name generation: original path + batch index + scheme -> new file name.
 */

import { basename } from "node:path";
import type { CaseOption, NumberingOptions, SchemeParams } from "./scheme.js";
import { validateScheme } from "./scheme.js";

const MINOR_WORDS = new Set([
  "a", "an", "the", "and", "but", "or", "for", "nor", "as", "at", "by",
  "from", "in", "into", "near", "of", "on", "onto", "to", "with",
]);

const WORD_SEPARATOR = /([\s_-]+)/;

/** Escape special regex characters so the string can be used as a literal in a regex. */
function escapeRegexLiteral(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Split a file name into base and extension (extension keeps its dot).
 * A leading dot belongs to the base: ".bashrc" has no extension.
 */
export function splitExtension(fileName: string): { base: string; ext: string } {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0) return { base: fileName, ext: "" };
  return { base: fileName.slice(0, dot), ext: fileName.slice(dot) };
}

function capitalize(word: string): string {
  const lower = word.toLowerCase();
  // o'connor -> O'Connor, but don't -> Don't
  const apostrophe = /^(\p{L})'(\p{L})/u.exec(lower);
  if (apostrophe) {
    return (
      apostrophe[1].toUpperCase() + "'" + apostrophe[2].toUpperCase() + lower.slice(3)
    );
  }
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

export function titleCase(text: string): string {
  if (!text) return text;
  const parts = text.split(WORD_SEPARATOR);
  const last = parts.length - 1;
  return parts
    .map((part, i) => {
      // odd indices are the captured separators
      if (i % 2 === 1 || part === "") return part;
      if (i !== 0 && i !== last && MINOR_WORDS.has(part.toLowerCase())) {
        return part.toLowerCase();
      }
      return capitalize(part);
    })
    .join("");
}

export function changeCase(text: string, caseOption: CaseOption): string {
  switch (caseOption) {
    case "lower":
      return text.toLowerCase();
    case "upper":
      return text.toUpperCase();
    case "title":
      return titleCase(text);
    case "preserve":
      return text;
  }
}

/** `start + index*step`, zero-padded to `padding` digits. Wider values are never clipped. */
export function formatNumber(index: number, numbering: Pick<NumberingOptions, "padding" | "start" | "step">): string {
  const value = numbering.start + index * numbering.step;
  return String(value).padStart(numbering.padding, "0");
}

function renderTemplate(template: string, base: string, ext: string): string {
  return template.replace(/\{(name|ext)\}/g, (_, token: string) =>
    token === "name" ? base : ext.replace(/^\./, ""),
  );
}

export function generateName(originalPath: string, index: number, params: SchemeParams): string {
  validateScheme(params);

  let { base, ext } = splitExtension(basename(originalPath));

  if (params.nameTemplate !== undefined) {
    const template = params.nameTemplate;
    const rendered = renderTemplate(template, base, ext);
    // only a template that places {ext} itself owns the extension
    if (template.includes("{ext}")) {
      ({ base, ext } = splitExtension(rendered));
    } else {
      base = rendered;
    }
  }

  if (params.find !== "") {
    const replace = params.replace;
    base = base.replace(new RegExp(escapeRegexLiteral(params.find), "g"), () => replace);
  }

  base = changeCase(base, params.caseOption);
  base = `${params.prefix}${base}${params.suffix}`;

  const { numbering } = params;
  if (numbering.enabled) {
    const num = formatNumber(index, numbering);
    base =
      numbering.position === "prefix"
        ? `${num}${numbering.separator}${base}`
        : `${base}${numbering.separator}${num}`;
  }

  return `${base}${ext}`;
}
