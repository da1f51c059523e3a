import { readFile } from "node:fs/promises";
import { TemplateError, errorMessage } from "./errors.js";

type Part = { text: string } | { field: string };

export type TemplateData = Record<string, string | number>;

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&#34;",
  "'": "&#39;",
};

export function escapeHtml(value: string) {
  return value.replace(/[&<>"']/g, (c) => ESCAPES[c]);
}

/** A parsed page template. Immutable, safe to share between requests. */
export class Template {
  private readonly parts: readonly Part[];

  constructor(source: string) {
    const parts: Part[] = [];
    let last = 0;
    for (const match of source.matchAll(PLACEHOLDER)) {
      const index = match.index ?? 0;
      if (index > last) parts.push({ text: source.slice(last, index) });
      parts.push({ field: match[1] });
      last = index + match[0].length;
    }
    if (last < source.length) parts.push({ text: source.slice(last) });
    this.parts = Object.freeze(parts);
  }

  render(data: TemplateData) {
    return this.parts
      .map((part) => {
        if ("text" in part) return part.text;
        const value = data[part.field];
        if (value === undefined) {
          throw new TemplateError(`no value for {{${part.field}}}`);
        }
        return escapeHtml(String(value));
      })
      .join("");
  }
}

export function compileTemplate(source: string) {
  return new Template(source);
}

export async function loadTemplate(templatePath: string) {
  let source: string;
  try {
    source = await readFile(templatePath, "utf8");
  } catch (err) {
    throw new TemplateError(
      `cannot read template ${templatePath}: ${errorMessage(err)}`
    );
  }
  return compileTemplate(source);
}
