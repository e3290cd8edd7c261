/**
 * @fileoverview Template rendering of chart directories and values files.
 *
 * @module TemplateRenderer
 * @since 1.0.0
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ExecutionError } from "../core/errors.ts";
import type { RenderContext } from "../types/service-types.ts";

/**
 * Turns a template directory plus a key/value context into a directory of
 * rendered files. The engine never inspects what comes out.
 */
export interface TemplateRenderer {
  render(templateDir: string, outputDir: string, context: RenderContext): Promise<string>;
}

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w.]*)\s*\}\}/g;

/**
 * Replaces every `{{ key }}` or `{{ a.b }}` placeholder by its value from
 * the context. Objects and arrays are written as JSON, which YAML reads as
 * flow collections. An unknown key renders as an empty string.
 *
 * @example
 * ```typescript
 * substitute("tag: {{ image.tag }}", { image: { tag: "1.2" } }); // "tag: 1.2"
 * ```
 */
export function substitute(template: string, context: RenderContext): string {
  return template.replace(PLACEHOLDER, (_match, path: string) => formatValue(lookup(context, path)));
}

function lookup(context: RenderContext, path: string): unknown {
  let current: unknown = context;
  for (const segment of path.split(".")) {
    if (typeof current !== "object" || current === null || !(segment in current)) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Renders a whole directory tree. Files ending in `.j2` (or with `.j2.` in
 * their name) are written without the `.j2` marker.
 */
export class FileTemplateRenderer implements TemplateRenderer {
  async render(templateDir: string, outputDir: string, context: RenderContext): Promise<string> {
    try {
      await this.renderDirectory(templateDir, outputDir, context);
    } catch (err) {
      throw new ExecutionError(
        `Unable to render templates from ${templateDir}`,
        err instanceof Error ? err.message : String(err),
      );
    }
    return outputDir;
  }

  private async renderDirectory(source: string, destination: string, context: RenderContext): Promise<void> {
    await mkdir(destination, { recursive: true });
    for (const entry of await readdir(source, { withFileTypes: true })) {
      const from = join(source, entry.name);
      if (entry.isDirectory()) {
        await this.renderDirectory(from, join(destination, entry.name), context);
        continue;
      }
      const content = await readFile(from, "utf8");
      await writeFile(join(destination, renderedFileName(entry.name)), substitute(content, context), "utf8");
    }
  }
}

export function renderedFileName(name: string): string {
  return name.replace(/\.j2(?=\.|$)/, "");
}
