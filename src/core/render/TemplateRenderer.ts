/**
 * Template Renderer for stage files.
 *
 * Each stage may ship a template tree under `templates/<stage>/`:
 *
 * - `common/` holds files used for every provider variant
 * - `<provider>/` holds variant files, which win over `common/` on clashes
 *
 * Files ending in `.hbs` are rendered with Handlebars against the stage's
 * template data and lose the extension; everything else is copied verbatim.
 * Reading the templates is the only I/O; nothing is written here.
 *
 * @module
 */

import { existsSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";
import fg from "fast-glob";
import { ForgeError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ProviderVariant } from "../config/ConfigSchema.js";

/** Relative path → file content. */
export type RenderedFiles = Record<string, string>;

const TEMPLATE_EXTENSION = ".hbs";

const COMMON_DIR = "common";

/**
 * Finds `<package>/templates` from this module, which sits at a different
 * depth in the sources than in the build output.
 */
function packageTemplatesDir(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (!existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return path.join(dir, "templates");
}

/** Template tree shipped with the package. */
export const DEFAULT_TEMPLATES_DIR = packageTemplatesDir();

export class TemplateRenderer {
  private readonly handlebars = Handlebars.create();

  constructor(private readonly templatesDir: string = DEFAULT_TEMPLATES_DIR) {
    this.handlebars.registerHelper("json", (value: unknown) => JSON.stringify(value));
  }

  /**
   * Renders a stage's templates for one provider variant. A stage without a
   * template tree renders nothing.
   */
  async render(stage: string, provider: ProviderVariant, data: Record<string, unknown>): Promise<RenderedFiles> {
    const files: RenderedFiles = {};

    for (const dir of [COMMON_DIR, provider]) {
      const baseDir = path.join(this.templatesDir, stage, dir);
      const entries = await fg("**/*", { cwd: baseDir, dot: true, onlyFiles: true });

      for (const entry of entries.sort()) {
        const content = await fs.readFile(path.join(baseDir, entry), "utf-8");
        if (entry.endsWith(TEMPLATE_EXTENSION)) {
          files[entry.slice(0, -TEMPLATE_EXTENSION.length)] = this.renderTemplate(stage, entry, content, data);
        } else {
          files[entry] = content;
        }
      }
    }

    return files;
  }

  private renderTemplate(stage: string, entry: string, content: string, data: Record<string, unknown>): string {
    try {
      return this.handlebars.compile(content, { noEscape: true, strict: true })(data);
    } catch (err) {
      throw new ForgeError(
        `Failed to render template '${entry}' of stage '${stage}'`,
        ErrorCode.INTERNAL_ERROR,
        { stage, template: entry },
        undefined,
        err instanceof Error ? err : undefined,
        false,
      );
    }
  }
}
