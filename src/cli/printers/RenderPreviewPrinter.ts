/**
 * Listing of the files a render pass wrote, grouped by stage directory.
 *
 * ```
 * Rendered 3 files into ./my-project
 *
 * (root) (1)
 *   + .gitignore
 *
 * stages/02-infrastructure/local (2)
 *   + stages/02-infrastructure/local/_clusterforge.tf.json
 *   + stages/02-infrastructure/local/main.tf
 * ```
 *
 * @module
 */

import { STAGES_DIR } from "../../core/utils/paths.js";

export interface RenderPreviewOptions {
  /** Shown after the listing of a dry run */
  readonly dryRun?: boolean;
}

const ROOT_GROUP = "(root)";

/**
 * `stages/<name>/<provider>` for stage files, `(root)` for everything else.
 */
export function groupOf(file: string): string {
  const segments = file.split("/");
  if (segments[0] === STAGES_DIR && segments.length > 3) {
    return segments.slice(0, 3).join("/");
  }
  return ROOT_GROUP;
}

export function formatRenderPreview(
  files: readonly string[],
  outputDir: string,
  options: RenderPreviewOptions = {},
): string[] {
  if (files.length === 0) {
    return [`No files rendered into ${outputDir}`];
  }

  const groups = new Map<string, string[]>();
  for (const file of [...files].sort()) {
    const group = groupOf(file);
    groups.set(group, [...(groups.get(group) ?? []), file]);
  }

  const lines = [`Rendered ${files.length} file${files.length === 1 ? "" : "s"} into ${outputDir}`, ""];
  for (const group of [...groups.keys()].sort()) {
    const members = groups.get(group) ?? [];
    lines.push(`${group} (${members.length})`);
    for (const file of members) {
      lines.push(`  + ${file}`);
    }
    lines.push("");
  }

  if (options.dryRun) {
    lines.push("Hint: Rerun without --dry-run to deploy.");
  }
  return lines;
}
