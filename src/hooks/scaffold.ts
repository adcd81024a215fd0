/**
 * Example hook registry for `taskhooks init`.
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { resolveProjectPaths } from "../config/index.js";

const TEMPLATE_DIR = fileURLToPath(new URL("../../templates/hooks/", import.meta.url));

interface TemplateFile {
  name: string;
  executable: boolean;
}

export const SCAFFOLD_FILES: readonly TemplateFile[] = [
  { name: "hooks.yaml", executable: false },
  { name: "notify-completed.sh", executable: true },
  { name: "README.md", executable: false },
];

export interface ScaffoldOptions {
  /** Overwrite files that already exist. */
  force?: boolean;
  /** Write every example hook with `enabled: false`. */
  disabled?: boolean;
  /** Template source; defaults to the bundled templates. */
  templateDir?: string;
}

export interface ScaffoldResult {
  hooksDir: string;
  created: string[];
  /** Existing files left untouched. */
  skipped: string[];
}

/** Files that `scaffoldHooksConfig` would overwrite. */
export function existingScaffoldFiles(projectRoot: string): string[] {
  const { hooksDir } = resolveProjectPaths(projectRoot);
  return SCAFFOLD_FILES.map((f) => path.join(hooksDir, f.name)).filter((p) => fs.existsSync(p));
}

function renderTemplate(file: TemplateFile, templateDir: string, disabled: boolean): string {
  const content = fs.readFileSync(path.join(templateDir, file.name), "utf-8");
  if (disabled && file.name === "hooks.yaml") {
    return content.replace(/^(\s+)enabled: true$/gm, "$1enabled: false");
  }
  return content;
}

/** Write the example registry, script and README into the hooks directory. */
export function scaffoldHooksConfig(projectRoot: string, options: ScaffoldOptions = {}): ScaffoldResult {
  const { hooksDir } = resolveProjectPaths(projectRoot);
  const templateDir = options.templateDir ?? TEMPLATE_DIR;
  fs.mkdirSync(hooksDir, { recursive: true });

  const result: ScaffoldResult = { hooksDir, created: [], skipped: [] };
  for (const file of SCAFFOLD_FILES) {
    const target = path.join(hooksDir, file.name);
    if (fs.existsSync(target) && !options.force) {
      result.skipped.push(target);
      continue;
    }
    fs.writeFileSync(target, renderTemplate(file, templateDir, options.disabled ?? false), "utf-8");
    if (file.executable) fs.chmodSync(target, 0o755);
    result.created.push(target);
  }
  return result;
}
