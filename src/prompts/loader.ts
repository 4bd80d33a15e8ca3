/**
 * Prompt template loader.
 *
 * Loads stage prompt templates from disk (.md or .txt files), parses and
 * validates them once, and caches the parsed result. A pipeline loads its
 * templates at construction so a broken template fails before any run.
 *
 * USAGE:
 *
 *   const loader = new PromptTemplateLoader(DEFAULT_PROMPTS_DIR);
 *   const templates = loadStageTemplates(loader);
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

/** File extensions recognized as prompt templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

/** The `prompts/` directory shipped with the package. */
export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

/** Template file used by each agent-backed stage. */
export const STAGE_TEMPLATE_FILES = {
  preprocessing: "preprocessing.md",
  perspective: "perspective.md",
  finalResponse: "final-response.md",
} as const;

export type StageTemplateName = keyof typeof STAGE_TEMPLATE_FILES;

export type StageTemplates = Readonly<Record<StageTemplateName, ParsedTemplate>>;

export class PromptTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing prompt template files
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  get directory(): string {
    return this.baseDir;
  }

  /**
   * Load and parse a single template file. Results are cached.
   *
   * @param filename - Filename relative to baseDir (e.g. "preprocessing.md")
   * @throws TemplateLoadError   if file is missing or has an unsupported extension
   * @throws TemplateParseError  if template contains invalid variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(
        filePath,
        `Template file not found: ${filePath}`
      );
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const source = readFileSync(filePath, "utf-8");
    const parsed = parseTemplate(source, basename(filename, ext));

    this.cache.set(filename, parsed);
    return parsed;
  }

  /**
   * List template filenames in the base directory.
   */
  listTemplates(): string[] {
    return readdirSync(this.baseDir)
      .filter((entry) => {
        const full = join(this.baseDir, entry);
        return statSync(full).isFile() && TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
      })
      .sort();
  }
}

/**
 * Load the three templates the stages render.
 */
export function loadStageTemplates(loader: PromptTemplateLoader): StageTemplates {
  return {
    preprocessing: loader.load(STAGE_TEMPLATE_FILES.preprocessing),
    perspective: loader.load(STAGE_TEMPLATE_FILES.perspective),
    finalResponse: loader.load(STAGE_TEMPLATE_FILES.finalResponse),
  };
}
