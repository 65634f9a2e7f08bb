/**
 * Template Library for apiforge.
 *
 * Loads the Handlebars templates that step actions render. Templates live
 * under `templates/` at the package root and are addressed by their path
 * relative to that directory, without the `.hbs` extension:
 *
 * ```
 * templates/app/main.py.hbs      -> "app/main.py"
 * templates/deploy/Dockerfile.hbs -> "deploy/Dockerfile"
 * ```
 *
 * ## Rendering
 *
 * - Output is never HTML-escaped (`noEscape`): templates produce source code
 * - Each library has its own Handlebars environment and helper set
 * - Compiled templates are cached per library
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";
import fg from "fast-glob";
import { TemplateNotFoundError, TemplateRenderError, toError } from "../errors/errors.js";
import { toPackageName } from "../config/Configuration.js";

// =============================================================================
// Constants
// =============================================================================

const TEMPLATE_EXTENSION = ".hbs";

/** Directory name of the bundled templates, relative to the package root. */
export const TEMPLATES_DIRNAME = "templates";

// =============================================================================
// Types
// =============================================================================

type HandlebarsEnv = ReturnType<typeof Handlebars.create>;
type CompiledTemplate = ReturnType<HandlebarsEnv["compile"]>;

/**
 * Renders a named template with the given data.
 */
export type RenderFn = (templateName: string, data: object) => string;

// =============================================================================
// TemplateLibrary
// =============================================================================

/**
 * Indexed, cached collection of Handlebars templates.
 *
 * @example
 * ```typescript
 * const templates = await TemplateLibrary.load();
 * const source = templates.render("app/main.py", config.toTemplateData());
 * ```
 */
export class TemplateLibrary {
  private readonly env: HandlebarsEnv;
  private readonly compiled = new Map<string, CompiledTemplate>();

  private constructor(
    private readonly sources: ReadonlyMap<string, string>,
    readonly templatesDir: string,
  ) {
    this.env = Handlebars.create();
    registerHelpers(this.env);
  }

  /**
   * Indexes and reads every template under a directory.
   *
   * @param templatesDir - Defaults to the templates bundled with apiforge
   */
  static async load(templatesDir: string = resolveTemplatesDir()): Promise<TemplateLibrary> {
    const files = await fg(`**/*${TEMPLATE_EXTENSION}`, {
      cwd: templatesDir,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
    });

    const sources = new Map<string, string>();
    for (const file of files.sort()) {
      const content = await fs.readFile(path.join(templatesDir, file), "utf-8");
      sources.set(file.slice(0, -TEMPLATE_EXTENSION.length), content);
    }

    return new TemplateLibrary(sources, templatesDir);
  }

  /**
   * Builds a library from in-memory sources keyed by template name.
   */
  static fromSources(sources: Readonly<Record<string, string>>): TemplateLibrary {
    return new TemplateLibrary(new Map(Object.entries(sources)), "<memory>");
  }

  has(templateName: string): boolean {
    return this.sources.has(templateName);
  }

  /** Template names, sorted. */
  names(): string[] {
    return [...this.sources.keys()].sort();
  }

  /**
   * Renders a template.
   *
   * @throws TemplateNotFoundError when no template has this name
   * @throws TemplateRenderError when compilation or rendering fails
   */
  render(templateName: string, data: object): string {
    const template = this.compile(templateName);
    try {
      return template(data);
    } catch (err) {
      throw new TemplateRenderError(templateName, toError(err));
    }
  }

  private compile(templateName: string): CompiledTemplate {
    const cached = this.compiled.get(templateName);
    if (cached) {
      return cached;
    }

    const source = this.sources.get(templateName);
    if (source === undefined) {
      throw new TemplateNotFoundError(templateName, this.templatesDir);
    }

    // Parsing is deferred to the first call, so syntax errors surface in render()
    const template = this.env.compile(source, { noEscape: true, strict: false });
    this.compiled.set(templateName, template);
    return template;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function registerHelpers(env: HandlebarsEnv): void {
  env.registerHelper("eq", (a: unknown, b: unknown) => a === b);
  env.registerHelper("ne", (a: unknown, b: unknown) => a !== b);
  // The last argument is Handlebars' options object
  env.registerHelper("and", (...args: unknown[]) => args.slice(0, -1).every(Boolean));
  env.registerHelper("or", (...args: unknown[]) => args.slice(0, -1).some(Boolean));
  env.registerHelper("not", (value: unknown) => !value);
  env.registerHelper("upper", (value: unknown) => String(value ?? "").toUpperCase());
  env.registerHelper("lower", (value: unknown) => String(value ?? "").toLowerCase());
  env.registerHelper("snake", (value: unknown) => toPackageName(String(value ?? "")));
}

/**
 * Locates the bundled templates directory.
 *
 * Walks up from this module to the nearest directory holding a package.json,
 * which works both from `src/` and from the compiled `dist/`.
 */
export function resolveTemplatesDir(fromUrl: string = import.meta.url): string {
  let dir = path.dirname(fileURLToPath(fromUrl));

  for (;;) {
    if (existsSync(path.join(dir, "package.json"))) {
      return path.join(dir, TEMPLATES_DIRNAME);
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return path.resolve(TEMPLATES_DIRNAME);
    }
    dir = parent;
  }
}
