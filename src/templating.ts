import * as nunjucks from "nunjucks";
import { join } from "path";
import type { DefinitionUnit, TemplateVariables } from "./types";
import { TemplateError, errorMessage } from "./errors";

export interface RenderOptions {
  /** Directories `{% include %}` targets are looked up in, in order. */
  searchPaths?: string[];
  /** Label used in error messages. */
  source?: string;
}

function createEnvironment(searchPaths: string[]): nunjucks.Environment {
  const loaders = searchPaths.length
    ? [new nunjucks.FileSystemLoader(searchPaths, { noCache: true })]
    : [];
  // Disable autoescape to keep markdown and JSON in prompts untouched.
  const env = new nunjucks.Environment(loaders, { autoescape: false });
  env.addFilter("tojson", (value: unknown) => JSON.stringify(value));
  return env;
}

/**
 * Render a Jinja-style template. The variables are the only data the template
 * sees; undefined names render empty unless a `default(...)` filter applies.
 *
 * @throws TemplateError on syntax errors and missing include targets
 */
export function renderTemplate(
  template: string,
  vars: TemplateVariables,
  options: RenderOptions = {}
): string {
  const { searchPaths = [], source = "template" } = options;
  try {
    return createEnvironment(searchPaths).renderString(template, vars);
  } catch (err) {
    throw new TemplateError(`Failed to render ${source}: ${errorMessage(err)}`, source, { cause: err });
  }
}

/**
 * Render a unit's instructions. Includes resolve against its `references/`
 * directory first, then its own directory.
 */
export function renderUnitInstructions(unit: DefinitionUnit, vars: TemplateVariables): string {
  return renderTemplate(unit.instructions, vars, {
    searchPaths: [join(unit.basePath, "references"), unit.basePath],
    source: unit.instructionsPath,
  });
}
