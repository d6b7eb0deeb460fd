import path from "node:path";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { findPackageRoot } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExportTemplateName = "netlist" | "script" | "guide";

export type ExportTemplateValues = Record<string, unknown>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderExportTemplate(
  name: ExportTemplateName,
  values: ExportTemplateValues,
): Promise<string> {
  const template = await loadTemplate(name);

  try {
    return template(values);
  } catch (err) {
    throw createTemplateRenderError(name, err);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<ExportTemplateName, Handlebars.TemplateDelegate>();
const TEMPLATE_ERROR_CODE = USER_FACING_ERROR_CODES.export;
const TEMPLATE_DIR_HINT = "Ensure the template exists under templates/exports.";
const TEMPLATE_SYNTAX_HINT = "Check the template syntax for errors.";

function createTemplateNotFoundError(name: ExportTemplateName, templatePath: string): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Export template missing.",
    message: `Export template "${name}" not found at ${templatePath}.`,
    hint: TEMPLATE_DIR_HINT,
  });
}

function createTemplateReadError(
  name: ExportTemplateName,
  templatePath: string,
  cause: unknown,
): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Export template unreadable.",
    message: `Failed to read export template "${name}" at ${templatePath}.`,
    hint: TEMPLATE_DIR_HINT,
    cause,
  });
}

function createTemplateRenderError(name: ExportTemplateName, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: TEMPLATE_ERROR_CODE,
    title: "Export template failed to render.",
    message: `Export template "${name}" could not be rendered.`,
    hint: TEMPLATE_SYNTAX_HINT,
    cause,
  });
}

async function loadTemplate(name: ExportTemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = path.join(findPackageRoot(), "templates", "exports", `${name}.hbs`);
  if (!(await fse.pathExists(templatePath))) {
    throw createTemplateNotFoundError(name, templatePath);
  }

  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw createTemplateReadError(name, templatePath, err);
  }

  // Compilation is lazy in Handlebars; syntax errors surface on first render.
  const compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}
