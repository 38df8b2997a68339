/**
 * Resource template expansion
 */

import { MCPDataError } from "./errors.js";
import type { MCPResourceTemplate } from "./types.js";

const PLACEHOLDER = /\{([^{}]+)\}/g;

export interface ExpandTemplateOptions {
  /** URI-component encode each value before substitution */
  encode?: boolean;
}

/**
 * Substitute `{name}` placeholders in a template's URI.
 * Values are inserted literally unless `encode` is set; a placeholder without
 * a value of its own raises.
 */
export function expandResourceTemplate(
  template: MCPResourceTemplate | string,
  values: Readonly<Record<string, string | number>>,
  options: ExpandTemplateOptions = {},
): string {
  const uriTemplate = typeof template === "string" ? template : template.uriTemplate;
  const missing: string[] = [];

  const uri = uriTemplate.replace(PLACEHOLDER, (_match, name: string) => {
    const value = Object.prototype.hasOwnProperty.call(values, name) ? values[name] : undefined;
    if (value === undefined) {
      missing.push(name);
      return "";
    }
    return options.encode ? encodeURIComponent(String(value)) : String(value);
  });

  if (missing.length > 0) {
    throw new MCPDataError(
      `Missing values for resource template '${uriTemplate}': ${missing.join(", ")}`,
      missing,
    );
  }
  return uri;
}
