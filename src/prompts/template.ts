/**
 * Prompt template parsing and variable extraction.
 *
 * TEMPLATE FORMAT:
 *
 *   {{request.prompt}}                 variable substitution
 *   {{#if request.context}}…{{/if}}    block kept when the variable is set and non-empty
 *
 * Rules:
 *   - Whitespace inside braces is trimmed: {{ request.prompt }} is valid
 *   - Unknown variable names are rejected at parse time
 *   - No nested conditionals
 */

import type { PromptVariable } from "./context.js";
import {
  parseConditionalBlocks,
  type ConditionalBlock,
} from "./conditional.js";

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  readonly source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  readonly variables: readonly PromptVariable[];
  readonly conditionals: readonly ConditionalBlock[];
  readonly name: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

/** Complete set of legal variable names; mirrors PromptVariable. */
const VALID_VARIABLES: ReadonlySet<string> = new Set<PromptVariable>([
  "request.prompt",
  "request.context",
  "request.constraints",
  "perspective.index",
  "perspective.framing",
  "perspective.input",
  "synthesis.results",
]);

export function isValidVariable(name: string): name is PromptVariable {
  return VALID_VARIABLES.has(name);
}

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names. Conditional tags are not
 * placeholders and are not returned.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    const name = match[1];
    if (name !== undefined) found.add(name);
  }
  return [...found].sort();
}

/**
 * Parse a template string, extracting and validating all variables
 * and conditional blocks.
 *
 * @throws TemplateParseError      if any {{variable}} name is invalid
 * @throws ConditionalParseError   if any conditional is malformed
 */
export function parseTemplate(source: string, name = "(anonymous)"): ParsedTemplate {
  const conditionals = parseConditionalBlocks(source, name, isValidVariable);

  const variables: PromptVariable[] = [];
  const invalid: string[] = [];
  for (const raw of extractVariables(source)) {
    if (isValidVariable(raw)) {
      variables.push(raw);
    } else {
      invalid.push(raw);
    }
  }

  if (invalid.length > 0) {
    throw new TemplateParseError(name, invalid);
  }

  return { source, variables, conditionals, name };
}
