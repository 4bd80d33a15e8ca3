/**
 * Conditional block parsing and evaluation.
 *
 *   {{#if request.context}}…{{/if}}   kept when the variable is set and non-empty
 *
 * No nesting and no `{{#else}}`.
 */

import type { PromptContext, PromptVariable } from "./context.js";

export interface ConditionalBlock {
  readonly variable: PromptVariable;
  /** The body text inside the block (may contain {{var}} placeholders). */
  readonly body: string;
}

export class ConditionalParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`
    );
    this.name = "ConditionalParseError";
  }
}

/** Groups: 1 variable name, 2 body content */
const CONDITIONAL_RE = /\{\{#if\s+([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;

const NESTED_IF_RE = /\{\{#if\s/;

/**
 * Extract all conditional blocks from a template source string.
 *
 * @throws ConditionalParseError if blocks reference invalid variables,
 *         nest, or are unbalanced
 */
export function parseConditionalBlocks(
  source: string,
  templateName: string,
  isValidVar: (name: string) => name is PromptVariable
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];

  for (const match of source.matchAll(CONDITIONAL_RE)) {
    const [, variable = "", body = ""] = match;

    if (!isValidVar(variable)) {
      issues.push(`Unknown variable "${variable}" in conditional`);
      continue;
    }

    if (NESTED_IF_RE.test(body)) {
      issues.push(
        `Nested conditionals are not supported (found {{#if inside {{#if ${variable}…}})`
      );
      continue;
    }

    blocks.push({ variable, body });
  }

  const openTags = source.match(/\{\{#if\s/g) ?? [];
  const closeTags = source.match(/\{\{\/if\}\}/g) ?? [];
  if (openTags.length !== closeTags.length) {
    issues.push(
      `Mismatched conditional tags: ${openTags.length} opening {{#if}}, ${closeTags.length} closing {{/if}}`
    );
  } else {
    // Tags the block pattern skipped, such as comparisons
    const leftover = source.replace(CONDITIONAL_RE, "").match(/\{\{#if\s[^}]*\}\}/g) ?? [];
    for (const tag of leftover) {
      issues.push(`Malformed conditional tag ${tag}; only {{#if variable}} is supported`);
    }
  }

  if (issues.length > 0) {
    throw new ConditionalParseError(templateName, issues);
  }

  return blocks;
}

/**
 * A block is kept when its variable is set and non-empty.
 */
export function evaluateCondition(contextValue: string | undefined): boolean {
  return contextValue !== undefined && contextValue !== "";
}

/**
 * Replace every conditional block with its body or with nothing.
 */
export function resolveConditionals(source: string, context: PromptContext): string {
  return source.replace(
    CONDITIONAL_RE,
    (_match, variable: string, body: string) => {
      const contextValue = isKnownKey(context, variable) ? context[variable] : undefined;
      return evaluateCondition(contextValue) ? body : "";
    }
  );
}

function isKnownKey(context: PromptContext, key: string): key is PromptVariable {
  return Object.prototype.hasOwnProperty.call(context, key);
}
