/**
 * Prompt renderer.
 *
 * Processing order:
 *   1. Resolve conditional blocks (evaluate {{#if …}}…{{/if}})
 *   2. Check every remaining {{variable}} has a value in the context
 *   3. Collapse runs of blank lines left by dropped blocks and trim
 *   4. Substitute
 *
 * Values are inserted verbatim; step 3 only touches template text.
 *
 * Purely mechanical text substitution; no content generation.
 */

import type { ParsedTemplate } from "./template.js";
import { extractVariables, isValidVariable, PLACEHOLDER_RE } from "./template.js";
import type { PromptContext } from "./context.js";
import { resolveConditionals } from "./conditional.js";

export class PromptRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": context is missing ` +
          `value(s) for: ${missingVariables.join(", ")}`
    );
    this.name = "PromptRenderError";
  }
}

function lookup(context: PromptContext, name: string): string | undefined {
  return isValidVariable(name) ? context[name] : undefined;
}

/**
 * Render a parsed template against a prompt context.
 *
 * @throws PromptRenderError if any variable outside a dropped block is unset
 */
export function renderPrompt(template: ParsedTemplate, context: PromptContext): string {
  const resolved =
    template.conditionals.length > 0
      ? resolveConditionals(template.source, context)
      : template.source;

  // Variables inside dropped blocks are gone by now
  const missing = extractVariables(resolved).filter((name) => lookup(context, name) === undefined);
  if (missing.length > 0) {
    throw new PromptRenderError(template.name, missing);
  }

  const compacted = resolved.replace(/\n{3,}/g, "\n\n").trim();

  return compacted.replace(PLACEHOLDER_RE, (_match, name: string) => lookup(context, name) ?? "");
}
