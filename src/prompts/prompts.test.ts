/**
 * Prompt template system tests.
 *
 * Run: node --import tsx src/prompts/prompts.test.ts
 *
 * Tests cover:
 *   1. Context building from a request
 *   2. Template parsing and variable validation
 *   3. Conditional blocks
 *   4. Rendering, including the bundled stage templates
 *   5. Loader: disk-based template loading and caching
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { PipelineRequest } from "../types/pipeline.js";
import { buildRequestContext, formatBulletList } from "./context.js";
import {
  extractVariables,
  isValidVariable,
  parseTemplate,
  TemplateParseError,
} from "./template.js";
import {
  ConditionalParseError,
  evaluateCondition,
  parseConditionalBlocks,
  resolveConditionals,
} from "./conditional.js";
import { PromptRenderError, renderPrompt } from "./renderer.js";
import {
  DEFAULT_PROMPTS_DIR,
  loadStageTemplates,
  PromptTemplateLoader,
  TemplateLoadError,
} from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function makeRequest(overrides: Partial<PipelineRequest> = {}): PipelineRequest {
  return { prompt: "Explain recursion", constraints: [], ...overrides };
}

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT BUILDING
// ═══════════════════════════════════════════════════════════════════════════

section("Context Building");

test("formatBulletList prefixes each item", () => {
  assert.equal(formatBulletList(["Use an analogy", "Stay brief"]), "- Use an analogy\n- Stay brief");
});

test("buildRequestContext sets only the prompt for a bare request", () => {
  assert.deepEqual(buildRequestContext(makeRequest()), { "request.prompt": "Explain recursion" });
});

test("buildRequestContext includes context and bulleted constraints", () => {
  const context = buildRequestContext(
    makeRequest({ context: "For beginners", constraints: ["Use an analogy"] })
  );
  assert.deepEqual(context, {
    "request.prompt": "Explain recursion",
    "request.context": "For beginners",
    "request.constraints": "- Use an analogy",
  });
});

test("buildRequestContext leaves an empty context unset", () => {
  const context = buildRequestContext(makeRequest({ context: "" }));
  assert.equal("request.context" in context, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// TEMPLATE PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Template Parsing");

test("extractVariables dedupes, sorts and trims inner whitespace", () => {
  assert.deepEqual(
    extractVariables("{{ request.prompt }} {{request.context}} {{request.prompt}}"),
    ["request.context", "request.prompt"]
  );
});

test("extractVariables ignores conditional tags", () => {
  assert.deepEqual(extractVariables("{{#if request.context}}x{{/if}}"), []);
});

test("isValidVariable accepts known names only", () => {
  assert.equal(isValidVariable("perspective.framing"), true);
  assert.equal(isValidVariable("topic.name"), false);
});

test("parseTemplate records name, variables and conditionals", () => {
  const parsed = parseTemplate("Hi {{request.prompt}}", "greeting");
  assert.equal(parsed.name, "greeting");
  assert.deepEqual(parsed.variables, ["request.prompt"]);
  assert.deepEqual(parsed.conditionals, []);
});

test("parseTemplate rejects unknown variables", () => {
  assert.throws(
    () => parseTemplate("About {{topic.name}}", "bad"),
    (err: unknown) => {
      assert.ok(err instanceof TemplateParseError);
      assert.deepEqual(err.invalidVariables, ["topic.name"]);
      assert.equal(err.message, 'Template "bad" references unknown variable(s): topic.name');
      return true;
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// CONDITIONALS
// ═══════════════════════════════════════════════════════════════════════════

section("Conditionals");

test("parseConditionalBlocks reads a truthy block", () => {
  assert.deepEqual(parseConditionalBlocks("{{#if request.context}}Ctx{{/if}}", "t", isValidVariable), [
    { variable: "request.context", body: "Ctx" },
  ]);
});

test("parseConditionalBlocks rejects a comparison", () => {
  assert.throws(
    () => parseConditionalBlocks('{{#if perspective.index == "1"}}first{{/if}}', "t", isValidVariable),
    (err: unknown) => {
      assert.ok(err instanceof ConditionalParseError);
      assert.deepEqual(err.issues, [
        'Malformed conditional tag {{#if perspective.index == "1"}}; only {{#if variable}} is supported',
      ]);
      return true;
    }
  );
});

test("parseConditionalBlocks rejects unknown variables", () => {
  assert.throws(
    () => parseConditionalBlocks("{{#if foo.bar}}x{{/if}}", "t", isValidVariable),
    (err: unknown) => {
      assert.ok(err instanceof ConditionalParseError);
      assert.deepEqual(err.issues, ['Unknown variable "foo.bar" in conditional']);
      return true;
    }
  );
});

test("parseConditionalBlocks rejects nesting", () => {
  assert.throws(
    () =>
      parseConditionalBlocks(
        "{{#if request.context}}a{{#if request.prompt}}b{{/if}}{{/if}}",
        "t",
        isValidVariable
      ),
    (err: unknown) => {
      assert.ok(err instanceof ConditionalParseError);
      assert.equal(err.issues.length, 1);
      assert.ok(err.issues[0]?.startsWith("Nested conditionals are not supported"));
      return true;
    }
  );
});

test("parseConditionalBlocks rejects an unclosed block", () => {
  assert.throws(
    () => parseConditionalBlocks("{{#if request.context}}a", "t", isValidVariable),
    (err: unknown) => {
      assert.ok(err instanceof ConditionalParseError);
      assert.deepEqual(err.issues, [
        "Mismatched conditional tags: 1 opening {{#if}}, 0 closing {{/if}}",
      ]);
      return true;
    }
  );
});

test("evaluateCondition treats unset and empty as false", () => {
  assert.equal(evaluateCondition(undefined), false);
  assert.equal(evaluateCondition(""), false);
  assert.equal(evaluateCondition("x"), true);
});

test("resolveConditionals keeps the body without substituting", () => {
  assert.equal(
    resolveConditionals("A{{#if request.context}}[{{request.context}}]{{/if}}B", {
      "request.context": "x",
    }),
    "A[{{request.context}}]B"
  );
  assert.equal(resolveConditionals("A{{#if request.context}}[x]{{/if}}B", {}), "AB");
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

test("renderPrompt substitutes every variable", () => {
  const template = parseTemplate("{{perspective.framing}}\n\n{{perspective.input}}", "p");
  assert.equal(
    renderPrompt(template, { "perspective.framing": "Think it through.", "perspective.input": "Task" }),
    "Think it through.\n\nTask"
  );
});

test("renderPrompt reports missing variables", () => {
  const template = parseTemplate("{{request.prompt}} / {{request.context}}", "t");
  assert.throws(
    () => renderPrompt(template, { "request.prompt": "p" }),
    (err: unknown) => {
      assert.ok(err instanceof PromptRenderError);
      assert.deepEqual(err.missingVariables, ["request.context"]);
      assert.equal(
        err.message,
        'Cannot render template "t": context is missing value(s) for: request.context'
      );
      return true;
    }
  );
});

test("renderPrompt does not require variables of dropped blocks", () => {
  const template = parseTemplate(
    "Q: {{request.prompt}}\n{{#if request.context}}C: {{request.context}}{{/if}}",
    "t"
  );
  assert.equal(renderPrompt(template, { "request.prompt": "p" }), "Q: p");
});

test("renderPrompt collapses blank lines left by dropped blocks", () => {
  const template = parseTemplate(
    "A\n\n{{#if request.context}}\nC\n{{/if}}\n\nB",
    "t"
  );
  assert.equal(renderPrompt(template, {}), "A\n\nB");
});

test("renderPrompt inserts values verbatim", () => {
  const template = parseTemplate("Input: {{request.prompt}}\n\n\n\nEnd", "t");
  assert.equal(
    renderPrompt(template, { "request.prompt": "line1\n\n\n\nline2" }),
    "Input: line1\n\n\n\nline2\n\nEnd"
  );
});

test("renderPrompt keeps whitespace at the edges of values", () => {
  assert.equal(
    renderPrompt(parseTemplate("{{perspective.framing}}\n\n{{perspective.input}}\n", "p"), {
      "perspective.framing": "  Framing",
      "perspective.input": "Task\n",
    }),
    "  Framing\n\nTask\n"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// BUNDLED TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════

section("Bundled Templates");

const bundled = loadStageTemplates(new PromptTemplateLoader(DEFAULT_PROMPTS_DIR));

test("bundled templates parse with the expected variables", () => {
  assert.equal(bundled.preprocessing.name, "preprocessing");
  assert.deepEqual(bundled.perspective.variables, ["perspective.framing", "perspective.input"]);
  assert.deepEqual(bundled.finalResponse.variables, [
    "request.constraints",
    "request.context",
    "request.prompt",
    "synthesis.results",
  ]);
});

test("preprocessing prompt for a bare request", () => {
  assert.equal(
    renderPrompt(bundled.preprocessing, buildRequestContext(makeRequest())),
    "You are a preprocessing agent for a reasoning pipeline.\n" +
      "Your task is to validate, normalize, and prepare the following input for reasoning:\n\n" +
      "Input: Explain recursion\n\n" +
      "Provide a clear, well-structured version of this task that will be easier for downstream reasoning stages to process."
  );
});

test("preprocessing prompt with context and constraints", () => {
  const rendered = renderPrompt(
    bundled.preprocessing,
    buildRequestContext(makeRequest({ context: "For beginners", constraints: ["Use an analogy"] }))
  );
  assert.ok(
    rendered.includes(
      "Input: Explain recursion\n\nContext: For beginners\n\nConstraints:\n- Use an analogy\n\nProvide a clear"
    )
  );
});

test("final response prompt places intermediate results after the request", () => {
  const rendered = renderPrompt(bundled.finalResponse, {
    ...buildRequestContext(makeRequest()),
    "synthesis.results": "Preprocessing:\nNormalized task",
  });
  assert.ok(
    rendered.includes(
      "Original request: Explain recursion\n\nIntermediate results from the pipeline:\n\nPreprocessing:\nNormalized task\n\nProvide a clear"
    )
  );
  assert.ok(rendered.endsWith("directly addresses the original request."));
});

// ═══════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════

section("Loader");

const loaderDir = join(tmpdir(), `prompt-loader-test-${process.pid}`);
mkdirSync(loaderDir, { recursive: true });
writeFileSync(join(loaderDir, "b.md"), "B {{request.prompt}}");
writeFileSync(join(loaderDir, "a.txt"), "A {{request.prompt}}");
writeFileSync(join(loaderDir, "notes.json"), "{}");
writeFileSync(join(loaderDir, "broken.md"), "{{nope}}");

test("loader caches parsed templates", () => {
  const loader = new PromptTemplateLoader(loaderDir);
  const first = loader.load("b.md");
  assert.equal(first.name, "b");
  assert.equal(loader.load("b.md"), first);
});

test("loader lists .md and .txt files, sorted", () => {
  const loader = new PromptTemplateLoader(loaderDir);
  assert.deepEqual(loader.listTemplates(), ["a.txt", "b.md", "broken.md"]);
});

test("loader rejects a missing file", () => {
  const loader = new PromptTemplateLoader(loaderDir);
  assert.throws(
    () => loader.load("missing.md"),
    (err: unknown) => {
      assert.ok(err instanceof TemplateLoadError);
      assert.equal(err.message, `Template file not found: ${join(loaderDir, "missing.md")}`);
      return true;
    }
  );
});

test("loader rejects unsupported extensions", () => {
  const loader = new PromptTemplateLoader(loaderDir);
  assert.throws(
    () => loader.load("notes.json"),
    (err: unknown) => {
      assert.ok(err instanceof TemplateLoadError);
      assert.equal(err.message, 'Unsupported template extension ".json". Use: .md, .txt');
      return true;
    }
  );
});

test("loader surfaces parse errors", () => {
  const loader = new PromptTemplateLoader(loaderDir);
  assert.throws(() => loader.load("broken.md"), TemplateParseError);
});

test("loader rejects a missing directory", () => {
  assert.throws(() => new PromptTemplateLoader(join(loaderDir, "nope")), TemplateLoadError);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(loaderDir, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
