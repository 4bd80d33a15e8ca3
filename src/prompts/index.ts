/**
 * Stage prompt templates.
 *
 * Templates live in `prompts/*.md`, use `{{variable}}` placeholders and
 * `{{#if}}` blocks, and are validated when the pipeline is built.
 */

export {
  buildRequestContext,
  formatBulletList,
  type PromptContext,
  type PromptVariable,
  type RequestVariable,
  type PerspectiveVariable,
  type SynthesisVariable,
} from "./context.js";
export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";
export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  ConditionalParseError,
  type ConditionalBlock,
} from "./conditional.js";
export { renderPrompt, PromptRenderError } from "./renderer.js";
export {
  PromptTemplateLoader,
  TemplateLoadError,
  loadStageTemplates,
  DEFAULT_PROMPTS_DIR,
  STAGE_TEMPLATE_FILES,
  type StageTemplates,
  type StageTemplateName,
} from "./loader.js";
