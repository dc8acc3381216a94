export {
  GeminiScriptGenerator,
  buildScriptPrompt,
  parseScript,
  buildScript,
  type GeminiScriptGeneratorOptions,
  type RawScript,
} from './script-generator.js';
export { MockScriptGenerator } from './mock-script.js';
export { createCollaborators } from './collaborators.js';
export * from './providers/index.js';
