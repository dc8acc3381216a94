export {
  ElevenLabsSpeechSynthesizer,
  GeminiSpeechSynthesizer,
  MockSpeechSynthesizer,
  ELEVENLABS_VOICES,
  estimateSpeechDuration,
  pcmToWav,
  type ElevenLabsOptions,
  type GeminiTTSOptions,
} from './voice.js';
export {
  PexelsFootageFinder,
  MockFootageFinder,
  sceneKeywords,
  type PexelsOptions,
} from './footage.js';
export {
  ManimAnimationRenderer,
  MockAnimationRenderer,
  parseDetection,
  extractCode,
  findSceneClass,
  type ManimRendererOptions,
  type MathDetection,
} from './animation.js';
export { measureDuration } from './duration.js';
