export {
  classifyScene,
  scaleDirection,
  CATEGORY_KEYWORDS,
  GROWTH_KEYWORDS,
  SHRINK_KEYWORDS,
  type ScaleDirection,
} from './classifier.js';
export {
  selectTransition,
  planTransitions,
  TRANSITION_RULES,
  DEFAULT_TRANSITION,
  type SceneText,
  type TransitionDurations,
} from './transitions.js';
export {
  MockCompositor,
  joinedDuration,
  type MediaClip,
  type MediaCompositor,
  type JoinKind,
  type SceneRenderSpec,
} from './compositor.js';
export { captionTimings, type CaptionCue } from './captions.js';
export { FfmpegCompositor, XFADE_TRANSITIONS, escapeDrawText, type FfmpegCompositorOptions } from './ffmpeg.js';
export { VideoAssembler, introText, type VideoAssemblerOptions, type AssembleRequest } from './assembler.js';
