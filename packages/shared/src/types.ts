// ─── Pipeline Stages ───

export const STAGE_NAMES = ['script', 'audio', 'illustration', 'animation', 'compilation'] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** Stages that run once per scene and own one media slot each */
export const SCENE_STAGES = ['audio', 'illustration', 'animation'] as const;

export type SceneStage = (typeof SCENE_STAGES)[number];

/** Stages whose failure aborts the whole run */
export const MANDATORY_STAGES: readonly StageName[] = ['script', 'audio', 'compilation'];

export const PIPELINE_PHASES = [
  'script_pending',
  'audio_pending',
  'illustration_pending',
  'animation_pending',
  'compilation_pending',
  'done',
  'failed',
] as const;

export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

// ─── Script ───

export interface ScriptScene {
  index: number; // 0-based, defines order
  title: string;
  lines: string[];
  narration: string;
  durationEstimate: number; // seconds
}

export interface Script {
  topic: string;
  title: string;
  scenes: ScriptScene[];
}

// ─── Media ───

export interface AudioClipRef {
  path: string;
  durationSeconds: number;
  engine: string;
}

export type ClipSource = 'stock' | 'animation' | 'placeholder' | 'composite' | 'title';

export interface ClipRef {
  path: string;
  durationSeconds?: number;
  source: ClipSource;
  keyword?: string;
  /** Provider id of the underlying asset, e.g. pexels:123 */
  sourceId?: string;
}

export interface SceneMedia {
  audio?: AudioClipRef;
  illustration?: ClipRef;
  animation?: ClipRef;
}

export interface Scene extends ScriptScene {
  media: SceneMedia;
}

// ─── Transitions ───

export const CONTENT_CATEGORIES = ['action', 'dramatic', 'temporal', 'scale'] as const;

export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];

export const TRANSITION_TYPES = ['crossfade', 'fade_to_black', 'zoom_in', 'zoom_out', 'quick_fade'] as const;

export type TransitionType = (typeof TRANSITION_TYPES)[number];

export const TRANSITION_DURATIONS: Record<TransitionType, number> = {
  crossfade: 1.0,
  fade_to_black: 1.0,
  zoom_in: 1.0,
  zoom_out: 1.0,
  quick_fade: 0.5,
};

export interface TransitionDecision {
  sourceIndex: number;
  targetIndex: number;
  transitionType: TransitionType;
  durationSeconds: number;
  categories: ContentCategory[];
}

// ─── Output ───

export interface Artifact {
  path: string;
  durationSeconds: number;
  sceneCount: number;
  transitions: TransitionDecision[];
}

export interface RunWarning {
  sceneIndex: number;
  stage: SceneStage;
  message: string;
}

// ─── Collaborator Interfaces ───

export interface ScriptGenerator {
  generate(topic: string, signal?: AbortSignal): Promise<Script>;
}

export interface SpeechSynthesizer {
  readonly name: string;
  synthesize(text: string, signal?: AbortSignal): Promise<AudioClipRef>;
}

export interface StockFootageFinder {
  /** used: source ids already taken in this run; the finder skips them and adds the one it picks */
  find(keywords: string[], signal?: AbortSignal, used?: Set<string>): Promise<ClipRef>;
}

export interface MathAnimationRenderer {
  /** Resolves to null when the scene has no mathematical content */
  render(scene: ScriptScene, signal?: AbortSignal): Promise<ClipRef | null>;
}

/** The collaborator set one pipeline run works with */
export interface PipelineCollaborators {
  script: ScriptGenerator;
  speech: SpeechSynthesizer;
  speechFallback?: SpeechSynthesizer;
  footage: StockFootageFinder;
  footageFallback?: StockFootageFinder;
  animation: MathAnimationRenderer;
}
