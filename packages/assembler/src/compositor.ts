import type { AudioClipRef, ClipRef, TransitionType } from '@topicreel/shared';
import type { CaptionCue } from './captions.js';

/** Low-level media primitives used by the VideoAssembler. */

export interface MediaClip {
  path: string;
  durationSeconds: number;
}

export type JoinKind = TransitionType | 'cut';

export interface SceneRenderSpec {
  index: number;
  title: string;
  audio: AudioClipRef;
  /** null renders a placeholder card with the title */
  visual: ClipRef | null;
  captions: CaptionCue[];
}

export interface MediaCompositor {
  /** A compositor whose intermediate files belong to one run only */
  forRun(runId: string): MediaCompositor;
  renderScene(spec: SceneRenderSpec): Promise<MediaClip>;
  titleCard(text: string, durationSeconds: number, background: string): Promise<MediaClip>;
  join(first: MediaClip, second: MediaClip, kind: JoinKind, durationSeconds: number): Promise<MediaClip>;
  finalize(clip: MediaClip, outputPath: string): Promise<MediaClip>;
}

/** Length of two clips joined by a transition that overlaps them. */
export function joinedDuration(first: MediaClip, second: MediaClip, kind: JoinKind, durationSeconds: number): number {
  if (kind === 'cut') return first.durationSeconds + second.durationSeconds;
  return first.durationSeconds + second.durationSeconds - clampOverlap(first, second, durationSeconds);
}

export function clampOverlap(first: MediaClip, second: MediaClip, durationSeconds: number): number {
  return Math.max(0, Math.min(durationSeconds, first.durationSeconds, second.durationSeconds));
}

// ─── Mock ───

/** In-memory compositor for dry runs and tests. Records every operation. */
export class MockCompositor implements MediaCompositor {
  readonly operations: string[] = [];
  readonly renders: SceneRenderSpec[] = [];
  readonly runs: string[] = [];
  private counter = 0;

  forRun(runId: string): MediaCompositor {
    this.runs.push(runId);
    return this;
  }

  async renderScene(spec: SceneRenderSpec): Promise<MediaClip> {
    this.renders.push(spec);
    this.operations.push(`scene:${spec.index}:${spec.visual ? spec.visual.source : 'placeholder'}`);
    return { path: `mock://scene/${spec.index}.mp4`, durationSeconds: spec.audio.durationSeconds };
  }

  async titleCard(text: string, durationSeconds: number): Promise<MediaClip> {
    this.operations.push(`title:${text}`);
    return { path: `mock://title/${++this.counter}.mp4`, durationSeconds };
  }

  async join(first: MediaClip, second: MediaClip, kind: JoinKind, durationSeconds: number): Promise<MediaClip> {
    this.operations.push(`join:${kind}:${durationSeconds}`);
    return {
      path: `mock://join/${++this.counter}.mp4`,
      durationSeconds: joinedDuration(first, second, kind, durationSeconds),
    };
  }

  async finalize(clip: MediaClip, outputPath: string): Promise<MediaClip> {
    this.operations.push(`finalize:${outputPath}`);
    return { path: outputPath, durationSeconds: clip.durationSeconds };
  }
}
