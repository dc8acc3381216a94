import {
  CompositionError,
  type Artifact,
  type Logger,
  type Scene,
  type TransitionDecision,
} from '@topicreel/shared';
import type { MediaClip, MediaCompositor } from './compositor.js';
import { captionTimings } from './captions.js';

/** Composes ordered scene media and the per-pair transitions into the final video,
 * framed by a fixed intro and outro card. */

export interface VideoAssemblerOptions {
  introSeconds?: number;
  outroSeconds?: number;
  introBackground?: string;
  outroBackground?: string;
  outroText?: string;
  /** Burn the script lines in as timed captions; on by default */
  captions?: boolean;
}

export interface AssembleRequest {
  /** Keys the compositor's intermediate files */
  runId: string;
  topic: string;
  outputPath: string;
}

export class VideoAssembler {
  private introSeconds: number;
  private outroSeconds: number;
  private introBackground: string;
  private outroBackground: string;
  private outroText: string;
  private captions: boolean;

  constructor(
    private compositor: MediaCompositor,
    private logger: Logger,
    options: VideoAssemblerOptions = {},
  ) {
    this.introSeconds = options.introSeconds ?? 3;
    this.outroSeconds = options.outroSeconds ?? 3;
    this.introBackground = options.introBackground ?? '0x0a0a1e';
    this.outroBackground = options.outroBackground ?? '0x1e0a0a';
    this.outroText = options.outroText ?? 'Thank you for watching!';
    this.captions = options.captions ?? true;
  }

  async assemble(
    scenes: readonly Scene[],
    transitions: readonly TransitionDecision[],
    request: AssembleRequest,
  ): Promise<Artifact> {
    assertOrdered(scenes);
    const byPair = indexTransitions(scenes, transitions);
    const compositor = this.compositor.forRun(request.runId);

    try {
      const clips: MediaClip[] = [];
      for (const scene of scenes) {
        const audio = scene.media.audio;
        if (!audio) {
          throw new CompositionError(`Scene ${scene.index} has no audio`);
        }
        if (!(audio.durationSeconds > 0)) {
          throw new CompositionError(`Scene ${scene.index} audio has no duration`);
        }
        const visual = scene.media.animation ?? scene.media.illustration ?? null;
        if (!visual) {
          this.logger.info({ scene: scene.index }, 'No visual layer, using placeholder');
        }
        clips.push(
          await compositor.renderScene({
            index: scene.index,
            title: scene.title,
            audio,
            visual,
            captions: this.captions ? captionTimings(scene.lines, audio.durationSeconds) : [],
          }),
        );
      }

      let body = clips[0];
      for (let i = 1; i < clips.length; i++) {
        const decision = byPair[i - 1];
        this.logger.debug(
          { from: decision.sourceIndex, to: decision.targetIndex, transition: decision.transitionType },
          'Applying transition',
        );
        body = await compositor.join(body, clips[i], decision.transitionType, decision.durationSeconds);
      }

      const intro = await compositor.titleCard(introText(request.topic), this.introSeconds, this.introBackground);
      const outro = await compositor.titleCard(this.outroText, this.outroSeconds, this.outroBackground);
      const framed = await compositor.join(
        await compositor.join(intro, body, 'cut', 0),
        outro,
        'cut',
        0,
      );
      const final = await compositor.finalize(framed, request.outputPath);

      return {
        path: final.path,
        durationSeconds: final.durationSeconds,
        sceneCount: scenes.length,
        transitions: [...byPair],
      };
    } catch (err) {
      if (err instanceof CompositionError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new CompositionError(`Assembly failed: ${message}`, { cause: err });
    }
  }
}

export function introText(topic: string): string {
  return `Video: ${topic.toLowerCase().replace(/\b\w/g, (c) => c.toUpperCase())}`;
}

function assertOrdered(scenes: readonly Scene[]): void {
  if (scenes.length === 0) {
    throw new CompositionError('No scenes to assemble');
  }
  scenes.forEach((scene, i) => {
    if (scene.index !== i) {
      throw new CompositionError(`Scene at position ${i} has index ${scene.index}`);
    }
  });
}

/** Transitions must cover every adjacent pair exactly once. */
function indexTransitions(
  scenes: readonly Scene[],
  transitions: readonly TransitionDecision[],
): TransitionDecision[] {
  const expected = scenes.length - 1;
  if (transitions.length !== expected) {
    throw new CompositionError(`Expected ${expected} transitions, got ${transitions.length}`);
  }

  const ordered: TransitionDecision[] = [];
  for (let i = 0; i < expected; i++) {
    const decision = transitions.find((t) => t.sourceIndex === i && t.targetIndex === i + 1);
    if (!decision) {
      throw new CompositionError(`Missing transition for scenes ${i} → ${i + 1}`);
    }
    ordered.push(decision);
  }
  return ordered;
}
