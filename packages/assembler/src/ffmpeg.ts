import { execFile } from 'child_process';
import { mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { CompositionError, type Logger, type TransitionType } from '@topicreel/shared';
import type { CaptionCue } from './captions.js';
import {
  clampOverlap,
  joinedDuration,
  type JoinKind,
  type MediaClip,
  type MediaCompositor,
  type SceneRenderSpec,
} from './compositor.js';

/** ffmpeg-backed compositor. Every primitive is one ffmpeg invocation writing into workDir;
 * forRun() narrows workDir to a directory of the run's own. */

export interface FfmpegCompositorOptions {
  workDir: string;
  ffmpegPath?: string;
  width?: number;
  height?: number;
  fps?: number;
  placeholderColor?: string;
  captionFontSize?: number;
}

/** xfade transition names for each selectable transition */
export const XFADE_TRANSITIONS: Record<TransitionType, string> = {
  crossfade: 'fade',
  fade_to_black: 'fadeblack',
  quick_fade: 'fade',
  zoom_in: 'zoomin',
  zoom_out: 'circleclose',
};

export class FfmpegCompositor implements MediaCompositor {
  private ffmpegPath: string;
  private width: number;
  private height: number;
  private fps: number;
  private placeholderColor: string;
  private counter = 0;

  constructor(
    private options: FfmpegCompositorOptions,
    private logger: Logger,
  ) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.width = options.width ?? 1920;
    this.height = options.height ?? 1080;
    this.fps = options.fps ?? 24;
    this.placeholderColor = options.placeholderColor ?? '0x003264';
  }

  forRun(runId: string): FfmpegCompositor {
    return new FfmpegCompositor(
      { ...this.options, workDir: join(this.options.workDir, runId) },
      this.logger.child({ runId }),
    );
  }

  async renderScene(spec: SceneRenderSpec): Promise<MediaClip> {
    const duration = spec.audio.durationSeconds;
    const out = await this.workFile(`scene_${String(spec.index).padStart(2, '0')}.mp4`);

    const videoInput = spec.visual
      ? ['-stream_loop', '-1', '-i', spec.visual.path]
      : ['-f', 'lavfi', '-i', this.colorSource(this.placeholderColor, duration)];
    const baseFilter = spec.visual
      ? `scale=${this.width}:${this.height}:force_original_aspect_ratio=decrease,` +
        `pad=${this.width}:${this.height}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${this.fps}`
      : this.drawText(spec.title, 60);
    const videoFilter = [baseFilter, ...spec.captions.map((cue) => this.captionFilter(cue))].join(',');

    await this.ffmpeg([
      ...videoInput,
      '-i', spec.audio.path,
      '-map', '0:v', '-map', '1:a',
      '-vf', videoFilter,
      ...this.encodeArgs(),
      '-t', duration.toFixed(2),
      out,
    ]);

    this.logger.debug(
      { scene: spec.index, visual: spec.visual?.source ?? 'placeholder', captions: spec.captions.length, out },
      'Scene rendered',
    );
    return { path: out, durationSeconds: duration };
  }

  async titleCard(text: string, durationSeconds: number, background: string): Promise<MediaClip> {
    const out = await this.workFile(`title_${++this.counter}.mp4`);
    await this.ffmpeg([
      '-f', 'lavfi', '-i', this.colorSource(background, durationSeconds),
      '-f', 'lavfi', '-i', 'anullsrc=r=44100:cl=stereo',
      '-vf', this.drawText(text, 80),
      ...this.encodeArgs(),
      '-t', durationSeconds.toFixed(2),
      out,
    ]);
    return { path: out, durationSeconds };
  }

  async join(first: MediaClip, second: MediaClip, kind: JoinKind, durationSeconds: number): Promise<MediaClip> {
    const out = await this.workFile(`join_${++this.counter}.mp4`);
    const filter = kind === 'cut'
      ? '[0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[v][a]'
      : this.transitionFilter(first, second, kind, durationSeconds);

    await this.ffmpeg([
      '-i', first.path,
      '-i', second.path,
      '-filter_complex', filter,
      '-map', '[v]', '-map', '[a]',
      ...this.encodeArgs(),
      out,
    ]);
    return { path: out, durationSeconds: joinedDuration(first, second, kind, durationSeconds) };
  }

  async finalize(clip: MediaClip, outputPath: string): Promise<MediaClip> {
    await mkdir(dirname(outputPath), { recursive: true });
    await this.ffmpeg(['-i', clip.path, '-c', 'copy', '-movflags', '+faststart', outputPath]);
    this.logger.info({ outputPath, duration: clip.durationSeconds }, 'Video written');
    return { path: outputPath, durationSeconds: clip.durationSeconds };
  }

  private transitionFilter(first: MediaClip, second: MediaClip, kind: TransitionType, durationSeconds: number): string {
    const overlap = clampOverlap(first, second, durationSeconds);
    const offset = Math.max(0, first.durationSeconds - overlap);
    return (
      `[0:v][1:v]xfade=transition=${XFADE_TRANSITIONS[kind]}:duration=${overlap.toFixed(2)}:offset=${offset.toFixed(2)}[v];` +
      `[0:a][1:a]acrossfade=d=${overlap.toFixed(2)}[a]`
    );
  }

  private colorSource(color: string, durationSeconds: number): string {
    return `color=c=${color}:s=${this.width}x${this.height}:d=${durationSeconds.toFixed(2)}:r=${this.fps}`;
  }

  private drawText(text: string, fontSize: number): string {
    return `drawtext=text='${escapeDrawText(text)}':fontcolor=white:fontsize=${fontSize}:x=(w-text_w)/2:y=(h-text_h)/2`;
  }

  /** White text on a dark box, left-aligned above a 10% bottom margin, shown only during its cue. */
  private captionFilter(cue: CaptionCue): string {
    const size = this.options.captionFontSize ?? 32;
    return (
      `drawtext=text='${escapeDrawText(cue.text)}':fontcolor=white:fontsize=${size}` +
      `:box=1:boxcolor=black@0.8:boxborderw=20:x=40:y=h-h/10-text_h` +
      `:enable='between(t,${cue.start.toFixed(2)},${cue.end.toFixed(2)})'`
    );
  }

  private encodeArgs(): string[] {
    return ['-c:v', 'libx264', '-preset', 'fast', '-pix_fmt', 'yuv420p', '-r', String(this.fps), '-c:a', 'aac', '-ar', '44100', '-ac', '2'];
  }

  private async workFile(name: string): Promise<string> {
    await mkdir(this.options.workDir, { recursive: true });
    return join(this.options.workDir, name);
  }

  private ffmpeg(args: string[]): Promise<void> {
    const fullArgs = ['-y', '-hide_banner', '-loglevel', 'error', ...args];
    return new Promise((resolve, reject) => {
      execFile(this.ffmpegPath, fullArgs, { maxBuffer: 16 * 1024 * 1024 }, (err, _stdout, stderr) => {
        if (err) {
          reject(new CompositionError(`ffmpeg failed: ${stderr || err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }
}

/** drawtext treats these as syntax; dropping them is enough for titles. */
export function escapeDrawText(text: string): string {
  return text.replace(/[\\':%,;[\]]/g, '');
}
