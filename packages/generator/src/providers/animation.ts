import { GoogleGenAI } from '@google/genai';
import { execFile } from 'child_process';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { createHash } from 'crypto';
import { z } from 'zod';
import {
  ContentError,
  type ClipRef,
  type Logger,
  type MathAnimationRenderer,
  type ScriptScene,
} from '@topicreel/shared';

/** Manim illustrations for mathematical scenes.
 * Gemini decides whether a scene is mathematical and writes the Manim scene; the manim CLI renders it. */

export interface ManimRendererOptions {
  apiKey: string;
  outputDir: string;
  model?: string;
  manimPath?: string;
  /** manim quality flag: l, m, h */
  quality?: 'l' | 'm' | 'h';
}

const QUALITY_DIRS = { l: '480p15', m: '720p30', h: '1080p60' } as const;

const detectionSchema = z.object({
  needs_manim: z.boolean(),
  content_type: z.string().default('none'),
  description: z.string().default(''),
});

export type MathDetection = z.infer<typeof detectionSchema>;

export class ManimAnimationRenderer implements MathAnimationRenderer {
  private client: GoogleGenAI;
  private outputDir: string;
  private model: string;
  private manimPath: string;
  private quality: 'l' | 'm' | 'h';

  constructor(
    options: ManimRendererOptions,
    private logger: Logger,
  ) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.outputDir = options.outputDir;
    this.model = options.model ?? 'gemini-2.0-flash';
    this.manimPath = options.manimPath ?? 'manim';
    this.quality = options.quality ?? 'l';
  }

  async render(scene: ScriptScene, signal?: AbortSignal): Promise<ClipRef | null> {
    const detection = await this.detect(scene.narration, signal);
    if (!detection.needs_manim) {
      this.logger.debug({ scene: scene.index }, 'No mathematical content');
      return null;
    }

    const code = await this.generateCode(scene.narration, detection, signal);
    const sceneClass = findSceneClass(code);
    const name = `illustration_${createHash('sha1').update(scene.narration).digest('hex').slice(0, 8)}`;

    await mkdir(this.outputDir, { recursive: true });
    const sourcePath = join(this.outputDir, `${name}.py`);
    await writeFile(sourcePath, code);

    await this.runManim([`-q${this.quality}`, '--media_dir', this.outputDir, '-o', `${name}.mp4`, sourcePath, sceneClass], signal);

    const videoPath = join(this.outputDir, 'videos', name, QUALITY_DIRS[this.quality], `${name}.mp4`);
    this.logger.info({ scene: scene.index, contentType: detection.content_type, videoPath }, 'Manim animation rendered');
    return { path: videoPath, source: 'animation' };
  }

  async detect(narration: string, signal?: AbortSignal): Promise<MathDetection> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: `Analyze this dialogue and determine if it contains mathematical content that would benefit from visual illustration (graphs, equations, geometric shapes, data visualization, etc.):

"${narration}"

Respond with JSON in this exact format:
{"needs_manim": true/false, "content_type": "equation/graph/geometry/data/none", "description": "brief description of what should be illustrated"}`,
      config: { temperature: 0.3, maxOutputTokens: 1000, abortSignal: signal },
    });
    return parseDetection(response.text ?? '');
  }

  private async generateCode(narration: string, detection: MathDetection, signal?: AbortSignal): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: `Write a Manim Community Edition scene that illustrates this ${detection.content_type}: ${detection.description}

Dialogue: "${narration}"

Rules:
- One class extending Scene with a construct method
- Start with "from manim import *"
- Keep it under 10 seconds
- Output only Python code`,
      config: { temperature: 0.3, maxOutputTokens: 2000, abortSignal: signal },
    });
    return extractCode(response.text ?? '');
  }

  private runManim(args: string[], signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      execFile(this.manimPath, args, { signal, maxBuffer: 16 * 1024 * 1024 }, (err, _stdout, stderr) => {
        if (err) {
          reject(new ContentError(`manim render failed: ${stderr || err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }
}

export function parseDetection(text: string): MathDetection {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) throw new ContentError('No JSON in math detection response');
  try {
    return detectionSchema.parse(JSON.parse(text.slice(start, end + 1)));
  } catch (err) {
    throw new ContentError('Unreadable math detection response', { cause: err });
  }
}

/** Strip a markdown fence if the model wrapped the code in one. */
export function extractCode(text: string): string {
  const fenced = text.match(/```(?:python)?\s*\n([\s\S]*?)```/);
  return (fenced ? fenced[1] : text).trim();
}

export function findSceneClass(code: string): string {
  const match = code.match(/class\s+(\w+)\s*\(\s*Scene\s*\)/);
  if (!match) throw new ContentError('Could not find Scene class in generated code');
  return match[1];
}

// ─── Mock ───

const MATH_PATTERN = /equation|formula|graph|triangle|\d+\s*[-+*/=x]\s*\d+/i;

/** Renders a mock clip for scenes that look mathematical, skips the rest. */
export class MockAnimationRenderer implements MathAnimationRenderer {
  async render(scene: ScriptScene): Promise<ClipRef | null> {
    if (!MATH_PATTERN.test(scene.narration)) return null;
    return { path: `mock://animation/${scene.index}.mp4`, durationSeconds: 8, source: 'animation' };
  }
}
