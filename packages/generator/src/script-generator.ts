import { GoogleGenAI } from '@google/genai';
import { z } from 'zod';
import {
  ContentError,
  type Logger,
  type Script,
  type ScriptGenerator,
  type ScriptScene,
} from '@topicreel/shared';
import { estimateSpeechDuration } from './providers/voice.js';

/** Gemini-powered script writer. Produces a ~2 minute script split into 5-7 scenes. */

export interface GeminiScriptGeneratorOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

const rawScriptSchema = z.object({
  scenes: z
    .array(
      z.object({
        title: z.string().default(''),
        content: z.array(z.string()).min(1),
      }),
    )
    .min(1),
});

export type RawScript = z.infer<typeof rawScriptSchema>;

export class GeminiScriptGenerator implements ScriptGenerator {
  private client: GoogleGenAI;
  private model: string;
  private temperature: number;
  private maxOutputTokens: number;

  constructor(
    options: GeminiScriptGeneratorOptions,
    private logger: Logger,
  ) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gemini-2.0-flash';
    this.temperature = options.temperature ?? 0.7;
    this.maxOutputTokens = options.maxOutputTokens ?? 2000;
  }

  async generate(topic: string, signal?: AbortSignal): Promise<Script> {
    this.logger.info({ topic, model: this.model }, 'Generating script');

    const response = await this.client.models.generateContent({
      model: this.model,
      contents: buildScriptPrompt(topic),
      config: {
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        abortSignal: signal,
      },
    });

    const script = parseScript(topic, response.text ?? '');
    this.logger.info({ topic, scenes: script.scenes.length }, 'Script generated');
    return script;
  }
}

export function buildScriptPrompt(topic: string): string {
  return `Write a 2 min video script of this topic in an interactive way: "${topic}"

Respond in JSON with strictly these keys:
{"scenes": [{"title": "", "content": ["line1", "line2"]}, {"title": "", "content": ["line1", "line2"]}]}

Make sure:
- The script is engaging and interactive
- Each scene has a clear title
- Content is broken down into digestible lines
- Total duration should be around 2 minutes when spoken
- Include 5-7 scenes for good pacing
- Do not include extra instructions or comments in the script, just the dialogue`;
}

/** Extract the JSON object from an LLM reply and build ordered scenes from it. */
export function parseScript(topic: string, text: string): Script {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new ContentError('No JSON object found in script response');
  }

  let json: unknown;
  try {
    json = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ContentError(`Script response is not valid JSON: ${message}`, { cause: err });
  }

  const result = rawScriptSchema.safeParse(json);
  if (!result.success) {
    throw new ContentError(`Script response has the wrong shape: ${result.error.issues[0]?.message ?? 'unknown'}`);
  }

  return buildScript(topic, result.data);
}

export function buildScript(topic: string, raw: RawScript): Script {
  const scenes: ScriptScene[] = raw.scenes.map((scene, index) => {
    const lines = scene.content.map((line) => line.trim()).filter(Boolean);
    const narration = lines.join(' ');
    return {
      index,
      title: scene.title.trim() || `Scene ${index + 1}`,
      lines,
      narration,
      durationEstimate: estimateSpeechDuration(narration),
    };
  });

  return { topic, title: topic, scenes };
}
