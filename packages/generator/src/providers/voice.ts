import { GoogleGenAI } from '@google/genai';
import { randomUUID } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ContentError, errorFromResponse, type AudioClipRef, type SpeechSynthesizer } from '@topicreel/shared';
import { measureDuration } from './duration.js';

// ─── ElevenLabs (Primary) ───

export const ELEVENLABS_VOICES = {
  Daniel: 'onwK4e9ZLuTAKqWW03F9',
  Female: '21m00Tcm4TlvDq8ikWAM',
} as const;

export interface ElevenLabsOptions {
  apiKey: string;
  outputDir: string;
  voiceId?: string;
  model?: string;
  stability?: number;
  similarityBoost?: number;
  ffprobePath?: string;
}

/** ElevenLabs text-to-speech. Writes mp3 files under outputDir and measures them with ffprobe. */
export class ElevenLabsSpeechSynthesizer implements SpeechSynthesizer {
  readonly name = 'elevenlabs';
  private apiKey: string;
  private outputDir: string;
  private voiceId: string;
  private model: string;
  private stability: number;
  private similarityBoost: number;
  private ffprobePath: string;

  constructor(options: ElevenLabsOptions) {
    this.apiKey = options.apiKey;
    this.outputDir = options.outputDir;
    this.voiceId = options.voiceId ?? ELEVENLABS_VOICES.Daniel;
    this.model = options.model ?? 'eleven_multilingual_v2';
    this.stability = options.stability ?? 0.5;
    this.similarityBoost = options.similarityBoost ?? 0.5;
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<AudioClipRef> {
    if (!text.trim()) throw new ContentError('Cannot synthesize empty text');

    const response = await fetch(`https://api.elevenlabs.io/v1/text-to-speech/${this.voiceId}`, {
      method: 'POST',
      headers: {
        Accept: 'audio/mpeg',
        'Content-Type': 'application/json',
        'xi-api-key': this.apiKey,
      },
      body: JSON.stringify({
        text,
        model_id: this.model,
        voice_settings: {
          stability: this.stability,
          similarity_boost: this.similarityBoost,
        },
      }),
      signal,
    });

    if (!response.ok) {
      throw errorFromResponse(response.status, await response.text(), 'ElevenLabs TTS');
    }

    const path = await writeAudio(this.outputDir, 'mp3', Buffer.from(await response.arrayBuffer()));
    const durationSeconds = await measureDuration(path, this.ffprobePath, signal);
    return { path, durationSeconds, engine: this.name };
  }
}

// ─── Google Gemini TTS (Fallback) ───

export interface GeminiTTSOptions {
  apiKey: string;
  outputDir: string;
  model?: string;
  voiceName?: string;
}

/** Gemini TTS via the audio response modality. The API returns 24kHz 16-bit mono PCM. */
export class GeminiSpeechSynthesizer implements SpeechSynthesizer {
  readonly name = 'gemini';
  private client: GoogleGenAI;
  private outputDir: string;
  private model: string;
  private voiceName: string;

  constructor(options: GeminiTTSOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.outputDir = options.outputDir;
    this.model = options.model ?? 'gemini-2.5-flash-preview-tts';
    this.voiceName = options.voiceName ?? 'Kore';
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<AudioClipRef> {
    if (!text.trim()) throw new ContentError('Cannot synthesize empty text');

    const response = await this.client.models.generateContent({
      model: this.model,
      contents: text,
      config: {
        responseModalities: ['AUDIO'],
        speechConfig: {
          voiceConfig: {
            prebuiltVoiceConfig: { voiceName: this.voiceName },
          },
        },
        abortSignal: signal,
      },
    });

    const parts = response.candidates?.[0]?.content?.parts ?? [];
    const data = parts.find((p) => p.inlineData?.data)?.inlineData?.data;
    if (!data) {
      throw new ContentError('Gemini TTS response contains no audio data');
    }

    const pcm = Buffer.from(data, 'base64');
    if (pcm.length < 2) {
      throw new ContentError('Gemini TTS returned empty audio');
    }
    const path = await writeAudio(this.outputDir, 'wav', pcmToWav(pcm, 24_000));
    return { path, durationSeconds: pcm.length / (24_000 * 2), engine: this.name };
  }
}

// ─── Mock ───

export class MockSpeechSynthesizer implements SpeechSynthesizer {
  readonly name = 'mock';
  private counter = 0;

  async synthesize(text: string): Promise<AudioClipRef> {
    return {
      path: `mock://audio/${++this.counter}.mp3`,
      durationSeconds: Math.max(1, estimateSpeechDuration(text)),
      engine: this.name,
    };
  }
}

// ─── Helpers ───

export function estimateSpeechDuration(text: string, speed = 1.0): number {
  // ~150 words per minute
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.round((words / 150) * 60 / speed);
}

/** Prefix raw 16-bit mono PCM with a RIFF/WAVE header. */
export function pcmToWav(pcm: Buffer, sampleRate: number): Buffer {
  const header = Buffer.alloc(44);
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8);
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36);
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}

async function writeAudio(outputDir: string, extension: string, data: Buffer): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, `audio_${randomUUID().slice(0, 8)}.${extension}`);
  await writeFile(path, data);
  return path;
}
