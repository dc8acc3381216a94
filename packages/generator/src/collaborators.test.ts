import { describe, it, expect } from 'vitest';
import { AuthError, createLogger, parseConfig } from '@topicreel/shared';
import { createCollaborators } from './collaborators.js';
import { MockScriptGenerator } from './mock-script.js';
import { GeminiScriptGenerator } from './script-generator.js';
import { ElevenLabsSpeechSynthesizer, GeminiSpeechSynthesizer, MockSpeechSynthesizer } from './providers/voice.js';
import { PexelsFootageFinder } from './providers/footage.js';
import { ManimAnimationRenderer } from './providers/animation.js';

const logger = createLogger('test', 'silent');

describe('createCollaborators', () => {
  it('uses mocks for dry runs', () => {
    const collaborators = createCollaborators(parseConfig({ DRY_RUN: 'true' }), logger);

    expect(collaborators.script).toBeInstanceOf(MockScriptGenerator);
    expect(collaborators.speech).toBeInstanceOf(MockSpeechSynthesizer);
    expect(collaborators.speechFallback).toBeUndefined();
    expect(collaborators.footageFallback).toBeUndefined();
  });

  it('wires the live adapters with the speech fallback', () => {
    const config = parseConfig({
      DRY_RUN: 'false',
      GEMINI_API_KEY: 'test-key',
      ELEVENLABS_API_KEY: 'test-key',
      PEXELS_API_KEY: 'test-key',
    });
    const collaborators = createCollaborators(config, logger);

    expect(collaborators.script).toBeInstanceOf(GeminiScriptGenerator);
    expect(collaborators.speech).toBeInstanceOf(ElevenLabsSpeechSynthesizer);
    expect(collaborators.speechFallback).toBeInstanceOf(GeminiSpeechSynthesizer);
    expect(collaborators.footage).toBeInstanceOf(PexelsFootageFinder);
    expect(collaborators.animation).toBeInstanceOf(ManimAnimationRenderer);
  });

  it('refuses a live run without credentials', () => {
    const config = parseConfig({ DRY_RUN: 'false', GEMINI_API_KEY: 'test-key' });

    expect(() => createCollaborators(config, logger)).toThrow(AuthError);
    expect(() => createCollaborators(config, logger)).toThrow('Missing credentials: ELEVENLABS_API_KEY, PEXELS_API_KEY');
  });
});

describe('MockScriptGenerator', () => {
  it('returns three ordered scenes about the topic', async () => {
    const script = await new MockScriptGenerator().generate('volcanoes');

    expect(script.topic).toBe('volcanoes');
    expect(script.scenes.map((s) => s.index)).toEqual([0, 1, 2]);
    expect(script.scenes[0].narration).toBe('Today we explore volcanoes. Stay with us to the end.');
  });
});
