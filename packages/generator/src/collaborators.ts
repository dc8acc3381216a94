import { join } from 'path';
import { AuthError, missingCredentials, type Config, type Logger, type PipelineCollaborators } from '@topicreel/shared';
import { GeminiScriptGenerator } from './script-generator.js';
import { ElevenLabsSpeechSynthesizer, GeminiSpeechSynthesizer, MockSpeechSynthesizer } from './providers/voice.js';
import { PexelsFootageFinder, MockFootageFinder } from './providers/footage.js';
import { ManimAnimationRenderer, MockAnimationRenderer } from './providers/animation.js';
import { MockScriptGenerator } from './mock-script.js';

/** Build the collaborator set for a run. Dry runs get mocks and never touch the network. */
export function createCollaborators(config: Config, logger: Logger): PipelineCollaborators {
  if (config.dryRun) {
    logger.debug('Using mock collaborators (dry run)');
    return {
      script: new MockScriptGenerator(),
      speech: new MockSpeechSynthesizer(),
      footage: new MockFootageFinder(),
      animation: new MockAnimationRenderer(),
    };
  }

  const missing = missingCredentials(config);
  if (missing.length > 0) {
    throw new AuthError(`Missing credentials: ${missing.join(', ')}`);
  }

  const audioDir = join(config.outputDir, 'audio');
  return {
    script: new GeminiScriptGenerator({ apiKey: config.geminiApiKey, model: config.geminiModel }, logger),
    speech: new ElevenLabsSpeechSynthesizer({
      apiKey: config.elevenlabsApiKey,
      voiceId: config.elevenlabsVoiceId,
      ffprobePath: config.ffprobePath,
      outputDir: audioDir,
    }),
    speechFallback: new GeminiSpeechSynthesizer({ apiKey: config.geminiApiKey, outputDir: audioDir }),
    footage: new PexelsFootageFinder({ apiKey: config.pexelsApiKey }),
    animation: new ManimAnimationRenderer(
      {
        apiKey: config.geminiApiKey,
        model: config.geminiModel,
        manimPath: config.manimPath,
        outputDir: join(config.outputDir, 'manim'),
      },
      logger,
    ),
  };
}
