import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ContentError, createLogger } from '@topicreel/shared';
import { GeminiScriptGenerator, buildScriptPrompt, parseScript } from './script-generator.js';

const generateContent = vi.hoisted(() => vi.fn());

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

const logger = createLogger('test', 'silent');

const SCRIPT_JSON = JSON.stringify({
  scenes: [
    { title: 'What is Photosynthesis?', content: ['Plants make their own food.', 'They use sunlight.'] },
    { title: '', content: ['  Chlorophyll is green.  ', ''] },
  ],
});

describe('parseScript', () => {
  it('builds ordered scenes with joined narration', () => {
    const script = parseScript('photosynthesis', SCRIPT_JSON);

    expect(script.topic).toBe('photosynthesis');
    expect(script.scenes).toHaveLength(2);
    expect(script.scenes[0]).toEqual({
      index: 0,
      title: 'What is Photosynthesis?',
      lines: ['Plants make their own food.', 'They use sunlight.'],
      narration: 'Plants make their own food. They use sunlight.',
      durationEstimate: 3,
    });
  });

  it('names untitled scenes by position and drops blank lines', () => {
    const script = parseScript('photosynthesis', SCRIPT_JSON);

    expect(script.scenes[1].title).toBe('Scene 2');
    expect(script.scenes[1].lines).toEqual(['Chlorophyll is green.']);
    expect(script.scenes[1].index).toBe(1);
  });

  it('finds the JSON object inside surrounding prose', () => {
    const script = parseScript('t', `Here is your script:\n\`\`\`json\n${SCRIPT_JSON}\n\`\`\``);
    expect(script.scenes).toHaveLength(2);
  });

  it('rejects replies without JSON', () => {
    expect(() => parseScript('t', 'Sorry, I cannot help')).toThrow(ContentError);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseScript('t', '{"scenes": [')).toThrow('No JSON object found');
    expect(() => parseScript('t', '{"scenes": [}')).toThrow('not valid JSON');
  });

  it('rejects a script with no scenes', () => {
    expect(() => parseScript('t', '{"scenes": []}')).toThrow('wrong shape');
  });
});

describe('buildScriptPrompt', () => {
  it('embeds the topic and the expected shape', () => {
    const prompt = buildScriptPrompt('black holes');
    expect(prompt).toContain('"black holes"');
    expect(prompt).toContain('"scenes"');
  });
});

describe('GeminiScriptGenerator', () => {
  beforeEach(() => {
    generateContent.mockReset();
  });

  it('asks the configured model and parses its reply', async () => {
    generateContent.mockResolvedValue({ text: SCRIPT_JSON });
    const generator = new GeminiScriptGenerator({ apiKey: 'test-key', model: 'gemini-test' }, logger);

    const script = await generator.generate('photosynthesis');

    expect(script.scenes).toHaveLength(2);
    expect(generateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gemini-test',
        config: expect.objectContaining({ temperature: 0.7, maxOutputTokens: 2000 }),
      }),
    );
  });

  it('passes the abort signal through', async () => {
    generateContent.mockResolvedValue({ text: SCRIPT_JSON });
    const generator = new GeminiScriptGenerator({ apiKey: 'test-key' }, logger);
    const controller = new AbortController();

    await generator.generate('photosynthesis', controller.signal);

    expect(generateContent.mock.calls[0][0].config.abortSignal).toBe(controller.signal);
  });

  it('fails with a content error on an empty reply', async () => {
    generateContent.mockResolvedValue({ text: undefined });
    const generator = new GeminiScriptGenerator({ apiKey: 'test-key' }, logger);

    await expect(generator.generate('photosynthesis')).rejects.toBeInstanceOf(ContentError);
  });
});
