import type { Script, ScriptGenerator } from '@topicreel/shared';
import { buildScript } from './script-generator.js';

/** Canned three-scene script for dry runs. */
export class MockScriptGenerator implements ScriptGenerator {
  async generate(topic: string): Promise<Script> {
    return buildScript(topic, {
      scenes: [
        { title: `Introducing ${topic}`, content: [`Today we explore ${topic}.`, 'Stay with us to the end.'] },
        { title: 'How it works', content: [`Here is how ${topic} works, step by step.`] },
        { title: 'Wrapping up', content: [`Then we put it all together.`, `Now you know the basics of ${topic}.`] },
      ],
    });
  }
}
