import { describe, it, expect } from 'vitest';
import { AuthError, ContentError, type Script } from '@topicreel/shared';
import { PipelineRun } from './run-state.js';

function makeScript(count: number): Script {
  return {
    topic: 'tides',
    title: 'tides',
    scenes: Array.from({ length: count }, (_, index) => ({
      index,
      title: `Scene ${index + 1}`,
      lines: [`Line ${index}`],
      narration: `Line ${index}`,
      durationEstimate: 2,
    })),
  };
}

const audio = { path: 'a.mp3', durationSeconds: 4, engine: 'mock' };

describe('PipelineRun', () => {
  it('starts in script_pending with no scenes', () => {
    const run = new PipelineRun('tides', 'run-1');
    const status = run.status();

    expect(status.runId).toBe('run-1');
    expect(status.phase).toBe('script_pending');
    expect(status.scenes).toEqual([]);
    expect(run.signal.aborted).toBe(false);
  });

  it('accepts the script only once', () => {
    const run = new PipelineRun('tides');
    run.setScript(makeScript(2));

    expect(() => run.setScript(makeScript(2))).toThrow('already has a script');
  });

  it('rejects a script whose scenes are out of order', () => {
    const script = makeScript(2);
    script.scenes.reverse();

    expect(() => new PipelineRun('tides').setScript(script)).toThrow('Scene at position 0 has index 1');
  });

  it('writes each scene slot once', () => {
    const run = new PipelineRun('tides');
    run.setScript(makeScript(2));
    run.setSlot(0, 'audio', { status: 'success', payload: audio });

    expect(() => run.setSlot(0, 'audio', { status: 'success', payload: audio })).toThrow(
      'Slot audio of scene 0 is already written',
    );
    expect(() => run.setSlot(5, 'audio', { status: 'success', payload: audio })).toThrow('has no scene 5');
    expect(run.slot(0, 'audio')).toEqual({ status: 'success', payload: audio });
    expect(run.slot(1, 'audio')).toBeUndefined();
  });

  it('only moves phases forward', () => {
    const run = new PipelineRun('tides');
    run.advance('audio_pending');
    run.advance('illustration_pending');

    expect(() => run.advance('audio_pending')).toThrow('Cannot move run');
    expect(() => run.advance('failed')).toThrow('Cannot move run');
  });

  it('fails once, aborting the run signal with the error', () => {
    const run = new PipelineRun('tides');
    const error = new AuthError('bad key');
    run.fail('script', error);
    run.fail('audio', new ContentError('later'));

    expect(run.phase).toBe('failed');
    expect(run.failure).toEqual({ stage: 'script', error });
    expect(run.signal.aborted).toBe(true);
    expect(run.signal.reason).toBe(error);
    expect(() => run.advance('done')).toThrow('already failed');
    expect(run.status().failure).toEqual({ stage: 'script', kind: 'auth', message: 'bad key' });
  });

  it('builds scenes from the slots that produced media', () => {
    const run = new PipelineRun('tides');
    run.setScript(makeScript(2));
    run.setSlot(0, 'audio', { status: 'success', payload: audio });
    run.setSlot(1, 'audio', { status: 'fallback_used', payload: { ...audio, engine: 'backup' }, reason: 'primary down' });
    run.setSlot(0, 'illustration', { status: 'success', payload: { path: 'leaf.mp4', source: 'stock' } });
    run.setSlot(1, 'illustration', { status: 'failed', error: new ContentError('nothing found') });
    run.setSlot(0, 'animation', { status: 'success', payload: null });
    run.setSlot(1, 'animation', { status: 'success', payload: { path: 'graph.mp4', source: 'animation' } });

    const [first, second] = run.scenes();
    expect(first.media).toEqual({ audio, illustration: { path: 'leaf.mp4', source: 'stock' } });
    expect(second.media).toEqual({
      audio: { ...audio, engine: 'backup' },
      animation: { path: 'graph.mp4', source: 'animation' },
    });
  });

  it('reports per-scene slot progress', () => {
    const run = new PipelineRun('tides');
    run.setScript(makeScript(2));
    run.advance('audio_pending');
    run.setSlot(0, 'audio', { status: 'success', payload: audio });
    run.setSlot(1, 'audio', { status: 'failed', error: new ContentError('empty') });

    expect(run.status().scenes).toEqual([
      { index: 0, title: 'Scene 1', audio: 'success', illustration: 'pending', animation: 'pending' },
      { index: 1, title: 'Scene 2', audio: 'failed', illustration: 'pending', animation: 'pending' },
    ]);
  });

  it('records completion time and artifact when done', () => {
    const run = new PipelineRun('tides');
    run.advance('compilation_pending');
    run.complete({ path: 'out.mp4', durationSeconds: 12, sceneCount: 1, transitions: [] });

    const status = run.status();
    expect(status.phase).toBe('done');
    expect(status.artifact?.path).toBe('out.mp4');
    expect(status.finishedAt).toBeDefined();
  });
});
