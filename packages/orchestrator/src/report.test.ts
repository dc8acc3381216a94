import { describe, it, expect, vi } from 'vitest';
import { join } from 'path';
import type { TransitionDecision } from '@topicreel/shared';
import { parseCliArgs, renderTransitionTable, renderWarnings, saveProject } from './report.js';
import type { RunStatus } from './run-state.js';

const writeFileMock = vi.hoisted(() => vi.fn());

vi.mock('fs/promises', () => ({
  mkdir: vi.fn().mockResolvedValue(undefined),
  writeFile: writeFileMock,
}));

describe('parseCliArgs', () => {
  it('joins the positional words into the topic', () => {
    expect(parseCliArgs(['black', 'holes', '-o', 'space.mp4', '--save-project'])).toEqual({
      command: 'run',
      topic: 'black holes',
      output: 'space.mp4',
      saveProject: true,
      live: false,
    });
  });

  it('recognises the serve command and its port', () => {
    expect(parseCliArgs(['serve', '--port', '4000'])).toEqual({
      command: 'serve',
      topic: '',
      port: 4000,
      saveProject: false,
      live: false,
    });
  });

  it('shows help without a topic or when asked', () => {
    expect(parseCliArgs([]).command).toBe('help');
    expect(parseCliArgs(['tides', '--help']).command).toBe('help');
  });

  it('enables live mode', () => {
    expect(parseCliArgs(['--live', 'tides']).live).toBe(true);
  });
});

describe('renderTransitionTable', () => {
  it('lists one row per decision with 1-based scene numbers', () => {
    const transitions: TransitionDecision[] = [
      { sourceIndex: 0, targetIndex: 1, transitionType: 'fade_to_black', durationSeconds: 1, categories: ['dramatic'] },
      { sourceIndex: 1, targetIndex: 2, transitionType: 'quick_fade', durationSeconds: 0.5, categories: ['temporal'] },
    ];

    const table = renderTransitionTable(transitions);

    expect(table).toContain('fade_to_black');
    expect(table).toContain('quick_fade');
    expect(table).toContain('0.5');
    expect(table).toContain('dramatic');
  });
});

describe('renderWarnings', () => {
  it('describes each degraded scene', () => {
    expect(renderWarnings([{ sceneIndex: 1, stage: 'illustration', message: 'No stock footage found' }])).toEqual([
      'Scene 2 illustration: No stock footage found',
    ]);
  });
});

describe('saveProject', () => {
  it('writes the run status as project_data.json', async () => {
    const status: RunStatus = {
      runId: 'run-1',
      topic: 'tides',
      phase: 'done',
      startedAt: '2026-01-01T00:00:00.000Z',
      scenes: [],
      warnings: [],
      transitions: [],
    };

    const path = await saveProject(status, 'out');

    expect(path).toBe(join('out', 'project_data.json'));
    expect(JSON.parse(writeFileMock.mock.calls[0][1])).toEqual(status);
  });
});
