import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join } from 'path';
import { CompositionError, createLogger } from '@topicreel/shared';
import { FfmpegCompositor, escapeDrawText } from './ffmpeg.js';

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock('child_process', () => ({ execFile: execFileMock }));
vi.mock('fs/promises', () => ({ mkdir: vi.fn().mockResolvedValue(undefined) }));

const logger = createLogger('test', 'silent');
const workDir = join('tmp', 'work');

function lastArgs(): string[] {
  const call = execFileMock.mock.calls[execFileMock.mock.calls.length - 1];
  return call[1];
}

describe('FfmpegCompositor', () => {
  beforeEach(() => {
    execFileMock.mockReset();
    execFileMock.mockImplementation((_file, _args, _opts, cb) => cb(null, '', ''));
  });

  it('invokes the configured ffmpeg binary quietly', async () => {
    const compositor = new FfmpegCompositor({ workDir, ffmpegPath: '/opt/ffmpeg' }, logger);
    await compositor.titleCard('Hello', 3, '0x000000');

    expect(execFileMock.mock.calls[0][0]).toBe('/opt/ffmpeg');
    expect(lastArgs().slice(0, 4)).toEqual(['-y', '-hide_banner', '-loglevel', 'error']);
  });

  it('joins two clips with an xfade transition and shortens the total by the overlap', async () => {
    const compositor = new FfmpegCompositor({ workDir }, logger);
    const joined = await compositor.join(
      { path: 'a.mp4', durationSeconds: 10 },
      { path: 'b.mp4', durationSeconds: 8 },
      'fade_to_black',
      1,
    );

    const args = lastArgs();
    expect(args[args.indexOf('-filter_complex') + 1]).toBe(
      '[0:v][1:v]xfade=transition=fadeblack:duration=1.00:offset=9.00[v];[0:a][1:a]acrossfade=d=1.00[a]',
    );
    expect(joined).toEqual({ path: join(workDir, 'join_1.mp4'), durationSeconds: 17 });
  });

  it('clamps the overlap to the shorter clip', async () => {
    const compositor = new FfmpegCompositor({ workDir }, logger);
    const joined = await compositor.join(
      { path: 'a.mp4', durationSeconds: 0.5 },
      { path: 'b.mp4', durationSeconds: 4 },
      'crossfade',
      1,
    );

    const args = lastArgs();
    expect(args[args.indexOf('-filter_complex') + 1]).toContain('xfade=transition=fade:duration=0.50:offset=0.00');
    expect(joined.durationSeconds).toBe(4);
  });

  it('concatenates on a cut', async () => {
    const compositor = new FfmpegCompositor({ workDir }, logger);
    const joined = await compositor.join(
      { path: 'a.mp4', durationSeconds: 3 },
      { path: 'b.mp4', durationSeconds: 20 },
      'cut',
      0,
    );

    const args = lastArgs();
    expect(args[args.indexOf('-filter_complex') + 1]).toBe('[0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[v][a]');
    expect(joined.durationSeconds).toBe(23);
  });

  it('renders a placeholder card when the scene has no visual', async () => {
    const compositor = new FfmpegCompositor({ workDir }, logger);
    const clip = await compositor.renderScene({
      index: 2,
      title: 'Why leaves are green',
      audio: { path: 'voice.mp3', durationSeconds: 5, engine: 'mock' },
      visual: null,
      captions: [],
    });

    const args = lastArgs();
    expect(args).toContain('color=c=0x003264:s=1920x1080:d=5.00:r=24');
    expect(args[args.indexOf('-vf') + 1]).toBe(
      "drawtext=text='Why leaves are green':fontcolor=white:fontsize=60:x=(w-text_w)/2:y=(h-text_h)/2",
    );
    expect(clip).toEqual({ path: join(workDir, 'scene_02.mp4'), durationSeconds: 5 });
  });

  it('loops the visual layer under the scene audio', async () => {
    const compositor = new FfmpegCompositor({ workDir }, logger);
    await compositor.renderScene({
      index: 0,
      title: 'Intro',
      audio: { path: 'voice.mp3', durationSeconds: 7.5, engine: 'mock' },
      visual: { path: 'stock.mp4', source: 'stock' },
      captions: [],
    });

    const args = lastArgs();
    expect(args.slice(4, 8)).toEqual(['-stream_loop', '-1', '-i', 'stock.mp4']);
    expect(args[args.indexOf('-t') + 1]).toBe('7.50');
  });

  it('draws each caption only during its cue', async () => {
    const compositor = new FfmpegCompositor({ workDir }, logger);
    await compositor.renderScene({
      index: 1,
      title: 'Tides',
      audio: { path: 'voice.mp3', durationSeconds: 6, engine: 'mock' },
      visual: { path: 'sea.mp4', source: 'stock' },
      captions: [
        { text: "The moon's pull", start: 0, end: 3 },
        { text: 'moves the sea', start: 3, end: 6 },
      ],
    });

    const filter = lastArgs()[lastArgs().indexOf('-vf') + 1];
    expect(filter.split(',drawtext=').slice(1)).toEqual([
      "text='The moons pull':fontcolor=white:fontsize=32:box=1:boxcolor=black@0.8:boxborderw=20:x=40:y=h-h/10-text_h:enable='between(t,0.00,3.00)'",
      "text='moves the sea':fontcolor=white:fontsize=32:box=1:boxcolor=black@0.8:boxborderw=20:x=40:y=h-h/10-text_h:enable='between(t,3.00,6.00)'",
    ]);
  });

  it('keeps the work files of different runs apart', async () => {
    const compositor = new FfmpegCompositor({ workDir }, logger);
    const spec = {
      index: 0,
      title: 'Intro',
      audio: { path: 'voice.mp3', durationSeconds: 4, engine: 'mock' },
      visual: null,
      captions: [],
    };

    const first = await compositor.forRun('run-a').renderScene(spec);
    const second = await compositor.forRun('run-b').renderScene(spec);

    expect(first.path).toBe(join(workDir, 'run-a', 'scene_00.mp4'));
    expect(second.path).toBe(join(workDir, 'run-b', 'scene_00.mp4'));
  });

  it('raises CompositionError with ffmpeg stderr on failure', async () => {
    execFileMock.mockImplementation((_file, _args, _opts, cb) => cb(new Error('exit 1'), '', 'Invalid data found'));
    const compositor = new FfmpegCompositor({ workDir }, logger);

    const result = compositor.finalize({ path: 'x.mp4', durationSeconds: 1 }, join('out', 'final.mp4'));
    await expect(result).rejects.toBeInstanceOf(CompositionError);
    await expect(result).rejects.toThrow('ffmpeg failed: Invalid data found');
  });
});

describe('escapeDrawText', () => {
  it('drops drawtext syntax characters', () => {
    expect(escapeDrawText("Nature's 50%: roots, [stems]; leaves")).toBe('Natures 50 roots stems leaves');
  });
});
