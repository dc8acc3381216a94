import { join } from 'path';
import pLimit from 'p-limit';
import {
  ContentError,
  toPipelineError,
  type Artifact,
  type Logger,
  type PipelineCollaborators,
  type PipelineError,
  type PipelinePhase,
  type RunWarning,
  type SceneStage,
  type ScriptScene,
  type StageName,
} from '@topicreel/shared';
import { planTransitions, type TransitionDurations, type VideoAssembler } from '@topicreel/assembler';
import { sceneKeywords } from '@topicreel/generator';
import { StageRunner, type StageCall, type StageResult } from './stage-runner.js';
import { PipelineRun, type RunStatus, type SlotPayloads } from './run-state.js';

/** Drives a topic through script → audio → illustration → animation → compilation.
 * Per-scene stages fan out under a concurrency limit; each phase is a barrier. */

export interface PipelineOrchestratorOptions {
  outputDir: string;
  maxConcurrency?: number;
  maxRetries?: number;
  retryInitialDelayMs?: number;
  stageTimeoutMs?: number;
  transitionDurations?: TransitionDurations;
  /** Finished runs kept for status queries; older ones are evicted first */
  maxRunHistory?: number;
}

export type PipelineOutcome =
  | { status: 'done'; runId: string; artifact: Artifact; warnings: RunWarning[] }
  | { status: 'failed'; runId: string; stage: StageName; error: PipelineError; warnings: RunWarning[] };

export interface StartedRun {
  runId: string;
  /** Never rejects; failures resolve to a failed outcome */
  outcome: Promise<PipelineOutcome>;
}

const PHASE_STAGE: Record<PipelinePhase, StageName> = {
  script_pending: 'script',
  audio_pending: 'audio',
  illustration_pending: 'illustration',
  animation_pending: 'animation',
  compilation_pending: 'compilation',
  done: 'compilation',
  failed: 'compilation',
};

export class PipelineOrchestrator {
  private runs = new Map<string, PipelineRun>();
  private maxConcurrency: number;
  private maxRunHistory: number;

  constructor(
    private collaborators: PipelineCollaborators,
    private assembler: VideoAssembler,
    private logger: Logger,
    private options: PipelineOrchestratorOptions,
  ) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 3);
    this.maxRunHistory = Math.max(1, options.maxRunHistory ?? 50);
  }

  /** Run the whole pipeline for a topic and wait for its outcome. */
  async runPipeline(topic: string, outputFilename?: string): Promise<PipelineOutcome> {
    return this.start(topic, outputFilename).outcome;
  }

  /** Start a run and return its id straight away. */
  start(topic: string, outputFilename?: string): StartedRun {
    const run = new PipelineRun(topic);
    this.runs.set(run.id, run);

    let outcome: Promise<PipelineOutcome>;
    if (!topic.trim()) {
      const log = this.logger.child({ runId: run.id });
      outcome = Promise.resolve(this.failRun(run, 'script', new ContentError('Topic must not be empty'), log));
    } else {
      const outputPath = join(this.options.outputDir, 'compiled_videos', outputFilename ?? defaultOutputFilename(topic));
      outcome = this.execute(run, outputPath);
    }
    return { runId: run.id, outcome: outcome.finally(() => this.pruneRuns()) };
  }

  getStatus(runId: string): RunStatus | null {
    return this.runs.get(runId)?.status() ?? null;
  }

  listRuns(): RunStatus[] {
    return [...this.runs.values()].map((run) => run.status());
  }

  /** Drop the oldest finished runs beyond maxRunHistory. Runs in flight are never dropped. */
  private pruneRuns(): void {
    const finished = [...this.runs.values()].filter((run) => run.isTerminal);
    for (const run of finished.slice(0, Math.max(0, finished.length - this.maxRunHistory))) {
      this.runs.delete(run.id);
    }
  }

  private async execute(run: PipelineRun, outputPath: string): Promise<PipelineOutcome> {
    const log = this.logger.child({ runId: run.id });
    const runner = new StageRunner(log, {
      maxRetries: this.options.maxRetries ?? 2,
      initialDelayMs: this.options.retryInitialDelayMs,
      timeoutMs: this.options.stageTimeoutMs,
    });
    log.info({ topic: run.topic, outputPath }, 'Pipeline started');

    try {
      // ─── Script ───
      const { script, speech, speechFallback, footage, footageFallback, animation } = this.collaborators;
      const scriptResult = await runner.run('script', (topic: string, signal) => script.generate(topic, signal), undefined, run.topic, run.signal);
      if (scriptResult.status === 'failed') return this.failRun(run, 'script', scriptResult.error, log);
      if (scriptResult.payload.scenes.length === 0) {
        return this.failRun(run, 'script', new ContentError('Script has no scenes'), log);
      }
      run.setScript(scriptResult.payload);
      log.info({ scenes: run.script.scenes.length }, 'Script ready');

      // ─── Audio (mandatory) ───
      run.advance('audio_pending');
      await this.fanOut(run, 'audio', (scene, signal) =>
        runner.run(
          'audio',
          (s: ScriptScene, sig) => speech.synthesize(s.narration, sig),
          speechFallback && ((s: ScriptScene, sig) => speechFallback.synthesize(s.narration, sig)),
          scene,
          signal,
        ),
      );
      if (run.failure) return this.failRun(run, run.failure.stage, run.failure.error, log);

      // ─── Illustration (degradable) ───
      run.advance('illustration_pending');
      const findFootage: StageCall<ScriptScene, SlotPayloads['illustration']> = (s, sig) =>
        footage.find(sceneKeywords(s), sig, run.usedFootage);
      await this.fanOut(run, 'illustration', (scene, signal) =>
        runner.run(
          'illustration',
          findFootage,
          footageFallback && ((s: ScriptScene, sig) => footageFallback.find(sceneKeywords(s), sig, run.usedFootage)),
          scene,
          signal,
        ),
      );

      // ─── Animation (degradable, null when not mathematical) ───
      run.advance('animation_pending');
      await this.fanOut(run, 'animation', (scene, signal) =>
        runner.run('animation', (s: ScriptScene, sig) => animation.render(s, sig), undefined, scene, signal),
      );

      // ─── Compilation ───
      run.advance('compilation_pending');
      const scenes = run.scenes();
      const transitions = planTransitions(scenes, this.options.transitionDurations);
      run.setTransitions(transitions);
      log.info({ transitions: transitions.map((t) => t.transitionType) }, 'Transitions planned');

      let artifact: Artifact;
      try {
        artifact = await this.assembler.assemble(scenes, transitions, { runId: run.id, topic: run.topic, outputPath });
      } catch (err) {
        return this.failRun(run, 'compilation', toPipelineError(err), log);
      }
      run.complete(artifact);

      const warnings = [...run.warnings];
      log.info({ path: artifact.path, durationSeconds: artifact.durationSeconds, warnings: warnings.length }, 'Pipeline finished');
      return { status: 'done', runId: run.id, artifact, warnings };
    } catch (err) {
      return this.failRun(run, PHASE_STAGE[run.phase], toPipelineError(err), log);
    }
  }

  /** One task per scene, at most maxConcurrency in flight. Results land in the scene's own slot. */
  private async fanOut<S extends SceneStage>(
    run: PipelineRun,
    stage: S,
    task: (scene: ScriptScene, signal: AbortSignal) => Promise<StageResult<SlotPayloads[S]>>,
  ): Promise<void> {
    const limit = pLimit(this.maxConcurrency);
    await Promise.all(
      run.script.scenes.map((scene) =>
        limit(async () => {
          if (run.signal.aborted) return;
          const result = await task(scene, run.signal);
          if (run.isTerminal) return;

          run.setSlot(scene.index, stage, result);
          if (result.status !== 'failed') return;

          if (stage === 'audio') {
            run.fail('audio', result.error);
          } else {
            run.warn({ sceneIndex: scene.index, stage, message: result.error.message });
          }
        }),
      ),
    );
  }

  /** Marks the run failed (a no-op when it already is) and reports the outcome. */
  private failRun(run: PipelineRun, stage: StageName, error: PipelineError, log: Logger): PipelineOutcome {
    run.fail(stage, error);
    log.error({ stage, kind: error.kind, error: error.message }, 'Pipeline failed');
    return { status: 'failed', runId: run.id, stage, error, warnings: [...run.warnings] };
  }
}

export function defaultOutputFilename(topic: string): string {
  return `${topic.trim().replace(/\s+/g, '_').toLowerCase()}_video.mp4`;
}
