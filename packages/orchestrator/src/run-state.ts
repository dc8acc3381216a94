import { randomUUID } from 'crypto';
import {
  PIPELINE_PHASES,
  SCENE_STAGES,
  type Artifact,
  type AudioClipRef,
  type ClipRef,
  type PipelineError,
  type PipelinePhase,
  type RunWarning,
  type Scene,
  type SceneStage,
  type Script,
  type StageName,
  type TransitionDecision,
} from '@topicreel/shared';
import type { StageResult, StageStatus } from './stage-runner.js';

/** State of one pipeline run. Every (scene, slot) result is written exactly once,
 * by the task that owns it; phases only move forward. */

export interface SlotPayloads {
  audio: AudioClipRef;
  illustration: ClipRef;
  /** null: the scene has no mathematical content */
  animation: ClipRef | null;
}

export type SceneSlots = { [S in SceneStage]?: StageResult<SlotPayloads[S]> };

export interface RunFailure {
  stage: StageName;
  error: PipelineError;
}

export type SlotState = StageStatus | 'pending';

export interface SceneProgress {
  index: number;
  title: string;
  audio: SlotState;
  illustration: SlotState;
  animation: SlotState;
}

export interface RunStatus {
  runId: string;
  topic: string;
  phase: PipelinePhase;
  startedAt: string;
  finishedAt?: string;
  scenes: SceneProgress[];
  warnings: RunWarning[];
  transitions: TransitionDecision[];
  artifact?: Artifact;
  failure?: { stage: StageName; kind: string; message: string };
}

export class PipelineRun {
  readonly id: string;
  readonly startedAt = new Date();
  private currentPhase: PipelinePhase = 'script_pending';
  private finishedAt: Date | null = null;
  private currentScript: Script | null = null;
  private slots: SceneSlots[] = [];
  private runWarnings: RunWarning[] = [];
  private plannedTransitions: TransitionDecision[] = [];
  private producedArtifact: Artifact | null = null;
  private runFailure: RunFailure | null = null;
  private controller = new AbortController();
  /** Stock footage source ids handed out to this run's scenes */
  readonly usedFootage = new Set<string>();

  constructor(
    readonly topic: string,
    id: string = randomUUID(),
  ) {
    this.id = id;
  }

  get phase(): PipelinePhase {
    return this.currentPhase;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isTerminal(): boolean {
    return this.currentPhase === 'done' || this.currentPhase === 'failed';
  }

  get script(): Script {
    if (!this.currentScript) throw new Error(`Run ${this.id} has no script yet`);
    return this.currentScript;
  }

  get warnings(): readonly RunWarning[] {
    return this.runWarnings;
  }

  get transitions(): readonly TransitionDecision[] {
    return this.plannedTransitions;
  }

  get artifact(): Artifact | null {
    return this.producedArtifact;
  }

  get failure(): RunFailure | null {
    return this.runFailure;
  }

  setScript(script: Script): void {
    if (this.currentScript) throw new Error(`Run ${this.id} already has a script`);
    script.scenes.forEach((scene, i) => {
      if (scene.index !== i) throw new Error(`Scene at position ${i} has index ${scene.index}`);
    });
    this.currentScript = script;
    this.slots = script.scenes.map(() => ({}));
  }

  setSlot<S extends SceneStage>(sceneIndex: number, stage: S, result: StageResult<SlotPayloads[S]>): void {
    const slots: { [K in S]?: StageResult<SlotPayloads[K]> } | undefined = this.slots[sceneIndex];
    if (!slots) throw new Error(`Run ${this.id} has no scene ${sceneIndex}`);
    if (slots[stage] !== undefined) {
      throw new Error(`Slot ${stage} of scene ${sceneIndex} is already written`);
    }
    slots[stage] = result;
  }

  slot<S extends SceneStage>(sceneIndex: number, stage: S): StageResult<SlotPayloads[S]> | undefined {
    return this.slots[sceneIndex]?.[stage];
  }

  warn(warning: RunWarning): void {
    this.runWarnings.push(warning);
  }

  advance(phase: PipelinePhase): void {
    if (this.isTerminal) throw new Error(`Run ${this.id} is already ${this.currentPhase}`);
    if (phase === 'failed' || PIPELINE_PHASES.indexOf(phase) <= PIPELINE_PHASES.indexOf(this.currentPhase)) {
      throw new Error(`Cannot move run ${this.id} from ${this.currentPhase} to ${phase}`);
    }
    this.currentPhase = phase;
    if (phase === 'done') this.finishedAt = new Date();
  }

  setTransitions(transitions: TransitionDecision[]): void {
    this.plannedTransitions = transitions;
  }

  complete(artifact: Artifact): void {
    this.producedArtifact = artifact;
    this.advance('done');
  }

  /** Terminal failure. Aborts every task still running for this run. */
  fail(stage: StageName, error: PipelineError): void {
    if (this.isTerminal) return;
    this.runFailure = { stage, error };
    this.currentPhase = 'failed';
    this.finishedAt = new Date();
    this.controller.abort(error);
  }

  /** Script scenes with the media of every slot that produced a payload. */
  scenes(): Scene[] {
    return this.script.scenes.map((scene, i) => {
      const media: Scene['media'] = {};
      const audio = this.slot(i, 'audio');
      const illustration = this.slot(i, 'illustration');
      const animation = this.slot(i, 'animation');
      if (audio && audio.status !== 'failed') media.audio = audio.payload;
      if (illustration && illustration.status !== 'failed') media.illustration = illustration.payload;
      if (animation && animation.status !== 'failed' && animation.payload) media.animation = animation.payload;
      return { ...scene, media };
    });
  }

  status(): RunStatus {
    const scenes = (this.currentScript?.scenes ?? []).map((scene, i) => {
      const progress: SceneProgress = { index: scene.index, title: scene.title, audio: 'pending', illustration: 'pending', animation: 'pending' };
      for (const stage of SCENE_STAGES) {
        progress[stage] = this.slots[i]?.[stage]?.status ?? 'pending';
      }
      return progress;
    });

    return {
      runId: this.id,
      topic: this.topic,
      phase: this.currentPhase,
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.finishedAt?.toISOString(),
      scenes,
      warnings: [...this.runWarnings],
      transitions: [...this.plannedTransitions],
      artifact: this.producedArtifact ?? undefined,
      failure: this.runFailure
        ? { stage: this.runFailure.stage, kind: this.runFailure.error.kind, message: this.runFailure.error.message }
        : undefined,
    };
  }
}
