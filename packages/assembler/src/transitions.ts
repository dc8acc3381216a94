import {
  TRANSITION_DURATIONS,
  type ContentCategory,
  type TransitionDecision,
  type TransitionType,
} from '@topicreel/shared';
import { classifyScene, scaleDirection } from './classifier.js';

/** Content-aware transition selection between adjacent scenes.
 * Rules are checked top to bottom over the categories of both scenes; the first match wins. */

export interface SceneText {
  index: number;
  narration?: string | null;
}

interface PairContext {
  categories: ReadonlySet<ContentCategory>;
  text: string;
}

interface TransitionRule {
  name: string;
  matches: (pair: PairContext) => boolean;
  pick: (pair: PairContext) => TransitionType;
}

export const TRANSITION_RULES: readonly TransitionRule[] = [
  {
    name: 'dramatic',
    matches: (p) => p.categories.has('dramatic'),
    pick: () => 'fade_to_black',
  },
  {
    name: 'temporal',
    matches: (p) => p.categories.has('temporal'),
    pick: () => 'quick_fade',
  },
  {
    name: 'scale',
    matches: (p) => p.categories.has('scale'),
    pick: (p) => (scaleDirection(p.text) === 'shrink' ? 'zoom_out' : 'zoom_in'),
  },
  {
    name: 'action',
    matches: (p) => p.categories.has('action'),
    pick: () => 'zoom_in',
  },
];

export const DEFAULT_TRANSITION: TransitionType = 'crossfade';

export type TransitionDurations = Record<TransitionType, number>;

export function selectTransition(
  source: SceneText,
  target: SceneText,
  durations: TransitionDurations = TRANSITION_DURATIONS,
): TransitionDecision {
  let transitionType = DEFAULT_TRANSITION;
  let categories: ContentCategory[] = [];

  try {
    const pair = buildPair(source, target);
    categories = [...pair.categories];
    const rule = TRANSITION_RULES.find((r) => r.matches(pair));
    if (rule) transitionType = rule.pick(pair);
  } catch {
    // Selection never aborts the pipeline; crossfade stands in.
    transitionType = DEFAULT_TRANSITION;
    categories = [];
  }

  return {
    sourceIndex: source.index,
    targetIndex: target.index,
    transitionType,
    durationSeconds: durations[transitionType],
    categories,
  };
}

/** One decision per adjacent pair, in scene order. */
export function planTransitions(
  scenes: readonly SceneText[],
  durations: TransitionDurations = TRANSITION_DURATIONS,
): TransitionDecision[] {
  const decisions: TransitionDecision[] = [];
  for (let i = 1; i < scenes.length; i++) {
    decisions.push(selectTransition(scenes[i - 1], scenes[i], durations));
  }
  return decisions;
}

function buildPair(source: SceneText, target: SceneText): PairContext {
  const categories = new Set<ContentCategory>([
    ...classifyScene(source.narration),
    ...classifyScene(target.narration),
  ]);
  const text = [source.narration, target.narration]
    .filter((t): t is string => typeof t === 'string')
    .join(' ');
  return { categories, text };
}
