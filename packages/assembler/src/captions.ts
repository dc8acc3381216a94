/** Per-line captions timed over a scene's narration audio. */

export interface CaptionCue {
  text: string;
  start: number; // seconds from scene start
  end: number;
}

/** Split the audio length evenly across the non-empty script lines, in order. */
export function captionTimings(lines: readonly string[], audioSeconds: number): CaptionCue[] {
  const texts = lines.map((line) => line.trim()).filter(Boolean);
  if (texts.length === 0 || !(audioSeconds > 0)) return [];

  const perLine = audioSeconds / texts.length;
  return texts.map((text, i) => ({
    text,
    start: i * perLine,
    end: Math.min((i + 1) * perLine, audioSeconds),
  }));
}
