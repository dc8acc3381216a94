import { z } from 'zod';
import {
  ContentError,
  errorFromResponse,
  type ClipRef,
  type ScriptScene,
  type StockFootageFinder,
} from '@topicreel/shared';

// ─── Pexels ───

export interface PexelsOptions {
  apiKey: string;
  baseUrl?: string;
  perPage?: number;
  minWidth?: number;
}

const pexelsSearchSchema = z.object({
  videos: z.array(
    z.object({
      id: z.number(),
      duration: z.number(),
      video_files: z.array(
        z.object({
          link: z.string(),
          quality: z.string().nullable().optional(),
          file_type: z.string(),
          width: z.number().nullable().optional(),
        }),
      ),
    }),
  ),
});

/** Stock footage search against the Pexels video API. Picks the first landscape mp4 at or above minWidth
 * whose video has not been used yet, so scenes with overlapping keywords still get different clips. */
export class PexelsFootageFinder implements StockFootageFinder {
  private usedIds = new Set<string>();
  private apiKey: string;
  private baseUrl: string;
  private perPage: number;
  private minWidth: number;

  constructor(options: PexelsOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://api.pexels.com/videos';
    this.perPage = options.perPage ?? 5;
    this.minWidth = options.minWidth ?? 1280;
  }

  /** Forget the clips handed out without a caller-owned set. */
  resetUsed(): void {
    this.usedIds.clear();
  }

  async find(keywords: string[], signal?: AbortSignal, used: Set<string> = this.usedIds): Promise<ClipRef> {
    const query = keywords.join(' ').trim();
    if (!query) throw new ContentError('No keywords to search stock footage with');

    const params = new URLSearchParams({
      query,
      per_page: String(this.perPage),
      orientation: 'landscape',
    });
    const response = await fetch(`${this.baseUrl}/search?${params}`, {
      headers: { Authorization: this.apiKey },
      signal,
    });

    if (!response.ok) {
      throw errorFromResponse(response.status, await response.text(), 'Pexels');
    }

    const parsed = pexelsSearchSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ContentError('Pexels returned an unexpected response');
    }

    let skipped = 0;
    for (const video of parsed.data.videos) {
      const file = video.video_files.find(
        (f) => f.file_type === 'video/mp4' && (f.width ?? 0) >= this.minWidth,
      );
      if (!file) continue;

      const sourceId = `pexels:${video.id}`;
      if (used.has(sourceId)) {
        skipped++;
        continue;
      }
      used.add(sourceId);
      return { path: file.link, durationSeconds: video.duration, source: 'stock', keyword: query, sourceId };
    }

    if (skipped > 0) {
      throw new ContentError(`No unused stock footage for "${query}" (${skipped} already used)`);
    }
    throw new ContentError(`No stock footage found for "${query}"`);
  }
}

// ─── Mock ───

export class MockFootageFinder implements StockFootageFinder {
  async find(keywords: string[]): Promise<ClipRef> {
    const query = keywords.join('-');
    return { path: `mock://stock/${query}.mp4`, durationSeconds: 10, source: 'stock', keyword: keywords.join(' ') };
  }
}

// ─── Keywords ───

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'for', 'from', 'how', 'in', 'into',
  'is', 'it', 'its', 'let', 'lets', 'of', 'on', 'or', 'our', 'so', 'that', 'the', 'this', 'to',
  'us', 'we', 'what', 'when', 'why', 'with', 'you', 'your',
]);

function meaningfulWords(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 2 && !STOPWORDS.has(w));
}

/** Search keywords for a scene: title words first, narration words when the title has none. */
export function sceneKeywords(scene: Pick<ScriptScene, 'title' | 'narration'>, max = 3): string[] {
  const fromTitle = meaningfulWords(scene.title);
  const words = fromTitle.length > 0 ? fromTitle : meaningfulWords(scene.narration);
  return [...new Set(words)].slice(0, max);
}
