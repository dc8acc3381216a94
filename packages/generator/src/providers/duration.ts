import { execFile } from 'child_process';
import { ContentError } from '@topicreel/shared';

/** Length of a media file in seconds, read with ffprobe. */
export function measureDuration(path: string, ffprobePath = 'ffprobe', signal?: AbortSignal): Promise<number> {
  const args = ['-v', 'quiet', '-show_entries', 'format=duration', '-of', 'csv=p=0', path];
  return new Promise((resolve, reject) => {
    execFile(ffprobePath, args, { signal }, (err, stdout) => {
      if (err) {
        reject(new ContentError(`ffprobe failed for ${path}: ${err.message}`, { cause: err }));
        return;
      }
      const seconds = parseFloat(String(stdout).trim());
      if (!Number.isFinite(seconds) || seconds <= 0) {
        reject(new ContentError(`${path} has no playable duration`));
        return;
      }
      resolve(seconds);
    });
  });
}
