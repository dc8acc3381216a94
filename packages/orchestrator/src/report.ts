import chalk from 'chalk';
import Table from 'cli-table3';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { RunWarning, TransitionDecision } from '@topicreel/shared';
import type { RunStatus } from './run-state.js';

// ─── Arguments ───

export interface CliOptions {
  command: 'run' | 'serve' | 'help';
  topic: string;
  output?: string;
  saveProject: boolean;
  live: boolean;
  port?: number;
}

export function parseCliArgs(args: string[]): CliOptions {
  const positional: string[] = [];
  const options: CliOptions = { command: 'run', topic: '', saveProject: false, live: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--output':
      case '-o':
        options.output = args[++i];
        break;
      case '--port':
        options.port = parseInt(args[++i] ?? '', 10) || undefined;
        break;
      case '--save-project':
      case '-s':
        options.saveProject = true;
        break;
      case '--live':
        options.live = true;
        break;
      case '--help':
      case '-h':
        options.command = 'help';
        break;
      default:
        positional.push(arg);
    }
  }

  if (options.command === 'help') return options;
  if (positional[0] === 'serve') {
    options.command = 'serve';
    return options;
  }

  options.topic = positional.join(' ').trim();
  if (!options.topic) options.command = 'help';
  return options;
}

// ─── Output ───

export function renderTransitionTable(transitions: readonly TransitionDecision[]): string {
  const table = new Table({
    head: [chalk.cyan('From'), chalk.cyan('To'), chalk.cyan('Transition'), chalk.cyan('Seconds'), chalk.cyan('Matched')],
    colWidths: [7, 7, 16, 10, 28],
  });

  for (const t of transitions) {
    table.push([
      String(t.sourceIndex + 1),
      String(t.targetIndex + 1),
      t.transitionType,
      t.durationSeconds.toFixed(1),
      t.categories.length > 0 ? t.categories.join(', ') : chalk.dim('none'),
    ]);
  }
  return table.toString();
}

export function renderWarnings(warnings: readonly RunWarning[]): string[] {
  return warnings.map((w) => `Scene ${w.sceneIndex + 1} ${w.stage}: ${w.message}`);
}

/** Write the run summary next to the compiled videos. */
export async function saveProject(status: RunStatus, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, 'project_data.json');
  await writeFile(path, JSON.stringify(status, null, 2));
  return path;
}
