import chalk from 'chalk';
import { join } from 'path';
import { loadConfig, createLogger } from '@topicreel/shared';
import { FfmpegCompositor, MockCompositor, VideoAssembler, type MediaCompositor } from '@topicreel/assembler';
import { createCollaborators } from '@topicreel/generator';
import { PipelineOrchestrator } from './pipeline.js';
import { createDashboard } from './dashboard.js';
import { parseCliArgs, renderTransitionTable, renderWarnings, saveProject } from './report.js';

const print = {
  header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
  success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
  info: (text: string) => console.log(chalk.blue(`  ℹ ${text}`)),
  warn: (text: string) => console.log(chalk.yellow(`  ⚠ ${text}`)),
  error: (text: string) => console.log(chalk.red(`  ✗ ${text}`)),
  dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
};

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.command === 'help') {
    printHelp();
    return 0;
  }

  const loaded = loadConfig();
  const config = options.live ? { ...loaded, dryRun: false } : loaded;
  const logger = createLogger('topicreel', config.logLevel);

  const compositor: MediaCompositor = config.dryRun
    ? new MockCompositor()
    : new FfmpegCompositor({ workDir: join(config.outputDir, 'work'), ffmpegPath: config.ffmpegPath }, logger);
  const orchestrator = new PipelineOrchestrator(
    createCollaborators(config, logger),
    new VideoAssembler(compositor, logger),
    logger,
    {
      outputDir: config.outputDir,
      maxConcurrency: config.maxConcurrency,
      maxRetries: config.maxRetries,
      retryInitialDelayMs: config.retryInitialDelayMs,
      stageTimeoutMs: config.stageTimeoutMs,
    },
  );

  if (options.command === 'serve') {
    const port = options.port ?? config.dashboardPort;
    print.header('Dashboard API');
    createDashboard(orchestrator, logger, port);
    print.success(`Dashboard running at ${chalk.underline(`http://localhost:${port}`)}`);
    print.dim('Endpoints: /health, /api/runs, /api/runs/:runId, /api/pipeline/stages');
    if (config.dryRun) print.warn('DRY RUN mode: mock collaborators, no media is rendered');
    print.dim('Press Ctrl+C to stop');
    return 0;
  }

  print.header(`Video: "${options.topic}"`);
  if (config.dryRun) print.warn('DRY RUN mode: mock collaborators, no media is rendered');

  const outcome = await orchestrator.runPipeline(options.topic, options.output);

  if (options.saveProject) {
    const status = orchestrator.getStatus(outcome.runId);
    if (status) print.dim(`Project data saved to ${await saveProject(status, config.outputDir)}`);
  }

  if (outcome.status === 'failed') {
    print.error(`Failed at ${outcome.stage}: ${outcome.error.message}`);
    return 1;
  }

  print.header('Transitions');
  console.log(renderTransitionTable(outcome.artifact.transitions));
  for (const line of renderWarnings(outcome.warnings)) print.warn(line);
  print.success(`Video saved to ${chalk.bold(outcome.artifact.path)} (${outcome.artifact.durationSeconds.toFixed(1)}s)`);
  return 0;
}

function printHelp() {
  console.log(`
  topicreel: turn a topic into a narrated video

  Usage:
    npm run topicreel -- <topic> [options]
    npm run topicreel -- serve [--port <n>]

  Options:
    --output, -o <file>      Output file name (default: <topic>_video.mp4)
    --save-project, -s       Save the run summary as project_data.json
    --live                   Use the real collaborators (needs API keys)
    --port <n>               Dashboard port (default: DASHBOARD_PORT or 3000)
    --help, -h               Show this help
  `);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const errMsg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`\n  ✗ Error: ${errMsg}`));
    process.exitCode = 1;
  },
);
