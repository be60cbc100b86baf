import type { Command } from 'commander';
import { loadCases, ConfigLoader, ProgressRenderer } from '@packbench/bench';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from './options';

interface CheckOptions {
  baseline?: string;
}

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .description('Load and validate a case corpus without running a solver')
    .argument('<cases>', 'Case file or directory of case files')
    .option('--baseline <path>', 'Baseline table of known optima')
    .action(async (cases: string, options: CheckOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const config = ConfigLoader.load({ configPath: globalOpts.config });

      const loaded = await loadCases(cases, {
        baselineFile: config.cases.baselineFile,
        baselinePath: options.baseline,
        extensions: config.cases.extensions,
      });

      if (!globalOpts.json) {
        const progress = new ProgressRenderer();
        loaded.errors.forEach((error) => progress.loadError(error));
      }

      renderer.render({
        command: 'check',
        baselinePath: loaded.baselinePath,
        cases: loaded.cases.map((c) => ({
          id: c.id,
          rectangles: c.instance.rectangles.length,
          optimal: c.knownOptimal,
          source: c.optimalSource,
        })),
        loadErrors: loaded.errors.map((e) => ({ message: e.message, path: e.path, line: e.line })),
      });

      if (loaded.errors.length > 0) {
        process.exitCode = 1;
      }
    });
}
