import path from 'path';
import { Option, type Command } from 'commander';
import { UsageError, atomicWrite } from '@packbench/shared';
import { generateInstance, seededRandom, serializeInstance, type GenerateOptions } from '@packbench/bench';
import { OutputRenderer } from '../output/renderer';
import { parsePositiveInt, parseSeed, parseYesNo, type GlobalOptions } from './options';

interface GenerateCommandOptions {
  count: number;
  rectangles?: number;
  variant?: 'free' | 'fixed';
  rotation?: boolean;
  prefix: string;
  seed?: number;
}

export function instanceFileName(prefix: string, index: number, count: number): string {
  return `${prefix}-${String(index).padStart(String(count).length, '0')}.txt`;
}

export function registerGenerateCommand(program: Command) {
  program
    .command('generate')
    .description('Write random instances whose optimal packing is known')
    .argument('<dir>', 'Directory to write the instances into')
    .option('--count <n>', 'Number of instances', parsePositiveInt, 1)
    .option('--rectangles <n>', 'Rectangles per instance (random by default)', parsePositiveInt)
    .addOption(new Option('--variant <kind>', 'Container height regime').choices(['free', 'fixed']))
    .option('--rotation <yes|no>', 'Whether rotations are allowed', parseYesNo)
    .option('--prefix <name>', 'File name prefix', 'instance')
    .option('--seed <n>', 'Seed for a reproducible corpus', parseSeed)
    .action(async (dir: string, options: GenerateCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      if (options.prefix === '' || /[\\/]/.test(options.prefix)) {
        throw new UsageError(`Invalid prefix "${options.prefix}": expected a plain file name`);
      }
      const random = options.seed === undefined ? Math.random : seededRandom(options.seed);
      const generateOptions: GenerateOptions = {
        rectangles: options.rectangles,
        variant: options.variant,
        allowRotation: options.rotation,
      };

      const files: string[] = [];
      for (let i = 1; i <= options.count; i++) {
        const instance = generateInstance(generateOptions, random);
        const file = path.join(dir, instanceFileName(options.prefix, i, options.count));
        await atomicWrite(file, serializeInstance(instance, { includeBoundingBox: true }));
        files.push(file);
        if (globalOpts.verbose) {
          renderer.log(`${file}: ${instance.rectangles.length} rectangle(s)`);
        }
      }

      renderer.render({ command: 'generate', dir, files, seed: options.seed });
    });
}
