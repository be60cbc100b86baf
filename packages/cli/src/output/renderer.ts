import pc from 'picocolors';
import type { BatchSummary } from '@packbench/shared';

export interface RunOutput {
  command: 'run';
  batchId: string;
  ledgerPath: string;
  summary: BatchSummary;
}

export interface CheckOutput {
  command: 'check';
  cases: Array<{ id: string; rectangles: number; optimal: number | null; source: 'baseline' | 'instance' | null }>;
  baselinePath: string | null;
  loadErrors: Array<{ message: string; path?: string; line?: number }>;
}

export interface GenerateOutput {
  command: 'generate';
  dir: string;
  files: string[];
  seed?: number;
}

export type OutputResult = RunOutput | CheckOutput | GenerateOutput;

const LISTED_FILES = 10;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }
    switch (data.command) {
      case 'run':
        this.renderRun(data);
        break;
      case 'check':
        this.renderCheck(data);
        break;
      case 'generate':
        this.renderGenerate(data);
        break;
    }
  }

  private renderRun(data: RunOutput): void {
    // The progress stream already printed the summary.
    if (data.summary.cancelled) {
      console.log(`\n${pc.yellow('⚠️  Batch interrupted; completed rows were kept.')}`);
    } else {
      console.log(`\n${pc.green('✅ Batch complete.')}`);
    }
  }

  private renderCheck(data: CheckOutput): void {
    if (data.loadErrors.length === 0) {
      console.log(`\n${pc.green(`✅ ${data.cases.length} case(s) loaded.`)}`);
    } else {
      console.log(
        `\n${pc.red(`❌ ${data.loadErrors.length} load error(s); ${data.cases.length} case(s) loaded.`)}`,
      );
    }
    if (data.baselinePath) {
      console.log(`  Baseline: ${data.baselinePath}`);
    }

    if (data.cases.length > 0) {
      console.log(pc.bold('\nCases:'));
      for (const c of data.cases) {
        const optimal = c.optimal === null ? pc.gray('no baseline') : `optimal ${c.optimal} (${c.source})`;
        console.log(`  - ${c.id}: ${c.rectangles} rectangle(s), ${optimal}`);
      }
    }
  }

  private renderGenerate(data: GenerateOutput): void {
    console.log(`\n${pc.green(`✅ Wrote ${data.files.length} instance(s) to ${data.dir}`)}`);
    data.files.slice(0, LISTED_FILES).forEach((file) => console.log(`  - ${file}`));
    if (data.files.length > LISTED_FILES) {
      console.log(`  ... and ${data.files.length - LISTED_FILES} more.`);
    }
    if (data.seed !== undefined) {
      console.log(pc.gray(`  Seed: ${data.seed}`));
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}
