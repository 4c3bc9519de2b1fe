#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import pc from 'picocolors';
import { promises as fs } from 'fs';
import { runAnalysis } from './commands/analyze.js';

interface CliOptions {
  providers?: string;
  maxIterations: string;
  budget: string;
}

const program = new Command();

program
  .name('analyst-agent')
  .description('Answer a data question by letting LLM providers write and run Python in a Docker sandbox')
  .version('0.1.0')
  .argument('<files...>', 'question.txt plus any data files it refers to')
  .option('--providers <list>', 'Comma-separated provider order (default: PROVIDER_ORDER or nvidia,gemini,openai)')
  .option('--max-iterations <number>', 'Maximum feedback iterations per provider (default: 9)', '9')
  .option('--budget <seconds>', 'Time budget per provider attempt in seconds (default: 300)', '300')
  .action(async (files: string[], options: CliOptions) => {
    const maxIterations = parseInt(options.maxIterations, 10);
    if (isNaN(maxIterations) || maxIterations < 1 || maxIterations > 50) {
      console.error(pc.red('Error: --max-iterations must be a number between 1 and 50'));
      process.exit(2);
    }

    const budgetSeconds = parseInt(options.budget, 10);
    if (isNaN(budgetSeconds) || budgetSeconds < 10 || budgetSeconds > 3600) {
      console.error(pc.red('Error: --budget must be a number between 10 and 3600 seconds'));
      process.exit(2);
    }

    for (const file of files) {
      try {
        await fs.access(file);
      } catch {
        console.error(pc.red(`Error: File does not exist: ${file}`));
        process.exit(2);
      }
    }

    const exitCode = await runAnalysis({
      files,
      providers: options.providers,
      maxIterations,
      budgetSeconds,
    });

    process.exit(exitCode);
  });

program.parse();
