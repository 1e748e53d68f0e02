// Init command for the safety review CLI

import { Command } from 'commander';
import { ReviewStore } from '../../services/storage/review-store.js';
import { reviewDir } from '../utils/workspace.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

interface InitOptions {
  path: string;
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize the .review directory')
    .option('-p, --path <path>', 'Base path for initialization', process.cwd())
    .action(withErrorHandling(async (options: InitOptions) => {
      const store = new ReviewStore({ baseDir: reviewDir(options.path) });
      await store.initialize();
      success('Initialized .review directory');
      console.log('  Created files:');
      console.log('    - .review/config.yaml');
      console.log('    - .review/reviews.yaml');
    }));
}
