// Diff command: compares two snapshot files

import { Command } from 'commander';
import { ConfigService } from '../../services/config/config-service.js';
import { ReviewStore } from '../../services/storage/review-store.js';
import { configureLogging, diffServiceFor, parseList, reviewDir } from '../utils/workspace.js';
import { formatChangeSet } from '../utils/format.js';
import { withErrorHandling } from '../utils/error-handler.js';

interface DiffOptions {
  path: string;
  scope?: string;
  json?: boolean;
}

export function registerDiffCommand(program: Command): void {
  program
    .command('diff <old> <new>')
    .description('Compare two model snapshot files')
    .option('-s, --scope <ids>', 'Comma-separated entity identifiers to compare')
    .option('--json', 'Print the change-set as JSON')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(withErrorHandling(async (oldFile: string, newFile: string, options: DiffOptions) => {
      const config = new ConfigService({ baseDir: reviewDir(options.path) });
      await configureLogging(config);
      const store = new ReviewStore({ baseDir: reviewDir(options.path) });

      const before = await store.loadSnapshot(oldFile, oldFile);
      const after = await store.loadSnapshot(newFile, newFile);
      const scope = parseList(options.scope);

      const differ = await diffServiceFor(config);
      const changeSet = differ.diff(before, after, scope.length > 0 ? scope : undefined);

      if (options.json) {
        console.log(JSON.stringify(changeSet, null, 2));
        return;
      }
      for (const line of formatChangeSet(changeSet)) {
        console.log(line);
      }
    }));
}
