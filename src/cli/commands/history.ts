// Approved-version history and version comparison

import { Command } from 'commander';
import { DEFAULT_MODEL_FILE, WorkspaceOptions, openWorkspace, parseList } from '../utils/workspace.js';
import { formatChangeSet } from '../utils/format.js';
import { withErrorHandling } from '../utils/error-handler.js';

interface CompareOptions extends WorkspaceOptions {
  scope?: string;
}

export function registerHistoryCommands(program: Command): void {
  program
    .command('history')
    .description('List approved versions, oldest first')
    .option('-m, --model <file>', 'Working model snapshot file', DEFAULT_MODEL_FILE)
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(withErrorHandling(async (options: WorkspaceOptions) => {
      const { registry } = await openWorkspace(options);
      const history = registry.approvedHistory();
      if (history.length === 0) {
        console.log('No approved versions');
        return;
      }
      for (const entry of history) {
        const session = registry.getSession(entry.sessionId);
        console.log(`  ${entry.snapshot.version} - ${entry.approvedAt.toISOString()}`);
        console.log(`    Review: ${session ? `${session.id} ${session.name}` : entry.sessionId}`);
        console.log(`    Entities: ${entry.snapshot.entities.length} | Checksum: ${entry.checksum.slice(0, 12)}`);
      }
    }));

  program
    .command('compare <base> <other>')
    .description('Compare two versions ("working" or "approved vN")')
    .option('-s, --scope <ids>', 'Comma-separated entity identifiers to compare')
    .option('-m, --model <file>', 'Working model snapshot file', DEFAULT_MODEL_FILE)
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(withErrorHandling(async (base: string, other: string, options: CompareOptions) => {
      const { registry } = await openWorkspace(options);
      const scope = parseList(options.scope);
      const changeSet = registry.compareVersions(base, other, scope.length > 0 ? scope : undefined);
      for (const line of formatChangeSet(changeSet)) {
        console.log(line);
      }
    }));
}
