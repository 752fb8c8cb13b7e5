/**
 * Export the parameters of a family snapshot to CSV
 * Run with: npx tsx scripts/export-family-parameters.ts <snapshot.json> [--out file.csv]
 * e.g.      npm run export:family -- samples/door-family.json --yes
 *
 * Options:
 *   --out <file>        write here without asking
 *   --dir <directory>   folder for the suggested file name (default: current directory)
 *   --mapping <file>    group mapping JSON (overrides FAMILY_EXPORT_MAPPING_PATH)
 *   --excluded <file>   excluded names JSON (overrides FAMILY_EXPORT_EXCLUDED_PATH)
 *   --yes               accept the suggested file name
 */

import path from 'path';
import { createInterface } from 'readline/promises';
import { parseArgs } from 'util';
import {
  SnapshotParameterSource,
  exportFamilyParameters,
  getExportConfig,
  loadExportResources,
  loadFamilySnapshot,
} from '../lib/family-export';
import type { Notifier, SaveFilePrompt, SavePathRequest } from '../lib/family-export';

const consoleNotifier: Notifier = {
  show(title, message) {
    console.log(`${title}: ${message}`);
  },
};

function createSavePrompt(out: string | undefined, acceptSuggestion: boolean): SaveFilePrompt {
  return {
    async chooseSavePath(request: SavePathRequest) {
      if (out) {
        return path.resolve(out);
      }

      const suggested = path.join(request.initialDirectory, request.suggestedName);
      if (acceptSuggestion || !process.stdin.isTTY) {
        return suggested;
      }

      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        const answer = (await rl.question(`${request.title} [${suggested}] (q to cancel): `)).trim();
        if (answer.toLowerCase() === 'q') {
          return null;
        }
        if (!answer) {
          return suggested;
        }
        return path.resolve(
          path.extname(answer) ? answer : `${answer}.${request.extension}`
        );
      } finally {
        rl.close();
      }
    },
  };
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: 'string' },
      dir: { type: 'string' },
      mapping: { type: 'string' },
      excluded: { type: 'string' },
      yes: { type: 'boolean', default: false },
    },
  });

  const snapshotPath = positionals[0];
  if (!snapshotPath) {
    console.error(
      'Usage: npx tsx scripts/export-family-parameters.ts <snapshot.json> [--out file.csv]'
    );
    process.exit(1);
  }

  const config = getExportConfig();
  const resources = loadExportResources({
    mappingPath: values.mapping ?? config.mappingPath,
    excludedNamesPath: values.excluded ?? config.excludedNamesPath,
  });

  console.log(`Reading snapshot: ${snapshotPath}\n`);
  const source = new SnapshotParameterSource(loadFamilySnapshot(snapshotPath));

  const result = await exportFamilyParameters(
    {
      source,
      prompt: createSavePrompt(values.out, values.yes ?? false),
      notifier: consoleNotifier,
    },
    resources,
    {
      translateMode: config.translateMode,
      lineEnding: config.lineEnding,
      bom: config.bom,
      debug: config.debug,
      initialDirectory: path.resolve(values.dir ?? process.cwd()),
    }
  );

  if (result.status === 'failed') {
    process.exit(1);
  }
}

main().catch(error => {
  console.error('❌ Error:', error);
  process.exit(1);
});
