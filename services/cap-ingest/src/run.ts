import { pathToFileURL } from 'node:url';
import { getEnv } from './env.js';
import { createDocumentLoader } from './scrape.js';
import { createSheetMirror } from './sheets.js';
import { createCapStore } from './supa.js';
import { syncCapData } from './sync.js';

export interface CliArgs {
  teams: string[];
  dryRun: boolean;
  skipSheets: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const teams: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === '--team' && args[i + 1]) {
      teams.push(args[i + 1]);
      i += 1;
    } else if (arg.startsWith('--team=')) {
      const value = arg.slice('--team='.length);
      if (value) teams.push(value);
    }
  }
  return {
    teams,
    dryRun: args.includes('--dry-run'),
    skipSheets: args.includes('--skip-sheets'),
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const env = getEnv();

  if (!env.store && !args.dryRun) {
    throw new Error('SUPABASE_URL is not configured; pass --dry-run to scrape without writing');
  }
  if (!env.sheets && !args.skipSheets && !args.dryRun) {
    console.warn('[cli] GOOGLE_SPREADSHEET_ID is not configured; skipping spreadsheet mirror');
  }

  const loadDocument = createDocumentLoader({
    userAgent: env.userAgent,
    timeoutMs: env.requestTimeoutMs,
    minGapMs: env.requestGapMs,
    maxAttempts: env.maxAttempts,
  });

  const summary = await syncCapData(
    {
      loadDocument,
      store: env.store ? createCapStore(env.store) : null,
      mirror: env.sheets && !args.skipSheets ? createSheetMirror(env.sheets) : null,
    },
    {
      baseUrl: env.baseUrl,
      season: env.season,
      teams: args.teams,
      dryRun: args.dryRun,
      debugSaveHtml: env.debugSaveHtml,
    },
  );

  if (args.dryRun) {
    summary.succeeded.forEach((team) => {
      console.log(`[cli] ${team.team}: ${team.records} records, total ${team.total_cap_hit}`);
    });
  }

  if (summary.failed.length > 0 || summary.mirrorError) {
    process.exitCode = 1;
  }
}

const entryPoint = process.argv[1];
if (entryPoint && import.meta.url === pathToFileURL(entryPoint).href) {
  main().catch((error) => {
    console.error('[cli] Fatal error', error);
    process.exitCode = 1;
  });
}
