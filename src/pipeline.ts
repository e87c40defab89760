import process from 'node:process';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { CURRENT_SEASON } from './config';

type StepAction = (context: PipelineContext) => Promise<void> | void;

interface Step {
  name: string;
  description?: string;
  action: StepAction;
}

interface PipelineContext {
  scenario: string;
  dryRun: boolean;
  season?: string;
  game?: string;
  teamA?: string;
  teamB?: string;
}

interface ScenarioDefinition {
  description: string;
  steps: Step[];
}

async function runPipeline(context: PipelineContext, steps: Step[]): Promise<void> {
  console.info(`Starting pipeline scenario: ${context.scenario}`);
  if (context.dryRun) {
    console.info('Dry-run enabled. Steps will be logged but not executed.');
  }

  for (const step of steps) {
    console.info(`→ Step: ${step.name}`);
    if (step.description) {
      console.info(`   ${step.description}`);
    }

    if (context.dryRun) {
      console.info('   Skipped (dry-run)');
      continue;
    }

    await Promise.resolve(step.action(context));
    console.info('   Completed');
  }

  console.info(`Pipeline scenario "${context.scenario}" finished.`);
}

const stepCatalog: Record<string, Step> = {
  cleanOutputs: {
    name: 'Clean outputs',
    description: "Remove a season's derived, season and matchup files.",
    action: async (context) => {
      const module = await import('./steps/00_clean_outputs');
      module.cleanOutputs({ season: context.season ?? CURRENT_SEASON });
    },
  },
  buildGameStats: {
    name: 'Build game stats',
    description: 'Segment drives and derive per-game team statistics from PBP files.',
    action: async (context) => {
      const module = await import('./steps/01_derive_game_stats');
      await module.deriveGameStats({ season: context.season, game: context.game });
    },
  },
  buildSeasonStats: {
    name: 'Build season stats',
    description: 'Sum derived game rows into season totals and rates.',
    action: async (context) => {
      const module = await import('./steps/02_build_season_stats');
      await module.buildSeasonStats({ season: context.season });
    },
  },
  buildMatchup: {
    name: 'Build matchup',
    description: 'Export both teams of a matchup as JSON and CSV.',
    action: async (context) => {
      if (!context.teamA || !context.teamB) {
        throw new Error('--team-a and --team-b are required for the matchup step.');
      }
      const module = await import('./steps/03_build_matchup');
      await module.buildMatchupFiles({
        season: context.season ?? CURRENT_SEASON,
        teamA: context.teamA,
        teamB: context.teamB,
      });
    },
  },
  validateOutputs: {
    name: 'Validate outputs',
    description: 'Check stat shape and zone and turnover accounting.',
    action: async (context) => {
      const module = await import('./steps/04_validate_outputs');
      await module.validateOutputs({ season: context.season });
    },
  },
};

const SCENARIOS: Record<string, ScenarioDefinition> = {
  clean: {
    description: 'Remove derived outputs for a season (default: current).',
    steps: [stepCatalog.cleanOutputs],
  },
  'build:game-stats': {
    description: 'Build per-game stats from PBP files (optionally --season/--game).',
    steps: [stepCatalog.buildGameStats],
  },
  'build:season-stats': {
    description: 'Re-sum derived game files into season aggregates.',
    steps: [stepCatalog.buildSeasonStats],
  },
  'build:matchup': {
    description: 'Export a two-team matchup (requires --team-a and --team-b).',
    steps: [stepCatalog.buildMatchup],
  },
  'validate:data': {
    description: 'Validate derived outputs; fails on accounting errors.',
    steps: [stepCatalog.validateOutputs],
  },
  'refresh:full': {
    description: 'Full refresh: clean, derive, aggregate, validate.',
    steps: [
      stepCatalog.cleanOutputs,
      stepCatalog.buildGameStats,
      stepCatalog.buildSeasonStats,
      stepCatalog.validateOutputs,
    ],
  },
};

function printAvailableScenarios(): void {
  console.info('Available scenarios:');
  Object.entries(SCENARIOS).forEach(([name, definition]) => {
    console.info(`  • ${name.padEnd(22)} ${definition.description}`);
  });
}

async function main(): Promise<void> {
  const parsed = yargs(hideBin(process.argv))
    .option('scenario', {
      alias: 's',
      type: 'string',
      describe: 'Pipeline scenario to run',
      default: process.env.PIPELINE_SCENARIO ?? 'refresh:full',
    })
    .option('dry-run', {
      alias: 'd',
      type: 'boolean',
      describe: 'Log steps without executing',
      default: process.env.PIPELINE_DRY_RUN === '1',
    })
    .option('season', {
      type: 'string',
      describe: 'Season to process',
    })
    .option('game', {
      type: 'string',
      describe: 'Single game id to reprocess (build:game-stats)',
    })
    .option('team-a', {
      type: 'string',
      describe: 'First matchup team (build:matchup)',
    })
    .option('team-b', {
      type: 'string',
      describe: 'Second matchup team (build:matchup)',
    })
    .option('list-scenarios', {
      alias: 'l',
      type: 'boolean',
      describe: 'List available scenarios and exit',
      default: false,
    })
    .help()
    .parseSync();

  if (parsed['list-scenarios']) {
    printAvailableScenarios();
    return;
  }
  const scenario = parsed.scenario;
  const scenarioDefinition = SCENARIOS[scenario];

  if (!scenarioDefinition) {
    console.error(`Unknown scenario "${scenario}".`);
    printAvailableScenarios();
    process.exitCode = 1;
    return;
  }

  const context: PipelineContext = {
    scenario,
    dryRun: Boolean(parsed['dry-run']),
    season: parsed.season,
    game: parsed.game,
    teamA: parsed['team-a'],
    teamB: parsed['team-b'],
  };

  await runPipeline(context, scenarioDefinition.steps);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
