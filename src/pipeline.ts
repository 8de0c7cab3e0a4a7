import process from 'node:process';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { resolveDataDir } from './utils';

type StepAction = (context: PipelineContext) => Promise<void> | void;

interface Step {
  name: string;
  description?: string;
  action: StepAction;
}

interface PipelineContext {
  scenario: string;
  dryRun: boolean;
  dataDir: string;
  replay?: string;
}

interface ScenarioDefinition {
  description: string;
  steps: Step[];
}

async function runPipeline(context: PipelineContext, steps: Step[]): Promise<void> {
  console.info(`Starting pipeline scenario: ${context.scenario}`);
  console.info(`Data directory: ${context.dataDir}`);
  if (context.replay) {
    console.info(`Restricted to replay: ${context.replay}`);
  }
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

const stepCatalog = {
  cleanOutputs: {
    name: 'Clean outputs',
    description: 'Remove everything under data/decoded.',
    action: async (context) => {
      const module = await import('./steps/00_clean_outputs');
      module.cleanOutputs(context.dataDir);
    },
  },
  decodeAttributes: {
    name: 'Decode attributes',
    description: 'Turn raw attribute records into named, typed attributes.',
    action: async (context) => {
      const module = await import('./steps/01_decode_attributes');
      await module.decodeReplayAttributes({ replay: context.replay, dataDir: context.dataDir });
    },
  },
  buildTeams: {
    name: 'Build teams',
    description: 'Assemble players and teams, then write hashes, lineups and results.',
    action: async (context) => {
      const module = await import('./steps/02_build_teams');
      await module.buildTeams({ replay: context.replay, dataDir: context.dataDir });
    },
  },
  renderSummaries: {
    name: 'Render summaries',
    description: 'Print score-screen graphs and stats per player.',
    action: async (context) => {
      const module = await import('./steps/03_render_summaries');
      await module.renderSummaries({ replay: context.replay, dataDir: context.dataDir });
    },
  },
} satisfies Record<string, Step>;

const SCENARIOS: Record<string, ScenarioDefinition> = {
  'clean:outputs': {
    description: 'Remove generated outputs.',
    steps: [stepCatalog.cleanOutputs],
  },
  'decode:attributes': {
    description: 'Decode the attribute block of every replay.',
    steps: [stepCatalog.decodeAttributes],
  },
  'build:teams': {
    description: 'Decode attributes and build team identities.',
    steps: [stepCatalog.decodeAttributes, stepCatalog.buildTeams],
  },
  'report:summaries': {
    description: 'Render the score-screen summaries.',
    steps: [stepCatalog.renderSummaries],
  },
  'refresh:full': {
    description: 'Clean, decode, build teams and render summaries (default).',
    steps: [
      stepCatalog.cleanOutputs,
      stepCatalog.decodeAttributes,
      stepCatalog.buildTeams,
      stepCatalog.renderSummaries,
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
    .option('replay', {
      alias: 'r',
      type: 'string',
      describe: 'Only process this replay directory',
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
    dataDir: resolveDataDir(),
    replay: parsed.replay,
  };

  await runPipeline(context, scenarioDefinition.steps);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
