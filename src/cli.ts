import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import { loadConfigFromFile, resolveConfigPath, type ScenewatchConfig } from './config/index.js';
import { parseScenarioDefinitions } from './detection/definitions.js';
import type { ScenarioDefinition } from './detection/types.js';

export type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'SceneWatch CLI',
  '',
  'Usage:',
  '  scenewatch start                      Run the detector until SIGINT/SIGTERM',
  '  scenewatch validate [--config path]   Validate a configuration file',
  '  scenewatch scenarios [--config path] [--json]  List configured scenarios',
  '  scenewatch events [--limit n] [--scenario id] [--json]  List stored alert events',
  '  scenewatch prune --days n             Delete stored events older than n days',
  '  scenewatch log-level [get|set <level>]  Get or set the active log level'
];

const LOG_LEVEL_USAGE = [
  'SceneWatch log level commands',
  '',
  'Usage:',
  '  scenewatch log-level              Show the current log level',
  '  scenewatch log-level get          Show the current log level',
  '  scenewatch log-level set <level>  Change the active log level',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'help';
  const args = argv.slice(1);

  switch (command) {
    case 'start':
      return startDetectorCommand(io);
    case 'validate':
      return runValidateCommand(args, io);
    case 'scenarios':
      return runScenariosCommand(args, io);
    case 'events':
      return runEventsCommand(args, io);
    case 'prune':
      return runPruneCommand(args, io);
    case 'log-level':
      return runLogLevelCommand(args, io);
    case 'help':
    case '--help':
    case '-h':
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    default:
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
  }
}

function readOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  return value && !value.startsWith('--') ? value : undefined;
}

type LoadedConfig = { path: string; config: ScenewatchConfig; scenarios: ScenarioDefinition[] };

function loadScenarios(args: string[]): LoadedConfig {
  const configPath = path.resolve(readOption(args, '--config') ?? resolveConfigPath());
  const config = loadConfigFromFile(configPath);
  const scenarios = parseScenarioDefinitions(config.detection.scenarios, 'config.detection.scenarios');
  return { path: configPath, config, scenarios };
}

function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function formatScenarioLine(scenario: ScenarioDefinition) {
  return [
    `  ${scenario.id}`,
    `[${scenario.alertLevel}]`,
    `threshold=${scenario.threshold.toFixed(2)}`,
    `cooldown=${scenario.cooldown}s`,
    `frames=${scenario.consecutiveFrames}`,
    scenario.enabled ? 'enabled' : 'disabled'
  ].join(' ');
}

function runValidateCommand(args: string[], io: CliIo): number {
  let loaded: LoadedConfig;
  try {
    loaded = loadScenarios(args);
  } catch (error) {
    io.stderr.write(`Invalid configuration: ${describeError(error)}\n`);
    return 1;
  }

  const enabled = loaded.scenarios.filter(scenario => scenario.enabled).length;
  io.stdout.write(`Configuration OK: ${loaded.path}\n`);
  io.stdout.write(`Scenarios: ${loaded.scenarios.length} (${enabled} enabled)\n`);
  for (const scenario of loaded.scenarios) {
    io.stdout.write(`${formatScenarioLine(scenario)}\n`);
  }
  return 0;
}

function runScenariosCommand(args: string[], io: CliIo): number {
  let loaded: LoadedConfig;
  try {
    loaded = loadScenarios(args);
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }

  if (args.includes('--json')) {
    io.stdout.write(`${JSON.stringify(loaded.scenarios, null, 2)}\n`);
    return 0;
  }

  for (const scenario of loaded.scenarios) {
    io.stdout.write(`${formatScenarioLine(scenario)}  "${scenario.prompt}"\n`);
  }
  return 0;
}

async function runEventsCommand(args: string[], io: CliIo): Promise<number> {
  const rawLimit = readOption(args, '--limit');
  const limit = rawLimit === undefined ? undefined : Number(rawLimit);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    io.stderr.write(`Invalid --limit value: ${rawLimit}\n`);
    return 1;
  }

  const { listEvents } = await import('./db.js');
  const result = listEvents({ limit, scenario: readOption(args, '--scenario') });

  if (args.includes('--json')) {
    io.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    return 0;
  }

  if (result.items.length === 0) {
    io.stdout.write('No events stored\n');
    return 0;
  }
  for (const event of result.items) {
    const scenarioId = event.meta?.scenarioId;
    const label = typeof scenarioId === 'string' ? ` ${scenarioId}` : '';
    io.stdout.write(
      `#${event.id} ${new Date(event.ts).toISOString()} ${event.severity}${label} ${event.message}\n`
    );
  }
  io.stdout.write(`Showing ${result.items.length} of ${result.total}\n`);
  return 0;
}

const DAY_MS = 24 * 60 * 60 * 1000;

async function runPruneCommand(args: string[], io: CliIo): Promise<number> {
  const rawDays = readOption(args, '--days');
  const days = rawDays === undefined ? Number.NaN : Number(rawDays);
  if (!Number.isFinite(days) || days < 0) {
    io.stderr.write(`Invalid --days value: ${rawDays ?? '(missing)'}\n`);
    return 1;
  }

  const { pruneEventsOlderThan } = await import('./db.js');
  const removed = pruneEventsOlderThan(Date.now() - days * DAY_MS);
  logger.info({ removed, days }, 'Pruned stored events');
  io.stdout.write(`Removed ${removed} event(s) older than ${days} day(s)\n`);
  return 0;
}

function runLogLevelCommand(args: string[], io: CliIo): number {
  const [first, second] = args;

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first !== 'set') {
    io.stderr.write(`Unknown log-level command: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!second) {
    io.stderr.write('Missing value for log level\n');
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  try {
    const normalized = setLogLevel(second);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }
}

async function startDetectorCommand(io: CliIo): Promise<number> {
  const { runUntilSignal } = await import('./run-detector.js');
  try {
    await runUntilSignal();
  } catch (error) {
    logger.error({ err: error }, 'Detector failed to start');
    io.stderr.write('Detector failed to start. Check logs for details.\n');
    return 1;
  }
  io.stdout.write('Detector stopped\n');
  return 0;
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'SceneWatch CLI failed');
      process.exit(1);
    }
  );
}
