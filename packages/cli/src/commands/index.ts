import { Command } from 'commander';
import chalk from 'chalk';
import Conf from 'conf';
import { createInterface } from 'readline';
import {
  createDatabaseManager,
  createOverseer,
  getDefaultDatabasePath,
  type Overseer,
  type OverseerStore,
  type OverseerSummary,
  type Target,
} from '@overseer/core';

/**
 * Persisted CLI settings
 */
export interface CliSettings {
  overseerId: string;
  overseerName: string;
  dispatchTimeoutMs: number;
  databasePath: string;
  targets: string[];
}

export const DEFAULT_SETTINGS: CliSettings = {
  overseerId: 'overseer-local',
  overseerName: 'Overseer',
  dispatchTimeoutMs: 30000,
  databasePath: '',
  targets: ['engineering', 'operations'],
};

const SETTING_KEYS = ['overseerId', 'overseerName', 'dispatchTimeoutMs', 'databasePath', 'targets'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

const EXIT_WORDS = ['exit', 'quit'];

let configStore: Conf<CliSettings> | undefined;

/**
 * Configuration store, created on first use
 */
function getConfig(): Conf<CliSettings> {
  if (!configStore) {
    configStore = new Conf<CliSettings>({
      projectName: 'overseer-cli',
      defaults: DEFAULT_SETTINGS,
    });
  }
  return configStore;
}

function readSettings(): CliSettings {
  const config = getConfig();
  return {
    overseerId: config.get('overseerId'),
    overseerName: config.get('overseerName'),
    dispatchTimeoutMs: config.get('dispatchTimeoutMs'),
    databasePath: config.get('databasePath'),
    targets: config.get('targets'),
  };
}

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((candidate) => candidate === key);
}

export type ParsedSetting =
  | { ok: true; settings: Partial<CliSettings> }
  | { ok: false; error: string };

/**
 * Parse a `config set` value for `key`
 */
export function parseSetting(key: SettingKey, raw: string): ParsedSetting {
  const value = raw.trim();

  switch (key) {
    case 'dispatchTimeoutMs': {
      const timeout = Number(value);
      if (!Number.isInteger(timeout) || timeout <= 0) {
        return { ok: false, error: `dispatchTimeoutMs must be a positive integer, got '${raw}'` };
      }
      return { ok: true, settings: { dispatchTimeoutMs: timeout } };
    }
    case 'targets':
      return {
        ok: true,
        settings: {
          targets: value
            .split(',')
            .map((name) => name.trim())
            .filter((name) => name.length > 0),
        },
      };
    case 'overseerId':
    case 'overseerName':
      if (value.length === 0) {
        return { ok: false, error: `${key} must not be empty` };
      }
      return { ok: true, settings: key === 'overseerId' ? { overseerId: value } : { overseerName: value } };
    case 'databasePath':
      return { ok: true, settings: { databasePath: value } };
  }
}

/**
 * Database path: OVERSEER_DB_PATH, then the configured path, then the default
 */
export function resolveDatabasePath(configured: string, env: NodeJS.ProcessEnv = process.env): string {
  const override = env.OVERSEER_DB_PATH;
  if (override && override.trim().length > 0) {
    return override.trim();
  }
  if (configured.trim().length > 0) {
    return configured.trim();
  }
  return getDefaultDatabasePath();
}

/**
 * Local target that prints the directives it receives
 */
export function createEchoTarget(name: string, print: (line: string) => void = console.log): Target {
  return {
    id: `target-${name.toLowerCase()}`,
    name,
    receiveDirective: (directive) => {
      print(`${chalk.cyan(`[${name}]`)} received directive (${directive.priority}): ${directive.title}`);
    },
  };
}

export function formatSummary(summary: OverseerSummary): string[] {
  const pending =
    summary.pendingApprovals > 0 ? chalk.yellow(String(summary.pendingApprovals)) : String(summary.pendingApprovals);
  const urgent = summary.urgentReports > 0 ? chalk.red(String(summary.urgentReports)) : String(summary.urgentReports);

  return [
    `  Pending approvals: ${pending}`,
    `  Unread reports: ${summary.unreadReports}`,
    `  Urgent reports: ${urgent}`,
    `  Messages: ${summary.totalMessages}`,
    `  Targets: ${summary.targetCount}`,
  ];
}

/**
 * Build an overseer from settings, restore its last snapshot and
 * register the configured echo targets
 */
export function openOverseer(
  settings: CliSettings,
  store: OverseerStore,
  options: { print?: (line: string) => void; persistEvents?: boolean } = {}
): Overseer {
  const print = options.print ?? console.log;
  const overseer = createOverseer({
    id: settings.overseerId,
    name: settings.overseerName,
    dispatchTimeoutMs: settings.dispatchTimeoutMs,
    store,
    persistEvents: options.persistEvents ?? true,
    callbacks: {
      onApprovalRequired: (request) => {
        print(chalk.yellow(`Approval required [${request.id}] ${request.kind}: ${request.description}`));
      },
      onEscalation: (escalation) => {
        print(chalk.red(`Escalation: ${escalation.reason}`));
      },
    },
  });

  overseer.restore();
  for (const name of settings.targets) {
    overseer.registerTarget(name, createEchoTarget(name, print));
  }
  return overseer;
}

/**
 * Interactive chat console
 */
export function consoleCommand(program: Command): void {
  program
    .command('console')
    .description('Open the overseer chat console')
    .action(async () => {
      const settings = readSettings();
      const store = createDatabaseManager({ path: resolveDatabasePath(settings.databasePath) });
      const overseer = openOverseer(settings, store);

      console.log(chalk.bold.green(`\n  ${overseer.name} console\n`));
      console.log(chalk.dim(`  Targets: ${overseer.getTargetNames().join(', ') || 'none'}`));
      console.log(chalk.dim('  Type exit or quit to leave.\n'));

      const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
      rl.prompt();

      try {
        for await (const line of rl) {
          const input = line.trim();
          if (EXIT_WORDS.includes(input.toLowerCase())) {
            break;
          }
          if (input.length > 0) {
            console.log(await overseer.processInput(input));
            overseer.snapshot();
          }
          rl.prompt();
        }
      } finally {
        overseer.snapshot();
        store.close();
      }
    });
}

/**
 * Summary of the last saved session
 */
export function statusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the overseer summary from the last session')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const settings = readSettings();
      const store = createDatabaseManager({ path: resolveDatabasePath(settings.databasePath) });

      try {
        const overseer = openOverseer(settings, store, { print: () => undefined, persistEvents: false });
        const summary = await overseer.getSummary();

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        console.log(chalk.bold(`\n  ${overseer.name} Status\n`));
        for (const line of formatSummary(summary)) {
          console.log(line);
        }

        const pending = overseer.getPendingApprovals();
        if (pending.length > 0) {
          console.log(chalk.bold('\n  Pending Approvals:'));
          for (const request of pending) {
            console.log(`    [${request.id}] ${request.kind}: ${request.description}`);
          }
        }
      } finally {
        store.close();
      }
    });
}

/**
 * Read and write persisted settings
 */
export function configCommand(program: Command): void {
  const configCmd = program.command('config').description('Manage overseer settings');

  configCmd
    .command('get [key]')
    .description('Show one setting or all of them')
    .action((key?: string) => {
      const settings = readSettings();

      if (key === undefined) {
        for (const name of SETTING_KEYS) {
          console.log(`  ${chalk.bold(name)}: ${JSON.stringify(settings[name])}`);
        }
        return;
      }

      if (!isSettingKey(key)) {
        console.error(chalk.red(`Unknown setting: ${key}`));
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(settings[key]));
    });

  configCmd
    .command('set <key> <value>')
    .description('Change a setting')
    .action((key: string, value: string) => {
      if (!isSettingKey(key)) {
        console.error(chalk.red(`Unknown setting: ${key}`));
        process.exitCode = 1;
        return;
      }

      const parsed = parseSetting(key, value);
      if (!parsed.ok) {
        console.error(chalk.red(parsed.error));
        process.exitCode = 1;
        return;
      }

      getConfig().set(parsed.settings);
      console.log(chalk.green(`Updated ${key}`));
    });
}
