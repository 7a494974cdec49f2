/**
 * Config command - view and edit ~/.es-mcp-agent/config.json
 */

import { Command } from 'commander';
import { Workspace } from '../../storage/workspace.js';
import { ConfigManager, DEFAULT_CONFIG, ENV_MAPPINGS } from '../../config/config-manager.js';
import { errorMessage } from '../../errors/errors.js';
import { exitWithError } from '../utils/context.js';

const SECRET_KEYS = new Set(['devtunnelAccessToken']);

export function configCommand(): Command {
  const cmd = new Command('config');

  cmd.description('View and edit configuration');

  cmd
    .command('show', { isDefault: true })
    .description('Show the effective configuration (file and environment)')
    .action(async () => {
      await showConfig();
    });

  cmd
    .command('get <key>')
    .description('Get a configuration value (e.g. conversation.maxToolRounds)')
    .action(async (key: string) => {
      await getConfig(key);
    });

  cmd
    .command('set <key> <value>')
    .description('Set a value in the config file; JSON values such as 3, true or ["esql"] are parsed')
    .action(async (key: string, value: string) => {
      await setConfig(key, value);
    });

  cmd
    .command('env')
    .description('List the environment variables that override the file')
    .action(() => {
      for (const [name, mapping] of Object.entries(ENV_MAPPINGS)) {
        console.log(`${name.padEnd(30)} ${mapping.path.join('.')}`);
      }
    });

  return cmd;
}

/**
 * Parses a CLI value as JSON when it is JSON, otherwise keeps the string
 */
export function parseConfigValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * JSON with secret values masked
 */
export function redactSecrets(value: unknown): string {
  return JSON.stringify(
    value,
    (key, field: unknown) => (SECRET_KEYS.has(key) && typeof field === 'string' ? '********' : field),
    2
  );
}

async function showConfig(): Promise<void> {
  const configManager = new ConfigManager(new Workspace().configPath);
  const result = await configManager.load(process.env);

  console.log(`Configuration (${configManager.path}):\n`);
  console.log(redactSecrets(result.config ?? DEFAULT_CONFIG));

  if (!result.success && result.errors) {
    console.log('\nProblems:');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }
}

async function getConfig(key: string): Promise<void> {
  const configManager = new ConfigManager(new Workspace().configPath);
  await configManager.load(process.env);

  const value = configManager.get(key);
  if (value === undefined) {
    exitWithError(`Configuration key not set: ${key}`);
  }

  const leaf = key.split('.').pop() ?? key;
  if (typeof value === 'object') {
    console.log(redactSecrets(value));
  } else {
    console.log(SECRET_KEYS.has(leaf) ? '********' : String(value));
  }
}

async function setConfig(key: string, value: string): Promise<void> {
  const workspace = new Workspace();
  await workspace.initialize();

  const configManager = new ConfigManager(workspace.configPath);
  const loaded = await configManager.load(process.env);
  if (!loaded.success) {
    exitWithError('Fix the current configuration first', loaded.errors);
  }

  const parsedValue = parseConfigValue(value);
  const result = configManager.set(key, parsedValue);
  if (!result.success) {
    exitWithError('Invalid configuration', result.errors);
  }

  try {
    await configManager.save();
  } catch (error) {
    exitWithError(`Failed to save configuration: ${errorMessage(error)}`);
  }
  console.log(`Set ${key} = ${JSON.stringify(parsedValue)}`);
}
