import { Command } from 'commander';
import { SETTING_KEYS, loadPaths, loadSettings, updateSetting } from '../config.js';
import { getDB } from '../db/db.js';
import { getConfigAll } from '../db/repo.js';
import { action } from './context.js';

/** Effective settings, marking the ones stored in the config table. */
export function describeSettings() {
  const db = getDB(loadPaths().dbPath);
  const stored = getConfigAll(db);
  const settings: Record<string, unknown> = loadSettings(db);
  return SETTING_KEYS.map((key) => {
    const value = settings[key];
    const origin = key in stored ? '' : ' (default)';
    return `${key.padEnd(18)} ${value === undefined ? '-' : String(value)}${origin}`;
  });
}

export function setConfigKV(key: string, value: string) {
  updateSetting(getDB(loadPaths().dbPath), key, value);
}

export function registerConfigCommands(program: Command) {
  const config = program.command('config').description('Runtime settings stored with the jobs');

  config
    .command('get')
    .action(
      action(() => {
        for (const line of describeSettings()) console.log(line);
      })
    );

  config
    .command('set')
    .argument('<key>')
    .argument('<value>', 'new value; "" resets to the default')
    .action(
      action((key: string, value: string) => {
        setConfigKV(key, value);
        console.log(value.trim() === '' ? `✅ ${key} reset to default` : `✅ ${key} = ${value.trim()}`);
      })
    );
}
