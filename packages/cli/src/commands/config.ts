import { Command } from 'commander';
import { CONFIG_FILE_NAMES, ConfigManager } from '@crewline/core';
import { errorMessage } from '@crewline/shared';
import type { GlobalOptions } from '../runtime.js';

export const configCommand = new Command('config')
  .description('Inspect crewline configuration');

configCommand
  .command('show')
  .description('Show the effective configuration')
  .action(async (_options: unknown, command: Command) => {
    const { config: configPath } = command.optsWithGlobals<GlobalOptions>();
    const manager = new ConfigManager();
    try {
      const config = await manager.load({ configPath });
      console.log(`# ${manager.loadedFrom ?? 'defaults and environment only'}`);
      console.log(JSON.stringify(config, null, 2));
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(() => {
    console.log('Config files searched upward from the working directory (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
    console.log('');
    console.log('Environment variables:');
    console.log('  CREWLINE_DB_PATH');
    console.log('  CREWLINE_BATCH_SIZE');
    console.log('  CREWLINE_MAX_RETRIES');
    console.log('  CREWLINE_LOG_LEVEL');
    console.log('  CREWLINE_DBT_PROJECT_DIR');
  });
