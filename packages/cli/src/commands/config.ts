import { Command } from 'commander';
import { ConfigManager, CONFIG_FILE_NAMES } from '@semantix/core';
import { redactConfig } from '../output/formatter.js';

export const configCommand = new Command('config')
  .description('Manage semantix configuration');

configCommand
  .command('show')
  .description('Show the resolved configuration')
  .option('-c, --config <path>', 'Config file to read instead of searching')
  .action(async (options: { config?: string }) => {
    const mgr = new ConfigManager();
    const config = await mgr.load({ configPath: options.config });
    console.log(JSON.stringify(redactConfig(config), null, 2));
  });

configCommand
  .command('path')
  .description('Show config file search paths')
  .action(async () => {
    const mgr = new ConfigManager({ onWarning: () => {} });
    await mgr.load();

    console.log('Config files searched in the working directory and its parents (first found wins):');
    CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
    console.log(`Loaded: ${mgr.getConfigPath() ?? '(none)'}`);
    console.log('');
    console.log('Environment variables:');
    console.log('  SEMANTIX_REASONING_PROVIDER / _API_KEY / _MODEL / _BASE_URL / _MAX_TOKENS');
    console.log('  SEMANTIX_EMBEDDING_PROVIDER / _API_KEY / _MODEL / _BASE_URL');
    console.log('  SEMANTIX_INDEXING_PROVIDER / _TOP_K');
    console.log('  SEMANTIX_TOKEN_RATIO');
    console.log('  SEMANTIX_LOG_LEVEL, SEMANTIX_TRACE_OUTPUT');
    console.log('  SEMANTIX_DB_PATH');
    console.log('  OPENAI_API_KEY (fallback for both API keys)');
  });
