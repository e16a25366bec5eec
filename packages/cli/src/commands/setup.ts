import { Command } from 'commander';
import { withSession } from '../setup.js';
import { formatCapabilities } from '../output/formatter.js';

export const setupCommand = new Command('setup')
  .description('Show the backend bound to each capability')
  .option('--reasoning-model <model>', 'Switch the reasoning model before showing')
  .option('-c, --config <path>', 'Config file to read instead of searching')
  .action(async (options: { reasoningModel?: string; config?: string }) => {
    await withSession({ configPath: options.config }, async ({ runtime }) => {
      if (options.reasoningModel) {
        runtime.command(['reasoning'], { model: options.reasoningModel });
      }
      console.log(formatCapabilities(runtime.registry));
    });
  });
