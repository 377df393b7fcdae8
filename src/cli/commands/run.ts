import type { Command } from '../types.js';
import { loadConfig, toRuntimeConfig } from '../../config/loader.js';
import { loadDataset } from '../../input/dataset.js';
import { parseClusterFlags, runDataset } from '../utils.js';

export const runCommand: Command = {
  name: 'run',
  description: 'Cluster a dataset file',
  usage:
    'kmeans-lab run <dataset.json> [--metric euclidean|manhattan] [--max-iterations <n>] [--json] [--verbose]',
  handler: async (args) => {
    const { positional, overrides, verbose } = parseClusterFlags(args);
    const path = positional[0];
    if (!path) {
      console.error('Error: Dataset path required');
      console.log(`Usage: ${runCommand.usage}`);
      process.exit(2);
    }

    const config = toRuntimeConfig(loadConfig({ cliOverrides: overrides }));
    const dataset = await loadDataset(path);
    console.log(runDataset(dataset, config, verbose));
  },
};
