import type { Command } from '../types.js';
import { loadConfig, toRuntimeConfig } from '../../config/loader.js';
import { loadExampleDataset } from '../../input/dataset.js';
import { parseClusterFlags, runDataset } from '../utils.js';

export const demoCommand: Command = {
  name: 'demo',
  description: 'Cluster a bundled example dataset',
  usage:
    'kmeans-lab demo [one-dimensional|two-dimensional] [--metric <name>] [--max-iterations <n>] [--json] [--verbose]',
  handler: async (args) => {
    const { positional, overrides, verbose } = parseClusterFlags(args);
    const name = positional[0] ?? 'one-dimensional';

    const config = toRuntimeConfig(loadConfig({ cliOverrides: overrides }));
    const dataset = await loadExampleDataset(name);
    console.log(runDataset(dataset, config, verbose));
  },
};
