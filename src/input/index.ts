/**
 * Input construction exports.
 */

export {
  recordsFromValues,
  centroidsFromValues,
  parseDataset,
  loadDataset,
  loadExampleDataset,
  isExampleName,
  EXAMPLE_NAMES,
} from './dataset.js';
export type { Dataset, ExampleName } from './dataset.js';
