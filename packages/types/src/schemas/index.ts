export { RelayoutTuningSchema, TableTuningSchema } from './tuning.js';

export type {
  RelayoutTuning,
  RelayoutTuningInput,
  TableTuning,
  TableTuningInput,
} from './tuning.js';
