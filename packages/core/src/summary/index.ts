export {
  summarizeRun,
  summarizeRunData,
  type SummarizeOptions,
} from './summarize.js';
