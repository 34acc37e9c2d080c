// Evaluation tools
export {
  evaluate,
  evaluateSchema,
  batch,
  batchSchema,
  toolDependencies,
} from './evaluate.js';

// Summary tool
export { summarize, summarizeSchema } from './summarize.js';
