export { createAnalyzeCommand, executeAnalyze } from './analyze';
export { createDeployCommand, executeDeploy } from './deploy';
export * from './flags';
