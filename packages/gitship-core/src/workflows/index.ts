/**
 * End-to-end workflows behind the CLI commands
 */

export { runAnalyze, type AnalyzeOptions, type AnalyzeOutcome } from './analyze';
export { runDeploy, type DeployOptions, type DeployOutcome } from './deploy';
export { createWorkflowContext, classifyChanges, type WorkflowOptions, type WorkflowContext } from './context';
