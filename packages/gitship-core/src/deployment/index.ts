/**
 * Deployment log reader
 * @module @gitship/core/deployment
 */

export {
  DEPLOYMENT_LOG_LABELS,
  candidateLogDirs,
  findDeploymentLogsDir,
  findLatestDeploymentLog,
  parseDeploymentLog,
  readLatestDeploymentRecord,
} from './log-reader';
