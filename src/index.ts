export * from '../lib/api/errors'
export { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../lib/api/retry'
export { getJobStatusLabel, isTerminalJobStatus } from '../lib/api/utils'
export { HistoryConfig, getHistoryConfig } from './config'
export * from './helpers/historyInterfaces'
export * from './models/status'
export { Accelerator, ContainerBuildParams, ContainerSpec, acceleratorLabel } from './models/containerSpec'
export { ExperimentGroup } from './models/experimentGroup'
export { Experiment } from './models/experiment'
export { Job } from './models/job'
export { JobSpec } from './models/jobSpec'
export { Run } from './models/run'
export { Clause, ClauseValue, QueryOp } from './storage/clause'
export * from './storage/interfaces'
export { HistoryQuery } from './storage/query'
export { NullStorage } from './storage/nullStorage'
export { MemoryStorage } from './storage/memoryStorage'
export { FileStorage, DEFAULT_HISTORY_FILE } from './storage/fileStorage'
export { FirestoreStorage } from './storage/firestoreStorage'
export { openStorage, parseConnectionString } from './storage/engine'
export { findExperimentGroup, selectJobs } from './storage/history'
export * from './compute/computePlatform'
export { NullCompute } from './compute/nullCompute'
export { LocalCompute, LocalExecutor } from './compute/localCompute'
export { CaipCompute } from './compute/caipCompute'
export { GkeCompute } from './compute/gkeCompute'
export { liveJobStatus, updateJobStatus, stopJob, stopRun, submitJobSpecs } from './compute/reconcile'
export { replaceJobSpecImage } from './compute/jobSpecImage'
export { resubmit, ImageBuilder, ResubmitOptions, ResubmitSummary } from './compute/resubmit'
export { CaipAPI } from './services/caip'
export { ClusterJobClient, KubeJobClient } from './services/gke'
export { FirestoreAPI } from './services/firestore'
export { CommandContext, createCommandContext } from './commands/context'
export { statusCommand, statusLines } from './commands/status'
export { stopCommand } from './commands/stop'
export { resubmitCommand } from './commands/resubmit'
