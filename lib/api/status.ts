export enum Platform {
  CAIP = 'CAIP',
  GKE = 'GKE',
  LOCAL = 'LOCAL',
  TEST = 'TEST',
}

// Canonical status shared by every platform. Runs store one of these.
export enum JobStatus {
  SUBMITTED = 'SUBMITTED',
  RUNNING = 'RUNNING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
  STOPPED = 'STOPPED',
  UNKNOWN = 'UNKNOWN',
}

// https://cloud.google.com/ai-platform/training/docs/reference/rest/v1/projects.jobs#State
export enum CaipJobState {
  STATE_UNSPECIFIED = 'STATE_UNSPECIFIED',
  QUEUED = 'QUEUED',
  PREPARING = 'PREPARING',
  RUNNING = 'RUNNING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
  CANCELLING = 'CANCELLING',
  CANCELLED = 'CANCELLED',
}

// Derived from a batch/v1 Job's status block, the cluster has no single field.
export enum GkeJobState {
  STATE_UNSPECIFIED = 'STATE_UNSPECIFIED',
  PENDING = 'PENDING',
  RUNNING = 'RUNNING',
  FAILED = 'FAILED',
  SUCCEEDED = 'SUCCEEDED',
  UNAVAILABLE = 'UNAVAILABLE',
}
