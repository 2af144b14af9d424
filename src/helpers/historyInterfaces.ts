// historyInterfaces.ts
//
// Dictionary forms of every history entity. These are the only shapes that
// cross the storage edge, and field names are the same in every backend.

import { JobStatus, Platform } from '../models/status'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

// One value of a parameter sweep, e.g. { learning_rate: 0.01 }
export type KwargValue = string | number | boolean
export type Kwargs = { [key: string]: KwargValue }

export type ExperimentGroupRecord = {
  id: string
  name: string
  user: string
  timestamp: string
}

export type ContainerSpecRecord = {
  id: string
  user: string
  spec: JsonObject
  timestamp: string
}

export type ExperimentRecord = {
  id: string
  name: string
  xgroup: string
  container: string
  command: string | null
  args: string[]
  configs: Kwargs[]
  user: string
  timestamp: string
}

export type JobRecord = {
  id: string
  name: string
  experiment: string
  user: string
  timestamp: string
  args: string[]
  kwargs: Kwargs
}

export type JobSpecRecord = {
  id: string
  job: string
  platform: Platform
  spec: JsonObject
  timestamp: string
}

export type RunRecord = {
  id: string
  job: string
  jobSpec: string
  user: string
  platform: Platform
  timestamp: string
  status: JobStatus
  details: JsonObject
}

export type HistoryRecord =
  | ExperimentGroupRecord
  | ContainerSpecRecord
  | ExperimentRecord
  | JobRecord
  | JobSpecRecord
  | RunRecord
