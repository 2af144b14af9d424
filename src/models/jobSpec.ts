import { parseTimestamp, toIsoTimestamp } from '../../lib/time'
import { contentId } from '../helpers/helperFunctions'
import { JobSpecRecord, JsonObject } from '../helpers/historyInterfaces'
import { Platform } from './status'

/**
 * The platform-specific submission payload of a job, e.g. a training job
 * request body or a batch/v1 Job document. The payload is opaque here.
 */
export class JobSpec {
  readonly id: string
  readonly jobId: string
  readonly platform: Platform
  readonly spec: JsonObject
  readonly timestamp: Date

  constructor(record: JobSpecRecord) {
    this.id = record.id
    this.jobId = record.job
    this.platform = record.platform
    this.spec = record.spec
    this.timestamp = parseTimestamp(record.timestamp)
  }

  /**
   * The payload to submit again, or `undefined` when the platform never
   * built one and must build it from the job.
   */
  payload(): JsonObject | undefined {
    return Object.keys(this.spec).length === 0 ? undefined : this.spec
  }

  toDict(): JobSpecRecord {
    return {
      id: this.id,
      job: this.jobId,
      platform: this.platform,
      spec: this.spec,
      timestamp: toIsoTimestamp(this.timestamp),
    }
  }

  static createRecord(
    jobId: string,
    platform: Platform,
    spec: JsonObject,
    now: Date = new Date()
  ): JobSpecRecord {
    return {
      id: contentId('jobSpec', jobId, platform, spec),
      job: jobId,
      platform,
      spec,
      timestamp: toIsoTimestamp(now),
    }
  }
}
