import { errorMessage } from '../../lib/api/errors'
import { ContainerSpec } from '../models/containerSpec'
import { Experiment } from '../models/experiment'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { JobStatus, Platform } from '../models/status'
import { JobSelection, selectJobs } from '../storage/history'
import { Storage } from '../storage/interfaces'
import { PlatformRegistry } from './computePlatform'
import { replaceJobSpecImage } from './jobSpecImage'
import {
  SubmissionCallback,
  SubmissionRequest,
  submitJobSpecs,
  updateJobStatus,
} from './reconcile'

/** Builds and pushes the image of a container spec, resolving to its id. */
export type ImageBuilder = (containerSpec: ContainerSpec) => Promise<string>

export interface ResubmitOptions extends JobSelection {
  // resubmit every job, not only failed and stopped ones
  allJobs?: boolean
  // without a builder every job keeps the image it ran with
  buildImage?: ImageBuilder
  callback?: SubmissionCallback
}

export interface ResubmitSummary {
  submitted: number
  failed: number
  skipped: number
}

interface Candidate {
  job: Job
  run: Run
}

const RESUBMITTABLE: readonly JobStatus[] = [JobStatus.FAILED, JobStatus.STOPPED]

// Each distinct container is built at most once; `undefined` keeps the image.
class ImageCache {
  private readonly images = new Map<string, Promise<string | undefined>>()
  private readonly builder?: ImageBuilder

  constructor(builder?: ImageBuilder) {
    this.builder = builder
  }

  async image(job: Job): Promise<string | undefined> {
    const builder = this.builder
    if (builder === undefined) return undefined
    const experiment = await job.experiment()
    if (experiment === undefined) return undefined
    let image = this.images.get(experiment.containerId)
    if (image === undefined) {
      image = this.build(experiment, builder)
      this.images.set(experiment.containerId, image)
    }
    return image
  }

  private async build(
    experiment: Experiment,
    builder: ImageBuilder
  ): Promise<string | undefined> {
    const containerSpec = await experiment.containerSpec()
    // prebuilt images have no container spec to build from
    if (containerSpec === undefined) return undefined
    return builder(containerSpec)
  }
}

/**
 * Resubmits the jobs of an experiment group, or the user's most recent jobs.
 * The latest run of each job is reconciled first; unless `allJobs` is set
 * only failed and stopped jobs are resubmitted. Jobs are rebuilt against a
 * fresh image when `buildImage` is given and submitted per platform, each
 * platform in its own transaction. A failing platform does not stop the
 * others.
 */
export async function resubmit(
  storage: Storage,
  platforms: PlatformRegistry,
  options: ResubmitOptions = {}
): Promise<ResubmitSummary> {
  const summary: ResubmitSummary = { submitted: 0, failed: 0, skipped: 0 }
  const byPlatform = new Map<Platform, Candidate[]>()

  for (const job of await selectJobs(storage, options)) {
    const run = await job.latestRun()
    if (run === undefined) {
      summary.skipped += 1
      continue
    }
    const status = await updateJobStatus(run, platforms)
    if (!options.allJobs && !RESUBMITTABLE.includes(status)) {
      summary.skipped += 1
      continue
    }
    const candidates = byPlatform.get(run.platform) ?? []
    candidates.push({ job, run })
    byPlatform.set(run.platform, candidates)
  }

  const images = new ImageCache(options.buildImage)
  for (const [platform, candidates] of byPlatform) {
    const requests: SubmissionRequest[] = []
    for (const { job, run } of candidates) {
      try {
        const payload = (await run.jobSpec())?.payload()
        const image = await images.image(job)
        const spec =
          payload === undefined || image === undefined
            ? payload
            : replaceJobSpecImage(platform, payload, image)
        requests.push({ job, spec })
      } catch (error) {
        console.error(`Unable to prepare job ${job.id} for resubmission:`, error)
        summary.failed += 1
      }
    }
    if (requests.length === 0) continue

    try {
      const batch = await submitJobSpecs(
        storage,
        requests,
        platforms,
        platform,
        options.callback
      )
      summary.submitted += batch.submitted
      summary.failed += batch.failed
    } catch (error) {
      console.error(
        `Resubmission of ${requests.length} jobs to ${platform} failed: ${errorMessage(error)}`
      )
      summary.failed += requests.length
    }
  }

  return summary
}
