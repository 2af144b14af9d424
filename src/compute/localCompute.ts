import { spawn } from 'node:child_process'
import { z } from 'zod'
import { SubmissionError } from '../../lib/api/errors'
import { JsonObject } from '../helpers/historyInterfaces'
import { jsonObjectSchema } from '../helpers/historySchemas'
import { Job } from '../models/job'
import { Run } from '../models/run'
import { JobStatus, Platform } from '../models/status'
import { ComputePlatform, SubmissionStatus } from './computePlatform'

/** Runs a command to completion and resolves to its exit code. */
export type LocalExecutor = (command: string[]) => Promise<number>

export const spawnExecutor: LocalExecutor = ([program, ...args]) =>
  new Promise((resolve, reject) => {
    const child = spawn(program, args, { stdio: 'inherit' })
    child.on('error', reject)
    child.on('close', (code) => resolve(code ?? 1))
  })

export const localJobSpecSchema = z.object({
  container: z.string(),
  command: z.array(z.string()).min(1),
})

export type LocalJobSpec = z.infer<typeof localJobSpecSchema>

export interface LocalComputeOptions {
  // image used for jobs submitted without a spec
  image?: string
  execute?: LocalExecutor
  dockerArgs?: string[]
}

/**
 * Runs jobs in local containers, one at a time. A submission only returns
 * once the container exits, so every status it records is terminal.
 */
export class LocalCompute implements ComputePlatform {
  readonly name = 'LOCAL'
  readonly platform = Platform.LOCAL
  private readonly options: LocalComputeOptions
  private readonly execute: LocalExecutor

  constructor(options: LocalComputeOptions = {}) {
    this.options = options
    this.execute = options.execute ?? spawnExecutor
  }

  buildSpec(job: Job, image: string): LocalJobSpec {
    return {
      container: image,
      command: [
        'docker',
        'run',
        '--rm',
        ...(this.options.dockerArgs ?? []),
        image,
        ...job.argv(),
      ],
    }
  }

  async submit(job: Job, spec?: JsonObject): Promise<SubmissionStatus> {
    const local = this.resolveSpec(job, spec)
    const code = await this.execute(local.command)
    return {
      spec: jsonObjectSchema.parse(local),
      status: code === 0 ? JobStatus.SUCCEEDED : JobStatus.FAILED,
      details: { jobName: local.container, exitCode: code },
    }
  }

  // Nothing to poll once the container has exited.
  async status(run: Run): Promise<JobStatus> {
    return run.status
  }

  async stop(): Promise<boolean> {
    return true
  }

  private resolveSpec(job: Job, spec?: JsonObject): LocalJobSpec {
    if (spec !== undefined) {
      const parsed = localJobSpecSchema.safeParse(spec)
      if (!parsed.success) {
        throw new SubmissionError(`invalid local job spec: ${parsed.error.message}`)
      }
      return parsed.data
    }
    if (this.options.image === undefined) {
      throw new SubmissionError(`no image to run job ${job.id} with`)
    }
    return this.buildSpec(job, this.options.image)
  }
}
