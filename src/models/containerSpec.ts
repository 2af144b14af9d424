import { z } from 'zod'
import { parseTimestamp, toIsoTimestamp } from '../../lib/time'
import { contentId } from '../helpers/helperFunctions'
import { ContainerSpecRecord, JsonObject } from '../helpers/historyInterfaces'

export type Accelerator =
  | { kind: 'none' }
  | { kind: 'gpu'; type: string; count: number }
  | { kind: 'tpu'; type: string; count: number }

export const NO_ACCELERATOR: Accelerator = { kind: 'none' }

export function acceleratorLabel(accelerator: Accelerator): string {
  switch (accelerator.kind) {
    case 'none':
      return 'CPU'
    case 'gpu':
      return `GPU ${accelerator.count}x${accelerator.type}`
    case 'tpu':
      return `TPU ${accelerator.count}x${accelerator.type}`
    default: {
      const unhandled: never = accelerator
      throw new Error(`unhandled accelerator ${JSON.stringify(unhandled)}`)
    }
  }
}

/** Parameters a container image is built from. */
export type ContainerBuildParams = {
  baseImage?: string
  // a prebuilt image; nothing is built when set
  imageId?: string
  buildPath?: string
  requirementsPath?: string
  condaEnvPath?: string
  extraDirs?: string[]
  credentialsPath?: string
  accelerator?: Accelerator
}

const acceleratorSchema: z.ZodType<Accelerator> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('gpu'), type: z.string(), count: z.number() }),
  z.object({ kind: z.literal('tpu'), type: z.string(), count: z.number() }),
])

const containerBuildParamsSchema: z.ZodType<ContainerBuildParams> = z.object({
  baseImage: z.string().optional(),
  imageId: z.string().optional(),
  buildPath: z.string().optional(),
  requirementsPath: z.string().optional(),
  condaEnvPath: z.string().optional(),
  extraDirs: z.array(z.string()).optional(),
  credentialsPath: z.string().optional(),
  accelerator: acceleratorSchema.optional(),
})

function toSpec(params: ContainerBuildParams): JsonObject {
  const spec: JsonObject = {}
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) spec[key] = value
  }
  return spec
}

/**
 * How a container is built. Two specs built from structurally equal
 * parameters by the same user share one id.
 */
export class ContainerSpec {
  readonly id: string
  readonly user: string
  readonly spec: JsonObject
  readonly timestamp: Date

  constructor(record: ContainerSpecRecord) {
    this.id = record.id
    this.user = record.user
    this.spec = record.spec
    this.timestamp = parseTimestamp(record.timestamp)
  }

  /** Build parameters; unrecognised keys in the stored spec are dropped. */
  params(): ContainerBuildParams {
    const parsed = containerBuildParamsSchema.safeParse(this.spec)
    return parsed.success ? parsed.data : {}
  }

  accelerator(): Accelerator {
    return this.params().accelerator ?? NO_ACCELERATOR
  }

  equals(other: ContainerSpec): boolean {
    return this.id === other.id
  }

  describe(): string {
    const params = this.params()
    const extraDirs = params.extraDirs?.join(',') ?? 'none'
    return (
      `${this.id.slice(0, 8)}: job_mode: ${acceleratorLabel(this.accelerator())}, ` +
      `build url: ${params.buildPath ?? params.imageId ?? 'N/A'}, ` +
      `extra dirs: ${extraDirs}`
    )
  }

  toDict(): ContainerSpecRecord {
    return {
      id: this.id,
      user: this.user,
      spec: this.spec,
      timestamp: toIsoTimestamp(this.timestamp),
    }
  }

  static createRecord(
    params: ContainerBuildParams,
    user: string,
    now: Date = new Date()
  ): ContainerSpecRecord {
    const spec = toSpec(params)
    return {
      id: contentId('containerSpec', user, spec),
      user,
      spec,
      timestamp: toIsoTimestamp(now),
    }
  }
}
