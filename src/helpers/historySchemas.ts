import { z } from 'zod'
import { JobStatus, Platform } from '../models/status'
import {
  ContainerSpecRecord,
  ExperimentGroupRecord,
  ExperimentRecord,
  JobRecord,
  JobSpecRecord,
  JsonObject,
  JsonValue,
  Kwargs,
  RunRecord,
} from './historyInterfaces'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
)

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(
  z.string(),
  jsonValueSchema
)

const kwargsSchema: z.ZodType<Kwargs> = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean()])
)

const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'invalid timestamp')

export const experimentGroupRecordSchema: z.ZodType<ExperimentGroupRecord> =
  z.object({
    id: z.string().min(1),
    name: z.string(),
    user: z.string(),
    timestamp: timestampSchema,
  })

export const containerSpecRecordSchema: z.ZodType<ContainerSpecRecord> =
  z.object({
    id: z.string().min(1),
    user: z.string(),
    spec: jsonObjectSchema,
    timestamp: timestampSchema,
  })

export const experimentRecordSchema: z.ZodType<ExperimentRecord> = z.object({
  id: z.string().min(1),
  name: z.string(),
  xgroup: z.string(),
  container: z.string(),
  command: z.string().nullable(),
  args: z.array(z.string()),
  configs: z.array(kwargsSchema),
  user: z.string(),
  timestamp: timestampSchema,
})

export const jobRecordSchema: z.ZodType<JobRecord> = z.object({
  id: z.string().min(1),
  name: z.string(),
  experiment: z.string(),
  user: z.string(),
  timestamp: timestampSchema,
  args: z.array(z.string()),
  kwargs: kwargsSchema,
})

export const jobSpecRecordSchema: z.ZodType<JobSpecRecord> = z.object({
  id: z.string().min(1),
  job: z.string(),
  platform: z.nativeEnum(Platform),
  spec: jsonObjectSchema,
  timestamp: timestampSchema,
})

export const runRecordSchema: z.ZodType<RunRecord> = z.object({
  id: z.string().min(1),
  job: z.string(),
  jobSpec: z.string(),
  user: z.string(),
  platform: z.nativeEnum(Platform),
  timestamp: timestampSchema,
  status: z.nativeEnum(JobStatus),
  details: jsonObjectSchema,
})

/**
 * Validates a record read back from a backend. Corrupt records are logged
 * and dropped so that one bad document cannot fail a whole query.
 */
export function parseRecord<R>(
  schema: z.ZodType<R>,
  collection: string,
  data: unknown
): R | undefined {
  const result = schema.safeParse(data)
  if (!result.success) {
    console.error(
      `Skipping invalid record in ${collection}:`,
      result.error.issues.map((issue) => issue.message).join('; ')
    )
    return undefined
  }
  return result.data
}
