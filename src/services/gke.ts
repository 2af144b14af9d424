import {
  BatchV1Api,
  HttpError,
  KubeConfig,
  ObjectSerializer,
  V1Job,
} from '@kubernetes/client-node'
import { JsonObject } from '../helpers/historyInterfaces'

/** The batch/v1 Job operations the GKE platform needs from a cluster. */
export interface KubeJobClient {
  /** Resolves to `undefined` when the job does not exist. */
  readJob(name: string, namespace: string): Promise<V1Job | undefined>
  createJob(namespace: string, job: V1Job): Promise<V1Job>
  /** Resolves to `false` when the job does not exist. */
  deleteJob(name: string, namespace: string): Promise<boolean>
}

// Converts a stored manifest into the client's model, e.g. string
// timestamps into Dates.
export function toV1Job(manifest: JsonObject): V1Job {
  const job: V1Job = ObjectSerializer.deserialize(manifest, 'V1Job')
  return job
}

function isNotFound(error: unknown): boolean {
  return error instanceof HttpError && error.statusCode === 404
}

/** {@link KubeJobClient} over the cluster of a kubeconfig context. */
export class ClusterJobClient implements KubeJobClient {
  private readonly batch: BatchV1Api

  constructor(context?: string, kubeConfig: KubeConfig = new KubeConfig()) {
    if (kubeConfig.getContexts().length === 0) kubeConfig.loadFromDefault()
    if (context !== undefined) kubeConfig.setCurrentContext(context)
    this.batch = kubeConfig.makeApiClient(BatchV1Api)
  }

  async readJob(name: string, namespace: string): Promise<V1Job | undefined> {
    try {
      const { body } = await this.batch.readNamespacedJob(name, namespace)
      return body
    } catch (error) {
      if (isNotFound(error)) return undefined
      console.error(`An error occurred while reading job ${namespace}/${name}:`, error)
      throw error
    }
  }

  async createJob(namespace: string, job: V1Job): Promise<V1Job> {
    try {
      const { body } = await this.batch.createNamespacedJob(namespace, job)
      return body
    } catch (error) {
      console.error(`An error occurred while creating a job in ${namespace}:`, error)
      throw error
    }
  }

  async deleteJob(name: string, namespace: string): Promise<boolean> {
    try {
      // foreground deletion also removes the job's pods
      await this.batch.deleteNamespacedJob(
        name,
        namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        'Foreground'
      )
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      console.error(`An error occurred while deleting job ${namespace}/${name}:`, error)
      throw error
    }
  }
}
