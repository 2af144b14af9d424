import axios, { AxiosInstance } from 'axios'
import { z } from 'zod'
import { JsonObject } from '../helpers/historyInterfaces'

export const CAIP_BASE_URL = 'https://ml.googleapis.com/v1/'

// https://cloud.google.com/ai-platform/training/docs/reference/rest/v1/projects.jobs
const caipJobSchema = z.object({
  jobId: z.string(),
  state: z.string().optional(),
  errorMessage: z.string().optional(),
})

export type CaipJob = z.infer<typeof caipJobSchema>

export interface CaipConfig {
  baseURL?: string
  accessToken?: string
}

export class CaipAPI {
  apiClient: AxiosInstance

  constructor(config: CaipConfig = {}) {
    this.apiClient = axios.create({
      baseURL: config.baseURL ?? CAIP_BASE_URL,
      headers: {
        'Content-Type': 'application/json',
        ...(config.accessToken
          ? { Authorization: `Bearer ${config.accessToken}` }
          : {}),
      },
    })
  }

  async createJob(projectId: string, body: JsonObject): Promise<CaipJob> {
    try {
      const response = await this.apiClient.post<unknown>(
        `projects/${projectId}/jobs`,
        body
      )
      return caipJobSchema.parse(response.data)
    } catch (error) {
      console.error(
        `An error occurred while creating a training job in ${projectId}:`,
        error
      )
      throw error
    }
  }

  async getJob(projectId: string, jobId: string): Promise<CaipJob> {
    try {
      const response = await this.apiClient.get<unknown>(
        `projects/${projectId}/jobs/${jobId}`
      )
      return caipJobSchema.parse(response.data)
    } catch (error) {
      console.error(
        `An error occurred while fetching details for job ID: ${jobId}`,
        error
      )
      throw error
    }
  }

  async cancelJob(projectId: string, jobId: string): Promise<void> {
    try {
      await this.apiClient.post(`projects/${projectId}/jobs/${jobId}:cancel`, {})
    } catch (error) {
      console.error(`An error occurred while cancelling job ID: ${jobId}`, error)
      throw error
    }
  }
}
