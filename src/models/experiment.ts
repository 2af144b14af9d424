import { parseTimestamp, toIsoTimestamp } from '../../lib/time'
import { contentId } from '../helpers/helperFunctions'
import {
  ExperimentRecord,
  JobRecord,
  Kwargs,
} from '../helpers/historyInterfaces'
import { HistoryContext } from '../storage/interfaces'
import { ContainerSpec } from './containerSpec'
import { ExperimentGroup } from './experimentGroup'
import { Job } from './job'

export interface ExperimentParams {
  name: string
  xgroup: string
  container: string
  command: string | null
  args: string[]
  configs: Kwargs[]
  user: string
}

/**
 * One parameter sweep over a container. Every entry of `configs` becomes
 * one {@link Job}; the experiment itself is platform-independent.
 */
export class Experiment {
  readonly id: string
  readonly name: string
  readonly xgroupId: string
  readonly containerId: string
  readonly command: string | null
  readonly args: string[]
  readonly configs: Kwargs[]
  readonly user: string
  readonly timestamp: Date
  private readonly context: HistoryContext

  constructor(record: ExperimentRecord, context: HistoryContext) {
    this.context = context
    this.id = record.id
    this.name = record.name
    this.xgroupId = record.xgroup
    this.containerId = record.container
    this.command = record.command
    this.args = record.args
    this.configs = record.configs
    this.user = record.user
    this.timestamp = parseTimestamp(record.timestamp)
  }

  jobs(): Promise<Job[]> {
    return this.context.jobsOf(this.id)
  }

  xgroup(): Promise<ExperimentGroup | undefined> {
    return this.context.fetch('xgroups', this.xgroupId)
  }

  // undefined for prebuilt images, whose container is an image id
  containerSpec(): Promise<ContainerSpec | undefined> {
    return this.context.fetch('containerSpecs', this.containerId)
  }

  toDict(): ExperimentRecord {
    return {
      id: this.id,
      name: this.name,
      xgroup: this.xgroupId,
      container: this.containerId,
      command: this.command,
      args: this.args,
      configs: this.configs,
      user: this.user,
      timestamp: toIsoTimestamp(this.timestamp),
    }
  }

  static createRecord(
    params: ExperimentParams,
    now: Date = new Date()
  ): ExperimentRecord {
    const { name, xgroup, container, command, args, configs, user } = params
    return {
      id: contentId('experiment', xgroup, container, command, args, configs),
      name,
      xgroup,
      container,
      command,
      args,
      configs,
      user,
      timestamp: toIsoTimestamp(now),
    }
  }

  // No configs still runs the container once, without kwargs.
  static jobRecords(
    experiment: ExperimentRecord,
    now: Date = new Date()
  ): JobRecord[] {
    const configs = experiment.configs.length > 0 ? experiment.configs : [{}]
    return configs.map((kwargs, index) => ({
      id: contentId('job', experiment.id, index),
      name: `${experiment.name}-${index}`,
      experiment: experiment.id,
      user: experiment.user,
      timestamp: toIsoTimestamp(now),
      args: experiment.args,
      kwargs,
    }))
  }
}
