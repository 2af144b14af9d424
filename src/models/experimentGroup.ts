import { compactTimestamp, parseTimestamp, toIsoTimestamp } from '../../lib/time'
import { contentId } from '../helpers/helperFunctions'
import { ExperimentGroupRecord } from '../helpers/historyInterfaces'
import { HistoryContext } from '../storage/interfaces'
import { Experiment } from './experiment'

/** Named bucket of related experiments, unique per (user, name). */
export class ExperimentGroup {
  readonly id: string
  readonly name: string
  readonly user: string
  readonly timestamp: Date
  private readonly context: HistoryContext

  constructor(record: ExperimentGroupRecord, context: HistoryContext) {
    this.context = context
    this.id = record.id
    this.name = record.name
    this.user = record.user
    this.timestamp = parseTimestamp(record.timestamp)
  }

  experiments(): Promise<Experiment[]> {
    return this.context.experimentsOf(this.id)
  }

  toDict(): ExperimentGroupRecord {
    return {
      id: this.id,
      name: this.name,
      user: this.user,
      timestamp: toIsoTimestamp(this.timestamp),
    }
  }

  static generateName(user: string, date: Date = new Date()): string {
    return `${user}-xgroup-${compactTimestamp(date)}`
  }

  static createRecord(
    name: string | undefined,
    user: string,
    now: Date = new Date()
  ): ExperimentGroupRecord {
    const groupName = name ?? ExperimentGroup.generateName(user, now)
    return {
      id: contentId('xgroup', user, groupName),
      name: groupName,
      user,
      timestamp: toIsoTimestamp(now),
    }
  }
}
