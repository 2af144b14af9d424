import { QueryError } from '../../lib/api/errors'
import { getField } from '../helpers/helperFunctions'
import { Clause, ClauseValue, QueryOp } from './clause'
import { Collection, Direction, Query } from './interfaces'

export interface QueryOrder {
  field: string
  direction: Direction
}

/** Everything a backend needs to run one query. */
export interface QueryPlan {
  clauses: readonly Clause[]
  order?: QueryOrder
  limit?: number
}

export type QueryRunner<T> = (plan: QueryPlan) => Promise<IterableIterator<T>>

export class HistoryQuery<T> implements Query<T> {
  private readonly runner: QueryRunner<T>
  private readonly plan: QueryPlan

  constructor(runner: QueryRunner<T>, plan: QueryPlan = { clauses: [] }) {
    this.runner = runner
    this.plan = plan
  }

  where(field: string, op: QueryOp, value: ClauseValue): Query<T> {
    return new HistoryQuery(this.runner, {
      ...this.plan,
      clauses: [...this.plan.clauses, new Clause(field, op, value)],
    })
  }

  orderBy(field: string, direction: Direction = Direction.ASCENDING): Query<T> {
    return new HistoryQuery(this.runner, {
      ...this.plan,
      order: { field, direction },
    })
  }

  limit(count: number): Query<T> {
    if (!Number.isInteger(count) || count < 0) {
      throw new QueryError(`limit must be a non-negative integer, got ${count}`)
    }
    return new HistoryQuery(this.runner, { ...this.plan, limit: count })
  }

  execute(): Promise<IterableIterator<T>> {
    return this.runner(this.plan)
  }

  toString(): string {
    const parts = this.plan.clauses.map((clause) => clause.toString())
    if (this.plan.order) {
      parts.push(`order by ${this.plan.order.field} ${this.plan.order.direction}`)
    }
    if (this.plan.limit !== undefined) parts.push(`limit ${this.plan.limit}`)
    return parts.join(', ')
  }
}

export class EntityCollection<T> implements Collection<T> {
  private readonly getter: (id: string) => Promise<T | undefined>
  private readonly runner: QueryRunner<T>

  constructor(
    getter: (id: string) => Promise<T | undefined>,
    runner: QueryRunner<T>
  ) {
    this.getter = getter
    this.runner = runner
  }

  get(id: string): Promise<T | undefined> {
    return this.getter(id)
  }

  where(field: string, op: QueryOp, value: ClauseValue): Query<T> {
    return new HistoryQuery(this.runner).where(field, op, value)
  }
}

/** Lazily keeps the records every clause accepts, up to `limit`. */
export function* filterRecords<R>(
  records: Iterable<R>,
  clauses: readonly Clause[],
  limit?: number
): IterableIterator<R> {
  if (limit === 0) return
  let count = 0
  for (const record of records) {
    if (!clauses.every((clause) => clause.matches(record))) continue
    yield record
    count += 1
    if (limit !== undefined && count >= limit) return
  }
}

// Records missing the field sort last in either direction.
export function sortRecords<R>(records: R[], order: QueryOrder): R[] {
  const sign = order.direction === Direction.ASCENDING ? 1 : -1
  return [...records].sort((a, b) => {
    const left = getField(a, order.field)
    const right = getField(b, order.field)
    if (left === undefined || right === undefined) {
      return Number(left === undefined) - Number(right === undefined)
    }
    if (typeof left === 'number' && typeof right === 'number') {
      return sign * (left - right)
    }
    const l = String(left)
    const r = String(right)
    return sign * (l < r ? -1 : l > r ? 1 : 0)
  })
}
