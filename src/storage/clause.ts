import { isDeepStrictEqual } from 'util'
import { QueryError } from '../../lib/api/errors'
import { getField } from '../helpers/helperFunctions'
import { JsonValue } from '../helpers/historyInterfaces'

export enum QueryOp {
  LT = '<',
  LE = '<=',
  GT = '>',
  GE = '>=',
  EQ = '==',
  IN = 'in',
}

export type ClauseValue = JsonValue | Date | Array<JsonValue | Date>

function normalizeValue(value: ClauseValue): JsonValue {
  // timestamps are stored as ISO strings
  if (value instanceof Date) return value.toISOString()
  if (Array.isArray(value)) return value.map(normalizeValue)
  return value
}

// Ordering is only defined between values of the same primitive type.
function compare(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b)
  }
  return undefined
}

/**
 * A single `field op value` predicate. `field` is a dot path into a record's
 * dictionary form, e.g. `kwargs.learning_rate`.
 *
 * The same clause is sent to a remote index or applied in-process with
 * {@link Clause.apply}.
 */
export class Clause {
  readonly field: string
  readonly op: QueryOp
  readonly value: JsonValue

  constructor(field: string, op: QueryOp, value: ClauseValue) {
    if (field.length === 0 || field.split('.').some((key) => key === '')) {
      throw new QueryError(`invalid field path '${field}'`)
    }
    if (!Object.values(QueryOp).includes(op)) {
      throw new QueryError(`unsupported query operator '${String(op)}'`)
    }
    if (op === QueryOp.IN && !Array.isArray(value)) {
      throw new QueryError(`'${QueryOp.IN}' needs a list of values for ${field}`)
    }
    this.field = field
    this.op = op
    this.value = normalizeValue(value)
  }

  matches(record: unknown): boolean {
    const actual = getField(record, this.field)
    if (actual === undefined) return false

    switch (this.op) {
      case QueryOp.EQ:
        return isDeepStrictEqual(actual, this.value)
      case QueryOp.IN:
        return (
          Array.isArray(this.value) &&
          this.value.some((candidate) => isDeepStrictEqual(actual, candidate))
        )
      case QueryOp.LT:
      case QueryOp.LE:
      case QueryOp.GT:
      case QueryOp.GE: {
        const order = compare(actual, this.value)
        if (order === undefined || Number.isNaN(order)) return false
        if (this.op === QueryOp.LT) return order < 0
        if (this.op === QueryOp.LE) return order <= 0
        if (this.op === QueryOp.GT) return order > 0
        return order >= 0
      }
    }
  }

  /** Returns the record when the predicate holds, `undefined` otherwise. */
  apply<R>(record: R): R | undefined {
    return this.matches(record) ? record : undefined
  }

  toString(): string {
    return `${this.field} ${this.op} ${JSON.stringify(this.value)}`
  }
}
