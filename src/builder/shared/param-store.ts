import { placeholder, type SqlDialect } from '../../sql-builder-dialect'

export interface ParamStore {
  add(value: unknown): string
  snapshot(): ParamSnapshot
}

interface ParamSnapshot {
  readonly index: number
  readonly params: readonly unknown[]
}

function assertBindable(value: unknown, index: number): void {
  if (value === undefined) {
    throw new Error(`CRITICAL: Param ${index} is undefined`)
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new Error(`CRITICAL: Param ${index} is not a finite number`)
  }
}

export function createParamStore(dialect: SqlDialect): ParamStore {
  const params: unknown[] = []
  let index = 1

  return {
    add(value: unknown): string {
      assertBindable(value, index)
      params.push(value)
      const token = placeholder(index, dialect)
      index++
      return token
    },
    snapshot(): ParamSnapshot {
      return Object.freeze({ index, params: Object.freeze([...params]) })
    },
  }
}
