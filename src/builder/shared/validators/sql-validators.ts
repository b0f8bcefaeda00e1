import { REGEX_CACHE, SQL_KEYWORDS } from '../constants'
import { isNonEmptyString } from './type-guards'
import type { SqlDialect } from '../../../sql-builder-dialect'

function sqlPreview(sql: string): string {
  return `${sql.substring(0, 100)}...`
}

export function needsQuoting(id: string): boolean {
  if (!isNonEmptyString(id)) return true

  const isKeyword = SQL_KEYWORDS.has(id.toLowerCase())
  if (isKeyword) return true

  return !REGEX_CACHE.VALID_IDENTIFIER.test(id)
}

export function validateSelectQuery(sql: string): void {
  if (!isNonEmptyString(sql)) {
    throw new Error('CRITICAL: Generated empty SQL query')
  }

  const upper = sql.toUpperCase()
  const select = upper.indexOf('SELECT')
  const from = upper.indexOf('FROM')
  if (select === -1 || from === -1 || select > from) {
    throw new Error(
      `CRITICAL: Invalid SQL structure. SQL: ${sqlPreview(sql)}`,
    )
  }
}

function collectDollarIndices(sql: string): number[] {
  const out: number[] = []
  for (const m of sql.matchAll(/\$(\d+)/g)) {
    out.push(parseInt(m[1], 10))
  }
  return out
}

export function validateParamConsistency(
  sql: string,
  params: readonly unknown[],
  dialect: SqlDialect,
): void {
  if (dialect === 'sqlite') {
    const count = (sql.match(/\?/g) ?? []).length
    if (count !== params.length) {
      throw new Error(
        `CRITICAL: Parameter mismatch - SQL has ${count} placeholders but ${params.length} params provided. SQL: ${sqlPreview(sql)}`,
      )
    }
    return
  }

  const seen = new Set(collectDollarIndices(sql))
  for (let k = 1; k <= params.length; k++) {
    if (!seen.has(k)) {
      throw new Error(
        `CRITICAL: Parameter mismatch - SQL is missing placeholder $${k}. SQL: ${sqlPreview(sql)}`,
      )
    }
  }
  if (seen.size !== params.length) {
    throw new Error(
      `CRITICAL: Parameter mismatch - SQL references ${seen.size} placeholders but ${params.length} params provided. SQL: ${sqlPreview(sql)}`,
    )
  }
}
