export type SqlDialect = 'postgres' | 'sqlite'

export function placeholder(index: number, dialect: SqlDialect): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new Error(`CRITICAL: Index must be integer >= 1, got ${index}`)
  }
  return dialect === 'postgres' ? `$${index}` : '?'
}

export function countColumn(column: string): string {
  if (!column || column.trim().length === 0) {
    throw new Error('countColumn column is required and cannot be empty')
  }
  return `COUNT(${column})`
}

export function rankOver(orderExpr: string): string {
  if (!orderExpr || orderExpr.trim().length === 0) {
    throw new Error('rankOver orderExpr is required and cannot be empty')
  }
  return `RANK() OVER (ORDER BY ${orderExpr} DESC)`
}
