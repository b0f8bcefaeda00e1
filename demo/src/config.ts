import 'dotenv/config'
import os from 'os'
import postgres from 'postgres'
import Database from 'better-sqlite3'
import { MongoClient } from 'mongodb'
import { loadConfig } from '../../src'

export const CONFIG = loadConfig()

export function openPostgres(url: string): postgres.Sql {
  return postgres(url, {
    keep_alive: 10_000,
    max: Math.min(os.availableParallelism() * 2 + 1, 20),
    connect_timeout: 5,
  })
}

export function openSqlite(path: string): Database.Database {
  return new Database(path, { readonly: true, fileMustExist: true })
}

export function openMongo(uri: string): MongoClient {
  return new MongoClient(uri, { serverSelectionTimeoutMS: 5_000 })
}
