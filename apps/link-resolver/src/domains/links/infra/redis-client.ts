import { createClient } from "redis"

export type RedisSetOptions = { EX: number }

/** The commands this service sends, typed narrowly enough to mock. */
export type RedisClient = {
  readonly isOpen: boolean
  readonly isReady: boolean

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  ping(): Promise<string>
  on(event: "error", listener: (err: Error) => void): unknown

  get(key: string): Promise<string | null>
  set(key: string, value: string, opts?: RedisSetOptions): Promise<unknown>
  del(key: string): Promise<number>
}

export function createRedisClient(url: string): RedisClient {
  return createClient({ url }) as unknown as RedisClient
}
