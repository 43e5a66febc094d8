export type InFlightKey = string

/**
 * - "leader": this caller ran the function
 * - "inflight": this caller joined a flight started by another
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T
  isLeader: boolean

  /** Number of followers that joined the flight (leader excluded). Same for every caller. */
  sharedWith: number

  source: FlightSource
}

/**
 * Deduplicates concurrent work per key.
 *
 * The first caller for a key becomes the leader and runs `fn`; callers arriving
 * while it runs are queued as followers. When `fn` settles, followers are
 * resumed in the order they joined, all with the leader's outcome (shared fate),
 * and the key is released so the next call starts a new flight.
 *
 * @example
 * ```ts
 * const group = new MemorySingleflight<ConfigMap>()
 *
 * const [a, b] = await Promise.all([
 *   group.run("config.yml", () => readDocument()),
 *   group.run("config.yml", () => readDocument()),
 * ])
 *
 * a.isLeader   // true
 * b.source     // "inflight"
 * a.value === b.value
 * ```
 */
export interface Singleflight<T = unknown> {
  run<R = T>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>>

  /** `true` while a flight for `key` is running. */
  has(key: InFlightKey): boolean

  readonly size: number
}
