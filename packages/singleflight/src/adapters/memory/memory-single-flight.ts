import type { FlightResult, InFlightKey, Singleflight } from "../../ports/single-flight"

type Follower<T> = {
  resolve: (result: FlightResult<T>) => void
  reject: (err: unknown) => void
}

interface InFlight<T> {
  followers: Follower<T>[]
}

export class MemorySingleflight<T = unknown> implements Singleflight<T> {
  private readonly flights = new Map<InFlightKey, InFlight<unknown>>()

  run<R = T>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> {
    const existing = this.flights.get(key) as InFlight<R> | undefined

    if (existing) {
      return new Promise((resolve, reject) => {
        existing.followers.push({ resolve, reject })
      })
    }

    return this.lead(key, fn)
  }

  has(key: InFlightKey): boolean {
    return this.flights.has(key)
  }

  get size(): number {
    return this.flights.size
  }

  private async lead<R>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> {
    const flight: InFlight<R> = { followers: [] }

    this.flights.set(key, flight as InFlight<unknown>)

    try {
      const value = await fn()
      const sharedWith = flight.followers.length

      for (const follower of flight.followers) {
        follower.resolve({ value, isLeader: false, sharedWith, source: "inflight" })
      }

      return { value, isLeader: true, sharedWith, source: "leader" }
    } catch (err) {
      for (const follower of flight.followers) {
        follower.reject(err)
      }

      throw err
    } finally {
      this.flights.delete(key)
    }
  }
}
