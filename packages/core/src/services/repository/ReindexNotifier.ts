/**
 * Fan-out of reindex signals to registered sinks
 *
 * Shared by repository implementations to back `afterReindex`.
 *
 * @module
 */

import type { Scope } from "effect"
import { Effect, Queue, Ref } from "effect"

export interface ReindexNotifier {
  /**
   * Register a sink for as long as the scope is open
   */
  readonly register: (sink: Queue.Enqueue<void>) => Effect.Effect<void, never, Scope.Scope>

  /**
   * Offer one signal to every registered sink
   */
  readonly notify: () => Effect.Effect<void>

  /**
   * Number of registered sinks
   */
  readonly sinkCount: () => Effect.Effect<number>
}

export const makeReindexNotifier = (): Effect.Effect<ReindexNotifier> =>
  Effect.gen(function*() {
    const sinksRef = yield* Ref.make<ReadonlySet<Queue.Enqueue<void>>>(new Set())

    const register: ReindexNotifier["register"] = (sink) =>
      Effect.acquireRelease(
        Ref.update(sinksRef, (sinks) => new Set(sinks).add(sink)),
        () =>
          Ref.update(sinksRef, (sinks) => {
            const next = new Set(sinks)
            next.delete(sink)
            return next
          })
      )

    const notify: ReindexNotifier["notify"] = () =>
      Effect.gen(function*() {
        const sinks = yield* Ref.get(sinksRef)
        for (const sink of sinks) {
          // A queue may be shut down before its registration scope closes
          if (yield* Queue.isShutdown(sink)) continue
          yield* Queue.offer(sink, undefined)
        }
      })

    const sinkCount: ReindexNotifier["sinkCount"] = () => Ref.get(sinksRef).pipe(Effect.map((sinks) => sinks.size))

    return { register, notify, sinkCount }
  })
