/**
 * ThumbnailIndex - in-memory record of built thumbnails
 *
 * Maps a source route to the thumbnails built for it, keyed by
 * `dimensionsKey`. The index is an immutable HashMap; every insert returns a
 * new index, so the worker can hold it in a Ref and update it atomically.
 *
 * Entries are append-only: nothing removes a record once it is inserted.
 *
 * @module
 */

import { HashMap, Option } from "effect"

import type { Dimensions, ThumbnailIdentity, ThumbnailRecord } from "../../types/index.js"
import { dimensionsKey } from "../../utils/dimensions.js"

export type ThumbnailIndex = HashMap.HashMap<string, HashMap.HashMap<string, ThumbnailRecord>>

/**
 * An index without records
 */
export const empty: ThumbnailIndex = HashMap.empty()

/**
 * Look up the record of a source route at the given dimensions
 */
export const get = (
  index: ThumbnailIndex,
  sourceRoute: string,
  dimensions: Dimensions
): Option.Option<ThumbnailRecord> =>
  HashMap.get(index, sourceRoute).pipe(
    Option.flatMap((thumbs) => HashMap.get(thumbs, dimensionsKey(dimensions)))
  )

/**
 * True iff a record with the identity's source route and dimensions exists
 */
export const contains = (index: ThumbnailIndex, identity: ThumbnailIdentity): boolean =>
  Option.isSome(get(index, identity.sourceRoute, identity.dimensions))

/**
 * Add a record, replacing any record with the same identity
 */
export const insert = (index: ThumbnailIndex, record: ThumbnailRecord): ThumbnailIndex => {
  const thumbs = HashMap.get(index, record.sourceRoute).pipe(
    Option.getOrElse(() => HashMap.empty<string, ThumbnailRecord>())
  )
  return HashMap.set(index, record.sourceRoute, HashMap.set(thumbs, dimensionsKey(record.dimensions), record))
}

/**
 * All records, in no particular order
 */
export const records = (index: ThumbnailIndex): Array<ThumbnailRecord> =>
  Array.from(HashMap.values(index)).flatMap((thumbs) => Array.from(HashMap.values(thumbs)))

/**
 * Number of records
 */
export const size = (index: ThumbnailIndex): number =>
  HashMap.reduce(index, 0, (total, thumbs) => total + HashMap.size(thumbs))

/**
 * Build an index from records; later records win on duplicate identities
 */
export const fromRecords = (thumbnails: Iterable<ThumbnailRecord>): ThumbnailIndex => {
  let index = empty
  for (const record of thumbnails) {
    index = insert(index, record)
  }
  return index
}
