/**
 * Repository route utilities
 *
 * A route is a `/`-separated path inside the repository, without leading or
 * trailing separators. A file's source route is its item route combined with
 * the file's own route.
 *
 * @module
 */

import { Either } from "effect"

import { InvalidRouteError } from "../errors/index.js"

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/

/**
 * Split a route into its meaningful segments.
 * Backslashes count as separators; empty and `.` segments are dropped.
 */
export const routeSegments = (route: string): Array<string> =>
  route
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".")

/**
 * Normalize a route, e.g. `"/documents//sample/"` => `"documents/sample"`
 */
export const normalizeRoute = (route: string): string => routeSegments(route).join("/")

/**
 * Combine an item route and a file route into the file's full route.
 *
 * Fails if either part climbs out of the repository (`..`), contains a
 * control character, or if nothing is left after normalization.
 *
 * @example
 * ```ts
 * combineRoutes("documents/sample", "files/image.jpg")
 * // => Either.right("documents/sample/files/image.jpg")
 * ```
 */
export const combineRoutes = (
  parent: string,
  route: string
): Either.Either<string, InvalidRouteError> => {
  const segments = [...routeSegments(parent), ...routeSegments(route)]

  if (segments.some((segment) => segment === "..")) {
    return Either.left(new InvalidRouteError({ parent, route, reason: "parent directory segments are not allowed" }))
  }

  if (segments.some((segment) => CONTROL_CHARACTERS.test(segment))) {
    return Either.left(new InvalidRouteError({ parent, route, reason: "control characters are not allowed" }))
  }

  if (segments.length === 0) {
    return Either.left(new InvalidRouteError({ parent, route, reason: "the combined route is empty" }))
  }

  return Either.right(segments.join("/"))
}
