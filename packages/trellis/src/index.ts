/**
 * trellis
 * Composable request routing and response construction for Node.js
 *
 * Re-exports:
 * - @trellis/core: Outcome, combinators, status registry, MIME table
 * - @trellis/app: context, writers, response builders, matchers, basic auth
 * - @trellis/server: file serving and the node:http transport
 *
 * @example
 * ```typescript
 * import { browseHome, choose, compose, GET, notFound, ok, serve, url, urlScan } from 'trellis'
 *
 * await serve({
 *   port: 3000,
 *   handler: choose([
 *     compose(GET, url('/'), ok('Home')),
 *     compose(GET, urlScan('/users/%d', ([id]) => ok(`User ${id}`))),
 *     compose(GET, browseHome),
 *     notFound('Page not found.'),
 *   ]),
 * })
 * ```
 */

export * from '@trellis/core'
export * from '@trellis/app'
export * from '@trellis/server'
