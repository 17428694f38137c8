import { Context, Layer } from "effect"
import { HttpApp, HttpRouter } from "@effect/platform"
import type { GraphQLSchema } from "graphql"
import { makeHttpQueryRouter, type MakeHttpQueryRouterOptions } from "@httpql/core"

/**
 * Result of creating a web handler
 */
export interface WebHandler {
  /**
   * Handle a web standard Request and return a Response.
   */
  readonly handler: (request: Request, context?: Context.Context<never>) => Promise<Response>

  /**
   * Dispose of the handler and clean up resources.
   */
  readonly dispose: () => Promise<void>
}

/**
 * Create a web standard Request/Response handler from an HttpRouter.
 *
 * @param router - The HttpRouter to handle (typically from makeHttpQueryRouter)
 * @param layer - Layer providing any services required by the router
 *
 * @example
 * ```typescript
 * const router = makeHttpQueryRouter(schema, { batch: true })
 * const { handler } = toHandler(router, Layer.empty)
 *
 * const response = await handler(new Request("http://localhost/graphql?query={test}"))
 * ```
 */
export const toHandler = <E, R, RE>(
  router: HttpRouter.HttpRouter<E, R>,
  layer: Layer.Layer<R, RE>
): WebHandler => HttpApp.toWebHandlerLayer(router, layer)

/**
 * Build the GraphQL router for `schema` and wrap it in a web handler.
 */
export const makeHandler = (
  schema: GraphQLSchema,
  options: MakeHttpQueryRouterOptions = {}
): WebHandler => toHandler(makeHttpQueryRouter(schema, options), Layer.empty)
