import { Effect, Layer } from "effect"
import { HttpRouter, HttpServer } from "@effect/platform"
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { createServer } from "node:http"

/**
 * Options for the Node.js GraphQL server
 */
export interface ServeOptions {
  /** Port to listen on (default: 4000) */
  readonly port?: number
  /** Hostname to bind to (default: "0.0.0.0") */
  readonly host?: string
  /** Callback when server starts */
  readonly onStart?: (url: string) => void
}

export const serverUrl = (host: string, port: number): string =>
  `http://${host === "0.0.0.0" ? "localhost" : host}:${port}`

/**
 * Build the layer that serves `router` from a `node:http` server.
 * Nothing listens until the layer is launched.
 */
export const makeServerLayer = <E, R, RE>(
  router: HttpRouter.HttpRouter<E, R>,
  layer: Layer.Layer<R, RE>,
  options: Pick<ServeOptions, "port" | "host"> = {}
) => {
  const { port = 4000, host = "0.0.0.0" } = options

  const app = router.pipe(
    Effect.catchAllCause((cause) => Effect.die(cause)),
    HttpServer.serve()
  )

  const serverLayer = NodeHttpServer.layer(() => createServer(), { port, host })
  const fullLayer = Layer.merge(serverLayer, layer)

  return Layer.provide(app, fullLayer)
}

/**
 * Start a Node.js HTTP server with the given router.
 *
 * Runs until the process is interrupted; `NodeRuntime.runMain` closes the
 * server and releases the layer on SIGINT or SIGTERM.
 *
 * @param router - The HttpRouter to serve (typically from makeHttpQueryRouter)
 * @param layer - Layer providing the router's service dependencies
 * @param options - Server configuration options
 *
 * @example
 * ```typescript
 * const router = makeHttpQueryRouter(schema, { batch: true })
 *
 * serve(router, Layer.empty, {
 *   port: 4000,
 *   onStart: (url) => console.log(`Server running at ${url}`)
 * })
 * ```
 */
export const serve = <E, R, RE>(
  router: HttpRouter.HttpRouter<E, R>,
  layer: Layer.Layer<R, RE>,
  options: ServeOptions = {}
): void => {
  const { port = 4000, host = "0.0.0.0", onStart } = options

  if (onStart) {
    onStart(serverUrl(host, port))
  }

  NodeRuntime.runMain(Layer.launch(makeServerLayer(router, layer, { port, host })))
}
