import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Cause, Effect } from "effect"
import type { GraphQLSchema } from "graphql"
import { decodeBody, searchParamsToData } from "../body"
import { runHttpQuery } from "../dispatch"
import { encodeExecutionResults, jsonEncode } from "../encode"
import { badRequest, type HttpQueryError } from "../error"
import { GraphQLExecutor, graphqlJsExecutor } from "../executor"
import { normalizeConfig, type HttpQueryConfigInput } from "./config"

/**
 * Error handler function type for handling uncaught errors during GraphQL execution.
 * Receives the error cause and should return an HTTP response.
 */
export type ErrorHandler = (
  cause: Cause.Cause<unknown>
) => Effect.Effect<HttpServerResponse.HttpServerResponse, never, never>

/**
 * Default error handler that returns a 500 Internal Server Error.
 * In non-production environments, it logs the full error for debugging.
 */
export const defaultErrorHandler: ErrorHandler = (cause) =>
  (process.env.NODE_ENV !== "production"
    ? Effect.logError("GraphQL error", cause)
    : Effect.void
  ).pipe(
    Effect.andThen(
      HttpServerResponse.json(
        {
          errors: [
            {
              message: "An error occurred processing your request",
            },
          ],
        },
        { status: 500 }
      ).pipe(Effect.orDie)
    )
  )

/**
 * Options for makeHttpQueryRouter
 */
export interface MakeHttpQueryRouterOptions extends HttpQueryConfigInput {
  /**
   * Builds the context value handed to resolvers. Called once per HTTP
   * request; every operation of a batch sees the same value.
   */
  readonly context?: (request: HttpServerRequest.HttpServerRequest) => unknown

  /** Root value handed to resolvers */
  readonly rootValue?: unknown

  /** GraphQL engine to run operations with (default: graphql-js) */
  readonly executor?: GraphQLExecutor

  /**
   * Custom error handler for uncaught errors during GraphQL execution.
   * Defaults to returning a 500 Internal Server Error with a generic message.
   */
  readonly errorHandler?: ErrorHandler
}

const toPathInput = (path: string): HttpRouter.PathInput =>
  path.startsWith("/") ? `/${path.slice(1)}` : `/${path}`

const contentType = "application/json"

/**
 * Respond to a protocol failure with its status, headers and a GraphQL-style body.
 */
const httpQueryErrorResponse = (
  error: HttpQueryError,
  pretty: boolean
): HttpServerResponse.HttpServerResponse =>
  HttpServerResponse.text(jsonEncode({ errors: [{ message: error.message }] }, pretty), {
    status: error.statusCode,
    headers: error.headers,
    contentType,
  })

/**
 * Create an HttpRouter serving GraphQL over GET and POST.
 *
 * Every method is routed to the endpoint so that unsupported ones get a 405
 * with an `Allow` header rather than a 404.
 *
 * @example
 * ```typescript
 * const router = makeHttpQueryRouter(schema, {
 *   path: "/graphql",
 *   batch: true,
 *   context: (request) => ({ headers: request.headers }),
 * })
 *
 * const app = HttpRouter.empty.pipe(
 *   HttpRouter.get("/health", HttpServerResponse.json({ status: "ok" })),
 *   HttpRouter.concat(router)
 * )
 * ```
 */
export const makeHttpQueryRouter = (
  schema: GraphQLSchema,
  options: MakeHttpQueryRouterOptions = {}
): HttpRouter.HttpRouter<never, never> => {
  const config = normalizeConfig(options)
  const executor = options.executor ?? graphqlJsExecutor
  const errorHandler = options.errorHandler ?? defaultErrorHandler

  const respond = (
    request: HttpServerRequest.HttpServerRequest,
    url: URL,
    pretty: boolean
  ) =>
    Effect.gen(function* () {
      const method = request.method.toUpperCase()

      const data =
        method === "POST"
          ? yield* request.text.pipe(
              Effect.mapError(() => badRequest("POST body could not be read.")),
              Effect.flatMap((body) => decodeBody(body, request.headers["content-type"]))
            )
          : {}

      const result = yield* runHttpQuery(
        schema,
        { method, data, queryData: searchParamsToData(url.searchParams) },
        {
          batchEnabled: config.batch,
          precedence: method === "GET" ? config.precedence.get : config.precedence.post,
          contextValue: options.context?.(request),
          rootValue: options.rootValue,
          concurrency: config.concurrency,
        }
      )

      const { body, statusCode } = encodeExecutionResults(result, { pretty })
      return HttpServerResponse.text(body, { status: statusCode, contentType })
    })

  const graphqlHandler = Effect.gen(function* () {
    const request = yield* HttpServerRequest.HttpServerRequest
    const url = new URL(request.url, "http://localhost")
    const pretty = config.pretty || url.searchParams.has("pretty")

    return yield* respond(request, url, pretty).pipe(
      Effect.catchTag("HttpQueryError", (error) =>
        Effect.logWarning("GraphQL request rejected", error.message).pipe(
          Effect.as(httpQueryErrorResponse(error, pretty))
        )
      )
    )
  }).pipe(
    Effect.provideService(GraphQLExecutor, executor),
    Effect.catchAllCause(errorHandler)
  )

  return HttpRouter.empty.pipe(HttpRouter.all(toPathInput(config.path), graphqlHandler))
}
