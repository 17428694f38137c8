import { Effect } from "effect"
import type { OperationDefinitionNode } from "graphql"
import { HttpQueryError } from "./error"

export type HttpQueryMethod = "GET" | "POST"

/**
 * Normalize the request method, rejecting anything but GET and POST.
 */
export const ensureAllowedMethod = (
  method: string
): Effect.Effect<HttpQueryMethod, HttpQueryError> => {
  const normalized = method.toUpperCase()
  return normalized === "GET" || normalized === "POST"
    ? Effect.succeed(normalized)
    : Effect.fail(
        new HttpQueryError({
          statusCode: 405,
          message: "GraphQL only supports GET and POST requests.",
          headers: { Allow: "GET, POST" },
        })
      )
}

/**
 * GET is a safe method: only query operations may run through it.
 */
export const guardOperation = (
  method: HttpQueryMethod,
  operation: OperationDefinitionNode
): Effect.Effect<void, HttpQueryError> =>
  method === "GET" && operation.operation !== "query"
    ? Effect.fail(
        new HttpQueryError({
          statusCode: 405,
          message: `Can only perform a ${operation.operation} operation from a POST request.`,
          headers: { Allow: "POST" },
        })
      )
    : Effect.void
