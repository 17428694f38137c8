import { Effect, Either, Option, Predicate } from "effect"
import * as S from "effect/Schema"
import { badRequest, type HttpQueryError } from "./error"

/**
 * An untyped key/value source a request can carry GraphQL params in,
 * e.g. the decoded body or the decoded query string.
 */
export type RequestData = Readonly<Record<string, unknown>>

/**
 * One resolved unit of work.
 *
 * `query` stays untyped: a non-string value is reported against the
 * operation itself rather than failing the request.
 */
export interface OperationParams {
  readonly query: unknown
  readonly variables?: Readonly<Record<string, unknown>>
  readonly operationName?: string
}

/**
 * Which source wins when both carry the same field.
 */
export type ParamPrecedence = "body-first" | "query-first"

export const isRequestData = (value: unknown): value is RequestData =>
  Predicate.isRecord(value)

/**
 * Order the two sources by precedence. The result is what `extractParams` consults.
 */
export const orderSources = (
  precedence: ParamPrecedence,
  body: RequestData,
  queryString: RequestData
): ReadonlyArray<RequestData> =>
  precedence === "body-first" ? [body, queryString] : [queryString, body]

/**
 * Look a field up in a single source. A key holding `null` is present.
 */
export const lookup = (source: RequestData, key: string): Option.Option<unknown> =>
  Object.prototype.hasOwnProperty.call(source, key) ? Option.some(source[key]) : Option.none()

const isBlank = (value: unknown): boolean => value === null || value === ""

/**
 * Take the field from the first source holding a non-blank value. A `null`
 * or `""` found on the way is kept only when no later source has more.
 */
export const resolveField = (
  sources: ReadonlyArray<RequestData>,
  key: string
): Option.Option<unknown> => {
  const candidates = sources.map((source) => lookup(source, key))
  return Option.orElse(
    Option.firstSomeOf(
      candidates.map((candidate) => Option.filter(candidate, (value) => !isBlank(value)))
    ),
    () => Option.firstSomeOf(candidates)
  )
}

const decodeJson = S.decodeUnknownEither(S.parseJson())

const invalidVariables = () => badRequest("Variables are invalid JSON.")

/**
 * Normalize a raw `variables` value: mappings pass through, strings are
 * parsed as JSON, `null` and the empty string mean no variables.
 */
export const loadJsonVariables = (
  raw: unknown
): Effect.Effect<Readonly<Record<string, unknown>> | undefined, HttpQueryError> => {
  if (raw === undefined || raw === null || raw === "") {
    return Effect.succeed(undefined)
  }
  if (isRequestData(raw)) {
    return Effect.succeed(raw)
  }
  if (typeof raw !== "string") {
    return Effect.fail(invalidVariables())
  }
  return Either.match(decodeJson(raw), {
    onLeft: () => Effect.fail(invalidVariables()),
    onRight: (parsed) =>
      parsed === null
        ? Effect.succeed(undefined)
        : isRequestData(parsed)
          ? Effect.succeed(parsed)
          : Effect.fail(invalidVariables()),
  })
}

/**
 * Resolve `query`, `variables` and `operationName` from the given sources,
 * consulted in order.
 */
export const extractParams = (
  sources: ReadonlyArray<RequestData>
): Effect.Effect<OperationParams, HttpQueryError> =>
  Effect.gen(function* () {
    const query = Option.getOrUndefined(resolveField(sources, "query"))
    const variables = yield* loadJsonVariables(
      Option.getOrUndefined(resolveField(sources, "variables"))
    )
    const operationName = resolveField(sources, "operationName").pipe(
      Option.filter(Predicate.isString),
      Option.filter((name) => name.length > 0),
      Option.getOrUndefined
    )

    return {
      query,
      ...(variables !== undefined ? { variables } : {}),
      ...(operationName !== undefined ? { operationName } : {}),
    }
  })

/**
 * Whether the params carry something the executor could try to run.
 */
export const hasQuery = (params: OperationParams): boolean =>
  params.query !== undefined && params.query !== null && params.query !== ""
