import { Data, Effect, Either, Predicate } from "effect"
import {
  GraphQLError,
  type DocumentNode,
  type ExecutionArgs,
  type ExecutionResult,
  type GraphQLSchema,
  type OperationDefinitionNode,
} from "graphql"
import { inspect } from "graphql/jsutils/inspect"
import { isBatchEnvelope } from "./body"
import { badRequest, type HttpQueryError } from "./error"
import { GraphQLExecutor } from "./executor"
import { ensureAllowedMethod, guardOperation, type HttpQueryMethod } from "./method"
import { selectOperation } from "./operation"
import {
  extractParams,
  hasQuery,
  isRequestData,
  orderSources,
  type OperationParams,
  type ParamPrecedence,
  type RequestData,
} from "./params"

/**
 * The `(data, errors)` produced for one requested operation, together with
 * the params it was run with.
 */
export interface ExecutionOutcome {
  readonly params: OperationParams
  readonly data: Readonly<Record<string, unknown>> | null
  readonly errors?: ReadonlyArray<GraphQLError>
}

/**
 * Outcomes shaped like the request: a bare outcome for a single request,
 * an ordered list for a batch.
 */
export type HttpQueryResult = Data.TaggedEnum<{
  Single: { readonly outcome: ExecutionOutcome }
  Batch: { readonly outcomes: ReadonlyArray<ExecutionOutcome> }
}>

export const HttpQueryResult = Data.taggedEnum<HttpQueryResult>()

/**
 * Outcomes in request order, whatever the request shape.
 */
export const outcomesOf = (result: HttpQueryResult): ReadonlyArray<ExecutionOutcome> =>
  HttpQueryResult.$match(result, {
    Single: ({ outcome }) => [outcome],
    Batch: ({ outcomes }) => outcomes,
  })

/**
 * What the HTTP adapter extracted from the request.
 */
export interface HttpQueryRequest {
  readonly method: string
  /** Decoded body: a params object, or an array of them for a batch */
  readonly data: unknown
  /** Decoded query string */
  readonly queryData?: RequestData
}

export interface RunHttpQueryOptions {
  /** Accept array bodies (default: false) */
  readonly batchEnabled?: boolean
  /**
   * Which source wins for single requests. Defaults to the query string for
   * GET and to the body for POST.
   */
  readonly precedence?: ParamPrecedence
  /** Passed read-only to every operation of the request */
  readonly contextValue?: unknown
  readonly rootValue?: unknown
  /** How many batch operations may execute at once (default: 1) */
  readonly concurrency?: number | "unbounded"
}

export const defaultPrecedence = (method: HttpQueryMethod): ParamPrecedence =>
  method === "GET" ? "query-first" : "body-first"

type PreparedOperation = Data.TaggedEnum<{
  Resolved: { readonly outcome: ExecutionOutcome }
  Ready: {
    readonly params: OperationParams
    readonly document: DocumentNode
    readonly operation: OperationDefinitionNode
  }
}>

const PreparedOperation = Data.taggedEnum<PreparedOperation>()

const failed = (params: OperationParams, errors: ReadonlyArray<GraphQLError>) =>
  PreparedOperation.Resolved({ outcome: { params, data: null, errors } })

/**
 * Run everything that may reject the request before execution: param
 * extraction, parsing, validation, operation selection and the method guard.
 * Failures local to the operation become a resolved outcome.
 */
const prepareOperation = (
  schema: GraphQLSchema,
  method: HttpQueryMethod,
  sources: ReadonlyArray<RequestData>
): Effect.Effect<PreparedOperation, HttpQueryError, GraphQLExecutor> =>
  Effect.gen(function* () {
    const executor = yield* GraphQLExecutor
    const params = yield* extractParams(sources)

    if (!hasQuery(params)) {
      return yield* Effect.fail(badRequest("Must provide query string."))
    }

    const query = params.query
    if (typeof query !== "string") {
      return failed(params, [
        new GraphQLError(`Must provide Source. Received: ${inspect(query)}.`),
      ])
    }

    const parsed = executor.parse(query)
    if (Either.isLeft(parsed)) {
      return failed(params, [parsed.left])
    }
    const document = parsed.right

    const validationErrors = executor.validate(schema, document)
    if (validationErrors.length > 0) {
      return failed(params, validationErrors)
    }

    const selected = selectOperation(document, params.operationName)
    if (Either.isLeft(selected)) {
      return failed(params, [selected.left])
    }

    yield* guardOperation(method, selected.right)

    return PreparedOperation.Ready({ params, document, operation: selected.right })
  })

const toGraphQLError = (error: unknown): GraphQLError =>
  error instanceof GraphQLError
    ? error
    : new GraphQLError(error instanceof Error ? error.message : String(error), {
        originalError: error instanceof Error ? error : undefined,
      })

/**
 * Execute a prepared operation. Anything the executor throws is reported on
 * the operation rather than failing its siblings.
 */
const executeOperation = (
  args: ExecutionArgs
): Effect.Effect<ExecutionResult, never, GraphQLExecutor> =>
  Effect.gen(function* () {
    const executor = yield* GraphQLExecutor
    const executeResult = yield* Effect.try(() => executor.execute(args))

    if (Predicate.isPromise(executeResult)) {
      return yield* Effect.tryPromise(() => executeResult)
    }
    return executeResult
  }).pipe(
    Effect.catchAll((exception) =>
      Effect.succeed<ExecutionResult>({ errors: [toGraphQLError(exception.error)] })
    )
  )

const completeOperation = (
  schema: GraphQLSchema,
  prepared: PreparedOperation,
  options: RunHttpQueryOptions
): Effect.Effect<ExecutionOutcome, never, GraphQLExecutor> =>
  PreparedOperation.$match(prepared, {
    Resolved: ({ outcome }) => Effect.succeed(outcome),
    Ready: ({ params, document, operation }) =>
      executeOperation({
        schema,
        document,
        rootValue: options.rootValue,
        contextValue: options.contextValue,
        variableValues: params.variables,
        operationName: operation.name?.value,
      }).pipe(Effect.map((result) => toOutcome(params, result))),
  })

const toOutcome = (params: OperationParams, result: ExecutionResult): ExecutionOutcome => ({
  params,
  data: result.data ?? null,
  ...(result.errors && result.errors.length > 0 ? { errors: result.errors } : {}),
})

/**
 * Resolve, check and execute every operation a request carries.
 *
 * Protocol failures (`HttpQueryError`) abort the whole request before any
 * operation executes. GraphQL errors stay on the operation that caused them.
 *
 * @example
 * ```typescript
 * const result = yield* runHttpQuery(schema, {
 *   method: "GET",
 *   data: {},
 *   queryData: { query: "{ test }" },
 * })
 * ```
 */
export const runHttpQuery = (
  schema: GraphQLSchema,
  request: HttpQueryRequest,
  options: RunHttpQueryOptions = {}
): Effect.Effect<HttpQueryResult, HttpQueryError, GraphQLExecutor> =>
  Effect.gen(function* () {
    const method = yield* ensureAllowedMethod(request.method)
    const { batchEnabled = false, concurrency = 1 } = options
    const precedence = options.precedence ?? defaultPrecedence(method)
    const isBatch = isBatchEnvelope(request.data)

    if (isBatchEnvelope(request.data)) {
      if (!batchEnabled) {
        return yield* Effect.fail(badRequest("Batch GraphQL requests are not enabled."))
      }
      if (request.data.length === 0) {
        return yield* Effect.fail(badRequest("Received an empty list in the batch request."))
      }
    }

    const entries: ReadonlyArray<unknown> = isBatchEnvelope(request.data)
      ? request.data
      : [request.data]

    const sourceLists = yield* Effect.forEach(entries, (entry) =>
      isRequestData(entry)
        ? Effect.succeed(
            isBatch ? [entry] : orderSources(precedence, entry, request.queryData ?? {})
          )
        : Effect.fail(
            badRequest(`GraphQL params should be an object. Received: ${inspect(entry)}.`)
          )
    )

    yield* Effect.logDebug(
      `Dispatching ${isBatch ? "batch" : "single"} GraphQL request with ${entries.length} operation(s)`
    )

    const prepared = yield* Effect.forEach(sourceLists, (sources) =>
      prepareOperation(schema, method, sources)
    )

    const outcomes = yield* Effect.forEach(
      prepared,
      (operation) => completeOperation(schema, operation, options),
      { concurrency }
    )

    return isBatch
      ? HttpQueryResult.Batch({ outcomes })
      : HttpQueryResult.Single({ outcome: outcomes[0] })
  })
