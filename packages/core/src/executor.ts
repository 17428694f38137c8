import { Context, Either, Layer } from "effect"
import {
  GraphQLError,
  execute,
  parse,
  validate,
  type DocumentNode,
  type ExecutionArgs,
  type ExecutionResult,
  type GraphQLSchema,
} from "graphql"

/**
 * The GraphQL engine the transport layer drives. Parsing and validation
 * report errors as values; execution may complete synchronously or not.
 */
export interface GraphQLExecutor {
  readonly parse: (source: string) => Either.Either<DocumentNode, GraphQLError>
  readonly validate: (
    schema: GraphQLSchema,
    document: DocumentNode
  ) => ReadonlyArray<GraphQLError>
  readonly execute: (args: ExecutionArgs) => ExecutionResult | Promise<ExecutionResult>
}

export const GraphQLExecutor = Context.GenericTag<GraphQLExecutor>("GraphQLExecutor")

/**
 * Executor backed by graphql-js.
 */
export const graphqlJsExecutor: GraphQLExecutor = {
  parse: (source) => {
    try {
      return Either.right(parse(source))
    } catch (error) {
      return Either.left(
        error instanceof GraphQLError ? error : new GraphQLError(String(error))
      )
    }
  },
  validate: (schema, document) => validate(schema, document),
  execute: (args) => execute(args),
}

export const GraphQLExecutorLive: Layer.Layer<GraphQLExecutor> = Layer.succeed(
  GraphQLExecutor,
  graphqlJsExecutor
)
