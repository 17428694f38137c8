import { Either } from "effect"
import {
  GraphQLError,
  Kind,
  type DocumentNode,
  type OperationDefinitionNode,
} from "graphql"

/**
 * Operation definitions of a document. Fragments are not operations.
 */
export const getOperations = (
  document: DocumentNode
): ReadonlyArray<OperationDefinitionNode> =>
  document.definitions.filter(
    (d): d is OperationDefinitionNode => d.kind === Kind.OPERATION_DEFINITION
  )

/**
 * Pick the operation a request asks for.
 *
 * A single operation is always selected, whatever name was sent. With several,
 * `operationName` is required and must match one of them.
 */
export const selectOperation = (
  document: DocumentNode,
  operationName: string | undefined
): Either.Either<OperationDefinitionNode, GraphQLError> => {
  const operations = getOperations(document)

  if (operations.length === 1) {
    return Either.right(operations[0])
  }
  if (operations.length === 0) {
    return Either.left(new GraphQLError("Must provide an operation."))
  }
  if (operationName === undefined) {
    return Either.left(
      new GraphQLError("Must provide operation name if query contains multiple operations.")
    )
  }

  const operation = operations.find((o) => o.name?.value === operationName)
  return operation
    ? Either.right(operation)
    : Either.left(new GraphQLError(`Unknown operation named "${operationName}".`))
}
